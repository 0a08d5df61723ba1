/**
 * Grid Engine — Core Models
 *
 * Entities live in one arena keyed by bus id. Edges are stored as id
 * references on both ends: a Load names its Source, a Source lists its
 * Loads. Both ends are written in the same store update.
 * Pure TypeScript. No storage dependency.
 */

import type { ComponentKind, LoadKind } from '../parameters/types';

// ─── Status ───

export type OperatingStatus = 'normal' | 'warning' | 'critical' | 'inactive';

export type EntityKind = ComponentKind;

// ─── Entities ───

interface EntityBase {
    /** Unique bus identifier, also the arena key */
    id: string;
    kind: EntityKind;
    label: string;
    gridX: number;
    gridY: number;
    /** Per-unit voltage. A Load mirrors its Source; 1.0 when unconnected. */
    voltagePerUnit: number;
    status: OperatingStatus;
}

export interface SourceEntity extends EntityBase {
    kind: 'source';
    /** Configured rating, informational only */
    nominalPowerMw: number;
    nominalVoltageKv: number;
    /** Fixed capacity used for loading, independent of nominalPowerMw */
    capacityMw: number;
    totalActiveDemand: number;
    totalReactiveDemand: number;
    loadingPercent: number;
    loadIds: string[];
}

export interface LoadEntity extends EntityBase {
    kind: LoadKind;
    /** MW */
    activeDemand: number;
    powerFactor: number;
    /** MVAr, signed by kind. Always derived, never set directly. */
    reactiveDemand: number;
    sourceId: string | null;
}

export type GridEntity = SourceEntity | LoadEntity;

export function isSource(entity: GridEntity): entity is SourceEntity {
    return entity.kind === 'source';
}

export function isLoad(entity: GridEntity): entity is LoadEntity {
    return entity.kind !== 'source';
}

// ─── Grid State ───

export interface GridState {
    entities: Record<string, GridEntity>;
    /** The single Source of the session, once placed */
    sourceId: string | null;
    /** Next bus number; bus 0 is the reference bus */
    busCounter: number;
    /** Monotonic version counter, bumped on every change */
    version: number;
    /** Completed recompute passes */
    tickCount: number;
}

// ─── Status Transitions ───

export interface StatusTransition {
    entityId: string;
    from: OperatingStatus;
    to: OperatingStatus;
    /** Human-readable reasons, filled in for transitions into critical */
    reasons: string[];
}

export interface RecomputeReport {
    tick: number;
    transitions: StatusTransition[];
}

// ─── Serialisation ───

export interface GridSnapshot {
    entities: GridEntity[];
    edges: Array<{ sourceId: string; loadId: string }>;
    sourceId: string | null;
    busCounter: number;
    version: number;
}

// ─── Status Summaries ───

export interface SourceSummary {
    busId: string;
    loadingPercent: number;
    voltagePerUnit: number;
    totalActiveDemand: number;
    totalReactiveDemand: number;
    availableCapacity: number;
    connectedLoads: number;
    isOverloaded: boolean;
    status: OperatingStatus;
}

export interface LoadSummary {
    busId: string;
    kind: LoadKind;
    isConnected: boolean;
    activeDemand: number;
    reactiveDemand: number;
    powerFactor: number;
    apparentPower: number;
    actualPowerFactor: number;
    connectedTo: string | null;
    voltagePerUnit: number | null;
    status: OperatingStatus;
}
