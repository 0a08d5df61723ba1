/**
 * Recompute — aggregate demand, voltage and status for every Source
 * and its Loads.
 *
 * Operates on a plain GridState (or an immer draft of one). Never
 * fails: pure arithmetic over in-memory state.
 */

import type {
    GridState,
    LoadEntity,
    OperatingStatus,
    SourceEntity,
    StatusTransition,
} from './models';
import { isLoad, isSource } from './models';
import {
    NOMINAL_VOLTAGE_PU,
    THRESHOLDS,
    classifyStatus,
    loadingPercent,
    voltagePerUnit,
} from './electrical';

export function recomputeGrid(state: GridState): StatusTransition[] {
    const transitions: StatusTransition[] = [];

    for (const entity of Object.values(state.entities)) {
        if (isSource(entity)) {
            transitions.push(...recomputeSource(state, entity));
        }
    }

    // Loads with no Source are inactive regardless of any Source state.
    for (const entity of Object.values(state.entities)) {
        if (isLoad(entity) && entity.sourceId === null) {
            entity.voltagePerUnit = NOMINAL_VOLTAGE_PU;
            const t = applyStatus(entity, 'inactive', []);
            if (t) transitions.push(t);
        }
    }

    return transitions;
}

function recomputeSource(state: GridState, source: SourceEntity): StatusTransition[] {
    const loads = connectedLoads(state, source);

    let p = 0;
    let q = 0;
    for (const load of loads) {
        p += load.activeDemand;
        q += load.reactiveDemand;
    }

    source.totalActiveDemand = p;
    source.totalReactiveDemand = q;
    source.loadingPercent = loadingPercent(p, source.capacityMw);
    source.voltagePerUnit = voltagePerUnit(source.loadingPercent, q);

    const status = classifyStatus(source.loadingPercent, source.voltagePerUnit);
    const transitions: StatusTransition[] = [];

    const st = applyStatus(source, status, sourceReasons(source));
    if (st) transitions.push(st);

    for (const load of loads) {
        load.voltagePerUnit = source.voltagePerUnit;
        const lt = applyStatus(load, status, loadReasons(load));
        if (lt) transitions.push(lt);
    }

    return transitions;
}

/** Loads whose edge is recorded on both ends */
export function connectedLoads(state: GridState, source: SourceEntity): LoadEntity[] {
    const loads: LoadEntity[] = [];
    for (const id of source.loadIds) {
        const entity = state.entities[id];
        if (entity && isLoad(entity) && entity.sourceId === source.id) {
            loads.push(entity);
        }
    }
    return loads;
}

function applyStatus(
    entity: SourceEntity | LoadEntity,
    next: OperatingStatus,
    criticalReasons: string[],
): StatusTransition | null {
    const prev = entity.status;
    if (prev === next) return null;
    entity.status = next;
    return {
        entityId: entity.id,
        from: prev,
        to: next,
        reasons: next === 'critical' ? criticalReasons : [],
    };
}

function sourceReasons(source: SourceEntity): string[] {
    const reasons: string[] = [];
    if (source.loadingPercent > THRESHOLDS.criticalLoading) {
        reasons.push(`High loading at ${source.id}: ${(source.loadingPercent * 100).toFixed(1)}%`);
    }
    if (source.voltagePerUnit < THRESHOLDS.criticalVoltage) {
        reasons.push(`Low voltage at ${source.id}: ${source.voltagePerUnit.toFixed(2)} pu`);
    }
    return reasons;
}

function loadReasons(load: LoadEntity): string[] {
    if (load.voltagePerUnit < THRESHOLDS.criticalVoltage) {
        return [`Low voltage at ${load.id}: ${load.voltagePerUnit.toFixed(2)} pu`];
    }
    return [];
}
