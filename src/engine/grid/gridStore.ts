/**
 * Grid Store — Zustand (vanilla) + Immer
 *
 * Owns the session's entity arena. Every mutation checks its
 * preconditions against the current state first and only then runs an
 * immer recipe, so a failed call leaves the graph untouched and a
 * successful one updates both ends of an edge in the same `set`.
 *
 * Nothing here is persisted: the graph is rebuilt from user actions
 * every session.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { produce } from 'immer';

import type { ComponentKind, LoadKind, ParameterValues } from '../parameters/types';
import { PARAMETER_CATALOG } from '../parameters/catalog';
import type { Result } from '../errors';
import { GraphStateError, ValidationError, fail, ok } from '../errors';
import type {
    GridEntity,
    GridSnapshot,
    GridState,
    LoadEntity,
    LoadSummary,
    RecomputeReport,
    SourceEntity,
    SourceSummary,
    StatusTransition,
} from './models';
import { isLoad, isSource } from './models';
import {
    DEFAULT_SOURCE_CAPACITY_MW,
    NOMINAL_VOLTAGE_PU,
    actualPowerFactor,
    apparentPower,
    connectionHealth,
    reactiveDemand,
} from './electrical';
import type { ConnectionHealth } from './electrical';
import { recomputeGrid } from './recompute';

// ─── Collaborators ───

/** Where entities read their initial electrical parameters from */
export interface ParameterSource {
    getEffective(kind: ComponentKind): ParameterValues;
}

export interface GridStoreOptions {
    parameters?: ParameterSource;
    /** Fixed Source capacity used for loading (default: 1000 MW) */
    capacityMw?: number;
    /** Sink for human-readable simulation messages */
    log?: (message: string) => void;
    /** Called once per entity each time it enters the critical status */
    onCriticalStatus?: (transition: StatusTransition) => void;
    /** Called when the session is reset, before the reset message is logged */
    onReset?: () => void;
}

// ─── Store Actions ───

interface GridActions {
    // ─── Placement ───
    placeSource(gridX: number, gridY: number): Result<SourceEntity>;
    placeLoad(gridX: number, gridY: number, kind: LoadKind): Result<LoadEntity>;
    /** Remove an entity, tearing down every edge it takes part in */
    removeEntity(id: string): Result<GridEntity>;

    // ─── Connection (Load side) ───
    connect(loadId: string, sourceId: string | null | undefined): Result<void>;
    disconnect(loadId: string): Result<void>;

    // ─── Connection (Source side) ───
    attachLoad(sourceId: string, loadId: string): Result<void>;
    detachLoad(sourceId: string, loadId: string): Result<void>;

    // ─── Demand ───
    updateDemand(loadId: string, activeDemand: number, powerFactor?: number): Result<LoadEntity>;

    // ─── Simulation ───
    recompute(): RecomputeReport;
    resetSession(): void;

    // ─── Queries ───
    getEntity(id: string): GridEntity | null;
    getSource(): SourceEntity | null;
    getLoads(): LoadEntity[];
    getSourceSummary(id: string): SourceSummary | null;
    getLoadSummary(id: string): LoadSummary | null;
    /** Connection line level of a Load; null when it has no connection */
    getConnectionHealth(loadId: string): ConnectionHealth | null;
    getSnapshot(): GridSnapshot;
}

export type GridStore = GridState & GridActions;
export type GridStoreApi = StoreApi<GridStore>;

// ─── Initial State ───

const initialState: GridState = {
    entities: {},
    sourceId: null,
    busCounter: 1,
    version: 0,
    tickCount: 0,
};

const LOAD_LABELS: Record<LoadKind, string> = {
    inductive_load: 'CI',
    capacitive_load: 'CC',
    resistive_load: 'CR',
};

// ─── Store ───

export function createGridStore(options: GridStoreOptions = {}): GridStoreApi {
    const capacityMw = options.capacityMw ?? DEFAULT_SOURCE_CAPACITY_MW;
    const log = options.log ?? ((message: string) => console.info(`[Grid] ${message}`));

    return createStore<GridStore>()((set, get) => {
        /** Source reasons carry a "Warning:" prefix; a Load's low-voltage line is logged as is */
        const reportTransitions = (transitions: StatusTransition[]): void => {
            for (const t of transitions) {
                if (t.to !== 'critical') continue;
                const prefix = get().sourceId === t.entityId ? 'Warning: ' : '';
                for (const reason of t.reasons) log(`${prefix}${reason}`);
                options.onCriticalStatus?.(t);
            }
        };

        /** Write both ends of the edge and recompute, in one update */
        const link = (sourceId: string, loadId: string): void => {
            let transitions: StatusTransition[] = [];
            set(
                produce((draft: GridState) => {
                    const source = draft.entities[sourceId];
                    const load = draft.entities[loadId];
                    if (!source || !isSource(source) || !load || !isLoad(load)) return;
                    load.sourceId = source.id;
                    source.loadIds.push(load.id);
                    transitions = recomputeGrid(draft);
                    draft.version++;
                }),
            );
            const load = findLoad(get(), loadId);
            if (load) {
                log(
                    `Connected ${load.id} to ${sourceId} ` +
                        `(P=${load.activeDemand.toFixed(1)}MW, Q=${load.reactiveDemand.toFixed(1)}MVAr)`,
                );
            }
            reportTransitions(transitions);
        };

        const unlink = (sourceId: string, loadId: string): void => {
            let transitions: StatusTransition[] = [];
            set(
                produce((draft: GridState) => {
                    const source = draft.entities[sourceId];
                    const load = draft.entities[loadId];
                    if (!source || !isSource(source) || !load || !isLoad(load)) return;
                    source.loadIds = source.loadIds.filter((id) => id !== loadId);
                    load.sourceId = null;
                    transitions = recomputeGrid(draft);
                    draft.version++;
                }),
            );
            log(`Disconnected ${loadId} from ${sourceId}`);
            reportTransitions(transitions);
        };

        return {
            ...initialState,

            // ─── Placement ───

            placeSource: (gridX, gridY) => {
                const coords = checkCoordinates(gridX, gridY);
                if (coords) return fail(coords);

                const state = get();
                if (state.sourceId !== null) {
                    return fail(
                        new GraphStateError('SourceAlreadyPlaced', 'Only one source allowed'),
                    );
                }

                const values = options.parameters?.getEffective('source') ?? {};
                const id = `Source_Bus_${state.busCounter}`;
                const source: SourceEntity = {
                    id,
                    kind: 'source',
                    label: 'PS',
                    gridX,
                    gridY,
                    voltagePerUnit: NOMINAL_VOLTAGE_PU,
                    status: 'normal',
                    nominalPowerMw: readParam(values, 'source', 'p_nom_mw'),
                    nominalVoltageKv: readParam(values, 'source', 'v_nom_kv'),
                    capacityMw,
                    totalActiveDemand: 0,
                    totalReactiveDemand: 0,
                    loadingPercent: 0,
                    loadIds: [],
                };

                set(
                    produce((draft: GridState) => {
                        draft.entities[id] = source;
                        draft.sourceId = id;
                        draft.busCounter++;
                        recomputeGrid(draft);
                        draft.version++;
                    }),
                );

                log(`Added source at bus ${id}`);
                const placed = findSource(get(), id);
                return placed ? ok(placed) : fail(notFound(id));
            },

            placeLoad: (gridX, gridY, kind) => {
                const coords = checkCoordinates(gridX, gridY);
                if (coords) return fail(coords);

                const values = options.parameters?.getEffective(kind) ?? {};
                const activeDemand = readParam(values, kind, 'p_demand_mw');
                const powerFactor = readParam(values, kind, 'power_factor');
                const id = `Load_Bus_${get().busCounter}`;

                const load: LoadEntity = {
                    id,
                    kind,
                    label: LOAD_LABELS[kind],
                    gridX,
                    gridY,
                    voltagePerUnit: NOMINAL_VOLTAGE_PU,
                    status: 'inactive',
                    activeDemand,
                    powerFactor,
                    reactiveDemand: reactiveDemand(kind, activeDemand, powerFactor),
                    sourceId: null,
                };

                set(
                    produce((draft: GridState) => {
                        draft.entities[id] = load;
                        draft.busCounter++;
                        draft.version++;
                    }),
                );

                log(
                    `Load added at bus ${id} ` +
                        `(P: ${load.activeDemand.toFixed(1)} MW, Q: ${load.reactiveDemand.toFixed(1)} MVAr)`,
                );
                const placed = findLoad(get(), id);
                return placed ? ok(placed) : fail(notFound(id));
            },

            removeEntity: (id) => {
                const entity = get().entities[id];
                if (!entity) return fail(notFound(id));

                let transitions: StatusTransition[] = [];
                set(
                    produce((draft: GridState) => {
                        const target = draft.entities[id];
                        if (!target) return;

                        if (isSource(target)) {
                            for (const loadId of target.loadIds) {
                                const load = draft.entities[loadId];
                                if (load && isLoad(load)) load.sourceId = null;
                            }
                            if (draft.sourceId === id) draft.sourceId = null;
                        } else if (target.sourceId !== null) {
                            const source = draft.entities[target.sourceId];
                            if (source && isSource(source)) {
                                source.loadIds = source.loadIds.filter((l) => l !== id);
                            }
                        }

                        delete draft.entities[id];
                        transitions = recomputeGrid(draft);
                        draft.version++;
                    }),
                );

                log(`Removed ${id}`);
                reportTransitions(transitions);
                return ok(entity);
            },

            // ─── Connection (Load side) ───

            connect: (loadId, sourceId) => {
                const state = get();
                const load = state.entities[loadId];
                if (!load) return fail(notFound(loadId));
                if (!isLoad(load)) return fail(wrongKind(loadId, 'a load'));

                if (sourceId === null || sourceId === undefined || !state.entities[sourceId]) {
                    return fail(new GraphStateError('NilSource', `No source to connect ${loadId} to`));
                }
                return state.attachLoad(sourceId, loadId);
            },

            disconnect: (loadId) => {
                const state = get();
                const load = state.entities[loadId];
                if (!load) return fail(notFound(loadId));
                if (!isLoad(load)) return fail(wrongKind(loadId, 'a load'));
                if (load.sourceId === null) {
                    return fail(new GraphStateError('NotConnected', `${loadId} is not connected`));
                }
                return state.detachLoad(load.sourceId, loadId);
            },

            // ─── Connection (Source side) ───

            attachLoad: (sourceId, loadId) => {
                const state = get();
                const source = state.entities[sourceId];
                const load = state.entities[loadId];
                if (!source) return fail(notFound(sourceId));
                if (!isSource(source)) return fail(wrongKind(sourceId, 'a source'));
                if (!load) return fail(notFound(loadId));
                if (!isLoad(load)) return fail(wrongKind(loadId, 'a load'));

                if (source.loadIds.includes(loadId) || load.sourceId !== null) {
                    const target = load.sourceId ?? sourceId;
                    return fail(
                        new GraphStateError('AlreadyConnected', `${loadId} is already connected to ${target}`),
                    );
                }

                link(sourceId, loadId);
                return ok(undefined);
            },

            detachLoad: (sourceId, loadId) => {
                const state = get();
                const source = state.entities[sourceId];
                if (!source) return fail(notFound(sourceId));
                if (!isSource(source)) return fail(wrongKind(sourceId, 'a source'));

                const load = state.entities[loadId];
                if (!source.loadIds.includes(loadId) || !load || !isLoad(load) || load.sourceId !== sourceId) {
                    return fail(
                        new GraphStateError('NotConnected', `${loadId} is not connected to ${sourceId}`),
                    );
                }

                unlink(sourceId, loadId);
                return ok(undefined);
            },

            // ─── Demand ───

            updateDemand: (loadId, activeDemand, powerFactor) => {
                const load = get().entities[loadId];
                if (!load) return fail(notFound(loadId));
                if (!isLoad(load)) return fail(wrongKind(loadId, 'a load'));

                if (!Number.isFinite(activeDemand) || activeDemand < 0) {
                    return fail(new ValidationError('Active demand must be a non-negative number'));
                }
                if (
                    powerFactor !== undefined &&
                    (!Number.isFinite(powerFactor) || powerFactor <= 0 || powerFactor > 1)
                ) {
                    return fail(new ValidationError('Power factor must be greater than 0 and at most 1'));
                }

                let transitions: StatusTransition[] = [];
                set(
                    produce((draft: GridState) => {
                        const target = draft.entities[loadId];
                        if (!target || !isLoad(target)) return;
                        target.activeDemand = activeDemand;
                        if (powerFactor !== undefined) target.powerFactor = powerFactor;
                        target.reactiveDemand = reactiveDemand(
                            target.kind,
                            target.activeDemand,
                            target.powerFactor,
                        );
                        if (target.sourceId !== null) {
                            transitions = recomputeGrid(draft);
                        }
                        draft.version++;
                    }),
                );

                reportTransitions(transitions);
                const updated = findLoad(get(), loadId);
                return updated ? ok(updated) : fail(notFound(loadId));
            },

            // ─── Simulation ───

            recompute: () => {
                let transitions: StatusTransition[] = [];
                set(
                    produce((draft: GridState) => {
                        transitions = recomputeGrid(draft);
                        draft.tickCount++;
                    }),
                );
                reportTransitions(transitions);
                return { tick: get().tickCount, transitions };
            },

            resetSession: () => {
                set((s) => ({ ...initialState, version: s.version + 1 }));
                options.onReset?.();
                log('Simulation reset - Board cleared');
            },

            // ─── Queries ───

            getEntity: (id) => get().entities[id] ?? null,

            getSource: () => {
                const { sourceId } = get();
                return sourceId === null ? null : findSource(get(), sourceId);
            },

            getLoads: () => Object.values(get().entities).filter(isLoad),

            getSourceSummary: (id) => {
                const source = findSource(get(), id);
                if (!source) return null;
                return {
                    busId: source.id,
                    loadingPercent: source.loadingPercent,
                    voltagePerUnit: source.voltagePerUnit,
                    totalActiveDemand: source.totalActiveDemand,
                    totalReactiveDemand: source.totalReactiveDemand,
                    availableCapacity: Math.max(0, source.capacityMw - source.totalActiveDemand),
                    connectedLoads: source.loadIds.length,
                    isOverloaded: source.loadingPercent > 1.0,
                    status: source.status,
                };
            },

            getLoadSummary: (id) => {
                const state = get();
                const load = findLoad(state, id);
                if (!load) return null;
                const source = load.sourceId === null ? null : findSource(state, load.sourceId);
                return {
                    busId: load.id,
                    kind: load.kind,
                    isConnected: source !== null,
                    activeDemand: load.activeDemand,
                    reactiveDemand: load.reactiveDemand,
                    powerFactor: load.powerFactor,
                    apparentPower: apparentPower(load.activeDemand, load.reactiveDemand),
                    actualPowerFactor: actualPowerFactor(load.activeDemand, load.reactiveDemand),
                    connectedTo: source?.id ?? null,
                    voltagePerUnit: source?.voltagePerUnit ?? null,
                    status: load.status,
                };
            },

            getConnectionHealth: (loadId) => {
                const state = get();
                const load = findLoad(state, loadId);
                if (!load || load.sourceId === null) return null;
                const source = findSource(state, load.sourceId);
                return source ? connectionHealth(source.voltagePerUnit) : null;
            },

            getSnapshot: () => {
                const s = get();
                const entities = structuredClone(Object.values(s.entities));
                const edges: GridSnapshot['edges'] = [];
                for (const e of entities) {
                    if (isLoad(e) && e.sourceId !== null) {
                        edges.push({ sourceId: e.sourceId, loadId: e.id });
                    }
                }
                return {
                    entities,
                    edges,
                    sourceId: s.sourceId,
                    busCounter: s.busCounter,
                    version: s.version,
                };
            },
        };
    });
}

// ─── Helpers ───

function findSource(state: GridState, id: string): SourceEntity | null {
    const entity = state.entities[id];
    return entity && isSource(entity) ? entity : null;
}

function findLoad(state: GridState, id: string): LoadEntity | null {
    const entity = state.entities[id];
    return entity && isLoad(entity) ? entity : null;
}

function readParam(values: ParameterValues, kind: ComponentKind, name: string): number {
    const value = values[name];
    if (typeof value === 'number') return value;
    const def = PARAMETER_CATALOG.find((d) => d.componentKind === kind && d.parameterName === name);
    return def?.default ?? 0;
}

function checkCoordinates(gridX: number, gridY: number): ValidationError | null {
    if (!Number.isInteger(gridX) || !Number.isInteger(gridY)) {
        return new ValidationError('Grid coordinates must be integers');
    }
    return null;
}

function notFound(id: string): GraphStateError {
    return new GraphStateError('EntityNotFound', `Entity ${id} not found`);
}

function wrongKind(id: string, expected: string): GraphStateError {
    return new GraphStateError('WrongEntityKind', `${id} is not ${expected}`);
}
