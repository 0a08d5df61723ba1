/**
 * Grid Engine — Public API
 *
 * Re-exports models, electrical formulas, recompute and the store.
 */

// ─── Models ───
export type {
    OperatingStatus,
    EntityKind,
    SourceEntity,
    LoadEntity,
    GridEntity,
    GridState,
    StatusTransition,
    RecomputeReport,
    GridSnapshot,
    SourceSummary,
    LoadSummary,
} from './models';
export { isSource, isLoad } from './models';

// ─── Formulas ───
export {
    DEFAULT_SOURCE_CAPACITY_MW,
    THRESHOLDS,
    reactiveDemand,
    apparentPower,
    actualPowerFactor,
    loadingPercent,
    voltagePerUnit,
    classifyStatus,
    connectionHealth,
} from './electrical';
export type { ConnectionBand, ConnectionHealth } from './electrical';

// ─── Recompute ───
export { recomputeGrid, connectedLoads } from './recompute';

// ─── Store ───
export { createGridStore } from './gridStore';
export type { GridStore, GridStoreApi, GridStoreOptions, ParameterSource } from './gridStore';
