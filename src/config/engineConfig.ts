/**
 * Engine Config — runtime settings for one engine instance.
 *
 * Callers pass a Partial; anything left out falls back to
 * DEFAULT_ENGINE_CONFIG.
 */

import type { RecomputeReport, StatusTransition } from '../engine/grid/models';
import { DEFAULT_SOURCE_CAPACITY_MW } from '../engine/grid/electrical';
import { DEFAULT_LOG_LIMIT } from '../store/sessionLog';
import { ValidationError } from '../engine/errors';

export interface GridEngineConfig {
    /** SQLite file for parameters and presets; ":memory:" for a throwaway store */
    databasePath: string;
    /** Interval between simulation ticks in milliseconds (default: 1000) */
    tickIntervalMs: number;
    /** Start ticking as soon as the engine is created (default: false) */
    autoStart: boolean;
    /** Messages kept in the session log (default: 8) */
    sessionLogLimit: number;
    /** Fixed Source capacity used for loading, in MW (default: 1000) */
    sourceCapacityMw: number;
    /** Callback after every simulation tick */
    onTick?: (report: RecomputeReport) => void;
    /** Callback when a tick listener fails */
    onError?: (error: Error) => void;
    /** Callback when an entity enters the critical status */
    onCriticalStatus?: (transition: StatusTransition) => void;
}

export const DEFAULT_ENGINE_CONFIG: GridEngineConfig = {
    databasePath: 'gridsim.db',
    tickIntervalMs: 1000,
    autoStart: false,
    sessionLogLimit: DEFAULT_LOG_LIMIT,
    sourceCapacityMw: DEFAULT_SOURCE_CAPACITY_MW,
};

export function resolveEngineConfig(config: Partial<GridEngineConfig> = {}): GridEngineConfig {
    const resolved: GridEngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...config };

    if (!resolved.databasePath) {
        throw new ValidationError('databasePath is required');
    }
    if (!(resolved.tickIntervalMs > 0)) {
        throw new ValidationError(`tickIntervalMs must be positive, got ${resolved.tickIntervalMs}`);
    }
    if (!Number.isInteger(resolved.sessionLogLimit) || resolved.sessionLogLimit < 1) {
        throw new ValidationError(`sessionLogLimit must be a positive integer, got ${resolved.sessionLogLimit}`);
    }
    if (!(resolved.sourceCapacityMw > 0)) {
        throw new ValidationError(`sourceCapacityMw must be positive, got ${resolved.sourceCapacityMw}`);
    }
    return resolved;
}
