/**
 * Grid simulation and configuration engine — public API.
 */

export { createGridEngine } from './bootstrap';
export type { GridEngine } from './bootstrap';

export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from './config/engineConfig';
export type { GridEngineConfig } from './config/engineConfig';

export * from './engine/errors';
export * from './engine/parameters';
export * from './engine/config';
export * from './engine/grid';
export * from './engine/simulation';

export { GridDatabase, openDatabase } from './persistence';
export type { PresetRecord, NewPreset } from './persistence';

export { createSessionLog, truncateMessage } from './store';
export type { LogEntry, SessionLogStore } from './store';
