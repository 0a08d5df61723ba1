/**
 * Configuration Snapshot Store — Zustand (vanilla)
 *
 * Holds the "current configuration" table owned by one
 * ConfigurationService. Rebuilt for every kind after each successful
 * write. Readers subscribe through zustand's own subscribe().
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';

import type { ConfigurationTable } from '../parameters/types';
import type { ConfigEventTag } from './events';

export interface ConfigSnapshotState {
    current: ConfigurationTable;
    /** Monotonic counter, bumped on every published change */
    version: number;
    lastEvent: ConfigEventTag | null;
}

export type ConfigSnapshotStore = StoreApi<ConfigSnapshotState>;

export function createConfigStore(initial: ConfigurationTable): ConfigSnapshotStore {
    return createStore<ConfigSnapshotState>()(() => ({
        current: initial,
        version: 0,
        lastEvent: null,
    }));
}
