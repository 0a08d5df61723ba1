/**
 * Bootstrap — builds one engine instance.
 *
 * It will:
 * 1. Open (or create) the SQLite database and seed parameter defaults
 * 2. Build the parameter store and configuration service on top of it
 * 3. Create the grid store, reading initial parameters from the service
 * 4. Create the simulation loop, started only when autoStart is set
 *
 * Each call returns an independent engine. Only the SQLite WASM module
 * is shared between engines.
 */

import { openDatabase } from './persistence/db';
import type { GridDatabase } from './persistence/db';
import { ParameterStore } from './engine/parameters/ParameterStore';
import { ConfigurationService } from './engine/config/ConfigurationService';
import { createGridStore } from './engine/grid/gridStore';
import type { GridStoreApi } from './engine/grid/gridStore';
import { SimulationLoop } from './engine/simulation/SimulationLoop';
import { createSessionLog } from './store/sessionLog';
import type { SessionLogStore } from './store/sessionLog';
import { resolveEngineConfig } from './config/engineConfig';
import type { GridEngineConfig } from './config/engineConfig';

export interface GridEngine {
    readonly config: GridEngineConfig;
    readonly db: GridDatabase;
    readonly parameters: ParameterStore;
    readonly configuration: ConfigurationService;
    readonly grid: GridStoreApi;
    readonly loop: SimulationLoop;
    readonly log: SessionLogStore;
    /** Stop the loop, drop listeners and close the database */
    destroy(): void;
}

export async function createGridEngine(config: Partial<GridEngineConfig> = {}): Promise<GridEngine> {
    const resolved = resolveEngineConfig(config);

    const db = await openDatabase(resolved.databasePath);
    let parameters: ParameterStore;
    try {
        parameters = new ParameterStore(db);
    } catch (err) {
        db.close();
        throw err;
    }
    const configuration = new ConfigurationService(parameters, db);
    const log = createSessionLog(resolved.sessionLogLimit);

    const grid = createGridStore({
        parameters: configuration,
        capacityMw: resolved.sourceCapacityMw,
        log: (message) => {
            console.info(`[Grid] ${message}`);
            log.getState().append(message);
        },
        onReset: () => log.getState().clear(),
        onCriticalStatus: resolved.onCriticalStatus,
    });

    const loop = new SimulationLoop(grid, {
        intervalMs: resolved.tickIntervalMs,
        onTick: resolved.onTick,
        onError: resolved.onError,
    });

    if (resolved.autoStart) loop.start();
    console.info(`[Persistence] Opened ${resolved.databasePath}`);

    return {
        config: resolved,
        db,
        parameters,
        configuration,
        grid,
        loop,
        log,
        destroy: () => {
            loop.stop();
            configuration.clearListeners();
            db.close();
        },
    };
}
