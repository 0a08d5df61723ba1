/**
 * SimulationLoop — fixed-interval recompute driver.
 *
 * Each tick asks the grid store to recompute demand, voltage and
 * status. The cadence belongs to the caller; `tick()` can also be
 * driven by hand from an external event loop instead of `start()`.
 */

import type { GridStoreApi } from '../grid/gridStore';
import type { RecomputeReport } from '../grid/models';

export interface SimulationLoopConfig {
    /** Interval between ticks in milliseconds (default: 1000) */
    intervalMs: number;
    /** Called after every tick */
    onTick?: (report: RecomputeReport) => void;
    /** Called when a tick listener throws */
    onError?: (error: Error) => void;
}

const DEFAULT_CONFIG: SimulationLoopConfig = {
    intervalMs: 1000,
};

export class SimulationLoop {
    private config: SimulationLoopConfig;
    private timer: ReturnType<typeof setInterval> | null = null;
    private lastReport: RecomputeReport | null = null;

    constructor(
        private readonly grid: GridStoreApi,
        config: Partial<SimulationLoopConfig> = {},
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        if (!(this.config.intervalMs > 0)) {
            throw new RangeError(`Tick interval must be positive, got ${this.config.intervalMs}`);
        }
    }

    // ─── Lifecycle ───

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(this.tick, this.config.intervalMs);
        console.info(`[Simulation] Started, ticking every ${this.config.intervalMs}ms`);
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            console.info('[Simulation] Stopped');
        }
    }

    get running(): boolean {
        return this.timer !== null;
    }

    get latest(): RecomputeReport | null {
        return this.lastReport;
    }

    // ─── Tick ───

    tick = (): RecomputeReport => {
        const report = this.grid.getState().recompute();
        this.lastReport = report;

        try {
            this.config.onTick?.(report);
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            if (this.config.onError) {
                this.config.onError(error);
            } else {
                console.warn('[Simulation] Tick listener failed:', error);
            }
        }

        return report;
    };
}
