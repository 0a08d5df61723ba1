import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SimulationLoop } from '../SimulationLoop';
import { createGridStore } from '../../grid/gridStore';
import type { GridStoreApi } from '../../grid/gridStore';

let grid: GridStoreApi;

beforeEach(() => {
  vi.useFakeTimers();
  vi.spyOn(console, 'info').mockImplementation(() => {});
  grid = createGridStore({ log: () => {} });
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('SimulationLoop', () => {
  it('recomputes once per interval while running', () => {
    const onTick = vi.fn();
    const loop = new SimulationLoop(grid, { intervalMs: 1000, onTick });

    loop.start();
    expect(loop.running).toBe(true);
    vi.advanceTimersByTime(3500);

    expect(onTick).toHaveBeenCalledTimes(3);
    expect(grid.getState().tickCount).toBe(3);
    expect(loop.latest).toEqual({ tick: 3, transitions: [] });

    loop.stop();
    vi.advanceTimersByTime(5000);
    expect(loop.running).toBe(false);
    expect(grid.getState().tickCount).toBe(3);
  });

  it('ignores a second start', () => {
    const loop = new SimulationLoop(grid, { intervalMs: 500 });
    loop.start();
    loop.start();
    vi.advanceTimersByTime(1000);
    expect(grid.getState().tickCount).toBe(2);
    loop.stop();
  });

  it('can be ticked by hand', () => {
    const loop = new SimulationLoop(grid);
    expect(loop.latest).toBeNull();
    expect(loop.tick().tick).toBe(1);
    expect(loop.running).toBe(false);
  });

  it('reports a throwing tick listener and keeps ticking', () => {
    const onError = vi.fn();
    const loop = new SimulationLoop(grid, {
      intervalMs: 100,
      onTick: () => {
        throw new Error('panel gone');
      },
      onError,
    });

    loop.start();
    vi.advanceTimersByTime(200);
    loop.stop();

    expect(onError).toHaveBeenCalledTimes(2);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(Error);
    expect(grid.getState().tickCount).toBe(2);
  });

  it('rejects a non-positive interval', () => {
    expect(() => new SimulationLoop(grid, { intervalMs: 0 })).toThrow(RangeError);
  });
});
