import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createGridEngine } from '../bootstrap';
import type { GridEngine } from '../bootstrap';
import type { StatusTransition } from '../engine/grid/models';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

let engine: GridEngine;
let critical: StatusTransition[];

beforeEach(async () => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  critical = [];
  engine = await createGridEngine({
    databasePath: ':memory:',
    onCriticalStatus: (t) => critical.push(t),
  });
});

afterEach(() => {
  engine.destroy();
  vi.restoreAllMocks();
});

// ─── Wiring ───────────────────────────────────────────────────────────────────

describe('createGridEngine', () => {
  it('seeds defaults and leaves the loop stopped', () => {
    expect(engine.configuration.getEffective('source')).toEqual({ p_nom_mw: 1000, v_nom_kv: 110 });
    expect(engine.loop.running).toBe(false);
    expect(engine.db.isOpen).toBe(true);
  });

  it('places entities with the configuration effective at creation', () => {
    engine.configuration.save('inductive_load', 'p_demand_mw', 100);
    const grid = engine.grid.getState();
    grid.placeSource(0, 0);
    grid.placeLoad(1, 0, 'inductive_load');

    engine.configuration.save('inductive_load', 'p_demand_mw', 10);
    expect(engine.grid.getState().getEntity('Load_Bus_2')).toMatchObject({ activeDemand: 100 });
  });

  it('copies grid messages into the session log', () => {
    engine.configuration.save('inductive_load', 'p_demand_mw', 100);
    const grid = engine.grid.getState();
    grid.placeSource(0, 0);
    grid.placeLoad(1, 0, 'inductive_load');
    grid.connect('Load_Bus_2', 'Source_Bus_1');

    const messages = engine.log.getState().entries.map((e) => e.message);
    expect(messages[0]).toBe('Added source at bus Source_Bus_1');
    expect(messages).toContain('Warning: Low voltage at Source_Bus_1: -0.51 pu');
    expect(messages).toContain('Low voltage at Load_Bus_2: -0.51 pu');
    expect(critical.map((t) => t.entityId)).toEqual(['Source_Bus_1', 'Load_Bus_2']);
  });

  it('empties the session log on reset', () => {
    const grid = engine.grid.getState();
    grid.placeSource(0, 0);
    grid.placeLoad(1, 0, 'resistive_load');
    grid.resetSession();

    expect(engine.log.getState().entries.map((e) => e.message)).toEqual([
      'Simulation reset - Board cleared',
    ]);
  });

  it('stops the loop and closes the database on destroy', () => {
    engine.loop.start();
    engine.configuration.onConfigChange(() => {});
    engine.destroy();

    expect(engine.loop.running).toBe(false);
    expect(engine.configuration.listenerCount).toBe(0);
    expect(engine.db.isOpen).toBe(false);
  });

  it('rejects an invalid configuration before opening anything', async () => {
    await expect(createGridEngine({ databasePath: ':memory:', tickIntervalMs: -5 })).rejects.toThrow(
      'tickIntervalMs must be positive, got -5',
    );
  });
});
