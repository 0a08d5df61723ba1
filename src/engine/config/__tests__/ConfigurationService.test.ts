import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GridDatabase } from '../../../persistence/db';
import { ParameterStore } from '../../parameters/ParameterStore';
import { ConfigurationService } from '../ConfigurationService';
import { ConfigEvent } from '../events';
import type { ConfigChangeDetail, ConfigEventTag } from '../events';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const CREATED_AT = '2026-02-14T09:30:00.000Z';

let db: GridDatabase;
let service: ConfigurationService;
let events: Array<[ConfigEventTag, ConfigChangeDetail]>;

beforeEach(async () => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  db = await GridDatabase.open(':memory:');
  service = new ConfigurationService(new ParameterStore(db), db, { now: () => CREATED_AT });
  events = [];
  service.onConfigChange((tag, detail) => events.push([tag, detail]));
});

afterEach(() => {
  db.close();
  vi.restoreAllMocks();
});

// ─── Effective values ─────────────────────────────────────────────────────────

describe('ConfigurationService – getEffective', () => {
  it('returns the defaults of a kind as a name → value map', () => {
    expect(service.getEffective('capacitive_load')).toEqual({ p_demand_mw: 5, power_factor: 0.9 });
  });

  it('returns a copy that callers cannot use to change the configuration', () => {
    const values = service.getEffective('source');
    values.p_nom_mw = 1;
    expect(service.getEffective('source').p_nom_mw).toBe(1000);
  });
});

describe('ConfigurationService – getDefinitions', () => {
  it('describes each parameter of a kind with its range text', () => {
    const defs = service.getDefinitions('source');
    expect(defs.map((d) => [d.parameterName, d.rangeText])).toEqual([
      ['p_nom_mw', 'Range: 100.0 - 5000.0 MW'],
      ['v_nom_kv', 'Range: 11.0 - 400.0 kV'],
    ]);
    expect(defs[0]).toMatchObject({ default: 1000, min: 100, max: 5000, description: 'Nominal Power Capacity' });
  });
});

// ─── save / reset ─────────────────────────────────────────────────────────────

describe('ConfigurationService – save', () => {
  it('persists a valid value and notifies config_changed', () => {
    const result = service.save('source', 'p_nom_mw', 1500);
    expect(result).toEqual({ success: true, message: 'Configuration saved successfully', value: 1500 });
    expect(service.getEffective('source').p_nom_mw).toBe(1500);
    expect(events).toEqual([[ConfigEvent.ConfigChanged, { kind: 'source', parameterName: 'p_nom_mw' }]]);
  });

  it('rebuilds the snapshot store for every kind', () => {
    service.save('resistive_load', 'p_demand_mw', 9);
    const snapshot = service.store.getState();
    expect(snapshot.version).toBe(1);
    expect(snapshot.lastEvent).toBe('config_changed');
    expect(snapshot.current.resistive_load.p_demand_mw).toBe(9);
    expect(snapshot.current.source).toEqual({ p_nom_mw: 1000, v_nom_kv: 110 });
  });

  it('rejects an out-of-range value with a displayable message', () => {
    const result = service.save('source', 'p_nom_mw', 6000);
    expect(result.success).toBe(false);
    expect(result.message).toBe('Value must be between 100 and 5000 MW');
    expect(service.getEffective('source').p_nom_mw).toBe(1000);
    expect(events).toHaveLength(0);
    expect(service.store.getState().version).toBe(0);
  });

  it('reports an unknown parameter as not found', () => {
    const result = service.save('source', 'frequency_hz', 50);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('NotFound');
  });
});

describe('ConfigurationService – reset', () => {
  it('restores one parameter', () => {
    service.save('inductive_load', 'power_factor', 0.9);
    const result = service.reset('inductive_load', 'power_factor');
    expect(result).toEqual({ success: true, message: 'power_factor reset to default', value: 1 });
    expect(service.getEffective('inductive_load').power_factor).toBe(0.8);
  });

  it('restores every parameter of the kind', () => {
    service.save('source', 'p_nom_mw', 2000);
    service.save('source', 'v_nom_kv', 220);
    const result = service.reset('source');
    expect(result.message).toBe('All source parameters reset to defaults');
    expect(service.getEffective('source')).toEqual({ p_nom_mw: 1000, v_nom_kv: 110 });
    expect(events.map(([tag]) => tag)).toEqual(['config_changed', 'config_changed', 'config_changed']);
  });
});

// ─── Presets ──────────────────────────────────────────────────────────────────

describe('ConfigurationService – presets', () => {
  it('requires a name', () => {
    const result = service.savePreset('   ', 'source');
    expect(result.success).toBe(false);
    expect(result.message).toBe('Name is required');
    if (!result.success) expect(result.error.code).toBe('Validation');
    expect(events).toHaveLength(0);
  });

  it('snapshots the configuration effective at save time', () => {
    service.save('inductive_load', 'p_demand_mw', 30);
    const saved = service.savePreset('A', 'inductive_load', 'motors');
    expect(saved.success).toBe(true);
    if (!saved.success) return;

    expect(saved.message).toBe("Saved preset 'A' successfully");
    expect(saved.value).toEqual({
      id: 1,
      name: 'A',
      description: 'motors',
      componentKind: 'inductive_load',
      parameters: { p_demand_mw: 30, power_factor: 0.8 },
      createdAt: CREATED_AT,
    });

    service.save('inductive_load', 'p_demand_mw', 60);
    service.save('inductive_load', 'power_factor', 0.6);

    const loaded = service.loadPreset(saved.value.id);
    expect(loaded.success).toBe(true);
    if (loaded.success) {
      expect(loaded.value).toEqual({ p_demand_mw: 30, power_factor: 0.8 });
    }
  });

  it('notifies instance_saved with the new id', () => {
    service.savePreset('Plant', 'source');
    expect(events).toEqual([[ConfigEvent.PresetSaved, { kind: 'source', presetId: 1 }]]);
  });

  it('rejects a duplicate name and leaves the original untouched', () => {
    service.savePreset('A', 'source', 'first');
    service.save('source', 'p_nom_mw', 4000);

    const second = service.savePreset('A', 'source', 'second');
    expect(second.success).toBe(false);
    expect(second.message).toBe("A preset named 'A' already exists");
    if (!second.success) expect(second.error.code).toBe('Duplicate');

    const listed = service.listPresets();
    expect(listed.success).toBe(true);
    if (listed.success) {
      expect(listed.value).toHaveLength(1);
      expect(listed.value[0].description).toBe('first');
      expect(listed.value[0].parameters).toEqual({ p_nom_mw: 1000, v_nom_kv: 110 });
    }
  });

  it('reports a missing preset on load', () => {
    const result = service.loadPreset(99);
    expect(result).toMatchObject({ success: false, message: 'Preset 99 not found' });
  });

  it('lists presets filtered by kind', () => {
    service.savePreset('S', 'source');
    service.savePreset('R', 'resistive_load');
    const result = service.listPresets('resistive_load');
    expect(result.success && result.value.map((p) => p.name)).toEqual(['R']);
  });

  it('deletes a preset and notifies instance_deleted', () => {
    service.savePreset('Temp', 'capacitive_load');
    events.length = 0;

    const result = service.deletePreset(1);
    expect(result).toEqual({ success: true, message: 'Preset deleted successfully', value: 1 });
    expect(events).toEqual([[ConfigEvent.PresetDeleted, { presetId: 1 }]]);
  });

  it('reports a second delete as not found without notifying', () => {
    service.savePreset('Temp', 'capacitive_load');
    service.deletePreset(1);
    events.length = 0;

    const result = service.deletePreset(1);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('NotFound');
    expect(events).toHaveLength(0);
  });

  it('applies a preset as overrides of its kind', () => {
    service.save('inductive_load', 'p_demand_mw', 25);
    service.savePreset('Mill', 'inductive_load');
    service.reset('inductive_load');

    const result = service.applyPreset(1);
    expect(result.success).toBe(true);
    expect(service.getEffective('inductive_load')).toEqual({ p_demand_mw: 25, power_factor: 0.8 });
    expect(events[events.length - 1]).toEqual([
      ConfigEvent.ConfigChanged,
      { kind: 'inductive_load', presetId: 1 },
    ]);
  });
});

// ─── Subscription ─────────────────────────────────────────────────────────────

describe('ConfigurationService – subscription', () => {
  it('calls listeners synchronously in registration order', () => {
    const order: string[] = [];
    service.onConfigChange(() => order.push('second'));
    service.onConfigChange(() => order.push('third'));
    service.onConfigChange(() => order.push('fourth'));

    service.save('source', 'v_nom_kv', 132);
    expect(events).toHaveLength(1);
    expect(order).toEqual(['second', 'third', 'fourth']);
  });

  it('stops calling a listener once it unsubscribes', () => {
    const listener = vi.fn();
    const off = service.onConfigChange(listener);
    service.save('source', 'v_nom_kv', 132);
    off();
    service.save('source', 'v_nom_kv', 220);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(service.listenerCount).toBe(1);
  });

  it('delivers once per registration when the same function registers twice', () => {
    const listener = vi.fn();
    const off = service.onConfigChange(listener);
    service.onConfigChange(listener);

    service.save('source', 'v_nom_kv', 132);
    expect(listener).toHaveBeenCalledTimes(2);

    off();
    off();
    service.save('source', 'v_nom_kv', 220);
    expect(listener).toHaveBeenCalledTimes(3);
    expect(service.listenerCount).toBe(2);
  });

  it('rejects a write made from inside a listener', () => {
    let nested: ReturnType<ConfigurationService['save']> | null = null;
    service.onConfigChange(() => {
      nested = service.save('source', 'p_nom_mw', 2000);
    });

    service.save('source', 'v_nom_kv', 220);

    expect(nested).toMatchObject({
      success: false,
      message: 'Configuration cannot be changed from inside a change listener',
    });
    expect(service.getEffective('source')).toEqual({ p_nom_mw: 1000, v_nom_kv: 220 });
  });

  it('keeps reads available inside a listener', () => {
    let seen: number | null = null;
    service.onConfigChange(() => {
      seen = service.getEffective('source').v_nom_kv;
    });
    service.save('source', 'v_nom_kv', 66);
    expect(seen).toBe(66);
  });

  it('keeps notifying when one listener throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const after = vi.fn();
    service.onConfigChange(() => {
      throw new Error('listener broke');
    });
    service.onConfigChange(after);

    const result = service.save('source', 'v_nom_kv', 66);
    expect(result.success).toBe(true);
    expect(after).toHaveBeenCalledWith('config_changed', { kind: 'source', parameterName: 'v_nom_kv' });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
