import type {
  ComponentKind,
  ConfigurationTable,
  ParameterDefinition,
  ParameterDescriptor,
  ParameterOverride,
} from './types';
import { OutOfRangeError, ValidationError } from '../errors';

export function paramKey(kind: ComponentKind, name: string): string {
  return `${kind}.${name}`;
}

/**
 * Override shadows default. Values are never clamped here or anywhere
 * else: a stored override is already known to be in range.
 */
export function resolveEffective(
  definitions: readonly ParameterDefinition[],
  overrides: readonly ParameterOverride[],
): ConfigurationTable {
  const byKey = new Map<string, number>();
  for (const o of overrides) {
    byKey.set(paramKey(o.componentKind, o.parameterName), o.value);
  }

  const table = emptyTable();
  for (const def of definitions) {
    const key = paramKey(def.componentKind, def.parameterName);
    table[def.componentKind][def.parameterName] = byKey.get(key) ?? def.default;
  }
  return table;
}

export function checkRange(def: ParameterDefinition, value: number): ValidationError | null {
  if (!Number.isFinite(value)) {
    return new ValidationError(`${def.parameterName} must be a finite number`);
  }
  if (value < def.min || value > def.max) {
    return new OutOfRangeError(def.min, def.max, def.unit);
  }
  return null;
}

export function formatRange(def: ParameterDefinition): string {
  return `Range: ${def.min.toFixed(1)} - ${def.max.toFixed(1)} ${def.unit}`;
}

export function describeDefinition(def: ParameterDefinition): ParameterDescriptor {
  return { ...def, rangeText: formatRange(def) };
}

function emptyTable(): ConfigurationTable {
  return {
    source: {},
    inductive_load: {},
    capacitive_load: {},
    resistive_load: {},
  };
}
