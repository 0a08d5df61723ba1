/**
 * Parameter Catalog — seeded defaults and ranges per component kind.
 *
 * Written into ComponentParameterDefaults once when a database is
 * opened. Never mutated at runtime.
 */

import type { ComponentKind, ParameterDefinition } from './types';

export const PARAMETER_CATALOG: readonly ParameterDefinition[] = [
    {
        componentKind: 'source',
        parameterName: 'p_nom_mw',
        default: 1000.0,
        min: 100.0,
        max: 5000.0,
        unit: 'MW',
        description: 'Nominal Power Capacity',
    },
    {
        componentKind: 'source',
        parameterName: 'v_nom_kv',
        default: 110.0,
        min: 11.0,
        max: 400.0,
        unit: 'kV',
        description: 'Nominal Voltage',
    },
    {
        componentKind: 'inductive_load',
        parameterName: 'p_demand_mw',
        default: 5.0,
        min: 0.1,
        max: 100.0,
        unit: 'MW',
        description: 'Power Demand',
    },
    {
        componentKind: 'inductive_load',
        parameterName: 'power_factor',
        default: 0.8,
        min: 0.5,
        max: 0.95,
        unit: 'pu',
        description: 'Power Factor',
    },
    {
        componentKind: 'capacitive_load',
        parameterName: 'p_demand_mw',
        default: 5.0,
        min: 0.1,
        max: 100.0,
        unit: 'MW',
        description: 'Power Demand',
    },
    {
        componentKind: 'capacitive_load',
        parameterName: 'power_factor',
        default: 0.9,
        min: 0.85,
        max: 1.0,
        unit: 'pu',
        description: 'Power Factor',
    },
    {
        componentKind: 'resistive_load',
        parameterName: 'p_demand_mw',
        default: 5.0,
        min: 0.1,
        max: 100.0,
        unit: 'MW',
        description: 'Power Demand',
    },
    {
        componentKind: 'resistive_load',
        parameterName: 'power_factor',
        default: 1.0,
        min: 0.98,
        max: 1.0,
        unit: 'pu',
        description: 'Power Factor',
    },
];

export function catalogFor(kind: ComponentKind): ParameterDefinition[] {
    return PARAMETER_CATALOG.filter((def) => def.componentKind === kind);
}
