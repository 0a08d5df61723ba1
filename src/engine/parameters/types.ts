/**
 * Parameter Engine — Core Types
 *
 * Pure TypeScript. No storage dependency.
 */

// ─── Component Kinds ───

export type ComponentKind =
    | 'source'
    | 'inductive_load'
    | 'capacitive_load'
    | 'resistive_load';

export type LoadKind = Exclude<ComponentKind, 'source'>;

export const COMPONENT_KINDS: readonly ComponentKind[] = [
    'source',
    'inductive_load',
    'capacitive_load',
    'resistive_load',
];

export function isComponentKind(value: string): value is ComponentKind {
    return COMPONENT_KINDS.some((kind) => kind === value);
}

// ─── Definitions ───

export interface ParameterDefinition {
    componentKind: ComponentKind;
    parameterName: string;
    default: number;
    min: number;
    max: number;
    unit: string;
    description: string;
}

/** A definition as shown on an edit screen */
export interface ParameterDescriptor extends ParameterDefinition {
    /** e.g. "Range: 100.0 - 5000.0 MW" */
    rangeText: string;
}

export interface ParameterOverride {
    componentKind: ComponentKind;
    parameterName: string;
    value: number;
    /** ISO timestamp of the last write */
    lastModified: string;
}

// ─── Resolved Values ───

/** Effective values of one component kind, keyed by parameter name */
export type ParameterValues = Record<string, number>;

/** Effective values of every component kind */
export type ConfigurationTable = Record<ComponentKind, ParameterValues>;
