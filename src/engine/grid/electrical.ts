/**
 * Electrical formulas — reactive demand, voltage approximation and
 * status thresholds.
 *
 * The voltage is a closed-form linear drop, not a load-flow solve. It
 * has no floor and can go negative under heavy reactive load.
 */

import type { LoadKind } from '../parameters/types';
import type { OperatingStatus } from './models';

export const DEFAULT_SOURCE_CAPACITY_MW = 1000;

export const NOMINAL_VOLTAGE_PU = 1.0;

/** Voltage drop per unit of loading */
export const LOADING_VOLTAGE_COEFF = 0.1;
/** Voltage drop per MVAr of net reactive demand */
export const REACTIVE_VOLTAGE_COEFF = 0.02;

export const THRESHOLDS = {
    criticalLoading: 0.9,
    criticalVoltage: 0.95,
    warningLoading: 0.7,
    warningVoltage: 0.98,
} as const;

// ─── Load Side ───

export function reactiveDemand(kind: LoadKind, activeDemand: number, powerFactor: number): number {
    if (kind === 'resistive_load') return 0;
    const q = activeDemand * Math.tan(Math.acos(powerFactor));
    return kind === 'inductive_load' ? q : -q;
}

export function apparentPower(p: number, q: number): number {
    return Math.sqrt(p * p + q * q);
}

export function actualPowerFactor(p: number, q: number): number {
    const s = apparentPower(p, q);
    return s > 0 ? p / s : 1.0;
}

// ─── Source Side ───

export function loadingPercent(totalActiveDemand: number, capacityMw: number): number {
    return totalActiveDemand / capacityMw;
}

export function voltagePerUnit(loading: number, totalReactiveDemand: number): number {
    return (
        NOMINAL_VOLTAGE_PU -
        loading * LOADING_VOLTAGE_COEFF -
        Math.abs(totalReactiveDemand) * REACTIVE_VOLTAGE_COEFF
    );
}

export function classifyStatus(loading: number, voltage: number): OperatingStatus {
    if (loading > THRESHOLDS.criticalLoading || voltage < THRESHOLDS.criticalVoltage) {
        return 'critical';
    }
    if (loading > THRESHOLDS.warningLoading || voltage < THRESHOLDS.warningVoltage) {
        return 'warning';
    }
    return 'normal';
}

// ─── Presentation Helpers ───

export type ConnectionBand = 'normal' | 'degraded' | 'low';

export interface ConnectionHealth {
    band: ConnectionBand;
    /** 0..1 position inside the band, used for color interpolation */
    factor: number;
}

export function connectionHealth(voltage: number): ConnectionHealth {
    if (voltage >= THRESHOLDS.warningVoltage) {
        return { band: 'normal', factor: 1 };
    }
    if (voltage >= THRESHOLDS.criticalVoltage) {
        const span = THRESHOLDS.warningVoltage - THRESHOLDS.criticalVoltage;
        return { band: 'degraded', factor: clamp01((voltage - THRESHOLDS.criticalVoltage) / span) };
    }
    return { band: 'low', factor: clamp01(voltage / THRESHOLDS.criticalVoltage) };
}

function clamp01(v: number): number {
    return Math.min(Math.max(v, 0), 1);
}
