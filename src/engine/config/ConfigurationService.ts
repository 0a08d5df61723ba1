/**
 * ConfigurationService — effective parameters, validated writes,
 * named presets and change notification.
 *
 * Every public operation returns an OperationResult that the UI layer
 * can show as-is. Failed operations never change stored or in-memory
 * state.
 *
 * Listeners must not call back into the service. A mutation attempted
 * while listeners are being notified is rejected with a ReentrancyError;
 * reads are always allowed.
 */

import type { GridDatabase, PresetRecord } from '../../persistence/db';
import type { ParameterStore } from '../parameters/ParameterStore';
import type {
    ComponentKind,
    ParameterDescriptor,
    ParameterValues,
} from '../parameters/types';
import { describeDefinition } from '../parameters/resolve';
import type { GridCoreError, Result } from '../errors';
import {
    DuplicateError,
    NotFoundError,
    PersistenceError,
    ReentrancyError,
    ValidationError,
} from '../errors';
import { ConfigEvent } from './events';
import type { ConfigChangeDetail, ConfigChangeListener, ConfigEventTag } from './events';
import { createConfigStore } from './configStore';
import type { ConfigSnapshotStore } from './configStore';

// ─── Result ───

export type OperationResult<T = undefined> =
    | { success: true; message: string; value: T }
    | { success: false; message: string; error: GridCoreError };

function succeed<T>(message: string, value: T): OperationResult<T> {
    return { success: true, message, value };
}

function reject<T>(error: GridCoreError): OperationResult<T> {
    return { success: false, message: error.message, error };
}

export interface ConfigurationServiceOptions {
    /** Timestamp source for preset createdAt (default: ISO now) */
    now?: () => string;
}

// ─── Service ───

export class ConfigurationService {
    readonly store: ConfigSnapshotStore;

    /** Registration order; the same function may appear more than once */
    private listeners: ConfigChangeListener[] = [];
    private dispatching = false;
    private readonly now: () => string;

    constructor(
        private readonly params: ParameterStore,
        private readonly db: GridDatabase,
        options: ConfigurationServiceOptions = {},
    ) {
        this.now = options.now ?? (() => new Date().toISOString());
        this.store = createConfigStore(params.getEffectiveTable());
    }

    // ─── Reads ───

    getEffective(kind: ComponentKind): ParameterValues {
        return this.params.getEffectiveValues(kind);
    }

    getEffectiveValue(kind: ComponentKind, name: string): Result<number> {
        return this.params.getEffective(kind, name);
    }

    /** Definitions of one kind with their range text, for edit screens */
    getDefinitions(kind: ComponentKind): ParameterDescriptor[] {
        return this.params.getDefinitions(kind).map(describeDefinition);
    }

    // ─── Parameter Writes ───

    save(kind: ComponentKind, name: string, value: number): OperationResult<number> {
        const guard = this.guardMutation<number>();
        if (guard) return guard;

        const result = this.params.setOverride(kind, name, value);
        if (!result.ok) return reject(result.error);

        this.publish(ConfigEvent.ConfigChanged, { kind, parameterName: name });
        return succeed('Configuration saved successfully', result.value);
    }

    reset(kind: ComponentKind, name?: string): OperationResult<number> {
        const guard = this.guardMutation<number>();
        if (guard) return guard;

        const result = this.params.resetOverride(kind, name);
        if (!result.ok) return reject(result.error);

        this.publish(ConfigEvent.ConfigChanged, { kind, parameterName: name });
        const message = name !== undefined
            ? `${name} reset to default`
            : `All ${kind} parameters reset to defaults`;
        return succeed(message, result.value);
    }

    // ─── Presets ───

    savePreset(name: string, kind: ComponentKind, description = ''): OperationResult<PresetRecord> {
        const guard = this.guardMutation<PresetRecord>();
        if (guard) return guard;

        const trimmed = name.trim();
        if (!trimmed) return reject(new ValidationError('Name is required'));

        let preset: PresetRecord;
        try {
            if (this.db.getPresetByName(trimmed)) {
                return reject(new DuplicateError(`A preset named '${trimmed}' already exists`));
            }
            preset = this.db.insertPreset({
                name: trimmed,
                description,
                componentKind: kind,
                parameters: this.params.getEffectiveValues(kind),
                createdAt: this.now(),
            });
        } catch (err) {
            return reject(asCoreError(err));
        }

        this.publish(ConfigEvent.PresetSaved, { kind, presetId: preset.id });
        return succeed(`Saved preset '${trimmed}' successfully`, preset);
    }

    loadPreset(id: number): OperationResult<ParameterValues> {
        let preset: PresetRecord | undefined;
        try {
            preset = this.db.getPreset(id);
        } catch (err) {
            return reject(asCoreError(err));
        }
        if (!preset) return reject(new NotFoundError(`Preset ${id} not found`));
        return succeed(`Loaded preset '${preset.name}'`, { ...preset.parameters });
    }

    listPresets(kind?: ComponentKind): OperationResult<PresetRecord[]> {
        try {
            const presets = this.db.listPresets(kind);
            return succeed(`${presets.length} preset(s)`, presets);
        } catch (err) {
            return reject(asCoreError(err));
        }
    }

    deletePreset(id: number): OperationResult<number> {
        const guard = this.guardMutation<number>();
        if (guard) return guard;

        let removed: number;
        try {
            removed = this.db.deletePreset(id);
        } catch (err) {
            return reject(asCoreError(err));
        }
        if (removed === 0) return reject(new NotFoundError(`Preset ${id} not found`));

        this.publish(ConfigEvent.PresetDeleted, { presetId: id });
        return succeed('Preset deleted successfully', id);
    }

    /**
     * Write every value of a preset as an override of its kind.
     * All values are validated and stored together, or none are.
     */
    applyPreset(id: number): OperationResult<ParameterValues> {
        const guard = this.guardMutation<ParameterValues>();
        if (guard) return guard;

        let preset: PresetRecord | undefined;
        try {
            preset = this.db.getPreset(id);
        } catch (err) {
            return reject(asCoreError(err));
        }
        if (!preset) return reject(new NotFoundError(`Preset ${id} not found`));

        const kind = preset.componentKind;
        const writes = Object.entries(preset.parameters).map(([name, value]) => ({ kind, name, value }));
        const result = this.params.setOverrides(writes);
        if (!result.ok) return reject(result.error);

        this.publish(ConfigEvent.ConfigChanged, { kind, presetId: id });
        return succeed(`Applied preset '${preset.name}'`, this.params.getEffectiveValues(kind));
    }

    // ─── Subscription ───

    /**
     * Register a listener. Returns a function that removes this one
     * registration; calling it again does nothing.
     */
    onConfigChange(listener: ConfigChangeListener): () => void {
        this.listeners.push(listener);
        let registered = true;
        return () => {
            if (!registered) return;
            registered = false;
            this.unsubscribe(listener);
        };
    }

    /** Remove the earliest registration of `listener` */
    unsubscribe(listener: ConfigChangeListener): void {
        const index = this.listeners.indexOf(listener);
        if (index !== -1) this.listeners.splice(index, 1);
    }

    clearListeners(): void {
        this.listeners = [];
    }

    get listenerCount(): number {
        return this.listeners.length;
    }

    // ─── Internal ───

    private guardMutation<T>(): OperationResult<T> | null {
        if (!this.dispatching) return null;
        return reject(
            new ReentrancyError('Configuration cannot be changed from inside a change listener'),
        );
    }

    private publish(tag: ConfigEventTag, detail: ConfigChangeDetail): void {
        this.dispatching = true;
        try {
            // The whole table is rebuilt, not just the kind that changed.
            this.store.setState((s) => ({
                current: this.params.getEffectiveTable(),
                version: s.version + 1,
                lastEvent: tag,
            }));

            for (const listener of [...this.listeners]) {
                try {
                    listener(tag, detail);
                } catch (err) {
                    console.warn(`[Config] Listener failed on ${tag}:`, err);
                }
            }
        } finally {
            this.dispatching = false;
        }
    }
}

function asCoreError(err: unknown): GridCoreError {
    if (err instanceof DuplicateError || err instanceof PersistenceError) return err;
    return new PersistenceError(String(err), err);
}
