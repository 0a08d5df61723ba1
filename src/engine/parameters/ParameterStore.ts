/**
 * ParameterStore — seeded definitions plus per-parameter user overrides.
 *
 * Resolution rule: an override shadows the default. Writes outside
 * [min, max] are rejected, never clamped.
 *
 * The database is written first; the in-memory effective table is only
 * replaced once the write has gone through, so a storage failure leaves
 * the table exactly as it was.
 */

import type { GridDatabase } from '../../persistence/db';
import type {
    ComponentKind,
    ConfigurationTable,
    ParameterDefinition,
    ParameterOverride,
    ParameterValues,
} from './types';
import { PARAMETER_CATALOG } from './catalog';
import { checkRange, paramKey, resolveEffective } from './resolve';
import type { Result } from '../errors';
import { NotFoundError, PersistenceError, fail, ok } from '../errors';

// ─── Write Request ───

export interface OverrideWrite {
    kind: ComponentKind;
    name: string;
    value: number;
}

export interface ParameterStoreOptions {
    /** Catalog seeded into an empty database (default: PARAMETER_CATALOG) */
    catalog?: readonly ParameterDefinition[];
    /** Timestamp source for lastModified (default: ISO now) */
    now?: () => string;
}

// ─── Store ───

export class ParameterStore {
    private readonly definitions: ReadonlyMap<string, ParameterDefinition>;
    private overrides = new Map<string, ParameterOverride>();
    private effective: ConfigurationTable;
    private readonly now: () => string;

    constructor(private readonly db: GridDatabase, options: ParameterStoreOptions = {}) {
        this.now = options.now ?? (() => new Date().toISOString());

        const seeded = db.seedDefinitions(options.catalog ?? PARAMETER_CATALOG);
        if (seeded > 0) {
            console.info(`[Config] Seeded ${seeded} parameter definitions`);
        }

        const defs = new Map<string, ParameterDefinition>();
        for (const def of db.listDefinitions()) {
            defs.set(paramKey(def.componentKind, def.parameterName), def);
        }
        this.definitions = defs;

        for (const o of db.listOverrides()) {
            const key = paramKey(o.componentKind, o.parameterName);
            // Rows left behind for parameters the catalog no longer has are ignored.
            if (defs.has(key)) this.overrides.set(key, o);
        }
        this.effective = this.recompute();
    }

    // ─── Definitions ───

    getDefinition(kind: ComponentKind, name: string): Result<ParameterDefinition> {
        const def = this.definitions.get(paramKey(kind, name));
        if (!def) {
            return fail(new NotFoundError(`Unknown parameter ${kind}.${name}`));
        }
        return ok(def);
    }

    getDefinitions(kind: ComponentKind): ParameterDefinition[] {
        return [...this.definitions.values()].filter((d) => d.componentKind === kind);
    }

    // ─── Reads ───

    getEffective(kind: ComponentKind, name: string): Result<number> {
        const def = this.getDefinition(kind, name);
        if (!def.ok) return def;
        return ok(this.effective[kind][name]);
    }

    /** Copy of the effective values of one kind */
    getEffectiveValues(kind: ComponentKind): ParameterValues {
        return { ...this.effective[kind] };
    }

    /** Copy of the whole effective table */
    getEffectiveTable(): ConfigurationTable {
        return {
            source: { ...this.effective.source },
            inductive_load: { ...this.effective.inductive_load },
            capacitive_load: { ...this.effective.capacitive_load },
            resistive_load: { ...this.effective.resistive_load },
        };
    }

    hasOverride(kind: ComponentKind, name: string): boolean {
        return this.overrides.has(paramKey(kind, name));
    }

    getOverride(kind: ComponentKind, name: string): ParameterOverride | undefined {
        return this.overrides.get(paramKey(kind, name));
    }

    // ─── Writes ───

    setOverride(kind: ComponentKind, name: string, value: number): Result<number> {
        const def = this.getDefinition(kind, name);
        if (!def.ok) return def;

        const rangeError = checkRange(def.value, value);
        if (rangeError) return fail(rangeError);

        const row: ParameterOverride = {
            componentKind: kind,
            parameterName: name,
            value,
            lastModified: this.now(),
        };

        try {
            this.db.upsertOverride(kind, name, value, row.lastModified);
        } catch (err) {
            return fail(toPersistenceError(err));
        }

        this.overrides.set(paramKey(kind, name), row);
        this.effective = this.recompute();
        return ok(value);
    }

    /**
     * Validate every write first, then persist them in one transaction.
     * Either all overrides land or none do.
     */
    setOverrides(writes: readonly OverrideWrite[]): Result<number> {
        const rows: ParameterOverride[] = [];
        const stamp = this.now();

        for (const w of writes) {
            const def = this.getDefinition(w.kind, w.name);
            if (!def.ok) return fail(def.error);
            const rangeError = checkRange(def.value, w.value);
            if (rangeError) return fail(rangeError);
            rows.push({
                componentKind: w.kind,
                parameterName: w.name,
                value: w.value,
                lastModified: stamp,
            });
        }

        try {
            this.db.upsertOverrides(rows);
        } catch (err) {
            return fail(toPersistenceError(err));
        }

        for (const row of rows) {
            this.overrides.set(paramKey(row.componentKind, row.parameterName), row);
        }
        this.effective = this.recompute();
        return ok(rows.length);
    }

    /**
     * Delete one override, or every override of `kind` when `name` is
     * omitted. Returns the number of rows removed.
     */
    resetOverride(kind: ComponentKind, name?: string): Result<number> {
        if (name !== undefined) {
            const def = this.getDefinition(kind, name);
            if (!def.ok) return fail(def.error);
        }

        let removed: number;
        try {
            removed = name !== undefined
                ? this.db.deleteOverride(kind, name)
                : this.db.deleteOverridesForKind(kind);
        } catch (err) {
            return fail(toPersistenceError(err));
        }

        if (name !== undefined) {
            this.overrides.delete(paramKey(kind, name));
        } else {
            for (const [key, o] of this.overrides) {
                if (o.componentKind === kind) this.overrides.delete(key);
            }
        }
        this.effective = this.recompute();
        return ok(removed);
    }

    // ─── Internal ───

    private recompute(): ConfigurationTable {
        return resolveEffective([...this.definitions.values()], [...this.overrides.values()]);
    }
}

function toPersistenceError(err: unknown): PersistenceError {
    if (err instanceof PersistenceError) return err;
    return new PersistenceError(String(err), err);
}
