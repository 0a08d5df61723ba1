/**
 * SQLite Wrapper — Low-level database operations.
 *
 * Relational store built on sql.js (SQLite compiled to WebAssembly).
 * Opening is async because the WASM module loads once per process;
 * after that every call completes (or throws a PersistenceError)
 * before it returns. File-backed databases are written back to disk
 * after each committed write.
 *
 * Database schema:
 *   - "ComponentParameterDefaults" : seeded definitions, one row per (kind, name)
 *   - "ParameterOverrides"         : user overrides, one row per (kind, name)
 *   - "Presets"                    : named parameter snapshots of one kind
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';

import type {
    ComponentKind,
    ParameterDefinition,
    ParameterOverride,
    ParameterValues,
} from '../engine/parameters/types';
import { isComponentKind } from '../engine/parameters/types';
import { DuplicateError, PersistenceError, describeError } from '../engine/errors';

// ─── Preset Record ───

export interface PresetRecord {
    id: number;
    name: string;
    description: string;
    componentKind: ComponentKind;
    parameters: ParameterValues;
    createdAt: string;
}

export interface NewPreset {
    name: string;
    description: string;
    componentKind: ComponentKind;
    parameters: ParameterValues;
    createdAt: string;
}

// ─── Row Shapes ───

type Row = Record<string, SqlValue>;

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS ComponentParameterDefaults (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        component_kind TEXT NOT NULL,
        parameter_name TEXT NOT NULL,
        default_value REAL NOT NULL,
        min_value REAL NOT NULL,
        max_value REAL NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        unit TEXT NOT NULL DEFAULT '',
        UNIQUE(component_kind, parameter_name)
    );

    CREATE TABLE IF NOT EXISTS ParameterOverrides (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        component_kind TEXT NOT NULL,
        parameter_name TEXT NOT NULL,
        value REAL NOT NULL,
        last_modified TEXT NOT NULL,
        UNIQUE(component_kind, parameter_name)
    );

    CREATE TABLE IF NOT EXISTS Presets (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        component_kind TEXT NOT NULL,
        parameters_json TEXT NOT NULL,
        created_at TEXT NOT NULL
    );
`;

// ─── Database Class ───

export const MEMORY_PATH = ':memory:';

export class GridDatabase {
    private closed = false;
    private depth = 0;

    private constructor(
        readonly path: string,
        private readonly db: Database,
    ) {}

    /** Open (or create) the database at `path`; ":memory:" keeps it in process. */
    static async open(path: string): Promise<GridDatabase> {
        let SQL: SqlJsStatic;
        try {
            SQL = await loadSqlJs();
        } catch (err) {
            throw new PersistenceError(`Failed to load SQLite: ${describeError(err)}`, err);
        }
        return new GridDatabase(path, connect(SQL, path));
    }

    // ─── Definitions ───

    /** Insert catalog rows that are missing. Existing rows are left as they are. */
    seedDefinitions(definitions: readonly ParameterDefinition[]): number {
        return this.write('seed definitions', () => {
            let inserted = 0;
            for (const d of definitions) {
                inserted += this.change(
                    `INSERT OR IGNORE INTO ComponentParameterDefaults
                        (component_kind, parameter_name, default_value, min_value, max_value, description, unit)
                     VALUES (?, ?, ?, ?, ?, ?, ?)`,
                    [d.componentKind, d.parameterName, d.default, d.min, d.max, d.description, d.unit],
                );
            }
            return inserted;
        });
    }

    listDefinitions(): ParameterDefinition[] {
        return this.run('list definitions', () => {
            const defs: ParameterDefinition[] = [];
            for (const row of this.all('SELECT * FROM ComponentParameterDefaults ORDER BY id')) {
                const kind = text(row, 'component_kind');
                if (!isComponentKind(kind)) continue;
                defs.push({
                    componentKind: kind,
                    parameterName: text(row, 'parameter_name'),
                    default: real(row, 'default_value'),
                    min: real(row, 'min_value'),
                    max: real(row, 'max_value'),
                    unit: text(row, 'unit'),
                    description: text(row, 'description'),
                });
            }
            return defs;
        });
    }

    // ─── Overrides ───

    listOverrides(): ParameterOverride[] {
        return this.run('list overrides', () => {
            const overrides: ParameterOverride[] = [];
            for (const row of this.all('SELECT * FROM ParameterOverrides ORDER BY id')) {
                const kind = text(row, 'component_kind');
                if (!isComponentKind(kind)) continue;
                overrides.push({
                    componentKind: kind,
                    parameterName: text(row, 'parameter_name'),
                    value: real(row, 'value'),
                    lastModified: text(row, 'last_modified'),
                });
            }
            return overrides;
        });
    }

    upsertOverride(kind: ComponentKind, name: string, value: number, lastModified: string): void {
        this.write('save override', () => {
            this.change(UPSERT_OVERRIDE, [kind, name, value, lastModified]);
        });
    }

    /** Upsert several overrides in one transaction: all rows land or none do. */
    upsertOverrides(rows: readonly ParameterOverride[]): void {
        this.write('save overrides', () => {
            for (const o of rows) {
                this.change(UPSERT_OVERRIDE, [o.componentKind, o.parameterName, o.value, o.lastModified]);
            }
        });
    }

    deleteOverride(kind: ComponentKind, name: string): number {
        return this.write('delete override', () =>
            this.change(
                'DELETE FROM ParameterOverrides WHERE component_kind = ? AND parameter_name = ?',
                [kind, name],
            ),
        );
    }

    deleteOverridesForKind(kind: ComponentKind): number {
        return this.write('delete overrides', () =>
            this.change('DELETE FROM ParameterOverrides WHERE component_kind = ?', [kind]),
        );
    }

    // ─── Presets ───

    insertPreset(preset: NewPreset): PresetRecord {
        return this.write('save preset', () => {
            try {
                this.change(
                    `INSERT INTO Presets (name, description, component_kind, parameters_json, created_at)
                     VALUES (?, ?, ?, ?, ?)`,
                    [
                        preset.name,
                        preset.description,
                        preset.componentKind,
                        JSON.stringify(preset.parameters),
                        preset.createdAt,
                    ],
                );
            } catch (err) {
                if (isUniqueViolation(err)) {
                    throw new DuplicateError(`A preset named '${preset.name}' already exists`);
                }
                throw err;
            }
            const row = this.first('SELECT last_insert_rowid() AS id');
            const id = row ? real(row, 'id') : 0;
            return { ...preset, parameters: { ...preset.parameters }, id };
        });
    }

    getPreset(id: number): PresetRecord | undefined {
        return this.run('load preset', () => {
            const row = this.first('SELECT * FROM Presets WHERE id = ?', [id]);
            return row ? toPresetRecord(row) : undefined;
        });
    }

    getPresetByName(name: string): PresetRecord | undefined {
        return this.run('load preset', () => {
            const row = this.first('SELECT * FROM Presets WHERE name = ?', [name]);
            return row ? toPresetRecord(row) : undefined;
        });
    }

    listPresets(kind?: ComponentKind): PresetRecord[] {
        return this.run('list presets', () => {
            const rows = kind
                ? this.all('SELECT * FROM Presets WHERE component_kind = ? ORDER BY id', [kind])
                : this.all('SELECT * FROM Presets ORDER BY id');
            const presets: PresetRecord[] = [];
            for (const row of rows) {
                const record = toPresetRecord(row);
                if (record) presets.push(record);
            }
            return presets;
        });
    }

    deletePreset(id: number): number {
        return this.write('delete preset', () =>
            this.change('DELETE FROM Presets WHERE id = ?', [id]),
        );
    }

    // ─── Utility ───

    /** Run several writes as one transaction. Nested calls join the outer one. */
    transaction<T>(fn: () => T): T {
        return this.write('transaction', fn);
    }

    clear(): void {
        this.write('clear', () => {
            this.db.exec('DELETE FROM ParameterOverrides; DELETE FROM Presets;');
        });
    }

    get isOpen(): boolean {
        return !this.closed;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.db.close();
    }

    // ─── Internal ───

    private run<T>(label: string, fn: () => T): T {
        if (this.closed) {
            throw new PersistenceError(`Error during ${label}: database is closed`);
        }
        try {
            return fn();
        } catch (err) {
            if (err instanceof DuplicateError || err instanceof PersistenceError) throw err;
            throw new PersistenceError(`Error during ${label}: ${describeError(err)}`, err);
        }
    }

    /** Run `fn` inside a transaction and write the file once the outermost one commits. */
    private write<T>(label: string, fn: () => T): T {
        return this.run(label, () => {
            if (this.depth > 0) return fn();

            this.db.run('BEGIN');
            this.depth = 1;
            let committed = false;
            try {
                const result = fn();
                this.db.run('COMMIT');
                committed = true;
                this.flush();
                return result;
            } finally {
                this.depth = 0;
                if (!committed) this.db.run('ROLLBACK');
            }
        });
    }

    private flush(): void {
        if (this.path === MEMORY_PATH) return;
        writeFileSync(this.path, this.db.export());
    }

    private all(sql: string, params: SqlValue[] = []): Row[] {
        const stmt = this.db.prepare(sql);
        try {
            stmt.bind(params);
            const rows: Row[] = [];
            while (stmt.step()) rows.push(stmt.getAsObject());
            return rows;
        } finally {
            stmt.free();
        }
    }

    private first(sql: string, params: SqlValue[] = []): Row | undefined {
        return this.all(sql, params)[0];
    }

    /** Run one statement; returns the number of rows it changed. */
    private change(sql: string, params: SqlValue[]): number {
        this.db.run(sql, params);
        return this.db.getRowsModified();
    }
}

const UPSERT_OVERRIDE = `
    INSERT INTO ParameterOverrides (component_kind, parameter_name, value, last_modified)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(component_kind, parameter_name)
    DO UPDATE SET value = excluded.value, last_modified = excluded.last_modified
`;

// ─── Helpers ───

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
    if (!sqlJs) {
        sqlJs = initSqlJs().catch((err: unknown) => {
            sqlJs = null;
            throw err;
        });
    }
    return sqlJs;
}

function connect(SQL: SqlJsStatic, path: string): Database {
    try {
        const bytes = path !== MEMORY_PATH && existsSync(path) ? readFileSync(path) : null;
        const db = new SQL.Database(bytes);
        db.exec(SCHEMA);
        return db;
    } catch (err) {
        throw new PersistenceError(`Failed to open database "${path}": ${describeError(err)}`, err);
    }
}

function text(row: Row, column: string): string {
    const value = row[column];
    if (typeof value === 'string') return value;
    throw new PersistenceError(`Column ${column} is not text`);
}

function real(row: Row, column: string): number {
    const value = row[column];
    if (typeof value === 'number') return value;
    throw new PersistenceError(`Column ${column} is not a number`);
}

function toPresetRecord(row: Row): PresetRecord | undefined {
    const kind = text(row, 'component_kind');
    if (!isComponentKind(kind)) return undefined;
    return {
        id: real(row, 'id'),
        name: text(row, 'name'),
        description: text(row, 'description'),
        componentKind: kind,
        parameters: parseParameters(text(row, 'parameters_json')),
        createdAt: text(row, 'created_at'),
    };
}

function parseParameters(json: string): ParameterValues {
    const parsed: unknown = JSON.parse(json);
    const values: ParameterValues = {};
    if (typeof parsed !== 'object' || parsed === null) return values;
    for (const [name, value] of Object.entries(parsed)) {
        if (typeof value === 'number') values[name] = value;
    }
    return values;
}

function isUniqueViolation(err: unknown): boolean {
    return err instanceof Error && err.message.includes('UNIQUE constraint failed');
}

// ─── Factory ───

export function openDatabase(path: string): Promise<GridDatabase> {
    return GridDatabase.open(path);
}
