/**
 * Core Errors — typed failures shared by every engine module.
 *
 * Nothing here is fatal. Lower layers hand these back inside a
 * `Result`; the configuration service turns them into
 * `{ success, message }` for direct display.
 */

// ─── Error Codes ───

export type GraphStateCode =
    | 'AlreadyConnected'
    | 'NotConnected'
    | 'NilSource'
    | 'SourceAlreadyPlaced'
    | 'EntityNotFound'
    | 'WrongEntityKind';

export type CoreErrorCode =
    | 'Validation'
    | 'NotFound'
    | 'Duplicate'
    | 'Persistence'
    | 'Reentrancy'
    | GraphStateCode;

// ─── Error Classes ───

export abstract class GridCoreError extends Error {
    abstract readonly code: CoreErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends GridCoreError {
    readonly code = 'Validation' as const;
}

export class OutOfRangeError extends ValidationError {
    constructor(
        readonly min: number,
        readonly max: number,
        readonly unit: string,
    ) {
        super(`Value must be between ${min} and ${max} ${unit}`);
    }
}

export class NotFoundError extends GridCoreError {
    readonly code = 'NotFound' as const;
}

export class DuplicateError extends GridCoreError {
    readonly code = 'Duplicate' as const;
}

export class PersistenceError extends GridCoreError {
    readonly code = 'Persistence' as const;

    constructor(message: string, readonly cause?: unknown) {
        super(message);
    }
}

export class ReentrancyError extends GridCoreError {
    readonly code = 'Reentrancy' as const;
}

export class GraphStateError extends GridCoreError {
    constructor(readonly code: GraphStateCode, message: string) {
        super(message);
    }
}

// ─── Result ───

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: GridCoreError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T>(error: GridCoreError): Result<T> {
    return { ok: false, error };
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
