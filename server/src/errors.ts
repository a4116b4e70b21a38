import type { ImportReport } from './types.js';

/**
 * Error taxonomy.
 * ValidationError and StorageError are per-record and never stop an import;
 * StorageUnavailableError means the store itself is gone and aborts the session.
 */

export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    constructor(what: string, id: string) {
        super(`${what} not found: ${id}`);
        this.name = 'NotFoundError';
    }
}

/** A single write failed; the store is still usable. */
export class StorageError extends Error {
    readonly code: string | null;

    constructor(message: string, code: string | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageError';
        this.code = code;
    }
}

/** The store cannot be reached or written at all. */
export class StorageUnavailableError extends StorageError {
    constructor(message: string, code: string | null = null, options?: { cause?: unknown }) {
        super(message, code, options);
        this.name = 'StorageUnavailableError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Raised when a systemic storage failure stops an import; records merged before it stay committed. */
export class ImportAbortedError extends Error {
    readonly report: ImportReport;

    constructor(message: string, report: ImportReport, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ImportAbortedError';
        this.report = report;
    }
}
