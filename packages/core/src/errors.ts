/**
 * Error taxonomy for the import pipeline.
 *
 * Row-level errors are recorded in the batch and the row is skipped.
 * Whole-file errors abort the batch and carry the finalized failed batch.
 */

import type { ImportBatch } from './types/index.js';

export type RowErrorCode =
    | 'MalformedNumber'
    | 'MalformedDate'
    | 'MissingRequiredField'
    | 'InvalidTribeSplit';

export type FileErrorCode = 'DecodeFailure' | 'FormatUnrecognized';

/**
 * Error confined to a single data row.
 */
export class RowError extends Error {
    readonly code: RowErrorCode;

    constructor(code: RowErrorCode, message: string) {
        super(message);
        this.name = 'RowError';
        this.code = code;
    }
}

/**
 * Error that stops the whole file from being imported.
 * `batch` is set by the orchestrator before the error leaves runImport.
 */
export class ImportAbortedError extends Error {
    readonly code: FileErrorCode;
    batch: ImportBatch | null = null;

    constructor(code: FileErrorCode, message: string) {
        super(message);
        this.name = 'ImportAbortedError';
        this.code = code;
    }
}

export class DecodeFailureError extends ImportAbortedError {
    constructor(message: string) {
        super('DecodeFailure', message);
        this.name = 'DecodeFailureError';
    }
}

export class FormatUnrecognizedError extends ImportAbortedError {
    constructor(message: string) {
        super('FormatUnrecognized', message);
        this.name = 'FormatUnrecognizedError';
    }
}
