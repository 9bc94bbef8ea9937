import type { CanonicalRow, CategoryRule, ImportBatch } from '../types/index.js';

/**
 * Inputs to one import call. Everything the pipeline reads is passed in;
 * nothing is loaded from disk or a database.
 */
export interface ImportInput {
    /** Raw CSV bytes */
    data: ArrayBuffer | Uint8Array;
    filename: string;
    /** Natural keys already persisted, snapshot taken by the caller */
    existingKeys?: Iterable<string>;
    rules?: readonly CategoryRule[];
    /** Recorded as created_by on the batch */
    actor?: string | null;
    /** Clock for started_at / completed_at; defaults to the system clock */
    now?: () => Date;
}

export interface ImportOutput {
    batch: ImportBatch;
    /** Accepted rows in source order */
    rows: CanonicalRow[];
}
