/**
 * Bank profile configuration types.
 *
 * Profiles are plain tagged data: detection tokens, a column dictionary,
 * a finalize hook and a natural-key extractor. The set is closed and
 * enumerated in profiles.ts.
 */

import type { BankFields, ProfileId } from '../types/index.js';

/**
 * Cell conversion applied before a value is stored on the draft.
 * - text: trimmed string
 * - amount: Czech decimal -> "1234.50"
 * - date: Czech/ISO date -> "YYYY-MM-DD"
 * - currency: upper-cased code
 * - foreign_amount: amount with optional trailing currency, fills original_currency too
 */
export type FieldTransform = 'text' | 'amount' | 'date' | 'currency' | 'foreign_amount';

/**
 * Staging slots a profile may fill before finalize() folds them into bank fields.
 */
export type StagingField = 'account_bank_code' | 'own_note';

export type ColumnTarget = keyof BankFields | StagingField;

/**
 * Draft values keyed by target, all in canonical string form.
 */
export type DraftRow = Partial<Record<ColumnTarget, string>>;

export interface ColumnMapping {
    /** Header token as exported by the bank (compared case-insensitively) */
    header: string;
    target: ColumnTarget;
    transform: FieldTransform;
    /** For header names that repeat: 0 = first occurrence, 1 = second, ... */
    occurrence?: number;
}

export interface BankProfile {
    id: ProfileId;
    label: string;
    /** All must be present in the header row */
    headerTokens: readonly string[];
    /** Metadata block header that precedes the real header row */
    preludeMarker?: readonly string[];
    columns: readonly ColumnMapping[];
    /** Profile-specific post-processing on the draft (joins, fallbacks) */
    finalize?: (draft: DraftRow) => DraftRow;
    /** Natural key for duplicate suppression; null means the row is never deduplicated */
    naturalKey: (fields: BankFields) => string | null;
}
