/**
 * Text normalization for header detection and rule matching.
 */

import { stripBom } from './csv.js';

/**
 * Normalize a CSV header cell for case-insensitive token comparison.
 *
 * Transformations:
 * - Strip BOM
 * - Unicode NFC (cp1250 and UTF-8 exports must compare equal)
 * - Trim and lowercase
 */
export function normalizeHeader(raw: string): string {
    return stripBom(raw).normalize('NFC').trim().toLowerCase();
}

/**
 * Fold case for non-case-sensitive rule comparison.
 */
export function foldCase(value: string, caseSensitive: boolean): string {
    return caseSensitive ? value : value.toLowerCase();
}
