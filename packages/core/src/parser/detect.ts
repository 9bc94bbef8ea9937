/**
 * Bank format detection from CSV header rows.
 *
 * Each profile declares required header tokens; the first profile (in
 * DETECTION_ORDER) whose tokens all appear in the header row wins.
 * Some banks prepend an account metadata block; when the first row is such
 * a block, detection retries on the following non-empty rows.
 */

import { CSV_FORMAT } from '../types/index.js';
import { normalizeHeader } from '../utils/normalize.js';
import { isBlankRow } from '../utils/csv.js';
import { BANK_PROFILES, DETECTION_ORDER } from './profiles.js';
import type { BankProfile } from './types.js';

/**
 * Detection result: the profile and the index of its header row
 * (0 = the row passed as headerRow).
 */
export interface FormatDetection {
    profile: BankProfile;
    headerRowIndex: number;
}

function containsAll(cells: readonly string[], tokens: readonly string[]): boolean {
    const present = new Set(cells.map(normalizeHeader));
    return tokens.every((token) => present.has(normalizeHeader(token)));
}

/**
 * Match a single row against the profiles in detection order.
 */
export function matchHeaderRow(cells: readonly string[]): BankProfile | null {
    for (const id of DETECTION_ORDER) {
        const profile = BANK_PROFILES[id];
        if (containsAll(cells, profile.headerTokens)) {
            return profile;
        }
    }
    return null;
}

/**
 * Detect the bank profile of a CSV file.
 *
 * @param headerRow - First row of the file
 * @param followingRows - Rows after it, consulted only after a metadata prelude
 * @returns Detection or null when no profile matches (fatal for the file)
 */
export function detectFormat(
    headerRow: readonly string[],
    followingRows: readonly (readonly string[])[] = []
): FormatDetection | null {
    const direct = matchHeaderRow(headerRow);
    if (direct) {
        return { profile: direct, headerRowIndex: 0 };
    }

    const hasPrelude = DETECTION_ORDER.some((id) => {
        const marker = BANK_PROFILES[id].preludeMarker;
        return marker !== undefined && containsAll(headerRow, marker);
    });
    if (!hasPrelude) {
        return null;
    }

    let scanned = 0;
    for (let i = 0; i < followingRows.length && scanned < CSV_FORMAT.PRELUDE_SCAN_LIMIT; i++) {
        const row = followingRows[i];
        if (isBlankRow(row)) continue;
        scanned++;

        const profile = matchHeaderRow(row);
        if (profile) {
            return { profile, headerRowIndex: i + 1 };
        }
    }

    return null;
}
