/**
 * Date parsing utilities for bank exports.
 * All dates returned as UTC (00:00:00Z).
 */

import { RowError } from '../errors.js';

/**
 * Layouts seen in Czech bank exports.
 */
export type DateFormatHint = 'DMY_DOT' | 'DMY_DOT_TIME' | 'DMY_SLASH' | 'ISO' | 'ISO_TIME';

interface DatePattern {
    hint: DateFormatHint;
    regex: RegExp;
    order: 'DMY' | 'YMD';
}

/**
 * Tried in this order unless a hint narrows the attempt.
 */
const DATE_PATTERNS: readonly DatePattern[] = [
    { hint: 'DMY_DOT', regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, order: 'DMY' },
    { hint: 'DMY_DOT_TIME', regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})\s+\d{1,2}:\d{2}(:\d{2})?$/, order: 'DMY' },
    { hint: 'DMY_SLASH', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'DMY' },
    { hint: 'ISO', regex: /^(\d{4})-(\d{2})-(\d{2})$/, order: 'YMD' },
    { hint: 'ISO_TIME', regex: /^(\d{4})-(\d{2})-(\d{2})[ T]\d{2}:\d{2}(:\d{2})?$/, order: 'YMD' },
];

/**
 * Parse a date string, returning null when no layout matches
 * or the date does not exist in the calendar.
 */
export function parseDateValue(raw: string, formatHint?: DateFormatHint): Date | null {
    const value = raw.trim();
    const patterns = formatHint
        ? DATE_PATTERNS.filter((p) => p.hint === formatHint)
        : DATE_PATTERNS;

    for (const pattern of patterns) {
        const match = value.match(pattern.regex);
        if (!match) continue;

        const [first, second, third] = [match[1], match[2], match[3]].map((part) => parseInt(part, 10));
        const date = pattern.order === 'DMY'
            ? buildUtcDate(third, second, first)
            : buildUtcDate(first, second, third);

        if (date) return date;
    }

    return null;
}

/**
 * Parse a date string.
 *
 * @throws RowError MalformedDate when no layout matches or the date is invalid (31.04. is rejected, not clamped)
 */
export function parseDate(raw: string, formatHint?: DateFormatHint): Date {
    const date = parseDateValue(raw, formatHint);
    if (!date) {
        throw new RowError('MalformedDate', `Unable to parse date: "${raw}"`);
    }
    return date;
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
