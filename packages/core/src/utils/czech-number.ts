/**
 * Czech locale number parsing.
 *
 * Czech exports write amounts as "1 234,56": space (often NBSP) as thousands
 * separator and comma as decimal separator.
 */

import { Decimal } from 'decimal.js';
import { RowError } from '../errors.js';

const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;
const CURRENCY_SUFFIX = /^(.*?)\s*([A-Za-z]{3})$/;

/**
 * Parse a Czech-formatted amount into a Decimal.
 *
 * @throws RowError MalformedNumber on empty input or any residual non-numeric character
 */
export function parseAmount(raw: string): Decimal {
    const cleaned = raw
        .replace(/[\s\u00A0\u202F]/g, '')
        .replace(/\u2212/g, '-')
        .replace(/,/g, '.');

    if (!DECIMAL_PATTERN.test(cleaned)) {
        throw new RowError('MalformedNumber', `Unable to parse amount: "${raw}"`);
    }

    return new Decimal(cleaned);
}

/**
 * Format a Decimal at minor-unit precision ("1234.50").
 */
export function formatAmount(value: Decimal): string {
    return value.toFixed(2);
}

/**
 * Normalize a currency code ("czk " -> "CZK").
 */
export function parseCurrency(raw: string): string {
    return raw.trim().toUpperCase();
}

/**
 * Parse a foreign-amount cell that may carry its currency ("12,50 EUR").
 * Currency is null when the cell holds only the amount.
 */
export function parseForeignAmount(raw: string): { amount: Decimal; currency: string | null } {
    const trimmed = raw.trim();
    const match = trimmed.match(CURRENCY_SUFFIX);

    if (match) {
        return { amount: parseAmount(match[1]), currency: parseCurrency(match[2]) };
    }

    return { amount: parseAmount(trimmed), currency: null };
}
