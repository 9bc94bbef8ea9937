import { Decimal } from 'decimal.js';
import { TRIBE_SPLIT } from '../types/index.js';
import type { CanonicalRow, CategorizationFields } from '../types/index.js';
import { directionFromAmount } from '../categorizer/categorize.js';

export type TribeSplit = Pick<CategorizationFields, 'split_mh' | 'split_sk' | 'split_xp' | 'split_fr'>;

export interface ValidationResult {
    valid: boolean;
    errors: string[];
}

const SPLIT_KEYS = ['split_mh', 'split_sk', 'split_xp', 'split_fr'] as const;

const PERCENT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Validate a tribe split.
 *
 * Each share must lie within 0-100 and the shares must sum to exactly
 * 0 (unassigned) or 100 (fully assigned). Uses Decimal for the sum.
 *
 * @param splits - The four percentage strings
 */
export function validateTribeSplit(splits: TribeSplit): ValidationResult {
    const errors: string[] = [];
    let total = new Decimal(0);

    for (const key of SPLIT_KEYS) {
        const raw = splits[key];
        if (!PERCENT_PATTERN.test(raw)) {
            errors.push(`${key} is not a number: "${raw}"`);
            continue;
        }

        const value = new Decimal(raw);
        if (value.lt(TRIBE_SPLIT.MIN_PCT) || value.gt(TRIBE_SPLIT.MAX_PCT)) {
            errors.push(`${key} must be between ${TRIBE_SPLIT.MIN_PCT} and ${TRIBE_SPLIT.MAX_PCT}, got ${raw}`);
        }
        total = total.plus(value);
    }

    if (errors.length === 0 && !TRIBE_SPLIT.ALLOWED_SUMS.some((sum) => total.equals(sum))) {
        errors.push(`Tribe split must sum to 0 or 100, got ${total.toString()}`);
    }

    return { valid: errors.length === 0, errors };
}

/**
 * Validate a stored row for downstream consumers.
 *
 * Adds a direction/amount agreement check to the tribe split rule.
 * Import never runs this check: a rule may legitimately assign a direction
 * that disagrees with the sign (refunds, reversals).
 */
export function validateRow(row: CanonicalRow): ValidationResult {
    const { errors } = validateTribeSplit(row);

    const implied = directionFromAmount(row.amount);
    if (row.direction && implied && row.direction !== implied) {
        errors.push(`Direction "${row.direction}" disagrees with amount ${row.amount}`);
    }

    return { valid: errors.length === 0, errors };
}
