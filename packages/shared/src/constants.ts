/**
 * Constants for KMEN Import.
 */

/**
 * The four cost-bearing tribes a transaction may be split across.
 * ŠK is stored as the ASCII code SK.
 */
export const TRIBES = ['MH', 'SK', 'XP', 'FR'] as const;

/**
 * Percentage bounds for tribe splits.
 * A split is either unassigned (sum 0) or complete (sum 100).
 */
export const TRIBE_SPLIT = {
    MIN_PCT: 0,
    MAX_PCT: 100,
    ALLOWED_SUMS: ['0', '100'],
} as const;

/**
 * Currency assumed when a bank layout carries no currency column.
 */
export const DEFAULT_CURRENCY = 'CZK';

/**
 * CSV decoding.
 * Czech bank exports are UTF-8 (often with BOM) or windows-1250.
 */
export const CSV_FORMAT = {
    DELIMITER: ';',
    PRIMARY_ENCODING: 'utf-8',
    FALLBACK_ENCODING: 'windows-1250',
    /** Lines scanned after a metadata prelude when looking for the real header. */
    PRELUDE_SCAN_LIMIT: 10,
} as const;

/**
 * Rule defaults and limits for user-editable regex rules.
 */
export const RULE_LIMITS = {
    DEFAULT_PRIORITY: 100,
    MAX_PATTERN_LENGTH: 500,
    MAX_REGEX_INPUT_LENGTH: 2000,
} as const;

/**
 * Rule tiers, in evaluation order.
 */
export const MATCH_TIERS = ['account', 'merchant', 'keyword'] as const;

/**
 * Batch id configuration.
 */
export const BATCH_ID = {
    LENGTH: 16,
} as const;
