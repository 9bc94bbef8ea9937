/**
 * Zod schemas for KMEN Import data structures.
 *
 * IMPORTANT: Decimal values (amounts, fees, split percentages) are stored as
 * strings. Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { BATCH_ID, RULE_LIMITS, TRIBES, TRIBE_SPLIT } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Signed decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Tribe split percentage, 0-100 inclusive.
 */
const percentString = z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal string')
    .refine(
        (v) => Number(v) >= TRIBE_SPLIT.MIN_PCT && Number(v) <= TRIBE_SPLIT.MAX_PCT,
        `Must be between ${TRIBE_SPLIT.MIN_PCT} and ${TRIBE_SPLIT.MAX_PCT}`
    );

/**
 * Percentages in rule files may be written as YAML numbers or strings.
 */
const percentInput = z
    .union([z.number(), z.string()])
    .transform((v) => String(v))
    .pipe(percentString);

const batchId = z.string().regex(
    new RegExp(`^[0-9a-f]{${BATCH_ID.LENGTH}}$`),
    `Must be ${BATCH_ID.LENGTH}-char hex`
);

// ============================================================================
// Enumerations
// ============================================================================

export const DirectionSchema = z.enum(['income', 'expense']);
export type Direction = z.infer<typeof DirectionSchema>;

export const OwnershipSchema = z.enum(['own', 'foreign', 'none']);
export type Ownership = z.infer<typeof OwnershipSchema>;

export const TribeSchema = z.enum(TRIBES);
export type Tribe = z.infer<typeof TribeSchema>;

export const RowStatusSchema = z.enum(['imported', 'processed', 'approved', 'edited', 'error']);
export type RowStatus = z.infer<typeof RowStatusSchema>;

export const ProfileIdSchema = z.enum(['raiffeisen', 'creditas', 'generic']);
export type ProfileId = z.infer<typeof ProfileIdSchema>;

export const MatchTypeSchema = z.enum(['account', 'merchant', 'keyword']);
export type MatchType = z.infer<typeof MatchTypeSchema>;

export const MatchModeSchema = z.enum(['exact', 'substring', 'regex']);
export type MatchMode = z.infer<typeof MatchModeSchema>;

// ============================================================================
// Canonical Row Schema
// ============================================================================

/**
 * Fields copied from the bank export. Written once at import, never mutated.
 */
export const BankFieldsSchema = z.object({
    txn_date: isoDateString,
    posting_date: isoDateString.nullable(),
    amount: decimalString,
    currency: z.string(),
    account: z.string(),
    counterparty_account: z.string(),
    counterparty_name: z.string(),
    counterparty_bank_code: z.string(),
    merchant_name: z.string(),
    message: z.string(),
    note: z.string(),
    bank_category: z.string(),
    transaction_type: z.string(),
    variable_symbol: z.string(),
    constant_symbol: z.string(),
    specific_symbol: z.string(),
    original_amount: decimalString.nullable(),
    original_currency: z.string(),
    fees: decimalString.nullable(),
    external_id: z.string().nullable(),
    city: z.string(),
    reference: z.string(),
});

export type BankFields = z.infer<typeof BankFieldsSchema>;

/**
 * Fields assigned by rules or a human. The parser never sets these.
 */
export const CategorizationFieldsSchema = z.object({
    direction: DirectionSchema.nullable(),
    ownership: OwnershipSchema.nullable(),
    tax: z.boolean(),
    cost_type: z.string(),
    cost_detail: z.string(),
    tribe: TribeSchema.nullable(),
    split_mh: percentString,
    split_sk: percentString,
    split_xp: percentString,
    split_fr: percentString,
    project_id: z.string().nullable(),
    product_id: z.string().nullable(),
    subgroup_id: z.string().nullable(),
    status: RowStatusSchema,
});

export type CategorizationFields = z.infer<typeof CategorizationFieldsSchema>;

/**
 * Normalized transaction - the common form every bank export becomes.
 */
export const CanonicalRowSchema = BankFieldsSchema.merge(CategorizationFieldsSchema).extend({
    source_file: z.string(),
    import_batch_id: batchId,
    row_number: z.number().int().min(1),
});

export type CanonicalRow = z.infer<typeof CanonicalRowSchema>;

// ============================================================================
// Category Rule Schemas
// ============================================================================

/**
 * Sparse field assignments carried by a rule.
 * Absent or null entries are not applied.
 */
export const RuleAssignmentSchema = z
    .object({
        direction: DirectionSchema.nullish(),
        ownership: OwnershipSchema.nullish(),
        tax: z.boolean().nullish(),
        cost_type: z.string().min(1).nullish(),
        cost_detail: z.string().min(1).nullish(),
        tribe: TribeSchema.nullish(),
        split_mh: percentInput.nullish(),
        split_sk: percentInput.nullish(),
        split_xp: percentInput.nullish(),
        split_fr: percentInput.nullish(),
        project_id: z.string().min(1).nullish(),
        product_id: z.string().min(1).nullish(),
        subgroup_id: z.string().min(1).nullish(),
    })
    .strict();

export type RuleAssignment = z.infer<typeof RuleAssignmentSchema>;

/**
 * Categorization rule: a predicate on one tier's source text plus assignments.
 * Lower priority number is evaluated first within its match_type tier.
 */
export const CategoryRuleSchema = z.object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
    description: z.string().optional(),
    match_type: MatchTypeSchema,
    match_mode: MatchModeSchema.default('exact'),
    match_value: z.string().min(1),
    case_sensitive: z.boolean().default(false),
    priority: z.number().int().min(0).default(RULE_LIMITS.DEFAULT_PRIORITY),
    active: z.boolean().default(true),
    assign: RuleAssignmentSchema.default({}),
});

export type CategoryRule = z.infer<typeof CategoryRuleSchema>;

/**
 * Rules file: either a bare list or wrapped as { rules: [...] }.
 */
export const RuleFileSchema = z.union([
    z.array(CategoryRuleSchema),
    z.object({ rules: z.array(CategoryRuleSchema).default([]) }).transform((f) => f.rules),
]);

// ============================================================================
// Import Batch Schemas
// ============================================================================

export const RowIssueCodeSchema = z.enum([
    'MalformedNumber',
    'MalformedDate',
    'MissingRequiredField',
    'InvalidTribeSplit',
    'InvalidRulePattern',
]);

export type RowIssueCode = z.infer<typeof RowIssueCodeSchema>;

/**
 * A per-row error or warning, reported by 1-based data row number.
 */
export const RowIssueSchema = z.object({
    row_number: z.number().int().min(1),
    code: RowIssueCodeSchema,
    message: z.string(),
});

export type RowIssue = z.infer<typeof RowIssueSchema>;

/**
 * Audit record for one CSV upload.
 * Built in memory by the import pipeline, persisted by the caller.
 */
export const ImportBatchSchema = z.object({
    id: batchId,
    filename: z.string(),
    file_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
    format: ProfileIdSchema.nullable(),
    encoding: z.string().nullable(),
    status: z.enum(['completed', 'failed']),
    total_rows: z.number().int().min(0),
    imported: z.number().int().min(0),
    skipped: z.number().int().min(0),
    errors: z.number().int().min(0),
    error_details: z.array(RowIssueSchema),
    warning_details: z.array(RowIssueSchema),
    failure: z.string().nullable(),
    started_at: z.string(),
    completed_at: z.string(),
    duration_ms: z.number().min(0),
    created_by: z.string().nullable(),
});

export type ImportBatch = z.infer<typeof ImportBatchSchema>;

// ============================================================================
// Transaction Store Schema
// ============================================================================

/**
 * On-disk store used by the CLI: accepted rows plus batch audit records.
 */
export const TransactionStoreSchema = z.object({
    version: z.literal(1),
    transactions: z.array(CanonicalRowSchema),
    batches: z.array(ImportBatchSchema),
});

export type TransactionStore = z.infer<typeof TransactionStoreSchema>;
