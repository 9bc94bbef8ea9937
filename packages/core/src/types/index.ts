/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    BankFields,
    CategorizationFields,
    CanonicalRow,
    Direction,
    Ownership,
    Tribe,
    ProfileId,
    MatchType,
    MatchMode,
    RuleAssignment,
    CategoryRule,
    RowIssue,
    RowIssueCode,
    ImportBatch,
    TransactionStore,
} from '@kmen/shared';

export {
    CanonicalRowSchema,
    CategoryRuleSchema,
    ImportBatchSchema,
    RuleFileSchema,
    TransactionStoreSchema,
    TRIBES,
    TRIBE_SPLIT,
    DEFAULT_CURRENCY,
    CSV_FORMAT,
    RULE_LIMITS,
    MATCH_TIERS,
    BATCH_ID,
} from '@kmen/shared';
