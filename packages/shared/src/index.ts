// Schemas
export {
    BankFieldsSchema,
    CategorizationFieldsSchema,
    CanonicalRowSchema,
    DirectionSchema,
    OwnershipSchema,
    TribeSchema,
    RowStatusSchema,
    ProfileIdSchema,
    MatchTypeSchema,
    MatchModeSchema,
    RuleAssignmentSchema,
    CategoryRuleSchema,
    RuleFileSchema,
    RowIssueCodeSchema,
    RowIssueSchema,
    ImportBatchSchema,
    TransactionStoreSchema,
} from './schemas.js';

// Types
export type {
    BankFields,
    CategorizationFields,
    CanonicalRow,
    Direction,
    Ownership,
    Tribe,
    RowStatus,
    ProfileId,
    MatchType,
    MatchMode,
    RuleAssignment,
    CategoryRule,
    RowIssueCode,
    RowIssue,
    ImportBatch,
    TransactionStore,
} from './schemas.js';

// Constants
export {
    TRIBES,
    TRIBE_SPLIT,
    DEFAULT_CURRENCY,
    CSV_FORMAT,
    RULE_LIMITS,
    MATCH_TIERS,
    BATCH_ID,
} from './constants.js';
