// Types (re-exported from shared)
export type {
    CanonicalRow,
    BankFields,
    CategorizationFields,
    CategoryRule,
    RuleAssignment,
    ImportBatch,
    RowIssue,
    RowIssueCode,
    ProfileId,
    MatchType,
    MatchMode,
    Direction,
    Tribe,
    TransactionStore,
} from './types/index.js';

export {
    CanonicalRowSchema,
    CategoryRuleSchema,
    RuleFileSchema,
    ImportBatchSchema,
    TransactionStoreSchema,
    TRIBES,
    TRIBE_SPLIT,
    DEFAULT_CURRENCY,
    CSV_FORMAT,
    RULE_LIMITS,
    MATCH_TIERS,
} from './types/index.js';

// Errors
export { RowError, ImportAbortedError, DecodeFailureError, FormatUnrecognizedError } from './errors.js';
export type { RowErrorCode, FileErrorCode } from './errors.js';

// Utils
export { decodeStatement, splitCsv, parseAmount, parseDate, formatAmount, hashContent } from './utils/index.js';

// Parsers
export { detectFormat, getSupportedProfiles, BANK_PROFILES } from './parser/index.js';
export type { BankProfile, FormatDetection } from './parser/index.js';

// Dedup
export { DedupIndex } from './dedup/index.js';

// Categorizer
export { categorize, applyRules, isUncategorized, validateRule, validateRules } from './categorizer/index.js';
export type {
    CategorizationOutput,
    ApplyRulesOptions,
    ApplyRulesResult,
    RejectedUpdate,
    RuleValidationResult,
} from './categorizer/index.js';

// Validation
export { validateTribeSplit, validateRow } from './validation/index.js';
export type { TribeSplit, ValidationResult } from './validation/index.js';

// Import
export { runImport, UNCATEGORIZED } from './importer/index.js';
export type { ImportInput, ImportOutput } from './importer/index.js';
