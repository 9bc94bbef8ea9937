/**
 * Categorizer module: rule-based assignment of categorization fields.
 */

export { categorize, categorizeWithTiers, buildRuleTiers, tierSourceText, directionFromAmount } from './categorize.js';
export { applyRules, isUncategorized } from './apply.js';
export { matchesRule, compileRuleRegex } from './match.js';
export { validateRule, validateRules } from './validate.js';
export type {
    MatchResult,
    FieldAssignments,
    CategorizableRow,
    CategorizationOutput,
    RuleTiers,
    ApplyRulesOptions,
    ApplyRulesResult,
    RejectedUpdate,
} from './types.js';
export type { RuleValidationResult } from './validate.js';
