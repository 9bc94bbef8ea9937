/**
 * Internal types for categorizer module.
 */

import type { CategorizationFields, CategoryRule, MatchType } from '../types/index.js';

/**
 * Result of matching a rule against one source text.
 */
export interface MatchResult {
    matched: boolean;
    warning?: string;
}

/**
 * Categorization fields a rule (or amount-sign derivation) sets.
 * Workflow status is never set by rules.
 */
export type FieldAssignments = Partial<Omit<CategorizationFields, 'status'>>;

/**
 * Row fields the matcher reads: the three tier sources, amount sign
 * and the current direction flag.
 */
export interface CategorizableRow {
    counterparty_account: string;
    merchant_name: string;
    message: string;
    note: string;
    counterparty_name: string;
    amount: string;
    direction: CategorizationFields['direction'];
}

/**
 * Active rules grouped per tier and sorted by priority.
 */
export type RuleTiers = Readonly<Record<MatchType, readonly CategoryRule[]>>;

/**
 * Output of categorize(): assignments plus the winning rule and tier.
 * Warnings carry invalid or over-long regex reports; no console output.
 */
export interface CategorizationOutput {
    assignments: FieldAssignments;
    matchedRule: CategoryRule | null;
    tier: MatchType | null;
    warnings: string[];
}

export interface ApplyRulesOptions {
    /** Skip rows that already have both direction and cost type */
    onlyUncategorized?: boolean;
}

/**
 * An update that was not applied because the resulting tribe split is invalid.
 * `index` is the row's position in the input.
 */
export interface RejectedUpdate {
    index: number;
    rule: string | null;
    errors: string[];
}

/**
 * Statistics from bulk re-categorization.
 */
export interface ApplyRulesResult<Row> {
    rows: Row[];
    changed: number;
    matchedRules: Record<string, number>;
    warnings: string[];
    rejected: RejectedUpdate[];
}
