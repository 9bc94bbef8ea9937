/**
 * Transaction categorization with a 3-tier rule hierarchy.
 *
 * Tier order (first tier with a match wins):
 * 1. account  - counterparty account number
 * 2. merchant - merchant name
 * 3. keyword  - message, note and counterparty name joined by a space
 *
 * Within a tier, active rules run by ascending priority; ties keep the order
 * in which rules were defined. Assignments come from exactly one rule.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { Decimal } from 'decimal.js';
import { MATCH_TIERS } from '../types/index.js';
import type { CategoryRule, Direction, MatchType, RuleAssignment } from '../types/index.js';
import { matchesRule } from './match.js';
import type { CategorizableRow, CategorizationOutput, FieldAssignments, RuleTiers } from './types.js';

/**
 * Group active rules by tier, sorted by priority.
 * Array.prototype.sort is stable, so equal priorities keep definition order.
 */
export function buildRuleTiers(rules: readonly CategoryRule[]): RuleTiers {
    const byTier = (tier: MatchType): CategoryRule[] =>
        rules
            .filter((rule) => rule.active && rule.match_type === tier)
            .sort((a, b) => a.priority - b.priority);

    return {
        account: byTier('account'),
        merchant: byTier('merchant'),
        keyword: byTier('keyword'),
    };
}

/**
 * Text a tier's rules are matched against.
 */
export function tierSourceText(row: CategorizableRow, tier: MatchType): string {
    switch (tier) {
        case 'account':
            return row.counterparty_account.trim();
        case 'merchant':
            return row.merchant_name.trim();
        case 'keyword':
            return [row.message, row.note, row.counterparty_name]
                .map((part) => part.trim())
                .filter((part) => part !== '')
                .join(' ');
    }
}

/**
 * Direction implied by the amount sign; zero implies nothing.
 */
export function directionFromAmount(amount: string): Direction | null {
    const value = new Decimal(amount);
    if (value.isPositive() && !value.isZero()) return 'income';
    if (value.isNegative() && !value.isZero()) return 'expense';
    return null;
}

/**
 * Copy the non-null entries of a rule's assignment block.
 */
function toFieldAssignments(assign: RuleAssignment): FieldAssignments {
    const out: FieldAssignments = {};

    if (assign.direction != null) out.direction = assign.direction;
    if (assign.ownership != null) out.ownership = assign.ownership;
    if (assign.tax != null) out.tax = assign.tax;
    if (assign.cost_type != null) out.cost_type = assign.cost_type;
    if (assign.cost_detail != null) out.cost_detail = assign.cost_detail;
    if (assign.tribe != null) out.tribe = assign.tribe;
    if (assign.split_mh != null) out.split_mh = assign.split_mh;
    if (assign.split_sk != null) out.split_sk = assign.split_sk;
    if (assign.split_xp != null) out.split_xp = assign.split_xp;
    if (assign.split_fr != null) out.split_fr = assign.split_fr;
    if (assign.project_id != null) out.project_id = assign.project_id;
    if (assign.product_id != null) out.product_id = assign.product_id;
    if (assign.subgroup_id != null) out.subgroup_id = assign.subgroup_id;

    return out;
}

/**
 * Categorize one row against pre-built tiers.
 */
export function categorizeWithTiers(row: CategorizableRow, tiers: RuleTiers): CategorizationOutput {
    const warnings: string[] = [];

    let matchedRule: CategoryRule | null = null;
    let tier: MatchType | null = null;

    for (const candidateTier of MATCH_TIERS) {
        const source = tierSourceText(row, candidateTier);
        if (source === '') continue;

        for (const rule of tiers[candidateTier]) {
            const { matched, warning } = matchesRule(source, rule);
            if (warning && !warnings.includes(warning)) {
                warnings.push(warning);
            }
            if (matched) {
                matchedRule = rule;
                tier = candidateTier;
                break;
            }
        }
        if (matchedRule) break;
    }

    const assignments = matchedRule ? toFieldAssignments(matchedRule.assign) : {};

    // Amount sign only fills a direction nobody set
    if (!assignments.direction && !row.direction) {
        const derived = directionFromAmount(row.amount);
        if (derived) assignments.direction = derived;
    }

    return { assignments, matchedRule, tier, warnings };
}

/**
 * Categorize a single row.
 *
 * @returns the winning rule's assignments (plus derived direction), the rule
 *          and its tier, and invalid-pattern warnings
 */
export function categorize(row: CategorizableRow, rules: readonly CategoryRule[]): CategorizationOutput {
    return categorizeWithTiers(row, buildRuleTiers(rules));
}
