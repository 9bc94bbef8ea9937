/**
 * Bulk re-categorization of stored rows.
 *
 * Same matcher as import; only categorization fields are ever written.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import type { CanonicalRow, CategoryRule } from '../types/index.js';
import { validateTribeSplit } from '../validation/validate.js';
import { buildRuleTiers, categorizeWithTiers } from './categorize.js';
import type { ApplyRulesOptions, ApplyRulesResult, FieldAssignments, RejectedUpdate } from './types.js';

const CATEGORIZATION_KEYS = [
    'direction',
    'ownership',
    'tax',
    'cost_type',
    'cost_detail',
    'tribe',
    'split_mh',
    'split_sk',
    'split_xp',
    'split_fr',
    'project_id',
    'product_id',
    'subgroup_id',
] as const satisfies readonly (keyof FieldAssignments)[];

/**
 * A row is uncategorized while direction or cost type is missing.
 */
export function isUncategorized(row: Pick<CanonicalRow, 'direction' | 'cost_type'>): boolean {
    return !row.direction || row.cost_type === '';
}

function differs(before: CanonicalRow, after: CanonicalRow): boolean {
    return CATEGORIZATION_KEYS.some((key) => before[key] !== after[key]);
}

/**
 * Re-run rules over rows.
 *
 * Input rows are not mutated; `rows` holds updated copies in input order.
 * An update whose tribe split would not sum to 0 or 100 is not applied: the
 * row is kept as it was and the update is listed in `rejected`.
 * `matchedRules` counts, per rule name, the rows that rule changed.
 */
export function applyRules<Row extends CanonicalRow>(
    rows: readonly Row[],
    rules: readonly CategoryRule[],
    options: ApplyRulesOptions = {}
): ApplyRulesResult<Row> {
    const tiers = buildRuleTiers(rules);
    const allWarnings: string[] = [];
    const matchedRules: Record<string, number> = {};
    const rejected: RejectedUpdate[] = [];
    let changed = 0;

    const out = rows.map((row, index) => {
        if (options.onlyUncategorized && !isUncategorized(row)) {
            return row;
        }

        const { assignments, matchedRule, warnings } = categorizeWithTiers(row, tiers);

        // Aggregate warnings (dedupe)
        for (const w of warnings) {
            if (!allWarnings.includes(w)) {
                allWarnings.push(w);
            }
        }

        const updated: Row = { ...row, ...assignments };
        if (!differs(row, updated)) {
            return row;
        }

        const split = validateTribeSplit(updated);
        if (!split.valid) {
            rejected.push({ index, rule: matchedRule ? matchedRule.name : null, errors: split.errors });
            return row;
        }

        changed++;
        if (matchedRule) {
            matchedRules[matchedRule.name] = (matchedRules[matchedRule.name] ?? 0) + 1;
        }
        return updated;
    });

    return { rows: out, changed, matchedRules, warnings: allWarnings, rejected };
}
