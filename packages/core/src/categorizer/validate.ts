/**
 * Rule validation, run when a rule file is loaded.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import type { CategoryRule } from '../types/index.js';
import { validateTribeSplit } from '../validation/validate.js';
import { compileRuleRegex } from './match.js';

export interface RuleValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

/**
 * Validate one rule.
 *
 * Errors: regex that does not compile or is too long, split assignments that
 * cannot produce a valid split. Splits the rule leaves unset count as 0.
 * Warnings: inactive rules, rules that assign nothing.
 */
export function validateRule(rule: CategoryRule): RuleValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (rule.match_mode === 'regex') {
        const compiled = compileRuleRegex(rule);
        if ('error' in compiled) {
            errors.push(compiled.error);
        }
    }

    const { assign } = rule;
    const assignsSplit =
        assign.split_mh != null || assign.split_sk != null || assign.split_xp != null || assign.split_fr != null;

    if (assignsSplit) {
        const split = validateTribeSplit({
            split_mh: assign.split_mh ?? '0',
            split_sk: assign.split_sk ?? '0',
            split_xp: assign.split_xp ?? '0',
            split_fr: assign.split_fr ?? '0',
        });
        for (const e of split.errors) {
            errors.push(`Rule "${rule.name}": ${e}`);
        }
    }

    if (!rule.active) {
        warnings.push(`Rule "${rule.name}" is inactive`);
    }
    if (Object.values(assign).every((value) => value == null)) {
        warnings.push(`Rule "${rule.name}" assigns no fields`);
    }

    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate a rule set; error messages from every rule are collected.
 */
export function validateRules(rules: readonly CategoryRule[]): RuleValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const rule of rules) {
        const result = validateRule(rule);
        errors.push(...result.errors);
        warnings.push(...result.warnings);
    }

    return { valid: errors.length === 0, errors, warnings };
}
