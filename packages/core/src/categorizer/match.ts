/**
 * Rule matching for categorization.
 *
 * Regex rules are untrusted input. They run on RE2, which matches in time
 * linear to the input and has no backtracking; back-references and
 * lookaround do not compile. Pattern length and searched text are capped.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Invalid regex returns warning in result.
 */

import { RE2JS } from 're2js';
import { RULE_LIMITS } from '../types/index.js';
import type { CategoryRule } from '../types/index.js';
import { foldCase } from '../utils/normalize.js';
import type { MatchResult } from './types.js';

/**
 * Compile a rule's regex, or report why it cannot be used.
 */
export function compileRuleRegex(rule: CategoryRule): { regex: RE2JS } | { error: string } {
    if (rule.match_value.length > RULE_LIMITS.MAX_PATTERN_LENGTH) {
        return {
            error: `Unsafe regex pattern in rule "${rule.name}": pattern longer than ${RULE_LIMITS.MAX_PATTERN_LENGTH} characters`,
        };
    }

    try {
        return { regex: RE2JS.compile(rule.match_value, rule.case_sensitive ? 0 : RE2JS.CASE_INSENSITIVE) };
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        return { error: `Invalid regex pattern in rule "${rule.name}": ${errorMsg}` };
    }
}

/**
 * Match a tier's source text against a rule.
 *
 * - exact: whole text equals match_value
 * - substring: match_value occurs anywhere
 * - regex: unanchored search
 * Case-folded on both sides unless the rule is case-sensitive.
 *
 * An invalid or over-long regex returns false with a warning and does not throw.
 */
export function matchesRule(sourceText: string, rule: CategoryRule): MatchResult {
    switch (rule.match_mode) {
        case 'exact':
            return {
                matched: foldCase(sourceText, rule.case_sensitive) === foldCase(rule.match_value, rule.case_sensitive),
            };
        case 'substring':
            return {
                matched: foldCase(sourceText, rule.case_sensitive).includes(foldCase(rule.match_value, rule.case_sensitive)),
            };
        case 'regex': {
            const compiled = compileRuleRegex(rule);
            if ('error' in compiled) {
                return { matched: false, warning: compiled.error };
            }
            const text = sourceText.slice(0, RULE_LIMITS.MAX_REGEX_INPUT_LENGTH);
            return { matched: compiled.regex.matcher(text).find() };
        }
    }
}
