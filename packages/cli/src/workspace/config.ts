import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { RuleFileSchema, type CategoryRule } from '@kmen/shared';
import type { Workspace } from '../types.js';

/**
 * Loads categorization rules from config/rules.yaml.
 * A missing or empty file means no rules.
 *
 * @throws ZodError when a rule does not match the rule schema
 */
export function loadRules(workspace: Workspace): CategoryRule[] {
    const path = workspace.config.rulesPath;
    if (!existsSync(path)) {
        return [];
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    if (data === null || data === undefined) return [];

    // Either a direct array or a wrapped object { rules: [...] }
    return RuleFileSchema.parse(data);
}
