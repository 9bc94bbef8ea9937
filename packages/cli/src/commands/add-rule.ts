import { CategoryRuleSchema } from '@kmen/shared';
import { validateRule } from '@kmen/core';
import { openWorkspace } from '../workspace/paths.js';
import { loadRules } from '../workspace/config.js';
import { appendRuleToYaml } from '../yaml/rules.js';
import type { RuleEntry } from '../yaml/rules.js';
import { success, log, arrow, warn, fail, errorMessage } from '../utils/console.js';
import type { AddRuleOptions } from '../types.js';

/**
 * Build the YAML entry from command arguments; unset options are left out.
 */
export function buildRuleEntry(name: string, matchType: string, matchValue: string, options: AddRuleOptions): RuleEntry {
    const assign: Record<string, string> = {};
    if (options.direction) assign.direction = options.direction;
    if (options.costType) assign.cost_type = options.costType;
    if (options.costDetail) assign.cost_detail = options.costDetail;
    if (options.tribe) assign.tribe = options.tribe.toUpperCase();

    const entry: RuleEntry = { name, match_type: matchType, match_value: matchValue, assign };
    if (options.mode) entry.match_mode = options.mode;
    if (options.caseSensitive) entry.case_sensitive = true;
    if (options.priority !== undefined) entry.priority = Number(options.priority);
    return entry;
}

export async function addRule(
    name: string,
    matchType: string,
    matchValue: string,
    options: AddRuleOptions
): Promise<void> {
    const entry = buildRuleEntry(name, matchType, matchValue, options);

    const parsed = CategoryRuleSchema.safeParse(entry);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'rule'}: ${i.message}`);
        fail(`Invalid rule. ${issues.join('; ')}`);
        process.exit(1);
    }

    const validation = validateRule(parsed.data);
    if (!validation.valid) {
        fail(validation.errors.join(', '));
        process.exit(1);
    }
    for (const w of validation.warnings) {
        warn(w);
    }

    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        fail('Workspace not found. Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }
    const rulesPath = workspace.config.rulesPath;

    // Same name or same predicate: warn but don't block
    const existing = loadRules(workspace);
    const clash = existing.find(
        (r) =>
            r.name === parsed.data.name ||
            (r.match_type === parsed.data.match_type && r.match_value === parsed.data.match_value)
    );
    if (clash) {
        warn(`Rule collision detected with existing rule "${clash.name}". Proceeding anyway.`);
    }

    log(`Adding new rule to: ${rulesPath}`);

    try {
        await appendRuleToYaml(rulesPath, entry);
    } catch (err) {
        fail(`Failed to add rule: ${errorMessage(err)}`);
        process.exit(1);
    }

    success('Rule successfully added!');
    arrow(`Name:     ${parsed.data.name}`);
    arrow(`Match:    ${parsed.data.match_type} ${parsed.data.match_mode} "${parsed.data.match_value}"`);
    arrow(`Priority: ${parsed.data.priority}`);
}
