import { applyRules } from '@kmen/core';
import type { CanonicalRow, CategoryRule } from '@kmen/core';
import { openWorkspace } from '../workspace/paths.js';
import { loadRules } from '../workspace/config.js';
import { loadStore, saveStore } from '../workspace/store.js';
import { log, success, warn, arrow, fail, errorMessage } from '../utils/console.js';
import type { ApplyRulesCommandOptions } from '../types.js';

const MAX_LISTED_CHANGES = 10;

export async function applyRulesCommand(options: ApplyRulesCommandOptions): Promise<void> {
    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        fail('Workspace not found. Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }

    let rules: CategoryRule[];
    try {
        rules = loadRules(workspace);
    } catch (err) {
        fail(`Failed to load rules. ${errorMessage(err)}`);
        process.exit(1);
    }

    const store = await loadStore(workspace);

    // Indices into store.transactions of the rows to process
    const selected: number[] = [];
    store.transactions.forEach((row, index) => {
        if (!options.batch || row.import_batch_id === options.batch) {
            selected.push(index);
        }
    });

    if (options.batch) {
        arrow(`Filtering to batch: ${options.batch}`);
    }
    if (options.all) {
        warn('Processing ALL transactions');
    } else {
        arrow('Processing uncategorized transactions only');
    }
    if (options.dryRun) {
        warn('DRY RUN - no changes will be saved');
    }

    const before = selected.map((i) => store.transactions[i]);
    const result = applyRules(before, rules, { onlyUncategorized: !options.all });

    for (const w of result.warnings) {
        warn(w);
    }
    for (const r of result.rejected) {
        const row = before[r.index];
        warn(`Not updated: ${row.txn_date} | ${row.amount} | rule "${r.rule ?? '(none)'}": ${r.errors.join('; ')}`);
    }

    let listed = 0;
    const transactions: CanonicalRow[] = [...store.transactions];
    result.rows.forEach((row, i) => {
        const original = before[i];
        if (row === original) return;

        transactions[selected[i]] = row;
        if (listed < MAX_LISTED_CHANGES) {
            log(`  Updated: ${row.txn_date} | ${row.amount} | ${original.cost_type || '(empty)'} -> ${row.cost_type || '(empty)'}`);
            listed++;
        }
    });
    if (result.changed > MAX_LISTED_CHANGES) {
        log(`  ... and ${result.changed - MAX_LISTED_CHANGES} more`);
    }

    log('');
    if (options.dryRun) {
        warn(`Would update ${result.changed} of ${before.length} transactions`);
    } else {
        await saveStore(workspace, { ...store, transactions });
        success(`Updated ${result.changed} of ${before.length} transactions`);
    }

    const matched = Object.entries(result.matchedRules).sort(([, a], [, b]) => b - a);
    if (matched.length > 0) {
        log('\nRules matched:');
        for (const [name, count] of matched) {
            log(`  ${name}: ${count}`);
        }
    }
}
