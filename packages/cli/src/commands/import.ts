import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { runImport, validateRules, ImportAbortedError } from '@kmen/core';
import type { CategoryRule, ImportBatch } from '@kmen/core';
import { openWorkspace } from '../workspace/paths.js';
import { loadRules } from '../workspace/config.js';
import { loadStore, saveStore, storedKeys, appendImport } from '../workspace/store.js';
import { log, success, warn, arrow, fail, errorMessage } from '../utils/console.js';
import type { ImportOptions, Workspace } from '../types.js';

const MAX_LISTED_ISSUES = 10;

function loadWorkspaceRules(workspace: Workspace): CategoryRule[] {
    let rules: CategoryRule[];
    try {
        rules = loadRules(workspace);
    } catch (err) {
        fail(`Failed to load rules from ${workspace.config.rulesPath}. ${errorMessage(err)}`);
        process.exit(1);
    }

    const validation = validateRules(rules);
    for (const e of validation.errors) {
        warn(e);
    }
    return rules;
}

function printBatch(batch: ImportBatch): void {
    log('\n--- Import Summary ---');
    arrow(`Batch:    ${batch.id}`);
    arrow(`Format:   ${batch.format ?? 'unknown'} (${batch.encoding ?? 'undecoded'})`);
    arrow(`Rows:     ${batch.total_rows}`);
    arrow(`Imported: ${batch.imported}`);
    arrow(`Skipped:  ${batch.skipped}`);
    arrow(`Errors:   ${batch.errors}`);

    for (const issue of batch.error_details.slice(0, MAX_LISTED_ISSUES)) {
        log(`  Row ${issue.row_number}: [${issue.code}] ${issue.message}`);
    }
    if (batch.errors > MAX_LISTED_ISSUES) {
        log(`  ... and ${batch.errors - MAX_LISTED_ISSUES} more`);
    }

    const distinctWarnings = [...new Set(batch.warning_details.map((w) => w.message))];
    for (const message of distinctWarnings) {
        const rows = batch.warning_details.filter((w) => w.message === message).length;
        warn(`${message} (${rows} rows)`);
    }
}

export async function importStatement(file: string, options: ImportOptions): Promise<void> {
    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        fail('Workspace not found. Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }

    let data: Uint8Array;
    try {
        data = await readFile(file);
    } catch (err) {
        fail(`Error reading file: ${errorMessage(err)}`);
        process.exit(1);
    }

    const rules = options.rules === false ? [] : loadWorkspaceRules(workspace);
    const store = await loadStore(workspace);
    const filename = basename(file);

    log(`\nImporting ${filename}`);
    if (rules.length === 0) {
        arrow('No categorization rules applied');
    }

    try {
        const { batch, rows } = runImport({
            data,
            filename,
            existingKeys: storedKeys(store),
            rules,
            actor: options.user ?? null,
        });

        printBatch(batch);

        if (options.dryRun) {
            log('\n[DRY RUN] Nothing was written to the store.');
            return;
        }

        const appended = appendImport(store, batch, rows);
        await saveStore(workspace, appended.store);
        if (appended.conflicts > 0) {
            warn(`${appended.conflicts} rows were already in the store and were not added`);
        }
        success(`Saved ${appended.added} transactions to ${workspace.storePath}`);
    } catch (err) {
        if (!(err instanceof ImportAbortedError)) {
            throw err;
        }

        fail(`Import failed [${err.code}]: ${err.message}`);
        if (err.batch && !options.dryRun) {
            await saveStore(workspace, { ...store, batches: [...store.batches, err.batch] });
            arrow(`Failed batch ${err.batch.id} recorded`);
        }
        process.exit(1);
    }
}
