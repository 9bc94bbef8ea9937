import { RowStatusSchema } from '@kmen/shared';
import type { RowStatus } from '@kmen/shared';
import { openWorkspace } from '../workspace/paths.js';
import { loadStore } from '../workspace/store.js';
import { computeStats, filterByDate } from '../stats/compute.js';
import { log, warn, arrow, fail } from '../utils/console.js';
import type { StatsOptions } from '../types.js';

const STATUS_LABELS: Record<RowStatus, string> = {
    imported: 'Imported',
    processed: 'Processed',
    approved: 'Approved',
    edited: 'Edited',
    error: 'Error',
};

function pct(count: number, total: number): string {
    return `${((count / total) * 100).toFixed(1)}%`;
}

export async function showStats(options: StatsOptions): Promise<void> {
    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        fail('Workspace not found. Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }

    const store = await loadStore(workspace);
    const rows = filterByDate(store.transactions, options);

    if (options.from) arrow(`From: ${options.from}`);
    if (options.to) arrow(`To: ${options.to}`);

    log(`\n${'='.repeat(60)}`);
    log('TRANSACTION STATISTICS');
    log('='.repeat(60));

    const stats = computeStats(rows);
    log(`\nTotal transactions: ${stats.total}`);
    if (stats.total === 0) {
        warn('No transactions found');
        return;
    }

    log('\n--- By Status ---');
    for (const status of RowStatusSchema.options) {
        const count = stats.byStatus[status];
        log(`  ${STATUS_LABELS[status]}: ${count} (${pct(count, stats.total)})`);
    }

    log('\n--- Financial Summary ---');
    log(`  Income:  ${stats.income.padStart(15)} CZK`);
    log(`  Expense: ${stats.expense.padStart(15)} CZK`);
    log(`  Net:     ${stats.net.padStart(15)} CZK`);

    log('\n--- Categorization ---');
    log(`  Categorized:   ${stats.categorized} (${pct(stats.categorized, stats.total)})`);
    log(`  Uncategorized: ${stats.uncategorized} (${pct(stats.uncategorized, stats.total)})`);

    if (options.byMonth) {
        log('\n--- By Month ---');
        log(`  ${'Month'.padEnd(12)} ${'Count'.padStart(8)} ${'Income'.padStart(15)} ${'Expense'.padStart(15)} ${'Net'.padStart(15)}`);
        for (const m of stats.byMonth.slice(0, 12)) {
            log(`  ${m.month.padEnd(12)} ${String(m.count).padStart(8)} ${m.income.padStart(15)} ${m.expense.padStart(15)} ${m.net.padStart(15)}`);
        }
    }

    if (options.byTribe) {
        log('\n--- By KMEN ---');
        for (const [tribe, total] of Object.entries(stats.byTribe)) {
            log(`  ${tribe}: ${total.padStart(15)} CZK`);
        }
    }

    if (options.byCostType) {
        log('\n--- By Cost Type ---');
        for (const c of stats.byCostType.slice(0, 15)) {
            log(`  ${c.costType.slice(0, 25).padEnd(25)} ${String(c.count).padStart(8)} ${c.total.padStart(15)}`);
        }
    }

    log(`\n${'='.repeat(60)}`);
}
