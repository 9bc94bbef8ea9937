import { writeFile, mkdir } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { isUncategorized } from '@kmen/core';
import { RowStatusSchema } from '@kmen/shared';
import type { CanonicalRow } from '@kmen/core';
import { openWorkspace, getOutputPath } from '../workspace/paths.js';
import { loadStore } from '../workspace/store.js';
import { filterByDate } from '../stats/compute.js';
import { convertToCsv } from '../export/csv.js';
import { generateTransactionsExcel } from '../excel/transactions.js';
import { success, warn, arrow, fail } from '../utils/console.js';
import type { ExportOptions } from '../types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Rows to export, ordered by transaction date (stable for equal dates).
 */
export function selectForExport(rows: readonly CanonicalRow[], options: ExportOptions): CanonicalRow[] {
    return filterByDate(rows, options)
        .filter((row) => !options.status || row.status === options.status)
        .filter((row) => !options.uncategorized || isUncategorized(row))
        .sort((a, b) => a.txn_date.localeCompare(b.txn_date));
}

export async function exportTransactions(output: string, options: ExportOptions): Promise<void> {
    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        fail('Workspace not found. Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }

    const format = extname(output).toLowerCase();
    if (format !== '.xlsx' && format !== '.csv') {
        fail(`Unsupported export format "${format || output}". Use .xlsx or .csv.`);
        process.exit(1);
    }

    for (const [flag, value] of [['--from', options.from], ['--to', options.to]] as const) {
        if (value && !ISO_DATE.test(value)) {
            fail(`Invalid ${flag} date "${value}". Use YYYY-MM-DD.`);
            process.exit(1);
        }
    }
    if (options.status && !RowStatusSchema.safeParse(options.status).success) {
        fail(`Unknown status "${options.status}". Use one of: ${RowStatusSchema.options.join(', ')}.`);
        process.exit(1);
    }

    const store = await loadStore(workspace);
    const rows = selectForExport(store.transactions, options);

    arrow(`Exporting ${rows.length} transactions...`);
    if (rows.length === 0) {
        warn('No transactions to export');
        return;
    }

    const path = getOutputPath(workspace, output);
    await mkdir(dirname(path), { recursive: true });

    if (format === '.csv') {
        await writeFile(path, convertToCsv(rows), 'utf8');
    } else {
        const workbook = generateTransactionsExcel(rows);
        await workbook.xlsx.writeFile(path);
    }

    success(`Exported ${rows.length} transactions to ${path}`);
}
