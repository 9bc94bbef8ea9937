#!/usr/bin/env node
/**
 * KMEN Import CLI
 *
 * The CLI owns all file I/O and console output:
 * - reads statement bytes and hands them to the core
 * - loads rules from config/rules.yaml, rows from data/transactions.json
 * - prints the warnings and errors the core returns as data
 */

import { Command } from 'commander';
import { importStatement } from './commands/import.js';
import { applyRulesCommand } from './commands/apply-rules.js';
import { exportTransactions } from './commands/export.js';
import { showStats } from './commands/stats.js';
import { addRule } from './commands/add-rule.js';
import { fail, errorMessage } from './utils/console.js';
import type { AddRuleOptions, ApplyRulesCommandOptions, ExportOptions, ImportOptions, StatsOptions } from './types.js';

const program = new Command();

program.name('kmen').description('Czech bank statement import and categorization').version('1.0.0');

program
    .command('import')
    .description('Import a bank statement CSV into the workspace store')
    .argument('<file>', 'CSV export from Raiffeisenbank, Banka Creditas or the generic layout')
    .option('--dry-run', 'Show the import summary without saving')
    .option('--no-rules', 'Skip categorization rules')
    .option('--user <id>', 'Recorded as the batch creator')
    .option('--workspace <dir>', 'Workspace root (default: detected from the current directory)')
    .action(async (file: string, options: ImportOptions) => {
        await importStatement(file, options);
    });

program
    .command('apply-rules')
    .description('Re-apply categorization rules to stored transactions')
    .option('--all', 'Process all transactions, not just uncategorized')
    .option('--batch <id>', 'Only process transactions from one import batch')
    .option('--dry-run', 'Show what would change without saving')
    .option('--workspace <dir>', 'Workspace root')
    .action(async (options: ApplyRulesCommandOptions) => {
        await applyRulesCommand(options);
    });

program
    .command('export')
    .description('Export stored transactions to .xlsx or .csv')
    .argument('<output>', 'Output file; bare names are written to outputs/')
    .option('--from <date>', 'From transaction date (YYYY-MM-DD)')
    .option('--to <date>', 'To transaction date (YYYY-MM-DD)')
    .option('--status <status>', 'Only rows with this status')
    .option('--uncategorized', 'Only uncategorized rows')
    .option('--workspace <dir>', 'Workspace root')
    .action(async (output: string, options: ExportOptions) => {
        await exportTransactions(output, options);
    });

program
    .command('stats')
    .description('Show transaction statistics')
    .option('--from <date>', 'From transaction date (YYYY-MM-DD)')
    .option('--to <date>', 'To transaction date (YYYY-MM-DD)')
    .option('--by-month', 'Breakdown by month')
    .option('--by-tribe', 'Breakdown by KMEN, weighted by split')
    .option('--by-cost-type', 'Breakdown by cost type')
    .option('--workspace <dir>', 'Workspace root')
    .action(async (options: StatsOptions) => {
        await showStats(options);
    });

program
    .command('add-rule')
    .description('Append a categorization rule to config/rules.yaml')
    .argument('<name>', 'Rule name')
    .argument('<match-type>', 'account | merchant | keyword')
    .argument('<match-value>', 'Value or pattern to match')
    .option('--mode <mode>', 'exact | substring | regex')
    .option('--priority <n>', 'Lower runs first within its tier')
    .option('--case-sensitive', 'Match case exactly')
    .option('--direction <direction>', 'income | expense')
    .option('--cost-type <value>', 'Cost type to assign')
    .option('--cost-detail <value>', 'Cost detail to assign')
    .option('--tribe <code>', 'MH | SK | XP | FR')
    .option('--workspace <dir>', 'Workspace root')
    .action(async (name: string, matchType: string, matchValue: string, options: AddRuleOptions) => {
        await addRule(name, matchType, matchValue, options);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    fail(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
