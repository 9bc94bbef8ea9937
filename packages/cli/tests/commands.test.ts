import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fsp from 'node:fs/promises';
import { TransactionStoreSchema, CategoryRuleSchema } from '@kmen/shared';
import type { TransactionStore } from '@kmen/shared';
import { importStatement } from '../src/commands/import.js';
import { applyRulesCommand } from '../src/commands/apply-rules.js';
import * as paths from '../src/workspace/paths.js';
import * as config from '../src/workspace/config.js';
import { emptyStore } from '../src/workspace/store.js';
import type { Workspace } from '../src/types.js';
import { makeRow } from './fixtures/rows.js';

vi.mock('node:fs/promises');
vi.mock('../src/workspace/paths.js');
vi.mock('../src/workspace/config.js');

const WORKSPACE: Workspace = {
    root: '/ws',
    data: '/ws/data',
    outputs: '/ws/outputs',
    storePath: '/ws/data/transactions.json',
    config: { rulesPath: '/ws/config/rules.yaml' },
};

const STATEMENT = [
    'Datum;Účet;Typ;Poznámka/Zpráva;VS;Částka;Id transakce;Číslo protiúčtu;Název protiúčtu;Název merchanta',
    '01.03.2026;1234/0800;Příjem;Platba za workshop;111;15 000,00;G-1;9999/0100;Klient a.s.;',
    '02.03.2026;1234/0800;Výdaj;Elektřina březen;;-2 300,00;G-2;;;ČEZ Prodej',
].join('\n');

function missingFile(): Error {
    return Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
}

/**
 * Serve the statement and the store from memory.
 */
function serveFiles(files: { statement: string; store: TransactionStore | null }): void {
    vi.mocked(fsp.readFile).mockImplementation(async (path: unknown) => {
        if (String(path) === WORKSPACE.storePath) {
            if (!files.store) throw missingFile();
            return JSON.stringify(files.store);
        }
        return Buffer.from(files.statement, 'utf8');
    });
}

function savedStore(): TransactionStore {
    const calls = vi.mocked(fsp.writeFile).mock.calls;
    expect(calls).toHaveLength(1);
    expect(String(calls[0]?.[0])).toBe(WORKSPACE.storePath);
    return TransactionStoreSchema.parse(JSON.parse(String(calls[0]?.[1])));
}

beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('exit');
    });
    vi.mocked(paths.openWorkspace).mockReturnValue(WORKSPACE);
    vi.mocked(config.loadRules).mockReturnValue([]);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('import command', () => {
    it('should save imported rows and the batch to the store', async () => {
        serveFiles({ statement: STATEMENT, store: null });

        await importStatement('/tmp/vypis.csv', { user: 'ucetni' });

        const store = savedStore();
        expect(store.transactions.map((r) => r.external_id)).toEqual(['G-1', 'G-2']);
        expect(store.transactions.map((r) => r.direction)).toEqual(['income', 'expense']);
        expect(store.batches).toHaveLength(1);
        expect(store.batches[0]?.filename).toBe('vypis.csv');
        expect(store.batches[0]?.imported).toBe(2);
        expect(store.batches[0]?.created_by).toBe('ucetni');
    });

    it('should skip rows already in the store', async () => {
        serveFiles({
            statement: STATEMENT,
            store: { ...emptyStore(), transactions: [makeRow({ external_id: 'G-1' })] },
        });

        await importStatement('/tmp/vypis.csv', {});

        const store = savedStore();
        expect(store.transactions.map((r) => r.external_id)).toEqual(['G-1', 'G-2']);
        expect(store.batches[0]?.imported).toBe(1);
        expect(store.batches[0]?.skipped).toBe(1);
    });

    it('should not write anything on a dry run', async () => {
        serveFiles({ statement: STATEMENT, store: null });

        await importStatement('/tmp/vypis.csv', { dryRun: true });

        expect(fsp.writeFile).not.toHaveBeenCalled();
    });

    it('should not load rules with --no-rules', async () => {
        serveFiles({ statement: STATEMENT, store: null });

        await importStatement('/tmp/vypis.csv', { rules: false });

        expect(config.loadRules).not.toHaveBeenCalled();
    });

    it('should record a failed batch and exit on an unrecognized file', async () => {
        serveFiles({ statement: 'foo;bar\n1;2', store: null });

        await expect(importStatement('/tmp/neznamy.csv', {})).rejects.toThrow('exit');

        const store = savedStore();
        expect(store.transactions).toEqual([]);
        expect(store.batches[0]?.status).toBe('failed');
        expect(store.batches[0]?.failure).toBe(
            'Unrecognized CSV format. Supported formats: raiffeisen, creditas, generic'
        );
    });

    it('should exit when no workspace is found', async () => {
        vi.mocked(paths.openWorkspace).mockReturnValue(null);
        await expect(importStatement('/tmp/vypis.csv', {})).rejects.toThrow('exit');
        expect(fsp.readFile).not.toHaveBeenCalled();
    });
});

describe('apply-rules command', () => {
    const stored: TransactionStore = {
        ...emptyStore(),
        transactions: [
            makeRow({ external_id: 'G-2', amount: '-2300.00', merchant_name: 'ČEZ Prodej', direction: null, cost_type: '' }),
            makeRow({ external_id: 'G-4', amount: '-450.50', cost_type: '' }),
            makeRow({ external_id: 'G-5', merchant_name: 'ČEZ Prodej', cost_type: 'Jiné' }),
        ],
    };

    beforeEach(() => {
        vi.mocked(config.loadRules).mockReturnValue([
            CategoryRuleSchema.parse({
                name: 'Elektřina',
                match_type: 'merchant',
                match_value: 'čez prodej',
                assign: { cost_type: 'Energie' },
            }),
        ]);
        serveFiles({ statement: '', store: stored });
    });

    it('should categorize uncategorized rows and save', async () => {
        await applyRulesCommand({});

        const store = savedStore();
        expect(store.transactions.map((r) => r.cost_type)).toEqual(['Energie', '', 'Jiné']);
        expect(store.transactions[0]?.direction).toBe('expense');
        expect(console.log).toHaveBeenCalledWith('  Elektřina: 1');
    });

    it('should re-categorize every row with --all', async () => {
        await applyRulesCommand({ all: true });

        expect(savedStore().transactions.map((r) => r.cost_type)).toEqual(['Energie', '', 'Energie']);
    });

    it('should leave the store untouched on a dry run', async () => {
        await applyRulesCommand({ dryRun: true });

        expect(fsp.writeFile).not.toHaveBeenCalled();
    });
});

describe('apply-rules command with split assignments', () => {
    it('should keep rows whose split would break and report them', async () => {
        vi.mocked(config.loadRules).mockReturnValue([
            CategoryRuleSchema.parse({
                name: 'Škola',
                match_type: 'account',
                match_value: '2000145399/0800',
                assign: { split_sk: 100 },
            }),
        ]);
        serveFiles({
            statement: '',
            store: {
                ...emptyStore(),
                transactions: [
                    makeRow({ txn_date: '2026-03-02', counterparty_account: '2000145399/0800', split_mh: '100' }),
                ],
            },
        });

        await applyRulesCommand({ all: true });

        const store = savedStore();
        expect(store.transactions[0]?.split_mh).toBe('100');
        expect(store.transactions[0]?.split_sk).toBe('0');
        expect(console.warn).toHaveBeenCalledWith(
            '⚠️  Not updated: 2026-03-02 | -100.00 | rule "Škola": Tribe split must sum to 0 or 100, got 200'
        );
    });
});
