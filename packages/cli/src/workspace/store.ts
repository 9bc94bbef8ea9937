import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TransactionStoreSchema } from '@kmen/shared';
import type { CanonicalRow, ImportBatch, TransactionStore } from '@kmen/shared';
import type { Workspace } from '../types.js';

export function emptyStore(): TransactionStore {
    return { version: 1, transactions: [], batches: [] };
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Loads data/transactions.json; a missing file is an empty store.
 *
 * @throws ZodError when the file does not match the store schema
 */
export async function loadStore(workspace: Workspace): Promise<TransactionStore> {
    let content: string;
    try {
        content = await readFile(workspace.storePath, 'utf8');
    } catch (err) {
        if (isMissingFile(err)) {
            return emptyStore();
        }
        throw err;
    }

    const data: unknown = JSON.parse(content);
    return TransactionStoreSchema.parse(data);
}

export async function saveStore(workspace: Workspace, store: TransactionStore): Promise<void> {
    await mkdir(dirname(workspace.storePath), { recursive: true });
    await writeFile(workspace.storePath, `${JSON.stringify(store, null, 2)}\n`);
}

/**
 * Natural keys of stored rows, the dedup snapshot for the next import.
 */
export function storedKeys(store: TransactionStore): Set<string> {
    const keys = new Set<string>();
    for (const row of store.transactions) {
        if (row.external_id) keys.add(row.external_id);
    }
    return keys;
}

export interface AppendResult {
    store: TransactionStore;
    added: number;
    /** Rows whose key reached the store between snapshot and append */
    conflicts: number;
}

/**
 * Append an import's rows and its batch record.
 *
 * Keys are checked again against the current store; rows already present
 * are dropped and counted as conflicts.
 */
export function appendImport(store: TransactionStore, batch: ImportBatch, rows: readonly CanonicalRow[]): AppendResult {
    const keys = storedKeys(store);
    const accepted: CanonicalRow[] = [];

    for (const row of rows) {
        if (row.external_id && keys.has(row.external_id)) continue;
        if (row.external_id) keys.add(row.external_id);
        accepted.push(row);
    }

    return {
        store: {
            ...store,
            transactions: [...store.transactions, ...accepted],
            batches: [...store.batches, batch],
        },
        added: accepted.length,
        conflicts: rows.length - accepted.length,
    };
}
