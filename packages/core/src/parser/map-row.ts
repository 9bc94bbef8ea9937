/**
 * Maps raw CSV cells to canonical bank fields for a detected profile.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures are thrown as RowError
 * and recorded by the orchestrator against the row number.
 */

import { DEFAULT_CURRENCY } from '../types/index.js';
import type { BankFields } from '../types/index.js';
import { RowError } from '../errors.js';
import { normalizeHeader } from '../utils/normalize.js';
import { parseAmount, parseCurrency, parseForeignAmount, formatAmount } from '../utils/czech-number.js';
import { parseDate, formatIsoDate } from '../utils/date-parse.js';
import type { BankProfile, ColumnMapping, DraftRow } from './types.js';

/**
 * Column mapping per header position; undefined for unmapped columns.
 */
export type ColumnPlan = readonly (ColumnMapping | undefined)[];

export interface MappedRow {
    fields: BankFields;
    naturalKey: string | null;
}

const REQUIRED_FIELDS = [
    { target: 'txn_date', label: 'date' },
    { target: 'amount', label: 'amount' },
] as const;

/**
 * Resolve each header cell to its column mapping.
 * Repeated header names are told apart by occurrence index.
 */
export function buildColumnPlan(profile: BankProfile, headers: readonly string[]): ColumnPlan {
    const seen = new Map<string, number>();

    return headers.map((header) => {
        const key = normalizeHeader(header);
        const occurrence = seen.get(key) ?? 0;
        seen.set(key, occurrence + 1);

        return profile.columns.find(
            (column) =>
                normalizeHeader(column.header) === key &&
                (column.occurrence ?? 0) === occurrence
        );
    });
}

function applyTransform(draft: DraftRow, column: ColumnMapping, value: string): void {
    switch (column.transform) {
        case 'text':
            draft[column.target] = value;
            return;
        case 'amount':
            draft[column.target] = formatAmount(parseAmount(value));
            return;
        case 'date':
            draft[column.target] = formatIsoDate(parseDate(value));
            return;
        case 'currency':
            draft[column.target] = parseCurrency(value);
            return;
        case 'foreign_amount': {
            const { amount, currency } = parseForeignAmount(value);
            draft[column.target] = formatAmount(amount);
            if (currency && !draft.original_currency) {
                draft.original_currency = currency;
            }
            return;
        }
    }
}

function toBankFields(draft: DraftRow): BankFields {
    const text = (value: string | undefined): string => value ?? '';
    const nullable = (value: string | undefined): string | null => value ?? null;

    for (const { target, label } of REQUIRED_FIELDS) {
        if (!draft[target]) {
            throw new RowError('MissingRequiredField', `Missing required field: ${label}`);
        }
    }

    return {
        txn_date: text(draft.txn_date),
        posting_date: nullable(draft.posting_date),
        amount: text(draft.amount),
        currency: draft.currency || DEFAULT_CURRENCY,
        account: text(draft.account),
        counterparty_account: text(draft.counterparty_account),
        counterparty_name: text(draft.counterparty_name),
        counterparty_bank_code: text(draft.counterparty_bank_code),
        merchant_name: text(draft.merchant_name),
        message: text(draft.message),
        note: text(draft.note),
        bank_category: text(draft.bank_category),
        transaction_type: text(draft.transaction_type),
        variable_symbol: text(draft.variable_symbol),
        constant_symbol: text(draft.constant_symbol),
        specific_symbol: text(draft.specific_symbol),
        original_amount: nullable(draft.original_amount),
        original_currency: text(draft.original_currency),
        fees: nullable(draft.fees),
        external_id: nullable(draft.external_id),
        city: text(draft.city),
        reference: text(draft.reference),
    };
}

/**
 * Map one data row.
 *
 * Empty cells count as absent. Cells beyond the header are ignored.
 *
 * @throws RowError MalformedNumber | MalformedDate | MissingRequiredField
 */
export function mapRow(profile: BankProfile, plan: ColumnPlan, cells: readonly string[]): MappedRow {
    let draft: DraftRow = {};

    const width = Math.min(plan.length, cells.length);
    for (let i = 0; i < width; i++) {
        const column = plan[i];
        const value = cells[i].trim();
        if (!column || value === '') continue;

        applyTransform(draft, column, value);
    }

    if (profile.finalize) {
        draft = profile.finalize(draft);
    }

    const fields = toBankFields(draft);
    return { fields, naturalKey: profile.naturalKey(fields) };
}
