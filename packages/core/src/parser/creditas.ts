/**
 * Banka Creditas statement export.
 *
 * Format:
 * - Rows 0-2 are an account metadata block (Typ účtu, IBAN, BIC, ...),
 *   the transaction header follows on the next non-empty row
 * - Account numbers and bank codes sit in separate columns, joined as "number/bank"
 * - "Datum provedení" is usually empty; "Datum zaúčtování" is the fallback
 * - No bank transaction id: rows take no part in duplicate suppression.
 *   Re-importing the same file imports every row again (known gap).
 */

import type { BankProfile, DraftRow } from './types.js';

function joinAccount(number: string | undefined, bankCode: string | undefined): string | undefined {
    if (number && bankCode) return `${number}/${bankCode}`;
    return number;
}

function finalizeCreditas(draft: DraftRow): DraftRow {
    const { account_bank_code, ...rest } = draft;
    const result: DraftRow = { ...rest };

    const account = joinAccount(rest.account, account_bank_code);
    if (account) result.account = account;

    const counterparty = joinAccount(rest.counterparty_account, rest.counterparty_bank_code);
    if (counterparty) result.counterparty_account = counterparty;

    if (!result.txn_date && result.posting_date) {
        result.txn_date = result.posting_date;
    }

    return result;
}

export const CREDITAS_PROFILE: BankProfile = {
    id: 'creditas',
    label: 'Banka Creditas',
    headerTokens: ['Protiúčet', 'Platba/Vklad', 'Částka'],
    preludeMarker: ['Typ účtu', 'IBAN', 'BIC'],
    columns: [
        { header: 'Můj účet', target: 'account', transform: 'text' },
        { header: 'Můj účet-banka', target: 'account_bank_code', transform: 'text' },
        { header: 'Datum zaúčtování', target: 'posting_date', transform: 'date' },
        { header: 'Datum provedení', target: 'txn_date', transform: 'date' },
        { header: 'Protiúčet', target: 'counterparty_account', transform: 'text' },
        { header: 'Protiúčet-banka', target: 'counterparty_bank_code', transform: 'text' },
        { header: 'Název protiúčtu', target: 'counterparty_name', transform: 'text' },
        { header: 'Kód transakce', target: 'bank_category', transform: 'text' },
        { header: 'VS', target: 'variable_symbol', transform: 'text' },
        { header: 'SS', target: 'specific_symbol', transform: 'text' },
        { header: 'KS', target: 'constant_symbol', transform: 'text' },
        { header: 'E2E', target: 'reference', transform: 'text' },
        { header: 'Zpráva pro protistranu', target: 'message', transform: 'text' },
        { header: 'Poznámka', target: 'note', transform: 'text' },
        { header: 'Částka', target: 'amount', transform: 'amount' },
        { header: 'Měna', target: 'currency', transform: 'currency' },
    ],
    finalize: finalizeCreditas,
    naturalKey: () => null,
};
