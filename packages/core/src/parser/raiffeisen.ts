/**
 * Raiffeisenbank (CZ) statement export.
 *
 * Format:
 * - Semicolon CSV, header on the first line
 * - "Datum provedení" carries a time ("16.08.2025 05:42"), discarded
 * - "Původní částka a měna" appears twice: amount first, currency second
 * - "Vlastní poznámka" fills the note only when "Poznámka" is empty
 * - Bank-supplied "Id transakce" is the natural key
 */

import type { BankProfile, DraftRow } from './types.js';

function finalizeRaiffeisen(draft: DraftRow): DraftRow {
    const { own_note, ...rest } = draft;
    if (own_note && !rest.note) {
        return { ...rest, note: own_note };
    }
    return rest;
}

export const RAIFFEISEN_PROFILE: BankProfile = {
    id: 'raiffeisen',
    label: 'Raiffeisenbank',
    headerTokens: ['Datum provedení', 'Zaúčtovaná částka'],
    columns: [
        { header: 'Datum provedení', target: 'txn_date', transform: 'date' },
        { header: 'Datum zaúčtování', target: 'posting_date', transform: 'date' },
        { header: 'Číslo účtu', target: 'account', transform: 'text' },
        { header: 'Kategorie transakce', target: 'bank_category', transform: 'text' },
        { header: 'Číslo protiúčtu', target: 'counterparty_account', transform: 'text' },
        { header: 'Název protiúčtu', target: 'counterparty_name', transform: 'text' },
        { header: 'Typ transakce', target: 'transaction_type', transform: 'text' },
        { header: 'Zpráva', target: 'message', transform: 'text' },
        { header: 'Poznámka', target: 'note', transform: 'text' },
        { header: 'VS', target: 'variable_symbol', transform: 'text' },
        { header: 'KS', target: 'constant_symbol', transform: 'text' },
        { header: 'SS', target: 'specific_symbol', transform: 'text' },
        { header: 'Zaúčtovaná částka', target: 'amount', transform: 'amount' },
        { header: 'Měna účtu', target: 'currency', transform: 'currency' },
        { header: 'Původní částka a měna', target: 'original_amount', transform: 'foreign_amount', occurrence: 0 },
        { header: 'Původní částka a měna', target: 'original_currency', transform: 'currency', occurrence: 1 },
        { header: 'Poplatek', target: 'fees', transform: 'amount' },
        { header: 'Id transakce', target: 'external_id', transform: 'text' },
        { header: 'Vlastní poznámka', target: 'own_note', transform: 'text' },
        { header: 'Název obchodníka', target: 'merchant_name', transform: 'text' },
        { header: 'Město', target: 'city', transform: 'text' },
    ],
    finalize: finalizeRaiffeisen,
    naturalKey: (fields) => fields.external_id,
};
