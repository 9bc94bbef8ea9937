/**
 * Generic Czech bank export (the app's own column naming).
 *
 * Several columns have short and long aliases (VS / Variabilní symbol).
 * "Id transakce" is the natural key when present and non-empty.
 */

import type { BankProfile } from './types.js';

export const GENERIC_PROFILE: BankProfile = {
    id: 'generic',
    label: 'Generic',
    headerTokens: ['Datum', 'Částka'],
    columns: [
        { header: 'Datum', target: 'txn_date', transform: 'date' },
        { header: 'Účet', target: 'account', transform: 'text' },
        { header: 'Typ', target: 'bank_category', transform: 'text' },
        { header: 'Poznámka/Zpráva', target: 'message', transform: 'text' },
        { header: 'VS', target: 'variable_symbol', transform: 'text' },
        { header: 'Variabilní symbol', target: 'variable_symbol', transform: 'text' },
        { header: 'Částka', target: 'amount', transform: 'amount' },
        { header: 'Datum zaúčtování', target: 'posting_date', transform: 'date' },
        { header: 'Číslo protiúčtu', target: 'counterparty_account', transform: 'text' },
        { header: 'Název protiúčtu', target: 'counterparty_name', transform: 'text' },
        { header: 'Typ transakce', target: 'transaction_type', transform: 'text' },
        { header: 'KS', target: 'constant_symbol', transform: 'text' },
        { header: 'Konstantní symbol', target: 'constant_symbol', transform: 'text' },
        { header: 'SS', target: 'specific_symbol', transform: 'text' },
        { header: 'Specifický symbol', target: 'specific_symbol', transform: 'text' },
        { header: 'Původní částka', target: 'original_amount', transform: 'foreign_amount' },
        { header: 'Původní měna', target: 'original_currency', transform: 'currency' },
        { header: 'Poplatky', target: 'fees', transform: 'amount' },
        { header: 'Id transakce', target: 'external_id', transform: 'text' },
        { header: 'Vlastní poznámka', target: 'note', transform: 'text' },
        { header: 'Název merchanta', target: 'merchant_name', transform: 'text' },
        { header: 'Město', target: 'city', transform: 'text' },
        { header: 'Měna', target: 'currency', transform: 'currency' },
        { header: 'Banka protiúčtu', target: 'counterparty_bank_code', transform: 'text' },
        { header: 'Reference', target: 'reference', transform: 'text' },
    ],
    naturalKey: (fields) => fields.external_id,
};
