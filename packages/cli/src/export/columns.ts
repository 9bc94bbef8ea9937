import type { CanonicalRow, Direction, Ownership, RowStatus } from '@kmen/shared';

/**
 * How a column is rendered:
 * - text: as stored
 * - date: DD.MM.YYYY
 * - amount / percent: decimal comma in CSV, number in Excel
 */
export type ColumnKind = 'text' | 'date' | 'amount' | 'percent';

export interface ExportColumn {
    header: string;
    kind: ColumnKind;
    value: (row: CanonicalRow) => string;
}

const STATUS_LABELS: Record<RowStatus, string> = {
    imported: 'Importováno',
    processed: 'Zpracováno',
    approved: 'Schváleno',
    edited: 'Upraveno',
    error: 'Chyba',
};

const DIRECTION_CODES: Record<Direction, string> = {
    income: 'P',
    expense: 'V',
};

const OWNERSHIP_CODES: Record<Ownership, string> = {
    own: 'V',
    foreign: 'N',
    none: '-',
};

/**
 * Column layout of the accounting spreadsheet.
 */
export const EXPORT_COLUMNS: readonly ExportColumn[] = [
    { header: 'Datum', kind: 'date', value: (r) => r.txn_date },
    { header: 'Účet', kind: 'text', value: (r) => r.account },
    { header: 'Typ', kind: 'text', value: (r) => r.bank_category },
    { header: 'Poznámka/Zpráva', kind: 'text', value: (r) => r.message },
    { header: 'VS', kind: 'text', value: (r) => r.variable_symbol },
    { header: 'Částka', kind: 'amount', value: (r) => r.amount },
    { header: 'Status', kind: 'text', value: (r) => STATUS_LABELS[r.status] },
    { header: 'P/V', kind: 'text', value: (r) => (r.direction ? DIRECTION_CODES[r.direction] : '') },
    { header: 'V/N', kind: 'text', value: (r) => (r.ownership ? OWNERSHIP_CODES[r.ownership] : '') },
    { header: 'Daně', kind: 'text', value: (r) => (r.tax ? 'Ano' : 'Ne') },
    { header: 'Druh', kind: 'text', value: (r) => r.cost_type },
    { header: 'Detail', kind: 'text', value: (r) => r.cost_detail },
    { header: 'KMEN', kind: 'text', value: (r) => r.tribe ?? '' },
    { header: 'MH%', kind: 'percent', value: (r) => r.split_mh },
    { header: 'ŠK%', kind: 'percent', value: (r) => r.split_sk },
    { header: 'XP%', kind: 'percent', value: (r) => r.split_xp },
    { header: 'FR%', kind: 'percent', value: (r) => r.split_fr },
    { header: 'Projekt', kind: 'text', value: (r) => r.project_id ?? '' },
    { header: 'Produkt', kind: 'text', value: (r) => r.product_id ?? '' },
    { header: 'Podskupina', kind: 'text', value: (r) => r.subgroup_id ?? '' },
    { header: 'Číslo protiúčtu', kind: 'text', value: (r) => r.counterparty_account },
    { header: 'Název protiúčtu', kind: 'text', value: (r) => r.counterparty_name },
    { header: 'Merchant', kind: 'text', value: (r) => r.merchant_name },
    { header: 'ID transakce', kind: 'text', value: (r) => r.external_id ?? '' },
];

/**
 * "2026-03-05" -> "05.03.2026"
 */
export function formatCzechDate(isoDate: string): string {
    const [year, month, day] = isoDate.split('-');
    return `${day}.${month}.${year}`;
}

/**
 * "-1234.50" -> "-1234,50"
 */
export function formatCzechDecimal(value: string): string {
    return value.replace('.', ',');
}
