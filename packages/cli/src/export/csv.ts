import type { CanonicalRow } from '@kmen/shared';
import { CSV_FORMAT } from '@kmen/shared';
import { EXPORT_COLUMNS, formatCzechDate, formatCzechDecimal } from './columns.js';
import type { ExportColumn } from './columns.js';

function renderCell(column: ExportColumn, row: CanonicalRow): string {
    const value = column.value(row);
    switch (column.kind) {
        case 'date':
            return formatCzechDate(value);
        case 'amount':
        case 'percent':
            return formatCzechDecimal(value);
        case 'text':
            return value;
    }
}

/**
 * Quote a cell when it contains the delimiter, a quote or a line break;
 * internal quotes are doubled.
 */
export function escapeCsvCell(value: string, delimiter: string = CSV_FORMAT.DELIMITER): string {
    if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * Semicolon-separated export, header row first, CRLF line endings.
 * Prefixed with a BOM so spreadsheet software picks UTF-8.
 */
export function convertToCsv(rows: readonly CanonicalRow[]): string {
    const lines = [EXPORT_COLUMNS.map((c) => escapeCsvCell(c.header))];

    for (const row of rows) {
        lines.push(EXPORT_COLUMNS.map((c) => escapeCsvCell(renderCell(c, row))));
    }

    return `\uFEFF${lines.map((cells) => cells.join(CSV_FORMAT.DELIMITER)).join('\r\n')}\r\n`;
}
