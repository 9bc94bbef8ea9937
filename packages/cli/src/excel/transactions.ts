import exceljs from 'exceljs';
import type { Column, Workbook, Worksheet } from 'exceljs';
import type { CanonicalRow } from '@kmen/shared';
import { EXPORT_COLUMNS, formatCzechDate } from '../export/columns.js';
import type { ColumnKind } from '../export/columns.js';

const NUMBER_FORMATS: Record<ColumnKind, string | undefined> = {
    text: undefined,
    date: undefined,
    amount: '#,##0.00;[Red]-#,##0.00',
    percent: '0.00',
};

const MIN_WIDTH = 8;
const MAX_WIDTH = 60;

function cellValue(kind: ColumnKind, value: string): string | number {
    switch (kind) {
        case 'date':
            return formatCzechDate(value);
        case 'amount':
        case 'percent':
            return parseFloat(value);
        case 'text':
            return value;
    }
}

function styleHeader(sheet: Worksheet): void {
    const header = sheet.getRow(1);
    header.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    header.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };
    header.alignment = { vertical: 'middle', horizontal: 'center' };
    sheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Generates the transactions workbook (sheet "Transakce").
 *
 * Column order, headers and formats come from EXPORT_COLUMNS. Amounts and
 * split percentages are written as numbers; dates as DD.MM.YYYY text.
 */
export function generateTransactionsExcel(rows: readonly CanonicalRow[]): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'KMEN Import';
    workbook.created = new Date();

    const sheet = workbook.addWorksheet('Transakce');
    sheet.columns = EXPORT_COLUMNS.map((column, i): Partial<Column> => {
        const numFmt = NUMBER_FORMATS[column.kind];
        return {
            header: column.header,
            key: `c${i}`,
            style: numFmt ? { numFmt, alignment: { horizontal: 'right' } } : {},
        };
    });

    const widths = EXPORT_COLUMNS.map((column) => column.header.length);
    for (const row of rows) {
        sheet.addRow(
            EXPORT_COLUMNS.map((column, i) => {
                const raw = column.value(row);
                widths[i] = Math.max(widths[i], raw.length);
                return cellValue(column.kind, raw);
            })
        );
    }
    widths.forEach((width, i) => {
        sheet.getColumn(i + 1).width = Math.min(Math.max(width + 2, MIN_WIDTH), MAX_WIDTH);
    });

    styleHeader(sheet);
    return workbook;
}
