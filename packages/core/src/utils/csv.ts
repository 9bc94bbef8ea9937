/**
 * CSV decoding and splitting utilities.
 */

import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { CSV_FORMAT } from '../types/index.js';
import { DecodeFailureError, FormatUnrecognizedError } from '../errors.js';

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

export interface DecodedStatement {
    text: string;
    encoding: string;
}

/**
 * Decode raw statement bytes.
 *
 * Tries strict UTF-8 first (BOM removed), then the Czech 8-bit code page.
 * Throws DecodeFailureError when neither decodes cleanly.
 *
 * The WHATWG windows-1250 table maps all 256 bytes (0x81, 0x83, 0x88, 0x90
 * and 0x98 become C1 controls), so the fallback accepts any input and the
 * error is only reached if the runtime lacks that decoder.
 */
export function decodeStatement(data: ArrayBuffer | Uint8Array): DecodedStatement {
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    const tried: string[] = [];

    for (const encoding of [CSV_FORMAT.PRIMARY_ENCODING, CSV_FORMAT.FALLBACK_ENCODING]) {
        tried.push(encoding);
        try {
            const decoder = new TextDecoder(encoding, { fatal: true });
            return { text: stripBom(decoder.decode(bytes)), encoding };
        } catch (e) {
            if (!(e instanceof TypeError) && !(e instanceof RangeError)) {
                throw e;
            }
        }
    }

    throw new DecodeFailureError(`Unable to decode CSV. Tried: ${tried.join(', ')}`);
}

function parseRecords(text: string, delimiter: string): unknown {
    return parse(text, {
        delimiter,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: false,
    });
}

/**
 * Split decoded CSV text into rows of cells.
 * Blank lines are kept as rows so callers can number rows consistently.
 *
 * A quote left open reads through to the end of the file, so the rest of
 * the text becomes one cell. Any other parse failure is a whole-file
 * FormatUnrecognizedError.
 */
export function splitCsv(text: string, delimiter: string = CSV_FORMAT.DELIMITER): string[][] {
    let records: unknown;
    try {
        try {
            records = parseRecords(text, delimiter);
        } catch (e) {
            if (!(e instanceof CsvError) || e.code !== 'CSV_QUOTE_NOT_CLOSED') throw e;
            records = parseRecords(`${text}"`, delimiter);
        }
    } catch (e) {
        if (e instanceof CsvError) {
            throw new FormatUnrecognizedError(`Malformed CSV: ${e.message}`);
        }
        throw e;
    }

    if (!Array.isArray(records)) {
        return [];
    }

    return records.map((record: unknown) =>
        Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? '')) : []
    );
}

/**
 * True when every cell of the row is empty or whitespace.
 */
export function isBlankRow(cells: readonly string[]): boolean {
    return cells.every((cell) => cell.trim() === '');
}
