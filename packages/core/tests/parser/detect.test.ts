import { describe, it, expect } from 'vitest';
import { detectFormat, matchHeaderRow } from '../../src/parser/detect.js';
import { splitCsv } from '../../src/utils/csv.js';
import { CREDITAS_CSV, GENERIC_HEADER, RAIFFEISEN_HEADER } from '../fixtures/statements.js';

describe('detectFormat', () => {
    it('detects the generic layout', () => {
        const result = detectFormat(GENERIC_HEADER.split(';'));

        expect(result?.profile.id).toBe('generic');
        expect(result?.headerRowIndex).toBe(0);
    });

    it('detects Raiffeisen', () => {
        expect(detectFormat(RAIFFEISEN_HEADER.split(';'))?.profile.id).toBe('raiffeisen');
    });

    it('prefers Raiffeisen when generic tokens are present too', () => {
        const header = ['Datum', 'Částka', 'Datum provedení', 'Zaúčtovaná částka'];
        expect(detectFormat(header)?.profile.id).toBe('raiffeisen');
    });

    it('matches header tokens case-insensitively', () => {
        expect(detectFormat(['DATUM', ' částka ', 'Něco'])?.profile.id).toBe('generic');
    });

    it('ignores a BOM on the first header cell', () => {
        expect(detectFormat(['\uFEFFDatum', 'Částka'])?.profile.id).toBe('generic');
    });

    it('finds the Creditas header after the metadata block', () => {
        const [first, ...rest] = splitCsv(CREDITAS_CSV);
        const result = detectFormat(first, rest);

        expect(result?.profile.id).toBe('creditas');
        expect(rest[(result?.headerRowIndex ?? 0) - 1]).toContain('Platba/Vklad');
    });

    it('skips blank rows after the metadata block', () => {
        const result = detectFormat(
            ['Typ účtu', 'IBAN', 'BIC'],
            [['Běžný účet', 'CZ00', 'CTASCZ22'], [''], ['Protiúčet', 'Platba/Vklad', 'Částka']]
        );

        expect(result?.profile.id).toBe('creditas');
        // metadata values, blank line, then header
        expect(result?.headerRowIndex).toBe(3);
    });

    it('returns null for an unknown header', () => {
        expect(detectFormat(['Date', 'Amount', 'Description'])).toBeNull();
    });

    it('does not scan past the first row without a prelude', () => {
        expect(detectFormat(['Výpis z účtu'], [['Datum', 'Částka']])).toBeNull();
    });

    it('gives up when the header is beyond the scan limit', () => {
        const prelude = ['Typ účtu', 'IBAN', 'BIC'];
        const filler = Array.from({ length: 10 }, (_, i) => [`info ${i}`]);
        expect(detectFormat(prelude, [...filler, ['Protiúčet', 'Platba/Vklad', 'Částka']])).toBeNull();
        expect(detectFormat(prelude, [...filler.slice(1), ['Protiúčet', 'Platba/Vklad', 'Částka']])?.headerRowIndex).toBe(10);
    });
});

describe('matchHeaderRow', () => {
    it('returns null for an empty row', () => {
        expect(matchHeaderRow([])).toBeNull();
    });
});
