import { describe, it, expect } from 'vitest';
import { decodeStatement, splitCsv, stripBom, isBlankRow } from '../../src/utils/csv.js';

describe('csv utilities', () => {
    describe('decodeStatement', () => {
        it('should decode UTF-8 and drop the BOM', () => {
            const bytes = new TextEncoder().encode('\uFEFFDatum;Částka');
            const decoded = decodeStatement(bytes);
            expect(decoded.text).toBe('Datum;Částka');
            expect(decoded.encoding).toBe('utf-8');
        });

        it('should accept an ArrayBuffer', () => {
            const bytes = new TextEncoder().encode('VS;KS');
            const buffer = bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength);
            expect(decodeStatement(buffer).text).toBe('VS;KS');
        });

        it('should fall back to windows-1250', () => {
            // "Částka" in windows-1250: Č = 0xC8, á = 0xE1
            const bytes = new Uint8Array([0xc8, 0xe1, 0x73, 0x74, 0x6b, 0x61]);
            const decoded = decodeStatement(bytes);
            expect(decoded.text).toBe('Částka');
            expect(decoded.encoding).toBe('windows-1250');
        });

        it('should map code-page gaps to control characters', () => {
            const decoded = decodeStatement(new Uint8Array([0x41, 0x81, 0x42]));
            expect(decoded.encoding).toBe('windows-1250');
            expect(decoded.text).toBe('A\u0081B');
        });
    });

    describe('splitCsv', () => {
        it('should split on semicolons', () => {
            expect(splitCsv('Datum;Částka\n01.03.2026;-100,00')).toEqual([
                ['Datum', 'Částka'],
                ['01.03.2026', '-100,00'],
            ]);
        });

        it('should keep quoted delimiters', () => {
            expect(splitCsv('"a;b";c')).toEqual([['a;b', 'c']]);
        });

        it('should allow rows of different width', () => {
            expect(splitCsv('a;b;c\nd')).toEqual([['a', 'b', 'c'], ['d']]);
        });

        it('should read an unclosed quote through to the end of the text', () => {
            expect(splitCsv('02.03.2026;20,00;"Faktura ABC')).toEqual([['02.03.2026', '20,00', 'Faktura ABC']]);
            expect(splitCsv('a;"b\nc;d')).toEqual([['a', 'b\nc;d']]);
        });
    });

    describe('stripBom', () => {
        it('should remove a leading BOM only', () => {
            expect(stripBom('\uFEFFabc')).toBe('abc');
            expect(stripBom('abc')).toBe('abc');
        });
    });

    describe('isBlankRow', () => {
        it('should detect whitespace-only rows', () => {
            expect(isBlankRow(['', ' ', '\t'])).toBe(true);
            expect(isBlankRow(['', 'x'])).toBe(false);
        });
    });
});
