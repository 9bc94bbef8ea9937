import { describe, it, expect } from 'vitest';
import { matchesRule, compileRuleRegex } from '../../src/categorizer/match.js';
import { makeRule } from '../fixtures/rows.js';

describe('matchesRule', () => {
    describe('exact matching', () => {
        it('matches case-insensitively by default', () => {
            const rule = makeRule({ name: 'ČEZ', match_type: 'merchant', match_value: 'čez prodej' });
            expect(matchesRule('ČEZ Prodej', rule).matched).toBe(true);
        });

        it('requires the whole text', () => {
            const rule = makeRule({ name: 'ČEZ', match_type: 'merchant', match_value: 'ČEZ' });
            expect(matchesRule('ČEZ Prodej', rule).matched).toBe(false);
        });

        it('respects case_sensitive', () => {
            const rule = makeRule({ name: 'ČEZ', match_type: 'merchant', match_value: 'čez prodej', case_sensitive: true });
            expect(matchesRule('ČEZ Prodej', rule).matched).toBe(false);
        });
    });

    describe('substring matching', () => {
        it('matches anywhere in the text', () => {
            const rule = makeRule({ name: 'Nájem', match_type: 'keyword', match_mode: 'substring', match_value: 'NÁJEM' });
            expect(matchesRule('Platba nájem srpen', rule).matched).toBe(true);
        });

        it('does not match when absent', () => {
            const rule = makeRule({ name: 'Nájem', match_type: 'keyword', match_mode: 'substring', match_value: 'nájem' });
            expect(matchesRule('Elektřina', rule).matched).toBe(false);
        });
    });

    describe('regex matching', () => {
        it('searches unanchored and case-insensitively', () => {
            const rule = makeRule({ name: 'Faktura', match_type: 'keyword', match_mode: 'regex', match_value: 'faktura\\s+\\d+' });
            expect(matchesRule('Úhrada FAKTURA 2026014 dodavatel', rule).matched).toBe(true);
            expect(matchesRule('Úhrada zálohy', rule).matched).toBe(false);
        });

        it('respects case_sensitive', () => {
            const rule = makeRule({
                name: 'Faktura',
                match_type: 'keyword',
                match_mode: 'regex',
                match_value: 'Faktura',
                case_sensitive: true,
            });
            expect(matchesRule('faktura 1', rule).matched).toBe(false);
            expect(matchesRule('Faktura 1', rule).matched).toBe(true);
        });

        it('returns a warning for an invalid pattern without throwing', () => {
            const rule = makeRule({ name: 'Broken', match_type: 'keyword', match_mode: 'regex', match_value: '[unclosed' });
            const result = matchesRule('anything', rule);

            expect(result.matched).toBe(false);
            expect(result.warning).toContain('Invalid regex pattern in rule "Broken"');
        });

        it('runs backtracking-prone patterns in linear time', () => {
            const keyword = (match_value: string) =>
                makeRule({ name: 'Slow', match_type: 'keyword', match_mode: 'regex', match_value });

            expect(matchesRule('a'.repeat(1999), keyword('(a|a)*b'))).toEqual({ matched: false });
            expect(matchesRule(`${'a'.repeat(1999)}!`, keyword('(\\w|\\d)+$'))).toEqual({ matched: false });
            expect(matchesRule('a'.repeat(1999), keyword('(a+)+$b'))).toEqual({ matched: false });
            expect(matchesRule('a'.repeat(25), keyword('(a?){25}a{25}'))).toEqual({ matched: true });
        });

        it('warns on back-references, which do not compile', () => {
            const rule = makeRule({ name: 'Ref', match_type: 'keyword', match_mode: 'regex', match_value: '(a)\\1' });
            const result = matchesRule('aa', rule);

            expect(result.matched).toBe(false);
            expect(result.warning).toContain('Invalid regex pattern in rule "Ref"');
        });

        it('only searches the first 2000 characters', () => {
            const rule = makeRule({ name: 'Tail', match_type: 'keyword', match_mode: 'regex', match_value: 'KONEC' });
            expect(matchesRule(`${'x'.repeat(2000)}KONEC`, rule).matched).toBe(false);
            expect(matchesRule(`${'x'.repeat(1995)}KONEC`, rule).matched).toBe(true);
        });
    });
});

describe('compileRuleRegex', () => {
    it('compiles case-insensitively by default', () => {
        const rule = makeRule({ name: 'R', match_type: 'keyword', match_mode: 'regex', match_value: 'abc' });
        const compiled = compileRuleRegex(rule);
        expect('regex' in compiled && compiled.regex.matcher('xABCx').find()).toBe(true);
    });

    it('rejects patterns over 500 characters', () => {
        const rule = (length: number) =>
            makeRule({ name: 'Long', match_type: 'keyword', match_mode: 'regex', match_value: 'a'.repeat(length) });

        expect('regex' in compileRuleRegex(rule(500))).toBe(true);
        expect(compileRuleRegex(rule(501))).toEqual({
            error: 'Unsafe regex pattern in rule "Long": pattern longer than 500 characters',
        });
    });
});
