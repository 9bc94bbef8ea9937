import { describe, it, expect } from 'vitest';
import { applyRules, isUncategorized } from '../../src/categorizer/apply.js';
import { makeRow, makeRule } from '../fixtures/rows.js';

const rules = [
    makeRule({
        name: 'Elektřina',
        match_type: 'merchant',
        match_value: 'ČEZ Prodej',
        assign: { cost_type: 'Energie', tribe: 'MH', split_mh: 100 },
    }),
];

describe('applyRules', () => {
    it('updates matching rows and counts per rule', () => {
        const rows = [
            makeRow({ row_number: 1, merchant_name: 'ČEZ Prodej' }),
            makeRow({ row_number: 2, merchant_name: 'ČEZ Prodej' }),
        ];
        const result = applyRules(rows, rules);

        expect(result.changed).toBe(2);
        expect(result.matchedRules).toEqual({ Elektřina: 2 });
        expect(result.rows[0].cost_type).toBe('Energie');
        expect(result.rows[0].tribe).toBe('MH');
        expect(result.rows[0].split_mh).toBe('100');
        expect(result.rows[0].direction).toBe('expense');
    });

    it('does not mutate input rows', () => {
        const row = makeRow({ merchant_name: 'ČEZ Prodej' });
        applyRules([row], rules);
        expect(row.cost_type).toBe('');
    });

    it('never touches bank fields', () => {
        const row = makeRow({ merchant_name: 'ČEZ Prodej', amount: '-2300.00', message: 'Záloha' });
        const [updated] = applyRules([row], rules).rows;

        expect(updated.amount).toBe('-2300.00');
        expect(updated.message).toBe('Záloha');
        expect(updated.merchant_name).toBe('ČEZ Prodej');
        expect(updated.status).toBe('imported');
    });

    it('does not count rows that end up identical', () => {
        const row = makeRow({
            merchant_name: 'ČEZ Prodej',
            direction: 'expense',
            cost_type: 'Energie',
            tribe: 'MH',
            split_mh: '100',
        });
        const result = applyRules([row], rules);

        expect(result.changed).toBe(0);
        expect(result.matchedRules).toEqual({});
        expect(result.rows[0]).toBe(row);
    });

    it('counts a derived direction as a change without a rule', () => {
        const result = applyRules([makeRow({ amount: '500.00' })], rules);

        expect(result.changed).toBe(1);
        expect(result.rows[0].direction).toBe('income');
        expect(result.matchedRules).toEqual({});
    });

    it('skips categorized rows with onlyUncategorized', () => {
        const done = makeRow({ merchant_name: 'ČEZ Prodej', direction: 'expense', cost_type: 'Jiné' });
        const open = makeRow({ merchant_name: 'ČEZ Prodej', direction: 'expense' });
        const result = applyRules([done, open], rules, { onlyUncategorized: true });

        expect(result.changed).toBe(1);
        expect(result.rows[0].cost_type).toBe('Jiné');
        expect(result.rows[1].cost_type).toBe('Energie');
    });

    it('re-assigns categorized rows without onlyUncategorized', () => {
        const done = makeRow({ merchant_name: 'ČEZ Prodej', direction: 'expense', cost_type: 'Jiné' });
        expect(applyRules([done], rules).rows[0].cost_type).toBe('Energie');
    });

    it('aggregates warnings once', () => {
        const broken = [makeRule({ name: 'Broken', match_type: 'keyword', match_mode: 'regex', match_value: '(' })];
        const result = applyRules([makeRow({ message: 'a' }), makeRow({ message: 'b' })], broken);

        expect(result.warnings).toHaveLength(1);
    });

    it('keeps a row whose split would no longer sum to 0 or 100', () => {
        const school = [
            makeRule({ name: 'Škola', match_type: 'account', match_value: '2000145399/0800', assign: { split_sk: 100 } }),
        ];
        const row = makeRow({ counterparty_account: '2000145399/0800', direction: 'expense', split_mh: '100' });

        const result = applyRules([row], school, { onlyUncategorized: false });

        expect(result.rows[0]).toBe(row);
        expect(result.changed).toBe(0);
        expect(result.matchedRules).toEqual({});
        expect(result.rejected).toEqual([
            { index: 0, rule: 'Škola', errors: ['Tribe split must sum to 0 or 100, got 200'] },
        ]);
    });

    it('applies a split that replaces the whole assignment', () => {
        const school = [
            makeRule({
                name: 'Škola',
                match_type: 'account',
                match_value: '2000145399/0800',
                assign: { split_mh: 0, split_sk: 100 },
            }),
        ];
        const row = makeRow({ counterparty_account: '2000145399/0800', direction: 'expense', split_mh: '100' });

        const result = applyRules([row], school);

        expect(result.changed).toBe(1);
        expect(result.rejected).toEqual([]);
        expect(result.rows[0].split_mh).toBe('0');
        expect(result.rows[0].split_sk).toBe('100');
    });
});

describe('isUncategorized', () => {
    it('needs both direction and cost type', () => {
        expect(isUncategorized({ direction: null, cost_type: 'Energie' })).toBe(true);
        expect(isUncategorized({ direction: 'expense', cost_type: '' })).toBe(true);
        expect(isUncategorized({ direction: 'expense', cost_type: 'Energie' })).toBe(false);
    });
});
