import { describe, it, expect } from 'vitest';
import { validateTribeSplit, validateRow } from '../../src/validation/validate.js';
import { makeRow } from '../fixtures/rows.js';

describe('validateTribeSplit', () => {
    it('accepts an unassigned split', () => {
        expect(validateTribeSplit({ split_mh: '0', split_sk: '0', split_xp: '0', split_fr: '0' }).valid).toBe(true);
    });

    it('accepts a split summing to 100', () => {
        expect(validateTribeSplit({ split_mh: '50', split_sk: '50', split_xp: '0', split_fr: '0' }).valid).toBe(true);
        expect(
            validateTribeSplit({ split_mh: '33.33', split_sk: '33.33', split_xp: '33.34', split_fr: '0' }).valid
        ).toBe(true);
    });

    it('rejects any other sum', () => {
        const result = validateTribeSplit({ split_mh: '60', split_sk: '50', split_xp: '0', split_fr: '0' });
        expect(result).toEqual({ valid: false, errors: ['Tribe split must sum to 0 or 100, got 110'] });
    });

    it('rejects a share out of range', () => {
        const result = validateTribeSplit({ split_mh: '101', split_sk: '0', split_xp: '0', split_fr: '0' });
        expect(result.errors).toEqual(['split_mh must be between 0 and 100, got 101']);
    });

    it('rejects a non-numeric share', () => {
        const result = validateTribeSplit({ split_mh: 'abc', split_sk: '0', split_xp: '0', split_fr: '0' });
        expect(result.errors).toEqual(['split_mh is not a number: "abc"']);
    });
});

describe('validateRow', () => {
    it('accepts a consistent row', () => {
        expect(validateRow(makeRow({ amount: '-10.00', direction: 'expense' }))).toEqual({ valid: true, errors: [] });
    });

    it('flags a direction that disagrees with the amount', () => {
        const result = validateRow(makeRow({ amount: '-10.00', direction: 'income' }));
        expect(result.errors).toEqual(['Direction "income" disagrees with amount -10.00']);
    });

    it('accepts any direction on a zero amount', () => {
        expect(validateRow(makeRow({ amount: '0.00', direction: 'income' })).valid).toBe(true);
    });
});
