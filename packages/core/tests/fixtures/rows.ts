import { CategoryRuleSchema } from '../../src/types/index.js';
import type { CanonicalRow, CategoryRule } from '../../src/types/index.js';

/**
 * Build a rule the way the rule file loader does, defaults included.
 */
export function makeRule(input: Record<string, unknown>): CategoryRule {
    return CategoryRuleSchema.parse(input);
}

export function makeRow(overrides: Partial<CanonicalRow> = {}): CanonicalRow {
    return {
        txn_date: '2026-03-01',
        posting_date: null,
        amount: '-100.00',
        currency: 'CZK',
        account: '1234/0800',
        counterparty_account: '',
        counterparty_name: '',
        counterparty_bank_code: '',
        merchant_name: '',
        message: '',
        note: '',
        bank_category: '',
        transaction_type: '',
        variable_symbol: '',
        constant_symbol: '',
        specific_symbol: '',
        original_amount: null,
        original_currency: '',
        fees: null,
        external_id: null,
        city: '',
        reference: '',
        direction: null,
        ownership: null,
        tax: false,
        cost_type: '',
        cost_detail: '',
        tribe: null,
        split_mh: '0',
        split_sk: '0',
        split_xp: '0',
        split_fr: '0',
        project_id: null,
        product_id: null,
        subgroup_id: null,
        status: 'imported',
        source_file: 'vypis.csv',
        import_batch_id: '0123456789abcdef',
        row_number: 1,
        ...overrides,
    };
}
