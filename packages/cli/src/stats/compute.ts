import { Decimal } from 'decimal.js';
import { TRIBES } from '@kmen/shared';
import type { CanonicalRow, RowStatus, Tribe } from '@kmen/shared';
import { isUncategorized } from '@kmen/core';

export interface MonthSummary {
    month: string;
    count: number;
    income: string;
    expense: string;
    net: string;
}

export interface CostTypeSummary {
    costType: string;
    count: number;
    total: string;
}

export interface TransactionStats {
    total: number;
    byStatus: Record<RowStatus, number>;
    income: string;
    expense: string;
    net: string;
    categorized: number;
    uncategorized: number;
    /** Amount weighted by each tribe's split percentage */
    byTribe: Record<Tribe, string>;
    /** Most recent month first */
    byMonth: MonthSummary[];
    /** Most frequent first */
    byCostType: CostTypeSummary[];
}

export interface DateRange {
    from?: string;
    to?: string;
}

/**
 * Rows whose transaction date falls within the inclusive range.
 * ISO dates compare correctly as strings.
 */
export function filterByDate<Row extends Pick<CanonicalRow, 'txn_date'>>(rows: readonly Row[], range: DateRange): Row[] {
    return rows.filter(
        (row) => (!range.from || row.txn_date >= range.from) && (!range.to || row.txn_date <= range.to)
    );
}

const SPLIT_FIELD: Record<Tribe, 'split_mh' | 'split_sk' | 'split_xp' | 'split_fr'> = {
    MH: 'split_mh',
    SK: 'split_sk',
    XP: 'split_xp',
    FR: 'split_fr',
};

/**
 * Summary figures for a set of stored rows.
 * Income is the sum of positive amounts, expense the absolute sum of negative ones.
 */
export function computeStats(rows: readonly CanonicalRow[]): TransactionStats {
    const byStatus: Record<RowStatus, number> = { imported: 0, processed: 0, approved: 0, edited: 0, error: 0 };
    const tribeTotals = new Map<Tribe, Decimal>(TRIBES.map((t): [Tribe, Decimal] => [t, new Decimal(0)]));
    const months = new Map<string, { count: number; income: Decimal; expense: Decimal }>();
    const costTypes = new Map<string, { count: number; total: Decimal }>();

    let income = new Decimal(0);
    let expense = new Decimal(0);
    let uncategorized = 0;

    for (const row of rows) {
        const amount = new Decimal(row.amount);
        byStatus[row.status]++;

        if (amount.isPositive()) income = income.plus(amount);
        if (amount.isNegative()) expense = expense.plus(amount.abs());

        if (isUncategorized(row)) uncategorized++;

        for (const tribe of TRIBES) {
            const pct = new Decimal(row[SPLIT_FIELD[tribe]]);
            const current = tribeTotals.get(tribe) ?? new Decimal(0);
            tribeTotals.set(tribe, current.plus(amount.times(pct).dividedBy(100)));
        }

        const monthKey = row.txn_date.slice(0, 7);
        const month = months.get(monthKey) ?? { count: 0, income: new Decimal(0), expense: new Decimal(0) };
        month.count++;
        if (amount.isPositive()) month.income = month.income.plus(amount);
        if (amount.isNegative()) month.expense = month.expense.plus(amount.abs());
        months.set(monthKey, month);

        if (row.cost_type) {
            const entry = costTypes.get(row.cost_type) ?? { count: 0, total: new Decimal(0) };
            entry.count++;
            entry.total = entry.total.plus(amount);
            costTypes.set(row.cost_type, entry);
        }
    }

    const byTribe: Record<Tribe, string> = { MH: '0.00', SK: '0.00', XP: '0.00', FR: '0.00' };
    for (const [tribe, total] of tribeTotals) {
        byTribe[tribe] = total.toFixed(2);
    }

    return {
        total: rows.length,
        byStatus,
        income: income.toFixed(2),
        expense: expense.toFixed(2),
        net: income.minus(expense).toFixed(2),
        categorized: rows.length - uncategorized,
        uncategorized,
        byTribe,
        byMonth: [...months.entries()]
            .sort(([a], [b]) => b.localeCompare(a))
            .map(([month, m]) => ({
                month,
                count: m.count,
                income: m.income.toFixed(2),
                expense: m.expense.toFixed(2),
                net: m.income.minus(m.expense).toFixed(2),
            })),
        byCostType: [...costTypes.entries()]
            .sort(([, a], [, b]) => b.count - a.count)
            .map(([costType, c]) => ({ costType, count: c.count, total: c.total.toFixed(2) })),
    };
}
