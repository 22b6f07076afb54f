import {
  CategoryTotals,
  PeriodCategoryTotals,
  PeriodTotals,
  Totals,
  activeCategories,
  aggregateByCategory,
  aggregateByPeriod,
  aggregateByPeriodAndCategory,
  aggregateTotal,
  dateBounds
} from "./aggregate.js";
import { Elapsed, Frequency, diffDays, elapsed, periodDuration } from "./calendar.js";
import { Transaction } from "./schema.js";

export type SummarizeOptions = {
  /** Period frequency for the period views. Absent means one period over the whole range. */
  freq?: Frequency;
  /** Inclusive lower bound (YYYY-MM-DD). Defaults to the earliest transaction. */
  startDate?: string;
  /** Inclusive upper bound (YYYY-MM-DD). Defaults to the latest transaction. */
  endDate?: string;
  /** Round every numeric field to this many decimals (integer in 0..15) once everything is computed. */
  decimals?: number;
  /** Spending budget of `amount` per `freq`, scaled to each period as `periodBudget`. */
  budget?: Budget;
};

export type Budget = {
  amount: number;
  freq: Frequency;
};

export const MAX_DECIMALS = 15;

export type AverageBalance = {
  dailyAvgBalance: number;
  weeklyAvgBalance: number;
  monthlyAvgBalance: number;
  yearlyAvgBalance: number;
};

export type OverallSummary = Totals & AverageBalance & { savingsPc: number; periodBudget?: number };

export type PeriodSummaryRow = PeriodTotals & {
  savingsPc: number;
  cumulativeIncome: number;
  cumulativeBalance: number;
  cumulativeSavingsPc: number;
  /** Present only when a budget was given. */
  periodBudget?: number;
};

export type CategorySummaryRow = CategoryTotals &
  AverageBalance & {
    incomeToTotalIncomePc: number;
    expenseToTotalIncomePc: number;
    expenseToTotalExpensePc: number;
  };

export type PeriodCategorySummaryRow = PeriodCategoryTotals & {
  incomeToPeriodIncomePc: number;
  expenseToPeriodIncomePc: number;
  expenseToPeriodExpensePc: number;
};

/**
 * Output of {@link summarize}. Percentages are in [0, 100] scale; any ratio whose
 * denominator is zero is `NaN` (JSON output turns it into `null`).
 */
export type SummaryBundle = {
  byNone: OverallSummary;
  byPeriod: PeriodSummaryRow[];
  byCategory: CategorySummaryRow[];
  byPeriodAndCategory: PeriodCategorySummaryRow[];
};

/** `100 * num / den`, or NaN when `den` is zero. */
export function pct(num: number, den: number): number {
  return den === 0 ? NaN : (100 * num) / den;
}

function per(num: number, den: number): number {
  return den === 0 || Number.isNaN(den) ? NaN : num / den;
}

function averages(balance: number, span: Elapsed | null): AverageBalance {
  return {
    dailyAvgBalance: per(balance, span?.days ?? NaN),
    weeklyAvgBalance: per(balance, span?.weeks ?? NaN),
    monthlyAvgBalance: per(balance, span?.months ?? NaN),
    yearlyAvgBalance: per(balance, span?.years ?? NaN)
  };
}

/** Keep transactions dated inside `[startDate, endDate]`; either bound may be absent. */
export function filterByDate(transactions: readonly Transaction[], startDate?: string, endDate?: string): Transaction[] {
  return transactions.filter(
    (t) => (startDate === undefined || t.date >= startDate) && (endDate === undefined || t.date <= endDate)
  );
}

/**
 * Summarize a ledger at four granularities: overall, per period, per category and
 * per period and category. Category views are empty when the filtered ledger has no
 * category labels. The input array and its records are left untouched.
 */
export function summarize(transactions: readonly Transaction[], opts: SummarizeOptions = {}): SummaryBundle {
  const filtered = filterByDate(transactions, opts.startDate, opts.endDate);

  // Categories are recomputed on the filtered rows so labels outside the window drop out.
  const categories = activeCategories(filtered);

  const bounds = dateBounds(transactions);
  const start = opts.startDate ?? bounds?.first;
  const end = opts.endDate ?? bounds?.last;
  const span = start !== undefined && end !== undefined ? elapsed(start, end) : null;

  const budget = opts.budget;
  // Whole range: the budget times the number of budget periods between the first and last date.
  const rangeBudget =
    budget && start !== undefined && end !== undefined
      ? (budget.amount * diffDays(start, end)) / periodDuration(start, budget.freq)
      : NaN;

  const total = aggregateTotal(filtered);
  const byNone: OverallSummary = {
    ...total,
    savingsPc: pct(total.balance, total.income),
    ...averages(total.balance, span),
    ...(budget ? { periodBudget: rangeBudget } : {})
  };

  let cumulativeIncome = 0;
  let cumulativeBalance = 0;
  const byPeriod: PeriodSummaryRow[] = aggregateByPeriod(filtered, { freq: opts.freq }).map((row) => {
    cumulativeIncome += row.income;
    cumulativeBalance += row.balance;
    return {
      ...row,
      savingsPc: pct(row.balance, row.income),
      cumulativeIncome,
      cumulativeBalance,
      cumulativeSavingsPc: pct(cumulativeBalance, cumulativeIncome),
      ...(budget ? { periodBudget: scaleBudget(budget, row.date, opts.freq, rangeBudget) } : {})
    };
  });

  let byCategory: CategorySummaryRow[] = [];
  let byPeriodAndCategory: PeriodCategorySummaryRow[] = [];

  if (categories.length > 0) {
    byCategory = aggregateByCategory(filtered).map((row) => ({
      ...row,
      incomeToTotalIncomePc: pct(row.income, total.income),
      expenseToTotalIncomePc: pct(row.expense, total.income),
      expenseToTotalExpensePc: pct(row.expense, total.expense),
      ...averages(row.balance, span)
    }));

    const periods = new Map(byPeriod.map((p) => [p.date, p]));
    byPeriodAndCategory = aggregateByPeriodAndCategory(filtered, { freq: opts.freq }).map((row) => {
      const period = periods.get(row.date);
      const periodIncome = period?.income ?? 0;
      const periodExpense = period?.expense ?? 0;
      return {
        ...row,
        incomeToPeriodIncomePc: pct(row.income, periodIncome),
        expenseToPeriodIncomePc: pct(row.expense, periodIncome),
        expenseToPeriodExpensePc: pct(row.expense, periodExpense)
      };
    });
  }

  const bundle: SummaryBundle = { byNone, byPeriod, byCategory, byPeriodAndCategory };
  return opts.decimals === undefined ? bundle : roundBundle(bundle, opts.decimals);
}

/** Budget for the period starting at `date`: its length in budget periods times the amount. */
function scaleBudget(budget: Budget, date: string, freq: Frequency | undefined, single: number): number {
  if (!freq) return single;
  return (budget.amount * periodDuration(date, freq)) / periodDuration(date, budget.freq);
}

/** Round half away from zero; NaN and infinities pass through. */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new Error(`decimals must be an integer from 0 to ${MAX_DECIMALS}, got ${decimals}`);
  }
  if (!Number.isFinite(value)) return value;
  const f = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * f)) / f || 0;
}

export function roundBundle(bundle: SummaryBundle, decimals: number): SummaryBundle {
  const r = (v: number) => roundTo(v, decimals);

  const budgetField = (v: number | undefined) => (v === undefined ? {} : { periodBudget: r(v) });
  const totals = (t: Totals): Totals => ({ income: r(t.income), expense: r(t.expense), balance: r(t.balance) });
  const avg = (a: AverageBalance): AverageBalance => ({
    dailyAvgBalance: r(a.dailyAvgBalance),
    weeklyAvgBalance: r(a.weeklyAvgBalance),
    monthlyAvgBalance: r(a.monthlyAvgBalance),
    yearlyAvgBalance: r(a.yearlyAvgBalance)
  });

  return {
    byNone: {
      ...totals(bundle.byNone),
      savingsPc: r(bundle.byNone.savingsPc),
      ...avg(bundle.byNone),
      ...budgetField(bundle.byNone.periodBudget)
    },
    byPeriod: bundle.byPeriod.map((row) => ({
      date: row.date,
      ...totals(row),
      savingsPc: r(row.savingsPc),
      cumulativeIncome: r(row.cumulativeIncome),
      cumulativeBalance: r(row.cumulativeBalance),
      cumulativeSavingsPc: r(row.cumulativeSavingsPc),
      ...budgetField(row.periodBudget)
    })),
    byCategory: bundle.byCategory.map((row) => ({
      category: row.category,
      ...totals(row),
      incomeToTotalIncomePc: r(row.incomeToTotalIncomePc),
      expenseToTotalIncomePc: r(row.expenseToTotalIncomePc),
      expenseToTotalExpensePc: r(row.expenseToTotalExpensePc),
      ...avg(row)
    })),
    byPeriodAndCategory: bundle.byPeriodAndCategory.map((row) => ({
      date: row.date,
      category: row.category,
      ...totals(row),
      incomeToPeriodIncomePc: r(row.incomeToPeriodIncomePc),
      expenseToPeriodIncomePc: r(row.expenseToPeriodIncomePc),
      expenseToPeriodExpensePc: r(row.expenseToPeriodExpensePc)
    }))
  };
}
