import { Frequency, periodGrouper, periodStarts } from "./calendar.js";
import { MissingCategoryError } from "./errors.js";
import { Transaction, UNCATEGORIZED } from "./schema.js";

export type GroupKey = "period" | "category";

export type Totals = {
  income: number;
  expense: number;
  balance: number;
};

export type PeriodTotals = Totals & { date: string };
export type CategoryTotals = Totals & { category: string };
export type PeriodCategoryTotals = Totals & { date: string; category: string };

/** Row shape returned by {@link aggregate}; which keys are set depends on the requested grouping. */
export type AggregateRow = Totals & { date?: string; category?: string };

export type AggregateOptions = {
  /** Period frequency. Absent means a single period starting at the earliest date. */
  freq?: Frequency;
};

type Flow = {
  date: string;
  category: string;
  income: number;
  expense: number;
};

export function hasCategories(transactions: readonly Transaction[]): boolean {
  return transactions.some((t) => t.category !== undefined);
}

/** Distinct labels present in `transactions`, sorted. Empty when the ledger carries no categories. */
export function activeCategories(transactions: readonly Transaction[]): string[] {
  if (!hasCategories(transactions)) return [];
  const labels = new Set(transactions.map((t) => t.category ?? UNCATEGORIZED));
  return Array.from(labels).sort(compareText);
}

/** Earliest and latest dates, or null for an empty list. */
export function dateBounds(transactions: readonly Transaction[]): { first: string; last: string } | null {
  if (transactions.length === 0) return null;
  let first = transactions[0].date;
  let last = first;
  for (const t of transactions) {
    if (t.date < first) first = t.date;
    if (t.date > last) last = t.date;
  }
  return { first, last };
}

export function aggregateTotal(transactions: readonly Transaction[]): Totals {
  const acc = emptyTotals();
  for (const f of toFlows(transactions)) addFlow(acc, f);
  return finish(acc);
}

/**
 * Totals per period, in chronological order. Every period between the first and last
 * transaction is present, so empty periods show up as zero rows.
 */
export function aggregateByPeriod(transactions: readonly Transaction[], opts: AggregateOptions = {}): PeriodTotals[] {
  const bounds = dateBounds(transactions);
  if (!bounds) return [];

  const groups = new Map<string, Totals>();
  for (const start of periodStarts(bounds.first, bounds.last, opts.freq)) groups.set(start, emptyTotals());

  const grouper = periodGrouper(opts.freq, bounds.first);
  for (const f of toFlows(transactions)) {
    const key = grouper(f.date);
    const acc = groups.get(key) ?? emptyTotals();
    addFlow(acc, f);
    groups.set(key, acc);
  }

  return Array.from(groups.entries())
    .map(([date, acc]) => ({ date, ...finish(acc) }))
    .sort((a, b) => compareText(a.date, b.date));
}

/** Totals per active category, ordered by label. */
export function aggregateByCategory(transactions: readonly Transaction[]): CategoryTotals[] {
  if (!hasCategories(transactions)) throw new MissingCategoryError();

  const groups = new Map<string, Totals>();
  for (const f of toFlows(transactions)) {
    const acc = groups.get(f.category) ?? emptyTotals();
    addFlow(acc, f);
    groups.set(f.category, acc);
  }

  return Array.from(groups.entries())
    .map(([category, acc]) => ({ category, ...finish(acc) }))
    .sort((a, b) => compareText(a.category, b.category));
}

/** Totals per (period, category) pair that occurs in the data, ordered by period then label. */
export function aggregateByPeriodAndCategory(
  transactions: readonly Transaction[],
  opts: AggregateOptions = {}
): PeriodCategoryTotals[] {
  if (!hasCategories(transactions)) throw new MissingCategoryError();

  const bounds = dateBounds(transactions);
  if (!bounds) return [];

  const grouper = periodGrouper(opts.freq, bounds.first);
  const groups = new Map<string, PeriodCategoryTotals>();
  for (const f of toFlows(transactions)) {
    const date = grouper(f.date);
    const key = `${date}\u0000${f.category}`;
    const acc = groups.get(key) ?? { date, category: f.category, ...emptyTotals() };
    addFlow(acc, f);
    groups.set(key, acc);
  }

  return Array.from(groups.values())
    .map((acc) => ({ date: acc.date, category: acc.category, ...finish(acc) }))
    .sort((a, b) => compareText(a.date, b.date) || compareText(a.category, b.category));
}

/**
 * Group by any non-empty subset of {period, category} and sum income and expense.
 * Throws {@link MissingCategoryError} when category grouping is asked of a ledger without categories.
 */
export function aggregate(
  transactions: readonly Transaction[],
  groupKeys: readonly GroupKey[],
  opts: AggregateOptions = {}
): AggregateRow[] {
  if (groupKeys.length === 0) throw new Error("aggregate: at least one group key is required");

  const byPeriod = groupKeys.includes("period");
  const byCategory = groupKeys.includes("category");

  if (byPeriod && byCategory) return aggregateByPeriodAndCategory(transactions, opts);
  if (byCategory) return aggregateByCategory(transactions);
  return aggregateByPeriod(transactions, opts);
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toFlows(transactions: readonly Transaction[]): Flow[] {
  return transactions.map((t) => ({
    date: t.date,
    category: t.category ?? UNCATEGORIZED,
    income: t.amount > 0 ? t.amount : 0,
    expense: t.amount < 0 ? -t.amount : 0
  }));
}

function emptyTotals(): Totals {
  return { income: 0, expense: 0, balance: 0 };
}

function addFlow(acc: Totals, f: Flow): void {
  acc.income += f.income;
  acc.expense += f.expense;
}

function finish(acc: Totals): Totals {
  return { income: acc.income, expense: acc.expense, balance: acc.income - acc.expense };
}
