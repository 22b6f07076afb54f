import { addDays, diffDays } from "./calendar.js";
import { Transaction } from "./schema.js";
import { sortTransactions } from "./validate.js";

export const DEFAULT_INCOME_CATEGORIES = ["yoga", "reiki", "thieving"];
export const DEFAULT_EXPENSE_CATEGORIES = ["food", "housing", "transport", "healthcare", "soil testing"];

export type SampleOptions = {
  /** Hours between consecutive transactions. */
  everyHours?: number;
  incomeCategories?: string[];
  expenseCategories?: string[];
  /** Uniform [0, 1) source; pass a deterministic one in tests. */
  random?: () => number;
};

/**
 * Whimsical sample ledger between two dates (inclusive): one transaction every
 * `everyHours`, integer amounts in [-100, 100), positive ones tagged with an income
 * category and the rest with an expense category.
 */
export function buildSampleTransactions(startDate: string, endDate: string, opts: SampleOptions = {}): Transaction[] {
  const everyHours = opts.everyHours ?? 12;
  if (!(everyHours > 0)) throw new Error(`everyHours must be positive, got ${everyHours}`);

  const random = opts.random ?? Math.random;
  const incomeCategories = opts.incomeCategories ?? DEFAULT_INCOME_CATEGORIES;
  const expenseCategories = opts.expenseCategories ?? DEFAULT_EXPENSE_CATEGORIES;
  if (incomeCategories.length === 0 || expenseCategories.length === 0) {
    throw new Error("sample categories must not be empty");
  }

  const totalHours = diffDays(startDate, endDate) * 24;
  const out: Transaction[] = [];

  for (let h = 0; h <= totalHours; h += everyHours) {
    const amount = Math.floor(random() * 200) - 100;
    const pool = amount > 0 ? incomeCategories : expenseCategories;
    out.push({
      date: addDays(startDate, Math.floor(h / 24)),
      amount,
      description: hex(random, 20),
      category: pick(random, pool),
      comment: hex(random, 40)
    });
  }

  return sortTransactions(out);
}

function hex(random: () => number, bits: number): string {
  return "0x" + Math.floor(random() * 2 ** bits).toString(16);
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}
