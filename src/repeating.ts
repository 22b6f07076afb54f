import { dateBounds } from "./aggregate.js";
import { Frequency, dateRange } from "./calendar.js";
import { dedupeTransactions } from "./dedupe.js";
import { Transaction } from "./schema.js";

export type RepeatingTransaction = {
  amount: number;
  freq: Frequency;
  description?: string;
  category?: string;
  comment?: string;
  /** First date to consider (inclusive). Defaults to the earliest ledger date. */
  startDate?: string;
  /** Last date to consider (inclusive). Defaults to the latest ledger date. */
  endDate?: string;
};

/**
 * Add `amount` at every boundary of `freq` within the date window, then drop exact
 * duplicates and sort by (date, amount). Returns a new list.
 */
export function insertRepeating(transactions: readonly Transaction[], repeat: RepeatingTransaction): Transaction[] {
  const bounds = dateBounds(transactions);
  const start = repeat.startDate ?? bounds?.first;
  const end = repeat.endDate ?? bounds?.last;
  if (start === undefined || end === undefined) {
    throw new Error("insertRepeating: an empty ledger needs explicit start and end dates");
  }

  const added: Transaction[] = dateRange(start, end, repeat.freq).map((date) => {
    const tx: Transaction = { date, amount: repeat.amount };
    if (repeat.description !== undefined) tx.description = repeat.description;
    if (repeat.category !== undefined) tx.category = repeat.category.trim().toLowerCase();
    if (repeat.comment !== undefined) tx.comment = repeat.comment;
    return tx;
  });

  return dedupeTransactions([...transactions, ...added]).transactions;
}
