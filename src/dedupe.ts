import crypto from "node:crypto";
import { Transaction } from "./schema.js";
import { sortTransactions } from "./validate.js";

export type DedupeResult = {
  transactions: Transaction[];
  removed: number;
};

/**
 * Drop rows identical in every field, keeping the first occurrence.
 * The result is sorted by (date, amount).
 */
export function dedupeTransactions(transactions: readonly Transaction[]): DedupeResult {
  const seen = new Set<string>();
  const out: Transaction[] = [];
  let removed = 0;

  for (const tx of transactions) {
    const key = hashKey(tx);
    if (seen.has(key)) {
      removed++;
      continue;
    }
    seen.add(key);
    out.push(tx);
  }

  return { transactions: sortTransactions(out), removed };
}

function hashKey(tx: Transaction): string {
  const payload = [tx.date, tx.amount, tx.description ?? null, tx.category ?? null, tx.comment ?? null];
  return crypto.createHash("sha256").update(JSON.stringify(payload)).digest("hex");
}
