import fs from "node:fs/promises";
import path from "node:path";
import { LedgerSchemaError } from "./errors.js";
import { readRowsFromCsv, writeJson } from "./io.js";
import { TOOL_NAME, Transaction, TransactionsFile, TransactionsFileSchema } from "./schema.js";
import { parseTransactions, sortTransactions } from "./validate.js";

export function parseTransactionsFile(json: unknown): Transaction[] {
  const parsed = TransactionsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new LedgerSchemaError(
      parsed.error.issues.map((i) => ({ column: i.path.join(".") || undefined, message: i.message }))
    );
  }
  return sortTransactions(parsed.data.transactions);
}

export async function readTransactionsFile(filePath: string): Promise<Transaction[]> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseTransactionsFile(JSON.parse(raw));
}

/** Read a ledger from a normalized JSON file or a raw CSV table, picked by extension. */
export async function readLedger(filePath: string): Promise<Transaction[]> {
  if (path.extname(filePath).toLowerCase() === ".json") return readTransactionsFile(filePath);
  const { headers, rows } = await readRowsFromCsv(filePath);
  return parseTransactions(rows, headers);
}

export function buildTransactionsFile(transactions: Transaction[], now: Date = new Date()): TransactionsFile {
  const out = {
    version: 1 as const,
    generatedAt: now.toISOString(),
    tool: TOOL_NAME,
    transactions
  };
  // Validate before writing.
  return TransactionsFileSchema.parse(out);
}

export async function writeTransactionsFile(filePath: string, transactions: Transaction[]): Promise<TransactionsFile> {
  const file = buildTransactionsFile(transactions);
  await writeJson(filePath, file);
  return file;
}
