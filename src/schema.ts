import { z } from "zod";
import { isCalendarDate } from "./calendar.js";

/**
 * Core schema for a normalized transaction record.
 * Every input (CSV, JSON, generated) is mapped into this shape before summarizing.
 */
export const TransactionSchema = z.object({
  /** ISO date (YYYY-MM-DD). */
  date: z.string().refine(isCalendarDate, { message: "expected a calendar date (YYYY-MM-DD)" }),
  /** Positive = income, negative = expense, zero = neither. */
  amount: z.number().finite(),

  description: z.string().optional(),

  /** Lower-cased, trimmed category label; blank means uncategorized. */
  category: z
    .string()
    .trim()
    .toLowerCase()
    .transform((s) => (s === "" ? undefined : s))
    .optional(),

  comment: z.string().optional()
});

export const TransactionsFileSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  tool: z.string(),
  transactions: z.array(TransactionSchema)
});

export type Transaction = z.infer<typeof TransactionSchema>;
export type TransactionsFile = z.infer<typeof TransactionsFileSchema>;

export type ColumnName = keyof Transaction;
export type ColumnType = "date" | "number" | "text" | "label";

export type ColumnSpec = {
  name: ColumnName;
  required: boolean;
  type: ColumnType;
  description: string;
};

/** Static descriptor of the ledger table. Header lookup and validation both read from it. */
export const LEDGER_COLUMNS: readonly ColumnSpec[] = [
  { name: "date", required: true, type: "date", description: "YYYY-MM-DD (also YYYY/MM/DD, YYYY.MM.DD)" },
  { name: "amount", required: true, type: "number", description: "income +, expense -" },
  { name: "description", required: false, type: "text", description: "free text" },
  { name: "category", required: false, type: "label", description: "case-insensitive label" },
  { name: "comment", required: false, type: "text", description: "free text" }
];

export const TOOL_NAME = "ledgerroll@0.1.0";

/** Label given to uncategorized rows of a ledger that otherwise carries categories. */
export const UNCATEGORIZED = "uncategorized";
