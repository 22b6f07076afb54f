import { isCalendarDate } from "./calendar.js";
import { LedgerIssue, LedgerSchemaError } from "./errors.js";
import { ColumnName, ColumnSpec, LEDGER_COLUMNS, Transaction } from "./schema.js";

export type RawRow = Record<string, unknown>;

export type ValidationResult =
  | { ok: true; transactions: Transaction[]; columns: ColumnName[] }
  | { ok: false; issues: LedgerIssue[] };

/** `" Date "`, `"DATE"` and `"date"` all normalize to `"date"`; inner whitespace becomes `_`. */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_]+/g, "_");
}

/**
 * Map each known column to the header that carries it in the given table.
 * Unknown headers are ignored; the first match wins.
 */
export function findColumns(headers: Iterable<string>): Partial<Record<ColumnName, string>> {
  const found: Partial<Record<ColumnName, string>> = {};
  for (const h of headers) {
    const key = normalizeHeader(h);
    const spec = LEDGER_COLUMNS.find((c) => c.name === key);
    if (spec && found[spec.name] === undefined) found[spec.name] = h;
  }
  return found;
}

/**
 * Check a raw table against the ledger columns and coerce it into transactions
 * sorted by (date, amount). Collects every issue instead of stopping at the first.
 */
export function validateRows(rows: RawRow[], headers?: string[]): ValidationResult {
  const keys = new Set<string>(headers ?? []);
  if (!headers) for (const r of rows) for (const k of Object.keys(r)) keys.add(k);

  const col = findColumns(keys);
  const issues: LedgerIssue[] = [];

  for (const spec of LEDGER_COLUMNS) {
    if (spec.required && col[spec.name] === undefined) {
      issues.push({ column: spec.name, message: `required column '${spec.name}' not found` });
    }
  }
  if (issues.length > 0) return { ok: false, issues };

  const transactions: Transaction[] = [];

  rows.forEach((r, i) => {
    const row = i + 2;
    const cell = (name: ColumnName): unknown => {
      const header = col[name];
      return header === undefined ? undefined : r[header];
    };

    const date = normalizeDate(cell("date"));
    if (date === null) issues.push({ row, column: "date", message: `unparseable date: ${show(cell("date"))}` });

    const amount = normalizeAmount(cell("amount"));
    if (amount === null) issues.push({ row, column: "amount", message: `non-numeric amount: ${show(cell("amount"))}` });

    if (date === null || amount === null) return;

    const tx: Transaction = { date, amount };
    for (const spec of LEDGER_COLUMNS) {
      if (spec.type !== "text" && spec.type !== "label") continue;
      const value = normalizeText(cell(spec.name), spec);
      if (value === undefined) continue;
      if (spec.name === "description") tx.description = value;
      else if (spec.name === "category") tx.category = value;
      else if (spec.name === "comment") tx.comment = value;
    }
    transactions.push(tx);
  });

  if (issues.length > 0) return { ok: false, issues };

  const columns = LEDGER_COLUMNS.map((c) => c.name).filter((name) => col[name] !== undefined);
  return { ok: true, transactions: sortTransactions(transactions), columns };
}

/** Like {@link validateRows}, but throws a {@link LedgerSchemaError} on failure. */
export function parseTransactions(rows: RawRow[], headers?: string[]): Transaction[] {
  const result = validateRows(rows, headers);
  if (!result.ok) throw new LedgerSchemaError(result.issues);
  return result.transactions;
}

/** Stable sort by (date, amount); returns a new array. */
export function sortTransactions(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort((a, b) => (a.date === b.date ? a.amount - b.amount : a.date < b.date ? -1 : 1));
}

export function normalizeDate(value: unknown): string | null {
  if (typeof value !== "string") return null;
  // Supports YYYY-MM-DD, YYYY/MM/DD, YYYY.MM.DD with an optional trailing time.
  const m = value.trim().match(/^(\d{4})[\/.\-](\d{1,2})[\/.\-](\d{1,2})(?:$|[T\s])/);
  if (!m) return null;
  const iso = `${m[1]}-${m[2].padStart(2, "0")}-${m[3].padStart(2, "0")}`;
  return isCalendarDate(iso) ? iso : null;
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

export function normalizeAmount(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  // Remove thousands separators, currency symbols and whitespace; (12.50) means -12.50.
  const cleaned = value
    .trim()
    .replace(/[$€£¥￥,\s]/g, "")
    .replace(/^\(([^)]+)\)$/, "-$1");
  // Plain decimals only: Number() would also take hex, binary and octal literals.
  if (!DECIMAL.test(cleaned)) return null;

  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function normalizeText(value: unknown, spec: ColumnSpec): string | undefined {
  if (value === undefined || value === null) return undefined;
  const s = String(value).trim();
  if (s === "") return undefined;
  return spec.type === "label" ? s.toLowerCase() : s;
}

function show(value: unknown): string {
  return value === undefined || value === null || value === "" ? "(empty)" : JSON.stringify(value);
}
