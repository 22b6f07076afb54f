import path from "node:path";
import { writeText } from "./io.js";
import { Transaction } from "./schema.js";
import { SummaryBundle } from "./summarize.js";

const TRANSACTION_HEADER = ["date", "amount", "description", "category", "comment"];

export type CsvCell = string | number | undefined;

export type SummaryTable = {
  /** File stem, e.g. `by_period`. */
  name: string;
  header: string[];
  rows: CsvCell[][];
};

export function transactionsToCsv(txs: readonly Transaction[]): string {
  return toCsv([
    TRANSACTION_HEADER,
    ...txs.map((t) => [t.date, t.amount, t.description, t.category, t.comment])
  ]);
}

export async function writeTransactionsCsv(filePath: string, txs: readonly Transaction[]): Promise<void> {
  await writeText(filePath, transactionsToCsv(txs));
}

/**
 * The four views as flat tables with snake_case headers (pandas/streamlit friendly).
 * `period_budget` is appended to the overall and period tables when a budget was given.
 */
export function summaryTables(bundle: SummaryBundle): SummaryTable[] {
  const n = bundle.byNone;
  const budget = n.periodBudget !== undefined;
  const withBudget = (header: string[]) => (budget ? [...header, "period_budget"] : header);
  const budgetCell = (v: number | undefined): CsvCell[] => (budget ? [v] : []);
  return [
    {
      name: "by_none",
      header: withBudget([
        "income",
        "expense",
        "balance",
        "savings_pc",
        "daily_avg_balance",
        "weekly_avg_balance",
        "monthly_avg_balance",
        "yearly_avg_balance"
      ]),
      rows: [
        [
          n.income,
          n.expense,
          n.balance,
          n.savingsPc,
          n.dailyAvgBalance,
          n.weeklyAvgBalance,
          n.monthlyAvgBalance,
          n.yearlyAvgBalance,
          ...budgetCell(n.periodBudget)
        ]
      ]
    },
    {
      name: "by_period",
      header: withBudget([
        "date",
        "income",
        "expense",
        "balance",
        "savings_pc",
        "cumulative_income",
        "cumulative_balance",
        "cumulative_savings_pc"
      ]),
      rows: bundle.byPeriod.map((r) => [
        r.date,
        r.income,
        r.expense,
        r.balance,
        r.savingsPc,
        r.cumulativeIncome,
        r.cumulativeBalance,
        r.cumulativeSavingsPc,
        ...budgetCell(r.periodBudget)
      ])
    },
    {
      name: "by_category",
      header: [
        "category",
        "income",
        "expense",
        "balance",
        "income_to_total_income_pc",
        "expense_to_total_income_pc",
        "expense_to_total_expense_pc",
        "daily_avg_balance",
        "weekly_avg_balance",
        "monthly_avg_balance",
        "yearly_avg_balance"
      ],
      rows: bundle.byCategory.map((r) => [
        r.category,
        r.income,
        r.expense,
        r.balance,
        r.incomeToTotalIncomePc,
        r.expenseToTotalIncomePc,
        r.expenseToTotalExpensePc,
        r.dailyAvgBalance,
        r.weeklyAvgBalance,
        r.monthlyAvgBalance,
        r.yearlyAvgBalance
      ])
    },
    {
      name: "by_period_and_category",
      header: [
        "date",
        "category",
        "income",
        "expense",
        "balance",
        "income_to_period_income_pc",
        "expense_to_period_income_pc",
        "expense_to_period_expense_pc"
      ],
      rows: bundle.byPeriodAndCategory.map((r) => [
        r.date,
        r.category,
        r.income,
        r.expense,
        r.balance,
        r.incomeToPeriodIncomePc,
        r.expenseToPeriodIncomePc,
        r.expenseToPeriodExpensePc
      ])
    }
  ];
}

/** Writes `<dir>/<view>.csv` for each view and returns the paths written. */
export async function writeSummaryCsv(dir: string, bundle: SummaryBundle): Promise<string[]> {
  const written: string[] = [];
  for (const table of summaryTables(bundle)) {
    const filePath = path.join(dir, `${table.name}.csv`);
    await writeText(filePath, toCsv([table.header, ...table.rows]));
    written.push(filePath);
  }
  return written;
}

export function toCsv(lines: readonly (readonly CsvCell[])[]): string {
  return lines.map((cells) => cells.map(csvCell).join(",")).join("\n") + "\n";
}

// NaN and missing values are written as empty cells.
function csvCell(v: CsvCell): string {
  if (v === undefined) return "";
  if (typeof v === "number") return Number.isNaN(v) ? "" : String(v);
  return csvEscape(v);
}

function csvEscape(v: string): string {
  const needsQuote = /[\n\r,"]/.test(v);
  const s = v.replace(/"/g, '""');
  return needsQuote ? `"${s}"` : s;
}
