import { SummaryBundle } from "./summarize.js";

export type FormatOptions = {
  /** Label appended to money values, e.g. "NZD". */
  currency?: string;
  /** BCP 47 locale for digit grouping. */
  locale?: string;
  /** Fraction digits shown; defaults to 2. */
  decimals?: number;
};

export const NOT_AVAILABLE = "n/a";

export function formatNumber(value: number, opts: FormatOptions = {}): string {
  if (!Number.isFinite(value)) return NOT_AVAILABLE;
  const digits = opts.decimals ?? 2;
  return new Intl.NumberFormat(opts.locale ?? "en-US", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits
  }).format(value);
}

export function formatMoney(value: number, opts: FormatOptions = {}): string {
  const s = formatNumber(value, opts);
  return s !== NOT_AVAILABLE && opts.currency ? `${s} ${opts.currency}` : s;
}

export function formatPercent(value: number, opts: FormatOptions = {}): string {
  const s = formatNumber(value, { locale: opts.locale, decimals: opts.decimals ?? 1 });
  return s === NOT_AVAILABLE ? s : `${s}%`;
}

/** Plain-text table: first column left-aligned, the rest right-aligned. */
export function renderTable(header: string[], rows: string[][]): string {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const line = (cells: string[]) =>
    cells
      .map((c, i) => (i === 0 ? c.padEnd(widths[i]) : c.padStart(widths[i])))
      .join("  ")
      .trimEnd();
  const rule = widths.map((w) => "-".repeat(w)).join("  ");
  return [line(header), rule, ...rows.map(line)].join("\n");
}

export type SummarySection = {
  title: string;
  table: string;
};

/** One text table per non-empty view, ready to print. */
export function renderSummary(bundle: SummaryBundle, opts: FormatOptions = {}): SummarySection[] {
  const money = (v: number) => formatMoney(v, opts);
  const pc = (v: number) => formatPercent(v, { locale: opts.locale });

  const sections: SummarySection[] = [
    {
      title: "Overall",
      table: renderTable(
        ["", "income", "expense", "balance", "savings", "per month"],
        [
          [
            "total",
            money(bundle.byNone.income),
            money(bundle.byNone.expense),
            money(bundle.byNone.balance),
            pc(bundle.byNone.savingsPc),
            money(bundle.byNone.monthlyAvgBalance)
          ]
        ]
      )
    }
  ];

  if (bundle.byPeriod.length > 0) {
    const budget = bundle.byNone.periodBudget !== undefined;
    sections.push({
      title: "By period",
      table: renderTable(
        [
          "period",
          "income",
          "expense",
          "balance",
          "savings",
          "cum. balance",
          "cum. savings",
          ...(budget ? ["budget"] : [])
        ],
        bundle.byPeriod.map((r) => [
          r.date,
          money(r.income),
          money(r.expense),
          money(r.balance),
          pc(r.savingsPc),
          money(r.cumulativeBalance),
          pc(r.cumulativeSavingsPc),
          ...(budget ? [money(r.periodBudget ?? NaN)] : [])
        ])
      )
    });
  }

  if (bundle.byCategory.length > 0) {
    sections.push({
      title: "By category",
      table: renderTable(
        ["category", "income", "expense", "balance", "% of income", "% of expense"],
        bundle.byCategory.map((r) => [
          r.category,
          money(r.income),
          money(r.expense),
          money(r.balance),
          pc(r.incomeToTotalIncomePc),
          pc(r.expenseToTotalExpensePc)
        ])
      )
    });
  }

  if (bundle.byPeriodAndCategory.length > 0) {
    sections.push({
      title: "By period and category",
      table: renderTable(
        ["period", "category", "income", "expense", "% of period income", "% of period expense"],
        bundle.byPeriodAndCategory.map((r) => [
          r.date,
          r.category,
          money(r.income),
          money(r.expense),
          pc(r.incomeToPeriodIncomePc),
          pc(r.expenseToPeriodExpensePc)
        ])
      )
    });
  }

  return sections;
}

/** Notice printed after a summary whose category views came out empty, else null. */
export function categoryNote(bundle: SummaryBundle): string | null {
  if (bundle.byCategory.length > 0) return null;
  return "Note: no categories in the selected rows; category views are empty.";
}
