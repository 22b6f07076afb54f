import { getColors } from "./colors.js";
import { SummaryBundle } from "./summarize.js";

export type ChartView = "period" | "category";

export type ChartOptions = {
  view?: ChartView;
  /** Currency label for the axis and tooltips, e.g. "NZD". */
  currency?: string;
  title?: string;
  width?: number;
  height?: number;
};

export type ChartSeries = {
  name: string;
  type: "column" | "line";
  color: string;
  /** One point per x-axis category; null where there is nothing to plot. */
  data: (number | null)[];
  stack?: string;
};

/** Highcharts-style options object. Plain data only, so it can be written out as JSON. */
export type ChartSpec = {
  chart: { zoomType: "xy"; width?: number; height?: number };
  title: { text: string };
  xAxis: { type: "category"; categories: string[] };
  yAxis: { title: { text: string } };
  tooltip: { shared: boolean; valueSuffix: string };
  plotOptions: { column: { pointPadding: number; borderWidth: number; borderColor: string; stacking?: "normal" } };
  credits: { enabled: false };
  series: ChartSeries[];
};

function point(v: number | undefined): number | null {
  return v === undefined || Number.isNaN(v) ? null : v;
}

/**
 * Describe a chart of the summary: per period income and expense columns with balance
 * lines, or (view "category") income and expense stacks split by category. A summary
 * computed with a budget gets a "Budget" column beside the spending. Falls back to the period view when the bundle carries no category data.
 */
export function buildChart(bundle: SummaryBundle, opts: ChartOptions = {}): ChartSpec {
  const currency = opts.currency ?? "";
  const dates = bundle.byPeriod.map((r) => r.date);
  const byCategory = opts.view === "category" && bundle.byCategory.length > 0;

  const spec: ChartSpec = {
    chart: { zoomType: "xy" },
    title: { text: opts.title ?? "Account Summary" },
    // Dates are plotted as categories so each label reads as a period start.
    xAxis: { type: "category", categories: dates },
    yAxis: { title: { text: currency ? `Money (${currency})` : "Money" } },
    tooltip: { shared: !byCategory, valueSuffix: currency ? ` ${currency}` : "" },
    plotOptions: { column: { pointPadding: 0, borderWidth: 1, borderColor: "#333333" } },
    credits: { enabled: false },
    series: byCategory ? categorySeries(bundle, dates) : periodSeries(bundle)
  };

  const budget = budgetSeries(bundle, byCategory);
  if (budget) spec.series.splice(spec.series.length - (byCategory ? 1 : 2), 0, budget);

  if (byCategory) spec.plotOptions.column.stacking = "normal";
  if (opts.width !== undefined) spec.chart.width = opts.width;
  if (opts.height !== undefined) spec.chart.height = opts.height;

  return spec;
}

function periodSeries(bundle: SummaryBundle): ChartSeries[] {
  const [balanceColor] = getColors("balance", 1);
  return [
    {
      name: "Income",
      type: "column",
      color: getColors("income", 1)[0],
      data: bundle.byPeriod.map((r) => point(r.income))
    },
    {
      name: "Expense",
      type: "column",
      color: getColors("expense", 1)[0],
      data: bundle.byPeriod.map((r) => point(r.expense))
    },
    { name: "Balance", type: "line", color: balanceColor, data: bundle.byPeriod.map((r) => point(r.balance)) },
    {
      name: "Cumulative balance",
      type: "line",
      color: balanceColor,
      data: bundle.byPeriod.map((r) => point(r.cumulativeBalance))
    }
  ];
}

function budgetSeries(bundle: SummaryBundle, stacked: boolean): ChartSeries | undefined {
  if (bundle.byNone.periodBudget === undefined) return undefined;
  return {
    name: "Budget",
    type: "column",
    color: getColors("budget", 1)[0],
    data: bundle.byPeriod.map((r) => point(r.periodBudget)),
    ...(stacked ? { stack: "budget" } : {})
  };
}

function categorySeries(bundle: SummaryBundle, dates: string[]): ChartSeries[] {
  const series: ChartSeries[] = [];

  for (const column of ["income", "expense"] as const) {
    // Largest categories first; categories with nothing in this column are left out.
    const categories = bundle.byCategory
      .filter((r) => r[column] > 0)
      .sort((a, b) => b[column] - a[column])
      .map((r) => r.category);
    const colors = getColors(column, categories.length);

    categories.forEach((category, i) => {
      const values = new Map(
        bundle.byPeriodAndCategory.filter((r) => r.category === category).map((r) => [r.date, r[column]])
      );
      series.push({
        name: `${column === "income" ? "Income" : "Expense"} ${category}`,
        type: "column",
        color: colors[i],
        stack: column,
        data: dates.map((d) => {
          const v = values.get(d);
          return v !== undefined && v > 0 ? v : null;
        })
      });
    });
  }

  series.push({
    name: "Cumulative balance",
    type: "line",
    color: getColors("balance", 1)[0],
    data: bundle.byPeriod.map((r) => point(r.cumulativeBalance))
  });

  return series;
}
