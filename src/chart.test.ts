import test from "node:test";
import assert from "node:assert/strict";
import { parseFrequency } from "./calendar.js";
import { buildChart } from "./chart.js";
import { Transaction } from "./schema.js";
import { summarize } from "./summarize.js";

const LEDGER: Transaction[] = [
  { date: "2017-01-01", amount: 100, category: "salary" },
  { date: "2017-01-15", amount: -40, category: "food" },
  { date: "2017-02-03", amount: -10, category: "food" },
  { date: "2017-02-10", amount: 50, category: "salary" },
  { date: "2017-04-01", amount: -5, category: "transport" }
];

const bundle = summarize(LEDGER, { freq: parseFrequency("MS") });

test("period view: income and expense columns with balance lines", () => {
  const chart = buildChart(bundle, { currency: "NZD" });

  assert.deepEqual(chart.xAxis.categories, ["2017-01-01", "2017-02-01", "2017-03-01", "2017-04-01"]);
  assert.equal(chart.yAxis.title.text, "Money (NZD)");
  assert.equal(chart.tooltip.shared, true);
  assert.equal(chart.tooltip.valueSuffix, " NZD");
  assert.equal(chart.plotOptions.column.stacking, undefined);
  assert.equal("width" in chart.chart, false);
  assert.deepEqual(
    chart.series.map((s) => [s.name, s.type]),
    [
      ["Income", "column"],
      ["Expense", "column"],
      ["Balance", "line"],
      ["Cumulative balance", "line"]
    ]
  );
  assert.deepEqual(chart.series[0].data, [100, 50, 0, 0]);
  assert.deepEqual(chart.series[3].data, [60, 100, 100, 95]);
});

test("category view: stacks split by category, largest first", () => {
  const chart = buildChart(bundle, { view: "category", width: 800, title: "Household" });

  assert.equal(chart.title.text, "Household");
  assert.equal(chart.chart.width, 800);
  assert.equal(chart.yAxis.title.text, "Money");
  assert.equal(chart.plotOptions.column.stacking, "normal");
  assert.equal(chart.tooltip.shared, false);
  assert.deepEqual(
    chart.series.map((s) => [s.name, s.stack, s.color]),
    [
      ["Income salary", "income", "#0868ac"],
      ["Expense food", "expense", "#b30000"],
      ["Expense transport", "expense", "#e34a33"],
      ["Cumulative balance", undefined, "#555555"]
    ]
  );
  assert.deepEqual(chart.series[0].data, [100, 50, null, null]);
  assert.deepEqual(chart.series[1].data, [40, 10, null, null]);
  assert.deepEqual(chart.series[2].data, [null, null, null, 5]);
});

test("category view falls back to periods without category data", () => {
  const plain = summarize(
    LEDGER.map(({ date, amount }) => ({ date, amount })),
    { freq: parseFrequency("MS") }
  );
  const chart = buildChart(plain, { view: "category" });
  assert.deepEqual(
    chart.series.map((s) => s.name),
    ["Income", "Expense", "Balance", "Cumulative balance"]
  );
});

test("a budgeted summary gets a budget column", () => {
  const budgeted = summarize(LEDGER, {
    freq: parseFrequency("MS"),
    budget: { amount: 70, freq: parseFrequency("W") }
  });

  const periods = buildChart(budgeted);
  assert.deepEqual(
    periods.series.map((s) => s.name),
    ["Income", "Expense", "Budget", "Balance", "Cumulative balance"]
  );
  assert.equal(periods.series[2].color, "#ffffff");
  assert.equal(periods.series[2].stack, undefined);
  assert.deepEqual(periods.series[2].data, [310, 280, 310, 300]);

  const categories = buildChart(budgeted, { view: "category" });
  assert.deepEqual(
    categories.series.slice(-2).map((s) => [s.name, s.stack]),
    [
      ["Budget", "budget"],
      ["Cumulative balance", undefined]
    ]
  );
});
