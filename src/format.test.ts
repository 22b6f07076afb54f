import test from "node:test";
import assert from "node:assert/strict";
import { parseFrequency } from "./calendar.js";
import { categoryNote, formatMoney, formatNumber, formatPercent, renderSummary, renderTable } from "./format.js";
import { summarize } from "./summarize.js";

test("numbers, money and percentages", () => {
  assert.equal(formatMoney(1234.5, { currency: "NZD" }), "1,234.50 NZD");
  assert.equal(formatMoney(-3), "-3.00");
  assert.equal(formatMoney(NaN, { currency: "NZD" }), "n/a");
  assert.equal(formatPercent(60), "60.0%");
  assert.equal(formatPercent(NaN), "n/a");
  assert.equal(formatNumber(1234.5, { locale: "de-DE" }), "1.234,50");
  assert.equal(formatNumber(2.5, { decimals: 0 }), "3");
});

test("renderTable pads columns", () => {
  assert.equal(
    renderTable(
      ["a", "bb"],
      [
        ["x", "1"],
        ["yyy", "22"]
      ]
    ),
    ["a    bb", "---  --", "x     1", "yyy  22"].join("\n")
  );
});

test("renderSummary skips empty views", () => {
  const bundle = summarize([
    { date: "2017-01-01", amount: 100 },
    { date: "2017-01-15", amount: -40 }
  ]);
  const sections = renderSummary(bundle, { currency: "NZD" });
  assert.deepEqual(
    sections.map((s) => s.title),
    ["Overall", "By period"]
  );
  assert.equal(sections[0].table.split("\n")[2].split(/\s{2,}/)[1], "100.00 NZD");
});

test("renderSummary adds a budget column when there is a budget", () => {
  const bundle = summarize(
    [
      { date: "2017-01-01", amount: 100 },
      { date: "2017-01-15", amount: -40 }
    ],
    { budget: { amount: 70, freq: parseFrequency("W") } }
  );
  const [header, , row] = renderSummary(bundle, { currency: "NZD" })[1].table.split("\n");
  assert.equal(header.split(/\s{2,}/).at(-1), "budget");
  assert.equal(row.split(/\s{2,}/).at(-1), "140.00 NZD");
});

test("categoryNote follows the category views of the summary", () => {
  const ledger = [
    { date: "2017-01-01", amount: 100, category: "salary" },
    { date: "2017-03-01", amount: -40 }
  ];
  assert.equal(categoryNote(summarize(ledger)), null);
  // The only categorized row falls outside the window.
  assert.equal(
    categoryNote(summarize(ledger, { startDate: "2017-02-01" })),
    "Note: no categories in the selected rows; category views are empty."
  );
});
