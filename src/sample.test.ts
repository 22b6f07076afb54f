import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_EXPENSE_CATEGORIES, DEFAULT_INCOME_CATEGORIES, buildSampleTransactions } from "./sample.js";

test("one transaction every twelve hours by default", () => {
  const txs = buildSampleTransactions("2017-01-01", "2017-01-03");
  assert.deepEqual(
    txs.map((t) => t.date),
    ["2017-01-01", "2017-01-01", "2017-01-02", "2017-01-02", "2017-01-03"]
  );

  for (const t of txs) {
    assert.ok(Number.isInteger(t.amount) && t.amount >= -100 && t.amount < 100);
    const pool = t.amount > 0 ? DEFAULT_INCOME_CATEGORIES : DEFAULT_EXPENSE_CATEGORIES;
    assert.ok(t.category !== undefined && pool.includes(t.category));
    assert.match(t.description ?? "", /^0x[0-9a-f]+$/);
    assert.match(t.comment ?? "", /^0x[0-9a-f]+$/);
  }
});

test("a fixed random source gives fixed rows", () => {
  const txs = buildSampleTransactions("2017-01-01", "2017-01-03", { everyHours: 24, random: () => 0.75 });
  assert.equal(txs.length, 3);
  assert.deepEqual(txs[0], {
    date: "2017-01-01",
    amount: 50,
    description: "0xc0000",
    category: "thieving",
    comment: "0xc000000000"
  });
});

test("custom categories and bad spacing", () => {
  const txs = buildSampleTransactions("2017-01-01", "2017-01-01", {
    random: () => 0.1,
    expenseCategories: ["rent"]
  });
  assert.deepEqual(
    txs.map((t) => [t.amount, t.category]),
    [[-80, "rent"]]
  );
  assert.throws(() => buildSampleTransactions("2017-01-01", "2017-01-02", { everyHours: 0 }), /positive/);
});
