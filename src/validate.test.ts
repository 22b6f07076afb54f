import test from "node:test";
import assert from "node:assert/strict";
import { LedgerSchemaError } from "./errors.js";
import { findColumns, normalizeAmount, normalizeDate, parseTransactions, validateRows } from "./validate.js";

test("findColumns matches headers case-insensitively and ignores others", () => {
  assert.deepEqual(findColumns(["Amount", "DATE", "incomey"]), { amount: "Amount", date: "DATE" });
  assert.deepEqual(findColumns([" Category ", "comment"]), { category: " Category ", comment: "comment" });
});

test("validateRows coerces cells and sorts by date then amount", () => {
  const headers = [" Date ", "AMOUNT", "Category", "Notes"];
  const result = validateRows(
    [
      { " Date ": "2017/1/15", AMOUNT: "1,200.50", Category: " Food ", Notes: "x" },
      { " Date ": "2017-01-02", AMOUNT: "(40)", Category: "", Notes: "" }
    ],
    headers
  );

  if (!result.ok) return assert.fail(`unexpected issues: ${JSON.stringify(result.issues)}`);
  assert.deepEqual(result.transactions, [
    { date: "2017-01-02", amount: -40 },
    { date: "2017-01-15", amount: 1200.5, category: "food" }
  ]);
  assert.deepEqual(result.columns, ["date", "amount", "category"]);
});

test("validateRows reports missing required columns", () => {
  const result = validateRows([{ date: "2017-01-01" }]);
  if (result.ok) return assert.fail("expected validation to fail");
  assert.deepEqual(result.issues, [{ column: "amount", message: "required column 'amount' not found" }]);
});

test("validateRows lists every bad cell with its line", () => {
  const result = validateRows([
    { date: "2017-02-30", amount: "12" },
    { date: "2017-01-01", amount: "abc" }
  ]);
  if (result.ok) return assert.fail("expected validation to fail");
  assert.deepEqual(result.issues, [
    { row: 2, column: "date", message: 'unparseable date: "2017-02-30"' },
    { row: 3, column: "amount", message: 'non-numeric amount: "abc"' }
  ]);
});

test("parseTransactions throws a LedgerSchemaError", () => {
  assert.throws(
    () => parseTransactions([{ date: "", amount: "1" }]),
    (err: unknown) => err instanceof LedgerSchemaError && err.issues.length === 1 && err.issues[0].row === 2
  );
});

test("cell normalizers", () => {
  assert.equal(normalizeAmount(""), null);
  assert.equal(normalizeAmount(5), 5);
  assert.equal(normalizeAmount(" $ -3.25 "), -3.25);
  assert.equal(normalizeAmount(Number.NaN), null);
  assert.equal(normalizeAmount("1e3"), 1000);
  assert.equal(normalizeAmount(".5"), 0.5);
  assert.equal(normalizeAmount("+7."), 7);
  assert.equal(normalizeDate("2017-01-05T10:00:00"), "2017-01-05");
  assert.equal(normalizeDate("2017.3.9"), "2017-03-09");
  assert.equal(normalizeDate("05/01/2017"), null);
});

test("normalizeAmount rejects non-decimal number literals", () => {
  assert.equal(normalizeAmount("0x10"), null);
  assert.equal(normalizeAmount("0b11"), null);
  assert.equal(normalizeAmount("0o7"), null);
  assert.equal(normalizeAmount("Infinity"), null);
  assert.equal(normalizeAmount("1.2.3"), null);
});
