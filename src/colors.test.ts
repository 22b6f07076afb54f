import test from "node:test";
import assert from "node:assert/strict";
import { MAX_DISTINCT_COLORS, getColors } from "./colors.js";

test("getColors repeats the palette beyond six colours", () => {
  const colors = getColors("income", 300);
  assert.equal(colors.length, 300);
  assert.equal(new Set(colors).size, MAX_DISTINCT_COLORS);
});

test("getColors per column", () => {
  assert.deepEqual(getColors("expense", 2), ["#b30000", "#e34a33"]);
  assert.deepEqual(getColors("balance", 3), ["#555555", "#555555", "#555555"]);
  assert.deepEqual(getColors("income", 0), []);
  assert.deepEqual(getColors("budget", 2), ["#ffffff", "#ffffff"]);
});
