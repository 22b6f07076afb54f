import test from "node:test";
import assert from "node:assert/strict";
import {
  dateRange,
  diffDays,
  elapsed,
  formatFrequency,
  isCalendarDate,
  parseFrequency,
  periodDuration,
  periodGrouper,
  periodStart,
  periodStarts
} from "./calendar.js";
import { FrequencyError } from "./errors.js";

const MS = parseFrequency("MS");

test("parseFrequency reads codes, multipliers and week anchors", () => {
  assert.deepEqual(MS, { unit: "month", step: 1, weekStart: 0 });
  assert.deepEqual(parseFrequency("2W-MON"), { unit: "week", step: 2, weekStart: 1 });
  assert.deepEqual(parseFrequency("monthly"), { unit: "month", step: 1, weekStart: 0 });
  assert.equal(parseFrequency("AS").unit, "year");
  assert.equal(formatFrequency(parseFrequency("2w-mon")), "2W-MON");
  assert.equal(formatFrequency(parseFrequency("quarterly")), "QS");
});

test("parseFrequency rejects unknown codes", () => {
  for (const bad of ["5X", "MS-MON", "0D", ""]) {
    assert.throws(() => parseFrequency(bad), FrequencyError, bad);
  }
});

test("periodStart aligns to the calendar", () => {
  assert.equal(periodStart("2017-01-15", MS), "2017-01-01");
  assert.equal(periodStart("2017-05-20", parseFrequency("QS")), "2017-04-01");
  assert.equal(periodStart("2017-05-20", parseFrequency("YS")), "2017-01-01");
  // 2017-01-04 is a Wednesday.
  assert.equal(periodStart("2017-01-04", parseFrequency("W")), "2017-01-01");
  assert.equal(periodStart("2017-01-04", parseFrequency("W-MON")), "2017-01-02");
});

test("periodDuration follows variable month and year lengths", () => {
  assert.equal(periodDuration("2017-01-01", MS), 31);
  assert.equal(periodDuration("2017-01-15", MS), 28);
  assert.equal(periodDuration("2016-02-01", MS), 29);
  assert.equal(periodDuration("2016-01-01", parseFrequency("YS")), 366);
  assert.equal(periodDuration("2017-01-01", parseFrequency("D")), 1);
  assert.equal(periodDuration("2017-01-01", parseFrequency("W")), 7);
});

test("periodGrouper labels each date by its period start", () => {
  const monthly = periodGrouper(MS, "2017-01-15");
  assert.equal(monthly("2017-03-31"), "2017-03-01");
  assert.equal(monthly("2017-01-01"), "2017-01-01");

  const bimonthly = periodGrouper(parseFrequency("2MS"), "2017-01-15");
  assert.equal(bimonthly("2017-02-28"), "2017-01-01");
  assert.equal(bimonthly("2017-04-10"), "2017-03-01");
});

test("periodGrouper without a frequency collapses to one period", () => {
  const single = periodGrouper(undefined, "2017-01-01");
  assert.equal(single("2018-05-05"), "2017-01-01");
});

test("dateRange starts at the first boundary on or after start", () => {
  assert.deepEqual(dateRange("2017-01-15", "2017-04-10", MS), ["2017-02-01", "2017-03-01", "2017-04-01"]);
  assert.deepEqual(dateRange("2017-01-01", "2017-03-01", MS), ["2017-01-01", "2017-02-01", "2017-03-01"]);
});

test("periodStarts covers the range without gaps", () => {
  assert.deepEqual(periodStarts("2017-01-15", "2017-03-02", MS), ["2017-01-01", "2017-02-01", "2017-03-01"]);
  assert.deepEqual(periodStarts("2017-01-15", "2017-03-02", undefined), ["2017-01-15"]);
});

test("elapsed counts inclusive days and fixed-ratio units", () => {
  const e = elapsed("2017-01-01", "2017-12-31");
  assert.equal(e.days, 365);
  assert.equal(e.weeks, 365 / 7);
  assert.ok(Math.abs(e.months - 12) < 1e-9);
  assert.equal(e.years, 1);
});

test("date helpers", () => {
  assert.equal(isCalendarDate("2016-02-29"), true);
  assert.equal(isCalendarDate("2017-02-30"), false);
  assert.equal(isCalendarDate("2017-1-5"), false);
  assert.equal(diffDays("2017-01-01", "2017-03-01"), 59);
});
