import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import { FrequencyError } from "./errors.js";

dayjs.extend(utc);

const ISO = "YYYY-MM-DD";

export type FrequencyUnit = "day" | "week" | "month" | "quarter" | "year";

export type Frequency = {
  unit: FrequencyUnit;
  /** Number of units per period (e.g. 2 for fortnightly). */
  step: number;
  /** Day a week starts on, 0 = Sunday. Ignored for other units. */
  weekStart: number;
};

export type Elapsed = {
  days: number;
  weeks: number;
  months: number;
  years: number;
};

const WEEKDAYS = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"];

const WORDS: Record<string, FrequencyUnit> = {
  day: "day",
  daily: "day",
  week: "week",
  weekly: "week",
  month: "month",
  monthly: "month",
  quarter: "quarter",
  quarterly: "quarter",
  year: "year",
  yearly: "year",
  annual: "year"
};

const CODES: Record<string, FrequencyUnit> = {
  D: "day",
  W: "week",
  MS: "month",
  QS: "quarter",
  YS: "year",
  AS: "year"
};

/**
 * Parse a frequency such as `MS`, `2W`, `W-MON` or `monthly`.
 * All frequencies are labelled by the start of their period; a bare `W` starts weeks on Sunday.
 */
export function parseFrequency(text: string): Frequency {
  const s = text.trim();

  const word = WORDS[s.toLowerCase()];
  if (word) return { unit: word, step: 1, weekStart: 0 };

  const m = s.toUpperCase().match(/^(\d+)?(D|W|MS|QS|YS|AS)(?:-(SUN|MON|TUE|WED|THU|FRI|SAT))?$/);
  if (!m) throw new FrequencyError(text);

  const unit = CODES[m[2]];
  const step = m[1] ? Number(m[1]) : 1;
  if (step < 1) throw new FrequencyError(text);
  if (m[3] && unit !== "week") throw new FrequencyError(text);

  return { unit, step, weekStart: m[3] ? WEEKDAYS.indexOf(m[3]) : 0 };
}

export function formatFrequency(freq: Frequency): string {
  const code = { day: "D", week: "W", month: "MS", quarter: "QS", year: "YS" }[freq.unit];
  const anchor = freq.unit === "week" && freq.weekStart !== 0 ? `-${WEEKDAYS[freq.weekStart]}` : "";
  return `${freq.step > 1 ? freq.step : ""}${code}${anchor}`;
}

export function isCalendarDate(date: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return false;
  const d = dayjs.utc(date);
  return d.isValid() && d.format(ISO) === date;
}

export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, "day").format(ISO);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function diffDays(from: string, to: string): number {
  return dayjs.utc(to).diff(dayjs.utc(from), "day");
}

function alignStart(d: dayjs.Dayjs, freq: Frequency): dayjs.Dayjs {
  switch (freq.unit) {
    case "day":
      return d.startOf("day");
    case "week":
      return d.startOf("day").subtract((d.day() - freq.weekStart + 7) % 7, "day");
    case "month":
      return d.startOf("month");
    case "quarter":
      return d.subtract(d.month() % 3, "month").startOf("month");
    case "year":
      return d.startOf("year");
  }
}

function addUnits(d: dayjs.Dayjs, n: number, unit: FrequencyUnit): dayjs.Dayjs {
  switch (unit) {
    case "day":
      return d.add(n, "day");
    case "week":
      return d.add(7 * n, "day");
    case "month":
      return d.add(n, "month");
    case "quarter":
      return d.add(3 * n, "month");
    case "year":
      return d.add(n, "year");
  }
}

// Both arguments must already be aligned to `unit`.
function unitsBetween(a: dayjs.Dayjs, b: dayjs.Dayjs, unit: FrequencyUnit): number {
  const months = (b.year() - a.year()) * 12 + (b.month() - a.month());
  switch (unit) {
    case "day":
      return b.diff(a, "day");
    case "week":
      return b.diff(a, "day") / 7;
    case "month":
      return months;
    case "quarter":
      return months / 3;
    case "year":
      return b.year() - a.year();
  }
}

/** Calendar-aligned start of the unit containing `date`. */
export function periodStart(date: string, freq: Frequency): string {
  return alignStart(dayjs.utc(date), freq).format(ISO);
}

/**
 * Returns a function mapping a date to the start of its period, left-closed/right-open.
 * Multi-unit periods (`2W`, `3MS`) are counted from the aligned start of `origin`.
 * Without a frequency every date belongs to the single period starting at `origin`.
 */
export function periodGrouper(freq: Frequency | undefined, origin: string): (date: string) => string {
  if (!freq) return () => origin;

  const base = alignStart(dayjs.utc(origin), freq);

  return (date) => {
    const start = alignStart(dayjs.utc(date), freq);
    const index = Math.floor(unitsBetween(base, start, freq.unit) / freq.step);
    return addUnits(base, index * freq.step, freq.unit).format(ISO);
  };
}

/** Boundaries of `freq` that fall inside `[start, end]`, starting at the first one on or after `start`. */
export function dateRange(start: string, end: string, freq: Frequency): string[] {
  const last = dayjs.utc(end);
  const first = dayjs.utc(start);

  let cur = alignStart(first, freq);
  if (cur.isBefore(first)) cur = addUnits(cur, 1, freq.unit);

  const out: string[] = [];
  while (!cur.isAfter(last)) {
    out.push(cur.format(ISO));
    cur = addUnits(cur, freq.step, freq.unit);
  }
  return out;
}

/**
 * Length in days of the period starting at `date`: the gap between the first two boundaries
 * of a sequence anchored at `date`. For `MS` and `2017-01-15` that is February (28 days).
 */
export function periodDuration(date: string, freq: Frequency): number {
  const d = dayjs.utc(date);
  let first = alignStart(d, freq);
  if (first.isBefore(d)) first = addUnits(first, 1, freq.unit);
  const second = addUnits(first, freq.step, freq.unit);
  return second.diff(first, "day");
}

/** Gap-free list of period starts covering `[first, last]`. */
export function periodStarts(first: string, last: string, freq: Frequency | undefined): string[] {
  if (!freq) return [first];

  const grouper = periodGrouper(freq, first);
  const end = dayjs.utc(last);

  const out: string[] = [];
  let cur = dayjs.utc(grouper(first));
  while (!cur.isAfter(end)) {
    out.push(cur.format(ISO));
    cur = addUnits(cur, freq.step, freq.unit);
  }
  return out;
}

/** Inclusive elapsed time between two dates, using fixed ratios for weeks, months and years. */
export function elapsed(start: string, end: string): Elapsed {
  const days = diffDays(start, end) + 1;
  return {
    days,
    weeks: days / 7,
    months: days / (365 / 12),
    years: days / 365
  };
}
