import { z } from "zod";
import { parseFrequency } from "./calendar.js";
import { OptionsError } from "./errors.js";
import { MAX_DECIMALS, SummarizeOptions } from "./summarize.js";
import { normalizeDate } from "./validate.js";

/** CLI dates accept the same spellings as ledger dates and come out as YYYY-MM-DD. */
const DateOption = z.string().transform((s, ctx) => {
  const date = normalizeDate(s);
  if (date === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date: ${s}` });
    return z.NEVER;
  }
  return date;
});

const FrequencyOption = z.string().transform((s, ctx) => {
  try {
    return parseFrequency(s);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

const ListOption = z
  .string()
  .transform((s) =>
    s
      .split(",")
      .map((x) => x.trim().toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.string()).min(1));

const FormatFields = {
  currency: z.string().min(1).optional(),
  locale: z.string().min(1).optional()
};

const SummaryFields = {
  freq: FrequencyOption.optional(),
  start: DateOption.optional(),
  end: DateOption.optional(),
  decimals: z.coerce.number().int().min(0).max(MAX_DECIMALS).optional(),
  budget: z.coerce.number().finite().positive().optional(),
  budgetFreq: FrequencyOption.optional()
};

function orderedRange(o: { start?: string; end?: string }): boolean {
  return o.start === undefined || o.end === undefined || o.start <= o.end;
}

const RANGE_MESSAGE = { message: "--start must not be after --end", path: ["start"] };

function pairedBudget(o: { budget?: number; budgetFreq?: unknown }): boolean {
  return (o.budget === undefined) === (o.budgetFreq === undefined);
}

const BUDGET_MESSAGE = { message: "--budget and --budget-freq must be given together", path: ["budget"] };

export const SummarizeCliSchema = z
  .object({ ...SummaryFields, ...FormatFields, out: z.string().optional() })
  .refine(orderedRange, RANGE_MESSAGE)
  .refine(pairedBudget, BUDGET_MESSAGE);

export const ExportCliSchema = z
  .object({ ...SummaryFields, dir: z.string().min(1) })
  .refine(orderedRange, RANGE_MESSAGE)
  .refine(pairedBudget, BUDGET_MESSAGE);

export const ChartCliSchema = z
  .object({
    ...SummaryFields,
    currency: FormatFields.currency,
    view: z.enum(["period", "category"]).default("period"),
    title: z.string().optional(),
    width: z.coerce.number().int().positive().optional(),
    height: z.coerce.number().int().positive().optional(),
    out: z.string().min(1)
  })
  .refine(orderedRange, RANGE_MESSAGE)
  .refine(pairedBudget, BUDGET_MESSAGE);

export const RepeatCliSchema = z
  .object({
    amount: z.coerce.number().finite(),
    freq: FrequencyOption,
    description: z.string().optional(),
    category: z.string().optional(),
    comment: z.string().optional(),
    start: DateOption.optional(),
    end: DateOption.optional(),
    out: z.string().min(1)
  })
  .refine(orderedRange, RANGE_MESSAGE);

export const SampleCliSchema = z
  .object({
    start: DateOption,
    end: DateOption,
    everyHours: z.coerce.number().positive().default(12),
    incomeCategories: ListOption.optional(),
    expenseCategories: ListOption.optional(),
    out: z.string().min(1)
  })
  .refine(orderedRange, RANGE_MESSAGE);

export type SummarizeCliOptions = z.infer<typeof SummarizeCliSchema>;
export type ExportCliOptions = z.infer<typeof ExportCliSchema>;
export type ChartCliOptions = z.infer<typeof ChartCliSchema>;
export type RepeatCliOptions = z.infer<typeof RepeatCliSchema>;
export type SampleCliOptions = z.infer<typeof SampleCliSchema>;

/** Map the shared summary options of a command onto {@link SummarizeOptions}. */
export function toSummarizeOptions(opts: z.infer<z.ZodObject<typeof SummaryFields>>): SummarizeOptions {
  return {
    freq: opts.freq,
    startDate: opts.start,
    endDate: opts.end,
    decimals: opts.decimals,
    budget: opts.budget !== undefined && opts.budgetFreq ? { amount: opts.budget, freq: opts.budgetFreq } : undefined
  };
}

/** Validate raw commander options; throws {@link OptionsError} listing every problem. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new OptionsError(
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }
  return parsed.data;
}
