#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";

import { buildChart } from "./chart.js";
import { FrequencyError, LedgerSchemaError, MissingCategoryError, OptionsError, formatIssue } from "./errors.js";
import { writeSummaryCsv, writeTransactionsCsv } from "./export.js";
import { categoryNote, renderSummary } from "./format.js";
import { readRowsFromCsv, writeJson } from "./io.js";
import { readLedger, writeTransactionsFile } from "./ledger.js";
import {
  ChartCliSchema,
  ExportCliSchema,
  RepeatCliSchema,
  SampleCliSchema,
  SummarizeCliSchema,
  parseOptions,
  toSummarizeOptions
} from "./options.js";
import { insertRepeating } from "./repeating.js";
import { buildSampleTransactions } from "./sample.js";
import { LEDGER_COLUMNS } from "./schema.js";
import { summarize } from "./summarize.js";
import { validateRows } from "./validate.js";

type RawOptions = Record<string, unknown>;

const program = new Command();

program
  .name("ledgerroll")
  .description("Summarize a ledger of transactions by period and category.")
  .version("0.1.0");

const withSummaryOptions = (cmd: Command) =>
  cmd
    .option("--freq <freq>", "Period frequency: D|W|W-MON|MS|QS|YS (optionally 2W, 3MS...), or daily|weekly|monthly...")
    .option("--start <date>", "First date to include (YYYY-MM-DD)")
    .option("--end <date>", "Last date to include (YYYY-MM-DD)")
    .option("--decimals <n>", "Round every value to this many decimals (0-15)")
    .option("--budget <amount>", "Spending budget per --budget-freq, scaled to each period")
    .option("--budget-freq <freq>", "Frequency the budget amount applies to, e.g. MS or W");

program
  .command("ingest")
  .description("Validate a CSV ledger and write it as normalized JSON.")
  .argument("<input>", "Input CSV path")
  .option("-o, --out <path>", "Output JSON path", "./out/ledger.json")
  .action(async (input: string, opts: { out: string }) => {
    const transactions = await readLedger(input);
    const file = await writeTransactionsFile(opts.out, transactions);
    console.log(chalk.green(`OK: wrote ${file.transactions.length} transactions -> ${opts.out}`));
  });

program
  .command("validate")
  .description("Check a CSV ledger against the column schema and list every problem.")
  .argument("<input>", "Input CSV path")
  .action(async (input: string) => {
    const { headers, rows } = await readRowsFromCsv(input);
    const result = validateRows(rows, headers);
    if (!result.ok) {
      console.error(chalk.red(`${input}: ${result.issues.length} problem(s)`));
      for (const issue of result.issues) console.error(chalk.red(formatIssue(issue)));
      process.exitCode = 1;
      return;
    }
    console.log(
      chalk.green(`OK: ${result.transactions.length} transactions, columns: ${result.columns.join(", ")}`)
    );
  });

withSummaryOptions(
  program
    .command("summarize")
    .description("Summarize a ledger (CSV or JSON) overall, by period and by category.")
    .argument("<input>", "Input ledger (.csv or .json)")
)
  .option("--currency <label>", "Currency label for printed amounts")
  .option("--locale <locale>", "Locale for printed numbers", "en-US")
  .option("-o, --out <path>", "Write the summary as JSON instead of printing tables")
  .action(async (input: string, raw: RawOptions) => {
    const opts = parseOptions(SummarizeCliSchema, raw);
    const transactions = await readLedger(input);
    const bundle = summarize(transactions, toSummarizeOptions(opts));

    if (opts.out) {
      await writeJson(opts.out, bundle);
      console.log(chalk.green(`OK: wrote summary of ${transactions.length} transactions -> ${opts.out}`));
    } else {
      for (const section of renderSummary(bundle, opts)) {
        console.log(chalk.bold(section.title));
        console.log(section.table + "\n");
      }
    }

    const note = categoryNote(bundle);
    if (note) console.log(chalk.yellow(note));
  });

withSummaryOptions(
  program
    .command("export-csv")
    .description("Write the four summary views as CSV files (pandas/streamlit friendly).")
    .argument("<input>", "Input ledger (.csv or .json)")
)
  .option("-d, --dir <path>", "Output directory", "./out/summary")
  .action(async (input: string, raw: RawOptions) => {
    const opts = parseOptions(ExportCliSchema, raw);
    const transactions = await readLedger(input);
    const bundle = summarize(transactions, toSummarizeOptions(opts));
    const written = await writeSummaryCsv(opts.dir, bundle);
    console.log(chalk.green(`OK: wrote ${written.length} files -> ${opts.dir}`));
  });

withSummaryOptions(
  program
    .command("chart")
    .description("Write a Highcharts-style chart description of the summary as JSON.")
    .argument("<input>", "Input ledger (.csv or .json)")
)
  .option("--view <view>", "period|category", "period")
  .option("--currency <label>", "Currency label for the y-axis")
  .option("--title <text>", "Chart title")
  .option("--width <px>", "Chart width")
  .option("--height <px>", "Chart height")
  .option("-o, --out <path>", "Output JSON path", "./out/chart.json")
  .action(async (input: string, raw: RawOptions) => {
    const opts = parseOptions(ChartCliSchema, raw);
    const transactions = await readLedger(input);
    const bundle = summarize(transactions, toSummarizeOptions(opts));
    const chart = buildChart(bundle, opts);
    await writeJson(opts.out, chart);
    console.log(chalk.green(`OK: wrote chart with ${chart.series.length} series -> ${opts.out}`));

    if (opts.view === "category" && bundle.byCategory.length === 0) {
      console.log(chalk.yellow("Note: the ledger has no categories; drew the period view instead."));
    }
  });

program
  .command("repeat")
  .description("Insert a repeating transaction into a ledger and write the result as JSON.")
  .argument("<input>", "Input ledger (.csv or .json)")
  .requiredOption("--amount <n>", "Amount of each occurrence (income +, expense -)")
  .requiredOption("--freq <freq>", "How often it repeats, e.g. MS or W")
  .option("--description <text>", "Description")
  .option("--category <label>", "Category")
  .option("--comment <text>", "Comment")
  .option("--start <date>", "First date (defaults to the first ledger date)")
  .option("--end <date>", "Last date (defaults to the last ledger date)")
  .option("-o, --out <path>", "Output JSON path", "./out/ledger.json")
  .action(async (input: string, raw: RawOptions) => {
    const opts = parseOptions(RepeatCliSchema, raw);
    const before = await readLedger(input);
    const after = insertRepeating(before, {
      amount: opts.amount,
      freq: opts.freq,
      description: opts.description,
      category: opts.category,
      comment: opts.comment,
      startDate: opts.start,
      endDate: opts.end
    });
    await writeTransactionsFile(opts.out, after);
    console.log(chalk.green(`OK: added ${after.length - before.length} transactions -> ${opts.out}`));
  });

program
  .command("sample")
  .description("Generate a sample CSV ledger between two dates.")
  .argument("<start>", "First date (YYYY-MM-DD)")
  .argument("<end>", "Last date (YYYY-MM-DD)")
  .option("--every-hours <n>", "Hours between transactions", "12")
  .option("--income-categories <list>", "Comma-separated income categories")
  .option("--expense-categories <list>", "Comma-separated expense categories")
  .option("-o, --out <path>", "Output CSV path", "./out/sample.csv")
  .action(async (start: string, end: string, raw: RawOptions) => {
    const opts = parseOptions(SampleCliSchema, { ...raw, start, end });
    const transactions = buildSampleTransactions(opts.start, opts.end, {
      everyHours: opts.everyHours,
      incomeCategories: opts.incomeCategories,
      expenseCategories: opts.expenseCategories
    });
    await writeTransactionsCsv(opts.out, transactions);
    console.log(chalk.green(`OK: wrote ${transactions.length} rows -> ${opts.out}`));
  });

program
  .command("schema")
  .description("Print the ledger columns.")
  .action(() => {
    console.log(
      [
        "A ledger is a CSV with a header row (names matched case-insensitively; others ignored):",
        ...LEDGER_COLUMNS.map((c) => `- ${c.name}${c.required ? "" : "?"}: ${c.type}; ${c.description}`)
      ].join("\n")
    );
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const known =
    err instanceof LedgerSchemaError ||
    err instanceof OptionsError ||
    err instanceof FrequencyError ||
    err instanceof MissingCategoryError;
  console.error(chalk.red(err instanceof Error ? (known ? err.message : err.stack ?? err.message) : String(err)));
  process.exitCode = 1;
});
