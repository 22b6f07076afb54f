export * from "./schema.js";
export * from "./errors.js";
export * from "./calendar.js";
export * from "./validate.js";
export * from "./aggregate.js";
export * from "./summarize.js";
export * from "./repeating.js";
export * from "./sample.js";
export * from "./colors.js";
export * from "./chart.js";
export * from "./format.js";
export { dedupeTransactions } from "./dedupe.js";
export { summaryTables, toCsv, transactionsToCsv } from "./export.js";
export { parseTransactionsFile, buildTransactionsFile } from "./ledger.js";
