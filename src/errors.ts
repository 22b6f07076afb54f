export type LedgerIssue = {
  /** 1-based line in the source file (header is line 1). */
  row?: number;
  column?: string;
  message: string;
};

export class LedgerSchemaError extends Error {
  readonly issues: LedgerIssue[];

  constructor(issues: LedgerIssue[]) {
    super(`Ledger failed validation:\n${issues.map(formatIssue).join("\n")}`);
    this.name = "LedgerSchemaError";
    this.issues = issues;
  }
}

export class MissingCategoryError extends Error {
  constructor() {
    super("category column missing from transactions");
    this.name = "MissingCategoryError";
  }
}

export class FrequencyError extends Error {
  constructor(input: string) {
    super(`Unsupported frequency: ${input}`);
    this.name = "FrequencyError";
  }
}

export function formatIssue(issue: LedgerIssue): string {
  const where = [issue.row != null ? `row ${issue.row}` : "", issue.column ?? ""].filter(Boolean).join(" ");
  return where ? `- ${where}: ${issue.message}` : `- ${issue.message}`;
}

export class OptionsError extends Error {
  constructor(messages: string[]) {
    super(`Invalid options:\n${messages.map((m) => `- ${m}`).join("\n")}`);
    this.name = "OptionsError";
  }
}
