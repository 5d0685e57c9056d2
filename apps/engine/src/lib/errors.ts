import type { ValidationIssue } from "./types";

export type StatementsErrorCode =
  | "MISSING_OPENING_SNAPSHOT"
  | "MISSING_DATA_SOURCE"
  | "MISSING_COLUMNS"
  | "INVALID_TRANSACTION_DATE"
  | "VALIDATION_FAILED";

/**
 * Structural failure that stops the pipeline.
 * Reconciliation residuals are reported as values and never raise one of these.
 */
export class StatementsError extends Error {
  public readonly code: StatementsErrorCode;

  constructor(code: StatementsErrorCode, message: string) {
    super(message);
    this.name = "StatementsError";
    this.code = code;
  }
}

export class MissingOpeningSnapshotError extends StatementsError {
  public readonly year0: number;
  public readonly firstStatementYear: number;

  constructor(year0: number, firstStatementYear: number) {
    super(
      "MISSING_OPENING_SNAPSHOT",
      `Missing Year 0 opening snapshot in TB. Expected prior-year year-end (${year0}-12-31 or latest date in ${year0}) ` +
        `to support opening balances for first statement year ${firstStatementYear}.`
    );
    this.name = "MissingOpeningSnapshotError";
    this.year0 = year0;
    this.firstStatementYear = firstStatementYear;
  }
}

export class MissingDataSourceError extends StatementsError {
  constructor() {
    super("MISSING_DATA_SOURCE", "No Trial Balance or General Ledger data was provided");
    this.name = "MissingDataSourceError";
  }
}

export class MissingColumnsError extends StatementsError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super("MISSING_COLUMNS", `Required columns missing: ${missing.join(", ")}`);
    this.name = "MissingColumnsError";
    this.missing = missing;
  }
}

export class InvalidTransactionDateError extends StatementsError {
  public readonly rowIndex: number;

  constructor(rowIndex: number) {
    super("INVALID_TRANSACTION_DATE", `Row ${rowIndex} has a transaction date that could not be parsed`);
    this.name = "InvalidTransactionDateError";
    this.rowIndex = rowIndex;
  }
}

export class ValidationFailedError extends StatementsError {
  public readonly issues: ValidationIssue[];

  constructor(source: string, issues: ValidationIssue[]) {
    const critical = issues.filter((issue) => issue.severity === "Critical");
    super(
      "VALIDATION_FAILED",
      `${source} failed validation with ${critical.length} critical issue(s): ${critical
        .map((issue) => issue.issue)
        .join("; ")}`
    );
    this.name = "ValidationFailedError";
    this.issues = issues;
  }
}
