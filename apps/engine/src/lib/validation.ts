/**
 * Input validation for Trial Balance and GL data.
 *
 * Every check returns ValidationIssues instead of throwing; whether a
 * Critical issue blocks generation is the pipeline's decision (strict mode).
 * Only balancing failures are Critical. Per-row problems are Warnings, since
 * such rows still classify by name or fall to unclassified.
 */

import Decimal from "decimal.js";

import { DEFAULT_ENGINE_CONFIG, type BalanceTolerance } from "./config";
import { formatWithSeparators, maxAmount, sumAmounts } from "./currency";
import { fiscalYearOf, formatDateInput } from "./date";
import type { AutoFix, ClassifiedRecord, DatasetMode, FsliCategory, LedgerRecord, ValidationIssue } from "./types";

const MAX_AFFECTED_ROWS = 100;
const MAX_ACCOUNT_NUMBER = 99999;
const UNCLASSIFIED_ACCOUNT_NUMBER = 9999;
const MIN_TRANSACTION_ID_COVERAGE = 0.5;
const OUTLIER_STD_DEVIATIONS = 3;

const REQUIRED_CATEGORIES: Record<DatasetMode, readonly FsliCategory[]> = {
  snapshot: ["cash", "accounts_payable", "common_stock"],
  activity: ["revenue", "cogs"],
};

type IssueInput = Omit<ValidationIssue, "autoFix" | "affectedRows" | "totalAffected"> &
  Partial<Pick<ValidationIssue, "autoFix" | "totalAffected">> & { rows?: number[] };

function issue({ rows = [], autoFix = null, totalAffected, ...rest }: IssueInput): ValidationIssue {
  return {
    ...rest,
    autoFix,
    affectedRows: rows.slice(0, MAX_AFFECTED_ROWS),
    totalAffected: totalAffected ?? rows.length,
  };
}

export function hasCriticalIssues(issues: readonly ValidationIssue[]): boolean {
  return issues.some((item) => item.severity === "Critical");
}

interface BalanceTotals {
  debit: Decimal;
  credit: Decimal;
}

function totalsOf(records: readonly LedgerRecord[]): BalanceTotals {
  return {
    debit: sumAmounts(records.map((record) => record.debit)),
    credit: sumAmounts(records.map((record) => record.credit)),
  };
}

/** Tolerance is the larger of the absolute floor and a share of the larger side. */
export function isBalanced({ debit, credit }: BalanceTotals, tolerance: BalanceTolerance): boolean {
  const allowed = Decimal.max(tolerance.absolute, maxAmount(debit, credit).times(tolerance.relative));
  return debit.minus(credit).abs().lessThanOrEqualTo(allowed);
}

function groupBy<K>(records: readonly LedgerRecord[], keyOf: (record: LedgerRecord) => K | null): Map<K, LedgerRecord[]> {
  const groups = new Map<K, LedgerRecord[]>();
  for (const record of records) {
    const key = keyOf(record);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }
  return groups;
}

function overallImbalance(
  records: readonly LedgerRecord[],
  tolerance: BalanceTolerance
): { totals: BalanceTotals; difference: Decimal } | null {
  const totals = totalsOf(records);
  if (isBalanced(totals, tolerance)) return null;
  return { totals, difference: totals.debit.minus(totals.credit).abs() };
}

function totalsImpact({ debit, credit }: BalanceTotals): string {
  return `Total Debits: $${formatWithSeparators(debit)} ≠ Total Credits: $${formatWithSeparators(credit)}`;
}

/** Each snapshot date must balance, and so must the file as a whole. */
export function validateTrialBalance(
  records: readonly LedgerRecord[],
  tolerance: BalanceTolerance = DEFAULT_ENGINE_CONFIG.balanceTolerance
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const byDate = groupBy(records, (record) => (record.txnDate ? formatDateInput(record.txnDate) : null));
  const unbalanced = [...byDate.entries()]
    .filter(([, group]) => !isBalanced(totalsOf(group), tolerance))
    .map(([date]) => date)
    .sort();

  if (unbalanced.length > 0) {
    issues.push(
      issue({
        severity: "Critical",
        category: "Trial Balance",
        issue: `TB does not balance for ${unbalanced.length} period(s)`,
        impact: "Financial statements will be inaccurate",
        suggestion: "Review source data for these periods",
        totalAffected: unbalanced.length,
        detail: `Periods out of balance: ${unbalanced.join(", ")}`,
      })
    );
  }

  const overall = overallImbalance(records, tolerance);
  if (overall) {
    issues.push(
      issue({
        severity: "Critical",
        category: "Trial Balance",
        issue: `Overall TB out of balance by $${formatWithSeparators(overall.difference)}`,
        impact: totalsImpact(overall.totals),
        suggestion: "Review all entries",
        totalAffected: 0,
      })
    );
  }

  return issues;
}

/**
 * GL balancing. Transactions are balanced one by one when at least half the
 * rows carry a TransactionID; otherwise only file totals are checked, and an
 * overall imbalance is then Critical rather than a Warning.
 */
export function validateGlActivity(
  records: readonly LedgerRecord[],
  tolerance: BalanceTolerance = DEFAULT_ENGINE_CONFIG.balanceTolerance
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  let byTransaction = records.some((record) => record.transactionId !== undefined);

  if (byTransaction) {
    const populated = records.filter((record) => record.transactionId != null).length;
    const coverage = records.length > 0 ? populated / records.length : 0;
    if (coverage < MIN_TRANSACTION_ID_COVERAGE) {
      issues.push(
        issue({
          severity: "Warning",
          category: "Data Quality",
          issue: `TransactionID column exists but only ${Math.round(coverage * 100)}% populated`,
          impact: "Transaction-level balancing unavailable",
          suggestion: "Using total-file balancing only",
        })
      );
      byTransaction = false;
    }
  } else {
    issues.push(
      issue({
        severity: "Info",
        category: "Data Quality",
        issue: "TransactionID column not found",
        impact: "Transaction-level balancing unavailable",
        suggestion: "Using total-file balancing only (weaker validation)",
      })
    );
  }

  if (byTransaction) {
    const byId = groupBy(records, (record) => record.transactionId ?? null);
    const unbalanced = [...byId.entries()].filter(([, group]) => !isBalanced(totalsOf(group), tolerance));
    if (unbalanced.length > 0) {
      issues.push(
        issue({
          severity: "Critical",
          category: "Transaction Balance",
          issue: `${unbalanced.length} transaction(s) do not balance`,
          impact: "Debits ≠ Credits for these transactions",
          suggestion: "Review and correct these transactions",
          totalAffected: unbalanced.length,
          detail: `Unbalanced transactions: ${unbalanced
            .slice(0, 20)
            .map(([id]) => id)
            .join(", ")}`,
        })
      );
    }
  }

  const overall = overallImbalance(records, tolerance);
  if (overall) {
    issues.push(
      issue({
        severity: byTransaction ? "Warning" : "Critical",
        category: "Overall Balance",
        issue: `Overall GL out of balance by $${formatWithSeparators(overall.difference)}`,
        impact: totalsImpact(overall.totals),
        suggestion: "Review all entries",
        totalAffected: 0,
      })
    );
  }

  return issues;
}

function rowsWhere(records: readonly LedgerRecord[], predicate: (record: LedgerRecord) => boolean): number[] {
  const rows: number[] = [];
  records.forEach((record, index) => {
    if (predicate(record)) rows.push(index);
  });
  return rows;
}

function isInvalidAccountNumber(accountNumber: number | null): boolean {
  return accountNumber !== null && (accountNumber < 0 || accountNumber > MAX_ACCOUNT_NUMBER);
}

/** Debits more than three sample standard deviations above the mean absolute debit. */
function outlierRows(records: readonly LedgerRecord[]): number[] {
  if (records.length < 2) return [];
  const amounts = records.map((record) => record.debit.abs());
  const mean = sumAmounts(amounts).div(amounts.length);
  const variance = sumAmounts(amounts.map((amount) => amount.minus(mean).pow(2))).div(amounts.length - 1);
  const threshold = mean.plus(variance.sqrt().times(OUTLIER_STD_DEVIATIONS));
  return rowsWhere(records, (record) => record.debit.abs().greaterThan(threshold));
}

/**
 * Lines of one posting share a TransactionID, so only a line whose ID, date,
 * account and amounts all repeat counts as a duplicate. Rows without an ID
 * are never compared.
 */
function duplicateKey(record: LedgerRecord): string | null {
  if (record.transactionId == null) return null;
  return [
    record.transactionId,
    record.txnDate?.getTime() ?? "",
    record.accountNumber ?? "",
    record.accountName,
    record.debit.toString(),
    record.credit.toString(),
  ].join("|");
}

/** Every occurrence of a repeated line, plus how many of them are surplus copies. */
function duplicateRows(records: readonly LedgerRecord[]): { rows: number[]; surplus: number } {
  const counts = new Map<string, number>();
  for (const record of records) {
    const key = duplicateKey(record);
    if (key !== null) counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const rows = rowsWhere(records, (record) => {
    const key = duplicateKey(record);
    return key !== null && (counts.get(key) ?? 0) > 1;
  });
  const groups = [...counts.values()].filter((count) => count > 1).length;
  return { rows, surplus: rows.length - groups };
}

export function validateCommonIssues(records: readonly LedgerRecord[], now: Date = new Date()): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const missingDates = rowsWhere(records, (record) => record.txnDate === null);
  if (missingDates.length > 0) {
    issues.push(
      issue({
        severity: "Warning",
        category: "Missing Data",
        issue: `${missingDates.length} transactions missing dates`,
        impact: "Cannot determine period",
        suggestion: `Remove ${missingDates.length} rows`,
        autoFix: "remove_missing_dates",
        rows: missingDates,
      })
    );
  }

  const missingAccounts = rowsWhere(records, (record) => record.accountNumber === null);
  if (missingAccounts.length > 0) {
    issues.push(
      issue({
        severity: "Warning",
        category: "Missing Data",
        issue: `${missingAccounts.length} transactions without account numbers`,
        impact: "Classified by account name only",
        suggestion: `Map to Unclassified (${UNCLASSIFIED_ACCOUNT_NUMBER})`,
        autoFix: "map_unclassified",
        rows: missingAccounts,
      })
    );
  }

  const invalidAccounts = rowsWhere(records, (record) => isInvalidAccountNumber(record.accountNumber));
  if (invalidAccounts.length > 0) {
    issues.push(
      issue({
        severity: "Warning",
        category: "Data Quality",
        issue: `${invalidAccounts.length} invalid account numbers`,
        impact: "Mapping errors",
        suggestion: "Convert negative to positive",
        autoFix: "fix_account_numbers",
        rows: invalidAccounts,
      })
    );
  }

  const duplicates = duplicateRows(records);
  if (duplicates.rows.length > 0) {
    issues.push(
      issue({
        severity: "Warning",
        category: "Duplicates",
        issue: `${duplicates.rows.length} duplicate transaction lines`,
        impact: "May inflate amounts",
        suggestion: `Remove ${duplicates.surplus} duplicates`,
        autoFix: "remove_duplicates",
        rows: duplicates.rows,
      })
    );
  }

  const futureDates = rowsWhere(records, (record) => record.txnDate !== null && record.txnDate.getTime() > now.getTime());
  if (futureDates.length > 0) {
    issues.push(
      issue({
        severity: "Warning",
        category: "Data Quality",
        issue: `${futureDates.length} future-dated transactions`,
        impact: "May affect current period",
        suggestion: `Remove ${futureDates.length} rows`,
        autoFix: "remove_future_dates",
        rows: futureDates,
      })
    );
  }

  const outliers = outlierRows(records);
  if (outliers.length > 0) {
    issues.push(
      issue({
        severity: "Info",
        category: "Outliers",
        issue: `${outliers.length} potential outlier transactions`,
        impact: "Unusual amounts detected",
        suggestion: "Review for accuracy",
        rows: outliers,
      })
    );
  }

  return issues;
}

/** A TB should carry cash, payables and common stock; a GL should carry revenue and COGS. */
export function validateRequiredCategories(
  records: readonly ClassifiedRecord[],
  mode: DatasetMode
): ValidationIssue[] {
  const present = new Set(records.map((record) => record.category));
  const missing = REQUIRED_CATEGORIES[mode].filter((category) => !present.has(category));
  if (missing.length === 0) return [];

  const source = mode === "snapshot" ? "Trial Balance" : "GL Activity";
  return [
    issue({
      severity: "Warning",
      category: "Account Mapping",
      issue: `${source} has no accounts mapped to: ${missing.join(", ")}`,
      impact: "Related statement lines will be zero",
      suggestion: "Check account names and numbers, or supply custom account ranges",
    }),
  ];
}

function datedYears(records: readonly LedgerRecord[]): Set<number> {
  const years = new Set<number>();
  for (const record of records) {
    if (record.txnDate) years.add(fiscalYearOf(record.txnDate));
  }
  return years;
}

/**
 * A merged run needs the TB snapshot for the year before the first statement
 * year. Single-source runs do not, so nothing is reported without both.
 */
export function validateOpeningSnapshot(
  tbRecords: readonly LedgerRecord[],
  glRecords: readonly LedgerRecord[],
  statementYearCount: number = DEFAULT_ENGINE_CONFIG.statementYearCount,
  strict: boolean = DEFAULT_ENGINE_CONFIG.strictMode
): ValidationIssue[] {
  if (tbRecords.length === 0 || glRecords.length === 0) return [];

  const tbYears = datedYears(tbRecords);
  const allYears = [...new Set([...tbYears, ...datedYears(glRecords)])].sort((a, b) => a - b);
  if (allYears.length === 0) return [];

  const firstStatementYear = allYears.slice(-statementYearCount)[0];
  const year0 = firstStatementYear - 1;
  if (tbYears.has(year0)) return [];

  return [
    issue({
      severity: strict ? "Critical" : "Warning",
      category: "Opening Balance",
      issue: `Trial Balance has no ${year0} year-end snapshot`,
      impact: `Opening balances for ${firstStatementYear} cannot be established`,
      suggestion: `Add a TB snapshot dated ${year0}-12-31 (or the latest date in ${year0})`,
    }),
  ];
}

export interface AutoFixResult {
  records: LedgerRecord[];
  changes: string[];
}

/** Applies the selected fixes in a fixed order and returns a change log. */
export function applyAutoFixes(
  records: readonly LedgerRecord[],
  fixes: readonly AutoFix[],
  now: Date = new Date()
): AutoFixResult {
  const selected = new Set(fixes);
  const changes: string[] = [];
  let fixed = records.map((record) => ({ ...record }));

  if (selected.has("remove_missing_dates")) {
    const before = fixed.length;
    fixed = fixed.filter((record) => record.txnDate !== null);
    const removed = before - fixed.length;
    if (removed > 0) changes.push(`Removed ${removed} rows with missing dates`);
  }

  if (selected.has("map_unclassified")) {
    const missing = fixed.filter((record) => record.accountNumber === null);
    for (const record of missing) record.accountNumber = UNCLASSIFIED_ACCOUNT_NUMBER;
    if (missing.length > 0) {
      changes.push(`Mapped ${missing.length} entries to Unclassified (${UNCLASSIFIED_ACCOUNT_NUMBER})`);
    }
  }

  if (selected.has("fix_account_numbers")) {
    const invalid = fixed.filter((record) => isInvalidAccountNumber(record.accountNumber));
    for (const record of invalid) {
      if (record.accountNumber !== null && record.accountNumber < 0) {
        record.accountNumber = Math.abs(record.accountNumber);
      }
    }
    if (invalid.length > 0) changes.push(`Fixed ${invalid.length} invalid account numbers`);
  }

  if (selected.has("remove_duplicates")) {
    const seen = new Set<string>();
    const before = fixed.length;
    fixed = fixed.filter((record) => {
      const key = duplicateKey(record);
      if (key === null) return true;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
    const removed = before - fixed.length;
    if (removed > 0) changes.push(`Removed ${removed} duplicate transactions`);
  }

  if (selected.has("remove_future_dates")) {
    const before = fixed.length;
    fixed = fixed.filter((record) => record.txnDate === null || record.txnDate.getTime() <= now.getTime());
    const removed = before - fixed.length;
    if (removed > 0) changes.push(`Removed ${removed} future-dated transactions`);
  }

  return { records: fixed, changes };
}
