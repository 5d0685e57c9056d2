/**
 * Statement aggregation.
 *
 * Turns classified ledger rows into one YearStatement per calendar year.
 * Trial Balance data is a snapshot: only the latest date in each year counts,
 * so monthly snapshots are not double-counted. GL data is activity: every row
 * in the year is summed.
 */

import Decimal from "decimal.js";

import { deriveSequentialCashFlows } from "./cashFlow";
import { sumAmounts } from "./currency";
import { fiscalYearOf } from "./date";
import { InvalidTransactionDateError } from "./errors";
import {
  type BalanceSheetKey,
  type ClassifiedRecord,
  type DatasetMode,
  type FsliCategory,
  type StatementSeries,
  type YearStatement,
} from "./types";

/**
 * What to do with rows whose date did not parse.
 * "drop" keeps aggregation total; "reject" throws on the first such row.
 */
export type InvalidDatePolicy = "drop" | "reject";

export interface AggregateOptions {
  invalidDates?: InvalidDatePolicy;
}

type SumMethod = "net" | "debit" | "credit";

interface DatedRecord {
  record: ClassifiedRecord;
  date: Date;
  year: number;
}

/** Credit-natured balances, presented as positive amounts. */
const ABSOLUTE_BALANCE_KEYS: readonly BalanceSheetKey[] = [
  "accumulated_depreciation",
  "accounts_payable",
  "accrued_payroll",
  "deferred_revenue",
  "interest_payable",
  "other_current_liabilities",
  "income_taxes_payable",
  "long_term_debt",
  "common_stock",
  "retained_earnings",
];

const NET_BALANCE_KEYS: readonly BalanceSheetKey[] = [
  "cash",
  "accounts_receivable",
  "inventory",
  "prepaid_expenses",
  "other_current_assets",
  "ppe_gross",
];

export function emptyYearStatement(): YearStatement {
  const zero = () => new Decimal(0);
  return {
    // Income statement
    revenue: zero(),
    cogs: zero(),
    distribution_expenses: zero(),
    marketing_admin: zero(),
    research_dev: zero(),
    depreciation_expense: zero(),
    interest_expense: zero(),
    tax_expense: zero(),
    net_income: zero(),
    gross_profit: zero(),
    total_opex: zero(),
    ebit: zero(),
    ebt: zero(),
    // Balance sheet
    cash: zero(),
    accounts_receivable: zero(),
    inventory: zero(),
    prepaid_expenses: zero(),
    other_current_assets: zero(),
    ppe_gross: zero(),
    accumulated_depreciation: zero(),
    accounts_payable: zero(),
    accrued_payroll: zero(),
    deferred_revenue: zero(),
    interest_payable: zero(),
    other_current_liabilities: zero(),
    income_taxes_payable: zero(),
    long_term_debt: zero(),
    common_stock: zero(),
    retained_earnings: zero(),
    // Cash flow drivers
    delta_ar: zero(),
    delta_inventory: zero(),
    delta_prepaid: zero(),
    delta_other_current_assets: zero(),
    delta_ap: zero(),
    delta_accrued_payroll: zero(),
    delta_deferred_revenue: zero(),
    delta_interest_payable: zero(),
    delta_other_current_liabilities: zero(),
    delta_income_taxes_payable: zero(),
    delta_debt: zero(),
    capex: zero(),
    stock_issuance: zero(),
    dividends: zero(),
  };
}

export function cloneYearStatement(statement: YearStatement): YearStatement {
  return { ...statement };
}

function sumCategory(rows: readonly ClassifiedRecord[], category: FsliCategory, method: SumMethod): Decimal {
  const matching = rows.filter((row) => row.category === category);
  const debit = sumAmounts(matching.map((row) => row.debit));
  const credit = sumAmounts(matching.map((row) => row.credit));
  switch (method) {
    case "debit":
      return debit;
    case "credit":
      return credit;
    case "net":
      return debit.minus(credit);
  }
}

/** Income statement subtotals from the eight income statement inputs. */
export function applyIncomeStatementSubtotals(statement: YearStatement): void {
  statement.gross_profit = statement.revenue.minus(statement.cogs);
  statement.total_opex = sumAmounts([
    statement.distribution_expenses,
    statement.marketing_admin,
    statement.research_dev,
    statement.depreciation_expense,
  ]);
  statement.ebit = statement.gross_profit.minus(statement.total_opex);
  statement.ebt = statement.ebit.minus(statement.interest_expense);
  statement.net_income = statement.ebt.minus(statement.tax_expense);
}

export function buildYearStatement(rows: readonly ClassifiedRecord[]): YearStatement {
  const statement = emptyYearStatement();

  statement.revenue = sumCategory(rows, "revenue", "credit");
  statement.cogs = sumCategory(rows, "cogs", "debit");
  statement.distribution_expenses = sumCategory(rows, "distribution_expenses", "debit");
  statement.marketing_admin = sumCategory(rows, "marketing_admin", "debit");
  statement.research_dev = sumCategory(rows, "research_dev", "debit");
  statement.depreciation_expense = sumCategory(rows, "depreciation_expense", "debit");
  statement.interest_expense = sumCategory(rows, "interest_expense", "debit");
  statement.tax_expense = sumCategory(rows, "tax_expense", "debit");
  applyIncomeStatementSubtotals(statement);

  for (const key of NET_BALANCE_KEYS) {
    statement[key] = sumCategory(rows, key, "net");
  }
  for (const key of ABSOLUTE_BALANCE_KEYS) {
    statement[key] = sumCategory(rows, key, "net").abs();
  }

  return statement;
}

function withParsedDates(records: readonly ClassifiedRecord[], policy: InvalidDatePolicy): DatedRecord[] {
  const dated: DatedRecord[] = [];
  records.forEach((record, index) => {
    const date = record.txnDate;
    if (date === null || Number.isNaN(date.getTime())) {
      if (policy === "reject") throw new InvalidTransactionDateError(index);
      return;
    }
    dated.push({ record, date, year: fiscalYearOf(date) });
  });
  return dated;
}

function latestSnapshot(rows: readonly DatedRecord[]): DatedRecord[] {
  const latest = rows.reduce((max, row) => Math.max(max, row.date.getTime()), -Infinity);
  return rows.filter((row) => row.date.getTime() === latest);
}

/**
 * One statement per calendar year present in the dated input, in ascending
 * order. When two or more years exist the legacy year-over-year cash-flow
 * drivers are filled in for every year after the first.
 */
export function aggregate(
  records: readonly ClassifiedRecord[],
  mode: DatasetMode,
  options: AggregateOptions = {}
): StatementSeries {
  const dated = withParsedDates(records, options.invalidDates ?? "drop");

  const byYear = new Map<number, DatedRecord[]>();
  for (const row of dated) {
    const bucket = byYear.get(row.year);
    if (bucket) bucket.push(row);
    else byYear.set(row.year, [row]);
  }

  const series: StatementSeries = new Map();
  for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
    const bucket = byYear.get(year) ?? [];
    const rows = mode === "snapshot" ? latestSnapshot(bucket) : bucket;
    series.set(year, buildYearStatement(rows.map((row) => row.record)));
  }

  if (series.size >= 2) {
    deriveSequentialCashFlows(series);
  }

  return series;
}
