/**
 * Statement row layouts for presentation.
 *
 * A row either reads one line item, evaluates a named formula, or is pure
 * layout. Formulas are looked up in a fixed table so every derived row is
 * checked at compile time.
 */

import Decimal from "decimal.js";

import { financingCashFlow, investingCashFlow, netCashChange, operatingCashFlow } from "./cashFlow";
import { safeRatio, sumAmounts } from "./currency";
import {
  netPpe,
  totalAssets,
  totalCurrentAssets,
  totalCurrentLiabilities,
  totalEquity,
  totalLiabilitiesAndEquity,
} from "./reconciliation";
import type { LineItemKey, StatementSeries, YearStatement } from "./types";

type StatementFormula = (statement: YearStatement) => Decimal;

function grossProfit(s: YearStatement): Decimal {
  return s.revenue.minus(s.cogs);
}

function totalOperatingExpenses(s: YearStatement): Decimal {
  return sumAmounts([s.distribution_expenses, s.marketing_admin, s.research_dev, s.depreciation_expense]);
}

function ebit(s: YearStatement): Decimal {
  return grossProfit(s).minus(totalOperatingExpenses(s));
}

function incomeBeforeTaxes(s: YearStatement): Decimal {
  return ebit(s).minus(s.interest_expense);
}

function netIncome(s: YearStatement): Decimal {
  return incomeBeforeTaxes(s).minus(s.tax_expense);
}

export const FORMULAS = {
  gross_profit: grossProfit,
  total_opex: totalOperatingExpenses,
  ebit,
  income_before_taxes: incomeBeforeTaxes,
  net_income: netIncome,
  total_current_assets: totalCurrentAssets,
  less_accumulated_depreciation: (s) => s.accumulated_depreciation.negated(),
  net_ppe: netPpe,
  total_assets: totalAssets,
  total_current_liabilities: totalCurrentLiabilities,
  total_equity: totalEquity,
  total_liabilities_and_equity: totalLiabilitiesAndEquity,
  operating_cash_flow: operatingCashFlow,
  investing_cash_flow: investingCashFlow,
  financing_cash_flow: financingCashFlow,
  net_cash_change: netCashChange,
  dividends_paid: (s) => s.dividends.negated(),
} satisfies Record<string, StatementFormula>;

export type FormulaName = keyof typeof FORMULAS;

export type ReportRow =
  | { kind: "direct"; label: string; key: LineItemKey }
  | { kind: "derived"; label: string; formula: FormulaName }
  | { kind: "heading"; label: string }
  | { kind: "spacer" };

const direct = (label: string, key: LineItemKey): ReportRow => ({ kind: "direct", label, key });
const derived = (label: string, formula: FormulaName): ReportRow => ({ kind: "derived", label, formula });
const heading = (label: string): ReportRow => ({ kind: "heading", label });
const SPACER: ReportRow = { kind: "spacer" };

export const INCOME_STATEMENT_ROWS: readonly ReportRow[] = [
  direct("Revenues", "revenue"),
  direct("Cost of Goods Sold", "cogs"),
  derived("Gross Profit", "gross_profit"),
  SPACER,
  heading("Operating Expenses:"),
  direct("Distribution Expenses", "distribution_expenses"),
  direct("Marketing and Administration", "marketing_admin"),
  direct("Research and Development", "research_dev"),
  direct("Depreciation", "depreciation_expense"),
  derived("Total Operating Expenses", "total_opex"),
  SPACER,
  derived("EBIT (Operating Profit)", "ebit"),
  direct("Interest Expense", "interest_expense"),
  derived("Income Before Taxes", "income_before_taxes"),
  direct("Income Tax Expense", "tax_expense"),
  derived("Net Income", "net_income"),
];

export const BALANCE_SHEET_ROWS: readonly ReportRow[] = [
  heading("ASSETS"),
  heading("Current Assets:"),
  direct("Cash", "cash"),
  direct("Accounts Receivable", "accounts_receivable"),
  direct("Inventory", "inventory"),
  direct("Prepaid Expenses", "prepaid_expenses"),
  direct("Other Current Assets", "other_current_assets"),
  derived("Total Current Assets", "total_current_assets"),
  SPACER,
  heading("Non-Current Assets:"),
  direct("Property, Plant & Equipment - Gross", "ppe_gross"),
  derived("Less: Accumulated Depreciation", "less_accumulated_depreciation"),
  derived("Property, Plant & Equipment - Net", "net_ppe"),
  derived("TOTAL ASSETS", "total_assets"),
  SPACER,
  heading("LIABILITIES AND EQUITY"),
  heading("Current Liabilities:"),
  direct("Accounts Payable", "accounts_payable"),
  direct("Accrued Payroll", "accrued_payroll"),
  direct("Deferred Revenue", "deferred_revenue"),
  direct("Interest Payable", "interest_payable"),
  direct("Other Current Liabilities", "other_current_liabilities"),
  direct("Income Taxes Payable", "income_taxes_payable"),
  derived("Total Current Liabilities", "total_current_liabilities"),
  SPACER,
  heading("Non-Current Liabilities:"),
  direct("Long-Term Debt", "long_term_debt"),
  SPACER,
  heading("Shareholders' Equity:"),
  direct("Common Stock and APIC", "common_stock"),
  direct("Retained Earnings", "retained_earnings"),
  derived("Total Shareholders' Equity", "total_equity"),
  SPACER,
  derived("TOTAL LIABILITIES AND EQUITY", "total_liabilities_and_equity"),
];

export const CASH_FLOW_ROWS: readonly ReportRow[] = [
  heading("Operating Activities:"),
  derived("Net Income", "net_income"),
  direct("Depreciation", "depreciation_expense"),
  direct("Change in Accounts Receivable", "delta_ar"),
  direct("Change in Inventory", "delta_inventory"),
  direct("Change in Prepaid Expenses", "delta_prepaid"),
  direct("Change in Other Current Assets", "delta_other_current_assets"),
  direct("Change in Accounts Payable", "delta_ap"),
  direct("Change in Accrued Payroll", "delta_accrued_payroll"),
  direct("Change in Deferred Revenue", "delta_deferred_revenue"),
  direct("Change in Interest Payable", "delta_interest_payable"),
  direct("Change in Other Current Liabilities", "delta_other_current_liabilities"),
  direct("Change in Income Taxes Payable", "delta_income_taxes_payable"),
  derived("Cash from Operating Activities", "operating_cash_flow"),
  SPACER,
  heading("Investing Activities:"),
  direct("Acquisitions of PP&E", "capex"),
  derived("Cash from Investing Activities", "investing_cash_flow"),
  SPACER,
  heading("Financing Activities:"),
  direct("Issuance of Common Stock", "stock_issuance"),
  derived("Dividends", "dividends_paid"),
  direct("Change in Long-Term Debt", "delta_debt"),
  derived("Cash from Financing Activities", "financing_cash_flow"),
  SPACER,
  derived("Net Change in Cash", "net_cash_change"),
];

/** Value of a row for one year; layout rows have none. */
export function resolveRow(row: ReportRow, statement: YearStatement): Decimal | null {
  switch (row.kind) {
    case "direct":
      return statement[row.key];
    case "derived":
      return FORMULAS[row.formula](statement);
    case "heading":
    case "spacer":
      return null;
  }
}

export interface StatementTableRow {
  label: string;
  kind: ReportRow["kind"];
  /** One cell per requested year; null for layout rows and missing years. */
  values: Array<Decimal | null>;
}

export interface StatementTable {
  years: number[];
  rows: StatementTableRow[];
}

export function buildStatementTable(
  rows: readonly ReportRow[],
  series: StatementSeries,
  years: readonly number[]
): StatementTable {
  return {
    years: [...years],
    rows: rows.map((row) => ({
      label: row.kind === "spacer" ? "" : row.label,
      kind: row.kind,
      values: years.map((year) => {
        const statement = series.get(year);
        return statement ? resolveRow(row, statement) : null;
      }),
    })),
  };
}

export interface Margins {
  grossMargin: Decimal;
  ebitMargin: Decimal;
  netMargin: Decimal;
}

/** Margins in percent. Zero or negative revenue yields 0 for every margin. */
export function computeMargins(statement: YearStatement): Margins {
  if (statement.revenue.lessThanOrEqualTo(0)) {
    return { grossMargin: new Decimal(0), ebitMargin: new Decimal(0), netMargin: new Decimal(0) };
  }
  const percentOfRevenue = (value: Decimal) => safeRatio(value, statement.revenue).times(100);
  return {
    grossMargin: percentOfRevenue(grossProfit(statement)),
    ebitMargin: percentOfRevenue(ebit(statement)),
    netMargin: percentOfRevenue(netIncome(statement)),
  };
}
