/**
 * Shared Type Definitions
 */

import type Decimal from "decimal.js";

export const FSLI_CATEGORIES = [
    // Assets
    "cash",
    "accounts_receivable",
    "inventory",
    "prepaid_expenses",
    "other_current_assets",
    "ppe_gross",
    "accumulated_depreciation",
    "other_fixed_assets",
    // Liabilities
    "accounts_payable",
    "accrued_payroll",
    "deferred_revenue",
    "interest_payable",
    "other_current_liabilities",
    "income_taxes_payable",
    "long_term_debt",
    // Equity
    "common_stock",
    "retained_earnings",
    "dividends",
    // Income Statement
    "revenue",
    "cogs",
    "distribution_expenses",
    "marketing_admin",
    "research_dev",
    "depreciation_expense",
    "other_opex",
    "interest_expense",
    "tax_expense",
    "unclassified",
] as const;

export type FsliCategory = (typeof FSLI_CATEGORIES)[number];

export type ClassifiedCategory = Exclude<FsliCategory, "unclassified">;

export const BALANCE_SHEET_KEYS = [
    "cash",
    "accounts_receivable",
    "inventory",
    "prepaid_expenses",
    "other_current_assets",
    "ppe_gross",
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
] as const;

/** Keys the GL activity series is allowed to supply in a merged run. */
export const INCOME_STATEMENT_KEYS = [
    "revenue",
    "cogs",
    "distribution_expenses",
    "marketing_admin",
    "research_dev",
    "depreciation_expense",
    "interest_expense",
    "tax_expense",
    "net_income",
] as const;

export const INCOME_STATEMENT_SUBTOTAL_KEYS = ["gross_profit", "total_opex", "ebit", "ebt"] as const;

export const WORKING_CAPITAL_DELTA_KEYS = [
    "delta_ar",
    "delta_inventory",
    "delta_prepaid",
    "delta_other_current_assets",
    "delta_ap",
    "delta_accrued_payroll",
    "delta_deferred_revenue",
    "delta_interest_payable",
    "delta_other_current_liabilities",
    "delta_income_taxes_payable",
] as const;

export const CASH_FLOW_KEYS = [
    ...WORKING_CAPITAL_DELTA_KEYS,
    "delta_debt",
    "capex",
    "stock_issuance",
    "dividends",
] as const;

export const LINE_ITEM_KEYS = [
    ...INCOME_STATEMENT_KEYS,
    ...INCOME_STATEMENT_SUBTOTAL_KEYS,
    ...BALANCE_SHEET_KEYS,
    ...CASH_FLOW_KEYS,
] as const;

export type BalanceSheetKey = (typeof BALANCE_SHEET_KEYS)[number];
export type IncomeStatementKey = (typeof INCOME_STATEMENT_KEYS)[number];
export type IncomeStatementSubtotalKey = (typeof INCOME_STATEMENT_SUBTOTAL_KEYS)[number];
export type WorkingCapitalDeltaKey = (typeof WORKING_CAPITAL_DELTA_KEYS)[number];
export type CashFlowKey = (typeof CASH_FLOW_KEYS)[number];
export type LineItemKey = (typeof LINE_ITEM_KEYS)[number];

/** One year of statement line items. Every key is always present. */
export type YearStatement = Record<LineItemKey, Decimal>;

/** Year-keyed statements, inserted in ascending year order. */
export type StatementSeries = Map<number, YearStatement>;

/** Trial Balance rows are snapshots; GL rows are period activity. */
export type DatasetMode = "snapshot" | "activity";

export interface LedgerRecord {
    /** Null when the source value did not parse. */
    txnDate: Date | null;
    accountNumber: number | null;
    accountName: string;
    debit: Decimal;
    credit: Decimal;
    transactionId?: string | null;
    currency?: string | null;
}

export interface ClassifiedRecord extends LedgerRecord {
    category: FsliCategory;
}

/** Inclusive account-number range. */
export type AccountRange = readonly [start: number, end: number];

export type AccountRangeTable = Partial<Record<ClassifiedCategory, AccountRange>>;

export interface MappingStats {
    total_accounts: number;
    mapped_accounts: number;
    unclassified_accounts: number;
    mapping_rate: number;
    category_distribution: Partial<Record<FsliCategory, number>>;
}

export interface ReconciliationResult {
    /** Assets - (Liabilities + booked Equity) */
    balance_sheet_check: Decimal;
    /** Reported ending cash - rolled-forward ending cash */
    cashflow_check: Decimal;
    retained_earnings_calc: Decimal;
    retained_earnings_tb: Decimal;
    retained_earnings_diff: Decimal;
}

export type IssueSeverity = "Critical" | "Warning" | "Info";

export type AutoFix =
    | "remove_missing_dates"
    | "map_unclassified"
    | "fix_account_numbers"
    | "remove_duplicates"
    | "remove_future_dates";

export interface ValidationIssue {
    severity: IssueSeverity;
    category: string;
    issue: string;
    impact: string;
    suggestion: string;
    autoFix: AutoFix | null;
    /** Row indexes, capped at the first 100. */
    affectedRows: number[];
    totalAffected: number;
    detail?: string;
}
