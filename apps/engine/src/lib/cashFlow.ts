/**
 * Indirect-method cash-flow drivers derived from balance-sheet movements.
 *
 * Sign convention: an increase in a working-capital asset is a use of cash
 * (negative), an increase in a working-capital liability is a source
 * (positive).
 */

import Decimal from "decimal.js";

import { sumAmounts } from "./currency";
import {
  WORKING_CAPITAL_DELTA_KEYS,
  type BalanceSheetKey,
  type StatementSeries,
  type WorkingCapitalDeltaKey,
  type YearStatement,
} from "./types";

export interface WorkingCapitalDriver {
  source: BalanceSheetKey;
  target: WorkingCapitalDeltaKey;
  sign: 1 | -1;
}

export const WORKING_CAPITAL_DRIVERS: readonly WorkingCapitalDriver[] = [
  { source: "accounts_receivable", target: "delta_ar", sign: -1 },
  { source: "inventory", target: "delta_inventory", sign: -1 },
  { source: "prepaid_expenses", target: "delta_prepaid", sign: -1 },
  { source: "other_current_assets", target: "delta_other_current_assets", sign: -1 },
  { source: "accounts_payable", target: "delta_ap", sign: 1 },
  { source: "accrued_payroll", target: "delta_accrued_payroll", sign: 1 },
  { source: "deferred_revenue", target: "delta_deferred_revenue", sign: 1 },
  { source: "interest_payable", target: "delta_interest_payable", sign: 1 },
  { source: "other_current_liabilities", target: "delta_other_current_liabilities", sign: 1 },
  { source: "income_taxes_payable", target: "delta_income_taxes_payable", sign: 1 },
];

/**
 * Writes the working-capital deltas, delta_debt, stock_issuance and capex
 * onto `current`. Capex assumes no disposals: it is the negated change in
 * gross PP&E.
 */
export function applyBalanceSheetDeltas(current: YearStatement, prior: YearStatement): void {
  for (const { source, target, sign } of WORKING_CAPITAL_DRIVERS) {
    current[target] = current[source].minus(prior[source]).times(sign);
  }

  current.delta_debt = current.long_term_debt.minus(prior.long_term_debt);
  current.stock_issuance = current.common_stock.minus(prior.common_stock);
  current.capex = current.ppe_gross.minus(prior.ppe_gross).negated();
}

/**
 * Dividends implied by the retained-earnings roll-forward, clamped at zero.
 * A negative implied value means RE grew more than net income explains;
 * that gap surfaces in reconciliation, not here.
 */
export function rollForwardDividends(current: YearStatement, prior: YearStatement): Decimal {
  const implied = prior.retained_earnings.plus(current.net_income).minus(current.retained_earnings);
  return Decimal.max(0, implied);
}

/**
 * Legacy single-source derivation: each year is compared with the previous
 * year present in the series. The first year gets no drivers.
 *
 * Mutates the statements in place and returns the years that were derived.
 */
export function deriveSequentialCashFlows(series: StatementSeries): number[] {
  const years = [...series.keys()].sort((a, b) => a - b);
  const derived: number[] = [];

  for (let i = 1; i < years.length; i++) {
    const current = series.get(years[i]);
    const prior = series.get(years[i - 1]);
    if (!current || !prior) continue;
    applyBalanceSheetDeltas(current, prior);
    derived.push(years[i]);
  }

  return derived;
}

export function workingCapitalChange(statement: YearStatement): Decimal {
  return sumAmounts(WORKING_CAPITAL_DELTA_KEYS.map((key) => statement[key]));
}

export function operatingCashFlow(statement: YearStatement): Decimal {
  return statement.net_income.plus(statement.depreciation_expense).plus(workingCapitalChange(statement));
}

export function investingCashFlow(statement: YearStatement): Decimal {
  return statement.capex;
}

export function financingCashFlow(statement: YearStatement): Decimal {
  return statement.stock_issuance.minus(statement.dividends).plus(statement.delta_debt);
}

export function netCashChange(statement: YearStatement): Decimal {
  return operatingCashFlow(statement).plus(investingCashFlow(statement)).plus(financingCashFlow(statement));
}
