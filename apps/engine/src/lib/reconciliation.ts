/**
 * Reconciliation checks over a statement series.
 *
 * The first year is the opening year (Year 0): it is only used as the
 * starting point and gets no result of its own. Residuals are reported as
 * values; nothing here throws.
 */

import Decimal from "decimal.js";

import { isAmountZero, sumAmounts } from "./currency";
import { netCashChange } from "./cashFlow";
import type { ReconciliationResult, StatementSeries, YearStatement } from "./types";

export function totalCurrentAssets(statement: YearStatement): Decimal {
  return sumAmounts([
    statement.cash,
    statement.accounts_receivable,
    statement.inventory,
    statement.prepaid_expenses,
    statement.other_current_assets,
  ]);
}

export function netPpe(statement: YearStatement): Decimal {
  return statement.ppe_gross.minus(statement.accumulated_depreciation);
}

export function totalAssets(statement: YearStatement): Decimal {
  return totalCurrentAssets(statement).plus(netPpe(statement));
}

export function totalCurrentLiabilities(statement: YearStatement): Decimal {
  return sumAmounts([
    statement.accounts_payable,
    statement.accrued_payroll,
    statement.deferred_revenue,
    statement.interest_payable,
    statement.other_current_liabilities,
    statement.income_taxes_payable,
  ]);
}

export function totalLiabilities(statement: YearStatement): Decimal {
  return totalCurrentLiabilities(statement).plus(statement.long_term_debt);
}

/** Booked equity: common stock plus TB retained earnings. */
export function totalEquity(statement: YearStatement): Decimal {
  return statement.common_stock.plus(statement.retained_earnings);
}

export function totalLiabilitiesAndEquity(statement: YearStatement): Decimal {
  return totalLiabilities(statement).plus(totalEquity(statement));
}

export function reconcile(series: StatementSeries): Map<number, ReconciliationResult> {
  const results = new Map<number, ReconciliationResult>();
  const years = [...series.keys()].sort((a, b) => a - b);
  if (years.length < 2) return results;

  const opening = series.get(years[0]);
  if (!opening) return results;

  let prior = opening;
  // Diagnostic roll-forward, seeded from the opening TB balance
  let retainedEarningsCalc = opening.retained_earnings;

  for (const year of years.slice(1)) {
    const current = series.get(year);
    if (!current) continue;

    retainedEarningsCalc = retainedEarningsCalc.plus(current.net_income).minus(current.dividends);
    const endingCashCalc = prior.cash.plus(netCashChange(current));

    results.set(year, {
      balance_sheet_check: totalAssets(current).minus(totalLiabilitiesAndEquity(current)),
      cashflow_check: current.cash.minus(endingCashCalc),
      retained_earnings_calc: retainedEarningsCalc,
      retained_earnings_tb: current.retained_earnings,
      retained_earnings_diff: current.retained_earnings.minus(retainedEarningsCalc),
    });

    prior = current;
  }

  return results;
}

/**
 * Both primary residuals within tolerance. The retained-earnings difference
 * is diagnostic and does not count.
 */
export function isReconciled(result: ReconciliationResult, tolerance = 0.01): boolean {
  return isAmountZero(result.balance_sheet_check, tolerance) && isAmountZero(result.cashflow_check, tolerance);
}
