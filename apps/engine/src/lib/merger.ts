/**
 * Trial Balance + General Ledger merge.
 *
 * TB supplies balance-sheet snapshots, GL supplies income-statement activity.
 * The output covers Year 0 (the opening snapshot, used internally) followed by
 * the statement years. Year 0 carries balance-sheet values only.
 */

import Decimal from "decimal.js";

import { cloneYearStatement, emptyYearStatement } from "./aggregator";
import { applyBalanceSheetDeltas, rollForwardDividends } from "./cashFlow";
import { MissingOpeningSnapshotError } from "./errors";
import {
  CASH_FLOW_KEYS,
  INCOME_STATEMENT_KEYS,
  INCOME_STATEMENT_SUBTOTAL_KEYS,
  type StatementSeries,
  type YearStatement,
} from "./types";

/** GL values that may overwrite a TB-based statement. */
const GL_OVERLAY_KEYS = [...INCOME_STATEMENT_KEYS, ...INCOME_STATEMENT_SUBTOTAL_KEYS] as const;

export interface StatementYears {
  year0: number;
  statementYears: number[];
}

/** The latest `statementYearCount` years present in either source, and the year before them. */
export function selectStatementYears(
  tbStatements: StatementSeries,
  glStatements: StatementSeries,
  statementYearCount: number
): StatementYears | null {
  const allYears = [...new Set([...tbStatements.keys(), ...glStatements.keys()])].sort((a, b) => a - b);
  if (allYears.length === 0) return null;

  const statementYears = allYears.slice(-statementYearCount);
  return { year0: statementYears[0] - 1, statementYears };
}

function openingSnapshot(statement: YearStatement): YearStatement {
  const opening = cloneYearStatement(statement);
  for (const key of [...INCOME_STATEMENT_KEYS, ...INCOME_STATEMENT_SUBTOTAL_KEYS, ...CASH_FLOW_KEYS]) {
    opening[key] = new Decimal(0);
  }
  return opening;
}

function overlayActivity(base: YearStatement | undefined, activity: YearStatement | undefined): YearStatement {
  const merged = base ? cloneYearStatement(base) : emptyYearStatement();
  for (const key of GL_OVERLAY_KEYS) {
    merged[key] = activity ? activity[key] : new Decimal(0);
  }
  return merged;
}

/**
 * Merge TB snapshots and GL activity into Year 0 + statement years.
 *
 * @throws MissingOpeningSnapshotError when the TB has no statement for the
 *   year before the first statement year.
 */
export function merge(
  tbStatements: StatementSeries,
  glStatements: StatementSeries,
  statementYearCount = 3
): StatementSeries {
  const selected = selectStatementYears(tbStatements, glStatements, statementYearCount);
  if (!selected) return new Map();

  const { year0, statementYears } = selected;
  const opening = tbStatements.get(year0);
  if (!opening) {
    throw new MissingOpeningSnapshotError(year0, statementYears[0]);
  }

  let prior = openingSnapshot(opening);
  const merged: StatementSeries = new Map([[year0, prior]]);

  for (const year of statementYears) {
    const current = overlayActivity(tbStatements.get(year), glStatements.get(year));
    current.dividends = rollForwardDividends(current, prior);
    applyBalanceSheetDeltas(current, prior);
    merged.set(year, current);
    prior = current;
  }

  return merged;
}
