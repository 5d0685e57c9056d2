/**
 * Statement pipeline.
 *
 * One call builds the statements for one request: optional auto-fixes,
 * validation, classification, aggregation, the TB/GL merge (or the
 * single-source fallback) and reconciliation. All inputs arrive on the
 * context object; nothing is kept between calls.
 */

import { classifyRecords, getMappingStats, type ClassificationPolicy } from "./classifier";
import { aggregate, type InvalidDatePolicy } from "./aggregator";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./config";
import { formatAmount } from "./currency";
import { MissingDataSourceError, ValidationFailedError } from "./errors";
import { merge, selectStatementYears } from "./merger";
import { isReconciled, reconcile } from "./reconciliation";
import type {
  AccountRangeTable,
  AutoFix,
  LedgerRecord,
  MappingStats,
  ReconciliationResult,
  StatementSeries,
  ValidationIssue,
} from "./types";
import {
  applyAutoFixes,
  hasCriticalIssues,
  validateCommonIssues,
  validateGlActivity,
  validateOpeningSnapshot,
  validateRequiredCategories,
  validateTrialBalance,
} from "./validation";

export interface PipelineContext {
  trialBalance?: readonly LedgerRecord[];
  generalLedger?: readonly LedgerRecord[];
  /** Replaces the default account-number ranges. */
  customRanges?: AccountRangeTable;
  matchPolicy?: ClassificationPolicy;
  invalidDates?: InvalidDatePolicy;
  /** Applied to both sources before validation. */
  autoFixes?: readonly AutoFix[];
  /** Reference time for future-date checks. */
  now?: Date;
}

export type PipelineMode = "merged" | "trial-balance-only" | "general-ledger-only";

export interface PipelineResult {
  mode: PipelineMode;
  /** Every computed year, Year 0 included in merged mode. */
  statements: StatementSeries;
  /** Years to present, ascending. */
  statementYears: number[];
  /** Opening year of a merged run; null for single-source runs. */
  year0: number | null;
  /** Years whose cash-flow drivers were derived. */
  cashFlowYears: number[];
  reconciliation: Map<number, ReconciliationResult>;
  mappingStats: {
    trialBalance?: MappingStats;
    generalLedger?: MappingStats;
  };
  issues: ValidationIssue[];
  /** Auto-fix change log, one line per change. */
  changes: string[];
}

interface PreparedSource {
  records: LedgerRecord[];
  issues: ValidationIssue[];
  changes: string[];
}

function prepareSource(
  label: string,
  records: readonly LedgerRecord[],
  validate: (records: readonly LedgerRecord[]) => ValidationIssue[],
  context: PipelineContext,
  config: EngineConfig
): PreparedSource {
  const fixed = context.autoFixes?.length
    ? applyAutoFixes(records, context.autoFixes, context.now)
    : { records: [...records], changes: [] };

  const issues = [...validate(fixed.records), ...validateCommonIssues(fixed.records, context.now)];
  if (config.strictMode && hasCriticalIssues(issues)) {
    const error = new ValidationFailedError(label, issues);
    console.error(`[pipeline] ${error.message}`);
    throw error;
  }

  return {
    records: fixed.records,
    issues,
    changes: fixed.changes.map((change) => `${label}: ${change}`),
  };
}

function sortedYears(series: StatementSeries): number[] {
  return [...series.keys()].sort((a, b) => a - b);
}

/**
 * Build three-statement data from TB snapshots and/or GL activity.
 *
 * @throws MissingDataSourceError when neither source has rows
 * @throws ValidationFailedError in strict mode when a source has Critical issues
 * @throws MissingOpeningSnapshotError when both sources are present and the TB
 *   lacks the Year 0 snapshot
 */
export function runPipeline(context: PipelineContext, config: EngineConfig = DEFAULT_ENGINE_CONFIG): PipelineResult {
  const tbInput = context.trialBalance ?? [];
  const glInput = context.generalLedger ?? [];
  if (tbInput.length === 0 && glInput.length === 0) {
    throw new MissingDataSourceError();
  }

  const tb = tbInput.length > 0
    ? prepareSource("Trial Balance", tbInput, (rows) => validateTrialBalance(rows, config.balanceTolerance), context, config)
    : null;
  const gl = glInput.length > 0
    ? prepareSource("GL Activity", glInput, (rows) => validateGlActivity(rows, config.balanceTolerance), context, config)
    : null;

  const issues: ValidationIssue[] = [...(tb?.issues ?? []), ...(gl?.issues ?? [])];
  const mappingStats: PipelineResult["mappingStats"] = {};
  const classifyOptions = { customRanges: context.customRanges, policy: context.matchPolicy };
  const aggregateOptions = { invalidDates: context.invalidDates };

  let tbSeries: StatementSeries = new Map();
  if (tb) {
    const classified = classifyRecords(tb.records, classifyOptions);
    mappingStats.trialBalance = getMappingStats(classified);
    issues.push(...validateRequiredCategories(classified, "snapshot"));
    tbSeries = aggregate(classified, "snapshot", aggregateOptions);
  }

  let glSeries: StatementSeries = new Map();
  if (gl) {
    const classified = classifyRecords(gl.records, classifyOptions);
    mappingStats.generalLedger = getMappingStats(classified);
    issues.push(...validateRequiredCategories(classified, "activity"));
    glSeries = aggregate(classified, "activity", aggregateOptions);
  }

  let mode: PipelineMode;
  let statements: StatementSeries;
  let statementYears: number[];
  let year0: number | null = null;
  let cashFlowYears: number[];

  if (tb && gl) {
    mode = "merged";
    issues.push(
      ...validateOpeningSnapshot(tb.records, gl.records, config.statementYearCount, config.strictMode)
    );
    statements = merge(tbSeries, glSeries, config.statementYearCount);
    const selected = selectStatementYears(tbSeries, glSeries, config.statementYearCount);
    year0 = selected?.year0 ?? null;
    statementYears = selected?.statementYears ?? [];
    cashFlowYears = [...statementYears];
  } else {
    mode = tb ? "trial-balance-only" : "general-ledger-only";
    statements = tb ? tbSeries : glSeries;
    const years = sortedYears(statements);
    statementYears = years.slice(-config.statementYearCount);
    cashFlowYears = years.slice(1);
  }

  console.info(`[pipeline] Built ${mode} statements for ${statementYears.join(", ") || "no years"}`);

  // A GL on its own has no balance sheet to check
  const reconciliation = mode === "general-ledger-only" ? new Map<number, ReconciliationResult>() : reconcile(statements);
  for (const [year, result] of reconciliation) {
    if (!isReconciled(result, config.reconciliationTolerance)) {
      console.warn(
        `[pipeline] ${year} does not reconcile (balance sheet ${formatAmount(result.balance_sheet_check)}, ` +
          `cash flow ${formatAmount(result.cashflow_check)})`
      );
    }
  }

  return {
    mode,
    statements,
    statementYears,
    year0,
    cashFlowYears,
    reconciliation,
    mappingStats,
    issues,
    changes: [...(tb?.changes ?? []), ...(gl?.changes ?? [])],
  };
}
