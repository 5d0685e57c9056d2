/**
 * Account classification.
 *
 * Maps a ledger account to an FSLI category in strict precedence:
 * 1. "accrued" accounts, split into payroll vs other current liabilities
 * 2. name aliases, in table order, first match wins
 * 3. account-number ranges, in table order, first match wins
 * 4. "unclassified"
 *
 * Pure: no state is kept between calls.
 */

import { z } from "zod";

import aliasData from "./data/fsli-aliases.json";
import rangeData from "./data/fsli-ranges.json";
import {
  FSLI_CATEGORIES,
  type AccountRangeTable,
  type ClassifiedCategory,
  type ClassifiedRecord,
  type FsliCategory,
  type LedgerRecord,
  type MappingStats,
} from "./types";

const classifiedCategorySchema = z.enum(FSLI_CATEGORIES).exclude(["unclassified"]);
const aliasTableSchema = z.record(z.string(), z.array(z.string().min(1)).min(1));
const rangeTableSchema = z.record(
  z.string(),
  z.tuple([z.number().int(), z.number().int()]).refine(([start, end]) => start <= end, {
    message: "range start must not exceed range end",
  })
);

interface AliasEntry {
  category: ClassifiedCategory;
  aliases: readonly string[];
}

interface RangeEntry {
  category: ClassifiedCategory;
  start: number;
  end: number;
}

function loadAliasTable(): AliasEntry[] {
  const table = aliasTableSchema.parse(aliasData);
  return Object.entries(table).map(([category, aliases]) => ({
    category: classifiedCategorySchema.parse(category),
    aliases: aliases.map((alias) => alias.toLowerCase()),
  }));
}

function loadRangeTable(): AccountRangeTable {
  const table = rangeTableSchema.parse(rangeData);
  const ranges: AccountRangeTable = {};
  for (const [category, range] of Object.entries(table)) {
    ranges[classifiedCategorySchema.parse(category)] = range;
  }
  return ranges;
}

export const ACCOUNT_NAME_ALIASES: readonly AliasEntry[] = loadAliasTable();

export const DEFAULT_ACCOUNT_RANGES: Readonly<AccountRangeTable> = loadRangeTable();

const PAYROLL_KEYWORDS = ["payroll", "wage", "salary", "bonus", "compensation"];

/**
 * How an alias is compared with a normalized account name.
 *
 * - permissive-substring: alias inside name, or name inside alias. Short
 *   aliases such as "ar" over-match ("retained earnings"); kept as the
 *   default because abbreviations like "A/R" rely on it.
 * - whole-word: same two directions, but only at word boundaries.
 */
export type ClassificationPolicy = "permissive-substring" | "whole-word";

const NAME_MATCHERS: Record<ClassificationPolicy, (name: string, alias: string) => boolean> = {
  "permissive-substring": (name, alias) => name.includes(alias) || alias.includes(name),
  "whole-word": (name, alias) => {
    const paddedName = ` ${name} `;
    const paddedAlias = ` ${alias} `;
    return paddedName.includes(paddedAlias) || paddedAlias.includes(paddedName);
  },
};

export interface ClassifyOptions {
  customRanges?: AccountRangeTable;
  policy?: ClassificationPolicy;
}

export function normalizeAccountName(name: string | null | undefined): string {
  if (name === null || name === undefined) return "";
  return name
    .toLowerCase()
    .trim()
    .replace(/\s+/g, " ")
    .replace(/,/g, "")
    .replace(/\./g, "")
    .replace(/&/g, "and");
}

/** Accrued accounts are payroll when any payroll keyword appears, else other current liabilities. */
export function classifyAccruedLiability(accountName: string): "accrued_payroll" | "other_current_liabilities" {
  const lower = accountName.toLowerCase();
  return PAYROLL_KEYWORDS.some((keyword) => lower.includes(keyword))
    ? "accrued_payroll"
    : "other_current_liabilities";
}

export function mapAccountByName(
  accountName: string | null | undefined,
  policy: ClassificationPolicy = "permissive-substring"
): ClassifiedCategory | null {
  const normalized = normalizeAccountName(accountName);
  // An empty name would be "contained" in every alias
  if (normalized === "") return null;

  if (normalized.includes("accrued")) {
    return classifyAccruedLiability(normalized);
  }

  const matches = NAME_MATCHERS[policy];
  for (const { category, aliases } of ACCOUNT_NAME_ALIASES) {
    if (aliases.some((alias) => matches(normalized, alias))) {
      return category;
    }
  }
  return null;
}

function toRangeEntries(table: AccountRangeTable): RangeEntry[] {
  const entries: RangeEntry[] = [];
  for (const [category, range] of Object.entries(table)) {
    const parsed = classifiedCategorySchema.safeParse(category);
    if (range && parsed.success) {
      entries.push({ category: parsed.data, start: range[0], end: range[1] });
    }
  }
  return entries;
}

/** Custom ranges replace the default table rather than extending it; an empty table keeps the defaults. */
export function mapAccountByRange(
  accountNumber: number | null | undefined,
  customRanges?: AccountRangeTable
): ClassifiedCategory | null {
  if (accountNumber === null || accountNumber === undefined || !Number.isFinite(accountNumber)) {
    return null;
  }

  const custom = customRanges ? toRangeEntries(customRanges) : [];
  const ranges = custom.length > 0 ? custom : toRangeEntries(DEFAULT_ACCOUNT_RANGES);
  for (const { category, start, end } of ranges) {
    if (start <= accountNumber && accountNumber <= end) {
      return category;
    }
  }
  return null;
}

export function classify(
  accountName: string | null | undefined,
  accountNumber?: number | null,
  customRanges?: AccountRangeTable,
  policy: ClassificationPolicy = "permissive-substring"
): FsliCategory {
  return (
    mapAccountByName(accountName, policy) ?? mapAccountByRange(accountNumber, customRanges) ?? "unclassified"
  );
}

export function classifyRecords(records: readonly LedgerRecord[], options: ClassifyOptions = {}): ClassifiedRecord[] {
  return records.map((record) => ({
    ...record,
    category: classify(record.accountName, record.accountNumber, options.customRanges, options.policy),
  }));
}

export function getMappingStats(records: readonly ClassifiedRecord[]): MappingStats {
  const distribution: Partial<Record<FsliCategory, number>> = {};
  let unclassified = 0;

  for (const record of records) {
    distribution[record.category] = (distribution[record.category] ?? 0) + 1;
    if (record.category === "unclassified") unclassified++;
  }

  const total = records.length;
  const mapped = total - unclassified;
  return {
    total_accounts: total,
    mapped_accounts: mapped,
    unclassified_accounts: unclassified,
    mapping_rate: total > 0 ? mapped / total : 0,
    category_distribution: distribution,
  };
}
