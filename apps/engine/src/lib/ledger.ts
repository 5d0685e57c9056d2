/**
 * Ledger row intake.
 *
 * Converts tabular rows (one object per spreadsheet row, keyed by header)
 * into LedgerRecords. Header spelling varies between exports, so headers are
 * normalized first. Bad cells never throw: dates become null, amounts 0 and
 * account numbers null. Validation reports those rows afterwards.
 */

import Decimal from "decimal.js";
import { z } from "zod";

import { coerceAmount } from "./currency";
import { parseTxnDate } from "./date";
import { MissingColumnsError } from "./errors";
import type { LedgerRecord } from "./types";

export const LEDGER_COLUMNS = [
  "TxnDate",
  "AccountNumber",
  "AccountName",
  "Debit",
  "Credit",
  "TransactionID",
  "Currency",
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

export const REQUIRED_COLUMNS: readonly LedgerColumn[] = ["TxnDate", "AccountNumber", "AccountName", "Debit", "Credit"];

export type RawLedgerRow = Record<string, unknown>;

const HEADER_VARIANTS: Record<string, LedgerColumn> = {
  txndate: "TxnDate",
  transaction_date: "TxnDate",
  date: "TxnDate",
  transdate: "TxnDate",

  accountnumber: "AccountNumber",
  account_number: "AccountNumber",
  acct_num: "AccountNumber",
  account: "AccountNumber",
  acct: "AccountNumber",

  accountname: "AccountName",
  account_name: "AccountName",
  acct_name: "AccountName",
  description: "AccountName",

  debit: "Debit",
  dr: "Debit",

  credit: "Credit",
  cr: "Credit",

  transactionid: "TransactionID",
  transaction_id: "TransactionID",
  txn_id: "TransactionID",
  txnid: "TransactionID",
  glid: "TransactionID",

  currency: "Currency",
  curr: "Currency",
};

/** Canonical name for a header, or the header unchanged when it is not recognized. */
export function normalizeHeader(header: string): string {
  const key = header.toLowerCase().trim().replace(/ /g, "_");
  return HEADER_VARIANTS[key] ?? header;
}

export function normalizeColumnHeaders(rows: readonly RawLedgerRow[]): RawLedgerRow[] {
  return rows.map((row) => {
    const normalized: RawLedgerRow = {};
    for (const [header, value] of Object.entries(row)) {
      normalized[normalizeHeader(header)] = value;
    }
    return normalized;
  });
}

export function columnsOf(rows: readonly RawLedgerRow[]): Set<string> {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const header of Object.keys(row)) columns.add(header);
  }
  return columns;
}

export function checkRequiredColumns(columns: Iterable<string>): { valid: boolean; missing: LedgerColumn[] } {
  const present = new Set(columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  return { valid: missing.length === 0, missing };
}

function toAccountNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

const ledgerRowSchema = z.object({
  TxnDate: z.unknown().transform(parseTxnDate),
  AccountNumber: z.unknown().transform(toAccountNumber),
  AccountName: z.unknown().transform((value) => toText(value) ?? ""),
  Debit: z.unknown().transform((value) => coerceAmount(value) ?? new Decimal(0)),
  Credit: z.unknown().transform((value) => coerceAmount(value) ?? new Decimal(0)),
  TransactionID: z.unknown().transform(toText),
  Currency: z.unknown().transform(toText),
});

/**
 * Build LedgerRecords from raw rows.
 *
 * Optional columns that are absent from every row stay undefined on the
 * records, so "no TransactionID column" can be told apart from "column
 * present but empty" (null).
 *
 * @throws MissingColumnsError when a required column is absent
 */
export function toLedgerRecords(rows: readonly RawLedgerRow[]): LedgerRecord[] {
  if (rows.length === 0) return [];

  const normalized = normalizeColumnHeaders(rows);
  const columns = columnsOf(normalized);
  const { valid, missing } = checkRequiredColumns(columns);
  if (!valid) throw new MissingColumnsError(missing);

  const hasTransactionIds = columns.has("TransactionID");
  const hasCurrency = columns.has("Currency");

  return normalized.map((row) => {
    const parsed = ledgerRowSchema.parse(row);
    const record: LedgerRecord = {
      txnDate: parsed.TxnDate,
      accountNumber: parsed.AccountNumber,
      accountName: parsed.AccountName,
      debit: parsed.Debit,
      credit: parsed.Credit,
    };
    if (hasTransactionIds) record.transactionId = parsed.TransactionID;
    if (hasCurrency) record.currency = parsed.Currency;
    return record;
  });
}
