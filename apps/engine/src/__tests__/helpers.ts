import Decimal from "decimal.js";

import { emptyYearStatement } from "@/lib/aggregator";
import { parseTxnDate } from "@/lib/date";
import {
  LINE_ITEM_KEYS,
  type ClassifiedRecord,
  type FsliCategory,
  type LedgerRecord,
  type LineItemKey,
  type YearStatement,
} from "@/lib/types";

interface RecordInput {
  date: string | null;
  name?: string;
  number?: number | null;
  debit?: number;
  credit?: number;
  txnId?: string | null;
}

export function ledgerRecord({ date, name = "", number = null, debit = 0, credit = 0, txnId }: RecordInput): LedgerRecord {
  return {
    txnDate: date === null ? null : parseTxnDate(date),
    accountNumber: number,
    accountName: name,
    debit: new Decimal(debit),
    credit: new Decimal(credit),
    transactionId: txnId,
  };
}

export function classifiedRecord(category: FsliCategory, input: RecordInput): ClassifiedRecord {
  return { ...ledgerRecord(input), category };
}

/** Account numbers inside each category's default range. */
export const ACCOUNT = {
  cash: 1000,
  accounts_receivable: 1100,
  inventory: 1200,
  ppe_gross: 1500,
  accumulated_depreciation: 1595,
  accounts_payable: 2000,
  long_term_debt: 2500,
  common_stock: 3000,
  retained_earnings: 3100,
  revenue: 4000,
  cogs: 5000,
  marketing_admin: 5200,
  depreciation_expense: 5350,
  interest_expense: 6000,
  tax_expense: 6100,
} as const;

type BalanceInput = Partial<Record<keyof typeof ACCOUNT, number>>;

/**
 * Year-end TB snapshot rows, one per non-zero balance. Asset balances are
 * debits and liability/equity balances credits, so a balanced input yields
 * a balanced TB.
 */
export function trialBalanceRows(date: string, balances: BalanceInput): LedgerRecord[] {
  const creditNatured = new Set([
    "accumulated_depreciation",
    "accounts_payable",
    "long_term_debt",
    "common_stock",
    "retained_earnings",
  ]);
  const numbers = new Map<string, number>(Object.entries(ACCOUNT));
  // 1595 sits in the ppe_gross range too, so contra-asset rows carry a name
  const names = new Map<string, string>([["accumulated_depreciation", "Accumulated Depreciation"]]);
  const rows: LedgerRecord[] = [];
  for (const [key, amount] of Object.entries(balances)) {
    const number = numbers.get(key);
    if (amount === undefined || amount === 0 || number === undefined) continue;
    const name = names.get(key) ?? "";
    rows.push(
      creditNatured.has(key)
        ? ledgerRecord({ date, name, number, credit: amount })
        : ledgerRecord({ date, name, number, debit: amount })
    );
  }
  return rows;
}

/** A zeroed statement with the given line items filled in. */
export function statementWith(values: Partial<Record<LineItemKey, number>>): YearStatement {
  const statement = emptyYearStatement();
  for (const key of LINE_ITEM_KEYS) {
    const value = values[key];
    if (value !== undefined) statement[key] = new Decimal(value);
  }
  return statement;
}
