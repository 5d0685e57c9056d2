import Decimal from "decimal.js";
import { describe, it, expect } from "vitest";

import { classifiedRecord, ledgerRecord } from "../__tests__/helpers";
import {
  applyAutoFixes,
  hasCriticalIssues,
  isBalanced,
  validateCommonIssues,
  validateGlActivity,
  validateOpeningSnapshot,
  validateRequiredCategories,
  validateTrialBalance,
} from "./validation";

const tolerance = { absolute: 0.01, relative: 0.0001 };
const NOW = new Date(Date.UTC(2024, 5, 30));

describe("isBalanced", () => {
  it("uses the absolute floor for small totals", () => {
    expect(isBalanced({ debit: new Decimal(10), credit: new Decimal(10.01) }, tolerance)).toBe(true);
    expect(isBalanced({ debit: new Decimal(10), credit: new Decimal(10.02) }, tolerance)).toBe(false);
  });

  it("scales the tolerance with the larger side", () => {
    expect(isBalanced({ debit: new Decimal(1000000), credit: new Decimal(999950) }, tolerance)).toBe(true);
    expect(isBalanced({ debit: new Decimal(1000000), credit: new Decimal(999800) }, tolerance)).toBe(false);
  });
});

describe("validateTrialBalance", () => {
  it("accepts a balanced snapshot", () => {
    const records = [
      ledgerRecord({ date: "2023-12-31", number: 1000, debit: 100 }),
      ledgerRecord({ date: "2023-12-31", number: 3000, credit: 100 }),
    ];

    expect(validateTrialBalance(records, tolerance)).toEqual([]);
  });

  it("reports unbalanced periods and the overall difference", () => {
    const records = [
      ledgerRecord({ date: "2022-12-31", number: 1000, debit: 100 }),
      ledgerRecord({ date: "2022-12-31", number: 3000, credit: 100 }),
      ledgerRecord({ date: "2023-12-31", number: 1000, debit: 150 }),
      ledgerRecord({ date: "2023-12-31", number: 3000, credit: 100 }),
    ];

    const issues = validateTrialBalance(records, tolerance);

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatchObject({
      severity: "Critical",
      issue: "TB does not balance for 1 period(s)",
      totalAffected: 1,
      detail: "Periods out of balance: 2023-12-31",
    });
    expect(issues[1]).toMatchObject({
      severity: "Critical",
      issue: "Overall TB out of balance by $50.00",
      impact: "Total Debits: $250.00 ≠ Total Credits: $200.00",
    });
    expect(hasCriticalIssues(issues)).toBe(true);
  });
});

describe("validateGlActivity", () => {
  it("notes a missing TransactionID column", () => {
    const records = [
      ledgerRecord({ date: "2023-03-01", number: 1000, debit: 100 }),
      ledgerRecord({ date: "2023-03-01", number: 4000, credit: 100 }),
    ];

    const issues = validateGlActivity(records, tolerance);

    expect(issues.map((item) => [item.severity, item.issue])).toEqual([["Info", "TransactionID column not found"]]);
    expect(hasCriticalIssues(issues)).toBe(false);
  });

  it("treats an overall imbalance as critical without transaction IDs", () => {
    const records = [
      ledgerRecord({ date: "2023-03-01", number: 1000, debit: 100 }),
      ledgerRecord({ date: "2023-03-01", number: 4000, credit: 90 }),
    ];

    const issues = validateGlActivity(records, tolerance);

    expect(issues.map((item) => [item.severity, item.issue])).toEqual([
      ["Info", "TransactionID column not found"],
      ["Critical", "Overall GL out of balance by $10.00"],
    ]);
  });

  it("balances each transaction when IDs are present", () => {
    const records = [
      ledgerRecord({ date: "2023-03-01", number: 1000, debit: 100, txnId: "T1" }),
      ledgerRecord({ date: "2023-03-01", number: 4000, credit: 100, txnId: "T1" }),
      ledgerRecord({ date: "2023-03-02", number: 5000, debit: 50, txnId: "T2" }),
      ledgerRecord({ date: "2023-03-02", number: 2000, credit: 40, txnId: "T2" }),
    ];

    const issues = validateGlActivity(records, tolerance);

    expect(issues.map((item) => [item.severity, item.issue])).toEqual([
      ["Critical", "1 transaction(s) do not balance"],
      ["Warning", "Overall GL out of balance by $10.00"],
    ]);
    expect(issues[0].detail).toBe("Unbalanced transactions: T2");
  });

  it("falls back to file totals when few rows carry an ID", () => {
    const records = [
      ledgerRecord({ date: "2023-03-01", number: 1000, debit: 10, txnId: "T1" }),
      ledgerRecord({ date: "2023-03-01", number: 4000, credit: 10, txnId: null }),
      ledgerRecord({ date: "2023-03-02", number: 1000, debit: 10, txnId: null }),
      ledgerRecord({ date: "2023-03-02", number: 4000, credit: 10, txnId: null }),
    ];

    const issues = validateGlActivity(records, tolerance);

    expect(issues.map((item) => [item.severity, item.issue])).toEqual([
      ["Warning", "TransactionID column exists but only 25% populated"],
    ]);
  });
});

function messyRecords() {
  return [
    ledgerRecord({ date: "2023-01-01", number: 1000, debit: 10, txnId: "A" }),
    ledgerRecord({ date: null, number: 1000, debit: 10, txnId: "B" }),
    ledgerRecord({ date: "2023-01-02", number: null, debit: 10, txnId: "A" }),
    ledgerRecord({ date: "2023-01-03", number: -1200, debit: 10, txnId: "C" }),
    ledgerRecord({ date: "2025-01-01", number: 4000, debit: 10, txnId: "D" }),
    ledgerRecord({ date: "2023-01-01", number: 1000, debit: 10, txnId: "A" }),
  ];
}

describe("validateCommonIssues", () => {
  it("reports each kind of data problem with its rows and auto-fix", () => {
    const issues = validateCommonIssues(messyRecords(), NOW);

    expect(issues.map((item) => [item.severity, item.issue, item.autoFix, item.affectedRows])).toEqual([
      ["Warning", "1 transactions missing dates", "remove_missing_dates", [1]],
      ["Warning", "1 transactions without account numbers", "map_unclassified", [2]],
      ["Warning", "1 invalid account numbers", "fix_account_numbers", [3]],
      ["Warning", "2 duplicate transaction lines", "remove_duplicates", [0, 5]],
      ["Warning", "1 future-dated transactions", "remove_future_dates", [4]],
    ]);
    expect(issues[3].suggestion).toBe("Remove 1 duplicates");
    expect(hasCriticalIssues(issues)).toBe(false);
  });

  it("does not treat the lines of one posting as duplicates", () => {
    const posting = [
      ledgerRecord({ date: "2023-05-01", number: 1000, debit: 100, txnId: "T1" }),
      ledgerRecord({ date: "2023-05-01", number: 4000, credit: 100, txnId: "T1" }),
    ];

    expect(validateCommonIssues(posting, NOW)).toEqual([]);
  });

  it("flags debits far above the mean as outliers", () => {
    const records = Array.from({ length: 20 }, () => ledgerRecord({ date: "2023-01-01", number: 1000, debit: 10 }));
    records.push(ledgerRecord({ date: "2023-01-01", number: 1000, debit: 1000 }));

    const issues = validateCommonIssues(records, NOW);

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ severity: "Info", category: "Outliers", affectedRows: [20], totalAffected: 1 });
  });

  it("caps the listed rows at one hundred", () => {
    const records = Array.from({ length: 150 }, () => ledgerRecord({ date: null, number: 1000 }));

    const [missingDates] = validateCommonIssues(records, NOW);

    expect(missingDates.affectedRows).toHaveLength(100);
    expect(missingDates.totalAffected).toBe(150);
  });

  it("returns nothing for clean data", () => {
    const records = [
      ledgerRecord({ date: "2023-01-01", number: 1000, debit: 10 }),
      ledgerRecord({ date: "2023-01-01", number: 4000, credit: 10 }),
    ];

    expect(validateCommonIssues(records, NOW)).toEqual([]);
  });
});

describe("validateRequiredCategories", () => {
  it("warns about missing balance sheet anchors in a TB", () => {
    const issues = validateRequiredCategories([classifiedRecord("cash", { date: "2023-12-31" })], "snapshot");

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe("Warning");
    expect(issues[0].issue).toBe("Trial Balance has no accounts mapped to: accounts_payable, common_stock");
  });

  it("accepts a GL with revenue and cost of sales", () => {
    const records = [
      classifiedRecord("revenue", { date: "2023-12-31" }),
      classifiedRecord("cogs", { date: "2023-12-31" }),
    ];

    expect(validateRequiredCategories(records, "activity")).toEqual([]);
  });
});

describe("validateOpeningSnapshot", () => {
  const gl = ["2022-06-30", "2023-06-30", "2024-06-30"].map((date) => ledgerRecord({ date, number: 4000 }));

  it("requires the TB snapshot for the year before the statement years", () => {
    const tb = ["2022-12-31", "2023-12-31", "2024-12-31"].map((date) => ledgerRecord({ date, number: 1000 }));

    const [strict] = validateOpeningSnapshot(tb, gl, 3, true);
    const [lenient] = validateOpeningSnapshot(tb, gl, 3, false);

    expect(strict.severity).toBe("Critical");
    expect(strict.issue).toBe("Trial Balance has no 2021 year-end snapshot");
    expect(lenient.severity).toBe("Warning");
  });

  it("passes when the opening year is present", () => {
    const tb = ["2021-12-31", "2022-12-31", "2023-12-31", "2024-12-31"].map((date) =>
      ledgerRecord({ date, number: 1000 })
    );

    expect(validateOpeningSnapshot(tb, gl, 3, true)).toEqual([]);
  });

  it("does not apply to single-source runs", () => {
    expect(validateOpeningSnapshot([], gl, 3, true)).toEqual([]);
  });
});

describe("applyAutoFixes", () => {
  it("applies every selected fix and logs the changes", () => {
    const records = messyRecords();

    const { records: fixed, changes } = applyAutoFixes(
      records,
      ["remove_missing_dates", "map_unclassified", "fix_account_numbers", "remove_duplicates", "remove_future_dates"],
      NOW
    );

    expect(fixed.map((record) => [record.transactionId, record.accountNumber])).toEqual([
      ["A", 1000],
      ["A", 9999],
      ["C", 1200],
    ]);
    expect(changes).toEqual([
      "Removed 1 rows with missing dates",
      "Mapped 1 entries to Unclassified (9999)",
      "Fixed 1 invalid account numbers",
      "Removed 1 duplicate transactions",
      "Removed 1 future-dated transactions",
    ]);
    expect(records[2].accountNumber).toBeNull();
  });

  it("leaves unselected problems alone", () => {
    const { records: fixed, changes } = applyAutoFixes(messyRecords(), ["fix_account_numbers"], NOW);

    expect(fixed).toHaveLength(6);
    expect(fixed[3].accountNumber).toBe(1200);
    expect(changes).toEqual(["Fixed 1 invalid account numbers"]);
  });

  it("keeps every line of a balanced posting when removing duplicates", () => {
    const posting = [
      ledgerRecord({ date: "2023-05-01", number: 1000, debit: 100, txnId: "T1" }),
      ledgerRecord({ date: "2023-05-01", number: 4000, credit: 100, txnId: "T1" }),
    ];

    const { records: fixed, changes } = applyAutoFixes(posting, ["remove_duplicates"], NOW);

    expect(fixed.map((record) => [record.accountNumber, record.debit.toString(), record.credit.toString()])).toEqual([
      [1000, "100", "0"],
      [4000, "0", "100"],
    ]);
    expect(changes).toEqual([]);
  });
});
