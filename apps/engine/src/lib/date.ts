const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a ledger transaction date.
 *
 * Plain `YYYY-MM-DD` strings are read as UTC midnight so the calendar year
 * never shifts with the host timezone. Anything that does not parse yields
 * null.
 */
export function parseTxnDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (trimmed === "") return null;

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    const [, year, month, day] = iso;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    // Reject rollovers such as 2023-02-30
    if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
      return null;
    }
    return date;
  }

  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function fiscalYearOf(date: Date): number {
  return date.getUTCFullYear();
}

export function formatDateInput(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
