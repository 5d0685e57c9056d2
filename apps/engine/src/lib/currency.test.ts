import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
  coerceAmount,
  formatAmount,
  sumAmounts,
  safeRatio,
  maxAmount,
  isAmountZero,
  formatWithSeparators,
} from './currency';

describe('coerceAmount', () => {
  it('should accept numbers, numeric strings and Decimals', () => {
    expect(coerceAmount(12.5)?.toString()).toBe('12.5');
    expect(coerceAmount(' 1,250.75 ')?.toString()).toBe('1250.75');
    expect(coerceAmount(new Decimal('3'))?.toString()).toBe('3');
  });

  it('should return null for values that are not amounts', () => {
    expect(coerceAmount('abc')).toBeNull();
    expect(coerceAmount('')).toBeNull();
    expect(coerceAmount(null)).toBeNull();
    expect(coerceAmount(undefined)).toBeNull();
    expect(coerceAmount(NaN)).toBeNull();
    expect(coerceAmount({})).toBeNull();
  });
});

describe('formatAmount', () => {
  it('should format with default 2 decimals', () => {
    expect(formatAmount(new Decimal(100.5))).toBe('100.50');
    expect(formatAmount('-50.25')).toBe('-50.25');
  });

  it('should handle rounding correctly', () => {
    expect(formatAmount('100.555', 2)).toBe('100.56');
    expect(formatAmount('100.554', 2)).toBe('100.55');
  });
});

describe('arithmetic helpers', () => {
  it('should sum empty array to zero', () => {
    expect(sumAmounts([]).toString()).toBe('0');
  });

  it('should preserve precision', () => {
    expect(sumAmounts([0.1, 0.2]).toString()).toBe('0.3');
    expect(sumAmounts(['100.5', new Decimal('-50.25')]).toString()).toBe('50.25');
  });

  it('should pick the larger amount', () => {
    expect(maxAmount(0, -25).toString()).toBe('0');
    expect(maxAmount(0, 640).toString()).toBe('640');
  });
});

describe('safeRatio', () => {
  it('should divide when the denominator is non-zero', () => {
    expect(safeRatio(1, 4).toString()).toBe('0.25');
  });

  it('should return zero instead of Infinity or NaN for a zero denominator', () => {
    expect(safeRatio(500, 0).toString()).toBe('0');
    expect(safeRatio(0, '0.00').toString()).toBe('0');
  });
});

describe('isAmountZero', () => {
  it('should return true for values within default tolerance (0.01)', () => {
    expect(isAmountZero('0.009')).toBe(true);
    expect(isAmountZero('-0.01')).toBe(true);
  });

  it('should return false for values exceeding tolerance', () => {
    expect(isAmountZero('0.011')).toBe(false);
  });

  it('should respect custom tolerance', () => {
    expect(isAmountZero('0.05', 0.1)).toBe(true);
    expect(isAmountZero('0.15', 0.1)).toBe(false);
  });
});

describe('formatWithSeparators', () => {
  it('should group thousands and keep fixed decimals', () => {
    expect(formatWithSeparators(1234567.5)).toBe('1,234,567.50');
    expect(formatWithSeparators('-1234.5')).toBe('-1,234.50');
    expect(formatWithSeparators(999)).toBe('999.00');
  });

  it('should omit the fraction when decimals is zero', () => {
    expect(formatWithSeparators(1500, 0)).toBe('1,500');
  });
});
