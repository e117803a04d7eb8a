/**
 * Unit Tests: Risk Metrics
 * Duration, convexity and WAL on the three-loan reference portfolio
 */

import { describe, it, expect } from 'vitest';
import { projectPortfolio } from '../../domain/amortization';
import { parseAssumptions } from '../../domain/assumptions';
import {
  computeDuration,
  computeDurationByLoan,
  computeWal,
  estimatePriceChange,
  presentValueAt
} from '../../domain/risk-metrics';
import { ErrorCode, isEngineError } from '../../utils/error-handler';
import type { LoanRecord } from '../../../shared/cashflow-types';

const SNAPSHOT = '2025-01-01';

const portfolio: LoanRecord[] = [
  { loanId: 'auto-1', balance: 25000, annualRate: 0.0599, remainingTermMonths: 60, snapshotDate: SNAPSHOT },
  { loanId: 'auto-2', balance: 50000, annualRate: 0.0649, remainingTermMonths: 48, snapshotDate: SNAPSHOT },
  { loanId: 'auto-3', balance: 15000, annualRate: 0.0549, remainingTermMonths: 36, snapshotDate: SNAPSHOT }
];

const assumptions = parseAssumptions({
  tiers: { default: { cpr: 0.05, annualCreditCost: 0.01 } },
  servicingFeeRate: 0.0025
});

const rows = projectPortfolio(portfolio, assumptions);

function relativeError(actual: number, expected: number): number {
  return Math.abs(actual / expected - 1);
}

describe('Risk Metrics', () => {
  describe('Reference portfolio', () => {
    const result = computeDuration(rows, { includeConvexity: true });

    it('should price the portfolio at its loan rates', () => {
      expect(relativeError(result.presentValue, 88867.3)).toBeLessThan(0.005);
    });

    it('should match the reference durations', () => {
      expect(relativeError(result.macaulayDuration, 1.645)).toBeLessThan(0.005);
      expect(relativeError(result.modifiedDuration, 1.637)).toBeLessThan(0.005);
    });

    it('should match the reference convexity', () => {
      expect(result.convexity).toBeDefined();
      expect(relativeError(result.convexity ?? 0, 3.951)).toBeLessThan(0.005);
    });

    it('should match the reference weighted average life', () => {
      expect(relativeError(computeWal(rows), 1.78)).toBeLessThan(0.005);
    });

    it('should report a value-weighted rate between the loan rates', () => {
      expect(result.discountRate).toBeGreaterThan(0.0549);
      expect(result.discountRate).toBeLessThan(0.0649);
    });

    it('should agree with a direct present value', () => {
      expect(presentValueAt(rows)).toBeCloseTo(result.presentValue, 6);
    });

    it('should add up per-loan present values to the portfolio value', () => {
      const byLoan = computeDurationByLoan(rows);
      expect(Array.from(byLoan.keys())).toEqual(['auto-1', 'auto-2', 'auto-3']);
      const total = Array.from(byLoan.values()).reduce((s, r) => s + r.presentValue, 0);
      expect(total).toBeCloseTo(result.presentValue, 6);
    });
  });

  describe('Rate shocks', () => {
    const result = computeDuration(rows, { includeConvexity: true });

    it.each([0.03, -0.03])('should get closer to the repriced value with convexity at %f', shift => {
      const actual = presentValueAt(rows, { shift }) - result.presentValue;
      const estimate = estimatePriceChange(result, shift);
      expect(estimate.withConvexity).toBeDefined();
      const durationGap = Math.abs(actual - estimate.durationOnly);
      const convexityGap = Math.abs(actual - (estimate.withConvexity ?? estimate.durationOnly));
      expect(convexityGap).toBeLessThan(durationGap);
    });

    it('should lose value when rates rise', () => {
      expect(presentValueAt(rows, { shift: 0.01 })).toBeLessThan(result.presentValue);
    });
  });

  describe('Single loan', () => {
    const single = parseAssumptions({ tiers: { default: { cpr: 0, annualCreditCost: 0 } } });
    const loanRows = projectPortfolio([portfolio[0]], single);

    it('should relate modified and Macaulay duration through the monthly rate', () => {
      const result = computeDuration(loanRows);
      expect(result.modifiedDuration).toBeCloseTo(result.macaulayDuration / (1 + 0.0599 / 12), 12);
      expect(result.discountRate).toBeCloseTo(0.0599, 12);
      expect(result.convexity).toBeUndefined();
    });

    it('should use a forced discount rate for every row', () => {
      const result = computeDuration(loanRows, { discountRate: 0.08 });
      expect(result.discountRate).toBeCloseTo(0.08, 12);
      expect(result.modifiedDuration).toBeCloseTo(result.macaulayDuration / (1 + 0.08 / 12), 12);
      expect(result.presentValue).toBeLessThan(computeDuration(loanRows).presentValue);
    });
  });

  describe('Weighted average life', () => {
    it('should ignore the scale of principal amounts', () => {
      const scaled = rows.map(r => ({ ...r, totalPrincipal: r.totalPrincipal * 3.5 }));
      expect(computeWal(scaled)).toBeCloseTo(computeWal(rows), 12);
    });

    it('should give the same life on the investor share of principal', () => {
      const partial = parseAssumptions({
        tiers: { default: { cpr: 0.05, annualCreditCost: 0.01 } },
        investorShare: 0.8
      });
      const partialRows = projectPortfolio(portfolio, partial);
      expect(computeWal(partialRows, 'investor')).toBeCloseTo(computeWal(partialRows, 'total'), 12);
    });

    it('should reject rows that repay no principal', () => {
      let error: unknown;
      try {
        computeWal([{ ...rows[0], totalPrincipal: 0 }]);
      } catch (e) {
        error = e;
      }
      expect(isEngineError(error, ErrorCode.INVALID_INPUT)).toBe(true);
    });
  });

  describe('Invalid input', () => {
    it('should reject an empty row set', () => {
      expect(() => computeDuration([])).toThrow('No cash-flow rows supplied');
    });

    it('should reject a discount rate at or below -100%', () => {
      expect(() => computeDuration(rows, { discountRate: -1 })).toThrow('discountRate must be a finite rate above -100%');
    });
  });
});
