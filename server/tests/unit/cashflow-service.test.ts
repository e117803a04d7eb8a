/**
 * Unit Tests: Cash-Flow Service
 * Public operations, eager validation and error mapping
 */

import { describe, it, expect } from 'vitest';
import { CashFlowService } from '../../services/cashflow-service';
import { getLogger } from '../../bootstrap/logger';
import { EngineError, ErrorCode } from '../../utils/error-handler';
import type { LoanRecord } from '../../../shared/cashflow-types';

const service = new CashFlowService(
  { yieldMaxIterations: 100, yieldTolerance: 1e-10, yieldCompounding: 'monthly' },
  getLogger('silent', false)
);

const loans: LoanRecord[] = [
  { loanId: 'c-1', balance: 8000, annualRate: 0.09, remainingTermMonths: 12, snapshotDate: '2025-06-01', tier: 'near-prime' },
  { loanId: 'c-2', balance: 4000, annualRate: 0.11, remainingTermMonths: 6, snapshotDate: '2025-06-01' }
];

const assumptions = {
  tiers: {
    default: { cpr: 0.1, annualCreditCost: 0.03 },
    'near-prime': { cpr: 0.08, probabilityOfDefault: 0.05, lossGivenDefault: 0.6 }
  },
  servicingFeeRate: 0.005
};

function captureError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (error) {
    if (error instanceof EngineError) return error;
    throw error;
  }
  throw new Error('expected an EngineError');
}

describe('Cash-Flow Service', () => {
  describe('compute_cash_flows', () => {
    it('should return per-loan rows tagged with a run id', () => {
      const run = service.computeCashFlows(loans, assumptions);
      expect(run.runId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
      expect(run.loanCashFlows).toHaveLength(18);
      expect(run.monthlyTotals).toBeUndefined();
    });

    it('should add monthly totals grouped as requested', () => {
      const run = service.computeCashFlows(loans, assumptions, { includeMonthlyTotals: true, groupBy: ['tier'] });
      expect(run.monthlyTotals).toHaveLength(18);
      expect(run.monthlyTotals?.[0].group).toEqual({ tier: 'default' });
      expect(run.monthlyTotals?.[1].group).toEqual({ tier: 'near-prime' });
    });

    it('should map schema violations to INVALID_INPUT with field details', () => {
      const error = captureError(() => service.computeCashFlows([{ ...loans[0], balance: -1 }], assumptions));
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.message).toBe('0.balance: Must be greater than 0');
      expect(error.details).toEqual({ fields: { '0.balance': ['Must be greater than 0'] } });
    });

    it('should reject duplicate loan ids', () => {
      const error = captureError(() => service.computeCashFlows([loans[0], loans[0]], assumptions));
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.message).toBe('1.loanId: Duplicate loan id c-1');
    });

    it('should require a default tier', () => {
      const error = captureError(() =>
        service.computeCashFlows(loans, { tiers: { 'near-prime': { cpr: 0.08, annualCreditCost: 0.01 } } })
      );
      expect(error.message).toBe('tiers: A "default" tier assumption is required');
    });

    it('should reject an investor share outside (0, 1]', () => {
      const error = captureError(() => service.computeCashFlows(loans, { ...assumptions, investorShare: 0 }));
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.message).toBe('investorShare: Must be greater than 0');
    });
  });

  describe('risk operations', () => {
    const run = service.computeCashFlows(loans, assumptions);

    it('should compute duration with convexity on request', () => {
      const result = service.computeDuration(run.loanCashFlows, undefined, true);
      expect(result.macaulayDuration).toBeGreaterThan(0);
      expect(result.convexity).toBeGreaterThan(0);
    });

    it('should compute WAL for the investor share', () => {
      expect(service.computeWal(run.loanCashFlows, 'investor')).toBeCloseTo(service.computeWal(run.loanCashFlows), 12);
    });

    it('should solve yields with configured defaults', () => {
      const series = [
        { date: '2026-06-01', amount: 550 },
        { date: '2027-06-01', amount: 550 }
      ];
      const pv = 550 / Math.pow(1 + 0.1 / 12, 12) + 550 / Math.pow(1 + 0.1 / 12, 24);
      expect(service.solveYield(series, pv, '2025-06-01')).toBeCloseTo(0.1, 8);
    });

    it('should surface solver failures as engine errors', () => {
      const error = captureError(() => service.solveYield([], 100, '2025-06-01'));
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.message).toBe('Cash-flow series is empty');
    });
  });
});
