/**
 * Duration, convexity and weighted average life over generated schedules.
 *
 * Discounting is monthly compounded, (1 + y/12)^(-12t), with t the actual/actual
 * years from each loan's snapshot date. Each row is discounted at its loan's own
 * rate unless a single override rate is given.
 */

import type {
  CashFlowField,
  DurationResult,
  MonthlyCashFlowRow,
  PrincipalField
} from '../../shared/cashflow-types';
import { invalidInput } from '../utils/error-handler';

export interface DurationOptions {
  discountRate?: number;
  includeConvexity?: boolean;
  cashFlowField?: CashFlowField;
}

export interface PresentValueOptions {
  shift?: number;
  discountRate?: number;
  cashFlowField?: CashFlowField;
}

export interface PriceChangeEstimate {
  durationOnly: number;
  withConvexity?: number;
}

function cashFlowOf(row: MonthlyCashFlowRow, field: CashFlowField): number {
  return field === 'investor' ? row.investorTotal : row.totalPayment;
}

function principalOf(row: MonthlyCashFlowRow, field: PrincipalField): number {
  return field === 'investor' ? row.investorPrincipal : row.totalPrincipal;
}

function assertRows(rows: readonly MonthlyCashFlowRow[]): void {
  if (rows.length === 0) {
    throw invalidInput('No cash-flow rows supplied');
  }
}

function assertRate(rate: number | undefined, name: string): void {
  if (rate !== undefined && (!Number.isFinite(rate) || rate <= -1)) {
    throw invalidInput(`${name} must be a finite rate above -100%`, { [name]: rate });
  }
}

export function computeDuration(
  rows: readonly MonthlyCashFlowRow[],
  options: DurationOptions = {}
): DurationResult {
  assertRows(rows);
  assertRate(options.discountRate, 'discountRate');
  const field = options.cashFlowField ?? 'total';

  let pv = 0;
  let timeWeighted = 0;
  let modifiedWeighted = 0;
  let convexityWeighted = 0;
  let rateWeighted = 0;

  for (const row of rows) {
    const y = options.discountRate ?? row.annualRate;
    const t = row.timeYears;
    const growth = 1 + y / 12;
    const value = cashFlowOf(row, field) * Math.pow(growth, -12 * t);

    pv += value;
    timeWeighted += value * t;
    modifiedWeighted += (value * t) / growth;
    convexityWeighted += (value * t * (t + 1 / 12)) / (growth * growth);
    rateWeighted += value * y;
  }

  if (pv === 0) {
    throw invalidInput('Present value of the cash flows is zero');
  }

  const result: DurationResult = {
    presentValue: pv,
    macaulayDuration: timeWeighted / pv,
    modifiedDuration: modifiedWeighted / pv,
    discountRate: rateWeighted / pv
  };
  if (options.includeConvexity) {
    result.convexity = convexityWeighted / pv;
  }
  return result;
}

/**
 * Duration per loan, keyed by loan id in first-seen order
 */
export function computeDurationByLoan(
  rows: readonly MonthlyCashFlowRow[],
  options: DurationOptions = {}
): Map<string, DurationResult> {
  const byLoan = new Map<string, MonthlyCashFlowRow[]>();
  for (const row of rows) {
    const list = byLoan.get(row.loanId) ?? [];
    list.push(row);
    byLoan.set(row.loanId, list);
  }

  const results = new Map<string, DurationResult>();
  for (const [loanId, loanRows] of byLoan) {
    results.set(loanId, computeDuration(loanRows, options));
  }
  return results;
}

/**
 * Direct present value with every discount rate moved by `shift`
 */
export function presentValueAt(
  rows: readonly MonthlyCashFlowRow[],
  options: PresentValueOptions = {}
): number {
  assertRows(rows);
  assertRate(options.discountRate, 'discountRate');
  const shift = options.shift ?? 0;
  const field = options.cashFlowField ?? 'total';

  return rows.reduce((pv, row) => {
    const y = (options.discountRate ?? row.annualRate) + shift;
    return pv + cashFlowOf(row, field) * Math.pow(1 + y / 12, -12 * row.timeYears);
  }, 0);
}

/**
 * Second-order Taylor estimate of the price change for a parallel rate move
 */
export function estimatePriceChange(result: DurationResult, shift: number): PriceChangeEstimate {
  const durationOnly = -result.modifiedDuration * shift * result.presentValue;
  if (result.convexity === undefined) {
    return { durationOnly };
  }
  return {
    durationOnly,
    withConvexity: durationOnly + 0.5 * result.convexity * shift * shift * result.presentValue
  };
}

/**
 * Weighted average life in years; undiscounted
 */
export function computeWal(
  rows: readonly MonthlyCashFlowRow[],
  principalField: PrincipalField = 'total'
): number {
  assertRows(rows);

  let weighted = 0;
  let principal = 0;
  for (const row of rows) {
    const p = principalOf(row, principalField);
    weighted += p * row.timeYears;
    principal += p;
  }

  if (principal === 0) {
    throw invalidInput('No principal is repaid in the supplied rows');
  }
  return weighted / principal;
}
