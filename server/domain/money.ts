/**
 * Rate conversions and payment math for monthly cash-flow projection
 */

import Decimal from 'decimal.js';
import type { CreditAssumption } from '../../shared/cashflow-types';

const Exact = Decimal.clone({ precision: 40 });

/**
 * Convert an annual nominal rate to the monthly periodic rate
 * @param annualRate Annual rate as decimal (e.g., 0.0599)
 */
export function annualToMonthlyRate(annualRate: number): number {
  return annualRate / 12;
}

/**
 * Compound conversion of an annual probability to its monthly equivalent:
 * 1 - (1 - annual)^(1/12)
 */
export function annualToMonthlyCompound(annual: number): number {
  if (annual <= 0) return 0;
  return 1 - Math.pow(1 - annual, 1 / 12);
}

/**
 * Single monthly mortality from a conditional prepayment rate
 */
export function cprToSmm(cpr: number): number {
  return annualToMonthlyCompound(cpr);
}

/**
 * Annual credit cost, either given directly or as PD x LGD
 */
export function annualCreditCost(credit: CreditAssumption): number {
  if ('annualCreditCost' in credit) {
    return credit.annualCreditCost;
  }
  return credit.probabilityOfDefault * credit.lossGivenDefault;
}

/**
 * Level payment amount for a fully amortizing loan
 * @param balance Present value (principal)
 * @param r Periodic decimal rate (e.g., 0.005 for 0.5% per month)
 * @param n Number of periods
 */
export function levelPayment(balance: number, r: number, n: number): number {
  if (n <= 0) throw new RangeError('Number of periods must be > 0');

  if (r === 0) {
    return balance / n;
  }

  // PMT = P * r / (1 - (1 + r)^-n)
  return (r * balance) / (1 - Math.pow(1 + r, -n));
}

/**
 * Remaining balance after k level payments
 */
export function remainingBalance(balance: number, payment: number, r: number, k: number): number {
  if (r === 0) {
    return Math.max(0, balance - payment * k);
  }
  // B = P(1+r)^k - PMT((1+r)^k - 1)/r
  const factor = Math.pow(1 + r, k);
  return Math.max(0, balance * factor - (payment * (factor - 1)) / r);
}

/**
 * Sum in 40-digit decimal so the result does not depend on the order of terms
 */
export function sumExact(values: Iterable<number>): number {
  let total = new Exact(0);
  for (const v of values) {
    total = total.plus(v);
  }
  return total.toNumber();
}
