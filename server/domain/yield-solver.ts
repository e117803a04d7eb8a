/**
 * Effective yield of an irregular, dated cash-flow series.
 *
 * Solves for the annual rate r (quoted under the chosen compounding) at which
 *    -pv + sum_i amount_i * DF(t_i) = 0
 * where t_i is the actual/actual year fraction from the start date and
 *    DF(t) = (1 + r/m)^(-m*t)   discrete, m periods per year
 *    DF(t) = e^(-r*t)           continuous
 *
 * Newton's method runs first; if it diverges, oscillates, loses its derivative
 * or leaves the bracket, the solver switches to bisection on the lowest
 * sub-interval of [-99%, 1000%] where the NPV changes sign.
 * Iterations of both phases share the same maxIterations budget.
 */

import type {
  AmountField,
  CashFlowSeries,
  Compounding,
  ISODate,
  PortfolioMonthlyTotal
} from '../../shared/cashflow-types';
import { isIsoDate, yearFraction } from './day-count';
import { domainError, invalidInput, noConvergence } from '../utils/error-handler';

export const RATE_FLOOR = -0.99;
export const RATE_CEILING = 10;
const DEFAULT_GUESS = 0.1;
const MIN_DERIVATIVE = 1e-12;
const BRACKET_SCAN_STEPS = 200;

export interface YieldSolverOptions {
  compounding: Compounding;
  maxIterations: number;
  tolerance: number;
  initialGuess?: number;
}

export type SolverPhase = 'newton' | 'bisection';

export interface YieldSolution {
  rate: number;
  iterations: number;
  phase: SolverPhase;
}

interface TimedFlow {
  t: number;
  amount: number;
}

export function periodsPerYear(compounding: Exclude<Compounding, 'continuous'>): number {
  switch (compounding) {
    case 'monthly': return 12;
    case 'quarterly': return 4;
    case 'semiannual': return 2;
    case 'annual': return 1;
  }
}

export function discountFactor(rate: number, t: number, compounding: Compounding): number {
  if (compounding === 'continuous') {
    return Math.exp(-rate * t);
  }
  const m = periodsPerYear(compounding);
  return Math.pow(1 + rate / m, -m * t);
}

/**
 * d DF / d rate
 */
function discountFactorSlope(rate: number, t: number, compounding: Compounding): number {
  if (compounding === 'continuous') {
    return -t * Math.exp(-rate * t);
  }
  const m = periodsPerYear(compounding);
  return -t * Math.pow(1 + rate / m, -m * t - 1);
}

/**
 * Effective annual rate equivalent to a rate quoted under the given compounding
 */
export function effectiveAnnualRate(rate: number, compounding: Compounding): number {
  if (compounding === 'continuous') {
    return Math.exp(rate) - 1;
  }
  const m = periodsPerYear(compounding);
  return Math.pow(1 + rate / m, m) - 1;
}

function validate(series: CashFlowSeries, pv: number, startDate: ISODate, options: YieldSolverOptions): TimedFlow[] {
  if (series.length === 0) {
    throw invalidInput('Cash-flow series is empty');
  }
  if (!Number.isFinite(pv) || pv <= 0) {
    throw invalidInput('Present value must be a positive amount', { pv });
  }
  if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
    throw invalidInput('maxIterations must be a positive integer', { maxIterations: options.maxIterations });
  }
  if (!(options.tolerance > 0)) {
    throw invalidInput('tolerance must be > 0', { tolerance: options.tolerance });
  }
  if (!isIsoDate(startDate)) {
    throw domainError(`Invalid start date: ${startDate}`);
  }
  if (series.every(cf => cf.amount === 0)) {
    throw invalidInput('All cash flows are zero; no finite yield exists');
  }

  return series.map((cf, index) => {
    if (!Number.isFinite(cf.amount)) {
      throw invalidInput(`Cash flow ${index} has a non-finite amount`, { index });
    }
    if (!isIsoDate(cf.date)) {
      throw domainError(`Cash flow ${index} has an invalid date: ${cf.date}`, { index });
    }
    const t = yearFraction(startDate, cf.date);
    if (t < 0) {
      throw domainError(`Cash flow ${index} is dated before the start date`, { index, date: cf.date, startDate });
    }
    return { t, amount: cf.amount };
  });
}

/**
 * Guess from the simple average return: (sum / pv - 1) over the amount-weighted time
 */
function initialGuess(flows: TimedFlow[], pv: number): number {
  const total = flows.reduce((s, f) => s + f.amount, 0);
  const weightedTime = flows.reduce((s, f) => s + f.amount * f.t, 0);
  if (total === 0 || weightedTime === 0) return DEFAULT_GUESS;

  const guess = (total / pv - 1) / (weightedTime / total);
  return Number.isFinite(guess) && guess > RATE_FLOOR && guess < RATE_CEILING ? guess : DEFAULT_GUESS;
}

/**
 * Solve for the yield, reporting which phase converged and how many iterations it took
 */
export function solveYieldDetailed(
  series: CashFlowSeries,
  pv: number,
  startDate: ISODate,
  options: YieldSolverOptions
): YieldSolution {
  const flows = validate(series, pv, startDate, options);
  const { compounding, maxIterations, tolerance } = options;

  const npv = (rate: number): number =>
    flows.reduce((s, f) => s + f.amount * discountFactor(rate, f.t, compounding), -pv);
  const slope = (rate: number): number =>
    flows.reduce((s, f) => s + f.amount * discountFactorSlope(rate, f.t, compounding), 0);

  let phase: SolverPhase = 'newton';
  let rate = options.initialGuess ?? initialGuess(flows, pv);
  let previousStep = Infinity;
  let lo = RATE_FLOOR;
  let hi = RATE_CEILING;
  let npvLo = 0;
  let iterations = 0;

  // Narrow [lo, hi] to the lowest sub-interval whose ends straddle a root
  const openBracket = (): number => {
    const width = (RATE_CEILING - RATE_FLOOR) / BRACKET_SCAN_STEPS;
    let left = RATE_FLOOR;
    let atLeft = npv(left);
    for (let i = 1; i <= BRACKET_SCAN_STEPS; i++) {
      const right = i === BRACKET_SCAN_STEPS ? RATE_CEILING : RATE_FLOOR + i * width;
      const atRight = npv(right);
      if (atLeft * atRight <= 0) {
        lo = left;
        hi = right;
        return atLeft;
      }
      left = right;
      atLeft = atRight;
    }
    throw domainError('NPV does not change sign between -99% and 1000%; no yield in range', {
      npvAtFloor: npv(RATE_FLOOR),
      npvAtCeiling: atLeft
    });
  };

  while (iterations < maxIterations) {
    iterations++;

    if (phase === 'newton') {
      const f = npv(rate);
      if (Math.abs(f) < tolerance) {
        return { rate, iterations, phase };
      }
      const d = slope(rate);
      if (!Number.isFinite(d) || Math.abs(d) < MIN_DERIVATIVE) {
        phase = 'bisection';
        npvLo = openBracket();
        continue;
      }
      const step = f / d;
      const next = rate - step;
      const diverging = Math.abs(step) >= Math.abs(previousStep);
      if (!Number.isFinite(next) || next <= RATE_FLOOR || next >= RATE_CEILING || diverging) {
        phase = 'bisection';
        npvLo = openBracket();
        continue;
      }
      if (Math.abs(step) < tolerance) {
        return { rate: next, iterations, phase };
      }
      previousStep = step;
      rate = next;
      continue;
    }

    const mid = (lo + hi) / 2;
    const fMid = npv(mid);
    if (Math.abs(fMid) < tolerance || (hi - lo) / 2 < tolerance) {
      return { rate: mid, iterations, phase };
    }
    if (fMid * npvLo > 0) {
      lo = mid;
      npvLo = fMid;
    } else {
      hi = mid;
    }
    rate = mid;
  }

  throw noConvergence(`Yield did not converge within ${maxIterations} iterations`, {
    iterations,
    phase,
    lastRate: rate
  });
}

export function solveYield(
  series: CashFlowSeries,
  pv: number,
  startDate: ISODate,
  options: YieldSolverOptions
): number {
  return solveYieldDetailed(series, pv, startDate, options).rate;
}

/**
 * Dated series from portfolio monthly totals, one point per month
 */
export function seriesFromTotals(
  totals: readonly PortfolioMonthlyTotal[],
  field: AmountField = 'investorTotal'
): CashFlowSeries {
  return totals.map(total => ({ date: total.paymentDate, amount: total[field] }));
}
