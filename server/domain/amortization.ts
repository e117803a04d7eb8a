/**
 * Loan cash-flow projection: credit loss, prepayment, scheduled principal,
 * interest accrual and the fee / ownership waterfall, one row per month.
 */

import type {
  AssumptionSet,
  LoanRecord,
  MonthlyCashFlowRow,
  ResolvedAssumption
} from '../../shared/cashflow-types';
import {
  annualToMonthlyCompound,
  annualToMonthlyRate,
  cprToSmm,
  levelPayment
} from './money';
import { monthlySchedule, yearFraction } from './day-count';
import { resolveAssumption } from './assumptions';
import { invalidInput } from '../utils/error-handler';

function assertProjectable(loan: LoanRecord): void {
  if (!(loan.balance > 0)) {
    throw invalidInput(`Loan ${loan.loanId}: balance must be > 0`, { loanId: loan.loanId, balance: loan.balance });
  }
  if (!Number.isInteger(loan.remainingTermMonths) || loan.remainingTermMonths < 1) {
    throw invalidInput(`Loan ${loan.loanId}: remaining term must be a whole number of months >= 1`, {
      loanId: loan.loanId,
      remainingTermMonths: loan.remainingTermMonths
    });
  }
  if (!(loan.annualRate >= 0)) {
    throw invalidInput(`Loan ${loan.loanId}: negative rates are not modeled`, { loanId: loan.loanId, annualRate: loan.annualRate });
  }
}

/**
 * Contractual monthly payment: the supplied one, else the level payment
 * for the snapshot balance, rate and remaining term
 */
export function contractualPayment(loan: LoanRecord): number {
  if (loan.monthlyPayment !== undefined) {
    return loan.monthlyPayment;
  }
  return levelPayment(loan.balance, annualToMonthlyRate(loan.annualRate), loan.remainingTermMonths);
}

/**
 * Generate the month-by-month schedule for one loan.
 * Each row depends only on the previous row's remaining balance.
 */
export function projectLoan(
  loan: LoanRecord,
  assumptions: AssumptionSet,
  resolved: ResolvedAssumption = resolveAssumption(assumptions, loan.tier)
): MonthlyCashFlowRow[] {
  assertProjectable(loan);

  const n = loan.remainingTermMonths;
  const r = annualToMonthlyRate(loan.annualRate);
  const smm = cprToSmm(resolved.cpr);
  const monthlyCredit = annualToMonthlyCompound(resolved.annualCreditCost);
  const payment = contractualPayment(loan);
  const share = assumptions.investorShare;
  const originationPerMonth = loan.originalBalance !== undefined
    ? (loan.originalBalance * assumptions.originationFeeRate) / n
    : 0;

  const dates = monthlySchedule(loan.snapshotDate, n);
  const rows: MonthlyCashFlowRow[] = [];
  let balance = loan.balance;

  for (let k = 1; k <= n; k++) {
    const startingBalance = balance;
    const creditLoss = startingBalance * monthlyCredit;
    const prepayment = (startingBalance - creditLoss) * smm;
    const adjustedBalance = startingBalance - creditLoss - prepayment;

    const accrualBalance = assumptions.interestOnStartingBalance ? startingBalance : adjustedBalance;
    const grossInterest = accrualBalance * r;

    let scheduledPrincipal: number;
    let capitalizedInterest = 0;
    if (k === n) {
      // Final period: pay off whatever is left
      scheduledPrincipal = adjustedBalance;
    } else if (payment < grossInterest) {
      scheduledPrincipal = 0;
      if (assumptions.negativeAmortization === 'capitalize') {
        capitalizedInterest = grossInterest - payment;
      }
    } else {
      scheduledPrincipal = Math.min(payment - grossInterest, adjustedBalance);
    }

    const totalPrincipal = scheduledPrincipal + prepayment;
    const remainingBalance = Math.max(0, adjustedBalance - scheduledPrincipal + capitalizedInterest);
    const totalPayment = grossInterest - capitalizedInterest + totalPrincipal;

    // Fee waterfall
    const servicingFee = accrualBalance * annualToMonthlyRate(assumptions.servicingFeeRate);
    const reportingFee = accrualBalance * annualToMonthlyRate(assumptions.reportingFeeRate);
    const originationFee = startingBalance > 0 ? originationPerMonth : 0;

    // Capitalized interest was not paid in cash, so it never reaches the investor
    let netInterest = grossInterest - capitalizedInterest - servicingFee - reportingFee - originationFee;
    if (assumptions.creditLossReducesInterest) {
      netInterest -= creditLoss;
    }
    netInterest = Math.max(0, netInterest);

    const investorPrincipal = totalPrincipal * share;
    const investorInterest = netInterest * share;

    rows.push({
      loanId: loan.loanId,
      tier: resolved.tier,
      period: k,
      paymentDate: dates[k - 1],
      timeYears: yearFraction(loan.snapshotDate, dates[k - 1]),
      annualRate: loan.annualRate,
      startingBalance,
      creditLoss,
      prepayment,
      adjustedBalance,
      accrualBalance,
      grossInterest,
      scheduledPrincipal,
      totalPrincipal,
      remainingBalance,
      totalPayment,
      capitalizedInterest,
      servicingFee,
      reportingFee,
      originationFee,
      netInterest,
      investorPrincipal,
      investorInterest,
      investorTotal: investorPrincipal + investorInterest
    });

    balance = remainingBalance;
  }

  return rows;
}

/**
 * Map step of the pipeline: loans are independent, so the schedules
 * can be generated in any order and concatenated.
 */
export function projectPortfolio(
  loans: readonly LoanRecord[],
  assumptions: AssumptionSet
): MonthlyCashFlowRow[] {
  const resolved = loans.map(loan => resolveAssumption(assumptions, loan.tier));
  return loans.flatMap((loan, i) => projectLoan(loan, assumptions, resolved[i]));
}
