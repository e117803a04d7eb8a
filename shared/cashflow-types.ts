/**
 * Cash-flow projection domain types
 * Amounts are plain numbers in currency units; rates are decimals (0.0599 = 5.99%)
 */

export type ISODate = string; // YYYY-MM-DD
export type MonthKey = string; // YYYY-MM

export type Compounding = 'monthly' | 'quarterly' | 'semiannual' | 'annual' | 'continuous';
export type NegativeAmortizationPolicy = 'floor' | 'capitalize';
export type PrincipalField = 'total' | 'investor';
export type CashFlowField = 'total' | 'investor';

export const DEFAULT_TIER = 'default';

export interface LoanRecord {
  loanId: string;
  balance: number;
  annualRate: number;
  remainingTermMonths: number;
  snapshotDate: ISODate;
  tier?: string;
  monthlyPayment?: number;
  originalBalance?: number;
  attributes?: Record<string, string>;
}

// Credit cost is either a direct annual rate or PD x LGD
export type CreditAssumption =
  | { annualCreditCost: number }
  | { probabilityOfDefault: number; lossGivenDefault: number };

export type TierAssumption = { cpr: number } & CreditAssumption;

export interface AssumptionSet {
  tiers: Record<string, TierAssumption>;
  servicingFeeRate: number;
  reportingFeeRate: number;
  originationFeeRate: number;
  investorShare: number;
  creditLossReducesInterest: boolean;
  interestOnStartingBalance: boolean;
  negativeAmortization: NegativeAmortizationPolicy;
}

// Tier assumption after resolution, credit cost already collapsed to one annual rate
export interface ResolvedAssumption {
  tier: string;
  cpr: number;
  annualCreditCost: number;
}

export interface MonthlyCashFlowRow {
  loanId: string;
  tier: string;
  period: number;
  paymentDate: ISODate;
  timeYears: number;
  annualRate: number;
  startingBalance: number;
  creditLoss: number;
  prepayment: number;
  adjustedBalance: number;
  accrualBalance: number;
  grossInterest: number;
  scheduledPrincipal: number;
  totalPrincipal: number;
  remainingBalance: number;
  totalPayment: number;
  capitalizedInterest: number;
  servicingFee: number;
  reportingFee: number;
  originationFee: number;
  netInterest: number;
  investorPrincipal: number;
  investorInterest: number;
  investorTotal: number;
}

export const AMOUNT_FIELDS = [
  'startingBalance',
  'creditLoss',
  'prepayment',
  'adjustedBalance',
  'accrualBalance',
  'grossInterest',
  'scheduledPrincipal',
  'totalPrincipal',
  'remainingBalance',
  'totalPayment',
  'capitalizedInterest',
  'servicingFee',
  'reportingFee',
  'originationFee',
  'netInterest',
  'investorPrincipal',
  'investorInterest',
  'investorTotal',
] as const;

export type AmountField = typeof AMOUNT_FIELDS[number];

export type PortfolioMonthlyTotal = {
  month: MonthKey;
  paymentDate: ISODate; // earliest payment date in the month
  group: Record<string, string>;
  loanCount: number;
} & Record<AmountField, number>;

export interface CashFlowPoint {
  date: ISODate;
  amount: number;
}

export type CashFlowSeries = readonly CashFlowPoint[];

export interface DurationResult {
  presentValue: number;
  macaulayDuration: number;
  modifiedDuration: number;
  discountRate: number;
  convexity?: number;
}

export interface CashFlowRun {
  runId: string;
  loanCashFlows: MonthlyCashFlowRow[];
  monthlyTotals?: PortfolioMonthlyTotal[];
}
