/**
 * Input schemas and tier-keyed assumption lookup
 */

import { z } from 'zod';
import {
  DEFAULT_TIER,
  type AssumptionSet,
  type LoanRecord,
  type ResolvedAssumption,
  type TierAssumption
} from '../../shared/cashflow-types';
import { annualCreditCost } from './money';
import { isIsoDate } from './day-count';
import { invalidInput } from '../utils/error-handler';

const annualRate = z.number().finite().min(0).lt(1);
const probability = z.number().finite().min(0).max(1);
const feeRate = z.number().finite().min(0).default(0);

export const tierAssumptionSchema = z.union([
  z.object({ cpr: annualRate, annualCreditCost: annualRate }).strict(),
  z.object({
    cpr: annualRate,
    probabilityOfDefault: probability,
    lossGivenDefault: probability
  }).strict()
]);

export const assumptionSetSchema = z.object({
  tiers: z
    .record(z.string().min(1), tierAssumptionSchema)
    .refine(tiers => hasTier(tiers, DEFAULT_TIER), {
      message: `A "${DEFAULT_TIER}" tier assumption is required`
    }),
  servicingFeeRate: feeRate,
  reportingFeeRate: feeRate,
  originationFeeRate: feeRate,
  investorShare: z.number().finite().gt(0).max(1).default(1),
  creditLossReducesInterest: z.boolean().default(false),
  interestOnStartingBalance: z.boolean().default(false),
  negativeAmortization: z.enum(['floor', 'capitalize']).default('floor')
});

export type AssumptionSetInput = z.input<typeof assumptionSetSchema>;

export const loanRecordSchema = z.object({
  loanId: z.string().min(1),
  balance: z.number().finite().positive(),
  annualRate: z.number().finite().min(0),
  remainingTermMonths: z.number().int().min(1),
  snapshotDate: z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD calendar date' }),
  tier: z.string().min(1).optional(),
  monthlyPayment: z.number().finite().positive().optional(),
  originalBalance: z.number().finite().positive().optional(),
  attributes: z.record(z.string()).optional()
});

export const loanBatchSchema = z.array(loanRecordSchema).superRefine((loans, ctx) => {
  const seen = new Set<string>();
  loans.forEach((loan, index) => {
    if (seen.has(loan.loanId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'loanId'],
        message: `Duplicate loan id ${loan.loanId}`
      });
    }
    seen.add(loan.loanId);
  });
});

function hasTier(tiers: Record<string, unknown>, tier: string): boolean {
  return Object.prototype.hasOwnProperty.call(tiers, tier);
}

/**
 * Validate an assumption set and fill documented defaults
 */
export function parseAssumptions(input: AssumptionSetInput): AssumptionSet {
  return assumptionSetSchema.parse(input);
}

export function parseLoans(input: readonly LoanRecord[]): LoanRecord[] {
  return loanBatchSchema.parse(input);
}

/**
 * Exact tier first, then the default tier
 */
export function resolveAssumption(assumptions: AssumptionSet, tier?: string): ResolvedAssumption {
  let label = DEFAULT_TIER;
  if (tier !== undefined && hasTier(assumptions.tiers, tier)) {
    label = tier;
  } else if (!hasTier(assumptions.tiers, DEFAULT_TIER)) {
    throw invalidInput(`No assumption for tier ${tier ?? DEFAULT_TIER} and no default tier`, { tier });
  }

  const selected: TierAssumption = assumptions.tiers[label];
  return {
    tier: label,
    cpr: selected.cpr,
    annualCreditCost: annualCreditCost(selected)
  };
}
