/**
 * Portfolio monthly totals: the reduce step over per-loan schedules
 */

import {
  AMOUNT_FIELDS,
  type AmountField,
  type LoanRecord,
  type MonthlyCashFlowRow,
  type PortfolioMonthlyTotal
} from '../../shared/cashflow-types';
import { monthKey } from './day-count';
import { sumExact } from './money';
import { invalidInput } from '../utils/error-handler';

export interface AggregationOptions {
  /** 'tier' groups by the resolved tier; any other key is read from the loan's attributes */
  groupBy?: readonly string[];
  /** Needed only when grouping by loan attributes */
  loans?: readonly LoanRecord[];
}

interface Bucket {
  month: string;
  paymentDate: string;
  group: Record<string, string>;
  loanIds: Set<string>;
  values: Record<AmountField, number[]>;
}

function amountRecord<T>(make: (field: AmountField) => T): Record<AmountField, T> {
  return {
    startingBalance: make('startingBalance'),
    creditLoss: make('creditLoss'),
    prepayment: make('prepayment'),
    adjustedBalance: make('adjustedBalance'),
    accrualBalance: make('accrualBalance'),
    grossInterest: make('grossInterest'),
    scheduledPrincipal: make('scheduledPrincipal'),
    totalPrincipal: make('totalPrincipal'),
    remainingBalance: make('remainingBalance'),
    totalPayment: make('totalPayment'),
    capitalizedInterest: make('capitalizedInterest'),
    servicingFee: make('servicingFee'),
    reportingFee: make('reportingFee'),
    originationFee: make('originationFee'),
    netInterest: make('netInterest'),
    investorPrincipal: make('investorPrincipal'),
    investorInterest: make('investorInterest'),
    investorTotal: make('investorTotal')
  };
}

function groupFor(
  row: MonthlyCashFlowRow,
  keys: readonly string[],
  attributes: Map<string, Record<string, string>>
): Record<string, string> {
  const group: Record<string, string> = {};
  for (const key of keys) {
    group[key] = key === 'tier'
      ? row.tier
      : attributes.get(row.loanId)?.[key] ?? '';
  }
  return group;
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sum every amount field per calendar month (and group), ascending by month then group
 */
export function aggregateMonthlyTotals(
  rows: readonly MonthlyCashFlowRow[],
  options: AggregationOptions = {}
): PortfolioMonthlyTotal[] {
  const keys = options.groupBy ?? [];
  const attributeKeys = keys.filter(key => key !== 'tier');
  if (attributeKeys.length > 0 && options.loans === undefined) {
    throw invalidInput('Grouping by loan attributes needs the loan records', { groupBy: attributeKeys });
  }
  const attributes = new Map<string, Record<string, string>>();
  for (const loan of options.loans ?? []) {
    attributes.set(loan.loanId, loan.attributes ?? {});
  }

  const buckets = new Map<string, Bucket>();
  for (const row of rows) {
    const month = monthKey(row.paymentDate);
    const group = groupFor(row, keys, attributes);
    const groupKey = keys.map(k => group[k]).join('\u0000');
    const id = `${month}\u0001${groupKey}`;

    let bucket = buckets.get(id);
    if (!bucket) {
      bucket = {
        month,
        paymentDate: row.paymentDate,
        group,
        loanIds: new Set(),
        values: amountRecord<number[]>(() => [])
      };
      buckets.set(id, bucket);
    }
    if (row.paymentDate < bucket.paymentDate) {
      bucket.paymentDate = row.paymentDate;
    }
    bucket.loanIds.add(row.loanId);
    for (const field of AMOUNT_FIELDS) {
      bucket.values[field].push(row[field]);
    }
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([, bucket]) => {
      const totals = amountRecord(field => sumExact(bucket.values[field]));
      return {
        month: bucket.month,
        paymentDate: bucket.paymentDate,
        group: bucket.group,
        loanCount: bucket.loanIds.size,
        ...totals
      };
    });
}
