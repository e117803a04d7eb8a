/**
 * Actual/actual day count and monthly date sequences
 */

import {
  addMonths,
  addYears,
  differenceInCalendarDays,
  format,
  getDaysInYear,
  getYear,
  isBefore,
  isValid,
  parseISO,
  startOfYear
} from 'date-fns';
import type { ISODate, MonthKey } from '../../shared/cashflow-types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a YYYY-MM-DD string, rejecting impossible calendar dates
 */
export function parseIsoDate(iso: ISODate): Date {
  if (!ISO_DATE.test(iso)) {
    throw new RangeError(`Invalid ISO date: ${iso}`);
  }
  const date = parseISO(iso);
  if (!isValid(date) || toIsoDate(date) !== iso) {
    throw new RangeError(`Invalid ISO date: ${iso}`);
  }
  return date;
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const date = parseISO(value);
  return isValid(date) && toIsoDate(date) === value;
}

export function toIsoDate(date: Date): ISODate {
  return format(date, 'yyyy-MM-dd');
}

export function monthKey(iso: ISODate): MonthKey {
  return iso.slice(0, 7);
}

/**
 * Add months to an ISO date; month-end dates clamp to the last day of the target month
 */
export function addMonthsIso(iso: ISODate, months: number): ISODate {
  return toIsoDate(addMonths(parseIsoDate(iso), months));
}

/**
 * Payment dates for periods 1..count, the first falling on the start date
 */
export function monthlySchedule(start: ISODate, count: number): ISODate[] {
  const first = parseIsoDate(start);
  const dates: ISODate[] = [];
  for (let k = 0; k < count; k++) {
    dates.push(toIsoDate(addMonths(first, k)));
  }
  return dates;
}

export function daysBetween(start: ISODate, end: ISODate): number {
  return differenceInCalendarDays(parseIsoDate(end), parseIsoDate(start));
}

/**
 * Actual/actual year fraction between two dates.
 *
 * Each calendar year the span touches contributes its actual days over that
 * year's length (365 or 366), so a span crossing into a leap year is prorated.
 * Negative when end precedes start.
 */
export function yearFraction(start: ISODate, end: ISODate): number {
  const from = parseIsoDate(start);
  const to = parseIsoDate(end);
  if (isBefore(to, from)) {
    return -yearFraction(end, start);
  }

  let years = 0;
  let cursor = from;
  while (getYear(cursor) < getYear(to)) {
    const nextYear = startOfYear(addYears(cursor, 1));
    years += differenceInCalendarDays(nextYear, cursor) / getDaysInYear(cursor);
    cursor = nextYear;
  }
  return years + differenceInCalendarDays(to, cursor) / getDaysInYear(cursor);
}
