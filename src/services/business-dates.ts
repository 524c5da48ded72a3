/**
 * Business-day helpers for the run's reference dates and mailbox cutoff.
 */

import { format, isWeekend, startOfDay, subDays } from "date-fns";
import { fromZonedTime } from "date-fns-tz";

export interface BusinessDates {
  /** Current business day */
  cbd: Date;
  /** Prior business day */
  pbd: Date;
  /** Two business days back */
  p2bd: Date;
}

/**
 * Business day `n` weekdays before `today`. With n = 0, today itself, or the
 * preceding Friday when today falls on a weekend.
 */
export function priorBusinessDay(n: number, today: Date = new Date()): Date {
  let target = startOfDay(today);

  if (n === 0) {
    while (isWeekend(target)) {
      target = subDays(target, 1);
    }
    return target;
  }

  let counted = 0;
  while (counted < Math.abs(n)) {
    target = subDays(target, 1);
    if (!isWeekend(target)) counted += 1;
  }
  return target;
}

export function businessDates(today: Date = new Date()): BusinessDates {
  return {
    cbd: priorBusinessDay(0, today),
    pbd: priorBusinessDay(1, today),
    p2bd: priorBusinessDay(2, today),
  };
}

/**
 * The instant at which the wall clock in `timeZone` reads `hour:minute` on
 * the calendar day of `date`.
 */
export function cutoffTime(date: Date, hour: number, minute: number, timeZone: string): Date {
  const wallClock =
    `${format(date, "yyyy-MM-dd")}T` +
    `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}:00`;
  return fromZonedTime(wallClock, timeZone);
}

export function formatBusinessDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}
