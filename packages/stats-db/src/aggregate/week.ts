import { UTCDate } from "@date-fns/utc";
import { format, startOfISOWeek } from "date-fns";
import { DateParseError } from "../errors";

const DAY_FORMAT = "yyyy-MM-dd";
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// Dates are naive calendar days, held as UTCDate so the host time zone
// never shifts or skips one.

/**
 * Parses a `YYYY-MM-DD` day. `table` names where the value came from and is
 * carried on the error.
 */
export function parseDay(value: string, table: string): Date {
  const match = DAY_PATTERN.exec(value);
  if (!match) {
    throw new DateParseError(value, table);
  }

  const [, year, month, day] = match;
  const date = new UTCDate(Number(year), Number(month) - 1, Number(day));
  if (format(date, DAY_FORMAT) !== value) {
    throw new DateParseError(value, table);
  }

  return date;
}

export function formatDay(date: Date): string {
  return format(new UTCDate(date), DAY_FORMAT);
}

/**
 * Monday of the week containing `date`. Identity on Mondays.
 */
export function getWeekStart(date: Date): Date {
  return startOfISOWeek(new UTCDate(date));
}

export function weekBucket(day: string, table: string): string {
  return formatDay(getWeekStart(parseDay(day, table)));
}

/** Today's UTC calendar date as YYYY-MM-DD. */
export function todayUtc(now: Date = new Date()): string {
  return now.toISOString().split("T")[0];
}
