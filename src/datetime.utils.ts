import * as z from "zod";

/**
 * A calendar date without time zone, `YYYY-MM-DD`.
 *
 * Four-digit years make these strings compare correctly with `<` and `>`.
 */
export type NaiveDate = string;

/**
 * Formats a date as YYYY-MM-DD string (local time)
 */
export function formatDateString(date: Date): NaiveDate {
  const year = date.getFullYear();
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const day = date.getDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Compares two YYYY-MM-DD dates.
 * Returns:
 *  -1 if a < b
 *   0 if a = b
 *   1 if a > b
 */
export function compareNaiveDates(a: NaiveDate, b: NaiveDate): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function pad(value: number, length = 2): string {
  return value.toString().padStart(length, "0");
}

/**
 * Formats an instant as RFC 3339 in the system time zone, keeping the
 * local offset instead of converting to UTC.
 *
 * @example
 * ```typescript
 * // On a machine set to Asia/Dhaka
 * formatLocalDateTime(new Date("2020-03-01T04:30:00Z"));
 * // Returns: "2020-03-01T10:30:00+06:00"
 * ```
 */
export function formatLocalDateTime(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? "+" : "-";
  const absOffset = Math.abs(offsetMinutes);
  const millis = date.getMilliseconds();
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

  return (
    `${formatDateString(date)}T${time}` +
    (millis === 0 ? "" : `.${pad(millis, 3)}`) +
    `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`
  );
}

/**
 * Wire form of a local date-time: RFC 3339 with an explicit offset
 * (`Z` included), decoded into a `Date`.
 */
export const LocalDateTimeSchema = z.iso
  .datetime({ offset: true })
  .transform((value) => new Date(value));
