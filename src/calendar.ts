/**
 * Holidays and the resolution of calendar dates to class days.
 *
 * @packageDocumentation
 */

import * as z from "zod";
import { compareNaiveDates, type NaiveDate } from "./datetime.utils.js";
import { InvalidSpanError, type SafeResult } from "./errors.js";
import type { Notice } from "./notice.js";
import { NaiveDateSchema, type Day } from "./types.js";

// ============================================================================
// Holiday span
// ============================================================================

/**
 * The dates a holiday covers: one day, or an inclusive range with
 * `from <= to`.
 */
export type HolidaySpan =
  | { type: "singleDay"; on: NaiveDate }
  | { type: "multiDays"; from: NaiveDate; to: NaiveDate };

export function singleDay(on: NaiveDate): HolidaySpan {
  return { type: "singleDay", on };
}

export function safeMultiDays(
  from: NaiveDate,
  to: NaiveDate,
): SafeResult<HolidaySpan, InvalidSpanError> {
  if (compareNaiveDates(from, to) > 0) {
    return { success: false, error: new InvalidSpanError(from, to) };
  }
  return { success: true, data: { type: "multiDays", from, to } };
}

/**
 * @throws {InvalidSpanError} when `from` is after `to`
 */
export function multiDays(from: NaiveDate, to: NaiveDate): HolidaySpan {
  const result = safeMultiDays(from, to);
  if (!result.success) throw result.error;
  return result.data;
}

export function spanStart(span: HolidaySpan): NaiveDate {
  return span.type === "singleDay" ? span.on : span.from;
}

export function spanEnd(span: HolidaySpan): NaiveDate {
  return span.type === "singleDay" ? span.on : span.to;
}

/**
 * Whether `date` falls within `span`, both ends included.
 */
export function spanContains(span: HolidaySpan, date: NaiveDate): boolean {
  switch (span.type) {
    case "singleDay":
      return date === span.on;
    case "multiDays":
      return compareNaiveDates(date, span.from) >= 0 && compareNaiveDates(date, span.to) <= 0;
  }
}

/**
 * Untagged wire fields of a span. A single day (`on`) is tried first,
 * then a range (`from`, `to`), which is rejected when it runs backwards.
 */
const SpanFieldsSchema = z
  .union([
    z.object({ on: NaiveDateSchema }),
    z.object({ from: NaiveDateSchema, to: NaiveDateSchema }),
  ])
  .check((payload) => {
    const fields = payload.value;
    if ("from" in fields && compareNaiveDates(fields.from, fields.to) > 0) {
      payload.issues.push({
        code: "custom",
        message: new InvalidSpanError(fields.from, fields.to).message,
        input: fields,
        params: { error: "invalid-span", from: fields.from, to: fields.to },
      });
    }
  });

type SpanFields = z.output<typeof SpanFieldsSchema>;

function spanFromFields(fields: SpanFields): HolidaySpan {
  return "on" in fields
    ? { type: "singleDay", on: fields.on }
    : { type: "multiDays", from: fields.from, to: fields.to };
}

export const HolidaySpanSchema = SpanFieldsSchema.transform(spanFromFields);

export type HolidaySpanWire = z.input<typeof HolidaySpanSchema>;

export function encodeHolidaySpan(span: HolidaySpan): HolidaySpanWire {
  return span.type === "singleDay" ? { on: span.on } : { from: span.from, to: span.to };
}

// ============================================================================
// Holiday
// ============================================================================

/**
 * An official RUET holiday.
 *
 * @example
 * ```ts
 * const eid: Holiday = { for: "Eid", span: singleDay("2020-05-24") };
 * encodeHoliday(eid); // { for: "Eid", on: "2020-05-24" }
 * ```
 */
export interface Holiday {
  /** Reason for the holiday. */
  for: string;
  span: HolidaySpan;
}

/**
 * Wire form of a holiday, with the span's fields inlined next to `for`.
 */
export const HolidaySchema = z
  .object({ for: z.string() })
  .and(SpanFieldsSchema)
  .transform((fields): Holiday => ({ for: fields.for, span: spanFromFields(fields) }));

export type HolidayWire = z.input<typeof HolidaySchema>;

export function encodeHoliday(holiday: Holiday): HolidayWire {
  return { for: holiday.for, ...encodeHolidaySpan(holiday.span) };
}

/**
 * The first holiday in `holidays` covering `date`.
 */
export function findHoliday(holidays: readonly Holiday[], date: NaiveDate): Holiday | undefined {
  return holidays.find((holiday) => spanContains(holiday.span, date));
}

// ============================================================================
// Date to day mapping
// ============================================================================

/**
 * What a calendar date turns out to be once the academic calendar is applied.
 *
 * Produced by calendar resolvers outside this library.
 */
export type DateDayMapping =
  | { type: "day"; day: Day }
  | { type: "weekend" }
  | { type: "holiday"; holiday: Holiday }
  | { type: "offDay"; notice: Notice };

export function classDay(day: Day): DateDayMapping {
  return { type: "day", day };
}

export function weekend(): DateDayMapping {
  return { type: "weekend" };
}

export function holidayOn(holiday: Holiday): DateDayMapping {
  return { type: "holiday", holiday };
}

export function offDay(notice: Notice): DateDayMapping {
  return { type: "offDay", notice };
}
