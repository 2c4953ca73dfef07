/**
 * Notices: calendar overrides published for a series and department.
 *
 * @packageDocumentation
 */

import * as z from "zod";
import { formatLocalDateTime, LocalDateTimeSchema, type NaiveDate } from "./datetime.utils.js";
import {
  DaySchema,
  NaiveDateSchema,
  SectionSchema,
  ThirtySchema,
  U8Schema,
  type Day,
  type Section,
  type Thirty,
} from "./types.js";

// ============================================================================
// Who scope
// ============================================================================

/**
 * Which students a notice concerns.
 *
 * An absent `section` means every section; `thirty` 0 means both thirties.
 * The default scope (no section, thirty 0) is everyone.
 */
export interface WhoScope {
  section?: Section;
  thirty: Thirty;
}

export const DEFAULT_WHO_SCOPE: Readonly<WhoScope> = Object.freeze({ thirty: 0 });

export function isDefaultWhoScope(scope: Readonly<WhoScope>): boolean {
  return scope.section === undefined && scope.thirty === 0;
}

export const WhoScopeSchema = z
  .object({
    section: SectionSchema.nullish(),
    thirty: ThirtySchema,
  })
  .transform(({ section, thirty }): WhoScope => (section ? { section, thirty } : { thirty }));

export type WhoScopeWire = z.input<typeof WhoScopeSchema>;

export function encodeWhoScope(scope: WhoScope): WhoScopeWire {
  return { section: scope.section ?? null, thirty: scope.thirty };
}

// ============================================================================
// Time scope
// ============================================================================

/**
 * How much of the day a class-off notice covers.
 *
 * - `allDay`: the whole day; with `lastDay`, every day from the notice date
 *   through `lastDay` inclusive
 * - `period`: a single numbered period
 */
export type TimeScope =
  | { type: "allDay"; lastDay?: NaiveDate }
  | { type: "period"; period: number };

export const TimeScopeSchema = z.union([
  z
    .strictObject({ allDay: NaiveDateSchema.nullable() })
    .transform(({ allDay }): TimeScope =>
      allDay ? { type: "allDay", lastDay: allDay } : { type: "allDay" },
    ),
  z
    .strictObject({ period: U8Schema })
    .transform(({ period }): TimeScope => ({ type: "period", period })),
]);

export type TimeScopeWire = z.input<typeof TimeScopeSchema>;

export function encodeTimeScope(time: TimeScope): TimeScopeWire {
  switch (time.type) {
    case "allDay":
      return { allDay: time.lastDay ?? null };
    case "period":
      return { period: time.period };
  }
}

// ============================================================================
// Notice
// ============================================================================

/** Classes are suspended. With `dayOff`, the day drops out of the cycle. */
export interface ClassOffNotice {
  type: "classOff";
  date: NaiveDate;
  time: TimeScope;
  forWhom: WhoScope;
  dayOff: boolean;
}

/** An additional class at a wall-clock time. */
export interface ExtraClassNotice {
  type: "extraClass";
  date: NaiveDate;
  time: Date;
  forWhom: WhoScope;
}

/** A class test, placed by cycle and day rather than by calendar date. */
export interface ClassTestNotice {
  type: "classTest";
  day: Day;
  cycle: number;
  period: number;
  course: string;
  teacher: string;
  /** Usually the syllabus. */
  extraInfo: string;
}

export interface ExamNotice {
  type: "exam";
  date: NaiveDate;
  course: string;
  /** Usually the syllabus. */
  extraInfo: string;
}

/** Any other announcement. */
export interface OthersNotice {
  type: "others";
  date: NaiveDate;
  message: string;
}

export type Notice =
  | ClassOffNotice
  | ExtraClassNotice
  | ClassTestNotice
  | ExamNotice
  | OthersNotice;

const ClassOffSchema = z
  .strictObject({
    classOff: z.object({
      date: NaiveDateSchema,
      time: TimeScopeSchema,
      forWhom: WhoScopeSchema.optional(),
      dayOff: z.boolean(),
    }),
  })
  .transform(
    ({ classOff }): Notice => ({
      type: "classOff",
      date: classOff.date,
      time: classOff.time,
      forWhom: classOff.forWhom ?? { thirty: 0 },
      dayOff: classOff.dayOff,
    }),
  );

const ExtraClassSchema = z
  .strictObject({
    extraClass: z.object({
      date: NaiveDateSchema,
      time: LocalDateTimeSchema,
      forWhom: WhoScopeSchema,
    }),
  })
  .transform(({ extraClass }): Notice => ({ type: "extraClass", ...extraClass }));

const ClassTestSchema = z
  .strictObject({
    classTest: z.object({
      day: DaySchema,
      cycle: U8Schema,
      period: U8Schema,
      course: z.string(),
      teacher: z.string(),
      extraInfo: z.string(),
    }),
  })
  .transform(({ classTest }): Notice => ({ type: "classTest", ...classTest }));

const ExamSchema = z
  .strictObject({
    exam: z.object({
      date: NaiveDateSchema,
      course: z.string(),
      extraInfo: z.string(),
    }),
  })
  .transform(({ exam }): Notice => ({ type: "exam", ...exam }));

const OthersSchema = z
  .strictObject({
    others: z.object({
      date: NaiveDateSchema,
      message: z.string(),
    }),
  })
  .transform(({ others }): Notice => ({ type: "others", ...others }));

/**
 * Wire form of a notice: an object with a single key naming the variant.
 *
 * @example
 * ```json
 * { "classOff": { "date": "2020-03-01", "time": { "allDay": null }, "dayOff": true } }
 * ```
 */
export const NoticeSchema = z.union([
  ClassOffSchema,
  ExtraClassSchema,
  ClassTestSchema,
  ExamSchema,
  OthersSchema,
]);

export type NoticeWire = z.input<typeof NoticeSchema>;

/**
 * Encodes a notice. A class-off notice for everyone leaves out `forWhom`.
 */
export function encodeNotice(notice: Notice): NoticeWire {
  switch (notice.type) {
    case "classOff":
      return {
        classOff: {
          date: notice.date,
          time: encodeTimeScope(notice.time),
          ...(isDefaultWhoScope(notice.forWhom) ? {} : { forWhom: encodeWhoScope(notice.forWhom) }),
          dayOff: notice.dayOff,
        },
      };
    case "extraClass":
      return {
        extraClass: {
          date: notice.date,
          time: formatLocalDateTime(notice.time),
          forWhom: encodeWhoScope(notice.forWhom),
        },
      };
    case "classTest":
      return {
        classTest: {
          day: notice.day,
          cycle: notice.cycle,
          period: notice.period,
          course: notice.course,
          teacher: notice.teacher,
          extraInfo: notice.extraInfo,
        },
      };
    case "exam":
      return {
        exam: { date: notice.date, course: notice.course, extraInfo: notice.extraInfo },
      };
    case "others":
      return { others: { date: notice.date, message: notice.message } };
  }
}

/**
 * The calendar date a notice takes effect on.
 * Class tests are placed by cycle and day, so they have none.
 */
export function noticeDate(notice: Notice): NaiveDate | undefined {
  return notice.type === "classTest" ? undefined : notice.date;
}
