/**
 * Domain model shared by the Unbusy class-scheduling plugins for RUET
 * students.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Rolls**: {@link Roll} validates a roll number once; series, department,
 * section and thirty are then read straight off it.
 *
 * **Routine**: {@link ClassRoutine} lists the classes of each cycle day
 * (A to E). A class's {@link ClassFrequency} decides, through
 * {@link wouldSitFor}, whether a given student attends it in a given cycle.
 *
 * **Notices and holidays**: {@link Notice} overrides the routine for a date
 * (class off, extra class, class test, exam, anything else); {@link Holiday}
 * marks official holidays. A calendar resolver combines them into a
 * {@link DateDayMapping} per date.
 *
 * **External form**: each type has a zod schema (`NoticeSchema`,
 * `ClassRoutineSchema`, ...) that reads the JSON form into domain values,
 * and an `encode*` function that writes it back. {@link decode} and
 * {@link decodeJson} report failures as {@link UnbusyError}s.
 *
 * @example Who attends a class
 * ```typescript
 * import { Roll, decodeJson, ClassRoutineSchema, classesFor } from "unbusy-core";
 *
 * const routine = decodeJson(ClassRoutineSchema, routineJson);
 * const roll = Roll.parse("1601031");
 * const today = classesFor(routine, "C", roll, 7);
 * ```
 *
 * @example Reading holidays
 * ```typescript
 * import { decode, HolidaySchema, spanContains } from "unbusy-core";
 *
 * const winter = decode(HolidaySchema, { for: "Winter", from: "2020-12-20", to: "2021-01-02" });
 * spanContains(winter.span, "2020-12-31"); // true
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Identifiers
// ============================================================================

export type { Department, DepartmentKind, Section, Thirty, Day } from "./types.js";

export {
  DEPARTMENTS,
  DEPARTMENT_TAGS,
  SECTIONS,
  DAYS,
  DepartmentSchema,
  SectionSchema,
  ThirtySchema,
  DaySchema,
  U8Schema,
  NaiveDateSchema,
  departmentTag,
  departmentFromTag,
  departmentKind,
  isDepartmentTag,
  isThirty,
  toThirty,
  succ,
  DayCursor,
} from "./types.js";

export { Roll, RollSchema, encodeRoll } from "./roll.js";

// ============================================================================
// Errors
// ============================================================================

export {
  UnbusyError,
  ParseError,
  InvalidRollError,
  CourseNotFoundError,
  InvalidSpanError,
  InvariantViolationError,
} from "./errors.js";

export type { UnbusyErrorKind, SafeResult } from "./errors.js";

// ============================================================================
// Routine
// ============================================================================

export type {
  ClassFrequency,
  ClassFrequencyWire,
  ClassInRoutine,
  ClassInRoutineWire,
  ClassRoutine,
  ClassRoutineWire,
} from "./routine.js";

export {
  DEFAULT_FREQUENCY,
  ClassFrequencySchema,
  ClassInRoutineSchema,
  ClassRoutineSchema,
  classInRoutine,
  wouldSitFor,
  classesFor,
  encodeClassFrequency,
  encodeClassInRoutine,
  encodeClassRoutine,
} from "./routine.js";

// ============================================================================
// Notices
// ============================================================================

export type {
  WhoScope,
  WhoScopeWire,
  TimeScope,
  TimeScopeWire,
  Notice,
  NoticeWire,
  ClassOffNotice,
  ExtraClassNotice,
  ClassTestNotice,
  ExamNotice,
  OthersNotice,
} from "./notice.js";

export {
  DEFAULT_WHO_SCOPE,
  WhoScopeSchema,
  TimeScopeSchema,
  NoticeSchema,
  isDefaultWhoScope,
  noticeDate,
  encodeWhoScope,
  encodeTimeScope,
  encodeNotice,
} from "./notice.js";

// ============================================================================
// Calendar
// ============================================================================

export type {
  HolidaySpan,
  HolidaySpanWire,
  Holiday,
  HolidayWire,
  DateDayMapping,
} from "./calendar.js";

export {
  HolidaySpanSchema,
  HolidaySchema,
  singleDay,
  multiDays,
  safeMultiDays,
  spanStart,
  spanEnd,
  spanContains,
  findHoliday,
  encodeHolidaySpan,
  encodeHoliday,
  classDay,
  weekend,
  holidayOn,
  offDay,
} from "./calendar.js";

export type { NaiveDate } from "./datetime.utils.js";

export {
  LocalDateTimeSchema,
  compareNaiveDates,
  formatDateString,
  formatLocalDateTime,
} from "./datetime.utils.js";

// ============================================================================
// Courses
// ============================================================================

export type { CourseName, CourseTable } from "./courses.js";

export {
  CourseCatalog,
  CourseTableSchema,
  defaultCourseCatalog,
  getCourseName,
} from "./courses.js";

// ============================================================================
// Serialization
// ============================================================================

export {
  decode,
  safeDecode,
  decodeJson,
  safeDecodeJson,
  encodeJson,
  toUnbusyError,
} from "./serde.js";
