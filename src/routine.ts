/**
 * The recurring class routine, indexed by cycle day.
 *
 * @packageDocumentation
 */

import * as z from "zod";
import type { Roll } from "./roll.js";
import { decode } from "./serde.js";
import { DAYS, DaySchema, ThirtySchema, U8Schema, type Day, type Thirty } from "./types.js";

// ============================================================================
// Class frequency
// ============================================================================

/**
 * How often a class gathers, and with whom.
 *
 * - `everyCycleWithAll`: the whole section, every cycle
 * - `everyCycleWith`: only `thirty`, every cycle
 * - `oddCyclesWithAll`: the whole section, odd cycles
 * - `evenCyclesWithAll`: the whole section, even cycles
 * - `oddCyclesWith`: `thirty` in odd cycles (the other thirty is meant to
 *   take even cycles, see {@link wouldSitFor})
 */
export type ClassFrequency =
  | { type: "everyCycleWithAll" }
  | { type: "everyCycleWith"; thirty: Thirty }
  | { type: "oddCyclesWithAll" }
  | { type: "evenCyclesWithAll" }
  | { type: "oddCyclesWith"; thirty: Thirty };

export const DEFAULT_FREQUENCY: Readonly<ClassFrequency> = Object.freeze({
  type: "everyCycleWithAll",
});

// Unit variants travel as the bare tag; `{ tag: null }` is accepted as well.

const EveryCycleWithAllSchema = z
  .union([z.literal("everyCycleWithAll"), z.strictObject({ everyCycleWithAll: z.null() })])
  .transform((): ClassFrequency => ({ type: "everyCycleWithAll" }));

const EveryCycleWithSchema = z
  .strictObject({ everyCycleWith: ThirtySchema })
  .transform(({ everyCycleWith }): ClassFrequency => ({
    type: "everyCycleWith",
    thirty: everyCycleWith,
  }));

const OddCyclesWithAllSchema = z
  .union([z.literal("oddCyclesWithAll"), z.strictObject({ oddCyclesWithAll: z.null() })])
  .transform((): ClassFrequency => ({ type: "oddCyclesWithAll" }));

const EvenCyclesWithAllSchema = z
  .union([z.literal("evenCyclesWithAll"), z.strictObject({ evenCyclesWithAll: z.null() })])
  .transform((): ClassFrequency => ({ type: "evenCyclesWithAll" }));

const OddCyclesWithSchema = z
  .strictObject({ oddCyclesWith: ThirtySchema })
  .transform(({ oddCyclesWith }): ClassFrequency => ({
    type: "oddCyclesWith",
    thirty: oddCyclesWith,
  }));

export const ClassFrequencySchema = z.union([
  EveryCycleWithAllSchema,
  EveryCycleWithSchema,
  OddCyclesWithAllSchema,
  EvenCyclesWithAllSchema,
  OddCyclesWithSchema,
]);

export type ClassFrequencyWire = z.input<typeof ClassFrequencySchema>;

export function encodeClassFrequency(frequency: ClassFrequency): ClassFrequencyWire {
  switch (frequency.type) {
    case "everyCycleWithAll":
    case "oddCyclesWithAll":
    case "evenCyclesWithAll":
      return frequency.type;
    case "everyCycleWith":
      return { everyCycleWith: frequency.thirty };
    case "oddCyclesWith":
      return { oddCyclesWith: frequency.thirty };
  }
}

// ============================================================================
// Class in routine
// ============================================================================

export const ClassInRoutineSchema = z.object({
  course: z.string(),
  teacher: z.string(),
  period: U8Schema,
  classRoom: z.string(),
  contactHours: U8Schema.default(1),
  frequency: ClassFrequencySchema.default(DEFAULT_FREQUENCY),
  /** Anything extra, such as the topic to be covered. */
  comment: z.string().default(""),
});

/**
 * A class as it appears on the routine.
 *
 * - `course` (required): course code, e.g. `"EEE 2105"`
 * - `teacher` (required): teacher initials
 * - `period` (required): period number in the day
 * - `classRoom` (required): where the class sits
 * - `contactHours`: how many periods it runs, default 1
 * - `frequency`: see {@link ClassFrequency}, default every cycle with all
 * - `comment`: free text, default empty
 */
export type ClassInRoutine = z.infer<typeof ClassInRoutineSchema>;

export type ClassInRoutineWire = z.input<typeof ClassInRoutineSchema>;

/**
 * Builds an entry, filling in the optional fields with their defaults.
 */
export function classInRoutine(
  entry: Pick<ClassInRoutine, "course" | "teacher" | "period" | "classRoom"> &
    Partial<ClassInRoutine>,
): ClassInRoutine {
  return {
    ...entry,
    contactHours: entry.contactHours ?? 1,
    frequency: entry.frequency ?? DEFAULT_FREQUENCY,
    comment: entry.comment ?? "",
  };
}

export function encodeClassInRoutine(entry: ClassInRoutine): ClassInRoutineWire {
  return {
    course: entry.course,
    teacher: entry.teacher,
    period: entry.period,
    classRoom: entry.classRoom,
    contactHours: entry.contactHours,
    frequency: encodeClassFrequency(entry.frequency),
    comment: entry.comment,
  };
}

/**
 * Whether `entry` sits for the student with `roll` in the given `cycle`
 * (0-255).
 *
 * Cycle 0 counts as even. For `oddCyclesWith` this returns false on every
 * even cycle, including for the other thirty.
 *
 * @example
 * ```ts
 * const lab = classInRoutine({
 *   course: "EEE 2100",
 *   teacher: "MFH",
 *   period: 1,
 *   classRoom: "Shop",
 *   frequency: { type: "everyCycleWith", thirty: 2 },
 * });
 * wouldSitFor(lab, Roll.from(1601031), 3); // true, roll 31 is in thirty 2
 * ```
 *
 * @throws {ParseError} when `cycle` is not an integer in 0-255
 */
export function wouldSitFor(entry: ClassInRoutine, roll: Roll, cycle: number): boolean {
  const frequency = entry.frequency;
  const odd = decode(U8Schema, cycle) % 2 !== 0;

  switch (frequency.type) {
    case "everyCycleWithAll":
      return true;
    case "everyCycleWith":
      return roll.thirty === frequency.thirty;
    case "oddCyclesWithAll":
      return odd;
    case "evenCyclesWithAll":
      return !odd;
    case "oddCyclesWith":
      return odd && roll.thirty === frequency.thirty;
  }
}

// ============================================================================
// Class routine
// ============================================================================

/**
 * Classes of each cycle day, in the order they are listed.
 * Days without classes may be missing.
 */
export type ClassRoutine = Partial<Record<Day, ClassInRoutine[]>>;

export const ClassRoutineSchema = z.partialRecord(DaySchema, z.array(ClassInRoutineSchema));

export type ClassRoutineWire = z.input<typeof ClassRoutineSchema>;

export function encodeClassRoutine(routine: ClassRoutine): ClassRoutineWire {
  const wire: ClassRoutineWire = {};
  for (const day of DAYS) {
    const entries = routine[day];
    if (entries) wire[day] = entries.map(encodeClassInRoutine);
  }
  return wire;
}

/**
 * The classes a student attends on `day` of `cycle`, in routine order.
 */
export function classesFor(
  routine: ClassRoutine,
  day: Day,
  roll: Roll,
  cycle: number,
): ClassInRoutine[] {
  return (routine[day] ?? []).filter((entry) => wouldSitFor(entry, roll, cycle));
}
