/**
 * Identifiers and enumerations shared by every other module.
 *
 * @packageDocumentation
 */

import * as z from "zod";
import { ParseError, type SafeResult } from "./errors.js";

// ============================================================================
// Department
// ============================================================================

/** Every department, in tag order. */
export const DEPARTMENTS = [
  "CE",
  "EEE",
  "ME",
  "CSE",
  "ETE",
  "IPE",
  "GCE",
  "URP",
  "MTE",
  "Arch",
  "ECE",
  "CFPE",
  "BECM",
  "MSE",
  "Chem",
  "Math",
  "Phy",
  "Hum",
] as const;

/**
 * Academic department of a student, spelled as its display form
 * (`"EEE"`, `"CFPE"`, `"Arch"`, ...).
 */
export type Department = (typeof DEPARTMENTS)[number];

/**
 * Stable integer tag of every department.
 *
 * Engineering departments occupy 0-13, basic science and humanities 100-103.
 * These numbers are part of the external contract and never change.
 */
export const DEPARTMENT_TAGS = {
  CE: 0,
  EEE: 1,
  ME: 2,
  CSE: 3,
  ETE: 4,
  IPE: 5,
  GCE: 6,
  URP: 7,
  MTE: 8,
  Arch: 9,
  ECE: 10,
  CFPE: 11,
  BECM: 12,
  MSE: 13,

  Chem: 100,
  Math: 101,
  Phy: 102,
  Hum: 103,
} as const satisfies Record<Department, number>;

const DEPARTMENT_BY_TAG = new Map<number, Department>(
  DEPARTMENTS.map((department): [number, Department] => [DEPARTMENT_TAGS[department], department]),
);

export const DepartmentSchema = z.enum(DEPARTMENTS);

export function departmentTag(department: Department): number {
  return DEPARTMENT_TAGS[department];
}

export function isDepartmentTag(tag: number): boolean {
  return DEPARTMENT_BY_TAG.has(tag);
}

/**
 * Looks up a department by its numeric tag.
 *
 * @example
 * ```ts
 * departmentFromTag(11); // { success: true, data: "CFPE" }
 * departmentFromTag(14); // { success: false, error: ParseError }
 * ```
 */
export function departmentFromTag(tag: number): SafeResult<Department, ParseError> {
  const department = DEPARTMENT_BY_TAG.get(tag);
  if (department === undefined) {
    return { success: false, error: new ParseError(`Unknown department tag: ${tag}`) };
  }
  return { success: true, data: department };
}

/** Engineering departments (tags 0-13) or basic science and humanities (100-103). */
export type DepartmentKind = "engineering" | "science";

export function departmentKind(department: Department): DepartmentKind {
  return DEPARTMENT_TAGS[department] < 100 ? "engineering" : "science";
}

// ============================================================================
// Section and Thirty
// ============================================================================

/** Subdivision of a department's cohort, up to 60 students each. */
export type Section = "A" | "B" | "C";

export const SECTIONS: readonly Section[] = ["A", "B", "C"];

export const SectionSchema = z.enum(["A", "B", "C"]);

/**
 * Half of a section, up to 30 students.
 *
 * Students always belong to thirty 1 or 2. The value 0 only appears in a
 * {@link WhoScope} and means "not narrowed to a thirty".
 */
export type Thirty = 0 | 1 | 2;

export const ThirtySchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export function isThirty(value: number): value is Thirty {
  return value === 0 || value === 1 || value === 2;
}

export function toThirty(value: number): SafeResult<Thirty, ParseError> {
  if (!isThirty(value)) {
    return { success: false, error: new ParseError(`Invalid thirty: ${value}`) };
  }
  return { success: true, data: value };
}

// ============================================================================
// Day
// ============================================================================

/**
 * A slot in the five-day academic cycle. Unrelated to calendar weekdays.
 */
export type Day = "A" | "B" | "C" | "D" | "E";

export const DAYS: readonly Day[] = ["A", "B", "C", "D", "E"];

export const DaySchema = z.enum(["A", "B", "C", "D", "E"]);

const NEXT_DAY = {
  A: "B",
  B: "C",
  C: "D",
  D: "E",
  E: "A",
} as const satisfies Record<Day, Day>;

/**
 * Returns the day after `day`, wrapping from E back to A.
 */
export function succ(day: Day): Day {
  return NEXT_DAY[day];
}

/**
 * Mutable position in the day cycle.
 *
 * @example
 * ```ts
 * const cursor = new DayCursor("D");
 * cursor.advance(); // "E"
 * cursor.advance(); // "A"
 * cursor.day;       // "A"
 * ```
 */
export class DayCursor {
  constructor(public day: Day) {}

  /** Moves to the next day and returns it. */
  advance(): Day {
    this.day = succ(this.day);
    return this.day;
  }
}

// ============================================================================
// Primitive wire schemas
// ============================================================================

/** Unsigned 8-bit integer (periods, cycles, contact hours). */
export const U8Schema = z.number().int().min(0).max(255);

/** Calendar date without a time zone, `YYYY-MM-DD`. */
export const NaiveDateSchema = z.iso.date();
