import * as z from "zod";
import { InvalidRollError, ParseError, unreachable, type SafeResult } from "./errors.js";
import {
  departmentFromTag,
  isDepartmentTag,
  type Department,
  type Section,
  type Thirty,
} from "./types.js";

const MAX_ROLL_EXCLUSIVE = 10_000_000;
const MAX_ROLL_IN_DEPT = 180;

const U32_MAX = 0xffff_ffff;

const DIGITS = /^\d+$/;

function isValidRoll(value: number): boolean {
  if (!Number.isInteger(value) || value < 0 || value >= MAX_ROLL_EXCLUSIVE) return false;
  const rollInDept = value % 1000;
  return (
    isDepartmentTag(Math.floor(value / 1000) % 100) &&
    rollInDept >= 1 &&
    rollInDept <= MAX_ROLL_IN_DEPT
  );
}

/**
 * Roll number of a RUET student, e.g. `1610001`.
 *
 * Reading right to left, the last three digits are the position in the
 * department, the two before them the department tag, and whatever remains
 * the admission series. Instances only exist for numbers that pass every
 * check, so the derived views below never fail.
 *
 * @example
 * ```ts
 * const roll = Roll.from(1610001);
 * roll.series;     // 16
 * roll.department; // "EEE"
 * roll.section;    // "A"
 * roll.thirty;     // 1
 * ```
 */
export class Roll {
  private constructor(private readonly raw: number) {}

  /**
   * Validates `value` as a roll.
   *
   * @throws {InvalidRollError} when any roll invariant fails
   */
  static from(value: number): Roll {
    const result = Roll.safeFrom(value);
    if (!result.success) throw result.error;
    return result.data;
  }

  static safeFrom(value: number): SafeResult<Roll, InvalidRollError> {
    if (!isValidRoll(value)) {
      return { success: false, error: new InvalidRollError(value) };
    }
    return { success: true, data: new Roll(value) };
  }

  /**
   * Reads a roll from its decimal text form.
   *
   * @throws {ParseError} when `text` is not an unsigned decimal integer
   * @throws {InvalidRollError} when the number is not a valid roll
   */
  static parse(text: string): Roll {
    const result = Roll.safeParse(text);
    if (!result.success) throw result.error;
    return result.data;
  }

  static safeParse(text: string): SafeResult<Roll, ParseError | InvalidRollError> {
    const value = Number(text);
    if (!DIGITS.test(text) || value > U32_MAX) {
      return { success: false, error: new ParseError(`Invalid roll number: '${text}'`) };
    }
    return Roll.safeFrom(value);
  }

  /** The roll number as given. */
  get value(): number {
    return this.raw;
  }

  /** Admission series, the leading digits (`16` for `1610001`). */
  get series(): number {
    return Math.floor(this.raw / 100_000);
  }

  get department(): Department {
    const result = departmentFromTag(Math.floor(this.raw / 1000) % 100);
    if (!result.success) return unreachable(`Invalid department in roll: ${this.raw}`);
    return result.data;
  }

  /** Position within the department, 1 to 180. */
  get rollInDept(): number {
    return this.raw % 1000;
  }

  get section(): Section {
    const n = this.rollInDept;
    if (n >= 1 && n <= 60) return "A";
    if (n >= 61 && n <= 120) return "B";
    if (n >= 121 && n <= 180) return "C";
    return unreachable(`Invalid roll in department: ${n}`);
  }

  /** First or second half of the section. */
  get thirty(): Thirty {
    const n = this.rollInDept;
    if (n < 1 || n > MAX_ROLL_IN_DEPT) return unreachable(`Invalid roll in department: ${n}`);
    return (n - 1) % 60 < 30 ? 1 : 2;
  }

  equals(other: Roll): boolean {
    return this.raw === other.raw;
  }

  toString(): string {
    return String(this.raw);
  }

  toJSON(): number {
    return this.raw;
  }
}

/**
 * Wire form of a roll: an unsigned integer, rejected unless it is a valid roll.
 */
export const RollSchema = z
  .number()
  .int()
  .nonnegative()
  .transform((value, ctx) => {
    const result = Roll.safeFrom(value);
    if (!result.success) {
      ctx.issues.push({
        code: "custom",
        message: result.error.message,
        input: value,
        params: { error: "invalid-roll", value },
      });
      return z.NEVER;
    }
    return result.data;
  });

export function encodeRoll(roll: Roll): number {
  return roll.value;
}
