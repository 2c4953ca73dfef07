import { readFileSync } from "node:fs";
import * as z from "zod";
import { CourseNotFoundError, type SafeResult } from "./errors.js";
import { decode, decodeJson } from "./serde.js";
import { DEPARTMENTS, DepartmentSchema, type Department } from "./types.js";

const CourseNameSchema = z.object({
  official: z.string(),
  colloquial: z.string(),
});

/**
 * Display names of a course.
 *
 * - `official`: the name on the syllabus
 * - `colloquial`: what students call it
 */
export type CourseName = z.infer<typeof CourseNameSchema>;

/**
 * Course names keyed by department, then by course code.
 *
 * @example
 * ```json
 * { "EEE": { "EEE 2100": { "official": "Electrical Shop Practice", "colloquial": "Electrical Shop" } } }
 * ```
 */
export const CourseTableSchema = z.partialRecord(
  DepartmentSchema,
  z.record(z.string(), CourseNameSchema),
);

export type CourseTable = z.infer<typeof CourseTableSchema>;

/**
 * Immutable lookup of course names.
 *
 * The bundled table is deliberately small; callers add their own courses
 * with {@link CourseCatalog.extend}.
 */
export class CourseCatalog {
  private constructor(private readonly table: CourseTable) {}

  static empty(): CourseCatalog {
    return new CourseCatalog({});
  }

  /**
   * @throws {ParseError} when `input` is not a course table
   */
  static fromTable(input: unknown): CourseCatalog {
    return new CourseCatalog(decode(CourseTableSchema, input));
  }

  /**
   * Returns a catalogue with the courses of `additions` added. Entries for a
   * code that is already present replace the existing names.
   */
  extend(additions: CourseTable): CourseCatalog {
    const merged: CourseTable = { ...this.table };
    for (const department of DEPARTMENTS) {
      const extra = additions[department];
      if (!extra) continue;
      const courses = { ...merged[department] };
      for (const [code, name] of Object.entries(extra)) courses[code] = { ...name };
      merged[department] = courses;
    }
    return new CourseCatalog(merged);
  }

  safeGetCourseName(
    department: Department,
    code: string,
  ): SafeResult<CourseName, CourseNotFoundError> {
    const courses = this.table[department];
    const name = courses && Object.hasOwn(courses, code) ? courses[code] : undefined;
    if (!name) {
      return { success: false, error: new CourseNotFoundError(department, code) };
    }
    return { success: true, data: { ...name } };
  }

  /**
   * @throws {CourseNotFoundError} when the department has no course `code`
   */
  getCourseName(department: Department, code: string): CourseName {
    const result = this.safeGetCourseName(department, code);
    if (!result.success) throw result.error;
    return result.data;
  }

  toTable(): CourseTable {
    return structuredClone(this.table);
  }
}

let bundled: CourseCatalog | undefined;

/**
 * The catalogue shipped in `data/courses.json`, read on first use.
 */
export function defaultCourseCatalog(): CourseCatalog {
  if (!bundled) {
    const text = readFileSync(new URL("../data/courses.json", import.meta.url), "utf8");
    bundled = CourseCatalog.empty().extend(decodeJson(CourseTableSchema, text));
  }
  return bundled;
}

/**
 * Official and colloquial names of a department's course.
 *
 * @example
 * ```ts
 * getCourseName("EEE", "EEE 2100");
 * // { official: "Electrical Shop Practice", colloquial: "Electrical Shop" }
 * ```
 *
 * @throws {CourseNotFoundError} when the catalogue has no such course
 */
export function getCourseName(
  department: Department,
  code: string,
  catalog: CourseCatalog = defaultCourseCatalog(),
): CourseName {
  return catalog.getCourseName(department, code);
}
