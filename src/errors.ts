/**
 * Discriminator shared by every error the library raises.
 */
export type UnbusyErrorKind =
  | "parse"
  | "invalid-roll"
  | "course-not-found"
  | "invalid-span"
  | "invariant-violated";

/**
 * Base class for all failures produced by unbusy-core.
 *
 * Narrow on `kind` (or `instanceof` a subclass) to handle a specific failure.
 *
 * @category Errors
 */
export abstract class UnbusyError extends Error {
  abstract readonly kind: UnbusyErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Textual or structured input could not be read as the expected form.
 *
 * `issues` lists one line per problem, prefixed with the path into the input
 * where it was found (e.g. `"classOff.date: Invalid ISO date"`).
 *
 * @category Errors
 */
export class ParseError extends UnbusyError {
  readonly kind = "parse";
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/**
 * An integer failed the roll invariants.
 *
 * @category Errors
 */
export class InvalidRollError extends UnbusyError {
  readonly kind = "invalid-roll";
  public readonly value: number;

  constructor(value: number) {
    super(`Invalid roll: ${value}`);
    this.value = value;
  }
}

/**
 * No catalogue entry exists for a department/course code pair.
 *
 * @category Errors
 */
export class CourseNotFoundError extends UnbusyError {
  readonly kind = "course-not-found";
  public readonly department: string;
  public readonly code: string;

  constructor(department: string, code: string) {
    super(`No course '${code}' available for ${department}`);
    this.department = department;
    this.code = code;
  }
}

/**
 * A multi-day span ends before it starts.
 *
 * @category Errors
 */
export class InvalidSpanError extends UnbusyError {
  readonly kind = "invalid-span";
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid holiday span: ${from} is after ${to}`);
    this.from = from;
    this.to = to;
  }
}

/**
 * A total function met a value no validated constructor can produce.
 *
 * @category Errors
 */
export class InvariantViolationError extends UnbusyError {
  readonly kind = "invariant-violated";
}

/**
 * Outcome of a fallible operation, shaped like zod's `safeParse` result.
 */
export type SafeResult<T, E extends UnbusyError = UnbusyError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Signals a branch that validated input can never reach.
 */
export function unreachable(message: string): never {
  throw new InvariantViolationError(message);
}
