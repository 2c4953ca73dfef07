/**
 * Entry points for reading and writing the external form.
 *
 * Every wire schema in this package decodes into domain values, so
 * `decode(NoticeSchema, json)` hands back a {@link Notice}. Failures are
 * reported as {@link UnbusyError}s rather than zod errors: a lone invalid
 * roll or backwards holiday span keeps its own kind, anything else becomes a
 * {@link ParseError} listing every issue.
 *
 * @packageDocumentation
 */

import * as z from "zod";
import {
  InvalidRollError,
  InvalidSpanError,
  ParseError,
  type SafeResult,
  type UnbusyError,
} from "./errors.js";

const DomainIssueParamsSchema = z.discriminatedUnion("error", [
  z.object({ error: z.literal("invalid-roll"), value: z.number() }),
  z.object({ error: z.literal("invalid-span"), from: z.string(), to: z.string() }),
]);

function formatIssue(issue: z.ZodError["issues"][number]): string {
  const path = issue.path.map(String).join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Converts a zod failure into the library's error taxonomy.
 */
export function toUnbusyError(error: z.ZodError): UnbusyError {
  const [only, ...rest] = error.issues;
  if (only && rest.length === 0 && only.code === "custom") {
    const params = DomainIssueParamsSchema.safeParse(only.params);
    if (params.success) {
      switch (params.data.error) {
        case "invalid-roll":
          return new InvalidRollError(params.data.value);
        case "invalid-span":
          return new InvalidSpanError(params.data.from, params.data.to);
      }
    }
  }

  const issues = error.issues.map(formatIssue);
  return new ParseError(`Invalid input: ${issues.join("; ")}`, issues);
}

export function safeDecode<S extends z.ZodType>(
  schema: S,
  input: unknown,
): SafeResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: toUnbusyError(result.error) };
  }
  return { success: true, data: result.data };
}

/**
 * Decodes an already-parsed value (e.g. from `JSON.parse` or a YAML reader).
 *
 * @throws {UnbusyError} when `input` does not match the wire form
 *
 * @example
 * ```typescript
 * const holiday = decode(HolidaySchema, { for: "Eid", on: "2020-05-24" });
 * // { for: "Eid", span: { type: "singleDay", on: "2020-05-24" } }
 * ```
 */
export function decode<S extends z.ZodType>(schema: S, input: unknown): z.output<S> {
  const result = safeDecode(schema, input);
  if (!result.success) throw result.error;
  return result.data;
}

export function safeDecodeJson<S extends z.ZodType>(
  schema: S,
  text: string,
): SafeResult<z.output<S>> {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { success: false, error: new ParseError(`Invalid JSON: ${reason}`, [reason]) };
  }
  return safeDecode(schema, input);
}

/**
 * @throws {UnbusyError} when `text` is not JSON or does not match the wire form
 */
export function decodeJson<S extends z.ZodType>(schema: S, text: string): z.output<S> {
  const result = safeDecodeJson(schema, text);
  if (!result.success) throw result.error;
  return result.data;
}

/**
 * Serializes an encoded value (the output of an `encode*` function).
 */
export function encodeJson(wire: unknown, indent?: number): string {
  return JSON.stringify(wire, null, indent);
}
