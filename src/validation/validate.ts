import type { z } from "zod";
import { InputValidationError, type Violation } from "../errors.js";

export const ROOT_PATH = "(root)";

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; violations: Violation[] };

function issuePath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.map(String).join(".") : ROOT_PATH;
}

function compareViolations(a: Violation, b: Violation): number {
  if (a.path !== b.path) {
    return a.path < b.path ? -1 : 1;
  }
  if (a.message !== b.message) {
    return a.message < b.message ? -1 : 1;
  }
  return 0;
}

/**
 * Checks a document against a schema and reports every violation, sorted by
 * location, instead of stopping at the first one.
 */
export function validateDocument<T>(document: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ValidationOutcome<T> {
  const parsed = schema.safeParse(document);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  const violations = parsed.error.issues
    .map((issue) => ({ path: issuePath(issue.path), message: issue.message }))
    .sort(compareViolations);

  return { ok: false, violations };
}

export function assertValid<T>(document: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  const outcome = validateDocument(document, schema);
  if (!outcome.ok) {
    throw new InputValidationError(label, outcome.violations);
  }
  return outcome.value;
}
