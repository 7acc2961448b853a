import type { z } from "zod";

/**
 * Raised when an input is structurally invalid (unsupported crop, non-positive
 * land area, malformed date, confidence outside [0,1]).
 *
 * Numeric weather/price anomalies are NOT validation errors: estimators clamp
 * or default those and report them through confidence and adjustments.
 */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`VALIDATION_FAILED: ${field}: ${message}`);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Parses `input` with `schema` and converts the first zod issue into a
 * ValidationError whose field is `root` joined with the issue path.
 */
export function parseWithSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, root: string): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  if (!issue) throw new ValidationError(root, "invalid input");

  const field = [root, ...issue.path.map((p) => String(p))].join(".");
  throw new ValidationError(field, issue.message);
}
