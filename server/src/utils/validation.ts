// src/utils/validation.ts
import { z } from "zod";
import { ValidationError } from "../errors";

/**
 * Runs a zod schema over untyped input and turns failures into a
 * ValidationError with one issue per offending field.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
        message: issue.message,
      }))
    );
  }
  return result.data;
}
