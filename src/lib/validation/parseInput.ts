// src/lib/validation/parseInput.ts
// zod boundary parsing that fails with the structured field list of InvalidArgumentError.

import type { z } from "zod";
import { InvalidArgumentError, type FieldViolation } from "@/lib/errors/errors";

function valueAt(input: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (current === null || typeof current !== "object") return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function toFieldViolations(
  error: z.ZodError,
  input: unknown,
): FieldViolation[] {
  return error.issues.map((issue) => ({
    field: issue.path.length ? issue.path.join(".") : "(root)",
    message: issue.message,
    value: valueAt(input, issue.path),
  }));
}

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message = "Request failed validation",
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(message, toFieldViolations(parsed.error, input));
  }
  return parsed.data;
}
