import type { TypeOf, ZodTypeAny } from "zod";
import { ValidationError } from "../lib/errors";

/**
 * Parse `input` (req.body, req.query) or fail the request with a 400 describing
 * the first problem. Express v5 safe: the request is never mutated.
 */
export function parseWith<T extends ZodTypeAny>(schema: T, input: unknown): TypeOf<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, input);
  return parsed.data;
}
