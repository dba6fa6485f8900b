import { z } from "zod";
import { ValidationError } from "../utils/errors";

/**
 * Parses input with a schema, throwing a ValidationError with field-level
 * messages when it does not match.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(result.error);
  return result.data;
}
