import type { z } from "zod";
import { ValidationError } from "../errors.js";

/** Parses the filter parameters of a list request. */
export function parseListQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  const parsed = schema.safeParse(query ?? {});
  if (parsed.success) return parsed.data;

  const [issue] = parsed.error.issues;
  const field = issue ? issue.path.join(".") : "query";
  throw new ValidationError(`Invalid ${field}: ${issue?.message ?? "unsupported value"}`, { field });
}
