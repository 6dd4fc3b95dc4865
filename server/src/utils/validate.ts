import type { z } from "zod";
import { ValidationError } from "@genrelay/shared";

/** Parses `input` or throws a 400-mapped ValidationError naming each bad field. */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  throw new ValidationError(detail);
}
