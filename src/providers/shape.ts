// pattern: Functional Core

import type { z } from "zod";
import { ParseError } from "../errors.ts";

/**
 * Checks an upstream payload against the shape a provider relies on.
 * Missing optional fields are fine; a payload of the wrong structure is a ParseError.
 */
export function parseUpstream<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  what: string,
): z.output<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ParseError(`unexpected ${what} response${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/** Collapses runs of whitespace, as scraped text carries layout whitespace. */
export function normalizeWhitespace(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

export function trimSlash(base: string): string {
  return base.replace(/\/+$/, "");
}
