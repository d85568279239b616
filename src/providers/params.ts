// pattern: Functional Core

/**
 * Shared request validation for provider operations and the aggregator.
 */

import { z } from "zod";
import { ValidationError } from "../errors.ts";

export const MAX_RESULT_LIMIT = 100;
export const DEFAULT_LIMIT = 5;
export const MAX_QUERY_LENGTH = 200;

export const QuerySchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .max(MAX_QUERY_LENGTH, `must be at most ${MAX_QUERY_LENGTH} characters`);

export const LimitSchema = z
  .number()
  .int("must be an integer")
  .min(1, `must be between 1 and ${MAX_RESULT_LIMIT}`)
  .max(MAX_RESULT_LIMIT, `must be between 1 and ${MAX_RESULT_LIMIT}`);

export const LanguageSchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .max(50, "must be at most 50 characters");

export const RepoSchema = z
  .string()
  .trim()
  .max(MAX_QUERY_LENGTH, `must be at most ${MAX_QUERY_LENGTH} characters`);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.output<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Aggregator-side limit handling: missing means the default, anything else is
 * clamped into range instead of rejected.
 */
export function clampLimit(limit: number | undefined, fallback: number = DEFAULT_LIMIT): number {
  const value = limit === undefined || Number.isNaN(limit) ? fallback : Math.trunc(limit);
  return Math.min(Math.max(value, 1), MAX_RESULT_LIMIT);
}
