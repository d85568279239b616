// pattern: Functional Core

import { describeFailure } from "../errors.ts";
import type { JsonValue, ProviderResult } from "./types.ts";

export function ok<T extends JsonValue>(provider: string, data: T): ProviderResult<T> {
  return { success: true, provider, data };
}

export function fail(provider: string, error: string): ProviderResult<never> {
  return { success: false, provider, error };
}

/**
 * Runs a lookup and folds any thrown error into a failed result, so nothing
 * thrown by an upstream call leaves the provider.
 */
export async function settle<T extends JsonValue>(
  provider: string,
  label: string,
  lookup: () => Promise<T>,
): Promise<ProviderResult<T>> {
  try {
    return ok(provider, await lookup());
  } catch (error) {
    return fail(provider, describeFailure(label, error));
  }
}
