// pattern: Functional Core

/**
 * Where each provider's outcome lands in an aggregate result.
 * Built-in names are fixed here; configuration may override any entry.
 */

import type { ResultKeys } from "../config/schema.ts";

export const LIBRARY_KEY = "library";

export const DEFAULT_RESULT_KEYS: Readonly<Record<string, ResultKeys>> = {
  pypi: { result: "pypi", error: "pypi_error" },
  github: { result: "github_repos", error: "github_error" },
  google: { result: "web", error: "google_error" },
  godocs: { result: "godocs", error: "godocs_error" },
};

export function defaultKeysFor(providerName: string): ResultKeys {
  return DEFAULT_RESULT_KEYS[providerName] ?? {
    result: providerName,
    error: `${providerName}_error`,
  };
}

/**
 * Resolves the keys for every provider and rejects any map in which two
 * outcomes could overwrite each other.
 */
export function resolveResultKeys(
  providerNames: ReadonlyArray<string>,
  overrides: Readonly<Record<string, ResultKeys>> = {},
): ReadonlyMap<string, ResultKeys> {
  const resolved = new Map<string, ResultKeys>();
  const owners = new Map<string, string>([[LIBRARY_KEY, LIBRARY_KEY]]);

  for (const name of providerNames) {
    const keys = overrides[name] ?? defaultKeysFor(name);
    for (const key of [keys.result, keys.error]) {
      const owner = owners.get(key);
      if (owner !== undefined) {
        throw new Error(
          owner === LIBRARY_KEY
            ? `provider ${name} cannot use the reserved key "${LIBRARY_KEY}"`
            : `result key "${key}" of provider ${name} is already used by ${owner}`,
        );
      }
      owners.set(key, name);
    }
    resolved.set(name, keys);
  }

  return resolved;
}
