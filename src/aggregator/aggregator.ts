// pattern: Imperative Shell

/**
 * Fans one library lookup out to every library-search provider and merges the
 * outcomes. A failing provider only costs its own key.
 */

import { z } from "zod";
import type { ResultKeys } from "../config/schema.ts";
import { describeFailure } from "../errors.ts";
import { QuerySchema, clampLimit, parseParams } from "../providers/params.ts";
import type { ProviderRegistry } from "../providers/registry.ts";
import { fail } from "../providers/result.ts";
import type { JsonValue, LibrarySearchProvider, ProviderResult } from "../providers/types.ts";
import { LIBRARY_KEY, resolveResultKeys } from "./keys.ts";

export type AggregateResult = {
  readonly library: string;
  readonly [key: string]: JsonValue;
};

export type AggregatorOptions = {
  readonly registry: ProviderRegistry;
  readonly keys?: Readonly<Record<string, ResultKeys>>;
  readonly include?: ReadonlyArray<string>;
  readonly defaultLimit?: number;
};

export interface Aggregator {
  locate(library: string, limit?: number, signal?: AbortSignal): Promise<AggregateResult>;
  providerNames(): ReadonlyArray<string>;
}

const LocateParamsSchema = z.object({
  library: QuerySchema,
});

function selectProviders(
  registry: ProviderRegistry,
  include: ReadonlyArray<string> | undefined,
): ReadonlyArray<LibrarySearchProvider> {
  const searchable = registry.librarySearchProviders();
  if (!include) {
    return searchable;
  }

  return include.map((name) => {
    const provider = searchable.find((candidate) => candidate.name === name);
    if (!provider) {
      throw new Error(
        registry.get(name)
          ? `provider ${name} does not support library search`
          : `unknown provider: ${name}`,
      );
    }
    return provider;
  });
}

async function callProvider(
  provider: LibrarySearchProvider,
  library: string,
  limit: number,
  signal?: AbortSignal,
): Promise<ProviderResult> {
  try {
    return await provider.searchLibrary(library, limit, signal);
  } catch (error) {
    return fail(provider.name, describeFailure(provider.getMetadata().label, error));
  }
}

export function createAggregator(options: AggregatorOptions): Aggregator {
  const providers = selectProviders(options.registry, options.include);
  const keys = resolveResultKeys(
    providers.map((provider) => provider.name),
    options.keys,
  );
  const targets = providers.map((provider) => ({
    provider,
    keys: keys.get(provider.name) ?? { result: provider.name, error: `${provider.name}_error` },
  }));
  const names = Object.freeze(providers.map((provider) => provider.name));

  return {
    async locate(library, limit, signal) {
      const { library: name } = parseParams(LocateParamsSchema, { library });
      const cappedLimit = clampLimit(limit, options.defaultLimit);

      const settled = await Promise.all(
        targets.map(async (target) => ({
          ...target,
          outcome: await callProvider(target.provider, name, cappedLimit, signal),
        })),
      );

      const merged: Record<string, JsonValue> = { [LIBRARY_KEY]: name };
      for (const { provider, keys: providerKeys, outcome } of settled) {
        if (outcome.success) {
          merged[providerKeys.result] = outcome.data;
          continue;
        }
        const error = outcome.error || `${provider.getMetadata().label} failed`;
        console.warn(`[aggregator] ${provider.name}: ${error}`);
        merged[providerKeys.error] = error;
      }

      return { ...merged, library: name };
    },

    providerNames: () => names,
  };
}
