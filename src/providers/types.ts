// pattern: Functional Core

/**
 * Provider contract and the normalised records providers produce.
 * Every upstream integration implements DocProvider; the registry and the
 * aggregator only ever see this surface.
 */

import type { ToolDefinition } from "../tool/types.ts";

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue | undefined };

export type ProviderMetadata = {
  readonly name: string;
  readonly label: string;
  readonly description: string;
  readonly exposeAsTool: boolean;
  readonly toolNames: ReadonlyArray<string>;
  readonly supportsLibrarySearch: boolean;
  readonly requiredEnvVars: ReadonlyArray<string>;
  readonly optionalEnvVars: ReadonlyArray<string>;
};

/**
 * Outcome of one provider call. Success carries data and never an error;
 * failure carries an error and never data.
 */
export type ProviderResult<T extends JsonValue = JsonValue> =
  | { readonly success: true; readonly provider: string; readonly data: T }
  | { readonly success: false; readonly provider: string; readonly error: string };

/**
 * A named operation a provider exposes to callers. `invoke` validates its own
 * params and throws the gateway error taxonomy; the tool layer renders those.
 */
export type ProviderOperation = {
  readonly definition: ToolDefinition;
  invoke(params: Record<string, unknown>, signal?: AbortSignal): Promise<JsonValue>;
};

export interface DocProvider {
  readonly name: string;
  getMetadata(): ProviderMetadata;
  getOperations(): ReadonlyArray<ProviderOperation>;
  searchLibrary?(library: string, limit: number, signal?: AbortSignal): Promise<ProviderResult>;
}

export type LibrarySearchProvider = DocProvider & {
  searchLibrary(library: string, limit: number, signal?: AbortSignal): Promise<ProviderResult>;
};

export function supportsLibrarySearch(provider: DocProvider): provider is LibrarySearchProvider {
  return provider.getMetadata().supportsLibrarySearch && typeof provider.searchLibrary === "function";
}

export type PackageInfo = {
  readonly name: string;
  readonly version: string;
  readonly summary: string;
  readonly home_page: string | null;
  readonly docs_url: string | null;
  readonly project_urls: Readonly<Record<string, string>>;
  readonly requires_python: string | null;
};

export type Repository = {
  readonly name: string;
  readonly description: string;
  readonly stars: number;
  readonly url: string;
  readonly default_branch: string;
  readonly language: string | null;
};

export type CodeHit = {
  readonly name: string;
  readonly path: string;
  readonly repository: string;
  readonly url: string;
};

export type SearchResult = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
};

export type GoPackage = {
  readonly name: string;
  readonly path: string;
  readonly synopsis: string;
  readonly url: string;
};
