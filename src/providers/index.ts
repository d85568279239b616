// pattern: Functional Core

export type {
  JsonPrimitive,
  JsonValue,
  ProviderMetadata,
  ProviderResult,
  ProviderOperation,
  DocProvider,
  LibrarySearchProvider,
  PackageInfo,
  Repository,
  CodeHit,
  SearchResult,
  GoPackage,
} from "./types.ts";
export type { ProviderRegistry } from "./registry.ts";

export { supportsLibrarySearch } from "./types.ts";
export { createProviderRegistry } from "./registry.ts";
export { createDefaultProviders } from "./factory.ts";
export { createPypiProvider } from "./pypi.ts";
export { createGitHubProvider } from "./github.ts";
export { createGoogleProvider } from "./google.ts";
export { createGoDocsProvider } from "./godocs.ts";
export { MAX_RESULT_LIMIT, DEFAULT_LIMIT, clampLimit } from "./params.ts";
