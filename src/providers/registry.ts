// pattern: Imperative Shell

/**
 * Fixed set of providers, checked and indexed once at startup.
 */

import { supportsLibrarySearch } from "./types.ts";
import type {
  DocProvider,
  LibrarySearchProvider,
  ProviderMetadata,
  ProviderOperation,
} from "./types.ts";

export interface ProviderRegistry {
  get(name: string): DocProvider | undefined;
  list(): ReadonlyArray<DocProvider>;
  librarySearchProviders(): ReadonlyArray<LibrarySearchProvider>;
  metadata(): ReadonlyArray<ProviderMetadata>;
  operation(toolName: string): ProviderOperation | undefined;
}

function checkProvider(provider: DocProvider): void {
  const metadata = provider.getMetadata();
  if (metadata.name !== provider.name) {
    throw new Error(`provider ${provider.name} reports metadata name ${metadata.name}`);
  }

  const operationNames = provider.getOperations().map((op) => op.definition.name);
  const missing = metadata.toolNames.filter((name) => !operationNames.includes(name));
  const undeclared = operationNames.filter((name) => !metadata.toolNames.includes(name));
  if (missing.length > 0 || undeclared.length > 0) {
    throw new Error(
      `provider ${provider.name} tool names do not match its operations (missing: [${missing.join(", ")}], undeclared: [${undeclared.join(", ")}])`,
    );
  }

  const hasSearch = typeof provider.searchLibrary === "function";
  if (metadata.supportsLibrarySearch !== hasSearch) {
    throw new Error(
      `provider ${provider.name} declares supportsLibrarySearch=${metadata.supportsLibrarySearch} but ${hasSearch ? "implements" : "does not implement"} searchLibrary`,
    );
  }
}

export function createProviderRegistry(providers: ReadonlyArray<DocProvider>): ProviderRegistry {
  const byName = new Map<string, DocProvider>();
  const byTool = new Map<string, ProviderOperation>();

  for (const provider of providers) {
    if (byName.has(provider.name)) {
      throw new Error(`provider already registered: ${provider.name}`);
    }
    checkProvider(provider);

    for (const operation of provider.getOperations()) {
      const toolName = operation.definition.name;
      if (byTool.has(toolName)) {
        throw new Error(`tool ${toolName} is exposed by more than one provider`);
      }
      byTool.set(toolName, operation);
    }
    byName.set(provider.name, provider);
  }

  const ordered = Object.freeze(Array.from(byName.values()));
  const searchable = Object.freeze(ordered.filter(supportsLibrarySearch));
  const metadata = Object.freeze(ordered.map((provider) => provider.getMetadata()));

  return {
    get: (name) => byName.get(name),
    list: () => ordered,
    librarySearchProviders: () => searchable,
    metadata: () => metadata,
    operation: (toolName) => byTool.get(toolName),
  };
}
