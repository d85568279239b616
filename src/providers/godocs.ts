// pattern: Imperative Shell

import { z } from "zod";
import type { GoDocsConfig } from "../config/schema.ts";
import type { UpstreamClient } from "../upstream/client.ts";
import { parseDocument, selectAll } from "./html.ts";
import { DEFAULT_LIMIT, LimitSchema, QuerySchema, parseParams } from "./params.ts";
import { settle } from "./result.ts";
import { normalizeWhitespace, trimSlash } from "./shape.ts";
import type { DocProvider, GoPackage, ProviderMetadata, ProviderOperation } from "./types.ts";

const GoDocsSearchParamsSchema = z.object({
  query: QuerySchema,
  limit: LimitSchema.default(DEFAULT_LIMIT),
});

const METADATA: ProviderMetadata = {
  name: "godocs",
  label: "Go docs",
  description: "Go package search on pkg.go.dev",
  exposeAsTool: true,
  toolNames: ["godocs_search"],
  supportsLibrarySearch: true,
  requiredEnvVars: [],
  optionalEnvVars: [],
};

/**
 * Reads the package cards of a pkg.go.dev search page.
 */
export function parseGoDocsResults(html: string, limit: number, baseUrl: string): Array<GoPackage> {
  const document = parseDocument(html);
  const packages: Array<GoPackage> = [];

  for (const snippet of selectAll(document, ".SearchSnippet")) {
    if (packages.length >= limit) break;

    const anchor = snippet.querySelector(".SearchSnippet-headerContainer a, h2 a");
    const href = anchor?.getAttribute("href");
    if (!anchor || !href) continue;

    const pathText = normalizeWhitespace(snippet.querySelector(".SearchSnippet-header-path")?.textContent);
    const path = pathText.replace(/^\(|\)$/g, "") || href.replace(/^\//, "");
    const name =
      normalizeWhitespace((anchor.textContent ?? "").replace(pathText, "")) ||
      (path.split("/").pop() ?? path);

    packages.push({
      name,
      path,
      synopsis: normalizeWhitespace(snippet.querySelector(".SearchSnippet-synopsis")?.textContent),
      url: new URL(href, baseUrl).toString(),
    });
  }

  return packages;
}

export function createGoDocsProvider(config: GoDocsConfig, client: UpstreamClient): DocProvider {
  const baseUrl = trimSlash(config.base_url);

  async function search(query: string, limit: number, signal?: AbortSignal): Promise<Array<GoPackage>> {
    const url = new URL(`${baseUrl}/search`);
    url.searchParams.set("q", query);
    url.searchParams.set("m", "package");
    const html = await client.getText(url, { headers: { Accept: "text/html" }, signal });
    return parseGoDocsResults(html, limit, baseUrl);
  }

  const operations: ReadonlyArray<ProviderOperation> = [
    {
      definition: {
        name: "godocs_search",
        description: "Search Go packages on pkg.go.dev and return their import paths and synopses.",
        parameters: [
          { name: "query", type: "string", description: "Package name or search terms", required: true },
          {
            name: "limit",
            type: "number",
            description: "Maximum number of packages (1-100, default 5)",
            required: false,
          },
        ],
      },
      async invoke(params, signal) {
        const { query, limit } = parseParams(GoDocsSearchParamsSchema, params);
        return search(query, limit, signal);
      },
    },
  ];

  return {
    name: METADATA.name,
    getMetadata: () => METADATA,
    getOperations: () => operations,
    searchLibrary(library, limit, signal) {
      return settle(METADATA.name, METADATA.label, () => search(library, limit, signal));
    },
  };
}
