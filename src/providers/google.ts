// pattern: Imperative Shell

import { z } from "zod";
import type { GoogleConfig } from "../config/schema.ts";
import { ConfigurationError, describeFailure } from "../errors.ts";
import type { UpstreamClient } from "../upstream/client.ts";
import { parseDocument, selectAll, type ElementLike } from "./html.ts";
import { DEFAULT_LIMIT, LimitSchema, QuerySchema, parseParams } from "./params.ts";
import { settle } from "./result.ts";
import { normalizeWhitespace, parseUpstream } from "./shape.ts";
import type { DocProvider, ProviderMetadata, ProviderOperation, SearchResult } from "./types.ts";

// The Custom Search API never returns more than ten items per page.
const API_PAGE_SIZE = 10;

export const API_ERROR_TITLE = "google-api-error";

const CustomSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().nullish(),
        link: z.string().nullish(),
        snippet: z.string().nullish(),
      }),
    )
    .default([]),
});

const GoogleSearchParamsSchema = z.object({
  query: QuerySchema,
  limit: LimitSchema.default(DEFAULT_LIMIT),
  use_api: z.boolean().default(false),
});

const METADATA: ProviderMetadata = {
  name: "google",
  label: "Google",
  description: "Google search (HTML scrape with Custom Search API option)",
  exposeAsTool: true,
  toolNames: ["google_search"],
  supportsLibrarySearch: true,
  requiredEnvVars: [],
  optionalEnvVars: ["GOOGLE_API_KEY", "GOOGLE_CSE_ID"],
};

function extractUrl(href: string): string {
  if (href.startsWith("/url?")) {
    const target = new URL(href, "https://www.google.com").searchParams.get("q");
    if (target) return target;
  }
  return href;
}

function firstLink(block: ElementLike): ElementLike | undefined {
  return selectAll(block, "a").find((anchor) => {
    const href = anchor.getAttribute("href");
    return Boolean(href) && !href?.startsWith("#");
  });
}

/**
 * Best-effort scrape of Google result cards. The page layout changes without
 * notice, so an unrecognised page yields an empty list rather than an error.
 */
export function parseGoogleResults(html: string, limit: number): Array<SearchResult> {
  const document = parseDocument(html);
  const results: Array<SearchResult> = [];
  const seen = new Set<string>();

  for (const block of selectAll(document, "div.g")) {
    if (results.length >= limit) break;

    const anchor = firstLink(block);
    if (!anchor) continue;

    const url = extractUrl(anchor.getAttribute("href") ?? "");
    if (seen.has(url)) continue;
    seen.add(url);

    const heading = block.querySelector("h3");
    const title = normalizeWhitespace(heading?.textContent ?? anchor.textContent);
    const snippetEl = block.querySelector(".VwiC3b, [data-sncf]");
    const snippet = normalizeWhitespace(snippetEl?.textContent ?? block.textContent);

    results.push({ title, url, snippet });
  }

  return results;
}

export function normalizeCustomSearch(payload: unknown, limit: number): Array<SearchResult> {
  const { items } = parseUpstream(CustomSearchResponseSchema, payload, "Google Custom Search");
  return items.slice(0, limit).map((item) => ({
    title: item.title ?? "",
    url: item.link ?? "",
    snippet: item.snippet ?? "",
  }));
}

export function createGoogleProvider(config: GoogleConfig, client: UpstreamClient): DocProvider {
  const hasApiCredentials = Boolean(config.api_key && config.cse_id);

  async function scrape(query: string, limit: number, signal?: AbortSignal): Promise<Array<SearchResult>> {
    const url = new URL(config.search_url);
    url.searchParams.set("q", query);
    const html = await client.getText(url, {
      headers: { Accept: "text/html,application/xhtml+xml" },
      signal,
    });
    return parseGoogleResults(html, limit);
  }

  async function searchApi(query: string, limit: number, signal?: AbortSignal): Promise<Array<SearchResult>> {
    if (!config.api_key || !config.cse_id) {
      throw new ConfigurationError("GOOGLE_API_KEY and GOOGLE_CSE_ID are required");
    }
    const url = new URL(config.api_url);
    url.searchParams.set("key", config.api_key);
    url.searchParams.set("cx", config.cse_id);
    url.searchParams.set("q", query);
    url.searchParams.set("num", String(Math.min(limit, API_PAGE_SIZE)));

    const payload = await client.getJson(url, { headers: { Accept: "application/json" }, signal });
    return normalizeCustomSearch(payload, limit);
  }

  /**
   * API first when asked for, then the scrape. A failed API call is reported
   * as a trailing diagnostic record that takes the place of the last hit.
   */
  async function search(
    query: string,
    limit: number,
    useApi: boolean,
    signal?: AbortSignal,
  ): Promise<Array<SearchResult>> {
    let apiError: string | undefined;

    if (useApi) {
      try {
        const hits = await searchApi(query, limit, signal);
        if (hits.length > 0) return hits;
      } catch (error) {
        if (signal?.aborted) throw error;
        apiError = describeFailure("Google API", error);
      }
    }

    const hits = await scrape(query, limit, signal);
    if (apiError === undefined) return hits;
    return [...hits.slice(0, limit - 1), { title: API_ERROR_TITLE, url: "", snippet: apiError }];
  }

  const operations: ReadonlyArray<ProviderOperation> = [
    {
      definition: {
        name: "google_search",
        description:
          "Run a Google search and return result cards. Uses the Custom Search API when use_api is set and credentials exist, with the HTML scrape as fallback.",
        parameters: [
          { name: "query", type: "string", description: "Search terms", required: true },
          {
            name: "limit",
            type: "number",
            description: "Maximum number of results (1-100, default 5)",
            required: false,
          },
          {
            name: "use_api",
            type: "boolean",
            description: "Try the Custom Search API before scraping",
            required: false,
          },
        ],
      },
      async invoke(params, signal) {
        const { query, limit, use_api } = parseParams(GoogleSearchParamsSchema, params);
        return search(query, limit, use_api, signal);
      },
    },
  ];

  return {
    name: METADATA.name,
    getMetadata: () => METADATA,
    getOperations: () => operations,
    searchLibrary(library, limit, signal) {
      const query = config.library_query.replaceAll("{library}", library);
      return settle(METADATA.name, METADATA.label, () =>
        hasApiCredentials ? searchApi(query, limit, signal) : scrape(query, limit, signal),
      );
    },
  };
}
