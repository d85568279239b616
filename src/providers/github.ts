// pattern: Imperative Shell

import { z } from "zod";
import type { GitHubConfig } from "../config/schema.ts";
import type { UpstreamClient } from "../upstream/client.ts";
import {
  DEFAULT_LIMIT,
  LanguageSchema,
  LimitSchema,
  QuerySchema,
  RepoSchema,
  parseParams,
} from "./params.ts";
import { settle } from "./result.ts";
import { parseUpstream, trimSlash } from "./shape.ts";
import type {
  CodeHit,
  DocProvider,
  ProviderMetadata,
  ProviderOperation,
  Repository,
} from "./types.ts";

const GitHubRepoItemSchema = z.object({
  full_name: z.string().nullish(),
  description: z.string().nullish(),
  stargazers_count: z.number().nullish(),
  html_url: z.string().nullish(),
  default_branch: z.string().nullish(),
  language: z.string().nullish(),
});

const GitHubCodeItemSchema = z.object({
  name: z.string().nullish(),
  path: z.string().nullish(),
  html_url: z.string().nullish(),
  repository: z.object({ full_name: z.string().nullish() }).nullish(),
});

const GitHubRepoSearchSchema = z.object({
  items: z.array(GitHubRepoItemSchema).default([]),
});

const GitHubCodeSearchSchema = z.object({
  items: z.array(GitHubCodeItemSchema).default([]),
});

type RepoSearchOptions = {
  readonly limit: number;
  readonly language: string | null;
};

const METADATA: ProviderMetadata = {
  name: "github",
  label: "GitHub",
  description: "GitHub repository and code search",
  exposeAsTool: true,
  toolNames: ["github_repo_search", "github_code_search"],
  supportsLibrarySearch: true,
  requiredEnvVars: [],
  optionalEnvVars: ["GITHUB_TOKEN"],
};

export function normalizeRepositories(payload: unknown, limit: number): Array<Repository> {
  const { items } = parseUpstream(GitHubRepoSearchSchema, payload, "GitHub repository search");
  return items.slice(0, limit).map((item) => ({
    name: item.full_name ?? "",
    description: item.description ?? "",
    stars: item.stargazers_count ?? 0,
    url: item.html_url ?? "",
    default_branch: item.default_branch ?? "",
    language: item.language ?? null,
  }));
}

export function normalizeCodeHits(payload: unknown, limit: number): Array<CodeHit> {
  const { items } = parseUpstream(GitHubCodeSearchSchema, payload, "GitHub code search");
  return items.slice(0, limit).map((item) => ({
    name: item.name ?? "",
    path: item.path ?? "",
    repository: item.repository?.full_name ?? "",
    url: item.html_url ?? "",
  }));
}

export function createGitHubProvider(config: GitHubConfig, client: UpstreamClient): DocProvider {
  const apiBase = trimSlash(config.api_base);

  // Computed once; the registry hands out this same provider for the process lifetime.
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
  };
  if (config.token) {
    headers["Authorization"] = `Bearer ${config.token}`;
  }

  async function searchRepos(
    query: string,
    options: RepoSearchOptions,
    signal?: AbortSignal,
  ): Promise<Array<Repository>> {
    const url = new URL(`${apiBase}/search/repositories`);
    url.searchParams.set("q", options.language ? `${query} language:${options.language}` : query);
    url.searchParams.set("sort", "stars");
    url.searchParams.set("order", "desc");
    url.searchParams.set("per_page", String(options.limit));

    const payload = await client.getJson(url, { headers, signal });
    return normalizeRepositories(payload, options.limit);
  }

  async function searchCode(
    query: string,
    repo: string | undefined,
    limit: number,
    signal?: AbortSignal,
  ): Promise<Array<CodeHit>> {
    const url = new URL(`${apiBase}/search/code`);
    url.searchParams.set("q", repo ? `${query} repo:${repo}` : query);
    url.searchParams.set("per_page", String(limit));

    const payload = await client.getJson(url, { headers, signal });
    return normalizeCodeHits(payload, limit);
  }

  const RepoSearchParamsSchema = z.object({
    query: QuerySchema,
    limit: LimitSchema.default(DEFAULT_LIMIT),
    language: LanguageSchema.nullable().default(config.default_language),
  });

  const CodeSearchParamsSchema = z.object({
    query: QuerySchema,
    repo: RepoSchema.nullish(),
    limit: LimitSchema.default(DEFAULT_LIMIT),
  });

  const operations: ReadonlyArray<ProviderOperation> = [
    {
      definition: {
        name: "github_repo_search",
        description: "Search GitHub repositories relevant to a library or topic, most starred first.",
        parameters: [
          { name: "query", type: "string", description: "Search terms", required: true },
          {
            name: "limit",
            type: "number",
            description: "Maximum number of repositories (1-100, default 5)",
            required: false,
          },
          {
            name: "language",
            type: "string",
            description: `Language filter (default ${config.default_language}); null searches every language`,
            required: false,
            nullable: true,
          },
        ],
      },
      async invoke(params, signal) {
        const { query, limit, language } = parseParams(RepoSearchParamsSchema, params);
        return searchRepos(query, { limit, language }, signal);
      },
    },
    {
      definition: {
        name: "github_code_search",
        description: "Search code on GitHub, optionally scoped to one repository.",
        parameters: [
          { name: "query", type: "string", description: "Search terms", required: true },
          {
            name: "repo",
            type: "string",
            description: "Repository to search in, as owner/name",
            required: false,
            nullable: true,
          },
          {
            name: "limit",
            type: "number",
            description: "Maximum number of hits (1-100, default 5)",
            required: false,
          },
        ],
      },
      async invoke(params, signal) {
        const { query, repo, limit } = parseParams(CodeSearchParamsSchema, params);
        return searchCode(query, repo || undefined, limit, signal);
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
        searchRepos(query, { limit, language: config.default_language }, signal),
      );
    },
  };
}
