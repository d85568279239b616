// pattern: Imperative Shell

import { z } from "zod";
import type { PypiConfig } from "../config/schema.ts";
import type { UpstreamClient } from "../upstream/client.ts";
import { parseParams, QuerySchema } from "./params.ts";
import { settle } from "./result.ts";
import { parseUpstream, trimSlash } from "./shape.ts";
import type { DocProvider, PackageInfo, ProviderMetadata, ProviderOperation } from "./types.ts";

const PypiInfoSchema = z.object({
  name: z.string().nullish(),
  version: z.string().nullish(),
  summary: z.string().nullish(),
  home_page: z.string().nullish(),
  docs_url: z.string().nullish(),
  project_urls: z.record(z.string().nullable()).nullish(),
  requires_python: z.string().nullish(),
});

const PypiResponseSchema = z.object({
  info: PypiInfoSchema,
});

const PypiMetadataParamsSchema = z.object({
  package: QuerySchema,
});

const DOCS_KEY = /^doc(s|umentation)$/i;

const METADATA: ProviderMetadata = {
  name: "pypi",
  label: "PyPI",
  description: "PyPI package metadata",
  exposeAsTool: true,
  toolNames: ["pypi_metadata"],
  supportsLibrarySearch: true,
  requiredEnvVars: [],
  optionalEnvVars: [],
};

export function normalizePackageInfo(payload: unknown): PackageInfo {
  const { info } = parseUpstream(PypiResponseSchema, payload, "PyPI");

  const projectUrls: Record<string, string> = {};
  for (const [key, value] of Object.entries(info.project_urls ?? {})) {
    if (value) projectUrls[key] = value;
  }

  const docsFromProjectUrls = Object.entries(projectUrls).find(([key]) => DOCS_KEY.test(key))?.[1];

  return {
    name: info.name ?? "",
    version: info.version ?? "",
    summary: info.summary ?? "",
    home_page: info.home_page || null,
    docs_url: info.docs_url || docsFromProjectUrls || null,
    project_urls: projectUrls,
    requires_python: info.requires_python || null,
  };
}

export function createPypiProvider(config: PypiConfig, client: UpstreamClient): DocProvider {
  async function fetchMetadata(pkg: string, signal?: AbortSignal): Promise<PackageInfo> {
    const url = `${trimSlash(config.base_url)}/pypi/${encodeURIComponent(pkg)}/json`;
    const payload = await client.getJson(url, {
      headers: { Accept: "application/json" },
      signal,
    });
    return normalizePackageInfo(payload);
  }

  const operations: ReadonlyArray<ProviderOperation> = [
    {
      definition: {
        name: "pypi_metadata",
        description:
          "Retrieve PyPI package metadata including documentation URLs when available.",
        parameters: [
          {
            name: "package",
            type: "string",
            description: "Package name as published on PyPI",
            required: true,
          },
        ],
      },
      async invoke(params, signal) {
        const { package: pkg } = parseParams(PypiMetadataParamsSchema, params);
        return fetchMetadata(pkg, signal);
      },
    },
  ];

  return {
    name: METADATA.name,
    getMetadata: () => METADATA,
    getOperations: () => operations,
    searchLibrary(library, _limit, signal) {
      return settle(METADATA.name, METADATA.label, () => fetchMetadata(library, signal));
    },
  };
}
