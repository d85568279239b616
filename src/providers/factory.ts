// pattern: Imperative Shell

import type { AppConfig } from "../config/schema.ts";
import type { UpstreamClient } from "../upstream/client.ts";
import { createGitHubProvider } from "./github.ts";
import { createGoDocsProvider } from "./godocs.ts";
import { createGoogleProvider } from "./google.ts";
import { createPypiProvider } from "./pypi.ts";
import type { DocProvider } from "./types.ts";

/**
 * The built-in providers, in the order their results appear in an aggregate.
 */
export function createDefaultProviders(config: AppConfig, client: UpstreamClient): Array<DocProvider> {
  return [
    createPypiProvider(config.pypi, client),
    createGitHubProvider(config.github, client),
    createGoogleProvider(config.google, client),
    createGoDocsProvider(config.godocs, client),
  ];
}
