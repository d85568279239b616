// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export const DEFAULT_CONFIG_FILE = "docs-gateway.toml";

type Env = Readonly<Record<string, string | undefined>>;
type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): Record<string, unknown> {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(resolvedPath)) {
    // Only an explicitly requested file has to exist.
    if (configPath) {
      throw new Error(`config file not found: ${resolvedPath}`);
    }
    return {};
  }
  return TOML.parse(readFileSync(resolvedPath, "utf-8"));
}

function collectEnvOverrides(env: Env): Record<string, Section> {
  const overrides: Record<string, Section> = {};
  const set = (section: string, key: string, value: unknown): void => {
    overrides[section] = { ...overrides[section], [key]: value };
  };

  if (env["GITHUB_TOKEN"]) {
    set("github", "token", env["GITHUB_TOKEN"]);
  }
  if (env["GOOGLE_API_KEY"]) {
    set("google", "api_key", env["GOOGLE_API_KEY"]);
  }
  if (env["GOOGLE_CSE_ID"]) {
    set("google", "cse_id", env["GOOGLE_CSE_ID"]);
  }
  if (env["USE_TOON"]?.toLowerCase() === "true") {
    set("output", "format", "dense");
  }
  if (env["DOCS_GATEWAY_TIMEOUT_MS"]) {
    set("http", "timeout_ms", Number(env["DOCS_GATEWAY_TIMEOUT_MS"]));
  }

  return overrides;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const parsed = readConfigFile(configPath);

  // Environment variable overrides for secrets and deployment knobs
  const merged: Record<string, unknown> = { ...parsed };
  for (const [section, values] of Object.entries(collectEnvOverrides(env))) {
    const base = parsed[section];
    merged[section] = { ...(isRecord(base) ? base : {}), ...values };
  }

  return AppConfigSchema.parse(merged);
}
