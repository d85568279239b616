// pattern: Functional Core
import { z } from "zod";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0 Safari/537.36";

const HttpConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(15000),
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  max_retries: z.number().int().min(0).max(5).default(0),
  retry_backoff_ms: z.number().int().nonnegative().default(500),
});

const OutputConfigSchema = z.object({
  format: z.enum(["json", "dense"]).default("json"),
});

const PypiConfigSchema = z.object({
  base_url: z.string().url().default("https://pypi.org"),
});

const GitHubConfigSchema = z.object({
  api_base: z.string().url().default("https://api.github.com"),
  token: z.string().min(1).optional(),
  default_language: z.string().min(1).max(50).default("Python"),
  library_query: z.string().includes("{library}").default("{library} python"),
});

const GoogleConfigSchema = z.object({
  search_url: z.string().url().default("https://www.google.com/search"),
  api_url: z.string().url().default("https://www.googleapis.com/customsearch/v1"),
  api_key: z.string().min(1).optional(),
  cse_id: z.string().min(1).optional(),
  library_query: z.string().includes("{library}").default("{library} python documentation"),
});

const GoDocsConfigSchema = z.object({
  base_url: z.string().url().default("https://pkg.go.dev"),
});

const ResultKeysSchema = z.object({
  result: z.string().min(1),
  error: z.string().min(1),
});

const AggregatorConfigSchema = z.object({
  default_limit: z.number().int().min(1).max(100).default(5),
  providers: z.array(z.string().min(1)).optional(),
  keys: z.record(ResultKeysSchema).default({}),
});

const AppConfigSchema = z.object({
  http: HttpConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  pypi: PypiConfigSchema.default({}),
  github: GitHubConfigSchema.default({}),
  google: GoogleConfigSchema.default({}),
  godocs: GoDocsConfigSchema.default({}),
  aggregator: AggregatorConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = OutputConfig["format"];
export type PypiConfig = z.infer<typeof PypiConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type GoogleConfig = z.infer<typeof GoogleConfigSchema>;
export type GoDocsConfig = z.infer<typeof GoDocsConfigSchema>;
export type ResultKeys = z.infer<typeof ResultKeysSchema>;
export type AggregatorConfig = z.infer<typeof AggregatorConfigSchema>;

export {
  AppConfigSchema,
  HttpConfigSchema,
  OutputConfigSchema,
  PypiConfigSchema,
  GitHubConfigSchema,
  GoogleConfigSchema,
  GoDocsConfigSchema,
  AggregatorConfigSchema,
};
