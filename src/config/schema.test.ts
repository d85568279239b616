// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { AppConfigSchema } from "./schema.ts";

describe("AppConfigSchema", () => {
  it("should parse an empty object into a complete config", () => {
    const result = AppConfigSchema.parse({});

    expect(result.output.format).toBe("json");
    expect(result.http.user_agent).toContain("Mozilla/5.0");
    expect(result.github.library_query).toBe("{library} python");
  });

  it("should reject an unknown output format", () => {
    expect(() => AppConfigSchema.parse({ output: { format: "yaml" } })).toThrow();
  });

  it("should reject a default limit above the result cap", () => {
    expect(() => AppConfigSchema.parse({ aggregator: { default_limit: 101 } })).toThrow();
  });

  it("should reject a library query template without the placeholder", () => {
    expect(() => AppConfigSchema.parse({ github: { library_query: "python" } })).toThrow();
  });

  it("should reject a result key entry missing its error key", () => {
    expect(() =>
      AppConfigSchema.parse({ aggregator: { keys: { pypi: { result: "pypi" } } } }),
    ).toThrow();
  });

  it("should reject more than five retries", () => {
    expect(() => AppConfigSchema.parse({ http: { max_retries: 6 } })).toThrow();
  });
});
