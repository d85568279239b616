// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createUpstreamClient } from "../upstream/client.ts";
import { TEST_HTTP_CONFIG, createFakeFetch, jsonResponse } from "../upstream/test-helpers.ts";
import { ParseError, ValidationError } from "../errors.ts";
import { createPypiProvider, normalizePackageInfo } from "./pypi.ts";

const PYPI_CONFIG = { base_url: "https://pypi.test" };

const REQUESTS_PAYLOAD = {
  info: {
    name: "requests",
    version: "2.31.0",
    summary: "Python HTTP for Humans.",
    home_page: "https://requests.readthedocs.io",
    requires_python: ">=3.7",
    project_urls: {
      Documentation: "https://requests.readthedocs.io",
      Source: "https://github.com/psf/requests",
    },
  },
};

describe("normalizePackageInfo", () => {
  it("should map the info block onto a package record", () => {
    expect(normalizePackageInfo(REQUESTS_PAYLOAD)).toEqual({
      name: "requests",
      version: "2.31.0",
      summary: "Python HTTP for Humans.",
      home_page: "https://requests.readthedocs.io",
      docs_url: "https://requests.readthedocs.io",
      project_urls: {
        Documentation: "https://requests.readthedocs.io",
        Source: "https://github.com/psf/requests",
      },
      requires_python: ">=3.7",
    });
  });

  it("should fill absent fields with stable defaults", () => {
    expect(normalizePackageInfo({ info: { name: "tiny", summary: null, home_page: "" } })).toEqual({
      name: "tiny",
      version: "",
      summary: "",
      home_page: null,
      docs_url: null,
      project_urls: {},
      requires_python: null,
    });
  });

  it("should prefer info.docs_url over project urls", () => {
    const info = normalizePackageInfo({
      info: {
        name: "pkg",
        docs_url: "https://pythonhosted.org/pkg",
        project_urls: { docs: "https://pkg.example.com/docs" },
      },
    });

    expect(info.docs_url).toBe("https://pythonhosted.org/pkg");
  });

  it("should find a docs link under a lower-case key and drop null urls", () => {
    const info = normalizePackageInfo({
      info: {
        name: "pkg",
        project_urls: { docs: "https://pkg.example.com/docs", Homepage: null },
      },
    });

    expect(info.docs_url).toBe("https://pkg.example.com/docs");
    expect(info.project_urls).toEqual({ docs: "https://pkg.example.com/docs" });
  });

  it("should raise ParseError when the info block is missing", () => {
    expect(() => normalizePackageInfo({ releases: {} })).toThrow(ParseError);
  });
});

describe("PyPI provider", () => {
  it("should describe itself without network access", () => {
    const fakeFetch = createFakeFetch(() => jsonResponse({}));
    const provider = createPypiProvider(PYPI_CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch));

    expect(provider.getMetadata()).toEqual({
      name: "pypi",
      label: "PyPI",
      description: "PyPI package metadata",
      exposeAsTool: true,
      toolNames: ["pypi_metadata"],
      supportsLibrarySearch: true,
      requiredEnvVars: [],
      optionalEnvVars: [],
    });
    expect(fakeFetch.calls).toHaveLength(0);
  });

  it("should look up the package JSON endpoint for library search", async () => {
    const fakeFetch = createFakeFetch(() => jsonResponse(REQUESTS_PAYLOAD));
    const provider = createPypiProvider(PYPI_CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch));

    const result = await provider.searchLibrary?.("requests", 5);

    expect(fakeFetch.calls[0]?.url.toString()).toBe("https://pypi.test/pypi/requests/json");
    expect(result?.success).toBe(true);
    if (result?.success) {
      expect(result.provider).toBe("pypi");
      expect(result.data).toMatchObject({ name: "requests", version: "2.31.0" });
    }
  });

  it("should turn a 404 into a failed result", async () => {
    const fakeFetch = createFakeFetch(
      () => new Response("", { status: 404, statusText: "Not Found" }),
    );
    const provider = createPypiProvider(PYPI_CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch));

    const result = await provider.searchLibrary?.("no-such-package", 5);

    expect(result).toEqual({ success: false, provider: "pypi", error: "PyPI returned 404" });
  });

  it("should turn a transport failure into a failed result", async () => {
    const fakeFetch = createFakeFetch(() => {
      throw new Error("connect ECONNREFUSED");
    });
    const provider = createPypiProvider(PYPI_CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch));

    const result = await provider.searchLibrary?.("requests", 5);

    expect(result).toEqual({
      success: false,
      provider: "pypi",
      error: "PyPI request failed: connect ECONNREFUSED",
    });
  });

  describe("pypi_metadata operation", () => {
    it("should return the package record", async () => {
      const fakeFetch = createFakeFetch(() => jsonResponse(REQUESTS_PAYLOAD));
      const provider = createPypiProvider(PYPI_CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch));
      const operation = provider.getOperations()[0];

      const data = await operation?.invoke({ package: " requests " });

      expect(data).toMatchObject({ version: "2.31.0", requires_python: ">=3.7" });
      expect(fakeFetch.calls[0]?.url.pathname).toBe("/pypi/requests/json");
    });

    it("should reject an empty package name before any request", async () => {
      const fakeFetch = createFakeFetch(() => jsonResponse(REQUESTS_PAYLOAD));
      const provider = createPypiProvider(PYPI_CONFIG, createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch));
      const operation = provider.getOperations()[0];

      await expect(operation?.invoke({ package: "   " })).rejects.toThrow(
        new ValidationError("package: must not be empty"),
      );
      expect(fakeFetch.calls).toHaveLength(0);
    });
  });
});
