// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createUpstreamClient } from "../upstream/client.ts";
import { TEST_HTTP_CONFIG, createFakeFetch, htmlResponse } from "../upstream/test-helpers.ts";
import { createGoDocsProvider, parseGoDocsResults } from "./godocs.ts";

const MOCK_PKGSITE_HTML = `
<html><body>
<div class="SearchResults">
  <div class="SearchSnippet">
    <div class="SearchSnippet-headerContainer">
      <h2>
        <a href="/github.com/gin-gonic/gin" data-gtmc="search result">
          gin
          <span class="SearchSnippet-header-path">(github.com/gin-gonic/gin)</span>
        </a>
      </h2>
    </div>
    <p class="SearchSnippet-synopsis">Package gin implements a HTTP web framework called gin.</p>
  </div>
  <div class="SearchSnippet">
    <div class="SearchSnippet-headerContainer">
      <h2><a href="/net/http">http <span class="SearchSnippet-header-path">(net/http)</span></a></h2>
    </div>
    <p class="SearchSnippet-synopsis">Package http provides HTTP client and server implementations.</p>
  </div>
  <div class="SearchSnippet">
    <h2><a href="/golang.org/x/net/html"></a></h2>
  </div>
</div>
</body></html>`;

describe("parseGoDocsResults", () => {
  it("should read name, import path, synopsis and absolute url", () => {
    expect(parseGoDocsResults(MOCK_PKGSITE_HTML, 10, "https://pkg.go.test")).toEqual([
      {
        name: "gin",
        path: "github.com/gin-gonic/gin",
        synopsis: "Package gin implements a HTTP web framework called gin.",
        url: "https://pkg.go.test/github.com/gin-gonic/gin",
      },
      {
        name: "http",
        path: "net/http",
        synopsis: "Package http provides HTTP client and server implementations.",
        url: "https://pkg.go.test/net/http",
      },
      {
        name: "html",
        path: "golang.org/x/net/html",
        synopsis: "",
        url: "https://pkg.go.test/golang.org/x/net/html",
      },
    ]);
  });

  it("should stop at the limit", () => {
    expect(parseGoDocsResults(MOCK_PKGSITE_HTML, 2, "https://pkg.go.test").map((pkg) => pkg.path)).toEqual([
      "github.com/gin-gonic/gin",
      "net/http",
    ]);
  });
});

describe("Go docs provider", () => {
  it("should search packages on pkg.go.dev for library search", async () => {
    const fakeFetch = createFakeFetch(() => htmlResponse(MOCK_PKGSITE_HTML));
    const provider = createGoDocsProvider(
      { base_url: "https://pkg.go.test/" },
      createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch),
    );

    const result = await provider.searchLibrary?.("gin", 1);

    const url = fakeFetch.calls[0]?.url;
    expect(url?.pathname).toBe("/search");
    expect(url?.searchParams.get("q")).toBe("gin");
    expect(url?.searchParams.get("m")).toBe("package");
    expect(result).toEqual({
      success: true,
      provider: "godocs",
      data: [
        {
          name: "gin",
          path: "github.com/gin-gonic/gin",
          synopsis: "Package gin implements a HTTP web framework called gin.",
          url: "https://pkg.go.test/github.com/gin-gonic/gin",
        },
      ],
    });
  });

  it("should report an upstream failure under its label", async () => {
    const fakeFetch = createFakeFetch(() => new Response("", { status: 502, statusText: "Bad Gateway" }));
    const provider = createGoDocsProvider(
      { base_url: "https://pkg.go.test" },
      createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch),
    );

    expect(await provider.searchLibrary?.("gin", 5)).toEqual({
      success: false,
      provider: "godocs",
      error: "Go docs returned 502",
    });
  });

  it("should expose godocs_search", async () => {
    const fakeFetch = createFakeFetch(() => htmlResponse(MOCK_PKGSITE_HTML));
    const provider = createGoDocsProvider(
      { base_url: "https://pkg.go.test" },
      createUpstreamClient(TEST_HTTP_CONFIG, fakeFetch),
    );
    const operation = provider.getOperations()[0];

    const packages = await operation?.invoke({ query: "http router", limit: 3 });

    expect(operation?.definition.name).toBe("godocs_search");
    expect(fakeFetch.calls[0]?.url.searchParams.get("q")).toBe("http router");
    expect(Array.isArray(packages) ? packages.length : -1).toBe(3);
  });
});
