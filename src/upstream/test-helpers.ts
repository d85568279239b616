// pattern: Functional Core

/**
 * Shared test utilities for code that talks to upstream APIs.
 * Provides an in-process fetch stand-in that records every request.
 */

import type { HttpConfig } from "../config/schema.ts";
import type { FetchFn } from "./client.ts";

export type RecordedRequest = {
  readonly url: URL;
  readonly headers: Headers;
};

export type FakeFetch = FetchFn & { readonly calls: Array<RecordedRequest> };

export const TEST_HTTP_CONFIG: HttpConfig = {
  timeout_ms: 1000,
  user_agent: "docs-gateway-test",
  max_retries: 0,
  retry_backoff_ms: 0,
};

export function createFakeFetch(
  handler: (url: URL, init?: RequestInit) => Response | Promise<Response>,
): FakeFetch {
  const calls: Array<RecordedRequest> = [];
  const fetchFn: FetchFn = async (input, init) => {
    const url = new URL(input.toString());
    calls.push({ url, headers: new Headers(init?.headers) });
    return handler(url, init);
  };
  return Object.assign(fetchFn, { calls });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, {
    status,
    headers: { "content-type": "text/html; charset=utf-8" },
  });
}

/**
 * A fetch that never answers and rejects once its signal aborts.
 */
export const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new Error("This operation was aborted"));
      return;
    }
    signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
  });
