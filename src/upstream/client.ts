// pattern: Imperative Shell

/**
 * Thin HTTP client shared by every provider.
 * Applies default headers, one timeout per request, optional retry of transient
 * failures, and maps failures onto the gateway error taxonomy.
 */

import type { HttpConfig } from "../config/schema.ts";
import {
  ParseError,
  UpstreamHTTPError,
  UpstreamTransportError,
  errorMessage,
} from "../errors.ts";
import { callWithRetry } from "./retry.ts";

export const MAX_ERROR_BODY_LENGTH = 200;

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type RequestOptions = {
  readonly headers?: Readonly<Record<string, string>>;
  readonly signal?: AbortSignal;
};

export interface UpstreamClient {
  getText(url: string | URL, options?: RequestOptions): Promise<string>;
  getJson(url: string | URL, options?: RequestOptions): Promise<unknown>;
}

function isTransient(error: unknown): boolean {
  if (error instanceof UpstreamHTTPError) {
    return error.status === 429 || error.status >= 500;
  }
  return error instanceof UpstreamTransportError;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const body = await response.text();
    return body.slice(0, MAX_ERROR_BODY_LENGTH);
  } catch {
    return "";
  }
}

export function createUpstreamClient(
  config: HttpConfig,
  fetchFn: FetchFn = (input, init) => fetch(input, init),
): UpstreamClient {
  const defaultHeaders: Record<string, string> = {
    "User-Agent": config.user_agent,
    Accept: "*/*",
  };

  async function requestOnce(url: string, options: RequestOptions): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, config.timeout_ms);
    const onCallerAbort = (): void => controller.abort();
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const transportError = (error: unknown): UpstreamTransportError => {
      if (timedOut) {
        return new UpstreamTransportError(`timed out after ${config.timeout_ms}ms`, { cause: error });
      }
      if (callerSignal?.aborted) {
        return new UpstreamTransportError("request aborted", { cause: error });
      }
      return new UpstreamTransportError(errorMessage(error), { cause: error });
    };

    try {
      let response: Response;
      try {
        response = await fetchFn(url, {
          headers: { ...defaultHeaders, ...options.headers },
          signal: controller.signal,
        });
      } catch (error) {
        throw transportError(error);
      }

      if (!response.ok) {
        const body = await readErrorBody(response);
        throw new UpstreamHTTPError(response.status, response.statusText, body, url);
      }

      try {
        return await response.text();
      } catch (error) {
        throw transportError(error);
      }
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  async function getText(url: string | URL, options: RequestOptions = {}): Promise<string> {
    const target = url.toString();
    return callWithRetry(
      () => requestOnce(target, options),
      { maxRetries: config.max_retries, initialBackoffMs: config.retry_backoff_ms },
      (error) => !options.signal?.aborted && isTransient(error),
      {
        signal: options.signal,
        onRetry: (error, attempt, backoffMs) => {
          console.warn(
            `[upstream] retry ${attempt + 1}/${config.max_retries} for ${target} in ${backoffMs}ms: ${errorMessage(error)}`,
          );
        },
      },
    );
  }

  return {
    getText,

    async getJson(url: string | URL, options: RequestOptions = {}): Promise<unknown> {
      const text = await getText(url, options);
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new ParseError(`invalid JSON: ${errorMessage(error)}`, { cause: error });
      }
    },
  };
}
