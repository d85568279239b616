// pattern: Functional Core

/**
 * Error taxonomy shared by the HTTP layer, providers, aggregator and tools.
 * Upstream errors are caught at the provider boundary and rendered with
 * describeFailure; only ValidationError reaches the caller as a failure.
 */

export type GatewayErrorCode =
  | "validation"
  | "upstream_http"
  | "upstream_transport"
  | "parse"
  | "configuration";

export class GatewayError extends Error {
  constructor(
    public readonly code: GatewayErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

export class UpstreamHTTPError extends GatewayError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
    public readonly url: string,
  ) {
    super("upstream_http", `${status} ${statusText}`.trim());
    this.name = "UpstreamHTTPError";
  }
}

export class UpstreamTransportError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("upstream_transport", message, options);
    this.name = "UpstreamTransportError";
  }
}

export class ParseError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse", message, options);
    this.name = "ParseError";
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Short diagnostic for a failed upstream lookup, e.g. `GitHub returned 403 rate limited`.
 */
export function describeFailure(label: string, error: unknown): string {
  if (error instanceof UpstreamHTTPError) {
    const body = error.body.trim();
    return body
      ? `${label} returned ${error.status} ${body}`
      : `${label} returned ${error.status}`;
  }
  if (error instanceof UpstreamTransportError) {
    return `${label} request failed: ${error.message}`;
  }
  if (error instanceof ParseError) {
    return `${label} parsing failed: ${error.message}`;
  }
  if (error instanceof ConfigurationError) {
    return `${label} not configured: ${error.message}`;
  }
  if (error instanceof ValidationError) {
    return `invalid input: ${error.message}`;
  }
  return `${label} failed: ${errorMessage(error)}`;
}
