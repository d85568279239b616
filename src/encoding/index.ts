// pattern: Functional Core

/**
 * Result encoders. Both are pure: the same value always yields the same
 * string, with object fields in insertion order.
 */

import { decode, encode } from "@toon-format/toon";
import type { OutputFormat } from "../config/schema.ts";
import { ParseError, errorMessage } from "../errors.ts";
import type { JsonValue } from "../providers/types.ts";

export type Encoder = (value: JsonValue) => string;

export function encodeJson(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}

/** TOON: uniform record lists become a `key[N]{fields}:` header plus one row per record. */
export function encodeDense(value: JsonValue): string {
  return encode(value);
}

export function decodeDense(text: string): unknown {
  try {
    return decode(text);
  } catch (error) {
    throw new ParseError(`invalid dense text: ${errorMessage(error)}`, { cause: error });
  }
}

export function createEncoder(format: OutputFormat): Encoder {
  switch (format) {
    case "json":
      return encodeJson;
    case "dense":
      return encodeDense;
  }
}
