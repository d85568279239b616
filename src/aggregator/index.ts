// pattern: Functional Core

export type { AggregateResult, Aggregator, AggregatorOptions } from "./aggregator.ts";

export { createAggregator } from "./aggregator.ts";
export { DEFAULT_RESULT_KEYS, LIBRARY_KEY, defaultKeysFor, resolveResultKeys } from "./keys.ts";
