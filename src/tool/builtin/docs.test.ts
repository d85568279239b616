// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import type { Aggregator } from '../../aggregator/aggregator.ts';
import { encodeJson } from '../../encoding/index.ts';
import { ValidationError } from '../../errors.ts';
import { createDocsTool } from './docs.ts';

type LocateCall = { library: string; limit: number | undefined; signal: AbortSignal | undefined };

function fakeAggregator(calls: Array<LocateCall>): Aggregator {
  return {
    async locate(library, limit, signal) {
      calls.push({ library, limit, signal });
      if (library.trim() === '') {
        throw new ValidationError('library: must not be empty');
      }
      return { library, pypi: { version: '1.0.0' } };
    },
    providerNames: () => ['pypi'],
  };
}

describe('search_library_docs tool', () => {
  it('should describe its parameters with the default limit', () => {
    const tool = createDocsTool({ aggregator: fakeAggregator([]), encode: encodeJson, defaultLimit: 5 });

    expect(tool.definition.name).toBe('search_library_docs');
    expect(tool.definition.parameters.map((p) => [p.name, p.required])).toEqual([
      ['library', true],
      ['limit', false],
    ]);
    expect(tool.definition.parameters[1]?.description).toBe('Maximum results per provider (1-100, default 5)');
  });

  it('should pass library, limit and signal through and encode the aggregate', async () => {
    const calls: Array<LocateCall> = [];
    const tool = createDocsTool({ aggregator: fakeAggregator(calls), encode: encodeJson, defaultLimit: 5 });
    const controller = new AbortController();

    const result = await tool.handler({ library: 'requests', limit: 3 }, controller.signal);

    expect(calls).toEqual([{ library: 'requests', limit: 3, signal: controller.signal }]);
    expect(result).toEqual({
      success: true,
      output: '{\n  "library": "requests",\n  "pypi": {\n    "version": "1.0.0"\n  }\n}',
    });
  });

  it('should leave the limit to the aggregator when omitted', async () => {
    const calls: Array<LocateCall> = [];
    const tool = createDocsTool({ aggregator: fakeAggregator(calls), encode: encodeJson, defaultLimit: 5 });

    await tool.handler({ library: 'requests' });

    expect(calls[0]?.limit).toBeUndefined();
  });

  it('should surface validation failures as invalid input', async () => {
    const tool = createDocsTool({ aggregator: fakeAggregator([]), encode: encodeJson, defaultLimit: 5 });

    const result = await tool.handler({ library: '  ' });

    expect(result).toEqual({
      success: false,
      output: '',
      error: 'invalid input: library: must not be empty',
    });
  });
});
