// pattern: Imperative Shell

/**
 * The aggregate lookup tool: one library name in, every provider's findings out.
 */

import type { Aggregator } from '../../aggregator/aggregator.ts';
import type { Encoder } from '../../encoding/index.ts';
import { describeFailure } from '../../errors.ts';
import type { Tool } from '../types.ts';

type DocsToolOptions = {
  readonly aggregator: Aggregator;
  readonly encode: Encoder;
  readonly defaultLimit: number;
};

export function createDocsTool(options: DocsToolOptions): Tool {
  const { aggregator, encode, defaultLimit } = options;

  return {
    definition: {
      name: 'search_library_docs',
      description:
        'Find documentation for a library across the package registry, code host, web search and Go package index in one call. Providers that fail are reported under their own _error key.',
      parameters: [
        {
          name: 'library',
          type: 'string',
          description: 'Library or package name',
          required: true,
        },
        {
          name: 'limit',
          type: 'number',
          description: `Maximum results per provider (1-100, default ${defaultLimit})`,
          required: false,
        },
      ],
    },
    handler: async (params, signal) => {
      const library = params['library'];
      const limit = params['limit'];

      try {
        const result = await aggregator.locate(
          typeof library === 'string' ? library : '',
          typeof limit === 'number' ? limit : undefined,
          signal,
        );
        return { success: true, output: encode(result) };
      } catch (err) {
        return {
          success: false,
          output: '',
          error: describeFailure('search_library_docs', err),
        };
      }
    },
  };
}
