// pattern: Imperative Shell

/**
 * Exposes each provider operation as a tool.
 * Handlers encode the operation's result; any failure becomes a failed ToolResult.
 */

import { describeFailure } from '../../errors.ts';
import type { Encoder } from '../../encoding/index.ts';
import type { ProviderRegistry } from '../../providers/registry.ts';
import type { Tool } from '../types.ts';

type ProviderToolOptions = {
  readonly registry: ProviderRegistry;
  readonly encode: Encoder;
};

export function createProviderTools(options: ProviderToolOptions): Array<Tool> {
  const { registry, encode } = options;
  const tools: Array<Tool> = [];

  for (const provider of registry.list()) {
    const metadata = provider.getMetadata();
    if (!metadata.exposeAsTool) continue;

    for (const operation of provider.getOperations()) {
      tools.push({
        definition: operation.definition,
        handler: async (params, signal) => {
          try {
            const data = await operation.invoke(params, signal);
            return { success: true, output: encode(data) };
          } catch (err) {
            return {
              success: false,
              output: '',
              error: describeFailure(metadata.label, err),
            };
          }
        },
      });
    }
  }

  return tools;
}
