// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  ToolDescription,
  ToolRegistry,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export { createProviderTools } from './builtin/providers.ts';
export { createDocsTool } from './builtin/docs.ts';
