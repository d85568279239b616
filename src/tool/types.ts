// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and the tool catalogue.
 * These types define the port interface for the tool registry and tool handlers.
 */

export type ToolParameterType = 'string' | 'number' | 'boolean';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  nullable?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolResult = {
  success: boolean;
  output: string;
  error?: string;
};

export type ToolHandler = (params: Record<string, unknown>, signal?: AbortSignal) => Promise<ToolResult>;

export type Tool = {
  definition: ToolDefinition;
  handler: ToolHandler;
};

export type ToolDescription = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  getDefinitions(): Array<ToolDefinition>;
  dispatch(name: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult>;
  describeTools(): Array<ToolDescription>;
}
