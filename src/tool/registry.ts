// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, parameter checks, dispatch, and the JSON-schema catalogue of tools.
 */

import type {
  Tool,
  ToolDefinition,
  ToolDescription,
  ToolParameter,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.ts';

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  function validateParameterType(
    value: unknown,
    expectedType: ToolParameterType,
  ): boolean {
    const actualType = typeof value;

    switch (expectedType) {
      case 'string':
        return actualType === 'string';
      case 'number':
        return actualType === 'number';
      case 'boolean':
        return actualType === 'boolean';
    }
  }

  function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
  }

  function parameterSchema(param: ToolParameter): Record<string, unknown> {
    return {
      type: param.nullable ? [param.type, 'null'] : param.type,
      description: param.description,
    };
  }

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(
          `tool already registered: ${tool.definition.name}`,
        );
      }
      tools.set(tool.definition.name, tool);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async dispatch(
      name: string,
      params: Record<string, unknown>,
      signal?: AbortSignal,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return {
          success: false,
          output: '',
          error: `unknown tool: ${name}`,
        };
      }

      // Validate required parameters
      for (const param of tool.definition.parameters) {
        if (param.required && !(param.name in params)) {
          return {
            success: false,
            output: '',
            error: `missing required parameter: ${param.name}`,
          };
        }
      }

      // Validate parameter types
      for (const param of tool.definition.parameters) {
        if (param.name in params) {
          const value = params[param.name];
          if (value === null && param.nullable) {
            continue;
          }
          if (!validateParameterType(value, param.type)) {
            return {
              success: false,
              output: '',
              error: `invalid type for parameter ${param.name}: expected ${param.type}, got ${describeType(value)}`,
            };
          }
        }
      }

      try {
        const result = await tool.handler(params, signal);
        return result;
      } catch (error) {
        return {
          success: false,
          output: '',
          error: `handler error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    describeTools(): Array<ToolDescription> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = parameterSchema(param);

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
