import type { ToolArguments, ToolSchema, ToolSchemaProperty } from '../core/types.js';

/** JSON Schema primitive used to describe a tool parameter to the model. */
export type ToolParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  /** @default true */
  required?: boolean;
  default?: unknown;
  enum?: unknown[];
}

/**
 * Execution context injected by the caller (the agent loop or its host).
 * The registry never owns it.
 */
export interface ToolExecutionContext {
  workingDir: string;
  /** Upper bound for subprocess-backed tools. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface Tool {
  name: string;
  description: string;
  /** Only used to present a function-calling schema to the model. */
  parameters: ToolParameter[];
  /**
   * Run the tool. Throw `ToolExecutionError` with a reason the model can act on;
   * the registry turns any throw into an error result.
   */
  execute(args: ToolArguments, context: ToolExecutionContext): Promise<string>;
}

export function toolSchema(tool: Tool): ToolSchema {
  const properties: Record<string, ToolSchemaProperty> = {};
  const required: string[] = [];

  for (const param of tool.parameters) {
    const property: ToolSchemaProperty = {
      type: param.type,
      description: param.description,
    };
    if (param.enum && param.enum.length > 0) {
      property.enum = [...param.enum];
    }
    properties[param.name] = property;

    if (param.required ?? true) {
      required.push(param.name);
    }
  }

  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties,
        required,
      },
    },
  };
}
