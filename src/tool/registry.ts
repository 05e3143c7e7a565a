// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, argument validation, and the JSON-schema form handed to the model.
 */

import type { JsonSchemaProperty, ToolDefinition as ModelToolDefinition } from '../model/types.ts';
import type { Tool, ToolDefinition, ToolParameterType, ToolRegistry } from './types.ts';

export const REQUEST_HEARTBEAT_PARAMETER = 'request_heartbeat';

const REQUEST_HEARTBEAT_DESCRIPTION =
  'Request an immediate heartbeat after function execution. ' +
  'Set to true if you want to send a follow-up message or run a follow-up function.';

function validateParameterType(value: unknown, expectedType: ToolParameterType): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    default:
      return false;
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  function toModelTool(definition: ToolDefinition): ModelToolDefinition {
    const properties: Record<string, JsonSchemaProperty> = {};
    const required: Array<string> = [];

    for (const param of definition.parameters) {
      properties[param.name] = {
        type: param.type,
        description: param.description,
        ...(param.enum_values && { enum: param.enum_values }),
      };
      if (param.required) {
        required.push(param.name);
      }
    }

    properties[REQUEST_HEARTBEAT_PARAMETER] = { type: 'boolean', description: REQUEST_HEARTBEAT_DESCRIPTION };
    required.push(REQUEST_HEARTBEAT_PARAMETER);

    return {
      name: definition.name,
      description: definition.description,
      input_schema: { type: 'object', properties, required },
    };
  }

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(`tool already registered: ${tool.definition.name}`);
      }
      tools.set(tool.definition.name, tool);
    },

    get(name: string): Tool | null {
      return tools.get(name) ?? null;
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    toModelTools(names?: ReadonlyArray<string>): Array<ModelToolDefinition> {
      const selected = names
        ? names.flatMap((name) => {
            const tool = tools.get(name);
            return tool ? [tool] : [];
          })
        : Array.from(tools.values());
      return selected.map((tool) => toModelTool(tool.definition));
    },

    validateArguments(name: string, args: Record<string, unknown>): string | null {
      const tool = tools.get(name);
      if (!tool) {
        return `unknown tool: ${name}`;
      }

      const { parameters } = tool.definition;

      for (const param of parameters) {
        if (param.required && !(param.name in args)) {
          return `missing required parameter: ${param.name}`;
        }
      }

      for (const key of Object.keys(args)) {
        const param = parameters.find((p) => p.name === key);
        if (!param) {
          return `unexpected parameter: ${key}`;
        }
        const value = args[key];
        if (!validateParameterType(value, param.type)) {
          return `invalid type for parameter ${key}: expected ${param.type}, got ${describeValue(value)}`;
        }
        if (param.enum_values && typeof value === 'string' && !param.enum_values.includes(value)) {
          return `invalid value for parameter ${key}: expected one of ${param.enum_values.join(', ')}`;
        }
      }

      return null;
    },
  };
}
