import type { z } from 'zod';
import { zodToJsonSchema as toJsonSchema } from 'zod-to-json-schema';
import type { ToolDeclaration } from '../types/completion.js';
import type { ToolDefinition } from './tool.js';

/**
 * The subset of JSON Schema that tool parameters use. Other keywords pass
 * through untyped.
 */
export interface JsonSchema {
  type?: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: unknown[];
  additionalProperties?: boolean | JsonSchema;
  [keyword: string]: unknown;
}

/**
 * JSON Schema for a tool's argument schema, in the OpenAPI 3 dialect that
 * chat-completions endpoints accept: no `$ref` and no `$schema` header.
 *
 * @example
 * ```typescript
 * zodToJsonSchema(z.object({ city: z.string(), days: z.number().int().optional() }));
 * // {
 * //   type: 'object',
 * //   properties: { city: { type: 'string' }, days: { type: 'integer' } },
 * //   required: ['city'],
 * //   additionalProperties: false
 * // }
 * ```
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const converted = toJsonSchema(schema, { target: 'openApi3', $refStrategy: 'none' });
  return Object.fromEntries(Object.entries(converted).filter(([keyword]) => keyword !== '$schema'));
}

export function createToolDeclaration(tool: ToolDefinition): ToolDeclaration {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: zodToJsonSchema(tool.schema) },
  };
}
