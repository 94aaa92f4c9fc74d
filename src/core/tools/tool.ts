import type { z } from 'zod';

/**
 * A callable tool as the model sees it.
 *
 * Only the contract lives here; executing a tool is the caller's business.
 * The schema validates the arguments the model sends back.
 *
 * @example
 * ```typescript
 * const weather = defineTool({
 *   name: 'weather',
 *   description: 'Current weather for a city',
 *   schema: z.object({ city: z.string().describe('City name') }),
 * });
 * ```
 */
export interface ToolDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Unique name the model calls the tool by */
  readonly name: string;
  /** Sent to the model to help it decide when to call the tool */
  readonly description: string;
  readonly schema: TSchema;
  /** Free-form properties for the caller (e.g. the provider a tool needs) */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Create a frozen tool definition.
 *
 * @throws {TypeError} If the name is not 1-64 characters of letters, digits, `_` or `-`
 */
export function defineTool<TSchema extends z.ZodTypeAny>(config: {
  name: string;
  description: string;
  schema: TSchema;
  metadata?: Record<string, unknown>;
}): ToolDefinition<TSchema> {
  if (!TOOL_NAME_PATTERN.test(config.name)) {
    throw new TypeError(`Invalid tool name: ${config.name}`);
  }
  return Object.freeze({
    name: config.name,
    description: config.description,
    schema: config.schema,
    ...(config.metadata ? { metadata: Object.freeze({ ...config.metadata }) } : {}),
  });
}
