/**
 * Immutable tool registry.
 *
 * Tools are collected by a {@link ToolRegistryBuilder}; conditional entries
 * (a tool that only works with one provider, a tool behind a feature switch)
 * are decided while building. The built registry never changes and can be
 * shared freely between requests.
 *
 * @example
 * ```typescript
 * const tools = new ToolRegistryBuilder()
 *   .register(weatherTool)
 *   .registerIf(config.imageGeneration, imageTool)
 *   .build();
 *
 * const declarations = tools.declarations({ excluded: ['weather'] });
 * ```
 */

import { DuplicateToolError, ToolArgumentsError, ToolNotFoundError } from '../errors/tool-errors.js';
import { toError } from '../errors/base-error.js';
import { isRecord, parseToolArguments, type ToolCall, type ToolDeclaration } from '../types/completion.js';
import { createToolDeclaration } from './schema.js';
import type { ToolDefinition } from './tool.js';

/**
 * Selection of tools offered for one request.
 *
 * A non-empty `allowed` list wins and keeps only those names; otherwise a
 * non-empty `excluded` list removes names; otherwise every tool is offered.
 */
export interface ToolSelection {
  allowed?: readonly string[];
  excluded?: readonly string[];
}

/**
 * A tool call matched to its definition, with validated arguments.
 */
export interface ParsedToolCall {
  call: ToolCall;
  tool: ToolDefinition;
  args: unknown;
}

interface RegistryEntry {
  tool: ToolDefinition;
  declaration: ToolDeclaration;
}

export class ToolRegistry {
  private readonly entries: ReadonlyMap<string, RegistryEntry>;

  /** @internal Use {@link ToolRegistryBuilder}. */
  constructor(tools: readonly ToolDefinition[]) {
    const entries = new Map<string, RegistryEntry>();
    for (const tool of tools) {
      entries.set(tool.name, { tool, declaration: createToolDeclaration(tool) });
    }
    this.entries = entries;
  }

  static empty(): ToolRegistry {
    return new ToolRegistry([]);
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.entries.get(name)?.tool;
  }

  /**
   * Tool names in registration order, narrowed by `selection`.
   */
  names(selection: ToolSelection = {}): string[] {
    return this.select(selection).map((entry) => entry.tool.name);
  }

  /**
   * Wire declarations in registration order, narrowed by `selection`.
   * Unknown names in `allowed` are ignored.
   */
  declarations(selection: ToolSelection = {}): ToolDeclaration[] {
    return this.select(selection).map((entry) => entry.declaration);
  }

  /**
   * Human-readable listing for system prompts and help output.
   *
   * @example
   * ```text
   * • weather: Current weather for a city
   *   Parameters:
   *   - city (string): City name
   * ```
   */
  describe(selection: ToolSelection = {}): string {
    let text = '';
    for (const { tool, declaration } of this.select(selection)) {
      text += `• ${tool.name}: ${tool.description}\n`;
      const properties = declaration.function.parameters.properties;
      if (isRecord(properties) && Object.keys(properties).length > 0) {
        text += '  Parameters:\n';
        for (const [name, schema] of Object.entries(properties)) {
          const { type, description } = describeProperty(schema);
          text += `  - ${name} (${type}): ${description}\n`;
        }
      }
    }
    return text;
  }

  /**
   * Match a tool call to its definition and validate its arguments.
   *
   * @throws {ToolNotFoundError} If no tool has the call's name
   * @throws {ToolArgumentsError} If the arguments are not a JSON object or fail the schema
   */
  parseArguments(call: ToolCall): ParsedToolCall {
    const entry = this.entries.get(call.function.name);
    if (!entry) {
      throw new ToolNotFoundError(call.function.name);
    }

    let raw: Record<string, unknown>;
    try {
      raw = parseToolArguments(call);
    } catch (error) {
      const cause = toError(error);
      throw new ToolArgumentsError(call.function.name, cause.message, cause);
    }

    const result = entry.tool.schema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ToolArgumentsError(call.function.name, detail, result.error);
    }
    return { call, tool: entry.tool, args: result.data };
  }

  private select(selection: ToolSelection): RegistryEntry[] {
    const all = [...this.entries.values()];
    if (selection.allowed && selection.allowed.length > 0) {
      const allowed = new Set(selection.allowed);
      return all.filter((entry) => allowed.has(entry.tool.name));
    }
    if (selection.excluded && selection.excluded.length > 0) {
      const excluded = new Set(selection.excluded);
      return all.filter((entry) => !excluded.has(entry.tool.name));
    }
    return all;
  }
}

function describeProperty(schema: unknown): { type: string; description: string } {
  const property: Record<string, unknown> = isRecord(schema) ? schema : {};
  return {
    type: typeof property.type === 'string' ? property.type : 'any',
    description: typeof property.description === 'string' ? property.description : '',
  };
}

/**
 * Collects tool definitions and produces an immutable {@link ToolRegistry}.
 */
export class ToolRegistryBuilder {
  private readonly tools: ToolDefinition[] = [];

  /**
   * @throws {DuplicateToolError} If a tool with the same name is already registered
   */
  register(tool: ToolDefinition): this {
    if (this.tools.some((existing) => existing.name === tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.push(tool);
    return this;
  }

  /**
   * Register `tool` only when `condition` holds. A factory is called only
   * when the tool is actually registered.
   */
  registerIf(condition: boolean, tool: ToolDefinition | (() => ToolDefinition)): this {
    if (!condition) {
      return this;
    }
    return this.register(typeof tool === 'function' ? tool() : tool);
  }

  build(): ToolRegistry {
    return new ToolRegistry([...this.tools]);
  }
}
