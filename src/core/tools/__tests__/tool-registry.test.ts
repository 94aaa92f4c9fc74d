import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { DuplicateToolError, ToolArgumentsError, ToolNotFoundError } from '../../errors/tool-errors.js';
import type { ToolCall } from '../../types/completion.js';
import { defineTool } from '../tool.js';
import { ToolRegistry, ToolRegistryBuilder } from '../tool-registry.js';

const weather = defineTool({
  name: 'weather',
  description: 'Current weather for a city',
  schema: z.object({
    city: z.string().describe('City name'),
    days: z.number().int().min(1).max(7).optional(),
  }),
});

const search = defineTool({
  name: 'search',
  description: 'Search the web',
  schema: z.object({ query: z.string().describe('Search query') }),
});

const images = defineTool({
  name: 'images',
  description: 'Generate an image',
  schema: z.object({ prompt: z.string() }),
});

const call = (name: string, args: string): ToolCall => ({
  id: 'call_1',
  type: 'function',
  function: { name, arguments: args },
});

describe('ToolRegistryBuilder', () => {
  it('should keep registration order', () => {
    const tools = new ToolRegistryBuilder().register(weather).register(search).build();

    expect(tools.names()).toEqual(['weather', 'search']);
    expect(tools.size).toBe(2);
  });

  it('should reject duplicate names', () => {
    const builder = new ToolRegistryBuilder().register(weather);

    expect(() => builder.register(weather)).toThrow(DuplicateToolError);
  });

  it('should only build conditional tools when the condition holds', () => {
    const factory = vi.fn(() => images);

    const tools = new ToolRegistryBuilder().registerIf(false, factory).registerIf(true, search).build();

    expect(factory).not.toHaveBeenCalled();
    expect(tools.has('images')).toBe(false);
    expect(tools.get('search')).toBe(search);
  });

  it('should not change a built registry', () => {
    const builder = new ToolRegistryBuilder().register(weather);
    const tools = builder.build();
    builder.register(search);

    expect(tools.names()).toEqual(['weather']);
  });
});

describe('ToolRegistry', () => {
  const tools = new ToolRegistryBuilder().register(weather).register(search).register(images).build();

  describe('declarations', () => {
    it('should let the allowed list win over the excluded list', () => {
      expect(tools.names({ allowed: ['search', 'unknown'], excluded: ['search'] })).toEqual(['search']);
    });

    it('should apply the excluded list', () => {
      expect(tools.names({ excluded: ['weather'] })).toEqual(['search', 'images']);
    });

    it('should offer everything without a selection', () => {
      expect(tools.declarations().map((declaration) => declaration.function.name)).toEqual([
        'weather',
        'search',
        'images',
      ]);
    });

    it('should be empty for the empty registry', () => {
      expect(ToolRegistry.empty().declarations()).toEqual([]);
    });
  });

  describe('describe', () => {
    it('should list tools with their parameters', () => {
      expect(tools.describe({ allowed: ['weather'] })).toBe(
        '• weather: Current weather for a city\n' +
          '  Parameters:\n' +
          '  - city (string): City name\n' +
          '  - days (integer): \n'
      );
    });
  });

  describe('parseArguments', () => {
    it('should validate arguments against the schema', () => {
      const parsed = tools.parseArguments(call('weather', '{"city":"Oslo","days":3}'));

      expect(parsed.tool).toBe(weather);
      expect(parsed.args).toEqual({ city: 'Oslo', days: 3 });
    });

    it('should reject unknown tools', () => {
      expect(() => tools.parseArguments(call('teleport', '{}'))).toThrow(ToolNotFoundError);
    });

    it('should reject malformed JSON', () => {
      expect(() => tools.parseArguments(call('weather', '{"city":'))).toThrow(ToolArgumentsError);
    });

    it('should report schema failures by path', () => {
      expect(() => tools.parseArguments(call('weather', '{"city":"Oslo","days":9}'))).toThrow(
        /^invalid arguments for tool weather: days: /
      );
    });
  });
});
