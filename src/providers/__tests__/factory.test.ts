import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseConfig } from '../../core/config/config.js';
import { providerConfigSchema, type ProviderConfigInput } from '../../core/config/schema.js';
import { ConfigurationError } from '../../core/errors/registry-errors.js';
import { configureLogging, resetLoggers } from '../../core/logging/logger.js';
import { InMemoryChatSettings } from '../../core/registry/chat-settings.js';
import { userMessage } from '../../core/types/message.js';
import { jsonResponse } from '../../__tests__/sse.js';
import { createProvider, createRegistry } from '../factory.js';
import { LocalProvider } from '../local/provider.js';
import { OpenAICompatibleProvider } from '../openai-compatible/provider.js';
import { OpenRouterProvider } from '../openrouter/provider.js';
import { fakeFetch } from './fake-fetch.js';

function providerConfig(input: ProviderConfigInput) {
  return providerConfigSchema.parse(input);
}

describe('createProvider', () => {
  it('should build the provider class for each type', () => {
    expect(createProvider(providerConfig({ type: 'openrouter', name: 'or' }))).toBeInstanceOf(OpenRouterProvider);
    expect(
      createProvider(providerConfig({ type: 'local', name: 'ollama', baseUrl: 'http://localhost:11434/v1' }))
    ).toBeInstanceOf(LocalProvider);

    const generic = createProvider(
      providerConfig({ type: 'openai-compatible', name: 'deepseek', baseUrl: 'https://llm.example.com/v1' })
    );
    expect(generic).toBeInstanceOf(OpenAICompatibleProvider);
    expect(generic).not.toBeInstanceOf(OpenRouterProvider);
    expect(generic.name).toBe('deepseek');
  });

  it.each(['local', 'openai-compatible'] as const)('should require a base URL for %s', (type) => {
    expect(() => createProvider(providerConfig({ type, name: 'self' }))).toThrow(
      new ConfigurationError(`provider self: baseUrl is required for type ${type}`)
    );
  });

  it('should read the API key from the environment', async () => {
    const { fetch, requests } = fakeFetch(() => jsonResponse({ data: [] }));
    const provider = createProvider(
      providerConfig({
        type: 'openai-compatible',
        name: 'deepseek',
        baseUrl: 'https://llm.example.com/v1',
        envApiKey: 'SWITCHBOARD_TEST_KEY',
        headers: { 'X-Team': 'bots' },
      }),
      { env: { SWITCHBOARD_TEST_KEY: 'test-secret' }, fetch }
    );

    await provider.getModels();

    expect(requests[0]?.headers.get('authorization')).toBe('Bearer test-secret');
    expect(requests[0]?.headers.get('x-team')).toBe('bots');
  });

  it('should pass configured models and the default model', async () => {
    const provider = createProvider(
      providerConfig({
        type: 'local',
        name: 'local',
        baseUrl: 'http://localhost:8080/v1',
        defaultModel: 'mini',
        models: [{ model: 'mini', isFree: true }],
      })
    );

    expect(provider.getDefaultModel()).toBe('mini');
    expect((await provider.getModelInfo('mini')).pricing?.prompt).toBe('0');
  });
});

describe('createRegistry', () => {
  let logs: string[];

  beforeEach(() => {
    resetLoggers();
    logs = [];
    configureLogging({ includeTimestamp: false, destination: (message) => logs.push(message) });
  });

  afterEach(() => {
    resetLoggers();
  });

  const config = parseConfig({
    defaultModel: 'local:mini',
    modelParams: { temperature: 0.4 },
    providers: [
      { type: 'openrouter', name: 'openrouter' },
      {
        type: 'local',
        name: 'local',
        baseUrl: 'http://localhost:8080/v1',
        models: [{ model: 'mini' }],
      },
    ],
  });

  it('should register providers in configuration order', () => {
    const registry = createRegistry(config);

    expect(registry.providers()).toEqual(['openrouter', 'local']);
    expect(logs).toEqual(['[switchboard.providers - INFO] Providers ready {"providers":["openrouter","local"]}']);
  });

  it('should answer through the configured default', async () => {
    const { fetch, requests } = fakeFetch(() => jsonResponse({ choices: [{ message: { content: 'hello there' } }] }));
    const registry = createRegistry(config, { fetch, chatSettings: new InMemoryChatSettings(config) });

    const result = await registry.ask({ messages: [userMessage('hi')] });

    expect(result.content).toBe('hello there');
    expect(result.params).toEqual({ temperature: 0.4 });
    expect(requests[0]?.body).toMatchObject({ model: 'mini', temperature: 0.4 });
  });
});
