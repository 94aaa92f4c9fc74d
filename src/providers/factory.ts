/**
 * Build providers and a registry from configuration.
 *
 * @module providers/factory
 */

import { configuredModels, resolveApiKey } from '../core/config/config.js';
import type { ProviderConfig, SwitchboardConfig } from '../core/config/schema.js';
import { ConfigurationError } from '../core/errors/registry-errors.js';
import { configureLogging, getLogger, type Logger } from '../core/logging/logger.js';
import type { ChatSettings } from '../core/registry/chat-settings.js';
import type { Provider } from '../core/registry/provider.js';
import { ProviderRegistry } from '../core/registry/provider-registry.js';
import { LocalProvider } from './local/provider.js';
import { OpenAICompatibleProvider, type OpenAICompatibleProviderConfig } from './openai-compatible/provider.js';
import { OpenRouterProvider } from './openrouter/provider.js';
import type { FetchFunction } from './shared/transport.js';

export interface ProviderFactoryOptions {
  /** Environment used to resolve `envApiKey`. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  fetch?: FetchFunction;
  now?: () => number;
  /** Randomness for OpenRouter's `random-free` */
  random?: () => number;
  logger?: Logger;
}

export interface CreateRegistryOptions extends ProviderFactoryOptions {
  chatSettings?: ChatSettings;
}

function requireBaseUrl(config: ProviderConfig): string {
  if (!config.baseUrl) {
    throw new ConfigurationError(`provider ${config.name}: baseUrl is required for type ${config.type}`);
  }
  return config.baseUrl;
}

/**
 * @throws {ConfigurationError} When a provider type needs a base URL that is missing
 */
export function createProvider(config: ProviderConfig, options: ProviderFactoryOptions = {}): Provider {
  const common: Omit<OpenAICompatibleProviderConfig, 'baseURL'> = {
    name: config.name,
    apiKey: resolveApiKey(config, options.env),
    defaultModel: config.defaultModel,
    chatPath: config.chatPath,
    models: configuredModels(config),
    overrideModels: config.overrideModels,
    onlyFreeModels: config.onlyFreeModels,
    defaultHeaders: config.headers,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
    fetch: options.fetch,
    now: options.now,
    logger: options.logger,
  };

  switch (config.type) {
    case 'openrouter':
      return new OpenRouterProvider({
        ...common,
        baseURL: config.baseUrl,
        appTitle: config.appTitle,
        httpReferer: config.httpReferer,
        random: options.random,
      });
    case 'local':
      return new LocalProvider({ ...common, baseURL: requireBaseUrl(config) });
    case 'openai-compatible':
      return new OpenAICompatibleProvider({ ...common, baseURL: requireBaseUrl(config) });
  }
}

/**
 * Registry with one provider per configured entry, in configuration order.
 * Applies the `logging` section when present.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('./switchboard.json');
 * const registry = createRegistry(config);
 * void registry.syncModels();
 * const { content } = await registry.ask({ messages: [userMessage('Hello')] });
 * ```
 */
export function createRegistry(config: SwitchboardConfig, options: CreateRegistryOptions = {}): ProviderRegistry {
  if (config.logging) {
    configureLogging(config.logging);
  }

  const registry = new ProviderRegistry({
    config,
    chatSettings: options.chatSettings,
    logger: options.logger,
  });
  for (const providerConfig of config.providers) {
    registry.registerProvider(createProvider(providerConfig, options));
  }

  (options.logger ?? getLogger('switchboard.providers')).info('Providers ready', { providers: registry.providers() });
  return registry;
}
