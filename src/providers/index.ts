/**
 * Provider implementations and the configuration factory.
 *
 * @module providers
 */

export {
  DEFAULT_TIMEOUT_MS,
  HttpTransport,
  type FetchFunction,
  type HttpTransportConfig,
  type TransportRequestOptions,
  toAIError,
  truncateLargeFields,
} from './shared/transport.js';
export {
  CompletionClient,
  type CompletionClientConfig,
  DEFAULT_CHAT_PATH,
  MODELS_PATH,
  WEB_SEARCH_MAX_RESULTS,
} from './shared/completion-client.js';
export { type Backend, type BackendConfig, createBackend } from './shared/backend.js';
export { OpenAICompatibleProvider, type OpenAICompatibleProviderConfig } from './openai-compatible/provider.js';
export {
  DEFAULT_APP_TITLE,
  OPENROUTER_BASE_URL,
  OpenRouterProvider,
  type OpenRouterProviderConfig,
  RANDOM_FREE_MODEL,
  routingSort,
} from './openrouter/provider.js';
export { LocalProvider, type LocalProviderConfig } from './local/provider.js';
export {
  type CreateRegistryOptions,
  type ProviderFactoryOptions,
  createProvider,
  createRegistry,
} from './factory.js';
