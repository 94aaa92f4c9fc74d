export { type ModelSpec, formatModelSpec, parseModelSpec } from './model-spec.js';
export type { CallOptions, CreateRequestOptions, Provider, StreamResult } from './provider.js';
export { type ChatSettings, type MergeParamsRequest, InMemoryChatSettings } from './chat-settings.js';
export {
  ProviderRegistry,
  type AskOptions,
  type AskResult,
  type AskStreamResult,
  type ProviderRegistryOptions,
  type ResolutionSource,
  type ResolvedModel,
} from './provider-registry.js';
