/**
 * Provider for any OpenAI-compatible chat-completions API.
 *
 * @module providers/openai-compatible/provider
 */

import type { GetModelsOptions, ModelCatalog, ModelMap } from '../../core/catalog/model-catalog.js';
import type {
  CallOptions,
  CreateRequestOptions,
  Provider,
  StreamResult,
} from '../../core/registry/provider.js';
import type { CompletionRequest, CompletionResult } from '../../core/types/completion.js';
import type { ModelInfo } from '../../core/types/model-info.js';
import { createBackend, type BackendConfig } from '../shared/backend.js';
import type { CompletionClient } from '../shared/completion-client.js';

/**
 * @example
 * ```typescript
 * const provider = new OpenAICompatibleProvider({
 *   name: 'deepseek',
 *   baseURL: 'https://api.deepseek.com/v1',
 *   apiKey: process.env.DEEPSEEK_API_KEY,
 *   defaultModel: 'deepseek-chat',
 * });
 * ```
 */
export type OpenAICompatibleProviderConfig = BackendConfig;

export class OpenAICompatibleProvider implements Provider {
  readonly name: string;
  private readonly client: CompletionClient;
  private readonly catalog: ModelCatalog;
  private readonly defaultModel: string;

  constructor(config: OpenAICompatibleProviderConfig) {
    this.name = config.name;
    this.defaultModel = config.defaultModel ?? '';
    const backend = createBackend(config);
    this.client = backend.client;
    this.catalog = backend.catalog;
  }

  createRequest(options: CreateRequestOptions): CompletionRequest {
    return this.client.createRequest(options);
  }

  ask(request: CompletionRequest, options?: CallOptions): Promise<CompletionResult> {
    return this.client.ask(request, options);
  }

  askStream(request: CompletionRequest, options?: CallOptions): Promise<StreamResult> {
    return this.client.askStream(request, options);
  }

  getModels(options?: GetModelsOptions): Promise<ModelMap> {
    return this.catalog.getModels(options);
  }

  getModelInfo(name: string, signal?: AbortSignal): Promise<ModelInfo> {
    return this.catalog.getModelInfo(name, signal);
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }
}
