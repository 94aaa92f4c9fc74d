import type { GetModelsOptions, ModelCatalog, ModelMap } from '../../core/catalog/model-catalog.js';
import type { CallOptions, CreateRequestOptions, Provider, StreamResult } from '../../core/registry/provider.js';
import type { CompletionRequest, CompletionResult } from '../../core/types/completion.js';
import type { ModelInfo } from '../../core/types/model-info.js';
import { splitReasoning } from '../../core/utils/reasoning.js';
import { createBackend, type BackendConfig } from '../shared/backend.js';
import type { CompletionClient } from '../shared/completion-client.js';

export type LocalProviderConfig = Omit<BackendConfig, 'apiKey' | 'liveCatalog'>;

/**
 * Self-hosted OpenAI-compatible server (llama.cpp, Ollama, LM Studio).
 *
 * Requests go out without credentials and the catalog is whatever the
 * configuration declares. Local models tend to write their reasoning inline,
 * so a completion without a reasoning field has it split out of the content.
 */
export class LocalProvider implements Provider {
  readonly name: string;
  private readonly client: CompletionClient;
  private readonly catalog: ModelCatalog;
  private readonly defaultModel: string;

  constructor(config: LocalProviderConfig) {
    this.name = config.name;
    this.defaultModel = config.defaultModel ?? '';
    const backend = createBackend({ ...config, liveCatalog: false });
    this.client = backend.client;
    this.catalog = backend.catalog;
  }

  createRequest(options: CreateRequestOptions): CompletionRequest {
    return this.client.createRequest(options);
  }

  async ask(request: CompletionRequest, options?: CallOptions): Promise<CompletionResult> {
    const result = await this.client.ask(request, options);
    if (result.reasoning) {
      return result;
    }
    const { content, reasoning } = splitReasoning(result.content);
    return { ...result, content, reasoning };
  }

  askStream(request: CompletionRequest, options?: CallOptions): Promise<StreamResult> {
    return this.client.askStream(request, options);
  }

  getModels(options?: GetModelsOptions): Promise<ModelMap> {
    return this.catalog.getModels(options);
  }

  getModelInfo(name: string): Promise<ModelInfo> {
    return this.catalog.getModelInfo(name);
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }
}
