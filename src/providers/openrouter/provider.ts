/**
 * OpenRouter provider.
 *
 * @module providers/openrouter/provider
 */

import type { GetModelsOptions, ModelCatalog, ModelMap } from '../../core/catalog/model-catalog.js';
import { AIError } from '../../core/errors/ai-error.js';
import { ModelNotFoundError } from '../../core/errors/registry-errors.js';
import type { CallOptions, CreateRequestOptions, Provider, StreamResult } from '../../core/registry/provider.js';
import type { CompletionRequest, CompletionResult, ProviderSort } from '../../core/types/completion.js';
import { isFreeModel, type ModelInfo } from '../../core/types/model-info.js';
import { createBackend, type BackendConfig } from '../shared/backend.js';
import type { CompletionClient } from '../shared/completion-client.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_APP_TITLE = 'switchboard';

/** Model name that selects a random free model per call */
export const RANDOM_FREE_MODEL = 'random-free';

export interface OpenRouterProviderConfig extends Omit<BackendConfig, 'baseURL' | 'name'> {
  /** Defaults to 'openrouter' */
  name?: string;
  /** Defaults to {@link OPENROUTER_BASE_URL} */
  baseURL?: string;
  /** Sent as `X-Title` */
  appTitle?: string;
  /** Sent as `HTTP-Referer` when set */
  httpReferer?: string;
  /** Source of randomness in [0, 1) for `random-free`. Defaults to Math.random. */
  random?: () => number;
}

/**
 * Routing preference: free models are sorted by throughput, paid ones by
 * price.
 */
export function routingSort(model: ModelInfo): ProviderSort {
  return isFreeModel(model) ? 'throughput' : 'price';
}

/**
 * OpenRouter speaks the OpenAI wire format with a few additions: attribution
 * headers, per-request routing preferences, and the `random-free`
 * pseudo-model.
 *
 * @example
 * ```typescript
 * const openrouter = new OpenRouterProvider({
 *   apiKey: process.env.OPENROUTER_API_KEY,
 *   defaultModel: 'deepseek/deepseek-chat',
 * });
 * const { chunks } = await openrouter.askStream(
 *   openrouter.createRequest({
 *     stream: true,
 *     messages: [userMessage('Hi')],
 *     model: await openrouter.getModelInfo('random-free'),
 *     params: {},
 *   })
 * );
 * ```
 */
export class OpenRouterProvider implements Provider {
  readonly name: string;
  private readonly client: CompletionClient;
  private readonly catalog: ModelCatalog;
  private readonly defaultModel: string;
  private readonly random: () => number;

  constructor(config: OpenRouterProviderConfig = {}) {
    const headers: Record<string, string> = {
      ...config.defaultHeaders,
      'X-Title': config.appTitle || DEFAULT_APP_TITLE,
    };
    if (config.httpReferer) {
      headers['HTTP-Referer'] = config.httpReferer;
    }

    this.name = config.name || 'openrouter';
    this.defaultModel = config.defaultModel ?? '';
    this.random = config.random ?? Math.random;

    const backend = createBackend({
      ...config,
      name: this.name,
      baseURL: config.baseURL || OPENROUTER_BASE_URL,
      defaultHeaders: headers,
    });
    this.client = backend.client;
    this.catalog = backend.catalog;
  }

  createRequest(options: CreateRequestOptions): CompletionRequest {
    return this.client.createRequest(options);
  }

  async ask(request: CompletionRequest, options: CallOptions = {}): Promise<CompletionResult> {
    return this.client.ask(await this.route(request, options.signal), options);
  }

  async askStream(request: CompletionRequest, options: CallOptions = {}): Promise<StreamResult> {
    return this.client.askStream(await this.route(request, options.signal), options);
  }

  getModels(options?: GetModelsOptions): Promise<ModelMap> {
    return this.catalog.getModels(options);
  }

  async getModelInfo(name: string, signal?: AbortSignal): Promise<ModelInfo> {
    if (name === RANDOM_FREE_MODEL) {
      return this.getRandomFreeModel(signal);
    }
    return this.catalog.getModelInfo(name, signal);
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }

  /**
   * Uniformly sample the free catalog.
   *
   * @throws {AIError} When no free models are available
   */
  async getRandomFreeModel(signal?: AbortSignal): Promise<ModelInfo> {
    const models = [...(await this.catalog.getModels({ onlyFree: true, signal })).values()];
    if (models.length === 0) {
      throw new AIError({ provider: this.name, detail: 'no free models available' });
    }
    const index = Math.min(Math.floor(this.random() * models.length), models.length - 1);
    const model = models[index];
    if (!model) {
      throw new AIError({ provider: this.name, detail: 'failed to select random model' });
    }
    return model;
  }

  /**
   * Settle `random-free` and empty model names, then attach the routing
   * preference for the final model. A default model the catalog does not
   * list is sent as a placeholder.
   */
  private async route(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionRequest> {
    let routed = request;
    if (request.model === RANDOM_FREE_MODEL || request.model === '') {
      const modelInfo = await this.lookupModel(request.model || this.defaultModel, signal);
      routed = { ...request, model: modelInfo.id, modelInfo };
    }
    return {
      ...routed,
      provider: { ...routed.provider, sort: routingSort(routed.modelInfo) },
    };
  }

  private async lookupModel(name: string, signal?: AbortSignal): Promise<ModelInfo> {
    try {
      return await this.getModelInfo(name, signal);
    } catch (error) {
      if (error instanceof ModelNotFoundError) {
        return error.placeholder;
      }
      throw error;
    }
  }
}
