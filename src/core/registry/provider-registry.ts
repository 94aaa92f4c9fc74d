/**
 * Provider registry and model resolution.
 *
 * Holds every configured provider in registration order, resolves which
 * provider and model a call goes to, layers parameters and dispatches.
 *
 * @module provider-registry
 */

import type { GetModelsOptions } from '../catalog/model-catalog.js';
import { getAlias, getFullModelParams } from '../config/config.js';
import type { SwitchboardConfig } from '../config/schema.js';
import { toError } from '../errors/base-error.js';
import {
  InvalidModelSpecError,
  ModelNotFoundError,
  ProviderNotFoundError,
} from '../errors/registry-errors.js';
import { getLogger, type Logger } from '../logging/logger.js';
import type { CompletionResult, ToolDeclaration } from '../types/completion.js';
import type { Message } from '../types/message.js';
import { createPlaceholderModel, getFullName, withAlias, type ModelInfo } from '../types/model-info.js';
import { mergeModelParams, type ModelParams } from '../types/model-params.js';
import type { ChatSettings } from './chat-settings.js';
import { parseModelSpec } from './model-spec.js';
import type { CallOptions, Provider, StreamResult } from './provider.js';

/**
 * Where a resolved model came from.
 */
export type ResolutionSource = 'explicit' | 'chat' | 'default';

export interface ResolvedModel {
  provider: Provider;
  /** Model id on the provider; empty means the provider's default */
  model: string;
  source: ResolutionSource;
}

export interface AskOptions extends CallOptions {
  messages: Message[];
  tools?: ToolDeclaration[];
  /**
   * `provider:model` spec or a model from {@link ProviderRegistry.getFormattedModel}.
   * Absent: the chat's stored model, then the configured default.
   */
  model?: string | ModelInfo;
  /** Prompt name or alias whose configured params apply */
  prompt?: string;
  /** 0 or absent when the call is not tied to a chat */
  chatId?: number;
  webSearch?: boolean;
  /** Caller overrides, applied last */
  params?: ModelParams;
}

export interface AskResult extends CompletionResult {
  params: ModelParams;
}

export interface AskStreamResult extends StreamResult {
  params: ModelParams;
}

export interface ProviderRegistryOptions {
  config: SwitchboardConfig;
  chatSettings?: ChatSettings;
  logger?: Logger;
}

export class ProviderRegistry {
  private providerMap: ReadonlyMap<string, Provider> = new Map();
  private chatSettings: ChatSettings | undefined;
  private readonly config: SwitchboardConfig;
  private readonly logger: Logger;

  constructor(options: ProviderRegistryOptions) {
    this.config = options.config;
    this.chatSettings = options.chatSettings;
    this.logger = options.logger ?? getLogger('switchboard.registry');
  }

  setChatSettings(chatSettings: ChatSettings): void {
    this.chatSettings = chatSettings;
  }

  /**
   * Add or replace a provider under its name.
   */
  registerProvider(provider: Provider): void {
    const next = new Map(this.providerMap);
    next.set(provider.name, provider);
    this.providerMap = next;
    this.logger.debug('Provider registered', { provider: provider.name });
  }

  /**
   * @throws {ProviderNotFoundError}
   */
  getProvider(name: string): Provider {
    const provider = this.providerMap.get(name);
    if (!provider) {
      throw new ProviderNotFoundError(name);
    }
    return provider;
  }

  hasProvider(name: string): boolean {
    return this.providerMap.has(name);
  }

  /**
   * Provider names in registration order.
   */
  providers(): string[] {
    return [...this.providerMap.keys()];
  }

  /**
   * Pick the provider and model for a call.
   *
   * 1. An explicit `provider:model` spec. A malformed spec fails.
   * 2. The spec stored for `chatId` when it is non-zero. A failed lookup or
   *    malformed stored spec falls through.
   * 3. The configured default spec.
   *
   * An unknown provider name fails at every step.
   *
   * @throws {InvalidModelSpecError}
   * @throws {ProviderNotFoundError}
   */
  async resolveModel(modelSpec: string | undefined, chatId = 0): Promise<ResolvedModel> {
    if (modelSpec) {
      const spec = parseModelSpec(modelSpec);
      if (!spec) {
        throw new InvalidModelSpecError(modelSpec);
      }
      return { provider: this.getProvider(spec.provider), model: spec.model, source: 'explicit' };
    }

    if (chatId !== 0 && this.chatSettings) {
      const stored = await this.lookupChatSpec(chatId);
      const spec = stored ? parseModelSpec(stored) : undefined;
      if (spec) {
        return { provider: this.getProvider(spec.provider), model: spec.model, source: 'chat' };
      }
      if (stored) {
        this.logger.warn('Ignoring malformed stored model spec', { chatId, spec: stored });
      }
    }

    const spec = parseModelSpec(this.config.defaultModel);
    if (!spec) {
      throw new InvalidModelSpecError(this.config.defaultModel);
    }
    return { provider: this.getProvider(spec.provider), model: spec.model, source: 'default' };
  }

  /**
   * Resolve, layer params and run a blocking completion.
   *
   * @throws {AIError} From the provider
   */
  async ask(options: AskOptions): Promise<AskResult> {
    const { provider, model, params } = await this.prepare(options);
    const request = provider.createRequest({
      stream: false,
      messages: options.messages,
      tools: options.tools,
      model,
      params,
      webSearch: options.webSearch,
    });
    const result = await provider.ask(request, { headers: options.headers, signal: options.signal });
    return { ...result, params };
  }

  /**
   * Resolve, layer params and open a stream.
   *
   * @throws {AIError} If the stream cannot be opened
   */
  async askStream(options: AskOptions): Promise<AskStreamResult> {
    const { provider, model, params } = await this.prepare(options);
    const request = provider.createRequest({
      stream: true,
      messages: options.messages,
      tools: options.tools,
      model,
      params,
      webSearch: options.webSearch,
    });
    const result = await provider.askStream(request, { headers: options.headers, signal: options.signal });
    return { ...result, params };
  }

  /**
   * Find a model by alias, spec or bare id.
   *
   * Aliases resolve to their model first. With a provider (given, or
   * embedded as `provider:` and registered) that provider is asked directly;
   * otherwise every provider is tried in registration order. The alias is
   * set on the result.
   *
   * @throws {ModelNotFoundError} If no provider knows the model
   * @throws {ProviderNotFoundError} If `providerName` is given but unknown
   */
  async getFormattedModel(modelName: string, providerName?: string): Promise<ModelInfo> {
    this.logger.debug('Get model info', { model: modelName, provider: providerName });

    let aliasName: string | undefined;
    let name = modelName;
    const alias = getAlias(this.config, modelName);
    if (alias) {
      aliasName = alias.alias;
      name = alias.model;
    }

    let targetProvider = providerName;
    if (!targetProvider) {
      const spec = parseModelSpec(name);
      if (spec && this.providerMap.has(spec.provider)) {
        targetProvider = spec.provider;
        name = spec.model;
      }
    }

    if (targetProvider) {
      const provider = this.getProvider(targetProvider);
      const model = await provider.getModelInfo(name || provider.getDefaultModel());
      return withAlias(model, aliasName);
    }

    let lastError: Error | undefined;
    for (const provider of this.providerMap.values()) {
      try {
        const model = await provider.getModelInfo(name);
        return withAlias(model, aliasName);
      } catch (error) {
        lastError = toError(error);
      }
    }
    throw new ModelNotFoundError(createPlaceholderModel(name, ''), lastError);
  }

  /**
   * Models of every provider, keyed by provider name. Providers that fail
   * are logged and skipped; empty catalogs are left out.
   */
  async getAllModels(options: Omit<GetModelsOptions, 'signal'> = {}): Promise<Map<string, ModelInfo[]>> {
    const result = new Map<string, ModelInfo[]>();
    for (const [name, provider] of this.providerMap) {
      try {
        const models = await provider.getModels(options);
        if (models.size > 0) {
          result.set(name, [...models.values()]);
        }
      } catch (error) {
        this.logger.error('Failed to list models', error, { provider: name });
      }
    }
    return result;
  }

  /**
   * Refresh every catalog. Failures are logged, never thrown.
   */
  async syncModels(): Promise<void> {
    const entries = [...this.providerMap.entries()];
    const results = await Promise.allSettled(
      entries.map(([, provider]) => provider.getModels({ forceFresh: true }))
    );
    results.forEach((result, index) => {
      const name = entries[index][0];
      if (result.status === 'rejected') {
        this.logger.error('Initial model sync failed', result.reason, { provider: name });
      } else {
        this.logger.info('Models synced', { provider: name, models: result.value.size });
      }
    });
  }

  private async lookupChatSpec(chatId: number): Promise<string | undefined> {
    if (!this.chatSettings) {
      return undefined;
    }
    try {
      return await this.chatSettings.getCurrentModelSpec(chatId);
    } catch (error) {
      this.logger.warn('Chat model lookup failed, using default', {
        chatId,
        error: toError(error).message,
      });
      return undefined;
    }
  }

  private async prepare(
    options: AskOptions
  ): Promise<{ provider: Provider; model: ModelInfo; params: ModelParams }> {
    const requested = options.model;
    const spec = typeof requested === 'string' ? requested : requested ? getFullName(requested) : undefined;
    const resolved = await this.resolveModel(spec, options.chatId ?? 0);
    const provider = resolved.provider;

    let model: ModelInfo;
    if (typeof requested === 'object' && requested.provider === provider.name) {
      model = requested;
    } else {
      model = await this.describeModel(provider, resolved.model, options.signal);
    }

    const params = await this.mergeParams(options, provider.name, model.alias);
    return { provider, model, params };
  }

  /**
   * Catalog entry for a resolved model. A model the catalog does not list
   * is still usable; the request goes out with a placeholder.
   */
  private async describeModel(provider: Provider, name: string, signal?: AbortSignal): Promise<ModelInfo> {
    const id = name || provider.getDefaultModel();
    try {
      return await provider.getModelInfo(id, signal);
    } catch (error) {
      if (error instanceof ModelNotFoundError) {
        this.logger.debug('Model not in catalog, using placeholder', { provider: provider.name, model: id });
        return error.placeholder;
      }
      throw error;
    }
  }

  private async mergeParams(options: AskOptions, provider: string, alias: string | undefined): Promise<ModelParams> {
    const callerParams = options.params ?? {};
    if (this.chatSettings) {
      return this.chatSettings.mergeModelParams({
        chatId: options.chatId ?? 0,
        provider,
        alias,
        prompt: options.prompt,
        params: callerParams,
      });
    }
    return mergeModelParams(getFullModelParams(this.config, provider, alias, options.prompt), callerParams);
  }
}
