/**
 * Chat-completions behavior shared by every provider.
 *
 * Providers hold a CompletionClient and delegate to it wherever their
 * backend behaves like a plain OpenAI-style API.
 *
 * @module providers/shared/completion-client
 */

import { AIError } from '../../core/errors/ai-error.js';
import { toError } from '../../core/errors/base-error.js';
import { getLogger, type Logger } from '../../core/logging/logger.js';
import type { CallOptions, CreateRequestOptions, StreamResult } from '../../core/registry/provider.js';
import { decodeStream } from '../../core/streaming/stream-decoder.js';
import type { CompletionRequest, CompletionResult, Plugin } from '../../core/types/completion.js';
import { anyMessageHasFiles } from '../../core/types/message.js';
import { supportsFiles, type ModelInfo } from '../../core/types/model-info.js';
import { completionResponseFromWire, modelInfoFromWire } from '../../core/wire/decode.js';
import { encodeRequest } from '../../core/wire/encode.js';
import { completionResponseSchema, modelsListSchema } from '../../core/wire/schemas.js';
import type { HttpTransport } from './transport.js';

export const DEFAULT_CHAT_PATH = '/chat/completions';
export const MODELS_PATH = '/models';
export const WEB_SEARCH_MAX_RESULTS = 2;

export interface CompletionClientConfig {
  provider: string;
  transport: HttpTransport;
  /** Defaults to `/chat/completions` */
  chatPath?: string;
  logger?: Logger;
}

export class CompletionClient {
  readonly provider: string;
  readonly chatPath: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: CompletionClientConfig) {
    this.provider = config.provider;
    this.transport = config.transport;
    this.chatPath = config.chatPath || DEFAULT_CHAT_PATH;
    this.logger = (config.logger ?? getLogger('switchboard.provider')).child({ provider: config.provider });
  }

  createRequest(options: CreateRequestOptions): CompletionRequest {
    const { params, model } = options;
    const request: CompletionRequest = {
      model: model.id,
      messages: options.messages,
      stream: options.stream,
      plugins: [],
      usage: { include: true },
      modelInfo: model,
      webSearch: options.webSearch ?? false,
    };

    if (options.tools && options.tools.length > 0) {
      request.tools = options.tools;
    }
    if (params.temperature != null) request.temperature = params.temperature;
    if (params.maxTokens != null) request.maxTokens = params.maxTokens;
    if (params.topP != null) request.topP = params.topP;
    if (params.frequencyPenalty != null) request.frequencyPenalty = params.frequencyPenalty;
    if (params.presencePenalty != null) request.presencePenalty = params.presencePenalty;
    if (params.stopSequences != null) request.stopSequences = params.stopSequences;
    if (params.reasoning != null) request.reasoning = params.reasoning;

    const plugins: Plugin[] = [];
    if (request.webSearch) {
      plugins.push({ id: 'web', maxResults: WEB_SEARCH_MAX_RESULTS });
    }
    if (anyMessageHasFiles(options.messages)) {
      plugins.push({ id: 'file-parser', pdf: { engine: supportsFiles(model) ? 'native' : 'pdf-text' } });
    }
    request.plugins = plugins;

    return request;
  }

  async ask(request: CompletionRequest, options: CallOptions = {}): Promise<CompletionResult> {
    const model = request.model;
    const response = await this.transport.post(this.chatPath, encodeRequest(request), {
      headers: options.headers,
      signal: options.signal,
      model,
    });

    const json = await this.readJson(response, model);
    const parsed = completionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AIError({
        provider: this.provider,
        model,
        detail: 'failed to decode response',
        cause: parsed.error,
      });
    }

    // Some providers report failures inside a 200 body.
    if (parsed.data.error) {
      throw new AIError({
        provider: this.provider,
        model,
        errorCode: parsed.data.error.code || undefined,
        detail: parsed.data.error.message || 'provider returned an error',
      });
    }

    const result = completionResponseFromWire(parsed.data);
    const choice = result.choices[0];
    if (!choice) {
      throw new AIError({ provider: this.provider, model, detail: 'no choices in response' });
    }

    return {
      content: choice.message.content,
      reasoning: choice.message.reasoning || choice.message.reasoningContent || '',
      response: result,
      model: request.modelInfo,
    };
  }

  async askStream(request: CompletionRequest, options: CallOptions = {}): Promise<StreamResult> {
    const model = request.model;
    const response = await this.transport.post(this.chatPath, encodeRequest({ ...request, stream: true }), {
      headers: { ...options.headers, Accept: 'text/event-stream' },
      signal: options.signal,
      model,
    });

    if (!response.body) {
      throw new AIError({ provider: this.provider, model, detail: 'response has no body' });
    }

    const chunks = decodeStream(response.body, {
      provider: this.provider,
      model,
      signal: options.signal,
      logger: this.logger,
    });
    return { chunks, model: request.modelInfo };
  }

  /**
   * Live model listing from `GET /models`.
   *
   * @throws {AIError}
   */
  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const response = await this.transport.get(MODELS_PATH, { signal });
    const json = await this.readJson(response);
    const parsed = modelsListSchema.safeParse(json);
    if (!parsed.success) {
      throw new AIError({ provider: this.provider, detail: 'failed to decode models response', cause: parsed.error });
    }
    return parsed.data.data.map((model) => modelInfoFromWire(model, this.provider));
  }

  private async readJson(response: Response, model?: string): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new AIError({
        provider: this.provider,
        model,
        detail: 'failed to read response body',
        cause: toError(error),
        transportFailure: true,
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new AIError({
        provider: this.provider,
        model,
        status: response.status,
        detail: 'failed to unmarshal response',
        cause: toError(error),
      });
    }
  }
}
