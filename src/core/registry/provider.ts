import type { GetModelsOptions, ModelMap } from '../catalog/model-catalog.js';
import type { ChunkStream } from '../streaming/stream-decoder.js';
import type { CompletionRequest, CompletionResult, ToolDeclaration } from '../types/completion.js';
import type { Message } from '../types/message.js';
import type { ModelInfo } from '../types/model-info.js';
import type { ModelParams } from '../types/model-params.js';

export interface CreateRequestOptions {
  stream: boolean;
  messages: Message[];
  /** Omitted from the wire when empty or absent */
  tools?: ToolDeclaration[];
  model: ModelInfo;
  params: ModelParams;
  webSearch?: boolean;
}

/**
 * Per-call transport options.
 */
export interface CallOptions {
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Cancels the HTTP call; for streams, also stops decoding */
  signal?: AbortSignal;
}

export interface StreamResult {
  chunks: ChunkStream;
  model: ModelInfo;
}

/**
 * A chat-completions backend.
 *
 * Every failure surfaces as an `AIError` carrying the provider name and,
 * once known, the model.
 */
export interface Provider {
  readonly name: string;

  /**
   * Assemble the wire request. Adds a `web` plugin for web search and a
   * `file-parser` plugin when any message carries a file.
   */
  createRequest(options: CreateRequestOptions): CompletionRequest;

  /**
   * One blocking round trip.
   *
   * @throws {AIError} On transport failure, non-2xx status, undecodable body,
   * an error object inside a 2xx body, or zero choices
   */
  ask(request: CompletionRequest, options?: CallOptions): Promise<CompletionResult>;

  /**
   * Open a stream. Connection and status are checked before this resolves;
   * decoding continues in the background.
   *
   * @throws {AIError} If the stream cannot be opened
   */
  askStream(request: CompletionRequest, options?: CallOptions): Promise<StreamResult>;

  getModels(options?: GetModelsOptions): Promise<ModelMap>;

  /**
   * @throws {ModelNotFoundError} If no catalog source knows `name`
   */
  getModelInfo(name: string, signal?: AbortSignal): Promise<ModelInfo>;

  getDefaultModel(): string;
}
