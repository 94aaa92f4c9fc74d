/**
 * Completion request, result and streaming chunk types.
 *
 * @module completion
 */

import type { AIError } from '../errors/ai-error.js';
import type { Message } from './message.js';
import type { ModelInfo } from './model-info.js';
import type { ReasoningParams } from './model-params.js';

export interface FunctionCall {
  name: string;
  /** JSON-encoded arguments object once fully assembled */
  arguments: string;
}

/**
 * A function invocation requested by the model.
 */
export interface ToolCall {
  id: string;
  type: string;
  function: FunctionCall;
}

/**
 * Declaration of a callable tool, passed through to the provider unmodified.
 */
export interface ToolDeclaration {
  type: 'function';
  function: {
    name: string;
    description: string;
    /** JSON Schema for the arguments object */
    parameters: Record<string, unknown>;
  };
}

export type PdfEngine = 'native' | 'pdf-text' | 'mistral-ocr';

export interface WebPlugin {
  id: 'web';
  maxResults?: number;
  searchPrompt?: string;
}

export interface FileParserPlugin {
  id: 'file-parser';
  pdf: { engine: PdfEngine };
}

export type Plugin = WebPlugin | FileParserPlugin;

export type ProviderSort = 'price' | 'throughput' | 'latency';

export interface ProviderPreferences {
  sort?: ProviderSort;
  requireParameters?: boolean;
}

/**
 * The canonical request sent to a chat-completions endpoint.
 *
 * `modelInfo` and `webSearch` are request-scoped context and never reach
 * the wire.
 */
export interface CompletionRequest {
  model: string;
  messages: Message[];
  /** Absent when no tools were supplied */
  tools?: ToolDeclaration[];
  stream: boolean;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stopSequences?: string[];
  reasoning?: ReasoningParams;
  plugins: Plugin[];
  provider?: ProviderPreferences;
  usage: { include: boolean };

  modelInfo: ModelInfo;
  webSearch: boolean;
}

export interface UsageDetails {
  reasoningTokens?: number;
  cachedTokens?: number;
}

/**
 * Token accounting. Streaming events may carry a partial snapshot.
 */
export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  /** Cost reported by the provider, in credits */
  cost?: number;
  promptTokensDetails?: UsageDetails;
  completionTokensDetails?: UsageDetails;
}

export interface UrlCitation {
  url: string;
  title?: string;
  content?: string;
  startIndex?: number;
  endIndex?: number;
}

/**
 * Annotation attached to generated content (web citations, parsed files).
 */
export interface Annotation {
  type: string;
  text?: string;
  urlCitation?: UrlCitation;
  file?: {
    name: string;
    hash: string;
    content: unknown[];
  };
}

/**
 * Assistant message returned by a non-streaming completion.
 */
export interface ResponseMessage {
  role: string;
  content: string;
  reasoning?: string;
  reasoningContent?: string;
  toolCalls?: ToolCall[];
  annotations?: Annotation[];
}

export interface ResponseChoice {
  index: number;
  message: ResponseMessage;
  finishReason?: string;
}

/**
 * Decoded body of a non-streaming completion.
 */
export interface CompletionResponse {
  id: string;
  model?: string;
  choices: ResponseChoice[];
  usage?: Usage;
  annotations?: Annotation[];
}

/**
 * Result of `Provider.ask`.
 */
export interface CompletionResult {
  content: string;
  /** `reasoning`, falling back to `reasoning_content` */
  reasoning: string;
  response: CompletionResponse;
  model: ModelInfo;
}

/**
 * One unit of a streamed completion.
 *
 * `toolCalls` is populated only on the event that completes a tool-call
 * sequence. `error` marks a terminal in-stream failure.
 */
export interface Chunk {
  content: string;
  reasoning: string;
  usage?: Usage;
  toolCalls: ToolCall[];
  annotations: Annotation[];
  finishReason?: string;
  error?: AIError;
}

/**
 * Decode a tool call's arguments into an object.
 *
 * Empty arguments decode to `{}`.
 *
 * @throws {SyntaxError} If the arguments are not valid JSON
 * @throws {TypeError} If the arguments are not a JSON object
 */
export function parseToolArguments(call: ToolCall): Record<string, unknown> {
  const text = call.function.arguments.trim();
  if (text === '') {
    return {};
  }
  const value: unknown = JSON.parse(text);
  if (!isRecord(value)) {
    throw new TypeError(`Tool call ${call.function.name} arguments must be a JSON object`);
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
