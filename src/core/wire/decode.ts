/**
 * Conversion from validated wire payloads to the domain model.
 */

import type {
  Annotation,
  CompletionResponse,
  ToolCall,
  Usage,
  UsageDetails,
} from '../types/completion.js';
import type { ContentPart, Message } from '../types/message.js';
import { createModelInfo, type ModelInfo } from '../types/model-info.js';
import {
  type WireAnnotation,
  type WireCompletionResponse,
  type WireContentPart,
  type WireModel,
  type WireToolCall,
  type WireUsage,
  wireMessageSchema,
} from './schemas.js';

export function toolCallFromWire(wire: WireToolCall): ToolCall {
  return {
    id: wire.id ?? '',
    type: wire.type ?? '',
    function: {
      name: wire.function?.name ?? '',
      arguments: wire.function?.arguments ?? '',
    },
  };
}

function detailsFromWire(
  wire: { reasoning_tokens?: number | null; cached_tokens?: number | null } | null | undefined
): UsageDetails | undefined {
  if (!wire) {
    return undefined;
  }
  const details: UsageDetails = {};
  if (wire.reasoning_tokens != null) details.reasoningTokens = wire.reasoning_tokens;
  if (wire.cached_tokens != null) details.cachedTokens = wire.cached_tokens;
  return details;
}

export function usageFromWire(wire: WireUsage): Usage {
  const usage: Usage = {
    promptTokens: wire.prompt_tokens ?? 0,
    completionTokens: wire.completion_tokens ?? 0,
    totalTokens: wire.total_tokens ?? 0,
  };
  if (wire.cost != null) usage.cost = wire.cost;
  const promptDetails = detailsFromWire(wire.prompt_tokens_details);
  if (promptDetails) usage.promptTokensDetails = promptDetails;
  const completionDetails = detailsFromWire(wire.completion_tokens_details);
  if (completionDetails) usage.completionTokensDetails = completionDetails;
  return usage;
}

export function annotationFromWire(wire: WireAnnotation): Annotation {
  const annotation: Annotation = { type: wire.type };
  if (wire.text != null) annotation.text = wire.text;
  if (wire.url_citation) {
    const citation = wire.url_citation;
    annotation.urlCitation = { url: citation.url };
    if (citation.title != null) annotation.urlCitation.title = citation.title;
    if (citation.content != null) annotation.urlCitation.content = citation.content;
    if (citation.start_index != null) annotation.urlCitation.startIndex = citation.start_index;
    if (citation.end_index != null) annotation.urlCitation.endIndex = citation.end_index;
  }
  if (wire.file) {
    annotation.file = { name: wire.file.name, hash: wire.file.hash, content: wire.file.content };
  }
  return annotation;
}

export function annotationsFromWire(wire: WireAnnotation[] | null | undefined): Annotation[] {
  return (wire ?? []).map(annotationFromWire);
}

export function completionResponseFromWire(wire: WireCompletionResponse): CompletionResponse {
  const response: CompletionResponse = {
    id: wire.id ?? '',
    choices: (wire.choices ?? []).map((choice, position) => {
      const message = choice.message;
      return {
        index: choice.index ?? position,
        message: {
          role: message.role ?? 'assistant',
          content: message.content ?? '',
          ...(message.reasoning ? { reasoning: message.reasoning } : {}),
          ...(message.reasoning_content ? { reasoningContent: message.reasoning_content } : {}),
          ...(message.tool_calls?.length ? { toolCalls: message.tool_calls.map(toolCallFromWire) } : {}),
          ...(message.annotations?.length ? { annotations: annotationsFromWire(message.annotations) } : {}),
        },
        ...(choice.finish_reason ? { finishReason: choice.finish_reason } : {}),
      };
    }),
  };
  if (wire.model) response.model = wire.model;
  if (wire.usage) response.usage = usageFromWire(wire.usage);
  if (wire.annotations?.length) response.annotations = annotationsFromWire(wire.annotations);
  return response;
}

/**
 * Build a ModelInfo from a `/models` listing entry.
 */
export function modelInfoFromWire(wire: WireModel, provider: string): ModelInfo {
  const architecture = wire.architecture;
  return createModelInfo({
    id: wire.id,
    provider,
    supportedParameters: wire.supported_parameters ?? [],
    ...(architecture
      ? {
          architecture: {
            inputModalities: architecture.input_modalities ?? [],
            outputModalities: architecture.output_modalities ?? [],
            ...(architecture.modality ? { modality: architecture.modality } : {}),
            ...(architecture.tokenizer ? { tokenizer: architecture.tokenizer } : {}),
            ...(architecture.instruct_type !== undefined ? { instructType: architecture.instruct_type } : {}),
          },
        }
      : {}),
    ...(wire.pricing
      ? {
          pricing: {
            prompt: wire.pricing.prompt,
            completion: wire.pricing.completion,
            image: wire.pricing.image,
            webSearch: wire.pricing.web_search,
          },
        }
      : {}),
    ...(wire.created != null ? { created: wire.created } : {}),
  });
}

function partFromWire(part: WireContentPart): ContentPart {
  switch (part.type) {
    case 'text':
      return { type: 'text', text: part.text };
    case 'image_url':
      return {
        type: 'image_url',
        imageUrl: part.image_url.detail
          ? { url: part.image_url.url, detail: part.image_url.detail }
          : { url: part.image_url.url },
      };
    case 'file':
      return { type: 'file', file: { filename: part.file.filename, fileData: part.file.file_data } };
    case 'input_audio':
      return { type: 'input_audio', inputAudio: { data: part.input_audio.data, format: part.input_audio.format } };
  }
}

/**
 * Decode a message from its wire JSON.
 *
 * String content stays text, an array becomes parts, null or absent
 * content becomes empty text.
 *
 * @throws {ZodError} If the value is not a chat message
 */
export function messageFromWire(value: unknown): Message {
  const wire = wireMessageSchema.parse(value);
  const content = wire.content ?? '';
  const message: Message = {
    role: wire.role,
    content: typeof content === 'string' ? content : content.map(partFromWire),
  };
  if (wire.name) message.name = wire.name;
  if (wire.tool_call_id) message.toolCallId = wire.tool_call_id;
  if (wire.tool_calls?.length) message.toolCalls = wire.tool_calls.map(toolCallFromWire);
  return message;
}
