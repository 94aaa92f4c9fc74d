/**
 * Serialization of the domain model to snake_case wire JSON.
 */

import type { CompletionRequest, Plugin, ToolCall } from '../types/completion.js';
import type { ContentPart, Message } from '../types/message.js';
import type { ReasoningParams } from '../types/model-params.js';

export type WireObject = Record<string, unknown>;

function encodePart(part: ContentPart): WireObject {
  switch (part.type) {
    case 'text':
      return { type: 'text', text: part.text };
    case 'image_url':
      return {
        type: 'image_url',
        image_url: part.imageUrl.detail
          ? { url: part.imageUrl.url, detail: part.imageUrl.detail }
          : { url: part.imageUrl.url },
      };
    case 'file':
      return { type: 'file', file: { filename: part.file.filename, file_data: part.file.fileData } };
    case 'input_audio':
      return { type: 'input_audio', input_audio: { data: part.inputAudio.data, format: part.inputAudio.format } };
  }
}

function encodeToolCall(call: ToolCall): WireObject {
  return {
    id: call.id,
    type: call.type,
    function: { name: call.function.name, arguments: call.function.arguments },
  };
}

/**
 * Content goes out as the part list when parts are present, as plain text
 * otherwise.
 */
export function encodeMessage(message: Message): WireObject {
  const content = message.content;
  const wire: WireObject = {
    role: message.role,
    content: typeof content === 'string' ? content : content.length > 0 ? content.map(encodePart) : '',
  };
  if (message.name) wire.name = message.name;
  if (message.toolCallId) wire.tool_call_id = message.toolCallId;
  if (message.toolCalls && message.toolCalls.length > 0) {
    wire.tool_calls = message.toolCalls.map(encodeToolCall);
  }
  return wire;
}

/**
 * A token budget takes priority over an effort level; providers reject
 * both at once.
 */
function encodeReasoning(reasoning: ReasoningParams): WireObject | undefined {
  const wire: WireObject = {};
  if (reasoning.enabled != null) wire.enabled = reasoning.enabled;
  if (reasoning.exclude != null) wire.exclude = reasoning.exclude;
  if (reasoning.maxTokens != null) {
    wire.max_tokens = reasoning.maxTokens;
  } else if (reasoning.effort != null) {
    wire.effort = reasoning.effort;
  }
  return Object.keys(wire).length > 0 ? wire : undefined;
}

function encodePlugin(plugin: Plugin): WireObject {
  if (plugin.id === 'file-parser') {
    return { id: plugin.id, pdf: { engine: plugin.pdf.engine } };
  }
  const wire: WireObject = { id: plugin.id };
  if (plugin.maxResults !== undefined) wire.max_results = plugin.maxResults;
  if (plugin.searchPrompt !== undefined) wire.search_prompt = plugin.searchPrompt;
  return wire;
}

/**
 * Serialize a request body. `modelInfo` and `webSearch` stay behind.
 */
export function encodeRequest(request: CompletionRequest): WireObject {
  const wire: WireObject = {
    model: request.model,
    messages: request.messages.map(encodeMessage),
    stream: request.stream,
  };
  if (request.tools !== undefined) wire.tools = request.tools;
  if (request.temperature !== undefined) wire.temperature = request.temperature;
  if (request.maxTokens !== undefined) wire.max_tokens = request.maxTokens;
  if (request.topP !== undefined) wire.top_p = request.topP;
  if (request.frequencyPenalty !== undefined) wire.frequency_penalty = request.frequencyPenalty;
  if (request.presencePenalty !== undefined) wire.presence_penalty = request.presencePenalty;
  if (request.stopSequences !== undefined && request.stopSequences.length > 0) wire.stop = request.stopSequences;
  if (request.reasoning !== undefined) {
    const reasoning = encodeReasoning(request.reasoning);
    if (reasoning) wire.reasoning = reasoning;
  }
  if (request.plugins.length > 0) wire.plugins = request.plugins.map(encodePlugin);
  if (request.provider) {
    const provider: WireObject = {};
    if (request.provider.sort) provider.sort = request.provider.sort;
    if (request.provider.requireParameters) provider.require_parameters = true;
    if (Object.keys(provider).length > 0) wire.provider = provider;
  }
  wire.usage = { include: request.usage.include };
  return wire;
}
