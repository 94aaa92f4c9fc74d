/**
 * Chat messages exchanged with a provider.
 *
 * @module message
 */

import type { ToolCall } from './completion.js';

/**
 * Role of a message author.
 */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImageUrlPart {
  type: 'image_url';
  imageUrl: {
    /** http(s) URL or data URL */
    url: string;
    detail?: 'auto' | 'low' | 'high';
  };
}

export interface FilePart {
  type: 'file';
  file: {
    filename: string;
    /** Data URL with the file contents */
    fileData: string;
  };
}

export interface InputAudioPart {
  type: 'input_audio';
  inputAudio: {
    /** Base64-encoded audio */
    data: string;
    format: string;
  };
}

/**
 * One element of a multi-part message body.
 */
export type ContentPart = TextPart | ImageUrlPart | FilePart | InputAudioPart;

/**
 * A chat message.
 *
 * `content` is either plain text or an ordered list of parts; the wire
 * encoding mirrors the same choice.
 */
export interface Message {
  role: MessageRole;
  content: string | ContentPart[];
  /** Tool call this message answers (role `tool`) */
  toolCallId?: string;
  /** Tool calls requested by the model (role `assistant`) */
  toolCalls?: ToolCall[];
  name?: string;
}

export function systemMessage(text: string): Message {
  return { role: 'system', content: text };
}

export function userMessage(content: string | ContentPart[]): Message {
  return { role: 'user', content };
}

export function assistantMessage(text: string, toolCalls?: ToolCall[]): Message {
  return toolCalls && toolCalls.length > 0
    ? { role: 'assistant', content: text, toolCalls }
    : { role: 'assistant', content: text };
}

export function toolMessage(toolCallId: string, text: string, name?: string): Message {
  return name ? { role: 'tool', content: text, toolCallId, name } : { role: 'tool', content: text, toolCallId };
}

export function textPart(text: string): TextPart {
  return { type: 'text', text };
}

export function imagePart(url: string, detail?: ImageUrlPart['imageUrl']['detail']): ImageUrlPart {
  return { type: 'image_url', imageUrl: detail ? { url, detail } : { url } };
}

export function filePart(filename: string, fileData: string): FilePart {
  return { type: 'file', file: { filename, fileData } };
}

export function audioPart(data: string, format: string): InputAudioPart {
  return { type: 'input_audio', inputAudio: { data, format } };
}

/**
 * Concatenated text of a message, ignoring non-text parts.
 */
export function getMessageText(message: Message): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .filter((part): part is TextPart => part.type === 'text')
    .map((part) => part.text)
    .join('');
}

export function messageHasFiles(message: Message): boolean {
  return typeof message.content !== 'string' && message.content.some((part) => part.type === 'file');
}

export function anyMessageHasFiles(messages: readonly Message[]): boolean {
  return messages.some(messageHasFiles);
}
