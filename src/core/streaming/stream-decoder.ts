/**
 * Server-sent-event decoding for streamed chat completions.
 *
 * A producer task reads the response body line by line, turns each
 * `data: {...}` event into a {@link Chunk} and pushes it to a
 * {@link ChunkQueue}. Tool-call fragments are merged across events and
 * released on the event whose finish reason is `tool_calls`.
 *
 * @module stream-decoder
 */

import { AIError } from '../errors/ai-error.js';
import { getLogger, LogLevel, type Logger } from '../logging/logger.js';
import type { Chunk } from '../types/completion.js';
import { annotationsFromWire, usageFromWire } from '../wire/decode.js';
import { streamEventSchema, type WireStreamEvent } from '../wire/schemas.js';
import { ChunkQueue } from './chunk-queue.js';
import { readLines } from './line-reader.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';

export const DATA_PREFIX = 'data:';
export const DONE_SENTINEL = '[DONE]';

/**
 * Consumer side of a streamed completion.
 *
 * Iterate with `for await`; chunks arrive in the order their events were
 * parsed. Breaking out of the loop or calling `cancel()` stops the producer
 * and closes the network body.
 */
export interface ChunkStream extends AsyncIterable<Chunk> {
  cancel(): void;
  readonly cancelled: boolean;
}

export interface StreamContext {
  provider: string;
  model: string;
}

export interface StreamDecoderOptions extends StreamContext {
  /** Aborting stops decoding and cancels the body */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Result of classifying one line of the event stream.
 */
export type StreamLine =
  | { kind: 'ignore' }
  | { kind: 'done' }
  | { kind: 'event'; event: WireStreamEvent }
  | { kind: 'invalid'; payload: string; reason: string };

/**
 * Classify one line. Only `data:` lines carry payload; comments, blank lines
 * and other fields are ignored.
 */
export function parseStreamLine(line: string): StreamLine {
  if (!line.startsWith(DATA_PREFIX)) {
    return { kind: 'ignore' };
  }
  const payload = line.slice(DATA_PREFIX.length).trim();
  if (payload === DONE_SENTINEL) {
    return { kind: 'done' };
  }
  if (payload === '') {
    return { kind: 'ignore' };
  }

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    return { kind: 'invalid', payload, reason: error instanceof Error ? error.message : String(error) };
  }

  const result = streamEventSchema.safeParse(json);
  if (!result.success) {
    return { kind: 'invalid', payload, reason: result.error.message };
  }
  return { kind: 'event', event: result.data };
}

/**
 * Turn one event into a chunk, merging tool-call fragments into
 * `accumulator`. Returns undefined for events with neither a choice, a
 * usage snapshot nor an error.
 */
export function decodeStreamEvent(
  event: WireStreamEvent,
  accumulator: ToolCallAccumulator,
  context: StreamContext
): Chunk | undefined {
  const choice = event.choices?.[0];
  const chunk: Chunk = { content: '', reasoning: '', toolCalls: [], annotations: [] };
  let meaningful = false;

  if (choice) {
    meaningful = true;
    const delta = choice.delta;
    if (delta) {
      if (delta.tool_calls) {
        accumulator.mergeAll(delta.tool_calls);
      }
      chunk.content = delta.content ?? '';
      chunk.reasoning = delta.reasoning || delta.reasoning_content || '';
      chunk.annotations = annotationsFromWire(delta.annotations);
    }

    const finishReason = choice.finish_reason;
    if (finishReason) {
      chunk.finishReason = finishReason;
    }
    if (finishReason === 'tool_calls') {
      chunk.toolCalls = accumulator.drain();
    } else if (finishReason === 'error') {
      chunk.error = new AIError({
        provider: context.provider,
        model: context.model,
        detail: `stream generation failed: ${finishReason}`,
      });
    }
  }

  if (event.usage) {
    meaningful = true;
    chunk.usage = usageFromWire(event.usage);
  }

  if (event.error) {
    meaningful = true;
    chunk.error = new AIError({
      provider: context.provider,
      model: context.model,
      errorCode: event.error.code,
      detail: event.error.message || 'stream generation failed',
    });
  }

  return meaningful ? chunk : undefined;
}

/**
 * Start decoding `body` and return the consumer handle immediately.
 *
 * The body reader is cancelled on every exit path: `[DONE]`, end of body, a
 * read error (logged, then the stream ends), consumer cancellation or an
 * aborted `signal`.
 *
 * @example
 * ```typescript
 * const chunks = decodeStream(response.body, { provider: 'openrouter', model: 'x/y' });
 * for await (const chunk of chunks) {
 *   process.stdout.write(chunk.content);
 * }
 * ```
 */
export function decodeStream(body: ReadableStream<Uint8Array>, options: StreamDecoderOptions): ChunkStream {
  const logger = (options.logger ?? getLogger('switchboard.stream')).child({
    provider: options.provider,
    model: options.model,
  });
  const reader = body.getReader();
  const controller = new AbortController();

  const cancelBody = (): void => {
    reader.cancel().catch((error: unknown) => {
      logger.debug('Stream body cancel failed', { error: String(error) });
    });
  };

  const stop = (): void => {
    if (!controller.signal.aborted) {
      controller.abort();
      cancelBody();
    }
  };

  const queue = new ChunkQueue<Chunk>(stop);

  const external = options.signal;
  const onExternalAbort = (): void => {
    logger.debug('Stream aborted by caller');
    queue.cancel();
  };

  if (external?.aborted) {
    queue.cancel();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const produce = async (): Promise<void> => {
    const accumulator = new ToolCallAccumulator();
    const debug = logger.isLevelEnabled(LogLevel.DEBUG);
    try {
      for await (const line of readLines(reader)) {
        if (controller.signal.aborted) {
          break;
        }
        if (debug) {
          logger.debug('Raw SSE line', { line });
        }

        const parsed = parseStreamLine(line);
        if (parsed.kind === 'done') {
          break;
        }
        if (parsed.kind === 'invalid') {
          logger.warn('Skipping undecodable stream event', { reason: parsed.reason, data: parsed.payload });
          continue;
        }
        if (parsed.kind === 'ignore') {
          continue;
        }

        const chunk = decodeStreamEvent(parsed.event, accumulator, options);
        if (chunk) {
          queue.push(chunk);
        }
      }
    } catch (error) {
      if (!controller.signal.aborted) {
        logger.error('Stream read failed', error);
      }
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
      if (!controller.signal.aborted) {
        controller.abort();
        cancelBody();
      }
      queue.close();
    }
  };

  produce().catch((error: unknown) => {
    logger.error('Stream producer failed', error);
    queue.close();
  });

  return queue;
}
