import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { sseEvent, textStream } from '../../../__tests__/sse.js';
import { AIError } from '../../errors/ai-error.js';
import type { Chunk } from '../../types/completion.js';
import { configureLogging, LogLevel, resetLoggers } from '../../logging/logger.js';
import { collectStream } from '../aggregate.js';
import { decodeStream, decodeStreamEvent, parseStreamLine } from '../stream-decoder.js';
import { ToolCallAccumulator } from '../tool-call-accumulator.js';

const context = { provider: 'openrouter', model: 'gpt-x' };

const delta = (content: string) => ({ choices: [{ delta: { content } }] });

describe('parseStreamLine', () => {
  it('should recognize the end sentinel with or without a space', () => {
    expect(parseStreamLine('data: [DONE]')).toEqual({ kind: 'done' });
    expect(parseStreamLine('data:[DONE]')).toEqual({ kind: 'done' });
  });

  it.each(['', ': OPENROUTER PROCESSING', 'event: message', 'id: 7', 'data: '])('should ignore %j', (line) => {
    expect(parseStreamLine(line)).toEqual({ kind: 'ignore' });
  });

  it('should report undecodable payloads', () => {
    const parsed = parseStreamLine('data: {"choices":');
    expect(parsed.kind).toBe('invalid');
    expect(parsed.kind === 'invalid' && parsed.payload).toBe('{"choices":');
  });

  it('should report payloads that fail validation', () => {
    expect(parseStreamLine('data: {"choices":"nope"}').kind).toBe('invalid');
  });

  it('should keep the text of an event with odd annotations', () => {
    const annotations = [{ url_citation: { title: 'Doc' } }, 42, { type: 'file', file: { name: 'a.pdf' } }];
    const parsed = parseStreamLine(`data: ${JSON.stringify({ choices: [{ delta: { content: 'cited', annotations } }] })}`);

    expect(parsed.kind).toBe('event');
    const chunk = parsed.kind === 'event' ? decodeStreamEvent(parsed.event, new ToolCallAccumulator(), context) : undefined;
    expect(chunk?.content).toBe('cited');
    expect(chunk?.annotations).toEqual([
      { type: '', urlCitation: { url: '', title: 'Doc' } },
      { type: 'file', file: { name: 'a.pdf', hash: '', content: [] } },
    ]);
  });
});

describe('decodeStreamEvent', () => {
  it('should skip events without choices, usage or error', () => {
    expect(decodeStreamEvent({ id: 'gen-1' }, new ToolCallAccumulator(), context)).toBeUndefined();
  });

  it('should prefer reasoning over reasoning_content', () => {
    const chunk = decodeStreamEvent(
      { choices: [{ delta: { reasoning: 'a', reasoning_content: 'b' } }] },
      new ToolCallAccumulator(),
      context
    );
    expect(chunk?.reasoning).toBe('a');
  });

  it('should emit usage-only events', () => {
    const chunk = decodeStreamEvent(
      { choices: [], usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 } },
      new ToolCallAccumulator(),
      context
    );
    expect(chunk).toEqual({
      content: '',
      reasoning: '',
      toolCalls: [],
      annotations: [],
      usage: { promptTokens: 3, completionTokens: 4, totalTokens: 7 },
    });
  });

  it('should attach an error for finish_reason error', () => {
    const chunk = decodeStreamEvent(
      { choices: [{ delta: { content: '' }, finish_reason: 'error' }] },
      new ToolCallAccumulator(),
      context
    );
    expect(chunk?.error).toBeInstanceOf(AIError);
    expect(chunk?.error?.detail).toBe('stream generation failed: error');
    expect(chunk?.error?.model).toBe('gpt-x');
  });

  it('should attach an in-band provider error', () => {
    const chunk = decodeStreamEvent(
      { error: { message: 'upstream overloaded', code: 'overloaded', type: '' } },
      new ToolCallAccumulator(),
      context
    );
    expect(chunk?.error?.errorCode).toBe('overloaded');
    expect(chunk?.error?.detail).toBe('upstream overloaded');
    expect(chunk?.error?.status).toBe(0);
  });
});

describe('decodeStream', () => {
  let logs: Array<{ message: string; level: LogLevel }>;

  beforeEach(() => {
    resetLoggers();
    logs = [];
    configureLogging({ destination: (message, level) => logs.push({ message, level }), includeTimestamp: false });
  });

  afterEach(() => {
    resetLoggers();
  });

  it('should emit one chunk per event and stop at [DONE]', async () => {
    const body = textStream([
      sseEvent(delta('Hel')),
      sseEvent(delta('lo')),
      sseEvent({ choices: [], usage: { prompt_tokens: 1, completion_tokens: 2, total_tokens: 3 } }),
      'data: [DONE]\n\n',
      sseEvent(delta('ignored')),
    ]);

    const summary = await collectStream(decodeStream(body, context));

    expect(summary.content).toBe('Hello');
    expect(summary.chunkCount).toBe(3);
    expect(summary.usage).toEqual({ promptTokens: 1, completionTokens: 2, totalTokens: 3 });
  });

  it('should skip an undecodable line between valid events', async () => {
    const body = textStream([sseEvent(delta('a')), 'data: {not json}\n\n', sseEvent(delta('b'))]);

    const summary = await collectStream(decodeStream(body, context));

    expect(summary.chunkCount).toBe(2);
    expect(summary.content).toBe('ab');
    const warnings = logs.filter((entry) => entry.level === LogLevel.WARN);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message).toContain('Skipping undecodable stream event');
  });

  it('should ignore comments and accept CRLF framing', async () => {
    const body = textStream([
      ': OPENROUTER PROCESSING\r\n\r\n',
      `event: message\r\ndata: ${JSON.stringify(delta('x'))}\r\n\r\n`,
      'data: [DONE]\r\n',
    ]);

    const summary = await collectStream(decodeStream(body, context));

    expect(summary.content).toBe('x');
    expect(summary.chunkCount).toBe(1);
  });

  it('should reassemble events split across reads', async () => {
    const event = sseEvent(delta('split'));
    const body = textStream([event.slice(0, 12), event.slice(12)]);

    const summary = await collectStream(decodeStream(body, context));

    expect(summary.content).toBe('split');
  });

  it('should rebuild tool calls from fragments', async () => {
    const body = textStream([
      sseEvent({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"a"' } }] } }] }),
      sseEvent({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: ':1}' } }] } }] }),
      sseEvent({
        choices: [
          {
            delta: { tool_calls: [{ index: 0, id: 'call_1', type: 'function', function: { name: 'f' } }] },
            finish_reason: 'tool_calls',
          },
        ],
      }),
      'data: [DONE]\n\n',
    ]);

    const chunks: Chunk[] = [];
    for await (const chunk of decodeStream(body, context)) {
      chunks.push(chunk);
    }

    expect(chunks.map((chunk) => chunk.toolCalls.length)).toEqual([0, 0, 1]);
    expect(chunks[2]?.toolCalls).toEqual([
      { id: 'call_1', type: 'function', function: { name: 'f', arguments: '{"a":1}' } },
    ]);
    expect(chunks[2]?.finishReason).toBe('tool_calls');
  });

  it('should deliver chunks read before a body failure, then end', async () => {
    const body = textStream([sseEvent(delta('partial'))], { error: new Error('connection reset') });

    const summary = await collectStream(decodeStream(body, context));

    expect(summary.content).toBe('partial');
    expect(summary.error).toBeUndefined();
    const errors = logs.filter((entry) => entry.level === LogLevel.ERROR);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.message).toContain('Stream read failed');
  });

  it('should cancel the body when the consumer breaks out', async () => {
    const onCancel = vi.fn();
    const body = textStream([sseEvent(delta('first')), sseEvent(delta('second'))], { hang: true, onCancel });
    const chunks = decodeStream(body, context);

    for await (const chunk of chunks) {
      expect(chunk.content).toBe('first');
      break;
    }

    expect(chunks.cancelled).toBe(true);
    await vi.waitFor(() => expect(onCancel).toHaveBeenCalledTimes(1));
  });

  it('should cancel the body on cancel()', async () => {
    const onCancel = vi.fn();
    const chunks = decodeStream(textStream([], { hang: true, onCancel }), context);

    chunks.cancel();

    expect((await collectStream(chunks)).chunkCount).toBe(0);
    await vi.waitFor(() => expect(onCancel).toHaveBeenCalledTimes(1));
  });

  it('should stop when the caller aborts', async () => {
    const onCancel = vi.fn();
    const controller = new AbortController();
    const chunks = decodeStream(textStream([sseEvent(delta('one'))], { hang: true, onCancel }), {
      ...context,
      signal: controller.signal,
    });
    const iterator = chunks[Symbol.asyncIterator]();

    const first = await iterator.next();
    expect(first.done).toBe(false);
    controller.abort();

    expect((await iterator.next()).done).toBe(true);
    await vi.waitFor(() => expect(onCancel).toHaveBeenCalledTimes(1));
  });

  it('should not start when the signal is already aborted', async () => {
    const onCancel = vi.fn();
    const chunks = decodeStream(textStream([sseEvent(delta('one'))], { onCancel }), {
      ...context,
      signal: AbortSignal.abort(),
    });

    expect(chunks.cancelled).toBe(true);
    expect((await collectStream(chunks)).chunkCount).toBe(0);
  });
});
