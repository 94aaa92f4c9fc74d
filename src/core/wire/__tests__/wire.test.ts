import { describe, it, expect } from 'vitest';
import type { CompletionRequest } from '../../types/completion.js';
import { filePart, imagePart, textPart, toolMessage, userMessage, assistantMessage } from '../../types/message.js';
import { createModelInfo } from '../../types/model-info.js';
import { encodeMessage, encodeRequest } from '../encode.js';
import { completionResponseFromWire, messageFromWire, modelInfoFromWire } from '../decode.js';
import { completionResponseSchema, wireModelSchema } from '../schemas.js';

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    model: 'gpt-x',
    messages: [userMessage('hi')],
    stream: false,
    plugins: [],
    usage: { include: true },
    modelInfo: createModelInfo({ id: 'gpt-x', provider: 'openai' }),
    webSearch: false,
    ...overrides,
  };
}

describe('encodeMessage', () => {
  it('should send string content as is', () => {
    expect(encodeMessage(userMessage('hi'))).toEqual({ role: 'user', content: 'hi' });
  });

  it('should send parts in snake_case', () => {
    const message = userMessage([textPart('look'), imagePart('https://example.com/a.png', 'low'), filePart('a.pdf', 'AA==')]);
    expect(encodeMessage(message)).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'look' },
        { type: 'image_url', image_url: { url: 'https://example.com/a.png', detail: 'low' } },
        { type: 'file', file: { filename: 'a.pdf', file_data: 'AA==' } },
      ],
    });
  });

  it('should send an empty part list as empty text', () => {
    expect(encodeMessage(userMessage([]))).toEqual({ role: 'user', content: '' });
  });

  it('should carry tool call fields', () => {
    const call = { id: 'call_1', type: 'function', function: { name: 'weather', arguments: '{}' } };
    expect(encodeMessage(assistantMessage('', [call]))).toEqual({ role: 'assistant', content: '', tool_calls: [call] });
    expect(encodeMessage(toolMessage('call_1', 'sunny'))).toEqual({ role: 'tool', content: 'sunny', tool_call_id: 'call_1' });
  });
});

describe('encodeRequest', () => {
  it('should write the minimal body', () => {
    expect(encodeRequest(request())).toEqual({
      model: 'gpt-x',
      messages: [{ role: 'user', content: 'hi' }],
      stream: false,
      usage: { include: true },
    });
  });

  it('should map params, plugins and routing', () => {
    const body = encodeRequest(
      request({
        temperature: 0.4,
        maxTokens: 100,
        topP: 0.9,
        stopSequences: ['END'],
        reasoning: { effort: 'high', maxTokens: 50, exclude: true },
        plugins: [{ id: 'web', maxResults: 2 }, { id: 'file-parser', pdf: { engine: 'pdf-text' } }],
        provider: { sort: 'price' },
      })
    );
    expect(body).toMatchObject({
      temperature: 0.4,
      max_tokens: 100,
      top_p: 0.9,
      stop: ['END'],
      reasoning: { exclude: true, max_tokens: 50 },
      plugins: [
        { id: 'web', max_results: 2 },
        { id: 'file-parser', pdf: { engine: 'pdf-text' } },
      ],
      provider: { sort: 'price' },
    });
  });

  it('should drop empty stop lists and empty reasoning', () => {
    const body = encodeRequest(request({ stopSequences: [], reasoning: {} }));
    expect(body).not.toHaveProperty('stop');
    expect(body).not.toHaveProperty('reasoning');
  });

  it('should send effort when no token budget is set', () => {
    expect(encodeRequest(request({ reasoning: { effort: 'low' } })).reasoning).toEqual({ effort: 'low' });
  });
});

describe('completionResponseFromWire', () => {
  it('should decode a response with tool calls, usage and annotations', () => {
    const wire = completionResponseSchema.parse({
      id: 'gen-1',
      model: 'gpt-x',
      choices: [
        {
          message: {
            role: 'assistant',
            content: null,
            reasoning_content: 'thinking',
            tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'weather', arguments: '{"city":"Oslo"}' } }],
          },
          finish_reason: 'tool_calls',
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15, cost: 0.001 },
      annotations: [{ type: 'url_citation', url_citation: { url: 'https://example.com', title: 'Example' } }],
    });

    expect(completionResponseFromWire(wire)).toEqual({
      id: 'gen-1',
      model: 'gpt-x',
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content: '',
            reasoningContent: 'thinking',
            toolCalls: [{ id: 'call_1', type: 'function', function: { name: 'weather', arguments: '{"city":"Oslo"}' } }],
          },
          finishReason: 'tool_calls',
        },
      ],
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15, cost: 0.001 },
      annotations: [{ type: 'url_citation', urlCitation: { url: 'https://example.com', title: 'Example' } }],
    });
  });

  it('should read numeric error codes as strings', () => {
    const wire = completionResponseSchema.parse({ error: { message: 'quota', code: 402 } });
    expect(wire.error?.code).toBe('402');
  });
});

describe('modelInfoFromWire', () => {
  it('should map a listing entry', () => {
    const model = modelInfoFromWire(
      wireModelSchema.parse({
        id: 'vendor/free-model:free',
        created: 1700000000,
        architecture: { input_modalities: ['text', 'image'], output_modalities: ['text'], instruct_type: null },
        pricing: { prompt: '0', completion: '0', image: 0, web_search: '0' },
        supported_parameters: ['tools'],
      }),
      'openrouter'
    );
    expect(model).toEqual({
      id: 'vendor/free-model:free',
      provider: 'openrouter',
      created: 1700000000,
      architecture: { inputModalities: ['text', 'image'], outputModalities: ['text'], instructType: null },
      pricing: { prompt: '0', completion: '0', image: '0', webSearch: '0' },
      supportedParameters: ['tools'],
    });
  });

  it('should tolerate missing optional fields', () => {
    expect(modelInfoFromWire(wireModelSchema.parse({ id: 'mini' }), 'local')).toEqual({
      id: 'mini',
      provider: 'local',
      supportedParameters: [],
    });
  });
});

describe('messageFromWire', () => {
  it('should decode text, parts and null content', () => {
    expect(messageFromWire({ role: 'user', content: 'hi' })).toEqual({ role: 'user', content: 'hi' });
    expect(messageFromWire({ role: 'assistant', content: null })).toEqual({ role: 'assistant', content: '' });
    expect(
      messageFromWire({ role: 'user', content: [{ type: 'input_audio', input_audio: { data: 'AA==', format: 'wav' } }] })
    ).toEqual({ role: 'user', content: [{ type: 'input_audio', inputAudio: { data: 'AA==', format: 'wav' } }] });
  });

  it('should reject values that are not messages', () => {
    expect(() => messageFromWire({ role: 'robot', content: 'hi' })).toThrow();
  });
});
