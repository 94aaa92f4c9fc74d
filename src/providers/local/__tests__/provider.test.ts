import { describe, it, expect } from 'vitest';
import { ModelNotFoundError } from '../../../core/errors/registry-errors.js';
import { userMessage } from '../../../core/types/message.js';
import { createModelInfo } from '../../../core/types/model-info.js';
import { jsonResponse } from '../../../__tests__/sse.js';
import { fakeFetch } from '../../__tests__/fake-fetch.js';
import { OpenAICompatibleProvider } from '../../openai-compatible/provider.js';
import { LocalProvider } from '../provider.js';

const mini = createModelInfo({ id: 'mini', provider: 'local' });

function setup(message: Record<string, unknown>) {
  const { fetch, requests } = fakeFetch(() => jsonResponse({ choices: [{ message }] }));
  const provider = new LocalProvider({
    name: 'local',
    baseURL: 'http://localhost:8080/v1',
    defaultModel: 'mini',
    models: [mini],
    fetch,
  });
  const request = provider.createRequest({ stream: false, messages: [userMessage('hi')], model: mini, params: {} });
  return { provider, request, requests };
}

describe('LocalProvider', () => {
  it('should serve the configured catalog without a network call', async () => {
    const { provider, requests } = setup({ content: '' });

    expect([...(await provider.getModels()).keys()]).toEqual(['mini']);
    expect(await provider.getModelInfo('mini')).toBe(mini);
    await expect(provider.getModelInfo('llama')).rejects.toBeInstanceOf(ModelNotFoundError);
    expect(requests).toHaveLength(0);
  });

  it('should not derive from the generic provider', () => {
    const { provider } = setup({ content: '' });
    expect(provider).not.toBeInstanceOf(OpenAICompatibleProvider);
  });

  it('should send requests without credentials', async () => {
    const { provider, request, requests } = setup({ content: 'hello' });

    await provider.ask(request);

    expect(requests[0]?.url).toBe('http://localhost:8080/v1/chat/completions');
    expect(requests[0]?.headers.has('authorization')).toBe(false);
  });

  it('should split inline reasoning out of the content', async () => {
    const { provider, request } = setup({ content: '<reasoning>the user greets</reasoning>\nHello!' });

    const result = await provider.ask(request);

    expect(result.content).toBe('Hello!');
    expect(result.reasoning).toBe('the user greets');
  });

  it('should keep a dedicated reasoning field as is', async () => {
    const { provider, request } = setup({ content: 'Answer Reasoning: kept inline', reasoning: 'separate' });

    const result = await provider.ask(request);

    expect(result.content).toBe('Answer Reasoning: kept inline');
    expect(result.reasoning).toBe('separate');
  });
});
