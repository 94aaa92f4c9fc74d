import { describe, it, expect } from 'vitest';
import { parseConfig } from '../../config/config.js';
import { InMemoryChatSettings } from '../chat-settings.js';

const config = parseConfig({
  modelParams: { temperature: 0.7, stopSequences: ['<END>'] },
  providers: [{ type: 'openrouter', name: 'openrouter', modelParams: { maxTokens: 512 } }],
  aliases: [{ alias: 'precise', model: 'openrouter:vendor/model', modelParams: { temperature: 0 } }],
});

describe('InMemoryChatSettings', () => {
  it('should return undefined for chats without a stored model', async () => {
    const settings = new InMemoryChatSettings(config);
    expect(await settings.getCurrentModelSpec(1)).toBeUndefined();
  });

  it('should store and clear per-chat state', async () => {
    const settings = new InMemoryChatSettings(config);
    settings.setModelSpec(1, 'openrouter:vendor/model');
    settings.setChatParams(1, { temperature: 1.1 });

    expect(await settings.getCurrentModelSpec(1)).toBe('openrouter:vendor/model');

    settings.clear(1);

    expect(await settings.getCurrentModelSpec(1)).toBeUndefined();
    expect(await settings.mergeModelParams({ chatId: 1, provider: 'openrouter', params: {} })).toEqual({
      temperature: 0.7,
      maxTokens: 512,
      stopSequences: ['<END>'],
    });
  });

  it('should apply configuration, then chat overrides, then caller params', async () => {
    const settings = new InMemoryChatSettings(config);
    settings.setChatParams(5, { temperature: 1.1, stopSequences: ['STOP'] });

    const merged = await settings.mergeModelParams({
      chatId: 5,
      provider: 'openrouter',
      alias: 'precise',
      params: { maxTokens: 64 },
    });

    expect(merged).toEqual({ temperature: 1.1, maxTokens: 64, stopSequences: ['STOP'] });
  });

  it('should copy stored params', async () => {
    const settings = new InMemoryChatSettings(config);
    const params = { temperature: 0.2 };
    settings.setChatParams(9, params);
    params.temperature = 1.9;

    const merged = await settings.mergeModelParams({ chatId: 9, provider: 'none', params: {} });

    expect(merged.temperature).toBe(0.2);
  });
});
