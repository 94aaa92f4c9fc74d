import type { SwitchboardConfig } from '../config/schema.js';
import { getFullModelParams } from '../config/config.js';
import { mergeModelParams, type ModelParams } from '../types/model-params.js';

export interface MergeParamsRequest {
  /** 0 when the call is not tied to a chat */
  chatId: number;
  provider: string;
  alias?: string;
  prompt?: string;
  /** Caller overrides, applied last */
  params: ModelParams;
}

/**
 * Per-chat model choice and parameter overrides, owned by the application.
 */
export interface ChatSettings {
  /**
   * The `provider:model` spec stored for a chat, if any.
   */
  getCurrentModelSpec(chatId: number): Promise<string | undefined>;

  /**
   * Configuration defaults for (provider, alias, prompt), then stored chat
   * overrides, then the caller's params.
   */
  mergeModelParams(request: MergeParamsRequest): Promise<ModelParams>;
}

/**
 * In-memory {@link ChatSettings}.
 *
 * @example
 * ```typescript
 * const settings = new InMemoryChatSettings(config);
 * settings.setModelSpec(42, 'local:mini');
 * settings.setChatParams(42, { temperature: 0.3 });
 * registry.setChatSettings(settings);
 * ```
 */
export class InMemoryChatSettings implements ChatSettings {
  private specs = new Map<number, string>();
  private params = new Map<number, ModelParams>();

  constructor(private readonly config: SwitchboardConfig) {}

  setModelSpec(chatId: number, spec: string): void {
    const next = new Map(this.specs);
    next.set(chatId, spec);
    this.specs = next;
  }

  setChatParams(chatId: number, params: ModelParams): void {
    const next = new Map(this.params);
    next.set(chatId, { ...params });
    this.params = next;
  }

  clear(chatId: number): void {
    const specs = new Map(this.specs);
    specs.delete(chatId);
    const params = new Map(this.params);
    params.delete(chatId);
    this.specs = specs;
    this.params = params;
  }

  async getCurrentModelSpec(chatId: number): Promise<string | undefined> {
    return this.specs.get(chatId);
  }

  async mergeModelParams(request: MergeParamsRequest): Promise<ModelParams> {
    const configured = getFullModelParams(this.config, request.provider, request.alias, request.prompt);
    const stored = this.params.get(request.chatId) ?? {};
    return mergeModelParams(mergeModelParams(configured, stored), request.params);
  }
}
