import { z } from 'zod';
import { LogLevel } from '../logging/logger.js';
import { modelParamsSchema } from '../types/model-params.js';

export const PROVIDER_TYPES = ['openai-compatible', 'openrouter', 'local'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * A model declared in configuration. Such entries are always part of the
 * provider's catalog and win over live entries with the same id.
 */
export const modelConfigSchema = z.object({
  model: z.string().min(1),
  inputModalities: z.array(z.string()).default([]),
  outputModalities: z.array(z.string()).default([]),
  supportedParameters: z.array(z.string()).default([]),
  isFree: z.boolean().default(false),
});

export const providerConfigSchema = z.object({
  type: z.enum(PROVIDER_TYPES),
  name: z.string().min(1).regex(/^[^:]+$/, 'provider name must not contain ":"'),
  baseUrl: z.string().url().optional(),
  /** Path of the chat-completions endpoint relative to `baseUrl` */
  chatPath: z.string().optional(),
  apiKey: z.string().optional(),
  /** Environment variable holding the API key, used when `apiKey` is empty */
  envApiKey: z.string().optional(),
  defaultModel: z.string().default(''),
  onlyFreeModels: z.boolean().default(false),
  overrideModels: z.boolean().default(false),
  modelParams: modelParamsSchema.default({}),
  models: z.array(modelConfigSchema).default([]),
  headers: z.record(z.string()).default({}),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  /** Sent as X-Title (openrouter) */
  appTitle: z.string().optional(),
  /** Sent as HTTP-Referer (openrouter) */
  httpReferer: z.string().optional(),
});

export const aliasConfigSchema = z.object({
  alias: z.string().min(1),
  /** Model id, or a full `provider:model` spec */
  model: z.string().min(1),
  modelParams: modelParamsSchema.default({}),
});

export const promptConfigSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  description: z.string().default(''),
  text: z.string().default(''),
  aliases: z.array(z.string()).default([]),
  commands: z.array(z.string()).default([]),
  modelParams: modelParamsSchema.default({}),
});

export const loggingConfigSchema = z.object({
  level: z.nativeEnum(LogLevel).optional(),
  format: z.enum(['json', 'text']).optional(),
  includeTimestamp: z.boolean().optional(),
  includeLoggerName: z.boolean().optional(),
});

export const switchboardConfigSchema = z
  .object({
    /** Global default `provider:model` spec */
    defaultModel: z.string().default(''),
    modelParams: modelParamsSchema.default({}),
    providers: z.array(providerConfigSchema).default([]),
    aliases: z.array(aliasConfigSchema).default([]),
    prompts: z.array(promptConfigSchema).default([]),
    logging: loggingConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.providers.forEach((provider, index) => {
      if (seen.has(provider.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers', index, 'name'],
          message: `duplicate provider name: ${provider.name}`,
        });
      }
      seen.add(provider.name);
    });
  });

export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type ProviderConfigInput = z.input<typeof providerConfigSchema>;
export type AliasConfig = z.infer<typeof aliasConfigSchema>;
export type PromptConfig = z.infer<typeof promptConfigSchema>;
export type SwitchboardConfig = z.infer<typeof switchboardConfigSchema>;
export type SwitchboardConfigInput = z.input<typeof switchboardConfigSchema>;
