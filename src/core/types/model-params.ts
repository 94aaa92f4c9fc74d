/**
 * Generation parameters and their layering rules.
 *
 * Every field is optional and nullable: an absent or null field means
 * "inherit". Layers combine with {@link mergeModelParams}.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/registry-errors.js';

/**
 * Reasoning-token controls (OpenRouter-style unified reasoning object).
 */
export interface ReasoningParams {
  enabled?: boolean | null;
  /** Exclude reasoning tokens from the response */
  exclude?: boolean | null;
  /** Token budget (Anthropic-style); takes priority over `effort` on the wire */
  maxTokens?: number | null;
  /** Effort level (OpenAI-style) */
  effort?: 'low' | 'medium' | 'high' | null;
}

/**
 * AI model settings for chat completion.
 */
export interface ModelParams {
  stream?: boolean | null;
  /** Sampling temperature, 0.0 to 2.0 */
  temperature?: number | null;
  /** Maximum number of tokens to generate (positive integer) */
  maxTokens?: number | null;
  /** Nucleus sampling mass, 0.0 to 1.0 */
  topP?: number | null;
  /** -2.0 to 2.0 */
  frequencyPenalty?: number | null;
  /** -2.0 to 2.0 */
  presencePenalty?: number | null;
  stopSequences?: string[] | null;
  reasoning?: ReasoningParams | null;
}

export const reasoningParamsSchema = z
  .object({
    enabled: z.boolean().nullish(),
    exclude: z.boolean().nullish(),
    maxTokens: z.number().int().positive().nullish(),
    effort: z.enum(['low', 'medium', 'high']).nullish(),
  })
  .strict();

/**
 * Validation schema for {@link ModelParams}.
 */
export const modelParamsSchema = z
  .object({
    stream: z.boolean().nullish(),
    temperature: z.number().min(0).max(2).nullish(),
    maxTokens: z.number().int().positive().nullish(),
    topP: z.number().min(0).max(1).nullish(),
    frequencyPenalty: z.number().min(-2).max(2).nullish(),
    presencePenalty: z.number().min(-2).max(2).nullish(),
    stopSequences: z.array(z.string()).nullish(),
    reasoning: reasoningParamsSchema.nullish(),
  })
  .strict();

/**
 * Validate untrusted parameters (configuration, persisted overrides).
 *
 * @throws {ConfigurationError} If a field has the wrong type or is out of range
 */
export function parseModelParams(input: unknown, source = 'model params'): ModelParams {
  const result = modelParamsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`${source}: ${issues}`, result.error);
  }
  return result.data;
}

/**
 * Right-biased field-wise override: each non-null field of `override`
 * replaces the field of `base`; null or absent fields leave `base` untouched.
 *
 * The merge is associative and idempotent. `reasoning` is replaced as a whole.
 *
 * @example
 * ```typescript
 * mergeModelParams({ temperature: 0.2, maxTokens: 500 }, { temperature: 0.9, maxTokens: null });
 * // { temperature: 0.9, maxTokens: 500 }
 * ```
 */
export function mergeModelParams(base: ModelParams, override: ModelParams): ModelParams {
  const merged: ModelParams = { ...base };
  if (override.stream != null) merged.stream = override.stream;
  if (override.temperature != null) merged.temperature = override.temperature;
  if (override.maxTokens != null) merged.maxTokens = override.maxTokens;
  if (override.topP != null) merged.topP = override.topP;
  if (override.frequencyPenalty != null) merged.frequencyPenalty = override.frequencyPenalty;
  if (override.presencePenalty != null) merged.presencePenalty = override.presencePenalty;
  if (override.stopSequences != null) merged.stopSequences = override.stopSequences;
  if (override.reasoning != null) merged.reasoning = override.reasoning;
  return merged;
}

/**
 * Layer configuration params. Unlike {@link mergeModelParams}, stop sequences
 * accumulate across layers instead of being replaced.
 */
export function layerModelParams(base: ModelParams, layer: ModelParams): ModelParams {
  const merged = mergeModelParams(base, layer);
  if (base.stopSequences && layer.stopSequences) {
    merged.stopSequences = [...base.stopSequences, ...layer.stopSequences];
  }
  return merged;
}

const snakeReasoningSchema = z
  .object({
    enabled: z.boolean().nullish(),
    exclude: z.boolean().nullish(),
    max_tokens: z.number().int().positive().nullish(),
    effort: z.enum(['low', 'medium', 'high']).nullish(),
  })
  .passthrough();

const snakeParamsSchema = z
  .object({
    stream: z.boolean().nullish(),
    temperature: z.number().nullish(),
    max_tokens: z.number().nullish(),
    top_p: z.number().nullish(),
    frequency_penalty: z.number().nullish(),
    presence_penalty: z.number().nullish(),
    stop_sequences: z.array(z.string()).nullish(),
    reasoning: snakeReasoningSchema.nullish(),
  })
  .passthrough();

/**
 * Build params from a snake_case record such as a persisted per-chat
 * override. Unknown keys are ignored; the result is range-checked.
 *
 * @throws {ConfigurationError} If a known key holds an invalid value
 */
export function modelParamsFromRecord(record: Record<string, unknown>): ModelParams {
  const result = snakeParamsSchema.safeParse(record);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`model params record: ${issues}`, result.error);
  }
  const data = result.data;
  const params: ModelParams = {};
  if (data.stream != null) params.stream = data.stream;
  if (data.temperature != null) params.temperature = data.temperature;
  if (data.max_tokens != null) params.maxTokens = data.max_tokens;
  if (data.top_p != null) params.topP = data.top_p;
  if (data.frequency_penalty != null) params.frequencyPenalty = data.frequency_penalty;
  if (data.presence_penalty != null) params.presencePenalty = data.presence_penalty;
  if (data.stop_sequences != null) params.stopSequences = data.stop_sequences;
  if (data.reasoning != null) {
    const reasoning: ReasoningParams = {};
    if (data.reasoning.enabled != null) reasoning.enabled = data.reasoning.enabled;
    if (data.reasoning.exclude != null) reasoning.exclude = data.reasoning.exclude;
    if (data.reasoning.max_tokens != null) reasoning.maxTokens = data.reasoning.max_tokens;
    if (data.reasoning.effort != null) reasoning.effort = data.reasoning.effort;
    params.reasoning = reasoning;
  }
  return parseModelParams(params, 'model params record');
}
