/**
 * Model Catalog Types
 *
 * Immutable description of a model offered by a provider: identity,
 * modalities, supported request parameters and pricing.
 *
 * @module model-info
 */

/**
 * Modalities a model reads or writes.
 */
export type Modality = 'text' | 'image' | 'file' | 'audio' | (string & {});

/**
 * Input/output capability flags reported by a provider.
 */
export interface ModelArchitecture {
  modality?: string;
  inputModalities: readonly Modality[];
  outputModalities: readonly Modality[];
  tokenizer?: string;
  instructType?: string | null;
}

/**
 * Per-token and per-request rates as decimal strings (USD).
 */
export interface ModelPricing {
  prompt: string;
  completion: string;
  image: string;
  webSearch: string;
}

/**
 * A model offered by a provider.
 *
 * Identified uniquely by `(provider, id)`. Instances are frozen by
 * {@link createModelInfo} and never mutated afterwards.
 */
export interface ModelInfo {
  readonly id: string;
  readonly provider: string;
  /** User-facing alias the model was selected through, if any */
  readonly alias?: string;
  readonly architecture?: Readonly<ModelArchitecture>;
  readonly pricing?: Readonly<ModelPricing>;
  readonly supportedParameters: readonly string[];
  /** Unix timestamp in seconds */
  readonly created?: number;
}

export type ModelInfoInit = {
  id: string;
  provider: string;
  alias?: string;
  architecture?: ModelArchitecture;
  pricing?: ModelPricing;
  supportedParameters?: readonly string[];
  created?: number;
};

/**
 * Pricing with every component set to zero.
 */
export const FREE_PRICING: Readonly<ModelPricing> = Object.freeze({
  prompt: '0',
  completion: '0',
  image: '0',
  webSearch: '0',
});

/**
 * Build a frozen ModelInfo.
 *
 * @example
 * ```typescript
 * const model = createModelInfo({ id: 'gpt-4o-mini', provider: 'openai' });
 * getFullName(model); // 'openai:gpt-4o-mini'
 * ```
 */
export function createModelInfo(init: ModelInfoInit): ModelInfo {
  const model: ModelInfo = {
    id: init.id,
    provider: init.provider,
    supportedParameters: Object.freeze([...(init.supportedParameters ?? [])]),
    ...(init.alias ? { alias: init.alias } : {}),
    ...(init.architecture
      ? {
          architecture: Object.freeze({
            ...init.architecture,
            inputModalities: Object.freeze([...init.architecture.inputModalities]),
            outputModalities: Object.freeze([...init.architecture.outputModalities]),
          }),
        }
      : {}),
    ...(init.pricing ? { pricing: Object.freeze({ ...init.pricing }) } : {}),
    ...(init.created !== undefined ? { created: init.created } : {}),
  };
  return Object.freeze(model);
}

/**
 * Copy of `model` carrying `alias` (or without one when `alias` is empty).
 */
export function withAlias(model: ModelInfo, alias: string | undefined): ModelInfo {
  const { alias: _previous, ...rest } = model;
  return createModelInfo({ ...rest, alias });
}

/**
 * Placeholder for a model the catalog does not know.
 */
export function createPlaceholderModel(id: string, provider: string): ModelInfo {
  return createModelInfo({ id, provider });
}

export function getFullName(model: ModelInfo): string {
  return `${model.provider}:${model.id}`;
}

/**
 * A model is free iff all four pricing components are exactly "0".
 */
export function isFreeModel(model: ModelInfo): boolean {
  const pricing = model.pricing;
  if (!pricing) {
    return false;
  }
  return (
    pricing.prompt === '0' &&
    pricing.completion === '0' &&
    pricing.image === '0' &&
    pricing.webSearch === '0'
  );
}

export function supportsTools(model: ModelInfo): boolean {
  return model.supportedParameters.includes('tools');
}

export function supportsInputModality(model: ModelInfo, modality: Modality): boolean {
  return model.architecture?.inputModalities.includes(modality) ?? false;
}

export function supportsOutputModality(model: ModelInfo, modality: Modality): boolean {
  return model.architecture?.outputModalities.includes(modality) ?? false;
}

export function supportsImageRecognition(model: ModelInfo): boolean {
  return supportsInputModality(model, 'image');
}

export function supportsImageGeneration(model: ModelInfo): boolean {
  return supportsOutputModality(model, 'image');
}

export function supportsFiles(model: ModelInfo): boolean {
  return supportsInputModality(model, 'file');
}

export function supportsAudioRecognition(model: ModelInfo): boolean {
  return supportsInputModality(model, 'audio');
}

export function supportsText(model: ModelInfo): boolean {
  return supportsInputModality(model, 'text') && supportsOutputModality(model, 'text');
}

export function isMultimodal(model: ModelInfo): boolean {
  return supportsImageRecognition(model) || supportsFiles(model) || supportsAudioRecognition(model);
}

/**
 * Creation date, or undefined when the provider did not report one.
 */
export function getCreatedAt(model: ModelInfo): Date | undefined {
  return model.created !== undefined ? new Date(model.created * 1000) : undefined;
}

function parsePrice(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const price = Number.parseFloat(value);
  return Number.isNaN(price) ? undefined : price;
}

export function getPromptPrice(model: ModelInfo): number | undefined {
  return parsePrice(model.pricing?.prompt);
}

export function getCompletionPrice(model: ModelInfo): number | undefined {
  return parsePrice(model.pricing?.completion);
}

const INPUT_BADGES: Record<string, string> = {
  text: '💬',
  image: '👁️',
  file: '📄',
  audio: '🎵',
};

const OUTPUT_BADGES: Record<string, string> = {
  text: '💬',
  image: '🖼️',
  file: '📄',
  audio: '🎵',
};

export const FREE_BADGE = '🆓';
export const TOOLS_BADGE = '🛠️';
export const UNKNOWN_MODALITIES_BADGE = '❓';

function badges(modalities: readonly string[] | undefined, table: Record<string, string>): string {
  return (modalities ?? []).map((modality) => table[modality] ?? '').join('');
}

/**
 * Compact badge string for model pickers: free marker, `input > output`
 * modalities, tools marker.
 *
 * @example
 * ```typescript
 * formatModelBadges(model); // '🆓💬👁️ > 💬🛠️'
 * ```
 */
export function formatModelBadges(model: ModelInfo): string {
  const input = badges(model.architecture?.inputModalities, INPUT_BADGES);
  const output = badges(model.architecture?.outputModalities, OUTPUT_BADGES);
  const modalities = input && output ? `${input} > ${output}` : UNKNOWN_MODALITIES_BADGE;
  return `${isFreeModel(model) ? FREE_BADGE : ''}${modalities}${supportsTools(model) ? TOOLS_BADGE : ''}`;
}
