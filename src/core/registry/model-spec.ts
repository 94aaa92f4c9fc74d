/**
 * A `provider:model` specifier split into its parts.
 */
export interface ModelSpec {
  provider: string;
  model: string;
}

/**
 * Split a spec on its first `:`. The model part may itself contain `:`
 * (`openrouter:vendor/model:free`) and may be empty, meaning the provider's
 * default model.
 *
 * @returns undefined when there is no `:` or the provider part is empty
 */
export function parseModelSpec(spec: string): ModelSpec | undefined {
  const separator = spec.indexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  return { provider: spec.slice(0, separator), model: spec.slice(separator + 1) };
}

export function formatModelSpec(spec: ModelSpec): string {
  return `${spec.provider}:${spec.model}`;
}
