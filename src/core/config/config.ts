/**
 * Configuration loading and lookups.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('./switchboard.json');
 * const params = getFullModelParams(config, 'openrouter', 'fast', 'translator');
 * ```
 *
 * @module config
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors/registry-errors.js';
import { toError } from '../errors/base-error.js';
import { createModelInfo, FREE_PRICING, type ModelInfo } from '../types/model-info.js';
import { layerModelParams, type ModelParams } from '../types/model-params.js';
import {
  type AliasConfig,
  type PromptConfig,
  type ProviderConfig,
  type SwitchboardConfig,
  switchboardConfigSchema,
} from './schema.js';

/**
 * Validate a configuration object.
 *
 * @throws {ConfigurationError} Listing every invalid field
 */
export function parseConfig(input: unknown): SwitchboardConfig {
  const result = switchboardConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid configuration: ${issues}`, result.error);
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file.
 *
 * @throws {ConfigurationError} If the file cannot be read, is not JSON, or is invalid
 */
export async function loadConfig(path: string): Promise<SwitchboardConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`cannot read configuration file ${path}`, toError(error));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`configuration file ${path} is not valid JSON`, toError(error));
  }

  return parseConfig(json);
}

/**
 * The provider's API key: `apiKey` when set, else the environment variable
 * named by `envApiKey`.
 */
export function resolveApiKey(
  provider: Pick<ProviderConfig, 'apiKey' | 'envApiKey'>,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (provider.apiKey) {
    return provider.apiKey;
  }
  if (provider.envApiKey) {
    return env[provider.envApiKey] || undefined;
  }
  return undefined;
}

export function getProviderConfig(config: SwitchboardConfig, name: string): ProviderConfig | undefined {
  return config.providers.find((provider) => provider.name === name);
}

export function getAlias(config: SwitchboardConfig, alias: string): AliasConfig | undefined {
  return config.aliases.find((entry) => entry.alias === alias);
}

/**
 * Find an enabled prompt by name or by one of its aliases.
 */
export function findPrompt(config: SwitchboardConfig, nameOrAlias: string): PromptConfig | undefined {
  return config.prompts.find(
    (prompt) => prompt.enabled && (prompt.name === nameOrAlias || prompt.aliases.includes(nameOrAlias))
  );
}

/**
 * Find an enabled prompt bound to a command.
 */
export function findPromptByCommand(config: SwitchboardConfig, command: string): PromptConfig | undefined {
  return config.prompts.find((prompt) => prompt.enabled && prompt.commands.includes(command));
}

/**
 * Split the global default spec into provider and model. A spec without a
 * provider yields an empty provider name.
 */
export function getDefaultProviderAndModel(config: SwitchboardConfig): { provider: string; model: string } {
  const separator = config.defaultModel.indexOf(':');
  if (separator === -1) {
    return { provider: '', model: config.defaultModel };
  }
  return {
    provider: config.defaultModel.slice(0, separator),
    model: config.defaultModel.slice(separator + 1),
  };
}

/**
 * Layer configured params: global, then provider, then alias, then prompt.
 * Unknown names are skipped. Stop sequences accumulate across layers.
 */
export function getFullModelParams(
  config: SwitchboardConfig,
  providerName?: string,
  aliasName?: string,
  promptName?: string
): ModelParams {
  let params: ModelParams = { ...config.modelParams };

  const provider = providerName ? getProviderConfig(config, providerName) : undefined;
  if (provider) {
    params = layerModelParams(params, provider.modelParams);
  }

  const alias = aliasName ? getAlias(config, aliasName) : undefined;
  if (alias) {
    params = layerModelParams(params, alias.modelParams);
  }

  const prompt = promptName ? findPrompt(config, promptName) : undefined;
  if (prompt) {
    params = layerModelParams(params, prompt.modelParams);
  }

  return params;
}

/**
 * Catalog entries for the models a provider declares in configuration.
 */
export function configuredModels(provider: ProviderConfig): ModelInfo[] {
  return provider.models.map((model) =>
    createModelInfo({
      id: model.model,
      provider: provider.name,
      architecture: {
        inputModalities: model.inputModalities,
        outputModalities: model.outputModalities,
      },
      supportedParameters: model.supportedParameters,
      ...(model.isFree ? { pricing: FREE_PRICING } : {}),
    })
  );
}
