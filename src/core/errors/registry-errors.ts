import { SwitchboardError } from './base-error.js';
import type { ModelInfo } from '../types/model-info.js';

/**
 * Thrown when a model specifier is not of the form `provider:model`.
 */
export class InvalidModelSpecError extends SwitchboardError {
  constructor(
    public readonly spec: string,
    cause?: Error
  ) {
    super(`invalid model format, expected provider:model: ${spec}`, cause, 'INVALID_MODEL_SPEC');
  }
}

/**
 * Thrown when no provider is registered under the requested name.
 */
export class ProviderNotFoundError extends SwitchboardError {
  constructor(public readonly providerName: string) {
    super(`provider not found: ${providerName}`, undefined, 'PROVIDER_NOT_FOUND');
  }
}

/**
 * Thrown when a model is absent from the configured models, the cache and the
 * live catalog.
 *
 * `placeholder` always holds a ModelInfo with the requested id and provider and
 * no capability data, so callers that tolerate unknown models can continue.
 */
export class ModelNotFoundError extends SwitchboardError {
  constructor(
    public readonly placeholder: ModelInfo,
    cause?: Error
  ) {
    super(`model not found: ${placeholder.provider}:${placeholder.id}`, cause, 'MODEL_NOT_FOUND');
  }
}

/**
 * Thrown when configuration fails validation or cannot be read.
 */
export class ConfigurationError extends SwitchboardError {
  constructor(message: string, cause?: Error) {
    super(message, cause, 'CONFIG_INVALID');
  }
}
