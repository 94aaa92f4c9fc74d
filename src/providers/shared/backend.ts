/**
 * Building blocks every provider is assembled from.
 *
 * @module providers/shared/backend
 */

import { ModelCatalog } from '../../core/catalog/model-catalog.js';
import { getLogger, type Logger } from '../../core/logging/logger.js';
import type { ModelInfo } from '../../core/types/model-info.js';
import { CompletionClient } from './completion-client.js';
import { HttpTransport, type FetchFunction } from './transport.js';

/**
 * Settings shared by every provider built on {@link CompletionClient}.
 */
export interface BackendConfig {
  name: string;
  baseURL: string;
  apiKey?: string;
  defaultModel?: string;
  /** Chat-completions path relative to `baseURL` */
  chatPath?: string;
  /** Models declared in configuration */
  models?: readonly ModelInfo[];
  /** Serve configured models only */
  overrideModels?: boolean;
  /** Fetch the catalog from `GET /models`. Defaults to true. */
  liveCatalog?: boolean;
  onlyFreeModels?: boolean;
  defaultHeaders?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
  fetch?: FetchFunction;
  /** Clock for the catalog TTL, in milliseconds */
  now?: () => number;
  logger?: Logger;
}

export interface Backend {
  client: CompletionClient;
  catalog: ModelCatalog;
}

/**
 * Transport, completion client and catalog for one provider.
 */
export function createBackend(config: BackendConfig): Backend {
  const logger = config.logger ?? getLogger(`switchboard.providers.${config.name}`);

  const transport = new HttpTransport({
    provider: config.name,
    baseURL: config.baseURL,
    apiKey: config.apiKey,
    defaultHeaders: config.defaultHeaders,
    timeout: config.timeout,
    maxRetries: config.maxRetries,
    fetch: config.fetch,
    logger,
  });
  const client = new CompletionClient({ provider: config.name, transport, chatPath: config.chatPath, logger });
  const catalog = new ModelCatalog({
    provider: config.name,
    configuredModels: config.models,
    fetchModels: config.liveCatalog === false ? undefined : (signal) => client.listModels(signal),
    overrideModels: config.overrideModels,
    onlyFree: config.onlyFreeModels,
    now: config.now,
    logger,
  });

  return { client, catalog };
}
