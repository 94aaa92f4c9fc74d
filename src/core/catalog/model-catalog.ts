/**
 * Per-provider model catalog with a time-limited cache.
 *
 * Three sources, consulted in order:
 *
 * 1. Models declared in configuration. Always present, never expire, and
 *    win over a live entry with the same id.
 * 2. The cache of the last live listing, while younger than the TTL.
 * 3. A live listing from the provider, which replaces the cache wholesale.
 *
 * @module model-catalog
 */

import { AIError } from '../errors/ai-error.js';
import { toError } from '../errors/base-error.js';
import { ModelNotFoundError } from '../errors/registry-errors.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { createPlaceholderModel, isFreeModel, type ModelInfo } from '../types/model-info.js';

/** Cache lifetime after the last successful live listing. */
export const MODEL_CACHE_TTL_MS = 30 * 60 * 1000;

export type ModelMap = ReadonlyMap<string, ModelInfo>;

/**
 * Fetches the provider's live model listing.
 */
export type ModelFetcher = (signal?: AbortSignal) => Promise<ModelInfo[]>;

export interface ModelCatalogOptions {
  provider: string;
  /** Models declared in configuration */
  configuredModels?: readonly ModelInfo[];
  /** Live listing; without one the catalog serves configured models only */
  fetchModels?: ModelFetcher;
  /** Serve configured models only, even when a live listing exists */
  overrideModels?: boolean;
  /** Narrow every live listing to free models and cache the narrowed set */
  onlyFree?: boolean;
  ttlMs?: number;
  /** Clock in milliseconds, for tests */
  now?: () => number;
  logger?: Logger;
}

export interface GetModelsOptions {
  /** Return only free models */
  onlyFree?: boolean;
  /** Skip the cache and fetch a live listing */
  forceFresh?: boolean;
  signal?: AbortSignal;
}

/**
 * A live listing in progress and the callers still waiting for it.
 */
interface SharedFetch {
  readonly promise: Promise<ModelInfo[]>;
  readonly controller: AbortController;
  waiters: number;
}

const EMPTY: ModelMap = Object.freeze(new Map<string, ModelInfo>());

function toMap(models: Iterable<ModelInfo>): Map<string, ModelInfo> {
  const map = new Map<string, ModelInfo>();
  for (const model of models) {
    map.set(model.id, model);
  }
  return map;
}

export function filterFreeModels(models: ModelMap): ModelMap {
  return toMap([...models.values()].filter(isFreeModel));
}

export class ModelCatalog {
  readonly provider: string;
  readonly onlyFree: boolean;

  private readonly configured: ModelMap;
  private readonly fetchModels?: ModelFetcher;
  private readonly overrideModels: boolean;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private cache: ModelMap = EMPTY;
  private lastSync: number | undefined;
  private inflight: SharedFetch | undefined;

  constructor(options: ModelCatalogOptions) {
    this.provider = options.provider;
    this.configured = toMap(options.configuredModels ?? []);
    this.fetchModels = options.fetchModels;
    this.overrideModels = options.overrideModels ?? false;
    this.onlyFree = options.onlyFree ?? false;
    this.ttlMs = options.ttlMs ?? MODEL_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? getLogger('switchboard.catalog')).child({ provider: options.provider });
  }

  /**
   * Whether the catalog ever talks to the provider.
   */
  get hasLiveSource(): boolean {
    return this.fetchModels !== undefined && !this.overrideModels;
  }

  /**
   * True while the cache is populated and younger than the TTL.
   */
  isFresh(): boolean {
    return this.cache.size > 0 && this.lastSync !== undefined && this.now() - this.lastSync < this.ttlMs;
  }

  /**
   * Drop the cache so the next read performs a live listing.
   */
  invalidate(): void {
    this.cache = EMPTY;
    this.lastSync = undefined;
  }

  /**
   * List models.
   *
   * A fresh, non-empty cache answers unless `forceFresh` is set. Otherwise
   * the live listing is fetched, configured models are merged in, the result
   * is narrowed to free models when the provider or the caller asks for it,
   * and the result is cached unless it is a free-only view requested ad hoc
   * from a provider that is not free-only.
   *
   * @throws {AIError} If the live listing fails
   */
  async getModels(options: GetModelsOptions = {}): Promise<ModelMap> {
    const wantFree = options.onlyFree ?? false;

    if (!this.fetchModels || this.overrideModels) {
      return wantFree || this.onlyFree ? filterFreeModels(this.configured) : this.configured;
    }

    if (!options.forceFresh && this.isFresh()) {
      return wantFree ? filterFreeModels(this.cache) : this.cache;
    }

    const live = await this.fetchShared(this.fetchModels, options.signal);

    const merged = toMap(live);
    for (const [id, model] of this.configured) {
      merged.set(id, model);
    }

    const result: ModelMap = wantFree || this.onlyFree ? filterFreeModels(merged) : merged;

    if (this.onlyFree || !wantFree) {
      this.cache = Object.freeze(result);
      this.lastSync = this.now();
      this.logger.debug('Model catalog refreshed', { models: result.size });
    }

    return result;
  }

  /**
   * Look a model up by id.
   *
   * @throws {ModelNotFoundError} If no source knows the id; carries a placeholder model
   * @throws {AIError} If the live listing fails
   */
  async getModelInfo(name: string, signal?: AbortSignal): Promise<ModelInfo> {
    const configured = this.configured.get(name);
    if (configured) {
      return configured;
    }

    if (this.isFresh()) {
      const cached = this.cache.get(name);
      if (cached) {
        return cached;
      }
    }

    if (this.hasLiveSource) {
      const models = await this.getModels({ forceFresh: true, signal });
      const live = models.get(name);
      if (live) {
        return live;
      }
    }

    throw new ModelNotFoundError(createPlaceholderModel(name, this.provider));
  }

  /**
   * Concurrent live listings share one request, run under the catalog's own
   * signal. A caller's signal only ends that caller's wait; the request is
   * aborted once every waiter has given up.
   */
  private fetchShared(fetchModels: ModelFetcher, signal?: AbortSignal): Promise<ModelInfo[]> {
    if (signal?.aborted) {
      return Promise.reject(this.abortError(signal));
    }

    let shared = this.inflight;
    if (!shared) {
      this.logger.debug('Fetching live model listing');
      const controller = new AbortController();
      const entry: SharedFetch = {
        controller,
        waiters: 0,
        promise: fetchModels(controller.signal).finally(() => {
          if (this.inflight === entry) {
            this.inflight = undefined;
          }
        }),
      };
      this.inflight = entry;
      shared = entry;
    }

    return this.waitFor(shared, signal);
  }

  private waitFor(shared: SharedFetch, signal?: AbortSignal): Promise<ModelInfo[]> {
    shared.waiters += 1;
    if (!signal) {
      return shared.promise;
    }

    return new Promise<ModelInfo[]>((resolve, reject) => {
      const onAbort = (): void => {
        shared.waiters -= 1;
        if (shared.waiters === 0) {
          if (this.inflight === shared) {
            this.inflight = undefined;
          }
          shared.controller.abort(signal.reason);
        }
        reject(this.abortError(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      shared.promise.then(
        (models) => {
          signal.removeEventListener('abort', onAbort);
          resolve(models);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private abortError(signal: AbortSignal): AIError {
    return new AIError({ provider: this.provider, detail: 'request aborted', cause: toError(signal.reason) });
  }
}
