/**
 * HTTP transport shared by every provider.
 *
 * Built on the OpenAI SDK client, which handles bearer auth, base-URL
 * resolution, timeouts and status checking. Outgoing bodies are logged at
 * debug level with large fields truncated. Every failure is mapped to an
 * {@link AIError}.
 *
 * @module providers/shared/transport
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import { AIError } from '../../core/errors/ai-error.js';
import { toError } from '../../core/errors/base-error.js';
import { getLogger, LogLevel, type Logger } from '../../core/logging/logger.js';
import { isRecord } from '../../core/types/completion.js';
import type { WireObject } from '../../core/wire/encode.js';
import { providerErrorSchema } from '../../core/wire/schemas.js';

export type FetchFunction = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 60_000;

const TRUNCATED_KEYS = new Set(['url', 'content', 'text', 'file_data']);
const TRUNCATE_LIMIT = 1000;
const TRUNCATION_SUFFIX = '...[truncated]';

/**
 * Copy of a JSON value with long `url`, `content`, `text` and `file_data`
 * strings cut to 1000 characters, at any depth.
 *
 * @example
 * ```typescript
 * truncateLargeFields({ file_data: 'x'.repeat(5000) });
 * // { file_data: 'xxx…x...[truncated]' } (1000 x's)
 * ```
 */
export function truncateLargeFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(truncateLargeFields);
  }
  if (!isRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (typeof field === 'string' && TRUNCATED_KEYS.has(key) && field.length > TRUNCATE_LIMIT) {
      result[key] = field.slice(0, TRUNCATE_LIMIT) + TRUNCATION_SUFFIX;
    } else {
      result[key] = truncateLargeFields(field);
    }
  }
  return result;
}

export interface HttpTransportConfig {
  /** Provider name used in errors and logs */
  provider: string;
  baseURL: string;
  /** Bearer token; requests go out without Authorization when empty */
  apiKey?: string;
  defaultHeaders?: Record<string, string>;
  /** Request timeout in milliseconds. Defaults to 60000. */
  timeout?: number;
  /** Retries for failed requests. Defaults to 0; retry policy belongs to the caller. */
  maxRetries?: number;
  /** Underlying fetch implementation. Defaults to the global fetch. */
  fetch?: FetchFunction;
  logger?: Logger;
}

export interface TransportRequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Model the request targets, attached to errors */
  model?: string;
}

/**
 * Map anything the SDK or fetch throws to an AIError.
 */
export function toAIError(error: unknown, provider: string, model?: string): AIError {
  if (error instanceof AIError) {
    return model ? error.withModel(model) : error;
  }

  if (error instanceof APIUserAbortError) {
    return new AIError({ provider, model, detail: 'request aborted', cause: error });
  }

  if (error instanceof APIConnectionError) {
    return new AIError({
      provider,
      model,
      detail: 'network request failed',
      cause: error,
      transportFailure: true,
    });
  }

  if (error instanceof APIError && typeof error.status === 'number') {
    const parsed = providerErrorSchema.safeParse(error.error);
    const body = parsed.success ? parsed.data : undefined;
    return new AIError({
      provider,
      model,
      status: error.status,
      errorCode: body?.code || undefined,
      detail: body?.message || `HTTP request failed with status code: ${error.status}`,
      cause: error,
    });
  }

  const cause = toError(error);
  return new AIError({ provider, model, detail: cause.message, cause });
}

function normalizePath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

export class HttpTransport {
  readonly provider: string;
  readonly baseURL: string;
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(config: HttpTransportConfig) {
    this.provider = config.provider;
    this.baseURL = config.baseURL;
    this.logger = (config.logger ?? getLogger('switchboard.http')).child({ provider: config.provider });

    const apiKey = config.apiKey ?? '';
    const baseFetch: FetchFunction = config.fetch ?? ((input, init) => fetch(input, init));

    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseURL,
      defaultHeaders: config.defaultHeaders,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRetries: config.maxRetries ?? 0,
      fetch: this.createLoggingFetch(baseFetch, apiKey !== ''),
    });
  }

  /**
   * POST a JSON body. Resolves with the raw response once a 2xx status
   * arrives; the body is left unread.
   *
   * @throws {AIError}
   */
  async post(path: string, body: WireObject, options: TransportRequestOptions = {}): Promise<Response> {
    try {
      return await this.client
        .post(normalizePath(path), { body, headers: options.headers, signal: options.signal })
        .asResponse();
    } catch (error) {
      throw toAIError(error, this.provider, options.model);
    }
  }

  /**
   * @throws {AIError}
   */
  async get(path: string, options: TransportRequestOptions = {}): Promise<Response> {
    try {
      return await this.client
        .get(normalizePath(path), { headers: options.headers, signal: options.signal })
        .asResponse();
    } catch (error) {
      throw toAIError(error, this.provider, options.model);
    }
  }

  private createLoggingFetch(baseFetch: FetchFunction, authenticated: boolean): FetchFunction {
    return (input, init) => {
      if (this.logger.isLevelEnabled(LogLevel.DEBUG)) {
        this.logger.debug('HTTP request', {
          url: input instanceof Request ? input.url : String(input),
          method: init?.method ?? 'GET',
          body: describeBody(init?.body),
        });
      }

      if (authenticated) {
        return baseFetch(input, init);
      }
      const headers = new Headers(init?.headers);
      headers.delete('authorization');
      return baseFetch(input, { ...init, headers });
    };
  }
}

function describeBody(body: RequestInit['body']): unknown {
  if (typeof body !== 'string') {
    return undefined;
  }
  try {
    return truncateLargeFields(JSON.parse(body));
  } catch {
    return body.length > TRUNCATE_LIMIT ? body.slice(0, TRUNCATE_LIMIT) + TRUNCATION_SUFFIX : body;
  }
}
