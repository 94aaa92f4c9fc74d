import { SwitchboardError } from './base-error.js';

/**
 * Classification of provider failures.
 *
 * - `network`: transport failure before any HTTP status existed (DNS, reset, timeout)
 * - `rate_limit`: HTTP 429
 * - `server`: HTTP 5xx
 * - `content_policy`: HTTP 400 whose detail mentions a policy
 * - `client`: any other HTTP 4xx
 * - `unknown`: everything else, including errors reported inside a 2xx body
 */
export enum AIErrorKind {
  Network = 'network',
  RateLimit = 'rate_limit',
  Server = 'server',
  ContentPolicy = 'content_policy',
  Client = 'client',
  Unknown = 'unknown',
}

const RETRYABLE_KINDS: ReadonlySet<AIErrorKind> = new Set([
  AIErrorKind.Network,
  AIErrorKind.RateLimit,
  AIErrorKind.Server,
]);

/**
 * Fields describing a provider failure.
 */
export interface AIErrorOptions {
  /** Provider name (e.g. 'openrouter') */
  provider: string;
  /** Model the request targeted, when known */
  model?: string;
  /** HTTP status code, 0 when no response was received */
  status?: number;
  /** Provider-specific code (e.g. 'insufficient_quota') */
  errorCode?: string;
  /** Human-readable description */
  detail?: string;
  /** Underlying error */
  cause?: Error;
  /** True when the request never produced an HTTP status */
  transportFailure?: boolean;
}

function formatMessage(options: AIErrorOptions): string {
  let message = options.detail || options.cause?.message || 'AI provider error';
  if (options.provider && options.model) {
    message = `[${options.provider}:${options.model}] ${message}`;
  }
  if (options.errorCode) {
    message = `${message} (code: ${options.errorCode})`;
  }
  if (options.status) {
    message = `${options.status} ${message}`;
  }
  return message;
}

/**
 * Error raised by any provider operation.
 *
 * Every transport, decoding and provider-reported failure surfaces as an
 * AIError so callers can pattern-match on a single type. Classification and
 * retryability are pure functions of the fields.
 *
 * @example
 * ```typescript
 * try {
 *   await registry.ask({ messages, model });
 * } catch (error) {
 *   if (error instanceof AIError && error.isRetryable()) {
 *     // schedule another attempt
 *   }
 * }
 * ```
 */
export class AIError extends SwitchboardError {
  public readonly provider: string;
  public readonly model: string;
  public readonly status: number;
  public readonly errorCode: string;
  public readonly detail: string;
  public readonly transportFailure: boolean;

  constructor(options: AIErrorOptions) {
    super(formatMessage(options), options.cause, options.errorCode || undefined);
    this.provider = options.provider;
    this.model = options.model ?? '';
    this.status = options.status ?? 0;
    this.errorCode = options.errorCode ?? '';
    this.detail = options.detail ?? options.cause?.message ?? '';
    this.transportFailure = options.transportFailure ?? false;
  }

  /**
   * Copy of this error attributed to a model.
   */
  withModel(model: string): AIError {
    if (this.model === model) {
      return this;
    }
    return new AIError({
      provider: this.provider,
      model,
      status: this.status,
      errorCode: this.errorCode,
      detail: this.detail,
      cause: this.cause,
      transportFailure: this.transportFailure,
    });
  }

  get kind(): AIErrorKind {
    const status = this.status;
    if (status === 429) {
      return AIErrorKind.RateLimit;
    }
    if (status >= 500) {
      return AIErrorKind.Server;
    }
    if (status === 400 && this.detail.toLowerCase().includes('policy')) {
      return AIErrorKind.ContentPolicy;
    }
    if (status >= 400 && status < 500) {
      return AIErrorKind.Client;
    }
    if (status === 0 && this.transportFailure) {
      return AIErrorKind.Network;
    }
    return AIErrorKind.Unknown;
  }

  isRetryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }

  public toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      provider: this.provider,
      model: this.model,
      status: this.status,
      errorCode: this.errorCode,
      detail: this.detail,
      kind: this.kind,
    };
  }
}

/**
 * Find an AIError in a value or its cause chain.
 */
export function findAIError(error: unknown): AIError | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof AIError) {
      return current;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Classify any thrown value. Values that carry no AIError are `unknown`.
 */
export function classifyError(error: unknown): AIErrorKind {
  return findAIError(error)?.kind ?? AIErrorKind.Unknown;
}

export function isRetryableError(error: unknown): boolean {
  return findAIError(error)?.isRetryable() ?? false;
}

export function isErrorKind(error: unknown, kind: AIErrorKind): boolean {
  return classifyError(error) === kind;
}
