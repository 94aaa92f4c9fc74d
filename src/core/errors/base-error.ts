/**
 * Root of every error the switchboard throws.
 *
 * `cause` links the failure that triggered it and `code` is a stable
 * identifier callers can switch on (`MODEL_NOT_FOUND`, `CONFIG_INVALID`, ...).
 *
 * @example
 * ```typescript
 * try {
 *   await loadConfig('./switchboard.json');
 * } catch (error) {
 *   throw new SwitchboardError('startup failed', toError(error), 'STARTUP');
 * }
 * ```
 */
export class SwitchboardError extends Error {
  public readonly cause?: Error;
  public readonly code?: string;

  constructor(message: string, cause?: Error, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * `Name: message [CODE]`, followed by one `Caused by:` line for the cause.
   */
  public toString(): string {
    const head = this.code ? `${this.name}: ${this.message} [${this.code}]` : `${this.name}: ${this.message}`;
    return this.cause ? `${head}\nCaused by: ${this.cause.toString()}` : head;
  }

  public toJSON(): Record<string, unknown> {
    const cause = this.cause;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: cause && { name: cause.name, message: cause.message },
    };
  }
}

/**
 * Whatever a `catch` clause received, as an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
