/**
 * Error classes for the switchboard.
 *
 * All errors extend from SwitchboardError which provides:
 * - Cause chaining for wrapping underlying errors
 * - Optional error codes for programmatic handling
 * - Proper stack trace capture
 *
 * @module errors
 */

export { SwitchboardError, toError } from './base-error.js';
export {
  AIError,
  AIErrorKind,
  type AIErrorOptions,
  classifyError,
  findAIError,
  isRetryableError,
  isErrorKind,
} from './ai-error.js';
export {
  InvalidModelSpecError,
  ProviderNotFoundError,
  ModelNotFoundError,
  ConfigurationError,
} from './registry-errors.js';
export { ToolError, ToolNotFoundError, ToolArgumentsError, DuplicateToolError } from './tool-errors.js';
