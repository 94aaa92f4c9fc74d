import { SwitchboardError } from './base-error.js';

/**
 * Error thrown when a tool call cannot be matched to a usable declaration.
 *
 * @example
 * ```typescript
 * try {
 *   const { tool, args } = tools.parseArguments(call);
 * } catch (error) {
 *   if (error instanceof ToolError) {
 *     // report back to the model as a tool message
 *   }
 * }
 * ```
 */
export class ToolError extends SwitchboardError {
  constructor(message: string, cause?: Error, code?: string) {
    super(message, cause, code);
  }
}

/**
 * The model asked for a tool the registry does not hold.
 */
export class ToolNotFoundError extends ToolError {
  constructor(public readonly toolName: string) {
    super(`tool not found: ${toolName}`, undefined, 'TOOL_NOT_FOUND');
  }
}

/**
 * A tool call's arguments are not valid JSON or do not match the tool's schema.
 */
export class ToolArgumentsError extends ToolError {
  constructor(
    public readonly toolName: string,
    detail: string,
    cause?: Error
  ) {
    super(`invalid arguments for tool ${toolName}: ${detail}`, cause, 'TOOL_ARGUMENTS_INVALID');
  }
}

/**
 * Two tools were registered under one name.
 */
export class DuplicateToolError extends ToolError {
  constructor(public readonly toolName: string) {
    super(`tool already registered: ${toolName}`, undefined, 'TOOL_DUPLICATE');
  }
}
