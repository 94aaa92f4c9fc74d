/**
 * Tools module - declarations of functions the model may call.
 *
 * - defineTool for describing a tool with a Zod argument schema
 * - zodToJsonSchema / createToolDeclaration for the wire format
 * - ToolRegistryBuilder and the immutable ToolRegistry it builds
 *
 * @module tools
 */

export { type ToolDefinition, defineTool } from './tool.js';
export { zodToJsonSchema, createToolDeclaration, type JsonSchema } from './schema.js';
export {
  ToolRegistry,
  ToolRegistryBuilder,
  type ToolSelection,
  type ParsedToolCall,
} from './tool-registry.js';
