/**
 * LLM Switchboard
 *
 * One client for every OpenAI-compatible chat-completions backend:
 * streaming with tool-call assembly, cached model catalogs, model
 * resolution and classified errors.
 *
 * @packageDocumentation
 */

export const version = '0.1.0';

export * from './core/index.js';
export * from './providers/index.js';
