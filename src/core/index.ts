/**
 * Provider-independent core: types, wire format, streaming, catalogs,
 * configuration and model resolution.
 *
 * @module core
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './types/index.js';
export * from './wire/index.js';
export * from './streaming/index.js';
export * from './catalog/index.js';
export * from './config/index.js';
export * from './registry/index.js';
export * from './tools/index.js';
export * from './utils/index.js';
