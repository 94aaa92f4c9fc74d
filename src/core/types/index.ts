export * from './model-info.js';
export * from './model-params.js';
export * from './message.js';
export * from './completion.js';
