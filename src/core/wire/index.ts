export * from './schemas.js';
export * from './encode.js';
export * from './decode.js';
