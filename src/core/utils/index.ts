export { type SplitReasoning, splitReasoning } from './reasoning.js';
