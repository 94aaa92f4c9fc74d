export { ChunkQueue } from './chunk-queue.js';
export { readLines } from './line-reader.js';
export { ToolCallAccumulator } from './tool-call-accumulator.js';
export {
  type ChunkStream,
  type StreamContext,
  type StreamDecoderOptions,
  type StreamLine,
  DATA_PREFIX,
  DONE_SENTINEL,
  decodeStream,
  decodeStreamEvent,
  parseStreamLine,
} from './stream-decoder.js';
export {
  type StreamSummary,
  accumulateChunk,
  collectStream,
  emptySummary,
} from './aggregate.js';
