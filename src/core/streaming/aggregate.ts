import type { AIError } from '../errors/ai-error.js';
import type { Annotation, Chunk, ToolCall, Usage } from '../types/completion.js';

/**
 * Everything a stream delivered, folded into one value.
 */
export interface StreamSummary {
  content: string;
  reasoning: string;
  toolCalls: ToolCall[];
  annotations: Annotation[];
  /** Last usage snapshot seen */
  usage?: Usage;
  finishReason?: string;
  /** First terminal error seen */
  error?: AIError;
  chunkCount: number;
}

export function emptySummary(): StreamSummary {
  return { content: '', reasoning: '', toolCalls: [], annotations: [], chunkCount: 0 };
}

/**
 * Fold one chunk into a summary (mutates and returns `summary`).
 */
export function accumulateChunk(summary: StreamSummary, chunk: Chunk): StreamSummary {
  summary.content += chunk.content;
  summary.reasoning += chunk.reasoning;
  summary.toolCalls.push(...chunk.toolCalls);
  summary.annotations.push(...chunk.annotations);
  if (chunk.usage) {
    summary.usage = chunk.usage;
  }
  if (chunk.finishReason) {
    summary.finishReason = chunk.finishReason;
  }
  if (chunk.error && !summary.error) {
    summary.error = chunk.error;
  }
  summary.chunkCount += 1;
  return summary;
}

/**
 * Drain a stream into a {@link StreamSummary}.
 *
 * A terminal error is reported in the summary, not thrown; check
 * `summary.error`.
 */
export async function collectStream(chunks: AsyncIterable<Chunk>): Promise<StreamSummary> {
  const summary = emptySummary();
  for await (const chunk of chunks) {
    accumulateChunk(summary, chunk);
  }
  return summary;
}
