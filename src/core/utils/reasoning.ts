export interface SplitReasoning {
  content: string;
  reasoning: string;
}

const MARKER = 'Reasoning:';
const OPEN_TAG = '<reasoning>';
const CLOSE_TAG = '</reasoning>';
const FENCE_OPEN = '```reasoning';
const FENCE_CLOSE = '```';

/**
 * Separate reasoning that a model wrote inline from the answer, for
 * providers without a dedicated reasoning field.
 *
 * Recognized forms, first match wins:
 * - `answer Reasoning: why` (everything after the marker)
 * - `<reasoning>why</reasoning> answer`
 * - a fenced block opened with ```` ```reasoning ````
 *
 * Text without any of these comes back unchanged with empty reasoning.
 */
export function splitReasoning(text: string): SplitReasoning {
  const marker = text.indexOf(MARKER);
  if (marker !== -1) {
    return {
      content: text.slice(0, marker).trim(),
      reasoning: text.slice(marker + MARKER.length).trim(),
    };
  }

  const open = text.indexOf(OPEN_TAG);
  if (open !== -1) {
    const close = text.indexOf(CLOSE_TAG, open + OPEN_TAG.length);
    if (close !== -1) {
      return {
        content: (text.slice(0, open) + text.slice(close + CLOSE_TAG.length)).trim(),
        reasoning: text.slice(open + OPEN_TAG.length, close).trim(),
      };
    }
    return { content: text, reasoning: '' };
  }

  const fence = text.indexOf(FENCE_OPEN);
  if (fence !== -1) {
    const close = text.indexOf(FENCE_CLOSE, fence + FENCE_OPEN.length);
    if (close !== -1) {
      return {
        content: (text.slice(0, fence) + text.slice(close + FENCE_CLOSE.length)).trim(),
        reasoning: text.slice(fence + FENCE_OPEN.length, close).trim(),
      };
    }
  }

  return { content: text, reasoning: '' };
}
