import type { ToolCall } from '../types/completion.js';
import type { WireToolCallFragment } from '../wire/schemas.js';

/**
 * Rebuilds tool calls from fragments spread over many stream events.
 *
 * Fragments are keyed by slot index. The first fragment for a slot seeds
 * the call; later fragments overwrite id, type and name only with non-empty
 * values and append their argument text in arrival order.
 *
 * @example
 * ```typescript
 * const calls = new ToolCallAccumulator();
 * calls.merge({ index: 0, function: { arguments: '{"a"' } });
 * calls.merge({ index: 0, function: { arguments: ':1}' } });
 * calls.merge({ index: 0, id: 'call_1', type: 'function', function: { name: 'f' } });
 * calls.drain();
 * // [{ id: 'call_1', type: 'function', function: { name: 'f', arguments: '{"a":1}' } }]
 * ```
 */
export class ToolCallAccumulator {
  private slots = new Map<number, ToolCall>();

  get size(): number {
    return this.slots.size;
  }

  merge(fragment: WireToolCallFragment): void {
    const index = fragment.index ?? 0;
    const existing = this.slots.get(index);

    if (!existing) {
      this.slots.set(index, {
        id: fragment.id ?? '',
        type: fragment.type ?? '',
        function: {
          name: fragment.function?.name ?? '',
          arguments: fragment.function?.arguments ?? '',
        },
      });
      return;
    }

    if (fragment.id) {
      existing.id = fragment.id;
    }
    if (fragment.type) {
      existing.type = fragment.type;
    }
    if (fragment.function?.name) {
      existing.function.name = fragment.function.name;
    }
    if (fragment.function?.arguments) {
      existing.function.arguments += fragment.function.arguments;
    }
  }

  mergeAll(fragments: readonly WireToolCallFragment[]): void {
    for (const fragment of fragments) {
      this.merge(fragment);
    }
  }

  /**
   * Finished calls ordered by slot index. Clears every slot, so the next
   * tool-call sequence starts empty.
   */
  drain(): ToolCall[] {
    const calls = [...this.slots.entries()]
      .sort(([left], [right]) => left - right)
      .map(([, call]) => call);
    this.slots = new Map();
    return calls;
  }
}
