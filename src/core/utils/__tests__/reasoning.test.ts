import { describe, it, expect } from 'vitest';
import { splitReasoning } from '../reasoning.js';

describe('splitReasoning', () => {
  it('should take everything after the marker as reasoning', () => {
    expect(splitReasoning('Paris. Reasoning: it is the capital')).toEqual({
      content: 'Paris.',
      reasoning: 'it is the capital',
    });
  });

  it('should cut a tagged block out of the content', () => {
    expect(splitReasoning('Before <reasoning> step one </reasoning> after')).toEqual({
      content: 'Before  after',
      reasoning: 'step one',
    });
  });

  it('should leave an unclosed tag alone', () => {
    expect(splitReasoning('<reasoning>never closed')).toEqual({ content: '<reasoning>never closed', reasoning: '' });
  });

  it('should cut a fenced reasoning block', () => {
    expect(splitReasoning('```reasoning\ncount the letters\n```\nThree.')).toEqual({
      content: 'Three.',
      reasoning: 'count the letters',
    });
  });

  it('should prefer the marker over tags', () => {
    expect(splitReasoning('<reasoning>a</reasoning> b Reasoning: c').reasoning).toBe('c');
  });

  it('should return plain text unchanged', () => {
    expect(splitReasoning('  just an answer ')).toEqual({ content: '  just an answer ', reasoning: '' });
  });
});
