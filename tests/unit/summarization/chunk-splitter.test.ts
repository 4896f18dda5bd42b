/**
 * Unit tests for the fixed-width chunk splitter
 *
 * @module tests/unit/summarization/chunk-splitter
 */

import { describe, it, expect } from 'vitest';
import { splitIntoChunks, DEFAULT_CHUNK_MAX_CHARS } from '../../../src/services/summarization/chunk-splitter.js';
import { ValidationError } from '../../../src/utils/validation.js';

describe('splitIntoChunks', () => {
  it('returns no chunks for empty text', () => {
    expect(splitIntoChunks('', 3000)).toEqual([]);
  });

  it('returns the text as one chunk when shorter than the limit', () => {
    expect(splitIntoChunks('short text', 3000)).toEqual(['short text']);
  });

  it('returns one chunk when the text is exactly the limit', () => {
    const text = 'x'.repeat(3000);
    expect(splitIntoChunks(text, 3000)).toEqual([text]);
  });

  it('splits 7000 characters into 3000, 3000 and 1000', () => {
    const chunks = splitIntoChunks('a'.repeat(7000), 3000);
    expect(chunks.map((c) => c.length)).toEqual([3000, 3000, 1000]);
  });

  it('reproduces the input when chunks are joined', () => {
    const text = Array.from({ length: 250 }, (_, i) => `Sentence ${i} of the notes.`).join(' ');
    const chunks = splitIntoChunks(text, 97);
    expect(chunks.join('')).toBe(text);
  });

  it('keeps every chunk but the last at the limit and the last within 1..limit', () => {
    const text = 'abcdefghij'.repeat(53);
    const chunks = splitIntoChunks(text, 64);
    for (const chunk of chunks.slice(0, -1)) {
      expect(chunk.length).toBe(64);
    }
    const last = chunks[chunks.length - 1];
    expect(last.length).toBeGreaterThanOrEqual(1);
    expect(last.length).toBeLessThanOrEqual(64);
  });

  it('cuts at the limit without looking for word boundaries', () => {
    expect(splitIntoChunks('hello world', 4)).toEqual(['hell', 'o wo', 'rld']);
  });

  it('measures length in UTF-16 code units', () => {
    expect(splitIntoChunks('가나다라마', 2)).toEqual(['가나', '다라', '마']);
  });

  it('uses 3000 as the default limit', () => {
    expect(DEFAULT_CHUNK_MAX_CHARS).toBe(3000);
    expect(splitIntoChunks('b'.repeat(3001)).map((c) => c.length)).toEqual([3000, 1]);
  });

  it.each([0, -5, 2.5, Number.NaN])('rejects maxChars=%s', (maxChars) => {
    expect(() => splitIntoChunks('text', maxChars)).toThrow(ValidationError);
  });
});
