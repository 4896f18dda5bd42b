/**
 * Fixed-width chunk splitter.
 *
 * Cuts text left to right into pieces of exactly `maxChars` UTF-16 code
 * units, the last piece holding the remainder. No overlap and no attempt
 * at sentence or word boundaries, so joining the chunks gives back the
 * input unchanged.
 *
 * @module services/summarization/chunk-splitter
 */

import { ValidationError } from '../../utils/validation.js';

export const DEFAULT_CHUNK_MAX_CHARS = 3000;

export function splitIntoChunks(text: string, maxChars: number = DEFAULT_CHUNK_MAX_CHARS): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ValidationError(`maxChars must be a positive integer, got ${maxChars}`);
  }

  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += maxChars) {
    chunks.push(text.slice(start, start + maxChars));
  }
  return chunks;
}
