import type { EmbedFunction } from '../detectors/goal-drift.js';

const MIN_WORD_LENGTH = 4;

/** 32-bit FNV-1a. */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z]+/)
    .filter((word) => word.length >= MIN_WORD_LENGTH);
}

/**
 * Hashed bag-of-words vectors over words of four letters or more. Stands in
 * for a sentence-embedding model in the demo.
 */
export function bagOfWordsEmbedding(dimensions = 256): EmbedFunction {
  return (text) => {
    const vector = new Array<number>(dimensions).fill(0);
    for (const word of tokenize(text)) {
      vector[fnv1a(word) % dimensions] += 1;
    }
    return vector;
  };
}
