import type { Vocabulary } from './types.js';

/**
 * Length difference plus mismatches at equal indices over the shared prefix length.
 * Not an edit distance: "xcat" is 4 away from "cat", not 1.
 */
export function positionalDistance(a: string, b: string): number {
  let dist = Math.abs(a.length - b.length);
  const m = Math.min(a.length, b.length);
  for (let i = 0; i < m; i++) {
    if (a.charAt(i) !== b.charAt(i)) dist++;
  }
  return dist;
}

// Closest known word to a decoded candidate; first minimum in vocabulary order wins.
export function snapToVocabulary(candidate: string, vocabulary: Vocabulary): string {
  if (vocabulary.has(candidate)) return candidate;

  let best = candidate;
  let bestScore = Infinity;

  for (const word of vocabulary) {
    const dist = positionalDistance(word, candidate);
    if (dist < bestScore) {
      bestScore = dist;
      best = word;
    }
  }

  return best;
}
