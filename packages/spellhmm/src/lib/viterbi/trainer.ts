import type { EmissionTable, ProbabilityTable, SpellingModel, TrainingPair, TransitionTable, Vocabulary } from '../types.js';
import { END_SENTINEL, START_SENTINEL } from '../prebuilt.js';

type CountTable = Map<string, Map<string, number>>;

function increment(counts: CountTable, from: string, to: string) {
  let row = counts.get(from);
  if (!row) {
    row = new Map<string, number>();
    counts.set(from, row);
  }
  row.set(to, (row.get(to) ?? 0) + 1);
}

export function normalizeCounts(counts: ReadonlyMap<string, ReadonlyMap<string, number>>): ProbabilityTable {
  const table = new Map<string, Map<string, number>>();

  for (const [from, row] of counts) {
    let total = 0;
    for (const n of row.values()) total += n;
    if (total <= 0) continue;

    const probs = new Map<string, number>();
    for (const [to, n] of row) {
      if (n > 0) probs.set(to, n / total);
    }
    table.set(from, probs);
  }

  return table;
}

/**
 * P(typed char | correct char), counted over index-aligned positions.
 * Only the first min(len(correct), len(typed)) positions of a pair are used;
 * trailing characters of the longer word are dropped.
 */
export function computeEmissions(pairs: Iterable<TrainingPair>): EmissionTable {
  const counts: CountTable = new Map();

  for (const { correct, typed } of pairs) {
    const length = Math.min(correct.length, typed.length);
    for (let i = 0; i < length; i++) {
      increment(counts, correct.charAt(i), typed.charAt(i));
    }
  }

  return normalizeCounts(counts);
}

/** P(next char | char) over correct words padded as `^word$`. */
export function computeTransitions(pairs: Iterable<TrainingPair>): TransitionTable {
  const counts: CountTable = new Map();

  for (const { correct } of pairs) {
    const padded = START_SENTINEL + correct + END_SENTINEL;
    for (let i = 0; i < padded.length - 1; i++) {
      increment(counts, padded.charAt(i), padded.charAt(i + 1));
    }
  }

  return normalizeCounts(counts);
}

export function buildVocabulary(pairs: Iterable<TrainingPair>): Vocabulary {
  const vocabulary = new Set<string>();
  for (const { correct } of pairs) vocabulary.add(correct);
  return vocabulary;
}

export function trainModel(pairs: readonly TrainingPair[]): SpellingModel {
  return {
    emissions: computeEmissions(pairs),
    transitions: computeTransitions(pairs),
    vocabulary: buildVocabulary(pairs),
    pairCount: pairs.length
  };
}
