/**
 * A labelled example from the corpus: the intended word and one way it was typed.
 * Both are lowercase by the time they reach the trainer.
 */
export interface TrainingPair {
  readonly correct: string;
  readonly typed: string;
}

/** Probabilities keyed by the following (or observed) character. */
export type ProbabilityRow = ReadonlyMap<string, number>;

/**
 * Two-level conditional probability table. A missing row or entry means
 * "no data", never "zero probability".
 */
export type ProbabilityTable = ReadonlyMap<string, ProbabilityRow>;

/** emissions.get(c)?.get(t) = P(typed t | correct c) */
export type EmissionTable = ProbabilityTable;

/** transitions.get(a)?.get(b) = P(b follows a), sentinels included */
export type TransitionTable = ProbabilityTable;

// Distinct correct words in order of first appearance; Set iteration follows insertion order.
export type Vocabulary = ReadonlySet<string>;

export interface SpellingModel {
  emissions: EmissionTable;
  transitions: TransitionTable;
  vocabulary: Vocabulary;
  /** number of pairs the model was fitted on */
  pairCount: number;
}

/**
 * DecodeOptions controls the Viterbi state space and smoothing.
 */
export interface DecodeOptions {
  alphabet?: readonly string[]; // decoder states, in tie-break order
  floorProbability?: number; // substitute for a missing transition or emission, must be in (0, 1]
  debug?: boolean; // log each decoded word and its score via console.debug
}

export interface CorrectionMiss {
  typed: string;
  expected: string;
  actual: string;
}

export interface EvaluationReport {
  total: number;
  correct: number;
  accuracy: number;
  misses: CorrectionMiss[];
}
