// Curated public API
export type { TrainingPair, ProbabilityRow, ProbabilityTable, EmissionTable, TransitionTable, Vocabulary, SpellingModel, DecodeOptions, CorrectionMiss, EvaluationReport } from './lib/types.js';
export { ALPHABET, START_SENTINEL, END_SENTINEL, FLOOR_PROBABILITY } from './lib/prebuilt.js';
export { computeEmissions, computeTransitions, buildVocabulary, normalizeCounts, trainModel } from './lib/viterbi/trainer.js';
export { decodeWord, resolveDecodeOptions } from './lib/viterbi/core.js';
export { correctLinesFromAsyncIterable } from './lib/viterbi/streaming.js';
export { positionalDistance, snapToVocabulary } from './lib/vocabulary.js';
export { parseCorpusLine, pairsFromLines, pairsFromAsyncIterable, loadCorpusFile } from './lib/corpus.js';
export { correctWord, correctText } from './lib/corrector.js';
export { evaluateCorrections } from './lib/evaluate.js';
export { linesFromChunks, tokenizeWords } from './lib/utils.js';
export { promptLines } from './lib/prompt.js';
export type { LinePrompt } from './lib/prompt.js';
