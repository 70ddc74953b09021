import type { CorrectionMiss, DecodeOptions, EvaluationReport, SpellingModel, TrainingPair } from './types.js';
import { correctWord } from './corrector.js';

/**
 * Run every typed form through the corrector and compare with its intended word.
 * Misses are reported in input order.
 */
export function evaluateCorrections(
  model: SpellingModel,
  pairs: Iterable<TrainingPair>,
  opts?: DecodeOptions
): EvaluationReport {
  let total = 0;
  let correct = 0;
  const misses: CorrectionMiss[] = [];

  for (const pair of pairs) {
    total++;
    const actual = correctWord(pair.typed, model, opts);
    if (actual === pair.correct) {
      correct++;
    } else {
      misses.push({ typed: pair.typed, expected: pair.correct, actual });
    }
  }

  return { total, correct, accuracy: total > 0 ? correct / total : 0, misses };
}
