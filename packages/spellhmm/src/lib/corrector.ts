import type { DecodeOptions, SpellingModel } from './types.js';
import { decodeWord } from './viterbi/core.js';
import { snapToVocabulary } from './vocabulary.js';
import { tokenizeWords } from './utils.js';

export function correctWord(word: string, model: SpellingModel, opts?: DecodeOptions): string {
  const decoded = decodeWord(word.toLowerCase(), model.transitions, model.emissions, opts);
  return snapToVocabulary(decoded, model.vocabulary);
}

// Each whitespace-separated word is corrected independently; output words are joined by single spaces.
export function correctText(text: string, model: SpellingModel, opts?: DecodeOptions): string {
  return tokenizeWords(text).map(w => correctWord(w, model, opts)).join(' ');
}
