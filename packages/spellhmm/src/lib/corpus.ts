import fs from 'fs/promises';
import type { TrainingPair } from './types.js';
import { linesFromChunks, tokenizeWords } from './utils.js';

/**
 * Parse one corpus line of the form `correct: typed1 typed2 ...`.
 * Lines without a colon, or with nothing after it, yield no pairs.
 */
export function parseCorpusLine(line: string): TrainingPair[] {
  const trimmed = line.trim();
  const colon = trimmed.indexOf(':');
  if (colon < 0) return [];

  const correct = trimmed.slice(0, colon).trim().toLowerCase();
  return tokenizeWords(trimmed.slice(colon + 1)).map(typed => ({ correct, typed: typed.toLowerCase() }));
}

export function pairsFromLines(lines: Iterable<string>): TrainingPair[] {
  const pairs: TrainingPair[] = [];
  for (const line of lines) pairs.push(...parseCorpusLine(line));
  return pairs;
}

export async function pairsFromAsyncIterable(source: AsyncIterable<string>): Promise<TrainingPair[]> {
  const pairs: TrainingPair[] = [];
  for await (const line of linesFromChunks(source)) pairs.push(...parseCorpusLine(line));
  return pairs;
}

export async function loadCorpusFile(filePath: string): Promise<TrainingPair[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new Error(`Cannot read corpus file ${filePath}`, { cause: err });
  }

  return pairsFromLines(content.split(/\r\n|\n|\r/));
}
