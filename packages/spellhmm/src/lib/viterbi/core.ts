import type { DecodeOptions, EmissionTable, ProbabilityTable, TransitionTable } from '../types.js';
import { ALPHABET, END_SENTINEL, FLOOR_PROBABILITY, START_SENTINEL } from '../prebuilt.js';

interface VCell {
  score: number;
  prev: number | null;
}

function logProbability(table: ProbabilityTable, from: string, to: string, floor: number): number {
  return Math.log(table.get(from)?.get(to) ?? floor);
}

export function resolveDecodeOptions(opts?: DecodeOptions): Required<DecodeOptions> {
  const floorProbability = opts?.floorProbability ?? FLOOR_PROBABILITY;
  if (!(floorProbability > 0 && floorProbability <= 1)) {
    throw new Error(`floorProbability must be in (0, 1], got ${floorProbability}`);
  }

  return {
    alphabet: opts?.alphabet ?? ALPHABET,
    floorProbability,
    debug: opts?.debug ?? false
  };
}

/**
 * Most probable sequence of intended letters for an observed word under a
 * first-order character HMM. Output has the same length as `observed`.
 *
 * Ties at every step go to the earliest state in alphabet order. If no state
 * ends with a finite score the observed word is returned unchanged.
 */
export function decodeWord(
  observed: string,
  transitions: TransitionTable,
  emissions: EmissionTable,
  opts?: DecodeOptions
): string {
  if (observed.length === 0) return '';

  const { alphabet, floorProbability: floor, debug } = resolveDecodeOptions(opts);
  const states = alphabet.length;

  // log P(alphabet[i] -> alphabet[j]), row-major
  const logTrans: number[] = [];
  for (let j = 0; j < states; j++) {
    for (let i = 0; i < states; i++) {
      logTrans[j * states + i] = logProbability(transitions, alphabet[j] ?? '', alphabet[i] ?? '', floor);
    }
  }

  const lattice: VCell[][] = [];

  const first = observed.charAt(0);
  lattice[0] = alphabet.map(s => ({
    score: logProbability(transitions, START_SENTINEL, s, floor) + logProbability(emissions, s, first, floor),
    prev: null
  }));

  for (let t = 1; t < observed.length; t++) {
    const ch = observed.charAt(t);
    const prevCol = lattice[t - 1] ?? [];
    const col: VCell[] = [];

    for (let i = 0; i < states; i++) {
      const emit = logProbability(emissions, alphabet[i] ?? '', ch, floor);
      let bestScore = -Infinity;
      let bestPrev: number | null = null;

      for (let j = 0; j < states; j++) {
        const score = (prevCol[j]?.score ?? -Infinity) + (logTrans[j * states + i] ?? -Infinity) + emit;
        if (score > bestScore) {
          bestScore = score;
          bestPrev = j;
        }
      }

      col.push({ score: bestScore, prev: bestPrev });
    }

    lattice[t] = col;
  }

  const lastCol = lattice[observed.length - 1] ?? [];
  let bestTotal = -Infinity;
  let lastIndex: number | null = null;
  for (let i = 0; i < states; i++) {
    const total = (lastCol[i]?.score ?? -Infinity) + logProbability(transitions, alphabet[i] ?? '', END_SENTINEL, floor);
    if (total > bestTotal) {
      bestTotal = total;
      lastIndex = i;
    }
  }

  if (lastIndex === null) return observed;

  const path: string[] = [];
  let idx: number | null = lastIndex;
  for (let t = observed.length - 1; t >= 0; t--) {
    if (idx === null) return observed;
    path.push(alphabet[idx] ?? '');
    idx = lattice[t]?.[idx]?.prev ?? null;
  }
  path.reverse();

  const decoded = path.join('');
  if (debug) console.debug(`decode ${observed} -> ${decoded} (log score ${bestTotal.toFixed(4)})`);

  return decoded;
}
