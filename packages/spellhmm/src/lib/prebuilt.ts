/**
 * Pre-built constants for the English lowercase spelling domain.
 * Callers may pass their own alphabet or floor through DecodeOptions,
 * but these are what the trainer and decoder use by default.
 */

export const ALPHABET: readonly string[] = [
  'a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j', 'k', 'l', 'm',
  'n', 'o', 'p', 'q', 'r', 's', 't', 'u', 'v', 'w', 'x', 'y', 'z'
];

/** Boundary markers padding each correct word for transition counting. Never decoder states. */
export const START_SENTINEL = '^';
export const END_SENTINEL = '$';

/**
 * Probability substituted for any transition or emission absent from the
 * trained tables. Keeps log() finite and gives unseen combinations a fixed,
 * very low score.
 */
export const FLOOR_PROBABILITY = 1e-6;
