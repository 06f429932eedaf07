// packages/game-core/src/scoring.ts
//
// Bulls & Cows scoring, shared by the secret check and candidate filtering.
//
// Score legend:
//   - bulls: same digit at the same position
//   - cows:  digit present in both codes, but at a different position
//
// Both codes hold distinct digits, so cows is simply the size of the
// digit-set intersection minus the bulls. The score is symmetric in its
// arguments.

import type { Code } from './codes.js';

export interface Score {
  bulls: number;
  cows: number;
}

/**
 * scoreGuess compares a guess against a reference code (the secret, or a
 * candidate standing in for it).
 *
 * @param reference - the code being guessed
 * @param guess     - the player's code
 *
 * Example:
 *   reference = [1,2,3,4], guess = [1,3,2,5]
 *   → { bulls: 1, cows: 2 }
 */
export function scoreGuess(reference: Code, guess: Code): Score {
  let bulls = 0;
  for (let i = 0; i < guess.length; i++) {
    if (guess[i] === reference[i]) bulls++;
  }
  const ref = new Set(reference);
  let shared = 0;
  for (const d of new Set(guess)) {
    if (ref.has(d)) shared++;
  }
  return { bulls, cows: shared - bulls };
}

export function sameScore(a: Score, b: Score): boolean {
  return a.bulls === b.bulls && a.cows === b.cows;
}
