// packages/game-core/src/codes.ts
//
// Codes and the candidate universe.
//
// A code is an ordered tuple of CODE_LENGTH pairwise-distinct digits (0–9).
// The universe of all such codes (10·9·8·7 = 5040) does not depend on any
// secret, so it is built once on first use and shared by every session.

import { CODE_LENGTH } from '@bullscows/protocol';

export { CODE_LENGTH };

export type Code = readonly number[];

export const DIGIT_COUNT = 10;

let universe: readonly Code[] | null = null;

/** True when `code` has CODE_LENGTH distinct integer digits in 0–9. */
export function isValidCode(code: readonly number[]): boolean {
  if (code.length !== CODE_LENGTH) return false;
  if (!code.every((d) => Number.isInteger(d) && d >= 0 && d < DIGIT_COUNT)) {
    return false;
  }
  return new Set(code).size === CODE_LENGTH;
}

/**
 * candidateUniverse returns every valid code in ascending numeric order
 * ("0123", "0124", …, "9876"). The returned array and its codes are frozen.
 */
export function candidateUniverse(): readonly Code[] {
  if (universe) return universe;
  const out: Code[] = [];
  const max = DIGIT_COUNT ** CODE_LENGTH;
  for (let n = 0; n < max; n++) {
    const code = String(n).padStart(CODE_LENGTH, '0').split('').map(Number);
    if (new Set(code).size === CODE_LENGTH) out.push(Object.freeze(code));
  }
  universe = Object.freeze(out);
  return universe;
}

/** "0123"-style rendering of a code. */
export function formatCode(code: Code): string {
  return code.join('');
}

/**
 * Converts an already-validated digit string into a code. Callers must run
 * the guess through `guessInput` first.
 */
export function toCode(digits: string): Code {
  return Object.freeze(digits.split('').map(Number));
}

export function sameCode(a: Code, b: Code): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}
