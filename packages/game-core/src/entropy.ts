// packages/game-core/src/entropy.ts
//
// Information measures over the consistent candidate set. Every candidate is
// equally likely, so entropy is just log2 of the count.

/** log2(n), or 0 for an empty set. */
export function entropyOf(count: number): number {
  return count > 0 ? Math.log2(count) : 0;
}

/** Bits gained when the candidate set shrinks from `before` to `after` candidates. */
export function mutualInformation(before: number, after: number): number {
  return entropyOf(before) - entropyOf(after);
}

/** Display rounding: 2 decimal places. */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
