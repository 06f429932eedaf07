// packages/game-core/src/filter.ts
//
// Candidate filtering.
//
// A constraint is a guess plus the feedback it earned. A candidate is
// consistent when, treated as the secret, it would have earned the same
// feedback for every constraint. Filtering always starts from the full
// universe and applies every constraint seen so far, so the result never
// depends on how earlier sets were narrowed.

import { candidateUniverse, type Code } from './codes.js';
import { sameScore, scoreGuess, type Score } from './scoring.js';

export interface Constraint {
  guess: Code;
  score: Score;
}

export function isConsistent(
  candidate: Code,
  constraints: readonly Constraint[],
): boolean {
  return constraints.every((c) => sameScore(scoreGuess(candidate, c.guess), c.score));
}

/**
 * filterCandidates returns the members of `universe` consistent with every
 * constraint, in universe order.
 */
export function filterCandidates(
  constraints: readonly Constraint[],
  universe: readonly Code[] = candidateUniverse(),
): Code[] {
  return universe.filter((candidate) => isConsistent(candidate, constraints));
}
