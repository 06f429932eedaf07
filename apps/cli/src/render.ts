// apps/cli/src/render.ts
//
// Plain-text rendering of engine outcomes and session history.

import type { HistoryEntry, Outcome } from '@bullscows/protocol';

export const INTRO =
  'Welcome to Bulls and Cows! Type "rules" to read the rules, or enter your guess (4 unique digits).';

export const RULES = [
  'Rules of Bulls and Cows:',
  '',
  '1. Guess the 4-digit number.',
  '2. Each digit must be unique.',
  "3. 'Bull' means a correct digit in the correct position.",
  "4. 'Cow' means a correct digit in the wrong position.",
  '5. Continue guessing until you find the secret number!',
].join('\n');

export const HELP = [
  'Commands:',
  '  rules     show the rules',
  '  history   list your guesses so far',
  '  reset     start over with a new secret',
  '  help      show this message',
  '  quit      leave the game',
  'Anything else is taken as a guess.',
].join('\n');

export function formatOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'validation-error':
      return `Invalid Input: ${outcome.message}`;
    case 'progress':
      return `Bulls: ${outcome.bulls}, Cows: ${outcome.cows}, Mutual Information: ${outcome.mutualInformation} | Entropy: ${outcome.entropy}`;
    case 'win':
      return `Congratulations! You guessed the number in ${outcome.attempts} attempts!`;
  }
}

export function formatHistoryEntry({ guess, outcome }: HistoryEntry): string {
  if (outcome.kind === 'win') {
    return `Guess: ${guess} | Solved in ${outcome.attempts} attempts`;
  }
  return `Guess: ${guess} | Bulls: ${outcome.bulls} | Cows: ${outcome.cows} | Mutual Information: ${outcome.mutualInformation} | Entropy: ${outcome.entropy}`;
}

export function formatHistory(entries: readonly HistoryEntry[]): string[] {
  if (entries.length === 0) return ['No guesses yet.'];
  return entries.map(formatHistoryEntry);
}
