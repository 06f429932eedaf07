// packages/protocol/src/index.ts
//
// Shared protocol definitions for the Bulls & Cows engine and its shells.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - guessInput:  the raw guess a player submits (4 distinct digits).
//   - Outcome:     what the engine answers for one guess
//                  ("validation-error" | "progress" | "win").
//   - HistoryEntry / SessionSnapshot: read-only views of a session.
//
// The engine builds its answers against these types; the CLI re-validates
// what it prints in JSON mode.

import { z } from 'zod';

export const CODE_LENGTH = 4;

export const GUESS_LENGTH_MESSAGE = `Guess must be exactly ${CODE_LENGTH} characters`;
export const GUESS_DIGITS_MESSAGE = 'Guess must contain only the digits 0-9';
export const GUESS_UNIQUE_MESSAGE = 'Guess digits must all be different';

/* -------------------------------------------------------------------------- */
/*                                   Guess                                    */
/* -------------------------------------------------------------------------- */

/**
 * A raw guess. Rules are checked in order and the first failure wins, so a
 * string that is both too short and non-numeric reports the length problem.
 */
export const guessInput = z.string().superRefine((raw, ctx) => {
  if (raw.length !== CODE_LENGTH) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: GUESS_LENGTH_MESSAGE });
    return;
  }
  if (!/^[0-9]+$/.test(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: GUESS_DIGITS_MESSAGE });
    return;
  }
  if (new Set(raw).size !== CODE_LENGTH) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: GUESS_UNIQUE_MESSAGE });
  }
});

/* -------------------------------------------------------------------------- */
/*                                  Outcomes                                  */
/* -------------------------------------------------------------------------- */

/** Malformed guess; the session is left exactly as it was. */
export const validationErrorOutcome = z.object({
  kind: z.literal('validation-error'),
  message: z.string().min(1),
});
export type ValidationErrorOutcome = z.infer<typeof validationErrorOutcome>;

/**
 * Feedback for a guess that did not crack the code.
 *  - bulls:             right digit, right position (never 4 here)
 *  - cows:              right digit, wrong position
 *  - mutualInformation: bits gained by this guess, 2 decimals
 *  - entropy:           log2 of the remaining candidates, 2 decimals
 */
export const progressOutcome = z
  .object({
    kind: z.literal('progress'),
    bulls: z.number().int().min(0).max(CODE_LENGTH - 1),
    cows: z.number().int().min(0).max(CODE_LENGTH),
    mutualInformation: z.number(),
    entropy: z.number().min(0),
  })
  .refine((o) => o.bulls + o.cows <= CODE_LENGTH, {
    message: `bulls + cows cannot exceed ${CODE_LENGTH}`,
  });
export type ProgressOutcome = z.infer<typeof progressOutcome>;

/** The secret was found after `attempts` validated guesses. */
export const winOutcome = z.object({
  kind: z.literal('win'),
  attempts: z.number().int().min(1),
});
export type WinOutcome = z.infer<typeof winOutcome>;

export const outcomeSchema = z.union([
  validationErrorOutcome,
  progressOutcome,
  winOutcome,
]);
export type Outcome = z.infer<typeof outcomeSchema>;

/** Outcomes that consumed an attempt (and therefore land in the history). */
export type ScoredOutcome = ProgressOutcome | WinOutcome;

/* -------------------------------------------------------------------------- */
/*                                  Sessions                                  */
/* -------------------------------------------------------------------------- */

export const gameStatus = z.enum(['ready', 'won']);
export type GameStatus = z.infer<typeof gameStatus>;

export const historyEntry = z.object({
  guess: z.string().length(CODE_LENGTH),
  outcome: z.union([progressOutcome, winOutcome]),
});
export type HistoryEntry = z.infer<typeof historyEntry>;

/**
 * Display view of a session. Never carries the secret.
 */
export const sessionSnapshot = z.object({
  status: gameStatus,
  attempts: z.number().int().min(0),
  remaining: z.number().int().min(1),
  entropy: z.number().min(0),
  history: z.array(historyEntry),
});
export type SessionSnapshot = z.infer<typeof sessionSnapshot>;
