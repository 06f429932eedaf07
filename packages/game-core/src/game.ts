// packages/game-core/src/game.ts
//
// The Bulls & Cows session: owns the secret, the consistent candidate set,
// the attempt counter and the guess history, and turns raw guesses into
// outcomes.
//
// Lifecycle:
//   ready ──(valid guess, bulls < 4)──▶ ready
//   ready ──(valid guess, bulls = 4)──▶ won
//   won   ──(reset)────────────────────▶ ready (fresh secret)
// Malformed guesses never change state, whichever state the session is in.
//
// Each session is an independent object; nothing here is shared between
// sessions except the frozen candidate universe.

import {
  guessInput,
  type GameStatus,
  type HistoryEntry,
  type Outcome,
  type ScoredOutcome,
  type SessionSnapshot,
} from '@bullscows/protocol';

import {
  candidateUniverse,
  formatCode,
  isValidCode,
  sameCode,
  toCode,
  type Code,
} from './codes.js';
import { entropyOf, mutualInformation, round2 } from './entropy.js';
import {
  ConfigurationError,
  GameFinishedError,
  InvariantViolationError,
} from './errors.js';
import type { GameEventListener } from './events.js';
import { filterCandidates, type Constraint } from './filter.js';
import { drawSecret, type RandomSource } from './random.js';
import { scoreGuess } from './scoring.js';

export interface GameOptions {
  /** Source of randomness for drawing secrets. Defaults to Math.random. */
  random?: RandomSource;
  /** Fixed secret for the first game; later resets draw from `random`. */
  secret?: readonly number[];
  onEvent?: GameEventListener;
}

export type ParsedGuess =
  | { ok: true; code: Code }
  | { ok: false; message: string };

/**
 * parseGuess applies the guess rules from `guessInput` and converts an
 * accepted string into a code.
 */
export function parseGuess(raw: string): ParsedGuess {
  const parsed = guessInput.safeParse(raw);
  if (parsed.success) return { ok: true, code: toCode(parsed.data) };
  const message = parsed.error.issues[0]?.message ?? 'Invalid guess';
  return { ok: false, message };
}

function copyEntry({ guess, outcome }: HistoryEntry): HistoryEntry {
  return { guess, outcome: { ...outcome } };
}

export class BullsCowsGame {
  private readonly random: RandomSource;
  private readonly onEvent?: GameEventListener;

  private secret: Code;
  private candidates: readonly Code[];
  private constraints: Constraint[] = [];
  private entries: HistoryEntry[] = [];
  private attemptCount = 0;
  private currentStatus: GameStatus = 'ready';

  constructor(options: GameOptions = {}) {
    this.random = options.random ?? Math.random;
    this.onEvent = options.onEvent;

    if (options.secret && !isValidCode(options.secret)) {
      throw new ConfigurationError(
        `Secret must be 4 distinct digits, got [${options.secret.join(', ')}]`,
      );
    }
    this.secret = options.secret
      ? Object.freeze([...options.secret])
      : drawSecret(this.random);
    this.candidates = candidateUniverse();
    this.started();
  }

  /** Starts over with a freshly drawn secret and the full universe. */
  reset(): void {
    this.secret = drawSecret(this.random);
    this.candidates = candidateUniverse();
    this.constraints = [];
    this.entries = [];
    this.attemptCount = 0;
    this.currentStatus = 'ready';
    this.started();
  }

  /**
   * processGuess validates, scores and filters one raw guess.
   *
   * @throws GameFinishedError when a valid guess arrives after a win
   * @throws InvariantViolationError if filtering leaves no candidates
   */
  processGuess(raw: string): Outcome {
    const parsed = parseGuess(raw);
    if (!parsed.ok) {
      this.onEvent?.({
        name: 'guess_rejected',
        props: { message: parsed.message, attempts: this.attemptCount },
      });
      return { kind: 'validation-error', message: parsed.message };
    }
    if (this.currentStatus === 'won') {
      throw new GameFinishedError(this.attemptCount);
    }

    const guess = parsed.code;
    const attempt = this.attemptCount + 1;
    const score = scoreGuess(this.secret, guess);

    const previousCount = this.candidates.length;
    const constraints = [...this.constraints, { guess, score }];
    const next = filterCandidates(constraints);
    if (next.length === 0) {
      throw new InvariantViolationError(
        `No candidate agrees with ${constraints.length} guesses; scoring is inconsistent`,
      );
    }
    this.attemptCount = attempt;
    this.constraints = constraints;
    this.candidates = next;

    const currentEntropy = entropyOf(next.length);
    const gained = mutualInformation(previousCount, next.length);

    this.onEvent?.({
      name: 'candidates_filtered',
      props: {
        attempt,
        bulls: score.bulls,
        cows: score.cows,
        remaining: next.length,
        entropy: currentEntropy,
        mutualInformation: gained,
      },
    });

    let outcome: ScoredOutcome;
    if (score.bulls === guess.length) {
      this.currentStatus = 'won';
      outcome = { kind: 'win', attempts: attempt };
      this.onEvent?.({ name: 'game_won', props: { attempts: attempt } });
    } else {
      outcome = {
        kind: 'progress',
        bulls: score.bulls,
        cows: score.cows,
        mutualInformation: round2(gained),
        entropy: round2(currentEntropy),
      };
    }
    this.entries.push({ guess: formatCode(guess), outcome: { ...outcome } });
    return outcome;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get status(): GameStatus {
    return this.currentStatus;
  }

  /** Copies of the recorded entries; changing them does not touch the session. */
  get history(): readonly HistoryEntry[] {
    return this.entries.map(copyEntry);
  }

  /** Number of codes still consistent with every guess. */
  get remaining(): number {
    return this.candidates.length;
  }

  /** Full-precision entropy of the consistent candidate set. */
  get entropy(): number {
    return entropyOf(this.candidates.length);
  }

  consistentCandidates(): readonly Code[] {
    return this.candidates;
  }

  isCandidate(code: Code): boolean {
    return this.candidates.some((c) => sameCode(c, code));
  }

  snapshot(): SessionSnapshot {
    return {
      status: this.currentStatus,
      attempts: this.attemptCount,
      remaining: this.candidates.length,
      entropy: round2(this.entropy),
      history: this.entries.map(copyEntry),
    };
  }

  private started(): void {
    this.onEvent?.({
      name: 'game_started',
      props: { candidates: this.candidates.length, entropy: this.entropy },
    });
  }
}

/** Creates a new, independent session. */
export function newGame(options?: GameOptions): BullsCowsGame {
  return new BullsCowsGame(options);
}

export function processGuess(session: BullsCowsGame, raw: string): Outcome {
  return session.processGuess(raw);
}
