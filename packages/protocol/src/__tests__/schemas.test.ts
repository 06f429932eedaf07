// packages/protocol/src/__tests__/schemas.test.ts
//
// Unit tests for the shared Zod schemas.
//
// Covered cases:
//   • guessInput accepts 4 distinct digits and reports the first broken rule
//   • outcomeSchema accepts each outcome shape and rejects impossible scores
//   • sessionSnapshot refuses an empty candidate set

import {
  GUESS_DIGITS_MESSAGE,
  GUESS_LENGTH_MESSAGE,
  GUESS_UNIQUE_MESSAGE,
  guessInput,
  outcomeSchema,
  sessionSnapshot,
} from '../index.js';

function firstMessage(raw: string): string | undefined {
  const parsed = guessInput.safeParse(raw);
  return parsed.success ? undefined : parsed.error.issues[0]?.message;
}

describe('guessInput', () => {
  it('accepts four distinct digits', () => {
    expect(guessInput.safeParse('1234').success).toBe(true);
    expect(guessInput.safeParse('0987').success).toBe(true);
  });

  it('rejects wrong lengths', () => {
    expect(firstMessage('123')).toBe(GUESS_LENGTH_MESSAGE);
    expect(firstMessage('12345')).toBe(GUESS_LENGTH_MESSAGE);
    expect(firstMessage('')).toBe(GUESS_LENGTH_MESSAGE);
  });

  it('rejects non-digit characters', () => {
    expect(firstMessage('12a3')).toBe(GUESS_DIGITS_MESSAGE);
    expect(firstMessage(' 123')).toBe(GUESS_DIGITS_MESSAGE);
  });

  it('rejects repeated digits', () => {
    expect(firstMessage('1123')).toBe(GUESS_UNIQUE_MESSAGE);
  });

  it('reports the length problem first when several rules fail', () => {
    expect(firstMessage('1a')).toBe(GUESS_LENGTH_MESSAGE);
    expect(guessInput.safeParse('1a').error?.issues).toHaveLength(1);
  });
});

describe('outcomeSchema', () => {
  it('accepts every outcome kind', () => {
    expect(
      outcomeSchema.parse({ kind: 'validation-error', message: 'nope' }),
    ).toEqual({ kind: 'validation-error', message: 'nope' });
    expect(outcomeSchema.parse({ kind: 'win', attempts: 3 })).toEqual({
      kind: 'win',
      attempts: 3,
    });
    expect(
      outcomeSchema.parse({
        kind: 'progress',
        bulls: 0,
        cows: 4,
        mutualInformation: 9.13,
        entropy: 3.17,
      }),
    ).toEqual({
      kind: 'progress',
      bulls: 0,
      cows: 4,
      mutualInformation: 9.13,
      entropy: 3.17,
    });
  });

  it('rejects a progress outcome with four bulls', () => {
    const res = outcomeSchema.safeParse({
      kind: 'progress',
      bulls: 4,
      cows: 0,
      mutualInformation: 0,
      entropy: 0,
    });
    expect(res.success).toBe(false);
  });

  it('rejects more than four matches in total', () => {
    const res = outcomeSchema.safeParse({
      kind: 'progress',
      bulls: 2,
      cows: 3,
      mutualInformation: 1,
      entropy: 1,
    });
    expect(res.success).toBe(false);
  });
});

describe('sessionSnapshot', () => {
  it('requires at least one remaining candidate', () => {
    const res = sessionSnapshot.safeParse({
      status: 'ready',
      attempts: 0,
      remaining: 0,
      entropy: 0,
      history: [],
    });
    expect(res.success).toBe(false);
  });
});
