import {
  drawSecret,
  hashSeed,
  isValidCode,
  mulberry32,
  seededRandom,
} from '../index.js';

describe('drawSecret', () => {
  it('always yields a valid code', () => {
    const rng = mulberry32(42);
    for (let i = 0; i < 200; i++) {
      expect(isValidCode(drawSecret(rng))).toBe(true);
    }
  });

  it('draws digits in order from the unused pool', () => {
    expect(drawSecret(() => 0)).toEqual([0, 1, 2, 3]);
    expect(drawSecret(() => 0.999999)).toEqual([9, 0, 1, 2]);
  });

  it('stays inside the digit pool when random() returns 1', () => {
    const secret = drawSecret(() => 1);
    expect(secret).toEqual([9, 0, 1, 2]);
    expect(isValidCode(secret)).toBe(true);
  });
});

describe('seeded randomness', () => {
  it('repeats the same secrets for the same seed', () => {
    const a = seededRandom('daily-42');
    const b = seededRandom('daily-42');
    expect([drawSecret(a), drawSecret(a)]).toEqual([drawSecret(b), drawSecret(b)]);
  });

  it('hashes seeds to unsigned 32-bit integers', () => {
    expect(hashSeed('')).toBe(2166136261);
    const h = hashSeed('bulls');
    expect(Number.isInteger(h)).toBe(true);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThan(2 ** 32);
  });

  it('produces values in [0, 1)', () => {
    const rng = mulberry32(7);
    for (let i = 0; i < 100; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});
