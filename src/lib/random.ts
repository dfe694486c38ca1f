/**
 * Random sources for the channel noise simulator
 *
 * The simulator only ever asks for uniform integers, so anything that can
 * produce them (a seeded generator, Math.random, a scripted test double)
 * plugs in through RandomSource.
 */

export interface RandomSource {
  /** Uniform integer in [min, max) */
  nextInt(min: number, max: number): number;
}

/**
 * Mulberry32 generator
 *
 * Fast, 32-bit state, reproducible from a seed.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  private nextUint32(): number {
    let t = (this.state = (this.state + 0x6D2B79F5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Float in [0, 1)
   */
  next(): number {
    return this.nextUint32() / 4294967296;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min;
  }
}

/**
 * Unseeded source backed by Math.random
 */
export class MathRandom implements RandomSource {
  nextInt(min: number, max: number): number {
    return Math.floor(Math.random() * (max - min)) + min;
  }
}

/**
 * Seed derived from the clock, for runs where no seed was given
 */
export function timeSeed(): number {
  return Date.now() >>> 0;
}

/**
 * Parse a user-supplied seed (decimal or 0x-prefixed hex, 32-bit unsigned)
 */
export function parseSeed(value: string): number {
  const trimmed = value.trim();
  const seed = /^0x[0-9a-f]+$/i.test(trimmed)
    ? parseInt(trimmed.slice(2), 16)
    : /^\d+$/.test(trimmed)
      ? parseInt(trimmed, 10)
      : NaN;

  if (!Number.isSafeInteger(seed) || seed > 0xFFFFFFFF) {
    throw new RangeError(`Invalid seed: "${value}" (expected an integer from 0 to 4294967295)`);
  }

  return seed;
}

/**
 * Seed from user input, falling back to the clock
 */
export function resolveSeed(value?: string): number {
  return value === undefined ? timeSeed() : parseSeed(value);
}
