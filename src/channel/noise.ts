/**
 * Channel noise simulator
 *
 * Each codeword independently has a 1/7 chance of one bit flip at a uniformly
 * chosen index, parity or data alike. A block is never hit twice, so every
 * corruption stays within what the decoder can repair.
 */
import type { BitFlip, Codeword } from '../types';
import { BITS_PER_BYTE, HAMMING, NOISE } from '../utils/constants';
import type { RandomSource } from '../lib/random';
import { flipBit } from '../utils/bits';

export interface NoiseResult {
  codewords: Codeword[];
  blocks: number;
  corruptedBlocks: number;
  flips: BitFlip[];
}

/** Probability that a single block is corrupted */
export const flipRate = 1 / NOISE.OUTCOMES;

function draw(random: RandomSource, max: number): number {
  const value = random.nextInt(0, max);
  if (!Number.isInteger(value) || value < 0 || value >= max) {
    throw new RangeError(`Random source returned ${value}, expected an integer in [0, ${max})`);
  }
  return value;
}

/**
 * Decide the fate of one block: the bit index to flip, or null
 */
function drawFlip(random: RandomSource): number | null {
  if (draw(random, NOISE.OUTCOMES) !== NOISE.SENTINEL) {
    return null;
  }
  return draw(random, HAMMING.CODE_BITS);
}

function report(corrupted: number, blocks: number): void {
  if (corrupted > 0) {
    console.log(`[Noise] Flipped ${corrupted} of ${blocks} blocks`);
  }
}

/**
 * Maybe flip one bit of a single codeword
 *
 * Returns the flipped index, or null when the block was left alone.
 */
export function corruptBlock(codeword: Codeword, random: RandomSource): { codeword: Codeword; index: number | null } {
  const index = drawFlip(random);
  if (index === null) {
    return { codeword: [...codeword], index: null };
  }

  const corrupted: Codeword = [...codeword];
  corrupted[index] = corrupted[index] === 1 ? 0 : 1;

  return { codeword: corrupted, index };
}

/**
 * Run every codeword through the noisy channel
 *
 * Inputs are left untouched; corrupted copies are returned.
 */
export function injectNoise(codewords: readonly Codeword[], random: RandomSource): NoiseResult {
  const output: Codeword[] = [];
  const flips: BitFlip[] = [];

  codewords.forEach((codeword, block) => {
    const { codeword: received, index } = corruptBlock(codeword, random);
    output.push(received);
    if (index !== null) {
      flips.push({ block, index });
    }
  });

  report(flips.length, codewords.length);

  return {
    codewords: output,
    blocks: codewords.length,
    corruptedBlocks: flips.length,
    flips,
  };
}

/**
 * Run the first `blocks` packed codewords of a buffer through the noisy
 * channel, flipping bits in place
 *
 * Draws happen in the same order as `injectNoise`, so a seed gives the same
 * flips either way. Bits after the last block are never touched.
 */
export function applyNoise(buffer: Uint8Array, blocks: number, random: RandomSource): BitFlip[] {
  if (blocks * HAMMING.CODE_BITS > buffer.length * BITS_PER_BYTE) {
    throw new RangeError(`Buffer of ${buffer.length} bytes cannot hold ${blocks} codewords`);
  }

  const flips: BitFlip[] = [];

  for (let block = 0; block < blocks; block++) {
    const index = drawFlip(random);
    if (index !== null) {
      flipBit(buffer, block * HAMMING.CODE_BITS + index);
      flips.push({ block, index });
    }
  }

  report(flips.length, blocks);
  return flips;
}
