/**
 * Channel corruption pipeline
 *
 * Flow: Encoded bytes → Packed codewords → Noise (in place on a copy)
 *
 * Only whole codewords are exposed to noise. The bits after the last
 * codeword (the encoder's padding) are carried through as they are, so the
 * output is exactly as long as the input.
 */
import type { BitFlip } from '../types';
import { BITS_PER_BYTE, HAMMING } from '../utils/constants';
import type { RandomSource } from '../lib/random';
import { applyNoise } from './noise';

export interface CorruptResult {
  data: Uint8Array;
  flips: BitFlip[];
  stats: {
    size: number;
    blocks: number;
    corruptedBlocks: number;
    trailingBits: number;
  };
}

/**
 * Simulate a noisy channel over an encoded byte buffer
 */
export function corruptBytes(data: Uint8Array, random: RandomSource): CorruptResult {
  const totalBits = data.length * BITS_PER_BYTE;
  const blocks = Math.floor(totalBits / HAMMING.CODE_BITS);

  // Copy; the caller's buffer is never modified
  const output = new Uint8Array(data);
  const flips = applyNoise(output, blocks, random);

  return {
    data: output,
    flips,
    stats: {
      size: data.length,
      blocks,
      corruptedBlocks: flips.length,
      trailingBits: totalBits - blocks * HAMMING.CODE_BITS,
    },
  };
}
