/**
 * Hamming(7,4) syndrome decoder
 *
 * The syndrome is the XOR of the positions of every set bit. A clean
 * codeword gives 0; a single flipped bit gives that bit's position.
 * Two or more flips produce a syndrome that points at the wrong bit, and
 * the block is "corrected" into the wrong nibble without notice.
 */
import type { Bit, BlockDecodeResult, Codeword } from '../types';
import { HAMMING, indexToPosition, positionToIndex } from '../utils/constants';
import { chunkBits, packBits, unpackBits } from '../utils/bits';

export interface BitsDecodeResult {
  bits: Bit[];
  blocks: number;
  correctedBlocks: number;
  /** Trailing bits that did not fill a codeword */
  droppedBits: Bit[];
}

/**
 * Build a codeword from exactly seven bits
 */
export function toCodeword(bits: readonly Bit[]): Codeword {
  if (bits.length !== HAMMING.CODE_BITS) {
    throw new RangeError(`Codeword needs ${HAMMING.CODE_BITS} bits, got ${bits.length}`);
  }
  const [b0, b1, b2, b3, b4, b5, b6] = bits;
  return [b0, b1, b2, b3, b4, b5, b6];
}

/**
 * Compute the syndrome of a received codeword (0..7)
 */
export function syndromeOf(codeword: Codeword): number {
  let syndrome = 0;
  codeword.forEach((bit, index) => {
    if (bit === 1) {
      syndrome ^= indexToPosition(index);
    }
  });
  return syndrome;
}

/**
 * Decode one codeword, repairing a single flipped bit
 */
export function decodeBlock(received: Codeword): BlockDecodeResult {
  const codeword: Codeword = [...received];
  const syndrome = syndromeOf(codeword);

  if (syndrome !== 0) {
    const index = positionToIndex(syndrome);
    codeword[index] = codeword[index] === 1 ? 0 : 1;
  }

  const [p7, p6, p5, p3] = HAMMING.DATA_POSITIONS.map(position => codeword[positionToIndex(position)]);

  return {
    nibble: [p7, p6, p5, p3],
    corrected: syndrome !== 0,
    syndrome,
  };
}

// Lookup tables indexed by a packed 7-bit codeword (D7 high, P1 low):
// the corrected nibble (d0 high) and the syndrome
const NIBBLES = new Uint8Array(1 << HAMMING.CODE_BITS);
const SYNDROMES = new Uint8Array(1 << HAMMING.CODE_BITS);

for (let word = 0; word < NIBBLES.length; word++) {
  const { nibble, syndrome } = decodeBlock(toCodeword(unpackBits(word, HAMMING.CODE_BITS)));
  NIBBLES[word] = packBits(nibble);
  SYNDROMES[word] = syndrome;
}

/**
 * Syndrome of a packed codeword
 *
 * Bit k of the packed value is position k + 1, so this equals
 * `syndromeOf` on the unpacked codeword.
 */
export function syndromeOfWord(word: number): number {
  return SYNDROMES[word & 0x7f];
}

/**
 * Corrected nibble (packed, d0 high) of a packed codeword
 */
export function decodeWord(word: number): number {
  return NIBBLES[word & 0x7f];
}

/**
 * Decode a bit stream codeword by codeword
 *
 * Bits past the last complete codeword are returned in droppedBits.
 */
export function decodeBits(bits: readonly Bit[]): BitsDecodeResult {
  const { groups, remainder } = chunkBits(bits, HAMMING.CODE_BITS);
  const output: Bit[] = [];
  let correctedBlocks = 0;

  for (const group of groups) {
    const { nibble, corrected } = decodeBlock(toCodeword(group));
    output.push(...nibble);
    if (corrected) correctedBlocks++;
  }

  return {
    bits: output,
    blocks: groups.length,
    correctedBlocks,
    droppedBits: remainder,
  };
}
