/**
 * Hamming(7,4) block encoder
 *
 * Each nibble d0..d3 is placed on positions 7, 6, 5 and 3. The check bits on
 * positions 4, 2 and 1 complete every parity group to an even count, where a
 * group is the set of positions sharing one bit of their binary index.
 */
import type { Bit, Codeword, Nibble } from '../types';
import { HAMMING, positionToIndex } from '../utils/constants';
import { chunkBits, packBits, toBit, unpackBits } from '../utils/bits';

/**
 * Build a nibble from up to four bits, zero-filling a short group
 */
export function toNibble(bits: readonly Bit[]): Nibble {
  if (bits.length > HAMMING.DATA_BITS) {
    throw new RangeError(`Nibble needs at most ${HAMMING.DATA_BITS} bits, got ${bits.length}`);
  }
  const [d0 = 0, d1 = 0, d2 = 0, d3 = 0] = bits;
  return [d0, d1, d2, d3];
}

/**
 * Encode 4 data bits into a 7-bit codeword (wire order D7 D6 D5 P4 D3 P2 P1)
 */
export function encodeBlock(nibble: Nibble): Codeword {
  const codeword: Codeword = [0, 0, 0, 0, 0, 0, 0];

  // XOR of the positions of all set data bits; bit k is the odd/even
  // count of column k
  let columns = 0;

  HAMMING.DATA_POSITIONS.forEach((position, i) => {
    const bit = nibble[i];
    codeword[positionToIndex(position)] = bit;
    if (bit === 1) {
      columns ^= position;
    }
  });

  for (const check of HAMMING.CHECK_POSITIONS) {
    codeword[positionToIndex(check)] = toBit(columns & check ? 1 : 0);
  }

  return codeword;
}

// Packed codeword for every nibble value 0..15, d0 as the high bit
const CODEWORDS = Uint8Array.from({ length: 1 << HAMMING.DATA_BITS }, (_, value) =>
  packBits(encodeBlock(toNibble(unpackBits(value, HAMMING.DATA_BITS))))
);

/**
 * Encode a packed nibble (d0 high) into a packed 7-bit codeword
 * (D7 high, P1 low)
 */
export function encodeNibble(value: number): number {
  return CODEWORDS[value & 0x0f];
}

/**
 * Encode a bit stream nibble by nibble
 *
 * Byte-derived streams always split evenly; a short final group from any
 * other source is zero-filled before encoding.
 */
export function encodeBits(bits: readonly Bit[]): Codeword[] {
  const { groups, remainder } = chunkBits(bits, HAMMING.DATA_BITS);
  const codewords = groups.map(group => encodeBlock(toNibble(group)));

  if (remainder.length > 0) {
    codewords.push(encodeBlock(toNibble(remainder)));
  }

  return codewords;
}

/**
 * Flatten codewords back into a single bit stream
 */
export function codewordsToBits(codewords: readonly Codeword[]): Bit[] {
  const bits: Bit[] = [];
  for (const codeword of codewords) {
    bits.push(...codeword);
  }
  return bits;
}
