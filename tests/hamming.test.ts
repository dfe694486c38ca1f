/**
 * Tests for the Hamming(7,4) block encoder and decoder
 */

import { describe, it, expect } from 'vitest';
import type { Codeword, Nibble } from '../src/types';
import { encodeBlock, encodeBits, encodeNibble, toNibble } from '../src/encode/hamming';
import { decodeBlock, decodeBits, decodeWord, syndromeOf, syndromeOfWord, toCodeword } from '../src/decode/hamming';
import { HAMMING, positionToIndex } from '../src/utils/constants';
import { packBits, toBit } from '../src/utils/bits';

const ALL_NIBBLES: Nibble[] = Array.from({ length: 16 }, (_, n) =>
  toNibble([toBit(n >> 3), toBit(n >> 2), toBit(n >> 1), toBit(n)])
);

function flipPosition(codeword: Codeword, position: number): Codeword {
  const flipped: Codeword = [...codeword];
  const index = positionToIndex(position);
  flipped[index] = flipped[index] === 1 ? 0 : 1;
  return flipped;
}

describe('Hamming(7,4)', () => {
  describe('encodeBlock', () => {
    it('should encode 1011 with the column-parity check bits', () => {
      // Positions 7..1: d0 d1 d2 P4 d3 P2 P1
      expect(encodeBlock([1, 0, 1, 1])).toEqual([1, 0, 1, 0, 1, 0, 1]);
    });

    it('should encode 0100', () => {
      expect(encodeBlock([0, 1, 0, 0])).toEqual([0, 1, 0, 1, 0, 1, 0]);
    });

    it('should map all zeros and all ones to themselves', () => {
      expect(encodeBlock([0, 0, 0, 0])).toEqual([0, 0, 0, 0, 0, 0, 0]);
      expect(encodeBlock([1, 1, 1, 1])).toEqual([1, 1, 1, 1, 1, 1, 1]);
    });

    it('should place data bits on positions 7, 6, 5 and 3', () => {
      for (const nibble of ALL_NIBBLES) {
        const codeword = encodeBlock(nibble);
        expect(HAMMING.DATA_POSITIONS.map(p => codeword[positionToIndex(p)])).toEqual(nibble);
      }
    });

    it('should produce 16 distinct codewords', () => {
      const seen = new Set(ALL_NIBBLES.map(n => encodeBlock(n).join('')));
      expect(seen.size).toBe(16);
    });

    it('should satisfy even parity on every check group', () => {
      for (const nibble of ALL_NIBBLES) {
        const codeword = encodeBlock(nibble);

        for (const check of HAMMING.CHECK_POSITIONS) {
          let parity = 0;
          for (let position = 1; position <= HAMMING.CODE_BITS; position++) {
            if (position & check) {
              parity ^= codeword[positionToIndex(position)];
            }
          }
          expect(parity).toBe(0);
        }

        expect(syndromeOf(codeword)).toBe(0);
      }
    });
  });

  describe('decodeBlock', () => {
    it('should pass clean codewords through uncorrected', () => {
      for (const nibble of ALL_NIBBLES) {
        expect(decodeBlock(encodeBlock(nibble))).toEqual({
          nibble,
          corrected: false,
          syndrome: 0,
        });
      }
    });

    it('should correct any single flipped bit', () => {
      for (const nibble of ALL_NIBBLES) {
        for (let position = 1; position <= HAMMING.CODE_BITS; position++) {
          const received = flipPosition(encodeBlock(nibble), position);
          expect(decodeBlock(received)).toEqual({
            nibble,
            corrected: true,
            syndrome: position,
          });
        }
      }
    });

    it('should recover 1011 after position 5 is flipped', () => {
      const received = flipPosition(encodeBlock([1, 0, 1, 1]), 5);
      expect(received).toEqual([1, 0, 0, 0, 1, 0, 1]);

      const result = decodeBlock(received);
      expect(result.nibble).toEqual([1, 0, 1, 1]);
      expect(result.corrected).toBe(true);
    });

    it('should not modify the received codeword', () => {
      const received: Codeword = [1, 0, 0, 0, 1, 0, 1];
      decodeBlock(received);
      expect(received).toEqual([1, 0, 0, 0, 1, 0, 1]);
    });

    it('should miscorrect a double error without notice', () => {
      // Flipping positions 1 and 2 gives syndrome 3, so position 3 (d3) is "fixed"
      const received = flipPosition(flipPosition(encodeBlock([0, 0, 0, 0]), 1), 2);
      const result = decodeBlock(received);

      expect(result.syndrome).toBe(3);
      expect(result.corrected).toBe(true);
      expect(result.nibble).toEqual([0, 0, 0, 1]);
    });
  });

  describe('packed codewords', () => {
    it('should match encodeBlock for every nibble', () => {
      for (const nibble of ALL_NIBBLES) {
        expect(encodeNibble(packBits(nibble))).toBe(packBits(encodeBlock(nibble)));
      }
    });

    it('should encode 1011 as 1010101 and ignore higher bits', () => {
      expect(encodeNibble(0b1011)).toBe(0b1010101);
      expect(encodeNibble(0xFB)).toBe(0b1010101);
    });

    it('should correct a flip at any position, bit k being position k + 1', () => {
      for (let value = 0; value < 16; value++) {
        const word = encodeNibble(value);
        expect(syndromeOfWord(word)).toBe(0);
        expect(decodeWord(word)).toBe(value);

        for (let position = 1; position <= HAMMING.CODE_BITS; position++) {
          const received = word ^ (1 << (position - 1));
          expect(syndromeOfWord(received)).toBe(position);
          expect(decodeWord(received)).toBe(value);
        }
      }
    });

    it('should miscorrect a double error like decodeBlock', () => {
      // Positions 1 and 2 flipped in the all-zero codeword
      expect(syndromeOfWord(0b0000011)).toBe(3);
      expect(decodeWord(0b0000011)).toBe(0b0001);
    });
  });

  describe('block builders', () => {
    it('should zero-fill a short nibble', () => {
      expect(toNibble([1])).toEqual([1, 0, 0, 0]);
    });

    it('should reject oversized input', () => {
      expect(() => toNibble([1, 0, 1, 0, 1])).toThrow(RangeError);
      expect(() => toCodeword([1, 0, 1])).toThrow(RangeError);
    });
  });

  describe('stream functions', () => {
    it('should encode a byte as two codewords', () => {
      expect(encodeBits([1, 0, 1, 1, 0, 1, 0, 0])).toEqual([
        [1, 0, 1, 0, 1, 0, 1],
        [0, 1, 0, 1, 0, 1, 0],
      ]);
    });

    it('should zero-fill a trailing partial nibble', () => {
      expect(encodeBits([1, 0])).toEqual([[1, 0, 0, 1, 0, 1, 1]]);
    });

    it('should decode codewords and report leftover bits', () => {
      const result = decodeBits([1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 0, 0]);

      expect(result.bits).toEqual([1, 0, 1, 1, 0, 1, 0, 0]);
      expect(result.blocks).toBe(2);
      expect(result.correctedBlocks).toBe(0);
      expect(result.droppedBits).toEqual([0, 0]);
    });

    it('should count corrected blocks', () => {
      // Second codeword has position 1 flipped
      const result = decodeBits([1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 1]);

      expect(result.bits).toEqual([1, 0, 1, 1, 0, 1, 0, 0]);
      expect(result.correctedBlocks).toBe(1);
    });
  });
});
