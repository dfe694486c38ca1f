/**
 * Shared types for the Hamming(7,4) codec
 */

export type Bit = 0 | 1;

/** Four data bits in stream order: d0, d1, d2, d3 */
export type Nibble = [Bit, Bit, Bit, Bit];

/**
 * Seven code bits in wire order. Index i holds Hamming position 7 - i:
 * D7 D6 D5 P4 D3 P2 P1
 */
export type Codeword = [Bit, Bit, Bit, Bit, Bit, Bit, Bit];

export interface BlockDecodeResult {
  nibble: Nibble;
  /** True when a bit was flipped back */
  corrected: boolean;
  /** 0 for a clean block, otherwise the 1-indexed position that was repaired */
  syndrome: number;
}

export interface BitFlip {
  /** Codeword index within the stream */
  block: number;
  /** Bit index within the codeword, wire order */
  index: number;
}
