// Hamming(7,4) block geometry
// Positions are the classical 1-indexed Hamming positions. Check bits sit on
// the powers of two, data bits everywhere else.
export const HAMMING = {
  DATA_BITS: 4,
  CODE_BITS: 7,
  CHECK_POSITIONS: [4, 2, 1] as readonly number[],
  // Stream order of the data bits: d0 → 7, d1 → 6, d2 → 5, d3 → 3
  DATA_POSITIONS: [7, 6, 5, 3] as readonly number[],
  // Codewords are written highest position first: D7 D6 D5 P4 D3 P2 P1
  HIGHEST_POSITION: 7,
} as const;

// Channel noise simulator
// One draw in [0, OUTCOMES) decides whether a block is hit; only the sentinel
// outcome flips a bit, giving each block a 1/7 chance.
export const NOISE = {
  OUTCOMES: 7,
  SENTINEL: 4,
} as const;

export const BITS_PER_BYTE = 8;

/**
 * Array index of a 1-indexed codeword position in wire order
 */
export function positionToIndex(position: number): number {
  return HAMMING.HIGHEST_POSITION - position;
}

/**
 * 1-indexed codeword position of an array index in wire order
 */
export function indexToPosition(index: number): number {
  return HAMMING.HIGHEST_POSITION - index;
}
