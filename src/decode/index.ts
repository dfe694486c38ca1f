/**
 * Main decoding pipeline
 *
 * Flow: Packed bytes → Codewords → Correct (table lookup) → Nibbles → Bytes
 */
import { BitReader, BitWriter } from '../utils/bits';
import { BITS_PER_BYTE, HAMMING } from '../utils/constants';
import { decodeWord, syndromeOfWord } from './hamming';

export interface DecodeResult {
  data: Uint8Array;
  stats: {
    encodedSize: number;
    decodedSize: number;
    blocks: number;
    correctedBlocks: number;
    droppedBits: number;
  };
}

/**
 * Size in bytes of the decoded form of `byteCount` encoded bytes
 */
export function expectedDecodedLength(byteCount: number): number {
  const blocks = Math.floor((byteCount * BITS_PER_BYTE) / HAMMING.CODE_BITS);
  return Math.floor((blocks * HAMMING.DATA_BITS) / BITS_PER_BYTE);
}

/**
 * Decode Hamming(7,4) bytes, correcting one flipped bit per block
 *
 * Bits after the last whole codeword are dropped, as is a final partial
 * byte of recovered data.
 */
export function decodeBytes(data: Uint8Array): DecodeResult {
  const reader = new BitReader(data);
  const blocks = Math.floor(reader.remaining / HAMMING.CODE_BITS);
  const decoded = new Uint8Array(expectedDecodedLength(data.length));
  const writer = new BitWriter(decoded);
  let correctedBlocks = 0;

  for (let block = 0; block < blocks; block++) {
    const word = reader.read(HAMMING.CODE_BITS);
    writer.write(decodeWord(word), HAMMING.DATA_BITS);
    if (syndromeOfWord(word) !== 0) correctedBlocks++;
  }

  const droppedBits = reader.remaining;

  // Encoder padding is all zeros; anything else means the input was cut short
  if (reader.read(droppedBits) !== 0) {
    console.warn(`[Decoder] Dropped ${droppedBits} trailing bits that do not form a codeword`);
  }

  if (correctedBlocks > 0) {
    console.log(`[Decoder] Corrected ${correctedBlocks} of ${blocks} blocks`);
  }

  return {
    data: decoded,
    stats: {
      encodedSize: data.length,
      decodedSize: decoded.length,
      blocks,
      correctedBlocks,
      droppedBits,
    },
  };
}
