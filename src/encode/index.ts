/**
 * Main encoding pipeline
 *
 * Flow: Bytes → Nibbles → Codewords (table lookup) → Packed bytes → Noise?
 */
import { BitWriter } from '../utils/bits';
import { BITS_PER_BYTE, HAMMING } from '../utils/constants';
import { applyNoise } from '../channel/noise';
import type { RandomSource } from '../lib/random';
import { encodeNibble } from './hamming';

export interface EncodeResult {
  data: Uint8Array;
  stats: {
    originalSize: number;
    encodedSize: number;
    blocks: number;
    paddingBits: number;
    corruptedBlocks: number;
  };
}

export interface EncodeOptions {
  /** When set, encoded blocks also pass through the noise simulator */
  noise?: RandomSource;
}

/**
 * Size in bytes of the encoded form of `byteCount` input bytes
 */
export function expectedEncodedLength(byteCount: number): number {
  const codeBits = (byteCount * BITS_PER_BYTE / HAMMING.DATA_BITS) * HAMMING.CODE_BITS;
  return Math.ceil(codeBits / BITS_PER_BYTE);
}

/**
 * Encode bytes with Hamming(7,4)
 *
 * The output is zero-padded to a whole byte. There is no length header; the
 * padding is always shorter than one codeword, so decoding recovers the
 * exact input length.
 */
export function encodeBytes(data: Uint8Array, options: EncodeOptions = {}): EncodeResult {
  const encoded = new Uint8Array(expectedEncodedLength(data.length));
  const writer = new BitWriter(encoded);

  for (const byte of data) {
    writer.write(encodeNibble(byte >> HAMMING.DATA_BITS), HAMMING.CODE_BITS);
    writer.write(encodeNibble(byte), HAMMING.CODE_BITS);
  }

  const blocks = (data.length * BITS_PER_BYTE) / HAMMING.DATA_BITS;
  const paddingBits = encoded.length * BITS_PER_BYTE - writer.bitsWritten;
  const corruptedBlocks = options.noise ? applyNoise(encoded, blocks, options.noise).length : 0;

  console.log(`[Encoder] ${data.length} bytes → ${blocks} blocks → ${encoded.length} bytes`);

  return {
    data: encoded,
    stats: {
      originalSize: data.length,
      encodedSize: encoded.length,
      blocks,
      paddingBits,
      corruptedBlocks,
    },
  };
}
