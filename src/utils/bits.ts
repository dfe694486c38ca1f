/**
 * Bit-stream adapter
 *
 * Bytes are expanded most-significant bit first, the same order used when
 * packing bits back into bytes. `Bit[]` arrays suit small inputs and tests;
 * the byte pipelines stream through `BitReader`/`BitWriter` instead so that
 * memory stays proportional to the file size.
 */
import type { Bit } from '../types';
import { BITS_PER_BYTE } from './constants';

export function toBit(value: number): Bit {
  return value & 1 ? 1 : 0;
}

/**
 * Expand bytes into bits, MSB first
 */
export function bytesToBits(bytes: Uint8Array): Bit[] {
  const bits: Bit[] = [];

  for (const byte of bytes) {
    for (let i = 7; i >= 0; i--) {
      bits.push(toBit(byte >> i));
    }
  }

  return bits;
}

/**
 * Number of zero bits needed to reach the next byte boundary
 */
export function paddingFor(bitCount: number): number {
  const remainder = bitCount % BITS_PER_BYTE;
  return remainder === 0 ? 0 : BITS_PER_BYTE - remainder;
}

/**
 * Pack bits into bytes, MSB first
 *
 * With pad set, a trailing partial byte is completed with zero bits.
 * Without it, the partial byte is dropped.
 */
export function bitsToBytes(bits: readonly Bit[], pad = false): Uint8Array {
  const numBytes = pad
    ? Math.ceil(bits.length / BITS_PER_BYTE)
    : Math.floor(bits.length / BITS_PER_BYTE);
  const output = new Uint8Array(numBytes);
  const usable = Math.min(bits.length, numBytes * BITS_PER_BYTE);

  for (let i = 0; i < usable; i++) {
    const byteIndex = Math.floor(i / BITS_PER_BYTE);
    const bitIndex = 7 - (i % BITS_PER_BYTE);
    output[byteIndex] |= bits[i] << bitIndex;
  }

  return output;
}

/**
 * Split bits into consecutive groups of `size`
 *
 * Returns the complete groups and whatever is left over at the end.
 */
export function chunkBits(
  bits: readonly Bit[],
  size: number
): { groups: Bit[][]; remainder: Bit[] } {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Invalid group size: ${size}`);
  }

  const aligned = Math.floor(bits.length / size) * size;
  const groups: Bit[][] = [];

  for (let offset = 0; offset < aligned; offset += size) {
    groups.push(bits.slice(offset, offset + size));
  }

  return { groups, remainder: bits.slice(aligned) };
}

/**
 * Read a group of bits as an unsigned integer, first bit highest
 */
export function packBits(bits: readonly Bit[]): number {
  return bits.reduce<number>((value, bit) => (value << 1) | bit, 0);
}

/**
 * Expand the low `width` bits of a value, highest first
 */
export function unpackBits(value: number, width: number): Bit[] {
  const bits: Bit[] = [];
  for (let i = width - 1; i >= 0; i--) {
    bits.push(toBit(value >> i));
  }
  return bits;
}

/**
 * Invert one bit of a packed buffer, counted MSB first from the start
 */
export function flipBit(buffer: Uint8Array, bitOffset: number): void {
  buffer[Math.floor(bitOffset / BITS_PER_BYTE)] ^= 0x80 >> (bitOffset % BITS_PER_BYTE);
}

/**
 * Sequential MSB-first reader over a byte buffer
 */
export class BitReader {
  private offset = 0;

  constructor(private readonly buffer: Uint8Array) {}

  /** Bits not yet read */
  get remaining(): number {
    return this.buffer.length * BITS_PER_BYTE - this.offset;
  }

  read(width: number): number {
    if (width > this.remaining) {
      throw new RangeError(`Cannot read ${width} bits, ${this.remaining} left`);
    }

    let value = 0;
    for (let i = 0; i < width; i++) {
      const byte = this.buffer[Math.floor(this.offset / BITS_PER_BYTE)];
      value = (value << 1) | ((byte >> (7 - (this.offset % BITS_PER_BYTE))) & 1);
      this.offset++;
    }
    return value;
  }
}

/**
 * Sequential MSB-first writer into a preallocated, zeroed buffer
 *
 * Bits that fall past the end of the buffer are discarded, so a trailing
 * partial byte is dropped the same way `bitsToBytes` drops it.
 */
export class BitWriter {
  private offset = 0;

  constructor(private readonly buffer: Uint8Array) {}

  get bitsWritten(): number {
    return this.offset;
  }

  write(value: number, width: number): void {
    for (let i = width - 1; i >= 0; i--) {
      const byteIndex = Math.floor(this.offset / BITS_PER_BYTE);
      if (byteIndex < this.buffer.length && (value >> i) & 1) {
        this.buffer[byteIndex] |= 0x80 >> (this.offset % BITS_PER_BYTE);
      }
      this.offset++;
    }
  }
}
