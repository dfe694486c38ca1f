export type { Bit, Nibble, Codeword, BlockDecodeResult, BitFlip } from './types';
export { HAMMING, NOISE } from './utils/constants';
export { bytesToBits, bitsToBytes, chunkBits, paddingFor, packBits, unpackBits, BitReader, BitWriter } from './utils/bits';
export { encodeBlock, encodeBits, encodeNibble, codewordsToBits, toNibble } from './encode/hamming';
export { decodeBlock, decodeBits, decodeWord, syndromeOf, syndromeOfWord, toCodeword } from './decode/hamming';
export type { BitsDecodeResult } from './decode/hamming';
export { injectNoise, applyNoise, corruptBlock, flipRate } from './channel/noise';
export type { NoiseResult } from './channel/noise';
export { encodeBytes, expectedEncodedLength } from './encode';
export type { EncodeOptions, EncodeResult } from './encode';
export { corruptBytes } from './channel';
export type { CorruptResult } from './channel';
export { decodeBytes, expectedDecodedLength } from './decode';
export type { DecodeResult } from './decode';
export { SeededRandom, MathRandom, parseSeed, resolveSeed, timeSeed } from './lib/random';
export type { RandomSource } from './lib/random';
