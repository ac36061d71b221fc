/**
 * Bit-vector codec - Shared bit and integer conversions used by the boxes
 */

import type { Bit, BitVector } from './types';

/**
 * Interpret a bit vector as an unsigned integer, most significant bit first
 * @param bits - The bits to convert
 * @returns The integer value, 0 for an empty vector
 */
export function bitsToNum(bits: BitVector): number {
  let result = 0;

  for (const bit of bits) {
    // Multiplication instead of << keeps widths above 31 bits unsigned
    result = result * 2 + (bit ? 1 : 0);
  }

  return result;
}

/**
 * Convert an unsigned integer to exactly `bitCount` bits, most significant bit first.
 * High-order bits of `num` that do not fit are dropped.
 * @param num - The value to convert
 * @param bitCount - Width of the resulting vector
 * @returns The bit vector representation
 */
export function numToBits(num: number, bitCount: number): Bit[] {
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new Error(`Expected a non-negative safe integer, received ${num}`);
  }
  if (!Number.isSafeInteger(bitCount) || bitCount < 0) {
    throw new Error(`Expected a non-negative bit count, received ${bitCount}`);
  }

  const result: Bit[] = [];
  let rest = num;
  for (let i = 0; i < bitCount; i++) {
    result.push(rest % 2 === 1);
    rest = Math.floor(rest / 2);
  }

  return result.reverse();
}

/**
 * Minimal number of bits needed to address `n` distinct values, i.e. ceil(log2(n))
 * @param n - A positive integer
 * @returns The smallest `c` such that 2^c >= n
 */
export function ceilLog(n: number): number {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new Error(`ceilLog expects a positive integer, received ${n}`);
  }

  let result = 0;
  let rest = n;
  while (rest > 1) {
    result++;
    rest = Math.ceil(rest / 2);
  }

  return result;
}

/**
 * Number of bits needed to write `value` in binary (0 for 0)
 */
export function bitLength(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`Expected a non-negative safe integer, received ${value}`);
  }

  let result = 0;
  let rest = value;
  while (rest > 0) {
    result++;
    rest = Math.floor(rest / 2);
  }

  return result;
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0 && 2 ** ceilLog(n) === n;
}

/**
 * Render a bit vector as a string of 0 and 1 characters
 */
export function formatBits(bits: BitVector): string {
  return bits.map(bit => (bit ? '1' : '0')).join('');
}

/**
 * Parse a string of 0 and 1 characters into a bit vector.
 * Underscores and whitespace are accepted as group separators.
 * @param text - The string to parse, e.g. '1100_1010'
 * @returns The bit vector, most significant bit first
 */
export function parseBits(text: string): Bit[] {
  if (typeof text !== 'string') {
    throw new Error('Expected string containing bit data');
  }

  const bits: Bit[] = [];
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '0' || char === '1') {
      bits.push(char === '1');
    } else if (char !== '_' && char.trim() !== '') {
      throw new Error(`Invalid character '${char}' at index ${i}`);
    }
  }

  return bits;
}
