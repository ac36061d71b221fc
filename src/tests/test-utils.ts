import aesSBox from './fixtures/aes-sbox.json';
import type { Bit, SBoxTable } from '../types';
import { numToBits } from '../utils';

/**
 * The standard AES substitution table, 16 rows of 16 bytes
 */
export const aesSBoxTable: SBoxTable = aesSBox;

/**
 * Every bit vector of the given width, in increasing numeric order
 */
export function allBitVectors(width: number): Bit[][] {
  return Array.from({ length: 2 ** width }, (_, value) => numToBits(value, width));
}

/**
 * Runs `fn` and returns what it threw, failing the test when it returns normally
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('Expected function to throw');
}
