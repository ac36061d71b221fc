/**
 * Common type definitions for the boxes
 */

export type Bit = boolean;

// Most significant bit first
export type BitVector = readonly Bit[];

export type SBoxTable = readonly (readonly number[])[];

export type Permutation = readonly number[];

export interface SBoxOptions {
  /**
   * Reject tables that map two addresses to the same output.
   * Without it a non-bijective table is accepted and `decrypt` is not the inverse of `encrypt`.
   */
  checkBijection?: boolean;
}

/**
 * An invertible transform over fixed-width bit vectors.
 */
export interface BitTransform {
  /** Number of bits consumed and produced per call */
  readonly width: number;
  encrypt(bits: BitVector): Bit[];
  decrypt(bits: BitVector): Bit[];
}
