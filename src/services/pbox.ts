import { BoxCodedError } from '../errors';
import type { Bit, BitTransform, BitVector, Permutation } from '../types';
import { MAX_PERMUTATION_LENGTH, describeIssues, permutationSchema } from './schemas';

/**
 * Permutation box: moves input bit `i` to output position `permutation[i] - 1`.
 * Positions are 1-based and at most 32 bits are supported.
 */
export class PBox implements BitTransform {
  readonly width: number;

  private constructor(
    readonly permutation: Permutation,
    readonly inversePermutation: Permutation
  ) {
    this.width = permutation.length;
    Object.freeze(this);
  }

  /**
   * @throws {BoxCodedError} `invalid-permutation` unless `permutation` is a bijection on 1..n with 1 <= n <= 32
   */
  static create(permutation: Permutation): PBox {
    const parsed = permutationSchema.safeParse(permutation);
    if (!parsed.success) {
      throw new BoxCodedError(
        `Invalid permutation: ${describeIssues(parsed.error)}`,
        'invalid-permutation',
        parsed.error
      );
    }

    const forward = Object.freeze([...parsed.data]);
    PBox.checkPermutation(forward);
    return new PBox(forward, Object.freeze(PBox.invertPermutation(forward)));
  }

  encrypt(bits: BitVector): Bit[] {
    return this.transform(bits, this.permutation);
  }

  decrypt(bits: BitVector): Bit[] {
    return this.transform(bits, this.inversePermutation);
  }

  private transform(bits: BitVector, permutation: Permutation): Bit[] {
    if (bits.length !== this.width) {
      throw new BoxCodedError(
        `P-box expects ${this.width} input bits, received ${bits.length}`,
        'invalid-input-length'
      );
    }

    const result: Bit[] = new Array<Bit>(this.width).fill(false);
    bits.forEach((bit, i) => {
      result[permutation[i] - 1] = bit;
    });
    return result;
  }

  private static checkPermutation(permutation: Permutation): void {
    const n = permutation.length;
    if (n === 0 || n > MAX_PERMUTATION_LENGTH) {
      throw invalidPermutation(
        `length must be between 1 and ${MAX_PERMUTATION_LENGTH}, received ${n}`
      );
    }

    // n <= 32, so one bit per position fits a 32-bit mask
    let used = 0;
    permutation.forEach((position, i) => {
      if (position < 1 || position > n) {
        throw invalidPermutation(`position ${position} at index ${i} is outside 1..${n}`);
      }

      const mask = 1 << (position - 1);
      if ((used & mask) !== 0) {
        throw invalidPermutation(`position ${position} at index ${i} repeats`);
      }
      used |= mask;
    });
  }

  private static invertPermutation(permutation: Permutation): number[] {
    const result = new Array<number>(permutation.length).fill(0);
    permutation.forEach((position, i) => {
      result[position - 1] = i + 1;
    });
    return result;
  }
}

function invalidPermutation(reason: string): BoxCodedError {
  return new BoxCodedError(`Invalid permutation: ${reason}`, 'invalid-permutation');
}
