import { BoxCodedError } from '../errors';
import type { Bit, BitTransform, BitVector, SBoxOptions, SBoxTable } from '../types';
import { bitLength, bitsToNum, ceilLog, isPowerOfTwo, numToBits } from '../utils';
import { describeIssues, sBoxTableSchema } from './schemas';

/**
 * Substitution box over `width`-bit groups.
 *
 * The input is split into `ceilLog(rows)` outer bits, addressing the row, and
 * `ceilLog(columns)` middle bits, addressing the column. The entry found there
 * is the output, written back on the same width.
 *
 * Instances come from {@link SBox.create}, which validates the table and derives
 * the inverse table once, so `encrypt` and `decrypt` are plain lookups.
 */
export class SBox implements BitTransform {
  readonly rows: number;
  readonly columns: number;
  readonly width: number;
  private readonly outerBits: number;

  private constructor(
    readonly table: SBoxTable,
    readonly inverseTable: SBoxTable
  ) {
    this.rows = table.length;
    this.columns = table[0].length;
    this.outerBits = ceilLog(this.rows);
    this.width = this.outerBits + ceilLog(this.columns);
    Object.freeze(this);
  }

  /**
   * Validates `table` and builds the box.
   *
   * @param table - n rows of m entries, n and m powers of two
   * @param options - Set `checkBijection` to reject tables whose inverse is not well defined
   * @throws {BoxCodedError} `invalid-table` for a malformed table,
   * `non-bijective-table` when `checkBijection` is set and an output repeats
   */
  static create(table: SBoxTable, options: SBoxOptions = {}): SBox {
    const parsed = sBoxTableSchema.safeParse(table);
    if (!parsed.success) {
      throw new BoxCodedError(
        `Invalid S-box table: ${describeIssues(parsed.error)}`,
        'invalid-table',
        parsed.error
      );
    }

    const forward = freezeTable(parsed.data);
    SBox.checkTable(forward);
    if (options.checkBijection === true) {
      SBox.checkBijection(forward);
    }

    return new SBox(forward, freezeTable(SBox.invertTable(forward)));
  }

  encrypt(bits: BitVector): Bit[] {
    return this.transform(bits, this.table);
  }

  decrypt(bits: BitVector): Bit[] {
    return this.transform(bits, this.inverseTable);
  }

  encryptValue(value: number): number {
    return bitsToNum(this.encrypt(this.valueToBits(value)));
  }

  decryptValue(value: number): number {
    return bitsToNum(this.decrypt(this.valueToBits(value)));
  }

  private transform(bits: BitVector, table: SBoxTable): Bit[] {
    if (bits.length !== this.width) {
      throw new BoxCodedError(
        `S-box expects ${this.width} input bits, received ${bits.length}`,
        'invalid-input-length'
      );
    }

    const outer = bitsToNum(bits.slice(0, this.outerBits));
    const middle = bitsToNum(bits.slice(this.outerBits));
    return numToBits(table[outer][middle], this.width);
  }

  private valueToBits(value: number): Bit[] {
    if (!Number.isSafeInteger(value) || value < 0 || value >= 2 ** this.width) {
      throw new BoxCodedError(
        `S-box expects a ${this.width}-bit value, received ${value}`,
        'invalid-input-length'
      );
    }
    return numToBits(value, this.width);
  }

  private static checkTable(table: SBoxTable): void {
    const rowCount = table.length;
    if (!isPowerOfTwo(rowCount)) {
      throw invalidTable(`row count must be a nonzero power of two, received ${rowCount}`);
    }

    const columnCount = table[0].length;
    if (!isPowerOfTwo(columnCount)) {
      throw invalidTable(`column count must be a nonzero power of two, received ${columnCount}`);
    }

    table.forEach((row, i) => {
      if (row.length !== columnCount) {
        throw invalidTable(`row ${i} has ${row.length} entries, expected ${columnCount}`);
      }
    });

    const expectedBits = ceilLog(rowCount) + ceilLog(columnCount);
    const actualBits = maxBits(table);
    if (actualBits !== expectedBits) {
      throw invalidTable(
        `entries must need exactly ${expectedBits} bits for a ${rowCount}x${columnCount} table, largest needs ${actualBits}`
      );
    }
  }

  // With the width check passed, n * m distinct entries cover every address exactly once
  private static checkBijection(table: SBoxTable): void {
    const seen = new Set<number>();
    table.forEach((row, i) =>
      row.forEach((value, j) => {
        if (seen.has(value)) {
          throw new BoxCodedError(
            `Invalid S-box table: value ${value} at [${i}][${j}] appears more than once`,
            'non-bijective-table'
          );
        }
        seen.add(value);
      })
    );
  }

  private static invertTable(table: SBoxTable): number[][] {
    const outerBits = ceilLog(table.length);
    const middleBits = ceilLog(table[0].length);
    const width = outerBits + middleBits;

    const result = table.map(row => row.map(() => 0));
    table.forEach((row, i) =>
      row.forEach((value, j) => {
        const bits = numToBits(value, width);
        const outer = bitsToNum(bits.slice(0, outerBits));
        const middle = bitsToNum(bits.slice(outerBits));
        result[outer][middle] = (i << middleBits) | j;
      })
    );

    return result;
  }
}

function maxBits(table: SBoxTable): number {
  let result = 0;
  for (const row of table) {
    for (const value of row) {
      result = Math.max(result, bitLength(value));
    }
  }
  return result;
}

function freezeTable(table: SBoxTable): SBoxTable {
  return Object.freeze(table.map(row => Object.freeze([...row])));
}

function invalidTable(reason: string): BoxCodedError {
  return new BoxCodedError(`Invalid S-box table: ${reason}`, 'invalid-table');
}
