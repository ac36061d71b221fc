import { SpnService } from './service';
import { SBox } from './sbox';
import { PBox } from './pbox';
import type { Permutation, SBoxOptions, SBoxTable } from '../types';

/**
 * Builds S-boxes and P-boxes with logging around validation.
 *
 * Default S-box options given here apply to every `createSBox` call and are
 * overridden field by field by the options passed to the call.
 *
 * @extends SpnService
 */
export class BoxFactoryService extends SpnService {
  name = 'Box Factory Service';
  log_prefix = '[BoxFactoryService]';

  constructor(private readonly defaultSBoxOptions: SBoxOptions = {}) {
    super();
  }

  /**
   * @throws {BoxCodedError} rethrown from {@link SBox.create} after logging it
   */
  createSBox(table: SBoxTable, options: SBoxOptions = {}): SBox {
    const effectiveOptions = { ...this.defaultSBoxOptions, ...options };
    this.logDebug(
      `Creating S-box from ${table.length} rows (checkBijection: ${effectiveOptions.checkBijection === true})`
    );

    try {
      const sBox = SBox.create(table, effectiveOptions);
      this.log(`Created ${sBox.rows}x${sBox.columns} S-box over ${sBox.width} bits`);
      return sBox;
    } catch (error: unknown) {
      this.logError(`Failed to create S-box: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  /**
   * @throws {BoxCodedError} rethrown from {@link PBox.create} after logging it
   */
  createPBox(permutation: Permutation): PBox {
    this.logDebug(`Creating P-box from ${permutation.length} positions`);

    try {
      const pBox = PBox.create(permutation);
      this.log(`Created P-box over ${pBox.width} bits`);
      return pBox;
    } catch (error: unknown) {
      this.logError(`Failed to create P-box: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
