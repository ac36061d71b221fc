import { BoxFactoryService } from './box-factory';
import type { SpnService } from './service';
import type { SBoxOptions } from '../types';

/**
 * Services index - Export all services
 */
export { SpnService } from './service';
export { BoxFactoryService } from './box-factory';
export { SBox } from './sbox';
export { PBox } from './pbox';

export type SpnServices = {
  boxes: BoxFactoryService;
};

export type SpnServicesOptions = {
  sBox?: SBoxOptions;
};

export const createSpnServices = (options: SpnServicesOptions = {}): SpnServices => {
  const boxFactoryService = new BoxFactoryService(options.sBox);

  const services = {
    boxes: boxFactoryService,
  } satisfies Record<string, SpnService>;
  return services;
};
