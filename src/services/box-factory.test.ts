import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BoxFactoryService } from './box-factory';
import { createSpnServices } from '.';
import { LOG_LEVEL_ENV_VAR } from './environment';
import { BoxCodedError } from '../errors';
import { catchError } from '../tests/test-utils';

describe('BoxFactoryService', () => {
  const repeated = [
    [3, 3],
    [3, 3],
  ];
  let service: BoxFactoryService;

  beforeEach(() => {
    service = new BoxFactoryService();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('logging', () => {
    it('should log created boxes at info level', () => {
      vi.stubEnv(LOG_LEVEL_ENV_VAR, 'info');

      service.createSBox([
        [2, 0],
        [3, 1],
      ]);
      service.createPBox([2, 1]);

      expect(console.log).toHaveBeenCalledWith('[BoxFactoryService]', 'Created 2x2 S-box over 2 bits');
      expect(console.log).toHaveBeenCalledWith('[BoxFactoryService]', 'Created P-box over 2 bits');
      expect(console.debug).not.toHaveBeenCalled();
    });

    it('should log construction details at debug level', () => {
      vi.stubEnv(LOG_LEVEL_ENV_VAR, 'debug');

      service.createSBox([
        [2, 0],
        [3, 1],
      ]);
      service.createPBox([2, 1]);

      expect(console.debug).toHaveBeenCalledWith(
        '[BoxFactoryService]',
        'Creating S-box from 2 rows (checkBijection: false)'
      );
      expect(console.debug).toHaveBeenCalledWith(
        '[BoxFactoryService]',
        'Creating P-box from 2 positions'
      );
    });

    it('should log and rethrow construction failures at the default level', () => {
      vi.stubEnv(LOG_LEVEL_ENV_VAR, '');

      const error = catchError(() => service.createPBox([1, 1]));

      expect(error).toBeInstanceOf(BoxCodedError);
      expect(console.error).toHaveBeenCalledWith(
        '[BoxFactoryService]',
        'Failed to create P-box: Invalid permutation: position 1 at index 1 repeats'
      );
      expect(console.log).not.toHaveBeenCalled();
    });

    it('should stay quiet when silent', () => {
      vi.stubEnv(LOG_LEVEL_ENV_VAR, 'silent');

      expect(() => service.createSBox([[0, 1, 2]])).toThrow(BoxCodedError);
      service.createPBox([1]);

      expect(console.error).not.toHaveBeenCalled();
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('S-box options', () => {
    it('should apply default options', () => {
      const strict = new BoxFactoryService({ checkBijection: true });
      expect(catchError(() => strict.createSBox(repeated))).toMatchObject({
        code: 'non-bijective-table',
      });
    });

    it('should let call options override the defaults', () => {
      const strict = new BoxFactoryService({ checkBijection: true });
      const sBox = strict.createSBox(repeated, { checkBijection: false });
      expect(sBox.encryptValue(2)).toBe(3);
    });
  });

  describe('createSpnServices', () => {
    it('should build a box factory with the given S-box defaults', () => {
      const services = createSpnServices({ sBox: { checkBijection: true } });

      expect(services.boxes).toBeInstanceOf(BoxFactoryService);
      expect(services.boxes.name).toBe('Box Factory Service');
      expect(catchError(() => services.boxes.createSBox(repeated))).toMatchObject({
        code: 'non-bijective-table',
      });
    });

    it('should accept repeated outputs without options', () => {
      const services = createSpnServices();
      expect(services.boxes.createSBox(repeated).width).toBe(2);
    });
  });
});
