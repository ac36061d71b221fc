import { isLogLevelEnabled } from './environment';

export abstract class SpnService {
  abstract name: string;
  abstract log_prefix: string;
  log = (...args: unknown[]) => {
    if (isLogLevelEnabled('info')) console.log(`${this.log_prefix}`, ...args);
  };
  logError = (...args: unknown[]) => {
    if (isLogLevelEnabled('error')) console.error(`${this.log_prefix}`, ...args);
  };
  logDebug = (...args: unknown[]) => {
    if (isLogLevelEnabled('debug')) console.debug(`${this.log_prefix}`, ...args);
  };
}
