import type { Logger } from '../types/logger.js';
import { silentLogger } from '../types/logger.js';
import type { ThermolineConfig } from '../config.js';
import type { Colors } from '../utils/colors.js';
import { createLogger } from '../utils/logger.js';

export interface SessionOptions {
  config?: ThermolineConfig;
  /** Defaults to a terminal logger at `config.logLevel`, silent when that is `none` */
  logger?: Logger;
  colors?: Colors;
}

export function sessionLogger(config: ThermolineConfig, logger?: Logger): Logger {
  if (logger) return logger;
  return config.logLevel === 'none' ? silentLogger : createLogger({ level: config.logLevel });
}
