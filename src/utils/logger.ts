import pino from 'pino';
import { logLevel, type AppConfig } from '../config/env.js';

export const logger = pino({
  level: logLevel,
  redact: {
    paths: ['apikey', '*.apikey', 'expectedApiKey', '*.expectedApiKey', 'pass', '*.pass'],
    censor: '******'
  }
});

/** Switches the shared logger to the level from the validated config. */
export function applyLogConfig(config: Pick<AppConfig, 'logLevel'>): void {
  logger.level = config.logLevel;
}

export type { Logger } from 'pino';
