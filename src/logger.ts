import { pino, type DestinationStream, type Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

export function resolveLogLevel(config: Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL'>): string {
  if (config.LOG_LEVEL) return config.LOG_LEVEL;
  if (config.NODE_ENV === 'test') return 'silent';
  return config.NODE_ENV === 'production' ? 'info' : 'debug';
}

/** Root logger shared by Fastify and every component. Writes to stdout unless `destination` is given. */
export function createLogger(config: Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL'>, destination?: DestinationStream): Logger {
  const options = {
    level: resolveLogLevel(config),
    base: { service: 'unbound-steward' }
  };
  return destination ? pino(options, destination) : pino(options);
}
