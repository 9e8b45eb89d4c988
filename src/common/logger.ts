/**
 * Logger setup
 *
 * Logs go to stderr so stdout only carries the output paths the
 * dispatcher prints.
 */

import pino, { Logger } from 'pino';
import type { EnvConfig } from '../config/env';

export type { Logger };

const STDERR = 2;

export function createLogger(config: Pick<EnvConfig, 'logLevel' | 'nodeEnv'>): Logger {
  if (config.nodeEnv === 'production' || config.nodeEnv === 'test') {
    // Plain JSON, no worker thread
    return pino({ level: config.logLevel }, pino.destination(STDERR));
  }

  return pino({
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR,
      },
    },
  });
}

/**
 * Logger that drops everything, for library callers that pass none
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
