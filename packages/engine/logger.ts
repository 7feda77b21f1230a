import { pino, type Logger, type LoggerOptions } from 'pino';
import type { EngineConfig } from './config.js';

export type { Logger };

export function createLogger(config: Pick<EngineConfig, 'logLevel' | 'logPretty'>, name = 'canopy'): Logger {
  const options: LoggerOptions = { name, level: config.logLevel };
  if (config.logPretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }
  return pino(options);
}
