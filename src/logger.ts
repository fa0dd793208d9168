import pino from 'pino';
import type { LoggerOptions } from 'pino';

import { APP_ENV } from './config.js';

const createLoggerOptions = (): LoggerOptions => {
  const options: LoggerOptions = {
    level: APP_ENV.LOG_LEVEL,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (APP_ENV.LOG_PRETTY) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
        colorize: true
      }
    };
  }

  return options;
};

export const logger = pino(createLoggerOptions());

export type Logger = typeof logger;
