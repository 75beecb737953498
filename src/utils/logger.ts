// ============================================
// RIDESIM - Logger
// ============================================

import pino, { type Logger } from 'pino';
import { env, isDevelopment } from '../config/env.js';

export type { Logger };

function createLogger(): Logger {
  const level = env.LOG_LEVEL;

  if (isDevelopment()) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level });
}

export const logger = createLogger();
