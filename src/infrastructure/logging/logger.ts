/**
 * Logger - pino root logger with per-component children
 */

import pino from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const rootLogger = pino({
  level: resolveLevel(),
  base: { service: 'matching-engine' },
  ...(process.env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
    },
  }),
});

export type Logger = pino.Logger;

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export default rootLogger;
