import { pino, type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'loam',
  level: process.env.LOG_LEVEL || 'info',
});

/** Child logger tagged with the emitting module */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
