import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    level,
    base: { service: 'responder' },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

/** Logger for tests and callers that do not care about output. */
export const silentLogger: Logger = pino({ level: 'silent' });
