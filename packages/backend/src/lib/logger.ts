import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'work-orders',
  level: process.env.LOG_LEVEL || 'info',
});

/** Logger that discards everything; used by tests and embedded callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
