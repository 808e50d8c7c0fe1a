import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const createLogger = (level = process.env.LOG_LEVEL ?? 'info'): Logger =>
  pino({
    name: 'mail-sync',
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

export const silentLogger = (): Logger => pino({ level: 'silent' });
