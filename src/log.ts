import pino, { type Logger } from 'pino';

export type { Logger };

export const log: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'pbx-dialog-runtime' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
