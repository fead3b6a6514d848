import pino from 'pino';

export const log = pino({
  level: process.env.LOG_LEVEL?.trim() || 'info',
  base: { service: 'media-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof log;
