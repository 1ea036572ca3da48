import pino from 'pino';

/**
 * Process-wide pino logger. Stages log through `logger.child({ stage })`.
 */
export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  base: { service: 'voice-control-daemon' },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino-pretty' }
      : undefined,
});

export type Logger = pino.Logger;

/** `--debug` raises the level after the logger has been created */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}
