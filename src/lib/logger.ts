import { pino, type Logger as PinoLogger } from 'pino';

export function createLogger(level: string = 'info') {
  return pino({
    level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export type Logger = PinoLogger;

/**
 * Logger that drops everything. Used as the default for components
 * constructed without one (tests, scripts).
 */
export const silentLogger: Logger = pino({ level: 'silent' });
