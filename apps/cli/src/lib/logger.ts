import pino from 'pino';
import type { LogLevel, LogFormat } from '@tlog-auditor/config';

/**
 * Create a configured logger instance
 *
 * Logs go to stderr so that command output on stdout stays parseable.
 */
export function createLogger(level: LogLevel = 'info', format: LogFormat = 'pretty'): pino.Logger {
  if (format === 'pretty') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}
