import pino, { type Logger, type LoggerOptions } from 'pino';

export function createLogger(level: string, options: { pretty?: boolean } = {}): Logger {
  const pretty = options.pretty ?? false;
  const loggerOptions: LoggerOptions = {
    level,
    base: undefined,
    name: 'accept-negotiator'
  };

  // stdout carries MCP frames only; logs go to stderr.
  if (pretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(loggerOptions, pino.destination({ fd: 2, sync: false }));
}
