import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { config } from '../config/index.js';
import type { LogLevel } from '../config/index.js';

// Configure via env:
// - LOG_LEVEL: pino level name (default: 'info')
// - LOG_PRETTY: 'true' to render through the pino-pretty transport

export interface LoggerSettings {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(
  bindings: Record<string, unknown> = {},
  settings: LoggerSettings = {}
): Logger {
  const level = settings.level ?? config.log.level;
  const pretty = settings.pretty ?? config.log.pretty;

  const options: LoggerOptions = { level, base: bindings };
  if (pretty && level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    };
  }

  return pino(options);
}

let rootLogger: Logger | null = null;

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  if (bindings && Object.keys(bindings).length > 0) {
    return rootLogger.child(bindings);
  }
  return rootLogger;
}
