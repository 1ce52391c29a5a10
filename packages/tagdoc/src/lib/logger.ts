import { pino, type Logger } from 'pino';
import { config, type LogLevel } from './config.js';

export interface LoggerConfig {
  level?: LogLevel;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
}

export function createLogger(options: LoggerConfig = {}): Logger {
  return pino({
    level: options.level ?? config.logLevel,
    base: { lib: 'tagdoc', ...options.base }
  });
}

export const logger: Logger = createLogger();

export type { Logger };
