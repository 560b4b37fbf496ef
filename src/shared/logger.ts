/**
 * Structured console logging
 *
 * Filters by level and prefixes every line with its context.
 * Operational diagnostics only: request/response records go through
 * the ResponseLogger sinks instead.
 */

import { config } from './config';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_STYLES: Record<LogLevel, { color: string; write: (line: string) => void }> = {
  [LogLevel.DEBUG]: { color: '\x1b[36m', write: line => console.log(line) },
  [LogLevel.INFO]: { color: '\x1b[32m', write: line => console.log(line) },
  [LogLevel.WARN]: { color: '\x1b[33m', write: line => console.warn(line) },
  [LogLevel.ERROR]: { color: '\x1b[31m', write: line => console.error(line) },
};

const RESET_COLOR = '\x1b[0m';

function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

const currentLogLevel = parseLogLevel(config.logging.level);

/**
 * Errors serialize to `{}` through JSON.stringify; keep their name, message and code.
 */
function formatMeta(meta: unknown): string {
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) {
      const code = 'code' in value ? value.code : undefined;
      return code === undefined
        ? { name: value.name, message: value.message }
        : { name: value.name, code, message: value.message };
    }
    return value;
  });
}

export class Logger {
  constructor(private context: string) {}

  /** Logger for a sub-component, e.g. `Session:petstore` */
  child(subContext: string): Logger {
    return new Logger(this.context ? `${this.context}:${subContext}` : subContext);
  }

  debug(message: string, meta?: unknown) {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown) {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown) {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown) {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown) {
    if (level < currentLogLevel) {
      return;
    }

    const style = LEVEL_STYLES[level];
    const label = LogLevel[level].padEnd(5);
    const head = config.logging.colorize
      ? `${style.color}${new Date().toISOString()} ${label}${RESET_COLOR}`
      : `${new Date().toISOString()} ${label}`;
    const tail = meta === undefined ? '' : ` ${formatMeta(meta)}`;

    style.write(`${head} [${this.context}] ${message}${tail}`);
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}
