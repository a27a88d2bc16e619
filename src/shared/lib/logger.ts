import { dim, red, yellow } from './ansi.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: dim,
  info: (s) => s,
  warn: yellow,
  error: red,
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Emit one JSON object per line instead of `[level] message` */
  json?: boolean;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;

  function log(level: LogLevel, message: string, data?: LogData): void {
    if (LOG_LEVELS[level] < minLevel) return;

    if (jsonMode) {
      const line = { level, message, timestamp: new Date().toISOString(), ...data };
      process.stderr.write(JSON.stringify(line) + '\n');
      return;
    }

    const dataStr = data ? ` ${JSON.stringify(data)}` : '';
    process.stderr.write(`${LEVEL_COLOR[level](`[${level}]`)} ${message}${dataStr}\n`);
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}

/** Process-wide logger, reconfigured by the CLI's --verbose and --json flags */
export let logger = createLogger();

export function setLoggerOptions(options: LoggerOptions): void {
  logger = createLogger(options);
}
