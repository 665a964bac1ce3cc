// Structured logger for the library and the CLI.
// Every line goes to stderr; stdout belongs to classification output.

import { loadConfig, type LogFormat, type LogLevel } from './config.js';

export interface LogData {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(prefix: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  color?: boolean;
  /** Receives one formatted line without the trailing newline */
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

function isColorEnabled(): boolean {
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;
  return process.stderr.isTTY === true;
}

export function formatData(data: LogData): string {
  return Object.entries(data)
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=${value.message}`;
      }
      if (typeof value === 'object' && value !== null) {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');
}

function formatPretty(
  level: LogLevel,
  prefix: string,
  message: string,
  data: LogData | undefined,
  color: boolean,
  now: Date
): string {
  const ts = now.toISOString().replace('T', ' ').slice(0, 19);
  const label = LEVEL_LABELS[level];
  const dataStr = data ? ' ' + formatData(data) : '';

  if (!color) {
    const pfx = prefix ? ` [${prefix}]` : '';
    return `${ts} ${label}${pfx} ${message}${dataStr}`;
  }

  const pfx = prefix ? ` ${COLORS.blue}[${prefix}]${COLORS.reset}` : '';
  const tail = dataStr ? COLORS.dim + dataStr + COLORS.reset : '';
  return `${COLORS.dim}${ts}${COLORS.reset} ${LEVEL_COLORS[level]}${label}${COLORS.reset}${pfx} ${message}${tail}`;
}

function formatJSON(level: LogLevel, prefix: string, message: string, data: LogData | undefined, now: Date): string {
  return JSON.stringify({
    timestamp: now.toISOString(),
    level,
    ...(prefix ? { prefix } : {}),
    message,
    ...data,
  });
}

function createLoggerImpl(prefix: string, options: LoggerOptions): Logger {
  const config = loadConfig();
  const minLevel = options.level ?? config.logLevel;
  const useJSON = (options.format ?? config.logFormat) === 'json';
  const useColor = options.color ?? isColorEnabled();
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    write(
      useJSON
        ? formatJSON(level, prefix, message, data, now())
        : formatPretty(level, prefix, message, data, useColor, now())
    );
  }

  return {
    debug: (message, data?) => log('debug', message, data),
    info: (message, data?) => log('info', message, data),
    warn: (message, data?) => log('warn', message, data),
    error: (message, data?) => log('error', message, data),
    child: (childPrefix: string) =>
      createLoggerImpl(prefix ? `${prefix}:${childPrefix}` : childPrefix, options),
  };
}

export function createLogger(prefix?: string, options: LoggerOptions = {}): Logger {
  return createLoggerImpl(prefix || '', options);
}

export const logger = createLogger('langforest');
