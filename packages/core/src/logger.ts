/**
 * Logger interface for wdkeeper
 *
 * Library code depends on this contract only; the CLI supplies a
 * stderr-backed implementation.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogData = {
  [key: string]: unknown;
};

export type Logger = {
  level: LogLevel;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
  child?(prefix: string): Logger;
};

/**
 * The subset of Logger the lifecycle manager needs
 */
export type LifecycleLogger = Pick<Logger, 'error' | 'warn' | 'info' | 'debug'>;

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  output?: (message: string) => void;
};

// Errors stringify to {} otherwise
function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    const code = 'code' in value ? value.code : undefined;
    return code === undefined
      ? { name: value.name, message: value.message }
      : { name: value.name, message: value.message, code };
  }
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const entries = Object.entries(value).map(([key, v]) => [key, toSerializable(v)] as const);
    return Object.fromEntries(entries);
  }
  return value;
}

export function formatLogMessage(
  level: LogLevel,
  obj: unknown,
  msg?: string,
  prefix?: string,
  json?: boolean
): string {
  const timestamp = new Date().toISOString();
  const data = msg !== undefined ? obj : typeof obj === 'string' ? undefined : obj;
  const text = msg ?? (typeof obj === 'string' ? obj : undefined);

  if (json) {
    const record: LogData = { time: timestamp, level };
    if (prefix) record.prefix = prefix;
    if (text !== undefined) record.msg = text;
    if (data !== undefined) record.data = toSerializable(data);
    return JSON.stringify(record);
  }

  const prefixStr = prefix ? ` ${prefix}` : '';
  const messageStr = text ?? JSON.stringify(toSerializable(data));
  const dataStr =
    text !== undefined && data !== undefined && data !== null
      ? ` ${JSON.stringify(toSerializable(data))}`
      : '';

  return `[${timestamp}] [${level.toUpperCase()}]${prefixStr} ${messageStr}${dataStr}`;
}

/**
 * Create a functional logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? '';
  const json = options.json ?? false;
  const output = options.output ?? (() => {});

  const log = (logLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!shouldLog(level, logLevel)) {
      return;
    }
    output(formatLogMessage(logLevel, obj, msg, prefix, json));
  };

  return {
    level,
    error: (obj: unknown, msg?: string) => log('error', obj, msg),
    warn: (obj: unknown, msg?: string) => log('warn', obj, msg),
    info: (obj: unknown, msg?: string) => log('info', obj, msg),
    debug: (obj: unknown, msg?: string) => log('debug', obj, msg),
    trace: (obj: unknown, msg?: string) => log('trace', obj, msg),
    child: (childPrefix: string) =>
      createLogger({
        ...options,
        prefix: `${prefix}[${childPrefix}]`
      })
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
