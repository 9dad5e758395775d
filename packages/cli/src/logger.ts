/**
 * CLI Logger
 *
 * Logs to stderr so stdout stays clean for command output.
 */

import {
  formatLogMessage,
  isLogLevel,
  type Logger as CoreLogger,
  type LogLevel,
  shouldLog
} from '@wdkeeper/core';

export class Logger implements CoreLogger {
  readonly level: LogLevel;
  private readonly json: boolean;
  private readonly prefix: string;

  constructor(level: LogLevel = 'info', prefix = '', env: NodeJS.ProcessEnv = process.env) {
    const envLevel = env.WDKEEPER_LOG_LEVEL;
    this.level = isLogLevel(envLevel) ? envLevel : level;
    this.json = env.WDKEEPER_LOG === 'json';
    this.prefix = prefix;
  }

  private log(level: LogLevel, obj: unknown, msg?: string): void {
    if (!shouldLog(this.level, level)) return;
    console.error(formatLogMessage(level, obj, msg, this.prefix, this.json));
  }

  error(obj: unknown, msg?: string): void {
    this.log('error', obj, msg);
  }

  warn(obj: unknown, msg?: string): void {
    this.log('warn', obj, msg);
  }

  info(obj: unknown, msg?: string): void {
    this.log('info', obj, msg);
  }

  debug(obj: unknown, msg?: string): void {
    this.log('debug', obj, msg);
  }

  trace(obj: unknown, msg?: string): void {
    this.log('trace', obj, msg);
  }

  child(prefix: string): Logger {
    return new Logger(this.level, `${this.prefix}[${prefix}]`, {
      WDKEEPER_LOG: this.json ? 'json' : undefined
    });
  }
}
