// src/observability/Logger.ts

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  level?: LogLevel;
  format?: LogFormat;
  /**
   * Replaces the default console transport, which writes every level to stderr.
   */
  transports?: winston.LoggerOptions['transports'];
}

const SENSITIVE_KEYS = ['clientSecret', 'apiKey', 'accessToken', 'authorization', 'Authorization'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}, parent?: winston.Logger) {
    if (parent) {
      this.logger = parent;
      return;
    }

    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      // stdout is reserved for the output path
      transports: config.transports ?? [
        new winston.transports.Console({ stderrLevels: ['debug', 'info', 'warn', 'error'] }),
      ],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object') return obj;

    const redacted: Record<string, unknown> = Object.fromEntries(Object.entries(obj));

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Nested config sections and request headers
    for (const nested of ['reddit', 'gemini', 'headers']) {
      const value = redacted[nested];
      if (value && typeof value === 'object' && !Array.isArray(value)) {
        redacted[nested] = this.redactSensitive(value);
      }
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }

  /**
   * Returns a logger that adds `meta` to every entry, e.g. a run id.
   */
  child(meta: Record<string, unknown>): Logger {
    return new Logger({}, this.logger.child(meta));
  }
}
