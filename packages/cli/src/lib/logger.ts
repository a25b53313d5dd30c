/**
 * Structured Logger for the configuration builder CLI
 *
 * - Log levels: debug, info, warn, error
 * - Verbose mode for data payloads
 * - Silent mode for scripted use
 * - JSON lines when --json is set
 * - Redaction of credential-like keys and values
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

const SENSITIVE_PATTERNS = [/private[_-]?key/i, /secret/i, /password/i, /token/i, /api[_-]?key/i];

const SENSITIVE_PREFIXES = ['ya29.', '-----BEGIN', 'Bearer '];

class Logger {
  private verbose = false;
  private silent = false;
  private json = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.json = options.json ?? false;
  }

  isJson(): boolean {
    return this.json;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  success(message: string): void {
    if (this.silent || this.json) return;
    console.log(pc.green('✓'), message);
  }

  fail(message: string): void {
    if (this.json) return;
    console.error(pc.red('✗'), message);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const redactedData = data ? this.redact(data) : undefined;

    if (this.json) {
      console.log(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...(redactedData && { data: redactedData }),
        })
      );
      return;
    }

    const formattedMessage = `${this.getPrefix(level)} ${message}`;

    if (level === 'error' || level === 'warn') {
      console.error(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.verbose && redactedData) {
      console.log(pc.dim(JSON.stringify(redactedData, null, 2)));
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return pc.dim('[DEBUG]');
      case 'info':
        return pc.blue('[INFO]');
      case 'warn':
        return pc.yellow('[WARN]');
      case 'error':
        return pc.red('[ERROR]');
    }
  }

  redact(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      redacted[key] = this.isSensitiveKey(key) ? '[REDACTED]' : this.redactValue(value);
    }

    return redacted;
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.isSensitiveValue(value) ? this.mask(value) : value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }
    if (isRecord(value)) {
      return this.redact(value);
    }
    return value;
  }

  private isSensitiveKey(key: string): boolean {
    return SENSITIVE_PATTERNS.some((pattern) => pattern.test(key));
  }

  private isSensitiveValue(value: string): boolean {
    return SENSITIVE_PREFIXES.some((prefix) => value.startsWith(prefix));
  }

  private mask(value: string): string {
    if (value.length <= 8) {
      return '[REDACTED]';
    }
    return value.slice(0, 4) + '...' + value.slice(-4);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const logger = new Logger();

export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const success = logger.success.bind(logger);
export const fail = logger.fail.bind(logger);
