import { inspect } from 'node:util';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const SEVERITY: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

const ALIASES: Record<string, LogLevel> = {
  silent: 'silent',
  none: 'silent',
  notset: 'silent',
  critical: 'error',
  error: 'error',
  warning: 'warn',
  warn: 'warn',
  success: 'info',
  notice: 'info',
  info: 'info',
  verbose: 'debug',
  debug: 'debug',
  spam: 'debug',
};

let threshold: LogLevel = 'warn';

const secretFragments: string[] = [];
let secretPattern: RegExp | null = null;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return ALIASES[value.trim().toLowerCase()];
}

/**
 * Register a secret value so it is redacted from all log output. Returns
 * `false` when the value is too short or already registered.
 */
export function registerSecret(secret: string): boolean {
  // short values would redact ordinary words
  if (!secret || secret.length < 8) return false;
  const fragment = secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  if (secretFragments.includes(fragment)) return false;
  secretFragments.push(fragment);
  secretPattern = new RegExp(secretFragments.join('|'), 'g');
  return true;
}

function sanitize(message: string): string {
  return secretPattern ? message.replace(secretPattern, '[REDACTED]') : message;
}

export function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) return sanitize(arg.stack ?? `${arg.name}: ${arg.message}`);
      if (typeof arg === 'string') return sanitize(arg);
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity }));
    })
    .join(' ');
}

export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return SEVERITY[level] <= SEVERITY[threshold];
}

export function createLogger(tag: string): Logger {
  const prefix = (level: string) => `[${new Date().toISOString()}] [${level}] [${tag}]`;
  return {
    error(...args) {
      if (enabled('error')) console.error(prefix('ERROR'), formatArgs(args));
    },
    warn(...args) {
      if (enabled('warn')) console.warn(prefix('WARN'), formatArgs(args));
    },
    info(...args) {
      if (enabled('info')) console.log(prefix('INFO'), formatArgs(args));
    },
    debug(...args) {
      if (enabled('debug')) console.debug(prefix('DEBUG'), formatArgs(args));
    },
  };
}
