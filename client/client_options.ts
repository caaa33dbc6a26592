import { z } from 'zod';
import { ApiKeyError } from './errors';
import { createLogger, parseLogLevel, registerSecret, type LogLevel } from './logger';
import { SDK_VERSION } from './version';

export const DEFAULT_URL = 'wss://api.streamscribe.dev';
export const DEFAULT_REALTIME_PATH = '/transcribe/realtime';
export const DEFAULT_BATCH_PATH = '/api/v1/transcription';

const MAX_ENV_HEADERS = 20;

const log = createLogger('config');

export interface ClientOptionsInit {
  apiKey?: string;
  /** Base URL; `wss://` is assumed when no scheme is given. */
  url?: string;
  headers?: Record<string, string>;
  realtimePath?: string;
  batchPath?: string;
  keepAlive?: boolean;
  logLevel?: LogLevel;
}

function normalizeUrl(url: string): string {
  const withScheme = /^(https?|wss?):\/\//i.test(url) ? url : `wss://${url}`;
  return withScheme.replace(/\/+$/, '');
}

function normalizePath(path: string | undefined, fallback: string): string {
  if (!path) return fallback;
  return path.startsWith('/') ? path : `/${path}`;
}

export function userAgent(): string {
  return `streamscribe-sdk/${SDK_VERSION} node/${process.versions.node}`;
}

export class ClientOptions {
  readonly url: string;
  readonly realtimePath: string;
  readonly batchPath: string;
  readonly keepAlive: boolean;
  readonly logLevel?: LogLevel;
  private _apiKey: string;
  private _headers: Record<string, string> = {};
  private readonly extraHeaders: Record<string, string>;

  constructor(init: ClientOptionsInit = {}) {
    this._apiKey = init.apiKey ?? '';
    this.url = normalizeUrl(init.url || DEFAULT_URL);
    this.realtimePath = normalizePath(init.realtimePath, DEFAULT_REALTIME_PATH);
    this.batchPath = normalizePath(init.batchPath, DEFAULT_BATCH_PATH);
    this.keepAlive = init.keepAlive ?? false;
    this.logLevel = init.logLevel;
    this.extraHeaders = { ...init.headers };
    this.updateHeaders();
  }

  get apiKey(): string {
    return this._apiKey;
  }

  /** Connection headers: credential, user agent, then caller-supplied overrides. */
  get headers(): Readonly<Record<string, string>> {
    return this._headers;
  }

  setApiKey(apiKey: string): void {
    this._apiKey = apiKey;
    this.updateHeaders();
  }

  isKeepAliveEnabled(): boolean {
    return this.keepAlive;
  }

  private updateHeaders(): void {
    registerSecret(this._apiKey);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this._apiKey) headers.Authorization = `Basic ${this._apiKey}`;
    headers['User-Agent'] = userAgent();
    this._headers = { ...headers, ...this.extraHeaders };
  }
}

const envSchema = z.object({
  STREAMSCRIBE_API_KEY: z.string().default(''),
  STREAMSCRIBE_HOST: z.string().optional(),
  STREAMSCRIBE_REALTIME_PATH: z.string().optional(),
  STREAMSCRIBE_BATCH_PATH: z.string().optional(),
  STREAMSCRIBE_LOGGING: z.string().optional(),
  STREAMSCRIBE_KEEPALIVE: z
    .string()
    .optional()
    .transform((v) => v === '1' || v?.toLowerCase() === 'true'),
});

function headersFromEnv(env: NodeJS.ProcessEnv): Record<string, string> | undefined {
  const headers: Record<string, string> = {};
  for (let i = 0; i < MAX_ENV_HEADERS; i++) {
    const name = env[`STREAMSCRIBE_HEADER_${i}`];
    if (!name) break;
    headers[name] = env[`STREAMSCRIBE_HEADER_VALUE_${i}`] ?? '';
    log.debug(`header ${name} is set from environment`);
  }
  return Object.keys(headers).length > 0 ? headers : undefined;
}

/**
 * Build client options from `STREAMSCRIBE_*` environment variables. Values in
 * `overrides` win over the environment.
 */
export function clientOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ClientOptionsInit = {},
): ClientOptions {
  const parsed = envSchema.parse(env);
  const apiKey = overrides.apiKey || parsed.STREAMSCRIBE_API_KEY;
  if (!apiKey) {
    throw new ApiKeyError('STREAMSCRIBE_API_KEY is not set');
  }

  const logLevel = overrides.logLevel ?? parseLogLevel(parsed.STREAMSCRIBE_LOGGING);
  if (parsed.STREAMSCRIBE_LOGGING && !logLevel) {
    log.warn(`Unknown STREAMSCRIBE_LOGGING level "${parsed.STREAMSCRIBE_LOGGING}", keeping default`);
  }

  return new ClientOptions({
    apiKey,
    url: overrides.url ?? parsed.STREAMSCRIBE_HOST,
    headers: overrides.headers ?? headersFromEnv(env),
    realtimePath: overrides.realtimePath ?? parsed.STREAMSCRIBE_REALTIME_PATH,
    batchPath: overrides.batchPath ?? parsed.STREAMSCRIBE_BATCH_PATH,
    keepAlive: overrides.keepAlive ?? parsed.STREAMSCRIBE_KEEPALIVE,
    logLevel,
  });
}
