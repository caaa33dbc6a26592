import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { ClientOptions } from './client_options';

const optionsSchema = z.object({
  model: z.string().nullable().default(null),
  language: z.string().nullable().default('en-US'),
  smartFormat: z.boolean().default(false),
  punctuate: z.boolean().default(false),
  interimResults: z.boolean().default(true),
  encoding: z.string().nullable().default('linear16'),
  sampleRate: z.number().int().positive().nullable().default(16000),
  channels: z.number().int().positive().nullable().default(1),
  utteranceEndMs: z.number().int().nonnegative().nullable().default(1000),
  vadEvents: z.boolean().default(false),
});

/** Caller-facing options; `null` on a field means "do not send it". */
export type RealtimeOptions = z.input<typeof optionsSchema>;
export type ResolvedRealtimeOptions = Readonly<z.output<typeof optionsSchema>>;

export interface ConnectTarget {
  url: string;
  headers: Record<string, string>;
}

/** Apply defaults and validate. Throws `ConfigurationError` on invalid input. */
export function resolveRealtimeOptions(options: RealtimeOptions = {}): ResolvedRealtimeOptions {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid realtime options: ${detail}`, { cause: parsed.error });
  }
  return Object.freeze(parsed.data);
}

export function toQueryParams(options: ResolvedRealtimeOptions): Record<string, string> {
  const params: Record<string, string> = {};
  if (options.model) params.model = options.model;
  if (options.language) params.language = options.language;
  if (options.smartFormat) params.smart_format = 'true';
  if (options.punctuate) params.punctuate = 'true';
  if (options.interimResults) params.interim_results = 'true';
  if (options.encoding) params.encoding = options.encoding;
  if (options.sampleRate) params.sample_rate = String(options.sampleRate);
  if (options.channels) params.channels = String(options.channels);
  if (options.utteranceEndMs) params.utterance_end_ms = String(options.utteranceEndMs);
  if (options.vadEvents) params.vad_events = 'true';
  return params;
}

export function buildConnectTarget(client: ClientOptions, options: ResolvedRealtimeOptions): ConnectTarget {
  const base = `${client.url}${client.realtimePath}`;
  const query = new URLSearchParams(toQueryParams(options)).toString();
  const url = query ? `${base}${base.includes('?') ? '&' : '?'}${query}` : base;
  return { url, headers: { ...client.headers } };
}
