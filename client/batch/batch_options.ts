import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { createLogger } from '../logger';

export const DEFAULT_BATCH_MODEL = 'batch-general';
export const DEFAULT_POLLING_INTERVAL_MS = 3000;

const log = createLogger('batch');

const extraValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const extraParamsSchema = z.record(extraValueSchema);

const transcriptionConfigSchema = z.object({
  language: z.string().min(1).default('en-US'),
  model: z.string().min(1).default(DEFAULT_BATCH_MODEL),
  diarize: z.boolean().default(false),
  punctuate: z.boolean().default(false),
  smartFormat: z.boolean().default(false),
  channel: z.number().int().positive().default(2),
  pci: z.boolean().default(false),
  /** Extra query parameters, as an object or a JSON object string. */
  extraParams: z.union([extraParamsSchema, z.string()]).optional(),
});

export type TranscriptionConfig = z.input<typeof transcriptionConfigSchema>;

const batchOptionsSchema = z.object({
  pollingIntervalMs: z.number().positive().default(DEFAULT_POLLING_INTERVAL_MS),
  /** No timeout when omitted. */
  timeoutMs: z.number().positive().optional(),
});

export type BatchOptions = z.input<typeof batchOptionsSchema>;
export type ResolvedBatchOptions = z.output<typeof batchOptionsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export function resolveBatchOptions(options: BatchOptions = {}): ResolvedBatchOptions {
  const parsed = batchOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid batch options: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

function parseExtraParams(extra: z.infer<typeof transcriptionConfigSchema>['extraParams']): Record<string, string> {
  if (extra === undefined) return {};
  let source: unknown = extra;
  if (typeof extra === 'string') {
    try {
      source = JSON.parse(extra);
    } catch (err) {
      log.warn('Ignoring extraParams: not valid JSON', err);
      return {};
    }
  }
  const parsed = extraParamsSchema.safeParse(source);
  if (!parsed.success) {
    log.warn('Ignoring extraParams: expected an object of scalar values');
    return {};
  }
  return Object.fromEntries(Object.entries(parsed.data).map(([k, v]) => [k, String(v)]));
}

/** Query parameters for a submit request. Throws `ConfigurationError` on invalid config. */
export function toBatchQueryParams(config: TranscriptionConfig = {}): Record<string, string> {
  const parsed = transcriptionConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid transcription config: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  const c = parsed.data;
  return {
    language: c.language,
    model: c.model,
    diarize: String(c.diarize),
    punctuate: String(c.punctuate),
    smart_format: String(c.smartFormat),
    channel: String(c.channel),
    pci: String(c.pci),
    ...parseExtraParams(c.extraParams),
  };
}
