import { z } from 'zod';
import { ProtocolError } from './errors';
import { createLogger } from './logger';
import { describeCloseCode } from './status_codes';
import type {
  Alternative,
  ErrorEvent,
  LiveEvent,
  MetadataEvent,
  OutgoingMessage,
  SpeechStartedEvent,
  TranscriptEvent,
  UnhandledEvent,
  UtteranceEndEvent,
  Word,
} from '../types/events';

const log = createLogger('frame_codec');

const envelopeSchema = z.object({ type: z.string() });

const channelListSchema = z.array(z.number()).catch([]);

const wordSchema = z.object({
  word: z.string().default(''),
  start: z.number().default(0),
  end: z.number().default(0),
  confidence: z.number().default(0),
  punctuated_word: z.string().optional(),
});

const alternativeSchema = z.object({
  transcript: z.string().default(''),
  confidence: z.number().default(0),
  words: z.array(z.unknown()).default([]),
});

const resultsSchema = z.object({
  channel: z.object({ alternatives: z.array(z.unknown()).default([]) }).default({}),
  channel_index: channelListSchema,
  start: z.number().default(0),
  duration: z.number().default(0),
  is_final: z.boolean().default(false),
  speech_final: z.boolean().default(false),
  metadata: z
    .object({
      request_id: z.string().optional(),
      model_uuid: z.string().optional(),
      model_info: z.unknown().optional(),
    })
    .optional()
    .catch(undefined),
});

const metadataSchema = z.object({
  transaction_key: z.string().optional().catch(undefined),
  request_id: z.string().optional().catch(undefined),
  sha256: z.string().optional().catch(undefined),
  created: z.string().optional().catch(undefined),
  duration: z.number().optional().catch(undefined),
  channels: z.number().int().optional().catch(undefined),
});

const speechStartedSchema = z.object({
  channel: channelListSchema,
  timestamp: z.number().default(0),
});

const utteranceEndSchema = z.object({
  channel: channelListSchema,
  last_word_end: z.number().default(0),
});

const numericCode = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' && !Number.isNaN(Number(v)) ? Number(v) : v),
  z.number().int(),
);

const errorSchema = z.object({
  code: numericCode.optional().catch(undefined),
  message: z.string().optional(),
  description: z.string().optional(),
  variant: z.string().optional(),
});

function unhandled(raw: string): UnhandledEvent {
  return { kind: 'Unhandled', raw };
}

function decodeWords(items: unknown[]): Word[] {
  const words: Word[] = [];
  for (const item of items) {
    const parsed = wordSchema.safeParse(item);
    if (parsed.success) words.push(parsed.data);
  }
  // stable sort keeps timestamps non-decreasing
  return words.sort((a, b) => a.start - b.start);
}

function decodeAlternatives(items: unknown[]): Alternative[] {
  const alternatives: Alternative[] = [];
  for (const item of items) {
    const parsed = alternativeSchema.safeParse(item);
    if (!parsed.success) continue;
    alternatives.push({
      transcript: parsed.data.transcript,
      confidence: parsed.data.confidence,
      words: decodeWords(parsed.data.words),
    });
  }
  return alternatives;
}

function decodeResults(payload: unknown): TranscriptEvent | undefined {
  const parsed = resultsSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  const { channel, ...rest } = parsed.data;
  return {
    kind: 'Transcript',
    ...rest,
    channel: { alternatives: decodeAlternatives(channel.alternatives) },
  };
}

function decodeMetadata(payload: unknown): MetadataEvent | undefined {
  const parsed = metadataSchema.safeParse(payload);
  return parsed.success ? { kind: 'Metadata', ...parsed.data } : undefined;
}

function decodeSpeechStarted(payload: unknown): SpeechStartedEvent | undefined {
  const parsed = speechStartedSchema.safeParse(payload);
  return parsed.success ? { kind: 'SpeechStarted', ...parsed.data } : undefined;
}

function decodeUtteranceEnd(payload: unknown): UtteranceEndEvent | undefined {
  const parsed = utteranceEndSchema.safeParse(payload);
  return parsed.success ? { kind: 'UtteranceEnd', ...parsed.data } : undefined;
}

function decodeError(payload: unknown): ErrorEvent | undefined {
  const parsed = errorSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  const { code, description } = parsed.data;
  return {
    kind: 'Error',
    ...parsed.data,
    description: description ?? (code !== undefined ? describeCloseCode(code) : undefined),
    fatal: false,
  };
}

const decoders: Record<string, (payload: unknown) => LiveEvent | undefined> = {
  Results: decodeResults,
  Metadata: decodeMetadata,
  SpeechStarted: decodeSpeechStarted,
  UtteranceEnd: decodeUtteranceEnd,
  Error: decodeError,
};

function reject(reason: string, raw: string, cause?: unknown): UnhandledEvent {
  const err = new ProtocolError(reason, raw, { cause });
  log.warn(`${err.name}: ${err.message}`, raw.length > 200 ? `${raw.slice(0, 200)}...` : raw);
  return unhandled(raw);
}

/**
 * Decode one inbound text frame. Never throws: anything that cannot be
 * mapped to a known event comes back as `Unhandled` carrying the raw text.
 */
export function decodeFrame(raw: string): LiveEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    return reject('Frame is not valid JSON', raw, err);
  }

  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) return reject('Frame has no type discriminator', raw);

  const type = envelope.data.type;
  const decode = Object.prototype.hasOwnProperty.call(decoders, type) ? decoders[type] : undefined;
  if (!decode) return reject(`Unknown message type: ${type}`, raw);

  return decode(payload) ?? reject(`Malformed ${type} frame`, raw);
}

export function encodeAudio(bytes: Buffer | Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function encodeMessage(message: OutgoingMessage): string {
  return JSON.stringify(message);
}

export function encodeKeepAlive(): string {
  return encodeMessage({ type: 'KeepAlive' });
}
