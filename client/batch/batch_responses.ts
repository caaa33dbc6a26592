import { z } from 'zod';
import { BatchError } from '../errors';

const isoDate = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

const jobId = z.string().uuid();

const jobDetailsSchema = z
  .object({
    job_id: jobId,
    /** pending, downloading, uploading, queued, processing, completed or failed */
    status: z.string().default('pending'),
    created_at: isoDate.nullish(),
    updated_at: isoDate.nullish(),
    error_message: z.string().nullish(),
  })
  .transform((d) => ({
    jobId: d.job_id,
    status: d.status,
    createdAt: d.created_at ?? new Date(),
    updatedAt: d.updated_at ?? undefined,
    errorMessage: d.error_message ?? undefined,
  }));

const transcriptionStatusSchema = z
  .object({
    job_id: jobId,
    status: z.string().default('pending'),
    created_at: isoDate.nullish(),
    updated_at: isoDate.nullish(),
    error_message: z.string().nullish(),
  })
  .transform((d) => ({
    jobId: d.job_id,
    status: d.status,
    createdAt: d.created_at ?? undefined,
    updatedAt: d.updated_at ?? undefined,
    errorMessage: d.error_message ?? undefined,
  }));

const transcriptionResultSchema = z
  .object({
    job_id: jobId,
    status: z.string().default('pending'),
    transcription: z.record(z.unknown()).nullish(),
    message: z.string().nullish(),
  })
  .transform((d) => ({
    jobId: d.job_id,
    status: d.status,
    transcription: d.transcription ?? undefined,
    message: d.message ?? undefined,
  }));

/** Status and message of any job response, before the full shape is checked. */
export const jobSummarySchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
});

export type JobDetails = z.output<typeof jobDetailsSchema>;
export type TranscriptionStatus = z.output<typeof transcriptionStatusSchema>;
export type TranscriptionResult = z.output<typeof transcriptionResultSchema>;

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new BatchError(`Invalid ${what} response: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function parseJobDetails(data: unknown): JobDetails {
  return parseWith(jobDetailsSchema, 'job', data);
}

export function parseTranscriptionStatus(data: unknown): TranscriptionStatus {
  return parseWith(transcriptionStatusSchema, 'status', data);
}

export function parseTranscriptionResult(data: unknown): TranscriptionResult {
  return parseWith(transcriptionResultSchema, 'transcription', data);
}
