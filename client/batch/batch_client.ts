import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { userAgent, type ClientOptions } from '../client_options';
import {
  ApiKeyError,
  BatchError,
  BatchTimeoutError,
  ConfigurationError,
  JobFailedError,
  JobNotFoundError,
  StreamScribeError,
  TranscriptionNotReadyError,
} from '../errors';
import { createLogger } from '../logger';
import { resolveBatchOptions, toBatchQueryParams, type BatchOptions, type TranscriptionConfig } from './batch_options';
import {
  jobSummarySchema,
  parseJobDetails,
  parseTranscriptionResult,
  parseTranscriptionStatus,
  type JobDetails,
  type TranscriptionResult,
  type TranscriptionStatus,
} from './batch_responses';

export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

/** Audio given either as a presigned URL or as a local file (path or bytes). */
export type AudioSource =
  | { presignedUrl: string; audioFile?: undefined; filename?: undefined }
  | { audioFile: string | Buffer | Uint8Array; filename?: string; presignedUrl?: undefined };

export type SubmitJobRequest = AudioSource & { config?: TranscriptionConfig };

export type TranscribeRequest = SubmitJobRequest & { options?: BatchOptions };

interface HttpRequest {
  query?: Record<string, string>;
  json?: unknown;
  form?: FormData;
  jobId?: string;
}

interface HttpResult {
  status: number;
  data: unknown;
}

const log = createLogger('batch');

/**
 * Client for batch transcription: submit a job, poll its status and fetch
 * the transcript once it has completed.
 */
export class BatchClient {
  private readonly baseUrl: string;
  private readonly batchPath: string;
  private readonly apiKey: string;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: ClientOptions, private readonly requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS) {
    if (!options.apiKey) {
      throw new ApiKeyError('API key is required for batch transcription');
    }
    this.apiKey = options.apiKey;
    // realtime URLs are ws(s); REST calls go over http(s)
    this.baseUrl = options.url.replace(/^wss:\/\//i, 'https://').replace(/^ws:\/\//i, 'http://');
    this.batchPath = options.batchPath;
    log.debug(`BatchClient initialized (base_url=${this.baseUrl}, batch_path=${this.batchPath})`);
  }

  async submitJob(request: SubmitJobRequest): Promise<JobDetails> {
    if (request.presignedUrl && request.audioFile) {
      throw new ConfigurationError('Cannot specify both presignedUrl and audioFile');
    }
    const query = toBatchQueryParams(request.config);

    let result: HttpResult;
    if (request.presignedUrl) {
      result = await this.request('POST', '/transcribe', { query, json: { presigned_url: request.presignedUrl } });
    } else if (request.audioFile) {
      const form = await this.uploadForm(request.audioFile, request.filename);
      result = await this.request('POST', '/transcribe/upload', { query, form });
    } else {
      throw new ConfigurationError('Must provide either presignedUrl or audioFile');
    }

    const job = parseJobDetails(result.data);
    log.info(`Job submitted successfully: ${job.jobId}`);
    return job;
  }

  async getStatus(jobId: string): Promise<TranscriptionStatus> {
    log.debug(`Getting status for job: ${jobId}`);
    const { data } = await this.request('GET', `/status/${encodeURIComponent(jobId)}`, { jobId });
    return parseTranscriptionStatus(data);
  }

  /**
   * Fetch the transcript of a completed job. Throws
   * `TranscriptionNotReadyError` while the job is still running and
   * `JobFailedError` when it failed.
   */
  async getTranscription(jobId: string): Promise<TranscriptionResult> {
    log.debug(`Getting transcription for job: ${jobId}`);
    const { status, data } = await this.request('GET', `/get_transcription/${encodeURIComponent(jobId)}`, { jobId });
    const summary = jobSummarySchema.safeParse(data);
    const jobStatus = summary.success ? summary.data.status : undefined;

    if (status === 202) {
      throw new TranscriptionNotReadyError(jobId, jobStatus ?? 'unknown');
    }
    if (jobStatus?.toUpperCase() === 'FAILED') {
      throw new JobFailedError(jobId, (summary.success && summary.data.message) || 'Transcription failed');
    }
    return parseTranscriptionResult(data);
  }

  /** Poll until the job completes, then fetch its transcript. */
  async waitForCompletion(jobId: string, options: BatchOptions = {}): Promise<TranscriptionResult> {
    const { pollingIntervalMs, timeoutMs } = resolveBatchOptions(options);
    log.info(
      `Waiting for job completion: ${jobId} (polling_interval=${pollingIntervalMs}ms, timeout=${timeoutMs ?? 'none'})`,
    );
    const deadline = timeoutMs === undefined ? Number.POSITIVE_INFINITY : Date.now() + timeoutMs;

    for (let polls = 1; ; polls++) {
      const status = await this.getStatus(jobId);
      const current = status.status.toUpperCase();
      log.debug(`Job ${jobId} status: ${current} (poll #${polls})`);

      if (current === 'COMPLETED') {
        log.info(`Job completed (job_id=${jobId}, polls=${polls})`);
        break;
      }
      if (current === 'FAILED') {
        throw new JobFailedError(jobId, status.errorMessage ?? 'Job failed');
      }

      const remaining = deadline - Date.now();
      if (timeoutMs !== undefined && remaining <= 0) {
        throw new BatchTimeoutError(jobId, timeoutMs);
      }
      await sleep(Math.min(pollingIntervalMs, remaining));
    }
    return this.getTranscription(jobId);
  }

  /** Submit a job and wait for its transcript. */
  async transcribe(request: TranscribeRequest): Promise<TranscriptionResult> {
    const { options, ...submit } = request;
    const job = await this.submitJob(submit);
    const result = await this.waitForCompletion(job.jobId, options);
    log.info(`Transcription completed successfully (job_id=${job.jobId})`);
    return result;
  }

  /** Abort requests in flight and refuse new ones. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
    log.debug('BatchClient closed');
  }

  private async uploadForm(audioFile: string | Buffer | Uint8Array, filename?: string): Promise<FormData> {
    let content: Uint8Array;
    let name = filename ?? 'audio.mp3';
    if (typeof audioFile === 'string') {
      try {
        content = await readFile(audioFile);
      } catch (err) {
        throw new BatchError(`Audio file not found: ${audioFile}`, { cause: err });
      }
      name = filename ?? basename(audioFile);
    } else {
      content = audioFile;
    }
    const form = new FormData();
    form.append('audio_file', new Blob([new Uint8Array(content)], { type: 'audio/mpeg' }), name);
    return form;
  }

  private async request(method: 'GET' | 'POST', path: string, init: HttpRequest = {}): Promise<HttpResult> {
    if (this.closed) throw new BatchError('BatchClient is closed');

    let url = `${this.baseUrl}${this.batchPath}${path}`;
    const query = new URLSearchParams(init.query).toString();
    if (query) url += `?${query}`;

    const headers: Record<string, string> = { 'X-API-Key': this.apiKey, 'User-Agent': userAgent() };
    let body: string | FormData | undefined;
    if (init.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(init.json);
    } else if (init.form) {
      body = init.form;
    }

    const controller = new AbortController();
    this.inFlight.add(controller);
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    log.debug(`HTTP ${method} ${url}`);

    try {
      const response = await fetch(url, { method, headers, body, signal: controller.signal });
      if (response.status === 401) throw new ApiKeyError('Invalid API key');
      if (response.status === 404) throw new JobNotFoundError(init.jobId ?? 'unknown', 'Resource not found');

      const text = await response.text();
      if (response.status >= 400) {
        log.error(`HTTP ${response.status}: ${text}`);
        throw new BatchError(`HTTP ${response.status}: ${text}`);
      }
      const data: unknown = text ? JSON.parse(text) : {};
      return { status: response.status, data };
    } catch (err) {
      if (err instanceof StreamScribeError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new BatchError(`Request aborted: ${method} ${url}`, { cause: err });
      }
      throw new BatchError(`Request failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }
  }
}
