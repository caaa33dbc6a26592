import { describeCloseCode } from './status_codes';
import type { EventKind } from '../types/events';

export class StreamScribeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid session or client options; raised before any connection attempt. */
export class ConfigurationError extends StreamScribeError {}

export class ApiKeyError extends StreamScribeError {
  constructor(message = 'Invalid or missing API key') {
    super(message);
  }
}

/** Handshake or transport failure while opening a session. */
export class ConnectionError extends StreamScribeError {}

/** Malformed or unrecognised inbound frame. Logged, never thrown to callers. */
export class ProtocolError extends StreamScribeError {
  constructor(message: string, readonly raw: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Failure of an established socket while the receive loop runs. */
export class TransportError extends StreamScribeError {}

export class SendTimeoutError extends StreamScribeError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} not confirmed within ${timeoutMs}ms`);
  }
}

export class HandlerError extends StreamScribeError {
  constructor(readonly kind: EventKind, cause: unknown) {
    super(`Handler for ${kind} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class PartialShutdownError extends StreamScribeError {
  constructor(readonly timeoutMs: number) {
    super(`Receive loop did not stop within ${timeoutMs}ms`);
  }
}

export class WebSocketError extends StreamScribeError {
  constructor(message: string, readonly code?: number) {
    super(code ? `${message} (Code ${code}: ${describeCloseCode(code)})` : message);
  }
}

export class WavFormatError extends StreamScribeError {}

// Batch transcription

export class BatchError extends StreamScribeError {}

export class JobNotFoundError extends BatchError {
  constructor(readonly jobId: string, message?: string) {
    super(message ?? `Job not found: ${jobId}`);
  }
}

export class JobFailedError extends BatchError {
  constructor(readonly jobId: string, readonly errorMessage?: string) {
    super(errorMessage ?? `Job ${jobId} failed`);
  }
}

export class TranscriptionNotReadyError extends BatchError {
  constructor(readonly jobId: string, readonly status: string) {
    super(`Transcription not ready for job ${jobId}. Current status: ${status}`);
  }
}

export class BatchTimeoutError extends BatchError {
  constructor(readonly jobId: string, readonly timeoutMs: number) {
    super(`Job ${jobId} did not complete within ${timeoutMs}ms`);
  }
}
