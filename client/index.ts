export { StreamScribeClient, TranscribeRouter, LegacyListenRouter } from './client';
export type { StreamScribeClientInit } from './client';
export {
  ClientOptions,
  clientOptionsFromEnv,
  DEFAULT_URL,
  DEFAULT_REALTIME_PATH,
  DEFAULT_BATCH_PATH,
} from './client_options';
export type { ClientOptionsInit } from './client_options';
export { RealtimeSession, DEFAULT_JOIN_TIMEOUT_MS } from './realtime_session';
export type { SessionState, SessionTimings } from './realtime_session';
export { resolveRealtimeOptions, buildConnectTarget } from './realtime_options';
export type { RealtimeOptions, ResolvedRealtimeOptions, ConnectTarget } from './realtime_options';
export { ConnectionSupervisor, DEFAULT_SUPERVISOR_TIMINGS } from './connection_supervisor';
export type { SupervisorTimings, EventSink } from './connection_supervisor';
export { EventDispatcher } from './event_dispatcher';
export type { EventHandler, HandlerOutcome } from './event_dispatcher';
export { HeartbeatScheduler, DEFAULT_KEEPALIVE_INTERVAL_MS } from './heartbeat';
export { decodeFrame, encodeAudio, encodeKeepAlive } from './frame_codec';
export { CloseCode, describeCloseCode, isClientError, isServerError, isNormalClosure } from './status_codes';
export * from './errors';
export { createLogger, setLogLevel, getLogLevel, parseLogLevel, registerSecret } from './logger';
export type { LogLevel, Logger } from './logger';
export { BatchClient } from './batch/batch_client';
export type { AudioSource, SubmitJobRequest, TranscribeRequest } from './batch/batch_client';
export type { TranscriptionConfig, BatchOptions } from './batch/batch_options';
export type { JobDetails, TranscriptionStatus, TranscriptionResult } from './batch/batch_responses';
export { readWav } from './audio/wav_reader';
export type { WavAudio } from './audio/wav_reader';
export { FrameChunker, frameBytes } from './audio/frame_chunker';
export { streamPcm } from './audio/pcm_streamer';
export type { AudioSink, StreamPcmOptions, StreamStats } from './audio/pcm_streamer';
export { TranscriptCollector, formatFinalLine } from './transcript_collector';
export { SDK_VERSION } from './version';
export * from '../types/events';
