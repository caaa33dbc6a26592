// Events surfaced by a realtime transcription session. Wire field names are kept as-is.

export interface Word {
  readonly word: string;
  readonly start: number;
  readonly end: number;
  readonly confidence: number;
  readonly punctuated_word?: string;
}

export interface Alternative {
  readonly transcript: string;
  readonly confidence: number;
  readonly words: readonly Word[];
}

export interface Channel {
  readonly alternatives: readonly Alternative[];
}

export interface ResultMetadata {
  readonly request_id?: string;
  readonly model_uuid?: string;
  readonly model_info?: unknown;
}

export interface OpenEvent {
  readonly kind: 'Open';
}

export interface TranscriptEvent {
  readonly kind: 'Transcript';
  readonly channel: Channel;
  readonly channel_index: readonly number[];
  readonly start: number;
  readonly duration: number;
  readonly is_final: boolean;
  /** Set once enough trailing silence was observed to end the speech segment. */
  readonly speech_final: boolean;
  readonly metadata?: ResultMetadata;
}

export interface MetadataEvent {
  readonly kind: 'Metadata';
  readonly transaction_key?: string;
  readonly request_id?: string;
  readonly sha256?: string;
  readonly created?: string;
  readonly duration?: number;
  readonly channels?: number;
}

export interface SpeechStartedEvent {
  readonly kind: 'SpeechStarted';
  readonly channel: readonly number[];
  readonly timestamp: number;
}

export interface UtteranceEndEvent {
  readonly kind: 'UtteranceEnd';
  readonly channel: readonly number[];
  readonly last_word_end: number;
}

export interface ErrorEvent {
  readonly kind: 'Error';
  readonly code?: number;
  readonly message?: string;
  readonly description?: string;
  readonly variant?: string;
  /** True when the error ended the session (transport failure). */
  readonly fatal: boolean;
}

export interface CloseEvent {
  readonly kind: 'Close';
  readonly code?: number;
  readonly reason?: string;
  readonly description?: string;
}

export interface UnhandledEvent {
  readonly kind: 'Unhandled';
  readonly raw: string;
}

export type LiveEvent =
  | OpenEvent
  | TranscriptEvent
  | MetadataEvent
  | SpeechStartedEvent
  | UtteranceEndEvent
  | ErrorEvent
  | CloseEvent
  | UnhandledEvent;

export type EventKind = LiveEvent['kind'];
export type EventOf<K extends EventKind> = Extract<LiveEvent, { kind: K }>;

// Outgoing control messages
export interface KeepAliveMessage {
  type: 'KeepAlive';
}

export type OutgoingMessage = KeepAliveMessage;
