import type { RealtimeSession } from './realtime_session';
import type { TranscriptEvent } from '../types/events';

/**
 * Prefix `text` with an ISO timestamp and cut it to `limit` characters.
 * Returns `undefined` for blank text.
 */
export function formatFinalLine(
  text: string | null | undefined,
  limit = 2000,
  now: () => Date = () => new Date(),
): string | undefined {
  const trimmed = typeof text === 'string' ? text.trim() : '';
  if (!trimmed) return undefined;
  const line = `[${now().toISOString()}] ${trimmed}`;
  return line.length > limit ? line.slice(0, limit) : line;
}

export function topTranscript(event: TranscriptEvent): string {
  return event.channel.alternatives[0]?.transcript ?? '';
}

/**
 * Accumulates final transcripts of a session. Finals received since the last
 * `UtteranceEnd` are joined into one utterance when it arrives.
 */
export class TranscriptCollector {
  private readonly finals: string[] = [];
  private readonly completed: string[] = [];
  private pending: string[] = [];

  constructor(private readonly onUtterance?: (utterance: string) => void) {}

  attach(session: RealtimeSession): this {
    session.on('Transcript', (event) => {
      this.addTranscript(event);
    });
    session.on('UtteranceEnd', () => {
      this.endUtterance();
    });
    return this;
  }

  /** Returns the transcript text when the event is a non-empty final. */
  addTranscript(event: TranscriptEvent): string | undefined {
    const text = topTranscript(event).trim();
    if (!event.is_final || !text) return undefined;
    this.finals.push(text);
    this.pending.push(text);
    return text;
  }

  /** Close the current utterance; `undefined` when no final arrived since the last one. */
  endUtterance(): string | undefined {
    if (this.pending.length === 0) return undefined;
    const utterance = this.pending.join(' ');
    this.pending = [];
    this.completed.push(utterance);
    this.onUtterance?.(utterance);
    return utterance;
  }

  get finalTranscripts(): readonly string[] {
    return this.finals;
  }

  get utterances(): readonly string[] {
    return this.completed;
  }

  get text(): string {
    return this.finals.join(' ');
  }
}
