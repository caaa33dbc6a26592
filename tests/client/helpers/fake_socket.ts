import { EventEmitter } from 'node:events';

type SendCallback = (err?: Error) => void;

/**
 * In-process stand-in for a `ws` client socket. Sends are confirmed
 * immediately unless `autoConfirm` is off; `close` answers with a close
 * event on the next turn unless `answerClose` is off.
 */
export class FakeSocket extends EventEmitter {
  autoConfirm = true;
  answerClose = true;
  readonly unconfirmed: SendCallback[] = [];

  send = jest.fn((data: Buffer | string, options: { binary?: boolean }, cb?: SendCallback) => {
    if (!cb) return;
    if (this.autoConfirm) cb();
    else this.unconfirmed.push(cb);
  });

  close = jest.fn((code?: number, reason?: string) => {
    if (!this.answerClose) return;
    setImmediate(() => this.emit('close', code ?? 1005, Buffer.from(reason ?? '')));
  });

  terminate = jest.fn();

  open(): void {
    this.emit('open');
  }

  receive(payload: unknown): void {
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload);
    this.emit('message', Buffer.from(text), false);
  }

  remoteClose(code: number, reason = ''): void {
    this.emit('close', code, Buffer.from(reason));
  }
}

export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function transcriptFrame(transcript: string, isFinal = true, extra: Record<string, unknown> = {}) {
  return {
    type: 'Results',
    channel_index: [0, 1],
    start: 0,
    duration: 1,
    is_final: isFinal,
    speech_final: isFinal,
    channel: { alternatives: [{ transcript, confidence: 0.9, words: [] }] },
    ...extra,
  };
}
