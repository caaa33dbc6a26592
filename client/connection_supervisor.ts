import WebSocket from 'ws';
import { ConnectionError, SendTimeoutError, TransportError, WebSocketError } from './errors';
import { decodeFrame, encodeAudio, encodeKeepAlive } from './frame_codec';
import { createLogger } from './logger';
import { Mailbox } from './mailbox';
import { CloseCode, describeCloseCode, isNormalClosure } from './status_codes';
import type { ConnectTarget } from './realtime_options';
import type { CloseEvent, LiveEvent } from '../types/events';

export interface SupervisorTimings {
  /** Upper bound a caller waits for send/keep-alive/close to be confirmed. */
  sendTimeoutMs: number;
  /** How long the receive loop waits for the next item before re-checking the shutdown flag. */
  pollIntervalMs: number;
  /** How long a shutting-down loop waits for the close handshake before terminating. */
  closeTimeoutMs: number;
  handshakeTimeoutMs: number;
}

export const DEFAULT_SUPERVISOR_TIMINGS: SupervisorTimings = {
  sendTimeoutMs: 5000,
  pollIntervalMs: 1000,
  closeTimeoutMs: 1000,
  handshakeTimeoutMs: 10000,
};

export type EventSink = (event: LiveEvent) => void;

type CommandBody = { op: 'audio'; payload: Buffer } | { op: 'keepalive'; payload: string } | { op: 'close' };

type Command = CommandBody & {
  /** Resolves the caller's promise; calls after the first are ignored. */
  settle: (ok: boolean) => void;
};

type Inbound =
  | { kind: 'frame'; text: string }
  | { kind: 'binary'; size: number }
  | { kind: 'closed'; code: number; reason: string }
  | { kind: 'failed'; error: Error }
  | { kind: 'command'; command: Command };

interface CloseDetails {
  code?: number;
  reason?: string;
}

const log = createLogger('supervisor');

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function rawLength(data: WebSocket.RawData): number {
  if (Array.isArray(data)) return data.reduce((n, b) => n + b.length, 0);
  return data.byteLength;
}

function errorCode(err: Error): number | undefined {
  return 'code' in err && typeof err.code === 'number' ? err.code : undefined;
}

function closeEvent(details: CloseDetails): CloseEvent {
  return {
    kind: 'Close',
    code: details.code,
    reason: details.reason || undefined,
    description: details.code !== undefined ? describeCloseCode(details.code) : undefined,
  };
}

/**
 * Owns one duplex socket. A single receive loop drains a mailbox holding
 * inbound frames, transport notices and outbound commands, so the socket is
 * only ever touched from that loop and every event is emitted from it in
 * receipt order. Callers reach the socket by posting commands and waiting
 * (bounded) for the loop to confirm them.
 */
export class ConnectionSupervisor {
  private ws: WebSocket | null = null;
  private loop: Promise<void> | null = null;
  private readonly mailbox = new Mailbox<Inbound>();
  private readonly timings: SupervisorTimings;
  private stopping = false;
  private closeRequested = false;
  private transportClosed = false;
  private closeWaiters: Array<(ok: boolean) => void> = [];

  constructor(private readonly sink: EventSink, timings: Partial<SupervisorTimings> = {}) {
    this.timings = { ...DEFAULT_SUPERVISOR_TIMINGS, ...timings };
  }

  get isOpen(): boolean {
    return this.ws !== null && !this.stopping && !this.closeRequested && !this.transportClosed;
  }

  /**
   * Perform the handshake. Resolves `true` once the socket is open and the
   * receive loop has started, `false` if the handshake failed.
   */
  open(target: ConnectTarget): Promise<boolean> {
    if (this.ws || this.loop) {
      log.warn('Supervisor was already opened; start a new session instead');
      return Promise.resolve(false);
    }
    log.info(`Connecting to: ${target.url}`);

    return new Promise((resolve) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(target.url, {
          headers: target.headers,
          perMessageDeflate: false,
          handshakeTimeout: this.timings.handshakeTimeoutMs,
        });
      } catch (err) {
        log.error(new ConnectionError(`Failed to create socket for ${target.url}`, { cause: err }));
        resolve(false);
        return;
      }

      const onOpen = () => {
        ws.off('error', onError);
        this.attach(ws);
        resolve(true);
      };
      const onError = (err: Error) => {
        ws.off('open', onOpen);
        ws.on('error', (late: Error) => log.debug('socket error after failed handshake:', late.message));
        log.error(new ConnectionError(`Failed to connect: ${err.message}`, { cause: err }));
        resolve(false);
      };
      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  send(data: Buffer | Uint8Array): Promise<boolean> {
    if (!this.isOpen) {
      log.warn('WebSocket not connected; audio not sent');
      return Promise.resolve(false);
    }
    return this.submit({ op: 'audio', payload: encodeAudio(data) }, 'send');
  }

  keepAlive(): Promise<boolean> {
    if (!this.isOpen) return Promise.resolve(false);
    return this.submit({ op: 'keepalive', payload: encodeKeepAlive() }, 'keep-alive');
  }

  /** Request a graceful close. Idempotent; `true` when nothing is open. */
  close(): Promise<boolean> {
    if (!this.ws || this.transportClosed) return Promise.resolve(true);
    return this.submit({ op: 'close' }, 'close');
  }

  requestShutdown(): void {
    if (this.stopping) return;
    this.stopping = true;
    this.mailbox.interrupt();
  }

  /** Wait up to `timeoutMs` for the receive loop to finish. */
  async join(timeoutMs: number): Promise<boolean> {
    if (!this.loop) return true;
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.loop.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private submit(body: CommandBody, operation: string): Promise<boolean> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const command: Command = {
        ...body,
        settle: (ok) => {
          clearTimeout(timer);
          resolve(ok);
        },
      };
      // a write already handed to the socket may still complete after this
      timer = setTimeout(() => {
        log.warn(new SendTimeoutError(operation, this.timings.sendTimeoutMs).message);
        resolve(false);
      }, this.timings.sendTimeoutMs);
      this.mailbox.put({ kind: 'command', command });
    });
  }

  private attach(ws: WebSocket): void {
    this.ws = ws;
    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        this.mailbox.put({ kind: 'binary', size: rawLength(data) });
      } else {
        this.mailbox.put({ kind: 'frame', text: rawToString(data) });
      }
    });
    ws.on('close', (code: number, reason: Buffer) => {
      this.transportClosed = true;
      this.mailbox.put({ kind: 'closed', code, reason: reason.toString('utf8') });
    });
    ws.on('error', (error: Error) => {
      this.mailbox.put({ kind: 'failed', error });
    });
    log.info('WebSocket connected');
    this.loop = this.run(ws).catch((err: unknown) => {
      log.error('Receive loop crashed:', err);
    });
  }

  private async run(ws: WebSocket): Promise<void> {
    let details: CloseDetails = {};
    let ended = false;
    this.sink({ kind: 'Open' });
    try {
      while (!this.stopping) {
        const item = await this.mailbox.take(this.timings.pollIntervalMs);
        if (!item) continue;
        const result = this.handle(ws, item);
        if (result) {
          details = result;
          ended = true;
          break;
        }
      }
      if (!ended) details = await this.shutdownTransport(ws);
    } catch (err) {
      log.error(new TransportError('Receive loop failed', { cause: err }));
      ws.terminate();
    } finally {
      ws.removeAllListeners('message');
      this.ws = null;
      this.sink(closeEvent(details));
      this.settleLeftovers();
    }
  }

  /** Returns close details once the loop must stop. */
  private handle(ws: WebSocket, item: Inbound): CloseDetails | undefined {
    switch (item.kind) {
      case 'frame':
        this.sink(decodeFrame(item.text));
        return undefined;
      case 'binary':
        log.warn(`Ignoring ${item.size}-byte binary frame`);
        return undefined;
      case 'command':
        this.execute(ws, item.command);
        return undefined;
      case 'closed':
        if (isNormalClosure(item.code)) {
          log.info(`WebSocket connection closed: code=${item.code}, reason=${item.reason}`);
        } else {
          log.warn(new WebSocketError('WebSocket connection closed', item.code).message);
        }
        return { code: item.code, reason: item.reason };
      case 'failed':
        log.error(new TransportError(`WebSocket error: ${item.error.message}`, { cause: item.error }));
        this.sink({
          kind: 'Error',
          code: errorCode(item.error),
          message: item.error.message,
          description: 'WebSocket connection error',
          fatal: true,
        });
        ws.terminate();
        return {};
    }
  }

  private execute(ws: WebSocket, command: Command): void {
    if (command.op === 'close') {
      this.closeWaiters.push(command.settle);
      this.beginClose(ws);
      return;
    }
    if (this.closeRequested || this.transportClosed) {
      command.settle(false);
      return;
    }
    try {
      ws.send(command.payload, { binary: command.op === 'audio' }, (err?: Error) => {
        if (err) log.error(`Error sending ${command.op}:`, err.message);
        command.settle(!err);
      });
    } catch (err) {
      log.error(`Error sending ${command.op}:`, err);
      command.settle(false);
    }
  }

  private beginClose(ws: WebSocket): void {
    if (this.closeRequested) return;
    this.closeRequested = true;
    ws.close(CloseCode.NORMAL_CLOSURE);
  }

  // Close the socket and keep draining (frames are still delivered) until the
  // transport confirms or the close timeout runs out.
  private async shutdownTransport(ws: WebSocket): Promise<CloseDetails> {
    this.beginClose(ws);
    const deadline = Date.now() + this.timings.closeTimeoutMs;
    for (let remaining = this.timings.closeTimeoutMs; remaining > 0; remaining = deadline - Date.now()) {
      const item = await this.mailbox.take(remaining);
      if (!item) break;
      const result = this.handle(ws, item);
      if (result) return result;
    }
    log.warn(`Close handshake not completed within ${this.timings.closeTimeoutMs}ms; terminating socket`);
    ws.terminate();
    return {};
  }

  private settleLeftovers(): void {
    let dropped = 0;
    for (const item of this.mailbox.drain()) {
      if (item.kind === 'command') {
        item.command.settle(item.command.op === 'close');
      } else if (item.kind === 'frame') {
        dropped++;
      }
    }
    if (dropped > 0) log.debug(`Dropped ${dropped} frames received after the loop ended`);
    const waiters = this.closeWaiters;
    this.closeWaiters = [];
    for (const settle of waiters) settle(true);
  }
}
