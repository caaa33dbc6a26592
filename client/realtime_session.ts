import type { ClientOptions } from './client_options';
import { ConnectionSupervisor, type SupervisorTimings } from './connection_supervisor';
import { PartialShutdownError } from './errors';
import { EventDispatcher, type EventHandler } from './event_dispatcher';
import { DEFAULT_KEEPALIVE_INTERVAL_MS, HeartbeatScheduler } from './heartbeat';
import { createLogger } from './logger';
import {
  buildConnectTarget,
  resolveRealtimeOptions,
  type RealtimeOptions,
  type ResolvedRealtimeOptions,
} from './realtime_options';
import type { EventKind, LiveEvent } from '../types/events';

export type SessionState = 'Idle' | 'Connecting' | 'Open' | 'Closing' | 'Closed' | 'Failed';

export interface SessionTimings extends SupervisorTimings {
  /** How long `finish` waits for the receive loop to stop. */
  joinTimeoutMs: number;
  keepAliveIntervalMs: number;
}

export const DEFAULT_JOIN_TIMEOUT_MS = 5000;

const log = createLogger('session');

/**
 * One realtime transcription session: a single connection attempt with its
 * own handlers, supervisor and optional keep-alive. Not reusable once it has
 * finished.
 *
 * ```ts
 * const session = client.transcribe.realtime();
 * session.on('Transcript', (ev) => console.log(ev.channel.alternatives[0]?.transcript));
 * if (await session.start({ sampleRate: 16000 })) {
 *   await session.send(pcm);
 *   await session.finish();
 * }
 * ```
 */
export class RealtimeSession {
  private _state: SessionState = 'Idle';
  private _options?: ResolvedRealtimeOptions;
  private readonly dispatcher = new EventDispatcher();
  private readonly supervisor: ConnectionSupervisor;
  private readonly joinTimeoutMs: number;
  private readonly keepAliveIntervalMs: number;
  private heartbeat?: HeartbeatScheduler;
  private connecting?: Promise<boolean>;
  private finishing?: Promise<boolean>;

  constructor(private readonly client: ClientOptions, timings: Partial<SessionTimings> = {}) {
    const {
      joinTimeoutMs = DEFAULT_JOIN_TIMEOUT_MS,
      keepAliveIntervalMs = DEFAULT_KEEPALIVE_INTERVAL_MS,
      ...supervisorTimings
    } = timings;
    this.joinTimeoutMs = joinTimeoutMs;
    this.keepAliveIntervalMs = keepAliveIntervalMs;
    this.supervisor = new ConnectionSupervisor((event) => this.onEvent(event), supervisorTimings);
  }

  get state(): SessionState {
    return this._state;
  }

  get options(): ResolvedRealtimeOptions | undefined {
    return this._options;
  }

  isConnected(): boolean {
    return this._state === 'Open';
  }

  on<K extends EventKind>(kind: K, handler: EventHandler<K>): this {
    this.dispatcher.register(kind, handler);
    return this;
  }

  /**
   * Validate `options` and connect. Invalid options throw a
   * `ConfigurationError` synchronously and leave the session `Idle`.
   * Resolves `false` when the handshake fails or the session was already
   * started.
   */
  start(options: RealtimeOptions = {}): Promise<boolean> {
    if (this._state !== 'Idle') {
      log.warn(`start() ignored: session is ${this._state}`);
      return Promise.resolve(false);
    }
    const resolved = resolveRealtimeOptions(options);
    const target = buildConnectTarget(this.client, resolved);
    this._options = resolved;
    this.transition('Connecting');
    this.connecting = this.connect(target.url, target.headers);
    return this.connecting;
  }

  send(data: Buffer | Uint8Array): Promise<boolean> {
    if (this._state !== 'Open') {
      log.debug(`send() ignored: session is ${this._state}`);
      return Promise.resolve(false);
    }
    return this.supervisor.send(data);
  }

  keepAlive(): Promise<boolean> {
    if (this._state !== 'Open') return Promise.resolve(false);
    return this.supervisor.keepAlive();
  }

  /**
   * Close the session and wait for the receive loop to stop. `false` means
   * the loop did not stop within the join timeout.
   */
  finish(): Promise<boolean> {
    if (this.finishing) return this.finishing;
    if (this._state === 'Idle' || this._state === 'Closed' || this._state === 'Failed') {
      return Promise.resolve(true);
    }
    this.finishing = this.shutdown();
    return this.finishing;
  }

  private async connect(url: string, headers: Record<string, string>): Promise<boolean> {
    const opened = await this.supervisor.open({ url, headers });
    if (!opened) {
      this.transition('Failed');
      return false;
    }
    return true;
  }

  private async shutdown(): Promise<boolean> {
    if (this.connecting) await this.connecting;
    if (this._state !== 'Open') return true;

    this.transition('Closing');
    this.supervisor.requestShutdown();
    this.heartbeat?.stop();
    if (!(await this.supervisor.close())) {
      log.warn('Close was not confirmed');
    }
    const joined = await this.supervisor.join(this.joinTimeoutMs);
    this.transition('Closed');
    if (!joined) {
      log.error(new PartialShutdownError(this.joinTimeoutMs));
      return false;
    }
    log.info('finish succeeded');
    return true;
  }

  // Runs on the receive loop: update state first so handlers observe it.
  private onEvent(event: LiveEvent): void {
    switch (event.kind) {
      case 'Open':
        if (this._state === 'Connecting') {
          this.transition('Open');
          this.startHeartbeat();
        }
        break;
      case 'Error':
        if (event.fatal) {
          this.heartbeat?.stop();
          if (this._state === 'Open') this.transition('Failed');
        }
        break;
      case 'Close':
        this.heartbeat?.stop();
        if (this._state === 'Open') this.transition('Closed');
        break;
      default:
        break;
    }
    this.dispatcher.dispatch(event);
  }

  private startHeartbeat(): void {
    if (!this.client.isKeepAliveEnabled()) return;
    this.heartbeat = new HeartbeatScheduler(() => this.supervisor.keepAlive(), this.keepAliveIntervalMs);
    this.heartbeat.start();
  }

  private transition(next: SessionState): void {
    log.debug(`state ${this._state} -> ${next}`);
    this._state = next;
  }
}
