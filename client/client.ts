import { BatchClient } from './batch/batch_client';
import { ClientOptions, clientOptionsFromEnv } from './client_options';
import { setLogLevel } from './logger';
import { RealtimeSession, type SessionTimings } from './realtime_session';

export interface StreamScribeClientInit {
  /** Falls back to `STREAMSCRIBE_API_KEY` when neither this nor `config` is given. */
  apiKey?: string;
  /** Takes precedence over `apiKey`. */
  config?: ClientOptions;
  /** Timing overrides applied to every realtime session this client creates. */
  timings?: Partial<SessionTimings>;
}

export class TranscribeRouter {
  private batchClient?: BatchClient;

  constructor(
    private readonly config: ClientOptions,
    private readonly timings: Partial<SessionTimings> = {},
  ) {}

  /** A new realtime session; each call returns an independent session. */
  realtime(timings: Partial<SessionTimings> = {}): RealtimeSession {
    return new RealtimeSession(this.config, { ...this.timings, ...timings });
  }

  batch(): BatchClient {
    if (!this.batchClient) this.batchClient = new BatchClient(this.config);
    return this.batchClient;
  }
}

/** Older `listen.websocket.v('1')` accessor; maps to `transcribe.realtime()`. */
export class LegacyListenRouter {
  readonly websocket: { v: (version?: string) => RealtimeSession };

  constructor(transcribe: TranscribeRouter) {
    this.websocket = { v: () => transcribe.realtime() };
  }
}

/**
 * Entry point of the SDK.
 *
 * ```ts
 * const client = new StreamScribeClient({ apiKey: process.env.STREAMSCRIBE_API_KEY });
 * const session = client.transcribe.realtime();
 * const batch = client.transcribe.batch();
 * ```
 */
export class StreamScribeClient {
  readonly config: ClientOptions;
  readonly transcribe: TranscribeRouter;
  private legacy?: LegacyListenRouter;

  constructor(init: StreamScribeClientInit = {}) {
    if (init.config) {
      this.config = init.config;
    } else if (init.apiKey) {
      this.config = new ClientOptions({ apiKey: init.apiKey });
    } else {
      this.config = clientOptionsFromEnv();
    }
    if (this.config.logLevel) setLogLevel(this.config.logLevel);
    this.transcribe = new TranscribeRouter(this.config, init.timings);
  }

  get listen(): LegacyListenRouter {
    if (!this.legacy) this.legacy = new LegacyListenRouter(this.transcribe);
    return this.legacy;
  }
}
