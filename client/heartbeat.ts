import { createLogger } from './logger';

export const DEFAULT_KEEPALIVE_INTERVAL_MS = 5000;

const log = createLogger('heartbeat');

/**
 * Periodic keep-alive. A failed tick is logged and the next one still fires;
 * ticks never overlap.
 */
export class HeartbeatScheduler {
  private timer?: ReturnType<typeof setInterval>;
  private inFlight = false;
  private ticks = 0;

  constructor(
    private readonly tick: () => Promise<boolean>,
    private readonly intervalMs = DEFAULT_KEEPALIVE_INTERVAL_MS,
  ) {}

  start(): void {
    if (this.timer) return; // idempotent
    log.info(`keepalive is enabled (every ${this.intervalMs}ms)`);
    this.timer = setInterval(() => {
      void this.beat();
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    log.debug(`stopped after ${this.ticks} ticks`);
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  private async beat(): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    this.ticks++;
    try {
      const sent = await this.tick();
      if (sent) {
        log.debug('KeepAlive sent');
      } else {
        log.warn('KeepAlive was not confirmed');
      }
    } catch (err) {
      log.error('Error sending keep-alive:', err);
    } finally {
      this.inFlight = false;
    }
  }
}
