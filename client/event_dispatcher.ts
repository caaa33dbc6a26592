import { HandlerError } from './errors';
import { createLogger } from './logger';
import type { EventKind, EventOf, LiveEvent } from '../types/events';

/** May be async; a returned promise is not awaited but its rejection is logged. */
export type EventHandler<K extends EventKind> = (event: EventOf<K>) => void;

export type HandlerOutcome = { ok: true } | { ok: false; error: HandlerError };

type HandlerRegistry = { [K in EventKind]: EventHandler<K>[] };

const log = createLogger('dispatcher');

function emptyRegistry(): HandlerRegistry {
  return {
    Open: [],
    Transcript: [],
    Metadata: [],
    SpeechStarted: [],
    UtteranceEnd: [],
    Error: [],
    Close: [],
    Unhandled: [],
  };
}

/**
 * Ordered fan-out of session events.
 *
 * Handlers run synchronously in registration order. A throwing handler is
 * recorded in the returned outcomes and logged; the remaining handlers still
 * run and `emit` itself never throws. Async handlers are started in order but
 * not awaited; their rejections are logged.
 */
export class EventDispatcher {
  private readonly handlers: HandlerRegistry = emptyRegistry();

  register<K extends EventKind>(kind: K, handler: EventHandler<K>): void {
    if (!Object.prototype.hasOwnProperty.call(this.handlers, kind) || typeof handler !== 'function') {
      log.warn(`Ignoring handler registration for ${String(kind)}`);
      return;
    }
    log.debug(`event subscribed: ${kind}`);
    this.handlers[kind].push(handler);
  }

  emit<K extends EventKind>(kind: K, event: EventOf<K>): HandlerOutcome[] {
    const outcomes: HandlerOutcome[] = [];
    // snapshot so handlers registered during dispatch apply from the next event
    for (const handler of [...this.handlers[kind]]) {
      try {
        const result: unknown = handler(event);
        if (result instanceof Promise) {
          // not awaited; a later rejection is logged but cannot change the outcome
          result.catch((err: unknown) => {
            log.error('Error in event handler:', new HandlerError(kind, err));
          });
        }
        outcomes.push({ ok: true });
      } catch (err) {
        const error = new HandlerError(kind, err);
        log.error('Error in event handler:', error);
        outcomes.push({ ok: false, error });
      }
    }
    return outcomes;
  }

  dispatch(event: LiveEvent): HandlerOutcome[] {
    switch (event.kind) {
      case 'Open':
        return this.emit('Open', event);
      case 'Transcript':
        return this.emit('Transcript', event);
      case 'Metadata':
        return this.emit('Metadata', event);
      case 'SpeechStarted':
        return this.emit('SpeechStarted', event);
      case 'UtteranceEnd':
        return this.emit('UtteranceEnd', event);
      case 'Error':
        return this.emit('Error', event);
      case 'Close':
        return this.emit('Close', event);
      case 'Unhandled':
        return this.emit('Unhandled', event);
    }
  }

  count(kind: EventKind): number {
    return this.handlers[kind].length;
  }
}
