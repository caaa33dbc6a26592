import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../logger';
import { DEFAULT_BYTES_PER_FRAME, FrameChunker } from './frame_chunker';

export interface AudioSink {
  send(data: Buffer): Promise<boolean>;
}

export interface StreamPcmOptions {
  bytesPerFrame?: number;
  /** Delay between frames; 0 sends as fast as the sink confirms. */
  paceMs?: number;
  signal?: AbortSignal;
  onProgress?: (stats: StreamStats) => void;
  /** Call `onProgress` every N frames. */
  progressEvery?: number;
}

export interface StreamStats {
  framesSent: number;
  bytesSent: number;
  /** Set when a send was refused and streaming stopped. */
  failed: boolean;
  aborted: boolean;
}

const log = createLogger('pcm');

/**
 * Slice `pcm` into fixed-size frames (the last one may be short) and send
 * them one by one, waiting for each send to be confirmed. Stops at the first
 * refused frame.
 */
export async function streamPcm(sink: AudioSink, pcm: Buffer, options: StreamPcmOptions = {}): Promise<StreamStats> {
  const { paceMs = 20, signal, onProgress, progressEvery = 50 } = options;
  const stats: StreamStats = { framesSent: 0, bytesSent: 0, failed: false, aborted: false };

  const chunker = new FrameChunker({ bytesPerFrame: options.bytesPerFrame ?? DEFAULT_BYTES_PER_FRAME, flushTail: true });
  chunker.end(pcm);

  for await (const frame of chunker) {
    if (!Buffer.isBuffer(frame)) continue;
    if (signal?.aborted) {
      stats.aborted = true;
      break;
    }
    if (!(await sink.send(frame))) {
      log.warn(`Frame ${stats.framesSent + 1} was not sent; stopping`);
      stats.failed = true;
      break;
    }
    stats.framesSent++;
    stats.bytesSent += frame.length;
    if (onProgress && stats.framesSent % progressEvery === 0) onProgress({ ...stats });
    if (paceMs > 0) await sleep(paceMs);
  }

  log.debug(`streamed ${stats.framesSent} frames (${stats.bytesSent} bytes)`);
  return stats;
}
