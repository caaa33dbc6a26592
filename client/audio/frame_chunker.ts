import { Transform, TransformCallback } from 'node:stream';
import { ConfigurationError } from '../errors';

/** 20ms of 16 kHz mono 16-bit PCM. */
export const DEFAULT_BYTES_PER_FRAME = 320 * 2;

export interface FrameChunkerOptions {
  bytesPerFrame?: number;
  /** Emit the trailing partial frame on end instead of dropping it. */
  flushTail?: boolean;
}

export function frameBytes(sampleRate: number, channels: number, frameMs: number, bytesPerSample = 2): number {
  return Math.max(1, Math.round((sampleRate * frameMs) / 1000)) * channels * bytesPerSample;
}

export class FrameChunker extends Transform {
  private carry: Buffer = Buffer.alloc(0);
  private readonly bytesPerFrame: number;
  private readonly flushTail: boolean;

  constructor(options: FrameChunkerOptions = {}) {
    super({ readableObjectMode: true });
    this.bytesPerFrame = options.bytesPerFrame ?? DEFAULT_BYTES_PER_FRAME;
    this.flushTail = options.flushTail ?? false;
    if (!Number.isInteger(this.bytesPerFrame) || this.bytesPerFrame <= 0) {
      throw new ConfigurationError(`bytesPerFrame must be a positive integer, got ${this.bytesPerFrame}`);
    }
  }

  _transform(chunk: Buffer, _: BufferEncoding, cb: TransformCallback) {
    this.carry = this.carry.length ? Buffer.concat([this.carry, chunk]) : chunk;
    while (this.carry.length >= this.bytesPerFrame) {
      this.push(this.carry.subarray(0, this.bytesPerFrame));
      this.carry = this.carry.subarray(this.bytesPerFrame);
    }
    cb();
  }

  _flush(cb: TransformCallback) {
    if (this.flushTail && this.carry.length > 0) this.push(this.carry);
    this.carry = Buffer.alloc(0);
    cb();
  }
}
