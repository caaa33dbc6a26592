import { WavFormatError } from '../errors';
import { createLogger } from '../logger';

export interface WavAudio {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  /** Raw little-endian PCM samples from the data chunk. */
  data: Buffer;
  durationSec: number;
}

const PCM_FORMAT = 1;
const HEADER_MIN_BYTES = 44;

const log = createLogger('wav');

/**
 * Parse a RIFF/WAVE buffer holding 16-bit integer PCM. Unknown chunks are
 * skipped; a data chunk whose declared size runs past the buffer is
 * truncated to what is present.
 */
export function readWav(buffer: Buffer): WavAudio {
  if (buffer.length < HEADER_MIN_BYTES) {
    throw new WavFormatError(`WAV buffer too small: ${buffer.length} < ${HEADER_MIN_BYTES}`);
  }
  const riff = buffer.toString('ascii', 0, 4);
  const wave = buffer.toString('ascii', 8, 12);
  if (riff !== 'RIFF' || wave !== 'WAVE') {
    throw new WavFormatError(`Invalid WAV headers: RIFF='${riff}', WAVE='${wave}'`);
  }

  let fmt: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | undefined;
  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const start = offset + 8;

    if (chunkId === 'fmt ' && chunkSize >= 16) {
      fmt = {
        audioFormat: buffer.readUInt16LE(start),
        channels: buffer.readUInt16LE(start + 2),
        sampleRate: buffer.readUInt32LE(start + 4),
        bitsPerSample: buffer.readUInt16LE(start + 14),
      };
    } else if (chunkId === 'data') {
      if (!fmt) throw new WavFormatError('WAV data chunk precedes fmt chunk');
      if (fmt.audioFormat !== PCM_FORMAT) {
        throw new WavFormatError(`Unsupported WAV encoding ${fmt.audioFormat}; only integer PCM is supported`);
      }
      if (fmt.bitsPerSample !== 16) {
        throw new WavFormatError(`Unsupported sample width: ${fmt.bitsPerSample} bits`);
      }
      if (fmt.channels === 0 || fmt.sampleRate === 0) {
        throw new WavFormatError('WAV fmt chunk declares zero channels or sample rate');
      }
      const end = start + chunkSize;
      if (end > buffer.length) {
        log.warn(`WAV data chunk declares ${chunkSize} bytes, ${buffer.length - start} present`);
      }
      const data = buffer.subarray(start, Math.min(end, buffer.length));
      const blockAlign = fmt.channels * 2;
      return {
        sampleRate: fmt.sampleRate,
        channels: fmt.channels,
        bitsPerSample: fmt.bitsPerSample,
        data,
        durationSec: Math.floor(data.length / blockAlign) / fmt.sampleRate,
      };
    }
    // chunks are word aligned
    offset = start + chunkSize + (chunkSize % 2);
  }
  throw new WavFormatError(fmt ? 'WAV missing data chunk' : 'WAV missing fmt chunk');
}
