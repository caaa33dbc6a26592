#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { parseArgs } from 'node:util';
import { frameBytes } from './audio/frame_chunker';
import { streamPcm } from './audio/pcm_streamer';
import { readWav } from './audio/wav_reader';
import { StreamScribeClient } from './client';
import { describeCloseCode } from './status_codes';
import { TranscriptCollector, formatFinalLine, topTranscript } from './transcript_collector';

const USAGE = `usage: streamscribe-stream <file.wav> [options]

  --model <name>            model to request
  --language <code>         language (default en-US)
  --utterance-end-ms <n>    silence that ends an utterance (default 1000)
  --frame-ms <n>            audio per frame (default 20)
  --settle-ms <n>           wait for trailing results before closing (default 2000)
  --fast                    send frames without real-time pacing`;

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      model: { type: 'string' },
      language: { type: 'string', default: 'en-US' },
      'utterance-end-ms': { type: 'string', default: '1000' },
      'frame-ms': { type: 'string', default: '20' },
      'settle-ms': { type: 'string', default: '2000' },
      fast: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const file = positionals[0];
  if (values.help || !file) {
    console.log(USAGE);
    return values.help ? 0 : 2;
  }

  const frameMs = Number(values['frame-ms']);
  const wav = readWav(await readFile(file));
  console.log(
    `[stream] ${file}: ${wav.sampleRate} Hz, ${wav.channels} ch, ${wav.bitsPerSample}-bit, ${wav.durationSec.toFixed(2)}s`,
  );

  const client = new StreamScribeClient();
  const session = client.transcribe.realtime();
  const collector = new TranscriptCollector((utterance) => console.log(`\n[utterance] ${utterance}`)).attach(session);

  session
    .on('Open', () => console.log('[stream] connection opened'))
    .on('Transcript', (ev) => {
      const text = topTranscript(ev);
      if (!text) return;
      if (ev.is_final) {
        console.log(`\n[final] ${formatFinalLine(text) ?? text}`);
      } else {
        process.stdout.write(`\r[interim] ${text}`);
      }
    })
    .on('Metadata', (ev) => console.log(`\n[metadata] request_id=${ev.request_id ?? '-'}`))
    .on('SpeechStarted', () => console.log('\n[speech] started'))
    .on('Error', (ev) => {
      const code = ev.code !== undefined ? ` (${ev.code}: ${describeCloseCode(ev.code)})` : '';
      console.error(`\n[error] ${ev.message ?? ev.description ?? 'unknown error'}${code}`);
    })
    .on('Close', (ev) => {
      const detail = ev.code !== undefined ? ` code=${ev.code} (${ev.description})` : '';
      console.log(`\n[stream] connection closed${detail}${ev.reason ? ` reason=${ev.reason}` : ''}`);
    });

  const started = await session.start({
    model: values.model ?? null,
    language: values.language,
    sampleRate: wav.sampleRate,
    channels: wav.channels,
    utteranceEndMs: Number(values['utterance-end-ms']),
  });
  if (!started) {
    console.error('[stream] failed to connect');
    return 1;
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.log('\n[stream] interrupted');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const startedAt = Date.now();
  const stats = await streamPcm(session, wav.data, {
    bytesPerFrame: frameBytes(wav.sampleRate, wav.channels, frameMs),
    paceMs: values.fast ? 0 : frameMs,
    signal: controller.signal,
    onProgress: (s) => console.log(`\n[stream] sent ${s.framesSent} frames`),
  });
  process.off('SIGINT', onSigint);

  if (!stats.aborted && !stats.failed) await sleep(Number(values['settle-ms']));
  const finished = await session.finish();
  collector.endUtterance();

  const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
  console.log(`\n[stream] sent ${stats.framesSent} frames (${stats.bytesSent} bytes) in ${elapsed}s`);
  console.log(`[stream] ${collector.finalTranscripts.length} final results, ${collector.utterances.length} utterances`);
  if (collector.text) console.log(`[stream] transcript: ${collector.text}`);
  return finished && !stats.failed ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[stream] fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
