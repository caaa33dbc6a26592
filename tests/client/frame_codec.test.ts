import { decodeFrame, encodeAudio, encodeKeepAlive } from '../../client/frame_codec';
import { setLogLevel } from '../../client/logger';

describe('decodeFrame', () => {
  beforeAll(() => setLogLevel('silent'));
  afterAll(() => setLogLevel('warn'));

  test('decodes a Results frame into a Transcript event', () => {
    const raw = JSON.stringify({
      type: 'Results',
      channel_index: [0, 1],
      start: 1.5,
      duration: 0.75,
      is_final: true,
      speech_final: false,
      channel: {
        alternatives: [
          {
            transcript: 'hello there',
            confidence: 0.93,
            words: [
              { word: 'there', start: 1.9, end: 2.2, confidence: 0.9, punctuated_word: 'there.' },
              { word: 'hello', start: 1.5, end: 1.8, confidence: 0.95 },
            ],
          },
        ],
      },
      metadata: { request_id: 'req-1', model_uuid: 'model-1' },
    });

    expect(decodeFrame(raw)).toEqual({
      kind: 'Transcript',
      channel_index: [0, 1],
      start: 1.5,
      duration: 0.75,
      is_final: true,
      speech_final: false,
      metadata: { request_id: 'req-1', model_uuid: 'model-1' },
      channel: {
        alternatives: [
          {
            transcript: 'hello there',
            confidence: 0.93,
            words: [
              { word: 'hello', start: 1.5, end: 1.8, confidence: 0.95 },
              { word: 'there', start: 1.9, end: 2.2, confidence: 0.9, punctuated_word: 'there.' },
            ],
          },
        ],
      },
    });
  });

  test('fills defaults for missing Results fields', () => {
    const event = decodeFrame(JSON.stringify({ type: 'Results', channel: { alternatives: [{ words: [{ word: 'hi' }] }] } }));

    expect(event).toEqual({
      kind: 'Transcript',
      channel_index: [],
      start: 0,
      duration: 0,
      is_final: false,
      speech_final: false,
      channel: {
        alternatives: [{ transcript: '', confidence: 0, words: [{ word: 'hi', start: 0, end: 0, confidence: 0 }] }],
      },
    });
  });

  test('drops undecodable alternatives individually', () => {
    const event = decodeFrame(
      JSON.stringify({
        type: 'Results',
        channel: { alternatives: [{ transcript: 42 }, { transcript: 'kept', confidence: 0.5 }] },
      }),
    );

    expect(event.kind).toBe('Transcript');
    if (event.kind !== 'Transcript') return;
    expect(event.channel.alternatives).toEqual([{ transcript: 'kept', confidence: 0.5, words: [] }]);
  });

  test('decodes Metadata', () => {
    const event = decodeFrame(
      JSON.stringify({ type: 'Metadata', request_id: 'req-9', sha256: 'abc', created: '2024-01-01T00:00:00Z', duration: 3.2, channels: 1 }),
    );

    expect(event).toEqual({
      kind: 'Metadata',
      request_id: 'req-9',
      sha256: 'abc',
      created: '2024-01-01T00:00:00Z',
      duration: 3.2,
      channels: 1,
    });
  });

  test('keeps a Metadata frame when one field has the wrong type', () => {
    const event = decodeFrame(
      JSON.stringify({ type: 'Metadata', request_id: 'req-3', created: 1714557600, channels: 1.5, duration: 2 }),
    );

    expect(event).toEqual({ kind: 'Metadata', request_id: 'req-3', duration: 2 });
  });

  test('decodes SpeechStarted and UtteranceEnd', () => {
    expect(decodeFrame('{"type":"SpeechStarted","channel":[0,1],"timestamp":4.2}')).toEqual({
      kind: 'SpeechStarted',
      channel: [0, 1],
      timestamp: 4.2,
    });
    expect(decodeFrame('{"type":"UtteranceEnd","channel":"bad","last_word_end":7.5}')).toEqual({
      kind: 'UtteranceEnd',
      channel: [],
      last_word_end: 7.5,
    });
  });

  test('decodes an Error frame with a numeric-string code', () => {
    expect(decodeFrame('{"type":"Error","code":"1011","message":"boom"}')).toEqual({
      kind: 'Error',
      code: 1011,
      message: 'boom',
      description: 'Internal error',
      fatal: false,
    });
  });

  test('keeps the description an Error frame carries', () => {
    expect(decodeFrame('{"type":"Error","code":4029,"description":"slow down","variant":"quota"}')).toEqual({
      kind: 'Error',
      code: 4029,
      description: 'slow down',
      variant: 'quota',
      fatal: false,
    });
  });

  test.each([
    ['not json at all'],
    ['{"no_type":true}'],
    ['{"type":"Mystery","data":1}'],
    ['{"type":"Results","channel":"oops"}'],
    ['[1,2,3]'],
  ])('returns Unhandled for %s', (raw) => {
    expect(decodeFrame(raw)).toEqual({ kind: 'Unhandled', raw });
  });

  test('does not treat inherited property names as message types', () => {
    const raw = '{"type":"toString"}';
    expect(decodeFrame(raw)).toEqual({ kind: 'Unhandled', raw });
  });
});

describe('encoders', () => {
  test('encodeKeepAlive produces the KeepAlive control frame', () => {
    expect(encodeKeepAlive()).toBe('{"type":"KeepAlive"}');
  });

  test('encodeAudio passes bytes through unchanged', () => {
    const buf = Buffer.from([0, 1, 254, 255]);
    expect(encodeAudio(buf)).toBe(buf);

    const view = new Uint8Array([9, 8, 7, 6]).subarray(1, 3);
    expect([...encodeAudio(view)]).toEqual([8, 7]);
  });
});
