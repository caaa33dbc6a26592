import { ClientOptions } from '../../client/client_options';
import { ConfigurationError } from '../../client/errors';
import { buildConnectTarget, resolveRealtimeOptions, toQueryParams } from '../../client/realtime_options';

const client = new ClientOptions({ apiKey: 'test-secret', url: 'wss://api.test.local' });

describe('realtime options', () => {
  test('applies defaults', () => {
    expect(resolveRealtimeOptions()).toEqual({
      model: null,
      language: 'en-US',
      smartFormat: false,
      punctuate: false,
      interimResults: true,
      encoding: 'linear16',
      sampleRate: 16000,
      channels: 1,
      utteranceEndMs: 1000,
      vadEvents: false,
    });
  });

  test('resolved options are frozen', () => {
    expect(Object.isFrozen(resolveRealtimeOptions({ model: 'general' }))).toBe(true);
  });

  test.each([
    [{ sampleRate: 0 }],
    [{ sampleRate: -16000 }],
    [{ channels: 1.5 }],
    [{ utteranceEndMs: -1 }],
  ])('rejects %p', (options) => {
    expect(() => resolveRealtimeOptions(options)).toThrow(ConfigurationError);
  });

  test('names the invalid field', () => {
    expect(() => resolveRealtimeOptions({ sampleRate: 0 })).toThrow(/sampleRate/);
  });

  test('query parameters follow a fixed order and skip falsy values', () => {
    const params = toQueryParams(
      resolveRealtimeOptions({ model: 'general', smartFormat: true, punctuate: true, vadEvents: true, utteranceEndMs: 0 }),
    );

    expect(Object.keys(params)).toEqual([
      'model',
      'language',
      'smart_format',
      'punctuate',
      'interim_results',
      'encoding',
      'sample_rate',
      'channels',
      'vad_events',
    ]);
    expect(params.smart_format).toBe('true');
    expect(params.sample_rate).toBe('16000');
  });

  test('builds the default target', () => {
    const target = buildConnectTarget(client, resolveRealtimeOptions());

    expect(target.url).toBe(
      'wss://api.test.local/transcribe/realtime?language=en-US&interim_results=true&encoding=linear16&sample_rate=16000&channels=1&utterance_end_ms=1000',
    );
    expect(target.headers.Authorization).toBe('Basic test-secret');
  });

  test('appends with & when the path already has a query', () => {
    const withQuery = new ClientOptions({ apiKey: 'test-secret', url: 'wss://api.test.local', realtimePath: '/live?tier=fast' });
    const target = buildConnectTarget(withQuery, resolveRealtimeOptions({ language: 'de-DE', encoding: null, sampleRate: null, channels: null, utteranceEndMs: null, interimResults: false }));

    expect(target.url).toBe('wss://api.test.local/live?tier=fast&language=de-DE');
  });

  test('no query string when nothing is sent', () => {
    const target = buildConnectTarget(
      client,
      resolveRealtimeOptions({
        language: null,
        encoding: null,
        sampleRate: null,
        channels: null,
        utteranceEndMs: null,
        interimResults: false,
      }),
    );

    expect(target.url).toBe('wss://api.test.local/transcribe/realtime');
  });

  test('encodes values', () => {
    const target = buildConnectTarget(client, resolveRealtimeOptions({ model: 'a b&c', interimResults: false, encoding: null, sampleRate: null, channels: null, utteranceEndMs: null }));
    expect(target.url).toBe('wss://api.test.local/transcribe/realtime?model=a+b%26c&language=en-US');
  });
});
