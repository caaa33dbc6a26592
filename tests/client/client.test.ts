import { BatchClient } from '../../client/batch/batch_client';
import { StreamScribeClient } from '../../client/client';
import { ClientOptions } from '../../client/client_options';
import { ApiKeyError } from '../../client/errors';
import { getLogLevel, setLogLevel } from '../../client/logger';
import { RealtimeSession } from '../../client/realtime_session';

describe('StreamScribeClient', () => {
  const savedEnv = process.env;

  beforeEach(() => {
    process.env = { ...savedEnv };
  });

  afterEach(() => {
    process.env = savedEnv;
    setLogLevel('warn');
  });

  test('builds options from an explicit API key', () => {
    const client = new StreamScribeClient({ apiKey: 'test-secret' });

    expect(client.config.apiKey).toBe('test-secret');
    expect(client.config.url).toBe('wss://api.streamscribe.dev');
  });

  test('prefers a config object over an API key', () => {
    const config = new ClientOptions({ apiKey: 'test-secret-config', url: 'wss://api.test.local' });

    const client = new StreamScribeClient({ apiKey: 'test-secret', config });

    expect(client.config).toBe(config);
  });

  test('falls back to the environment', () => {
    process.env.STREAMSCRIBE_API_KEY = 'test-secret-env';
    process.env.STREAMSCRIBE_HOST = 'env.test.local';

    const client = new StreamScribeClient();

    expect(client.config.apiKey).toBe('test-secret-env');
    expect(client.config.url).toBe('wss://env.test.local');
  });

  test('throws ApiKeyError without any key', () => {
    delete process.env.STREAMSCRIBE_API_KEY;

    expect(() => new StreamScribeClient()).toThrow(ApiKeyError);
  });

  test('applies the configured log level', () => {
    new StreamScribeClient({ config: new ClientOptions({ apiKey: 'test-secret', logLevel: 'debug' }) });

    expect(getLogLevel()).toBe('debug');
  });

  test('returns a new realtime session per call', () => {
    const client = new StreamScribeClient({ apiKey: 'test-secret' });

    const first = client.transcribe.realtime();
    const second = client.transcribe.realtime();

    expect(first).toBeInstanceOf(RealtimeSession);
    expect(second).not.toBe(first);
    expect(first.state).toBe('Idle');
  });

  test('caches the batch client', () => {
    const client = new StreamScribeClient({ apiKey: 'test-secret' });

    const batch = client.transcribe.batch();

    expect(batch).toBeInstanceOf(BatchClient);
    expect(client.transcribe.batch()).toBe(batch);
  });

  test('exposes the legacy listen accessor', () => {
    const client = new StreamScribeClient({ apiKey: 'test-secret' });

    const session = client.listen.websocket.v('1');

    expect(session).toBeInstanceOf(RealtimeSession);
    expect(client.listen).toBe(client.listen);
  });
});
