import {
  DEFAULT_POLLING_INTERVAL_MS,
  resolveBatchOptions,
  toBatchQueryParams,
} from '../../../client/batch/batch_options';
import { ConfigurationError } from '../../../client/errors';
import { setLogLevel } from '../../../client/logger';

describe('toBatchQueryParams', () => {
  beforeAll(() => setLogLevel('silent'));
  afterAll(() => setLogLevel('warn'));

  test('fills defaults in a stable order', () => {
    const params = toBatchQueryParams();

    expect(Object.entries(params)).toEqual([
      ['language', 'en-US'],
      ['model', 'batch-general'],
      ['diarize', 'false'],
      ['punctuate', 'false'],
      ['smart_format', 'false'],
      ['channel', '2'],
      ['pci', 'false'],
    ]);
  });

  test('maps camelCase fields to wire names', () => {
    expect(toBatchQueryParams({ smartFormat: true, punctuate: true, pci: true })).toMatchObject({
      smart_format: 'true',
      punctuate: 'true',
      pci: 'true',
    });
  });

  test('stringifies extra params given as an object', () => {
    const params = toBatchQueryParams({ extraParams: { keywords: 'invoice', boost: 1.5, profanity_filter: true } });

    expect(params.keywords).toBe('invoice');
    expect(params.boost).toBe('1.5');
    expect(params.profanity_filter).toBe('true');
  });

  test('parses extra params given as a JSON string', () => {
    expect(toBatchQueryParams({ extraParams: '{"tier":"enhanced"}' }).tier).toBe('enhanced');
  });

  test.each([['not json'], ['[1,2]'], ['{"nested":{"a":1}}']])('ignores unusable extra params %s', (extraParams) => {
    expect(Object.keys(toBatchQueryParams({ extraParams }))).toHaveLength(7);
  });

  test.each([{ channel: 0 }, { channel: 1.5 }, { language: '' }])('rejects %p', (config) => {
    expect(() => toBatchQueryParams(config)).toThrow(ConfigurationError);
  });
});

describe('resolveBatchOptions', () => {
  test('defaults the polling interval and leaves the timeout open', () => {
    expect(resolveBatchOptions()).toEqual({ pollingIntervalMs: DEFAULT_POLLING_INTERVAL_MS });
  });

  test('keeps explicit values', () => {
    expect(resolveBatchOptions({ pollingIntervalMs: 250, timeoutMs: 60_000 })).toEqual({
      pollingIntervalMs: 250,
      timeoutMs: 60_000,
    });
  });

  test('rejects a negative timeout', () => {
    expect(() => resolveBatchOptions({ timeoutMs: -1 })).toThrow(/^Invalid batch options: timeoutMs/);
  });
});
