import {
  CloseCode,
  describeCloseCode,
  isClientError,
  isNormalClosure,
  isServerError,
} from '../../client/status_codes';
import { WebSocketError } from '../../client/errors';

describe('status codes', () => {
  test('describes known codes', () => {
    expect(describeCloseCode(1000)).toBe('Normal closure');
    expect(describeCloseCode(CloseCode.INTERNAL_ERROR)).toBe('Internal error');
    expect(describeCloseCode(4001)).toBe('Unauthorized - Authentication failed');
    expect(describeCloseCode('4029')).toBe('Rate limited - Too many requests');
  });

  test('describes unknown codes', () => {
    expect(describeCloseCode(4999)).toBe('Unknown status code: 4999');
  });

  test('classifies codes', () => {
    expect(isServerError(1011)).toBe(true);
    expect(isClientError(1011)).toBe(false);
    expect(isClientError(4029)).toBe(true);
    expect(isServerError(4029)).toBe(false);
    expect(isServerError(4503)).toBe(true);
    expect(isClientError(4503)).toBe(true);
    expect(isNormalClosure(1000)).toBe(true);
    expect(isNormalClosure('1001')).toBe(false);
  });

  test('WebSocketError appends the code description', () => {
    expect(new WebSocketError('Connection closed', 1011).message).toBe('Connection closed (Code 1011: Internal error)');
    expect(new WebSocketError('Connection closed').message).toBe('Connection closed');
    expect(new WebSocketError('x', 4001).name).toBe('WebSocketError');
  });
});
