// WebSocket close codes (RFC 6455 section 7.4.1) plus the service's application codes.
export const CloseCode = {
  NORMAL_CLOSURE: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  UNSUPPORTED_DATA: 1003,
  RESERVED: 1004,
  NO_STATUS_RECEIVED: 1005,
  ABNORMAL_CLOSURE: 1006,
  INVALID_FRAME_PAYLOAD: 1007,
  POLICY_VIOLATION: 1008,
  MESSAGE_TOO_BIG: 1009,
  MISSING_EXTENSION: 1010,
  INTERNAL_ERROR: 1011,
  SERVICE_RESTART: 1012,
  TRY_AGAIN_LATER: 1013,
  BAD_GATEWAY: 1014,
  TLS_HANDSHAKE: 1015,
  UNAUTHORIZED: 4001,
  FORBIDDEN: 4003,
  NOT_FOUND: 4004,
  BAD_REQUEST: 4008,
  RATE_LIMITED: 4029,
  INTERNAL_APP_ERROR: 4500,
  SERVICE_UNAVAILABLE: 4503,
} as const;

export type CloseCodeValue = (typeof CloseCode)[keyof typeof CloseCode];

const DESCRIPTIONS: Record<CloseCodeValue, string> = {
  1000: 'Normal closure',
  1001: 'Going away',
  1002: 'Protocol error',
  1003: 'Unsupported data',
  1004: 'Reserved',
  1005: 'No status received',
  1006: 'Abnormal closure',
  1007: 'Invalid frame payload data',
  1008: 'Policy violation',
  1009: 'Message too big',
  1010: 'Missing extension',
  1011: 'Internal error',
  1012: 'Service restart',
  1013: 'Try again later',
  1014: 'Bad gateway',
  1015: 'TLS handshake failure',
  4001: 'Unauthorized - Authentication failed',
  4003: 'Forbidden - Not authorized',
  4004: 'Not found - Resource does not exist',
  4008: 'Bad request - Invalid parameters',
  4029: 'Rate limited - Too many requests',
  4500: 'Internal application error',
  4503: 'Service unavailable',
};

function toCode(code: number | string): number {
  return typeof code === 'number' ? code : Number.parseInt(code, 10);
}

function isKnown(code: number): code is CloseCodeValue {
  return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, code);
}

export function describeCloseCode(code: number | string): string {
  const n = toCode(code);
  return isKnown(n) ? DESCRIPTIONS[n] : `Unknown status code: ${code}`;
}

export function isClientError(code: number | string): boolean {
  const n = toCode(code);
  return n >= 4000 && n < 5000;
}

export function isServerError(code: number | string): boolean {
  const n = toCode(code);
  return (n >= 1011 && n <= 1015) || n >= 4500;
}

export function isNormalClosure(code: number | string): boolean {
  return toCode(code) === CloseCode.NORMAL_CLOSURE;
}
