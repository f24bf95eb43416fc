import type { ChatReply } from '@/types/chat';

export const STARTUP_MESSAGE =
  "⏳ The booking service is waking up after a period of inactivity. This usually takes under a minute. Please send your message again shortly.";

export const DEFAULT_RETRY_AFTER_SECONDS = 30;

// Lower-cased fragments seen in timeout and pool-exhaustion failures
const COLD_START_FRAGMENTS = [
  'timed out',
  'timeout',
  'pool',
  'max retries exceeded',
  'econnreset',
  'socket hang up',
];

// undici / Node error codes for the same conditions
const COLD_START_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
  'ETIMEDOUT',
  'ECONNRESET',
]);

function readCode(value: unknown): string | undefined {
  if (value && typeof value === 'object' && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/** Flattens an error and its `cause` chain into messages and codes. */
function describeChain(error: unknown): { messages: string[]; codes: string[] } {
  const messages: string[] = [];
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; current && depth < 5; depth++) {
    if (current instanceof Error) {
      messages.push(current.name, current.message);
      const code = readCode(current);
      if (code) codes.push(code);
      current = current.cause;
    } else {
      messages.push(String(current));
      const code = readCode(current);
      if (code) codes.push(code);
      break;
    }
  }
  return { messages, codes };
}

/**
 * True when a failed backend call looks like the service is still starting:
 * a request timeout, a connect timeout, or a connection error whose text
 * mentions a timeout or an exhausted pool.
 */
export function isColdStartError(error: unknown): boolean {
  const { messages, codes } = describeChain(error);

  if (messages.includes('TimeoutError')) {
    return true;
  }
  if (codes.some((code) => COLD_START_CODES.has(code))) {
    return true;
  }
  const text = messages.join(' ').toLowerCase();
  return COLD_START_FRAGMENTS.some((fragment) => text.includes(fragment));
}

export function buildStartupReply(retryAfterSeconds: number = DEFAULT_RETRY_AFTER_SECONDS): ChatReply {
  return {
    message: STARTUP_MESSAGE,
    bookingData: null,
    suggestedTimes: [],
    requiresConfirmation: false,
    isStartupNotice: true,
    retryAfterSeconds,
  };
}
