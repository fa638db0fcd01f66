import type { ProbeErrorKind } from './types/index.js';

export class CamsweepError extends Error {
  constructor(
    message: string,
    public readonly type: CamsweepErrorType,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'CamsweepError';
  }
}

export type CamsweepErrorType =
  | 'ConfigurationError'
  | 'InvalidTargetError'
  | 'ScanPrerequisiteFailed'
  | 'NetworkError'
  | 'UnknownError';

export function classifyError(error: unknown): { type: CamsweepErrorType; retryable: boolean; message: string } {
  if (error instanceof CamsweepError) {
    return { type: error.type, retryable: error.retryable, message: error.message };
  }

  const message = error instanceof Error ? error.message : String(error);
  const messageLower = message.toLowerCase();

  if (/config|yaml|schema|validation/i.test(messageLower)) {
    return { type: 'ConfigurationError', retryable: false, message };
  }

  if (/invalid.*target|cidr|subnet/i.test(messageLower)) {
    return { type: 'InvalidTargetError', retryable: false, message };
  }

  if (/econnrefused|econnreset|enotfound|enetunreach|ehostunreach|etimedout|socket/i.test(messageLower)) {
    return { type: 'NetworkError', retryable: true, message };
  }

  return { type: 'UnknownError', retryable: false, message };
}

/**
 * Map a socket error to the probe taxonomy. Anything that fails before the
 * connection is established is a connect failure, whatever its errno.
 */
export function classifySocketError(error: unknown, connected: boolean): ProbeErrorKind {
  if (!connected) return 'ConnectFailed';

  // ECONNRESET, EPIPE and friends all mean the peer went away mid-exchange
  return errorCode(error) === 'ETIMEDOUT' ? 'Timeout' : 'ConnectionReset';
}

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : null;
  }
  return null;
}
