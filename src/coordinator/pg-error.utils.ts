import { getErrorCode } from '../shared/error.utils';

export type PgErrorClass = 'transient' | 'conflict' | 'fatal';

const TRANSIENT_SQLSTATES = [
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '55P03', // lock_not_available
];

const TRANSIENT_SOCKET_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE'];

const CONFLICT_SQLSTATES = ['23505']; // unique_violation

/**
 * Buckets a driver or socket error by whether retrying can help.
 *
 * Errors without a code (pool connection timeouts, terminated connections) count as transient.
 */
export function classifyPgError(error: unknown): PgErrorClass {
  const code = getErrorCode(error);

  if (code === undefined) {
    return isConnectionMessage(error) ? 'transient' : 'fatal';
  }
  if (CONFLICT_SQLSTATES.includes(code)) {
    return 'conflict';
  }
  // Class 08: connection exception
  if (code.startsWith('08') || TRANSIENT_SQLSTATES.includes(code) || TRANSIENT_SOCKET_CODES.includes(code)) {
    return 'transient';
  }
  return 'fatal';
}

function isConnectionMessage(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return (
    message.includes('connection terminated') ||
    message.includes('timeout exceeded when trying to connect') ||
    message.includes('connection timeout')
  );
}
