/**
 * Extracts a string message from an unknown error value.
 * Handles both Error instances and arbitrary thrown values.
 *
 * @param error - The caught error value (Error instance or any thrown value)
 * @returns The error message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the `code` property carried by driver and socket errors
 * (SQLSTATE for Postgres, `ECONNREFUSED` and friends for sockets).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Reads the HTTP `statusCode` carried by Docker Engine API errors.
 */
export function getStatusCode(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Base class for every error surfaced in an operation report.
 * The `code` is stable and machine-readable; the message is for operators.
 */
export abstract class ClusterError extends Error {
  abstract readonly code: string;
}

export interface ReportedError {
  code: string;
  message: string;
}

/**
 * Converts any thrown value into the `{ code, message }` pair stored on a per-node report entry.
 */
export function toReportedError(error: unknown): ReportedError {
  if (error instanceof ClusterError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'UNEXPECTED_ERROR', message: getErrorMessage(error) };
}
