import { ClusterError } from './error.utils';

/**
 * Thrown when a suspension point observes an aborted signal.
 * Coordinator-side state is left as-is; a later Converge resumes from it.
 */
export class OperationCancelledError extends ClusterError {
  readonly code = 'OPERATION_CANCELLED';

  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Options accepted by every bounded wait in the control plane.
 */
export interface WaitOptions {
  /** Cancels the wait; the operation stops at the next suspension point. */
  signal?: AbortSignal;
  /** Overrides the configured timeout for this call, in milliseconds. */
  timeoutMs?: number;
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}
