import { ClusterError } from '../shared/error.utils';

export class UnknownWorkerError extends ClusterError {
  readonly code = 'UNKNOWN_WORKER';

  constructor(readonly workerName: string) {
    super(`No worker named "${workerName}" in the cluster`);
    this.name = 'UnknownWorkerError';
  }
}

/**
 * A rebalance job was still Pending or Running at the deadline. The job itself keeps running.
 */
export class RebalanceTimeoutError extends ClusterError {
  readonly code = 'REBALANCE_TIMEOUT';

  constructor(
    readonly jobId: string,
    readonly waitedMs: number,
  ) {
    super(`Rebalance job ${jobId} did not finish within ${waitedMs}ms`);
    this.name = 'RebalanceTimeoutError';
  }
}
