import { ClusterError } from '../shared/error.utils';

/**
 * A drain did not reach zero shard placements before its deadline.
 * Terminal for the worker: an operator decides whether to wait longer or force removal.
 */
export class DrainStallError extends ClusterError {
  readonly code = 'DRAIN_STALL';
  public readonly remainingPlacements: number;

  constructor(node: string, remainingPlacements: number, waitedMs: number) {
    super(`${node} still holds ${remainingPlacements} shard placement(s) after draining for ${waitedMs}ms`);
    this.name = 'DrainStallError';
    this.remainingPlacements = remainingPlacements;
  }
}
