import { ClusterError } from '../shared/error.utils';
import type { ProbeOutcome } from './interfaces';

/**
 * The node did not become ready before the deadline. `lastOutcome` separates a node that
 * never accepted connections from one that accepted them but never finished initializing.
 */
export class ProbeTimeoutError extends ClusterError {
  readonly code = 'PROBE_TIMEOUT';
  public readonly node: string;
  public readonly lastOutcome: Exclude<ProbeOutcome, 'Ready'>;
  public readonly attempts: number;

  constructor(node: string, lastOutcome: Exclude<ProbeOutcome, 'Ready'>, attempts: number, waitedMs: number) {
    super(`${node} did not become ready within ${waitedMs}ms (last outcome: ${lastOutcome}, ${attempts} probes)`);
    this.name = 'ProbeTimeoutError';
    this.node = node;
    this.lastOutcome = lastOutcome;
    this.attempts = attempts;
  }
}
