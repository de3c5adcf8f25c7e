import { ClusterError } from '../shared/error.utils';

/**
 * The requested topology is malformed. Raised before any side effect; never retried.
 */
export class InvalidTopologyError extends ClusterError {
  readonly code = 'INVALID_TOPOLOGY';
  public readonly violations: string[];

  constructor(violations: string[]) {
    super(`Invalid topology: ${violations.join('; ')}`);
    this.name = 'InvalidTopologyError';
    this.violations = violations;
  }
}
