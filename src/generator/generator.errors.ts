import { ClusterError } from '../shared/error.utils';

/**
 * The generator produced output that breaks its own invariants. A logic defect; never retried.
 */
export class GeneratorInconsistencyError extends ClusterError {
  readonly code = 'GENERATOR_INCONSISTENCY';

  constructor(message: string) {
    super(message);
    this.name = 'GeneratorInconsistencyError';
  }
}
