import { ClusterError } from '../shared/error.utils';

export class SupervisorError extends ClusterError {
  readonly code = 'SUPERVISOR_ERROR';
  public readonly node: string;

  constructor(node: string, message: string) {
    super(`${node}: ${message}`);
    this.name = 'SupervisorError';
    this.node = node;
  }
}
