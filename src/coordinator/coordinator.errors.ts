import { ClusterError } from '../shared/error.utils';

/**
 * Network blip or coordinator momentarily unavailable during registration. Retried with backoff.
 */
export class RegistrationTransientError extends ClusterError {
  readonly code = 'REGISTRATION_TRANSIENT';

  constructor(message: string) {
    super(message);
    this.name = 'RegistrationTransientError';
  }
}

/**
 * The host+port is already registered under a different identity.
 * Terminal for the worker and never auto-resolved.
 */
export class RegistrationConflictError extends ClusterError {
  readonly code = 'REGISTRATION_CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'RegistrationConflictError';
  }
}

/**
 * A coordinator command other than registration failed.
 */
export class CoordinatorCommandError extends ClusterError {
  readonly code = 'COORDINATOR_COMMAND_FAILED';
  public readonly command: string;
  public readonly transient: boolean;

  constructor(command: string, message: string, transient: boolean) {
    super(`${command} failed: ${message}`);
    this.name = 'CoordinatorCommandError';
    this.command = command;
    this.transient = transient;
  }
}

/**
 * The coordinator did not become ready, so no worker could be registered against it.
 */
export class CoordinatorUnavailableError extends ClusterError {
  readonly code = 'COORDINATOR_UNAVAILABLE';

  constructor(message: string) {
    super(message);
    this.name = 'CoordinatorUnavailableError';
  }
}
