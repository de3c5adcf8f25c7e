import { ClusterError } from '../shared/error.utils';
import type { RegistrationState } from './interfaces';

/**
 * Transition graph of a worker's registration.
 *
 * ```
 * Unregistered   → Registering, Registered, Removed, Failed
 * Registering    → Registering, Registered, Unregistered, Failed
 * Registered     → DrainRequested, Removed, Unregistered
 * DrainRequested → Draining, Registered, Unregistered, Removed, Failed
 * Draining       → Registered, Unregistered, Removed, Failed
 * Failed         → Unregistered, DrainRequested, Removed
 * Removed        → (terminal)
 * ```
 *
 * Unregistered → Registered: the live node list already holds the worker.
 * Registered → Unregistered: the live node list no longer holds it (stale hint).
 * Registered/Failed → Removed: forced removal, or the worker is already gone.
 * Failed → Unregistered/DrainRequested: an operator re-runs registration or removal.
 * Registering/DrainRequested/Draining → Registered/Unregistered: a cancelled run left the
 * record mid-flight and the next run settles it onto the live node list.
 */
export const VALID_TRANSITIONS: Record<RegistrationState, readonly RegistrationState[]> = {
  Unregistered: ['Registering', 'Registered', 'Removed', 'Failed'],
  Registering: ['Registering', 'Registered', 'Unregistered', 'Failed'],
  Registered: ['DrainRequested', 'Removed', 'Unregistered'],
  DrainRequested: ['Draining', 'Registered', 'Unregistered', 'Removed', 'Failed'],
  Draining: ['Registered', 'Unregistered', 'Removed', 'Failed'],
  Failed: ['Unregistered', 'DrainRequested', 'Removed'],
  Removed: [],
};

export function isValidTransition(from: RegistrationState, to: RegistrationState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export class InvalidTransitionError extends ClusterError {
  readonly code = 'INVALID_TRANSITION';

  constructor(node: string, from: RegistrationState, to: RegistrationState) {
    super(`Invalid registration transition for ${node}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
