import type { ReportedError } from '../shared/error.utils';
import type { NodeIdentity } from '../topology/interfaces';

export const REGISTRATION_STATES = [
  'Unregistered',
  'Registering',
  'Registered',
  'DrainRequested',
  'Draining',
  'Removed',
  'Failed',
] as const;

export type RegistrationState = (typeof REGISTRATION_STATES)[number];

/**
 * Local view of one worker's registration. A hint only: every no-op decision is
 * re-checked against the coordinator's live node list first.
 */
export interface RegistrationRecord {
  name: string;
  identity: NodeIdentity;
  state: RegistrationState;
  lastError: ReportedError | null;
  /** register commands issued in the current registration run */
  attempts: number;
}

export interface WorkerRef {
  name: string;
  identity: NodeIdentity;
}

export interface RegistrationOutcome {
  name: string;
  identity: NodeIdentity;
  state: RegistrationState;
  attempts: number;
  /** The worker was already live on the coordinator; no register command was issued. */
  alreadyRegistered: boolean;
  error?: ReportedError;
}

export interface RemovalOptions {
  force?: boolean;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface RemovalOutcome {
  name: string;
  identity: NodeIdentity;
  state: RegistrationState;
  /** Drain was skipped at the caller's request. */
  forced: boolean;
  /** The worker was not live on the coordinator; nothing was issued. */
  notRegistered: boolean;
  /** Shard placements the node still held when removal was issued. */
  remainingPlacements?: number;
  warnings: string[];
  error?: ReportedError;
}
