import type { ReportedError } from '../shared/error.utils';
import type { NodeIdentity, NodeRole } from '../topology/interfaces';
import type { RegistrationState } from '../registration/interfaces';
import type { LifecycleOperation, OverallResult } from '../lifecycle/interfaces';

export const CLUSTER_EVENTS = {
  REGISTRATION_TRANSITION: 'registration.transition',
  NODE_STARTED: 'node.started',
  NODE_STOPPED: 'node.stopped',
  OPERATION_COMPLETED: 'operation.completed',
} as const;

export type ClusterEventType = (typeof CLUSTER_EVENTS)[keyof typeof CLUSTER_EVENTS];

export interface RegistrationTransitionEvent {
  type: typeof CLUSTER_EVENTS.REGISTRATION_TRANSITION;
  node: string;
  identity: NodeIdentity;
  from: RegistrationState;
  to: RegistrationState;
  attempts: number;
  error?: ReportedError;
  timestamp: string;
}

export interface NodeLifecycleEvent {
  type: typeof CLUSTER_EVENTS.NODE_STARTED | typeof CLUSTER_EVENTS.NODE_STOPPED;
  node: string;
  role: NodeRole;
  timestamp: string;
}

export interface OperationCompletedEvent {
  type: typeof CLUSTER_EVENTS.OPERATION_COMPLETED;
  operation: LifecycleOperation;
  overall: OverallResult;
  elapsedMs: number;
  planHash?: string;
  failedNodes: string[];
  timestamp: string;
}

export type ClusterEvent = RegistrationTransitionEvent | NodeLifecycleEvent | OperationCompletedEvent;
