import type { Credentials, NodeIdentity, NodeRole } from '../topology/interfaces';

export const NODE_PROBE = Symbol('NODE_PROBE');

export type ProbeOutcome = 'Ready' | 'NotReady' | 'Unreachable';

/**
 * A node to probe. `identity` is what the coordinator dials; `role` decides
 * whether coordinator-to-worker connectivity is part of readiness.
 */
export interface ProbeTarget {
  name: string;
  role: NodeRole;
  identity: NodeIdentity;
  credentials: ProbeCredentials;
}

export type ProbeCredentials = Credentials;

/**
 * One connection attempt against a node: classify, never throw.
 */
export interface NodeProbe {
  probe(host: string, port: number, credentials: ProbeCredentials, timeoutMs: number): Promise<ProbeOutcome>;
}
