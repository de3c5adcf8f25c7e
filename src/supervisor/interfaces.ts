import type { Readable } from 'stream';
import type { NodeDefinition } from '../generator/interfaces';
import type { NodeRole } from '../topology/interfaces';

export const NODE_SUPERVISOR = Symbol('NODE_SUPERVISOR');

export type NodeStatus = 'Running' | 'Stopped' | 'Unknown';

/**
 * Reference to a started node, as returned by `start` and `list`.
 */
export interface NodeHandle {
  /** Supervisor-specific id (container id for Docker). */
  id: string;
  name: string;
  role: NodeRole;
  host: string;
  port: number;
}

export interface ObservedNode extends NodeHandle {
  status: NodeStatus;
}

export interface LogOptions {
  /** Number of trailing lines; all lines when omitted. */
  tail?: number;
}

/**
 * Starts, stops and inspects node processes.
 *
 * `start` is idempotent per node name: an existing stopped node is restarted,
 * a running one is returned as-is.
 */
export interface NodeSupervisor {
  start(definition: NodeDefinition): Promise<NodeHandle>;
  stop(handle: NodeHandle): Promise<void>;
  status(handle: NodeHandle): Promise<NodeStatus>;
  logs(handle: NodeHandle, options?: LogOptions): Promise<Readable>;
  /** Every node of the cluster the supervisor knows, running or not. */
  list(clusterName: string): Promise<ObservedNode[]>;
  /** Resolves when the supervisor backend is reachable. */
  ping(): Promise<void>;
}
