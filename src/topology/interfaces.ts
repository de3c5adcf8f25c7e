export type NodeRole = 'coordinator' | 'worker';

/**
 * How node ports are published.
 * - `single-host`: every node is published on one machine, so no two nodes may share a port.
 * - `multi-host`: workers live on their own hosts; only identical host+port pairs collide.
 */
export type Placement = 'single-host' | 'multi-host';

export interface Credentials {
  user: string;
  password: string;
  database: string;
}

export interface CoordinatorSpec {
  host: string;
  port: number;
}

/**
 * A worker slot. `index` is the immutable identity within one topology generation
 * and drives naming and the default port offset.
 */
export interface WorkerSpec {
  index: number;
  /** Explicit port; defaults to `portBase + index`. */
  port?: number;
  /** Explicit host identity; defaults to the node name (`worker-<index>`). Required for multi-host. */
  host?: string;
}

export interface ClusterOptions {
  image: string;
  /** Influences the rebalance strategy only; never node generation. */
  shardCountHint?: number;
  /** Passed through to the coordinator, not interpreted locally. */
  replicationFactor?: number;
}

/**
 * Desired end state of one cluster.
 */
export interface Topology {
  clusterName: string;
  placement: Placement;
  /** Absent for a worker-only topology attached to an external coordinator. */
  coordinator?: CoordinatorSpec;
  workers: WorkerSpec[];
  credentials: Credentials;
  portBase: number;
  options: ClusterOptions;
}

/**
 * The identity a worker is registered under on the coordinator.
 */
export interface NodeIdentity {
  host: string;
  port: number;
}

/**
 * Overrides accepted by Converge over the configured topology.
 */
export interface TopologyOverrides {
  clusterName?: string;
  placement?: Placement;
  coordinator?: CoordinatorSpec | null;
  workerCount?: number;
  workers?: WorkerSpec[];
  portBase?: number;
  credentials?: Partial<Credentials>;
  shardCountHint?: number;
  replicationFactor?: number;
  image?: string;
}
