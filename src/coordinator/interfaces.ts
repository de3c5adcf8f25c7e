import type { NodeRole } from '../topology/interfaces';

export type RebalanceStrategy = 'by_shard_count' | 'by_disk_size';

export type RebalanceJobState = 'Pending' | 'Running' | 'Done' | 'Failed';

/**
 * A node as the coordinator's metadata currently knows it.
 */
export interface LiveNode {
  host: string;
  port: number;
  active: boolean;
  role: NodeRole;
}

export interface ClusterSettings {
  coordinatorHost: string;
  coordinatorPort: number;
  shardCount?: number;
  replicationFactor?: number;
}

export const COORDINATOR_CLIENT = Symbol('COORDINATOR_CLIENT');

export interface CoordinatorConnectionConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeout: number;
}

/**
 * Narrow command surface of the distributed SQL engine's coordinator.
 *
 * `registerNode` throws `RegistrationTransientError` for retryable failures and
 * `RegistrationConflictError` when the address is taken by a different identity.
 * Every other command throws `CoordinatorCommandError`.
 */
export interface CoordinatorClient {
  listNodes(): Promise<LiveNode[]>;
  registerNode(host: string, port: number): Promise<void>;
  drainNode(host: string, port: number): Promise<void>;
  /** Shard placements still held by the node; 0 confirms a drain. */
  shardPlacementCount(host: string, port: number): Promise<number>;
  removeNode(host: string, port: number, force: boolean): Promise<void>;
  /** Job id of the started rebalance, or `null` when there was nothing to move. */
  rebalance(strategy: RebalanceStrategy): Promise<string | null>;
  rebalanceStatus(jobId: string): Promise<RebalanceJobState>;
  checkConnection(host: string, port: number): Promise<boolean>;
  configureCluster(settings: ClusterSettings): Promise<void>;
  close(): Promise<void>;
}
