import type { NodeRole } from '../topology/interfaces';

export interface PortBinding {
  containerPort: number;
  hostPort: number;
}

/**
 * One node of a generated plan. Created fresh on every generation run and never mutated;
 * a topology change produces a new full set.
 */
export interface NodeDefinition {
  /** `coordinator` or `worker-<index>`. */
  name: string;
  /** `<cluster>-<name>`; unique per host. */
  containerName: string;
  role: NodeRole;
  /** 0 for the coordinator. */
  index: number;
  host: string;
  port: number;
  image: string;
  environment: Record<string, string>;
  ports: PortBinding[];
  labels: Record<string, string>;
  /** Always empty: ordering between nodes is decided by the lifecycle controller, not the nodes. */
  dependsOn: string[];
}

export interface PlanSettings {
  shardCount?: number;
  replicationFactor?: number;
}

export interface GeneratedPlan {
  clusterName: string;
  /** Coordinator first, then workers in ascending index order. */
  nodes: NodeDefinition[];
  settings: PlanSettings;
  /** Canonical JSON of the whole plan; byte-identical for equal topologies. */
  serialized: string;
  /** SHA-256 of `serialized`, hex encoded. */
  hash: string;
}
