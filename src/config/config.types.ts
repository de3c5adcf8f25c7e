import type { RebalanceStrategy } from '../coordinator/interfaces';
import type { Credentials } from '../topology/interfaces';

export interface TopologyConfig {
  clusterName: string;
  coordinatorEnabled: boolean;
  coordinatorHost: string;
  coordinatorPort: number;
  workerCount: number;
  portBase: number;
  /** Non-empty switches the topology to multi-host placement. */
  workerHosts: string[];
  credentials: Credentials;
  image: string;
  shardCountHint?: number;
  replicationFactor?: number;
}

export interface CoordinatorConfig {
  connectHost: string;
  connectPort: number;
  connectTimeout: number;
}

export interface SupervisorConfig {
  dockerSocket?: string;
  network?: string;
  stopTimeoutSeconds: number;
}

export interface ProbeConfig {
  hostOverride?: string;
  initialDelay: number;
  maxDelay: number;
  timeout: number;
  connectTimeout: number;
}

export interface RegistrationConfig {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  confirmTimeout: number;
}

export interface DrainConfig {
  timeout: number;
  pollInterval: number;
}

export interface LifecycleConfig {
  /** 0 means "bounded by the number of workers in the operation". */
  parallelism: number;
  rebalanceOnAdd: boolean;
  rebalanceStrategy?: RebalanceStrategy;
  rebalanceTimeout: number;
  rebalancePollInterval: number;
}

/**
 * Configuration type definition for type-safe access
 */
export interface ShardplaneConfiguration {
  environment: string;
  main: {
    port: number;
    apiKey: string;
  };
  topology: TopologyConfig;
  coordinator: CoordinatorConfig;
  supervisor: SupervisorConfig;
  probe: ProbeConfig;
  registration: RegistrationConfig;
  drain: DrainConfig;
  lifecycle: LifecycleConfig;
  reconcile: {
    enabled: boolean;
  };
  events: {
    enabled: boolean;
  };
}
