import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { Logger } from '@nestjs/common';
import {
  DEFAULT_SERVER_PORT,
  MIN_API_KEY_LENGTH,
  DEFAULT_CLUSTER_NAME,
  DEFAULT_COORDINATOR_HOST,
  DEFAULT_COORDINATOR_PORT,
  DEFAULT_WORKER_COUNT,
  DEFAULT_PORT_BASE,
  DEFAULT_POSTGRES_USER,
  DEFAULT_POSTGRES_DB,
  DEFAULT_NODE_IMAGE,
  DEFAULT_COORDINATOR_CONNECT_TIMEOUT,
  DEFAULT_STOP_TIMEOUT_SECONDS,
  DEFAULT_PROBE_INITIAL_DELAY,
  DEFAULT_PROBE_MAX_DELAY,
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_PROBE_CONNECT_TIMEOUT,
  DEFAULT_REGISTRATION_MAX_ATTEMPTS,
  DEFAULT_REGISTRATION_INITIAL_DELAY,
  DEFAULT_REGISTRATION_MAX_DELAY,
  DEFAULT_REGISTRATION_CONFIRM_TIMEOUT,
  DEFAULT_DRAIN_TIMEOUT,
  DEFAULT_DRAIN_POLL_INTERVAL,
  DEFAULT_REBALANCE_TIMEOUT,
  DEFAULT_REBALANCE_POLL_INTERVAL,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseOptionalNumber,
  parseStringWithDefault,
  parseCommaList,
  parseRebalanceStrategy,
} from './config/config.parsers';
import { isValidClusterName, isValidHost, validatePortLayout } from './config/config.validators';
import type {
  CoordinatorConfig,
  DrainConfig,
  LifecycleConfig,
  ProbeConfig,
  RegistrationConfig,
  ShardplaneConfiguration,
  SupervisorConfig,
  TopologyConfig,
} from './config/config.types';

const logger = new Logger('ConfigValidation');

/**
 * Build Main Server Configuration
 *
 * Required environment variables:
 * - SHP_API_KEY: Key expected in the X-API-Key header of every cluster API call (min 16 characters)
 *
 * Optional environment variables:
 * - SHP_SERVER_PORT: HTTP port of the control plane API (default: 8080)
 *
 * @throws {Error} If the API key is missing or too short
 */
function buildMainConfig(): ShardplaneConfiguration['main'] {
  const apiKey = process.env.SHP_API_KEY?.trim() ?? '';

  if (!apiKey) {
    throw new Error(
      'SHP_API_KEY is required. Generate one with:\n' +
        '  openssl rand -base64 32\n' +
        'and export it before starting the control plane.',
    );
  }

  if (apiKey.length < MIN_API_KEY_LENGTH) {
    throw new Error(`SHP_API_KEY must be at least ${MIN_API_KEY_LENGTH} characters (current: ${apiKey.length})`);
  }

  return {
    port: parseNumberWithDefault(process.env.SHP_SERVER_PORT, DEFAULT_SERVER_PORT),
    apiKey,
  };
}

/**
 * Build Topology Configuration
 *
 * The declared topology Converge drives towards when no explicit topology is supplied.
 *
 * Optional environment variables:
 * - SHP_CLUSTER_NAME: Cluster identifier, prefixes container names (default: 'shardplane')
 * - SHP_COORDINATOR_ENABLED: Manage a coordinator node; false attaches workers to an external one (default: true)
 * - SHP_COORDINATOR_HOST / SHP_COORDINATOR_PORT: Coordinator identity (default: coordinator:5432)
 * - SHP_WORKER_COUNT: Number of workers (default: 2)
 * - SHP_PORT_BASE: Worker i listens on SHP_PORT_BASE + i (default: 5432)
 * - SHP_WORKER_HOSTS: Comma-separated worker hosts; enables multi-host placement
 * - SHP_POSTGRES_USER / SHP_POSTGRES_PASSWORD / SHP_POSTGRES_DB: Shared node credentials
 * - SHP_NODE_IMAGE: Engine image for every node (default: citusdata/citus:12.1)
 * - SHP_SHARD_COUNT_HINT: Expected shard count; drives rebalance strategy selection
 * - SHP_REPLICATION_FACTOR: Shard replication factor passed to the coordinator
 *
 * @throws {Error} If a managed coordinator has no password, or names are malformed
 */
function buildTopologyConfig(): TopologyConfig {
  const clusterName = parseStringWithDefault(process.env.SHP_CLUSTER_NAME, DEFAULT_CLUSTER_NAME).trim();
  const coordinatorEnabled = parseOptionalBoolean(process.env.SHP_COORDINATOR_ENABLED, true);
  const coordinatorHost = parseStringWithDefault(process.env.SHP_COORDINATOR_HOST, DEFAULT_COORDINATOR_HOST).trim();
  const coordinatorPort = parseNumberWithDefault(process.env.SHP_COORDINATOR_PORT, DEFAULT_COORDINATOR_PORT);
  const portBase = parseNumberWithDefault(process.env.SHP_PORT_BASE, DEFAULT_PORT_BASE);
  const workerHosts = parseCommaList(process.env.SHP_WORKER_HOSTS);
  const password = process.env.SHP_POSTGRES_PASSWORD ?? '';

  if (!isValidClusterName(clusterName)) {
    throw new Error(
      `Invalid SHP_CLUSTER_NAME: "${clusterName}". Use lowercase letters, digits, '-', '_' or '.'.`,
    );
  }

  if (!isValidHost(coordinatorHost)) {
    throw new Error(`Invalid SHP_COORDINATOR_HOST: "${coordinatorHost}"`);
  }

  const invalidHosts = workerHosts.filter((host) => !isValidHost(host));
  if (invalidHosts.length > 0) {
    throw new Error(`Invalid host format in SHP_WORKER_HOSTS: ${invalidHosts.join(', ')}`);
  }

  if (coordinatorEnabled && !password.trim()) {
    throw new Error(
      'SHP_POSTGRES_PASSWORD is required when the coordinator is managed (SHP_COORDINATOR_ENABLED=true)',
    );
  }

  validatePortLayout(coordinatorEnabled ? coordinatorPort : undefined, portBase, workerHosts.length > 0);

  return {
    clusterName,
    coordinatorEnabled,
    coordinatorHost,
    coordinatorPort,
    workerCount: parseNumberWithDefault(process.env.SHP_WORKER_COUNT, DEFAULT_WORKER_COUNT),
    portBase,
    workerHosts,
    credentials: {
      user: parseStringWithDefault(process.env.SHP_POSTGRES_USER, DEFAULT_POSTGRES_USER),
      password,
      database: parseStringWithDefault(process.env.SHP_POSTGRES_DB, DEFAULT_POSTGRES_DB),
    },
    image: parseStringWithDefault(process.env.SHP_NODE_IMAGE, DEFAULT_NODE_IMAGE),
    shardCountHint: parseOptionalNumber(process.env.SHP_SHARD_COUNT_HINT),
    replicationFactor: parseOptionalNumber(process.env.SHP_REPLICATION_FACTOR),
  };
}

/**
 * Build Coordinator Connection Configuration
 *
 * Where the control plane itself connects to issue coordinator commands. Defaults to the
 * coordinator identity, which only resolves when the control plane shares the nodes' network.
 *
 * Optional environment variables:
 * - SHP_COORDINATOR_CONNECT_HOST: Address to dial (default: SHP_COORDINATOR_HOST)
 * - SHP_COORDINATOR_CONNECT_PORT: Port to dial (default: SHP_COORDINATOR_PORT)
 * - SHP_COORDINATOR_CONNECT_TIMEOUT: Connection timeout in ms (default: 5000)
 */
function buildCoordinatorConfig(topology: TopologyConfig): CoordinatorConfig {
  return {
    connectHost: parseStringWithDefault(process.env.SHP_COORDINATOR_CONNECT_HOST, topology.coordinatorHost),
    connectPort: parseNumberWithDefault(process.env.SHP_COORDINATOR_CONNECT_PORT, topology.coordinatorPort),
    connectTimeout: parseNumberWithDefault(
      process.env.SHP_COORDINATOR_CONNECT_TIMEOUT,
      DEFAULT_COORDINATOR_CONNECT_TIMEOUT,
    ),
  };
}

/**
 * Build Supervisor Configuration
 *
 * Optional environment variables:
 * - SHP_DOCKER_SOCKET: Docker socket path (default: dockerode's platform default)
 * - SHP_DOCKER_NETWORK: Network every node joins, so nodes resolve each other by name
 * - SHP_STOP_TIMEOUT: Seconds a node gets to shut down before it is killed (default: 30)
 */
function buildSupervisorConfig(): SupervisorConfig {
  return {
    dockerSocket: process.env.SHP_DOCKER_SOCKET?.trim() || undefined,
    network: process.env.SHP_DOCKER_NETWORK?.trim() || undefined,
    stopTimeoutSeconds: parseNumberWithDefault(process.env.SHP_STOP_TIMEOUT, DEFAULT_STOP_TIMEOUT_SECONDS),
  };
}

/**
 * Build Health Probe Configuration
 *
 * Optional environment variables:
 * - SHP_PROBE_HOST: Address probes dial instead of each node's host identity (e.g. 'localhost')
 * - SHP_PROBE_INITIAL_DELAY: First backoff delay in ms (default: 1000)
 * - SHP_PROBE_MAX_DELAY: Backoff cap in ms (default: 30000)
 * - SHP_PROBE_TIMEOUT: Overall wait for readiness in ms (default: 180000)
 * - SHP_PROBE_CONNECT_TIMEOUT: Per-attempt connection timeout in ms (default: 3000)
 */
function buildProbeConfig(): ProbeConfig {
  const initialDelay = parseNumberWithDefault(process.env.SHP_PROBE_INITIAL_DELAY, DEFAULT_PROBE_INITIAL_DELAY);
  const maxDelay = parseNumberWithDefault(process.env.SHP_PROBE_MAX_DELAY, DEFAULT_PROBE_MAX_DELAY);

  if (maxDelay < initialDelay) {
    throw new Error(
      `SHP_PROBE_MAX_DELAY (${maxDelay}) must be greater than or equal to SHP_PROBE_INITIAL_DELAY (${initialDelay})`,
    );
  }

  return {
    hostOverride: process.env.SHP_PROBE_HOST?.trim() || undefined,
    initialDelay,
    maxDelay,
    timeout: parseNumberWithDefault(process.env.SHP_PROBE_TIMEOUT, DEFAULT_PROBE_TIMEOUT),
    connectTimeout: parseNumberWithDefault(process.env.SHP_PROBE_CONNECT_TIMEOUT, DEFAULT_PROBE_CONNECT_TIMEOUT),
  };
}

/**
 * Build Registration Configuration
 *
 * Optional environment variables:
 * - SHP_REGISTRATION_MAX_ATTEMPTS: Register attempts before a worker is marked Failed (default: 5)
 * - SHP_REGISTRATION_INITIAL_DELAY / SHP_REGISTRATION_MAX_DELAY: Retry backoff in ms (default: 1000 / 15000)
 * - SHP_REGISTRATION_CONFIRM_TIMEOUT: Wait for the coordinator to list the worker, in ms (default: 60000)
 */
function buildRegistrationConfig(): RegistrationConfig {
  const maxAttempts = parseNumberWithDefault(
    process.env.SHP_REGISTRATION_MAX_ATTEMPTS,
    DEFAULT_REGISTRATION_MAX_ATTEMPTS,
  );

  if (maxAttempts < 1) {
    throw new Error('SHP_REGISTRATION_MAX_ATTEMPTS must be at least 1');
  }

  return {
    maxAttempts,
    initialDelay: parseNumberWithDefault(
      process.env.SHP_REGISTRATION_INITIAL_DELAY,
      DEFAULT_REGISTRATION_INITIAL_DELAY,
    ),
    maxDelay: parseNumberWithDefault(process.env.SHP_REGISTRATION_MAX_DELAY, DEFAULT_REGISTRATION_MAX_DELAY),
    confirmTimeout: parseNumberWithDefault(
      process.env.SHP_REGISTRATION_CONFIRM_TIMEOUT,
      DEFAULT_REGISTRATION_CONFIRM_TIMEOUT,
    ),
  };
}

/**
 * Build Drain Configuration
 *
 * Optional environment variables:
 * - SHP_DRAIN_TIMEOUT: Wait for a worker's placements to reach zero, in ms (default: 1800000 = 30 minutes)
 * - SHP_DRAIN_POLL_INTERVAL: Placement count polling interval in ms (default: 5000)
 */
function buildDrainConfig(): DrainConfig {
  return {
    timeout: parseNumberWithDefault(process.env.SHP_DRAIN_TIMEOUT, DEFAULT_DRAIN_TIMEOUT),
    pollInterval: parseNumberWithDefault(process.env.SHP_DRAIN_POLL_INTERVAL, DEFAULT_DRAIN_POLL_INTERVAL),
  };
}

/**
 * Build Lifecycle Configuration
 *
 * Optional environment variables:
 * - SHP_PARALLELISM: Concurrent worker operations; 0 bounds it by the worker count (default: 0)
 * - SHP_REBALANCE_ON_ADD: Start a rebalance after Converge registers new workers (default: false)
 * - SHP_REBALANCE_STRATEGY: Force 'by_shard_count' or 'by_disk_size' instead of choosing per run
 * - SHP_REBALANCE_TIMEOUT / SHP_REBALANCE_POLL_INTERVAL: Wait for a rebalance job, in ms
 */
function buildLifecycleConfig(): LifecycleConfig {
  return {
    parallelism: parseNumberWithDefault(process.env.SHP_PARALLELISM, 0),
    rebalanceOnAdd: parseOptionalBoolean(process.env.SHP_REBALANCE_ON_ADD, false),
    rebalanceStrategy: parseRebalanceStrategy(process.env.SHP_REBALANCE_STRATEGY),
    rebalanceTimeout: parseNumberWithDefault(process.env.SHP_REBALANCE_TIMEOUT, DEFAULT_REBALANCE_TIMEOUT),
    rebalancePollInterval: parseNumberWithDefault(
      process.env.SHP_REBALANCE_POLL_INTERVAL,
      DEFAULT_REBALANCE_POLL_INTERVAL,
    ),
  };
}

/**
 * Register Config Shardplane
 */
export default registerAs('shardplane', (): ShardplaneConfiguration => {
  const topology = buildTopologyConfig();
  const reconcileEnabled = parseOptionalBoolean(process.env.SHP_RECONCILE_ENABLED, false);

  if (reconcileEnabled) {
    logger.log('Periodic reconcile enabled; the declared topology is converged every 5 minutes');
  }

  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    main: buildMainConfig(),
    topology,
    coordinator: buildCoordinatorConfig(topology),
    supervisor: buildSupervisorConfig(),
    probe: buildProbeConfig(),
    registration: buildRegistrationConfig(),
    drain: buildDrainConfig(),
    lifecycle: buildLifecycleConfig(),
    reconcile: {
      enabled: reconcileEnabled,
    },
    events: {
      enabled: parseOptionalBoolean(process.env.SHP_EVENTS_ENABLED, true),
    },
  };
});
