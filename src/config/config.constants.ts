export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

// Configuration defaults
export const DEFAULT_SERVER_PORT = 8080;
export const MIN_API_KEY_LENGTH = 16;

export const DEFAULT_CLUSTER_NAME = 'shardplane';
export const DEFAULT_COORDINATOR_HOST = 'coordinator';
export const DEFAULT_COORDINATOR_PORT = 5432;
export const DEFAULT_WORKER_COUNT = 2;
export const DEFAULT_PORT_BASE = 5432;
export const DEFAULT_POSTGRES_USER = 'postgres';
export const DEFAULT_POSTGRES_DB = 'postgres';
export const DEFAULT_NODE_IMAGE = 'citusdata/citus:12.1';
export const DEFAULT_COORDINATOR_CONNECT_TIMEOUT = 5000;

export const DEFAULT_STOP_TIMEOUT_SECONDS = 30;

export const DEFAULT_PROBE_INITIAL_DELAY = 1000;
export const DEFAULT_PROBE_MAX_DELAY = 30000;
export const DEFAULT_PROBE_TIMEOUT = 180000; // 3 minutes
export const DEFAULT_PROBE_CONNECT_TIMEOUT = 3000;

export const DEFAULT_REGISTRATION_MAX_ATTEMPTS = 5;
export const DEFAULT_REGISTRATION_INITIAL_DELAY = 1000;
export const DEFAULT_REGISTRATION_MAX_DELAY = 15000;
export const DEFAULT_REGISTRATION_CONFIRM_TIMEOUT = 60000;

// Draining moves data; it routinely outlasts probes and registration by an order of magnitude
export const DEFAULT_DRAIN_TIMEOUT = 1_800_000; // 30 minutes
export const DEFAULT_DRAIN_POLL_INTERVAL = 5000;

export const DEFAULT_REBALANCE_TIMEOUT = 3_600_000; // 1 hour
export const DEFAULT_REBALANCE_POLL_INTERVAL = 10000;
export const REBALANCE_MAX_POLL_DELAY = 60000;

export const REBALANCE_STRATEGIES = ['by_shard_count', 'by_disk_size'] as const;

export const MAX_TCP_PORT = 65535;
export const CLUSTER_NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]*$/;
