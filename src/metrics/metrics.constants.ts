export const METRIC_PATHS = {
  // Operations
  OPERATIONS_TOTAL: 'operations.total',
  OPERATIONS_CONVERGED: 'operations.converged_total',
  OPERATIONS_PARTIALLY_CONVERGED: 'operations.partially_converged_total',
  OPERATIONS_FAILED: 'operations.failed_total',
  OPERATIONS_REJECTED: 'operations.rejected_total',
  OPERATIONS_UNCHANGED: 'operations.unchanged_total',
  OPERATIONS_DURATION_MS: 'operations.duration_ms',

  // Nodes
  NODES_STARTED: 'nodes.started_total',
  NODES_STOPPED: 'nodes.stopped_total',
  NODES_START_FAILURES: 'nodes.start_failures_total',

  // Registration
  REGISTRATION_ATTEMPTS: 'registration.attempts_total',
  REGISTRATION_REGISTERED: 'registration.registered_total',
  REGISTRATION_NOOP: 'registration.noop_total',
  REGISTRATION_TRANSIENT_ERRORS: 'registration.transient_errors_total',
  REGISTRATION_CONFLICTS: 'registration.conflicts_total',
  REGISTRATION_FAILED: 'registration.failed_total',

  // Drain
  DRAIN_REQUESTED: 'drain.requested_total',
  DRAIN_COMPLETED: 'drain.completed_total',
  DRAIN_STALLED: 'drain.stalled_total',
  DRAIN_FORCED_REMOVALS: 'drain.forced_removals_total',

  // Probe
  PROBE_READY: 'probe.ready_total',
  PROBE_TIMEOUTS: 'probe.timeouts_total',

  // Rebalance
  REBALANCE_STARTED: 'rebalance.started_total',
  REBALANCE_COMPLETED: 'rebalance.completed_total',
  REBALANCE_FAILED: 'rebalance.failed_total',

  // Cluster
  CLUSTER_REGISTERED_WORKERS: 'cluster.registered_workers',

  // Server
  SERVER_UPTIME_SECONDS: 'server.uptime_seconds',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
