/**
 * @interface Metrics
 * @description Counters and gauges tracked by the control plane. Counters are cumulative since
 * process start; `cluster.registered_workers` reflects the latest observation.
 */
export interface Metrics {
  /** Converge, add, remove and resize operations */
  operations: {
    total: number;
    converged_total: number;
    partially_converged_total: number;
    failed_total: number;
    /** Rejected before anything was touched */
    rejected_total: number;
    /** Topology unchanged since the last converged run */
    unchanged_total: number;
    /** Running average duration */
    duration_ms: number;
  };

  /** Supervisor actions */
  nodes: {
    started_total: number;
    stopped_total: number;
    start_failures_total: number;
  };

  registration: {
    attempts_total: number;
    registered_total: number;
    /** Worker was already live on the coordinator */
    noop_total: number;
    transient_errors_total: number;
    conflicts_total: number;
    failed_total: number;
  };

  drain: {
    requested_total: number;
    completed_total: number;
    stalled_total: number;
    forced_removals_total: number;
  };

  probe: {
    ready_total: number;
    timeouts_total: number;
  };

  rebalance: {
    started_total: number;
    completed_total: number;
    failed_total: number;
  };

  cluster: {
    registered_workers: number;
  };

  server: {
    uptime_seconds: number;
  };
}
