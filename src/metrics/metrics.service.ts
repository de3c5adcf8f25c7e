import { Injectable, Logger } from '@nestjs/common';
import type { MetricPath } from './metrics.constants';
import type { Metrics } from './interfaces';

type MetricSection = keyof Metrics;

/**
 * @class MetricsService
 * @description Collects the control plane's counters. Values live in memory only and
 * reset on restart, like the rest of the process state.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();

  private metrics: Metrics = {
    operations: {
      total: 0,
      converged_total: 0,
      partially_converged_total: 0,
      failed_total: 0,
      rejected_total: 0,
      unchanged_total: 0,
      duration_ms: 0,
    },
    nodes: {
      started_total: 0,
      stopped_total: 0,
      start_failures_total: 0,
    },
    registration: {
      attempts_total: 0,
      registered_total: 0,
      noop_total: 0,
      transient_errors_total: 0,
      conflicts_total: 0,
      failed_total: 0,
    },
    drain: {
      requested_total: 0,
      completed_total: 0,
      stalled_total: 0,
      forced_removals_total: 0,
    },
    probe: {
      ready_total: 0,
      timeouts_total: 0,
    },
    rebalance: {
      started_total: 0,
      completed_total: 0,
      failed_total: 0,
    },
    cluster: {
      registered_workers: 0,
    },
    server: {
      uptime_seconds: 0,
    },
  };

  private operationCount = 0;
  private operationDurationSum = 0;

  /**
   * Snapshot of all metrics with uptime computed at call time.
   */
  getMetrics(): Readonly<Metrics> {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime) / 1000);

    return {
      ...this.metrics,
      server: {
        uptime_seconds: uptimeSeconds,
      },
    };
  }

  increment(path: MetricPath, value: number = 1): void {
    this.update(path, (current) => current + value);
  }

  decrement(path: MetricPath, value: number = 1): void {
    this.update(path, (current) => current - value);
  }

  set(path: MetricPath, value: number): void {
    this.update(path, () => value);
  }

  /**
   * Records the duration of a lifecycle operation and updates the running average.
   */
  recordOperationDuration(ms: number): void {
    this.operationCount++;
    this.operationDurationSum += ms;
    this.metrics.operations.duration_ms = Math.round(this.operationDurationSum / this.operationCount);
  }

  private update(path: MetricPath, next: (current: number) => number): void {
    const [section, key] = path.split('.');
    if (!isMetricSection(section, this.metrics)) {
      this.logger.error(`Invalid metric path: ${path} (section "${section}" not found)`);
      return;
    }

    const group: Record<string, number> = this.metrics[section];
    const current = group[key];
    if (typeof current !== 'number') {
      this.logger.error(`Invalid metric path: ${path} (not a number)`);
      return;
    }
    group[key] = next(current);
  }
}

function isMetricSection(value: string, metrics: Metrics): value is MetricSection {
  return Object.prototype.hasOwnProperty.call(metrics, value);
}
