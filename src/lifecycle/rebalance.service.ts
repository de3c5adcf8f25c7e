import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { REBALANCE_MAX_POLL_DELAY } from '../config/config.constants';
import type { LifecycleConfig } from '../config/config.types';
import { CoordinatorGateway } from '../coordinator/coordinator.gateway';
import type { RebalanceJobState, RebalanceStrategy } from '../coordinator/interfaces';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { MetricsService } from '../metrics/metrics.service';
import { ExponentialBackoff, remainingMs } from '../shared/backoff';
import { throwIfCancelled, type WaitOptions } from '../shared/cancellation';
import { CLOCK, type Clock } from '../shared/clock';
import { getErrorMessage } from '../shared/error.utils';
import { RebalanceTimeoutError } from './lifecycle.errors';

export interface RebalanceRequest {
  /** Explicit strategy; otherwise chosen from the shard count hint. */
  strategy?: RebalanceStrategy;
  shardCountHint?: number;
  workerCount: number;
}

export interface StartedRebalance {
  strategy: RebalanceStrategy;
  jobId: string | null;
}

@Injectable()
export class RebalanceService {
  private readonly logger = new Logger(RebalanceService.name);
  private readonly config: LifecycleConfig;
  private readonly backoff: ExponentialBackoff;

  constructor(
    private readonly gateway: CoordinatorGateway,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly metricsService: MetricsService,
    configService: ConfigService,
  ) {
    const config = configService.get<LifecycleConfig>('shardplane.lifecycle');
    if (!config) {
      throw new Error('Lifecycle configuration is not loaded');
    }
    this.config = config;
    this.backoff = new ExponentialBackoff({
      initialDelayMs: config.rebalancePollInterval,
      maxDelayMs: Math.max(config.rebalancePollInterval, REBALANCE_MAX_POLL_DELAY),
    });
  }

  /**
   * The configured strategy wins. Otherwise shards are balanced by count when the hint
   * spreads evenly over the workers, and by disk size when it does not.
   */
  chooseStrategy(shardCountHint: number | undefined, workerCount: number): RebalanceStrategy {
    if (this.config.rebalanceStrategy) {
      return this.config.rebalanceStrategy;
    }
    if (shardCountHint !== undefined && workerCount > 0 && shardCountHint % workerCount === 0) {
      return 'by_shard_count';
    }
    return 'by_disk_size';
  }

  async start(request: RebalanceRequest): Promise<StartedRebalance> {
    const strategy = request.strategy ?? this.chooseStrategy(request.shardCountHint, request.workerCount);
    try {
      const jobId = await this.gateway.rebalance(strategy);
      this.metricsService.increment(METRIC_PATHS.REBALANCE_STARTED);
      if (jobId === null) {
        this.logger.log(`Rebalance (${strategy}) not needed: shards are already balanced`);
      } else {
        this.logger.log(`Rebalance job ${jobId} started with strategy ${strategy}`);
      }
      return { strategy, jobId };
    } catch (error) {
      this.metricsService.increment(METRIC_PATHS.REBALANCE_FAILED);
      throw error;
    }
  }

  status(jobId: string): Promise<RebalanceJobState> {
    return this.gateway.rebalanceStatus(jobId);
  }

  /**
   * Polls the job until it is Done or Failed.
   *
   * @throws {RebalanceTimeoutError} If the job is still pending or running at the deadline
   * @throws {OperationCancelledError} If `signal` aborts; the job keeps running
   */
  async waitForCompletion(jobId: string, options: WaitOptions = {}): Promise<RebalanceJobState> {
    const timeout = options.timeoutMs ?? this.config.rebalanceTimeout;
    const deadline = this.clock.now() + timeout;
    let attempt = 0;

    for (;;) {
      throwIfCancelled(options.signal);
      attempt++;
      let state: RebalanceJobState | undefined;
      try {
        state = await this.gateway.rebalanceStatus(jobId);
      } catch (error) {
        this.logger.warn(`Status of rebalance job ${jobId} unavailable: ${getErrorMessage(error)}`);
      }

      if (state === 'Done') {
        this.metricsService.increment(METRIC_PATHS.REBALANCE_COMPLETED);
        return state;
      }
      if (state === 'Failed') {
        this.metricsService.increment(METRIC_PATHS.REBALANCE_FAILED);
        return state;
      }

      const remaining = remainingMs(deadline, this.clock.now());
      if (remaining <= 0) {
        throw new RebalanceTimeoutError(jobId, timeout);
      }
      await this.clock.sleep(Math.min(this.backoff.delayFor(attempt), remaining), options.signal);
    }
  }
}
