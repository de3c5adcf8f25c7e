import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ProbeConfig } from '../config/config.types';
import { CoordinatorGateway } from '../coordinator/coordinator.gateway';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { ExponentialBackoff, remainingMs } from '../shared/backoff';
import { throwIfCancelled, type WaitOptions } from '../shared/cancellation';
import { CLOCK, type Clock } from '../shared/clock';
import { getErrorMessage } from '../shared/error.utils';
import { NODE_PROBE, type NodeProbe, type ProbeOutcome, type ProbeTarget } from './interfaces';
import { ProbeTimeoutError } from './probe.errors';

/**
 * Decides whether a node is ready to be used.
 *
 * A node is Ready when it accepts connections and answers a trivial query. A worker is
 * additionally required to be reachable from the coordinator, since that is the path
 * registration and every distributed query take.
 */
@Injectable()
export class HealthProberService {
  private readonly logger = new Logger(HealthProberService.name);
  private readonly config: ProbeConfig;
  private readonly backoff: ExponentialBackoff;

  constructor(
    @Inject(NODE_PROBE) private readonly probe: NodeProbe,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly gateway: CoordinatorGateway,
    private readonly metricsService: MetricsService,
    configService: ConfigService,
  ) {
    const config = configService.get<ProbeConfig>('shardplane.probe');
    if (!config) {
      throw new Error('Probe configuration is not loaded');
    }
    this.config = config;
    this.backoff = new ExponentialBackoff({ initialDelayMs: config.initialDelay, maxDelayMs: config.maxDelay });
  }

  /**
   * Single readiness check. Never throws.
   */
  async check(target: ProbeTarget): Promise<ProbeOutcome> {
    const host = this.config.hostOverride ?? target.identity.host;
    const outcome = await this.probe.probe(host, target.identity.port, target.credentials, this.config.connectTimeout);

    if (outcome !== 'Ready' || target.role !== 'worker') {
      return outcome;
    }

    try {
      const reachable = await this.gateway.checkConnection(target.identity.host, target.identity.port);
      if (!reachable) {
        this.logger.debug(`${target.name} is up but not yet reachable from the coordinator`);
        return 'NotReady';
      }
      return 'Ready';
    } catch (error) {
      this.logger.debug(`Coordinator connectivity check for ${target.name} failed: ${getErrorMessage(error)}`);
      return 'NotReady';
    }
  }

  /**
   * Polls `check` with bounded exponential backoff until Ready or the deadline passes.
   *
   * @returns Number of checks performed
   * @throws {ProbeTimeoutError} If the node is not Ready by the deadline
   * @throws {OperationCancelledError} If `signal` aborts
   */
  async waitUntilReady(target: ProbeTarget, options: WaitOptions = {}): Promise<number> {
    const timeout = options.timeoutMs ?? this.config.timeout;
    const deadline = this.clock.now() + timeout;
    let attempt = 0;

    for (;;) {
      throwIfCancelled(options.signal);
      attempt++;
      const outcome = await this.check(target);

      if (outcome === 'Ready') {
        this.logger.log(`${target.name} ready after ${attempt} probe(s)`);
        this.metricsService.increment(METRIC_PATHS.PROBE_READY);
        return attempt;
      }

      const remaining = remainingMs(deadline, this.clock.now());
      if (remaining <= 0) {
        this.logger.warn(`${target.name} not ready after ${timeout}ms (last outcome: ${outcome})`);
        this.metricsService.increment(METRIC_PATHS.PROBE_TIMEOUTS);
        throw new ProbeTimeoutError(target.name, outcome, attempt, timeout);
      }

      const delay = Math.min(this.backoff.delayFor(attempt), remaining);
      this.logger.debug(`${target.name} ${outcome}; probing again in ${delay}ms`);
      await this.clock.sleep(delay, options.signal);
    }
  }
}
