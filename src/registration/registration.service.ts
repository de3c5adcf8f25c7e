import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import pLimit from 'p-limit';
import type { DrainConfig, RegistrationConfig } from '../config/config.types';
import {
  CoordinatorCommandError,
  RegistrationConflictError,
  RegistrationTransientError,
} from '../coordinator/coordinator.errors';
import { CoordinatorGateway } from '../coordinator/coordinator.gateway';
import type { LiveNode } from '../coordinator/interfaces';
import { CLUSTER_EVENTS, type RegistrationTransitionEvent } from '../events/interfaces';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { MetricsService } from '../metrics/metrics.service';
import { ExponentialBackoff, remainingMs } from '../shared/backoff';
import { OperationCancelledError, throwIfCancelled, type WaitOptions } from '../shared/cancellation';
import { CLOCK, type Clock } from '../shared/clock';
import { getErrorMessage, toReportedError } from '../shared/error.utils';
import type { NodeIdentity } from '../topology/interfaces';
import type {
  RegistrationOutcome,
  RegistrationRecord,
  RegistrationState,
  RemovalOptions,
  RemovalOutcome,
  WorkerRef,
} from './interfaces';
import { DrainStallError } from './registration.errors';
import { InvalidTransitionError, isValidTransition } from './registration.state-machine';

export interface RegisterOptions extends WaitOptions {
  /** Concurrent registrations; 0 or unset means one per worker. */
  parallelism?: number;
}

function identityKey(identity: NodeIdentity): string {
  return `${identity.host}:${identity.port}`;
}

function isTransient(error: unknown): boolean {
  return (
    error instanceof RegistrationTransientError || (error instanceof CoordinatorCommandError && error.transient)
  );
}

/**
 * Makes the coordinator aware of workers, and drains and removes them again.
 *
 * Records kept here are hints. Before any decision to skip work the coordinator's live
 * node list is queried, so a run after a crash (empty records) converges to the same
 * result as an uninterrupted one.
 */
@Injectable()
export class RegistrationService {
  private readonly logger = new Logger(RegistrationService.name);
  private readonly records = new Map<string, RegistrationRecord>();
  private readonly registrationConfig: RegistrationConfig;
  private readonly drainConfig: DrainConfig;
  private readonly backoff: ExponentialBackoff;

  constructor(
    private readonly gateway: CoordinatorGateway,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly metricsService: MetricsService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    const registrationConfig = configService.get<RegistrationConfig>('shardplane.registration');
    const drainConfig = configService.get<DrainConfig>('shardplane.drain');
    if (!registrationConfig || !drainConfig) {
      throw new Error('Registration configuration is not loaded');
    }
    this.registrationConfig = registrationConfig;
    this.drainConfig = drainConfig;
    this.backoff = new ExponentialBackoff({
      initialDelayMs: registrationConfig.initialDelay,
      maxDelayMs: registrationConfig.maxDelay,
    });
  }

  /**
   * Registers workers in ascending index order. Workers proceed concurrently; the call
   * resolves once every worker is Registered or Failed.
   *
   * @throws {OperationCancelledError} If `signal` aborts; records stay where they were
   */
  async registerWorkers(workers: WorkerRef[], options: RegisterOptions = {}): Promise<RegistrationOutcome[]> {
    if (workers.length === 0) {
      return [];
    }
    const limit = pLimit(options.parallelism && options.parallelism > 0 ? options.parallelism : workers.length);
    return Promise.all(workers.map((worker) => limit(() => this.registerWorker(worker, options))));
  }

  /**
   * Ensures one worker is registered. Re-registering a registered worker is a no-op success.
   * `timeoutMs` overrides the configured confirmation deadline of each attempt.
   *
   * @throws {OperationCancelledError} If `signal` aborts
   */
  async registerWorker(worker: WorkerRef, options: WaitOptions = {}): Promise<RegistrationOutcome> {
    const record = this.recordFor(worker);

    try {
      throwIfCancelled(options.signal);
      if (record.state === 'Failed') {
        this.transition(record, 'Unregistered');
      }
      record.attempts = 0;
      record.lastError = null;

      const live = await this.findLive(worker.identity);
      this.settleInterrupted(record, live?.role === 'worker');
      if (live) {
        if (live.role === 'coordinator') {
          throw new RegistrationConflictError(
            `${identityKey(worker.identity)} is registered as the coordinator, not as a worker`,
          );
        }
        if (record.state !== 'Registered') {
          this.transition(record, 'Registered');
        }
        this.logger.debug(`${worker.name} already registered at ${identityKey(worker.identity)}`);
        this.metricsService.increment(METRIC_PATHS.REGISTRATION_NOOP);
        return this.toOutcome(record, true);
      }

      if (record.state === 'Registered') {
        this.logger.warn(`${worker.name} was recorded as registered but the coordinator no longer lists it`);
        this.transition(record, 'Unregistered');
      }

      this.transition(record, 'Registering');
      await this.registerWithRetry(record, options);
      return this.toOutcome(record, false);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      this.fail(record, error);
      return this.toOutcome(record, false);
    }
  }

  /**
   * Drains a worker and removes it from the coordinator. With `force`, the drain is skipped
   * and the result carries a data-loss warning.
   *
   * @throws {OperationCancelledError} If `signal` aborts; a started drain keeps running
   */
  async drainAndRemove(worker: WorkerRef, options: RemovalOptions = {}): Promise<RemovalOutcome> {
    const record = this.recordFor(worker);
    const force = options.force ?? false;
    const warnings: string[] = [];

    try {
      throwIfCancelled(options.signal);
      const live = await this.findLive(worker.identity);

      if (!live) {
        this.logger.log(`${worker.name} is not registered on the coordinator; nothing to remove`);
        this.settleInterrupted(record, false);
        if (record.state !== 'Removed') {
          this.transition(record, 'Removed');
        }
        return this.finishRemoval(record, { forced: false, notRegistered: true, warnings });
      }

      if (live.role === 'coordinator') {
        throw new RegistrationConflictError(
          `${identityKey(worker.identity)} is the coordinator and cannot be removed as a worker`,
        );
      }

      // The coordinator lists the worker, whatever the local hint says
      if (record.state === 'Unregistered' || record.state === 'Registering') {
        this.transition(record, 'Registered');
      }

      if (force) {
        return await this.forceRemove(record, warnings);
      }

      // A drain interrupted earlier is picked up where it stopped
      if (record.state !== 'DrainRequested' && record.state !== 'Draining') {
        this.transition(record, 'DrainRequested');
        this.metricsService.increment(METRIC_PATHS.DRAIN_REQUESTED);
      }
      await this.gateway.drainNode(worker.identity.host, worker.identity.port);
      if (record.state === 'DrainRequested') {
        this.transition(record, 'Draining');
      }

      await this.waitForDrain(record, options);

      await this.gateway.removeNode(worker.identity.host, worker.identity.port, false);
      this.transition(record, 'Removed');
      this.metricsService.increment(METRIC_PATHS.DRAIN_COMPLETED);
      return this.finishRemoval(record, { forced: false, notRegistered: false, warnings });
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      if (error instanceof DrainStallError) {
        this.metricsService.increment(METRIC_PATHS.DRAIN_STALLED);
      }
      this.fail(record, error);
      const outcome: RemovalOutcome = {
        ...this.removalBase(record),
        forced: force,
        notRegistered: false,
        warnings,
        error: toReportedError(error),
      };
      if (error instanceof DrainStallError) {
        outcome.remainingPlacements = error.remainingPlacements;
      }
      return outcome;
    }
  }

  getRecord(name: string): RegistrationRecord | undefined {
    const record = this.records.get(name);
    return record ? { ...record, identity: { ...record.identity } } : undefined;
  }

  listRecords(): RegistrationRecord[] {
    return [...this.records.values()]
      .map((record) => ({ ...record, identity: { ...record.identity } }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  private async registerWithRetry(record: RegistrationRecord, options: WaitOptions): Promise<void> {
    const { host, port } = record.identity;
    const maxAttempts = this.registrationConfig.maxAttempts;

    for (;;) {
      throwIfCancelled(options.signal);
      record.attempts++;
      this.metricsService.increment(METRIC_PATHS.REGISTRATION_ATTEMPTS);

      try {
        await this.gateway.registerNode(host, port);
        await this.confirmRegistered(record, options);
        this.transition(record, 'Registered');
        this.metricsService.increment(METRIC_PATHS.REGISTRATION_REGISTERED);
        this.logger.log(`${record.name} registered at ${host}:${port} after ${record.attempts} attempt(s)`);
        return;
      } catch (error) {
        if (error instanceof OperationCancelledError || !isTransient(error)) {
          throw error;
        }
        this.metricsService.increment(METRIC_PATHS.REGISTRATION_TRANSIENT_ERRORS);
        if (record.attempts >= maxAttempts) {
          throw new RegistrationTransientError(
            `gave up after ${record.attempts} attempts; last error: ${getErrorMessage(error)}`,
          );
        }

        record.lastError = toReportedError(error);
        const delay = this.backoff.delayFor(record.attempts);
        this.logger.warn(
          `Registering ${record.name} failed (attempt ${record.attempts}/${maxAttempts}), retrying in ${delay}ms: ${getErrorMessage(error)}`,
        );
        this.transition(record, 'Registering');
        await this.clock.sleep(delay, options.signal);
      }
    }
  }

  /**
   * Polls the live node list until the worker shows up.
   *
   * @throws {RegistrationTransientError} If it does not show up before the confirmation deadline
   */
  private async confirmRegistered(record: RegistrationRecord, options: WaitOptions): Promise<void> {
    const timeout = options.timeoutMs ?? this.registrationConfig.confirmTimeout;
    const deadline = this.clock.now() + timeout;

    for (;;) {
      const live = await this.findLive(record.identity);
      if (live && live.role === 'worker') {
        return;
      }
      const remaining = remainingMs(deadline, this.clock.now());
      if (remaining <= 0) {
        throw new RegistrationTransientError(
          `${identityKey(record.identity)} not listed by the coordinator within ${timeout}ms`,
        );
      }
      await this.clock.sleep(Math.min(this.registrationConfig.initialDelay, remaining), options.signal);
    }
  }

  /**
   * @throws {DrainStallError} If placements remain when the drain deadline passes
   */
  private async waitForDrain(record: RegistrationRecord, options: RemovalOptions): Promise<void> {
    const { host, port } = record.identity;
    const timeout = options.timeoutMs ?? this.drainConfig.timeout;
    const deadline = this.clock.now() + timeout;
    let lastCount = -1;

    for (;;) {
      throwIfCancelled(options.signal);
      try {
        lastCount = await this.gateway.shardPlacementCount(host, port);
      } catch (error) {
        if (!isTransient(error)) {
          throw error;
        }
        this.logger.warn(`Placement count for ${record.name} unavailable, will retry: ${getErrorMessage(error)}`);
      }

      if (lastCount === 0) {
        this.logger.log(`${record.name} drained`);
        return;
      }

      const remaining = remainingMs(deadline, this.clock.now());
      if (remaining <= 0) {
        throw new DrainStallError(record.name, Math.max(lastCount, 0), timeout);
      }
      if (lastCount > 0) {
        this.logger.debug(`${record.name} still holds ${lastCount} placement(s)`);
      }
      await this.clock.sleep(Math.min(this.drainConfig.pollInterval, remaining), options.signal);
    }
  }

  private async forceRemove(record: RegistrationRecord, warnings: string[]): Promise<RemovalOutcome> {
    const { host, port } = record.identity;
    let remainingPlacements: number | undefined;
    try {
      remainingPlacements = await this.gateway.shardPlacementCount(host, port);
    } catch (error) {
      // The count only feeds the warning; the removal goes ahead without it
      this.logger.warn(`Placement count for ${record.name} unavailable: ${getErrorMessage(error)}`);
    }
    const warning =
      remainingPlacements === undefined
        ? `${record.name} removed without draining (force); ` +
          'the number of shard placement(s) on it is unknown and they may be lost'
        : `${record.name} removed without draining (force); ` +
          `${remainingPlacements} shard placement(s) on it were not moved and may be lost`;
    warnings.push(warning);
    this.logger.warn(warning);

    await this.gateway.removeNode(host, port, true);
    this.transition(record, 'Removed');
    this.metricsService.increment(METRIC_PATHS.DRAIN_FORCED_REMOVALS);
    return this.finishRemoval(
      record,
      remainingPlacements === undefined
        ? { forced: true, notRegistered: false, warnings }
        : { forced: true, notRegistered: false, warnings, remainingPlacements },
    );
  }

  /**
   * Moves a record left mid-flight by a cancelled run to Registered or Unregistered,
   * whichever the coordinator's live node list says.
   */
  private settleInterrupted(record: RegistrationRecord, listed: boolean): void {
    if (record.state !== 'Registering' && record.state !== 'DrainRequested' && record.state !== 'Draining') {
      return;
    }
    const to: RegistrationState = listed ? 'Registered' : 'Unregistered';
    this.logger.warn(`${record.name} was left ${record.state} by an interrupted run; settling on ${to}`);
    this.transition(record, to);
  }

  private finishRemoval(
    record: RegistrationRecord,
    details: Pick<RemovalOutcome, 'forced' | 'notRegistered' | 'warnings' | 'remainingPlacements'>,
  ): RemovalOutcome {
    const outcome: RemovalOutcome = { ...this.removalBase(record), ...details };
    this.records.delete(record.name);
    return outcome;
  }

  private removalBase(record: RegistrationRecord): Pick<RemovalOutcome, 'name' | 'identity' | 'state'> {
    return { name: record.name, identity: { ...record.identity }, state: record.state };
  }

  private async findLive(identity: NodeIdentity): Promise<LiveNode | undefined> {
    const nodes = await this.gateway.listNodes();
    this.metricsService.set(
      METRIC_PATHS.CLUSTER_REGISTERED_WORKERS,
      nodes.filter((node) => node.role === 'worker').length,
    );
    return nodes.find((node) => node.host === identity.host && node.port === identity.port);
  }

  private recordFor(worker: WorkerRef): RegistrationRecord {
    const existing = this.records.get(worker.name);
    if (existing && identityKey(existing.identity) === identityKey(worker.identity)) {
      return existing;
    }
    const record: RegistrationRecord = {
      name: worker.name,
      identity: { ...worker.identity },
      state: 'Unregistered',
      lastError: null,
      attempts: 0,
    };
    this.records.set(worker.name, record);
    return record;
  }

  private fail(record: RegistrationRecord, error: unknown): void {
    record.lastError = toReportedError(error);
    if (error instanceof RegistrationConflictError) {
      this.metricsService.increment(METRIC_PATHS.REGISTRATION_CONFLICTS);
    }
    // Registered has no edge to Failed: a removal that never got going leaves the worker registered
    if (record.state !== 'Failed' && isValidTransition(record.state, 'Failed')) {
      this.transition(record, 'Failed');
      if (!(error instanceof DrainStallError)) {
        this.metricsService.increment(METRIC_PATHS.REGISTRATION_FAILED);
      }
    }
    this.logger.error(
      `${record.name} (${record.state}): ${getErrorMessage(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
  }

  /**
   * @throws {InvalidTransitionError} If the edge is not in the transition graph
   */
  private transition(record: RegistrationRecord, to: RegistrationState): void {
    const from = record.state;
    if (!isValidTransition(from, to)) {
      throw new InvalidTransitionError(record.name, from, to);
    }
    record.state = to;
    this.logger.debug(`${record.name}: ${from} -> ${to}`);
    this.emitTransition(record, from, to);
  }

  private emitTransition(record: RegistrationRecord, from: RegistrationState, to: RegistrationState): void {
    const event: RegistrationTransitionEvent = {
      type: CLUSTER_EVENTS.REGISTRATION_TRANSITION,
      node: record.name,
      identity: { ...record.identity },
      from,
      to,
      attempts: record.attempts,
      timestamp: new Date(this.clock.now()).toISOString(),
    };
    if (record.lastError) {
      event.error = { ...record.lastError };
    }
    this.eventEmitter.emit(CLUSTER_EVENTS.REGISTRATION_TRANSITION, event);
  }

  private toOutcome(record: RegistrationRecord, alreadyRegistered: boolean): RegistrationOutcome {
    const outcome: RegistrationOutcome = {
      name: record.name,
      identity: { ...record.identity },
      state: record.state,
      attempts: record.attempts,
      alreadyRegistered,
    };
    if (record.state === 'Failed' && record.lastError) {
      outcome.error = { ...record.lastError };
    }
    return outcome;
  }
}
