import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import pLimit from 'p-limit';
import type { LifecycleConfig } from '../config/config.types';
import { CoordinatorUnavailableError } from '../coordinator/coordinator.errors';
import { CoordinatorGateway } from '../coordinator/coordinator.gateway';
import type { LiveNode } from '../coordinator/interfaces';
import {
  CLUSTER_EVENTS,
  type NodeLifecycleEvent,
  type OperationCompletedEvent,
} from '../events/interfaces';
import { GeneratorService } from '../generator/generator.service';
import type { GeneratedPlan, NodeDefinition } from '../generator/interfaces';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { MetricsService } from '../metrics/metrics.service';
import { HealthProberService } from '../probe/health-prober.service';
import type { ProbeTarget } from '../probe/interfaces';
import type { RegistrationOutcome, WorkerRef } from '../registration/interfaces';
import { RegistrationService } from '../registration/registration.service';
import { OperationCancelledError } from '../shared/cancellation';
import { CLOCK, type Clock } from '../shared/clock';
import { getErrorMessage, toReportedError } from '../shared/error.utils';
import { NODE_SUPERVISOR, type NodeStatus, type NodeSupervisor } from '../supervisor/interfaces';
import type { NodeRole, Topology, WorkerSpec } from '../topology/interfaces';
import { InvalidTopologyError } from '../topology/topology.errors';
import { TopologyService } from '../topology/topology.service';
import { validateTopology } from '../topology/topology.validator';
import { ClusterStateStore } from './cluster-state.store';
import type {
  ConvergeOptions,
  LifecycleOperation,
  NodeReport,
  NodeState,
  OperationReport,
  OverallResult,
  RebalanceReport,
  RemoveWorkerOptions,
} from './interfaces';
import { UnknownWorkerError } from './lifecycle.errors';
import { RebalanceService } from './rebalance.service';

/**
 * A node of the previously applied (or observed) node set.
 */
interface PreviousNode {
  name: string;
  role: NodeRole;
  host: string;
  port: number;
  /** Supervisor handle id; the container name works for Docker. */
  handleId: string;
  definition?: NodeDefinition;
  /** Only known when the set was re-derived from the supervisor. */
  status?: NodeStatus;
}

function targetStateFor(role: NodeRole): NodeState {
  return role === 'coordinator' ? 'Running' : 'Registered';
}

function isFailedReport(report: NodeReport): boolean {
  return report.error !== undefined || report.achievedState !== report.targetState;
}

function overallFrom(reports: NodeReport[]): OverallResult {
  const failed = reports.filter(isFailedReport).length;
  if (failed === 0) {
    return 'Converged';
  }
  return failed === reports.length ? 'Failed' : 'PartiallyConverged';
}

function definitionChanged(previous: PreviousNode, next: NodeDefinition): boolean {
  if (previous.host !== next.host || previous.port !== next.port || previous.role !== next.role) {
    return true;
  }
  if (!previous.definition) {
    return false;
  }
  const before = previous.definition;
  if (before.image !== next.image) {
    return true;
  }
  const keys = new Set([...Object.keys(before.environment), ...Object.keys(next.environment)]);
  return [...keys].some((key) => before.environment[key] !== next.environment[key]);
}

/**
 * Composes generator, supervisor, prober and registration into whole-cluster operations.
 *
 * Per-node failures are recorded in the report and never abort the operation. Concurrent
 * operations against the same cluster are not serialized here; callers own that.
 */
@Injectable()
export class LifecycleService {
  private readonly logger = new Logger(LifecycleService.name);
  private readonly config: LifecycleConfig;
  private inFlight = 0;

  constructor(
    private readonly topologyService: TopologyService,
    private readonly generator: GeneratorService,
    @Inject(NODE_SUPERVISOR) private readonly supervisor: NodeSupervisor,
    private readonly prober: HealthProberService,
    private readonly registration: RegistrationService,
    private readonly gateway: CoordinatorGateway,
    private readonly rebalanceService: RebalanceService,
    private readonly store: ClusterStateStore,
    private readonly metricsService: MetricsService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    const config = configService.get<LifecycleConfig>('shardplane.lifecycle');
    if (!config) {
      throw new Error('Lifecycle configuration is not loaded');
    }
    this.config = config;
  }

  /** True while any operation is running. */
  get busy(): boolean {
    return this.inFlight > 0;
  }

  /**
   * The topology the next operation builds on: the last one requested, or the declared one.
   */
  currentTopology(): Topology {
    return this.store.getDesired() ?? this.topologyService.declared();
  }

  /**
   * Brings the running cluster in line with `topology`.
   *
   * @throws {OperationCancelledError} If `signal` aborts; the last applied plan is forgotten
   */
  converge(topology: Topology, options: ConvergeOptions = {}): Promise<OperationReport> {
    return this.track('converge', (startedAt) => this.convergeTo('converge', () => topology, options, startedAt));
  }

  /**
   * Converge of the current topology plus one worker at the next index.
   */
  addWorker(spec: Partial<WorkerSpec> = {}, options: ConvergeOptions = {}): Promise<OperationReport> {
    return this.track('add-worker', (startedAt) =>
      this.convergeTo('add-worker', () => this.topologyService.withWorker(this.currentTopology(), spec), options, startedAt),
    );
  }

  /**
   * Converge of the current topology with workers 1..count. Shrinking drains the highest indices.
   */
  resize(count: number, options: ConvergeOptions = {}): Promise<OperationReport> {
    return this.track('resize', (startedAt) =>
      this.convergeTo(
        'resize',
        () => this.topologyService.withWorkerCount(this.currentTopology(), count),
        options,
        startedAt,
      ),
    );
  }

  /**
   * Drains (unless `force`), deregisters and stops one worker. The desired topology is left
   * as it is, so a later Converge that still declares the worker adds it back.
   *
   * @throws {UnknownWorkerError} If neither the current plan nor the supervisor knows the worker
   */
  async removeWorker(name: string, options: RemoveWorkerOptions = {}): Promise<OperationReport> {
    const node = await this.findWorker(name);
    return this.track('remove-worker', async (startedAt) => {
      const report = await this.removeNode(node, options.force ?? false, options.signal);
      this.store.clearLastApplied();
      return {
        operation: 'remove-worker',
        overall: overallFrom([report]),
        perNode: [report],
        elapsedMs: this.clock.now() - startedAt,
        warnings: [],
      };
    });
  }

  private async track(
    operation: LifecycleOperation,
    body: (startedAt: number) => Promise<OperationReport>,
  ): Promise<OperationReport> {
    const startedAt = this.clock.now();
    this.inFlight++;
    this.metricsService.increment(METRIC_PATHS.OPERATIONS_TOTAL);
    this.logger.log(`Operation ${operation} started`);
    try {
      const report = await body(startedAt);
      this.finish(report);
      return report;
    } catch (error) {
      this.store.clearLastApplied();
      this.metricsService.increment(METRIC_PATHS.OPERATIONS_FAILED);
      if (error instanceof OperationCancelledError) {
        this.logger.warn(`Operation ${operation} cancelled; coordinator state is left as-is`);
      } else {
        this.logger.error(`Operation ${operation} aborted: ${getErrorMessage(error)}`);
      }
      throw error;
    } finally {
      this.inFlight--;
    }
  }

  private async convergeTo(
    operation: LifecycleOperation,
    build: () => Topology,
    options: ConvergeOptions,
    startedAt: number,
  ): Promise<OperationReport> {
    let topology: Topology;
    try {
      topology = build();
    } catch (error) {
      if (error instanceof InvalidTopologyError) {
        return this.rejected(operation, error.violations, startedAt);
      }
      throw error;
    }

    const violations = validateTopology(topology);
    if (violations.length > 0) {
      return this.rejected(operation, violations, startedAt);
    }

    const plan = this.generator.generate(topology);
    this.store.setDesired(topology);

    const applied = this.store.getLastApplied();
    if (applied && applied.hash === plan.hash) {
      this.logger.log(`Plan ${plan.hash.substring(0, 12)} already applied; nothing to do`);
      return {
        operation,
        overall: 'Converged',
        perNode: plan.nodes.map((node) => this.newReport(node, targetStateFor(node.role))),
        elapsedMs: this.clock.now() - startedAt,
        planHash: plan.hash,
        unchanged: true,
        warnings: [],
      };
    }

    const warnings: string[] = [];
    const previous = await this.previousNodes(plan, warnings);
    const previousByName = new Map(previous.map((node) => [node.name, node]));
    const desiredNames = new Set(plan.nodes.map((node) => node.name));

    const reports = new Map<string, NodeReport>();
    for (const node of plan.nodes) {
      const report = this.newReport(node, node.role === 'coordinator' ? 'Stopped' : 'Unregistered');
      const before = previousByName.get(node.name);
      if (before && definitionChanged(before, node)) {
        const warning = `${node.name} definition changed while running; left untouched (remove and re-add to apply)`;
        report.warnings = [warning];
        this.logger.warn(warning);
      }
      reports.set(node.name, report);
    }

    const coordinator = plan.nodes.find((node) => node.role === 'coordinator');
    let coordinatorReady = true;
    if (coordinator) {
      coordinatorReady = await this.bringUpCoordinator(
        coordinator,
        previousByName.get(coordinator.name),
        plan,
        topology,
        this.reportFor(reports, coordinator),
        options.signal,
      );
    }

    const outcomes = await this.bringUpWorkers(
      plan.nodes.filter((node) => node.role === 'worker'),
      previousByName,
      topology,
      reports,
      coordinatorReady,
      options.signal,
    );

    // Removals only after additions, so capacity never dips below the current registered set
    const removed = previous
      .filter((node) => !desiredNames.has(node.name))
      .sort((a, b) => (a.role === b.role ? a.name.localeCompare(b.name) : a.role === 'worker' ? -1 : 1));
    const removalLimit = pLimit(this.parallelism(removed.length));
    const removalReports = await Promise.all(
      removed.map((node) =>
        removalLimit(() =>
          node.role === 'worker'
            ? this.removeNode(node, options.forceRemoval ?? false, options.signal)
            : this.stopCoordinator(node),
        ),
      ),
    );
    for (const report of removalReports) {
      reports.set(report.name, report);
    }

    let rebalance: RebalanceReport | undefined;
    const newlyRegistered = outcomes.filter((outcome) => outcome.state === 'Registered' && !outcome.alreadyRegistered);
    if ((options.rebalance ?? this.config.rebalanceOnAdd) && newlyRegistered.length > 0) {
      const registeredCount = outcomes.filter((outcome) => outcome.state === 'Registered').length;
      rebalance = await this.startRebalance(topology, registeredCount, warnings);
    }

    const perNode = [...reports.values()];
    const overall = overallFrom(perNode);

    if (overall === 'Converged') {
      this.store.setLastApplied({
        hash: plan.hash,
        topology,
        nodes: plan.nodes,
        appliedAt: new Date(this.clock.now()).toISOString(),
      });
    } else {
      this.store.clearLastApplied();
    }

    const report: OperationReport = {
      operation,
      overall,
      perNode,
      elapsedMs: this.clock.now() - startedAt,
      planHash: plan.hash,
      warnings,
    };
    if (rebalance) {
      report.rebalance = rebalance;
    }
    return report;
  }

  /**
   * Starts (when needed), probes and configures the coordinator.
   *
   * @returns Whether workers can be registered against it
   */
  private async bringUpCoordinator(
    definition: NodeDefinition,
    previous: PreviousNode | undefined,
    plan: GeneratedPlan,
    topology: Topology,
    report: NodeReport,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    if (!(await this.ensureStarted(definition, previous, report))) {
      return false;
    }
    try {
      await this.prober.waitUntilReady(this.probeTarget(definition, topology), { signal });
      await this.gateway.configureCluster({
        coordinatorHost: definition.host,
        coordinatorPort: definition.port,
        shardCount: plan.settings.shardCount,
        replicationFactor: plan.settings.replicationFactor,
      });
      report.achievedState = 'Running';
      return true;
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      this.markFailed(report, error);
      return false;
    }
  }

  /**
   * Starts new workers, probes those not yet live, then registers every started worker.
   */
  private async bringUpWorkers(
    workers: NodeDefinition[],
    previousByName: Map<string, PreviousNode>,
    topology: Topology,
    reports: Map<string, NodeReport>,
    coordinatorReady: boolean,
    signal: AbortSignal | undefined,
  ): Promise<RegistrationOutcome[]> {
    if (workers.length === 0) {
      return [];
    }
    const limit = pLimit(this.parallelism(workers.length));

    const started = await Promise.all(
      workers.map((worker) =>
        limit(() => this.ensureStarted(worker, previousByName.get(worker.name), this.reportFor(reports, worker))),
      ),
    );
    const pending = workers.filter((_, position) => started[position]);
    if (pending.length === 0) {
      return [];
    }

    const live = coordinatorReady ? await this.liveNodes() : null;
    if (!live) {
      const unavailable = new CoordinatorUnavailableError(
        'coordinator is not ready; worker registration was not attempted',
      );
      for (const worker of pending) {
        this.markFailed(this.reportFor(reports, worker), unavailable);
      }
      return [];
    }

    const isLive = (worker: NodeDefinition) =>
      live.some((node) => node.role === 'worker' && node.host === worker.host && node.port === worker.port);

    const ready = await Promise.all(
      pending.map((worker) =>
        limit(async () => {
          if (isLive(worker)) {
            return true;
          }
          try {
            await this.prober.waitUntilReady(this.probeTarget(worker, topology), { signal });
            return true;
          } catch (error) {
            if (error instanceof OperationCancelledError) {
              throw error;
            }
            this.markFailed(this.reportFor(reports, worker), error);
            return false;
          }
        }),
      ),
    );

    const refs: WorkerRef[] = pending
      .filter((_, position) => ready[position])
      .sort((a, b) => a.index - b.index)
      .map((worker) => ({ name: worker.name, identity: { host: worker.host, port: worker.port } }));

    const outcomes = await this.registration.registerWorkers(refs, {
      signal,
      parallelism: this.config.parallelism,
    });
    for (const outcome of outcomes) {
      const report = reports.get(outcome.name);
      if (!report) {
        continue;
      }
      report.achievedState = outcome.state;
      report.attempts = outcome.attempts;
      if (outcome.error) {
        report.error = outcome.error;
      }
    }
    return outcomes;
  }

  /**
   * @returns Whether the node is running afterwards; failures are written to `report`
   */
  private async ensureStarted(
    definition: NodeDefinition,
    previous: PreviousNode | undefined,
    report: NodeReport,
  ): Promise<boolean> {
    // Kept nodes are left alone unless the supervisor saw them stopped
    if (previous && (previous.status === undefined || previous.status === 'Running')) {
      return true;
    }
    try {
      await this.supervisor.start(definition);
      this.metricsService.increment(METRIC_PATHS.NODES_STARTED);
      this.emitNodeEvent(CLUSTER_EVENTS.NODE_STARTED, definition.name, definition.role);
      return true;
    } catch (error) {
      this.metricsService.increment(METRIC_PATHS.NODES_START_FAILURES);
      this.markFailed(report, error);
      return false;
    }
  }

  private async removeNode(node: PreviousNode, force: boolean, signal: AbortSignal | undefined): Promise<NodeReport> {
    const report: NodeReport = {
      name: node.name,
      role: node.role,
      identity: { host: node.host, port: node.port },
      targetState: 'Removed',
      achievedState: 'Registered',
    };

    const outcome = await this.registration.drainAndRemove(
      { name: node.name, identity: { host: node.host, port: node.port } },
      { force, signal },
    );
    report.achievedState = outcome.state;
    if (outcome.forced) {
      report.forced = true;
    }
    if (outcome.warnings.length > 0) {
      report.warnings = [...outcome.warnings];
    }
    if (outcome.error) {
      report.error = outcome.error;
      return report;
    }

    await this.stopNode(node, report);
    return report;
  }

  private async stopCoordinator(node: PreviousNode): Promise<NodeReport> {
    const report: NodeReport = {
      name: node.name,
      role: node.role,
      identity: { host: node.host, port: node.port },
      targetState: 'Stopped',
      achievedState: 'Running',
    };
    if (await this.stopNode(node, report)) {
      report.achievedState = 'Stopped';
    }
    return report;
  }

  private async stopNode(node: PreviousNode, report: NodeReport): Promise<boolean> {
    try {
      await this.supervisor.stop({
        id: node.handleId,
        name: node.name,
        role: node.role,
        host: node.host,
        port: node.port,
      });
      this.metricsService.increment(METRIC_PATHS.NODES_STOPPED);
      this.emitNodeEvent(CLUSTER_EVENTS.NODE_STOPPED, node.name, node.role);
      return true;
    } catch (error) {
      report.error = toReportedError(error);
      this.logger.error(`Stopping ${node.name} failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  private async startRebalance(
    topology: Topology,
    workerCount: number,
    warnings: string[],
  ): Promise<RebalanceReport> {
    const strategy = this.rebalanceService.chooseStrategy(topology.options.shardCountHint, workerCount);
    try {
      const started = await this.rebalanceService.start({ strategy, workerCount });
      return { strategy: started.strategy, jobId: started.jobId };
    } catch (error) {
      const warning = `Rebalance could not be started: ${getErrorMessage(error)}`;
      warnings.push(warning);
      this.logger.warn(warning);
      return { strategy, jobId: null, error: toReportedError(error) };
    }
  }

  /**
   * The node set to diff against: the last applied plan when it is for this cluster,
   * otherwise whatever the supervisor currently runs.
   */
  private async previousNodes(plan: GeneratedPlan, warnings: string[]): Promise<PreviousNode[]> {
    const applied = this.store.getLastApplied();
    if (applied && applied.topology.clusterName === plan.clusterName) {
      return applied.nodes.map((definition) => ({
        name: definition.name,
        role: definition.role,
        host: definition.host,
        port: definition.port,
        handleId: definition.containerName,
        definition,
      }));
    }

    try {
      const observed = await this.supervisor.list(plan.clusterName);
      return observed.map((node) => ({
        name: node.name,
        role: node.role,
        host: node.host,
        port: node.port,
        handleId: node.id,
        status: node.status,
      }));
    } catch (error) {
      const warning = `Could not list running nodes, treating the cluster as empty: ${getErrorMessage(error)}`;
      warnings.push(warning);
      this.logger.warn(warning);
      return [];
    }
  }

  private async findWorker(name: string): Promise<PreviousNode> {
    const topology = this.currentTopology();
    if (validateTopology(topology).length === 0) {
      const definition = this.generator
        .generate(topology)
        .nodes.find((node) => node.role === 'worker' && node.name === name);
      if (definition) {
        return {
          name: definition.name,
          role: definition.role,
          host: definition.host,
          port: definition.port,
          handleId: definition.containerName,
          definition,
        };
      }
    }

    const observed = await this.supervisor.list(topology.clusterName);
    const node = observed.find((candidate) => candidate.role === 'worker' && candidate.name === name);
    if (!node) {
      throw new UnknownWorkerError(name);
    }
    return { name: node.name, role: node.role, host: node.host, port: node.port, handleId: node.id, status: node.status };
  }

  private async liveNodes(): Promise<LiveNode[] | null> {
    try {
      return await this.gateway.listNodes();
    } catch (error) {
      this.logger.error(`Coordinator node list unavailable: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private rejected(operation: LifecycleOperation, violations: string[], startedAt: number): OperationReport {
    this.logger.warn(`Topology rejected: ${violations.join('; ')}`);
    this.metricsService.increment(METRIC_PATHS.OPERATIONS_REJECTED);
    return {
      operation,
      overall: 'Failed',
      perNode: [],
      elapsedMs: this.clock.now() - startedAt,
      rejected: { code: 'INVALID_TOPOLOGY', violations },
      warnings: [],
    };
  }

  private finish(report: OperationReport): void {
    const outcomeMetric =
      report.overall === 'Converged'
        ? METRIC_PATHS.OPERATIONS_CONVERGED
        : report.overall === 'PartiallyConverged'
          ? METRIC_PATHS.OPERATIONS_PARTIALLY_CONVERGED
          : METRIC_PATHS.OPERATIONS_FAILED;
    this.metricsService.increment(outcomeMetric);
    if (report.unchanged) {
      this.metricsService.increment(METRIC_PATHS.OPERATIONS_UNCHANGED);
    }
    this.metricsService.recordOperationDuration(report.elapsedMs);

    const failedNodes = report.perNode.filter(isFailedReport).map((node) => node.name);
    if (failedNodes.length > 0) {
      this.logger.warn(`Operation ${report.operation}: ${report.overall}; failed nodes: ${failedNodes.join(', ')}`);
    } else {
      this.logger.log(`Operation ${report.operation}: ${report.overall} in ${report.elapsedMs}ms`);
    }

    const event: OperationCompletedEvent = {
      type: CLUSTER_EVENTS.OPERATION_COMPLETED,
      operation: report.operation,
      overall: report.overall,
      elapsedMs: report.elapsedMs,
      failedNodes,
      timestamp: new Date(this.clock.now()).toISOString(),
    };
    if (report.planHash) {
      event.planHash = report.planHash;
    }
    this.eventEmitter.emit(CLUSTER_EVENTS.OPERATION_COMPLETED, event);
  }

  private emitNodeEvent(type: NodeLifecycleEvent['type'], node: string, role: NodeRole): void {
    const event: NodeLifecycleEvent = { type, node, role, timestamp: new Date(this.clock.now()).toISOString() };
    this.eventEmitter.emit(type, event);
  }

  private markFailed(report: NodeReport, error: unknown): void {
    report.achievedState = 'Failed';
    report.error = toReportedError(error);
    this.logger.error(`${report.name}: ${getErrorMessage(error)}`);
  }

  private newReport(definition: NodeDefinition, achievedState: NodeState): NodeReport {
    return {
      name: definition.name,
      role: definition.role,
      identity: { host: definition.host, port: definition.port },
      targetState: targetStateFor(definition.role),
      achievedState,
    };
  }

  private reportFor(reports: Map<string, NodeReport>, definition: NodeDefinition): NodeReport {
    const report = reports.get(definition.name);
    if (report) {
      return report;
    }
    const created = this.newReport(definition, 'Unregistered');
    reports.set(definition.name, created);
    return created;
  }

  private probeTarget(definition: NodeDefinition, topology: Topology): ProbeTarget {
    return {
      name: definition.name,
      role: definition.role,
      identity: { host: definition.host, port: definition.port },
      credentials: { ...topology.credentials },
    };
  }

  private parallelism(count: number): number {
    if (this.config.parallelism > 0) {
      return this.config.parallelism;
    }
    return Math.max(1, count);
  }
}
