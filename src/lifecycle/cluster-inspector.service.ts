import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Readable } from 'stream';
import { CoordinatorGateway } from '../coordinator/coordinator.gateway';
import type { LiveNode } from '../coordinator/interfaces';
import { GeneratorService } from '../generator/generator.service';
import { serializePlan, toExportedPlan, type PlanFormat } from '../generator/plan.serializer';
import { getErrorMessage } from '../shared/error.utils';
import { NODE_SUPERVISOR, type NodeSupervisor, type ObservedNode } from '../supervisor/interfaces';
import { assertValidTopology } from '../topology/topology.validator';
import type { ClusterNodeView, ClusterNodesView, ExportedPlanDocument } from './interfaces';
import { LifecycleService } from './lifecycle.service';

/**
 * Read-only views of the cluster: the generated plan, the merged node list and node logs.
 */
@Injectable()
export class ClusterInspectorService {
  private readonly logger = new Logger(ClusterInspectorService.name);

  constructor(
    private readonly lifecycle: LifecycleService,
    private readonly generator: GeneratorService,
    private readonly gateway: CoordinatorGateway,
    @Inject(NODE_SUPERVISOR) private readonly supervisor: NodeSupervisor,
  ) {}

  /**
   * The plan for the current topology with secrets masked.
   *
   * @throws {InvalidTopologyError} If the current topology does not validate
   */
  exportPlan(format: PlanFormat): ExportedPlanDocument {
    const topology = this.lifecycle.currentTopology();
    assertValidTopology(topology);
    const plan = this.generator.generate(topology);
    const redacted = plan.nodes.map((node) => this.generator.redact(node));
    return {
      hash: plan.hash,
      contentType: format === 'yaml' ? 'application/yaml' : 'application/json',
      body: serializePlan(toExportedPlan(plan, redacted), format),
    };
  }

  /**
   * Supervisor view merged with the coordinator's live node list. Either side may be
   * unreachable; the view says which.
   */
  async describeNodes(): Promise<ClusterNodesView> {
    const clusterName = this.lifecycle.currentTopology().clusterName;

    let live: LiveNode[] = [];
    let coordinatorReachable = true;
    try {
      live = await this.gateway.listNodes();
    } catch (error) {
      coordinatorReachable = false;
      this.logger.warn(`Coordinator node list unavailable: ${getErrorMessage(error)}`);
    }

    let observed: ObservedNode[] = [];
    let supervisorReachable = true;
    try {
      observed = await this.supervisor.list(clusterName);
    } catch (error) {
      supervisorReachable = false;
      this.logger.warn(`Supervisor node list unavailable: ${getErrorMessage(error)}`);
    }

    const nodes: ClusterNodeView[] = observed.map((node) => {
      const match = live.find((candidate) => candidate.host === node.host && candidate.port === node.port);
      return {
        name: node.name,
        role: node.role,
        host: node.host,
        port: node.port,
        status: node.status,
        registered: match !== undefined,
        active: match?.active ?? false,
      };
    });

    // Registered on the coordinator but not run by this supervisor (external or foreign nodes)
    for (const node of live) {
      if (!nodes.some((view) => view.host === node.host && view.port === node.port)) {
        nodes.push({
          name: `${node.host}:${node.port}`,
          role: node.role,
          host: node.host,
          port: node.port,
          status: 'Unknown',
          registered: true,
          active: node.active,
        });
      }
    }

    return { clusterName, coordinatorReachable, supervisorReachable, nodes };
  }

  /**
   * @returns `null` when the supervisor runs no node of that name
   */
  async nodeLogs(name: string, tail?: number): Promise<Readable | null> {
    const clusterName = this.lifecycle.currentTopology().clusterName;
    const node = (await this.supervisor.list(clusterName)).find((candidate) => candidate.name === name);
    if (!node) {
      return null;
    }
    return this.supervisor.logs(node, tail !== undefined ? { tail } : {});
  }
}
