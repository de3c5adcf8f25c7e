import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';
import type { Topology } from '../topology/interfaces';
import { COORDINATOR_NODE_NAME, resolveWorkerAddress, workerName } from '../topology/topology.validator';
import { canonicalJson, type JsonValue } from './canonical-json';
import {
  LABEL_CLUSTER,
  LABEL_HOST,
  LABEL_INDEX,
  LABEL_NODE,
  LABEL_PORT,
  LABEL_ROLE,
  REDACTED_VALUE,
  SECRET_ENVIRONMENT_KEYS,
} from './generator.constants';
import { GeneratorInconsistencyError } from './generator.errors';
import type { GeneratedPlan, NodeDefinition, PlanSettings } from './interfaces';

/**
 * Container name of a node: `<cluster>-<node>`.
 */
export function containerName(clusterName: string, nodeName: string): string {
  return `${clusterName}-${nodeName}`;
}

interface NodePlacement {
  name: string;
  role: NodeDefinition['role'];
  index: number;
  host: string;
  port: number;
}

/**
 * Turns a validated Topology into node definitions and a content hash.
 *
 * Pure: no I/O, no clock, no randomness. Two calls with equal topologies return
 * byte-identical `serialized` output and the same `hash`.
 */
@Injectable()
export class GeneratorService {
  /**
   * @throws {GeneratorInconsistencyError} If the output would contain duplicate names or addresses
   */
  generate(topology: Topology): GeneratedPlan {
    const placements: NodePlacement[] = [];

    if (topology.coordinator) {
      placements.push({
        name: COORDINATOR_NODE_NAME,
        role: 'coordinator',
        index: 0,
        host: topology.coordinator.host,
        port: topology.coordinator.port,
      });
    }

    const workers = [...topology.workers].sort((a, b) => a.index - b.index);
    for (const worker of workers) {
      const address = resolveWorkerAddress(topology, worker);
      placements.push({ name: workerName(worker.index), role: 'worker', index: worker.index, ...address });
    }

    const nodes = placements.map((placement) => this.buildDefinition(topology, placement));
    this.assertConsistent(nodes);

    const settings: PlanSettings = {};
    if (topology.options.shardCountHint !== undefined) settings.shardCount = topology.options.shardCountHint;
    if (topology.options.replicationFactor !== undefined) {
      settings.replicationFactor = topology.options.replicationFactor;
    }

    const serialized = canonicalJson(this.toDocument(topology.clusterName, nodes, settings));
    const hash = createHash('sha256').update(serialized).digest('hex');

    return { clusterName: topology.clusterName, nodes, settings, serialized, hash };
  }

  /**
   * Copy of a definition with secret environment values masked, for API responses and exports.
   */
  redact(definition: NodeDefinition): NodeDefinition {
    const environment: Record<string, string> = {};
    for (const [key, value] of Object.entries(definition.environment)) {
      environment[key] = SECRET_ENVIRONMENT_KEYS.includes(key) ? REDACTED_VALUE : value;
    }
    return { ...definition, environment, ports: [...definition.ports], labels: { ...definition.labels } };
  }

  private buildDefinition(topology: Topology, placement: NodePlacement): NodeDefinition {
    const { credentials } = topology;

    // The engine listens on the published port inside the container too, so the
    // address other nodes dial on the shared network matches the registered identity.
    const environment: Record<string, string> = {
      PGPORT: String(placement.port),
      POSTGRES_DB: credentials.database,
      POSTGRES_PASSWORD: credentials.password,
      POSTGRES_USER: credentials.user,
      SHP_NODE_NAME: placement.name,
      SHP_NODE_ROLE: placement.role,
    };

    return {
      name: placement.name,
      containerName: containerName(topology.clusterName, placement.name),
      role: placement.role,
      index: placement.index,
      host: placement.host,
      port: placement.port,
      image: topology.options.image,
      environment,
      ports: [{ containerPort: placement.port, hostPort: placement.port }],
      labels: {
        [LABEL_CLUSTER]: topology.clusterName,
        [LABEL_HOST]: placement.host,
        [LABEL_INDEX]: String(placement.index),
        [LABEL_NODE]: placement.name,
        [LABEL_PORT]: String(placement.port),
        [LABEL_ROLE]: placement.role,
      },
      dependsOn: [],
    };
  }

  private assertConsistent(nodes: NodeDefinition[]): void {
    const names = new Set<string>();
    const addresses = new Set<string>();
    for (const node of nodes) {
      if (names.has(node.name)) {
        throw new GeneratorInconsistencyError(`duplicate node name "${node.name}" in generated plan`);
      }
      const address = `${node.host}:${node.port}`;
      if (addresses.has(address)) {
        throw new GeneratorInconsistencyError(`duplicate node address ${address} in generated plan`);
      }
      names.add(node.name);
      addresses.add(address);
    }
  }

  private toDocument(clusterName: string, nodes: NodeDefinition[], settings: PlanSettings): JsonValue {
    const settingsDocument: { [key: string]: JsonValue } = {};
    if (settings.shardCount !== undefined) settingsDocument.shardCount = settings.shardCount;
    if (settings.replicationFactor !== undefined) settingsDocument.replicationFactor = settings.replicationFactor;

    return {
      clusterName,
      settings: settingsDocument,
      nodes: nodes.map((node) => ({
        name: node.name,
        containerName: node.containerName,
        role: node.role,
        index: node.index,
        host: node.host,
        port: node.port,
        image: node.image,
        environment: { ...node.environment },
        ports: node.ports.map((binding) => ({
          containerPort: binding.containerPort,
          hostPort: binding.hostPort,
        })),
        labels: { ...node.labels },
        dependsOn: [...node.dependsOn],
      })),
    };
  }
}
