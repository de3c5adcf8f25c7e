import { isValidClusterName, isValidHost, isValidPort } from '../config/config.validators';
import { InvalidTopologyError } from './topology.errors';
import type { NodeIdentity, NodeRole, Topology, WorkerSpec } from './interfaces';

export const COORDINATOR_NODE_NAME = 'coordinator';

export function workerName(index: number): string {
  return `worker-${index}`;
}

/**
 * Address a worker is started on and registered under.
 */
export function resolveWorkerAddress(topology: Topology, worker: WorkerSpec): NodeIdentity {
  return {
    host: worker.host ?? workerName(worker.index),
    port: worker.port ?? topology.portBase + worker.index,
  };
}

interface PlacedNode {
  name: string;
  role: NodeRole;
  host: string;
  port: number;
}

function placedNodes(topology: Topology): PlacedNode[] {
  const nodes: PlacedNode[] = [];
  if (topology.coordinator) {
    nodes.push({
      name: COORDINATOR_NODE_NAME,
      role: 'coordinator',
      host: topology.coordinator.host,
      port: topology.coordinator.port,
    });
  }
  for (const worker of topology.workers) {
    const address = resolveWorkerAddress(topology, worker);
    nodes.push({ name: workerName(worker.index), role: 'worker', ...address });
  }
  return nodes;
}

function collisionKey(topology: Topology, node: PlacedNode): string {
  return topology.placement === 'single-host' ? String(node.port) : `${node.host}:${node.port}`;
}

/**
 * Collects every reason the topology is malformed. Pure; performs no I/O.
 */
export function validateTopology(topology: Topology): string[] {
  const violations: string[] = [];

  if (!isValidClusterName(topology.clusterName)) {
    violations.push(
      `cluster name "${topology.clusterName}" must be lowercase alphanumerics, '-', '_' or '.', starting with a letter or digit`,
    );
  }

  topology.workers.forEach((worker, position) => {
    if (worker.index !== position + 1) {
      violations.push(
        `worker at position ${position + 1} has index ${worker.index}; indices must be contiguous 1..${topology.workers.length}`,
      );
    }
    if (topology.placement === 'multi-host' && !worker.host) {
      violations.push(`${workerName(worker.index)} has no host; multi-host placement needs an explicit host per worker`);
    }
  });

  const nodes = placedNodes(topology);
  const owners = new Map<string, string[]>();

  for (const node of nodes) {
    if (!isValidPort(node.port)) {
      violations.push(`${node.name} port ${node.port} is outside 1..65535`);
    }
    if (!isValidHost(node.host)) {
      violations.push(`${node.name} host "${node.host}" is not a valid host name`);
    }
    const key = collisionKey(topology, node);
    owners.set(key, [...(owners.get(key) ?? []), node.name]);
  }

  for (const [key, names] of owners) {
    if (names.length > 1) {
      violations.push(`port ${key} is shared by ${names.join(', ')}`);
    }
  }

  if (topology.coordinator) {
    const { user, password, database } = topology.credentials;
    const missing = Object.entries({ user, password, database })
      .filter(([, value]) => !value || !value.trim())
      .map(([field]) => field);
    if (missing.length > 0) {
      violations.push(`credentials ${missing.join(', ')} must not be empty when a coordinator is declared`);
    }
  }

  const { shardCountHint, replicationFactor } = topology.options;
  if (shardCountHint !== undefined && (!Number.isInteger(shardCountHint) || shardCountHint < 1)) {
    violations.push(`shardCountHint must be a positive integer (received ${shardCountHint})`);
  }
  if (replicationFactor !== undefined && (!Number.isInteger(replicationFactor) || replicationFactor < 1)) {
    violations.push(`replicationFactor must be a positive integer (received ${replicationFactor})`);
  }
  if (!topology.options.image.trim()) {
    violations.push('node image must not be empty');
  }

  return violations;
}

/**
 * @throws {InvalidTopologyError} If any violation is found
 */
export function assertValidTopology(topology: Topology): void {
  const violations = validateTopology(topology);
  if (violations.length > 0) {
    throw new InvalidTopologyError(violations);
  }
}
