import { Readable } from 'stream';
import type { NodeDefinition } from '../../src/generator/interfaces';
import { SupervisorError } from '../../src/supervisor/supervisor.errors';
import type {
  LogOptions,
  NodeHandle,
  NodeStatus,
  NodeSupervisor,
  ObservedNode,
} from '../../src/supervisor/interfaces';

/**
 * In-memory supervisor keyed by container name. Stopped nodes stay listed, as containers do.
 */
export class FakeNodeSupervisor implements NodeSupervisor {
  readonly calls: string[] = [];
  readonly nodes = new Map<string, ObservedNode>();
  readonly started: NodeDefinition[] = [];
  /** Node names whose `start` fails. */
  readonly startFailures = new Set<string>();
  reachable = true;

  /** Seeds a node as if a previous process had started it. */
  seed(clusterName: string, node: Omit<ObservedNode, 'id'>): void {
    const id = `${clusterName}-${node.name}`;
    this.nodes.set(id, { ...node, id });
  }

  callCount(method?: string): number {
    return method ? this.calls.filter((call) => call.startsWith(`${method}:`)).length : this.calls.length;
  }

  async start(definition: NodeDefinition): Promise<NodeHandle> {
    this.calls.push(`start:${definition.name}`);
    if (this.startFailures.has(definition.name)) {
      throw new SupervisorError(definition.name, 'start failed: image not found');
    }
    const node: ObservedNode = {
      id: definition.containerName,
      name: definition.name,
      role: definition.role,
      host: definition.host,
      port: definition.port,
      status: 'Running',
    };
    this.nodes.set(node.id, node);
    this.started.push(definition);
    return { id: node.id, name: node.name, role: node.role, host: node.host, port: node.port };
  }

  async stop(handle: NodeHandle): Promise<void> {
    this.calls.push(`stop:${handle.name}`);
    const node = this.nodes.get(handle.id);
    if (node) {
      node.status = 'Stopped';
    }
  }

  async status(handle: NodeHandle): Promise<NodeStatus> {
    this.calls.push(`status:${handle.name}`);
    return this.nodes.get(handle.id)?.status ?? 'Stopped';
  }

  async logs(handle: NodeHandle, options: LogOptions = {}): Promise<Readable> {
    this.calls.push(`logs:${handle.name}`);
    const lines = ['database system is ready to accept connections\n', `node ${handle.name} listening on ${handle.port}\n`];
    return Readable.from(options.tail !== undefined ? lines.slice(-options.tail) : lines);
  }

  async list(clusterName: string): Promise<ObservedNode[]> {
    this.calls.push(`list:${clusterName}`);
    if (!this.reachable) {
      throw new Error('connect ENOENT /var/run/docker.sock');
    }
    return [...this.nodes.values()]
      .filter((node) => node.id.startsWith(`${clusterName}-`))
      .map((node) => ({ ...node }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async ping(): Promise<void> {
    if (!this.reachable) {
      throw new Error('connect ENOENT /var/run/docker.sock');
    }
  }
}
