import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Docker, { type ContainerCreateOptions, type ContainerInfo } from 'dockerode';
import { PassThrough, Readable } from 'stream';
import type { SupervisorConfig } from '../config/config.types';
import {
  LABEL_CLUSTER,
  LABEL_HOST,
  LABEL_NODE,
  LABEL_PORT,
  LABEL_ROLE,
} from '../generator/generator.constants';
import type { NodeDefinition } from '../generator/interfaces';
import { getErrorMessage, getStatusCode } from '../shared/error.utils';
import type { LogOptions, NodeHandle, NodeStatus, NodeSupervisor, ObservedNode } from './interfaces';
import { SupervisorError } from './supervisor.errors';

const STOPPED_STATES = ['created', 'exited', 'dead'];

/**
 * Runs cluster nodes as Docker containers named `<cluster>-<node>` and labelled with
 * their cluster, name, role, index, host and port, so the node set can be re-derived
 * from Docker alone after a restart.
 */
@Injectable()
export class DockerNodeSupervisor implements NodeSupervisor {
  private readonly logger = new Logger(DockerNodeSupervisor.name);
  private readonly docker: Docker;
  private readonly config: SupervisorConfig;

  constructor(configService: ConfigService) {
    const config = configService.get<SupervisorConfig>('shardplane.supervisor');
    if (!config) {
      throw new Error('Supervisor configuration is not loaded');
    }
    this.config = config;
    this.docker = config.dockerSocket ? new Docker({ socketPath: config.dockerSocket }) : new Docker();
  }

  async start(definition: NodeDefinition): Promise<NodeHandle> {
    const existing = await this.inspectByName(definition.containerName);

    if (existing?.State.Running) {
      this.logger.log(`${definition.name} already running (cid=${existing.Id.substring(0, 12)})`);
      return this.toHandle(existing.Id, definition);
    }

    try {
      if (existing) {
        this.logger.log(`Restarting stopped container ${definition.containerName}`);
        await this.docker.getContainer(existing.Id).start();
        return this.toHandle(existing.Id, definition);
      }

      await this.ensureImage(definition.image);
      const container = await this.docker.createContainer(this.buildCreateOptions(definition));
      await container.start();
      this.logger.log(`Started ${definition.name} as ${definition.containerName} (cid=${container.id.substring(0, 12)})`);
      return this.toHandle(container.id, definition);
    } catch (error) {
      throw new SupervisorError(definition.name, `start failed: ${getErrorMessage(error)}`);
    }
  }

  async stop(handle: NodeHandle): Promise<void> {
    this.logger.log(`Stopping ${handle.name} (timeout=${this.config.stopTimeoutSeconds}s)`);
    try {
      await this.docker.getContainer(handle.id).stop({ t: this.config.stopTimeoutSeconds });
    } catch (error) {
      const statusCode = getStatusCode(error);
      if (statusCode === 304 || statusCode === 404) {
        this.logger.debug(`${handle.name} already stopped`);
        return;
      }
      throw new SupervisorError(handle.name, `stop failed: ${getErrorMessage(error)}`);
    }
  }

  async status(handle: NodeHandle): Promise<NodeStatus> {
    try {
      const info = await this.docker.getContainer(handle.id).inspect();
      return info.State.Running ? 'Running' : 'Stopped';
    } catch (error) {
      if (getStatusCode(error) === 404) {
        return 'Stopped';
      }
      this.logger.warn(`Status of ${handle.name} unavailable: ${getErrorMessage(error)}`);
      return 'Unknown';
    }
  }

  async logs(handle: NodeHandle, options: LogOptions = {}): Promise<Readable> {
    let raw: Buffer;
    try {
      raw = await this.docker.getContainer(handle.id).logs({
        stdout: true,
        stderr: true,
        follow: false,
        ...(options.tail !== undefined ? { tail: options.tail } : {}),
      });
    } catch (error) {
      throw new SupervisorError(handle.name, `logs unavailable: ${getErrorMessage(error)}`);
    }

    // Non-TTY containers multiplex stdout and stderr behind 8-byte frame headers
    const output = new PassThrough();
    const source = Readable.from([raw]);
    source.on('end', () => output.end());
    source.on('error', (error) => output.destroy(error));
    this.docker.modem.demuxStream(source, output, output);
    return output;
  }

  async list(clusterName: string): Promise<ObservedNode[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [`${LABEL_CLUSTER}=${clusterName}`] },
    });

    const nodes: ObservedNode[] = [];
    for (const container of containers) {
      const node = this.fromContainerInfo(container);
      if (node) {
        nodes.push(node);
      } else {
        this.logger.warn(`Ignoring container ${container.Id.substring(0, 12)} with incomplete node labels`);
      }
    }
    return nodes.sort((a, b) => a.name.localeCompare(b.name));
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }

  private async inspectByName(name: string) {
    try {
      return await this.docker.getContainer(name).inspect();
    } catch (error) {
      if (getStatusCode(error) === 404) {
        return undefined;
      }
      throw new SupervisorError(name, `inspect failed: ${getErrorMessage(error)}`);
    }
  }

  /** Pull an image if it's not already present locally. */
  private async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch {
      this.logger.log(`Image '${image}' not found locally. Pulling...`);
    }

    const stream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (error: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.log(`Finished pulling image '${image}'`);
        resolve();
      });
    });
  }

  private buildCreateOptions(definition: NodeDefinition): ContainerCreateOptions {
    const exposedPorts: Record<string, object> = {};
    const portBindings: Record<string, Array<{ HostPort: string }>> = {};
    for (const binding of definition.ports) {
      const key = `${binding.containerPort}/tcp`;
      exposedPorts[key] = {};
      portBindings[key] = [{ HostPort: String(binding.hostPort) }];
    }

    const options: ContainerCreateOptions = {
      name: definition.containerName,
      Image: definition.image,
      Hostname: definition.host,
      Env: Object.entries(definition.environment).map(([key, value]) => `${key}=${value}`),
      Labels: definition.labels,
      ExposedPorts: exposedPorts,
      HostConfig: {
        PortBindings: portBindings,
        RestartPolicy: { Name: 'unless-stopped' },
        NetworkMode: this.config.network,
      },
    };

    if (this.config.network) {
      options.NetworkingConfig = {
        EndpointsConfig: { [this.config.network]: { Aliases: [definition.host] } },
      };
    }
    return options;
  }

  private toHandle(id: string, definition: NodeDefinition): NodeHandle {
    return { id, name: definition.name, role: definition.role, host: definition.host, port: definition.port };
  }

  private fromContainerInfo(container: ContainerInfo): ObservedNode | undefined {
    const labels = container.Labels;
    const name = labels[LABEL_NODE];
    const role = labels[LABEL_ROLE];
    const host = labels[LABEL_HOST];
    const port = Number(labels[LABEL_PORT]);

    if (!name || !host || !Number.isInteger(port) || (role !== 'coordinator' && role !== 'worker')) {
      return undefined;
    }

    return {
      id: container.Id,
      name,
      role,
      host,
      port,
      status: this.toStatus(container.State),
    };
  }

  private toStatus(state: string): NodeStatus {
    if (state === 'running') {
      return 'Running';
    }
    return STOPPED_STATES.includes(state) ? 'Stopped' : 'Unknown';
  }
}
