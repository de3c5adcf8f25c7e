import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { TopologyConfig } from '../config/config.types';
import { InvalidTopologyError } from './topology.errors';
import type { Topology, TopologyOverrides, WorkerSpec } from './interfaces';

/**
 * Builds Topology values from the configured declaration and per-call overrides.
 * Construction only; `validateTopology` decides whether the result is well-formed.
 */
@Injectable()
export class TopologyService {
  constructor(private readonly configService: ConfigService) {}

  private get config(): TopologyConfig {
    const config = this.configService.get<TopologyConfig>('shardplane.topology');
    if (!config) {
      throw new Error('Topology configuration is not loaded');
    }
    return config;
  }

  /**
   * The topology declared through SHP_* environment variables.
   */
  declared(): Topology {
    const config = this.config;
    return {
      clusterName: config.clusterName,
      placement: config.workerHosts.length > 0 ? 'multi-host' : 'single-host',
      coordinator: config.coordinatorEnabled ? { host: config.coordinatorHost, port: config.coordinatorPort } : undefined,
      workers: this.buildWorkers(config.workerCount, config.workerHosts),
      credentials: { ...config.credentials },
      portBase: config.portBase,
      options: {
        image: config.image,
        shardCountHint: config.shardCountHint,
        replicationFactor: config.replicationFactor,
      },
    };
  }

  /**
   * Applies overrides on top of `base` (the declared topology by default).
   *
   * `coordinator: null` drops the coordinator (worker-only topology). Explicit `workers`
   * win over `workerCount`.
   *
   * @throws {InvalidTopologyError} If `workerCount` is negative
   */
  resolve(overrides: TopologyOverrides = {}, base: Topology = this.declared()): Topology {
    if (overrides.workerCount !== undefined && overrides.workerCount < 0) {
      throw new InvalidTopologyError([`worker count must not be negative (received ${overrides.workerCount})`]);
    }

    const coordinator =
      overrides.coordinator === null ? undefined : (overrides.coordinator ?? base.coordinator);

    let workers = base.workers;
    if (overrides.workers) {
      workers = overrides.workers.map((worker) => ({ ...worker }));
    } else if (overrides.workerCount !== undefined) {
      workers = this.resizeWorkers(base.workers, overrides.workerCount);
    }

    return {
      clusterName: overrides.clusterName ?? base.clusterName,
      placement: overrides.placement ?? base.placement,
      coordinator: coordinator ? { ...coordinator } : undefined,
      workers,
      credentials: { ...base.credentials, ...overrides.credentials },
      portBase: overrides.portBase ?? base.portBase,
      options: {
        image: overrides.image ?? base.options.image,
        shardCountHint: overrides.shardCountHint ?? base.options.shardCountHint,
        replicationFactor: overrides.replicationFactor ?? base.options.replicationFactor,
      },
    };
  }

  /**
   * `base` plus one worker at the next index. A supplied index must be exactly that next index.
   *
   * @throws {InvalidTopologyError} If the supplied index would leave a gap or reuse an index
   */
  withWorker(base: Topology, spec: Partial<WorkerSpec> = {}): Topology {
    const nextIndex = base.workers.length + 1;
    if (spec.index !== undefined && spec.index !== nextIndex) {
      throw new InvalidTopologyError([
        `new worker must take index ${nextIndex} to keep indices contiguous (received ${spec.index})`,
      ]);
    }
    const worker: WorkerSpec = { index: nextIndex };
    if (spec.port !== undefined) worker.port = spec.port;
    if (spec.host !== undefined) worker.host = spec.host;
    return { ...base, workers: [...base.workers, worker] };
  }

  /**
   * `base` with workers 1..count; shrinking drops the highest indices.
   *
   * @throws {InvalidTopologyError} If `count` is negative
   */
  withWorkerCount(base: Topology, count: number): Topology {
    return this.resolve({ workerCount: count }, base);
  }

  private resizeWorkers(current: WorkerSpec[], count: number): WorkerSpec[] {
    if (count <= current.length) {
      return current.slice(0, count).map((worker) => ({ ...worker }));
    }
    const hosts = this.config.workerHosts;
    const added = this.buildWorkers(count, hosts).slice(current.length);
    return [...current.map((worker) => ({ ...worker })), ...added];
  }

  private buildWorkers(count: number, hosts: string[]): WorkerSpec[] {
    return Array.from({ length: count }, (_, position) => {
      const index = position + 1;
      const host = hosts[position];
      return host !== undefined ? { index, host } : { index };
    });
  }
}
