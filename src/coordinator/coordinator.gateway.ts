import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import pLimit from 'p-limit';
import { getErrorMessage } from '../shared/error.utils';
import {
  COORDINATOR_CLIENT,
  type ClusterSettings,
  type CoordinatorClient,
  type LiveNode,
  type RebalanceJobState,
  type RebalanceStrategy,
} from './interfaces';

/**
 * Single entry point for coordinator commands.
 *
 * The coordinator's metadata is one shared resource, so every command is queued behind
 * the previous one, including read-only queries issued from concurrent worker pipelines.
 */
@Injectable()
export class CoordinatorGateway implements OnModuleDestroy {
  private readonly logger = new Logger(CoordinatorGateway.name);
  private readonly queue = pLimit(1);

  constructor(@Inject(COORDINATOR_CLIENT) private readonly client: CoordinatorClient) {}

  listNodes(): Promise<LiveNode[]> {
    return this.issue('listNodes', () => this.client.listNodes(), true);
  }

  registerNode(host: string, port: number): Promise<void> {
    return this.issue(`registerNode ${host}:${port}`, () => this.client.registerNode(host, port));
  }

  drainNode(host: string, port: number): Promise<void> {
    return this.issue(`drainNode ${host}:${port}`, () => this.client.drainNode(host, port));
  }

  shardPlacementCount(host: string, port: number): Promise<number> {
    return this.issue(`shardPlacementCount ${host}:${port}`, () => this.client.shardPlacementCount(host, port), true);
  }

  removeNode(host: string, port: number, force: boolean): Promise<void> {
    return this.issue(`removeNode ${host}:${port} force=${force}`, () => this.client.removeNode(host, port, force));
  }

  rebalance(strategy: RebalanceStrategy): Promise<string | null> {
    return this.issue(`rebalance ${strategy}`, () => this.client.rebalance(strategy));
  }

  rebalanceStatus(jobId: string): Promise<RebalanceJobState> {
    return this.issue(`rebalanceStatus ${jobId}`, () => this.client.rebalanceStatus(jobId), true);
  }

  checkConnection(host: string, port: number): Promise<boolean> {
    return this.issue(`checkConnection ${host}:${port}`, () => this.client.checkConnection(host, port), true);
  }

  configureCluster(settings: ClusterSettings): Promise<void> {
    return this.issue(`configureCluster ${settings.coordinatorHost}:${settings.coordinatorPort}`, () =>
      this.client.configureCluster(settings),
    );
  }

  /** Commands still waiting for the coordinator, excluding the one in flight. */
  get pendingCommands(): number {
    return this.queue.pendingCount;
  }

  async onModuleDestroy(): Promise<void> {
    try {
      await this.client.close();
    } catch (error) {
      this.logger.warn(`Failed to close coordinator connection: ${getErrorMessage(error)}`);
    }
  }

  private issue<T>(description: string, command: () => Promise<T>, readOnly = false): Promise<T> {
    return this.queue(async () => {
      if (readOnly) {
        this.logger.debug(`Coordinator query: ${description}`);
      } else {
        this.logger.log(`Coordinator command: ${description}`);
      }
      try {
        return await command();
      } catch (error) {
        this.logger.warn(`Coordinator ${readOnly ? 'query' : 'command'} failed: ${description}: ${getErrorMessage(error)}`);
        throw error;
      }
    });
  }
}
