import { Logger } from '@nestjs/common';
import { Pool } from 'pg';
import { getErrorMessage } from '../shared/error.utils';
import {
  CoordinatorCommandError,
  RegistrationConflictError,
  RegistrationTransientError,
} from './coordinator.errors';
import type {
  ClusterSettings,
  CoordinatorClient,
  CoordinatorConnectionConfig,
  LiveNode,
  RebalanceJobState,
  RebalanceStrategy,
} from './interfaces';
import { classifyPgError } from './pg-error.utils';

type NodeRow = {
  nodename: string;
  nodeport: number;
  isactive: boolean;
  groupid: number;
};

type PlacementCountRow = { placements: number };
type JobIdRow = { job_id: string | null };
type JobStateRow = { state: string };
type ConnectionCheckRow = { connected: boolean };

const JOB_STATES: Record<string, RebalanceJobState> = {
  scheduled: 'Pending',
  running: 'Running',
  cancelling: 'Running',
  failing: 'Running',
  finished: 'Done',
  failed: 'Failed',
  cancelled: 'Failed',
};

/**
 * Coordinator command surface of a Citus cluster, issued as SQL over a small `pg` pool.
 */
export class CitusCoordinatorClient implements CoordinatorClient {
  private readonly logger = new Logger(CitusCoordinatorClient.name);
  private readonly pool: Pool;

  constructor(config: CoordinatorConnectionConfig, pool?: Pool) {
    this.pool =
      pool ??
      new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        connectionTimeoutMillis: config.connectTimeout,
        max: 2,
      });

    // Idle clients can error when the coordinator restarts; the next query reconnects
    this.pool.on('error', (error) => {
      this.logger.warn(`Idle coordinator connection error: ${error.message}`);
    });
  }

  async listNodes(): Promise<LiveNode[]> {
    const result = await this.run('listNodes', () =>
      this.pool.query<NodeRow>(
        'SELECT nodename, nodeport, isactive, groupid FROM pg_dist_node ORDER BY groupid, nodename, nodeport',
      ),
    );
    return result.rows.map((row) => ({
      host: row.nodename,
      port: row.nodeport,
      active: row.isactive,
      role: row.groupid === 0 ? 'coordinator' : 'worker',
    }));
  }

  async registerNode(host: string, port: number): Promise<void> {
    try {
      await this.pool.query('SELECT citus_add_node($1, $2)', [host, port]);
    } catch (error) {
      const message = getErrorMessage(error);
      switch (classifyPgError(error)) {
        case 'transient':
          throw new RegistrationTransientError(`citus_add_node(${host}, ${port}): ${message}`);
        case 'conflict':
          throw new RegistrationConflictError(`citus_add_node(${host}, ${port}): ${message}`);
        default:
          throw new CoordinatorCommandError('registerNode', message, false);
      }
    }
  }

  async drainNode(host: string, port: number): Promise<void> {
    await this.run('drainNode', async () => {
      await this.pool.query("SELECT citus_set_node_property($1, $2, 'shouldhaveshards', false)", [host, port]);
      // Background job; completion is observed through shardPlacementCount
      await this.pool.query('SELECT citus_rebalance_start(drain_only := true)');
    });
  }

  async shardPlacementCount(host: string, port: number): Promise<number> {
    const result = await this.run('shardPlacementCount', () =>
      this.pool.query<PlacementCountRow>(
        `SELECT count(*)::int AS placements
           FROM pg_dist_placement p
           JOIN pg_dist_node n ON p.groupid = n.groupid
          WHERE n.nodename = $1 AND n.nodeport = $2`,
        [host, port],
      ),
    );
    return result.rows[0]?.placements ?? 0;
  }

  async removeNode(host: string, port: number, force: boolean): Promise<void> {
    await this.run('removeNode', async () => {
      if (force) {
        await this.pool.query('SELECT citus_disable_node($1, $2, synchronous := true)', [host, port]);
      }
      await this.pool.query('SELECT citus_remove_node($1, $2)', [host, port]);
    });
  }

  async rebalance(strategy: RebalanceStrategy): Promise<string | null> {
    const result = await this.run('rebalance', () =>
      this.pool.query<JobIdRow>('SELECT citus_rebalance_start(rebalance_strategy := $1)::text AS job_id', [strategy]),
    );
    return result.rows[0]?.job_id ?? null;
  }

  async rebalanceStatus(jobId: string): Promise<RebalanceJobState> {
    const result = await this.run('rebalanceStatus', () =>
      this.pool.query<JobStateRow>('SELECT state::text AS state FROM pg_dist_background_job WHERE job_id = $1', [
        jobId,
      ]),
    );
    const row = result.rows[0];
    if (!row) {
      throw new CoordinatorCommandError('rebalanceStatus', `job ${jobId} not found`, false);
    }
    return JOB_STATES[row.state] ?? 'Running';
  }

  async checkConnection(host: string, port: number): Promise<boolean> {
    const result = await this.run('checkConnection', () =>
      this.pool.query<ConnectionCheckRow>('SELECT citus_check_connection_to_node($1, $2) AS connected', [host, port]),
    );
    return result.rows[0]?.connected === true;
  }

  async configureCluster(settings: ClusterSettings): Promise<void> {
    await this.run('configureCluster', async () => {
      await this.pool.query('CREATE EXTENSION IF NOT EXISTS citus');
      await this.pool.query('SELECT citus_set_coordinator_host($1, $2)', [
        settings.coordinatorHost,
        settings.coordinatorPort,
      ]);
      // ALTER SYSTEM takes no bind parameters; both values are validated positive integers
      if (settings.shardCount !== undefined) {
        await this.pool.query(`ALTER SYSTEM SET citus.shard_count = ${toSettingInteger(settings.shardCount)}`);
      }
      if (settings.replicationFactor !== undefined) {
        await this.pool.query(
          `ALTER SYSTEM SET citus.shard_replication_factor = ${toSettingInteger(settings.replicationFactor)}`,
        );
      }
      await this.pool.query('SELECT pg_reload_conf()');
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(command: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof CoordinatorCommandError) {
        throw error;
      }
      throw new CoordinatorCommandError(command, getErrorMessage(error), classifyPgError(error) === 'transient');
    }
  }
}

function toSettingInteger(value: number): string {
  if (!Number.isInteger(value) || value < 1) {
    throw new CoordinatorCommandError('configureCluster', `invalid setting value ${value}`, false);
  }
  return String(value);
}
