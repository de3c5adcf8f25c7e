import { Logger } from '@nestjs/common';
import appConfig from './app.config';
import { silenceNestLogger } from '../test/helpers/silence-logger';
import { TEST_API_KEY } from '../test/helpers/test-config';

describe('app.config', () => {
  let originalEnv: NodeJS.ProcessEnv;
  let restoreLogger: () => void;

  beforeAll(() => {
    originalEnv = { ...process.env };
    restoreLogger = silenceNestLogger(['log', 'warn']);
  });

  afterAll(() => {
    process.env = { ...originalEnv };
    restoreLogger();
  });

  beforeEach(() => {
    Object.keys(process.env).forEach((key) => {
      if (key.startsWith('SHP_') || key === 'NODE_ENV') {
        delete process.env[key];
      }
    });
    jest.clearAllMocks();
  });

  const setMinimalEnv = () => {
    process.env.SHP_API_KEY = TEST_API_KEY;
    process.env.SHP_POSTGRES_PASSWORD = 'test-secret';
  };

  const load = async () => appConfig();

  describe('defaults', () => {
    it('should build the full configuration from the minimal environment', async () => {
      setMinimalEnv();

      await expect(load()).resolves.toEqual({
        environment: 'production',
        main: { port: 8080, apiKey: TEST_API_KEY },
        topology: {
          clusterName: 'shardplane',
          coordinatorEnabled: true,
          coordinatorHost: 'coordinator',
          coordinatorPort: 5432,
          workerCount: 2,
          portBase: 5432,
          workerHosts: [],
          credentials: { user: 'postgres', password: 'test-secret', database: 'postgres' },
          image: 'citusdata/citus:12.1',
          shardCountHint: undefined,
          replicationFactor: undefined,
        },
        coordinator: { connectHost: 'coordinator', connectPort: 5432, connectTimeout: 5000 },
        supervisor: { dockerSocket: undefined, network: undefined, stopTimeoutSeconds: 30 },
        probe: { hostOverride: undefined, initialDelay: 1000, maxDelay: 30000, timeout: 180000, connectTimeout: 3000 },
        registration: { maxAttempts: 5, initialDelay: 1000, maxDelay: 15000, confirmTimeout: 60000 },
        drain: { timeout: 1800000, pollInterval: 5000 },
        lifecycle: {
          parallelism: 0,
          rebalanceOnAdd: false,
          rebalanceStrategy: undefined,
          rebalanceTimeout: 3600000,
          rebalancePollInterval: 10000,
        },
        reconcile: { enabled: false },
        events: { enabled: true },
      });
    });
  });

  describe('SHP_API_KEY', () => {
    it('should be required', async () => {
      process.env.SHP_POSTGRES_PASSWORD = 'test-secret';

      await expect(load()).rejects.toThrow('SHP_API_KEY is required');
    });

    it('should be at least 16 characters', async () => {
      setMinimalEnv();
      process.env.SHP_API_KEY = 'short';

      await expect(load()).rejects.toThrow('SHP_API_KEY must be at least 16 characters (current: 5)');
    });

    it('should be trimmed', async () => {
      setMinimalEnv();
      process.env.SHP_API_KEY = `  ${TEST_API_KEY}  `;

      expect((await load()).main.apiKey).toBe(TEST_API_KEY);
    });
  });

  describe('topology', () => {
    it('should require a password for a managed coordinator', async () => {
      process.env.SHP_API_KEY = TEST_API_KEY;

      await expect(load()).rejects.toThrow(
        'SHP_POSTGRES_PASSWORD is required when the coordinator is managed (SHP_COORDINATOR_ENABLED=true)',
      );
    });

    it('should not require a password for an external coordinator', async () => {
      process.env.SHP_API_KEY = TEST_API_KEY;
      process.env.SHP_COORDINATOR_ENABLED = 'false';

      const config = await load();

      expect(config.topology.coordinatorEnabled).toBe(false);
      expect(config.topology.credentials.password).toBe('');
    });

    it('should reject a malformed cluster name', async () => {
      setMinimalEnv();
      process.env.SHP_CLUSTER_NAME = 'Bad Name';

      await expect(load()).rejects.toThrow('Invalid SHP_CLUSTER_NAME: "Bad Name"');
    });

    it('should reject a malformed coordinator host', async () => {
      setMinimalEnv();
      process.env.SHP_COORDINATOR_HOST = '-coordinator';

      await expect(load()).rejects.toThrow('Invalid SHP_COORDINATOR_HOST: "-coordinator"');
    });

    it('should parse worker hosts as a comma list', async () => {
      setMinimalEnv();
      process.env.SHP_WORKER_HOSTS = 'db-a.internal, db-b.internal,';

      expect((await load()).topology.workerHosts).toEqual(['db-a.internal', 'db-b.internal']);
    });

    it('should reject malformed worker hosts', async () => {
      setMinimalEnv();
      process.env.SHP_WORKER_HOSTS = 'db-a.internal,bad_host';

      await expect(load()).rejects.toThrow('Invalid host format in SHP_WORKER_HOSTS: bad_host');
    });

    it('should parse numeric topology settings', async () => {
      setMinimalEnv();
      process.env.SHP_WORKER_COUNT = '4';
      process.env.SHP_PORT_BASE = '6000';
      process.env.SHP_SHARD_COUNT_HINT = '32';
      process.env.SHP_REPLICATION_FACTOR = '2';

      const { topology } = await load();

      expect(topology.workerCount).toBe(4);
      expect(topology.portBase).toBe(6000);
      expect(topology.shardCountHint).toBe(32);
      expect(topology.replicationFactor).toBe(2);
    });

    it('should reject a non-numeric worker count', async () => {
      setMinimalEnv();
      process.env.SHP_WORKER_COUNT = 'many';

      await expect(load()).rejects.toThrow('Invalid numeric value: "many" (must be a non-negative finite number)');
    });

    it('should warn when worker-1 lands on the coordinator port', async () => {
      setMinimalEnv();
      process.env.SHP_PORT_BASE = '5431';

      await load();

      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        'SHP_PORT_BASE=5431 places worker-1 on the coordinator port 5432. ' +
          'The topology will be rejected until SHP_PORT_BASE or SHP_COORDINATOR_PORT changes.',
      );
    });
  });

  describe('coordinator connection', () => {
    it('should default to the coordinator identity', async () => {
      setMinimalEnv();
      process.env.SHP_COORDINATOR_HOST = 'cn-1';
      process.env.SHP_COORDINATOR_PORT = '6432';

      expect((await load()).coordinator).toEqual({ connectHost: 'cn-1', connectPort: 6432, connectTimeout: 5000 });
    });

    it('should let the connect address differ from the identity', async () => {
      setMinimalEnv();
      process.env.SHP_COORDINATOR_CONNECT_HOST = 'localhost';
      process.env.SHP_COORDINATOR_CONNECT_PORT = '15432';

      const config = await load();

      expect(config.coordinator.connectHost).toBe('localhost');
      expect(config.coordinator.connectPort).toBe(15432);
      expect(config.topology.coordinatorHost).toBe('coordinator');
    });
  });

  describe('timing', () => {
    it('should reject a probe backoff cap below the first delay', async () => {
      setMinimalEnv();
      process.env.SHP_PROBE_INITIAL_DELAY = '5000';
      process.env.SHP_PROBE_MAX_DELAY = '1000';

      await expect(load()).rejects.toThrow(
        'SHP_PROBE_MAX_DELAY (1000) must be greater than or equal to SHP_PROBE_INITIAL_DELAY (5000)',
      );
    });

    it('should require at least one registration attempt', async () => {
      setMinimalEnv();
      process.env.SHP_REGISTRATION_MAX_ATTEMPTS = '0';

      await expect(load()).rejects.toThrow('SHP_REGISTRATION_MAX_ATTEMPTS must be at least 1');
    });

    it('should read the probe host override and docker settings', async () => {
      setMinimalEnv();
      process.env.SHP_PROBE_HOST = ' localhost ';
      process.env.SHP_DOCKER_SOCKET = '/var/run/docker.sock';
      process.env.SHP_DOCKER_NETWORK = 'shardplane-net';

      const config = await load();

      expect(config.probe.hostOverride).toBe('localhost');
      expect(config.supervisor).toEqual({
        dockerSocket: '/var/run/docker.sock',
        network: 'shardplane-net',
        stopTimeoutSeconds: 30,
      });
    });
  });

  describe('lifecycle', () => {
    it('should normalize the rebalance strategy', async () => {
      setMinimalEnv();
      process.env.SHP_REBALANCE_STRATEGY = 'BY_DISK_SIZE';
      process.env.SHP_REBALANCE_ON_ADD = 'yes';

      const { lifecycle } = await load();

      expect(lifecycle.rebalanceStrategy).toBe('by_disk_size');
      expect(lifecycle.rebalanceOnAdd).toBe(true);
    });

    it('should reject an unknown rebalance strategy', async () => {
      setMinimalEnv();
      process.env.SHP_REBALANCE_STRATEGY = 'random';

      await expect(load()).rejects.toThrow(
        'Invalid rebalance strategy: "random". Must be one of: by_shard_count, by_disk_size',
      );
    });

    it('should read the reconcile and event switches', async () => {
      setMinimalEnv();
      process.env.SHP_RECONCILE_ENABLED = 'true';
      process.env.SHP_EVENTS_ENABLED = 'false';

      const config = await load();

      expect(config.reconcile.enabled).toBe(true);
      expect(config.events.enabled).toBe(false);
    });
  });
});
