import { CoordinatorCommandError } from '../../coordinator/coordinator.errors';
import { OperationCancelledError } from '../../shared/cancellation';
import { createClusterHarness, type ClusterHarness } from '../../../test/helpers/cluster-harness';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { RebalanceTimeoutError } from '../lifecycle.errors';

describe('RebalanceService', () => {
  let restoreLogger: () => void;
  let harness: ClusterHarness;

  beforeAll(() => {
    restoreLogger = silenceNestLogger(['log', 'warn', 'error']);
  });

  afterAll(() => {
    restoreLogger();
  });

  beforeEach(async () => {
    harness = await createClusterHarness();
  });

  describe('chooseStrategy', () => {
    it('should balance by shard count when the hint spreads evenly', () => {
      expect(harness.rebalance.chooseStrategy(32, 4)).toBe('by_shard_count');
    });

    it('should balance by disk size when the hint does not spread evenly', () => {
      expect(harness.rebalance.chooseStrategy(30, 4)).toBe('by_disk_size');
    });

    it('should balance by disk size without a hint or without workers', () => {
      expect(harness.rebalance.chooseStrategy(undefined, 4)).toBe('by_disk_size');
      expect(harness.rebalance.chooseStrategy(32, 0)).toBe('by_disk_size');
    });

    it('should prefer the configured strategy', async () => {
      const configured = await createClusterHarness({ config: { lifecycle: { rebalanceStrategy: 'by_shard_count' } } });

      expect(configured.rebalance.chooseStrategy(30, 4)).toBe('by_shard_count');
    });
  });

  describe('start', () => {
    it('should start a job with the chosen strategy', async () => {
      const started = await harness.rebalance.start({ shardCountHint: 32, workerCount: 2 });

      expect(started).toEqual({ strategy: 'by_shard_count', jobId: '1' });
      expect(harness.coordinator.calls).toEqual([{ method: 'rebalance', args: ['by_shard_count'] }]);
      expect(harness.metrics.getMetrics().rebalance.started_total).toBe(1);
    });

    it('should honour an explicit strategy', async () => {
      const started = await harness.rebalance.start({ strategy: 'by_disk_size', shardCountHint: 32, workerCount: 2 });

      expect(started.strategy).toBe('by_disk_size');
    });

    it('should report a null job id when nothing needs to move', async () => {
      harness.coordinator.rebalanceNeeded = false;

      await expect(harness.rebalance.start({ workerCount: 2 })).resolves.toEqual({
        strategy: 'by_disk_size',
        jobId: null,
      });
    });

    it('should count and rethrow a failed start', async () => {
      harness.coordinator.reachable = false;

      await expect(harness.rebalance.start({ workerCount: 2 })).rejects.toBeInstanceOf(CoordinatorCommandError);
      expect(harness.metrics.getMetrics().rebalance.failed_total).toBe(1);
      expect(harness.metrics.getMetrics().rebalance.started_total).toBe(0);
    });
  });

  describe('waitForCompletion', () => {
    it('should poll with backoff until the job is done', async () => {
      harness.coordinator.jobStates.set('7', ['Pending', 'Running', 'Done']);

      await expect(harness.rebalance.waitForCompletion('7')).resolves.toBe('Done');
      expect(harness.clock.sleeps).toEqual([10, 20]);
      expect(harness.metrics.getMetrics().rebalance.completed_total).toBe(1);
    });

    it('should return a failed job without throwing', async () => {
      harness.coordinator.jobStates.set('7', ['Running', 'Failed']);

      await expect(harness.rebalance.waitForCompletion('7')).resolves.toBe('Failed');
      expect(harness.metrics.getMetrics().rebalance.failed_total).toBe(1);
    });

    it('should give up at the deadline and cap the last sleep', async () => {
      harness.coordinator.jobStates.set('7', ['Running']);

      await expect(harness.rebalance.waitForCompletion('7', { timeoutMs: 100 })).rejects.toThrow(
        new RebalanceTimeoutError('7', 100),
      );
      expect(harness.clock.sleeps).toEqual([10, 20, 40, 30]);
      expect(harness.coordinator.callCount('rebalanceStatus')).toBe(5);
    });

    it('should use the configured timeout by default', async () => {
      harness.coordinator.jobStates.set('7', ['Running']);

      await expect(harness.rebalance.waitForCompletion('7')).rejects.toThrow(
        'Rebalance job 7 did not finish within 1000ms',
      );
      expect(harness.clock.sleeps).toEqual([10, 20, 40, 80, 160, 320, 370]);
    });

    it('should keep polling through status errors', async () => {
      await expect(harness.rebalance.waitForCompletion('9', { timeoutMs: 30 })).rejects.toBeInstanceOf(
        RebalanceTimeoutError,
      );
      expect(harness.clock.sleeps).toEqual([10, 20]);
    });

    it('should stop polling once cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(harness.rebalance.waitForCompletion('7', { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );
      expect(harness.coordinator.callCount('rebalanceStatus')).toBe(0);
    });
  });

  it('should pass status through from the coordinator', async () => {
    harness.coordinator.jobStates.set('3', ['Running']);

    await expect(harness.rebalance.status('3')).resolves.toBe('Running');
  });
});
