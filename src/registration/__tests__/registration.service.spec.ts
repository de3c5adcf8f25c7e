import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import {
  CoordinatorCommandError,
  RegistrationConflictError,
  RegistrationTransientError,
} from '../../coordinator/coordinator.errors';
import { CoordinatorGateway } from '../../coordinator/coordinator.gateway';
import { COORDINATOR_CLIENT } from '../../coordinator/interfaces';
import type { RegistrationTransitionEvent } from '../../events/interfaces';
import { MetricsService } from '../../metrics/metrics.service';
import { OperationCancelledError } from '../../shared/cancellation';
import { CLOCK } from '../../shared/clock';
import type { WorkerRef } from '../interfaces';
import { RegistrationService } from '../registration.service';
import { FakeClock } from '../../../test/helpers/fake-clock';
import { FakeCoordinatorClient } from '../../../test/helpers/fake-coordinator';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { createTestConfigService } from '../../../test/helpers/test-config';

const WORKER_1: WorkerRef = { name: 'worker-1', identity: { host: 'worker-1', port: 5433 } };
const WORKER_2: WorkerRef = { name: 'worker-2', identity: { host: 'worker-2', port: 5434 } };

describe('RegistrationService', () => {
  let module: TestingModule;
  let service: RegistrationService;
  let metrics: MetricsService;
  let coordinator: FakeCoordinatorClient;
  let clock: FakeClock;
  let transitions: RegistrationTransitionEvent[];
  let restoreLogger: () => void;

  beforeEach(async () => {
    restoreLogger = silenceNestLogger(['log', 'warn', 'error', 'debug']);
    coordinator = new FakeCoordinatorClient({ host: 'coordinator', port: 5432 });
    clock = new FakeClock();
    transitions = [];
    const eventEmitter = new EventEmitter2();
    eventEmitter.on('registration.transition', (event: RegistrationTransitionEvent) => {
      transitions.push(event);
    });

    module = await Test.createTestingModule({
      providers: [
        RegistrationService,
        CoordinatorGateway,
        MetricsService,
        { provide: ConfigService, useValue: createTestConfigService() },
        { provide: EventEmitter2, useValue: eventEmitter },
        { provide: CLOCK, useValue: clock },
        { provide: COORDINATOR_CLIENT, useValue: coordinator },
      ],
    }).compile();

    service = module.get<RegistrationService>(RegistrationService);
    metrics = module.get<MetricsService>(MetricsService);
  });

  afterEach(async () => {
    await module.close();
    restoreLogger();
  });

  describe('registerWorker', () => {
    it('should register a new worker with one attempt', async () => {
      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome).toEqual({
        name: 'worker-1',
        identity: { host: 'worker-1', port: 5433 },
        state: 'Registered',
        attempts: 1,
        alreadyRegistered: false,
      });
      expect(coordinator.workerAddresses()).toEqual(['worker-1:5433']);
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual([
        'Unregistered->Registering',
        'Registering->Registered',
      ]);
    });

    it('should be a no-op for a worker that is already registered', async () => {
      await service.registerWorker(WORKER_1);

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.state).toBe('Registered');
      expect(outcome.alreadyRegistered).toBe(true);
      expect(outcome.attempts).toBe(0);
      expect(coordinator.callCount('registerNode')).toBe(1);
      expect(metrics.getMetrics().registration.noop_total).toBe(1);
    });

    it('should trust the coordinator over an empty local record', async () => {
      coordinator.addLiveWorker('worker-1', 5433);

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.alreadyRegistered).toBe(true);
      expect(coordinator.callCount('registerNode')).toBe(0);
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual(['Unregistered->Registered']);
    });

    it('should register again when the coordinator no longer lists a recorded worker', async () => {
      await service.registerWorker(WORKER_1);
      coordinator.nodes.splice(
        coordinator.nodes.findIndex((node) => node.host === 'worker-1'),
        1,
      );
      transitions.length = 0;

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.alreadyRegistered).toBe(false);
      expect(coordinator.callCount('registerNode')).toBe(2);
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual([
        'Registered->Unregistered',
        'Unregistered->Registering',
        'Registering->Registered',
      ]);
    });

    it('should retry transient failures with exponential backoff', async () => {
      coordinator.registerFailures.set('worker-1:5433', [
        new RegistrationTransientError('connection reset'),
        new RegistrationTransientError('connection reset'),
      ]);

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.state).toBe('Registered');
      expect(outcome.attempts).toBe(3);
      expect(clock.sleeps).toEqual([10, 20]);
      expect(metrics.getMetrics().registration.transient_errors_total).toBe(2);
      expect(metrics.getMetrics().registration.attempts_total).toBe(3);
    });

    it('should treat transient coordinator command errors as retryable', async () => {
      coordinator.registerFailures.set('worker-1:5433', [
        new CoordinatorCommandError('registerNode', 'connection terminated', true),
      ]);

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.state).toBe('Registered');
      expect(outcome.attempts).toBe(2);
    });

    it('should fail after the configured number of attempts', async () => {
      coordinator.registerFailures.set(
        'worker-1:5433',
        Array.from({ length: 5 }, () => new RegistrationTransientError('connection reset')),
      );

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome).toEqual({
        name: 'worker-1',
        identity: { host: 'worker-1', port: 5433 },
        state: 'Failed',
        attempts: 5,
        alreadyRegistered: false,
        error: {
          code: 'REGISTRATION_TRANSIENT',
          message: 'gave up after 5 attempts; last error: connection reset',
        },
      });
      expect(clock.sleeps).toEqual([10, 20, 40, 80]);
      expect(metrics.getMetrics().registration.failed_total).toBe(1);
    });

    it('should fail without retrying on a conflict', async () => {
      coordinator.registerFailures.set('worker-1:5433', [
        new RegistrationConflictError('worker-1:5433 is registered under another node id'),
      ]);

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.state).toBe('Failed');
      expect(outcome.attempts).toBe(1);
      expect(outcome.error).toEqual({
        code: 'REGISTRATION_CONFLICT',
        message: 'worker-1:5433 is registered under another node id',
      });
      expect(clock.sleeps).toEqual([]);
      expect(metrics.getMetrics().registration.conflicts_total).toBe(1);
    });

    it('should refuse to register the coordinator address as a worker', async () => {
      const outcome = await service.registerWorker({ name: 'worker-9', identity: { host: 'coordinator', port: 5432 } });

      expect(outcome.state).toBe('Failed');
      expect(outcome.attempts).toBe(0);
      expect(outcome.error).toEqual({
        code: 'REGISTRATION_CONFLICT',
        message: 'coordinator:5432 is registered as the coordinator, not as a worker',
      });
      expect(coordinator.callCount('registerNode')).toBe(0);
    });

    it('should start over from Failed when called again', async () => {
      coordinator.registerFailures.set('worker-1:5433', [new RegistrationConflictError('taken')]);
      await service.registerWorker(WORKER_1);

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.state).toBe('Registered');
      expect(outcome.attempts).toBe(1);
      expect(service.getRecord('worker-1')?.lastError).toBeNull();
    });

    it('should carry the last error on the transition event', async () => {
      coordinator.registerFailures.set('worker-1:5433', [new RegistrationTransientError('connection reset')]);

      await service.registerWorker(WORKER_1);

      const retry = transitions.find((event) => event.from === 'Registering' && event.to === 'Registering');
      expect(retry).toEqual({
        type: 'registration.transition',
        node: 'worker-1',
        identity: { host: 'worker-1', port: 5433 },
        from: 'Registering',
        to: 'Registering',
        attempts: 1,
        error: { code: 'REGISTRATION_TRANSIENT', message: 'connection reset' },
        timestamp: new Date(1_700_000_000_000).toISOString(),
      });
    });

    it('should use the per-call timeout as the confirmation deadline', async () => {
      jest.spyOn(coordinator, 'registerNode').mockResolvedValue(undefined);

      const outcome = await service.registerWorker(WORKER_1, { timeoutMs: 25 });

      expect(outcome.state).toBe('Failed');
      expect(outcome.error).toEqual({
        code: 'REGISTRATION_TRANSIENT',
        message: 'gave up after 5 attempts; last error: worker-1:5433 not listed by the coordinator within 25ms',
      });
      expect(clock.sleeps).toEqual([10, 10, 5, 10, 10, 10, 5, 20, 10, 10, 5, 40, 10, 10, 5, 80, 10, 10, 5]);
    });

    it('should throw when cancelled and leave the record untouched', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(service.registerWorker(WORKER_1, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );
      expect(service.getRecord('worker-1')?.state).toBe('Unregistered');
      expect(coordinator.callCount()).toBe(0);
    });
  });

  describe('registerWorkers', () => {
    it('should register every worker and return outcomes in input order', async () => {
      const outcomes = await service.registerWorkers([WORKER_1, WORKER_2], { parallelism: 1 });

      expect(outcomes.map((outcome) => [outcome.name, outcome.state])).toEqual([
        ['worker-1', 'Registered'],
        ['worker-2', 'Registered'],
      ]);
      expect(coordinator.workerAddresses()).toEqual(['worker-1:5433', 'worker-2:5434']);
    });

    it('should not let one failing worker stop the others', async () => {
      coordinator.registerFailures.set('worker-1:5433', [new RegistrationConflictError('taken')]);

      const outcomes = await service.registerWorkers([WORKER_1, WORKER_2]);

      expect(outcomes.map((outcome) => outcome.state)).toEqual(['Failed', 'Registered']);
    });

    it('should return nothing for an empty list', async () => {
      await expect(service.registerWorkers([])).resolves.toEqual([]);
      expect(coordinator.callCount()).toBe(0);
    });
  });

  describe('drainAndRemove', () => {
    beforeEach(async () => {
      await service.registerWorker(WORKER_2);
      transitions.length = 0;
    });

    it('should drain, wait for zero placements and remove', async () => {
      coordinator.placements.set('worker-2:5434', 8);

      const outcome = await service.drainAndRemove(WORKER_2);

      expect(outcome).toEqual({
        name: 'worker-2',
        identity: { host: 'worker-2', port: 5434 },
        state: 'Removed',
        forced: false,
        notRegistered: false,
        warnings: [],
      });
      expect(coordinator.workerAddresses()).toEqual([]);
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual([
        'Registered->DrainRequested',
        'DrainRequested->Draining',
        'Draining->Removed',
      ]);
      expect(service.getRecord('worker-2')).toBeUndefined();
      expect(metrics.getMetrics().drain.completed_total).toBe(1);
    });

    it('should report a stall and keep the worker registered', async () => {
      coordinator.placements.set('worker-2:5434', 4);
      coordinator.drainCompletes = false;

      const outcome = await service.drainAndRemove(WORKER_2, { timeoutMs: 250 });

      expect(outcome.state).toBe('Failed');
      expect(outcome.remainingPlacements).toBe(4);
      expect(outcome.error).toEqual({
        code: 'DRAIN_STALL',
        message: 'worker-2 still holds 4 shard placement(s) after draining for 250ms',
      });
      expect(clock.sleeps).toEqual([100, 100, 50]);
      expect(coordinator.workerAddresses()).toEqual(['worker-2:5434']);
      expect(metrics.getMetrics().drain.stalled_total).toBe(1);
      expect(metrics.getMetrics().registration.failed_total).toBe(0);
    });

    it('should let an operator retry a stalled drain', async () => {
      coordinator.placements.set('worker-2:5434', 4);
      coordinator.drainCompletes = false;
      await service.drainAndRemove(WORKER_2, { timeoutMs: 100 });
      coordinator.drainCompletes = true;

      const outcome = await service.drainAndRemove(WORKER_2);

      expect(outcome.state).toBe('Removed');
      expect(coordinator.workerAddresses()).toEqual([]);
    });

    it('should skip the drain when forced and warn about lost placements', async () => {
      coordinator.placements.set('worker-2:5434', 3);

      const outcome = await service.drainAndRemove(WORKER_2, { force: true });

      expect(outcome).toEqual({
        name: 'worker-2',
        identity: { host: 'worker-2', port: 5434 },
        state: 'Removed',
        forced: true,
        notRegistered: false,
        remainingPlacements: 3,
        warnings: [
          'worker-2 removed without draining (force); 3 shard placement(s) on it were not moved and may be lost',
        ],
      });
      expect(coordinator.callCount('drainNode')).toBe(0);
      expect(metrics.getMetrics().drain.forced_removals_total).toBe(1);
    });

    it('should still remove a forced worker when its placement count is unavailable', async () => {
      jest
        .spyOn(coordinator, 'shardPlacementCount')
        .mockRejectedValueOnce(new CoordinatorCommandError('shardPlacementCount', 'connection terminated', true));

      const outcome = await service.drainAndRemove(WORKER_2, { force: true });

      expect(outcome).toEqual({
        name: 'worker-2',
        identity: { host: 'worker-2', port: 5434 },
        state: 'Removed',
        forced: true,
        notRegistered: false,
        warnings: [
          'worker-2 removed without draining (force); the number of shard placement(s) on it is unknown and they may be lost',
        ],
      });
      expect(coordinator.calls.filter((call) => call.method === 'removeNode')).toEqual([
        { method: 'removeNode', args: ['worker-2', 5434, true] },
      ]);
      expect(coordinator.workerAddresses()).toEqual([]);
    });

    it('should succeed without any command for a worker the coordinator does not list', async () => {
      const outcome = await service.drainAndRemove(WORKER_1);

      expect(outcome.state).toBe('Removed');
      expect(outcome.notRegistered).toBe(true);
      expect(coordinator.callCount('drainNode')).toBe(0);
      expect(coordinator.callCount('removeNode')).toBe(0);
    });

    it('should keep the worker registered when the drain command fails', async () => {
      jest
        .spyOn(coordinator, 'drainNode')
        .mockRejectedValueOnce(new CoordinatorCommandError('drainNode', 'permission denied', false));

      const outcome = await service.drainAndRemove(WORKER_2);

      expect(outcome.state).toBe('Failed');
      expect(outcome.error).toEqual({
        code: 'COORDINATOR_COMMAND_FAILED',
        message: 'drainNode failed: permission denied',
      });
      expect(coordinator.workerAddresses()).toEqual(['worker-2:5434']);
    });
  });

  describe('after a cancelled run', () => {
    it('should settle an interrupted drain when the worker is registered again', async () => {
      await service.registerWorker(WORKER_2);
      coordinator.placements.set('worker-2:5434', 4);
      coordinator.drainCompletes = false;
      const controller = new AbortController();
      jest.spyOn(coordinator, 'shardPlacementCount').mockImplementationOnce(async () => {
        controller.abort();
        return 4;
      });

      await expect(service.drainAndRemove(WORKER_2, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );
      expect(service.getRecord('worker-2')?.state).toBe('Draining');
      transitions.length = 0;

      const outcome = await service.registerWorker(WORKER_2);

      expect(outcome).toEqual({
        name: 'worker-2',
        identity: { host: 'worker-2', port: 5434 },
        state: 'Registered',
        attempts: 0,
        alreadyRegistered: true,
      });
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual(['Draining->Registered']);
    });

    it('should resume an interrupted drain when removal is requested again', async () => {
      await service.registerWorker(WORKER_2);
      coordinator.placements.set('worker-2:5434', 4);
      const controller = new AbortController();
      jest.spyOn(coordinator, 'drainNode').mockImplementationOnce(async () => {
        controller.abort();
      });

      await expect(service.drainAndRemove(WORKER_2, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );
      transitions.length = 0;

      const outcome = await service.drainAndRemove(WORKER_2);

      expect(outcome.state).toBe('Removed');
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual(['Draining->Removed']);
      expect(coordinator.workerAddresses()).toEqual([]);
    });

    it('should settle an interrupted registration when the worker is removed', async () => {
      const controller = new AbortController();
      jest.spyOn(coordinator, 'registerNode').mockImplementationOnce(async () => {
        controller.abort();
        throw new RegistrationTransientError('connection reset');
      });

      await expect(service.registerWorker(WORKER_1, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );
      expect(service.getRecord('worker-1')?.state).toBe('Registering');
      transitions.length = 0;

      const outcome = await service.drainAndRemove(WORKER_1);

      expect(outcome).toEqual({
        name: 'worker-1',
        identity: { host: 'worker-1', port: 5433 },
        state: 'Removed',
        forced: false,
        notRegistered: true,
        warnings: [],
      });
      expect(transitions.map((event) => `${event.from}->${event.to}`)).toEqual([
        'Registering->Unregistered',
        'Unregistered->Removed',
      ]);
    });

    it('should register after an interrupted registration', async () => {
      const controller = new AbortController();
      jest.spyOn(coordinator, 'registerNode').mockImplementationOnce(async () => {
        controller.abort();
        throw new RegistrationTransientError('connection reset');
      });
      await expect(service.registerWorker(WORKER_1, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError,
      );

      const outcome = await service.registerWorker(WORKER_1);

      expect(outcome.state).toBe('Registered');
      expect(outcome.attempts).toBe(1);
      expect(coordinator.workerAddresses()).toEqual(['worker-1:5433']);
    });
  });

  describe('listRecords', () => {
    it('should return copies sorted by name', async () => {
      await service.registerWorkers([WORKER_2, WORKER_1]);

      const records = service.listRecords();
      records[0].state = 'Failed';

      expect(records.map((record) => record.name)).toEqual(['worker-1', 'worker-2']);
      expect(service.getRecord('worker-1')?.state).toBe('Registered');
    });
  });
});
