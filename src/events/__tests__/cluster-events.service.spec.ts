import { ConfigService } from '@nestjs/config';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';
import { Test } from '@nestjs/testing';
import { ClusterEventsService } from '../cluster-events.service';
import { CLUSTER_EVENTS, type ClusterEvent, type NodeLifecycleEvent, type OperationCompletedEvent } from '../interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { createTestConfigService } from '../../../test/helpers/test-config';

const started: NodeLifecycleEvent = {
  type: CLUSTER_EVENTS.NODE_STARTED,
  node: 'worker-1',
  role: 'worker',
  timestamp: '2023-11-14T22:13:20.000Z',
};

const stopped: NodeLifecycleEvent = { ...started, type: CLUSTER_EVENTS.NODE_STOPPED };

const completed: OperationCompletedEvent = {
  type: CLUSTER_EVENTS.OPERATION_COMPLETED,
  operation: 'converge',
  overall: 'Converged',
  elapsedMs: 12,
  failedNodes: [],
  timestamp: '2023-11-14T22:13:20.012Z',
};

describe('ClusterEventsService', () => {
  const restoreLogger = silenceNestLogger(['log']);

  afterAll(() => restoreLogger());

  describe('when enabled', () => {
    let service: ClusterEventsService;

    beforeEach(() => {
      service = new ClusterEventsService(createTestConfigService());
    });

    it('should report itself enabled', () => {
      expect(service.isEnabled()).toBe(true);
    });

    it('should publish every handled event to subscribers', () => {
      const received: ClusterEvent[] = [];
      const subscription = service.stream().subscribe((event) => received.push(event));

      service.handleNodeStarted(started);
      service.handleNodeStopped(stopped);
      service.handleOperationCompleted(completed);
      subscription.unsubscribe();

      expect(received).toEqual([started, stopped, completed]);
    });

    it('should filter the stream by event type', () => {
      const received: ClusterEvent[] = [];
      const subscription = service.stream([CLUSTER_EVENTS.NODE_STOPPED]).subscribe((event) => received.push(event));

      service.handleNodeStarted(started);
      service.handleNodeStopped(stopped);
      subscription.unsubscribe();

      expect(received).toEqual([stopped]);
    });

    it('should wrap events as SSE messages named after their type', () => {
      const messages: unknown[] = [];
      const subscription = service.toMessageEvents(service.stream()).subscribe((message) => messages.push(message));

      service.handleOperationCompleted(completed);
      subscription.unsubscribe();

      expect(messages).toEqual([{ type: 'operation.completed', data: completed }]);
    });
  });

  describe('when disabled', () => {
    it('should drop events', () => {
      const service = new ClusterEventsService(createTestConfigService({ events: { enabled: false } }));
      const received: ClusterEvent[] = [];
      const subscription = service.stream().subscribe((event) => received.push(event));

      service.handleNodeStarted(started);
      subscription.unsubscribe();

      expect(service.isEnabled()).toBe(false);
      expect(received).toEqual([]);
    });
  });

  describe('event emitter wiring', () => {
    it('should receive events emitted through EventEmitter2', async () => {
      const module = await Test.createTestingModule({
        imports: [EventEmitterModule.forRoot()],
        providers: [ClusterEventsService, { provide: ConfigService, useValue: createTestConfigService() }],
      }).compile();
      await module.init();
      const service = module.get(ClusterEventsService);
      const emitter = module.get(EventEmitter2);
      const received: ClusterEvent[] = [];
      const subscription = service.stream().subscribe((event) => received.push(event));

      emitter.emit(CLUSTER_EVENTS.NODE_STARTED, started);
      await new Promise((resolve) => setImmediate(resolve));
      subscription.unsubscribe();
      await module.close();

      expect(received).toEqual([started]);
    });
  });
});
