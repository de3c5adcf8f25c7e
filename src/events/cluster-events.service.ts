import { Injectable, Logger, MessageEvent } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { Observable, Subject } from 'rxjs';
import { filter, map } from 'rxjs/operators';
import {
  CLUSTER_EVENTS,
  type ClusterEvent,
  type ClusterEventType,
  type NodeLifecycleEvent,
  type OperationCompletedEvent,
  type RegistrationTransitionEvent,
} from './interfaces';

/**
 * @class ClusterEventsService
 * @description Bridges in-process lifecycle events onto an rxjs stream for SSE subscribers.
 */
@Injectable()
export class ClusterEventsService {
  private readonly logger = new Logger(ClusterEventsService.name);
  private readonly enabled: boolean;
  private readonly eventStream$ = new Subject<ClusterEvent>();

  constructor(private readonly configService: ConfigService) {
    this.enabled = this.configService.get<boolean>('shardplane.events.enabled', true);

    if (!this.enabled) {
      this.logger.log('Cluster event stream disabled (SHP_EVENTS_ENABLED=false)');
    }
  }

  @OnEvent(CLUSTER_EVENTS.REGISTRATION_TRANSITION)
  handleRegistrationTransition(event: RegistrationTransitionEvent): void {
    this.publish(event);
  }

  @OnEvent(CLUSTER_EVENTS.NODE_STARTED)
  handleNodeStarted(event: NodeLifecycleEvent): void {
    this.publish(event);
  }

  @OnEvent(CLUSTER_EVENTS.NODE_STOPPED)
  handleNodeStopped(event: NodeLifecycleEvent): void {
    this.publish(event);
  }

  @OnEvent(CLUSTER_EVENTS.OPERATION_COMPLETED)
  handleOperationCompleted(event: OperationCompletedEvent): void {
    this.publish(event);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Stream of cluster events, optionally limited to the given event types.
   */
  stream(types: ClusterEventType[] = []): Observable<ClusterEvent> {
    const source$ = this.eventStream$.asObservable();
    if (types.length === 0) {
      return source$;
    }
    const allowed = new Set<string>(types);
    return source$.pipe(filter((event) => allowed.has(event.type)));
  }

  /**
   * Transforms cluster events into SSE MessageEvents named after the event type.
   */
  toMessageEvents(source$: Observable<ClusterEvent>): Observable<MessageEvent> {
    return source$.pipe(map((event) => ({ type: event.type, data: event })));
  }

  private publish(event: ClusterEvent): void {
    if (!this.enabled) {
      return;
    }
    this.eventStream$.next(event);
  }
}
