import { Controller, Logger, MessageEvent, NotFoundException, Query, Sse, UseGuards } from '@nestjs/common';
import { Observable, interval, merge } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiTags, ApiSecurity, ApiOperation, ApiResponse, ApiQuery } from '@nestjs/swagger';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { ClusterEventsService } from './cluster-events.service';
import { CLUSTER_EVENTS, type ClusterEventType } from './interfaces';

const HEARTBEAT_INTERVAL_MS = 30000;
const KNOWN_TYPES: string[] = Object.values(CLUSTER_EVENTS);

function isClusterEventType(value: string): value is ClusterEventType {
  return KNOWN_TYPES.includes(value);
}

/**
 * @class ClusterEventsController
 * @description Server-Sent Events stream of registration transitions, node starts and stops,
 * and operation results.
 */
@ApiTags('Cluster')
@ApiSecurity('api-key')
@UseGuards(ApiKeyGuard)
@Controller('api/cluster/events')
export class ClusterEventsController {
  private readonly logger = new Logger(ClusterEventsController.name);

  constructor(private readonly eventsService: ClusterEventsService) {}

  @Sse()
  @ApiOperation({
    summary: 'Subscribe to cluster events',
    description: 'Streams lifecycle events as they happen. A heartbeat event is sent every 30 seconds.',
  })
  @ApiQuery({
    name: 'types',
    required: false,
    description: `Comma-separated event types to receive: ${KNOWN_TYPES.join(', ')}. All types when omitted.`,
    type: String,
  })
  @ApiResponse({ status: 200, description: 'SSE connection established.' })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  @ApiResponse({ status: 404, description: 'The event stream is disabled.' })
  stream(@Query('types') types?: string | string[]): Observable<MessageEvent> {
    if (!this.eventsService.isEnabled()) {
      throw new NotFoundException('Cluster event stream is disabled');
    }

    const requested = this.normalizeTypes(types);
    const message$ = this.eventsService.toMessageEvents(this.eventsService.stream(requested));
    const heartbeat$ = interval(HEARTBEAT_INTERVAL_MS).pipe(
      map(
        (): MessageEvent => ({
          type: 'heartbeat',
          data: { type: 'heartbeat', timestamp: new Date().toISOString() },
        }),
      ),
    );
    const combined$ = merge(message$, heartbeat$);

    return new Observable<MessageEvent>((subscriber) => {
      this.logger.log(`SSE client subscribed (types: ${requested.length > 0 ? requested.join(',') : 'all'})`);
      const subscription = combined$.subscribe({
        next: (value) => subscriber.next(value),
        error: (error: unknown) => {
          this.logger.error(`SSE stream error: ${error instanceof Error ? error.message : String(error)}`);
          subscriber.error(error);
        },
        complete: () => subscriber.complete(),
      });

      return () => {
        this.logger.log('SSE client disconnected');
        subscription.unsubscribe();
      };
    });
  }

  private normalizeTypes(value?: string | string[]): ClusterEventType[] {
    if (!value) {
      return [];
    }
    const raw = Array.isArray(value) ? value.join(',') : value;
    const entries = raw
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
    return Array.from(new Set(entries.filter(isClusterEventType)));
  }
}
