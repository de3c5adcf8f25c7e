import { Module } from '@nestjs/common';
import { ClusterEventsController } from './cluster-events.controller';
import { ClusterEventsService } from './cluster-events.service';

/**
 * @module EventsModule
 * @description Streams cluster lifecycle events over SSE. Producers emit through EventEmitter2
 * and never depend on this module.
 */
@Module({
  controllers: [ClusterEventsController],
  providers: [ClusterEventsService],
  exports: [ClusterEventsService],
})
export class EventsModule {}
