import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { DockerNodeSupervisor } from './docker-node.supervisor';
import { NODE_SUPERVISOR } from './interfaces';
import { SupervisorHealthIndicator } from './supervisor.health';

@Module({
  imports: [TerminusModule],
  providers: [
    {
      provide: NODE_SUPERVISOR,
      useClass: DockerNodeSupervisor,
    },
    SupervisorHealthIndicator,
  ],
  exports: [NODE_SUPERVISOR, SupervisorHealthIndicator],
})
export class SupervisorModule {}
