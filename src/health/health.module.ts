import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { CoordinatorModule } from '../coordinator/coordinator.module';
import { SupervisorModule } from '../supervisor/supervisor.module';
import { HealthController } from './health.controller';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, CoordinatorModule, SupervisorModule],
  controllers: [HealthController],
})
export class HealthModule {}
