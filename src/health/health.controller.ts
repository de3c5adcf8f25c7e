import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { CoordinatorHealthIndicator } from '../coordinator/coordinator.health';
import { SupervisorHealthIndicator } from '../supervisor/supervisor.health';
import { HealthResponseDto } from './dto/health-response.dto';

/**
 * Controller for handling health checks.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly coordinator: CoordinatorHealthIndicator,
    private readonly supervisor: SupervisorHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description:
      'Checks that the control plane is up, the coordinator answers its node list and the container supervisor responds.',
  })
  @ApiResponse({
    status: 200,
    description: 'The application is healthy. See the response body for detailed status of each component.',
    type: HealthResponseDto,
  })
  @ApiResponse({
    status: 503,
    description: 'The application is unhealthy. One or more health checks failed.',
    type: HealthResponseDto,
  })
  check() {
    return this.health.check([
      () => Promise.resolve({ server: { status: 'up' as const } }),
      () => this.coordinator.isHealthy('coordinator'),
      () => this.supervisor.isHealthy('supervisor'),
    ]);
  }
}
