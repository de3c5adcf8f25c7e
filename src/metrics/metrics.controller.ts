import { Controller, Get, UseGuards, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiSecurity, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { MetricsResponseDto } from './dto/metrics-response.dto';

@ApiTags('Metrics')
@ApiSecurity('api-key')
@Controller('api/metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * GET /api/metrics
   * Returns operation, registration, drain and probe counters
   * Requires X-API-Key header
   */
  @Get()
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get Control Plane Metrics',
    description:
      'Returns a snapshot of control plane counters: lifecycle operations, supervisor actions, registration attempts, drains, probes and rebalances.',
  })
  @ApiResponse({
    status: 200,
    description: 'Metrics retrieved successfully.',
    type: MetricsResponseDto,
  })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getMetrics() {
    return this.metricsService.getMetrics();
  }
}
