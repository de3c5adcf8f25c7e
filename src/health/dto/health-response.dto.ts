import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 * Contains health status of the application and its dependencies
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Detailed information about each health indicator when healthy',
    example: {
      server: { status: 'up' },
      coordinator: { status: 'up', nodes: 3, activeWorkers: 2 },
      supervisor: { status: 'up' },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Error information if health check failed',
    example: {
      coordinator: { status: 'down', message: 'connect ECONNREFUSED 127.0.0.1:5432' },
    },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Detailed health check results for all indicators',
    example: {
      server: { status: 'up' },
      coordinator: { status: 'up', nodes: 3, activeWorkers: 2 },
      supervisor: { status: 'up' },
    },
  })
  details!: Record<string, unknown>;
}
