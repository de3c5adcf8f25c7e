import { ApiProperty } from '@nestjs/swagger';

export class OperationMetricsDto {
  @ApiProperty({ description: 'Lifecycle operations started', example: 12 })
  total!: number;

  @ApiProperty({ example: 9 })
  converged_total!: number;

  @ApiProperty({ example: 2 })
  partially_converged_total!: number;

  @ApiProperty({ example: 0 })
  failed_total!: number;

  @ApiProperty({ description: 'Operations rejected before any side effect', example: 1 })
  rejected_total!: number;

  @ApiProperty({ description: 'Converge calls short-circuited on an unchanged plan', example: 6 })
  unchanged_total!: number;

  @ApiProperty({ description: 'Average operation duration', example: 41250 })
  duration_ms!: number;
}

export class NodeMetricsDto {
  @ApiProperty({ example: 4 })
  started_total!: number;

  @ApiProperty({ example: 1 })
  stopped_total!: number;

  @ApiProperty({ example: 0 })
  start_failures_total!: number;
}

export class RegistrationMetricsDto {
  @ApiProperty({ description: 'register commands issued', example: 5 })
  attempts_total!: number;

  @ApiProperty({ example: 3 })
  registered_total!: number;

  @ApiProperty({ description: 'Workers found already registered', example: 8 })
  noop_total!: number;

  @ApiProperty({ example: 2 })
  transient_errors_total!: number;

  @ApiProperty({ example: 0 })
  conflicts_total!: number;

  @ApiProperty({ example: 0 })
  failed_total!: number;
}

export class DrainMetricsDto {
  @ApiProperty({ example: 1 })
  requested_total!: number;

  @ApiProperty({ example: 1 })
  completed_total!: number;

  @ApiProperty({ example: 0 })
  stalled_total!: number;

  @ApiProperty({ example: 0 })
  forced_removals_total!: number;
}

export class ProbeMetricsDto {
  @ApiProperty({ example: 7 })
  ready_total!: number;

  @ApiProperty({ example: 0 })
  timeouts_total!: number;
}

export class RebalanceMetricsDto {
  @ApiProperty({ example: 1 })
  started_total!: number;

  @ApiProperty({ example: 1 })
  completed_total!: number;

  @ApiProperty({ example: 0 })
  failed_total!: number;
}

export class ClusterMetricsDto {
  @ApiProperty({ description: 'Workers registered at the last observation', example: 3 })
  registered_workers!: number;
}

export class ServerMetricsDto {
  @ApiProperty({ example: 3600 })
  uptime_seconds!: number;
}

export class MetricsResponseDto {
  @ApiProperty({ type: OperationMetricsDto })
  operations!: OperationMetricsDto;

  @ApiProperty({ type: NodeMetricsDto })
  nodes!: NodeMetricsDto;

  @ApiProperty({ type: RegistrationMetricsDto })
  registration!: RegistrationMetricsDto;

  @ApiProperty({ type: DrainMetricsDto })
  drain!: DrainMetricsDto;

  @ApiProperty({ type: ProbeMetricsDto })
  probe!: ProbeMetricsDto;

  @ApiProperty({ type: RebalanceMetricsDto })
  rebalance!: RebalanceMetricsDto;

  @ApiProperty({ type: ClusterMetricsDto })
  cluster!: ClusterMetricsDto;

  @ApiProperty({ type: ServerMetricsDto })
  server!: ServerMetricsDto;
}
