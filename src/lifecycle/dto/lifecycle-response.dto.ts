import { ApiProperty } from '@nestjs/swagger';

class ReportedErrorDto {
  @ApiProperty({ example: 'DRAIN_STALL' })
  code!: string;

  @ApiProperty()
  message!: string;
}

class NodeIdentityDto {
  @ApiProperty({ example: 'worker-1' })
  host!: string;

  @ApiProperty({ example: 5433 })
  port!: number;
}

export class NodeReportDto {
  @ApiProperty({ example: 'worker-1' })
  name!: string;

  @ApiProperty({ enum: ['coordinator', 'worker'] })
  role!: string;

  @ApiProperty({ type: NodeIdentityDto })
  identity!: NodeIdentityDto;

  @ApiProperty({ example: 'Registered' })
  targetState!: string;

  @ApiProperty({ example: 'Registered' })
  achievedState!: string;

  @ApiProperty({ required: false })
  attempts?: number;

  @ApiProperty({ required: false, description: 'Drain was skipped at the caller\'s request.' })
  forced?: boolean;

  @ApiProperty({ required: false, type: ReportedErrorDto })
  error?: ReportedErrorDto;

  @ApiProperty({ required: false, type: [String] })
  warnings?: string[];
}

class RebalanceReportDto {
  @ApiProperty({ enum: ['by_shard_count', 'by_disk_size'] })
  strategy!: string;

  @ApiProperty({ nullable: true, type: String })
  jobId!: string | null;

  @ApiProperty({ required: false, type: ReportedErrorDto })
  error?: ReportedErrorDto;
}

export class OperationReportDto {
  @ApiProperty({ enum: ['converge', 'add-worker', 'remove-worker', 'resize'] })
  operation!: string;

  @ApiProperty({ enum: ['Converged', 'PartiallyConverged', 'Failed'] })
  overall!: string;

  @ApiProperty({ type: [NodeReportDto] })
  perNode!: NodeReportDto[];

  @ApiProperty({ example: 5120 })
  elapsedMs!: number;

  @ApiProperty({ required: false, description: 'SHA-256 of the generated plan.' })
  planHash?: string;

  @ApiProperty({ required: false })
  unchanged?: boolean;

  @ApiProperty({ required: false, type: RebalanceReportDto })
  rebalance?: RebalanceReportDto;

  @ApiProperty({ type: [String] })
  warnings!: string[];
}

export class RebalanceStartedDto {
  @ApiProperty({ enum: ['by_shard_count', 'by_disk_size'] })
  strategy!: string;

  @ApiProperty({ nullable: true, type: String, description: 'null when there was nothing to move.' })
  jobId!: string | null;
}

export class RebalanceStatusDto {
  @ApiProperty()
  jobId!: string;

  @ApiProperty({ enum: ['Pending', 'Running', 'Done', 'Failed'] })
  state!: string;
}
