import { Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min, ValidateNested } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { REBALANCE_STRATEGIES } from '../../config/config.constants';
import type { RebalanceStrategy } from '../../coordinator/interfaces';
import { TopologyOverridesDto } from '../../topology/dto/topology.dto';

export class ConvergeRequestDto {
  @ApiProperty({
    required: false,
    type: TopologyOverridesDto,
    description: 'Overrides applied over the configured topology. The configured topology is used as-is when omitted.',
  })
  @IsOptional()
  @ValidateNested()
  @Type(() => TopologyOverridesDto)
  topology?: TopologyOverridesDto;

  @ApiProperty({
    required: false,
    default: false,
    description: 'Remove nodes dropped from the topology without draining them. Shard placements on them may be lost.',
  })
  @IsOptional()
  @IsBoolean()
  forceRemoval?: boolean;

  @ApiProperty({ required: false, description: 'Start a rebalance once new workers are registered.' })
  @IsOptional()
  @IsBoolean()
  rebalance?: boolean;
}

export class AddWorkerDto {
  @ApiProperty({ required: false, description: 'Must equal the next free index when given.', example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  index?: number;

  @ApiProperty({ required: false, example: 'db-c.internal' })
  @IsOptional()
  @IsString()
  @MaxLength(253)
  host?: string;

  @ApiProperty({ required: false, example: 5435 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  port?: number;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsBoolean()
  rebalance?: boolean;
}

export class ResizeDto {
  @ApiProperty({ description: 'Desired number of workers.', example: 4, minimum: 0 })
  @IsInt()
  @Min(0)
  workerCount!: number;

  @ApiProperty({ required: false, default: false, description: 'Skip draining workers removed by a shrink.' })
  @IsOptional()
  @IsBoolean()
  forceRemoval?: boolean;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsBoolean()
  rebalance?: boolean;
}

export class RebalanceRequestDto {
  @ApiProperty({
    required: false,
    enum: [...REBALANCE_STRATEGIES],
    description: 'Chosen from the shard count hint when omitted.',
  })
  @IsOptional()
  @IsIn([...REBALANCE_STRATEGIES])
  strategy?: RebalanceStrategy;
}
