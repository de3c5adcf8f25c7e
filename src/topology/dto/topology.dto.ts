import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import type { Placement, TopologyOverrides } from '../interfaces';

export class CoordinatorSpecDto {
  @ApiProperty({ description: 'Host identity the coordinator is reachable under.', example: 'coordinator' })
  @IsString()
  @MinLength(1)
  @MaxLength(253)
  host!: string;

  @ApiProperty({ description: 'Coordinator port.', example: 5432, minimum: 1, maximum: 65535 })
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;
}

export class WorkerSpecDto {
  @ApiProperty({ description: 'Worker index; indices must be contiguous from 1.', example: 1, minimum: 1 })
  @IsInt()
  @Min(1)
  index!: number;

  @ApiProperty({ description: 'Explicit port. Defaults to portBase + index.', required: false, example: 5433 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  port?: number;

  @ApiProperty({
    description: 'Explicit host identity. Defaults to worker-<index>; required for multi-host placement.',
    required: false,
    example: 'db-a.internal',
  })
  @IsOptional()
  @IsString()
  @MaxLength(253)
  host?: string;
}

export class CredentialsDto {
  @ApiProperty({ required: false, example: 'postgres' })
  @IsOptional()
  @IsString()
  user?: string;

  @ApiProperty({ required: false, description: 'Never echoed back in responses.' })
  @IsOptional()
  @IsString()
  password?: string;

  @ApiProperty({ required: false, example: 'postgres' })
  @IsOptional()
  @IsString()
  database?: string;
}

/**
 * Topology overrides applied over the configured declaration. Every field is optional.
 */
export class TopologyOverridesDto {
  @ApiProperty({ required: false, example: 'analytics' })
  @IsOptional()
  @IsString()
  clusterName?: string;

  @ApiProperty({ required: false, enum: ['single-host', 'multi-host'] })
  @IsOptional()
  @IsIn(['single-host', 'multi-host'])
  placement?: Placement;

  @ApiProperty({
    required: false,
    type: CoordinatorSpecDto,
    nullable: true,
    description: 'null declares a worker-only topology attached to an external coordinator.',
  })
  @IsOptional()
  @ValidateNested()
  @Type(() => CoordinatorSpecDto)
  coordinator?: CoordinatorSpecDto | null;

  @ApiProperty({ required: false, minimum: 0, example: 3 })
  @IsOptional()
  @IsInt()
  @Min(0)
  workerCount?: number;

  @ApiProperty({ required: false, type: [WorkerSpecDto] })
  @IsOptional()
  @ArrayMaxSize(1024)
  @ValidateNested({ each: true })
  @Type(() => WorkerSpecDto)
  workers?: WorkerSpecDto[];

  @ApiProperty({ required: false, example: 5432 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  portBase?: number;

  @ApiProperty({ required: false, type: CredentialsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => CredentialsDto)
  credentials?: CredentialsDto;

  @ApiProperty({ required: false, example: 64 })
  @IsOptional()
  @IsInt()
  @Min(1)
  shardCountHint?: number;

  @ApiProperty({ required: false, example: 2 })
  @IsOptional()
  @IsInt()
  @Min(1)
  replicationFactor?: number;

  @ApiProperty({ required: false, example: 'citusdata/citus:12.1' })
  @IsOptional()
  @IsString()
  image?: string;
}

/**
 * Copies the set fields of a validated DTO into plain overrides.
 */
export function toTopologyOverrides(dto: TopologyOverridesDto): TopologyOverrides {
  const overrides: TopologyOverrides = {};
  if (dto.clusterName !== undefined) overrides.clusterName = dto.clusterName;
  if (dto.placement !== undefined) overrides.placement = dto.placement;
  if (dto.coordinator !== undefined) {
    overrides.coordinator = dto.coordinator === null ? null : { host: dto.coordinator.host, port: dto.coordinator.port };
  }
  if (dto.workerCount !== undefined) overrides.workerCount = dto.workerCount;
  if (dto.workers !== undefined) {
    overrides.workers = dto.workers.map(({ index, port, host }) => ({
      index,
      ...(port !== undefined ? { port } : {}),
      ...(host !== undefined ? { host } : {}),
    }));
  }
  if (dto.portBase !== undefined) overrides.portBase = dto.portBase;
  if (dto.credentials !== undefined) {
    const { user, password, database } = dto.credentials;
    overrides.credentials = {
      ...(user !== undefined ? { user } : {}),
      ...(password !== undefined ? { password } : {}),
      ...(database !== undefined ? { database } : {}),
    };
  }
  if (dto.shardCountHint !== undefined) overrides.shardCountHint = dto.shardCountHint;
  if (dto.replicationFactor !== undefined) overrides.replicationFactor = dto.replicationFactor;
  if (dto.image !== undefined) overrides.image = dto.image;
  return overrides;
}
