import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import type { CoordinatorConfig, TopologyConfig } from '../config/config.types';
import { CitusCoordinatorClient } from './citus-coordinator.client';
import { CoordinatorGateway } from './coordinator.gateway';
import { CoordinatorHealthIndicator } from './coordinator.health';
import { COORDINATOR_CLIENT } from './interfaces';

@Module({
  imports: [TerminusModule],
  providers: [
    {
      provide: COORDINATOR_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const connection = configService.get<CoordinatorConfig>('shardplane.coordinator');
        const topology = configService.get<TopologyConfig>('shardplane.topology');
        if (!connection || !topology) {
          throw new Error('Coordinator configuration is not loaded');
        }
        return new CitusCoordinatorClient({
          host: connection.connectHost,
          port: connection.connectPort,
          user: topology.credentials.user,
          password: topology.credentials.password,
          database: topology.credentials.database,
          connectTimeout: connection.connectTimeout,
        });
      },
    },
    CoordinatorGateway,
    CoordinatorHealthIndicator,
  ],
  exports: [CoordinatorGateway, CoordinatorHealthIndicator],
})
export class CoordinatorModule {}
