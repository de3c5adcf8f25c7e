import { Module } from '@nestjs/common';
import { CoordinatorModule } from '../coordinator/coordinator.module';
import { HealthProberService } from './health-prober.service';
import { NODE_PROBE } from './interfaces';
import { PgNodeProbe } from './pg-node.probe';

@Module({
  imports: [CoordinatorModule],
  providers: [
    {
      provide: NODE_PROBE,
      useClass: PgNodeProbe,
    },
    HealthProberService,
  ],
  exports: [HealthProberService],
})
export class ProbeModule {}
