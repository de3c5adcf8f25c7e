import { Module } from '@nestjs/common';
import { CoordinatorModule } from '../coordinator/coordinator.module';
import { GeneratorModule } from '../generator/generator.module';
import { ProbeModule } from '../probe/probe.module';
import { RegistrationModule } from '../registration/registration.module';
import { SupervisorModule } from '../supervisor/supervisor.module';
import { TopologyModule } from '../topology/topology.module';
import { ClusterInspectorService } from './cluster-inspector.service';
import { ClusterStateStore } from './cluster-state.store';
import { LifecycleController } from './lifecycle.controller';
import { LifecycleService } from './lifecycle.service';
import { RebalanceService } from './rebalance.service';
import { ReconcileService } from './reconcile.service';

@Module({
  imports: [TopologyModule, GeneratorModule, SupervisorModule, CoordinatorModule, ProbeModule, RegistrationModule],
  controllers: [LifecycleController],
  providers: [ClusterStateStore, LifecycleService, RebalanceService, ClusterInspectorService, ReconcileService],
  exports: [LifecycleService],
})
export class LifecycleModule {}
