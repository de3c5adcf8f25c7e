import { Injectable } from '@nestjs/common';
import type { Topology } from '../topology/interfaces';
import type { AppliedPlan } from './interfaces';

/**
 * In-memory record of what the controller last applied and what it was last asked for.
 * Empty after a restart, in which case the node set is re-derived from the supervisor.
 */
@Injectable()
export class ClusterStateStore {
  private lastApplied: AppliedPlan | null = null;
  private desired: Topology | null = null;

  getLastApplied(): AppliedPlan | null {
    return this.lastApplied;
  }

  setLastApplied(plan: AppliedPlan): void {
    this.lastApplied = plan;
  }

  clearLastApplied(): void {
    this.lastApplied = null;
  }

  getDesired(): Topology | null {
    return this.desired;
  }

  setDesired(topology: Topology): void {
    this.desired = topology;
  }
}
