import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { getErrorMessage } from '../shared/error.utils';
import { NODE_SUPERVISOR, type NodeSupervisor } from './interfaces';

/**
 * Health indicator for the node supervisor backend.
 */
@Injectable()
export class SupervisorHealthIndicator {
  constructor(
    @Inject(NODE_SUPERVISOR) private readonly supervisor: NodeSupervisor,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    try {
      await this.supervisor.ping();
      return indicator.up();
    } catch (error) {
      return indicator.down({ message: getErrorMessage(error) });
    }
  }
}
