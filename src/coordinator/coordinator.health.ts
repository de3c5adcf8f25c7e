import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { getErrorMessage } from '../shared/error.utils';
import { CoordinatorGateway } from './coordinator.gateway';

/**
 * Health indicator for the coordinator connection.
 */
@Injectable()
export class CoordinatorHealthIndicator {
  constructor(
    private readonly gateway: CoordinatorGateway,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * Lists the coordinator's nodes; reachable and initialized means up.
   */
  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    try {
      const nodes = await this.gateway.listNodes();
      return indicator.up({
        nodes: nodes.length,
        activeWorkers: nodes.filter((node) => node.role === 'worker' && node.active).length,
      });
    } catch (error) {
      return indicator.down({ message: getErrorMessage(error) });
    }
  }
}
