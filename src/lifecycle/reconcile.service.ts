import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { getErrorMessage } from '../shared/error.utils';
import type { OperationReport } from './interfaces';
import { LifecycleService } from './lifecycle.service';

/**
 * Periodically converges the current topology when SHP_RECONCILE_ENABLED is set.
 */
@Injectable()
export class ReconcileService {
  private readonly logger = new Logger(ReconcileService.name);
  private readonly enabled: boolean;

  constructor(
    private readonly lifecycle: LifecycleService,
    configService: ConfigService,
  ) {
    this.enabled = configService.get<boolean>('shardplane.reconcile.enabled', false);
  }

  /**
   * @returns The report, or `null` when the tick was skipped
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  async reconcile(): Promise<OperationReport | null> {
    if (!this.enabled) {
      return null;
    }
    if (this.lifecycle.busy) {
      this.logger.debug('Skipping reconcile: another operation is in flight');
      return null;
    }

    try {
      const report = await this.lifecycle.converge(this.lifecycle.currentTopology());
      if (report.overall !== 'Converged') {
        this.logger.warn(`Reconcile finished ${report.overall}`);
      }
      return report;
    } catch (error) {
      this.logger.error(`Reconcile failed: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
