import { Logger } from '@nestjs/common';
import type { ShardplaneConfiguration } from './config.types';

/**
 * Renders a secret for log output: its length only, never its characters.
 */
export function redactSecret(secret: string): string {
  return secret ? `[redacted, ${secret.length} chars]` : '[not set]';
}

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * Sensitive values (API key, node password) are redacted.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: ShardplaneConfiguration): void {
  const summaryLogger = new Logger('Configuration');
  const { topology } = config;

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.main.port}`);
  summaryLogger.log(`API Key: ${redactSecret(config.main.apiKey)}`);

  summaryLogger.log(`Cluster: ${topology.clusterName} (image: ${topology.image})`);
  summaryLogger.log(
    topology.coordinatorEnabled
      ? `Coordinator: managed at ${topology.coordinatorHost}:${topology.coordinatorPort}`
      : `Coordinator: external at ${config.coordinator.connectHost}:${config.coordinator.connectPort}`,
  );
  summaryLogger.log(
    `Workers: ${topology.workerCount} (port base ${topology.portBase}, ` +
      `${topology.workerHosts.length > 0 ? `multi-host: ${topology.workerHosts.join(', ')}` : 'single-host'})`,
  );
  summaryLogger.log(
    `Credentials: user=${topology.credentials.user} db=${topology.credentials.database} ` +
      `password=${redactSecret(topology.credentials.password)}`,
  );

  if (topology.shardCountHint !== undefined || topology.replicationFactor !== undefined) {
    summaryLogger.log(
      `Sharding: shard count hint ${topology.shardCountHint ?? 'unset'}, ` +
        `replication factor ${topology.replicationFactor ?? 'unset'}`,
    );
  }

  summaryLogger.log(`Docker: ${config.supervisor.dockerSocket ?? 'default socket'}, network ${config.supervisor.network ?? 'default'}`);
  summaryLogger.log(
    `Timeouts: probe ${config.probe.timeout}ms, registration confirm ${config.registration.confirmTimeout}ms, ` +
      `drain ${config.drain.timeout}ms`,
  );
  summaryLogger.log(
    `Parallelism: ${config.lifecycle.parallelism === 0 ? 'bounded by worker count' : config.lifecycle.parallelism}`,
  );
  summaryLogger.log(`Periodic Reconcile: ${config.reconcile.enabled ? 'enabled' : 'disabled'}`);
  summaryLogger.log(`Event Stream: ${config.events.enabled ? 'enabled' : 'disabled'}`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
