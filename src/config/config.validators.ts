import { Logger } from '@nestjs/common';
import { CLUSTER_NAME_PATTERN, MAX_TCP_PORT } from './config.constants';

const logger = new Logger('ConfigValidation');

/**
 * Validates a host identity: an RFC 1123 hostname (single label or dotted) or an IPv4 address.
 *
 * @param host - Host name to validate
 * @returns True if the host format is valid
 */
export function isValidHost(host: string): boolean {
  if (host.length === 0 || host.length > 253) {
    return false;
  }
  // Matches: coordinator, worker-1, db-a.internal, 10.0.0.12
  return /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/.test(
    host,
  );
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= MAX_TCP_PORT;
}

/**
 * Cluster names become container-name prefixes and label values.
 */
export function isValidClusterName(name: string): boolean {
  return CLUSTER_NAME_PATTERN.test(name);
}

/**
 * Validates the port layout of the declared topology for common misconfigurations.
 *
 * Logs warnings for:
 * - A port base that puts worker-1 on the coordinator port (single-host layouts only)
 * - Worker ports below 1024, which need elevated privileges to publish
 */
export function validatePortLayout(coordinatorPort: number | undefined, portBase: number, multiHost: boolean): void {
  if (!multiHost && coordinatorPort !== undefined && portBase + 1 === coordinatorPort) {
    logger.warn(
      `SHP_PORT_BASE=${portBase} places worker-1 on the coordinator port ${coordinatorPort}. ` +
        'The topology will be rejected until SHP_PORT_BASE or SHP_COORDINATOR_PORT changes.',
    );
  }

  if (portBase + 1 < 1024) {
    logger.warn(`SHP_PORT_BASE=${portBase} publishes worker ports below 1024; this usually requires root.`);
  }
}
