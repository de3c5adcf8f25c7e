import { Injectable, Logger } from '@nestjs/common';
import { Client, DatabaseError } from 'pg';
import { getErrorMessage } from '../shared/error.utils';
import type { NodeProbe, ProbeCredentials, ProbeOutcome } from './interfaces';

/**
 * Opens a fresh connection and runs `SELECT 1`.
 *
 * A socket-level failure means Unreachable. A failure reported by the server itself
 * (SQLSTATE present, e.g. 57P03 "the database system is starting up") means NotReady.
 */
@Injectable()
export class PgNodeProbe implements NodeProbe {
  private readonly logger = new Logger(PgNodeProbe.name);

  async probe(host: string, port: number, credentials: ProbeCredentials, timeoutMs: number): Promise<ProbeOutcome> {
    const client = new Client({
      host,
      port,
      user: credentials.user,
      password: credentials.password,
      database: credentials.database,
      connectionTimeoutMillis: timeoutMs,
      query_timeout: timeoutMs,
    });
    // A failed connect can still emit 'error' later; it is already reflected in the outcome
    client.on('error', (error) => {
      this.logger.debug(`Probe connection to ${host}:${port} errored: ${error.message}`);
    });

    let connected = false;
    try {
      await client.connect();
      connected = true;
      await client.query('SELECT 1');
      return 'Ready';
    } catch (error) {
      const outcome = connected || error instanceof DatabaseError ? 'NotReady' : 'Unreachable';
      this.logger.debug(`Probe ${host}:${port} -> ${outcome}: ${getErrorMessage(error)}`);
      return outcome;
    } finally {
      await client.end().catch((error: unknown) => {
        this.logger.debug(`Closing probe connection to ${host}:${port} failed: ${getErrorMessage(error)}`);
      });
    }
  }
}
