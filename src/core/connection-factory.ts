import { getEnv, toConnectionSettings, type ConnectionSettings } from '../config/env.js';
import type { DatabaseEngine, EndpointDescriptor } from '../types/index.js';
import { ConnectionError, classifyDriverError, getErrorMessage, type DriverFailure } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { mapWithConcurrency } from './semaphore.js';
import { MysqlDriver } from './drivers/mysql.driver.js';
import { PostgresDriver } from './drivers/postgres.driver.js';
import type { EndpointConnection, EndpointDriver } from './drivers/types.js';

export const DEFAULT_PROBE_CONCURRENCY = 5;

export const PROBE_QUERY = 'SELECT 1 AS test_value, version() AS server_version';

const ENGINE_LABELS: Record<DatabaseEngine, string> = {
  postgres: 'PostgreSQL',
  mysql: 'MySQL'
};

export type DriverRegistry = Record<DatabaseEngine, EndpointDriver>;

/**
 * Outcome of the side-effect-free connectivity probe for one endpoint.
 */
export interface ConnectionTestResult {
  endpointId: string;
  success: boolean;
  message: string;
  errorCode?: string;
  serverVersion?: string;
  durationMs: number;
}

export interface ConnectionFactoryOptions {
  drivers?: Partial<DriverRegistry>;
  settings?: ConnectionSettings;
  logger?: Logger;
}

export class ConnectionFactory {
  private readonly drivers: DriverRegistry;
  private readonly settings: ConnectionSettings;
  private readonly logger: Logger;

  constructor(options: ConnectionFactoryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.settings = options.settings ?? toConnectionSettings(getEnv());
    this.drivers = {
      postgres: options.drivers?.postgres ?? new PostgresDriver(this.logger),
      mysql: options.drivers?.mysql ?? new MysqlDriver(this.logger)
    };
  }

  /**
   * Open a connection to one endpoint. Rejects with ConnectionError.
   */
  async open(endpoint: EndpointDescriptor): Promise<EndpointConnection> {
    try {
      return await this.drivers[endpoint.engine].connect(endpoint, this.settings);
    } catch (error) {
      const failure = classifyDriverError(error);
      this.logger.debug(`[${endpoint.id}] connect failed (${failure.kind}${failure.code ? ` ${failure.code}` : ''}): ${failure.message}`);
      throw new ConnectionError(failure.message, endpoint.id, failure);
    }
  }

  /**
   * Probe one endpoint with a trivial SELECT. Never throws.
   */
  async testConnection(endpoint: EndpointDescriptor): Promise<ConnectionTestResult> {
    const startedAt = performance.now();
    const elapsed = () => Math.round(performance.now() - startedAt);

    let connection: EndpointConnection | undefined;
    try {
      connection = await this.open(endpoint);
      const [probe] = await connection.execute(PROBE_QUERY);
      const row = probe?.rows[0];
      if (!row) {
        return { endpointId: endpoint.id, success: false, message: 'Failed to execute test query', durationMs: elapsed() };
      }

      const version = row[1];
      return {
        endpointId: endpoint.id,
        success: true,
        message: 'Connection successful',
        serverVersion: typeof version === 'string' ? version : undefined,
        durationMs: elapsed()
      };
    } catch (error) {
      const failure = error instanceof ConnectionError ? error.failure : classifyDriverError(error);
      return {
        endpointId: endpoint.id,
        success: false,
        message: this.describeProbeFailure(endpoint.engine, failure),
        errorCode: failure.code,
        durationMs: elapsed()
      };
    } finally {
      await this.releaseQuietly(connection);
    }
  }

  /**
   * Probe every endpoint with at most `maxConcurrency` probes in flight.
   * Results keep the input order.
   */
  async testAllConnections(
    endpoints: readonly EndpointDescriptor[],
    maxConcurrency: number = DEFAULT_PROBE_CONCURRENCY
  ): Promise<ConnectionTestResult[]> {
    return mapWithConcurrency(endpoints, maxConcurrency, (endpoint) => this.testConnection(endpoint));
  }

  async closeAll(): Promise<void> {
    await Promise.all(Object.values(this.drivers).map((driver) => driver.end()));
  }

  private describeProbeFailure(engine: DatabaseEngine, failure: DriverFailure): string {
    if (failure.kind === 'timeout') return `Connection timeout: ${failure.message}`;
    if (failure.kind === 'unexpected') return `Unexpected error: ${failure.message}`;
    return `${ENGINE_LABELS[engine]} Error: ${failure.message}`;
  }

  private async releaseQuietly(connection: EndpointConnection | undefined): Promise<void> {
    if (!connection) return;
    try {
      await connection.release();
    } catch (error) {
      this.logger.warn(`[${connection.endpointId}] failed to release probe connection: ${getErrorMessage(error)}`);
    }
  }
}
