import pg, { type PoolClient, type PoolConfig, type QueryArrayConfig } from 'pg';
import type { ConnectionSettings } from '../../config/env.js';
import { getErrorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { EndpointDescriptor } from '../../types/index.js';
import { isSslUnsupportedError, type EndpointConnection, type EndpointDriver, type ResultSet } from './types.js';

const { Pool, types } = pg;

const DATE_OID = 1082;
const TIMESTAMP_WITHOUT_TIME_ZONE_OID = 1114;
const DATE_PATTERN = /^(\d{4,})-(\d{2})-(\d{2})$/;

/** `timestamp without time zone` is read as UTC. BC and infinite values stay text. */
export function parseTimestampAsUtc(value: string): Date | string {
  const parsed = new Date(`${value.replace(' ', 'T')}Z`);
  return Number.isNaN(parsed.getTime()) ? value : parsed;
}

/** `date` is UTC midnight, whatever the process time zone. */
export function parseDateAsUtc(value: string): Date | string {
  const match = DATE_PATTERN.exec(value);
  if (!match) return value;

  const date = new Date(0);
  date.setUTCFullYear(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return date;
}

types.setTypeParser(DATE_OID, parseDateAsUtc);
types.setTypeParser(TIMESTAMP_WITHOUT_TIME_ZONE_OID, parseTimestampAsUtc);

/** The extended protocol makes the server reject text holding more than one command. */
export type PostgresQueryConfig = QueryArrayConfig & { queryMode: 'extended' };

export function buildQueryConfig(sql: string): PostgresQueryConfig {
  return { text: sql, rowMode: 'array', queryMode: 'extended' };
}

/**
 * The slice of a checked-out `pg` client the connection uses.
 */
export interface PostgresSession {
  query(config: PostgresQueryConfig): Promise<{ fields: readonly { name: string }[]; rows: unknown[][] }>;
  release(error?: Error): void;
}

export interface PostgresPool {
  connect(): Promise<PostgresSession>;
  end(): Promise<void>;
  onError(listener: (error: Error) => void): void;
}

export type PostgresPoolFactory = (config: PoolConfig) => PostgresPool;

function sessionFrom(client: PoolClient): PostgresSession {
  return {
    query: (config) => client.query(config),
    release: (error) => client.release(error)
  };
}

export const createPostgresPool: PostgresPoolFactory = (config) => {
  const pool = new Pool(config);
  return {
    connect: async () => sessionFrom(await pool.connect()),
    end: () => pool.end(),
    onError: (listener) => {
      pool.on('error', listener);
    }
  };
};

export class PostgresConnection implements EndpointConnection {
  readonly engine = 'postgres' as const;
  private released = false;

  constructor(
    readonly endpointId: string,
    private readonly session: PostgresSession
  ) {}

  async execute(sql: string): Promise<ResultSet[]> {
    const result = await this.session.query(buildQueryConfig(sql));
    return [{ columns: result.fields.map((field) => field.name), rows: result.rows }];
  }

  async release(error?: Error): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.session.release(error);
  }
}

export class PostgresDriver implements EndpointDriver {
  readonly engine = 'postgres' as const;
  private readonly pools = new Map<string, PostgresPool>();

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly createPool: PostgresPoolFactory = createPostgresPool
  ) {}

  async connect(endpoint: EndpointDescriptor, settings: ConnectionSettings): Promise<EndpointConnection> {
    const pool = this.getPool(endpoint, settings, settings.sslMode !== 'disable');

    try {
      return new PostgresConnection(endpoint.id, await pool.connect());
    } catch (error) {
      if (settings.sslMode !== 'prefer' || !isSslUnsupportedError(error)) {
        throw error;
      }
      this.logger.debug(`[${endpoint.id}] server does not support SSL, retrying without it`);
      await this.closePool(endpoint.id);
      const plainPool = this.getPool(endpoint, settings, false);
      return new PostgresConnection(endpoint.id, await plainPool.connect());
    }
  }

  async end(): Promise<void> {
    await Promise.all([...this.pools.keys()].map((endpointId) => this.closePool(endpointId)));
  }

  private getPool(endpoint: EndpointDescriptor, settings: ConnectionSettings, useSsl: boolean): PostgresPool {
    const existing = this.pools.get(endpoint.id);
    if (existing) {
      return existing;
    }

    const pool = this.createPool({
      host: endpoint.host,
      port: endpoint.port,
      database: endpoint.database,
      user: endpoint.username,
      password: endpoint.password,
      ssl: useSsl ? { rejectUnauthorized: false } : false,
      min: settings.poolMin,
      max: settings.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: settings.connectTimeoutMs,
      statement_timeout: settings.commandTimeoutMs,
      query_timeout: settings.commandTimeoutMs,
      application_name: 'fanout-sql'
    });

    pool.onError((err) => {
      this.logger.error(`PG pool error for endpoint ${endpoint.id}: ${err.message}`);
      this.closePool(endpoint.id).catch((closeError: unknown) => {
        this.logger.error(`Error closing pool for endpoint ${endpoint.id}: ${getErrorMessage(closeError)}`);
      });
    });

    this.pools.set(endpoint.id, pool);
    return pool;
  }

  private async closePool(endpointId: string): Promise<void> {
    const pool = this.pools.get(endpointId);
    if (!pool) return;
    this.pools.delete(endpointId);
    try {
      await pool.end();
    } catch (err) {
      this.logger.error(`Error closing pool for endpoint ${endpointId}: ${getErrorMessage(err)}`);
    }
  }
}
