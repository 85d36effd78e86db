import mysql, { type PoolConnection, type PoolOptions } from 'mysql2/promise';
import type { ConnectionSettings } from '../../config/env.js';
import { getErrorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { EndpointDescriptor } from '../../types/index.js';
import { isSslUnsupportedError, type EndpointConnection, type EndpointDriver, type ResultSet } from './types.js';

export function toResultSet(result: unknown, fields: readonly { name: string }[] | undefined): ResultSet {
  // DDL/DML answers with a ResultSetHeader rather than rows
  if (!Array.isArray(result)) {
    return { columns: [], rows: [] };
  }

  const rows: unknown[] = result;
  return {
    columns: (fields ?? []).map((field) => field.name),
    rows: rows.map((row): unknown[] => (Array.isArray(row) ? [...row] : []))
  };
}

/**
 * The slice of a checked-out `mysql2` connection the connection uses.
 */
export interface MysqlSession {
  query(sql: string, timeoutMs: number): Promise<ResultSet>;
  release(): void;
  destroy(): void;
}

export interface MysqlPool {
  getConnection(): Promise<MysqlSession>;
  end(): Promise<void>;
}

export type MysqlPoolFactory = (options: PoolOptions) => MysqlPool;

function sessionFrom(connection: PoolConnection): MysqlSession {
  return {
    query: async (sql, timeout) => {
      const [result, fields] = await connection.query({ sql, rowsAsArray: true, timeout });
      return toResultSet(result, fields);
    },
    release: () => connection.release(),
    destroy: () => connection.destroy()
  };
}

export const createMysqlPool: MysqlPoolFactory = (options) => {
  const pool = mysql.createPool(options);
  return {
    getConnection: async () => sessionFrom(await pool.getConnection()),
    end: () => pool.end()
  };
};

export class MysqlConnection implements EndpointConnection {
  readonly engine = 'mysql' as const;
  private released = false;

  constructor(
    readonly endpointId: string,
    private readonly session: MysqlSession,
    private readonly commandTimeoutMs: number
  ) {}

  async execute(sql: string): Promise<ResultSet[]> {
    return [await this.session.query(sql, this.commandTimeoutMs)];
  }

  async release(error?: Error): Promise<void> {
    if (this.released) return;
    this.released = true;
    if (error) {
      this.session.destroy();
      return;
    }
    this.session.release();
  }
}

export class MysqlDriver implements EndpointDriver {
  readonly engine = 'mysql' as const;
  private readonly pools = new Map<string, MysqlPool>();

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly createPool: MysqlPoolFactory = createMysqlPool
  ) {}

  async connect(endpoint: EndpointDescriptor, settings: ConnectionSettings): Promise<EndpointConnection> {
    const pool = this.getPool(endpoint, settings, settings.sslMode !== 'disable');

    try {
      return new MysqlConnection(endpoint.id, await pool.getConnection(), settings.commandTimeoutMs);
    } catch (error) {
      if (settings.sslMode !== 'prefer' || !isSslUnsupportedError(error)) {
        throw error;
      }
      this.logger.debug(`[${endpoint.id}] server does not support SSL, retrying without it`);
      await this.closePool(endpoint.id);
      const plainPool = this.getPool(endpoint, settings, false);
      return new MysqlConnection(endpoint.id, await plainPool.getConnection(), settings.commandTimeoutMs);
    }
  }

  async end(): Promise<void> {
    await Promise.all([...this.pools.keys()].map((endpointId) => this.closePool(endpointId)));
  }

  private getPool(endpoint: EndpointDescriptor, settings: ConnectionSettings, useSsl: boolean): MysqlPool {
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
      ssl: useSsl ? { rejectUnauthorized: false } : undefined,
      connectionLimit: settings.poolMax,
      maxIdle: Math.max(settings.poolMin, 1),
      idleTimeout: 30000,
      connectTimeout: settings.connectTimeoutMs,
      // one command per round trip; the server rejects a second statement
      multipleStatements: false,
      timezone: 'Z',
      supportBigNumbers: true,
      bigNumberStrings: true
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
