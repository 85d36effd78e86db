import type { ConnectionSettings } from '../../config/env.js';
import type { DatabaseEngine, EndpointDescriptor } from '../../types/index.js';

/**
 * One result set as the driver returned it: column names from result-set
 * metadata and raw cell values in column order.
 */
export interface ResultSet {
  columns: string[];
  rows: unknown[][];
}

/**
 * An open connection owned by exactly one endpoint for the duration of one query.
 */
export interface EndpointConnection {
  readonly endpointId: string;
  readonly engine: DatabaseEngine;
  /** Run SQL text and return every result set it produced, in order. */
  execute(sql: string): Promise<ResultSet[]>;
  /**
   * Hand the connection back. Passing an error marks it broken so the pool
   * destroys it instead of reusing it. Calling release twice is a no-op.
   */
  release(error?: Error): Promise<void>;
}

export interface EndpointDriver {
  readonly engine: DatabaseEngine;
  connect(endpoint: EndpointDescriptor, settings: ConnectionSettings): Promise<EndpointConnection>;
  /** End every pool this driver opened. */
  end(): Promise<void>;
}

const SSL_UNSUPPORTED_PATTERN = /does not support (ssl|secure conn)/i;

export function isSslUnsupportedError(error: unknown): boolean {
  return error instanceof Error && SSL_UNSUPPORTED_PATTERN.test(error.message);
}
