/**
 * Database engines an endpoint can speak.
 */
export type DatabaseEngine = 'postgres' | 'mysql';

/**
 * One configured target database. Created once by the environments loader
 * and read-only for the rest of the run.
 */
export interface EndpointDescriptor {
  readonly id: string;
  readonly engine: DatabaseEngine;
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly username: string;
  readonly password: string;
}

/**
 * Values a result cell can hold after normalization.
 */
export type SqlValue =
  | null
  | string
  | number
  | bigint
  | boolean
  | Date
  | Buffer
  | readonly SqlValue[]
  | { readonly [key: string]: SqlValue };

/**
 * Anything that accepts rendered text: process.stdout, a file stream, a test buffer.
 */
export interface TextSink {
  write(chunk: string): unknown;
}
