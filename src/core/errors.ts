export type FanoutErrorCode =
  | 'QUERY_VALIDATION_FAILED'
  | 'ENDPOINT_UNREACHABLE'
  | 'CONFIG_INVALID'
  | 'QUERY_FILE_INVALID';

export class FanoutError extends Error {
  constructor(
    message: string,
    readonly code: FanoutErrorCode,
    readonly details?: string
  ) {
    super(message);
    this.name = 'FanoutError';
  }
}

/**
 * The query failed the read-only gate. Fatal to the whole run.
 */
export class ValidationError extends FanoutError {
  constructor(message: string, details?: string) {
    super(message, 'QUERY_VALIDATION_FAILED', details);
    this.name = 'ValidationError';
  }
}

export class ConnectionError extends FanoutError {
  constructor(
    message: string,
    readonly endpointId: string,
    readonly failure: DriverFailure
  ) {
    super(message, 'ENDPOINT_UNREACHABLE', failure.code);
    this.name = 'ConnectionError';
  }
}

export class ConfigError extends FanoutError {
  constructor(message: string, details?: string) {
    super(message, 'CONFIG_INVALID', details);
    this.name = 'ConfigError';
  }
}

export class QueryFileError extends FanoutError {
  constructor(message: string, details?: string) {
    super(message, 'QUERY_FILE_INVALID', details);
    this.name = 'QueryFileError';
  }
}

export type DriverFailureKind =
  | 'timeout'
  | 'auth'
  | 'permission'
  | 'read-only-violation'
  | 'network'
  | 'database'
  | 'unexpected';

export interface DriverFailure {
  kind: DriverFailureKind;
  message: string;
  code?: string;
}

const PG_AUTH_CODES = new Set(['28000', '28P01']);
const PG_PERMISSION_CODES = new Set(['42501']);
const PG_READ_ONLY_CODES = new Set(['25006']);
const PG_TIMEOUT_CODES = new Set(['57014']);

const MYSQL_AUTH_CODES = new Set(['ER_ACCESS_DENIED_ERROR', 'ER_NOT_SUPPORTED_AUTH_MODE']);
const MYSQL_PERMISSION_CODES = new Set([
  'ER_DBACCESS_DENIED_ERROR',
  'ER_TABLEACCESS_DENIED_ERROR',
  'ER_COLUMNACCESS_DENIED_ERROR',
  'ER_SPECIFIC_ACCESS_DENIED_ERROR'
]);
const MYSQL_READ_ONLY_CODES = new Set(['ER_CANT_EXECUTE_IN_READ_ONLY_TRANSACTION']);

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'EPIPE']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'PROTOCOL_SEQUENCE_TIMEOUT']);

/**
 * A refused dual-stack connect arrives as an AggregateError with an empty
 * message; its inner errors carry the text, and failing that the code does.
 */
export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) {
    if (error.message) return error.message;
    if (error instanceof AggregateError) {
      const inner: unknown[] = error.errors;
      const messages = inner.map((item) => getErrorMessage(item, '')).filter((message) => message !== '');
      if (messages.length > 0) return messages.join('; ');
    }
    return getErrorCode(error) ?? fallback;
  }
  if (typeof error === 'string' && error) return error;
  return fallback;
}

function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error) {
    const { code } = error;
    if (typeof code === 'string' && code) return code;
    if (typeof code === 'number') return String(code);
  }
  if (error instanceof AggregateError) {
    const inner: unknown[] = error.errors;
    return inner.map(getErrorCode).find((code) => code !== undefined);
  }
  return undefined;
}

/**
 * Map a pg / mysql2 / socket error onto a driver-neutral failure kind.
 */
export function classifyDriverError(error: unknown): DriverFailure {
  const message = getErrorMessage(error);
  const code = getErrorCode(error);

  if (code) {
    if (PG_AUTH_CODES.has(code) || MYSQL_AUTH_CODES.has(code)) return { kind: 'auth', message, code };
    if (PG_PERMISSION_CODES.has(code) || MYSQL_PERMISSION_CODES.has(code)) return { kind: 'permission', message, code };
    if (PG_READ_ONLY_CODES.has(code) || MYSQL_READ_ONLY_CODES.has(code)) {
      return { kind: 'read-only-violation', message, code };
    }
    if (PG_TIMEOUT_CODES.has(code) || TIMEOUT_CODES.has(code)) return { kind: 'timeout', message, code };
    if (NETWORK_CODES.has(code)) return { kind: 'network', message, code };
    return { kind: 'database', message, code };
  }

  if (/time(d)?\s?out/i.test(message)) return { kind: 'timeout', message };
  return { kind: 'unexpected', message };
}
