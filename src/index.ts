export type { DatabaseEngine, EndpointDescriptor, SqlValue, TextSink } from './types/index.js';

export { getEnv, parseEnv, toConnectionSettings, type ConnectionSettings, type Env, type SslMode } from './config/env.js';
export {
  describeEndpoint,
  loadEnvironments,
  maskedConnectionUrl,
  parseEnvironmentConfig,
  resolveEnvironmentsFile
} from './config/environments.js';

export {
  ConfigError,
  ConnectionError,
  FanoutError,
  QueryFileError,
  ValidationError,
  classifyDriverError,
  type DriverFailure,
  type DriverFailureKind
} from './core/errors.js';
export { createLogger, silentLogger, type Logger } from './core/logger.js';
export { readQueryFile, type QueryFile } from './core/query-file.js';
export {
  ConnectionFactory,
  type ConnectionFactoryOptions,
  type ConnectionTestResult
} from './core/connection-factory.js';
export type { EndpointConnection, EndpointDriver, ResultSet } from './core/drivers/types.js';

export {
  StatementClassifier,
  classifyStatement,
  splitStatements,
  statementClassifier,
  stripComments,
  type SqlDialect
} from './modules/validation/statement-classifier.js';
export type { StatementType, ValidationOutcome } from './modules/validation/types/validation.types.js';
export { TransactionGuard } from './modules/execution/transaction-guard.js';
export { ExecutionCoordinator } from './modules/execution/execution-coordinator.js';
export type { FailedOutcome, QueryOutcome, SuccessfulOutcome } from './modules/execution/types/execution.types.js';
export { ResultRenderer, createRenderSession, resultRenderer, type OutputMode, type RenderSession } from './modules/render/result-renderer.js';
export { RunService, type RunReport, type RunRequest } from './modules/run/run.service.js';
