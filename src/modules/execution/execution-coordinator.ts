import type { ConnectionFactory } from '../../core/connection-factory.js';
import type { EndpointConnection } from '../../core/drivers/types.js';
import { ConnectionError, ValidationError, classifyDriverError, getErrorMessage } from '../../core/errors.js';
import { silentLogger, type Logger } from '../../core/logger.js';
import type { EndpointDescriptor } from '../../types/index.js';
import { StatementClassifier } from '../validation/statement-classifier.js';
import { TransactionGuard } from './transaction-guard.js';
import type { FailedOutcome, OutcomeHandler, QueryOutcome } from './types/execution.types.js';

/**
 * The slice of ConnectionFactory the coordinator needs.
 */
export type ConnectionOpener = Pick<ConnectionFactory, 'open'>;

interface ExecutionCoordinatorDependencies {
  connections: ConnectionOpener;
  guard?: TransactionGuard;
  classifier?: StatementClassifier;
  logger?: Logger;
}

/**
 * Runs one query against many endpoints, one endpoint at a time, and hands
 * each outcome over as soon as that endpoint is done. Outcomes always arrive
 * in the input order of the endpoint list.
 */
export class ExecutionCoordinator {
  private readonly connections: ConnectionOpener;
  private readonly guard: TransactionGuard;
  private readonly classifier: StatementClassifier;
  private readonly logger: Logger;

  constructor(dependencies: ExecutionCoordinatorDependencies) {
    this.connections = dependencies.connections;
    this.logger = dependencies.logger ?? silentLogger;
    this.guard = dependencies.guard ?? new TransactionGuard(this.logger);
    this.classifier = dependencies.classifier ?? new StatementClassifier();
  }

  /**
   * Streaming form. `onOutcome` is awaited before the next endpoint starts.
   */
  async run(query: string, endpoints: readonly EndpointDescriptor[], onOutcome: OutcomeHandler): Promise<void> {
    const validation = this.classifier.validate(query);
    if (!validation.isValid) {
      throw new ValidationError('Query validation failed. Only SELECT statements are allowed.', validation.errorMessage);
    }

    for (const endpoint of endpoints) {
      const outcome = await this.executeOn(query, endpoint);
      await onOutcome(outcome);
    }
  }

  /**
   * Batch form. Same order and semantics as `run`.
   */
  async runBatch(query: string, endpoints: readonly EndpointDescriptor[]): Promise<QueryOutcome[]> {
    const outcomes: QueryOutcome[] = [];
    await this.run(query, endpoints, (outcome) => {
      outcomes.push(outcome);
    });
    return outcomes;
  }

  private async executeOn(query: string, endpoint: EndpointDescriptor): Promise<QueryOutcome> {
    const startedAt = performance.now();
    this.logger.debug(`[${endpoint.id}] executing`);

    let connection: EndpointConnection;
    try {
      connection = await this.connections.open(endpoint);
    } catch (error) {
      const failure = error instanceof ConnectionError ? error.failure : classifyDriverError(error);
      this.logger.debug(`[${endpoint.id}] connect failed: ${failure.message}`);
      const outcome: FailedOutcome = {
        endpointId: endpoint.id,
        success: false,
        stage: 'connect',
        errorKind: failure.kind,
        errorMessage: failure.message,
        columns: [],
        rows: [],
        elapsedMs: performance.now() - startedAt
      };
      return Object.freeze(outcome);
    }

    try {
      const outcome = await this.guard.runReadOnly(connection, query);
      this.logger.debug(
        outcome.success
          ? `[${endpoint.id}] ${outcome.rows.length} row(s) captured`
          : `[${endpoint.id}] failed (${outcome.errorKind}): ${outcome.errorMessage}`
      );
      return Object.freeze({ ...outcome, elapsedMs: performance.now() - startedAt });
    } finally {
      await this.release(connection);
    }
  }

  private async release(connection: EndpointConnection): Promise<void> {
    try {
      await connection.release();
    } catch (error) {
      this.logger.warn(`[${connection.endpointId}] failed to release connection: ${getErrorMessage(error)}`);
    }
  }
}
