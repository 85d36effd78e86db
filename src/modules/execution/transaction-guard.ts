import { classifyDriverError, getErrorMessage } from '../../core/errors.js';
import { silentLogger, type Logger } from '../../core/logger.js';
import type { EndpointConnection, ResultSet } from '../../core/drivers/types.js';
import type { DatabaseEngine } from '../../types/index.js';
import { classifyStatement, splitStatements } from '../validation/statement-classifier.js';
import { snapshotRow } from './row-snapshot.js';
import type { FailedOutcome, QueryOutcome } from './types/execution.types.js';

/**
 * Statements that open a transaction the server itself keeps read-only.
 * MySQL only accepts the access mode on START TRANSACTION.
 */
export const READ_ONLY_PREAMBLE: Record<DatabaseEngine, readonly string[]> = {
  postgres: ['BEGIN', 'SET TRANSACTION READ ONLY'],
  mysql: ['START TRANSACTION READ ONLY']
};

export const ROLLBACK_STATEMENT = 'ROLLBACK';

const EMPTY_RESULT_SET: ResultSet = { columns: [], rows: [] };

export class TransactionGuard {
  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Run `query` inside a read-only transaction that is always rolled back.
   * Statements are sent one at a time, and a statement that is not a SELECT
   * is refused before the transaction opens. The first statement's first
   * result set is kept. Never throws: every failure becomes a failed outcome.
   */
  async runReadOnly(connection: EndpointConnection, query: string): Promise<QueryOutcome> {
    const startedAt = performance.now();
    const statements = splitStatements(query, connection.engine);

    const refused = statements.findIndex((statement) => classifyStatement(statement, connection.engine) !== 'Select');
    if (refused !== -1) {
      const refusal: FailedOutcome = {
        endpointId: connection.endpointId,
        success: false,
        stage: 'execute',
        errorKind: 'read-only-violation',
        errorMessage: `Statement ${refused + 1} is not a SELECT; nothing was sent to the server`,
        columns: [],
        rows: [],
        elapsedMs: performance.now() - startedAt
      };
      return Object.freeze(refusal);
    }

    let transactionOpen = false;
    let outcome: QueryOutcome;

    try {
      for (const statement of READ_ONLY_PREAMBLE[connection.engine]) {
        await connection.execute(statement);
        transactionOpen = true;
      }

      let captured: ResultSet | undefined;
      for (const statement of statements) {
        const resultSets = await connection.execute(statement);
        captured ??= resultSets[0] ?? EMPTY_RESULT_SET;
      }
      if (statements.length > 1) {
        this.logger.debug(
          `[${connection.endpointId}] ran ${statements.length} statements; keeping the first result set`
        );
      }

      const resultSet = captured ?? EMPTY_RESULT_SET;
      const columns = Object.freeze([...resultSet.columns]);
      outcome = {
        endpointId: connection.endpointId,
        success: true,
        columns,
        rows: Object.freeze(resultSet.rows.map((cells) => snapshotRow(columns.length, cells))),
        elapsedMs: 0
      };
    } catch (error) {
      const failure = classifyDriverError(error);
      outcome = {
        endpointId: connection.endpointId,
        success: false,
        stage: 'execute',
        errorKind: failure.kind,
        errorMessage: failure.message,
        columns: [],
        rows: [],
        elapsedMs: 0
      };
    }

    if (transactionOpen) {
      await this.rollback(connection);
    }

    return Object.freeze({ ...outcome, elapsedMs: performance.now() - startedAt });
  }

  private async rollback(connection: EndpointConnection): Promise<void> {
    try {
      await connection.execute(ROLLBACK_STATEMENT);
    } catch (error) {
      this.logger.warn(`[${connection.endpointId}] rollback failed, discarding connection: ${getErrorMessage(error)}`);
      await connection.release(error instanceof Error ? error : new Error(getErrorMessage(error)));
    }
  }
}
