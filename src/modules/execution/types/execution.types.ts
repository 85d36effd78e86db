import type { DriverFailureKind } from '../../../core/errors.js';
import type { SqlValue } from '../../../types/index.js';

/**
 * One row snapshot. Values are positional and aligned with the outcome's columns.
 */
export type OutcomeRow = readonly SqlValue[];

interface OutcomeBase {
  endpointId: string;
  elapsedMs: number;
}

export interface SuccessfulOutcome extends OutcomeBase {
  success: true;
  /** Column names in result-set order, taken from driver metadata. */
  columns: readonly string[];
  rows: readonly OutcomeRow[];
}

export type FailureStage = 'connect' | 'execute';

export interface FailedOutcome extends OutcomeBase {
  success: false;
  stage: FailureStage;
  errorKind: DriverFailureKind;
  errorMessage: string;
  columns: readonly [];
  rows: readonly [];
}

/**
 * Result of running the query against one endpoint. Immutable once created.
 */
export type QueryOutcome = SuccessfulOutcome | FailedOutcome;

export type OutcomeHandler = (outcome: QueryOutcome) => void | Promise<void>;
