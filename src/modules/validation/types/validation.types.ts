/**
 * Safety category of one semicolon-delimited statement, decided by its leading keyword.
 */
export type StatementType = 'Select' | 'Dml' | 'Ddl' | 'TransactionControl' | 'Procedure' | 'Unknown';

/**
 * Classification of a single statement within a query.
 */
export interface StatementOutcome {
  /** 1-based position among the non-blank statements. */
  index: number;
  rawText: string;
  isValid: boolean;
  statementType: StatementType;
  errorMessage?: string;
}

/**
 * Result of validating a whole query. Produced once per query text.
 */
export interface ValidationOutcome {
  isValid: boolean;
  errorMessage?: string;
  statementCount: number;
  statements: StatementOutcome[];
  originalQuery: string;
  cleanedQuery: string;
}
