import type { DatabaseEngine } from '../../types/index.js';
import type { StatementOutcome, StatementType, ValidationOutcome } from './types/validation.types.js';

/**
 * Lexical rules a script is read under. A script is accepted only when every
 * dialect reads it as SELECTs alone. MySQL escapes quotes with a backslash and
 * runs the body of a `/*!` comment; PostgreSQL has dollar quoting and nested
 * block comments.
 */
export type SqlDialect = DatabaseEngine;

const SQL_DIALECTS: readonly SqlDialect[] = ['postgres', 'mysql'];

const DIALECT_LABELS: Record<SqlDialect, string> = {
  postgres: 'PostgreSQL',
  mysql: 'MySQL'
};

const LEADING_WORD_PATTERN = /^[A-Za-z_]+/;
const START_TRANSACTION_PATTERN = /^START\s+TRANSACTION\b/i;
const DOLLAR_QUOTE_TAG_PATTERN = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;
const IDENTIFIER_CHAR_PATTERN = /[A-Za-z0-9_$]/;
const MYSQL_DASH_COMMENT_PATTERN = /^--(?:\s|$)/;

const KEYWORD_TYPES: ReadonlyMap<string, StatementType> = new Map<string, StatementType>([
  ['SELECT', 'Select'],
  ['INSERT', 'Dml'],
  ['UPDATE', 'Dml'],
  ['DELETE', 'Dml'],
  ['MERGE', 'Dml'],
  ['CREATE', 'Ddl'],
  ['ALTER', 'Ddl'],
  ['DROP', 'Ddl'],
  ['TRUNCATE', 'Ddl'],
  ['RENAME', 'Ddl'],
  ['BEGIN', 'TransactionControl'],
  ['COMMIT', 'TransactionControl'],
  ['ROLLBACK', 'TransactionControl'],
  ['CALL', 'Procedure'],
  ['EXEC', 'Procedure'],
  ['EXECUTE', 'Procedure']
]);

const REJECTION_MESSAGES: Record<Exclude<StatementType, 'Select'>, string> = {
  Dml: 'DML operations (INSERT, UPDATE, DELETE, MERGE) are not allowed',
  Ddl: 'DDL operations (CREATE, ALTER, DROP, TRUNCATE, RENAME) are not allowed',
  TransactionControl: 'Transaction control statements are not allowed',
  Procedure: 'Procedure calls are not allowed',
  Unknown: 'Unknown or unsupported SQL statement type'
};

interface ScannedSql {
  /** The input with every comment replaced by a single space. */
  cleaned: string;
  /** Trimmed, non-blank, comment-free statements split on top-level semicolons. */
  statements: string[];
}

function isIdentifierChar(char: string): boolean {
  return char !== '' && IDENTIFIER_CHAR_PATTERN.test(char);
}

function lineEnd(sql: string, start: number): number {
  const match = /[\r\n]/.exec(sql.slice(start));
  return match ? start + match.index : sql.length;
}

function blockCommentEnd(sql: string, start: number, nested: boolean): number {
  let depth = 0;
  let index = start;
  while (index < sql.length) {
    if ((depth === 0 || nested) && sql.startsWith('/*', index)) {
      depth += 1;
      index += 2;
    } else if (sql.startsWith('*/', index)) {
      depth -= 1;
      index += 2;
      if (depth === 0) return index;
    } else {
      index += 1;
    }
  }
  return sql.length;
}

/** Index just past the closing quote. An unterminated literal runs to the end of the text. */
function quotedEnd(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let index = start + 1;
  while (index < sql.length) {
    const char = sql.charAt(index);
    if (backslashEscapes && char === '\\') {
      index += 2;
    } else if (char !== quote) {
      index += 1;
    } else if (sql.charAt(index + 1) === quote) {
      index += 2;
    } else {
      return index + 1;
    }
  }
  return sql.length;
}

function dollarQuoteEnd(sql: string, start: number): number | undefined {
  // `$` inside an identifier (a$b$) never opens a dollar quote
  if (isIdentifierChar(sql.charAt(start - 1))) return undefined;
  const tag = DOLLAR_QUOTE_TAG_PATTERN.exec(sql.slice(start))?.[0];
  if (!tag) return undefined;
  const close = sql.indexOf(tag, start + tag.length);
  return close === -1 ? sql.length : close + tag.length;
}

function isEscapeStringPrefix(sql: string, quoteIndex: number): boolean {
  const prefix = sql.charAt(quoteIndex - 1);
  return (prefix === 'E' || prefix === 'e') && !isIdentifierChar(sql.charAt(quoteIndex - 2));
}

function commentEnd(sql: string, index: number, dialect: SqlDialect): number | undefined {
  const char = sql.charAt(index);
  const next = sql.charAt(index + 1);

  if (char === '-' && next === '-') {
    if (dialect === 'postgres' || MYSQL_DASH_COMMENT_PATTERN.test(sql.slice(index, index + 3))) {
      return lineEnd(sql, index);
    }
    return undefined;
  }
  if (char === '#' && dialect === 'mysql') {
    return lineEnd(sql, index);
  }
  if (char === '/' && next === '*') {
    // MySQL runs the body of /*! ... */, so it is read as code
    if (dialect === 'mysql' && sql.charAt(index + 2) === '!') return undefined;
    return blockCommentEnd(sql, index, dialect === 'postgres');
  }
  return undefined;
}

function literalEnd(sql: string, index: number, dialect: SqlDialect): number | undefined {
  const char = sql.charAt(index);

  if (dialect === 'mysql') {
    if (char === "'" || char === '"') return quotedEnd(sql, index, char, true);
    if (char === '`') return quotedEnd(sql, index, char, false);
    return undefined;
  }

  if (char === "'") return quotedEnd(sql, index, char, isEscapeStringPrefix(sql, index));
  if (char === '"') return quotedEnd(sql, index, char, false);
  if (char === '$') return dollarQuoteEnd(sql, index);
  return undefined;
}

/**
 * Walk the text once, copying string literals and quoted identifiers verbatim,
 * replacing comments with a space and splitting on semicolons outside both.
 */
function scan(sql: string, dialect: SqlDialect): ScannedSql {
  const statements: string[] = [];
  let cleaned = '';
  let current = '';

  const keep = (text: string): void => {
    cleaned += text;
    current += text;
  };
  const endStatement = (): void => {
    const statement = current.trim();
    if (statement) statements.push(statement);
    current = '';
  };

  let index = 0;
  while (index < sql.length) {
    const commentStop = commentEnd(sql, index, dialect);
    if (commentStop !== undefined) {
      keep(' ');
      index = commentStop;
      continue;
    }

    const literalStop = literalEnd(sql, index, dialect);
    if (literalStop !== undefined) {
      keep(sql.slice(index, literalStop));
      index = literalStop;
      continue;
    }

    const char = sql.charAt(index);
    if (char === ';') {
      cleaned += char;
      endStatement();
    } else {
      keep(char);
    }
    index += 1;
  }
  endStatement();

  return { cleaned, statements };
}

/**
 * Replace every line and block comment with a single space. Comment markers
 * inside string literals, quoted identifiers and dollar quotes are left alone.
 */
export function stripComments(sql: string, dialect: SqlDialect = 'postgres'): string {
  return scan(sql, dialect).cleaned;
}

/**
 * Split SQL on the semicolons that sit outside literals and comments into
 * trimmed, non-blank, comment-free statements.
 */
export function splitStatements(sql: string, dialect: SqlDialect = 'postgres'): string[] {
  return scan(sql, dialect).statements;
}

/**
 * Classify one statement by its leading keyword. Comments are stripped first,
 * so a statement and its comment-free form always classify the same.
 */
export function classifyStatement(statement: string, dialect: SqlDialect = 'postgres'): StatementType {
  const text = stripComments(statement, dialect).trim();
  if (START_TRANSACTION_PATTERN.test(text)) return 'TransactionControl';

  const leading = text.match(LEADING_WORD_PATTERN)?.[0];
  if (!leading) return 'Unknown';
  return KEYWORD_TYPES.get(leading.toUpperCase()) ?? 'Unknown';
}

export class StatementClassifier {
  /**
   * Prove a query contains only SELECT statements under every dialect's
   * reading. All statements of a reading are classified, even after the first
   * rejection, so callers can show every problem.
   */
  validate(queryText: string): ValidationOutcome {
    const cleanedQuery = stripComments(queryText);
    const base = { originalQuery: queryText, cleanedQuery };

    if (!cleanedQuery.trim()) {
      return {
        ...base,
        isValid: false,
        errorMessage: 'Query contains only comments or whitespace',
        statementCount: 0,
        statements: []
      };
    }

    let accepted: StatementOutcome[] | undefined;
    for (const dialect of SQL_DIALECTS) {
      const statements = splitStatements(queryText, dialect).map((statement, position) =>
        this.classify(statement, position + 1, dialect)
      );
      const firstRejection = statements.find((statement) => !statement.isValid);

      if (firstRejection) {
        return {
          ...base,
          isValid: false,
          errorMessage: firstRejection.errorMessage,
          statementCount: statements.length,
          statements
        };
      }
      accepted ??= statements;
    }

    const statements = accepted ?? [];
    if (!statements.some((statement) => statement.statementType === 'Select')) {
      return {
        ...base,
        isValid: false,
        errorMessage: 'No valid SELECT statements found in query',
        statementCount: statements.length,
        statements
      };
    }

    return { ...base, isValid: true, statementCount: statements.length, statements };
  }

  private classify(statement: string, index: number, dialect: SqlDialect): StatementOutcome {
    const statementType = classifyStatement(statement, dialect);
    if (statementType === 'Select') {
      return { index, rawText: statement, isValid: true, statementType };
    }

    const reading = dialect === 'postgres' ? '' : ` (as read by ${DIALECT_LABELS[dialect]})`;
    return {
      index,
      rawText: statement,
      isValid: false,
      statementType,
      errorMessage: `Statement ${index}: ${REJECTION_MESSAGES[statementType]}${reading}`
    };
  }
}

export const statementClassifier = new StatementClassifier();
