import test from 'node:test';
import assert from 'node:assert/strict';
import { StatementClassifier, classifyStatement, splitStatements, stripComments } from './statement-classifier.js';

test('accepts a single SELECT', () => {
  const classifier = new StatementClassifier();
  const result = classifier.validate('SELECT 1 as n;');
  assert.equal(result.isValid, true);
  assert.equal(result.statementCount, 1);
  assert.equal(result.errorMessage, undefined);
  assert.deepEqual(result.statements, [
    { index: 1, rawText: 'SELECT 1 as n', isValid: true, statementType: 'Select' }
  ]);
});

test('accepts several SELECTs interleaved with comments and blank lines', () => {
  const classifier = new StatementClassifier();
  const query = [
    '-- header comment',
    'select id from users;',
    '',
    '/* block',
    '   comment; with a semicolon */',
    'SELECT count(*) FROM orders -- trailing',
    ';',
    '   ',
    'Select now();'
  ].join('\n');

  const result = classifier.validate(query);
  assert.equal(result.isValid, true);
  assert.equal(result.statementCount, 3);
  assert.deepEqual(
    result.statements.map((statement) => statement.statementType),
    ['Select', 'Select', 'Select']
  );
});

test('rejects DML and names the category', () => {
  const classifier = new StatementClassifier();
  const result = classifier.validate('DELETE FROM t;');
  assert.equal(result.isValid, false);
  assert.equal(result.errorMessage, 'Statement 1: DML operations (INSERT, UPDATE, DELETE, MERGE) are not allowed');
  assert.equal(result.statements[0]?.statementType, 'Dml');
});

test('rejects every non-select category with its own message', () => {
  const classifier = new StatementClassifier();
  const cases: Array<[string, string]> = [
    ['INSERT INTO t VALUES (1)', 'DML operations'],
    ['merge into t using s on t.id = s.id when matched then delete', 'DML operations'],
    ['DROP TABLE t', 'DDL operations'],
    ['truncate t', 'DDL operations'],
    ['RENAME TABLE a TO b', 'DDL operations'],
    ['COMMIT', 'Transaction control statements are not allowed'],
    ['start   transaction read write', 'Transaction control statements are not allowed'],
    ['CALL do_things()', 'Procedure calls are not allowed'],
    ['EXEC sp_who', 'Procedure calls are not allowed'],
    ['WITH x AS (SELECT 1) SELECT * FROM x', 'Unknown or unsupported SQL statement type']
  ];

  for (const [query, fragment] of cases) {
    const result = classifier.validate(query);
    assert.equal(result.isValid, false, query);
    assert.ok(result.errorMessage?.startsWith('Statement 1: '), query);
    assert.ok(result.errorMessage?.includes(fragment), query);
  }
});

test('classifies every statement even after the first rejection', () => {
  const classifier = new StatementClassifier();
  const result = classifier.validate('SELECT 1; UPDATE t SET a = 1; DROP TABLE t; SELECT 2');
  assert.equal(result.isValid, false);
  assert.equal(result.statementCount, 4);
  assert.equal(result.errorMessage, 'Statement 2: DML operations (INSERT, UPDATE, DELETE, MERGE) are not allowed');
  assert.deepEqual(
    result.statements.map((statement) => [statement.index, statement.statementType, statement.isValid]),
    [
      [1, 'Select', true],
      [2, 'Dml', false],
      [3, 'Ddl', false],
      [4, 'Select', true]
    ]
  );
});

test('rejects empty and comment-only input', () => {
  const classifier = new StatementClassifier();
  for (const query of ['', '   \n\t', '-- nothing here', '/* only */ -- comments']) {
    const result = classifier.validate(query);
    assert.equal(result.isValid, false);
    assert.equal(result.errorMessage, 'Query contains only comments or whitespace');
    assert.equal(result.statementCount, 0);
  }
});

test('rejects input made only of separators', () => {
  const result = new StatementClassifier().validate(';;  ;');
  assert.equal(result.isValid, false);
  assert.equal(result.errorMessage, 'No valid SELECT statements found in query');
  assert.equal(result.statementCount, 0);
});

test('accepts two selects in one script', () => {
  const result = new StatementClassifier().validate('SELECT 1; SELECT 2;');
  assert.equal(result.isValid, true);
  assert.deepEqual(
    result.statements.map((statement) => statement.statementType),
    ['Select', 'Select']
  );
});

test('a write hidden behind a leading comment is still caught', () => {
  const result = new StatementClassifier().validate('/* SELECT */ DELETE FROM users');
  assert.equal(result.isValid, false);
  assert.equal(result.statements[0]?.statementType, 'Dml');
});

test('a select on a later line does not mask a leading write', () => {
  const result = new StatementClassifier().validate('DELETE FROM t WHERE id IN (\nSELECT id FROM u)');
  assert.equal(result.isValid, false);
  assert.equal(result.statements[0]?.statementType, 'Dml');
});

test('classification is unchanged by stripping comments first', () => {
  const statements = [
    '-- lead\nSELECT 1',
    '/* x */ insert into t values (1)',
    'DROP /* inline */ TABLE t',
    '/* a */ /* b */ CALL p()',
    'START /* gap */ TRANSACTION',
    '-- only\n',
    'EXPLAIN SELECT 1'
  ];
  for (const statement of statements) {
    assert.equal(classifyStatement(statement), classifyStatement(stripComments(statement)), statement);
  }
});

test('classifyStatement reads the leading keyword case-insensitively', () => {
  assert.equal(classifyStatement('  sElEcT * from t'), 'Select');
  assert.equal(classifyStatement('SELECT*FROM t'), 'Select');
  assert.equal(classifyStatement('Begin'), 'TransactionControl');
  assert.equal(classifyStatement('ROLLBACK'), 'TransactionControl');
  assert.equal(classifyStatement('Execute immediate'), 'Procedure');
  assert.equal(classifyStatement('SELECTED'), 'Unknown');
  assert.equal(classifyStatement('START something'), 'Unknown');
  assert.equal(classifyStatement('(SELECT 1)'), 'Unknown');
});

test('splitStatements trims and drops blanks', () => {
  assert.deepEqual(splitStatements(' a ;\n; b;'), ['a', 'b']);
});

test('comment markers inside string literals do not hide later statements', () => {
  const query = "SELECT '/*'; COMMIT; DELETE FROM accounts; SELECT '*/'";
  const result = new StatementClassifier().validate(query);

  assert.equal(result.isValid, false);
  assert.equal(result.errorMessage, 'Statement 2: Transaction control statements are not allowed');
  assert.equal(result.cleanedQuery, query);
  assert.deepEqual(
    result.statements.map((statement) => [statement.rawText, statement.statementType]),
    [
      ["SELECT '/*'", 'Select'],
      ['COMMIT', 'TransactionControl'],
      ['DELETE FROM accounts', 'Dml'],
      ["SELECT '*/'", 'Select']
    ]
  );
});

test('semicolons and dashes inside literals and quoted identifiers stay in one statement', () => {
  const query = `SELECT 'a;b' AS semi, '--' AS dashes, "odd;name" FROM t`;
  const result = new StatementClassifier().validate(query);

  assert.equal(result.isValid, true);
  assert.equal(result.statementCount, 1);
  assert.equal(result.statements[0]?.rawText, query);
});

test('escape strings keep a backslash-quoted quote inside the literal', () => {
  const result = new StatementClassifier().validate("SELECT E'it\\'s; DROP TABLE t' AS x");
  assert.equal(result.isValid, true);
  assert.equal(result.statementCount, 1);
});

test('dollar quotes hide comment markers from the postgres reading', () => {
  const query = "SELECT $$it's -- not a comment$$ AS txt";
  const result = new StatementClassifier().validate(query);

  assert.equal(result.isValid, true);
  assert.deepEqual(splitStatements(query), [query]);
});

test('a dollar-quoted write is rejected through the mysql reading', () => {
  const result = new StatementClassifier().validate('SELECT $x$ ; DELETE FROM t; $x$');
  assert.equal(result.isValid, false);
  assert.equal(result.statementCount, 3);
  assert.equal(result.errorMessage, 'Statement 2: DML operations (INSERT, UPDATE, DELETE, MERGE) are not allowed (as read by MySQL)');
});

test('writes hidden by postgres-only lexing are caught through the mysql reading', () => {
  const classifier = new StatementClassifier();
  const cases: Array<[string, string]> = [
    ['SELECT 1 --1; DELETE FROM t', 'Statement 2: DML operations (INSERT, UPDATE, DELETE, MERGE) are not allowed (as read by MySQL)'],
    ["SELECT 'x\\' ' ; DELETE FROM t; SELECT ' '", 'Statement 2: DML operations (INSERT, UPDATE, DELETE, MERGE) are not allowed (as read by MySQL)'],
    ['SELECT 1; /*! DELETE FROM t */', 'Statement 2: Unknown or unsupported SQL statement type (as read by MySQL)']
  ];

  for (const [query, message] of cases) {
    const result = classifier.validate(query);
    assert.equal(result.isValid, false, query);
    assert.equal(result.errorMessage, message, query);
  }
});

test('postgres block comments nest and mysql ones do not', () => {
  const query = '/* outer /* inner */ still comment; DELETE FROM t */ SELECT 1';

  assert.equal(stripComments(query), '  SELECT 1');
  assert.equal(stripComments(query, 'mysql'), '  still comment; DELETE FROM t */ SELECT 1');
  assert.equal(new StatementClassifier().validate(query).isValid, false);
});

test('a dollar sign inside an identifier does not open a dollar quote', () => {
  assert.deepEqual(splitStatements('SELECT a$b$ FROM t; SELECT $b$'), ['SELECT a$b$ FROM t', 'SELECT $b$']);
});

test('hash starts a comment only for mysql', () => {
  assert.equal(stripComments('SELECT 1 # note\nFROM t', 'mysql'), 'SELECT 1  \nFROM t');
  assert.equal(stripComments('SELECT 1 # note\nFROM t'), 'SELECT 1 # note\nFROM t');
});
