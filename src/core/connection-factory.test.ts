import test from 'node:test';
import assert from 'node:assert/strict';
import { FakeDriver, TEST_SETTINGS, driverError, endpoint, type FakeEndpointScript } from '../../tests/support/fake-driver.js';
import { ConnectionFactory, PROBE_QUERY } from './connection-factory.js';
import { ConnectionError } from './errors.js';

function setup(scripts: Record<string, FakeEndpointScript> = {}) {
  const postgres = new FakeDriver('postgres', scripts);
  const mysql = new FakeDriver('mysql', scripts);
  const factory = new ConnectionFactory({ drivers: { postgres, mysql }, settings: TEST_SETTINGS });
  return { postgres, mysql, factory };
}

test('reports a successful probe with the server version', async () => {
  const { factory, postgres } = setup();
  const result = await factory.testConnection(endpoint('a'));

  assert.equal(result.endpointId, 'a');
  assert.equal(result.success, true);
  assert.equal(result.message, 'Connection successful');
  assert.equal(result.serverVersion, 'PostgreSQL 16.2 on x86_64-pc-linux-gnu');
  assert.equal(result.errorCode, undefined);
  assert.deepEqual(postgres.executedOn('a'), [PROBE_QUERY]);
  assert.equal(postgres.connections[0]?.releaseCount, 1);
});

test('labels a refused postgres connection with its error code', async () => {
  const { factory } = setup({ a: { connectError: driverError('connect ECONNREFUSED 10.0.0.1:5432', 'ECONNREFUSED') } });
  const result = await factory.testConnection(endpoint('a'));

  assert.equal(result.success, false);
  assert.equal(result.message, 'PostgreSQL Error: connect ECONNREFUSED 10.0.0.1:5432');
  assert.equal(result.errorCode, 'ECONNREFUSED');
});

test('labels a dual-stack refusal with the inner connect errors', async () => {
  const refused = new AggregateError(
    [
      driverError('connect ECONNREFUSED ::1:5432', 'ECONNREFUSED'),
      driverError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED')
    ],
    ''
  );
  const { factory } = setup({ a: { connectError: refused } });
  const result = await factory.testConnection(endpoint('a'));

  assert.equal(result.message, 'PostgreSQL Error: connect ECONNREFUSED ::1:5432; connect ECONNREFUSED 127.0.0.1:5432');
  assert.equal(result.errorCode, 'ECONNREFUSED');
});

test('labels a mysql authentication failure', async () => {
  const { factory } = setup({
    m: { connectError: driverError("Access denied for user 'reader'@'10.0.0.9'", 'ER_ACCESS_DENIED_ERROR') }
  });
  const result = await factory.testConnection(endpoint('m', 'mysql'));

  assert.equal(result.message, "MySQL Error: Access denied for user 'reader'@'10.0.0.9'");
  assert.equal(result.errorCode, 'ER_ACCESS_DENIED_ERROR');
});

test('reports timeouts and unexpected errors distinctly', async () => {
  const { factory } = setup({
    slow: { connectError: driverError('timeout expired') },
    odd: { connectError: new Error('boom') }
  });

  const [slow, odd] = await factory.testAllConnections([endpoint('slow'), endpoint('odd')]);
  assert.equal(slow?.message, 'Connection timeout: timeout expired');
  assert.equal(slow?.errorCode, undefined);
  assert.equal(odd?.message, 'Unexpected error: boom');
});

test('fails the probe when the test query returns no row and still releases', async () => {
  const { factory, postgres } = setup({ a: { probeRows: [] } });
  const result = await factory.testConnection(endpoint('a'));

  assert.equal(result.success, false);
  assert.equal(result.message, 'Failed to execute test query');
  assert.equal(postgres.connections[0]?.releaseCount, 1);
});

test('releases the connection when the probe query itself fails', async () => {
  const { factory, postgres } = setup({
    a: { failOn: { [PROBE_QUERY]: driverError('function version() does not exist', '42883') } }
  });
  const result = await factory.testConnection(endpoint('a'));

  assert.equal(result.message, 'PostgreSQL Error: function version() does not exist');
  assert.equal(result.errorCode, '42883');
  assert.equal(postgres.connections[0]?.releaseCount, 1);
});

test('probes with bounded concurrency and keeps input order', async () => {
  const ids = ['e1', 'e2', 'e3', 'e4', 'e5', 'e6', 'e7'];
  const scripts = Object.fromEntries(ids.map((id): [string, FakeEndpointScript] => [id, { probeLatencyMs: 10 }]));
  const { factory, postgres } = setup(scripts);

  const results = await factory.testAllConnections(ids.map((id) => endpoint(id)), 3);

  assert.deepEqual(results.map((result) => result.endpointId), ids);
  assert.equal(results.every((result) => result.success), true);
  assert.equal(postgres.probes.peak, 3);
});

test('wraps open failures in ConnectionError', async () => {
  const { factory } = setup({ a: { connectError: driverError('password authentication failed for user "reader"', '28P01') } });

  await assert.rejects(factory.open(endpoint('a')), (error: unknown) => {
    assert.ok(error instanceof ConnectionError);
    assert.equal(error.endpointId, 'a');
    assert.equal(error.code, 'ENDPOINT_UNREACHABLE');
    assert.deepEqual(error.failure, {
      kind: 'auth',
      message: 'password authentication failed for user "reader"',
      code: '28P01'
    });
    return true;
  });
});

test('closeAll ends every driver', async () => {
  const { factory, postgres, mysql } = setup();
  await factory.closeAll();
  assert.equal(postgres.ended, true);
  assert.equal(mysql.ended, true);
});
