import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';
import { writeFileSync } from 'node:fs';
import { openReadOnly, introspectSchema, type SqliteHandle } from '../adapters/sqlite.js';
import { executeCandidate, createExecutor } from '../execute.js';
import { DatabaseOpenError, SchemaUnavailableError } from '../../errors.js';
import { createFixtureDb, type FixtureDb } from '../../__tests__/fixtures.js';

describe('openReadOnly', () => {
  it('fails with DatabaseOpenError when the file does not exist', () => {
    const fixture = createFixtureDb();
    try {
      assert.throws(() => openReadOnly(join(fixture.path, '..', 'missing.sqlite')), DatabaseOpenError);
    } finally {
      fixture.cleanup();
    }
  });

  it('rejects an empty path', () => {
    assert.throws(() => openReadOnly('  '), /path is required/);
  });
});

describe('introspectSchema', () => {
  it('reads tables, columns and foreign keys in name order', async () => {
    const fixture = createFixtureDb();
    const db = openReadOnly(fixture.path);
    try {
      const snapshot = await introspectSchema(db);
      assert.deepEqual(
        snapshot.tables.map((t) => t.name),
        ['Customer', 'Employee'],
      );

      const customer = snapshot.tables[0];
      assert.deepEqual(customer.columns, [
        { name: 'CustomerId', dataType: 'INTEGER', nullable: false, isPrimaryKey: true },
        { name: 'FirstName', dataType: 'TEXT', nullable: false, isPrimaryKey: false },
        { name: 'Company', dataType: 'TEXT', nullable: true, isPrimaryKey: false },
        { name: 'SupportRepId', dataType: 'INTEGER', nullable: true, isPrimaryKey: false },
      ]);
      assert.deepEqual(customer.foreignKeys, [
        { fromColumn: 'SupportRepId', toTable: 'Employee', toColumn: 'EmployeeId' },
      ]);
      assert.equal(snapshot.tables[1].foreignKeys.length, 0);
      assert.match(customer.ddl ?? '', /^CREATE TABLE Customer \(/);
    } finally {
      db.close();
      fixture.cleanup();
    }
  });

  it('fails with SchemaUnavailableError when there are no tables', async () => {
    const fixture = createFixtureDb('');
    const db = openReadOnly(fixture.path);
    try {
      await assert.rejects(introspectSchema(db), SchemaUnavailableError);
    } finally {
      db.close();
      fixture.cleanup();
    }
  });

  it('fails for a file that is not a database', async () => {
    const fixture = createFixtureDb();
    const bogus = join(fixture.path, '..', 'notes.sqlite');
    writeFileSync(bogus, 'plain text, not a database file\n'.repeat(64));
    try {
      await assert.rejects(
        async () => introspectSchema(openReadOnly(bogus)),
        (err: unknown) =>
          (err instanceof SchemaUnavailableError || err instanceof DatabaseOpenError) &&
          /not a database/.test(err.message),
      );
    } finally {
      fixture.cleanup();
    }
  });
});

describe('executeCandidate', () => {
  let fixture: FixtureDb;
  let db: SqliteHandle;

  before(() => {
    fixture = createFixtureDb();
    db = openReadOnly(fixture.path);
  });

  after(() => {
    db.close();
    fixture.cleanup();
  });

  it('returns columns and positional rows', async () => {
    const outcome = await executeCandidate(db, 'SELECT CustomerId, FirstName FROM Customer ORDER BY CustomerId');
    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.result.columns, ['CustomerId', 'FirstName']);
      assert.deepEqual(outcome.result.rows, [
        [1, 'Ines'],
        [2, 'Tomas'],
      ]);
      assert.equal(outcome.result.rowCount, 2);
      assert.equal(outcome.result.truncated, false);
    }
  });

  it('treats zero rows as success', async () => {
    const outcome = await executeCandidate(db, 'SELECT * FROM Customer WHERE CustomerId = 99');
    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.result.columns, ['CustomerId', 'FirstName', 'Company', 'SupportRepId']);
      assert.deepEqual(outcome.result.rows, []);
      assert.equal(outcome.result.rowCount, 0);
    }
  });

  it('keeps duplicate column names apart', async () => {
    const outcome = await executeCandidate(db, 'SELECT 1 AS x, 2 AS x');
    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.result.columns, ['x', 'x']);
      assert.deepEqual(outcome.result.rows, [[1, 2]]);
    }
  });

  it('returns the engine error message verbatim', async () => {
    const outcome = await executeCandidate(db, 'SELECT COUNT(*) FROM Customerr');
    assert.deepEqual(outcome, { ok: false, errorMessage: 'no such table: Customerr' });
  });

  it('is refused writes by the read-only handle', async () => {
    const outcome = await executeCandidate(db, 'DELETE FROM Customer');
    assert.deepEqual(outcome, { ok: false, errorMessage: 'attempt to write a readonly database' });

    const check = await executeCandidate(db, 'SELECT COUNT(*) AS n FROM Customer');
    assert.equal(check.ok, true);
    if (check.ok) assert.deepEqual(check.result.rows, [[2]]);
  });

  it('reports more than one statement as a failure', async () => {
    const outcome = await executeCandidate(db, 'SELECT 1; SELECT 2');
    assert.equal(outcome.ok, false);
    if (!outcome.ok) assert.match(outcome.errorMessage, /more than one statement/);
  });

  it('caps rows at maxRows and flags truncation', async () => {
    const execute = createExecutor(db, { maxRows: 1 });
    const outcome = await execute('SELECT FirstName FROM Customer ORDER BY CustomerId');
    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.result.rows, [['Ines']]);
      assert.equal(outcome.result.rowCount, 2);
      assert.equal(outcome.result.truncated, true);
    }
  });

  it('throws when the handle is closed', async () => {
    const other = openReadOnly(fixture.path);
    other.close();
    await assert.rejects(executeCandidate(other, 'SELECT 1'), DatabaseOpenError);
  });
});
