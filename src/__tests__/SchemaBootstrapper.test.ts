import { describe, expect, it } from 'vitest';
import { SchemaBootstrapper, indexName, isAlreadyExistsError } from '../core/SchemaBootstrapper';
import { InvalidArgumentError, SchemaConflictError } from '../utils/error';
import { MemoryDatabase, MemoryPool, SqlStateError } from './helpers/memoryPool';

const setup = async () => {
  const database = new MemoryDatabase();
  const pool = new MemoryPool(database, { database: 'test' });
  const client = await pool.connect();
  return { database, client, bootstrapper: new SchemaBootstrapper('Widget') };
};

describe('SchemaBootstrapper', () => {
  it('creates the document table and the hash index on _id', async () => {
    const { database, client, bootstrapper } = await setup();

    await bootstrapper.ensure(client, 'widget', '_id');

    expect(database.statements.map(statement => statement.text)).toEqual([
      'CREATE TABLE widget ( data jsonb )',
      "CREATE INDEX idx_id_widget ON widget USING HASH ((data->>'_id'))",
    ]);
    expect(database.tables.get('widget')).toEqual([]);
    expect(database.indexes.has(indexName('widget'))).toBe(true);
  });

  it('treats an existing table and index as success', async () => {
    const { database, client, bootstrapper } = await setup();

    await bootstrapper.ensure(client, 'widget', '_id');
    database.tables.get('widget')?.push({ _id: 'keep' });
    await expect(bootstrapper.ensure(client, 'widget', '_id')).resolves.toBeUndefined();

    expect(database.tables.get('widget')).toEqual([{ _id: 'keep' }]);
  });

  it('still creates a missing index when the table already exists', async () => {
    const { database, client, bootstrapper } = await setup();
    database.tables.set('widget', []);

    await bootstrapper.ensure(client, 'widget', '_id');

    expect(database.indexes.has('idx_id_widget')).toBe(true);
  });

  it('treats the catalog unique violation of a concurrent CREATE TABLE as success', async () => {
    const { database, client, bootstrapper } = await setup();
    database.failOn(
      /^CREATE TABLE/,
      new SqlStateError('duplicate key value violates unique constraint "pg_type_typname_nsp_index"', '23505')
    );
    database.tables.set('widget', []);

    await expect(bootstrapper.ensure(client, 'widget', '_id')).resolves.toBeUndefined();
  });

  it('surfaces any other DDL failure as SchemaConflictError', async () => {
    const { database, client, bootstrapper } = await setup();
    database.failOn(/^CREATE TABLE/, new SqlStateError('permission denied for schema public', '42501'));

    const error = await bootstrapper.ensure(client, 'widget', '_id').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SchemaConflictError);
    expect(error).toMatchObject({
      code: '42501',
      context: { entityType: 'Widget', operation: 'bootstrap' },
    });
  });

  it('drops the table and reports a missing table as a conflict', async () => {
    const { database, client, bootstrapper } = await setup();
    await bootstrapper.ensure(client, 'widget', '_id');

    await bootstrapper.drop(client, 'widget');
    expect(database.tables.has('widget')).toBe(false);

    await expect(bootstrapper.drop(client, 'widget')).rejects.toMatchObject({
      name: 'SchemaConflictError',
      code: '42P01',
      context: { operation: 'drop' },
    });
  });

  it('refuses table and field names that are not identifiers', async () => {
    const { client, bootstrapper } = await setup();

    await expect(bootstrapper.ensure(client, 'widget; DROP TABLE x', '_id')).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    await expect(bootstrapper.ensure(client, 'widget', "_id'")).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('classifies already-exists SQLSTATE codes', () => {
    expect(isAlreadyExistsError(new SqlStateError('exists', '42P07'))).toBe(true);
    expect(isAlreadyExistsError(new SqlStateError('exists', '42710'))).toBe(true);
    expect(isAlreadyExistsError(new SqlStateError('missing', '42P01'))).toBe(false);
    expect(isAlreadyExistsError(new Error('plain'))).toBe(false);
  });
});
