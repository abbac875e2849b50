import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EntityStore } from '../core/EntityStore';
import { ConnectionPoolCache } from '../config/database';
import { ConfigManager } from '../config/app';
import {
  ConnectionError,
  DatabaseError,
  DeleteVerificationError,
  InvalidArgumentError,
  MissingIdentifierError,
  NotFoundError,
  ValidationError,
} from '../utils/error';
import { Gadget, UUID_V4, Widget, clock } from './helpers/entities';
import { MemoryDatabase, MemoryPool, SqlStateError, memoryPoolFactory } from './helpers/memoryPool';

const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
};

describe('EntityStore', () => {
  let database: MemoryDatabase;
  let pools: MemoryPool[];
  let cache: ConnectionPoolCache;
  let widgets: EntityStore<Widget>;

  const statements = (prefix: string): string[] =>
    database.statements.map(statement => statement.text).filter(text => text.startsWith(prefix));

  beforeEach(() => {
    const memory = memoryPoolFactory();
    database = memory.database;
    pools = memory.pools;
    cache = new ConnectionPoolCache(memory.factory);
    widgets = new EntityStore(Widget, { cache, database: 'test' });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cache.close();
  });

  describe('Widget scenario', () => {
    it('adds, counts, finds, and re-bootstraps after drop', async () => {
      const widget = await widgets.add({ name: 'a' });

      expect(widget).toBeInstanceOf(Widget);
      expect(widget.id).toMatch(UUID_V4);
      expect(await widgets.count()).toBe(1);

      const found = await collect(widgets.find({}, { limit: 10 }));
      expect(found.map(item => item.toJSON())).toEqual([{ _id: widget.id, name: 'a' }]);

      await widgets.drop();
      expect(database.tables.has('widget')).toBe(false);

      expect(await widgets.count()).toBe(0);
      expect(statements('CREATE TABLE')).toHaveLength(2);
    });
  });

  describe('save and read back', () => {
    it('round-trips fields through findById', async () => {
      const saved = await widgets.save(new Widget({ a: 1, b: 'x' }));
      const found = await widgets.findById(saved.id ?? '');

      expect(found.toJSON()).toEqual({ _id: saved.id, a: 1, b: 'x' });
    });

    it('keeps a caller-provided identifier', async () => {
      const saved = await widgets.save(new Widget({ _id: 'fixed', name: 'x' }));

      expect(saved.id).toBe('fixed');
      expect(await widgets.exists('fixed')).toBe(true);
      expect(await widgets.exists('other')).toBe(false);
    });

    it('updates in place when the identifier already exists', async () => {
      const widget = await widgets.add({ name: 'a' });
      const id = widget.id;

      widget.set('name', 'b');
      await widgets.save(widget);

      expect(widget.id).toBe(id);
      expect(await widgets.count()).toBe(1);
      expect(statements('UPDATE')).toEqual([
        "UPDATE widget SET data = $1::jsonb WHERE data->>'_id' = $2 RETURNING data",
      ]);
      expect((await widgets.findById(id ?? '')).get('name')).toBe('b');
    });

    it('binds the document as JSON text with dates rendered as ISO-8601', async () => {
      await widgets.save(new Widget({ _id: 'w1', seenAt: new Date('2024-03-04T05:06:07.000Z') }));

      const insert = database.statements.find(statement => statement.text.startsWith('INSERT'));
      expect(insert?.params).toEqual(['{"_id":"w1","seenAt":"2024-03-04T05:06:07.000Z"}']);
    });

    it('materializes computed fields and adopts the stored form', async () => {
      const gadgets = new EntityStore(Gadget, { cache, database: 'test' });

      const gadget = await gadgets.add({ name: 'g' });
      expect(gadget.get('createdAt')).toBe('2024-05-01T12:00:00.000Z');
      expect(gadget.get('updatedAt')).toBe('2024-05-01T12:00:00.000Z');

      vi.spyOn(clock, 'now').mockReturnValue(new Date('2024-06-01T00:00:00.000Z'));
      await gadgets.save(gadget);

      expect(database.tables.get('gadget')).toEqual([
        {
          _id: gadget.id,
          name: 'g',
          createdAt: '2024-05-01T12:00:00.000Z',
          updatedAt: '2024-06-01T00:00:00.000Z',
        },
      ]);
    });

    it('rejects documents that fail the entity schema before touching the database', async () => {
      const gadgets = new EntityStore(Gadget, { cache, database: 'test' });

      await expect(gadgets.add({ name: '' })).rejects.toBeInstanceOf(ValidationError);
      expect(database.statements).toEqual([]);
    });
  });

  describe('add', () => {
    it('persists each record of a list and returns a list', async () => {
      await widgets.add({ name: 'seed' });
      const before = await widgets.count();

      const added = await widgets.add([{ name: 'a' }, { name: 'b' }, { name: 'c' }]);

      expect(added).toHaveLength(3);
      expect(added.every(item => item instanceof Widget)).toBe(true);
      expect(new Set(added.map(item => item.id)).size).toBe(3);
      expect(await widgets.count()).toBe(before + 3);
    });

    it('rejects input that is neither a record nor a list of records', async () => {
      await expect(widgets.add(JSON.parse('"nope"'))).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(widgets.add(JSON.parse('[{"name":"a"}, 3]'))).rejects.toMatchObject({
        name: 'InvalidArgumentError',
        context: { entityType: 'Widget', operation: 'add' },
      });
      expect(database.statements).toEqual([]);
    });
  });

  describe('lookups', () => {
    it('findById fails with NotFoundError', async () => {
      const error = await widgets.findById('missing').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        message: 'Could not find any Widget for: missing',
        context: { entityType: 'Widget', id: 'missing', operation: 'findById' },
      });
    });

    it('findOne returns null when nothing matches and the first match otherwise', async () => {
      await widgets.add([{ name: 'a' }, { name: 'b' }, { name: 'b' }]);

      expect(await widgets.findOne({ name: 'z' })).toBeNull();
      expect((await widgets.findOne({ name: 'b' }))?.get('name')).toBe('b');
      expect(database.statements.at(-1)?.text).toBe("SELECT data FROM widget WHERE data->>'name' = $1 LIMIT 1");
    });

    it('find pages through matches in row order', async () => {
      await widgets.add([1, 2, 3, 4, 5].map(n => ({ group: 'g', n })));
      await widgets.add({ group: 'h', n: 6 });

      const page = await collect(widgets.find({ group: 'g' }, { limit: 2, skip: 1 }));
      expect(page.map(item => item.get('n'))).toEqual([2, 3]);

      const large = await collect(widgets.find({ n: { $gt: 3 } }));
      expect(large.map(item => item.get('n'))).toEqual([4, 5, 6]);
      expect(database.statements.at(-1)?.text).toBe(
        "SELECT data FROM widget WHERE (data->>'n')::numeric > $1 LIMIT 100"
      );
    });

    it('find runs nothing until the first value is pulled', async () => {
      await widgets.add({ name: 'a' });
      const executed = database.statements.length;

      const iterator = widgets.find();
      expect(database.statements).toHaveLength(executed);

      const first = await iterator.next();
      expect(first.done).toBe(false);
      expect(database.statements).toHaveLength(executed + 1);
      expect((await iterator.next()).done).toBe(true);
    });

    it('counts with a filter', async () => {
      await widgets.add([{ kind: 'x' }, { kind: 'y' }, { kind: 'x' }]);
      expect(await widgets.count({ kind: 'x' })).toBe(2);
    });

    it('rejects filters on fields the entity does not declare', async () => {
      const gadgets = new EntityStore(Gadget, { cache, database: 'test' });

      await expect(gadgets.find({ secret: 1 }).next()).rejects.toThrow('Unknown field "secret"');
      await expect(gadgets.count({ name: 'g' })).resolves.toBe(0);
    });

    it('rejects empty identifiers', async () => {
      await expect(widgets.exists('')).rejects.toBeInstanceOf(InvalidArgumentError);
    });
  });

  describe('load and delete', () => {
    it('load overwrites fields from the stored row', async () => {
      const stored = await widgets.add({ name: 'a', size: 2 });
      const copy = new Widget({ _id: stored.id, name: 'stale' });

      await widgets.load(copy);

      expect(copy.toJSON()).toEqual({ _id: stored.id, name: 'a', size: 2 });
    });

    it('load requires an identifier that exists', async () => {
      await expect(widgets.load(new Widget({ name: 'a' }))).rejects.toBeInstanceOf(MissingIdentifierError);
      await expect(widgets.load(new Widget({ _id: 'ghost' }))).rejects.toMatchObject({
        name: 'MissingIdentifierError',
        context: { id: 'ghost', operation: 'load' },
      });
    });

    it('delete removes the row and clears the entity', async () => {
      const widget = await widgets.add({ name: 'a' });

      await widgets.delete(widget);

      expect(widget.toJSON()).toEqual({});
      expect(await widgets.count()).toBe(0);
    });

    it('delete checks existence first and never issues DELETE for a missing row', async () => {
      const widget = await widgets.add({ name: 'a' });
      const id = widget.id;
      await widgets.delete(widget);

      await expect(widgets.delete(new Widget({ _id: id }))).rejects.toBeInstanceOf(MissingIdentifierError);
      expect(statements('DELETE')).toHaveLength(1);
    });

    it('delete without an identifier fails', async () => {
      await expect(widgets.delete(new Widget({ name: 'a' }))).rejects.toBeInstanceOf(MissingIdentifierError);
      expect(database.statements).toEqual([]);
    });

    it('raises DeleteVerificationError when DELETE returns another identifier', async () => {
      const widget = await widgets.add({ name: 'a' });
      const execute = database.execute.bind(database);
      vi.spyOn(database, 'execute').mockImplementation((text, params) =>
        text.startsWith('DELETE') ? { rows: [{ deleted_id: 'other' }], rowCount: 1 } : execute(text, params)
      );

      const error = await widgets.delete(widget).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DeleteVerificationError);
      expect(error).toMatchObject({ deletedId: 'other', context: { id: widget.id, operation: 'delete' } });
      expect(widget.get('name')).toBe('a');
    });
  });

  describe('connections and bootstrap', () => {
    it('bootstraps once per pool, including under concurrent first use', async () => {
      await Promise.all([widgets.count(), widgets.count(), widgets.count()]);
      await widgets.add({ name: 'a' });

      expect(statements('CREATE TABLE')).toHaveLength(1);
      expect(statements('CREATE INDEX')).toHaveLength(1);
    });

    it('bootstraps again after the cache replaces the pool', async () => {
      await widgets.count();
      await cache.close();

      expect(await widgets.count()).toBe(0);
      expect(pools).toHaveLength(2);
      expect(statements('CREATE TABLE')).toHaveLength(2);
    });

    it('shares one pool between entity types with the same connection config', async () => {
      const gadgets = new EntityStore(Gadget, { cache, database: 'test' });

      await widgets.count();
      await gadgets.count();

      expect(pools).toHaveLength(1);
      expect([...database.tables.keys()]).toEqual(['widget', 'gadget']);
    });

    it('releases the connection after successes and failures', async () => {
      await widgets.add({ name: 'a' });
      await widgets.findById('missing').catch(() => undefined);
      database.failOn(/^SELECT data/, new SqlStateError('canceling statement due to statement timeout', '57014'));

      const error = await widgets.findOne({ name: 'a' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DatabaseError);
      expect(error).toMatchObject({ code: '57014', context: { entityType: 'Widget', operation: 'findOne' } });
      expect(pools[0]?.checkedOut).toBe(0);
    });

    it('surfaces checkout failures as ConnectionError', async () => {
      await widgets.count();
      const [pool] = pools;
      if (pool) pool.failConnect = new Error('sorry, too many clients already');

      await expect(widgets.count()).rejects.toMatchObject({
        name: 'ConnectionError',
        message: 'Failed to acquire database connection: sorry, too many clients already',
        context: { operation: 'count' },
      });
      await expect(widgets.exists('x')).rejects.toBeInstanceOf(ConnectionError);
    });

    it('resolves the connection config once, with the database name last', () => {
      const store = new EntityStore(Widget, { cache, connection: { database: 'ignored', max: 3 }, database: 'test' });

      expect(store.config.connection).toMatchObject({ database: 'test', max: 3 });
      expect(store.config.tableName).toBe('widget');
      expect(store.config.fields).toBeUndefined();
    });

    it('takes the database name from DB_NAME when nothing else names one', () => {
      const store = new EntityStore(Widget, { cache, config: new ConfigManager({ DB_NAME: 'app_db' }) });

      expect(store.config.connection.database).toBe('app_db');
    });

    it('prefers the database in the connection options over DB_NAME', () => {
      const store = new EntityStore(Widget, {
        cache,
        config: new ConfigManager({ DB_NAME: 'app_db' }),
        connection: { database: 'from_connection' },
      });

      expect(store.config.connection.database).toBe('from_connection');
    });

    it('falls back to the postgres database', () => {
      const store = new EntityStore(Widget, { cache, config: new ConfigManager({}) });

      expect(store.config.connection.database).toBe('postgres');
    });
  });

  describe('drop', () => {
    it('drops without bootstrapping and reports a missing table', async () => {
      await widgets.count();
      await widgets.drop();

      await expect(widgets.drop()).rejects.toMatchObject({
        name: 'SchemaConflictError',
        code: '42P01',
        context: { operation: 'drop' },
      });
      expect(statements('CREATE TABLE')).toHaveLength(1);
      expect(pools[0]?.checkedOut).toBe(0);
    });

    it('makes every store of the table on the same pool bootstrap again', async () => {
      const other = new EntityStore(Widget, { cache, database: 'test' });
      await widgets.add({ name: 'a' });
      expect(await other.count()).toBe(1);

      await widgets.drop();

      expect(await other.count()).toBe(0);
      expect(statements('CREATE TABLE')).toHaveLength(2);
    });
  });
});
