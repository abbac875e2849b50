/**
 * Per-entity-type store over a single jsonb document table
 * Bootstraps the table lazily, then runs every operation on a freshly checked-out connection
 */

import { ZodError } from 'zod';
import {
  ConnectionConfig,
  DatabaseClient,
  DatabasePool,
  DatabaseRow,
  DocumentData,
  FindOptions,
  QueryFilter,
  QuerySpec,
  TranslatedQuery,
} from '../types';
import { BaseDocument, DocumentClass, PRIMARY_FIELD, deserialize } from './BaseDocument';
import { SchemaBootstrapper } from './SchemaBootstrapper';
import { translate } from './QueryTranslator';
import configManager, { ConfigManager } from '../config/app';
import defaultPoolCache, { ConnectionPoolCache } from '../config/database';
import { ScopedLogger, logger } from '../utils/logger';
import {
  ConnectionError,
  DatabaseError,
  DeleteVerificationError,
  DocumentStoreError,
  InvalidArgumentError,
  MissingIdentifierError,
  NotFoundError,
  ValidationError,
  getErrorCode,
  toError,
} from '../utils/error';
import { decodeDocument, encodeDocument } from '../utils/json';
import { connectionConfigSchema, formatZodError, tableNameSchema } from '../schemas/base';

export interface EntityStoreOptions {
  cache?: ConnectionPoolCache;
  /** Source of the environment defaults; the process-wide config when omitted */
  config?: ConfigManager;
  /** Overrides merged over the environment defaults and the entity type's own connection */
  connection?: ConnectionConfig;
  database?: string;
  defaultLimit?: number;
}

/**
 * Everything an entity type needs at run time, resolved once at construction
 */
export interface EntityStoreConfig {
  entityType: string;
  tableName: string;
  connection: ConnectionConfig;
  fields?: readonly string[];
  defaultLimit: number;
}

const DEFAULT_DATABASE = 'postgres';

/**
 * Bootstrap state per pool and table, shared by every store on that pool.
 * An entry holds the in-flight or finished bootstrap; `drop` removes it.
 */
const bootstrapped = new WeakMap<DatabasePool, Map<string, Promise<void>>>();

const tablesOn = (pool: DatabasePool): Map<string, Promise<void>> => {
  let tables = bootstrapped.get(pool);
  if (!tables) {
    tables = new Map();
    bootstrapped.set(pool, tables);
  }
  return tables;
};

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const isPlainObject = (value: unknown): value is DocumentData =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

const toCount = (value: unknown): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') return Number.parseInt(value, 10);
  return 0;
};

export class EntityStore<T extends BaseDocument> {
  public readonly config: EntityStoreConfig;
  private readonly type: DocumentClass<T>;
  private readonly cache: ConnectionPoolCache;
  private readonly bootstrapper: SchemaBootstrapper;

  constructor(type: DocumentClass<T>, options: EntityStoreOptions = {}) {
    this.type = type;
    this.cache = options.cache ?? defaultPoolCache;
    this.config = EntityStore.resolveConfig(type, options);
    this.bootstrapper = new SchemaBootstrapper(this.config.entityType);
  }

  private static resolveConfig<T extends BaseDocument>(
    type: DocumentClass<T>,
    options: EntityStoreOptions
  ): EntityStoreConfig {
    const entityType = type.getEntityType();
    type.checkPrimary(type.getPrimary());

    const tableName = tableNameSchema.safeParse(type.getTableName());
    if (!tableName.success) {
      throw new InvalidArgumentError(
        `Invalid table name for ${entityType}: ${formatZodError(tableName.error).join(', ')}`,
        { entityType }
      );
    }

    const config = options.config ?? configManager;
    const defaults = config.getDatabaseConfig();
    const typeConnection = type.getConnection();
    const connection: ConnectionConfig = {
      ...defaults,
      ...typeConnection,
      ...options.connection,
      database:
        options.database ??
        asString(options.connection?.database) ??
        type.getDatabaseName() ??
        asString(typeConnection.database) ??
        asString(defaults.database) ??
        DEFAULT_DATABASE,
    };
    const checked = connectionConfigSchema.safeParse(connection);
    if (!checked.success) {
      throw new InvalidArgumentError(
        `Invalid connection config for ${entityType}: ${formatZodError(checked.error).join(', ')}`,
        { entityType }
      );
    }

    const fields = type.getFieldNames();

    return {
      entityType,
      tableName: tableName.data,
      connection,
      fields: fields.length > 0 ? fields : undefined,
      defaultLimit: options.defaultLimit ?? config.getQueryConfig().defaultFindLimit,
    };
  }

  public get tableName(): string {
    return this.config.tableName;
  }

  public async count(filter: QueryFilter = {}): Promise<number> {
    const { text, params } = this.translate({ filter }, true);
    const rows = await this.run('count', client => this.execute(client, text, params, 'count'));
    return toCount(rows[0]?.count);
  }

  public async exists(id: string): Promise<boolean> {
    this.checkId(id, 'exists');
    return this.run('exists', async client => (await this.countById(client, id)) > 0);
  }

  public async findById(id: string): Promise<T> {
    this.checkId(id, 'findById');
    const row = await this.run('findById', client => this.selectById(client, id));
    if (!row) {
      throw new NotFoundError(`Could not find any ${this.config.entityType} for: ${id}`, {
        entityType: this.config.entityType,
        id,
        operation: 'findById',
      });
    }
    return this.fromRow(row);
  }

  public async findOne(filter: QueryFilter = {}): Promise<T | null> {
    const { text, params } = this.translate({ filter, limit: 1 });
    const rows = await this.run('findOne', client => this.execute(client, text, params, 'findOne'));
    const row = rows[0];
    return row ? this.fromRow(row) : null;
  }

  /**
   * Lazily run a query and yield one entity per row. Nothing executes until the
   * first value is pulled; iterate again by calling `find` again.
   */
  public async *find(filter: QueryFilter = {}, options: FindOptions = {}): AsyncGenerator<T, void, undefined> {
    const { text, params } = this.translate({
      filter,
      limit: options.limit ?? this.config.defaultLimit,
      skip: options.skip ?? 0,
    });
    const rows = await this.run('find', client => this.execute(client, text, params, 'find'));
    for (const row of rows) {
      yield this.fromRow(row);
    }
  }

  public add(record: DocumentData): Promise<T>;
  public add(records: DocumentData[]): Promise<T[]>;
  public async add(input: unknown): Promise<T | T[]> {
    if (Array.isArray(input)) {
      const records: DocumentData[] = [];
      for (const record of input) {
        if (!isPlainObject(record)) {
          throw this.invalidAdd();
        }
        records.push(record);
      }

      const entities: T[] = [];
      for (const record of records) {
        const entity = new this.type(record);
        await this.save(entity);
        entities.push(entity);
      }
      return entities;
    }

    if (isPlainObject(input)) {
      const entity = new this.type(input);
      await this.save(entity);
      return entity;
    }

    throw this.invalidAdd();
  }

  /**
   * Insert the entity, or replace the stored document when its identifier already
   * exists. The existence check and the write are separate statements: a concurrent
   * writer on the same identifier wins or loses by commit order.
   */
  public async save(entity: T): Promise<T> {
    const document = entity.serialize({ computed: true, reset: true });
    const id = entity.id;
    if (!id) {
      throw new MissingIdentifierError(`${this.config.entityType} has no identifier after serialization`, {
        entityType: this.config.entityType,
        operation: 'save',
      });
    }

    const validation = this.type.getSchema().safeParse(document);
    if (!validation.success) {
      throw this.invalidDocument(validation.error, id);
    }

    const payload = encodeDocument(document);

    const row = await this.run('save', async client => {
      if ((await this.countById(client, id)) > 0) {
        const rows = await this.execute(
          client,
          `UPDATE ${this.tableName} SET data = $1::jsonb WHERE data->>'${PRIMARY_FIELD}' = $2 RETURNING data`,
          [payload, id],
          'save'
        );
        if (rows[0]) return rows[0];
        this.log('save').warn('Row removed between existence check and update; inserting', { id });
      }

      const rows = await this.execute(
        client,
        `INSERT INTO ${this.tableName} ( data ) VALUES ($1::jsonb) RETURNING data`,
        [payload],
        'save'
      );
      return rows[0];
    });

    if (!row) {
      throw new DatabaseError(`Saving ${this.config.entityType} returned no row`, {
        entityType: this.config.entityType,
        id,
        operation: 'save',
      });
    }

    entity.update(decodeDocument(row.data));
    this.log('save').debug('Entity saved', { id });
    return entity;
  }

  /**
   * Overwrite the entity's fields from its stored row
   */
  public async load(entity: T): Promise<T> {
    const id = this.requireId(entity, 'load');
    const row = await this.run('load', client => this.selectById(client, id));
    if (!row) {
      throw this.missing(id, 'load');
    }
    entity.update(decodeDocument(row.data));
    return entity;
  }

  public async delete(entity: T): Promise<void> {
    const id = this.requireId(entity, 'delete');

    const deletedId = await this.run('delete', async client => {
      if ((await this.countById(client, id)) === 0) {
        throw this.missing(id, 'delete');
      }
      const rows = await this.execute(
        client,
        `DELETE FROM ${this.tableName} WHERE data->>'${PRIMARY_FIELD}' = $1 RETURNING data->>'${PRIMARY_FIELD}' AS deleted_id`,
        [id],
        'delete'
      );
      return rows[0]?.deleted_id;
    });

    if (deletedId !== id) {
      this.log('delete').error('Deleted identifier does not match', { id, deletedId: String(deletedId) });
      throw new DeleteVerificationError(
        `Delete of ${this.config.entityType} ${id} returned ${String(deletedId)}`,
        { entityType: this.config.entityType, id, operation: 'delete' },
        typeof deletedId === 'string' ? deletedId : undefined
      );
    }

    entity.clear();
    this.log('delete').info('Entity deleted', { id });
  }

  /**
   * Drop the table without bootstrapping it first. The next operation of any
   * store of this table on the same pool bootstraps it again.
   */
  public async drop(): Promise<void> {
    const pool = await this.cache.connect(this.config.connection);
    await this.withClient(pool, 'drop', client => this.bootstrapper.drop(client, this.tableName));
    tablesOn(pool).delete(this.tableName);
  }

  private translate(spec: QuerySpec, count = false): TranslatedQuery {
    return translate(this.tableName, spec, { count, fields: this.config.fields });
  }

  private async countById(client: DatabaseClient, id: string): Promise<number> {
    const { text, params } = this.translate({ filter: { [PRIMARY_FIELD]: id } }, true);
    const rows = await this.execute(client, text, params, 'exists');
    return toCount(rows[0]?.count);
  }

  private async selectById(client: DatabaseClient, id: string): Promise<DatabaseRow | undefined> {
    const { text, params } = this.translate({ filter: { [PRIMARY_FIELD]: id }, limit: 1 });
    const rows = await this.execute(client, text, params, 'select');
    return rows[0];
  }

  private fromRow(row: DatabaseRow): T {
    return deserialize(this.type, decodeDocument(row.data));
  }

  /**
   * Resolve the pool and make sure the table exists on it. Bootstrap runs once per
   * pool and table; concurrent callers share the in-flight attempt.
   */
  private async ensurePool(): Promise<DatabasePool> {
    const pool = await this.cache.connect(this.config.connection);
    const tables = tablesOn(pool);

    let ready = tables.get(this.tableName);
    if (!ready) {
      ready = this.bootstrap(pool, tables);
      tables.set(this.tableName, ready);
    }
    await ready;
    return pool;
  }

  private async bootstrap(pool: DatabasePool, tables: Map<string, Promise<void>>): Promise<void> {
    try {
      await this.withClient(pool, 'bootstrap', client =>
        this.bootstrapper.ensure(client, this.tableName, PRIMARY_FIELD)
      );
    } catch (error) {
      tables.delete(this.tableName);
      throw error;
    }
  }

  private async run<R>(operation: string, fn: (client: DatabaseClient) => Promise<R>): Promise<R> {
    const pool = await this.ensurePool();
    return this.withClient(pool, operation, fn);
  }

  /**
   * Check out a connection for one operation; it is released on every exit path
   */
  private async withClient<R>(
    pool: DatabasePool,
    operation: string,
    fn: (client: DatabaseClient) => Promise<R>
  ): Promise<R> {
    let client: DatabaseClient;
    try {
      client = await pool.connect();
    } catch (error) {
      const cause = toError(error);
      this.log(operation).error('Failed to acquire database connection', { error: cause.message });
      throw new ConnectionError(
        `Failed to acquire database connection: ${cause.message}`,
        { entityType: this.config.entityType, operation },
        getErrorCode(error),
        cause
      );
    }

    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  private async execute(
    client: DatabaseClient,
    text: string,
    params: unknown[],
    operation: string
  ): Promise<DatabaseRow[]> {
    const start = Date.now();
    const log = this.log(operation);

    try {
      const result = await client.query(text, params);
      log.debug('Database query executed successfully', {
        duration: Date.now() - start,
        rowCount: result.rowCount,
        query: text.substring(0, 200) + (text.length > 200 ? '...' : ''),
        paramCount: params.length,
      });
      return result.rows;
    } catch (error) {
      if (error instanceof DocumentStoreError) {
        throw error;
      }
      const cause = toError(error);
      log.error('Database query failed', {
        duration: Date.now() - start,
        error: cause.message,
        query: text.substring(0, 200),
        paramCount: params.length,
      });
      throw new DatabaseError(
        `Query execution failed: ${cause.message}`,
        { entityType: this.config.entityType, operation },
        getErrorCode(error),
        cause
      );
    }
  }

  private log(operation: string): ScopedLogger {
    return logger.withContext({ entityType: this.config.entityType, operation });
  }

  private checkId(id: unknown, operation: string): void {
    if (typeof id !== 'string' || id === '') {
      throw new InvalidArgumentError(`${operation} expects a non-empty string identifier`, {
        entityType: this.config.entityType,
        operation,
      });
    }
  }

  private requireId(entity: T, operation: string): string {
    const id = entity.id;
    if (!id) {
      throw new MissingIdentifierError(`Missing ${this.config.entityType} id`, {
        entityType: this.config.entityType,
        operation,
      });
    }
    return id;
  }

  private missing(id: string, operation: string): MissingIdentifierError {
    return new MissingIdentifierError(`${this.config.entityType} id does not exist: ${id}`, {
      entityType: this.config.entityType,
      id,
      operation,
    });
  }

  private invalidAdd(): InvalidArgumentError {
    return new InvalidArgumentError(
      `Invalid argument to ${this.config.entityType} add: must be a record or a list of records`,
      { entityType: this.config.entityType, operation: 'add' }
    );
  }

  private invalidDocument(error: ZodError, id: string): ValidationError {
    const errors = formatZodError(error);
    return new ValidationError(
      `Invalid ${this.config.entityType} document: ${errors.join(', ')}`,
      { entityType: this.config.entityType, id, operation: 'save' },
      error.issues
    );
  }
}
