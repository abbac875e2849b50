/**
 * Creates the backing table and identifier index for an entity type.
 * Safe to run concurrently from several processes: "already exists" is success.
 */

import { DatabaseClient } from '../types';
import { fieldSegmentSchema, tableNameSchema } from '../schemas/base';
import { ScopedLogger, logger } from '../utils/logger';
import { InvalidArgumentError, SchemaConflictError, getErrorCode, toError } from '../utils/error';

// duplicate_table, duplicate_object, and unique_violation on pg_type when two
// sessions race through CREATE TABLE
const ALREADY_EXISTS_CODES = new Set(['42P07', '42710', '23505']);

export const isAlreadyExistsError = (error: unknown): boolean => {
  const code = getErrorCode(error);
  return code !== undefined && ALREADY_EXISTS_CODES.has(code);
};

export const indexName = (tableName: string): string => `idx_id_${tableName}`;

export class SchemaBootstrapper {
  private readonly log: ScopedLogger;

  constructor(private readonly entityType: string) {
    this.log = logger.withContext({ entityType, operation: 'bootstrap' });
  }

  public async ensure(client: DatabaseClient, tableName: string, identifierField: string): Promise<void> {
    const table = this.checkTable(tableName);
    if (!fieldSegmentSchema.safeParse(identifierField).success) {
      throw new InvalidArgumentError(`Invalid identifier field "${identifierField}"`, {
        entityType: this.entityType,
        operation: 'bootstrap',
      });
    }

    const createdTable = await this.run(client, `CREATE TABLE ${table} ( data jsonb )`);
    const createdIndex = await this.run(
      client,
      `CREATE INDEX ${indexName(table)} ON ${table} USING HASH ((data->>'${identifierField}'))`
    );

    this.log.debug('Schema ensured', { table, createdTable, createdIndex });
  }

  public async drop(client: DatabaseClient, tableName: string): Promise<void> {
    const table = this.checkTable(tableName);
    try {
      await client.query(`DROP TABLE ${table}`);
    } catch (error) {
      throw this.conflict(`Failed to drop table ${table}`, error, 'drop');
    }
    this.log.info('Table dropped', { table });
  }

  /**
   * Returns false when the object already existed
   */
  private async run(client: DatabaseClient, statement: string): Promise<boolean> {
    try {
      await client.query(statement);
      return true;
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return false;
      }
      throw this.conflict(`Schema bootstrap failed`, error);
    }
  }

  private checkTable(tableName: string): string {
    const result = tableNameSchema.safeParse(tableName);
    if (!result.success) {
      throw new InvalidArgumentError(`Invalid table name "${tableName}"`, {
        entityType: this.entityType,
      });
    }
    return result.data;
  }

  private conflict(message: string, error: unknown, operation = 'bootstrap'): SchemaConflictError {
    const cause = toError(error);
    this.log.error(message, { error: cause.message, code: getErrorCode(error) });
    return new SchemaConflictError(
      `${message}: ${cause.message}`,
      { entityType: this.entityType, operation },
      getErrorCode(error),
      cause
    );
  }
}
