/**
 * Database-related type definitions
 */

export type ConnectionConfigValue = string | number | boolean | undefined;

/**
 * Driver options for one pool. Two configs that fingerprint identically share a pool.
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  min?: number;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
  [option: string]: ConnectionConfigValue;
}

export type DatabaseRow = Record<string, unknown>;

export interface QueryResult<T = DatabaseRow> {
  rows: T[];
  rowCount: number;
}

/**
 * A connection checked out of a pool. Must be released exactly once.
 */
export interface DatabaseClient {
  query(text: string, params?: unknown[]): Promise<QueryResult>;
  release(error?: Error): void;
}

export interface PoolStats {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
}

/**
 * A live pool of connections, shared by every store whose config fingerprint matches
 */
export interface DatabasePool {
  connect(): Promise<DatabaseClient>;
  end(): Promise<void>;
  stats?(): PoolStats;
}

export type PoolFactory = (config: ConnectionConfig) => Promise<DatabasePool>;

/**
 * Opaque token for the scheduler pools are bound to
 */
export type ExecutionContext = object;
