/**
 * Database connection management
 * Pool cache keyed by connection fingerprint, with the pg-backed default pool factory
 */

import { Pool, PoolClient } from 'pg';
import {
  ConnectionConfig,
  DatabaseClient,
  DatabasePool,
  ExecutionContext,
  PoolFactory,
  PoolStats,
  QueryResult,
} from '../types';
import { logger } from '../utils/logger';
import { ConnectionError, getErrorCode, toError } from '../utils/error';
import { fingerprint } from '../utils/fingerprint';

class PgClient implements DatabaseClient {
  constructor(private readonly client: PoolClient) {}

  public async query(text: string, params: unknown[] = []): Promise<QueryResult> {
    const result = await this.client.query<Record<string, unknown>>(text, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  public release(error?: Error): void {
    this.client.release(error);
  }
}

class PgPool implements DatabasePool {
  constructor(private readonly pool: Pool) {}

  public async connect(): Promise<DatabaseClient> {
    return new PgClient(await this.pool.connect());
  }

  public async end(): Promise<void> {
    await this.pool.end();
  }

  public stats(): PoolStats {
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }
}

/**
 * Create a pg pool and verify it with one round trip
 */
export const createPgPool: PoolFactory = async (config: ConnectionConfig) => {
  const pool = new Pool(config);

  pool.on('error', (err: Error) => {
    logger.error('Unexpected database pool error', { error: err.message, database: config.database });
  });

  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  } catch (error) {
    await pool.end();
    throw error;
  }

  return new PgPool(pool);
};

const redact = (config: ConnectionConfig): ConnectionConfig => ({
  ...config,
  password: config.password === undefined ? undefined : '***',
});

interface CacheEntry {
  pool: Promise<DatabasePool>;
  generation: number;
}

/**
 * Process-wide cache of connection pools, one per config fingerprint.
 * Creation is single-flight: concurrent `connect` calls for the same
 * fingerprint await the same pending pool.
 */
export class ConnectionPoolCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly createPool: PoolFactory;
  private executionContext: ExecutionContext | null = null;
  private generation = 0;

  constructor(createPool: PoolFactory = createPgPool) {
    this.createPool = createPool;
  }

  public get size(): number {
    return this.entries.size;
  }

  public async connect(config: ConnectionConfig): Promise<DatabasePool> {
    const key = fingerprint(config);

    const cached = this.entries.get(key);
    if (cached) {
      return cached.pool;
    }

    const entry: CacheEntry = { pool: this.open(key, config), generation: this.generation };
    this.entries.set(key, entry);
    return entry.pool;
  }

  private async open(key: string, config: ConnectionConfig): Promise<DatabasePool> {
    const generation = this.generation;
    let pool: DatabasePool;

    try {
      pool = await this.createPool(config);
    } catch (error) {
      if (this.entries.get(key)?.generation === generation) {
        this.entries.delete(key);
      }
      const cause = toError(error);
      logger.error('Database pool creation failed', {
        error: cause.message,
        config: redact(config),
      });
      throw new ConnectionError(
        `Database connection failed: ${cause.message}`,
        { operation: 'connect' },
        getErrorCode(error),
        cause
      );
    }

    // The cache was closed while this pool was being created
    if (generation !== this.generation) {
      await pool.end();
      throw new ConnectionError('Connection pool cache was closed while connecting', {
        operation: 'connect',
      });
    }

    logger.info('Database pool created', {
      host: config.host,
      database: config.database,
      pools: this.entries.size,
    });
    return pool;
  }

  /**
   * End every cached pool and forget them
   */
  public async close(): Promise<void> {
    const pending = [...this.entries.values()];
    this.entries.clear();
    this.generation += 1;

    const results = await Promise.allSettled(
      pending.map(async entry => {
        const pool = await entry.pool;
        await pool.end();
      })
    );

    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    for (const failure of failures) {
      if (!(failure.reason instanceof ConnectionError)) {
        logger.warn('Failed to close database pool', { error: toError(failure.reason).message });
      }
    }

    logger.info('Database pools closed', { closed: pending.length });
  }

  public getExecutionContext(): ExecutionContext | null {
    return this.executionContext;
  }

  /**
   * Pools are bound to the context they were created under, so switching
   * contexts always closes every cached pool.
   */
  public async setExecutionContext(context: ExecutionContext): Promise<void> {
    this.executionContext = context;
    await this.close();
  }

  public stats(): Promise<Record<string, PoolStats | null>> {
    return Promise.all(
      [...this.entries.entries()].map(async ([key, entry]) => {
        const pool = await entry.pool;
        return [key, pool.stats ? pool.stats() : null] as const;
      })
    ).then(pairs => Object.fromEntries(pairs));
  }
}

// Shared default instance; stores accept an injected cache instead
export const defaultPoolCache = new ConnectionPoolCache();
export default defaultPoolCache;
