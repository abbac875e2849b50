/**
 * Application configuration
 * Centralized configuration management with environment validation
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { ConnectionConfig } from '../types';

dotenv.config();

// Environment validation schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),

  // Database
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(0),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),

  // Queries
  DEFAULT_FIND_LIMIT: z.coerce.number().int().min(1).default(100),
});

export type AppConfig = z.infer<typeof envSchema>;

class ConfigManager {
  private config: AppConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadAndValidateConfig(env);
  }

  /**
   * Load and validate environment configuration
   */
  private loadAndValidateConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
      const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);

      logger.error('Configuration validation failed', { errors });
      throw new Error(`Invalid configuration: ${errors.join(', ')}`);
    }

    logger.debug('Configuration loaded successfully', {
      environment: result.data.NODE_ENV,
      logLevel: result.data.LOG_LEVEL,
    });

    return result.data;
  }

  /**
   * Base connection options every entity store starts from.
   * The database name is left out when unset so entity types can choose their own.
   */
  public getDatabaseConfig(): ConnectionConfig {
    return {
      host: this.config.DB_HOST,
      port: this.config.DB_PORT,
      database: this.config.DB_NAME,
      user: this.config.DB_USER,
      password: this.config.DB_PASSWORD,
      min: this.config.DB_POOL_MIN,
      max: this.config.DB_POOL_MAX,
      idleTimeoutMillis: this.config.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: this.config.DB_CONNECTION_TIMEOUT_MS,
    };
  }

  public getQueryConfig() {
    return {
      defaultFindLimit: this.config.DEFAULT_FIND_LIMIT,
    };
  }

  public getMonitoringConfig() {
    return {
      logLevel: this.config.LOG_LEVEL,
    };
  }
}

// Export singleton instance
const configManager = new ConfigManager();
logger.setLevel(configManager.getMonitoringConfig().logLevel);

export default configManager;
export { ConfigManager };
