/**
 * Logging-related type definitions
 */

export interface LogContext {
  entityType?: string;
  operation?: string;
  id?: string;
  [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';
