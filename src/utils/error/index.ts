import { ErrorContext } from '../../types';

export class DocumentStoreError extends Error {
  public code?: string;
  public context: ErrorContext;
  public originalError?: Error;

  constructor(message: string, context: ErrorContext = {}, code?: string, originalError?: Error) {
    super(message);
    this.name = 'DocumentStoreError';
    this.context = context;
    this.code = code;
    this.originalError = originalError;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Pool creation or connection checkout failed
 */
export class ConnectionError extends DocumentStoreError {
  constructor(message: string, context: ErrorContext = {}, code?: string, originalError?: Error) {
    super(message, context, code, originalError);
    this.name = 'ConnectionError';
  }
}

/**
 * A statement failed to execute
 */
export class DatabaseError extends DocumentStoreError {
  constructor(message: string, context: ErrorContext = {}, code?: string, originalError?: Error) {
    super(message, context, code, originalError);
    this.name = 'DatabaseError';
  }
}

/**
 * DDL failed for a reason other than the object already existing
 */
export class SchemaConflictError extends DocumentStoreError {
  constructor(message: string, context: ErrorContext = {}, code?: string, originalError?: Error) {
    super(message, context, code, originalError);
    this.name = 'SchemaConflictError';
  }
}

export class NotFoundError extends DocumentStoreError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class MissingIdentifierError extends DocumentStoreError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'MISSING_IDENTIFIER');
    this.name = 'MissingIdentifierError';
  }
}

/**
 * The identifier returned by DELETE did not match the entity being deleted
 */
export class DeleteVerificationError extends DocumentStoreError {
  public deletedId?: string;

  constructor(message: string, context: ErrorContext = {}, deletedId?: string) {
    super(message, context, 'DELETE_VERIFICATION');
    this.name = 'DeleteVerificationError';
    this.deletedId = deletedId;
  }
}

export class InvalidArgumentError extends DocumentStoreError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class ValidationError extends DocumentStoreError {
  details?: unknown;

  constructor(message: string, context: ErrorContext = {}, details?: unknown) {
    super(message, context, 'VALIDATION');
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Read the SQLSTATE code a driver error carries, if any
 */
export const getErrorCode = (error: unknown): string | undefined => {
  if (error instanceof DocumentStoreError) {
    return error.code;
  }
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
