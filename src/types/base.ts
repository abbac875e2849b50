/**
 * Base type definitions - fundamental types used across the document store
 */

/**
 * A stored record. Every persisted document carries its identifier under `_id`.
 */
export type DocumentData = Record<string, unknown>;

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * Produces the value of a computed field at save time
 */
export interface ComputedFieldProvider {
  compute(): unknown;
  /** Only fill the field when it has no value yet; otherwise recompute on every reset. */
  onlyWhenEmpty: boolean;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'object' | 'array' | 'date';

export interface FieldDefinition {
  name: string;
  type: FieldType;
  primary: boolean;
  computed?: ComputedFieldProvider;
}

export interface SerializeOptions {
  /** Materialize computed fields before serializing */
  computed?: boolean;
  /** Recompute fields whose provider is not `onlyWhenEmpty` */
  reset?: boolean;
}

export interface ErrorContext {
  entityType?: string;
  id?: string;
  operation?: string;
}
