/**
 * Base document abstraction for every stored entity type
 * Owns the identifier policy, computed fields and the document (de)serialization
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  ComputedFieldProvider,
  ConnectionConfig,
  DocumentData,
  FieldDefinition,
  SerializeOptions,
  ValidationResult,
} from '../types';
import { formatZodError } from '../schemas/base';
import { InvalidArgumentError } from '../utils/error';

export const PRIMARY_FIELD = '_id';

const isEmpty = (value: unknown): boolean => value === undefined || value === null || value === '';

export abstract class BaseDocument {
  protected data: DocumentData;

  constructor(data: DocumentData = {}) {
    this.data = { ...data };
  }

  /**
   * Entity type name, also the source of the table name
   */
  public static getEntityType(): string {
    throw new Error('getEntityType must be implemented by concrete document classes');
  }

  /**
   * Zod schema the serialized document must satisfy. Keys of the shape are the
   * declared fields queries may reference; an empty shape accepts any field.
   */
  public static getSchema(): z.AnyZodObject {
    return z.object({}).passthrough();
  }

  public static getFieldNames(): string[] {
    return Object.keys(this.getSchema().shape);
  }

  public static getComputedFields(): Record<string, ComputedFieldProvider> {
    return {};
  }

  public static getTableName(): string {
    return this.getEntityType()
      .toLowerCase()
      .replace(/[^a-z0-9_]+/g, '_');
  }

  /**
   * Connection options specific to this entity type, merged over the environment defaults
   */
  public static getConnection(): ConnectionConfig {
    return {};
  }

  /**
   * Database for this entity type. Unset by default, leaving the choice to the
   * store's connection options and `DB_NAME`.
   */
  public static getDatabaseName(): string | undefined {
    return undefined;
  }

  public static defaultPrimary(): FieldDefinition {
    return {
      name: PRIMARY_FIELD,
      type: 'string',
      primary: true,
      computed: {
        compute: () => uuidv4(),
        onlyWhenEmpty: true,
      },
    };
  }

  public static getPrimary(): FieldDefinition {
    return this.defaultPrimary();
  }

  public static checkPrimary(primary: FieldDefinition): void {
    if (primary.name !== PRIMARY_FIELD) {
      throw new InvalidArgumentError(
        `Primary field must be named ${PRIMARY_FIELD}, got "${primary.name}"`,
        { entityType: this.getEntityType() }
      );
    }
    if (primary.type !== 'string') {
      throw new InvalidArgumentError(`Primary field must be a string, got ${primary.type}`, {
        entityType: this.getEntityType(),
      });
    }
  }

  public static validate(data: unknown): ValidationResult {
    const result = this.getSchema().safeParse(data);
    if (result.success) {
      return { isValid: true, errors: [] };
    }
    return { isValid: false, errors: formatZodError(result.error) };
  }

  public get id(): string | undefined {
    const value = this.data[PRIMARY_FIELD];
    return typeof value === 'string' && value !== '' ? value : undefined;
  }

  public get(field: string): unknown {
    return this.data[field];
  }

  public set(field: string, value: unknown): this {
    this.data[field] = value;
    return this;
  }

  /**
   * Merge fields from a stored document into this instance
   */
  public update(data: DocumentData): this {
    Object.assign(this.data, data);
    return this;
  }

  public clear(): void {
    this.data = {};
  }

  /**
   * Produce the document mapping to store. With `computed`, missing computed
   * fields (the primary included) are filled in on the instance first.
   */
  public serialize(options: SerializeOptions = {}): DocumentData {
    if (options.computed) {
      const type = this.constructor as typeof BaseDocument;
      const primary = type.getPrimary();
      const providers: Record<string, ComputedFieldProvider> = { ...type.getComputedFields() };
      if (primary.computed) {
        providers[primary.name] = primary.computed;
      }

      for (const [field, provider] of Object.entries(providers)) {
        const fill = isEmpty(this.data[field]) || (options.reset === true && !provider.onlyWhenEmpty);
        if (fill) {
          this.data[field] = provider.compute();
        }
      }
    }

    return { ...this.data };
  }

  public toJSON(): DocumentData {
    return { ...this.data };
  }
}

export type DocumentClass<T extends BaseDocument> = (new (data?: DocumentData) => T) &
  Omit<typeof BaseDocument, 'prototype'>;

/**
 * Build an entity instance from a stored document mapping
 */
export function deserialize<T extends BaseDocument>(type: DocumentClass<T>, data: DocumentData): T {
  return new type(data);
}
