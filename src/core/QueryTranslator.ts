/**
 * Translates a declarative query specification into parameterized SQL
 * against the `data` jsonb column. Pure: no I/O, no shared state.
 */

import { QuerySpec, TranslateOptions, TranslatedQuery } from '../types';
import { fieldSegmentSchema, formatZodError, querySpecSchema, tableNameSchema } from '../schemas/base';
import { InvalidArgumentError } from '../utils/error';

const PRIMARY_FIELD = '_id';

const COMPARATORS = {
  $eq: '=',
  $ne: '<>',
  $gt: '>',
  $gte: '>=',
  $lt: '<',
  $lte: '<=',
} as const;

type Comparator = keyof typeof COMPARATORS;

const isComparator = (operator: string): operator is Comparator =>
  Object.prototype.hasOwnProperty.call(COMPARATORS, operator);

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date);

/**
 * Accumulates bound values; `$n` always refers to `values[n - 1]`
 */
class ParameterList {
  public readonly values: unknown[] = [];

  public bind(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

class FilterCompiler {
  private readonly params = new ParameterList();
  private readonly fields?: ReadonlySet<string>;

  constructor(fields?: readonly string[]) {
    this.fields = fields ? new Set([PRIMARY_FIELD, ...fields]) : undefined;
  }

  public get values(): unknown[] {
    return this.params.values;
  }

  /**
   * Compile every key of one filter object into conditions that are ANDed together
   */
  public compile(filter: Record<string, unknown>): string[] {
    const conditions: string[] = [];

    for (const [key, value] of Object.entries(filter)) {
      if (value === undefined) continue;

      switch (key) {
        case '$and':
          conditions.push(this.group(key, value, ' AND ', 'TRUE'));
          break;
        case '$or':
          conditions.push(this.group(key, value, ' OR ', 'FALSE'));
          break;
        case '$nor':
          conditions.push(`NOT ${this.group(key, value, ' OR ', 'FALSE')}`);
          break;
        case '$not':
          if (!isPlainObject(value)) {
            throw new InvalidArgumentError('$not expects a filter object');
          }
          conditions.push(`NOT (${this.compile(value).join(' AND ') || 'TRUE'})`);
          break;
        default:
          if (key.startsWith('$')) {
            throw new InvalidArgumentError(`Unsupported logical operator: ${key}`);
          }
          conditions.push(...this.field(key, value));
      }
    }

    return conditions;
  }

  private conjunction(conditions: string[]): string | undefined {
    if (conditions.length === 0) return undefined;
    if (conditions.length === 1) return conditions[0];
    return `(${conditions.join(' AND ')})`;
  }

  private group(operator: string, value: unknown, joiner: string, empty: string): string {
    if (!Array.isArray(value)) {
      throw new InvalidArgumentError(`${operator} expects an array of filters`);
    }
    if (value.length === 0) return empty;

    const parts = value.map(entry => {
      if (!isPlainObject(entry)) {
        throw new InvalidArgumentError(`${operator} entries must be filter objects`);
      }
      return this.conjunction(this.compile(entry)) ?? 'TRUE';
    });

    return `(${parts.join(joiner)})`;
  }

  private field(name: string, condition: unknown): string[] {
    const segments = this.validateField(name);

    if (isPlainObject(condition)) {
      const operators = Object.entries(condition).filter(([, operand]) => operand !== undefined);
      if (operators.length === 0 || operators.some(([operator]) => !operator.startsWith('$'))) {
        throw new InvalidArgumentError(
          `Condition on "${name}" must use operators; match nested fields with dotted names`
        );
      }
      return operators.map(([operator, operand]) => this.operator(segments, name, operator, operand));
    }

    return [this.compare(segments, name, '$eq', condition)];
  }

  private validateField(name: string): string[] {
    const segments = name.split('.');
    for (const segment of segments) {
      const result = fieldSegmentSchema.safeParse(segment);
      if (!result.success) {
        throw new InvalidArgumentError(`Invalid field name "${name}": ${formatZodError(result.error).join(', ')}`);
      }
    }

    const root = segments[0] ?? name;
    if (this.fields && !this.fields.has(root)) {
      throw new InvalidArgumentError(`Unknown field "${name}"`);
    }

    return segments;
  }

  private operator(segments: string[], name: string, operator: string, operand: unknown): string {
    if (isComparator(operator)) {
      return this.compare(segments, name, operator, operand);
    }

    switch (operator) {
      case '$in':
      case '$nin': {
        if (!Array.isArray(operand)) {
          throw new InvalidArgumentError(`${operator} on "${name}" expects an array`);
        }
        if (operand.length === 0) {
          return operator === '$in' ? 'FALSE' : 'TRUE';
        }
        const texts = operand.map(item => this.toText(name, operator, item));
        const placeholder = this.params.bind(texts);
        return operator === '$in'
          ? `${textPath(segments)} = ANY(${placeholder}::text[])`
          : `${textPath(segments)} <> ALL(${placeholder}::text[])`;
      }
      case '$exists':
        if (typeof operand !== 'boolean') {
          throw new InvalidArgumentError(`$exists on "${name}" expects a boolean`);
        }
        return `${jsonPath(segments)} ${operand ? 'IS NOT NULL' : 'IS NULL'}`;
      case '$like':
        if (typeof operand !== 'string') {
          throw new InvalidArgumentError(`$like on "${name}" expects a string pattern`);
        }
        return `${textPath(segments)} LIKE ${this.params.bind(operand)}`;
      default:
        throw new InvalidArgumentError(`Unsupported operator ${operator} on "${name}"`);
    }
  }

  private compare(segments: string[], name: string, operator: Comparator, operand: unknown): string {
    const sqlOperator = COMPARATORS[operator];
    const path = textPath(segments);

    if (operand === null) {
      if (operator === '$eq') return `${path} IS NULL`;
      if (operator === '$ne') return `${path} IS NOT NULL`;
      throw new InvalidArgumentError(`${operator} on "${name}" cannot compare against null`);
    }
    if (typeof operand === 'string') {
      return `${path} ${sqlOperator} ${this.params.bind(operand)}`;
    }
    if (typeof operand === 'number') {
      if (!Number.isFinite(operand)) {
        throw new InvalidArgumentError(`${operator} on "${name}" requires a finite number`);
      }
      return `(${path})::numeric ${sqlOperator} ${this.params.bind(operand)}`;
    }
    if (typeof operand === 'boolean') {
      if (operator !== '$eq' && operator !== '$ne') {
        throw new InvalidArgumentError(`${operator} on "${name}" cannot order booleans`);
      }
      return `(${path})::boolean ${sqlOperator} ${this.params.bind(operand)}`;
    }
    if (operand instanceof Date) {
      return `${path} ${sqlOperator} ${this.params.bind(operand.toISOString())}`;
    }

    throw new InvalidArgumentError(`Unsupported value for ${operator} on "${name}"`);
  }

  private toText(name: string, operator: string, item: unknown): string {
    if (typeof item === 'string') return item;
    if (typeof item === 'number' || typeof item === 'boolean') return String(item);
    if (item instanceof Date) return item.toISOString();
    throw new InvalidArgumentError(`${operator} on "${name}" only accepts strings, numbers, booleans and dates`);
  }
}

const textPath = (segments: string[]): string =>
  segments.length === 1 ? `data->>'${segments[0]}'` : `data#>>'{${segments.join(',')}}'`;

const jsonPath = (segments: string[]): string =>
  segments.length === 1 ? `data->'${segments[0]}'` : `data#>'{${segments.join(',')}}'`;

/**
 * Build `SELECT data ...` (or `SELECT count(*) ...`) for a `QuerySpec`.
 * Placeholders are numbered from 1 in the order predicates appear in the filter.
 */
export function translate(
  tableName: string,
  spec: QuerySpec = {},
  options: TranslateOptions = {}
): TranslatedQuery {
  const table = tableNameSchema.safeParse(tableName);
  if (!table.success) {
    throw new InvalidArgumentError(`Invalid table name "${tableName}": ${formatZodError(table.error).join(', ')}`);
  }

  const parsed = querySpecSchema.safeParse(spec);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid query: ${formatZodError(parsed.error).join(', ')}`);
  }
  const { filter, limit, skip } = parsed.data;

  const compiler = new FilterCompiler(options.fields);
  const conditions = compiler.compile(filter);

  const clauses = [options.count ? `SELECT count(*) FROM ${table.data}` : `SELECT data FROM ${table.data}`];
  if (conditions.length > 0) {
    clauses.push(`WHERE ${conditions.join(' AND ')}`);
  }
  if (!options.count) {
    if (limit !== undefined) clauses.push(`LIMIT ${limit}`);
    if (skip > 0) clauses.push(`OFFSET ${skip}`);
  }

  return { text: clauses.join(' '), params: compiler.values };
}
