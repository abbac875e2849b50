/**
 * Query specification type definitions
 */

export type QueryValue = string | number | boolean | Date | null;

export interface OperatorCondition {
  $eq?: QueryValue;
  $ne?: QueryValue;
  $gt?: QueryValue;
  $gte?: QueryValue;
  $lt?: QueryValue;
  $lte?: QueryValue;
  $in?: QueryValue[];
  $nin?: QueryValue[];
  $exists?: boolean;
  $like?: string;
}

export type FieldCondition = QueryValue | OperatorCondition;

/**
 * Mongo-style filter. Sibling keys are ANDed; `$and`, `$or`, `$nor` and `$not` nest.
 */
export interface QueryFilter {
  $and?: QueryFilter[];
  $or?: QueryFilter[];
  $nor?: QueryFilter[];
  $not?: QueryFilter;
  [field: string]: FieldCondition | QueryFilter | QueryFilter[] | undefined;
}

export interface QuerySpec {
  filter?: QueryFilter;
  limit?: number;
  skip?: number;
}

export interface TranslateOptions {
  /** Emit `SELECT count(*)` instead of `SELECT data`; pagination is ignored */
  count?: boolean;
  /** Declared field names. When present, filters may only reference these and `_id`. */
  fields?: readonly string[];
}

export interface TranslatedQuery {
  text: string;
  params: unknown[];
}

export interface FindOptions {
  limit?: number;
  skip?: number;
}
