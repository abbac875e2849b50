/**
 * JSON encoding for the document column
 */

import { DocumentData } from '../types';

/**
 * Render dates as ISO-8601 and bigints as decimal strings on write
 */
export function convertValue(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown = typeof this === 'object' && this !== null ? Reflect.get(this, key) : value;
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

export const encodeDocument = (data: DocumentData): string => JSON.stringify(data, convertValue);

const isRecord = (value: unknown): value is DocumentData =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Decode a `data` column value. The pg driver hands back jsonb already parsed;
 * text columns or custom type parsers may return the raw JSON string.
 */
export const decodeDocument = (value: unknown): DocumentData => {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!isRecord(parsed)) {
    throw new TypeError(`Expected a JSON object in the document column, got ${typeof parsed}`);
  }
  return parsed;
};
