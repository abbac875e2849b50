/**
 * Base validation schemas using Zod
 */

import { z } from 'zod';

export const tableNameSchema = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, 'Table name must be a lower-case SQL identifier')
  .max(55, 'Table name too long');

export const fieldSegmentSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Field names may only contain letters, digits and underscores');

export const paginationSchema = z.object({
  limit: z
    .number()
    .int()
    .min(0, 'Limit cannot be negative')
    .max(Number.MAX_SAFE_INTEGER, 'Limit is too large')
    .optional(),
  skip: z
    .number()
    .int()
    .min(0, 'Skip cannot be negative')
    .max(Number.MAX_SAFE_INTEGER, 'Skip is too large')
    .default(0),
});

export const querySpecSchema = paginationSchema.extend({
  filter: z.record(z.unknown()).default({}),
});

export const connectionConfigSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.undefined()])
);

export const formatZodError = (error: z.ZodError): string[] =>
  error.errors.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`);
