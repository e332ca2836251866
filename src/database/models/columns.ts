import { z } from 'zod';
import { DataIntegrityError } from '../../shared/errors.js';

/** Nullable text column read as '' */
export const textColumn = z
  .string()
  .nullable()
  .transform((value) => value ?? '');

/** Nullable integer reference read as 0 */
export const refColumn = z
  .number()
  .int()
  .nullable()
  .transform((value) => value ?? 0);

export function parseRow<S extends z.ZodTypeAny>(schema: S, row: unknown, table: string): z.output<S> {
  const result = schema.safeParse(row);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new DataIntegrityError(`Unreadable ${table} row: ${issues}`);
  }
  return result.data;
}
