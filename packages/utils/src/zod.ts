import { z } from 'zod';
import { Redacted } from './redacted';

/**
 * Parses a JSON string and validates the parsed value against `schema`.
 */
export const json = <T extends z.ZodType>(schema: T) =>
  z
    .string()
    .transform((value, ctx) => {
      try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
      } catch (error) {
        ctx.addIssue({
          code: 'custom',
          message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        });
        return z.NEVER;
      }
    })
    .pipe(schema);

export const redacted = <T extends z.ZodType>(schema: T) =>
  schema.transform((value) => new Redacted(value));
