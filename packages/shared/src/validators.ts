/**
 * Zod validators for record definitions and record field values
 */

import { z } from 'zod';
import { FIELD_NAME_PATTERN } from './constants';
import { ValidationError } from './errors';
import type { FieldValidator } from './types';

// ============================================
// DEFINITION VALIDATORS
// ============================================

export const recordNameSchema = z
  .string({ invalid_type_error: 'Record name must be a string' })
  .trim()
  .min(1, 'Record name must not be empty');

export const fieldNameSchema = z
  .string({ invalid_type_error: 'Field names must be strings' })
  .regex(FIELD_NAME_PATTERN, 'Field names must be identifiers');

export const fieldListSchema = z
  .array(fieldNameSchema)
  .min(1, 'A record needs at least one field')
  .superRefine((fields, ctx) => {
    const seen = new Set<string>();
    fields.forEach((field, index) => {
      if (seen.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate field name: ${field}`,
          path: [index]
        });
      }
      seen.add(field);
    });
  });

export const fieldValidatorSchema = z.custom<FieldValidator>(
  value => typeof value === 'function',
  'validator must be a function'
);

export const recordDefinitionSchema = z
  .object({
    name: recordNameSchema,
    fields: fieldListSchema,
    defaults: z.array(z.unknown()).optional(),
    validator: fieldValidatorSchema.optional(),
    indexable: z.boolean().optional()
  })
  .superRefine((definition, ctx) => {
    const { defaults, fields } = definition;
    if (defaults && defaults.length > fields.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Got ${defaults.length} defaults for ${fields.length} fields`,
        path: ['defaults']
      });
    }
  });

// ============================================
// FIELD VALUE VALIDATORS
// ============================================

export type FieldSchemas<Field extends string = string> = Partial<Record<Field, z.ZodTypeAny>>;

/**
 * Build a record validator from one zod schema per field.
 *
 * The parsed output is what gets stored, so `.catch()`, `.default()`,
 * `.transform()` and coercions all take effect. Fields without a schema pass
 * through unchanged.
 *
 * @example
 * ```typescript
 * const validator = fieldValidator({
 *   red: z.number().int().min(0).max(255),
 *   alpha: z.number().min(0).max(1).catch(1)
 * });
 * ```
 */
export function fieldValidator<Field extends string>(
  schemas: FieldSchemas<Field>
): FieldValidator<Field> {
  return (field, value) => {
    const schema = schemas[field];
    if (!schema) return value;

    const result = schema.safeParse(value);
    if (!result.success) {
      const message = result.error.issues.map(issue => issue.message).join('; ');
      throw new ValidationError(`Invalid value for ${field}: ${message}`, {
        field,
        value,
        issues: result.error.issues
      });
    }
    return result.data;
  };
}
