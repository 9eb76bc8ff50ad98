/**
 * Zod schemas for fields and values embedded in pipeline configuration
 */

import { z } from 'zod';
import type { Field, RootKind } from './field';
import { tryFieldFromValue } from './unmarshal';
import type { Value } from './value';

/**
 * Schema turning a configuration string into a Field.
 *
 * Parse failures become custom issues carrying the parser's message and
 * its code under `params.code`.
 */
export function fieldSchema(kind?: RootKind): z.ZodType<Field, z.ZodTypeDef, unknown> {
  return z.unknown().transform((input, ctx) => {
    const result = tryFieldFromValue(input, kind);
    if (!result.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.message,
        params: { code: result.error.code },
      });
      return z.NEVER;
    }
    return result.field;
  });
}

export const FieldSchema = fieldSchema();

/**
 * Configured tree value: string, finite number, boolean, null, array or mapping
 */
export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(ValueSchema),
    z.record(ValueSchema),
  ])
);
