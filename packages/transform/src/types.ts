/**
 * logpipe Transform Types
 *
 * Pipeline configuration format. Every path in the document is parsed into
 * a Field while the configuration is validated, so a malformed path stops
 * the pipeline before any entry is processed.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { FieldSchema, ValueSchema } from '@logpipe/entry';

/**
 * What happens to an entry when an operator fails on it
 *
 * - send: log and pass the entry on unchanged by the failed operator
 * - drop: log and discard the entry
 */
export const OnErrorSchema = z.enum(['send', 'drop']);

export type OnError = z.infer<typeof OnErrorSchema>;

export const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const operatorBase = {
  /** Operator id used in logs; defaults to `<type>_<index>` */
  id: z.string().min(1).optional(),

  on_error: OnErrorSchema.default('send'),
};

/** Set a constant value */
export const AddOperatorSchema = z
  .object({
    type: z.literal('add'),
    field: FieldSchema,
    value: ValueSchema,
    ...operatorBase,
  })
  .strict();

/** Delete a field */
export const RemoveOperatorSchema = z
  .object({
    type: z.literal('remove'),
    field: FieldSchema,
    ...operatorBase,
  })
  .strict();

/** Move a value between fields */
export const MoveOperatorSchema = z
  .object({
    type: z.literal('move'),
    from: FieldSchema,
    to: FieldSchema,
    ...operatorBase,
  })
  .strict();

/** Copy a value between fields */
export const CopyOperatorSchema = z
  .object({
    type: z.literal('copy'),
    from: FieldSchema,
    to: FieldSchema,
    ...operatorBase,
  })
  .strict();

/** Keep only the listed fields of each root they name */
export const RetainOperatorSchema = z
  .object({
    type: z.literal('retain'),
    fields: z.array(FieldSchema).min(1),
    ...operatorBase,
  })
  .strict();

/** Lift the keys of a nested mapping into its parent */
export const FlattenOperatorSchema = z
  .object({
    type: z.literal('flatten'),
    field: FieldSchema.refine((field) => !field.isRoot(), {
      message: 'flatten field cannot be a root field',
    }),
    ...operatorBase,
  })
  .strict();

export const OperatorConfigSchema = z.discriminatedUnion('type', [
  AddOperatorSchema,
  RemoveOperatorSchema,
  MoveOperatorSchema,
  CopyOperatorSchema,
  RetainOperatorSchema,
  FlattenOperatorSchema,
]);

export type AddOperatorConfig = z.infer<typeof AddOperatorSchema>;
export type RemoveOperatorConfig = z.infer<typeof RemoveOperatorSchema>;
export type MoveOperatorConfig = z.infer<typeof MoveOperatorSchema>;
export type CopyOperatorConfig = z.infer<typeof CopyOperatorSchema>;
export type RetainOperatorConfig = z.infer<typeof RetainOperatorSchema>;
export type FlattenOperatorConfig = z.infer<typeof FlattenOperatorSchema>;
export type OperatorConfig = z.infer<typeof OperatorConfigSchema>;
export type OperatorType = OperatorConfig['type'];

export const PipelineConfigSchema = z
  .object({
    log_level: LogLevelSchema.optional(),
    operators: z.array(OperatorConfigSchema),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
