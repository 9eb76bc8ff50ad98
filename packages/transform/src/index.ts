/**
 * logpipe Transform
 *
 * Configurable operators over telemetry entries.
 *
 * Features:
 * - YAML or JSON pipeline configuration, validated with zod
 * - Field paths parsed once at load time, shared by every entry
 * - Operators: add, remove, move, copy, retain, flatten
 * - Per-operator on_error policy (send or drop) with structured logging
 *
 * @example
 * ```typescript
 * import { Entry } from '@logpipe/entry';
 * import { buildPipeline, loadPipelineConfig } from '@logpipe/transform';
 *
 * const pipeline = buildPipeline(loadPipelineConfig('pipeline.yaml'));
 * const out = pipeline.process(new Entry({ body: { message: 'hello' } }));
 * ```
 *
 * @packageDocumentation
 */

// Types
export {
  type OnError,
  type LogLevel,
  type AddOperatorConfig,
  type RemoveOperatorConfig,
  type MoveOperatorConfig,
  type CopyOperatorConfig,
  type RetainOperatorConfig,
  type FlattenOperatorConfig,
  type OperatorConfig,
  type OperatorType,
  type PipelineConfig,
  // Schemas for advanced validation
  OnErrorSchema,
  LogLevelSchema,
  AddOperatorSchema,
  RemoveOperatorSchema,
  MoveOperatorSchema,
  CopyOperatorSchema,
  RetainOperatorSchema,
  FlattenOperatorSchema,
  OperatorConfigSchema,
  PipelineConfigSchema,
} from './types';

// Loader
export {
  PipelineLoadError,
  PipelineValidationError,
  parsePipelineConfig,
  validatePipelineConfig,
  loadPipelineConfig,
  type PipelineConfigFormat,
} from './loader';

// Operators
export { type Operator, type OperatorResult, OperatorError, createOperator } from './operators';

// Pipeline
export { Pipeline, buildPipeline, type PipelineOptions } from './pipeline';

// Logging
export { createLogger, type Logger, type LoggerOptions } from './logger';
