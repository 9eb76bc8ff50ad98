/**
 * logpipe Pipeline Config Loader
 *
 * Loads and validates pipeline configuration from YAML or JSON.
 * Validation failures name the operator they belong to by position and,
 * when configured, by id.
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import type { ZodError, ZodIssue } from 'zod';
import { PipelineConfigSchema, type PipelineConfig } from './types';

export type PipelineConfigFormat = 'yaml' | 'json';

/**
 * Pipeline config load error
 */
export class PipelineLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error | ZodError
  ) {
    super(message);
    this.name = 'PipelineLoadError';
  }
}

/**
 * Pipeline config validation error with details
 */
export class PipelineValidationError extends PipelineLoadError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
    /** Positions of the operators with at least one issue, ascending */
    public readonly operatorIndexes: number[]
  ) {
    super(message);
    this.name = 'PipelineValidationError';
  }
}

const FORMAT_BY_EXTENSION: Record<string, PipelineConfigFormat> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function decode(content: string, format: PipelineConfigFormat | undefined): unknown {
  switch (format) {
    case 'json':
      return JSON.parse(content);
    case 'yaml':
      return yaml.parse(content);
    case undefined:
      // JSON first, YAML as fallback
      try {
        return JSON.parse(content);
      } catch {
        return yaml.parse(content);
      }
  }
}

/**
 * `operators[1] 'lift-message'`, `operators[2] (copy)` or `operators[3]`,
 * read from the raw document.
 */
function operatorLabel(config: unknown, index: number): string {
  const label = `operators[${index}]`;
  if (typeof config !== 'object' || config === null || !('operators' in config)) {
    return label;
  }
  const operators = config.operators;
  if (!Array.isArray(operators)) {
    return label;
  }
  const operator: unknown = operators[index];
  if (typeof operator !== 'object' || operator === null) {
    return label;
  }
  if ('id' in operator && typeof operator.id === 'string') {
    return `${label} '${operator.id}'`;
  }
  if ('type' in operator && typeof operator.type === 'string') {
    return `${label} (${operator.type})`;
  }
  return label;
}

function issueOperator(issue: ZodIssue): number | undefined {
  const [head, index] = issue.path;
  return head === 'operators' && typeof index === 'number' ? index : undefined;
}

function describeIssue(config: unknown, issue: ZodIssue): string {
  const index = issueOperator(issue);
  if (index === undefined) {
    return `${issue.path.join('.') || '(root)'}: ${issue.message}`;
  }
  const rest = issue.path.slice(2).join('.');
  const where = operatorLabel(config, index);
  return rest ? `${where} ${rest}: ${issue.message}` : `${where}: ${issue.message}`;
}

/**
 * Parse pipeline configuration from string content
 *
 * @param content - YAML or JSON string
 * @param format - Optional format hint, auto-detected if not provided
 * @throws PipelineLoadError on parse failure
 * @throws PipelineValidationError on schema validation failure, including malformed field paths
 */
export function parsePipelineConfig(
  content: string,
  format?: PipelineConfigFormat
): PipelineConfig {
  let decoded: unknown;
  try {
    decoded = decode(content, format);
  } catch (err) {
    throw new PipelineLoadError(
      `Failed to parse pipeline config: ${describeCause(err)}`,
      err instanceof Error ? err : undefined
    );
  }
  return validatePipelineConfig(decoded);
}

/**
 * Validate a decoded pipeline configuration object
 *
 * @throws PipelineValidationError on schema validation failure
 */
export function validatePipelineConfig(config: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }

  const { issues } = result.error;
  const operatorIndexes = [
    ...new Set(issues.map(issueOperator).filter((index): index is number => index !== undefined)),
  ].sort((a, b) => a - b);
  const details = issues.map((issue) => describeIssue(config, issue)).join('; ');

  throw new PipelineValidationError(
    `Pipeline config validation failed: ${details}`,
    issues,
    operatorIndexes
  );
}

/**
 * Load pipeline configuration from file
 *
 * The extension (.yaml, .yml or .json) picks the format; anything else is
 * auto-detected.
 *
 * @throws PipelineLoadError on file read or parse failure
 * @throws PipelineValidationError on schema validation failure
 */
export function loadPipelineConfig(filePath: string): PipelineConfig {
  const ext = path.extname(filePath).toLowerCase();
  const format = Object.hasOwn(FORMAT_BY_EXTENSION, ext) ? FORMAT_BY_EXTENSION[ext] : undefined;

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new PipelineLoadError(
      `Failed to read pipeline config ${filePath}: ${describeCause(err)}`,
      err instanceof Error ? err : undefined
    );
  }

  return parsePipelineConfig(content, format);
}
