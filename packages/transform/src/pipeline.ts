/**
 * logpipe Pipeline
 *
 * Runs operators over entries in order. An entry belongs to one pipeline
 * call at a time; operators and their fields are shared and never change
 * after construction.
 *
 * @packageDocumentation
 */

import type { Entry } from '@logpipe/entry';
import { createLogger, type Logger } from './logger';
import { createOperator, type Operator } from './operators';
import type { PipelineConfig } from './types';

export interface PipelineOptions {
  /** Logger for operator failures; built from the config's log_level when omitted */
  logger?: Logger;
}

export class Pipeline {
  readonly operators: readonly Operator[];
  private readonly logger: Logger;

  constructor(operators: readonly Operator[], logger: Logger) {
    this.operators = operators;
    this.logger = logger;
  }

  /**
   * Apply every operator to the entry
   *
   * @returns The entry, or undefined when an operator with `on_error: drop` failed
   */
  process(entry: Entry): Entry | undefined {
    for (const operator of this.operators) {
      const result = operator.apply(entry);
      if (result.ok) {
        continue;
      }
      if (operator.onError === 'drop') {
        this.logger.warn(
          { operator: operator.id, type: operator.type, err: result.error },
          'operator failed, dropping entry'
        );
        return undefined;
      }
      this.logger.warn(
        { operator: operator.id, type: operator.type, err: result.error },
        'operator failed, sending entry'
      );
    }
    return entry;
  }

  /**
   * Process a batch, returning the entries that were not dropped
   */
  processAll(entries: readonly Entry[]): Entry[] {
    const out: Entry[] = [];
    for (const entry of entries) {
      const processed = this.process(entry);
      if (processed !== undefined) {
        out.push(processed);
      }
    }
    return out;
  }
}

export function buildPipeline(config: PipelineConfig, options: PipelineOptions = {}): Pipeline {
  const logger = options.logger ?? createLogger({ level: config.log_level });
  const operators = config.operators.map((operator, index) => createOperator(operator, index));
  logger.debug({ operators: operators.map((operator) => operator.id) }, 'pipeline built');
  return new Pipeline(operators, logger);
}
