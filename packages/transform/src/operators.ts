/**
 * logpipe Operators
 *
 * Each operator mutates an entry in place through the Field API and
 * reports failure as a value; the pipeline applies the on_error policy.
 *
 * @packageDocumentation
 */

import {
  cloneValue,
  isValueMap,
  rootField,
  type Entry,
  type Field,
  type RootKind,
  type Value,
} from '@logpipe/entry';
import type { OnError, OperatorConfig, OperatorType } from './types';

export type OperatorResult = { ok: true } | { ok: false; error: Error };

export interface Operator {
  readonly id: string;
  readonly type: OperatorType;
  readonly onError: OnError;
  apply(entry: Entry): OperatorResult;
}

/**
 * Operator failure with the id of the operator that raised it
 */
export class OperatorError extends Error {
  constructor(
    message: string,
    public readonly operatorId: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'OperatorError';
  }
}

const OK: OperatorResult = Object.freeze({ ok: true });

function fail(id: string, message: string, cause?: Error): OperatorResult {
  return { ok: false, error: new OperatorError(message, id, cause) };
}

function addOperator(id: string, onError: OnError, field: Field, value: Value): Operator {
  return {
    id,
    type: 'add',
    onError,
    apply(entry) {
      const result = field.set(entry, cloneValue(value));
      return result.ok ? OK : fail(id, `add ${field}: ${result.error.message}`, result.error);
    },
  };
}

function removeOperator(id: string, onError: OnError, field: Field): Operator {
  return {
    id,
    type: 'remove',
    onError,
    apply(entry) {
      field.delete(entry);
      return OK;
    },
  };
}

function moveOperator(id: string, onError: OnError, from: Field, to: Field): Operator {
  return {
    id,
    type: 'move',
    onError,
    apply(entry) {
      const removed = from.delete(entry);
      if (!removed.found) {
        return fail(id, `move: field does not exist: ${from}`);
      }
      const result = to.set(entry, removed.value);
      if (!result.ok) {
        // restore the source
        from.set(entry, removed.value);
        return fail(id, `move ${from} to ${to}: ${result.error.message}`, result.error);
      }
      return OK;
    },
  };
}

function copyOperator(id: string, onError: OnError, from: Field, to: Field): Operator {
  return {
    id,
    type: 'copy',
    onError,
    apply(entry) {
      const lookup = from.get(entry);
      if (!lookup.found) {
        return fail(id, `copy: field does not exist: ${from}`);
      }
      const result = to.set(entry, cloneValue(lookup.value));
      return result.ok
        ? OK
        : fail(id, `copy ${from} to ${to}: ${result.error.message}`, result.error);
    },
  };
}

function retainOperator(id: string, onError: OnError, fields: readonly Field[]): Operator {
  const byKind = new Map<RootKind, Field[]>();
  for (const field of fields) {
    const group = byKind.get(field.kind) ?? [];
    group.push(field);
    byKind.set(field.kind, group);
  }
  // A retained root keeps the whole sub-tree
  const groups = [...byKind].filter(([, group]) => !group.some((field) => field.isRoot()));

  return {
    id,
    type: 'retain',
    onError,
    apply(entry) {
      for (const [kind, group] of groups) {
        const kept: Array<[Field, Value]> = [];
        for (const field of group) {
          const lookup = field.get(entry);
          if (lookup.found) {
            kept.push([field, lookup.value]);
          }
        }
        rootField(kind).delete(entry);
        for (const [field, value] of kept) {
          const result = field.set(entry, value);
          if (!result.ok) {
            return fail(id, `retain ${field}: ${result.error.message}`, result.error);
          }
        }
      }
      return OK;
    },
  };
}

function flattenOperator(id: string, onError: OnError, field: Field): Operator {
  const parent = field.parent();
  return {
    id,
    type: 'flatten',
    onError,
    apply(entry) {
      const lookup = field.get(entry);
      if (!lookup.found) {
        return fail(id, `flatten: field does not exist: ${field}`);
      }
      const nested = lookup.value;
      if (!isValueMap(nested)) {
        return fail(id, `flatten: field is not a mapping: ${field}`);
      }
      field.delete(entry);
      for (const [key, value] of Object.entries(nested)) {
        const result = parent.child(key).set(entry, value);
        if (!result.ok) {
          return fail(id, `flatten ${field}: ${result.error.message}`, result.error);
        }
      }
      return OK;
    },
  };
}

/**
 * Build an operator from its validated configuration
 *
 * @param config - Operator configuration
 * @param index - Position in the pipeline, used for the default id
 */
export function createOperator(config: OperatorConfig, index: number): Operator {
  const id = config.id ?? `${config.type}_${index}`;
  switch (config.type) {
    case 'add':
      return addOperator(id, config.on_error, config.field, config.value);
    case 'remove':
      return removeOperator(id, config.on_error, config.field);
    case 'move':
      return moveOperator(id, config.on_error, config.from, config.to);
    case 'copy':
      return copyOperator(id, config.on_error, config.from, config.to);
    case 'retain':
      return retainOperator(id, config.on_error, config.fields);
    case 'flatten':
      return flattenOperator(id, config.on_error, config.field);
  }
}
