/**
 * Field construction from configuration text
 *
 * YAML scalars and JSON strings go through the same grammar and fail
 * with the same messages:
 * - "the field is not a string"
 * - "must start with '<root>'"
 * - "found unclosed left bracket"
 *
 * @packageDocumentation
 */

import * as yaml from 'yaml';
import { FieldParseError, notStringError, prefixError, syntaxError } from './errors';
import { Field, ROOT_KINDS, isRootKind, type RootKind } from './field';
import { splitPath } from './parser';

export type FieldParseResult<K extends RootKind = RootKind> =
  | { ok: true; field: Field<K> }
  | { ok: false; error: FieldParseError };

/**
 * Parse a path expression without throwing
 *
 * @param text - Path expression such as `resource.host['k8s.pod.name']`
 * @param kind - Required root keyword; when omitted any root kind is accepted
 */
export function tryParseField<K extends RootKind>(text: string, kind: K): FieldParseResult<K>;
export function tryParseField(text: string): FieldParseResult;
export function tryParseField(text: string, kind?: RootKind): FieldParseResult {
  const split = splitPath(text);
  if (!split.ok) {
    return split;
  }

  const [first, ...rest] = split.keys;
  if (kind !== undefined) {
    if (split.bracketedHead || first !== kind) {
      return { ok: false, error: prefixError(text, [kind]) };
    }
    return { ok: true, field: new Field(kind, rest) };
  }
  if (split.bracketedHead || first === undefined || !isRootKind(first)) {
    return { ok: false, error: prefixError(text, ROOT_KINDS) };
  }
  return { ok: true, field: new Field(first, rest) };
}

/**
 * Parse a path expression
 *
 * @throws FieldParseError on malformed input
 */
export function parseField<K extends RootKind>(text: string, kind: K): Field<K>;
export function parseField(text: string): Field;
export function parseField(text: string, kind?: RootKind): Field {
  const result = kind === undefined ? tryParseField(text) : tryParseField(text, kind);
  if (!result.ok) {
    throw result.error;
  }
  return result.field;
}

/**
 * Build a field from an already-decoded configuration value
 */
export function tryFieldFromValue(input: unknown, kind?: RootKind): FieldParseResult {
  if (typeof input !== 'string') {
    return { ok: false, error: notStringError(input) };
  }
  return kind === undefined ? tryParseField(input) : tryParseField(input, kind);
}

export function fieldFromValue<K extends RootKind>(input: unknown, kind: K): Field<K>;
export function fieldFromValue(input: unknown): Field;
export function fieldFromValue(input: unknown, kind?: RootKind): Field {
  const result = tryFieldFromValue(input, kind);
  if (!result.ok) {
    throw result.error;
  }
  return result.field;
}

/**
 * Decode a YAML document holding a single path scalar
 *
 * @throws FieldParseError
 */
export function unmarshalYamlField<K extends RootKind>(source: string, kind: K): Field<K>;
export function unmarshalYamlField(source: string): Field;
export function unmarshalYamlField(source: string, kind?: RootKind): Field {
  let decoded: unknown;
  try {
    decoded = yaml.parse(source);
  } catch (err) {
    throw syntaxError(source, `invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return kind === undefined ? fieldFromValue(decoded) : fieldFromValue(decoded, kind);
}

/**
 * Decode a JSON document holding a single path string
 *
 * @throws FieldParseError
 */
export function unmarshalJsonField<K extends RootKind>(source: string, kind: K): Field<K>;
export function unmarshalJsonField(source: string): Field;
export function unmarshalJsonField(source: string, kind?: RootKind): Field {
  let decoded: unknown;
  try {
    decoded = JSON.parse(source);
  } catch (err) {
    throw syntaxError(source, `invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return kind === undefined ? fieldFromValue(decoded) : fieldFromValue(decoded, kind);
}
