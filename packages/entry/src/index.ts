/**
 * logpipe entry
 *
 * Telemetry entries and the field language used to address them:
 * - Path expressions: `resource.host`, `attributes['http.method']`, `body.a['b.c']`
 * - Get / set / delete / merge against resource, attributes and body trees
 * - YAML, JSON and zod entry points sharing one grammar and one error set
 *
 * @example
 * ```typescript
 * import { Entry, parseField } from '@logpipe/entry';
 *
 * const entry = new Entry({ resource: { host: { name: 'web-1' } } });
 * const field = parseField("resource.host['name']", 'resource');
 *
 * field.get(entry); // { found: true, value: 'web-1' }
 * ```
 *
 * @packageDocumentation
 */

// Values
export {
  type Value,
  type ValueMap,
  type ValuePrimitive,
  isValueMap,
  cloneValue,
} from './value';

// Errors
export {
  FIELD_PARSE_ERROR_CODES,
  FIELD_WRITE_ERROR_CODES,
  type FieldErrorCode,
  type FieldParseErrorCode,
  type FieldWriteErrorCode,
  FieldError,
  FieldParseError,
  FieldWriteError,
} from './errors';

// Fields
export {
  ROOT_KINDS,
  type RootKind,
  isRootKind,
  Field,
  type ResourceField,
  type AttributeField,
  type BodyField,
  resourceField,
  attributeField,
  bodyField,
  rootField,
} from './field';
export type { FieldLookup, FieldResult } from './mutator';
export { splitPath, formatSegment, type SplitResult } from './parser';

// Construction from configuration
export {
  type FieldParseResult,
  parseField,
  tryParseField,
  fieldFromValue,
  tryFieldFromValue,
  unmarshalYamlField,
  unmarshalJsonField,
} from './unmarshal';
export { FieldSchema, ValueSchema, fieldSchema } from './schema';

// Entries
export { Entry, type EntryInit } from './entry';
