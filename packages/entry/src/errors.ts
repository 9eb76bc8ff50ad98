/**
 * Field error model
 *
 * Parse errors are raised while configuration is loaded and are fatal
 * to pipeline start-up. Write errors are returned from `Field.set` at
 * runtime; the calling operator decides whether to drop or pass the entry.
 */

/**
 * Parse error codes (strict union type).
 */
export const FIELD_PARSE_ERROR_CODES = [
  'E_FIELD_NOT_STRING',
  'E_FIELD_PREFIX',
  'E_FIELD_UNCLOSED_BRACKET',
  'E_FIELD_SYNTAX',
] as const;

export type FieldParseErrorCode = (typeof FIELD_PARSE_ERROR_CODES)[number];

/**
 * Write error codes (strict union type).
 */
export const FIELD_WRITE_ERROR_CODES = ['E_FIELD_PATH_BLOCKED', 'E_FIELD_ROOT_REPLACE'] as const;

export type FieldWriteErrorCode = (typeof FIELD_WRITE_ERROR_CODES)[number];

export type FieldErrorCode = FieldParseErrorCode | FieldWriteErrorCode;

export class FieldError extends Error {
  readonly code: FieldErrorCode;

  constructor(code: FieldErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

/**
 * Malformed path expression
 *
 * Messages are matched on by configuration loaders, keep them stable.
 */
export class FieldParseError extends FieldError {
  declare readonly code: FieldParseErrorCode;
  readonly input: unknown;

  constructor(code: FieldParseErrorCode, message: string, input: unknown) {
    super(code, message);
    this.input = input;
  }
}

/**
 * Failed write into an entry tree
 */
export class FieldWriteError extends FieldError {
  declare readonly code: FieldWriteErrorCode;
  readonly keys: readonly string[];

  constructor(code: FieldWriteErrorCode, message: string, keys: readonly string[]) {
    super(code, message);
    this.keys = keys;
  }
}

export function notStringError(input: unknown): FieldParseError {
  return new FieldParseError('E_FIELD_NOT_STRING', 'the field is not a string', input);
}

export function prefixError(input: string, prefixes: readonly string[]): FieldParseError {
  const expected =
    prefixes.length === 1
      ? `'${prefixes[0]}'`
      : `one of ${prefixes.map((p) => `'${p}'`).join(', ')}`;
  return new FieldParseError(
    'E_FIELD_PREFIX',
    `field '${input}' must start with ${expected}`,
    input
  );
}

export function unclosedBracketError(input: string): FieldParseError {
  return new FieldParseError('E_FIELD_UNCLOSED_BRACKET', 'found unclosed left bracket', input);
}

export function syntaxError(input: unknown, reason: string): FieldParseError {
  return new FieldParseError('E_FIELD_SYNTAX', reason, input);
}
