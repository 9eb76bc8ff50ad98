/**
 * Path expression tokenizer
 *
 * Splits `resource.a['b.c'].d` style expressions into key segments:
 *
 *   path            := segment ( "." identifier | bracket )*
 *   identifier      := any run of characters except '.', '[' and ']'
 *   bracket         := "[" quote raw-text quote "]"
 *
 * where quote is `'` or `"` and raw-text may hold '.', '[' and ']'.
 * The root keyword check happens one level up, in `parseField`.
 */

import { syntaxError, unclosedBracketError, type FieldParseError } from './errors';

/**
 * Split outcome. `bracketedHead` is set when the first key came from a
 * bracket, which no root keyword can.
 */
export type SplitResult =
  | { ok: true; keys: string[]; bracketedHead: boolean }
  | { ok: false; error: FieldParseError };

const UNBRACKETED_RIGHT_BRACKET = 'unbracketed field cannot contain a right bracket';

type State =
  | 'begin'
  | 'inBracket'
  | 'inQuote'
  | 'outQuote'
  | 'outBracket'
  | 'inUnbracketedToken';

export function splitPath(input: string): SplitResult {
  const keys: string[] = [];
  let state: State = 'begin';
  let quote = '';
  let tokenStart = 0;
  let bracketedHead = false;

  for (let i = 0; i < input.length; i++) {
    const c = input[i];
    switch (state) {
      case 'begin':
        if (c === '[') {
          bracketedHead = true;
          state = 'inBracket';
          break;
        }
        tokenStart = i;
        state = 'inUnbracketedToken';
        if (c === ']') {
          return { ok: false, error: syntaxError(input, UNBRACKETED_RIGHT_BRACKET) };
        }
        if (c === '.') {
          keys.push('');
          tokenStart = i + 1;
        }
        break;

      case 'inBracket':
        if (c !== "'" && c !== '"') {
          return {
            ok: false,
            error: syntaxError(input, 'strings in brackets must be surrounded by quotes'),
          };
        }
        quote = c;
        tokenStart = i + 1;
        state = 'inQuote';
        break;

      case 'inQuote':
        if (c === quote) {
          keys.push(input.slice(tokenStart, i));
          state = 'outQuote';
        }
        break;

      case 'outQuote':
        if (c !== ']') {
          return {
            ok: false,
            error: syntaxError(input, 'found characters between closed quote and closing bracket'),
          };
        }
        state = 'outBracket';
        break;

      case 'outBracket':
        if (c === '.') {
          tokenStart = i + 1;
          state = 'inUnbracketedToken';
        } else if (c === '[') {
          state = 'inBracket';
        } else {
          return {
            ok: false,
            error: syntaxError(
              input,
              'bracketed access must be followed by a dot or another bracketed access'
            ),
          };
        }
        break;

      case 'inUnbracketedToken':
        if (c === '.') {
          keys.push(input.slice(tokenStart, i));
          tokenStart = i + 1;
        } else if (c === '[') {
          keys.push(input.slice(tokenStart, i));
          state = 'inBracket';
        } else if (c === ']') {
          return { ok: false, error: syntaxError(input, UNBRACKETED_RIGHT_BRACKET) };
        }
        break;
    }
  }

  switch (state) {
    case 'inBracket':
    case 'inQuote':
    case 'outQuote':
      return { ok: false, error: unclosedBracketError(input) };
    case 'inUnbracketedToken':
      keys.push(input.slice(tokenStart));
      break;
  }

  return { ok: true, keys, bracketedHead };
}

/**
 * Render a key segment so that `splitPath` reads it back unchanged.
 *
 * Keys containing both quote characters have no textual form; they
 * are rendered single-quoted and will not re-parse.
 */
export function formatSegment(key: string): string {
  if (key !== '' && !/[.[\]'"]/.test(key)) {
    return `.${key}`;
  }
  return key.includes("'") ? `["${key}"]` : `['${key}']`;
}
