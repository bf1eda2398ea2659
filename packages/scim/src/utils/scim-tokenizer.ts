/**
 * SCIM Filter Tokenizer
 *
 * Splits filter text into positioned tokens. Failures are returned as values
 * (`{ success: false, error }`) so the parser can propagate them without
 * unwinding through exceptions.
 */

import type { ScimFilterOperator } from '../types/scim';
import { COMPARISON_OPERATORS } from './scim-ast';
import type { ParserOptions } from './scim-config';

/**
 * Position-anchored lexing or parsing failure
 */
export interface ParseError {
  message: string;
  /** 0-based character offset into the parsed text */
  position: number;
}

export type ParseResult<T> = { success: true; data: T } | { success: false; error: ParseError };

export type PunctuationKind = '(' | ')' | '[' | ']' | ',';

interface TokenBase {
  /** Source text of the token */
  text: string;
  position: number;
}

export type Token =
  | (TokenBase & { kind: 'attribute' })
  | (TokenBase & { kind: 'string'; value: string })
  /**
   * Numbers are doubles. Literals that overflow, and integer literals beyond
   * Number.MAX_SAFE_INTEGER, are rejected.
   */
  | (TokenBase & { kind: 'number'; value: number })
  | (TokenBase & { kind: 'literal'; value: boolean | null })
  | (TokenBase & { kind: 'operator'; operator: ScimFilterOperator })
  | (TokenBase & { kind: 'logical'; operator: 'and' | 'or' | 'not' })
  | (TokenBase & { kind: PunctuationKind });

export type TokenizeResult = ParseResult<Token[]>;

export function ok<T>(data: T): ParseResult<T> {
  return { success: true, data };
}

export function fail<T>(message: string, position: number): ParseResult<T> {
  return { success: false, error: { message, position } };
}

const OPERATORS = new Set<string>([...COMPARISON_OPERATORS, 'pr']);
const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const INTEGER = /^-?\d+$/;
const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

function isPunctuation(ch: string): ch is PunctuationKind {
  return ch === '(' || ch === ')' || ch === '[' || ch === ']' || ch === ',';
}

function isOperator(word: string): word is ScimFilterOperator {
  return OPERATORS.has(word);
}

/**
 * Character class for words inside a filter: letters, digits, `- _ . $ :`
 * plus any configured extended characters.
 */
export function isFilterWordChar(ch: string, options: ParserOptions): boolean {
  return isAttributeNameChar(ch, options) || ch === '.' || ch === ':';
}

/**
 * Character class for a single attribute name: letters, digits, `- _ $`
 * plus any configured extended characters.
 */
export function isAttributeNameChar(ch: string, options: ParserOptions): boolean {
  return (
    LETTER_OR_DIGIT.test(ch) ||
    ch === '-' ||
    ch === '_' ||
    ch === '$' ||
    options.extendedAttributeNameCharacters.includes(ch)
  );
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

function unexpected<T>(ch: string, position: number): ParseResult<T> {
  return fail(`Unexpected character '${ch}' at position ${position}`, position);
}

/**
 * Read a quoted string starting at `start` (the opening quote).
 */
function readString(
  text: string,
  start: number,
  end: number
): ParseResult<{ value: string; next: number }> {
  let value = '';
  let i = start + 1;

  while (i < end) {
    const ch = text[i];
    if (ch === '"') {
      return ok({ value, next: i + 1 });
    }
    if (ch !== '\\') {
      value += ch;
      i++;
      continue;
    }

    const escape = text[i + 1];
    if (i + 1 >= end) {
      break;
    }
    if (escape === 'u') {
      const hex = text.substring(i + 2, Math.min(i + 6, end));
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        return fail(`Invalid unicode escape sequence at position ${i}`, i);
      }
      value += String.fromCharCode(parseInt(hex, 16));
      i += 6;
      continue;
    }
    const decoded = SIMPLE_ESCAPES[escape];
    if (decoded === undefined) {
      return fail(`Invalid escape sequence '\\${escape}' at position ${i}`, i);
    }
    value += decoded;
    i += 2;
  }

  return fail(`Unterminated string starting at position ${start}`, start);
}

/**
 * Tokenize `text[start, end)`. Token positions are offsets into the whole
 * `text`, so a filter embedded in a path reports positions in the path.
 */
export function tokenize(
  text: string,
  options: ParserOptions,
  start = 0,
  end = text.length
): TokenizeResult {
  const tokens: Token[] = [];
  let pos = start;

  while (pos < end) {
    const ch = text[pos];

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    if (isPunctuation(ch)) {
      tokens.push({ kind: ch, text: ch, position: pos });
      pos++;
      continue;
    }

    if (ch === '"') {
      // Quoted strings must be separated from words by whitespace
      if (pos > start && isFilterWordChar(text[pos - 1], options)) {
        return unexpected(ch, pos);
      }
      const result = readString(text, pos, end);
      if (!result.success) {
        return result;
      }
      const { value, next } = result.data;
      if (next < end && (isFilterWordChar(text[next], options) || text[next] === '"')) {
        return unexpected(text[next], next);
      }
      tokens.push({ kind: 'string', text: text.substring(pos, next), position: pos, value });
      pos = next;
      continue;
    }

    if (!isFilterWordChar(ch, options)) {
      return unexpected(ch, pos);
    }

    NUMBER.lastIndex = pos;
    const number = NUMBER.exec(text);
    if (number && pos + number[0].length <= end) {
      const next = pos + number[0].length;
      if (next >= end || !isFilterWordChar(text[next], options)) {
        const value = Number(number[0]);
        if (!Number.isFinite(value) || (INTEGER.test(number[0]) && !Number.isSafeInteger(value))) {
          return fail(`Number '${number[0]}' out of range at position ${pos}`, pos);
        }
        tokens.push({ kind: 'number', text: number[0], position: pos, value });
        pos = next;
        continue;
      }
    }

    let next = pos;
    while (next < end && isFilterWordChar(text[next], options)) {
      next++;
    }
    const word = text.substring(pos, next);
    const keyword = word.toLowerCase();

    if (isOperator(keyword)) {
      tokens.push({ kind: 'operator', text: word, position: pos, operator: keyword });
    } else if (keyword === 'and' || keyword === 'or' || keyword === 'not') {
      tokens.push({ kind: 'logical', text: word, position: pos, operator: keyword });
    } else if (keyword === 'true' || keyword === 'false') {
      tokens.push({ kind: 'literal', text: word, position: pos, value: keyword === 'true' });
    } else if (keyword === 'null') {
      tokens.push({ kind: 'literal', text: word, position: pos, value: null });
    } else {
      tokens.push({ kind: 'attribute', text: word, position: pos });
    }
    pos = next;
  }

  return ok(tokens);
}
