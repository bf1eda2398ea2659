/**
 * SCIM 2.0 Filter and Attribute Path Parser
 *
 * Implements RFC 7644 Section 3.4.2.2 (Filtering) and Section 3.10
 * (Attribute Notation).
 *
 * Supports:
 * - Comparison operators: eq, ne, co, sw, ew, pr, gt, ge, lt, le
 * - Logical operators: and, or, not (precedence not > and > or)
 * - Grouping with parentheses
 * - Complex value filters (e.g., emails[type eq "work" and value co "@example.com"])
 * - Schema URN qualified attributes
 *
 * The recursive-descent methods return ParseResult values; the public
 * methods convert a failure into a BadRequestException exactly once.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7644#section-3.4.2.2
 */

import type { ScimFilter, ScimFilterValue, ScimPath, ScimPathElement } from '../types/scim';
import {
  createComparison,
  createComplex,
  createLogical,
  createNot,
  createPath,
  createPathElement,
  createPresent,
  isUrn,
} from './scim-ast';
import { resolveParserOptions } from './scim-config';
import type { ParserOptions, ParserOptionsInput } from './scim-config';
import { BadRequestException } from './scim-errors';
import { fail, isAttributeNameChar, ok, tokenize } from './scim-tokenizer';
import type { ParseResult, Token, TokenizeResult } from './scim-tokenizer';

const OPERATOR_LIST = 'eq,ne,co,sw,ew,pr,gt,ge,lt,le';

/**
 * Parser over a token list for one filter expression
 */
class FilterTokenParser {
  private index = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly options: ParserOptions,
    /** Offset just past the input, reported when the input ends early */
    private readonly endPosition: number
  ) {}

  /**
   * Parse the whole token list as a single filter.
   */
  parse(): ParseResult<ScimFilter> {
    const result = this.parseOr();
    if (!result.success) {
      return result;
    }

    const trailing = this.peek();
    if (trailing) {
      if (trailing.kind === ')') {
        return fail(
          `No opening parenthesis matching closing parenthesis at position ${trailing.position}`,
          trailing.position
        );
      }
      return fail(
        `Unexpected token '${trailing.text}' at position ${trailing.position}`,
        trailing.position
      );
    }
    return result;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token) {
      this.index++;
    }
    return token;
  }

  private endOfInput<T>(): ParseResult<T> {
    return fail('Unexpected end of filter string', this.endPosition);
  }

  private parseOr(): ParseResult<ScimFilter> {
    return this.parseChain('or', () => this.parseAnd());
  }

  private parseAnd(): ParseResult<ScimFilter> {
    return this.parseChain('and', () => this.parsePrimary());
  }

  /**
   * `operand (op operand)*`, collected into one n-ary node.
   */
  private parseChain(
    operator: 'and' | 'or',
    operand: () => ParseResult<ScimFilter>
  ): ParseResult<ScimFilter> {
    const first = operand();
    if (!first.success) {
      return first;
    }

    const filters: ScimFilter[] = [first.data];
    for (let token = this.peek(); token?.kind === 'logical' && token.operator === operator; token = this.peek()) {
      this.next();
      const right = operand();
      if (!right.success) {
        return right;
      }
      filters.push(right.data);
    }

    return filters.length === 1 ? first : ok(createLogical(operator, filters));
  }

  private parsePrimary(): ParseResult<ScimFilter> {
    const token = this.next();
    if (!token) {
      return this.endOfInput();
    }

    switch (token.kind) {
      case 'logical': {
        if (token.operator !== 'not') {
          return fail(`Attribute name expected at position ${token.position}`, token.position);
        }
        const open = this.next();
        if (!open) {
          return this.endOfInput();
        }
        if (open.kind !== '(') {
          return fail(`Expected '(' at position ${open.position}`, open.position);
        }
        const inner = this.parseGroup(open);
        return inner.success ? ok(createNot(inner.data)) : inner;
      }

      case '(':
        return this.parseGroup(token);

      case 'attribute':
        return this.parseAttributeExpression(token);

      case ')':
        return fail(
          `No opening parenthesis matching closing parenthesis at position ${token.position}`,
          token.position
        );

      default:
        return fail(`Attribute name expected at position ${token.position}`, token.position);
    }
  }

  /**
   * Parse `or-expr ")"` after an already consumed opening parenthesis.
   */
  private parseGroup(open: Token): ParseResult<ScimFilter> {
    const inner = this.parseOr();
    if (!inner.success) {
      return inner;
    }
    const close = this.next();
    if (!close) {
      return fail(
        `No closing parenthesis matching opening parenthesis at position ${open.position}`,
        open.position
      );
    }
    if (close.kind !== ')') {
      return fail(`Expected ')' at position ${close.position}`, close.position);
    }
    return inner;
  }

  private parseAttributeExpression(attribute: Token): ParseResult<ScimFilter> {
    const path = parseAttributePath(attribute.text, attribute.position, this.options);
    if (!path.success) {
      return path;
    }

    const token = this.next();
    if (!token) {
      return this.endOfInput();
    }

    if (token.kind === '[') {
      const inner = this.parseOr();
      if (!inner.success) {
        return inner;
      }
      const close = this.next();
      if (!close) {
        return fail(
          `No closing bracket matching opening bracket at position ${token.position}`,
          token.position
        );
      }
      if (close.kind !== ']') {
        return fail(`Expected ']' at position ${close.position}`, close.position);
      }
      return ok(createComplex(path.data, inner.data));
    }

    if (token.kind !== 'operator') {
      return fail(
        `Unrecognized attribute operator '${token.text}' at position ${token.position}. Expected: ${OPERATOR_LIST}`,
        token.position
      );
    }

    if (token.operator === 'pr') {
      return ok(createPresent(path.data));
    }

    const value = this.parseComparisonValue();
    if (!value.success) {
      return value;
    }
    return ok(createComparison(token.operator, path.data, value.data));
  }

  private parseComparisonValue(): ParseResult<ScimFilterValue> {
    const token = this.next();
    if (!token) {
      return this.endOfInput();
    }

    switch (token.kind) {
      case 'string':
      case 'number':
      case 'literal':
        return ok(token.value);
      default:
        return fail(`Invalid comparison value at position ${token.position}`, token.position);
    }
  }
}

/**
 * Split a filter attribute word (`urn:...:User:name.givenName`) into a path.
 * Attribute paths inside filters never carry value filters.
 */
function parseAttributePath(
  text: string,
  position: number,
  options: ParserOptions
): ParseResult<ScimPath> {
  let schemaUrn: string | undefined;
  let offset = 0;

  if (isUrn(text)) {
    const colon = text.lastIndexOf(':');
    schemaUrn = text.substring(0, colon);
    offset = colon + 1;
    if (offset === text.length) {
      return fail(`Attribute path expected at position ${position + offset}`, position + offset);
    }
  }

  const elements: ScimPathElement[] = [];
  for (const name of text.substring(offset).split('.')) {
    const invalid = [...name].findIndex((ch) => !isAttributeNameChar(ch, options));
    if (name.length === 0 || invalid !== -1) {
      const at = position + offset + (invalid === -1 ? 0 : invalid);
      return fail(`Invalid attribute path '${text}' at position ${at}`, at);
    }
    elements.push(createPathElement(name));
    offset += name.length + 1;
  }

  return ok(createPath(elements, schemaUrn));
}

/**
 * Index of the `]` closing the `[` at `open`, skipping quoted strings.
 * Returns -1 if unbalanced.
 */
function findClosingBracket(text: string, open: number, end: number): number {
  let depth = 0;
  let inString = false;

  for (let i = open; i < end; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * SCIM filter and path parser bound to a set of options.
 *
 * @example
 * const parser = new ScimParser({ extendedAttributeNameCharacters: ['#'] });
 * parser.parseFilter('urn:example:#count gt 5');
 */
export class ScimParser {
  readonly options: ParserOptions;

  constructor(options: ParserOptionsInput | ParserOptions = {}) {
    this.options = resolveParserOptions(options);
  }

  tokenize(text: string): TokenizeResult {
    return tokenize(text, this.options);
  }

  /**
   * Parse a filter expression.
   * @throws BadRequestException (invalidFilter) on malformed input
   */
  parseFilter(text: string): ScimFilter {
    const result = this.parseFilterRange(text, 0, text.length);
    if (!result.success) {
      throw BadRequestException.invalidFilter(result.error.message, result.error.position);
    }
    return result.data;
  }

  /**
   * Parse an attribute path. The empty (or blank) string is the resource root.
   * @throws BadRequestException (invalidPath) on malformed input
   */
  parsePath(text: string): ScimPath {
    const result = this.parsePathResult(text);
    if (!result.success) {
      throw BadRequestException.invalidPath(result.error.message, result.error.position);
    }
    return result.data;
  }

  /**
   * Parse a single, unqualified, unfiltered attribute name.
   * @throws BadRequestException (invalidPath) for anything else
   */
  parseTopLevelAttribute(text: string): ScimPath {
    const path = this.parsePath(text);
    const [element] = path.elements;
    if (
      path.schemaUrn !== undefined ||
      path.elements.length !== 1 ||
      element.valueFilter !== undefined
    ) {
      throw BadRequestException.invalidPath(`'${text}' is not a top-level attribute name`);
    }
    return path;
  }

  private parseFilterRange(text: string, start: number, end: number): ParseResult<ScimFilter> {
    const tokens = tokenize(text, this.options, start, end);
    if (!tokens.success) {
      return tokens;
    }
    return new FilterTokenParser(tokens.data, this.options, end).parse();
  }

  private parsePathResult(text: string): ParseResult<ScimPath> {
    let pos = 0;
    let end = text.length;
    while (pos < end && /\s/.test(text[pos])) {
      pos++;
    }
    while (end > pos && /\s/.test(text[end - 1])) {
      end--;
    }
    if (pos === end) {
      return ok(createPath([]));
    }

    let schemaUrn: string | undefined;
    if (isUrn(text.substring(pos, end))) {
      const bracket = text.indexOf('[', pos);
      const colon = text.lastIndexOf(':', (bracket === -1 || bracket >= end ? end : bracket) - 1);
      schemaUrn = text.substring(pos, colon);
      pos = colon + 1;
      if (pos === end) {
        return ok(createPath([], schemaUrn));
      }
    }

    const elements: ScimPathElement[] = [];
    for (;;) {
      const nameStart = pos;
      while (pos < end && isAttributeNameChar(text[pos], this.options)) {
        pos++;
      }
      if (pos === nameStart) {
        return fail(`Attribute name expected at position ${pos}`, pos);
      }
      const attribute = text.substring(nameStart, pos);

      let valueFilter: ScimFilter | undefined;
      if (text[pos] === '[') {
        const close = findClosingBracket(text, pos, end);
        if (close === -1) {
          return fail(`No closing bracket matching opening bracket at position ${pos}`, pos);
        }
        if (text.substring(pos + 1, close).trim().length === 0) {
          return fail(`Value selection filter expected at position ${pos + 1}`, pos + 1);
        }
        const filter = this.parseFilterRange(text, pos + 1, close);
        if (!filter.success) {
          return filter;
        }
        valueFilter = filter.data;
        pos = close + 1;
      }
      elements.push(createPathElement(attribute, valueFilter));

      if (pos === end) {
        break;
      }
      if (text[pos] !== '.') {
        return fail(`Unexpected character '${text[pos]}' at position ${pos}`, pos);
      }
      pos++;
    }

    return ok(createPath(elements, schemaUrn));
  }
}

const defaultParser = new ScimParser();

function parserFor(options?: ParserOptionsInput | ParserOptions): ScimParser {
  return options ? new ScimParser(options) : defaultParser;
}

/**
 * Parse a SCIM filter string into an AST
 */
export function parseFilter(text: string, options?: ParserOptionsInput | ParserOptions): ScimFilter {
  return parserFor(options).parseFilter(text);
}

/**
 * Parse a SCIM attribute path
 */
export function parsePath(text: string, options?: ParserOptionsInput | ParserOptions): ScimPath {
  return parserFor(options).parsePath(text);
}

export function parseTopLevelAttribute(
  text: string,
  options?: ParserOptionsInput | ParserOptions
): ScimPath {
  return parserFor(options).parseTopLevelAttribute(text);
}

/**
 * Check filter syntax without throwing
 */
export function validateFilter(
  text: string,
  options?: ParserOptionsInput | ParserOptions
): { valid: boolean; error?: string } {
  try {
    parserFor(options).parseFilter(text);
    return { valid: true };
  } catch (error) {
    return {
      valid: false,
      error: error instanceof Error ? error.message : 'Invalid filter',
    };
  }
}
