/**
 * SCIM Filter and Path Parser Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ScimParser,
  parseFilter,
  parsePath,
  parseTopLevelAttribute,
  validateFilter,
} from '../utils/scim-parser';
import { filterEquals, renderFilter } from '../utils/scim-filter';
import { renderPath } from '../utils/scim-path';
import { BadRequestException } from '../utils/scim-errors';
import { SCIM_SCHEMAS } from '../types/scim';

function thrown(fn: () => unknown): BadRequestException {
  try {
    fn();
  } catch (error) {
    if (error instanceof BadRequestException) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a BadRequestException');
}

const attr = (...names: string[]) => ({ elements: names.map((attribute) => ({ attribute })) });

describe('SCIM Filter Parser', () => {
  describe('parseFilter', () => {
    it('should parse a simple eq comparison', () => {
      expect(parseFilter('userName eq "bjensen"')).toEqual({
        type: 'eq',
        attributePath: attr('userName'),
        value: 'bjensen',
      });
    });

    it('should parse pr', () => {
      expect(parseFilter('title pr')).toEqual({ type: 'pr', attributePath: attr('title') });
    });

    it('should parse sub-attributes', () => {
      expect(parseFilter('name.familyName co "O\'Malley"')).toEqual({
        type: 'co',
        attributePath: attr('name', 'familyName'),
        value: "O'Malley",
      });
    });

    it.each([
      ['loginCount gt 42', 42],
      ['ratio le -0.5', -0.5],
      ['active eq false', false],
      ['manager eq null', null],
      ['meta.lastModified gt "2011-05-13T04:42:34Z"', '2011-05-13T04:42:34Z'],
    ])('should parse the comparison value of %s', (text, value) => {
      expect(parseFilter(text)).toMatchObject({ value });
    });

    it('should parse schema-qualified attributes', () => {
      expect(
        parseFilter(`${SCIM_SCHEMAS.ENTERPRISE_USER}:employeeNumber eq "701984"`)
      ).toEqual({
        type: 'eq',
        attributePath: { schemaUrn: SCIM_SCHEMAS.ENTERPRISE_USER, elements: [{ attribute: 'employeeNumber' }] },
        value: '701984',
      });
    });

    it('should give and precedence over or', () => {
      const filter = parseFilter('a eq 1 or b eq 2 and c eq 3');
      expect(renderFilter(filter)).toBe('(a eq 1 or (b eq 2 and c eq 3))');
    });

    it('should collect a chain of the same operator into one node', () => {
      const filter = parseFilter('a pr and b pr and c pr');
      expect(filter.type).toBe('and');
      expect(filter).toMatchObject({ filters: [{ type: 'pr' }, { type: 'pr' }, { type: 'pr' }] });
    });

    it('should keep a parenthesized group as its own node', () => {
      expect(renderFilter(parseFilter('(a pr and b pr) and c pr'))).toBe('((a pr and b pr) and c pr)');
    });

    it('should parse not', () => {
      expect(parseFilter('not (a pr)')).toEqual({
        type: 'not',
        filter: { type: 'pr', attributePath: attr('a') },
      });
    });

    it('should parse complex attribute filters', () => {
      const filter = parseFilter('emails[type eq "work" and value co "@example.com"]');
      expect(filter.type).toBe('complex');
      expect(renderFilter(filter)).toBe('emails[(type eq "work" and value co "@example.com")]');
    });

    it('should match keywords case-insensitively', () => {
      expect(renderFilter(parseFilter('userName EQ "a" AND title PR'))).toBe(
        '(userName eq "a" and title pr)'
      );
    });

    it('should accept extended attribute name characters when configured', () => {
      const parser = new ScimParser({ extendedAttributeNameCharacters: ['#'] });
      expect(parser.parseFilter('urn:example:#count gt 5')).toEqual({
        type: 'gt',
        attributePath: { schemaUrn: 'urn:example', elements: [{ attribute: '#count' }] },
        value: 5,
      });
    });
  });

  describe('errors', () => {
    it.each([
      ['', 'Unexpected end of filter string', 0],
      ['userName eq', 'Unexpected end of filter string', 11],
      ['userName eq "a" and', 'Unexpected end of filter string', 19],
      ['(userName pr', 'No closing parenthesis matching opening parenthesis at position 0', 0],
      ['userName pr)', 'No opening parenthesis matching closing parenthesis at position 11', 11],
      [
        'userName xx "a"',
        "Unrecognized attribute operator 'xx' at position 9. Expected: eq,ne,co,sw,ew,pr,gt,ge,lt,le",
        9,
      ],
      ['userName eq "a" "b"', `Unexpected token '"b"' at position 16`, 16],
      ['emails[type eq "work"', 'No closing bracket matching opening bracket at position 6', 6],
      ['userName eq title', 'Invalid comparison value at position 12', 12],
      ['not a pr', "Expected '(' at position 4", 4],
      ['and eq 1', 'Attribute name expected at position 0', 0],
      ['urn:example: pr', 'Attribute path expected at position 12', 12],
      ['name..given pr', "Invalid attribute path 'name..given' at position 5", 5],
      ['x eq 1e400', "Number '1e400' out of range at position 5", 5],
      ['n eq 9007199254740993', "Number '9007199254740993' out of range at position 5", 5],
    ])('should reject %j', (text, message, position) => {
      const error = thrown(() => parseFilter(text));
      expect(error.message).toBe(message);
      expect(error.position).toBe(position);
      expect(error.scimType).toBe('invalidFilter');
      expect(error.status).toBe(400);
    });
  });

  describe('validateFilter', () => {
    it('should report valid filters', () => {
      expect(validateFilter('title pr')).toEqual({ valid: true });
    });

    it('should report the parse error for invalid filters', () => {
      expect(validateFilter('userName eq')).toEqual({
        valid: false,
        error: 'Unexpected end of filter string',
      });
    });
  });

  describe('round trip', () => {
    it.each([
      'userName eq "bjensen"',
      'name.familyName co "O\'Malley"',
      'userName sw "J" and not (title pr or userType eq "Intern")',
      'emails[type eq "work" and value co "@example.com"] or ims[type eq "xmpp"]',
      'meta.lastModified ge "2011-05-13T04:42:34Z" and meta.version ne 2.5e1',
      `${SCIM_SCHEMAS.ENTERPRISE_USER}:manager.value eq "26118915-6090-4610-87e4-49d8ca9f808d"`,
      'displayName eq "quote \\" and backslash \\\\"',
      'a pr or b pr or (c pr and d pr and e pr)',
      'meta.version le 9007199254740991 and score gt -1.5e300',
    ])('should re-parse the rendering of %s to an equal filter', (text) => {
      const filter = parseFilter(text);
      expect(filterEquals(parseFilter(renderFilter(filter)), filter)).toBe(true);
    });
  });
});

describe('SCIM Path Parser', () => {
  it.each(['', '   '])('should parse %j as the resource root', (text) => {
    expect(parsePath(text)).toEqual({ elements: [] });
  });

  it('should parse dotted attribute paths', () => {
    expect(parsePath('name.givenName')).toEqual(attr('name', 'givenName'));
  });

  it('should parse a value selection filter', () => {
    const path = parsePath('emails[type eq "work"].value');
    expect(path).toEqual({
      elements: [
        { attribute: 'emails', valueFilter: { type: 'eq', attributePath: attr('type'), value: 'work' } },
        { attribute: 'value' },
      ],
    });
    expect(renderPath(path)).toBe('emails[type eq "work"].value');
  });

  it('should split off the schema URN', () => {
    expect(parsePath(`${SCIM_SCHEMAS.ENTERPRISE_USER}:manager.value`)).toEqual({
      schemaUrn: SCIM_SCHEMAS.ENTERPRISE_USER,
      elements: [{ attribute: 'manager' }, { attribute: 'value' }],
    });
  });

  it('should parse a bare URN with a trailing colon as the extension root', () => {
    const path = parsePath(`${SCIM_SCHEMAS.ENTERPRISE_USER}:`);
    expect(path).toEqual({ schemaUrn: SCIM_SCHEMAS.ENTERPRISE_USER, elements: [] });
    expect(renderPath(path)).toBe(`${SCIM_SCHEMAS.ENTERPRISE_USER}:`);
  });

  it('should ignore colons inside the value selection filter when splitting the URN', () => {
    const path = parsePath('urn:x:emails[value eq "a:b"]');
    expect(path.schemaUrn).toBe('urn:x');
    expect(path.elements[0].attribute).toBe('emails');
  });

  describe('errors', () => {
    it.each([
      ['emails[]', 'Value selection filter expected at position 7', 7],
      ['emails[type eq "work"', 'No closing bracket matching opening bracket at position 6', 6],
      ['name/given', "Unexpected character '/' at position 4", 4],
      ['.name', 'Attribute name expected at position 0', 0],
      [
        'emails[type xx "w"]',
        "Unrecognized attribute operator 'xx' at position 12. Expected: eq,ne,co,sw,ew,pr,gt,ge,lt,le",
        12,
      ],
    ])('should reject %j', (text, message, position) => {
      const error = thrown(() => parsePath(text));
      expect(error.message).toBe(message);
      expect(error.position).toBe(position);
      expect(error.scimType).toBe('invalidPath');
    });
  });

  describe('parseTopLevelAttribute', () => {
    it('should accept a single attribute name', () => {
      expect(parseTopLevelAttribute('userName')).toEqual(attr('userName'));
    });

    it.each(['name.givenName', 'emails[type eq "work"]', `${SCIM_SCHEMAS.USER}:userName`])(
      'should reject %s',
      (text) => {
        const error = thrown(() => parseTopLevelAttribute(text));
        expect(error.message).toBe(`'${text}' is not a top-level attribute name`);
        expect(error.scimType).toBe('invalidPath');
      }
    );
  });
});
