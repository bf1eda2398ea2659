/**
 * SCIM Filter and Path Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { Filters, filterEquals, renderFilter } from '../utils/scim-filter';
import { Paths, isRootPath, pathEquals, renderPath } from '../utils/scim-path';
import { parseFilter, parsePath } from '../utils/scim-parser';
import { BadRequestException } from '../utils/scim-errors';

describe('Filters', () => {
  it('should build comparisons equal to the parsed form', () => {
    expect(filterEquals(Filters.eq('userName', 'bjensen'), parseFilter('userName eq "bjensen"'))).toBe(true);
    expect(filterEquals(Filters.ge('meta.version', 2), parseFilter('meta.version ge 2'))).toBe(true);
    expect(filterEquals(Filters.ne('active', false), parseFilter('active ne false'))).toBe(true);
  });

  it('should render dates as dateTime strings', () => {
    const filter = Filters.gt('meta.lastModified', new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
    expect(renderFilter(filter)).toBe('meta.lastModified gt "2024-01-02T03:04:05.000Z"');
  });

  it('should combine filters given as strings or nodes', () => {
    const filter = Filters.and('title pr', Filters.eq('userType', 'Employee'), Filters.not('active eq false'));
    expect(renderFilter(filter)).toBe('(title pr and userType eq "Employee" and not (active eq false))');
  });

  it('should build complex value filters', () => {
    expect(renderFilter(Filters.hasComplexValue('emails', 'type eq "work"'))).toBe('emails[type eq "work"]');
    expect(renderFilter(Filters.or(Filters.pr('title'), Filters.sw('userName', 'b')))).toBe(
      '(title pr or userName sw "b")'
    );
  });

  it('should reject a root attribute path', () => {
    expect(() => Filters.eq('', 'x')).toThrow(new BadRequestException('A filter requires an attribute path'));
  });

  it('should reject value selection filters in the attribute path', () => {
    let error: unknown;
    try {
      Filters.pr('emails[type eq "work"]');
    } catch (caught) {
      error = caught;
    }
    expect(error).toMatchObject({
      scimType: 'invalidFilter',
      message: 'Use hasComplexValue() to filter on the values of a multi-valued attribute',
    });
  });

  it('should produce frozen nodes', () => {
    expect(Object.isFrozen(Filters.eq('userName', 'bjensen'))).toBe(true);
  });
});

describe('filterEquals', () => {
  it('should compare attribute names case-insensitively', () => {
    expect(filterEquals(parseFilter('USERNAME eq "a"'), parseFilter('userName eq "a"'))).toBe(true);
  });

  it('should compare values exactly', () => {
    expect(filterEquals(parseFilter('userName eq "A"'), parseFilter('userName eq "a"'))).toBe(false);
    expect(filterEquals(parseFilter('count eq 1'), parseFilter('count eq "1"'))).toBe(false);
  });

  it('should distinguish operators and structure', () => {
    expect(filterEquals(parseFilter('a pr and b pr'), parseFilter('a pr or b pr'))).toBe(false);
    expect(filterEquals(parseFilter('a pr and b pr'), parseFilter('b pr and a pr'))).toBe(false);
    expect(filterEquals(parseFilter('not (a pr)'), parseFilter('a pr'))).toBe(false);
  });
});

describe('Paths', () => {
  it('should append attributes with optional filters', () => {
    const emails = Paths.attribute(Paths.root(), 'emails', 'type eq "work"');
    expect(renderPath(Paths.attribute(emails, 'value'))).toBe('emails[type eq "work"].value');
  });

  it('should keep the schema URN of the parent', () => {
    const path = Paths.attribute(Paths.root('urn:example:ext'), 'level');
    expect(renderPath(path)).toBe('urn:example:ext:level');
  });

  it('should reject invalid attribute names', () => {
    expect(() => Paths.attribute(Paths.root(), 'bad name')).toThrow("Invalid attribute name 'bad name'");
    expect(() => Paths.attribute(Paths.root(), '')).toThrow("Invalid attribute name ''");
  });

  it('should drop the last element for the parent', () => {
    expect(pathEquals(Paths.parent(parsePath('name.givenName')), parsePath('name'))).toBe(true);
    expect(Paths.parent(Paths.root())).toEqual(Paths.root());
  });

  it('should render roots', () => {
    expect(renderPath(Paths.root())).toBe('');
    expect(renderPath(Paths.root('urn:example:ext'))).toBe('urn:example:ext:');
  });

  it('should recognize the resource root only', () => {
    expect(isRootPath(Paths.root())).toBe(true);
    expect(isRootPath(Paths.root('urn:example:ext'))).toBe(false);
    expect(isRootPath(Paths.fromString('userName'))).toBe(false);
  });

  it('should compare paths case-insensitively', () => {
    expect(pathEquals(parsePath('Name.GivenName'), parsePath('name.givenName'))).toBe(true);
    expect(pathEquals(parsePath('emails[type eq "work"]'), parsePath('emails[type eq "home"]'))).toBe(false);
    expect(pathEquals(parsePath('urn:example:ext:level'), parsePath('level'))).toBe(false);
  });
});
