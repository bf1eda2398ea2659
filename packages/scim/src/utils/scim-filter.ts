/**
 * SCIM Filter builders
 *
 * Programmatic construction of filter ASTs. Attribute paths and child
 * filters may be given as strings, which are parsed with the default parser.
 *
 * @example
 * const filter = Filters.and(
 *   Filters.eq('userType', 'Employee'),
 *   Filters.hasComplexValue('emails', 'type eq "work" and value co "@example.com"')
 * );
 */

import type { ScimComparisonOperator, ScimFilter, ScimFilterValue, ScimPath } from '../types/scim';
import {
  createComparison,
  createComplex,
  createLogical,
  createNot,
  createPresent,
  filterEquals,
  renderFilter,
} from './scim-ast';
import { formatDateTime } from './scim-datetime';
import { BadRequestException } from './scim-errors';
import { parseFilter, parsePath } from './scim-parser';

export type AttributePathInput = ScimPath | string;
export type FilterInput = ScimFilter | string;
export type ComparisonValueInput = ScimFilterValue | Date;

function toAttributePath(input: AttributePathInput): ScimPath {
  const path = typeof input === 'string' ? parsePath(input) : input;
  if (path.elements.length === 0) {
    throw BadRequestException.invalidFilter('A filter requires an attribute path');
  }
  if (path.elements.some((element) => element.valueFilter !== undefined)) {
    throw BadRequestException.invalidFilter(
      'Use hasComplexValue() to filter on the values of a multi-valued attribute'
    );
  }
  return path;
}

function toFilter(input: FilterInput): ScimFilter {
  return typeof input === 'string' ? parseFilter(input) : input;
}

function toComparisonValue(value: ComparisonValueInput): ScimFilterValue {
  return value instanceof Date ? formatDateTime(value) : value;
}

function comparison(type: ScimComparisonOperator) {
  return (path: AttributePathInput, value: ComparisonValueInput): ScimFilter =>
    createComparison(type, toAttributePath(path), toComparisonValue(value));
}

export const Filters = Object.freeze({
  /** Equal */
  eq: comparison('eq'),
  /** Not equal */
  ne: comparison('ne'),
  /** Contains */
  co: comparison('co'),
  /** Starts with */
  sw: comparison('sw'),
  /** Ends with */
  ew: comparison('ew'),
  /** Greater than */
  gt: comparison('gt'),
  /** Greater than or equal */
  ge: comparison('ge'),
  /** Less than */
  lt: comparison('lt'),
  /** Less than or equal */
  le: comparison('le'),

  /** Present (has value) */
  pr: (path: AttributePathInput): ScimFilter => createPresent(toAttributePath(path)),

  and: (first: FilterInput, second: FilterInput, ...rest: FilterInput[]): ScimFilter =>
    createLogical('and', [first, second, ...rest].map(toFilter)),

  or: (first: FilterInput, second: FilterInput, ...rest: FilterInput[]): ScimFilter =>
    createLogical('or', [first, second, ...rest].map(toFilter)),

  not: (filter: FilterInput): ScimFilter => createNot(toFilter(filter)),

  /**
   * `path[filter]`: matches if any value of the attribute satisfies `filter`.
   */
  hasComplexValue: (path: AttributePathInput, filter: FilterInput): ScimFilter =>
    createComplex(toAttributePath(path), toFilter(filter)),

  fromString: (text: string): ScimFilter => parseFilter(text),
});

export { renderFilter, filterEquals };
