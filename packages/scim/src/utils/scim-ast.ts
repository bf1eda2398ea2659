/**
 * SCIM Filter and Path AST
 *
 * Node constructors, canonical rendering and structural equality for the
 * filter (RFC 7644 Section 3.4.2.2) and attribute path (RFC 7644 Section 3.10)
 * trees. Nodes are frozen on construction and safe to share.
 */

import type {
  ScimComparisonOperator,
  ScimFilter,
  ScimFilterValue,
  ScimLogicalOperator,
  ScimPath,
  ScimPathElement,
} from '../types/scim';

export const COMPARISON_OPERATORS: readonly ScimComparisonOperator[] = [
  'eq',
  'ne',
  'co',
  'sw',
  'ew',
  'gt',
  'ge',
  'lt',
  'le',
];

/**
 * True if the text starts with `urn:` (case-insensitive) and has more after it.
 */
export function isUrn(text: string): boolean {
  return text.length > 4 && text.substring(0, 4).toLowerCase() === 'urn:';
}

// =============================================================================
// Construction
// =============================================================================

export function createPathElement(attribute: string, valueFilter?: ScimFilter): ScimPathElement {
  return Object.freeze(valueFilter ? { attribute, valueFilter } : { attribute });
}

export function createPath(elements: readonly ScimPathElement[], schemaUrn?: string): ScimPath {
  const frozen = Object.freeze([...elements]);
  return Object.freeze(schemaUrn !== undefined ? { schemaUrn, elements: frozen } : { elements: frozen });
}

export function createComparison(
  type: ScimComparisonOperator,
  attributePath: ScimPath,
  value: ScimFilterValue
): ScimFilter {
  return Object.freeze({ type, attributePath, value });
}

export function createPresent(attributePath: ScimPath): ScimFilter {
  return Object.freeze({ type: 'pr', attributePath });
}

export function createLogical(type: ScimLogicalOperator, filters: readonly ScimFilter[]): ScimFilter {
  if (filters.length < 2) {
    throw new RangeError(`A logical '${type}' filter requires at least two filters`);
  }
  return Object.freeze({ type, filters: Object.freeze([...filters]) });
}

export function createNot(filter: ScimFilter): ScimFilter {
  return Object.freeze({ type: 'not', filter });
}

export function createComplex(attributePath: ScimPath, filter: ScimFilter): ScimFilter {
  return Object.freeze({ type: 'complex', attributePath, filter });
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render a filter in canonical form.
 *
 * @example
 * renderFilter(parseFilter('title pr and (userType eq "Employee")'))
 * // => '(title pr and userType eq "Employee")'
 */
export function renderFilter(filter: ScimFilter): string {
  switch (filter.type) {
    case 'pr':
      return `${renderPath(filter.attributePath)} pr`;
    case 'and':
    case 'or':
      return `(${filter.filters.map(renderFilter).join(` ${filter.type} `)})`;
    case 'not':
      return `not (${renderFilter(filter.filter)})`;
    case 'complex':
      return `${renderPath(filter.attributePath)}[${renderFilter(filter.filter)}]`;
    default:
      return `${renderPath(filter.attributePath)} ${filter.type} ${JSON.stringify(filter.value)}`;
  }
}

/**
 * Render a path. A bare extension root renders with its trailing colon
 * (`urn:x:`); the resource root renders as the empty string.
 */
export function renderPath(path: ScimPath): string {
  const elements = path.elements
    .map((element) =>
      element.valueFilter
        ? `${element.attribute}[${renderFilter(element.valueFilter)}]`
        : element.attribute
    )
    .join('.');
  return path.schemaUrn !== undefined ? `${path.schemaUrn}:${elements}` : elements;
}

// =============================================================================
// Equality
// =============================================================================

/**
 * Structural equality. Attribute names and schema URNs compare
 * case-insensitively; comparison values compare exactly.
 */
export function filterEquals(a: ScimFilter, b: ScimFilter): boolean {
  switch (a.type) {
    case 'pr':
      return b.type === 'pr' && pathEquals(a.attributePath, b.attributePath);
    case 'and':
    case 'or': {
      if (b.type !== a.type || !('filters' in b)) {
        return false;
      }
      const others = b.filters;
      return (
        a.filters.length === others.length &&
        a.filters.every((child, i) => filterEquals(child, others[i]))
      );
    }
    case 'not':
      return b.type === 'not' && filterEquals(a.filter, b.filter);
    case 'complex':
      return (
        b.type === 'complex' &&
        pathEquals(a.attributePath, b.attributePath) &&
        filterEquals(a.filter, b.filter)
      );
    default:
      if (b.type !== a.type || !('value' in b)) {
        return false;
      }
      return pathEquals(a.attributePath, b.attributePath) && a.value === b.value;
  }
}

function sameName(a: string | undefined, b: string | undefined): boolean {
  return a === undefined || b === undefined ? a === b : a.toLowerCase() === b.toLowerCase();
}

export function pathEquals(a: ScimPath, b: ScimPath): boolean {
  if (!sameName(a.schemaUrn, b.schemaUrn) || a.elements.length !== b.elements.length) {
    return false;
  }
  return a.elements.every((element, i) => {
    const other = b.elements[i];
    if (!sameName(element.attribute, other.attribute)) {
      return false;
    }
    if (element.valueFilter === undefined || other.valueFilter === undefined) {
      return element.valueFilter === other.valueFilter;
    }
    return filterEquals(element.valueFilter, other.valueFilter);
  });
}

/**
 * True for the resource root (no URN, no elements).
 */
export function isRootPath(path: ScimPath): boolean {
  return path.schemaUrn === undefined && path.elements.length === 0;
}
