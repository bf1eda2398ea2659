/**
 * SCIM Filter Evaluator
 *
 * Evaluates a filter AST against a JSON resource (RFC 7644 Section 3.4.2.2).
 *
 * - Multi-valued attributes match if any value matches.
 * - String comparisons are case-insensitive; dateTime strings compare as instants.
 * - Unassigned attributes, null and empty arrays are equivalent: only
 *   `eq null` holds for them.
 * - Mismatched types never match. Evaluation never throws.
 */

import type { JsonValue } from '../types/json';
import type { ScimComparisonFilter, ScimFilter, ScimFilterValue, ScimPath } from '../types/scim';
import { DEFAULT_PATCH_OPTIONS } from './scim-config';
import { compareDateTimes } from './scim-datetime';
import { getField, isEmptyValue, isJsonObject, schemaRootForRead } from './scim-json';

export interface FilterEvaluatorOptions {
  /** Schema URNs whose attributes live at the top level of the resource */
  coreSchemaUrns?: readonly string[];
}

function stringsEqual(a: string, b: string): boolean {
  const order = compareDateTimes(a, b);
  if (order !== undefined) {
    return order === 0;
  }
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Equality between a resource value and a filter value, or undefined when
 * the two are of different types.
 */
function valueEquals(candidate: JsonValue, value: ScimFilterValue): boolean | undefined {
  if (typeof candidate === 'string' && typeof value === 'string') {
    return stringsEqual(candidate, value);
  }
  if (typeof candidate === 'number' && typeof value === 'number') {
    return candidate === value;
  }
  if (typeof candidate === 'boolean' && typeof value === 'boolean') {
    return candidate === value;
  }
  return undefined;
}

/**
 * Ordering between a resource value and a filter value (-1, 0 or 1), or
 * undefined when they cannot be ordered. Booleans are never ordered.
 */
function valueOrder(candidate: JsonValue, value: ScimFilterValue): number | undefined {
  if (typeof candidate === 'number' && typeof value === 'number') {
    return Math.sign(candidate - value);
  }
  if (typeof candidate === 'string' && typeof value === 'string') {
    const order = compareDateTimes(candidate, value);
    if (order !== undefined) {
      return order;
    }
    const a = candidate.toLowerCase();
    const b = value.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return undefined;
}

export class FilterEvaluator {
  private readonly coreSchemaUrns: readonly string[];

  constructor(options: FilterEvaluatorOptions = {}) {
    this.coreSchemaUrns = options.coreSchemaUrns ?? DEFAULT_PATCH_OPTIONS.coreSchemaUrns;
  }

  /**
   * Evaluate `filter` with attribute paths rooted at `node`.
   */
  evaluate(filter: ScimFilter, node: JsonValue): boolean {
    switch (filter.type) {
      case 'and':
        return filter.filters.every((child) => this.evaluate(child, node));
      case 'or':
        return filter.filters.some((child) => this.evaluate(child, node));
      case 'not':
        return !this.evaluate(filter.filter, node);
      case 'pr':
        return this.candidates(filter.attributePath, node).some((value) => !isEmptyValue(value));
      case 'complex':
        return this.candidates(filter.attributePath, node).some((value) =>
          this.evaluate(filter.filter, value)
        );
      default:
        return this.compare(filter, this.candidates(filter.attributePath, node));
    }
  }

  private compare(filter: ScimComparisonFilter, candidates: JsonValue[]): boolean {
    const { value } = filter;

    switch (filter.type) {
      case 'eq':
        if (value === null) {
          return candidates.every(isEmptyValue);
        }
        return candidates.some((candidate) => valueEquals(candidate, value) === true);

      case 'ne':
        if (value === null) {
          return candidates.some((candidate) => !isEmptyValue(candidate));
        }
        return candidates.some((candidate) => valueEquals(candidate, value) === false);

      case 'co':
      case 'sw':
      case 'ew':
        return candidates.some((candidate) => {
          if (typeof candidate !== 'string' || typeof value !== 'string') {
            return valueEquals(candidate, value) === true;
          }
          const text = candidate.toLowerCase();
          const search = value.toLowerCase();
          if (filter.type === 'co') {
            return text.includes(search);
          }
          return filter.type === 'sw' ? text.startsWith(search) : text.endsWith(search);
        });

      default:
        return candidates.some((candidate) => {
          const order = valueOrder(candidate, value);
          if (order === undefined) {
            return false;
          }
          switch (filter.type) {
            case 'gt':
              return order > 0;
            case 'ge':
              return order >= 0;
            case 'lt':
              return order < 0;
            default:
              return order <= 0;
          }
        });
    }
  }

  /**
   * Values addressed by `path` under `node`, with arrays flattened and nulls
   * dropped.
   */
  private candidates(path: ScimPath, node: JsonValue): JsonValue[] {
    if (!isJsonObject(node)) {
      // Scalar value of a multi-valued attribute: `value` refers to the element itself
      const [element] = path.elements;
      const isValueRef =
        path.schemaUrn === undefined &&
        path.elements.length === 1 &&
        element.attribute.toLowerCase() === 'value';
      return isValueRef && node !== null && !Array.isArray(node) ? [node] : [];
    }

    const root =
      path.schemaUrn === undefined ? node : schemaRootForRead(node, path.schemaUrn, this.coreSchemaUrns);
    if (!root) {
      return [];
    }

    let current: JsonValue[] = [root];
    for (const element of path.elements) {
      const next: JsonValue[] = [];
      for (const value of current) {
        for (const item of Array.isArray(value) ? value : [value]) {
          if (!isJsonObject(item)) {
            continue;
          }
          const field = getField(item, element.attribute);
          if (field === undefined) {
            continue;
          }
          const valueFilter = element.valueFilter;
          if (!valueFilter) {
            next.push(field);
            continue;
          }
          for (const entry of Array.isArray(field) ? field : [field]) {
            if (this.evaluate(valueFilter, entry)) {
              next.push(entry);
            }
          }
        }
      }
      current = next;
    }

    return current
      .flatMap((value): JsonValue[] => (Array.isArray(value) ? value : [value]))
      .filter((value) => value !== null);
  }
}

const defaultEvaluator = new FilterEvaluator();

/**
 * Evaluate a filter against a JSON value.
 *
 * @example
 * evaluateFilter(parseFilter('emails[type eq "work"]'), user) // => true
 */
export function evaluateFilter(
  filter: ScimFilter,
  node: JsonValue,
  options?: FilterEvaluatorOptions
): boolean {
  return (options ? new FilterEvaluator(options) : defaultEvaluator).evaluate(filter, node);
}
