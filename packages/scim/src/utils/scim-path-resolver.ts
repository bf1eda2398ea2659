/**
 * SCIM Path Resolver
 *
 * Maps an attribute path onto locations in a JSON resource.
 *
 * Reads fan out: every array is expanded and value selection filters are
 * honoured on any element. Writes resolve to exactly one location, except
 * that a filter on the first element selects the matching values of that
 * multi-valued attribute.
 */

import type { JsonObject, JsonValue } from '../types/json';
import type { ScimFilter, ScimPath } from '../types/scim';
import { renderPath } from './scim-ast';
import { DEFAULT_PATCH_OPTIONS } from './scim-config';
import { BadRequestException } from './scim-errors';
import { FilterEvaluator } from './scim-filter-evaluator';
import {
  findKey,
  getField,
  isCoreSchemaUrn,
  isEmptyValue,
  isJsonObject,
  schemaRootForRead,
  setField,
} from './scim-json';

/**
 * A location read from the resource
 */
export type TargetHandle =
  /** The resource itself, or a whole extension object */
  | { kind: 'root'; container: JsonObject }
  /** An existing field of an object; `name` is the key as stored */
  | { kind: 'field'; container: JsonObject; name: string }
  /** One value of a multi-valued attribute */
  | { kind: 'element'; array: JsonValue[]; index: number };

/**
 * A location to write to
 */
export type WriteTarget =
  | { kind: 'root'; container: JsonObject }
  /** A field that may not exist yet; intermediate objects have been created */
  | { kind: 'field'; container: JsonObject; name: string }
  /**
   * The values of `container[name]` matching `filter`. `array` is undefined
   * when the attribute is absent. `subAttributes` holds the path elements
   * after the filtered one.
   */
  | {
      kind: 'selection';
      container: JsonObject;
      name: string;
      filter: ScimFilter;
      array: JsonValue[] | undefined;
      matches: number[];
      subAttributes: string[];
    };

export interface PathResolverOptions {
  coreSchemaUrns?: readonly string[];
}

export function handleValue(handle: TargetHandle): JsonValue {
  switch (handle.kind) {
    case 'root':
      return handle.container;
    case 'field':
      return handle.container[handle.name];
    case 'element':
      return handle.array[handle.index];
  }
}

export class PathResolver {
  private readonly coreSchemaUrns: readonly string[];
  private readonly evaluator: FilterEvaluator;

  constructor(options: PathResolverOptions = {}) {
    this.coreSchemaUrns = options.coreSchemaUrns ?? DEFAULT_PATCH_OPTIONS.coreSchemaUrns;
    this.evaluator = new FilterEvaluator({ coreSchemaUrns: this.coreSchemaUrns });
  }

  /**
   * Resolve `path` for reading. Returns handles in document order; an empty
   * list means nothing is there.
   */
  resolve(path: ScimPath, tree: JsonObject): TargetHandle[] {
    const root =
      path.schemaUrn === undefined ? tree : schemaRootForRead(tree, path.schemaUrn, this.coreSchemaUrns);
    if (!root) {
      return [];
    }
    if (path.elements.length === 0) {
      return [{ kind: 'root', container: root }];
    }

    const handles: TargetHandle[] = [];
    let containers: JsonObject[] = [root];

    path.elements.forEach((element, i) => {
      const last = i === path.elements.length - 1;
      const next: JsonObject[] = [];

      for (const container of containers) {
        const key = findKey(container, element.attribute);
        if (key === undefined) {
          continue;
        }
        const value = container[key];
        const filter = element.valueFilter;

        if (filter && Array.isArray(value)) {
          value.forEach((item, index) => {
            if (!this.evaluator.evaluate(filter, item)) {
              return;
            }
            if (last) {
              handles.push({ kind: 'element', array: value, index });
            } else if (isJsonObject(item)) {
              next.push(item);
            }
          });
        } else if (filter && (value === null || !this.evaluator.evaluate(filter, value))) {
          continue;
        } else if (last) {
          handles.push({ kind: 'field', container, name: key });
        } else {
          for (const item of Array.isArray(value) ? value : [value]) {
            if (isJsonObject(item)) {
              next.push(item);
            }
          }
        }
      }

      containers = next;
    });

    return handles;
  }

  /**
   * Resolve `path` for writing.
   *
   * With `create` (the default), a missing extension object or intermediate
   * complex attribute is created. Without it, undefined is returned when the
   * path runs into a missing object.
   *
   * @throws BadRequestException (invalidPath) when the path cannot address a
   * single location
   */
  resolveForWrite(path: ScimPath, tree: JsonObject, create = true): WriteTarget | undefined {
    const container = this.schemaRootForWrite(path, tree, create);
    if (!container) {
      return undefined;
    }
    if (path.elements.length === 0) {
      return { kind: 'root', container };
    }

    const [first, ...rest] = path.elements;
    if (rest.some((element) => element.valueFilter !== undefined)) {
      throw BadRequestException.invalidPath(
        `Value selection filters are only supported on the first element of the path '${renderPath(path)}'`
      );
    }

    if (first.valueFilter) {
      const existing = getField(container, first.attribute);
      if (existing !== undefined && existing !== null && !Array.isArray(existing)) {
        throw BadRequestException.invalidPath(
          `The operation could not be processed because a value selection filter was provided for the single-valued attribute '${first.attribute}'.`
        );
      }
      const filter = first.valueFilter;
      const array = Array.isArray(existing) ? existing : undefined;
      const matches: number[] = [];
      array?.forEach((item, index) => {
        if (this.evaluator.evaluate(filter, item)) {
          matches.push(index);
        }
      });
      return {
        kind: 'selection',
        container,
        name: first.attribute,
        filter,
        array,
        matches,
        subAttributes: rest.map((element) => element.attribute),
      };
    }

    let current = container;
    for (const element of path.elements.slice(0, -1)) {
      const child = getField(current, element.attribute);
      if (isJsonObject(child)) {
        current = child;
        continue;
      }
      if (child !== undefined && child !== null) {
        throw BadRequestException.invalidPath(
          `The path '${renderPath(path)}' does not resolve to a single target because '${element.attribute}' is not a complex attribute`
        );
      }
      if (!create) {
        return undefined;
      }
      const created: JsonObject = {};
      setField(current, element.attribute, created);
      current = created;
    }

    return { kind: 'field', container: current, name: path.elements[path.elements.length - 1].attribute };
  }

  /**
   * Values addressed by `path`, one per resolved location.
   */
  getValues(path: ScimPath, tree: JsonObject): JsonValue[] {
    return this.resolve(path, tree).map(handleValue);
  }

  /**
   * True if `path` addresses at least one non-empty value.
   */
  pathExists(path: ScimPath, tree: JsonObject): boolean {
    return this.getValues(path, tree).some((value) => !isEmptyValue(value));
  }

  private schemaRootForWrite(path: ScimPath, tree: JsonObject, create: boolean): JsonObject | undefined {
    const urn = path.schemaUrn;
    if (urn === undefined) {
      return tree;
    }

    const extension = getField(tree, urn);
    if (isJsonObject(extension)) {
      return extension;
    }
    if (isCoreSchemaUrn(tree, urn, this.coreSchemaUrns)) {
      return tree;
    }
    if (extension !== undefined && extension !== null) {
      throw BadRequestException.invalidPath(`The schema extension '${urn}' is not a JSON object`);
    }
    if (!create) {
      return undefined;
    }
    const created: JsonObject = {};
    setField(tree, urn, created);
    return created;
  }
}

const defaultResolver = new PathResolver();

export function resolvePath(path: ScimPath, tree: JsonObject): TargetHandle[] {
  return defaultResolver.resolve(path, tree);
}

export function getPathValues(path: ScimPath, tree: JsonObject): JsonValue[] {
  return defaultResolver.getValues(path, tree);
}

export function pathExists(path: ScimPath, tree: JsonObject): boolean {
  return defaultResolver.pathExists(path, tree);
}
