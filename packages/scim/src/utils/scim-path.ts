/**
 * SCIM Attribute Path builders
 */

import type { ScimFilter, ScimPath } from '../types/scim';
import { createPath, createPathElement, isRootPath, pathEquals, renderPath } from './scim-ast';
import { BadRequestException } from './scim-errors';
import { parseFilter, parsePath } from './scim-parser';

const RESERVED_NAME_CHARS = /[\s.[\]:"()]/;

export const Paths = Object.freeze({
  /**
   * The resource root, or the root of an extension object when a schema URN
   * is given.
   */
  root: (schemaUrn?: string): ScimPath => createPath([], schemaUrn),

  /**
   * Append an attribute (optionally with a value selection filter) to `parent`.
   *
   * @example
   * Paths.attribute(Paths.root(), 'emails', 'type eq "work"') // emails[type eq "work"]
   */
  attribute: (parent: ScimPath, name: string, valueFilter?: ScimFilter | string): ScimPath => {
    if (name.length === 0 || RESERVED_NAME_CHARS.test(name)) {
      throw BadRequestException.invalidPath(`Invalid attribute name '${name}'`);
    }
    const filter = typeof valueFilter === 'string' ? parseFilter(valueFilter) : valueFilter;
    return createPath([...parent.elements, createPathElement(name, filter)], parent.schemaUrn);
  },

  /**
   * The path with its last element dropped. The parent of a root is itself.
   */
  parent: (path: ScimPath): ScimPath =>
    path.elements.length === 0 ? path : createPath(path.elements.slice(0, -1), path.schemaUrn),

  fromString: (text: string): ScimPath => parsePath(text),
});

export { renderPath, pathEquals, isRootPath };
