/**
 * Generic SCIM resource
 *
 * A schema-less resource backed by a JSON tree, addressed with SCIM paths.
 */

import type { JsonObject, JsonValue } from '../types/json';
import type { ScimPath, ScimResourceContainer } from '../types/scim';
import { resolvePatchOptions } from './scim-config';
import type { PatchOptions, PatchOptionsInput } from './scim-config';
import { parseDateTime } from './scim-datetime';
import { cloneJson, getField } from './scim-json';
import { ScimParser } from './scim-parser';
import { PathResolver } from './scim-path-resolver';
import { PatchOperation, applyPatchOperations } from './scim-patch';

export interface GenericScimResourceOptions {
  parser?: ScimParser;
  patch?: PatchOptionsInput | PatchOptions;
}

export class GenericScimResource implements ScimResourceContainer {
  private node: JsonObject;
  private readonly parser: ScimParser;
  private readonly patchOptions: PatchOptions;
  private readonly resolver: PathResolver;

  constructor(node: JsonObject = {}, options: GenericScimResourceOptions = {}) {
    this.node = node;
    this.parser = options.parser ?? new ScimParser();
    this.patchOptions = resolvePatchOptions(options.patch);
    this.resolver = new PathResolver({ coreSchemaUrns: this.patchOptions.coreSchemaUrns });
  }

  getObjectNode(): JsonObject {
    return this.node;
  }

  setObjectNode(node: JsonObject): void {
    this.node = node;
  }

  /**
   * The first value at `path`, or undefined if there is none.
   */
  getValue(path: string | ScimPath): JsonValue | undefined {
    const [first] = this.resolver.getValues(this.toPath(path), this.node);
    return first;
  }

  /**
   * Every value at `path`. Multi-valued attributes are flattened and nulls
   * dropped.
   */
  getValues(path: string | ScimPath): JsonValue[] {
    return this.resolver
      .getValues(this.toPath(path), this.node)
      .flatMap((value): JsonValue[] => (Array.isArray(value) ? value : [value]))
      .filter((value) => value !== null);
  }

  /**
   * Replace the value at `path`. A null value removes it.
   */
  replaceValue(path: string | ScimPath, value: JsonValue): this {
    if (value === null) {
      this.removeValues(path);
      return this;
    }
    this.patch(PatchOperation.create('replace', this.toPath(path), value, this.parser));
    return this;
  }

  /**
   * Add values to the multi-valued attribute at `path`, skipping any already
   * present.
   */
  addValues(path: string | ScimPath, values: readonly JsonValue[]): this {
    if (values.length > 0) {
      this.patch(PatchOperation.create('add', this.toPath(path), [...values], this.parser));
    }
    return this;
  }

  /**
   * Remove everything at `path`. Returns true if something was there.
   */
  removeValues(path: string | ScimPath): boolean {
    const parsed = this.toPath(path);
    const existed = this.resolver.pathExists(parsed, this.node);
    this.patch(PatchOperation.create('remove', parsed, undefined, this.parser));
    return existed;
  }

  getSchemaUrns(): string[] {
    const schemas = getField(this.node, 'schemas');
    return Array.isArray(schemas)
      ? schemas.filter((urn): urn is string => typeof urn === 'string')
      : [];
  }

  getStringValue(path: string | ScimPath): string | undefined {
    const value = this.getValue(path);
    return typeof value === 'string' ? value : undefined;
  }

  getStringValues(path: string | ScimPath): string[] {
    return this.getValues(path).filter((value): value is string => typeof value === 'string');
  }

  /**
   * The dateTime at `path`, or undefined if absent or not a valid xsd:dateTime.
   */
  getDateValue(path: string | ScimPath): Date | undefined {
    const value = this.getStringValue(path);
    const time = value === undefined ? undefined : parseDateTime(value);
    return time === undefined ? undefined : new Date(time);
  }

  toJSON(): JsonObject {
    return cloneJson(this.node);
  }

  private toPath(path: string | ScimPath): ScimPath {
    return typeof path === 'string' ? this.parser.parsePath(path) : path;
  }

  private patch(operation: PatchOperation): void {
    applyPatchOperations(this.node, [operation], this.patchOptions);
  }
}
