/**
 * SCIM PATCH (RFC 7644 Section 3.5.2)
 *
 * PatchOperation and PatchRequest model the request body; applyPatchOperations
 * mutates a JSON resource. Operations are applied in order and are not
 * rolled back when a later one fails.
 */

import { z } from 'zod';
import { createLogger } from '@scimkit/lib-core';
import type { JsonObject, JsonValue } from '../types/json';
import type {
  ScimGroupMember,
  ScimPatchOp,
  ScimPatchOperationJson,
  ScimPatchOpType,
  ScimPath,
  ScimResourceContainer,
} from '../types/scim';
import { SCIM_SCHEMAS } from '../types/scim';
import { createComparison, createPath, createPathElement, isUrn, renderPath } from './scim-ast';
import { formatIssues, resolvePatchOptions } from './scim-config';
import type { PatchOptions, PatchOptionsInput } from './scim-config';
import { BadRequestException, ScimStateError } from './scim-errors';
import {
  JsonValueSchema,
  cloneJson,
  findKey,
  getField,
  isCoreSchemaUrn,
  isEmptyValue,
  isJsonObject,
  mergeField,
  removeField,
  setField,
} from './scim-json';
import { ScimParser } from './scim-parser';
import { PathResolver } from './scim-path-resolver';

const log = createLogger().module('SCIM_PATCH');

const MEMBERS_ATTRIBUTE = 'members';

const defaultParser = new ScimParser();

// =============================================================================
// Wire Schemas
// =============================================================================

/**
 * Rename keys that match one of `keys` case-insensitively to their canonical
 * spelling. SCIM attribute names, including those of the PatchOp message, are
 * case-insensitive.
 */
function canonicalKeys(keys: readonly string[]) {
  return (input: unknown): unknown => {
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      return input;
    }
    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const canonical = keys.find((candidate) => candidate.toLowerCase() === key.toLowerCase());
      output[canonical ?? key] = value;
    }
    return output;
  };
}

const PatchOperationSchema = z.preprocess(
  canonicalKeys(['op', 'path', 'value']),
  z.object({
    op: z.preprocess(
      (op) => (typeof op === 'string' ? op.toLowerCase() : op),
      z.enum(['add', 'replace', 'remove'])
    ),
    path: z.string().nullable().optional(),
    value: JsonValueSchema.optional(),
  })
);

const PatchRequestSchema = z.preprocess(
  canonicalKeys(['schemas', 'Operations']),
  z.object({
    schemas: z
      .array(z.string())
      .refine(
        (schemas) => schemas.some((urn) => urn.toLowerCase() === SCIM_SCHEMAS.PATCH_OP.toLowerCase()),
        { message: `Must contain '${SCIM_SCHEMAS.PATCH_OP}'` }
      )
      .optional(),
    Operations: z.array(PatchOperationSchema),
  })
);

const MemberSchema = z
  .object({
    value: z.string().optional(),
    $ref: z.string().nullable().optional(),
    type: z.string().optional(),
    display: z.string().optional(),
  })
  .strict();

// =============================================================================
// Patch Operation
// =============================================================================

function memberToJson(member: ScimGroupMember): JsonObject {
  const json: JsonObject = {};
  if (member.value !== undefined) {
    json.value = member.value;
  }
  if (member.$ref !== undefined) {
    json.$ref = member.$ref;
  }
  if (member.type !== undefined) {
    json.type = member.type;
  }
  if (member.display !== undefined) {
    json.display = member.display;
  }
  return json;
}

/**
 * Keys that cannot be stored as plain object properties: assignment sets the
 * prototype instead.
 */
const RESERVED_KEYS: readonly string[] = ['__proto__'];

function findReservedKey(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findReservedKey(item);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  for (const [key, child] of Object.entries(value)) {
    if (RESERVED_KEYS.includes(key)) {
      return key;
    }
    const found = findReservedKey(child);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

function rejectReservedKeys(value: unknown): void {
  const key = findReservedKey(value);
  if (key !== undefined) {
    throw BadRequestException.invalidValue(`The attribute name '${key}' is not allowed.`);
  }
}

function isRemoveByValuePath(path: ScimPath | undefined): boolean {
  if (!path || path.elements.length !== 1) {
    return false;
  }
  const [element] = path.elements;
  return element.valueFilter === undefined && element.attribute.toLowerCase() === MEMBERS_ATTRIBUTE;
}

function validateValueFilters(path: ScimPath): void {
  const [first, ...rest] = path.elements;
  if (!first || !rest.some((element) => element.valueFilter !== undefined)) {
    return;
  }
  if (first.valueFilter === undefined) {
    throw BadRequestException.invalidPath(
      `Path cannot target sub-attributes with a value selection filter: '${renderPath(path)}'`
    );
  }
  throw BadRequestException.invalidPath(
    `The path '${renderPath(path)}' is only allowed to contain a single value selection filter.`
  );
}

/**
 * Checks that only depend on the operation itself. Target-dependent checks
 * happen when the operation is applied.
 */
function validateOperation(op: ScimPatchOpType, path: ScimPath | undefined, value: JsonValue | undefined): void {
  rejectReservedKeys(value);
  if (path) {
    validateValueFilters(path);
  }
  const pathText = path ? renderPath(path) : '';

  if (op === 'remove') {
    if (!path) {
      throw BadRequestException.noTarget('A path must be specified for remove operations.');
    }
    if (value !== undefined && value !== null && !isRemoveByValuePath(path)) {
      throw BadRequestException.invalidPath(
        `Cannot create the operation since it has a value, but an invalid '${pathText}' path.`
      );
    }
  } else if (value === undefined || value === null || (isJsonObject(value) && Object.keys(value).length === 0)) {
    throw BadRequestException.invalidValue(`A non-empty value must be provided for '${op}' operations.`);
  }

  const [first] = path?.elements ?? [];
  if (!path || !first?.valueFilter) {
    return;
  }
  if (path.elements.length > 2 || (op === 'add' && path.elements.length !== 2)) {
    throw BadRequestException.invalidPath(
      `The '${op}' operation path '${pathText}' contains a value selection filter and needs to be 'attribute[filter].subAttribute'.`
    );
  }
  if (op !== 'add') {
    return;
  }

  const filter = first.valueFilter;
  if (
    filter.type !== 'eq' ||
    filter.value === null ||
    filter.attributePath.schemaUrn !== undefined ||
    filter.attributePath.elements.length !== 1 ||
    filter.attributePath.elements[0].valueFilter !== undefined
  ) {
    throw BadRequestException.invalidPath(
      `The add operation path '${pathText}' may only use a value selection filter of the form 'attribute eq value'.`
    );
  }
  if (Array.isArray(value)) {
    throw BadRequestException.invalidValue(
      `The add operation with path '${pathText}' cannot set the 'value' field to an array.`
    );
  }
}

/**
 * A single PATCH operation.
 *
 * Instances are immutable and validated on construction.
 *
 * @example
 * PatchOperation.replace('emails[type eq "work"].value', 'bjensen@example.com');
 * PatchOperation.remove('members[value eq "2819c223"]');
 */
export class PatchOperation {
  readonly op: ScimPatchOpType;
  /** Undefined when the operation targets the whole resource */
  readonly path: ScimPath | undefined;
  readonly value: JsonValue | undefined;

  private constructor(op: ScimPatchOpType, path: ScimPath | undefined, value: JsonValue | undefined) {
    this.op = op;
    this.path = path;
    this.value = value === undefined ? undefined : cloneJson(value);
    Object.freeze(this);
  }

  /**
   * @throws BadRequestException if the path does not parse or the operation
   * is malformed
   */
  static create(
    op: ScimPatchOpType,
    path: string | ScimPath | undefined,
    value?: JsonValue,
    parser: ScimParser = defaultParser
  ): PatchOperation {
    const parsed = typeof path === 'string' ? parser.parsePath(path) : path;
    const normalized =
      parsed && (parsed.elements.length > 0 || parsed.schemaUrn !== undefined) ? parsed : undefined;
    validateOperation(op, normalized, value);
    return new PatchOperation(op, normalized, value);
  }

  static add(path: string | ScimPath | undefined, value: JsonValue): PatchOperation {
    return PatchOperation.create('add', path, value);
  }

  static replace(path: string | ScimPath | undefined, value: JsonValue): PatchOperation {
    return PatchOperation.create('replace', path, value);
  }

  static remove(path: string | ScimPath, value?: JsonValue): PatchOperation {
    return PatchOperation.create('remove', path, value);
  }

  /**
   * Build an operation from its wire form. Field names and the op name are
   * matched case-insensitively.
   * @throws BadRequestException (invalidSyntax) if the shape is wrong
   */
  static fromJson(input: unknown, parser: ScimParser = defaultParser): PatchOperation {
    rejectReservedKeys(input);
    const result = PatchOperationSchema.safeParse(input);
    if (!result.success) {
      throw BadRequestException.invalidSyntax(`Invalid patch operation: ${formatIssues(result.error)}`);
    }
    const { op, path, value } = result.data;
    return PatchOperation.create(op, path ?? undefined, value, parser);
  }

  get pathText(): string | undefined {
    return this.path ? renderPath(this.path) : undefined;
  }

  /**
   * True for a remove on `members` that lists the members to remove in its
   * value instead of using a value selection filter.
   */
  get isRemoveMembersByValue(): boolean {
    return this.op === 'remove' && this.value !== undefined && this.value !== null;
  }

  /**
   * The members listed in the value of a remove operation. Both
   * `{"members": [...]}` and a bare array are accepted.
   *
   * @throws ScimStateError for add and replace operations
   * @throws BadRequestException if the value is not a member list
   */
  getRemoveMemberList(): ScimGroupMember[] {
    if (this.op !== 'remove') {
      throw new ScimStateError("Fetching members is only supported for 'remove' operations.");
    }
    if (!this.isRemoveMembersByValue) {
      return [];
    }

    const list = Array.isArray(this.value)
      ? this.value
      : isJsonObject(this.value)
        ? getField(this.value, MEMBERS_ATTRIBUTE)
        : undefined;
    if (!Array.isArray(list)) {
      throw BadRequestException.invalidValue('Could not extract a Member object list from the patch operation.');
    }

    const result = z.array(MemberSchema).safeParse(list);
    if (!result.success) {
      throw BadRequestException.invalidValue('The provided JSON contained an invalid Member representation.');
    }
    return result.data;
  }

  /**
   * A copy of this remove operation that removes the given members by value.
   * With `nested` the value is written as `{"members": [...]}`, otherwise as
   * a bare array. Returns this operation when there is nothing to remove.
   *
   * @throws ScimStateError for add and replace operations
   */
  withRemoveMembers(
    members: readonly (ScimGroupMember | null)[] | null | undefined,
    nested = true
  ): PatchOperation {
    if (this.op !== 'remove') {
      throw new ScimStateError("The 'withRemoveMembers()' method may only be used for remove operations.");
    }
    const list = (members ?? [])
      .filter((member): member is ScimGroupMember => member !== null)
      .map(memberToJson);
    if (list.length === 0) {
      return this;
    }
    return PatchOperation.create(
      'remove',
      createPath([createPathElement(MEMBERS_ATTRIBUTE)], this.path?.schemaUrn),
      nested ? { members: list } : list
    );
  }

  toJSON(): ScimPatchOperationJson {
    const json: ScimPatchOperationJson = { op: this.op };
    const pathText = this.pathText;
    if (pathText !== undefined) {
      json.path = pathText;
    }
    if (this.value !== undefined) {
      json.value = cloneJson(this.value);
    }
    return json;
  }
}

// =============================================================================
// Patch Request
// =============================================================================

function isResourceContainer(target: JsonObject | ScimResourceContainer): target is ScimResourceContainer {
  return typeof target.getObjectNode === 'function' && typeof target.setObjectNode === 'function';
}

/**
 * A PATCH request body: an ordered list of operations.
 */
export class PatchRequest {
  readonly schemas: readonly string[] = [SCIM_SCHEMAS.PATCH_OP];
  readonly operations: readonly PatchOperation[];

  constructor(operations: readonly PatchOperation[]) {
    this.operations = Object.freeze([...operations]);
  }

  /**
   * Parse a PatchOp message.
   * @throws BadRequestException (invalidSyntax) if the body is malformed
   */
  static fromJson(input: unknown, parser: ScimParser = defaultParser): PatchRequest {
    rejectReservedKeys(input);
    const result = PatchRequestSchema.safeParse(input);
    if (!result.success) {
      throw BadRequestException.invalidSyntax(`Invalid patch request: ${formatIssues(result.error)}`);
    }
    return new PatchRequest(
      result.data.Operations.map(({ op, path, value }) => PatchOperation.create(op, path ?? undefined, value, parser))
    );
  }

  /**
   * Apply every operation to `target`, in order. A raw JSON tree is mutated
   * in place; a container gets the patched tree back through setObjectNode.
   */
  apply(target: JsonObject | ScimResourceContainer, options?: PatchOptionsInput | PatchOptions): JsonObject {
    if (isResourceContainer(target)) {
      const node = target.getObjectNode();
      try {
        applyPatchOperations(node, this.operations, options);
      } finally {
        target.setObjectNode(node);
      }
      return node;
    }
    return applyPatchOperations(target, this.operations, options);
  }

  toJSON(): ScimPatchOp {
    return {
      schemas: [...this.schemas],
      Operations: this.operations.map((operation) => operation.toJSON()),
    };
  }
}

// =============================================================================
// Application
// =============================================================================

interface PatchContext {
  readonly resolver: PathResolver;
  readonly options: PatchOptions;
}

function requireValue(operation: PatchOperation): JsonValue {
  if (operation.value === undefined || operation.value === null) {
    throw BadRequestException.invalidValue(`A non-empty value must be provided for '${operation.op}' operations.`);
  }
  return operation.value;
}

function requireObjectValue(operation: PatchOperation, value: JsonValue): JsonObject {
  if (!isJsonObject(value)) {
    throw BadRequestException.invalidValue(
      `The value of a '${operation.op}' operation without an attribute path must be a JSON object.`
    );
  }
  return value;
}

/**
 * Overwrite `target[name]`. Objects are merged key by key; null and empty
 * values remove the attribute.
 */
function replaceField(target: JsonObject, name: string, value: JsonValue): void {
  if (isEmptyValue(value)) {
    removeField(target, name);
    return;
  }
  const existing = getField(target, name);
  if (isJsonObject(existing) && isJsonObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      replaceField(existing, key, child);
    }
    return;
  }
  setField(target, name, cloneJson(value));
}

/**
 * Write each attribute of `value` into `container`. Keys naming a schema URN
 * address an extension object, or the document itself for a core schema.
 */
function writeAttributes(
  container: JsonObject,
  tree: JsonObject,
  value: JsonObject,
  context: PatchContext,
  write: (target: JsonObject, name: string, child: JsonValue) => void
): void {
  for (const [key, child] of Object.entries(value)) {
    const coreExtension =
      container === tree && isUrn(key) && isCoreSchemaUrn(tree, key, context.options.coreSchemaUrns);
    if (coreExtension && isJsonObject(child)) {
      for (const [name, attribute] of Object.entries(child)) {
        write(tree, name, attribute);
      }
    } else {
      write(container, key, child);
    }
  }
}

function applyAdd(operation: PatchOperation, tree: JsonObject, context: PatchContext): void {
  const value = requireValue(operation);
  if (Array.isArray(value) && value.length === 0) {
    return;
  }

  const target = operation.path
    ? context.resolver.resolveForWrite(operation.path, tree)
    : { kind: 'root' as const, container: tree };
  if (!target) {
    return;
  }

  switch (target.kind) {
    case 'root':
      writeAttributes(target.container, tree, requireObjectValue(operation, value), context, mergeField);
      return;

    case 'field':
      mergeField(target.container, target.name, value);
      return;

    case 'selection': {
      const { filter } = target;
      const [subAttribute] = target.subAttributes;
      if (filter.type !== 'eq' || subAttribute === undefined) {
        throw BadRequestException.invalidPath(
          `The add operation path '${operation.pathText ?? ''}' needs to be 'attribute[filter].subAttribute'.`
        );
      }

      if (target.array && target.matches.length > 0) {
        for (const index of target.matches) {
          const element = target.array[index];
          if (isJsonObject(element)) {
            setField(element, subAttribute, cloneJson(value));
          }
        }
        return;
      }

      const filterAttribute = filter.attributePath.elements[0].attribute;
      const element: JsonObject = { [subAttribute]: cloneJson(value) };
      if (findKey(element, filterAttribute) === undefined) {
        element[filterAttribute] = filter.value;
      }
      if (target.array) {
        target.array.push(element);
      } else {
        setField(target.container, target.name, [element]);
      }
      return;
    }
  }
}

function applyReplace(operation: PatchOperation, tree: JsonObject, context: PatchContext): void {
  const value = requireValue(operation);
  const target = operation.path
    ? context.resolver.resolveForWrite(operation.path, tree, !isEmptyValue(value))
    : { kind: 'root' as const, container: tree };
  if (!target) {
    return;
  }

  switch (target.kind) {
    case 'root':
      writeAttributes(target.container, tree, requireObjectValue(operation, value), context, replaceField);
      return;

    case 'field':
      replaceField(target.container, target.name, value);
      return;

    case 'selection': {
      const { array } = target;
      if (!array) {
        return;
      }
      const [subAttribute] = target.subAttributes;
      for (const index of target.matches) {
        const element = array[index];
        if (subAttribute === undefined) {
          array[index] = cloneJson(value);
        } else if (isJsonObject(element)) {
          replaceField(element, subAttribute, value);
        }
      }
      return;
    }
  }
}

function removePath(path: ScimPath, tree: JsonObject, context: PatchContext): void {
  if (path.elements.length === 0) {
    const urn = path.schemaUrn;
    if (urn === undefined) {
      throw BadRequestException.noTarget('A path must be specified for remove operations.');
    }
    if (!removeField(tree, urn) && isCoreSchemaUrn(tree, urn, context.options.coreSchemaUrns)) {
      throw BadRequestException.invalidPath(`The core schema '${urn}' cannot be removed.`);
    }
    return;
  }

  if (path.elements[0].valueFilter === undefined) {
    for (const handle of context.resolver.resolve(path, tree)) {
      if (handle.kind === 'field') {
        delete handle.container[handle.name];
      }
    }
    return;
  }

  const target = context.resolver.resolveForWrite(path, tree, false);
  if (!target || target.kind !== 'selection' || !target.array) {
    return;
  }
  const { array } = target;
  const [subAttribute] = target.subAttributes;

  if (subAttribute !== undefined) {
    for (const index of target.matches) {
      const element = array[index];
      if (isJsonObject(element)) {
        removeField(element, subAttribute);
      }
    }
    return;
  }

  for (const index of [...target.matches].reverse()) {
    array.splice(index, 1);
  }
  if (target.matches.length > 0 && array.length === 0) {
    removeField(target.container, target.name);
  }
}

function applyRemove(operation: PatchOperation, tree: JsonObject, context: PatchContext): void {
  const { path } = operation;
  if (!path) {
    throw BadRequestException.noTarget('A path must be specified for remove operations.');
  }
  if (!operation.isRemoveMembersByValue) {
    removePath(path, tree, context);
    return;
  }

  if (!context.options.allowMemberRemoveByValue) {
    throw BadRequestException.invalidValue(
      `A remove operation on '${operation.pathText ?? ''}' must use a value selection filter instead of a value.`
    );
  }

  const members = operation.getRemoveMemberList();
  const ids: string[] = [];
  for (const member of members) {
    if (member.value === undefined) {
      throw BadRequestException.invalidValue(
        "The remove operation was formatted incorrectly because it did not contain a Member object with a 'value' subfield set."
      );
    }
    ids.push(member.value);
  }

  const attribute = path.elements[0].attribute;
  for (const id of ids) {
    const valuePath = createPath([createPathElement('value')]);
    removePath(
      createPath(
        [createPathElement(attribute, createComparison('eq', valuePath, id))],
        path.schemaUrn
      ),
      tree,
      context
    );
  }
}

/**
 * Schema URNs an operation may have written under.
 */
function touchedSchemaUrns(operation: PatchOperation): string[] {
  const { path, value } = operation;
  if (path) {
    return path.schemaUrn === undefined ? [] : [path.schemaUrn];
  }
  return isJsonObject(value) ? Object.keys(value).filter(isUrn) : [];
}

/**
 * Keep `schemas` in step with the extension objects: a non-empty extension
 * is listed, an empty one is dropped together with its URN.
 */
function updateSchemaUrns(operation: PatchOperation, tree: JsonObject, options: PatchOptions): void {
  for (const urn of touchedSchemaUrns(operation)) {
    if (isCoreSchemaUrn(tree, urn, options.coreSchemaUrns)) {
      continue;
    }

    const lower = urn.toLowerCase();
    const extension = getField(tree, urn);
    const schemas = getField(tree, 'schemas');
    const listed = Array.isArray(schemas) && schemas.some((s) => typeof s === 'string' && s.toLowerCase() === lower);

    if (isJsonObject(extension) && Object.values(extension).some((child) => !isEmptyValue(child))) {
      if (Array.isArray(schemas)) {
        if (!listed) {
          schemas.push(findKey(tree, urn) ?? urn);
        }
      } else if (schemas === undefined) {
        setField(tree, 'schemas', [findKey(tree, urn) ?? urn]);
      }
      continue;
    }

    removeField(tree, urn);
    if (Array.isArray(schemas) && listed) {
      const kept = schemas.filter((s) => typeof s !== 'string' || s.toLowerCase() !== lower);
      schemas.splice(0, schemas.length, ...kept);
    }
  }
}

/**
 * Apply `operations` to `resource` in order, mutating it in place.
 *
 * @returns the same resource object
 * @throws BadRequestException from the first failing operation; earlier
 * operations stay applied
 */
export function applyPatchOperations(
  resource: JsonObject,
  operations: readonly PatchOperation[],
  options?: PatchOptionsInput | PatchOptions
): JsonObject {
  const resolvedOptions = resolvePatchOptions(options);
  const context: PatchContext = {
    resolver: new PathResolver({ coreSchemaUrns: resolvedOptions.coreSchemaUrns }),
    options: resolvedOptions,
  };

  operations.forEach((operation, operationIndex) => {
    const operationLog = log.child({ operationIndex, op: operation.op, path: operation.pathText });
    operationLog.debug('Applying patch operation');

    try {
      switch (operation.op) {
        case 'add':
          applyAdd(operation, resource, context);
          break;
        case 'replace':
          applyReplace(operation, resource, context);
          break;
        case 'remove':
          applyRemove(operation, resource, context);
          break;
      }
    } catch (error) {
      operationLog.warn('Patch operation failed', undefined, error instanceof Error ? error : undefined);
      throw error;
    } finally {
      updateSchemaUrns(operation, resource, resolvedOptions);
    }
  });

  return resource;
}
