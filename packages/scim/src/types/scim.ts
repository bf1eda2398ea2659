/**
 * SCIM 2.0 Type Definitions
 *
 * RFC 7643: SCIM Core Schema
 * RFC 7644: SCIM Protocol
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7643
 * @see https://datatracker.ietf.org/doc/html/rfc7644
 */

import type { JsonObject, JsonValue } from './json';

/**
 * SCIM Schema URIs
 */
export const SCIM_SCHEMAS = {
  USER: 'urn:ietf:params:scim:schemas:core:2.0:User',
  GROUP: 'urn:ietf:params:scim:schemas:core:2.0:Group',
  ENTERPRISE_USER: 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User',
  ERROR: 'urn:ietf:params:scim:api:messages:2.0:Error',
  PATCH_OP: 'urn:ietf:params:scim:api:messages:2.0:PatchOp',
} as const;

/**
 * SCIM Group Member Reference
 */
export interface ScimGroupMember {
  value?: string; // User or Group ID
  $ref?: string | null; // Full URI to the resource
  type?: string;
  display?: string;
}

/**
 * SCIM Error Response (RFC 7644 Section 3.12)
 */
export interface ScimErrorResponse {
  schemas: string[];
  status: string; // HTTP status code
  scimType?: ScimErrorType;
  detail?: string;
}

/**
 * SCIM Error Types
 */
export type ScimErrorType =
  | 'invalidFilter'
  | 'tooMany'
  | 'uniqueness'
  | 'mutability'
  | 'invalidSyntax'
  | 'invalidPath'
  | 'noTarget'
  | 'invalidValue'
  | 'invalidVers'
  | 'sensitive';

/**
 * SCIM Filter Value Type (RFC 7644 Section 3.4.2.2)
 *
 * Filter comparison operands are limited to primitive types.
 */
export type ScimFilterValue = string | number | boolean | null;

/**
 * SCIM Filter comparison operators that take a value
 */
export type ScimComparisonOperator =
  | 'eq' // Equal
  | 'ne' // Not equal
  | 'co' // Contains
  | 'sw' // Starts with
  | 'ew' // Ends with
  | 'gt' // Greater than
  | 'ge' // Greater than or equal
  | 'lt' // Less than
  | 'le'; // Less than or equal

/**
 * SCIM Filter Operators
 */
export type ScimFilterOperator = ScimComparisonOperator | 'pr';

export type ScimLogicalOperator = 'and' | 'or';

/**
 * Comparison node: `attributePath op value`
 */
export interface ScimComparisonFilter {
  readonly type: ScimComparisonOperator;
  readonly attributePath: ScimPath;
  readonly value: ScimFilterValue;
}

/**
 * Presence node: `attributePath pr`
 */
export interface ScimPresentFilter {
  readonly type: 'pr';
  readonly attributePath: ScimPath;
}

/**
 * Logical node with two or more ordered children
 */
export interface ScimLogicalFilter {
  readonly type: ScimLogicalOperator;
  readonly filters: readonly ScimFilter[];
}

export interface ScimNotFilter {
  readonly type: 'not';
  readonly filter: ScimFilter;
}

/**
 * Complex value node: `attributePath[filter]`, true if any value of the
 * attribute satisfies the child filter.
 */
export interface ScimComplexFilter {
  readonly type: 'complex';
  readonly attributePath: ScimPath;
  readonly filter: ScimFilter;
}

/**
 * SCIM Filter AST Node
 */
export type ScimFilter =
  | ScimComparisonFilter
  | ScimPresentFilter
  | ScimLogicalFilter
  | ScimNotFilter
  | ScimComplexFilter;

/**
 * One dotted segment of an attribute path, optionally narrowed by a value
 * selection filter (e.g. `emails[type eq "work"]`).
 */
export interface ScimPathElement {
  readonly attribute: string;
  readonly valueFilter?: ScimFilter;
}

/**
 * SCIM Attribute Path (RFC 7644 Section 3.10)
 *
 * An empty element list addresses the whole resource, or the whole extension
 * object when `schemaUrn` is set.
 */
export interface ScimPath {
  readonly schemaUrn?: string;
  readonly elements: readonly ScimPathElement[];
}

/**
 * SCIM Patch Operation types (RFC 7644 Section 3.5.2)
 */
export type ScimPatchOpType = 'add' | 'replace' | 'remove';

/**
 * SCIM Patch Operation wire form
 */
export interface ScimPatchOperationJson {
  op: ScimPatchOpType;
  path?: string;
  value?: JsonValue;
}

/**
 * SCIM Patch Request wire form (RFC 7644 Section 3.5.2)
 */
export interface ScimPatchOp {
  schemas: string[];
  Operations: ScimPatchOperationJson[];
}

/**
 * Anything that exposes its resource as a mutable JSON tree
 */
export interface ScimResourceContainer {
  getObjectNode(): JsonObject;
  setObjectNode(node: JsonObject): void;
}
