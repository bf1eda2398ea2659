/**
 * @scimkit/scim - SCIM 2.0 filter, path and PATCH core
 *
 * Parses and evaluates SCIM filters and attribute paths, and applies PATCH
 * operations to JSON resources.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7643 - SCIM Core Schema
 * @see https://datatracker.ietf.org/doc/html/rfc7644 - SCIM Protocol
 */

// Types
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types/json';
export type {
  ScimComparisonFilter,
  ScimComparisonOperator,
  ScimComplexFilter,
  ScimErrorResponse,
  ScimErrorType,
  ScimFilter,
  ScimFilterOperator,
  ScimFilterValue,
  ScimGroupMember,
  ScimLogicalFilter,
  ScimLogicalOperator,
  ScimNotFilter,
  ScimPatchOp,
  ScimPatchOperationJson,
  ScimPatchOpType,
  ScimPath,
  ScimPathElement,
  ScimPresentFilter,
  ScimResourceContainer,
} from './types/scim';
export { SCIM_SCHEMAS } from './types/scim';

// Configuration and errors
export * from './utils/scim-config';
export * from './utils/scim-errors';

// Filters and paths
export type { ParseError, ParseResult, Token, TokenizeResult } from './utils/scim-tokenizer';
export { tokenize } from './utils/scim-tokenizer';
export { ScimParser, parseFilter, parsePath, parseTopLevelAttribute, validateFilter } from './utils/scim-parser';
export * from './utils/scim-filter';
export * from './utils/scim-path';
export * from './utils/scim-filter-evaluator';
export * from './utils/scim-path-resolver';

// JSON documents
export {
  cloneJson,
  isEmptyValue,
  isJsonObject,
  jsonEquals,
  JsonValueSchema,
} from './utils/scim-json';
export { compareDateTimes, formatDateTime, isDateTime, parseDateTime } from './utils/scim-datetime';

// PATCH
export * from './utils/scim-patch';
export * from './utils/scim-resource';
