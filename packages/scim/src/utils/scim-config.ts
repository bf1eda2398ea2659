/**
 * SCIM Core Configuration Schema
 *
 * Parser and PATCH behaviour is configured through immutable option values
 * validated with Zod. Options are passed per call or bound to a ScimParser,
 * never held in module state.
 */

import { z } from 'zod';
import { createLogger, parseBooleanFlag, parseListFlag } from '@scimkit/lib-core';
import type { EnvRecord } from '@scimkit/lib-core';
import { SCIM_SCHEMAS } from '../types/scim';
import { BadRequestException } from './scim-errors';

const log = createLogger().module('SCIM_CONFIG');

// =============================================================================
// Parser Options
// =============================================================================

export const ParserOptionsSchema = z.object({
  /**
   * Extra characters accepted inside attribute names, for service providers
   * whose attribute names fall outside the RFC 7643 grammar (e.g. "#").
   */
  extendedAttributeNameCharacters: z
    .array(z.string().length(1, { message: 'Each extended character must be a single character' }))
    .default([]),
});

// =============================================================================
// Patch Options
// =============================================================================

export const PatchOptionsSchema = z.object({
  /**
   * Accept `remove` operations on `members` that carry the member list in
   * `value` instead of a value selection filter.
   */
  allowMemberRemoveByValue: z.boolean().default(true),
  /**
   * Schema URNs whose attributes live at the top level of the resource.
   * Paths qualified with one of these resolve against the document root.
   */
  coreSchemaUrns: z.array(z.string().min(1)).default([SCIM_SCHEMAS.USER, SCIM_SCHEMAS.GROUP]),
});

// =============================================================================
// Root Configuration
// =============================================================================

export const ScimConfigSchema = z.object({
  parser: ParserOptionsSchema.default({}),
  patch: PatchOptionsSchema.default({}),
});

export interface ParserOptions {
  readonly extendedAttributeNameCharacters: readonly string[];
}

export interface PatchOptions {
  readonly allowMemberRemoveByValue: boolean;
  readonly coreSchemaUrns: readonly string[];
}

export interface ScimConfig {
  readonly parser: ParserOptions;
  readonly patch: PatchOptions;
}

export type ScimConfigInput = z.input<typeof ScimConfigSchema>;
export type ParserOptionsInput = z.input<typeof ParserOptionsSchema>;
export type PatchOptionsInput = z.input<typeof PatchOptionsSchema>;

export const DEFAULT_PARSER_OPTIONS: ParserOptions = Object.freeze({
  extendedAttributeNameCharacters: Object.freeze([]),
});

export const DEFAULT_PATCH_OPTIONS: PatchOptions = Object.freeze({
  allowMemberRemoveByValue: true,
  coreSchemaUrns: Object.freeze([SCIM_SCHEMAS.USER, SCIM_SCHEMAS.GROUP]),
});

export function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function freezeParserOptions(options: z.output<typeof ParserOptionsSchema>): ParserOptions {
  return Object.freeze({
    extendedAttributeNameCharacters: Object.freeze([...options.extendedAttributeNameCharacters]),
  });
}

function freezePatchOptions(options: z.output<typeof PatchOptionsSchema>): PatchOptions {
  return Object.freeze({
    allowMemberRemoveByValue: options.allowMemberRemoveByValue,
    coreSchemaUrns: Object.freeze([...options.coreSchemaUrns]),
  });
}

/**
 * Validate parser options, filling in defaults.
 * @throws BadRequestException (invalidValue) if the input does not match the schema
 */
export function resolveParserOptions(input: ParserOptionsInput | ParserOptions = {}): ParserOptions {
  const result = ParserOptionsSchema.safeParse(input);
  if (!result.success) {
    throw BadRequestException.invalidValue(`Invalid parser options: ${formatIssues(result.error)}`);
  }
  return freezeParserOptions(result.data);
}

/**
 * Validate patch options, filling in defaults.
 * @throws BadRequestException (invalidValue) if the input does not match the schema
 */
export function resolvePatchOptions(input: PatchOptionsInput | PatchOptions = {}): PatchOptions {
  const result = PatchOptionsSchema.safeParse(input);
  if (!result.success) {
    throw BadRequestException.invalidValue(`Invalid patch options: ${formatIssues(result.error)}`);
  }
  return freezePatchOptions(result.data);
}

/**
 * Validate and freeze a configuration value.
 * @throws BadRequestException (invalidValue) if the input does not match the schema
 */
export function loadScimConfig(input: unknown = {}): ScimConfig {
  const result = ScimConfigSchema.safeParse(input);
  if (!result.success) {
    throw BadRequestException.invalidValue(`Invalid SCIM configuration: ${formatIssues(result.error)}`);
  }

  const config: ScimConfig = Object.freeze({
    parser: freezeParserOptions(result.data.parser),
    patch: freezePatchOptions(result.data.patch),
  });

  log.debug('SCIM configuration loaded', {
    extendedAttributeNameCharacters: config.parser.extendedAttributeNameCharacters.join(''),
    allowMemberRemoveByValue: config.patch.allowMemberRemoveByValue,
    coreSchemaUrns: config.patch.coreSchemaUrns.length,
  });

  return config;
}

/**
 * Build a configuration from environment variables.
 *
 * Environment variables:
 * - SCIM_EXTENDED_ATTRIBUTE_CHARS: characters to accept in attribute names (e.g. "#!")
 * - SCIM_PATCH_MEMBER_REMOVE_BY_VALUE: "true" | "false" (default: "true")
 * - SCIM_CORE_SCHEMA_URNS: comma-separated schema URNs (default: core User and Group)
 *
 * @example
 * const config = scimConfigFromEnv(process.env);
 */
export function scimConfigFromEnv(env: EnvRecord): ScimConfig {
  const extendedChars = env.SCIM_EXTENDED_ATTRIBUTE_CHARS;
  const coreSchemaUrns = parseListFlag(env.SCIM_CORE_SCHEMA_URNS);

  return loadScimConfig({
    parser: {
      extendedAttributeNameCharacters: extendedChars ? Array.from(extendedChars) : [],
    },
    patch: {
      allowMemberRemoveByValue: parseBooleanFlag(env.SCIM_PATCH_MEMBER_REMOVE_BY_VALUE, true),
      ...(coreSchemaUrns && { coreSchemaUrns }),
    },
  });
}
