/**
 * SCIM Error Handling Utilities
 *
 * Errors raised by the filter/path parsers and the PATCH engine. Each
 * ScimException maps directly onto a SCIM error response body
 * (RFC 7644 Section 3.12).
 */

import type { ScimErrorResponse, ScimErrorType } from '../types/scim';
import { SCIM_SCHEMAS } from '../types/scim';

const HTTP_BAD_REQUEST = 400;

/**
 * SCIM Error class
 * Represents a client-facing SCIM protocol error
 */
export class ScimException extends Error {
  public readonly status: number;
  public readonly scimType?: ScimErrorType;
  public readonly detail: string;

  constructor(status: number, detail: string, scimType?: ScimErrorType) {
    super(detail);
    this.name = 'ScimException';
    this.status = status;
    this.detail = detail;
    if (scimType !== undefined) {
      this.scimType = scimType;
    }

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert error to a SCIM error response body
   */
  toJSON(): ScimErrorResponse {
    const response: ScimErrorResponse = {
      schemas: [SCIM_SCHEMAS.ERROR],
      status: this.status.toString(),
    };

    if (this.scimType) {
      response.scimType = this.scimType;
    }
    response.detail = this.detail;

    return response;
  }
}

/**
 * 400 Bad Request
 *
 * `position` is set for parser failures and holds the 0-based offset into
 * the parsed text.
 */
export class BadRequestException extends ScimException {
  public readonly position?: number;

  constructor(detail: string, scimType?: ScimErrorType, position?: number) {
    super(HTTP_BAD_REQUEST, detail, scimType);
    this.name = 'BadRequestException';
    if (position !== undefined) {
      this.position = position;
    }
  }

  static invalidFilter(detail: string, position?: number): BadRequestException {
    return new BadRequestException(detail, 'invalidFilter', position);
  }

  static invalidPath(detail: string, position?: number): BadRequestException {
    return new BadRequestException(detail, 'invalidPath', position);
  }

  static invalidValue(detail: string): BadRequestException {
    return new BadRequestException(detail, 'invalidValue');
  }

  static invalidSyntax(detail: string): BadRequestException {
    return new BadRequestException(detail, 'invalidSyntax');
  }

  static noTarget(detail: string): BadRequestException {
    return new BadRequestException(detail, 'noTarget');
  }
}

/**
 * Raised when an accessor is used on the wrong kind of patch operation.
 * This is a programming error, not a client error, so it carries no status.
 */
export class ScimStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScimStateError';
  }
}

export function isScimException(error: unknown): error is ScimException {
  return error instanceof ScimException;
}
