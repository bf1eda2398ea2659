/**
 * Environment Flag Utilities
 *
 * Reads deploy-time settings from a plain environment record
 * (typically `process.env`). Unset or malformed values fall back to the
 * supplied default.
 */

/**
 * Environment variable record, as exposed by `process.env`.
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Parse a boolean flag.
 *
 * Accepts `true`/`false`, `1`/`0`, `yes`/`no` and `on`/`off`, case-insensitively.
 *
 * @param value - Raw environment value
 * @param defaultValue - Value used when the flag is unset or unrecognized
 */
export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      return defaultValue;
  }
}

/**
 * Parse a comma-separated list flag (e.g. `SCIM_CORE_SCHEMA_URNS=urn:a,urn:b`).
 *
 * Entries are trimmed and empty entries dropped. Returns `undefined` when
 * the flag is unset or yields no entries, so callers can keep their default.
 */
export function parseListFlag(value: string | undefined, separator = ','): string[] | undefined {
  if (!value) {
    return undefined;
  }

  const entries = value
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return entries.length > 0 ? entries : undefined;
}
