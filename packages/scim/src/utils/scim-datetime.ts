/**
 * SCIM dateTime handling (RFC 7643 Section 2.3.5, xsd:dateTime)
 *
 * Values compare as instants, so `2024-01-01T09:00:00+09:00` equals
 * `2024-01-01T00:00:00.000Z`.
 */

const DATE_TIME_PATTERN =
  /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})$/i;

interface DateTimeParts {
  /** Epoch milliseconds */
  instant: number;
  /** Fraction digits below the millisecond, without trailing zeros */
  subMillis: string;
}

function parseParts(text: string): DateTimeParts | undefined {
  const match = DATE_TIME_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const [, date, time, fraction = '', zone] = match;
  // Date.parse only takes millisecond precision and HH:MM offsets
  const millis = fraction.padEnd(3, '0').substring(0, 3);
  const offset =
    zone.toUpperCase() === 'Z'
      ? 'Z'
      : zone.includes(':')
        ? zone
        : `${zone.substring(0, 3)}:${zone.substring(3)}`;

  const instant = Date.parse(`${date}T${time}.${millis}${offset}`);
  if (Number.isNaN(instant)) {
    return undefined;
  }
  return { instant, subMillis: fraction.substring(3).replace(/0+$/, '') };
}

/**
 * Parse a dateTime string into epoch milliseconds.
 * Returns undefined when the text is not a complete date-time with a zone.
 */
export function parseDateTime(text: string): number | undefined {
  return parseParts(text)?.instant;
}

/**
 * Order two dateTime strings as instants (-1, 0 or 1), including fraction
 * digits below the millisecond. Undefined unless both are dateTimes.
 */
export function compareDateTimes(a: string, b: string): number | undefined {
  const left = parseParts(a);
  const right = parseParts(b);
  if (!left || !right) {
    return undefined;
  }
  if (left.instant !== right.instant) {
    return Math.sign(left.instant - right.instant);
  }
  const length = Math.max(left.subMillis.length, right.subMillis.length);
  const l = left.subMillis.padEnd(length, '0');
  const r = right.subMillis.padEnd(length, '0');
  return l < r ? -1 : l > r ? 1 : 0;
}

export function isDateTime(text: string): boolean {
  return parseDateTime(text) !== undefined;
}

/**
 * Render a date in the canonical SCIM form (UTC, millisecond precision).
 */
export function formatDateTime(date: Date): string {
  return date.toISOString();
}
