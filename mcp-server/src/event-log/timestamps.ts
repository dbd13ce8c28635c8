/**
 * Timestamp parsing for log cells and cut-offs.
 *
 * Values without a zone designator are wall-clock times in UTC, whatever the
 * host's timezone.
 */

const NAIVE_ISO = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?)?$/;

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?|\b(?:GMT|UTC)(?:[+-]\d{1,4})?)$/i;

/**
 * Parse a timestamp, returning null when the value is not a valid date
 */
export function parseUtcTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  const naive = NAIVE_ISO.exec(trimmed);

  let parsed: Date;
  if (naive) {
    const [, date, clock = '00:00', seconds = '00', fraction = ''] = naive;
    const millis = fraction.length > 0 ? `.${fraction.slice(0, 3).padEnd(3, '0')}` : '';
    parsed = new Date(`${date}T${clock}:${seconds}${millis}Z`);
  } else if (ZONE_SUFFIX.test(trimmed)) {
    parsed = new Date(trimmed);
  } else {
    // Other zone-less formats: reread the local wall clock as UTC
    const local = new Date(trimmed);
    parsed = new Date(
      Date.UTC(
        local.getFullYear(),
        local.getMonth(),
        local.getDate(),
        local.getHours(),
        local.getMinutes(),
        local.getSeconds(),
        local.getMilliseconds()
      )
    );
  }

  return isNaN(parsed.getTime()) ? null : parsed;
}
