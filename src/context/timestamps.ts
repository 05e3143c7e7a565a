// pattern: Functional Core

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Read a timestamp as UTC. Strings without a zone designator are taken as UTC
 * wall-clock time rather than local time, so the clock value is never shifted.
 */
export function toUtcDate(value: Date | string): Date {
  if (value instanceof Date) {
    return value;
  }
  const normalized = value.trim().replace(' ', 'T');
  return new Date(ZONE_SUFFIX.test(normalized) ? normalized : `${normalized}Z`);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Human-readable UTC time used inside system messages and packaged events,
 * e.g. `2024-03-05 01:07:09 PM UTC+0000`.
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getUTCHours();
  const meridiem = hours < 12 ? 'AM' : 'PM';
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(hours12)}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time} ${meridiem} UTC+0000`;
}
