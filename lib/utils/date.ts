import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);

const ISO_WITH_OFFSET =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parses an ISO-8601 timestamp that carries an explicit UTC offset.
 * Returns epoch milliseconds, or null when the string is not such a timestamp.
 */
export function parseOffsetTimestamp(value: string): number | null {
  if (!ISO_WITH_OFFSET.test(value.trim())) return null;
  const ms = Date.parse(value.trim());
  return Number.isNaN(ms) ? null : ms;
}

const OFFSET_SUFFIX = /T.*(Z|[+-]\d{2}:\d{2})$/i;

export function hasExplicitOffset(value: string): boolean {
  return OFFSET_SUFFIX.test(value.trim());
}

/** Normalizes a timestamp to `toISOString` form. A value without an offset is read as UTC. */
export function toUtcIso(value: string): string | null {
  const parsed = dayjs.utc(value.trim());
  return parsed.isValid() ? parsed.toISOString() : null;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

/**
 * Parses a date or timestamp used as a list filter bound. A bare UTC date used
 * as an end bound covers the whole day.
 */
export function parseDateBound(value: string, edge: 'start' | 'end' = 'start'): number | null {
  const trimmed = value.trim();
  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) return null;
  return edge === 'end' && DATE_ONLY.test(trimmed) ? ms + DAY_MS - 1 : ms;
}

export function secondsBetween(startIso: string, endIso: string): number {
  return Math.max(0, (Date.parse(endIso) - Date.parse(startIso)) / 1000);
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  if (seconds < 60) {
    return `${seconds}s`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m ${seconds % 60}s`;
}
