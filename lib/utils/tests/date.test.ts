import { describe, expect, it } from 'vitest';
import {
  formatDuration,
  hasExplicitOffset,
  parseDateBound,
  parseOffsetTimestamp,
  secondsBetween,
  toUtcIso,
} from '@/lib/utils/date';

describe('parseOffsetTimestamp', () => {
  it('accepts timestamps with Z or a numeric offset', () => {
    expect(parseOffsetTimestamp('2025-09-11T06:00:00Z')).toBe(Date.UTC(2025, 8, 11, 6, 0, 0));
    expect(parseOffsetTimestamp('2025-09-11T14:00:00+08:00')).toBe(Date.UTC(2025, 8, 11, 6, 0, 0));
    expect(parseOffsetTimestamp('2025-09-11T14:00+08:00')).toBe(Date.UTC(2025, 8, 11, 6, 0, 0));
  });

  it('rejects timestamps without an offset', () => {
    expect(parseOffsetTimestamp('2025-09-11T14:00:00')).toBeNull();
    expect(parseOffsetTimestamp('2025-09-11')).toBeNull();
    expect(parseOffsetTimestamp('2025-09-11T14:00:00+0800')).toBeNull();
  });
});

describe('toUtcIso', () => {
  it('converts offset timestamps to UTC', () => {
    expect(toUtcIso('2025-01-01T09:00:00+02:00')).toBe('2025-01-01T07:00:00.000Z');
    expect(toUtcIso('2025-01-01T09:00:00Z')).toBe('2025-01-01T09:00:00.000Z');
  });

  it('reads a timestamp without an offset as UTC', () => {
    expect(toUtcIso('2025-01-01T12:00:00')).toBe('2025-01-01T12:00:00.000Z');
    expect(toUtcIso(' 2025-01-01T12:00:00.250 ')).toBe('2025-01-01T12:00:00.250Z');
  });

  it('returns null for unparseable input', () => {
    expect(toUtcIso('teatime')).toBeNull();
  });
});

describe('hasExplicitOffset', () => {
  it('looks for Z or a numeric offset after the time', () => {
    expect(hasExplicitOffset('2025-01-01T12:00:00Z')).toBe(true);
    expect(hasExplicitOffset('2025-01-01T12:00:00-05:00')).toBe(true);
    expect(hasExplicitOffset('2025-01-01T12:00:00')).toBe(false);
    expect(hasExplicitOffset('2025-01-01')).toBe(false);
  });
});

describe('parseDateBound', () => {
  it('extends a bare end date to the end of that day', () => {
    expect(parseDateBound('2025-01-01')).toBe(Date.UTC(2025, 0, 1));
    expect(parseDateBound('2025-01-01', 'end')).toBe(Date.UTC(2025, 0, 1, 23, 59, 59, 999));
    expect(parseDateBound('2025-01-01T10:00:00Z', 'end')).toBe(Date.UTC(2025, 0, 1, 10));
  });

  it('returns null for unparseable input', () => {
    expect(parseDateBound('someday')).toBeNull();
  });
});

describe('secondsBetween', () => {
  it('measures fractional seconds and never goes negative', () => {
    expect(secondsBetween('2025-01-01T00:00:00.000Z', '2025-01-01T00:00:01.500Z')).toBe(1.5);
    expect(secondsBetween('2025-01-01T00:00:10Z', '2025-01-01T00:00:00Z')).toBe(0);
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [45.9, '45s'],
    [300, '5m 0s'],
    [3723, '1h 2m 3s'],
    [90061, '25h 1m 1s'],
  ])('formats %s seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});
