import {
  addCalendarDays,
  addMinutesKeepingOffset,
  atWallTime,
  formatOffsetTimestamp,
  isValidTimeZone,
  parseOffsetTimestamp,
  wallClockIn,
  zonedIso,
} from '../src/lib/zonedTime';

describe('parseOffsetTimestamp', () => {
  it('parses a timestamp with a numeric offset', () => {
    expect(parseOffsetTimestamp('2025-09-03T16:00:00-04:00')).toEqual({
      year: 2025,
      month: 9,
      day: 3,
      hour: 16,
      minute: 0,
      second: 0,
      offset: '-04:00',
    });
  });

  it('rejects values without an offset', () => {
    expect(parseOffsetTimestamp('2025-09-03T16:00:00')).toBeNull();
  });

  it('rejects impossible calendar values', () => {
    expect(parseOffsetTimestamp('2025-02-30T10:00:00Z')).toBeNull();
    expect(parseOffsetTimestamp('2025-09-03T25:00:00Z')).toBeNull();
  });

  it('rejects free text', () => {
    expect(parseOffsetTimestamp('next wednesday at 4pm')).toBeNull();
  });
});

describe('formatOffsetTimestamp', () => {
  it('writes fraction and offset back as given', () => {
    const parsed = parseOffsetTimestamp('2025-09-03T16:00:00.250Z');
    expect(parsed).not.toBeNull();
    if (parsed) expect(formatOffsetTimestamp(parsed)).toBe('2025-09-03T16:00:00.250Z');
  });

  it('always writes seconds', () => {
    const parsed = parseOffsetTimestamp('2025-09-03T16:00+01:00');
    expect(parsed).not.toBeNull();
    if (parsed) expect(formatOffsetTimestamp(parsed)).toBe('2025-09-03T16:00:00+01:00');
  });
});

describe('addMinutesKeepingOffset', () => {
  it('rolls over midnight and the year without touching the offset', () => {
    const parsed = parseOffsetTimestamp('2025-12-31T23:30:00+05:30');
    expect(parsed).not.toBeNull();
    if (parsed) {
      const shifted = addMinutesKeepingOffset(parsed, 45);
      expect(shifted && formatOffsetTimestamp(shifted)).toBe('2026-01-01T00:15:00+05:30');
    }
  });

  it('returns null past year 9999', () => {
    const parsed = parseOffsetTimestamp('9999-12-31T23:00:00Z');
    expect(parsed).not.toBeNull();
    if (parsed) {
      expect(addMinutesKeepingOffset(parsed, 120)).toBeNull();
      expect(addMinutesKeepingOffset(parsed, 1e12)).toBeNull();
    }
  });
});

describe('zone helpers', () => {
  it('renders an instant in a zone with its offset', () => {
    const instant = new Date('2025-09-01T14:00:00Z');
    expect(zonedIso(instant, 'America/New_York')).toBe('2025-09-01T10:00:00-04:00');
    expect(zonedIso(instant, 'UTC')).toBe('2025-09-01T14:00:00+00:00');
  });

  it('reads the wall clock on the previous day west of UTC', () => {
    expect(wallClockIn(new Date('2025-09-01T02:00:00Z'), 'America/New_York')).toEqual({
      year: 2025,
      month: 8,
      day: 31,
      hour: 22,
      minute: 0,
      second: 0,
    });
  });

  it('uses summer and winter offsets for wall times', () => {
    expect(atWallTime({ year: 2025, month: 9, day: 2 }, 14, 0, 'America/New_York')).toBe(
      '2025-09-02T14:00:00-04:00'
    );
    expect(atWallTime({ year: 2025, month: 1, day: 15 }, 9, 0, 'America/New_York')).toBe(
      '2025-01-15T09:00:00-05:00'
    );
  });

  it('adds calendar days across month ends', () => {
    expect(addCalendarDays({ year: 2024, month: 2, day: 28 }, 2)).toEqual({
      year: 2024,
      month: 3,
      day: 1,
    });
  });

  it('validates IANA zone names', () => {
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
