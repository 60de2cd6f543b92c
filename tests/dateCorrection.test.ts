import { correctPlaceholderDates } from '../src/services/extractDate/dateCorrection';
import type { SlotSet } from '../src/types/slots';

// 10:00 in New York on 2025-09-01
const now = new Date('2025-09-01T14:00:00Z');
const ctx = { now, timezone: 'America/New_York', placeholderYear: 2023 };

describe('correctPlaceholderDates', () => {
  let warn: jest.SpyInstance;
  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => warn.mockRestore());

  it('moves a placeholder-year start to tomorrow, keeping time and offset', () => {
    const corrected = correctPlaceholderDates(
      {
        intent: 'CreateEvent',
        title: 'Review',
        start: '2023-05-10T16:00:00-04:00',
        end: '2023-05-10T16:45:00-04:00',
      },
      ctx
    );
    expect(corrected).toEqual({
      intent: 'CreateEvent',
      title: 'Review',
      start: '2025-09-02T16:00:00-04:00',
      end: '2025-09-02T16:45:00-04:00',
    });
  });

  it('returns the same slot set when no year matches', () => {
    const slots: SlotSet = { intent: 'CreateEvent', start: '2025-09-05T10:00:00-04:00' };
    expect(correctPlaceholderDates(slots, ctx)).toBe(slots);
    expect(warn).not.toHaveBeenCalled();
  });

  it('pushes an overnight end to the following day', () => {
    const corrected = correctPlaceholderDates(
      {
        intent: 'CreateEvent',
        start: '2023-05-10T23:00:00-04:00',
        end: '2023-05-11T01:00:00-04:00',
      },
      ctx
    );
    expect(corrected.start).toBe('2025-09-02T23:00:00-04:00');
    expect(corrected.end).toBe('2025-09-03T01:00:00-04:00');
  });

  it('places a stale end on the day of a plausible start', () => {
    const corrected = correctPlaceholderDates(
      {
        intent: 'CreateEvent',
        start: '2025-09-05T10:00:00-04:00',
        end: '2023-01-01T11:00:00-04:00',
      },
      ctx
    );
    expect(corrected.start).toBe('2025-09-05T10:00:00-04:00');
    expect(corrected.end).toBe('2025-09-05T11:00:00-04:00');
  });

  it('moves a stale end without a start to tomorrow', () => {
    const corrected = correctPlaceholderDates(
      { intent: 'MoveEvent', title: 'Retro', end: '2023-05-10T17:30:00-04:00' },
      ctx
    );
    expect(corrected).toEqual({
      intent: 'MoveEvent',
      title: 'Retro',
      end: '2025-09-02T17:30:00-04:00',
    });
  });

  it('computes tomorrow in the supplied zone, not in UTC', () => {
    // 22:00 on 2025-09-01 in New York, already 2025-09-02 in UTC
    const lateEvening = new Date('2025-09-02T02:00:00Z');
    const corrected = correctPlaceholderDates(
      { intent: 'CreateEvent', start: '2023-03-03T08:00:00-04:00' },
      { ...ctx, now: lateEvening }
    );
    expect(corrected.start).toBe('2025-09-02T08:00:00-04:00');
  });

  it('keeps fractional seconds and a foreign offset verbatim', () => {
    const corrected = correctPlaceholderDates(
      { intent: 'CreateEvent', start: '2023-05-10T09:30:15.5+02:00' },
      { now, timezone: 'Europe/Berlin', placeholderYear: 2023 }
    );
    expect(corrected.start).toBe('2025-09-02T09:30:15.5+02:00');
  });

  it('honours a configured placeholder year', () => {
    const corrected = correctPlaceholderDates(
      { intent: 'CreateEvent', start: '2024-01-10T14:00:00-05:00' },
      { ...ctx, placeholderYear: 2024 }
    );
    expect(corrected.start).toBe('2025-09-02T14:00:00-05:00');
  });

  it('leaves unparseable timestamps alone', () => {
    const slots: SlotSet = { intent: 'CreateEvent', start: 'tomorrow at 4' };
    expect(correctPlaceholderDates(slots, ctx)).toBe(slots);
  });
});
