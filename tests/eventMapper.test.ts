import { computeEnd, toGoogleEvent } from '../src/services/eventMapper';
import { MAX_DURATION_MINUTES, parseSlotSet } from '../src/schemas/slots.schema';
import type { SlotSet } from '../src/types/slots';

describe('toGoogleEvent', () => {
  it('derives end from start + duration_minutes', () => {
    const slots: SlotSet = {
      intent: 'CreateEvent',
      title: 'Sprint planning',
      start: '2025-09-03T16:00:00-04:00',
      duration_minutes: 45,
      attendees: ['maya@ex.com', 'leo@ex.com'],
    };

    expect(toGoogleEvent(slots)).toEqual({
      summary: 'Sprint planning',
      start: { dateTime: '2025-09-03T16:00:00-04:00', timeZone: 'America/New_York' },
      end: { dateTime: '2025-09-03T16:45:00-04:00', timeZone: 'America/New_York' },
      attendees: [{ email: 'maya@ex.com' }, { email: 'leo@ex.com' }],
    });
  });

  it('keeps an explicit end over the duration', () => {
    const body = toGoogleEvent({
      intent: 'CreateEvent',
      start: '2025-09-03T16:00:00-04:00',
      end: '2025-09-03T18:00:00-04:00',
      duration_minutes: 45,
    });
    expect(body.end?.dateTime).toBe('2025-09-03T18:00:00-04:00');
  });

  it('leaves end unset when start cannot be parsed', () => {
    const body = toGoogleEvent({
      intent: 'CreateEvent',
      start: 'next wednesday',
      duration_minutes: 30,
    });
    expect(body).not.toHaveProperty('end');
    expect(body.start?.dateTime).toBe('next wednesday');
  });

  it('leaves end unset when the duration runs past year 9999', () => {
    const nearMax = toGoogleEvent({
      intent: 'CreateEvent',
      start: '9999-12-31T23:00:00Z',
      duration_minutes: 120,
    });
    expect(nearMax).not.toHaveProperty('end');

    const huge = toGoogleEvent({
      intent: 'CreateEvent',
      start: '2025-09-03T16:00:00-04:00',
      duration_minutes: 1e12,
    });
    expect(huge).not.toHaveProperty('end');
    expect(huge.start?.dateTime).toBe('2025-09-03T16:00:00-04:00');
  });

  it('keeps a Z offset as Z', () => {
    const body = toGoogleEvent({
      intent: 'CreateEvent',
      start: '2025-09-03T23:30:00Z',
      duration_minutes: 60,
    });
    expect(body.end?.dateTime).toBe('2025-09-04T00:30:00Z');
  });

  it('uses the placeholder summary and omits every empty field', () => {
    const body = toGoogleEvent({
      intent: 'CreateEvent',
      title: '',
      location: '',
      attendees: [],
      reminders: [],
    });
    expect(body).toEqual({ summary: '(No title)' });
    expect(Object.values(body).every((v) => v !== null && v !== undefined)).toBe(true);
  });

  it('reshapes location, recurrence and reminders', () => {
    const body = toGoogleEvent({
      intent: 'CreateEvent',
      title: 'Standup',
      start: '2025-09-03T09:00:00+02:00',
      end: '2025-09-03T09:15:00+02:00',
      timezone: 'Europe/Berlin',
      location: 'Room 4',
      recurrence: 'RRULE:FREQ=DAILY;BYDAY=MO,TU,WE,TH,FR',
      reminders: [
        { method: 'popup', minutes: 10 },
        { method: 'email', minutes: 60 },
      ],
    });

    expect(body).toEqual({
      summary: 'Standup',
      start: { dateTime: '2025-09-03T09:00:00+02:00', timeZone: 'Europe/Berlin' },
      end: { dateTime: '2025-09-03T09:15:00+02:00', timeZone: 'Europe/Berlin' },
      location: 'Room 4',
      recurrence: ['RRULE:FREQ=DAILY;BYDAY=MO,TU,WE,TH,FR'],
      reminders: {
        useDefault: false,
        overrides: [
          { method: 'popup', minutes: 10 },
          { method: 'email', minutes: 60 },
        ],
      },
    });
  });

  it('falls back to the caller default timezone', () => {
    const body = toGoogleEvent(
      { intent: 'CreateEvent', start: '2025-09-03T09:00:00+01:00' },
      'Europe/London'
    );
    expect(body.start).toEqual({ dateTime: '2025-09-03T09:00:00+01:00', timeZone: 'Europe/London' });
  });
});

describe('computeEnd', () => {
  it('treats a zero duration as an end equal to start', () => {
    expect(computeEnd('2025-09-03T16:00-04:00', 0)).toBe('2025-09-03T16:00:00-04:00');
  });

  it('returns undefined for offset-less input', () => {
    expect(computeEnd('2025-09-03T16:00:00', 30)).toBeUndefined();
  });
});

describe('duration_minutes at the model boundary', () => {
  it('rejects a duration above the ceiling', () => {
    const result = parseSlotSet({
      intent: 'CreateEvent',
      start: '2025-09-03T16:00:00-04:00',
      duration_minutes: 1e12,
    });
    expect(result.success).toBe(false);
  });

  it('accepts the ceiling itself and maps it to an end 31 days later', () => {
    const result = parseSlotSet({
      intent: 'CreateEvent',
      start: '2025-09-03T16:00:00-04:00',
      duration_minutes: MAX_DURATION_MINUTES,
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(toGoogleEvent(result.data).end?.dateTime).toBe('2025-10-04T16:00:00-04:00');
    }
  });
});
