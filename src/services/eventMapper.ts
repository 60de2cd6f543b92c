// services/eventMapper.ts
// -----------------------------
// SlotSet -> Google Calendar events.insert body.
// Pure: no network, no model, no clock.
// =============================
import type { SlotSet } from "../types/slots";
import type { EventDateTime, GoogleEventBody } from "../types/calendar";
import {
  addMinutesKeepingOffset,
  formatOffsetTimestamp,
  parseOffsetTimestamp,
} from "../lib/zonedTime";

export const DEFAULT_TIMEZONE = "America/New_York";
export const UNTITLED_SUMMARY = "(No title)";

/**
 * `start` + `minutes`, written in the same shape as `start`.
 * Returns undefined when `start` is not an offset-qualified timestamp or the
 * sum runs past year 9999, so callers can ask the user for the end instead.
 */
export function computeEnd(start: string, minutes: number): string | undefined {
  const parsed = parseOffsetTimestamp(start);
  if (!parsed) return undefined;
  const shifted = addMinutesKeepingOffset(parsed, minutes);
  return shifted ? formatOffsetTimestamp(shifted) : undefined;
}

export function toGoogleEvent(
  slots: SlotSet,
  defaultTimezone: string = DEFAULT_TIMEZONE
): GoogleEventBody {
  const timeZone = slots.timezone || defaultTimezone;
  const start = slots.start || undefined;
  let end = slots.end || undefined;

  if (start && !end && slots.duration_minutes !== undefined) {
    end = computeEnd(start, slots.duration_minutes);
  }

  const at = (dateTime: string): EventDateTime => ({ dateTime, timeZone });
  const attendees = (slots.attendees ?? []).filter((a) => a.length > 0);
  const reminders = slots.reminders ?? [];

  return {
    summary: slots.title || UNTITLED_SUMMARY,
    ...(start ? { start: at(start) } : {}),
    ...(end ? { end: at(end) } : {}),
    ...(slots.location ? { location: slots.location } : {}),
    ...(attendees.length ? { attendees: attendees.map((email) => ({ email })) } : {}),
    ...(slots.recurrence ? { recurrence: [slots.recurrence] } : {}),
    ...(reminders.length
      ? { reminders: { useDefault: false as const, overrides: reminders.map((r) => ({ ...r })) } }
      : {}),
  };
}
