import type { Reminder } from "./slots";

//  GoogleEventBody: request body for Calendar `events.insert`
// -----------------------------
// - Only the fields the mapper can fill.
// - Optional fields are left out entirely when empty; never `null`.
// =============================

export type EventDateTime = {
  /** Offset-qualified ISO 8601 timestamp */
  dateTime: string;
  /** IANA zone label the provider should display the event in */
  timeZone: string;
};

export type EventAttendee = {
  email: string;
};

export type GoogleEventBody = {
  summary: string;
  start?: EventDateTime;
  end?: EventDateTime;
  location?: string;
  attendees?: EventAttendee[];
  recurrence?: string[];
  reminders?: {
    useDefault: false;
    overrides: Reminder[];
  };
};

export type MissingField = "title" | "start" | "end";

export interface CalendarInserter {
  /** Inserts the event and resolves to the provider's event id. */
  insertEvent(body: GoogleEventBody): Promise<string>;
}
