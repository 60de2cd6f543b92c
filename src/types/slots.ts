//  SlotSet: what the NLU step hands to the mapper
// -----------------------------
// - One intent plus whatever slots the model was confident about.
// - `start` / `end` are always offset-qualified ISO 8601 strings
//   (e.g. "2025-09-03T16:00:00-04:00"), never bare wall-clock values.
// - Attendees are copied from the utterance as written, never synthesized.
// =============================

export const INTENTS = [
  "CreateEvent",
  "MoveEvent",
  "CancelEvent",
  "AddInvitees",
  "QueryFreeTime",
] as const;

export type Intent = (typeof INTENTS)[number];

export const REMINDER_METHODS = ["popup", "email"] as const;

export type ReminderMethod = (typeof REMINDER_METHODS)[number];

export type Reminder = {
  method: ReminderMethod;
  minutes: number;
};

export type SlotSet = {
  intent: Intent;

  /** Free-text event title, becomes the calendar `summary` */
  title?: string;

  /** Offset-qualified start, e.g. "2025-09-03T16:00:00-04:00" */
  start?: string;

  /** Offset-qualified end; derived from start + duration_minutes when missing */
  end?: string;

  duration_minutes?: number;

  /** IANA zone name (e.g. "America/New_York") */
  timezone?: string;

  location?: string;

  /** Emails or names exactly as the user wrote them, in order */
  attendees?: string[];

  /** A single RRULE string, passed through unvalidated */
  recurrence?: string;

  reminders?: Reminder[];
};

//  Extraction input shared by every strategy
// =============================
export type ExtractInput = {
  utterance: string;
  /** Anchor for "tomorrow", "next Wednesday", ... */
  referenceTime: Date;
  timezone: string;
};

export type ExtractorStrategy = "openai" | "ollama";

export interface SlotExtractor {
  readonly strategy: ExtractorStrategy;
  /** Resolves to a well-formed slot set on every path; never rejects. */
  extract(input: ExtractInput): Promise<SlotSet>;
}

/** Inert result: nothing actionable was extracted. */
export function queryFreeTime(): SlotSet {
  return { intent: "QueryFreeTime" };
}
