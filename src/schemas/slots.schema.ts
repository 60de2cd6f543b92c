// schemas/slots.schema.ts
// -----------------------------
// One contract for every model payload:
// - SlotSetSchema (zod) validates whatever comes back from a model
// - SLOT_SET_JSON_SCHEMA is the tool definition the hosted model must fill
// =============================
import { z } from "zod";
import { INTENTS, REMINDER_METHODS, type SlotSet } from "../types/slots";
import { isOffsetTimestamp, isValidTimeZone } from "../lib/zonedTime";

// Models answer `null` or "" for slots they could not fill; both mean "absent".
const optionalText = z
  .string()
  .nullish()
  .transform((v) => {
    const t = v?.trim();
    return t ? t : undefined;
  });

const optionalTimestamp = (field: "start" | "end") =>
  optionalText.transform((v) => {
    if (v === undefined) return undefined;
    if (!isOffsetTimestamp(v)) {
      console.warn(`Dropping ${field} without a UTC offset: ${v}`);
      return undefined;
    }
    return v;
  });

const optionalTimeZone = optionalText.transform((v) => {
  if (v === undefined) return undefined;
  if (!isValidTimeZone(v)) {
    console.warn(`Dropping unknown timezone: ${v}`);
    return undefined;
  }
  return v;
});

/** 31 days */
export const MAX_DURATION_MINUTES = 44_640;
/** Four weeks, the provider's reminder ceiling */
export const MAX_REMINDER_MINUTES = 40_320;

// Small models sometimes quote numbers: "45" reads as 45.
const wholeMinutes = (max: number) =>
  z.preprocess(
    (v) => (typeof v === "string" && /^\s*\d+\s*$/.test(v) ? Number(v.trim()) : v),
    z.number().int().nonnegative().max(max)
  );

export const ReminderSchema = z.object({
  method: z.enum(REMINDER_METHODS),
  minutes: wholeMinutes(MAX_REMINDER_MINUTES),
});

const RawSlotSetSchema = z.object({
  intent: z.enum(INTENTS),
  title: optionalText,
  start: optionalTimestamp("start"),
  end: optionalTimestamp("end"),
  duration_minutes: wholeMinutes(MAX_DURATION_MINUTES).nullish(),
  timezone: optionalTimeZone,
  location: optionalText,
  attendees: z
    .array(z.string())
    .nullish()
    .transform((list) => (list ?? []).map((a) => a.trim()).filter((a) => a.length > 0)),
  recurrence: optionalText,
  reminders: z.array(ReminderSchema).nullish(),
});

export const SlotSetSchema = RawSlotSetSchema.transform((raw): SlotSet => {
  const slots: SlotSet = { intent: raw.intent };
  if (raw.title !== undefined) slots.title = raw.title;
  if (raw.start !== undefined) slots.start = raw.start;
  if (raw.end !== undefined) slots.end = raw.end;
  if (raw.duration_minutes != null) slots.duration_minutes = raw.duration_minutes;
  if (raw.timezone !== undefined) slots.timezone = raw.timezone;
  if (raw.location !== undefined) slots.location = raw.location;
  if (raw.attendees.length > 0) slots.attendees = raw.attendees;
  if (raw.recurrence !== undefined) slots.recurrence = raw.recurrence;
  if (raw.reminders && raw.reminders.length > 0) slots.reminders = raw.reminders;
  return slots;
});

export function parseSlotSet(payload: unknown) {
  return SlotSetSchema.safeParse(payload);
}

/* ============================ Tool JSON schema ============================ */

// Strict function calling wants every property listed in `required`;
// optional slots are therefore nullable instead of omitted.
const nullable = (type: "string" | "integer") => ({ type: [type, "null"] });

export const SLOT_SET_JSON_SCHEMA = {
  type: "object",
  properties: {
    intent: { type: "string", enum: [...INTENTS] },
    title: nullable("string"),
    start: {
      ...nullable("string"),
      description: "RFC3339 with offset, e.g. 2025-09-03T16:00:00-04:00",
    },
    end: {
      ...nullable("string"),
      description: "RFC3339 with offset, e.g. 2025-09-03T16:45:00-04:00",
    },
    duration_minutes: nullable("integer"),
    timezone: { ...nullable("string"), description: "IANA timezone name" },
    location: nullable("string"),
    attendees: {
      type: ["array", "null"],
      items: { type: "string", description: "email or name as provided" },
    },
    recurrence: { ...nullable("string"), description: "RFC5545 RRULE (optional)" },
    reminders: {
      type: ["array", "null"],
      items: {
        type: "object",
        properties: {
          method: { type: "string", enum: [...REMINDER_METHODS] },
          minutes: { type: "integer" },
        },
        required: ["method", "minutes"],
        additionalProperties: false,
      },
    },
  },
  required: [
    "intent",
    "title",
    "start",
    "end",
    "duration_minutes",
    "timezone",
    "location",
    "attendees",
    "recurrence",
    "reminders",
  ],
  additionalProperties: false,
} as const;
