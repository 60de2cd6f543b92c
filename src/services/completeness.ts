import type { SlotSet } from "../types/slots";
import type { MissingField } from "../types/calendar";

/**
 * Fields a follow-up question should ask for before a CreateEvent can be booked.
 * Advisory only; other intents always come back empty.
 */
export function findMissingFields(slots: SlotSet): MissingField[] {
  if (slots.intent !== "CreateEvent") return [];

  const hasDuration = slots.duration_minutes !== undefined;
  const missing: MissingField[] = [];
  if (!slots.title) missing.push("title");
  if (!slots.start && !hasDuration) missing.push("start");
  if (!slots.end && !hasDuration) missing.push("end");
  return missing;
}
