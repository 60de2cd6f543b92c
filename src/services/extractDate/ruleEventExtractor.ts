// services/extractDate/ruleEventExtractor.ts
// -----------------------------
// Last-resort keyword matcher used when the local model is unreachable or
// answers with something we cannot decode. Canned slot sets only.
// =============================
import { queryFreeTime, type ExtractInput, type SlotSet } from "../../types/slots";
import { addCalendarDays, atWallTime, wallClockIn } from "../../lib/zonedTime";

const CANCEL_RE = /\b(cancel|call off)\b/;

type CannedEvent = {
  keyword: RegExp;
  title: string;
  startHour: number;
  endHour: number;
};

// First match wins.
const CANNED_EVENTS: CannedEvent[] = [
  { keyword: /meeting/, title: "Meeting", startHour: 14, endHour: 15 },
  { keyword: /lunch/, title: "Lunch Meeting", startHour: 12, endHour: 13 },
];

export function extractRules(input: ExtractInput): SlotSet {
  const text = input.utterance.toLowerCase();

  if (CANCEL_RE.test(text)) return { intent: "CancelEvent" };

  const canned = CANNED_EVENTS.find((c) => c.keyword.test(text));
  if (!canned) return queryFreeTime();

  const tomorrow = addCalendarDays(wallClockIn(input.referenceTime, input.timezone), 1);
  return {
    intent: "CreateEvent",
    title: canned.title,
    start: atWallTime(tomorrow, canned.startHour, 0, input.timezone),
    end: atWallTime(tomorrow, canned.endHour, 0, input.timezone),
    timezone: input.timezone,
  };
}
