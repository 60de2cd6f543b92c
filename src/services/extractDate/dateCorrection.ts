// services/extractDate/dateCorrection.ts
// -----------------------------
// Small local models tend to answer with dates in a stale year taken from
// their training data. When a timestamp carries that placeholder year we
// assume "tomorrow" was meant.
//
// Known-fragile: this is a guess keyed on one specific year, not a date
// resolver. Anything else is passed through untouched.
// =============================
import type { SlotSet } from "../../types/slots";
import {
  addCalendarDays,
  formatOffsetTimestamp,
  parseOffsetTimestamp,
  toEpochMs,
  wallClockIn,
  type CalendarDate,
  type OffsetTimestamp,
} from "../../lib/zonedTime";

export const DEFAULT_PLACEHOLDER_YEAR = 2023;

export type DateCorrectionContext = {
  /** Real "now"; tomorrow is computed from its calendar date in `timezone` */
  now: Date;
  timezone: string;
  placeholderYear?: number;
};

function moveToDate(ts: OffsetTimestamp, date: CalendarDate): OffsetTimestamp {
  return { ...ts, year: date.year, month: date.month, day: date.day };
}

/**
 * A stale `start` moves to tomorrow. A stale `end` moves to the (corrected)
 * start's day, or to tomorrow when there is no start; if that puts it at or
 * before the start it is an overnight span and moves one more day.
 * Time-of-day, fraction and offset text are kept as extracted.
 */
export function correctPlaceholderDates(slots: SlotSet, ctx: DateCorrectionContext): SlotSet {
  const placeholderYear = ctx.placeholderYear ?? DEFAULT_PLACEHOLDER_YEAR;
  const today = wallClockIn(ctx.now, ctx.timezone);
  const tomorrow = addCalendarDays(today, 1);

  const start = slots.start ? parseOffsetTimestamp(slots.start) : null;
  const end = slots.end ? parseOffsetTimestamp(slots.end) : null;

  const startStale = start !== null && start.year === placeholderYear;
  const endStale = end !== null && end.year === placeholderYear;
  if (!startStale && !endStale) return slots;

  const fixedStart = start && startStale ? moveToDate(start, tomorrow) : start;
  let fixedEnd = end && endStale ? moveToDate(end, fixedStart ?? tomorrow) : end;

  if (fixedStart && fixedEnd && endStale && toEpochMs(fixedEnd) <= toEpochMs(fixedStart)) {
    fixedEnd = moveToDate(fixedEnd, addCalendarDays(fixedEnd, 1));
  }

  const corrected: SlotSet = { ...slots };
  if (fixedStart && startStale) corrected.start = formatOffsetTimestamp(fixedStart);
  if (fixedEnd && endStale) corrected.end = formatOffsetTimestamp(fixedEnd);

  console.warn(
    `Corrected placeholder year ${placeholderYear}: start=${corrected.start ?? "-"} end=${corrected.end ?? "-"}`
  );
  return corrected;
}
