// lib/zonedTime.ts
// -----------------------------
// Wall-clock and offset helpers on top of Intl.
// Offset-qualified timestamps are wall clock + fixed offset text; the host's
// local zone is never consulted.
// =============================
import { addMinutes, isValid } from "date-fns";

export type CalendarDate = { year: number; month: number; day: number };

export type WallClock = CalendarDate & {
  hour: number;
  minute: number;
  second: number;
};

/** A parsed "YYYY-MM-DDTHH:mm[:ss[.fff]](Z|±HH:MM)" value. */
export type OffsetTimestamp = WallClock & {
  /** Fraction digits exactly as written, without the dot */
  fraction?: string;
  /** "Z" or "±HH:MM", exactly as written */
  offset: string;
};

const OFFSET_TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:\d{2})$/;

const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function zonedParts(instant: Date, timeZone: string): WallClock & { offset: string } {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "longOffset",
  }).formatToParts(instant);

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "";

  // "GMT-04:00", or plain "GMT" for UTC
  const gmt = get("timeZoneName").replace(/^GMT/, "");

  return {
    year: Number(get("year")),
    month: Number(get("month")),
    day: Number(get("day")),
    hour: Number(get("hour")),
    minute: Number(get("minute")),
    second: Number(get("second")),
    offset: gmt === "" ? "+00:00" : gmt,
  };
}

/** Wall clock of `instant` as seen in `timeZone`. */
export function wallClockIn(instant: Date, timeZone: string): WallClock {
  const { year, month, day, hour, minute, second } = zonedParts(instant, timeZone);
  return { year, month, day, hour, minute, second };
}

/** UTC offset ("±HH:MM") of `timeZone` at `instant`. */
export function offsetAt(instant: Date, timeZone: string): string {
  return zonedParts(instant, timeZone).offset;
}

function offsetMinutes(offset: string): number {
  if (offset === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const [hh, mm] = offset.slice(1).split(":").map(Number);
  return sign * (hh * 60 + mm);
}

/** `instant` rendered as "YYYY-MM-DDTHH:mm:ss±HH:MM" in `timeZone`. */
export function zonedIso(instant: Date, timeZone: string): string {
  return formatOffsetTimestamp(zonedParts(instant, timeZone));
}

/** Calendar date `days` after `date`. */
export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/** Wall time on `date` in `timeZone`, with the offset the zone has at that moment. */
export function atWallTime(
  date: CalendarDate,
  hour: number,
  minute: number,
  timeZone: string
): string {
  const naive = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  // Two passes settle the offset on DST transition days.
  const firstGuess = offsetMinutes(offsetAt(new Date(naive), timeZone));
  const offset = offsetAt(new Date(naive - firstGuess * 60_000), timeZone);
  return formatOffsetTimestamp({ ...date, hour, minute, second: 0, offset });
}

export function parseOffsetTimestamp(value: string): OffsetTimestamp | null {
  const m = OFFSET_TIMESTAMP_RE.exec(value.trim());
  if (!m) return null;

  const [, y, mo, d, h, mi, s, fraction, offset] = m;
  const wall: WallClock = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h),
    minute: Number(mi),
    second: s ? Number(s) : 0,
  };

  // Reject rollovers such as 2025-02-30 or 25:00
  const probe = new Date(
    Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second)
  );
  if (
    !isValid(probe) ||
    probe.getUTCFullYear() !== wall.year ||
    probe.getUTCMonth() + 1 !== wall.month ||
    probe.getUTCDate() !== wall.day ||
    probe.getUTCHours() !== wall.hour ||
    probe.getUTCMinutes() !== wall.minute
  ) {
    return null;
  }
  if (offset !== "Z" && Math.abs(offsetMinutes(offset)) > 18 * 60) return null;

  return { ...wall, fraction, offset };
}

export function isOffsetTimestamp(value: string): boolean {
  return parseOffsetTimestamp(value) !== null;
}

/** Seconds are always written; fraction and offset are written back verbatim. */
export function formatOffsetTimestamp(ts: OffsetTimestamp): string {
  const date = `${pad(ts.year, 4)}-${pad(ts.month)}-${pad(ts.day)}`;
  const time = `${pad(ts.hour)}:${pad(ts.minute)}:${pad(ts.second)}`;
  const fraction = ts.fraction ? `.${ts.fraction}` : "";
  return `${date}T${time}${fraction}${ts.offset}`;
}

const MAX_YEAR = 9999;

/**
 * Shift the wall clock by `minutes`, keeping the timestamp's own offset.
 * Null when the result leaves the four-digit year range.
 */
export function addMinutesKeepingOffset(
  ts: OffsetTimestamp,
  minutes: number
): OffsetTimestamp | null {
  const naive = new Date(Date.UTC(ts.year, ts.month - 1, ts.day, ts.hour, ts.minute, ts.second));
  const shifted = addMinutes(naive, minutes);
  if (!isValid(shifted) || shifted.getUTCFullYear() > MAX_YEAR) return null;
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
    fraction: ts.fraction,
    offset: ts.offset,
  };
}

/** Absolute instant (ms since epoch) of a parsed timestamp. */
export function toEpochMs(ts: OffsetTimestamp): number {
  const naive = Date.UTC(ts.year, ts.month - 1, ts.day, ts.hour, ts.minute, ts.second);
  return naive - offsetMinutes(ts.offset) * 60_000;
}
