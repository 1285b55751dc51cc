// server/time.ts
// Clinic-local time helpers and natural formatting for spoken prompts

import dayjs, { type Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import customParseFormat from "dayjs/plugin/customParseFormat.js";

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

/**
 * Current instant viewed in the clinic's timezone
 */
export function clinicNow(tz: string, now: Date = new Date()): Dayjs {
  return dayjs(now).tz(tz);
}

/**
 * Parse a clinic-local wall time, e.g. ("2026-10-20", "14:00") → 2:00pm that day in tz
 */
export function atClinicTime(date: string, clock: string, tz: string): Dayjs {
  return dayjs.tz(`${date} ${clock}`, "YYYY-MM-DD HH:mm", tz);
}

/**
 * Date-only string (YYYY-MM-DD) of an instant in the clinic's timezone
 */
export function localDate(iso: string, tz: string): string {
  return dayjs(iso).tz(tz).format("YYYY-MM-DD");
}

/**
 * "2 PM", "2:30 PM"
 */
export function speakTime(iso: string, tz: string): string {
  const d = dayjs(iso).tz(tz);
  return d.minute() === 0 ? d.format("h A") : d.format("h:mm A");
}

/**
 * "Tuesday, October 20"
 */
export function speakDay(isoOrDate: string, tz: string): string {
  const d = /^\d{4}-\d{2}-\d{2}$/.test(isoOrDate) ? dayjs.tz(isoOrDate, tz) : dayjs(isoOrDate).tz(tz);
  return d.format("dddd, MMMM D");
}

/**
 * "Tuesday, October 20 at 2 PM"
 */
export function speakDateTime(iso: string, tz: string): string {
  return `${speakDay(iso, tz)} at ${speakTime(iso, tz)}`;
}

/**
 * "9 AM" from a clock string like "09:00"
 */
export function speakClock(clock: string): string {
  const [h, m] = clock.split(":").map(Number);
  const h12 = ((h + 11) % 12) + 1;
  const ampm = h < 12 ? "AM" : "PM";
  return m === 0 ? `${h12} ${ampm}` : `${h12}:${String(m).padStart(2, "0")} ${ampm}`;
}

/**
 * Join items the way people say lists: "a", "a or b", "a, b, or c"
 */
export function speakList(items: string[], conjunction: "and" | "or" = "and"): string {
  if (items.length === 0) return "";
  if (items.length === 1) return items[0];
  if (items.length === 2) return `${items[0]} ${conjunction} ${items[1]}`;
  return `${items.slice(0, -1).join(", ")}, ${conjunction} ${items[items.length - 1]}`;
}

/**
 * Clock time (HH:mm) of an instant in the clinic's timezone
 */
export function localClock(iso: string, tz: string): string {
  return dayjs(iso).tz(tz).format("HH:mm");
}

/**
 * Calendar arithmetic on YYYY-MM-DD strings, independent of DST
 */
export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, "day").format("YYYY-MM-DD");
}

/**
 * Half-open ISO range covering `days` whole clinic-local days starting at `date`
 */
export function clinicDayRange(date: string, tz: string, days = 1): { from: string; to: string } {
  return {
    from: atClinicTime(date, "00:00", tz).toISOString(),
    to: atClinicTime(addDays(date, days), "00:00", tz).toISOString(),
  };
}
