/**
 * Date Parser Utility
 * Resolves natural language day and time phrases against the clinic's calendar
 */

import dayjs, { type Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import { WEEKDAYS, type TimeOfDay } from "@shared/schema";

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];
const MONTH_ABBRS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const NUMBER_WORDS: Record<string, number> = {
  a: 1, an: 1, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7,
};

const TIME_OF_DAY_WINDOWS: Record<TimeOfDay, { start: string; end: string }> = {
  morning: { start: "00:00", end: "12:00" },
  afternoon: { start: "12:00", end: "17:00" },
  evening: { start: "17:00", end: "24:00" },
};

function monthIndex(word: string): number {
  const full = MONTHS.indexOf(word);
  if (full !== -1) return full;
  return MONTH_ABBRS.indexOf(word.slice(0, 3));
}

/**
 * Build a date in the same timezone as `today`, or null when it doesn't exist (e.g. Feb 30)
 */
function makeDate(today: Dayjs, year: number, month: number, day: number): Dayjs | null {
  const candidate = today.startOf("day").year(year).month(month).date(1).add(day - 1, "day");
  if (candidate.month() !== month || candidate.date() !== day) return null;
  return candidate;
}

/**
 * Next occurrence of a weekday strictly after today ("next tuesday" on a Tuesday is a week away)
 */
function nextWeekday(today: Dayjs, target: number): Dayjs {
  let delta = (target - today.day() + 7) % 7;
  if (delta === 0) delta = 7;
  return today.add(delta, "day");
}

/**
 * Resolve the first date expression found in an utterance to YYYY-MM-DD.
 * Handles: "today", "tomorrow", "day after tomorrow", weekdays with optional
 * "this"/"next"/"coming", "in 3 days", "in two weeks", "october 23rd", "23rd of october",
 * "the 23rd", and ISO dates. Past dates resolve to undefined.
 *
 * @param today - the current clinic-local day
 */
export function resolveDateExpression(text: string, today: Dayjs): string | undefined {
  const expr = text.toLowerCase();
  const startOfToday = today.startOf("day");
  const accept = (d: Dayjs | null): string | undefined =>
    d && !d.isBefore(startOfToday, "day") ? d.format("YYYY-MM-DD") : undefined;

  const iso = expr.match(/\b(\d{4})-(\d{2})-(\d{2})\b/);
  if (iso) {
    return accept(makeDate(today, Number(iso[1]), Number(iso[2]) - 1, Number(iso[3])));
  }

  if (/\bday after tomorrow\b/.test(expr)) return accept(startOfToday.add(2, "day"));
  if (/\btomorrow\b/.test(expr)) return accept(startOfToday.add(1, "day"));
  if (/\btoday\b/.test(expr)) return accept(startOfToday);

  const weekdayMatch = expr.match(
    /\b(?:(this|next|coming)\s+)?(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/
  );
  if (weekdayMatch) {
    const target = WEEKDAYS.findIndex((d) => d === weekdayMatch[2]);
    if (weekdayMatch[1] === "this" && today.day() === target) return accept(startOfToday);
    return accept(nextWeekday(startOfToday, target));
  }

  const relative = expr.match(/\bin\s+(\d+|a|an|one|two|three|four|five|six|seven)\s+(days?|weeks?)\b/);
  if (relative) {
    const amount = NUMBER_WORDS[relative[1]] ?? parseInt(relative[1], 10);
    const unit = relative[2].startsWith("week") ? "week" : "day";
    return accept(startOfToday.add(amount, unit));
  }

  const monthNames = `(${MONTHS.join("|")}|${MONTH_ABBRS.join("|")})\\.?`;

  // "october 23rd", "oct 23"
  const monthFirst = expr.match(new RegExp(`\\b${monthNames}\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`));
  // "23rd of october", "23 october"
  const dayFirst = expr.match(new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${monthNames}\\b`));
  const monthDay = monthFirst
    ? { month: monthIndex(monthFirst[1]), day: Number(monthFirst[2]) }
    : dayFirst
      ? { month: monthIndex(dayFirst[2]), day: Number(dayFirst[1]) }
      : null;
  if (monthDay && monthDay.month !== -1) {
    const thisYear = makeDate(today, today.year(), monthDay.month, monthDay.day);
    if (thisYear && !thisYear.isBefore(startOfToday, "day")) return accept(thisYear);
    return accept(makeDate(today, today.year() + 1, monthDay.month, monthDay.day));
  }

  // "the 23rd", "on the 5th"
  const dayOnly = expr.match(/\bthe\s+(\d{1,2})(st|nd|rd|th)\b/);
  if (dayOnly) {
    const day = Number(dayOnly[1]);
    for (let offset = 0; offset < 12; offset++) {
      const month = startOfToday.add(offset, "month");
      const candidate = makeDate(today, month.year(), month.month(), day);
      if (candidate && !candidate.isBefore(startOfToday, "day")) return accept(candidate);
    }
  }

  return undefined;
}

/**
 * True when the utterance carries a date phrase, even one that resolves to the past.
 * Used to tell "I said a date but it's gone" apart from "no date at all".
 */
export function mentionsDate(text: string): boolean {
  return /\b(today|tomorrow|yesterday|last\s+(week|month)|sunday|monday|tuesday|wednesday|thursday|friday|saturday|\d{4}-\d{2}-\d{2}|the\s+\d{1,2}(st|nd|rd|th))\b/i.test(text) ||
    new RegExp(`\\b(${MONTHS.join("|")})\\b`, "i").test(text);
}

/**
 * "morning" | "afternoon" | "evening" from phrases like "after lunch" or "after work"
 */
export function extractTimeOfDay(text: string): TimeOfDay | undefined {
  const t = text.toLowerCase();
  if (/\b(morning|early|before noon|before lunch)\b/.test(t)) return "morning";
  if (/\b(afternoon|after lunch)\b/.test(t)) return "afternoon";
  if (/\b(evening|after work|tonight)\b/.test(t)) return "evening";
  return undefined;
}

/**
 * Extract a specific clock time as HH:mm.
 * Handles: "2pm", "2 p.m.", "2:30 pm", "14:00", "two o'clock", "noon", "at 3".
 * Bare hours without am/pm lean toward clinic hours: 1-7 are afternoon, 8-11 morning.
 */
export function extractExactTime(text: string): string | undefined {
  const t = text.toLowerCase();

  if (/\bnoon\b|\bmidday\b/.test(t)) return "12:00";

  const withMeridiem = t.match(/\b(\d{1,2})(?::(\d{2}))?\s*(am|pm|a\.m\.?|p\.m\.?)(?=\s|$|[,.!?])/);
  const withColon = t.match(/\b(\d{1,2}):(\d{2})\b/);
  const atHour = t.match(/\bat\s+(\d{1,2})\b(?!\s*(?:st|nd|rd|th|days?|weeks?))/);

  const words: Record<string, number> = {
    one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8,
    nine: 9, ten: 10, eleven: 11, twelve: 12,
  };
  const wordMatch = t.match(
    /\b(one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve)(?:\s+(thirty|fifteen|forty[- ]five))?\s*(o'?clock|am|pm|a\.m\.?|p\.m\.?)/
  );

  let hour: number;
  let minute = 0;
  let meridiem: string | undefined;

  if (withMeridiem) {
    hour = Number(withMeridiem[1]);
    minute = withMeridiem[2] ? Number(withMeridiem[2]) : 0;
    meridiem = withMeridiem[3].replace(/\./g, "");
  } else if (withColon) {
    hour = Number(withColon[1]);
    minute = Number(withColon[2]);
  } else if (wordMatch) {
    hour = words[wordMatch[1]];
    const minuteWords: Record<string, number> = { thirty: 30, fifteen: 15, "forty-five": 45, "forty five": 45 };
    minute = wordMatch[2] ? minuteWords[wordMatch[2]] ?? 0 : 0;
    meridiem = wordMatch[3].startsWith("o") ? undefined : wordMatch[3].replace(/\./g, "");
  } else if (atHour) {
    hour = Number(atHour[1]);
  } else {
    return undefined;
  }

  if (meridiem === "pm" && hour < 12) hour += 12;
  else if (meridiem === "am" && hour === 12) hour = 0;
  else if (!meridiem && hour >= 1 && hour <= 7) hour += 12;

  if (hour > 23 || minute > 59) return undefined;
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

/**
 * Clinic-local clock window for a part of the day
 */
export function timeOfDayWindow(part: TimeOfDay): { start: string; end: string } {
  return TIME_OF_DAY_WINDOWS[part];
}

/**
 * Part of day a clock time falls in
 */
export function timeOfDayFor(clock: string): TimeOfDay {
  if (clock < "12:00") return "morning";
  if (clock < "17:00") return "afternoon";
  return "evening";
}
