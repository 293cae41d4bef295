// Relative time expressions → inclusive YYYY-MM-DD ranges, evaluated in UTC.
// "last year"/"last month"/"last week" are the previous calendar period;
// "past year", "last 12 months", "last N days" are trailing windows ending today.

import type { DateRange } from "../data/queryService";

export type ResolvedRange = Required<DateRange>;

const DAY_MS = 86_400_000;

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function isCalendarDate(text: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(text)) return false;
  const d = new Date(`${text}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && formatDate(d) === text;
}

function utcDay(y: number, m: number, d: number): Date {
  return new Date(Date.UTC(y, m, d));
}

function addDays(d: Date, days: number): Date {
  return new Date(d.getTime() + days * DAY_MS);
}

function daysInMonth(y: number, m: number): number {
  return utcDay(y, m + 1, 0).getUTCDate();
}

function addMonths(d: Date, months: number): Date {
  const total = d.getUTCFullYear() * 12 + d.getUTCMonth() + months;
  const y = Math.floor(total / 12);
  const m = total - y * 12;
  return utcDay(y, m, Math.min(d.getUTCDate(), daysInMonth(y, m)));
}

function range(start: Date, end: Date): ResolvedRange {
  return { startDate: formatDate(start), endDate: formatDate(end) };
}

function parseCount(token: string): number | undefined {
  if (/^\d+$/.test(token)) return Number(token);
  return NUMBER_WORDS[token];
}

function trailing(today: Date, count: number, unit: string): ResolvedRange | undefined {
  if (count < 1) return undefined;
  if (unit.startsWith("day")) return range(addDays(today, 1 - count), today);
  if (unit.startsWith("week")) return range(addDays(today, 1 - count * 7), today);
  if (unit.startsWith("month")) return range(addDays(addMonths(today, -count), 1), today);
  if (unit.startsWith("year")) return range(addDays(addMonths(today, -12 * count), 1), today);
  return undefined;
}

/** Resolves a relative time expression against `now`; undefined when the phrase is not recognized. */
export function resolvePeriod(expression: string, now: Date): ResolvedRange | undefined {
  const phrase = expression
    .trim()
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/^(in|during|over|for|from) /, "")
    .replace(/^the /, "");
  const today = utcDay(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const y = today.getUTCFullYear();
  const m = today.getUTCMonth();

  switch (phrase) {
    case "today":
      return range(today, today);
    case "yesterday": {
      const d = addDays(today, -1);
      return range(d, d);
    }
    case "this week": {
      const monday = addDays(today, -((today.getUTCDay() + 6) % 7));
      return range(monday, today);
    }
    case "last week":
    case "previous week": {
      const monday = addDays(today, -((today.getUTCDay() + 6) % 7) - 7);
      return range(monday, addDays(monday, 6));
    }
    case "this month":
      return range(utcDay(y, m, 1), today);
    case "last month":
    case "previous month":
      return range(utcDay(y, m - 1, 1), utcDay(y, m, 0));
    case "this year":
    case "year to date":
      return range(utcDay(y, 0, 1), today);
    case "last year":
    case "previous year":
      return range(utcDay(y - 1, 0, 1), utcDay(y - 1, 11, 31));
    case "past year":
    case "past 12 months":
    case "last 12 months":
      return trailing(today, 12, "months");
    case "all time":
    case "ever":
      return undefined;
  }

  const window = /^(?:last|past|previous) (\w+) (days?|weeks?|months?|years?)$/.exec(phrase);
  if (window) {
    const count = parseCount(window[1]);
    return count === undefined ? undefined : trailing(today, count, window[2]);
  }

  const year = /^(\d{4})$/.exec(phrase);
  if (year) {
    const yy = Number(year[1]);
    return range(utcDay(yy, 0, 1), utcDay(yy, 11, 31));
  }

  const month = /^(\d{4})-(\d{2})$/.exec(phrase);
  if (month) {
    const yy = Number(month[1]);
    const mm = Number(month[2]) - 1;
    if (mm < 0 || mm > 11) return undefined;
    return range(utcDay(yy, mm, 1), utcDay(yy, mm + 1, 0));
  }

  return undefined;
}
