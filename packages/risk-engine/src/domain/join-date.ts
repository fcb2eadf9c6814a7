import { differenceInCalendarDays, isValid, parse, parseISO } from "date-fns";

const TEXT_FORMATS: readonly string[] = [
  "MMMM yyyy",
  "MMM yyyy",
  "MMMM d, yyyy",
  "MMM d, yyyy",
  "d MMMM yyyy",
  "d MMM yyyy",
];

const JOINED_PREFIX = /^joined\s+/i;
const TIME_DESIGNATOR = /\dT\d/;

// Calendar fields are read in local time, so date-only text is pinned to UTC midnight.
const toUtcMidnight = (date: Date): Date =>
  new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));

const utcCalendarDay = (date: Date): Date =>
  new Date(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());

// Profile pages render the date as "Joined November 2024".
export const parseJoinDate = (value: string): Date | null => {
  const text = value.trim().replace(JOINED_PREFIX, "");
  if (text.length === 0) {
    return null;
  }

  const iso = parseISO(text);
  if (isValid(iso)) {
    return TIME_DESIGNATOR.test(text) ? iso : toUtcMidnight(iso);
  }

  for (const format of TEXT_FORMATS) {
    const parsed = parse(text, format, new Date(0));
    if (isValid(parsed)) {
      return toUtcMidnight(parsed);
    }
  }

  return null;
};

/** Whole UTC calendar days from `joinedAt` to `asOf`, floored at zero. */
export const accountAgeDays = (joinedAt: Date, asOf: Date): number =>
  Math.max(0, differenceInCalendarDays(utcCalendarDay(asOf), utcCalendarDay(joinedAt)));
