/**
 * Calendar arithmetic over plain { year, month, day } values.
 *
 * Dates are timezone-free: month is 1-based, and all arithmetic goes
 * through a day count since 1970-01-01 on the proleptic Gregorian calendar.
 */

export interface CalendarDate {
  year: number;
  /** 1 = January. */
  month: number;
  day: number;
}

export const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const DAYS_PER_WEEK = 7;
const MONTHS_PER_YEAR = 12;

// --- Construction ------------------------------------------------------------

export function calendarDate(year: number, month: number, day: number): CalendarDate {
  if (!Number.isInteger(month) || month < 1 || month > MONTHS_PER_YEAR) {
    throw new RangeError(`Invalid month ${month}`);
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    throw new RangeError(`Invalid day ${day} for ${year}-${month}`);
  }
  return { year, month, day };
}

/** Today's date in the local timezone. */
export function today(now: Date = new Date()): CalendarDate {
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}

/** Parses YYYY-MM-DD. Returns null for anything else, including impossible dates. */
export function parseIsoDate(text: string): CalendarDate | null {
  const match = /^(-?\d{4,})-(\d{2})-(\d{2})$/.exec(text.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > MONTHS_PER_YEAR) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

export function toIsoString(date: CalendarDate): string {
  const pad = (n: number, width: number) => String(n).padStart(width, "0");
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

// --- Month facts -------------------------------------------------------------

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? "";
}

// --- Day counting ------------------------------------------------------------

/** Days since 1970-01-01 (negative before it). */
export function toEpochDay(date: CalendarDate): number {
  const y = date.month <= 2 ? date.year - 1 : date.year;
  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400;
  const shiftedMonth = (date.month + 9) % 12;
  const dayOfYear = Math.floor((153 * shiftedMonth + 2) / 5) + date.day - 1;
  const dayOfEra =
    yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
  return era * 146097 + dayOfEra - 719468;
}

export function fromEpochDay(epochDay: number): CalendarDate {
  const z = epochDay + 719468;
  const era = Math.floor(z / 146097);
  const dayOfEra = z - era * 146097;
  const yearOfEra = Math.floor(
    (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36524) -
      Math.floor(dayOfEra / 146096)) /
      365,
  );
  const dayOfYear =
    dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100));
  const shiftedMonth = Math.floor((5 * dayOfYear + 2) / 153);
  const day = dayOfYear - Math.floor((153 * shiftedMonth + 2) / 5) + 1;
  const month = shiftedMonth < 10 ? shiftedMonth + 3 : shiftedMonth - 9;
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toEpochDay(a) - toEpochDay(b);
}

export function sameDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

export function weekdayOf(date: CalendarDate): Weekday {
  // 1970-01-01 was a Thursday
  const index = (((toEpochDay(date) + 4) % DAYS_PER_WEEK) + DAYS_PER_WEEK) % DAYS_PER_WEEK;
  return WEEKDAYS[index];
}

export function nextWeekday(day: Weekday): Weekday {
  return WEEKDAYS[(WEEKDAYS.indexOf(day) + 1) % DAYS_PER_WEEK];
}

/**
 * Shifts by whole months, carrying into the year. The day is kept when the
 * target month has it, otherwise it becomes the target month's last day.
 */
export function addMonths(date: CalendarDate, qty: number): CalendarDate {
  const years = Math.trunc(qty / MONTHS_PER_YEAR);
  const months = qty % MONTHS_PER_YEAR;

  let year = date.year + years;
  let month = date.month + months;
  if (month > MONTHS_PER_YEAR) {
    month -= MONTHS_PER_YEAR;
    year++;
  } else if (month < 1) {
    month += MONTHS_PER_YEAR;
    year--;
  }

  const day = Math.min(date.day, daysInMonth(year, month));
  return { year, month, day };
}

export function clampDate(
  date: CalendarDate,
  min: CalendarDate | null,
  max: CalendarDate | null,
): CalendarDate {
  if (min && compareDates(date, min) < 0) return min;
  if (max && compareDates(date, max) > 0) return max;
  return date;
}

/** First cell of a calendar page: the week-start day on or before the 1st, a full week earlier when the 1st is itself the week start. */
export function calendarStartDate(year: number, month: number, weekStart: Weekday): CalendarDate {
  let date: CalendarDate = { year, month, day: 1 };
  if (weekdayOf(date) === weekStart) {
    return addDays(date, -DAYS_PER_WEEK);
  }
  while (weekdayOf(date) !== weekStart) {
    date = addDays(date, -1);
  }
  return date;
}
