/**
 * Feed date normalization
 *
 * Parses RFC-822 style feed dates ("Mon, 02 Jan 2023 15:04:05 +0000") into
 * "YYYY-MM-DD HH:MM:SS". The wall-clock fields are kept as written and the
 * offset is dropped. Anything that does not parse comes back unchanged.
 */

const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const FEED_DATE_PATTERN =
  /^([a-z]{3}),\s+(\d{1,2})\s+([a-z]{3})\s+(\d{4})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})\s+(Z|[+-]\d{2}:?\d{2})$/i;

export interface ParsedFeedDate {
  year: number;
  month: number;          // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  offsetMinutes: number;  // East of UTC
}

export type NormalizedDateResult =
  | { ok: true; value: string; parsed: ParsedFeedDate }
  | { ok: false; value: string; reason: string };

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

function parseOffset(offset: string): number | null {
  if (offset.toUpperCase() === 'Z') return 0;

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export function parseFeedDate(raw: string): ParsedFeedDate | null {
  const match = raw.trim().match(FEED_DATE_PATTERN);
  if (!match) return null;

  const [, weekday, dayText, monthText, yearText, hourText, minuteText, secondText, offsetText] = match;
  if (!WEEKDAYS.includes(weekday.toLowerCase())) return null;

  const monthIndex = MONTHS.indexOf(monthText.toLowerCase());
  if (monthIndex === -1) return null;

  const year = Number(yearText);
  const month = monthIndex + 1;
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offsetMinutes = parseOffset(offsetText);
  if (offsetMinutes === null) return null;

  return { year, month, day, hour, minute, second, offsetMinutes };
}

export function formatFeedDate(parsed: ParsedFeedDate): string {
  const { year, month, day, hour, minute, second } = parsed;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

export function tryNormalizeFeedDate(raw: string): NormalizedDateResult {
  const parsed = parseFeedDate(raw);
  if (!parsed) {
    return { ok: false, value: raw, reason: `Unrecognized feed date: "${raw}"` };
  }
  return { ok: true, value: formatFeedDate(parsed), parsed };
}

export function normalizeFeedDate(raw: string): string {
  return tryNormalizeFeedDate(raw).value;
}
