const ISO_WITH_FRACTION = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d+)(Z|[+-]\d{2}:\d{2})$/;
const ISO_WITHOUT_FRACTION = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(Z|[+-]\d{2}:\d{2})$/;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const MONTH_NAME_DATE = /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+(\d{1,2}),?\s+(\d{4})\b/i;
const YMD_DATE = /\b(\d{4})-(\d{2})-(\d{2})\b/;
const MDY_DATE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/;

function offsetMinutes(zone: string): number {
  if (zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const [hours, minutes] = zone.slice(1).split(':').map(Number);
  return sign * (hours * 60 + minutes);
}

function buildUtc(parts: string[], fraction: string, zone: string): Date | null {
  const [year, month, day, hour, minute, second] = parts.map(Number);
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // Rejects overflow such as February 31st
  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (calendarDay.getUTCMonth() !== month - 1 || calendarDay.getUTCDate() !== day) {
    return null;
  }

  // Millisecond precision; microseconds from the server are truncated
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis) - offsetMinutes(zone) * 60000;
  const date = new Date(utc);

  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parses an ISO-8601 timestamp, trying the fractional-seconds form first and
 * the plain form second. Returns null for anything else.
 */
export function parseIsoTimestamp(value: string): Date | null {
  const withFraction = ISO_WITH_FRACTION.exec(value);
  if (withFraction) {
    return buildUtc(withFraction.slice(1, 7), withFraction[7], withFraction[8]);
  }

  const withoutFraction = ISO_WITHOUT_FRACTION.exec(value);
  if (withoutFraction) {
    return buildUtc(withoutFraction.slice(1, 7), '', withoutFraction[7]);
  }

  return null;
}

export function formatIsoTimestamp(date: Date): string {
  return date.toISOString();
}

function localDate(year: number, monthIndex: number, day: number): Date | null {
  if (monthIndex < 0 || monthIndex > 11 || day < 1) return null;
  const date = new Date(year, monthIndex, day);
  // Rejects overflow such as February 30th
  if (date.getMonth() !== monthIndex || date.getDate() !== day) return null;
  return date;
}

/**
 * Finds a transaction date inside a receipt title, e.g.
 * "Corner Bakery - October 31, 2025", "Fuel Oct 3 2025", "Pharmacy 2025-03-14"
 * or "Books 3/14/2025". Returns local midnight of that day.
 */
export function extractDateFromTitle(title: string): Date | null {
  const named = MONTH_NAME_DATE.exec(title);
  if (named) {
    const prefix = named[1].toLowerCase().slice(0, 3);
    const monthIndex = MONTHS.findIndex(month => month.startsWith(prefix));
    return localDate(Number(named[3]), monthIndex, Number(named[2]));
  }

  const ymd = YMD_DATE.exec(title);
  if (ymd) {
    return localDate(Number(ymd[1]), Number(ymd[2]) - 1, Number(ymd[3]));
  }

  const mdy = MDY_DATE.exec(title);
  if (mdy) {
    return localDate(Number(mdy[3]), Number(mdy[1]) - 1, Number(mdy[2]));
  }

  return null;
}
