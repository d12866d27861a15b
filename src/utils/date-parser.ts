/**
 * Date text recognition shared by inference and coercion.
 * Accepts ISO (YYYY-MM-DD with optional time) and day-first D/M/YYYY, D-M-YYYY, D.M.YYYY.
 */

export interface ParsedDate {
  date: Date;
  hasTime: boolean;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const DAY_MONTH_YEAR = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function validCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function validTime(hours: number, minutes: number, seconds: number): boolean {
  return hours < 24 && minutes < 60 && seconds < 60;
}

function offsetMinutes(zone: string): number {
  if (zone === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parse a date string; values without a zone are read as UTC
 */
export function parseDateText(text: string): ParsedDate | null {
  const value = text.trim();

  const iso = ISO_DATE.exec(value);
  if (iso) {
    const [, y, mo, d, h, mi, s, ms, zone] = iso;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hours = Number(h ?? 0);
    const minutes = Number(mi ?? 0);
    const seconds = Number(s ?? 0);

    if (!validCalendarDate(year, month, day) || !validTime(hours, minutes, seconds)) {
      return null;
    }

    const millis = Number((ms ?? '0').padEnd(3, '0'));
    const utc = Date.UTC(year, month - 1, day, hours, minutes, seconds, millis);
    const shift = zone ? offsetMinutes(zone) * 60000 : 0;
    return { date: new Date(utc - shift), hasTime: h !== undefined };
  }

  const dmy = DAY_MONTH_YEAR.exec(value);
  if (dmy) {
    const [, d, mo, y, h, mi, s] = dmy;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hours = Number(h ?? 0);
    const minutes = Number(mi ?? 0);
    const seconds = Number(s ?? 0);

    if (!validCalendarDate(year, month, day) || !validTime(hours, minutes, seconds)) {
      return null;
    }

    return { date: new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds)), hasTime: h !== undefined };
  }

  return null;
}

export function hasTimeOfDay(date: Date): boolean {
  return date.getUTCHours() !== 0 || date.getUTCMinutes() !== 0 ||
    date.getUTCSeconds() !== 0 || date.getUTCMilliseconds() !== 0;
}
