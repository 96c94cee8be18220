/**
 * Key and value normalization used for deduplication and export.
 */

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12,
};

const TRAILING_KEY_PUNCTUATION = /[.,;:!?*\-–—]+$/;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * "Invoice  Date:" and "invoice date" both become "invoice date".
 */
export function normalizeKey(key: string): string {
  return normalizeWhitespace(key).toLowerCase().replace(TRAILING_KEY_PUNCTUATION, '').trim();
}

function expandYear(raw: string): number {
  const year = parseInt(raw, 10);
  if (raw.length === 2) {
    return year < 69 ? 2000 + year : 1900 + year;
  }
  return year;
}

function monthFromName(name: string): number | undefined {
  return MONTHS[name.toLowerCase().replace(/\.$/, '')];
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (candidate.getUTCFullYear() !== year || candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) {
    return undefined;
  }
  return { year, month, day };
}

/**
 * Recognize the date spellings that show up in forms and reports.
 *
 * Slash dates are month-first unless the first field cannot be a month;
 * dash and dot dates are day-first unless the second field cannot be a month.
 */
export function parseDateValue(value: string): CalendarDate | undefined {
  const text = normalizeWhitespace(value);
  let m: RegExpMatchArray | null;

  m = text.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/);
  if (m) {
    return toCalendarDate(parseInt(m[1], 10), parseInt(m[2], 10), parseInt(m[3], 10));
  }

  m = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})$/);
  if (m) {
    const a = parseInt(m[1], 10);
    const b = parseInt(m[2], 10);
    const year = expandYear(m[3]);
    return a > 12 ? toCalendarDate(year, b, a) : toCalendarDate(year, a, b);
  }

  m = text.match(/^(\d{1,2})([-.])(\d{1,2})\2(\d{4}|\d{2})$/);
  if (m) {
    const a = parseInt(m[1], 10);
    const b = parseInt(m[3], 10);
    const year = expandYear(m[4]);
    return b > 12 ? toCalendarDate(year, a, b) : toCalendarDate(year, b, a);
  }

  // 05-Jan-24, 5 January 2024, 05 Jan, 2024
  m = text.match(/^(\d{1,2})(?:st|nd|rd|th)?[-\s]([A-Za-z]+\.?)[-\s,]+(\d{4}|\d{2})$/);
  if (m) {
    const month = monthFromName(m[2]);
    return month ? toCalendarDate(expandYear(m[3]), month, parseInt(m[1], 10)) : undefined;
  }

  // January 5, 2024
  m = text.match(/^([A-Za-z]+\.?)\s(\d{1,2})(?:st|nd|rd|th)?,?\s(\d{4})$/);
  if (m) {
    const month = monthFromName(m[1]);
    return month ? toCalendarDate(parseInt(m[3], 10), month, parseInt(m[2], 10)) : undefined;
  }

  return undefined;
}

export function formatIsoDate(date: CalendarDate): string {
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

/**
 * Canonical decimal string of a plain integer or decimal: thousands
 * separators, a leading "+" and trailing fractional zeros are dropped.
 * Digits are never converted to a floating point number, so long account
 * and reference numbers keep every digit. Leading zeros ("007") mark
 * identifiers, which stay text.
 */
export function normalizeNumber(value: string): string | undefined {
  const m = value.trim().match(/^([-+]?)(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?$/);
  if (!m) return undefined;

  const integer = m[2].replace(/,/g, '');
  if (/^0\d/.test(integer)) return undefined;

  const fraction = (m[3] ?? '').replace(/0+$/, '');
  const digits = fraction ? `${integer}.${fraction}` : integer;
  return m[1] === '-' && /[1-9]/.test(digits) ? `-${digits}` : digits;
}

/**
 * Equality form of a value: dates compare by calendar day, numbers by
 * their canonical decimal string, everything else as case-insensitive
 * collapsed text.
 */
export function valueIdentity(value: string): string {
  const date = parseDateValue(value);
  if (date) return `date:${formatIsoDate(date)}`;

  const numeric = normalizeNumber(value);
  if (numeric !== undefined) return `num:${numeric}`;

  return `text:${normalizeWhitespace(value).toLowerCase()}`;
}
