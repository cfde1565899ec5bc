/**
 * Date handling for feed timestamps.
 *
 * parseStructuredDate only accepts the two formats feeds are supposed to use
 * (RFC 822 for RSS, RFC 3339 / ISO 8601 for Atom). parseLooseDate is the
 * fallback for everything people actually put in <pubDate>.
 */

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

// Offsets in minutes east of UTC.
const ZONES: Record<string, number> = {
  ut: 0, utc: 0, gmt: 0, z: 0,
  est: -300, edt: -240, cst: -360, cdt: -300,
  mst: -420, mdt: -360, pst: -480, pdt: -420,
  bst: 60, cet: 60, cest: 120, eet: 120, eest: 180,
};

const RFC822 =
  /^(?:(?:mon|tue|wed|thu|fri|sat|sun),\s*)?(\d{1,2})\s+(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)\s+(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([a-z]{1,4}|[+-]\d{4})$/i;

const ISO8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[t ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*(z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

const DAY_FIRST =
  /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]{3,9})\.?,?\s+(\d{2}|\d{4})(?:,?\s+(?:at\s+)?(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(am|pm)?)?\s*([a-z]{1,4}|[+-]\d{2}:?\d{2})?$/i;

const MONTH_FIRST =
  /^([a-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})(?:,?\s+(?:at\s+)?(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(am|pm)?)?\s*([a-z]{1,4}|[+-]\d{2}:?\d{2})?$/i;

const SLASHED_ISO = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})(.*)$/;

const LEADING_WEEKDAY = /^(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/i;

// Date.parse reads "Episode 3" as March 2001; it only gets text that names a
// four-digit year together with a month name or a numeric day and month.
const FOUR_DIGIT_YEAR = /(?<!\d)\d{4}(?!\d)/;
const MONTH_NAME =
  /\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\b/i;
const NUMERIC_DAY_MONTH = /(?<!\d)(?:\d{1,2}[/.-]\d{1,2}[/.-]\d{4}|\d{4}[/.-]\d{1,2}[/.-]\d{1,2})(?!\d)/;

interface Parts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millis?: number;
  /** Minutes east of UTC; undefined means UTC. */
  offset?: number;
}

function build(p: Parts): Date | undefined {
  const hour = p.hour ?? 0;
  const minute = p.minute ?? 0;
  const second = p.second ?? 0;
  if (p.month < 0 || p.month > 11 || hour > 23 || minute > 59 || second > 60) return undefined;
  const ms = Date.UTC(p.year, p.month, p.day, hour, minute, second, p.millis ?? 0);
  // Reject roll-overs such as 31 Feb.
  const check = new Date(Date.UTC(p.year, p.month, p.day));
  if (check.getUTCFullYear() !== p.year || check.getUTCMonth() !== p.month || check.getUTCDate() !== p.day) {
    return undefined;
  }
  return new Date(ms - (p.offset ?? 0) * 60_000);
}

function expandYear(raw: string): number {
  const year = Number(raw);
  if (raw.length > 2) return year;
  return year < 50 ? 2000 + year : 1900 + year;
}

function zoneOffset(raw: string | undefined): number | null {
  if (!raw) return 0;
  const numeric = /^([+-])(\d{2}):?(\d{2})?$/.exec(raw);
  if (numeric) {
    const minutes = Number(numeric[2]) * 60 + Number(numeric[3] ?? "0");
    return numeric[1] === "-" ? -minutes : minutes;
  }
  const named = ZONES[raw.toLowerCase()];
  return named === undefined ? null : named;
}

function monthIndex(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

function to24h(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toLowerCase() === "pm";
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

function parseRfc822(value: string): Date | undefined {
  const m = RFC822.exec(value);
  if (!m) return undefined;
  const offset = zoneOffset(m[7]);
  const month = monthIndex(m[2]);
  if (offset === null || month === undefined) return undefined;
  return build({
    year: expandYear(m[3]),
    month,
    day: Number(m[1]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: m[6] ? Number(m[6]) : 0,
    offset,
  });
}

function parseIso8601(value: string): Date | undefined {
  const m = ISO8601.exec(value);
  if (!m) return undefined;
  const offset = zoneOffset(m[8]);
  if (offset === null) return undefined;
  return build({
    year: Number(m[1]),
    month: Number(m[2]) - 1,
    day: Number(m[3]),
    hour: m[4] ? Number(m[4]) : 0,
    minute: m[5] ? Number(m[5]) : 0,
    second: m[6] ? Number(m[6]) : 0,
    millis: m[7] ? Math.round(Number(`0.${m[7]}`) * 1000) : 0,
    offset,
  });
}

function parseWords(m: RegExpExecArray, dayGroup: number, monthGroup: number, yearGroup: number): Date | undefined {
  const month = monthIndex(m[monthGroup]);
  const offset = zoneOffset(m[8]);
  if (month === undefined || offset === null) return undefined;
  return build({
    year: expandYear(m[yearGroup]),
    month,
    day: Number(m[dayGroup]),
    hour: m[4] ? to24h(Number(m[4]), m[7]) : 0,
    minute: m[5] ? Number(m[5]) : 0,
    second: m[6] ? Number(m[6]) : 0,
    offset,
  });
}

/** RFC 822 or ISO 8601 only. Times without a zone are taken as UTC. */
export function parseStructuredDate(value: unknown): Date | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim().replace(/\s+/g, " ");
  if (!trimmed) return undefined;
  return parseRfc822(trimmed) ?? parseIso8601(trimmed);
}

export function parseLooseDate(value: unknown): Date | undefined {
  if (typeof value !== "string") return undefined;
  const structured = parseStructuredDate(value);
  if (structured) return structured;

  const text = value.trim().replace(/\s+/g, " ").replace(LEADING_WEEKDAY, "");
  if (!text) return undefined;

  const slashed = SLASHED_ISO.exec(text);
  if (slashed) {
    const iso = `${slashed[1]}-${slashed[2].padStart(2, "0")}-${slashed[3].padStart(2, "0")}${slashed[4]}`;
    const parsed = parseIso8601(iso);
    if (parsed) return parsed;
  }

  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    const parsed = parseWords(dayFirst, 1, 2, 3);
    if (parsed) return parsed;
  }
  const monthFirst = MONTH_FIRST.exec(text);
  if (monthFirst) {
    const parsed = parseWords(monthFirst, 2, 1, 3);
    if (parsed) return parsed;
  }

  if (!FOUR_DIGIT_YEAR.test(text) || !(MONTH_NAME.test(text) || NUMERIC_DAY_MONTH.test(text))) {
    return undefined;
  }
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}
