export class DateParseError extends Error {
  constructor(readonly input: string) {
    super(`Unparseable date: "${input}"`);
    this.name = "DateParseError";
  }
}

export interface DateParser {
  /** Throws DateParseError when the input is not a valid calendar timestamp. */
  parse(input: string): Date;
}

const YMD_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const DMY_PATTERN = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
// "Jan 5 2025", "January 5, 2025"
const MONTH_FIRST_PATTERN = /^([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/i;
// "5 Jan 2025", "5 January, 2025"
const DAY_FIRST_PATTERN = /^(\d{1,2})\s+([a-z]{3,9})\.?,?\s+(\d{4})$/i;

const MONTH_NAMES = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

/** 1-based month for a full or abbreviated (at least three letters) name. */
function monthNumber(name: string): number | undefined {
  const token = name.toLowerCase();
  const idx = MONTH_NAMES.findIndex((month) => month.startsWith(token));
  return idx === -1 ? undefined : idx + 1;
}

function toNumber(part: string | undefined): number {
  return part ? Number(part) : 0;
}

function buildLocal(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): Date | null {
  if (hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(2000, 0, 1, hour, minute, second);
  // setFullYear keeps years below 100 literal instead of mapping them to 19xx.
  date.setFullYear(year, month - 1, day);
  // Date rolls 2025-02-30 over to March; reject instead.
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

function fromMonthName(input: string, name: string, day: string, year: string): Date {
  const month = monthNumber(name);
  const date = month ? buildLocal(Number(year), month, Number(day), 0, 0, 0) : null;
  if (!date) throw new DateParseError(input);
  return date;
}

export function parseDate(input: string): Date {
  const text = input.trim();
  if (!text) throw new DateParseError(input);

  const ymd = YMD_PATTERN.exec(text);
  if (ymd) {
    const date = buildLocal(
      Number(ymd[1]), Number(ymd[2]), Number(ymd[3]),
      toNumber(ymd[4]), toNumber(ymd[5]), toNumber(ymd[6])
    );
    if (!date) throw new DateParseError(input);
    return date;
  }

  const dmy = DMY_PATTERN.exec(text);
  if (dmy) {
    const date = buildLocal(
      Number(dmy[3]), Number(dmy[2]), Number(dmy[1]),
      toNumber(dmy[4]), toNumber(dmy[5]), toNumber(dmy[6])
    );
    if (!date) throw new DateParseError(input);
    return date;
  }

  const monthFirst = MONTH_FIRST_PATTERN.exec(text);
  if (monthFirst) return fromMonthName(input, monthFirst[1], monthFirst[2], monthFirst[3]);

  const dayFirst = DAY_FIRST_PATTERN.exec(text);
  if (dayFirst) return fromMonthName(input, dayFirst[2], dayFirst[1], dayFirst[3]);

  throw new DateParseError(input);
}

export const localDateParser: DateParser = { parse: parseDate };

const pad = (n: number): string => String(n).padStart(2, "0");
const padYear = (n: number): string => String(n).padStart(4, "0");

/** `YYYY-MM-DD HH:mm:ss` in local time; the form written to the snapshot. */
export function formatCanonical(date: Date): string {
  return (
    `${padYear(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatDisplay(date: Date): string {
  return `${pad(date.getDate())}-${pad(date.getMonth() + 1)}-${padYear(date.getFullYear())}`;
}
