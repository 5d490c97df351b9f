import { InvalidDigitError, MalformedDateStringError } from "../utils/errors.js";

export const SEVEN_DATE_BASE = 7;

// Digital grammar: YYYY-dddd
export const DIGITAL_YEAR_WIDTH = 4;
export const DIGITAL_SEPARATOR = "-";
export const DIGITAL_DAY_WIDTH = 4;

// Dotted grammar: d.Y
export const DOTTED_SEPARATOR = ".";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface SevenDate {
  year: number;
  /** 0 for January 1. */
  dayOfYear: number;
}

export function toBase(n: number, base: number): string {
  if (!Number.isInteger(base) || base < 2 || base > 10) {
    throw new RangeError(`Unsupported base: ${base}`);
  }
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Expected a non-negative integer, got ${n}`);
  }
  if (n === 0) {
    return "0";
  }

  const digits: string[] = [];
  let rest = n;
  while (rest > 0) {
    digits.push(String(rest % base));
    rest = Math.floor(rest / base);
  }
  return digits.reverse().join("");
}

export function fromBase(s: string, base: number): number {
  if (!Number.isInteger(base) || base < 2 || base > 10) {
    throw new RangeError(`Unsupported base: ${base}`);
  }

  let value = 0;
  for (const character of s) {
    const digit = character >= "0" && character <= "9" ? character.charCodeAt(0) - 48 : -1;
    if (digit < 0 || digit >= base) {
      throw new InvalidDigitError(character, base);
    }
    value = value * base + digit;
  }
  return value;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

// Date.UTC maps years 0..99 onto 1900..1999; setUTCFullYear does not.
function utcMidnight(year: number, month: number, day: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  return date.getTime();
}

export function fromDate(date: Date): SevenDate {
  const year = date.getFullYear();
  const startOfYear = utcMidnight(year, 0, 1);
  const sameDay = utcMidnight(year, date.getMonth(), date.getDate());
  return { year, dayOfYear: Math.round((sameDay - startOfYear) / MS_PER_DAY) };
}

export function toDate(value: SevenDate): Date {
  // setFullYear keeps years below 100 literal, unlike the Date constructor.
  const date = new Date(0);
  date.setFullYear(value.year, 0, 1 + value.dayOfYear);
  date.setHours(0, 0, 0, 0);
  return date;
}

function checkedDay(input: string, year: number, dayOfYear: number): SevenDate {
  if (dayOfYear >= daysInYear(year)) {
    throw new MalformedDateStringError(input, `day ${dayOfYear} is past the end of ${year}`);
  }
  if (Number.isNaN(toDate({ year, dayOfYear }).getTime())) {
    throw new MalformedDateStringError(input, `year ${year} is out of range`);
  }
  return { year, dayOfYear };
}

export function decode(s: string): SevenDate {
  const input = s.trim();

  const dot = input.indexOf(DOTTED_SEPARATOR);
  if (dot !== -1) {
    const dayPart = input.slice(0, dot);
    const yearPart = input.slice(dot + DOTTED_SEPARATOR.length);
    if (dayPart.length === 0 || yearPart.length === 0) {
      throw new MalformedDateStringError(input, "expected <day>.<year>");
    }
    return checkedDay(input, fromBase(yearPart, 10), fromBase(dayPart, SEVEN_DATE_BASE));
  }

  const dayStart = DIGITAL_YEAR_WIDTH + DIGITAL_SEPARATOR.length;
  if (input.length <= dayStart) {
    throw new MalformedDateStringError(input, "expected <year>-<day>");
  }
  const separator = input.slice(DIGITAL_YEAR_WIDTH, dayStart);
  if (separator !== DIGITAL_SEPARATOR) {
    throw new MalformedDateStringError(input, `expected "${DIGITAL_SEPARATOR}" after the year, got "${separator}"`);
  }
  const year = fromBase(input.slice(0, DIGITAL_YEAR_WIDTH), 10);
  return checkedDay(input, year, fromBase(input.slice(dayStart), SEVEN_DATE_BASE));
}

export function encode(value: SevenDate, useDigital = false): string {
  const day = toBase(value.dayOfYear, SEVEN_DATE_BASE);
  if (!useDigital) {
    return `${day}${DOTTED_SEPARATOR}${value.year}`;
  }
  if (value.year < 0 || value.year > 9999) {
    throw new RangeError(`Year ${value.year} does not fit the digital format`);
  }
  const year = String(value.year).padStart(DIGITAL_YEAR_WIDTH, "0");
  return `${year}${DIGITAL_SEPARATOR}${day.padStart(DIGITAL_DAY_WIDTH, "0")}`;
}

/** Local midnight of the day named by `s`, in either format. */
export function parse(s: string): Date {
  return toDate(decode(s));
}

export function format(date: Date, useDigital = false): string {
  return encode(fromDate(date), useDigital);
}
