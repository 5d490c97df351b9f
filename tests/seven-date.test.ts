import { describe, expect, test } from "vitest";
import {
  decode,
  encode,
  format,
  fromBase,
  fromDate,
  parse,
  toBase,
  toDate,
} from "../src/domain/seven-date.js";
import { InvalidDigitError, MalformedDateStringError } from "../src/utils/errors.js";

function sameDay(date: Date): [number, number, number] {
  return [date.getFullYear(), date.getMonth(), date.getDate()];
}

describe("base conversion", () => {
  test("known values", () => {
    expect(toBase(0, 7)).toBe("0");
    expect(toBase(49, 7)).toBe("100");
    expect(toBase(365, 7)).toBe("1031");
    expect(toBase(10, 2)).toBe("1010");
    expect(fromBase("16", 7)).toBe(13);
    expect(fromBase("0000", 7)).toBe(0);
  });

  test("round trips 0..1000 in bases 2..9", () => {
    for (let base = 2; base <= 9; base += 1) {
      for (let n = 0; n <= 1000; n += 1) {
        expect(fromBase(toBase(n, base), base)).toBe(n);
      }
    }
  });

  test("rejects digits outside the base", () => {
    expect(() => fromBase("9", 7)).toThrow(InvalidDigitError);
    expect(() => fromBase("7", 7)).toThrow(InvalidDigitError);
    expect(() => fromBase("1a", 10)).toThrow('Invalid digit "a" for base 10');
  });

  test("rejects unsupported bases and negative numbers", () => {
    expect(() => toBase(5, 1)).toThrow(RangeError);
    expect(() => toBase(5, 11)).toThrow(RangeError);
    expect(() => toBase(-1, 7)).toThrow(RangeError);
    expect(() => fromBase("1", 11)).toThrow(RangeError);
  });
});

describe("format", () => {
  test("January 1 is day zero", () => {
    expect(format(new Date(2024, 0, 1))).toBe("0.2024");
    expect(format(new Date(2024, 0, 1), true)).toBe("2024-0000");
  });

  test("December 31 depends on leap years", () => {
    expect(fromDate(new Date(2024, 11, 31))).toEqual({ year: 2024, dayOfYear: 365 });
    expect(fromDate(new Date(2023, 11, 31))).toEqual({ year: 2023, dayOfYear: 364 });
    expect(format(new Date(2024, 11, 31))).toBe("1031.2024");
    expect(format(new Date(2023, 11, 31), true)).toBe("2023-1030");
  });

  test("ignores the time of day", () => {
    expect(format(new Date(2024, 2, 1, 23, 59, 59))).toBe(format(new Date(2024, 2, 1)));
  });

  test("pads years below 1000 in the digital format", () => {
    expect(encode({ year: 999, dayOfYear: 7 }, true)).toBe("0999-0010");
    expect(() => encode({ year: 10000, dayOfYear: 0 }, true)).toThrow(RangeError);
  });
});

describe("parse", () => {
  test("known values", () => {
    expect(sameDay(parse("0.2024"))).toEqual([2024, 0, 1]);
    expect(sameDay(parse("2024-0000"))).toEqual([2024, 0, 1]);
    expect(sameDay(parse("100.2023"))).toEqual([2023, 1, 19]);
  });

  test("returns local midnight", () => {
    const date = parse("52.2024");
    expect([date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds()]).toEqual([0, 0, 0, 0]);
  });

  test("trims surrounding whitespace", () => {
    expect(decode("  0.2024\n")).toEqual({ year: 2024, dayOfYear: 0 });
    expect(decode("\t2024-0001 ")).toEqual({ year: 2024, dayOfYear: 1 });
  });

  test("splits dotted strings on the first dot", () => {
    expect(() => decode("3.10.2024")).toThrow(InvalidDigitError);
  });

  test("propagates invalid digits", () => {
    expect(() => parse("8.2024")).toThrow(InvalidDigitError);
    expect(() => parse("2024-0x00")).toThrow(InvalidDigitError);
    expect(() => parse("20a4-0000")).toThrow(InvalidDigitError);
  });

  test("rejects malformed strings", () => {
    expect(() => parse(".2024")).toThrow(MalformedDateStringError);
    expect(() => parse("12.")).toThrow(MalformedDateStringError);
    expect(() => parse("2024-")).toThrow(MalformedDateStringError);
    expect(() => parse("")).toThrow(MalformedDateStringError);
  });

  test("requires a dash after the digital year", () => {
    expect(() => parse("2024/0000")).toThrow('expected "-" after the year, got "/"');
  });

  test("rejects days past the end of the year", () => {
    expect(decode("1031.2024")).toEqual({ year: 2024, dayOfYear: 365 });
    expect(() => decode("1031.2023")).toThrow(MalformedDateStringError);
  });

  test("keeps two-digit years literal", () => {
    expect(toDate({ year: 99, dayOfYear: 0 }).getFullYear()).toBe(99);
  });

  test("treats year 0 as a leap year in both directions", () => {
    expect(format(parse("1031.0"))).toBe("1031.0");
    expect(format(parse("0000-0126"), true)).toBe("0000-0126");
    expect(fromDate(toDate({ year: 0, dayOfYear: 59 }))).toEqual({ year: 0, dayOfYear: 59 });
  });

  test("rejects years a Date cannot hold", () => {
    expect(() => parse("0.300000")).toThrow(MalformedDateStringError);
    expect(() => decode("0.300000")).toThrow('Malformed date string "0.300000": year 300000 is out of range');
  });
});

describe("round trips", () => {
  test.each([false, true])("every day of 2000..2024 (digital: %s)", (useDigital) => {
    for (let year = 2000; year <= 2024; year += 1) {
      for (let day = 1; ; day += 1) {
        const date = new Date(year, 0, day);
        if (date.getFullYear() !== year) break;
        expect(sameDay(parse(format(date, useDigital)))).toEqual(sameDay(date));
      }
    }
  });
});
