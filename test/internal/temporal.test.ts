import { describe, it, expect } from "vitest"
import {
  daysInMonth,
  fromOrdinal,
  isLeapYear,
  parseIsoDate,
  parseIsoDateTime,
  parseIsoOffset,
  parseIsoTime,
  strftime,
  strptime,
  toOrdinal,
} from "../../src/internal/temporal.js"

describe("calendar arithmetic", () => {
  it("applies the Gregorian leap rule", () => {
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
    expect(isLeapYear(2024)).toBe(true)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(2024, 4)).toBe(30)
  })

  it("inverts ordinals at year boundaries", () => {
    for (const date of [
      { year: 1, month: 1, day: 1 },
      { year: 2000, month: 12, day: 31 },
      { year: 2023, month: 12, day: 31 },
      { year: 9999, month: 12, day: 31 },
    ]) {
      expect(fromOrdinal(toOrdinal(date))).toEqual(date)
    }
  })
})

describe("ISO parsing", () => {
  it("reads calendar and week dates", () => {
    expect(parseIsoDate("2024-01-31")).toEqual({ year: 2024, month: 1, day: 31 })
    expect(parseIsoDate("20240131")).toEqual({ year: 2024, month: 1, day: 31 })
    expect(parseIsoDate("2024-W01-1")).toEqual({ year: 2024, month: 1, day: 1 })
    expect(parseIsoDate("2021W011")).toEqual({ year: 2021, month: 1, day: 4 })
    expect(parseIsoDate("2020-W53-7")).toEqual({ year: 2021, month: 1, day: 3 })
  })

  it("rejects impossible dates and weeks", () => {
    expect(parseIsoDate("2023-02-29")).toBeUndefined()
    expect(parseIsoDate("2021-W53")).toBeUndefined()
    expect(parseIsoDate("2024-1-31")).toBeUndefined()
  })

  it("reads times with fractions and offsets", () => {
    expect(parseIsoTime("10:30:15.5+05:30")).toEqual({
      hour: 10,
      minute: 30,
      second: 15,
      microsecond: 500_000,
      offsetSeconds: 19_800,
    })
    expect(parseIsoTime("T103015Z")).toEqual({ hour: 10, minute: 30, second: 15, microsecond: 0, offsetSeconds: 0 })
    expect(parseIsoTime("24:00:00")).toBeUndefined()
    expect(parseIsoTime("10:30+25:00")).toBeUndefined()
  })

  it("reads offsets down to the second", () => {
    expect(parseIsoOffset("-01:00:30")).toBe(-3_630)
    expect(parseIsoOffset("+0530")).toBe(19_800)
    expect(parseIsoOffset("+05:60")).toBeUndefined()
  })

  it("defaults a bare date to midnight", () => {
    expect(parseIsoDateTime("2024-01-31")).toEqual({
      year: 2024,
      month: 1,
      day: 31,
      hour: 0,
      minute: 0,
      second: 0,
      microsecond: 0,
      offsetSeconds: undefined,
    })
    expect(parseIsoDateTime("2024-01-31 10:05")?.minute).toBe(5)
  })
})

describe("strftime", () => {
  it("renders numeric directives and offsets", () => {
    expect(
      strftime("%Y-%m-%d %H:%M:%S%z", {
        date: { year: 2024, month: 1, day: 31 },
        time: { hour: 10, minute: 5, second: 0, microsecond: 0 },
        offsetSeconds: -18_000,
      }),
    ).toBe("2024-01-31 10:05:00-0500")
  })

  it("renders names, day of year and the twelve-hour clock", () => {
    expect(
      strftime("%a %b %j %I %p %%", {
        date: { year: 2024, month: 2, day: 29 },
        time: { hour: 15, minute: 0, second: 0, microsecond: 0 },
      }),
    ).toBe("Thu Feb 060 03 PM %")
  })

  it("copies unknown directives", () => {
    expect(strftime("%Q", {})).toBe("%Q")
  })
})

describe("strptime", () => {
  it("resolves a day of year", () => {
    expect(strptime("2024-060", "%Y-%j")).toEqual({
      year: 2024,
      month: 2,
      day: 29,
      hour: 0,
      minute: 0,
      second: 0,
      microsecond: 0,
      offsetSeconds: undefined,
    })
  })

  it("maps 12 AM to midnight on the default date", () => {
    expect(strptime("12:30 AM", "%I:%M %p")).toEqual({
      year: 1900,
      month: 1,
      day: 1,
      hour: 0,
      minute: 30,
      second: 0,
      microsecond: 0,
      offsetSeconds: undefined,
    })
  })

  it("rejects invalid fields and unknown directives", () => {
    expect(strptime("2024-13-01", "%Y-%m-%d")).toBeUndefined()
    expect(strptime("2024", "%q")).toBeUndefined()
    expect(strptime("2024-01-31 extra", "%Y-%m-%d")).toBeUndefined()
  })
})
