/**
 * Proleptic Gregorian calendar arithmetic, ISO-8601 text forms and the
 * strftime/strptime directive set used by the temporal converters.
 *
 * Everything here works on plain field records; the value classes in
 * `Values.ts` wrap these records.
 */

export interface DateFields {
  readonly year: number
  readonly month: number
  readonly day: number
}

export interface TimeFields {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
}

export interface ParsedTime extends TimeFields {
  readonly offsetSeconds: number | undefined
}

export interface ParsedDateTime extends DateFields, ParsedTime {}

/**
 * Fields consumed by `strftime`. Missing date fields default to 1900-01-01
 * and missing time fields to midnight.
 */
export interface FormatFields {
  readonly date?: DateFields | undefined
  readonly time?: TimeFields | undefined
  readonly offsetSeconds?: number | undefined
  readonly zoneName?: string | undefined
}

export const MIN_YEAR = 1
export const MAX_YEAR = 9999
export const SECONDS_PER_DAY = 86_400
/** Offsets must stay strictly inside one day. */
export const MAX_OFFSET_SECONDS = SECONDS_PER_DAY - 1

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const

const WEEKDAY_NAMES = [
  "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday",
] as const

const DAYS_BEFORE_MONTH = [0, 31, 59, 90, 120, 151, 181, 212, 243, 273, 304, 334] as const

export const isLeapYear = (year: number): boolean =>
  year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0)

export const daysInMonth = (year: number, month: number): number => {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31
}

const inRange = (value: number, min: number, max: number): boolean =>
  Number.isInteger(value) && value >= min && value <= max

export const isValidDate = ({ year, month, day }: DateFields): boolean =>
  inRange(year, MIN_YEAR, MAX_YEAR) && inRange(month, 1, 12) && inRange(day, 1, daysInMonth(year, month))

export const isValidTime = ({ hour, minute, second, microsecond }: TimeFields): boolean =>
  inRange(hour, 0, 23) && inRange(minute, 0, 59) && inRange(second, 0, 59) && inRange(microsecond, 0, 999_999)

export const isValidOffset = (offsetSeconds: number): boolean =>
  inRange(offsetSeconds, -MAX_OFFSET_SECONDS, MAX_OFFSET_SECONDS)

export const dayOfYear = ({ year, month, day }: DateFields): number =>
  (DAYS_BEFORE_MONTH[month - 1] ?? 0) + (month > 2 && isLeapYear(year) ? 1 : 0) + day

/**
 * Day number with 0001-01-01 as day 1.
 */
export const toOrdinal = (date: DateFields): number => {
  const y = date.year - 1
  return y * 365 + Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400) + dayOfYear(date)
}

export const fromOrdinal = (ordinal: number): DateFields => {
  let n = ordinal - 1
  const n400 = Math.floor(n / 146_097)
  n -= n400 * 146_097
  const n100 = Math.floor(n / 36_524)
  n -= n100 * 36_524
  const n4 = Math.floor(n / 1_461)
  n -= n4 * 1_461
  const n1 = Math.floor(n / 365)
  n -= n1 * 365
  const baseYear = n400 * 400 + n100 * 100 + n4 * 4 + n1 + 1
  if (n1 === 4 || n100 === 4) {
    return { year: baseYear - 1, month: 12, day: 31 }
  }
  let month = 1
  while (month < 12 && n >= dayOfYear({ year: baseYear, month: month + 1, day: 1 }) - 1) {
    month += 1
  }
  return { year: baseYear, month, day: n - (dayOfYear({ year: baseYear, month, day: 1 }) - 1) + 1 }
}

/** Monday is 1, Sunday is 7. */
export const isoWeekday = (date: DateFields): number => ((toOrdinal(date) + 6) % 7) + 1

const isoWeekOneMonday = (year: number): number => {
  const firstDay = toOrdinal({ year, month: 1, day: 1 })
  const weekday = (firstDay + 6) % 7
  const monday = firstDay - weekday
  return weekday > 3 ? monday + 7 : monday
}

export const fromIsoCalendar = (year: number, week: number, weekday: number): DateFields | undefined => {
  if (!inRange(year, MIN_YEAR, MAX_YEAR) || !inRange(weekday, 1, 7)) {
    return undefined
  }
  const lastWeek = isoWeekOneMonday(year + 1) - isoWeekOneMonday(year) === 53 * 7 ? 53 : 52
  if (!inRange(week, 1, lastWeek)) {
    return undefined
  }
  const result = fromOrdinal(isoWeekOneMonday(year) + (week - 1) * 7 + (weekday - 1))
  return isValidDate(result) ? result : undefined
}

const pad = (value: number, width: number): string => String(Math.abs(value)).padStart(width, "0")

export const formatIsoDate = ({ year, month, day }: DateFields): string =>
  `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`

export const formatOffset = (offsetSeconds: number, separator = ":"): string => {
  const sign = offsetSeconds < 0 ? "-" : "+"
  const total = Math.abs(offsetSeconds)
  const hours = Math.floor(total / 3600)
  const minutes = Math.floor((total % 3600) / 60)
  const seconds = total % 60
  const base = `${sign}${pad(hours, 2)}${separator}${pad(minutes, 2)}`
  return seconds === 0 ? base : `${base}${separator}${pad(seconds, 2)}`
}

export const formatIsoTime = (time: TimeFields, offsetSeconds?: number): string => {
  const base = `${pad(time.hour, 2)}:${pad(time.minute, 2)}:${pad(time.second, 2)}`
  const fraction = time.microsecond === 0 ? "" : `.${pad(time.microsecond, 6)}`
  return `${base}${fraction}${offsetSeconds === undefined ? "" : formatOffset(offsetSeconds)}`
}

const ISO_DATE_EXTENDED = /^(\d{4})-(\d{2})-(\d{2})$/
const ISO_DATE_BASIC = /^(\d{4})(\d{2})(\d{2})$/
const ISO_WEEK_DATE = /^(\d{4})-?W(\d{2})(?:-?(\d))?$/

export const parseIsoDate = (text: string): DateFields | undefined => {
  const calendar = ISO_DATE_EXTENDED.exec(text) ?? ISO_DATE_BASIC.exec(text)
  if (calendar) {
    const fields = { year: Number(calendar[1]), month: Number(calendar[2]), day: Number(calendar[3]) }
    return isValidDate(fields) ? fields : undefined
  }
  const week = ISO_WEEK_DATE.exec(text)
  if (week) {
    return fromIsoCalendar(Number(week[1]), Number(week[2]), week[3] === undefined ? 1 : Number(week[3]))
  }
  return undefined
}

const ISO_OFFSET = /^(?:(Z)|([+-])(\d{2})(?::?(\d{2})(?::?(\d{2})(?:\.\d{1,6})?)?)?)$/
const ISO_TIME_EXTENDED = /^(\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,6}))?)?)?/
const ISO_TIME_BASIC = /^(\d{2})(?:(\d{2})(?:(\d{2})(?:[.,](\d{1,6}))?)?)?/

export const parseIsoOffset = (text: string): number | undefined => {
  const match = ISO_OFFSET.exec(text)
  if (!match) {
    return undefined
  }
  if (match[1] === "Z") {
    return 0
  }
  const hours = Number(match[3])
  const minutes = Number(match[4] ?? "0")
  const seconds = Number(match[5] ?? "0")
  if (minutes > 59 || seconds > 59) {
    return undefined
  }
  const total = hours * 3600 + minutes * 60 + seconds
  const signed = match[2] === "-" ? -total : total
  return isValidOffset(signed) ? signed : undefined
}

export const parseIsoTime = (text: string): ParsedTime | undefined => {
  const source = text.startsWith("T") ? text.slice(1) : text
  const offsetStart = source.search(/[Z+-]/)
  const clock = offsetStart === -1 ? source : source.slice(0, offsetStart)
  const offsetText = offsetStart === -1 ? undefined : source.slice(offsetStart)
  const match = clock.includes(":") ? ISO_TIME_EXTENDED.exec(clock) : ISO_TIME_BASIC.exec(clock)
  if (!match || match[0].length !== clock.length) {
    return undefined
  }
  const offsetSeconds = offsetText === undefined ? undefined : parseIsoOffset(offsetText)
  if (offsetText !== undefined && offsetSeconds === undefined) {
    return undefined
  }
  const fields = {
    hour: Number(match[1]),
    minute: Number(match[2] ?? "0"),
    second: Number(match[3] ?? "0"),
    microsecond: Number((match[4] ?? "0").padEnd(6, "0")),
  }
  return isValidTime(fields) ? { ...fields, offsetSeconds } : undefined
}

const MIDNIGHT: ParsedTime = { hour: 0, minute: 0, second: 0, microsecond: 0, offsetSeconds: undefined }

export const parseIsoDateTime = (text: string): ParsedDateTime | undefined => {
  const separator = text.search(/[Tt ]/)
  const datePart = separator === -1 ? text : text.slice(0, separator)
  const date = parseIsoDate(datePart)
  if (!date) {
    return undefined
  }
  if (separator === -1) {
    return { ...date, ...MIDNIGHT }
  }
  const time = parseIsoTime(text.slice(separator + 1))
  return time ? { ...date, ...time } : undefined
}

const DEFAULT_DATE: DateFields = { year: 1900, month: 1, day: 1 }

const twelveHour = (hour: number): number => (hour % 12 === 0 ? 12 : hour % 12)

/**
 * Render fields with the C89 strftime directives. Unknown directives are
 * copied through unchanged.
 */
export const strftime = (format: string, fields: FormatFields): string => {
  const date = fields.date ?? DEFAULT_DATE
  const time = fields.time ?? MIDNIGHT
  const weekday = isoWeekday(date)
  return format.replace(/%(.)/gs, (directive: string, code: string) => {
    switch (code) {
      case "Y":
        return pad(date.year, 4)
      case "y":
        return pad(date.year % 100, 2)
      case "m":
        return pad(date.month, 2)
      case "d":
        return pad(date.day, 2)
      case "j":
        return pad(dayOfYear(date), 3)
      case "B":
        return MONTH_NAMES[date.month - 1] ?? ""
      case "b":
        return (MONTH_NAMES[date.month - 1] ?? "").slice(0, 3)
      case "A":
        return WEEKDAY_NAMES[weekday - 1] ?? ""
      case "a":
        return (WEEKDAY_NAMES[weekday - 1] ?? "").slice(0, 3)
      case "w":
        return String(weekday % 7)
      case "u":
        return String(weekday)
      case "H":
        return pad(time.hour, 2)
      case "I":
        return pad(twelveHour(time.hour), 2)
      case "p":
        return time.hour < 12 ? "AM" : "PM"
      case "M":
        return pad(time.minute, 2)
      case "S":
        return pad(time.second, 2)
      case "f":
        return pad(time.microsecond, 6)
      case "z":
        return fields.offsetSeconds === undefined ? "" : formatOffset(fields.offsetSeconds, "")
      case "Z":
        return fields.zoneName ?? ""
      case "%":
        return "%"
      default:
        return directive
    }
  })
}

interface DirectiveSpec {
  readonly pattern: string
  readonly assign: (slots: ParseSlots, text: string) => boolean
}

interface ParseSlots {
  year?: number
  month?: number
  day?: number
  dayOfYear?: number
  hour?: number
  hour12?: number
  pm?: boolean
  minute?: number
  second?: number
  microsecond?: number
  offsetSeconds?: number
}

const nameIndex = (names: ReadonlyArray<string>, text: string, abbreviated: boolean): number => {
  const lowered = text.toLowerCase()
  return names.findIndex((name) => (abbreviated ? name.slice(0, 3) : name).toLowerCase() === lowered)
}

const alternation = (names: ReadonlyArray<string>, abbreviated: boolean): string =>
  names.map((name) => (abbreviated ? name.slice(0, 3) : name)).join("|")

const DIRECTIVES: Readonly<Record<string, DirectiveSpec>> = {
  Y: { pattern: String.raw`\d{4}`, assign: (slots, text) => ((slots.year = Number(text)), true) },
  y: {
    pattern: String.raw`\d{2}`,
    assign: (slots, text) => {
      const value = Number(text)
      slots.year = value < 69 ? 2000 + value : 1900 + value
      return true
    },
  },
  m: { pattern: String.raw`\d{1,2}`, assign: (slots, text) => ((slots.month = Number(text)), true) },
  d: { pattern: String.raw`\d{1,2}`, assign: (slots, text) => ((slots.day = Number(text)), true) },
  j: { pattern: String.raw`\d{1,3}`, assign: (slots, text) => ((slots.dayOfYear = Number(text)), true) },
  B: {
    pattern: alternation(MONTH_NAMES, false),
    assign: (slots, text) => ((slots.month = nameIndex(MONTH_NAMES, text, false) + 1), true),
  },
  b: {
    pattern: alternation(MONTH_NAMES, true),
    assign: (slots, text) => ((slots.month = nameIndex(MONTH_NAMES, text, true) + 1), true),
  },
  A: { pattern: alternation(WEEKDAY_NAMES, false), assign: () => true },
  a: { pattern: alternation(WEEKDAY_NAMES, true), assign: () => true },
  w: { pattern: "[0-6]", assign: () => true },
  u: { pattern: "[1-7]", assign: () => true },
  H: { pattern: String.raw`\d{1,2}`, assign: (slots, text) => ((slots.hour = Number(text)), true) },
  I: { pattern: String.raw`\d{1,2}`, assign: (slots, text) => ((slots.hour12 = Number(text)), true) },
  p: { pattern: "AM|PM", assign: (slots, text) => ((slots.pm = text.toUpperCase() === "PM"), true) },
  M: { pattern: String.raw`\d{1,2}`, assign: (slots, text) => ((slots.minute = Number(text)), true) },
  S: { pattern: String.raw`\d{1,2}`, assign: (slots, text) => ((slots.second = Number(text)), true) },
  f: {
    pattern: String.raw`\d{1,6}`,
    assign: (slots, text) => ((slots.microsecond = Number(text.padEnd(6, "0"))), true),
  },
  z: {
    pattern: String.raw`Z|[+-]\d{2}:?\d{2}(?::?\d{2})?`,
    assign: (slots, text) => {
      const offset = parseIsoOffset(text)
      if (offset === undefined) {
        return false
      }
      slots.offsetSeconds = offset
      return true
    },
  },
  Z: { pattern: "UTC|GMT", assign: (slots) => ((slots.offsetSeconds ??= 0), true) },
}

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")

interface CompiledFormat {
  readonly regex: RegExp
  readonly codes: ReadonlyArray<string>
}

const compileFormat = (format: string): CompiledFormat | undefined => {
  let source = ""
  const codes: Array<string> = []
  for (let index = 0; index < format.length; index++) {
    const char = format[index] ?? ""
    if (char === "%") {
      const code = format[index + 1]
      index += 1
      if (code === "%") {
        source += "%"
        continue
      }
      const spec = code === undefined ? undefined : DIRECTIVES[code]
      if (!spec || code === undefined) {
        return undefined
      }
      codes.push(code)
      source += `(${spec.pattern})`
    } else if (/\s/.test(char)) {
      source += String.raw`\s+`
      while (/\s/.test(format[index + 1] ?? "")) {
        index += 1
      }
    } else {
      source += escapeRegExp(char)
    }
  }
  return { regex: new RegExp(`^${source}$`, "i"), codes }
}

/**
 * Parse text against a strptime pattern. The whole text must match; fields
 * absent from the pattern default to 1900-01-01T00:00:00.
 */
export const strptime = (text: string, format: string): ParsedDateTime | undefined => {
  const compiled = compileFormat(format)
  const match = compiled?.regex.exec(text)
  if (!compiled || !match) {
    return undefined
  }
  const slots: ParseSlots = {}
  for (const [index, code] of compiled.codes.entries()) {
    const spec = DIRECTIVES[code]
    const captured = match[index + 1]
    if (!spec || captured === undefined || !spec.assign(slots, captured)) {
      return undefined
    }
  }
  let hour = slots.hour ?? 0
  if (slots.hour12 !== undefined) {
    if (slots.hour12 < 1 || slots.hour12 > 12) {
      return undefined
    }
    hour = (slots.hour12 % 12) + (slots.pm ? 12 : 0)
  }
  const year = slots.year ?? DEFAULT_DATE.year
  let date: DateFields = { year, month: slots.month ?? 1, day: slots.day ?? 1 }
  if (slots.dayOfYear !== undefined && slots.month === undefined && slots.day === undefined) {
    const lastDay = isLeapYear(year) ? 366 : 365
    if (slots.dayOfYear < 1 || slots.dayOfYear > lastDay) {
      return undefined
    }
    date = fromOrdinal(toOrdinal({ year, month: 1, day: 1 }) + slots.dayOfYear - 1)
  }
  const time: TimeFields = {
    hour,
    minute: slots.minute ?? 0,
    second: slots.second ?? 0,
    microsecond: slots.microsecond ?? 0,
  }
  if (!isValidDate(date) || !isValidTime(time)) {
    return undefined
  }
  return { ...date, ...time, offsetSeconds: slots.offsetSeconds }
}
