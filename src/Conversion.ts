/**
 * Single-type converters between runtime values and their string forms.
 *
 * Three families share one set of parsing rules:
 *
 * - `xToStr` / `strToX` soft-fail with `Option.none()` when the input is not
 *   of the expected runtime type or is malformed.
 * - `coerceX` accepts any value with a lossless path to `X`; the identification
 *   predicates and the hard constructors are both built on it.
 * - `toX` commits to a target type and fails with `ConversionError`.
 *
 * @since 0.1.0
 */

import { BigDecimal, Effect, HashMap, HashSet, Option } from "effect"
import { ConversionError } from "./Errors.js"
import { ConversionSettings, type TextEncodingName } from "./Settings.js"
import {
  Complex,
  Counter,
  DefaultMap,
  Deque,
  Fraction,
  FsPath,
  PlainDate,
  PlainDateTime,
  PlainTime,
  TimeDelta,
  TimezoneOffset,
  Tuple,
  type TypeTag,
  TypeNames,
  Uuid,
} from "./Values.js"
import { decodeBytesLiteral, display, dumpJson, formatDecimal, formatInt, type Json } from "./internal/display.js"
import {
  type Dict,
  isBool,
  isBytes,
  isComplex,
  isCounter,
  isDate,
  isDatetime,
  isDecimal,
  isDefaultdict,
  isDeque,
  isDict,
  isFloat,
  isFraction,
  isFrozendict,
  isFrozenset,
  isInt,
  isList,
  isPath,
  isPrimitiveType,
  isSet,
  isStr,
  isTime,
  isTimedelta,
  isTimezone,
  isTuple,
  isUuid,
  iterableItems,
  mappingEntries,
} from "./internal/guards.js"
import { parseComplexLiteral } from "./internal/literals/ComplexParser.js"
import { LiteralDiagnosticError } from "./internal/literals/Diagnostic.js"
import { parseIsoDuration } from "./internal/literals/DurationParser.js"
import { formatFloat, parseDecimalText, parseFloatText, parseIntText, toSafeNumber } from "./internal/numbers.js"
import {
  type FormatFields,
  type ParsedDateTime,
  type ParsedTime,
  parseIsoDate,
  parseIsoDateTime,
  parseIsoOffset,
  parseIsoTime,
  strftime,
  strptime,
} from "./internal/temporal.js"

/**
 * Output style of the container converters: JSON text, or the elements
 * (keys for mappings) joined with `", "`.
 *
 * @since 0.1.0
 * @category Models
 */
export type ContainerFormat = "json" | "simple"

const attemptLiteral = <A>(parse: () => A): Option.Option<A> => {
  try {
    return Option.some(parse())
  } catch (error) {
    if (error instanceof LiteralDiagnosticError) {
      return Option.none()
    }
    throw error
  }
}

const parseJson = (text: string): Option.Option<unknown> => {
  try {
    const decoded: unknown = JSON.parse(text)
    return Option.some(decoded)
  } catch (error) {
    if (error instanceof SyntaxError) {
      return Option.none()
    }
    throw error
  }
}

const fromString = <A>(value: unknown, parse: (text: string) => Option.Option<A>): Option.Option<A> =>
  isStr(value) ? parse(value) : Option.none()

const offsetFrom = (offsetSeconds: number | undefined): TimezoneOffset | undefined =>
  offsetSeconds === undefined ? undefined : Option.getOrUndefined(TimezoneOffset.from(offsetSeconds))

const dateFromParsed = (parsed: ParsedDateTime | undefined): Option.Option<PlainDate> =>
  parsed ? PlainDate.from(parsed) : Option.none()

const timeFromParsed = (parsed: ParsedTime | undefined): Option.Option<PlainTime> =>
  parsed ? PlainTime.from(parsed, offsetFrom(parsed.offsetSeconds)) : Option.none()

const datetimeFromParsed = (parsed: ParsedDateTime | undefined): Option.Option<PlainDateTime> =>
  parsed ? PlainDateTime.from(parsed, parsed, offsetFrom(parsed.offsetSeconds)) : Option.none()

const isDelimited = (text: string, open: string, close: string): boolean =>
  text.length >= 2 && text.startsWith(open) && text.endsWith(close)

// ---------------------------------------------------------------------------
// strToX
// ---------------------------------------------------------------------------

const TRUE_TOKENS: ReadonlySet<string> = new Set(["true", "1", "t", "y", "yes"])
const FALSE_TOKENS: ReadonlySet<string> = new Set(["false", "0", "f", "n", "no"])

/**
 * `true/1/t/y/yes` and `false/0/f/n/no`, case-insensitive.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToBool = (value: unknown): Option.Option<boolean> =>
  fromString(value, (text) => {
    const token = text.trim().toLowerCase()
    if (TRUE_TOKENS.has(token)) {
      return Option.some(true)
    }
    return FALSE_TOKENS.has(token) ? Option.some(false) : Option.none()
  })

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToBytes = (value: unknown): Option.Option<Uint8Array> =>
  fromString(value, (text) => Option.fromNullable(decodeBytesLiteral(text)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToComplex = (value: unknown): Option.Option<Complex> =>
  fromString(value, (text) =>
    Option.map(attemptLiteral(() => parseComplexLiteral(text)), ({ imag, real }) => Complex.of(real, imag)))

/**
 * `{...}` delimited JSON object.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToDict = (value: unknown): Option.Option<Dict> =>
  fromString(value, (text) => {
    const trimmed = text.trim()
    if (!isDelimited(trimmed, "{", "}")) {
      return Option.none()
    }
    return Option.filter(parseJson(trimmed), isDict)
  })

/**
 * `[...]` delimited JSON array.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToList = (value: unknown): Option.Option<ReadonlyArray<unknown>> =>
  fromString(value, (text) => {
    const trimmed = text.trim()
    if (!isDelimited(trimmed, "[", "]")) {
      return Option.none()
    }
    return Option.filter(parseJson(trimmed), isList)
  })

/**
 * JSON object whose values are all non-negative integers.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToCounter = (value: unknown): Option.Option<Counter<string>> =>
  Option.flatMap(strToDict(value), (dict) => {
    const entries = Object.entries(dict)
    const counts: Array<readonly [string, number]> = []
    for (const [key, count] of entries) {
      if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
        return Option.none()
      }
      counts.push([key, count])
    }
    return Option.some(Counter.fromCounts(counts))
  })

/**
 * ISO-8601 calendar or week date, or a strptime pattern when `format` is set.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToDate = (value: unknown, format?: string): Option.Option<PlainDate> =>
  fromString(value, (text) =>
    format === undefined
      ? Option.flatMap(Option.fromNullable(parseIsoDate(text)), PlainDate.from)
      : dateFromParsed(strptime(text, format)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToDatetime = (value: unknown, format?: string): Option.Option<PlainDateTime> =>
  fromString(value, (text) => datetimeFromParsed(format === undefined ? parseIsoDateTime(text) : strptime(text, format)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToTime = (value: unknown, format?: string): Option.Option<PlainTime> =>
  fromString(value, (text) => timeFromParsed(format === undefined ? parseIsoTime(text) : strptime(text, format)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToDecimal = (value: unknown): Option.Option<BigDecimal.BigDecimal> =>
  fromString(value, (text) =>
    Option.map(Option.fromNullable(parseDecimalText(text)), ({ digits, scale }) => BigDecimal.make(digits, scale)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToDefaultdict = (value: unknown): Option.Option<DefaultMap<string, unknown>> =>
  Option.map(strToDict(value), (dict) => new DefaultMap<string, unknown>(undefined, Object.entries(dict)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToDeque = (value: unknown): Option.Option<Deque<unknown>> =>
  Option.map(strToList(value), (items) => new Deque(items))

/**
 * Float literal, including `inf`, `infinity` and `nan`.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToFloat = (value: unknown): Option.Option<number> =>
  fromString(value, (text) => Option.fromNullable(parseFloatText(text)))

const DIGITS = String.raw`\d(?:_?\d)*`
const RATIO_PATTERN = new RegExp(String.raw`^([+-]?${DIGITS})\s*/\s*(${DIGITS})$`)

/**
 * `[sign]int[/int]` or decimal text; a zero denominator is none.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToFraction = (value: unknown): Option.Option<Fraction> =>
  fromString(value, (text) => {
    const trimmed = text.trim()
    const ratio = RATIO_PATTERN.exec(trimmed)
    if (ratio) {
      const numerator = parseIntText(ratio[1] ?? "")
      const denominator = parseIntText(ratio[2] ?? "")
      return numerator === undefined || denominator === undefined
        ? Option.none()
        : Fraction.from(numerator, denominator)
    }
    return Option.flatMap(strToDecimal(trimmed), Fraction.fromDecimal)
  })

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToFrozendict = (value: unknown): Option.Option<HashMap.HashMap<string, unknown>> =>
  Option.map(strToDict(value), (dict) => HashMap.fromIterable(Object.entries(dict)))

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToFrozenset = (value: unknown): Option.Option<HashSet.HashSet<unknown>> =>
  Option.map(strToList(value), (items) => HashSet.fromIterable(items))

/**
 * Integers outside the safe range come back as `bigint`.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToInt = (value: unknown): Option.Option<number | bigint> =>
  fromString(value, (text) => Option.map(Option.fromNullable(parseIntText(text)), toSafeNumber))

/**
 * Text that looks like a path: a separator, or a leading `.` or `~`.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToPath = (value: unknown): Option.Option<FsPath> =>
  fromString(value, (text) => {
    const plausible = text.length > 0 && !text.includes("\0")
      && (text.includes("/") || text.includes("\\") || text.startsWith(".") || text.startsWith("~"))
    return plausible ? Option.some(FsPath.of(text)) : Option.none()
  })

const splitLiteral = (text: string, open: string, close: string): Option.Option<ReadonlyArray<string>> =>
  isDelimited(text, open, close) && !text.includes(":") ? Option.some(text.slice(1, -1).split(",")) : Option.none()

/**
 * `{...}` delimited text without `:`, split on `,` into its literal parts.
 *
 * @since 0.1.0
 * @category String parsers
 * @example
 * ```ts
 * strToSet("{1,2,3}") // Option.some(new Set(["1", "2", "3"]))
 * ```
 */
export const strToSet = (value: unknown): Option.Option<Set<string>> =>
  fromString(value, (text) => Option.map(splitLiteral(text, "{", "}"), (parts) => new Set(parts)))

/**
 * `(...)` delimited text without `:`, split on `,` into its literal parts.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToTuple = (value: unknown): Option.Option<Tuple> =>
  fromString(value, (text) => Option.map(splitLiteral(text, "(", ")"), (parts) => Tuple.of(...parts)))

const DIGIT_RUN = /^\d+$/
const DAYS_CLOCK_PATTERN = /^(-?\d+) days?, (\d{1,2}):(\d{2}):(\d{2})(?:\.(\d{6}))?$/

const MICROS = {
  second: 1_000_000n,
  minute: 60_000_000n,
  hour: 3_600_000_000n,
  day: 86_400_000_000n,
} as const

const commaClock = (text: string): Option.Option<TimeDelta> => {
  const parts = text.split(",")
  const clock = (parts[1] ?? "").split(":")
  const fields = [parts[0] ?? "", ...clock]
  if (parts.length !== 2 || clock.length !== 3 || !fields.every((field) => DIGIT_RUN.test(field))) {
    return Option.none()
  }
  const [days = 0n, hours = 0n, minutes = 0n, seconds = 0n] = fields.map((field) => BigInt(field))
  return TimeDelta.fromMicroseconds(
    days * MICROS.day + hours * MICROS.hour + minutes * MICROS.minute + seconds * MICROS.second,
  )
}

const daysClock = (text: string): Option.Option<TimeDelta> => {
  const match = DAYS_CLOCK_PATTERN.exec(text)
  if (!match) {
    return Option.none()
  }
  const [hours, minutes, seconds] = [Number(match[2]), Number(match[3]), Number(match[4])]
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return Option.none()
  }
  return TimeDelta.fromMicroseconds(
    BigInt(match[1] ?? "0") * MICROS.day
      + BigInt(hours) * MICROS.hour
      + BigInt(minutes) * MICROS.minute
      + BigInt(seconds) * MICROS.second
      + BigInt(match[5] ?? "0"),
  )
}

/**
 * ISO-8601 duration, then `D,HH:MM:SS` digits, then `D day[s], H:MM:SS[.ffffff]`.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToTimedelta = (value: unknown): Option.Option<TimeDelta> =>
  fromString(value, (text) =>
    Option.flatMap(attemptLiteral(() => parseIsoDuration(text)), TimeDelta.fromMicroseconds).pipe(
      Option.orElse(() => commaClock(text)),
      Option.orElse(() => daysClock(text)),
    ))

const UTC_OFFSET_PATTERN = /^(?:UTC)?([+-]\d{2}:\d{2}(?::\d{2})?)$/

/**
 * `UTC`, `Z`, `UTC±HH:MM[:SS]` or `±HH:MM[:SS]`.
 *
 * @since 0.1.0
 * @category String parsers
 */
export const strToTimezone = (value: unknown): Option.Option<TimezoneOffset> =>
  fromString(value, (text) => {
    if (text === "UTC" || text === "Z") {
      return Option.some(TimezoneOffset.utc)
    }
    const match = UTC_OFFSET_PATTERN.exec(text)
    const seconds = match ? parseIsoOffset(match[1] ?? "") : undefined
    return seconds === undefined ? Option.none() : TimezoneOffset.from(seconds)
  })

/**
 * @since 0.1.0
 * @category String parsers
 */
export const strToUuid = (value: unknown): Option.Option<Uuid> => fromString(value, Uuid.parse)

// ---------------------------------------------------------------------------
// xToStr
// ---------------------------------------------------------------------------

const jsonKey = (key: unknown): string | undefined => {
  switch (typeof key) {
    case "string":
      return key
    case "boolean":
      return key ? "true" : "false"
    case "number":
      return Number.isFinite(key) ? formatFloat(key) : undefined
    case "bigint":
      return key.toString()
  }
  return key === null ? "null" : undefined
}

/**
 * JSON tree of a value built only from JSON-native parts; `undefined` when
 * anything inside has no JSON form.
 */
const toJsonTree = (value: unknown, seen: ReadonlySet<unknown> = new Set()): Json | undefined => {
  if (value === null || value === undefined) {
    return null
  }
  if (typeof value === "boolean" || typeof value === "string" || typeof value === "bigint") {
    return value
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined
  }
  if (seen.has(value)) {
    return undefined
  }
  const inner = new Set([...seen, value])
  const entries = mappingEntries(value)
  if (entries) {
    const members: Array<[string, Json]> = []
    for (const [key, item] of entries) {
      const name = jsonKey(key)
      const tree = toJsonTree(item, inner)
      if (name === undefined || tree === undefined) {
        return undefined
      }
      members.push([name, tree])
    }
    return Object.fromEntries(members)
  }
  if (isList(value) || isTuple(value) || isSet(value) || isFrozenset(value) || isDeque(value)) {
    const items: Array<Json> = []
    for (const item of iterableItems(value) ?? []) {
      const tree = toJsonTree(item, inner)
      if (tree === undefined) {
        return undefined
      }
      items.push(tree)
    }
    return items
  }
  return undefined
}

const containerToStr = (
  value: unknown,
  format: ContainerFormat,
  parts: ReadonlyArray<unknown> | undefined,
): Option.Option<string> => {
  if (parts === undefined) {
    return Option.none()
  }
  if (format === "json") {
    return Option.map(Option.fromNullable(toJsonTree(value)), (tree) => dumpJson(tree))
  }
  return Option.some(parts.map(display).join(", "))
}

const mappingKeys = (value: unknown): ReadonlyArray<unknown> | undefined =>
  mappingEntries(value)?.map(([key]) => key)

/**
 * `True` or `False`.
 *
 * @since 0.1.0
 * @category String renderers
 */
export const boolToStr = (value: unknown): Option.Option<string> =>
  isBool(value) ? Option.some(value ? "True" : "False") : Option.none()

/**
 * UTF-8 decoding; none when the bytes are not valid UTF-8.
 *
 * @since 0.1.0
 * @category String renderers
 */
export const bytesToStr = (value: unknown): Option.Option<string> => {
  if (!isBytes(value)) {
    return Option.none()
  }
  try {
    return Option.some(new TextDecoder("utf-8", { fatal: true }).decode(value))
  } catch (error) {
    if (error instanceof TypeError) {
      return Option.none()
    }
    throw error
  }
}

/**
 * @since 0.1.0
 * @category String renderers
 */
export const complexToStr = (value: unknown): Option.Option<string> =>
  isComplex(value) ? Option.some(value.toString()) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const counterToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isCounter(value) ? containerToStr(value, format, [...value.keys()]) : Option.none()

const temporalFields = (value: PlainDate | PlainDateTime | PlainTime): FormatFields => {
  const zone = value instanceof PlainDate ? undefined : value.offset
  return {
    date: value instanceof PlainTime ? undefined : value,
    time: value instanceof PlainDate ? undefined : value,
    offsetSeconds: zone?.offsetSeconds,
    zoneName: zone?.toString(),
  }
}

/**
 * ISO `YYYY-MM-DD`, or strftime output when `format` is set.
 *
 * @since 0.1.0
 * @category String renderers
 */
export const dateToStr = (value: unknown, format?: string): Option.Option<string> =>
  isDate(value)
    ? Option.some(format === undefined ? value.toString() : strftime(format, temporalFields(value)))
    : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const datetimeToStr = (value: unknown, format?: string): Option.Option<string> =>
  isDatetime(value)
    ? Option.some(format === undefined ? value.toString() : strftime(format, temporalFields(value)))
    : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const timeToStr = (value: unknown, format?: string): Option.Option<string> =>
  isTime(value)
    ? Option.some(format === undefined ? value.toString() : strftime(format, temporalFields(value)))
    : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const decimalToStr = (value: unknown): Option.Option<string> =>
  isDecimal(value) ? Option.some(formatDecimal(value)) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const defaultdictToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isDefaultdict(value) ? containerToStr(value, format, [...value.keys()]) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const dequeToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isDeque(value) ? containerToStr(value, format, value.toArray()) : Option.none()

/**
 * JSON text with `", "` and `": "` separators, or the keys joined.
 *
 * @since 0.1.0
 * @category String renderers
 * @example
 * ```ts
 * dictToStr({ x: 1 }, "json") // Option.some('{"x": 1}')
 * dictToStr({ x: 1, y: 2 })   // Option.some("x, y")
 * ```
 */
export const dictToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isDict(value) ? containerToStr(value, format, Object.keys(value)) : Option.none()

/**
 * Shortest text that reads back to the same number.
 *
 * @since 0.1.0
 * @category String renderers
 */
export const floatToStr = (value: unknown): Option.Option<string> =>
  typeof value === "number" ? Option.some(formatFloat(value)) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const fractionToStr = (value: unknown): Option.Option<string> =>
  isFraction(value) ? Option.some(value.toString()) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const frozendictToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isFrozendict(value) ? containerToStr(value, format, mappingKeys(value)) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const frozensetToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isFrozenset(value) ? containerToStr(value, format, [...value]) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const intToStr = (value: unknown): Option.Option<string> =>
  isInt(value) ? Option.some(formatInt(value)) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const listToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isList(value) ? containerToStr(value, format, value) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const pathToStr = (value: unknown): Option.Option<string> =>
  isPath(value) ? Option.some(value.value) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const setToStr = (value: unknown, format: ContainerFormat = "simple"): Option.Option<string> =>
  isSet(value) ? containerToStr(value, format, [...value]) : Option.none()

/**
 * ISO-8601 duration such as `P1DT2H3M4.5S`.
 *
 * @since 0.1.0
 * @category String renderers
 */
export const timedeltaToStr = (value: unknown): Option.Option<string> =>
  isTimedelta(value) ? Option.some(value.toString()) : Option.none()

/**
 * `UTC` or `UTC±HH:MM`.
 *
 * @since 0.1.0
 * @category String renderers
 */
export const timezoneToStr = (value: unknown): Option.Option<string> =>
  isTimezone(value) ? Option.some(value.toString()) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const tupleToStr = (value: unknown): Option.Option<string> =>
  isTuple(value) ? Option.some(display(value)) : Option.none()

/**
 * @since 0.1.0
 * @category String renderers
 */
export const uuidToStr = (value: unknown): Option.Option<string> =>
  isUuid(value) ? Option.some(value.value) : Option.none()

// ---------------------------------------------------------------------------
// coerceX
// ---------------------------------------------------------------------------

const safeNumber = (value: number | bigint): Option.Option<number> => {
  if (typeof value === "number") {
    return Option.some(value)
  }
  const narrowed = toSafeNumber(value)
  return typeof narrowed === "number" ? Option.some(narrowed) : Option.none()
}

const stringKeyed = (value: unknown): Option.Option<ReadonlyArray<readonly [string, unknown]>> => {
  const entries = mappingEntries(value)
  if (entries === undefined) {
    return Option.none()
  }
  const keyed: Array<readonly [string, unknown]> = []
  for (const [key, item] of entries) {
    if (typeof key !== "string") {
      return Option.none()
    }
    keyed.push([key, item])
  }
  return Option.some(keyed)
}

/**
 * Strings by the token set; otherwise booleans and the numbers 0 and 1.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceBool = (value: unknown): Option.Option<boolean> => {
  if (isStr(value)) {
    return strToBool(value)
  }
  if (isBool(value)) {
    return Option.some(value)
  }
  if (value === 0 || value === 1 || value === 0n || value === 1n) {
    return Option.some(value === 1 || value === 1n)
  }
  return Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceInt = (value: unknown): Option.Option<number | bigint> => {
  if (isStr(value)) {
    return strToInt(value)
  }
  if (isBool(value)) {
    return Option.some(value ? 1 : 0)
  }
  return isInt(value) ? Option.some(value) : Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceFloat = (value: unknown): Option.Option<number> => {
  if (isStr(value)) {
    return strToFloat(value)
  }
  if (isBool(value)) {
    return Option.some(value ? 1 : 0)
  }
  return isInt(value) || isFloat(value) ? safeNumber(value) : Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceComplex = (value: unknown): Option.Option<Complex> => {
  if (isStr(value)) {
    return strToComplex(value)
  }
  if (isComplex(value)) {
    return Option.some(value)
  }
  return isInt(value) || isFloat(value) ? Option.map(safeNumber(value), (real) => Complex.of(real)) : Option.none()
}

/**
 * Numbers convert through their shortest text, so `0.1` is exactly `0.1`.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceDecimal = (value: unknown): Option.Option<BigDecimal.BigDecimal> => {
  if (isStr(value)) {
    return strToDecimal(value)
  }
  if (isDecimal(value)) {
    return Option.some(value)
  }
  if (typeof value === "bigint") {
    return Option.some(BigDecimal.make(value, 0))
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return strToDecimal(isInt(value) ? formatInt(value) : formatFloat(value))
  }
  return Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceFraction = (value: unknown): Option.Option<Fraction> => {
  if (isStr(value)) {
    return strToFraction(value)
  }
  if (isFraction(value)) {
    return Option.some(value)
  }
  if (typeof value === "bigint") {
    return Fraction.from(value)
  }
  if (typeof value === "number") {
    return Fraction.fromNumber(value)
  }
  return isDecimal(value) ? Fraction.fromDecimal(value) : Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceBytes = (value: unknown): Option.Option<Uint8Array> => {
  if (isStr(value)) {
    return strToBytes(value)
  }
  return isBytes(value) ? Option.some(value) : Option.none()
}

/**
 * A datetime also counts as a date.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceDate = (value: unknown): Option.Option<PlainDate> => {
  if (isStr(value)) {
    return strToDate(value)
  }
  if (isDate(value)) {
    return Option.some(value)
  }
  return isDatetime(value) ? Option.some(value.toPlainDate()) : Option.none()
}

/**
 * JavaScript `Date` instances and epoch milliseconds convert to UTC.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceDatetime = (value: unknown): Option.Option<PlainDateTime> => {
  if (isStr(value)) {
    return strToDatetime(value)
  }
  if (isDatetime(value)) {
    return Option.some(value)
  }
  if (value instanceof Date) {
    return PlainDateTime.fromEpochMillis(value.getTime())
  }
  return typeof value === "number" ? PlainDateTime.fromEpochMillis(value) : Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceTime = (value: unknown): Option.Option<PlainTime> => {
  if (isStr(value)) {
    return strToTime(value)
  }
  if (isTime(value)) {
    return Option.some(value)
  }
  return isDatetime(value) ? Option.some(value.toPlainTime()) : Option.none()
}

/**
 * Numbers count days.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceTimedelta = (value: unknown): Option.Option<TimeDelta> => {
  if (isStr(value)) {
    return strToTimedelta(value)
  }
  if (isTimedelta(value)) {
    return Option.some(value)
  }
  return typeof value === "number" ? TimeDelta.fromDays(value) : Option.none()
}

/**
 * A timedelta of whole seconds inside one day also counts as an offset.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceTimezone = (value: unknown): Option.Option<TimezoneOffset> => {
  if (isStr(value)) {
    return strToTimezone(value)
  }
  if (isTimezone(value)) {
    return Option.some(value)
  }
  if (isTimedelta(value) && value.microseconds === 0) {
    return TimezoneOffset.from(value.days * 86_400 + value.seconds)
  }
  return Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceUuid = (value: unknown): Option.Option<Uuid> => {
  if (isStr(value)) {
    return strToUuid(value)
  }
  if (isUuid(value)) {
    return Option.some(value)
  }
  return isBytes(value) ? Uuid.fromBytes(value) : Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coercePath = (value: unknown): Option.Option<FsPath> => {
  if (isStr(value)) {
    return strToPath(value)
  }
  return isPath(value) ? Option.some(value) : Option.none()
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceList = (value: unknown): Option.Option<ReadonlyArray<unknown>> => {
  if (isStr(value)) {
    return strToList(value)
  }
  return Option.map(Option.fromNullable(iterableItems(value)), (items) => [...items])
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceTuple = (value: unknown): Option.Option<Tuple> => {
  if (isStr(value)) {
    return strToTuple(value)
  }
  if (isTuple(value)) {
    return Option.some(value)
  }
  return Option.map(Option.fromNullable(iterableItems(value)), Tuple.fromIterable)
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceSet = (value: unknown): Option.Option<Set<unknown>> => {
  if (isStr(value)) {
    return strToSet(value)
  }
  return Option.map(Option.fromNullable(iterableItems(value)), (items) => new Set(items))
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceFrozenset = (value: unknown): Option.Option<HashSet.HashSet<unknown>> => {
  if (isStr(value)) {
    return strToFrozenset(value)
  }
  if (isFrozenset(value)) {
    return Option.some(value)
  }
  return Option.map(Option.fromNullable(iterableItems(value)), (items) => HashSet.fromIterable(items))
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceDeque = (value: unknown): Option.Option<Deque<unknown>> => {
  if (isStr(value)) {
    return strToDeque(value)
  }
  if (isDeque(value)) {
    return Option.some(value)
  }
  return Option.map(Option.fromNullable(iterableItems(value)), (items) => new Deque(items))
}

/**
 * Mappings with string keys.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceDict = (value: unknown): Option.Option<Dict> => {
  if (isStr(value)) {
    return strToDict(value)
  }
  if (isDict(value)) {
    return Option.some(value)
  }
  return Option.map(stringKeyed(value), (entries) => Object.fromEntries(entries))
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceFrozendict = (value: unknown): Option.Option<HashMap.HashMap<unknown, unknown>> => {
  if (isStr(value)) {
    return strToFrozendict(value)
  }
  if (isFrozendict(value)) {
    return Option.some(value)
  }
  return Option.map(Option.fromNullable(mappingEntries(value)), (entries) => HashMap.fromIterable(entries))
}

/**
 * @since 0.1.0
 * @category Coercions
 */
export const coerceDefaultdict = (value: unknown): Option.Option<DefaultMap<unknown, unknown>> => {
  if (isStr(value)) {
    return strToDefaultdict(value)
  }
  if (isDefaultdict(value)) {
    return Option.some(value)
  }
  return Option.map(
    Option.fromNullable(mappingEntries(value)),
    (entries) => new DefaultMap<unknown, unknown>(undefined, entries),
  )
}

/**
 * Mappings whose values are all non-negative integers.
 *
 * @since 0.1.0
 * @category Coercions
 */
export const coerceCounter = (value: unknown): Option.Option<Counter<unknown>> => {
  if (isStr(value)) {
    return strToCounter(value)
  }
  if (isCounter(value)) {
    return Option.some(value)
  }
  const entries = mappingEntries(value)
  if (entries === undefined) {
    return Option.none()
  }
  const counts: Array<readonly [unknown, number]> = []
  for (const [key, count] of entries) {
    if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
      return Option.none()
    }
    counts.push([key, count])
  }
  return Option.some(Counter.fromCounts(counts))
}

// ---------------------------------------------------------------------------
// toX
// ---------------------------------------------------------------------------

const commit = <A>(tag: TypeTag, coerce: (value: unknown) => Option.Option<A>) =>
(value: unknown): Effect.Effect<A, ConversionError> =>
  Option.match(coerce(value), {
    onNone: () => Effect.fail(new ConversionError({ value, targetType: TypeNames[tag] })),
    onSome: Effect.succeed,
  })

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toDate: (value: unknown) => Effect.Effect<PlainDate, ConversionError> = commit("date", coerceDate)

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toDatetime: (value: unknown) => Effect.Effect<PlainDateTime, ConversionError> = commit(
  "datetime",
  coerceDatetime,
)

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toDecimal: (value: unknown) => Effect.Effect<BigDecimal.BigDecimal, ConversionError> = commit(
  "decimal",
  coerceDecimal,
)

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toFraction: (value: unknown) => Effect.Effect<Fraction, ConversionError> = commit(
  "fraction",
  coerceFraction,
)

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toTime: (value: unknown) => Effect.Effect<PlainTime, ConversionError> = commit("time", coerceTime)

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toTimedelta: (value: unknown) => Effect.Effect<TimeDelta, ConversionError> = commit(
  "timedelta",
  coerceTimedelta,
)

/**
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```ts
 * const error = Effect.runSync(Effect.flip(toUuid("not-a-uuid")))
 * error.targetType // "UUID"
 * ```
 */
export const toUuid: (value: unknown) => Effect.Effect<Uuid, ConversionError> = commit("uuid", coerceUuid)

/**
 * Truthiness: empty containers, zero, the empty string and `None` are false.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const toBool = (value: unknown): boolean => {
  if (value === null || value === undefined) {
    return false
  }
  switch (typeof value) {
    case "boolean":
      return value
    case "number":
      return value !== 0
    case "bigint":
      return value !== 0n
    case "string":
      return value.length > 0
  }
  if (isComplex(value)) {
    return value.real !== 0 || value.imag !== 0
  }
  if (isDecimal(value)) {
    return !BigDecimal.isZero(value)
  }
  if (isFraction(value)) {
    return value.numerator !== 0n
  }
  if (isTimedelta(value)) {
    return value.totalMicroseconds !== 0n
  }
  if (isBytes(value)) {
    return value.length > 0
  }
  const items = iterableItems(value)
  return items === undefined ? true : items.length > 0
}

/**
 * UTF-8 encoding of strings, copies of byte sequences and of arrays of
 * integers 0-255, or a zero-filled buffer of a non-negative length.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const toBytes = (value: unknown): Effect.Effect<Uint8Array, ConversionError> =>
  Effect.suspend(() => {
    if (isStr(value)) {
      return Effect.succeed(new TextEncoder().encode(value))
    }
    if (isBytes(value)) {
      return Effect.succeed(Uint8Array.from(value))
    }
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
      return Effect.succeed(new Uint8Array(value))
    }
    const items = isList(value) || isTuple(value) || isDeque(value) ? iterableItems(value) : undefined
    if (items && items.every((item) => typeof item === "number" && Number.isInteger(item) && item >= 0 && item <= 255)) {
      return Effect.succeed(Uint8Array.from(items, Number))
    }
    return Effect.fail(new ConversionError({ value, targetType: TypeNames.bytes }))
  })

/**
 * @since 0.1.0
 * @category Constructors
 */
export const toPath = (value: unknown): Effect.Effect<FsPath, ConversionError> =>
  isPath(value)
    ? Effect.succeed(value)
    : isStr(value)
    ? Effect.succeed(FsPath.of(value))
    : Effect.fail(new ConversionError({ value, targetType: TypeNames.path }))

const ASCII = /^[\x00-\x7f]*$/

const survivesEncoding = (text: string, encoding: TextEncodingName): boolean =>
  encoding === "ascii" ? ASCII.test(text) : new TextDecoder().decode(new TextEncoder().encode(text)) === text

/**
 * Renders the value, then checks the text survives an encode/decode round
 * trip through `encoding`.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const toStr = (value: unknown, encoding: TextEncodingName = "utf-8"): Effect.Effect<string, ConversionError> =>
  Effect.suspend(() => {
    const text = display(value)
    return survivesEncoding(text, encoding)
      ? Effect.succeed(text)
      : Effect.fail(new ConversionError({ value, targetType: TypeNames.str }))
  })

// ---------------------------------------------------------------------------
// convertToStr
// ---------------------------------------------------------------------------

/**
 * One row of a dispatch table: the first row whose `test` accepts a value
 * handles it.
 *
 * @since 0.1.0
 * @category Models
 */
export interface DispatchRow<Tag extends string, Handler> {
  readonly tag: Tag
  readonly test: (value: unknown) => boolean
  readonly handler: Handler
}

/**
 * @since 0.1.0
 * @category Models
 */
export type StringConversionRow = DispatchRow<TypeTag | "primitive", (value: unknown, format: ContainerFormat) => Option.Option<string>>

const primitiveToStr = (value: unknown): Option.Option<string> =>
  isPrimitiveType(value) || isStr(value) ? Option.some(display(value)) : Option.none()

/**
 * Exact-type dispatch order of `convertToStr`.
 *
 * @since 0.1.0
 * @category Dispatch
 */
export const StringConversionChain: ReadonlyArray<StringConversionRow> = [
  { tag: "primitive", test: (value) => isPrimitiveType(value) || isStr(value), handler: primitiveToStr },
  { tag: "date", test: isDate, handler: (value) => dateToStr(value) },
  { tag: "datetime", test: isDatetime, handler: (value) => datetimeToStr(value) },
  { tag: "decimal", test: isDecimal, handler: decimalToStr },
  { tag: "dict", test: isDict, handler: dictToStr },
  { tag: "list", test: isList, handler: listToStr },
  { tag: "path", test: isPath, handler: pathToStr },
  { tag: "time", test: isTime, handler: (value) => timeToStr(value) },
  { tag: "timedelta", test: isTimedelta, handler: timedeltaToStr },
  { tag: "timezone", test: isTimezone, handler: timezoneToStr },
  { tag: "set", test: isSet, handler: setToStr },
  { tag: "uuid", test: isUuid, handler: uuidToStr },
]

/**
 * Generic dispatcher: the first matching row of `StringConversionChain`
 * renders the value; anything else goes through `toStr` with the configured
 * encoding.
 *
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```ts
 * convertToStr(3.14)             // Effect.succeed("3.14")
 * convertToStr({ x: 1 }, "json") // Effect.succeed('{"x": 1}')
 * ```
 */
export const convertToStr = (
  value: unknown,
  format: ContainerFormat = "simple",
): Effect.Effect<string, ConversionError> =>
  Effect.gen(function* () {
    const row = StringConversionChain.find((candidate) => candidate.test(value))
    if (row === undefined) {
      const settings = yield* ConversionSettings
      return yield* toStr(value, settings.encoding)
    }
    const rendered = row.handler(value, format)
    if (Option.isNone(rendered)) {
      return yield* Effect.fail(new ConversionError({ value, targetType: TypeNames.str }))
    }
    return rendered.value
  })
