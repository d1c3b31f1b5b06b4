/**
 * Value universe for the conversion toolkit.
 *
 * JavaScript only ships a handful of the semantic types the converters work
 * with, so this module defines the missing ones. Classes built on
 * `Data.TaggedClass` compare structurally with `Equal.equals`; collection
 * classes extend the built-in `Map` so they interoperate with ordinary code.
 *
 * @since 0.1.0
 */

import { BigDecimal, Data, Equal, Hash, HashMap, HashSet, Option } from "effect"
import { divideRoundHalfEven, exactRatio, floorDivide, formatFloat, gcd, powerOfTen } from "./internal/numbers.js"
import {
  type DateFields,
  formatIsoDate,
  formatIsoTime,
  formatOffset,
  fromOrdinal,
  isoWeekday,
  isValidDate,
  isValidOffset,
  isValidTime,
  type TimeFields,
  toOrdinal,
} from "./internal/temporal.js"

/**
 * Closed set of semantic type tags.
 *
 * @since 0.1.0
 * @category Tags
 */
export const TypeTags = [
  "none",
  "bool",
  "int",
  "float",
  "complex",
  "decimal",
  "fraction",
  "str",
  "bytes",
  "date",
  "datetime",
  "time",
  "timedelta",
  "timezone",
  "uuid",
  "path",
  "list",
  "tuple",
  "dict",
  "set",
  "frozenset",
  "frozendict",
  "counter",
  "defaultdict",
  "deque",
] as const

/**
 * @since 0.1.0
 * @category Tags
 */
export type TypeTag = (typeof TypeTags)[number]

/**
 * Type names reported in conversion failures.
 *
 * @since 0.1.0
 * @category Tags
 */
export const TypeNames: { readonly [Tag in TypeTag]: string } = {
  none: "NoneType",
  bool: "bool",
  int: "int",
  float: "float",
  complex: "complex",
  decimal: "Decimal",
  fraction: "Fraction",
  str: "str",
  bytes: "bytes",
  date: "date",
  datetime: "datetime",
  time: "time",
  timedelta: "timedelta",
  timezone: "timezone",
  uuid: "UUID",
  path: "Path",
  list: "list",
  tuple: "tuple",
  dict: "dict",
  set: "set",
  frozenset: "frozenset",
  frozendict: "frozendict",
  counter: "Counter",
  defaultdict: "defaultdict",
  deque: "deque",
}

/**
 * Complex number with `number` components.
 *
 * @since 0.1.0
 * @category Numbers
 */
export class Complex extends Data.TaggedClass("Complex")<{
  readonly real: number
  readonly imag: number
}> {
  static of(real: number, imag = 0): Complex {
    return new Complex({ real, imag })
  }

  get magnitude(): number {
    return Math.hypot(this.real, this.imag)
  }

  /**
   * `(1+2j)`, or `2j` when the real part is positive zero.
   */
  toString(): string {
    const imag = formatFloat(this.imag)
    if (Object.is(this.real, 0)) {
      return `${imag}j`
    }
    const signed = imag.startsWith("-") ? imag : `+${imag}`
    return `(${formatFloat(this.real)}${signed}j)`
  }
}

/**
 * Exact rational number in lowest terms with a positive denominator.
 *
 * @since 0.1.0
 * @category Numbers
 */
export class Fraction extends Data.TaggedClass("Fraction")<{
  readonly numerator: bigint
  readonly denominator: bigint
}> {
  static from(numerator: bigint, denominator = 1n): Option.Option<Fraction> {
    if (denominator === 0n) {
      return Option.none()
    }
    const divisor = gcd(numerator, denominator)
    const sign = denominator < 0n ? -1n : 1n
    return Option.some(
      new Fraction({ numerator: (sign * numerator) / divisor, denominator: (sign * denominator) / divisor }),
    )
  }

  /**
   * Exact value of a finite number's binary expansion.
   */
  static fromNumber(value: number): Option.Option<Fraction> {
    const ratio = exactRatio(value)
    return ratio ? Fraction.from(ratio[0], ratio[1]) : Option.none()
  }

  /**
   * Exact ratio of a decimal; none when its exponent is too large to expand.
   */
  static fromDecimal(value: BigDecimal.BigDecimal): Option.Option<Fraction> {
    const { scale, value: digits } = BigDecimal.normalize(value)
    if (digits === 0n) {
      return Fraction.from(0n)
    }
    const power = powerOfTen(Math.abs(scale))
    if (power === undefined) {
      return Option.none()
    }
    return scale >= 0 ? Fraction.from(digits, power) : Fraction.from(digits * power)
  }

  toNumber(): number {
    return Number(this.numerator) / Number(this.denominator)
  }

  toString(): string {
    return this.denominator === 1n ? `${this.numerator}` : `${this.numerator}/${this.denominator}`
  }
}

/**
 * Fixed UTC offset, optionally named.
 *
 * @since 0.1.0
 * @category Temporal
 */
export class TimezoneOffset extends Data.TaggedClass("TimezoneOffset")<{
  readonly offsetSeconds: number
  readonly name: string | undefined
}> {
  static readonly utc: TimezoneOffset = new TimezoneOffset({ offsetSeconds: 0, name: undefined })

  static from(offsetSeconds: number, name?: string): Option.Option<TimezoneOffset> {
    return Number.isInteger(offsetSeconds) && isValidOffset(offsetSeconds)
      ? Option.some(new TimezoneOffset({ offsetSeconds, name }))
      : Option.none()
  }

  toString(): string {
    if (this.name !== undefined) {
      return this.name
    }
    return this.offsetSeconds === 0 ? "UTC" : `UTC${formatOffset(this.offsetSeconds)}`
  }
}

/**
 * Calendar date in the proleptic Gregorian calendar, years 1 to 9999.
 *
 * @since 0.1.0
 * @category Temporal
 */
export class PlainDate extends Data.TaggedClass("PlainDate")<{
  readonly year: number
  readonly month: number
  readonly day: number
}> {
  static from(fields: DateFields): Option.Option<PlainDate> {
    return isValidDate(fields)
      ? Option.some(new PlainDate({ year: fields.year, month: fields.month, day: fields.day }))
      : Option.none()
  }

  static fromOrdinal(ordinal: number): Option.Option<PlainDate> {
    return ordinal >= 1 ? PlainDate.from(fromOrdinal(ordinal)) : Option.none()
  }

  toOrdinal(): number {
    return toOrdinal(this)
  }

  /** ISO weekday, Monday is 1. */
  get isoWeekday(): number {
    return isoWeekday(this)
  }

  toString(): string {
    return formatIsoDate(this)
  }
}

/**
 * Wall-clock time with microsecond precision and an optional offset.
 *
 * @since 0.1.0
 * @category Temporal
 */
export class PlainTime extends Data.TaggedClass("PlainTime")<{
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
  readonly offset: TimezoneOffset | undefined
}> {
  static from(fields: TimeFields, offset?: TimezoneOffset): Option.Option<PlainTime> {
    return isValidTime(fields)
      ? Option.some(
        new PlainTime({
          hour: fields.hour,
          minute: fields.minute,
          second: fields.second,
          microsecond: fields.microsecond,
          offset,
        }),
      )
      : Option.none()
  }

  toString(): string {
    return formatIsoTime(this, this.offset?.offsetSeconds)
  }
}

/**
 * Date and wall-clock time with an optional offset.
 *
 * @since 0.1.0
 * @category Temporal
 */
export class PlainDateTime extends Data.TaggedClass("PlainDateTime")<{
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
  readonly offset: TimezoneOffset | undefined
}> {
  static from(date: DateFields, time: TimeFields, offset?: TimezoneOffset): Option.Option<PlainDateTime> {
    if (!isValidDate(date) || !isValidTime(time)) {
      return Option.none()
    }
    return Option.some(
      new PlainDateTime({
        year: date.year,
        month: date.month,
        day: date.day,
        hour: time.hour,
        minute: time.minute,
        second: time.second,
        microsecond: time.microsecond,
        offset,
      }),
    )
  }

  /**
   * UTC fields of an instant given as epoch milliseconds.
   */
  static fromEpochMillis(millis: number): Option.Option<PlainDateTime> {
    const micros = Math.round(millis * 1000)
    const wholeMillis = Math.floor(micros / 1000)
    const instant = new Date(wholeMillis)
    if (Number.isNaN(instant.getTime())) {
      return Option.none()
    }
    const microsecond = instant.getUTCMilliseconds() * 1000 + (micros - wholeMillis * 1000)
    return PlainDateTime.from(
      { year: instant.getUTCFullYear(), month: instant.getUTCMonth() + 1, day: instant.getUTCDate() },
      {
        hour: instant.getUTCHours(),
        minute: instant.getUTCMinutes(),
        second: instant.getUTCSeconds(),
        microsecond,
      },
      TimezoneOffset.utc,
    )
  }

  toPlainDate(): PlainDate {
    return new PlainDate({ year: this.year, month: this.month, day: this.day })
  }

  /** Time of day without the offset. */
  toPlainTime(): PlainTime {
    return new PlainTime({
      hour: this.hour,
      minute: this.minute,
      second: this.second,
      microsecond: this.microsecond,
      offset: undefined,
    })
  }

  toString(): string {
    return `${formatIsoDate(this)}T${formatIsoTime(this, this.offset?.offsetSeconds)}`
  }
}

const MICROS_PER_SECOND = 1_000_000n
const MICROS_PER_DAY = 86_400n * MICROS_PER_SECOND
const MAX_DELTA_DAYS = 999_999_999n

/**
 * Signed duration normalized to `days`, `0 <= seconds < 86400` and
 * `0 <= microseconds < 1000000`.
 *
 * @since 0.1.0
 * @category Temporal
 */
export class TimeDelta extends Data.TaggedClass("TimeDelta")<{
  readonly days: number
  readonly seconds: number
  readonly microseconds: number
}> {
  static readonly zero: TimeDelta = new TimeDelta({ days: 0, seconds: 0, microseconds: 0 })

  static fromMicroseconds(total: bigint): Option.Option<TimeDelta> {
    const days = floorDivide(total, MICROS_PER_DAY)
    if (days > MAX_DELTA_DAYS || days < -MAX_DELTA_DAYS) {
      return Option.none()
    }
    const rest = total - days * MICROS_PER_DAY
    return Option.some(
      new TimeDelta({
        days: Number(days),
        seconds: Number(rest / MICROS_PER_SECOND),
        microseconds: Number(rest % MICROS_PER_SECOND),
      }),
    )
  }

  /**
   * Rounds to the nearest microsecond, ties to even.
   */
  static fromSeconds(seconds: number): Option.Option<TimeDelta> {
    const ratio = exactRatio(seconds)
    return ratio
      ? TimeDelta.fromMicroseconds(divideRoundHalfEven(ratio[0] * MICROS_PER_SECOND, ratio[1]))
      : Option.none()
  }

  static fromDays(days: number): Option.Option<TimeDelta> {
    return Number.isFinite(days) ? TimeDelta.fromSeconds(days * 86_400) : Option.none()
  }

  get totalMicroseconds(): bigint {
    return BigInt(this.days) * MICROS_PER_DAY + BigInt(this.seconds) * MICROS_PER_SECOND + BigInt(this.microseconds)
  }

  totalSeconds(): number {
    return Number(this.totalMicroseconds) / 1_000_000
  }

  /**
   * ISO-8601 duration: `P1DT2H3M4.5S`, `PT0S`, `-P1D`.
   */
  toString(): string {
    const total = this.totalMicroseconds
    if (total === 0n) {
      return "PT0S"
    }
    const magnitude = total < 0n ? -total : total
    const days = magnitude / MICROS_PER_DAY
    const clock = magnitude % MICROS_PER_DAY
    const hours = clock / (3600n * MICROS_PER_SECOND)
    const minutes = (clock / (60n * MICROS_PER_SECOND)) % 60n
    const seconds = (clock / MICROS_PER_SECOND) % 60n
    const fraction = (clock % MICROS_PER_SECOND).toString().padStart(6, "0").replace(/0+$/, "")
    let time = ""
    if (hours > 0n) time += `${hours}H`
    if (minutes > 0n) time += `${minutes}M`
    if (seconds > 0n || fraction !== "") time += fraction === "" ? `${seconds}S` : `${seconds}.${fraction}S`
    const body = `P${days > 0n ? `${days}D` : ""}${time === "" ? "" : `T${time}`}`
    return total < 0n ? `-${body}` : body
  }
}

const UUID_PATTERN =
  /^(?:urn:uuid:)?([0-9a-f]{8})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{12})$/i

/**
 * 128-bit identifier held in its canonical lowercase hyphenated form.
 *
 * @since 0.1.0
 * @category Identifiers
 */
export class Uuid extends Data.TaggedClass("Uuid")<{
  readonly value: string
}> {
  /**
   * Accepts 32 hex digits with optional hyphens at the standard positions,
   * surrounding braces or a `urn:uuid:` prefix.
   */
  static parse(text: string): Option.Option<Uuid> {
    const trimmed = text.trim()
    const braced = trimmed.startsWith("{") && trimmed.endsWith("}")
    const match = UUID_PATTERN.exec(braced ? trimmed.slice(1, -1) : trimmed)
    return match
      ? Option.some(new Uuid({ value: match.slice(1, 6).join("-").toLowerCase() }))
      : Option.none()
  }

  static fromBytes(bytes: Uint8Array): Option.Option<Uuid> {
    if (bytes.length !== 16) {
      return Option.none()
    }
    const hex = Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join("")
    return Uuid.parse(hex)
  }

  get hex(): string {
    return this.value.replace(/-/g, "")
  }

  get version(): number {
    return Number.parseInt(this.value.charAt(14), 16)
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.hex.match(/../g) ?? [], (pair) => Number.parseInt(pair, 16))
  }

  toString(): string {
    return this.value
  }
}

/**
 * Lexically normalized POSIX path. `.` segments and repeated separators are
 * removed; `..` is kept since resolving it needs the filesystem.
 *
 * @since 0.1.0
 * @category Paths
 */
export class FsPath extends Data.TaggedClass("FsPath")<{
  readonly value: string
}> {
  static of(text: string): FsPath {
    const absolute = text.startsWith("/")
    const segments = text.split("/").filter((segment) => segment !== "" && segment !== ".")
    const joined = segments.join("/")
    return new FsPath({ value: absolute ? `/${joined}` : joined === "" ? "." : joined })
  }

  get parts(): ReadonlyArray<string> {
    const segments = this.value.split("/").filter((segment) => segment !== "" && segment !== ".")
    return this.value.startsWith("/") ? ["/", ...segments] : segments
  }

  get name(): string {
    const segments = this.value.split("/")
    const last = segments[segments.length - 1] ?? ""
    return last === "." ? "" : last
  }

  get suffix(): string {
    const dot = this.name.lastIndexOf(".")
    return dot > 0 ? this.name.slice(dot) : ""
  }

  get parent(): FsPath {
    const cut = this.value.lastIndexOf("/")
    if (cut === -1) {
      return FsPath.of(".")
    }
    return FsPath.of(cut === 0 ? "/" : this.value.slice(0, cut))
  }

  join(...segments: ReadonlyArray<string>): FsPath {
    return segments.reduce<FsPath>(
      (path, segment) => (segment.startsWith("/") ? FsPath.of(segment) : FsPath.of(`${path.value}/${segment}`)),
      this,
    )
  }

  toString(): string {
    return this.value
  }
}

/**
 * Immutable ordered sequence, distinct from a list.
 *
 * @since 0.1.0
 * @category Collections
 */
export class Tuple extends Data.TaggedClass("Tuple")<{
  readonly items: ReadonlyArray<unknown>
}> {
  static of(...items: ReadonlyArray<unknown>): Tuple {
    return new Tuple({ items: Data.array(items) })
  }

  static fromIterable(items: Iterable<unknown>): Tuple {
    return Tuple.of(...items)
  }

  get length(): number {
    return this.items.length
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.items[Symbol.iterator]()
  }
}

/**
 * Multiset: a map from element to count.
 *
 * @since 0.1.0
 * @category Collections
 */
export class Counter<K> extends Map<K, number> {
  static fromElements<K>(elements: Iterable<K>): Counter<K> {
    const counter = new Counter<K>()
    for (const element of elements) {
      counter.increment(element)
    }
    return counter
  }

  static fromCounts<K>(counts: Iterable<readonly [K, number]>): Counter<K> {
    return new Counter<K>(counts)
  }

  increment(key: K, by = 1): this {
    return this.set(key, this.count(key) + by)
  }

  /** Count of `key`, zero when absent. */
  count(key: K): number {
    return super.get(key) ?? 0
  }

  total(): number {
    let sum = 0
    for (const count of this.values()) {
      sum += count
    }
    return sum
  }

  /**
   * Elements ordered from the most common down; ties keep insertion order.
   */
  mostCommon(limit?: number): ReadonlyArray<readonly [K, number]> {
    const ordered = [...this.entries()].sort((left, right) => right[1] - left[1])
    return limit === undefined ? ordered : ordered.slice(0, limit)
  }
}

/**
 * Map that inserts a default value on lookup of a missing key.
 *
 * @since 0.1.0
 * @category Collections
 */
export class DefaultMap<K, V> extends Map<K, V> {
  readonly factory: (() => V) | undefined

  constructor(factory?: () => V, entries?: Iterable<readonly [K, V]>) {
    super(entries)
    this.factory = factory
  }

  override get(key: K): V | undefined {
    if (this.has(key) || this.factory === undefined) {
      return super.get(key)
    }
    const value = this.factory()
    this.set(key, value)
    return value
  }
}

/**
 * Double-ended queue with an optional maximum length. Appending to a full
 * deque drops an element from the opposite end.
 *
 * @since 0.1.0
 * @category Collections
 */
export class Deque<A> implements Iterable<A>, Equal.Equal {
  private items: Array<A>
  readonly maxlen: number | undefined

  constructor(items: Iterable<A> = [], maxlen?: number) {
    this.maxlen = maxlen
    this.items = []
    for (const item of items) {
      this.append(item)
    }
  }

  get length(): number {
    return this.items.length
  }

  append(item: A): this {
    if (this.maxlen === 0) {
      return this
    }
    this.items.push(item)
    if (this.maxlen !== undefined && this.items.length > this.maxlen) {
      this.items.shift()
    }
    return this
  }

  appendLeft(item: A): this {
    if (this.maxlen === 0) {
      return this
    }
    this.items.unshift(item)
    if (this.maxlen !== undefined && this.items.length > this.maxlen) {
      this.items.pop()
    }
    return this
  }

  extend(items: Iterable<A>): this {
    for (const item of items) {
      this.append(item)
    }
    return this
  }

  pop(): Option.Option<A> {
    return this.items.length === 0 ? Option.none() : Option.fromNullable(this.items.pop())
  }

  popLeft(): Option.Option<A> {
    return this.items.length === 0 ? Option.none() : Option.fromNullable(this.items.shift())
  }

  at(index: number): Option.Option<A> {
    return index >= -this.items.length && index < this.items.length
      ? Option.fromNullable(this.items.at(index))
      : Option.none()
  }

  toArray(): Array<A> {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<A> {
    return this.items[Symbol.iterator]()
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Deque
      && that.maxlen === this.maxlen
      && Equal.equals(Data.array(this.items), Data.array(that.toArray()))
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.hash(this.maxlen))(Hash.array(this.items))
  }
}

/**
 * Every runtime representation the toolkit recognizes.
 *
 * @since 0.1.0
 * @category Values
 */
export type Value =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Complex
  | BigDecimal.BigDecimal
  | Fraction
  | Uint8Array
  | PlainDate
  | PlainDateTime
  | PlainTime
  | TimeDelta
  | TimezoneOffset
  | Uuid
  | FsPath
  | ReadonlyArray<unknown>
  | Tuple
  | { readonly [key: string]: unknown }
  | ReadonlySet<unknown>
  | HashSet.HashSet<unknown>
  | HashMap.HashMap<unknown, unknown>
  | Counter<unknown>
  | DefaultMap<unknown, unknown>
  | Deque<unknown>
