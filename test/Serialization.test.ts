import { describe, it, expect } from "@effect/vitest"
import { Effect, HashMap, Logger, LogLevel, Option } from "effect"
import {
  DeserializationChain,
  deserialize,
  deserializeSync,
  SerializationChain,
  serialize,
  serializeSync,
} from "../src/Serialization.js"
import { ConversionSettings } from "../src/Settings.js"
import {
  Complex,
  Counter,
  Deque,
  Fraction,
  FsPath,
  PlainDate,
  PlainDateTime,
  PlainTime,
  TimeDelta,
  Uuid,
} from "../src/Values.js"

const date = Option.getOrThrow(PlainDate.from({ year: 2024, month: 1, day: 31 }))
const uuid = Option.getOrThrow(Uuid.parse("550e8400-e29b-41d4-a716-446655440000"))

const captureLogs = (records: Array<string>) =>
  Logger.replace(
    Logger.defaultLogger,
    Logger.make(({ annotations }) => {
      const tag = HashMap.get(annotations, "tag")
      const type = HashMap.get(annotations, "type")
      records.push(String(Option.getOrElse(tag, () => Option.getOrElse(type, () => "?"))))
    }),
  )

describe("serialize", () => {
  it.effect("keeps JSON primitives native", () =>
    Effect.gen(function* () {
      const text = yield* serialize({ a: 1, b: [true, null, "x"], c: 2.5 })

      expect(text).toBe("{\"a\": 1, \"b\": [true, null, \"x\"], \"c\": 2.5}")
    }),
  )

  it.effect("writes canonical strings for the value classes", () =>
    Effect.gen(function* () {
      const delta = Option.getOrThrow(TimeDelta.fromSeconds(5_400))
      const text = yield* serialize({ when: date, id: uuid, wait: delta, z: Complex.of(1, 2), p: FsPath.of("/var/log") })

      expect(text).toBe(
        "{\"when\": \"2024-01-31\", \"id\": \"550e8400-e29b-41d4-a716-446655440000\", \"wait\": \"PT1H30M\", \"z\": \"(1+2j)\", \"p\": \"/var/log\"}",
      )
    }),
  )

  it.effect("spells non-finite floats as strings", () =>
    Effect.gen(function* () {
      expect(yield* serialize([Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY])).toBe(
        "[\"nan\", \"inf\", \"-inf\"]",
      )
    }),
  )

  it.effect("walks collections", () =>
    Effect.gen(function* () {
      expect(yield* serialize([new Set([1]), new Deque(["a"]), new Uint8Array([104, 105])])).toBe(
        "[[1], [\"a\"], \"b'hi'\"]",
      )
      expect(yield* serialize(Counter.fromElements("aab"))).toBe("{\"a\": 2, \"b\": 1}")
    }),
  )

  it.effect("falls back to the display string", () =>
    Effect.gen(function* () {
      const fraction = Option.getOrThrow(Fraction.from(3n, 4n))

      expect(yield* serialize([fraction])).toBe("[\"3/4\"]")
    }),
  )

  it.effect("renders top-level scalars with convertToStr", () =>
    Effect.gen(function* () {
      expect(yield* serialize(3.14)).toBe("3.14")
      expect(yield* serialize(date)).toBe("2024-01-31")
      expect(yield* serialize(new Uint8Array([104, 105]))).toBe("b'hi'")
    }),
  )

  it.effect("indents when configured", () =>
    Effect.gen(function* () {
      const text = yield* serialize({ a: [1] }).pipe(Effect.provide(ConversionSettings.layer({ indent: 2 })))

      expect(text).toBe("{\n  \"a\": [\n    1\n  ]\n}")
    }),
  )

  it.effect("escapes non-ASCII text", () =>
    Effect.gen(function* () {
      expect(yield* serialize({ word: "é" })).toBe("{\"word\": \"\\u00e9\"}")
    }),
  )

  it.effect("enforces the depth limit", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        serialize({ a: { b: { c: 1 } } }).pipe(Effect.provide(ConversionSettings.layer({ maxDepth: 2 }))),
      )

      expect(error._tag).toBe("DepthLimitError")
      if (error._tag === "DepthLimitError") {
        expect(error.depth).toBe(3)
        expect(error.limit).toBe(2)
      }
    }),
  )

  it.effect("fails when the fallback text does not survive the encoding", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        serialize({ m: new Map([["é", 1]]) }).pipe(Effect.provide(ConversionSettings.layer({ encoding: "ascii" }))),
      )

      expect(error._tag).toBe("ConversionError")
    }),
  )

  it.effect("logs fallback renderings at debug level", () =>
    Effect.gen(function* () {
      const records: Array<string> = []
      yield* serialize([Option.getOrThrow(Fraction.from(1n, 3n))]).pipe(
        Effect.provide(captureLogs(records)),
        Logger.withMinimumLogLevel(LogLevel.Debug),
      )

      expect(records).toEqual(["Fraction"])
    }),
  )

  it("keeps the leaf order as data", () => {
    expect(SerializationChain.map((row) => row.tag)).toEqual([
      "none",
      "str",
      "primitive",
      "dict",
      "list",
      "counter",
      "defaultdict",
      "deque",
      "set",
      "datetime",
      "date",
      "time",
      "timedelta",
      "complex",
      "bytes",
      "path",
      "uuid",
    ])
  })
})

describe("deserialize", () => {
  it.effect("upgrades string leaves and keeps keys", () =>
    Effect.gen(function* () {
      const decoded = yield* deserialize("{\"2024-01-31\": \"2024-01-31\", \"n\": 1, \"s\": \"hello\"}")

      expect(decoded).toEqual({ "2024-01-31": date, n: 1, s: "hello" })
    }),
  )

  it.effect("upgrades a top-level scalar", () =>
    Effect.gen(function* () {
      expect(yield* deserialize("\"123\"")).toEqual(Complex.of(123, 0))
      expect(yield* deserialize("[\"1\", \"0\"]")).toEqual([true, false])
    }),
  )

  it.effect("recurses into containers produced by an upgrade", () =>
    Effect.gen(function* () {
      const decoded = yield* deserialize("{\"s\": \"{1,x}\", \"q\": \"[\\\"1\\\", \\\"x\\\"]\"}")

      expect(decoded).toEqual({ s: new Set([true, "x"]), q: new Deque([true, "x"]) })
    }),
  )

  it.effect("fails on invalid JSON", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(deserialize("not json"))

      expect(error._tag).toBe("ParseError")
      if (error._tag === "ParseError") {
        expect(error.input).toBe("not json")
        expect(error.message.startsWith("Invalid JSON input: ")).toBe(true)
      }
    }),
  )

  it.effect("enforces the depth limit", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        deserialize("[[[1]]]").pipe(Effect.provide(ConversionSettings.layer({ maxDepth: 2 }))),
      )

      expect(error).toEqual(expect.objectContaining({ _tag: "DepthLimitError", depth: 3, limit: 2 }))
    }),
  )

  it.effect("logs the chosen tag", () =>
    Effect.gen(function* () {
      const records: Array<string> = []
      yield* deserialize("[\"2024-01-31\", \"plain\"]").pipe(
        Effect.provide(captureLogs(records)),
        Logger.withMinimumLogLevel(LogLevel.Debug),
      )

      expect(records).toEqual(["date"])
    }),
  )

  it("keeps the upgrade order as data", () => {
    expect(DeserializationChain.map((row) => row.tag)).toEqual([
      "bool",
      "complex",
      "date",
      "datetime",
      "decimal",
      "deque",
      "dict",
      "defaultdict",
      "fraction",
      "frozendict",
      "frozenset",
      "set",
      "time",
      "timedelta",
      "timezone",
      "uuid",
      "path",
      "counter",
      "bytes",
    ])
  })
})

describe("round trip", () => {
  it.effect("restores plain trees", () =>
    Effect.gen(function* () {
      const tree = { a: 1, b: [true, null, "hello"], c: { d: 2.5, e: [] } }
      const decoded = yield* deserialize(yield* serialize(tree))

      expect(decoded).toEqual(tree)
    }),
  )

  it.effect("keeps the sign of negative zero", () =>
    Effect.gen(function* () {
      const text = yield* serialize([-0, { a: -0 }])
      const decoded = yield* deserialize(text)

      expect(text).toBe("[-0, {\"a\": -0}]")
      expect(decoded).toEqual([-0, { a: -0 }])
      expect(Array.isArray(decoded) && Object.is(decoded[0], -0)).toBe(true)
    }),
  )

  it.effect("restores temporal values, identifiers, paths and complex numbers", () =>
    Effect.gen(function* () {
      const tree = {
        when: date,
        at: Option.getOrThrow(
          PlainDateTime.from({ year: 2024, month: 1, day: 31 }, { hour: 10, minute: 0, second: 0, microsecond: 0 }),
        ),
        t: Option.getOrThrow(PlainTime.from({ hour: 10, minute: 30, second: 0, microsecond: 0 })),
        wait: Option.getOrThrow(TimeDelta.fromSeconds(5_400)),
        id: uuid,
        p: FsPath.of("/var/log"),
        z: Complex.of(1, 2),
      }
      const text = yield* serialize(tree)
      const decoded = yield* deserialize(text)

      expect(decoded).toEqual(tree)
      expect(yield* serialize(decoded)).toBe(text)
    }),
  )

  it("offers synchronous variants", () => {
    expect(serializeSync([1, "a"])).toBe("[1, \"a\"]")
    expect(deserializeSync("[1]")).toEqual([1])
    expect(() => deserializeSync("{")).toThrowError(/^Invalid JSON input: /)
    expect(() => serializeSync({ m: new Map([["\uD800", 1]]) })).toThrowError(/to str$/)
  })
})
