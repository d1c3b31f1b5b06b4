import { describe, it, expect } from "@effect/vitest"
import { BigDecimal, Effect, HashMap, Option } from "effect"
import {
  classify,
  ClassificationChain,
  couldBeBool,
  couldBeDict,
  couldBeInt,
  couldBeTimezone,
  couldBeUuid,
  identify,
  IdentificationChain,
  identifyInStr,
  identifyNumericType,
  identifyOrFail,
  isDict,
  isInstance,
  isInt,
  isSet,
  NumericChain,
} from "../src/Identification.js"
import { Complex, Counter, DefaultMap, PlainDate, PlainDateTime, TimeDelta, Uuid } from "../src/Values.js"

describe("identifyInStr", () => {
  it("resolves numeric text to complex", () => {
    expect(identifyInStr("123")).toEqual(Option.some("complex"))
    expect(identifyInStr("1.5e3")).toEqual(Option.some("complex"))
  })

  it("resolves 0 and 1 to bool", () => {
    expect(identifyInStr("0")).toEqual(Option.some("bool"))
    expect(identifyInStr("1")).toEqual(Option.some("bool"))
  })

  it.each([
    ["{\"a\": 1}", "dict"],
    ["[1, 2]", "list"],
    ["{1,2}", "set"],
    ["(1, 2)", "tuple"],
    ["2024-01-31", "date"],
    ["2024-01-31T10:00:00", "datetime"],
    ["10:30:00", "time"],
    ["P1D", "timedelta"],
    ["UTC+05:30", "timezone"],
    ["550e8400-e29b-41d4-a716-446655440000", "uuid"],
    ["/tmp/data.csv", "path"],
    ["b'abc'", "bytes"],
  ])("identifies %s as %s", (text, tag) => {
    expect(identifyInStr(text)).toEqual(Option.some(tag))
  })

  it("returns none for plain words", () => {
    expect(Option.isNone(identifyInStr("hello"))).toBe(true)
  })

  it("keeps the priority order as data", () => {
    expect(IdentificationChain.map((row) => row.tag)).toEqual([
      "bool",
      "complex",
      "dict",
      "float",
      "int",
      "list",
      "set",
      "tuple",
      "date",
      "datetime",
      "time",
      "timedelta",
      "timezone",
      "uuid",
      "path",
      "bytes",
    ])
    expect(NumericChain.map((row) => row.tag)).toEqual(["int", "float", "complex", "decimal"])
  })
})

describe("identifyNumericType", () => {
  it("prefers the narrowest numeric type", () => {
    expect(identifyNumericType(3)).toEqual(Option.some("int"))
    expect(identifyNumericType(3.5)).toEqual(Option.some("float"))
    expect(identifyNumericType("1.5")).toEqual(Option.some("float"))
    expect(identifyNumericType(Complex.of(1, 2))).toEqual(Option.some("complex"))
    expect(identifyNumericType(BigDecimal.make(15n, 1))).toEqual(Option.some("decimal"))
  })

  it("treats booleans as integers", () => {
    expect(identifyNumericType(true)).toEqual(Option.some("int"))
    expect(identifyNumericType(false)).toEqual(Option.some("int"))
    expect(couldBeInt(true)).toBe(true)
  })

  it("returns none for non-numeric values", () => {
    expect(Option.isNone(identifyNumericType("abc"))).toBe(true)
  })
})

describe("feasibility predicates", () => {
  it("accepts lossless conversions", () => {
    expect(couldBeBool(1)).toBe(true)
    expect(couldBeBool(2)).toBe(false)
    expect(couldBeInt(2.5)).toBe(false)
    expect(couldBeInt(10n ** 30n)).toBe(true)
    expect(couldBeUuid(new Uint8Array(16))).toBe(true)
    expect(couldBeDict(new Map([[1, "a"]]))).toBe(false)
    expect(couldBeDict(new Map([["a", 1]]))).toBe(true)
  })

  it("treats a whole-second timedelta as an offset", () => {
    expect(couldBeTimezone(Option.getOrThrow(TimeDelta.fromSeconds(3_600)))).toBe(true)
    expect(couldBeTimezone(Option.getOrThrow(TimeDelta.fromSeconds(0.5)))).toBe(false)
  })
})

describe("exact predicates", () => {
  it("separates siblings", () => {
    expect(isDict(new Counter())).toBe(false)
    expect(isSet(new Set())).toBe(true)
    expect(isInt(true)).toBe(false)
    expect(isInstance(new Counter(), Map, Set)).toBe(true)
    expect(isInstance([], Map, Set)).toBe(false)
  })
})

describe("classify", () => {
  it("reports exact tags", () => {
    const stamp = Option.getOrThrow(
      PlainDateTime.from({ year: 2024, month: 1, day: 1 }, { hour: 0, minute: 0, second: 0, microsecond: 0 }),
    )

    expect(classify(true)).toEqual(Option.some("bool"))
    expect(classify(1)).toEqual(Option.some("int"))
    expect(classify(1.5)).toEqual(Option.some("float"))
    expect(classify(null)).toEqual(Option.some("none"))
    expect(classify(new Counter())).toEqual(Option.some("counter"))
    expect(classify(new DefaultMap())).toEqual(Option.some("defaultdict"))
    expect(classify(stamp)).toEqual(Option.some("datetime"))
    expect(classify(stamp.toPlainDate())).toEqual(Option.some("date"))
    expect(Option.isNone(classify(Symbol("x")))).toBe(true)
  })

  it("checks every tag once", () => {
    const tags = ClassificationChain.map((row) => row.tag)

    expect(new Set(tags).size).toBe(tags.length)
  })

  it.effect("fails outside the modelled universe", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(identifyOrFail(Symbol("x")))

      expect(error._tag).toBe("IdentificationError")
      expect(error.reason).toBe("unsupported type symbol")
    }),
  )

  it.effect("succeeds inside it", () =>
    Effect.gen(function* () {
      const uuid = Option.getOrThrow(Uuid.parse("550e8400-e29b-41d4-a716-446655440000"))

      expect(yield* identifyOrFail(uuid)).toBe("uuid")
    }),
  )
})

describe("identify", () => {
  it("names runtime types", () => {
    expect(identify(null)).toBe("null")
    expect(identify(1)).toBe("number")
    expect(identify({})).toBe("Object")
    expect(identify(new Counter())).toBe("Counter")
    expect(identify(HashMap.empty())).toBe("HashMap")
    expect(identify(Option.getOrThrow(PlainDate.from({ year: 2024, month: 1, day: 1 })))).toBe("PlainDate")
  })
})
