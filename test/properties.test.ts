import { describe, expect, it } from "@effect/vitest"
import { Equal, Option } from "effect"
import * as FastCheck from "effect/FastCheck"
import { strToDate, strToDatetime, strToTime, strToTimedelta, strToTimezone } from "../src/Conversion.js"
import { IdentificationChain, identifyInStr } from "../src/Identification.js"
import { DeserializationChain, deserializeSync, serializeSync } from "../src/Serialization.js"
import { PlainDate, PlainDateTime, PlainTime, TimeDelta, TimezoneOffset } from "../src/Values.js"

const runs = { numRuns: 200 }

const ordinal = FastCheck.integer({ min: 1, max: 3_652_059 })
const epochMillis = FastCheck.integer({ min: -62_135_596_800_000, max: 253_402_300_799_999 })
const clock = FastCheck.record({
  hour: FastCheck.integer({ min: 0, max: 23 }),
  minute: FastCheck.integer({ min: 0, max: 59 }),
  second: FastCheck.integer({ min: 0, max: 59 }),
  microsecond: FastCheck.integer({ min: 0, max: 999_999 }),
})

describe("canonical strings parse back", () => {
  it("dates", () => {
    FastCheck.assert(FastCheck.property(ordinal, (day) => {
      const date = Option.getOrThrow(PlainDate.fromOrdinal(day))

      expect(Equal.equals(strToDate(date.toString()), Option.some(date))).toBe(true)
    }), runs)
  })

  it("datetimes", () => {
    FastCheck.assert(FastCheck.property(epochMillis, (millis) => {
      const stamp = Option.getOrThrow(PlainDateTime.fromEpochMillis(millis))

      expect(Equal.equals(strToDatetime(stamp.toString()), Option.some(stamp))).toBe(true)
    }), runs)
  })

  it("times", () => {
    FastCheck.assert(FastCheck.property(clock, (fields) => {
      const time = Option.getOrThrow(PlainTime.from(fields))

      expect(Equal.equals(strToTime(time.toString()), Option.some(time))).toBe(true)
    }), runs)
  })

  it("timedeltas", () => {
    FastCheck.assert(FastCheck.property(FastCheck.bigInt({ min: -(10n ** 17n), max: 10n ** 17n }), (micros) => {
      const delta = Option.getOrThrow(TimeDelta.fromMicroseconds(micros))

      expect(Equal.equals(strToTimedelta(delta.toString()), Option.some(delta))).toBe(true)
    }), runs)
  })

  it("timezones", () => {
    FastCheck.assert(FastCheck.property(FastCheck.integer({ min: -86_399, max: 86_399 }), (seconds) => {
      const zone = Option.getOrThrow(TimezoneOffset.from(seconds))

      expect(Equal.equals(strToTimezone(zone.toString()), Option.some(zone))).toBe(true)
    }), runs)
  })
})

describe("identifyInStr", () => {
  it("returns the first accepting row", () => {
    FastCheck.assert(FastCheck.property(FastCheck.string(), (text) => {
      const first = Option.fromNullable(IdentificationChain.find((row) => row.test(text)))

      expect(identifyInStr(text)).toEqual(Option.map(first, (row) => row.tag))
    }), runs)
  })

  it("recognises generated dates and identifiers", () => {
    FastCheck.assert(FastCheck.property(ordinal, FastCheck.uuid(), (day, id) => {
      const date = Option.getOrThrow(PlainDate.fromOrdinal(day))

      expect(identifyInStr(date.toString())).toEqual(Option.some("date"))
      expect(identifyInStr(id)).toEqual(Option.some("uuid"))
    }), runs)
  })
})

const inertString = FastCheck.string().filter((text) =>
  DeserializationChain.every((row) => Option.isNone(row.parse(text)))
)

const leaf = FastCheck.oneof(
  FastCheck.constant(null),
  FastCheck.boolean(),
  FastCheck.integer(),
  FastCheck.double({ noNaN: true, noDefaultInfinity: true }),
  inertString,
)

const { array: jsonArray, dict: jsonDict } = FastCheck.letrec((tie) => ({
  tree: FastCheck.oneof({ depthSize: "small" }, leaf, tie("array"), tie("dict")),
  array: FastCheck.array(tie("tree"), { maxLength: 4 }),
  dict: FastCheck.dictionary(FastCheck.string().filter((key) => key !== "__proto__"), tie("tree"), { maxKeys: 4 }),
}))

const jsonTree = FastCheck.oneof(jsonArray, jsonDict)

describe("serialize and deserialize", () => {
  it("restore trees of inert JSON values", () => {
    FastCheck.assert(FastCheck.property(jsonTree, (tree) => {
      expect(deserializeSync(serializeSync(tree))).toEqual(tree)
    }), runs)
  })

  it("reach a fixed point after one round", () => {
    FastCheck.assert(FastCheck.property(jsonTree, (tree) => {
      const text = serializeSync(tree)

      expect(serializeSync(deserializeSync(text))).toBe(text)
    }), runs)
  })
})
