import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, Option, Schema } from "effect"
import {
  BytesFromLiteral,
  ComplexFromString,
  FractionFromString,
  FsPathFromString,
  PlainDateFromString,
  PlainDateTimeFromString,
  TimeDeltaFromString,
  TimezoneOffsetFromString,
  UuidFromString,
  UuidSchema,
} from "../src/Schemas.js"
import { Complex, PlainDate, Uuid } from "../src/Values.js"

const ID = "550e8400-e29b-41d4-a716-446655440000"

describe("declarations", () => {
  it("guard on the value class", () => {
    const uuid = Option.getOrThrow(Uuid.parse(ID))

    expect(Schema.is(UuidSchema)(uuid)).toBe(true)
    expect(Schema.is(UuidSchema)(ID)).toBe(false)
  })
})

describe("string transformations", () => {
  it("decode with the string parsers and encode canonically", () => {
    const date = Schema.decodeUnknownSync(PlainDateFromString)("2024-01-31")

    expect(date.toString()).toBe("2024-01-31")
    expect(Schema.encodeSync(PlainDateFromString)(date)).toBe("2024-01-31")
    expect(Schema.encodeSync(ComplexFromString)(Schema.decodeUnknownSync(ComplexFromString)("1+2j"))).toBe("(1+2j)")
    expect(Schema.decodeUnknownSync(TimeDeltaFromString)("PT1H30M").totalSeconds()).toBe(5_400)
    expect(Schema.decodeUnknownSync(TimezoneOffsetFromString)("+05:30").offsetSeconds).toBe(19_800)
    expect(String(Schema.decodeUnknownSync(FractionFromString)("6/8"))).toBe("3/4")
    expect(String(Schema.decodeUnknownSync(PlainDateTimeFromString)("2024-01-31T10:00:00Z"))).toBe(
      "2024-01-31T10:00:00+00:00",
    )
  })

  it("reports the expected form", () => {
    const result = Schema.decodeUnknownEither(UuidFromString)("nope")

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toContain("Expected a UUID, received \"nope\"")
    }
  })

  it("rejects non-string input", () => {
    expect(Either.isLeft(Schema.decodeUnknownEither(PlainDateFromString)(42))).toBe(true)
  })

  it("accepts any non-empty path text", () => {
    expect(Schema.decodeUnknownSync(FsPathFromString)("notes").value).toBe("notes")
    expect(Either.isLeft(Schema.decodeUnknownEither(FsPathFromString)(""))).toBe(true)
  })

  it("reads and writes bytes literals", () => {
    expect(Array.from(Schema.decodeUnknownSync(BytesFromLiteral)("b'hi'"))).toEqual([104, 105])
    expect(Schema.encodeSync(BytesFromLiteral)(new Uint8Array([0, 0x27]))).toBe("b\"\\x00'\"")
  })

  it.effect("validates configuration structs", () =>
    Effect.gen(function* () {
      const Job = Schema.Struct({ start: PlainDateFromString, id: UuidFromString, every: TimeDeltaFromString })
      const job = yield* Schema.decodeUnknown(Job)({ start: "2024-01-31", id: ID.toUpperCase(), every: "P1D" })

      expect(job.start).toEqual(Option.getOrThrow(PlainDate.from({ year: 2024, month: 1, day: 31 })))
      expect(job.id.value).toBe(ID)
      expect(job.every.days).toBe(1)
      expect(yield* Schema.encode(Job)(job)).toEqual({ start: "2024-01-31", id: ID, every: "P1D" })
    }),
  )

  it("keeps complex values structural", () => {
    expect(Schema.decodeUnknownSync(ComplexFromString)("3j")).toEqual(Complex.of(0, 3))
  })
})
