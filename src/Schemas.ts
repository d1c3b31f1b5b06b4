/**
 * Effect `Schema` bindings for the value classes.
 *
 * The `…FromString` schemas decode with the same parsers as the `strToX`
 * converters and encode to the canonical string, so configuration validated
 * with `Schema.decodeUnknown` follows the toolkit's parsing rules.
 *
 * @since 0.1.0
 */

import { Option, ParseResult, Schema } from "effect"
import {
  strToBytes,
  strToComplex,
  strToDate,
  strToDatetime,
  strToFraction,
  strToTime,
  strToTimedelta,
  strToTimezone,
  strToUuid,
} from "./Conversion.js"
import { Complex, Fraction, FsPath, PlainDate, PlainDateTime, PlainTime, TimeDelta, TimezoneOffset, Uuid } from "./Values.js"
import { encodeBytesLiteral } from "./internal/display.js"

/**
 * @since 0.1.0
 * @category Declarations
 */
export const ComplexSchema = Schema.declare((u): u is Complex => u instanceof Complex, { identifier: "Complex" })

/**
 * @since 0.1.0
 * @category Declarations
 */
export const FractionSchema = Schema.declare((u): u is Fraction => u instanceof Fraction, { identifier: "Fraction" })

/**
 * @since 0.1.0
 * @category Declarations
 */
export const PlainDateSchema = Schema.declare((u): u is PlainDate => u instanceof PlainDate, {
  identifier: "PlainDate",
})

/**
 * @since 0.1.0
 * @category Declarations
 */
export const PlainDateTimeSchema = Schema.declare((u): u is PlainDateTime => u instanceof PlainDateTime, {
  identifier: "PlainDateTime",
})

/**
 * @since 0.1.0
 * @category Declarations
 */
export const PlainTimeSchema = Schema.declare((u): u is PlainTime => u instanceof PlainTime, {
  identifier: "PlainTime",
})

/**
 * @since 0.1.0
 * @category Declarations
 */
export const TimeDeltaSchema = Schema.declare((u): u is TimeDelta => u instanceof TimeDelta, {
  identifier: "TimeDelta",
})

/**
 * @since 0.1.0
 * @category Declarations
 */
export const TimezoneOffsetSchema = Schema.declare((u): u is TimezoneOffset => u instanceof TimezoneOffset, {
  identifier: "TimezoneOffset",
})

/**
 * @since 0.1.0
 * @category Declarations
 */
export const UuidSchema = Schema.declare((u): u is Uuid => u instanceof Uuid, { identifier: "Uuid" })

/**
 * @since 0.1.0
 * @category Declarations
 */
export const FsPathSchema = Schema.declare((u): u is FsPath => u instanceof FsPath, { identifier: "FsPath" })

const fromString = <A>(
  to: Schema.Schema<A>,
  parse: (text: string) => Option.Option<A>,
  print: (value: A) => string,
  expected: string,
) =>
  Schema.transformOrFail(Schema.String, to, {
    strict: true,
    decode: (text, _, ast) =>
      Option.match(parse(text), {
        onNone: () => ParseResult.fail(new ParseResult.Type(ast, text, `Expected ${expected}, received ${JSON.stringify(text)}`)),
        onSome: (value) => ParseResult.succeed(value),
      }),
    encode: (value) => ParseResult.succeed(print(value)),
  })

const canonical = (value: { toString(): string }): string => value.toString()

/**
 * ISO date (`2024-01-31`).
 *
 * @since 0.1.0
 * @category Transformations
 */
export const PlainDateFromString = fromString(PlainDateSchema, (text) => strToDate(text), canonical, "an ISO date")

/**
 * @since 0.1.0
 * @category Transformations
 */
export const PlainDateTimeFromString = fromString(
  PlainDateTimeSchema,
  (text) => strToDatetime(text),
  canonical,
  "an ISO datetime",
)

/**
 * @since 0.1.0
 * @category Transformations
 */
export const PlainTimeFromString = fromString(PlainTimeSchema, (text) => strToTime(text), canonical, "an ISO time")

/**
 * ISO-8601 duration or one of the clock layouts `strToTimedelta` accepts;
 * encodes as an ISO duration.
 *
 * @since 0.1.0
 * @category Transformations
 * @example
 * ```ts
 * Schema.decodeUnknownSync(TimeDeltaFromString)("PT90M").totalSeconds() // 5400
 * ```
 */
export const TimeDeltaFromString = fromString(TimeDeltaSchema, strToTimedelta, canonical, "a duration")

/**
 * @since 0.1.0
 * @category Transformations
 */
export const TimezoneOffsetFromString = fromString(
  TimezoneOffsetSchema,
  strToTimezone,
  canonical,
  "a UTC offset",
)

/**
 * @since 0.1.0
 * @category Transformations
 */
export const UuidFromString = fromString(UuidSchema, strToUuid, canonical, "a UUID")

/**
 * @since 0.1.0
 * @category Transformations
 */
export const ComplexFromString = fromString(ComplexSchema, strToComplex, canonical, "a complex literal")

/**
 * @since 0.1.0
 * @category Transformations
 */
export const FractionFromString = fromString(FractionSchema, strToFraction, canonical, "a fraction")

/**
 * Any non-empty path text; unlike `strToPath` no separator is required.
 *
 * @since 0.1.0
 * @category Transformations
 */
export const FsPathFromString = fromString(
  FsPathSchema,
  (text) => (text.length > 0 && !text.includes("\0") ? Option.some(FsPath.of(text)) : Option.none()),
  canonical,
  "a path",
)

/**
 * Bytes literal (`b'...'`).
 *
 * @since 0.1.0
 * @category Transformations
 */
export const BytesFromLiteral = fromString(Schema.Uint8ArrayFromSelf, strToBytes, encodeBytesLiteral, "a bytes literal")
