/**
 * Error hierarchy for the conversion toolkit.
 *
 * The soft-fail converters never raise; these tagged errors are reserved for
 * the hard constructors, JSON parsing and the recursive walks, so callers can
 * pattern match with `Effect.catchTag`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { display } from "./internal/display.js"

/**
 * Raised when a value cannot be converted to the requested type.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ConversionError({ value: "not-a-uuid", targetType: "UUID" })
 * error.message // "Failed to convert not-a-uuid to UUID"
 * ```
 */
export class ConversionError extends Data.TaggedError("ConversionError")<{
  readonly value: unknown
  readonly targetType: string
}> {
  get message(): string {
    return `Failed to convert ${display(this.value)} to ${this.targetType}`
  }
}

/**
 * Raised when text handed to `deserialize` is not valid JSON.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly input: string
  readonly problem: string
}> {
  get message(): string {
    return `Invalid JSON input: ${this.problem}`
  }
}

/**
 * Raised when a recursive walk nests deeper than `ConversionSettings.maxDepth`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DepthLimitError extends Data.TaggedError("DepthLimitError")<{
  readonly depth: number
  readonly limit: number
}> {
  get message(): string {
    return `Nesting depth ${this.depth} exceeds the limit of ${this.limit}`
  }
}

/**
 * Raised when a value falls outside every type the toolkit models.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IdentificationError extends Data.TaggedError("IdentificationError")<{
  readonly value: unknown
  readonly reason: string
}> {
  get message(): string {
    return `Cannot identify ${display(this.value)}: ${this.reason}`
  }
}

/**
 * Union of the errors raised by `serialize`.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SerializationError = ConversionError | DepthLimitError

/**
 * Union of the errors raised by `deserialize`.
 *
 * @category Errors
 * @since 0.1.0
 */
export type DeserializationError = ParseError | DepthLimitError
