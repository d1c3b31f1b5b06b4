import { Data } from "effect"

/**
 * Structured failure raised by the literal parsers. Soft-fail converters
 * catch exactly this error and turn it into an absent result.
 */
export type LiteralKind = "complex" | "duration"

export type LiteralErrorCode =
  | "UnexpectedCharacter"
  | "UnexpectedToken"
  | "UnexpectedEnd"
  | "TrailingInput"
  | "MisplacedWhitespace"
  | "UnbalancedParenthesis"
  | "UnsupportedDesignator"
  | "DuplicateDesignator"
  | "EmptyDuration"
  | "OutOfRange"

export interface LiteralDiagnostic {
  readonly literal: LiteralKind
  readonly code: LiteralErrorCode
  readonly message: string
  readonly offset?: number
}

export class LiteralDiagnosticError extends Data.TaggedError("LiteralDiagnosticError")<{
  readonly diagnostic: LiteralDiagnostic
}> {
  get message(): string {
    const { literal, message, offset } = this.diagnostic
    return offset === undefined ? `Invalid ${literal} literal: ${message}` : `Invalid ${literal} literal at ${offset}: ${message}`
  }
}
