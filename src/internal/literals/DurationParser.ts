import type { IToken, TokenType } from "chevrotain"
import {
  Days,
  DurationLexer,
  DurationNumber,
  Hours,
  Minus,
  MonthsOrMinutes,
  PeriodDesignator,
  Plus,
  Seconds,
  TimeDesignator,
  Weeks,
  Years,
} from "./tokens.js"
import { LiteralDiagnosticError, type LiteralErrorCode } from "./Diagnostic.js"
import { divideRoundHalfEven, pow10 } from "../numbers.js"

const MICROS_PER_SECOND = 1_000_000n
const MICROS_PER_MINUTE = 60n * MICROS_PER_SECOND
const MICROS_PER_HOUR = 60n * MICROS_PER_MINUTE
const MICROS_PER_DAY = 24n * MICROS_PER_HOUR
const MICROS_PER_WEEK = 7n * MICROS_PER_DAY

const fail = (code: LiteralErrorCode, message: string, token?: IToken): never => {
  throw new LiteralDiagnosticError({
    diagnostic: token ? { literal: "duration", code, message, offset: token.startOffset } : { literal: "duration", code, message },
  })
}

interface Designator {
  readonly token: TokenType
  readonly label: string
  /** `undefined` marks calendar units a fixed-length duration cannot hold. */
  readonly micros: bigint | undefined
}

const DATE_DESIGNATORS: ReadonlyArray<Designator> = [
  { token: Years, label: "years", micros: undefined },
  { token: MonthsOrMinutes, label: "months", micros: undefined },
  { token: Weeks, label: "weeks", micros: MICROS_PER_WEEK },
  { token: Days, label: "days", micros: MICROS_PER_DAY },
]

const TIME_DESIGNATORS: ReadonlyArray<Designator> = [
  { token: Hours, label: "hours", micros: MICROS_PER_HOUR },
  { token: MonthsOrMinutes, label: "minutes", micros: MICROS_PER_MINUTE },
  { token: Seconds, label: "seconds", micros: MICROS_PER_SECOND },
]

const scaleNumber = (image: string, unit: bigint): bigint => {
  const [whole = "0", fraction = ""] = image.split(/[.,]/)
  const scaled = BigInt(`${whole}${fraction}`)
  return divideRoundHalfEven(scaled * unit, pow10(fraction.length))
}

/**
 * Consume `(number designator)*` in designator order. Each designator may
 * appear once and only after the ones listed before it.
 */
const readComponents = (
  tokens: ReadonlyArray<IToken>,
  start: number,
  designators: ReadonlyArray<Designator>,
): { readonly micros: bigint; readonly next: number; readonly count: number } => {
  let index = start
  let cursor = 0
  let micros = 0n
  let count = 0
  while (index < tokens.length && tokens[index]?.tokenType === DurationNumber) {
    const number = tokens[index]
    const unit = tokens[index + 1]
    if (!number || !unit) {
      return fail("UnexpectedEnd", "number without designator", number)
    }
    const position = designators.findIndex((designator, at) => at >= cursor && designator.token === unit.tokenType)
    const designator = designators[position]
    if (!designator) {
      return fail("DuplicateDesignator", `unexpected designator "${unit.image}"`, unit)
    }
    const amount = scaleNumber(number.image, designator.micros ?? 1n)
    if (designator.micros === undefined && amount !== 0n) {
      return fail("UnsupportedDesignator", `${designator.label} have no fixed length`, unit)
    }
    micros += designator.micros === undefined ? 0n : amount
    cursor = position + 1
    count += 1
    index += 2
  }
  return { micros, next: index, count }
}

/**
 * Parse an ISO-8601 duration (`[-]PnYnMnWnDTnHnMnS`) into signed microseconds.
 */
export const parseIsoDuration = (text: string): bigint => {
  const lexed = DurationLexer.tokenize(text)
  const lexError = lexed.errors[0]
  if (lexError) {
    return fail("UnexpectedCharacter", lexError.message)
  }
  const tokens = lexed.tokens
  let index = 0
  let negative = false
  if (tokens[index]?.tokenType === Plus || tokens[index]?.tokenType === Minus) {
    negative = tokens[index]?.tokenType === Minus
    index += 1
  }
  if (tokens[index]?.tokenType !== PeriodDesignator) {
    return fail("UnexpectedToken", "duration must start with P", tokens[index])
  }
  const datePart = readComponents(tokens, index + 1, DATE_DESIGNATORS)
  index = datePart.next
  let micros = datePart.micros
  let count = datePart.count
  if (tokens[index]?.tokenType === TimeDesignator) {
    const timePart = readComponents(tokens, index + 1, TIME_DESIGNATORS)
    if (timePart.count === 0) {
      return fail("EmptyDuration", "T must be followed by a time component", tokens[index])
    }
    index = timePart.next
    micros += timePart.micros
    count += timePart.count
  }
  if (index < tokens.length) {
    return fail("TrailingInput", "unexpected input after duration", tokens[index])
  }
  if (count === 0) {
    return fail("EmptyDuration", "duration has no components")
  }
  return negative ? -micros : micros
}
