import type { IToken, TokenType } from "chevrotain"
import {
  ComplexLexer,
  ImaginaryUnit,
  InfinityLiteral,
  LParen,
  Minus,
  NaNLiteral,
  Plus,
  RealNumber,
  RParen,
  WhiteSpace,
} from "./tokens.js"
import { LiteralDiagnosticError, type LiteralErrorCode } from "./Diagnostic.js"

export interface ComplexParts {
  readonly real: number
  readonly imag: number
}

const fail = (code: LiteralErrorCode, message: string, token?: IToken): never => {
  throw new LiteralDiagnosticError({
    diagnostic: token ? { literal: "complex", code, message, offset: token.startOffset } : { literal: "complex", code, message },
  })
}

class TokenStream {
  readonly #tokens: ReadonlyArray<IToken>
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>) {
    this.#tokens = tokens
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  match(tokenType: TokenType): IToken | undefined {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return token
    }
    return undefined
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

const trimWhitespace = (tokens: ReadonlyArray<IToken>): ReadonlyArray<IToken> => {
  let start = 0
  let end = tokens.length
  while (start < end && tokens[start]?.tokenType === WhiteSpace) {
    start += 1
  }
  while (end > start && tokens[end - 1]?.tokenType === WhiteSpace) {
    end -= 1
  }
  return tokens.slice(start, end)
}

const unwrapParentheses = (tokens: ReadonlyArray<IToken>): ReadonlyArray<IToken> => {
  const first = tokens[0]
  const last = tokens[tokens.length - 1]
  const opens = first?.tokenType === LParen
  const closes = last?.tokenType === RParen
  if (opens !== closes || (opens && tokens.length < 2)) {
    return fail("UnbalancedParenthesis", "parentheses must enclose the whole literal", first)
  }
  return opens ? trimWhitespace(tokens.slice(1, -1)) : tokens
}

const magnitude = (token: IToken): number => {
  if (token.tokenType === InfinityLiteral) {
    return Number.POSITIVE_INFINITY
  }
  if (token.tokenType === NaNLiteral) {
    return Number.NaN
  }
  return Number(token.image.replace(/_/g, ""))
}

interface Term {
  readonly value: number
  readonly imaginary: boolean
}

const readSign = (stream: TokenStream): -1 | 1 | undefined => {
  if (stream.match(Plus)) {
    return 1
  }
  if (stream.match(Minus)) {
    return -1
  }
  return undefined
}

const readTerm = (stream: TokenStream, sign: -1 | 1): Term => {
  const number = stream.match(RealNumber) ?? stream.match(InfinityLiteral) ?? stream.match(NaNLiteral)
  const unit = stream.match(ImaginaryUnit)
  if (!number && !unit) {
    return fail(stream.peek() ? "UnexpectedToken" : "UnexpectedEnd", "expected a number or imaginary unit", stream.peek())
  }
  const value = number ? magnitude(number) : 1
  return { value: sign * value, imaginary: unit !== undefined }
}

/**
 * Parse `[ws] ['('] real | [real] (+|-) imag j | imag j [')'] [ws]`.
 * Whitespace is rejected between the parts of the number.
 */
export const parseComplexLiteral = (text: string): ComplexParts => {
  const lexed = ComplexLexer.tokenize(text)
  const lexError = lexed.errors[0]
  if (lexError) {
    return fail("UnexpectedCharacter", lexError.message)
  }
  const body = unwrapParentheses(trimWhitespace(lexed.tokens))
  const misplaced = body.find((token) => token.tokenType === WhiteSpace || token.tokenType === LParen || token.tokenType === RParen)
  if (misplaced) {
    return fail("MisplacedWhitespace", `unexpected "${misplaced.image}"`, misplaced)
  }
  const stream = new TokenStream(body)
  const first = readTerm(stream, readSign(stream) ?? 1)
  if (first.imaginary || stream.done()) {
    if (!stream.done()) {
      return fail("TrailingInput", "unexpected input after imaginary part", stream.peek())
    }
    return first.imaginary ? { real: 0, imag: first.value } : { real: first.value, imag: 0 }
  }
  const sign = readSign(stream)
  if (sign === undefined) {
    return fail("UnexpectedToken", "expected + or - before the imaginary part", stream.peek())
  }
  const second = readTerm(stream, sign)
  if (!second.imaginary) {
    return fail("UnexpectedToken", "imaginary part must end with j", stream.peek())
  }
  if (!stream.done()) {
    return fail("TrailingInput", "unexpected input after imaginary part", stream.peek())
  }
  return { real: first.value, imag: second.value }
}
