import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for the complex-number and ISO-8601 duration literals.
 * Whitespace is kept as a real token: both grammars only allow it at the
 * edges of a literal, which the parsers enforce.
 */
export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, line_breaks: true })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })

export const InfinityLiteral = createToken({ name: "InfinityLiteral", pattern: /inf(?:inity)?/i })
export const NaNLiteral = createToken({ name: "NaNLiteral", pattern: /nan/i })
export const RealNumber = createToken({
  name: "RealNumber",
  pattern: /(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?/,
})
export const ImaginaryUnit = createToken({ name: "ImaginaryUnit", pattern: /[jJ]/ })

export const ComplexLexer = new Lexer(
  [WhiteSpace, LParen, RParen, Plus, Minus, InfinityLiteral, NaNLiteral, RealNumber, ImaginaryUnit],
  { positionTracking: "onlyOffset" },
)

export const PeriodDesignator = createToken({ name: "PeriodDesignator", pattern: /P/ })
export const TimeDesignator = createToken({ name: "TimeDesignator", pattern: /T/ })
export const DurationNumber = createToken({ name: "DurationNumber", pattern: /\d+(?:[.,]\d+)?/ })
export const Years = createToken({ name: "Years", pattern: /Y/ })
export const MonthsOrMinutes = createToken({ name: "MonthsOrMinutes", pattern: /M/ })
export const Weeks = createToken({ name: "Weeks", pattern: /W/ })
export const Days = createToken({ name: "Days", pattern: /D/ })
export const Hours = createToken({ name: "Hours", pattern: /H/ })
export const Seconds = createToken({ name: "Seconds", pattern: /S/ })

export const DurationLexer = new Lexer(
  [
    Plus,
    Minus,
    PeriodDesignator,
    TimeDesignator,
    DurationNumber,
    Years,
    MonthsOrMinutes,
    Weeks,
    Days,
    Hours,
    Seconds,
  ],
  { positionTracking: "onlyOffset" },
)
