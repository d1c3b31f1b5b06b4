/**
 * Numeric text handling shared by the value classes and the converters.
 *
 * Parsers follow the literal grammars of the conversion targets: optional
 * surrounding whitespace, an optional sign, digit groups separated by single
 * underscores. They return `undefined` on malformed input and never throw.
 */

const DIGITS = String.raw`\d(?:_?\d)*`

const INT_PATTERN = new RegExp(String.raw`^([+-]?)(${DIGITS})$`)
const FLOAT_PATTERN = new RegExp(
  String.raw`^[+-]?(?:${DIGITS}(?:\.(?:${DIGITS})?)?|\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`,
)
const DECIMAL_PATTERN = new RegExp(
  String.raw`^([+-]?)(?:(${DIGITS})(?:\.(${DIGITS})?)?|\.(${DIGITS}))(?:[eE]([+-]?${DIGITS}))?$`,
)
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i

const stripUnderscores = (text: string): string => text.replace(/_/g, "")

export const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER)
export const MIN_SAFE_BIGINT = BigInt(Number.MIN_SAFE_INTEGER)

/**
 * Decimal number as an unscaled integer and a scale: `digits * 10^-scale`.
 */
export interface ScaledDecimal {
  readonly digits: bigint
  readonly scale: number
}

export const parseIntText = (text: string): bigint | undefined => {
  const match = INT_PATTERN.exec(text.trim())
  if (!match) {
    return undefined
  }
  const magnitude = BigInt(stripUnderscores(match[2] ?? ""))
  return match[1] === "-" ? -magnitude : magnitude
}

export const parseFloatText = (text: string): number | undefined => {
  const trimmed = text.trim()
  const special = SPECIAL_FLOAT_PATTERN.exec(trimmed)
  if (special) {
    const word = (special[2] ?? "").toLowerCase()
    if (word === "nan") {
      return Number.NaN
    }
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }
  if (!FLOAT_PATTERN.test(trimmed)) {
    return undefined
  }
  return Number(stripUnderscores(trimmed))
}

export const parseDecimalText = (text: string): ScaledDecimal | undefined => {
  const match = DECIMAL_PATTERN.exec(text.trim())
  if (!match) {
    return undefined
  }
  const [, sign, whole, fraction, bareFraction, exponent] = match
  const integerPart = stripUnderscores(whole ?? "")
  const fractionPart = stripUnderscores(fraction ?? bareFraction ?? "")
  const unscaled = BigInt(`${integerPart}${fractionPart}` || "0")
  const shift = exponent === undefined ? 0 : Number(stripUnderscores(exponent))
  const scale = fractionPart.length - shift
  if (!Number.isSafeInteger(scale)) {
    return undefined
  }
  return {
    digits: sign === "-" ? -unscaled : unscaled,
    scale,
  }
}

/**
 * Decimal text in the usual to-string form: plain notation while the
 * exponent is at most zero and the value has fewer than six leading zeros
 * after the point, scientific notation (`1E+3`, `1.5E-7`) otherwise.
 */
export const formatScaledDecimal = ({ digits, scale }: ScaledDecimal): string => {
  const negative = digits < 0n
  const coefficient = (negative ? -digits : digits).toString()
  const sign = negative ? "-" : ""
  const exponent = -scale
  const leftDigits = exponent + coefficient.length
  const dotPlace = exponent <= 0 && leftDigits > -6 ? leftDigits : 1
  const body = dotPlace <= 0
    ? `0.${"0".repeat(-dotPlace)}${coefficient}`
    : dotPlace >= coefficient.length
    ? `${coefficient}${"0".repeat(dotPlace - coefficient.length)}`
    : `${coefficient.slice(0, dotPlace)}.${coefficient.slice(dotPlace)}`
  const shift = leftDigits - dotPlace
  const suffix = shift === 0 ? "" : `E${shift > 0 ? "+" : "-"}${Math.abs(shift)}`
  return `${sign}${body}${suffix}`
}

/**
 * Largest power of ten built as an exact integer. Decimal exponents past it
 * have no exact ratio here.
 */
export const MAX_EXACT_EXPONENT = 4_300

export const powerOfTen = (exponent: number): bigint | undefined =>
  exponent >= 0 && exponent <= MAX_EXACT_EXPONENT ? 10n ** BigInt(exponent) : undefined

/**
 * Shortest round-trip text for a number, spelled the way float literals are
 * read back by `parseFloatText`: `nan`, `inf`, `-inf`, two-digit exponents.
 */
export const formatFloat = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf"
  }
  if (Object.is(value, -0)) {
    return "-0"
  }
  return String(value).replace(/e([+-])(\d)$/, "e$10$2")
}

export const toSafeNumber = (value: bigint): number | bigint =>
  value >= MIN_SAFE_BIGINT && value <= MAX_SAFE_BIGINT ? Number(value) : value

export const gcd = (left: bigint, right: bigint): bigint => {
  let a = left < 0n ? -left : left
  let b = right < 0n ? -right : right
  while (b !== 0n) {
    ;[a, b] = [b, a % b]
  }
  return a
}

export const pow10 = (exponent: number): bigint => 10n ** BigInt(exponent)

/**
 * Integer division rounding half to even.
 */
export const divideRoundHalfEven = (numerator: bigint, denominator: bigint): bigint => {
  const negative = (numerator < 0n) !== (denominator < 0n)
  const n = numerator < 0n ? -numerator : numerator
  const d = denominator < 0n ? -denominator : denominator
  let quotient = n / d
  const twiceRemainder = (n % d) * 2n
  if (twiceRemainder > d || (twiceRemainder === d && quotient % 2n === 1n)) {
    quotient += 1n
  }
  return negative ? -quotient : quotient
}

export const floorDivide = (numerator: bigint, denominator: bigint): bigint => {
  const quotient = numerator / denominator
  return (numerator % denominator !== 0n) && ((numerator < 0n) !== (denominator < 0n))
    ? quotient - 1n
    : quotient
}

/**
 * Exact binary expansion of a finite number as `numerator / 2^k`.
 */
export const exactRatio = (value: number): [numerator: bigint, denominator: bigint] | undefined => {
  if (!Number.isFinite(value)) {
    return undefined
  }
  let scaled = value
  let denominator = 1n
  while (!Number.isInteger(scaled)) {
    scaled *= 2
    denominator *= 2n
  }
  return [BigInt(scaled), denominator]
}
