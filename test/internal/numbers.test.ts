import { describe, it, expect } from "vitest"
import {
  divideRoundHalfEven,
  exactRatio,
  floorDivide,
  formatFloat,
  formatScaledDecimal,
  MAX_EXACT_EXPONENT,
  parseDecimalText,
  parseFloatText,
  parseIntText,
  powerOfTen,
} from "../../src/internal/numbers.js"

describe("numeric text", () => {
  it("reads integer literals with digit separators", () => {
    expect(parseIntText(" -1_000 ")).toBe(-1000n)
    expect(parseIntText("1__0")).toBeUndefined()
    expect(parseIntText("_1")).toBeUndefined()
  })

  it("reads float literals and special values", () => {
    expect(parseFloatText(".5e1")).toBe(5)
    expect(parseFloatText("1.")).toBe(1)
    expect(parseFloatText("-Infinity")).toBe(Number.NEGATIVE_INFINITY)
    expect(parseFloatText("NaN")).toBeNaN()
    expect(parseFloatText("1e")).toBeUndefined()
  })

  it("keeps the scale of decimal literals", () => {
    expect(parseDecimalText("1.50")).toEqual({ digits: 150n, scale: 2 })
    expect(parseDecimalText("-2e3")).toEqual({ digits: -2n, scale: -3 })
    expect(formatScaledDecimal({ digits: 5n, scale: 3 })).toBe("0.005")
    expect(formatScaledDecimal({ digits: -2n, scale: -3 })).toBe("-2E+3")
    expect(formatScaledDecimal({ digits: 0n, scale: 2 })).toBe("0.00")
    expect(formatScaledDecimal({ digits: 12345n, scale: 11 })).toBe("1.2345E-7")
  })

  it("spells floats with two-digit exponents", () => {
    expect(formatFloat(1e-7)).toBe("1e-07")
    expect(formatFloat(1.5e300)).toBe("1.5e+300")
    expect(formatFloat(-0)).toBe("-0")
    expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("-inf")
  })
})

describe("integer arithmetic", () => {
  it("rounds half to even", () => {
    expect(divideRoundHalfEven(5n, 2n)).toBe(2n)
    expect(divideRoundHalfEven(7n, 2n)).toBe(4n)
    expect(divideRoundHalfEven(-7n, 2n)).toBe(-4n)
  })

  it("builds powers of ten only up to the exact limit", () => {
    expect(powerOfTen(3)).toBe(1000n)
    expect(powerOfTen(MAX_EXACT_EXPONENT + 1)).toBeUndefined()
    expect(parseDecimalText("1e99999999999999999999")).toBeUndefined()
  })

  it("floors toward negative infinity", () => {
    expect(floorDivide(-7n, 2n)).toBe(-4n)
    expect(floorDivide(7n, 2n)).toBe(3n)
  })

  it("expands binary fractions exactly", () => {
    expect(exactRatio(0.375)).toEqual([3n, 8n])
    expect(exactRatio(Number.NaN)).toBeUndefined()
  })
})
