import { describe, it, expect } from "vitest"
import * as DataUtils from "../src/index.js"

describe("public API export surface", () => {
  it("exposes the conversion modules", () => {
    expect(DataUtils).toHaveProperty("identifyInStr")
    expect(DataUtils).toHaveProperty("identifyNumericType")
    expect(DataUtils).toHaveProperty("convertToStr")
    expect(DataUtils).toHaveProperty("strToTimedelta")
    expect(DataUtils).toHaveProperty("toUuid")
    expect(DataUtils).toHaveProperty("serialize")
    expect(DataUtils).toHaveProperty("deserialize")
    expect(DataUtils).toHaveProperty("ConversionSettings")
    expect(DataUtils).toHaveProperty("ConversionError")
    expect(DataUtils).toHaveProperty("PlainDateFromString")
    expect(DataUtils).toHaveProperty("TimeDelta")
  })
})
