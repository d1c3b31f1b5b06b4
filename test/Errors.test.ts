import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  ConversionError,
  DepthLimitError,
  IdentificationError,
  ParseError,
} from "../src/Errors.js"

describe("conversion error hierarchy", () => {
  it("formats conversion failures with the displayed value", () => {
    expect(new ConversionError({ value: "not-a-uuid", targetType: "UUID" }).message).toBe(
      "Failed to convert not-a-uuid to UUID",
    )
    expect(new ConversionError({ value: [1, "a"], targetType: "Decimal" }).message).toBe(
      "Failed to convert [1, 'a'] to Decimal",
    )
  })

  it("formats parse, depth and identification failures", () => {
    expect(new ParseError({ input: "{", problem: "unexpected end" }).message).toBe("Invalid JSON input: unexpected end")
    expect(new DepthLimitError({ depth: 3, limit: 2 }).message).toBe("Nesting depth 3 exceeds the limit of 2")
    expect(new IdentificationError({ value: Symbol("x"), reason: "unsupported type symbol" }).message).toBe(
      "Cannot identify Symbol(x): unsupported type symbol",
    )
  })

  it.effect("supports catchTag on ConversionError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(new ConversionError({ value: 1, targetType: "date" })).pipe(
        Effect.catchTag("ConversionError", (error) => {
          expect(error.value).toBe(1)
          expect(error.targetType).toBe("date")
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }),
  )

  it.effect("supports catchTag on DepthLimitError", () =>
    Effect.gen(function* () {
      const limit = yield* Effect.fail(new DepthLimitError({ depth: 5, limit: 4 })).pipe(
        Effect.catchTag("DepthLimitError", (error) => Effect.succeed(error.limit)),
      )

      expect(limit).toBe(4)
    }),
  )
})
