import { describe, it, expect } from "@effect/vitest"
import { ConfigProvider, Effect, Exit } from "effect"
import { Capabilities, ConversionSettings } from "../src/Settings.js"

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

const readSettings = Effect.gen(function* () {
  return yield* ConversionSettings
})

describe("ConversionSettings", () => {
  it.effect("falls back to defaults without a layer", () =>
    Effect.gen(function* () {
      const settings = yield* ConversionSettings

      expect(settings.maxDepth).toBe(Number.POSITIVE_INFINITY)
      expect(settings.encoding).toBe("utf-8")
      expect(settings.indent).toBeUndefined()
    }),
  )

  it.effect("merges overrides over the defaults", () =>
    Effect.gen(function* () {
      const settings = yield* ConversionSettings

      expect(settings).toEqual({ maxDepth: 4, encoding: "ascii", indent: undefined })
    }).pipe(Effect.provide(ConversionSettings.layer({ maxDepth: 4, encoding: "ascii" }))),
  )

  it.effect("reads settings from the config provider", () =>
    Effect.gen(function* () {
      const settings = yield* ConversionSettings

      expect(settings).toEqual({ maxDepth: 3, encoding: "ascii", indent: 2 })
    }).pipe(
      Effect.provide(ConversionSettings.layerConfig),
      withEnv([["CONVERSION_MAX_DEPTH", "3"], ["CONVERSION_ENCODING", "ascii"], ["CONVERSION_INDENT", "2"]]),
    ),
  )

  it.effect("keeps defaults for missing config keys", () =>
    Effect.gen(function* () {
      const settings = yield* ConversionSettings

      expect(settings).toEqual({ maxDepth: Number.POSITIVE_INFINITY, encoding: "utf-8", indent: undefined })
    }).pipe(Effect.provide(ConversionSettings.layerConfig), withEnv([])),
  )

  it.effect("rejects unknown encodings and negative depths", () =>
    Effect.gen(function* () {
      const encoding = yield* Effect.exit(
        Effect.provide(readSettings, ConversionSettings.layerConfig).pipe(
          withEnv([["CONVERSION_ENCODING", "latin-1"]]),
        ),
      )
      const depth = yield* Effect.exit(
        Effect.provide(readSettings, ConversionSettings.layerConfig).pipe(
          withEnv([["CONVERSION_MAX_DEPTH", "-1"]]),
        ),
      )

      expect(Exit.isFailure(encoding)).toBe(true)
      expect(Exit.isFailure(depth)).toBe(true)
    }),
  )
})

describe("Capabilities", () => {
  it("reports schema validation", () => {
    expect(Capabilities.schemaValidation).toBe(true)
  })
})
