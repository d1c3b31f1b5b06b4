/**
 * Runtime settings for the recursive conversions.
 *
 * `ConversionSettings` is a context reference with defaults, so every
 * operation runs without a layer; provide one to bound the nesting depth,
 * change the text encoding checked by `toStr`, or indent serialized JSON.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Option } from "effect"

/**
 * Text encodings the string round-trip check supports.
 *
 * @since 0.1.0
 * @category Settings
 */
export type TextEncodingName = "utf-8" | "ascii"

/**
 * @since 0.1.0
 * @category Settings
 */
export interface ConversionSettingsService {
  /** Deepest nesting level `serialize` and `deserialize` will walk. */
  readonly maxDepth: number
  readonly encoding: TextEncodingName
  /** JSON indentation; `undefined` keeps everything on one line. */
  readonly indent: number | undefined
}

const defaults: ConversionSettingsService = {
  maxDepth: Number.POSITIVE_INFINITY,
  encoding: "utf-8",
  indent: undefined,
}

/**
 * @since 0.1.0
 * @category Settings
 * @example
 * ```ts
 * serialize(tree).pipe(Effect.provide(ConversionSettings.layer({ maxDepth: 8, indent: 2 })))
 * ```
 */
export class ConversionSettings extends Context.Reference<ConversionSettings>()(
  "effect-datautils/ConversionSettings",
  { defaultValue: (): ConversionSettingsService => defaults },
) {
  static layer(overrides: Partial<ConversionSettingsService> = {}) {
    return Layer.succeed(this, { ...defaults, ...overrides })
  }

  /**
   * Reads `CONVERSION_MAX_DEPTH`, `CONVERSION_ENCODING` and
   * `CONVERSION_INDENT` from the active `ConfigProvider`.
   */
  static readonly layerConfig = Layer.effect(
    this,
    Effect.gen(function* () {
      const maxDepth = yield* Config.integer("CONVERSION_MAX_DEPTH").pipe(
        Config.validate({ message: "Expected a non-negative depth", validation: (depth) => depth >= 0 }),
        Config.withDefault(defaults.maxDepth),
      )
      const encoding = yield* Config.literal("utf-8", "ascii")("CONVERSION_ENCODING").pipe(
        Config.withDefault(defaults.encoding),
      )
      const indent = yield* Config.option(
        Config.integer("CONVERSION_INDENT").pipe(
          Config.validate({ message: "Expected a non-negative indent", validation: (width) => width >= 0 }),
        ),
      )
      const settings: ConversionSettingsService = { maxDepth, encoding, indent: Option.getOrUndefined(indent) }
      return settings
    }),
  )
}

/**
 * Optional features available in this build.
 *
 * @since 0.1.0
 * @category Settings
 */
export const Capabilities = {
  /** Effect `Schema` ships with the runtime dependency. */
  schemaValidation: true,
} as const
