import { Effect, Logger, LogLevel, Option, Schema } from "effect"
import { mkdirSync, writeFileSync } from "node:fs"
import { resolve } from "node:path"
import { identifyInStr } from "../src/Identification.js"
import { PlainDateFromString, TimeDeltaFromString, UuidFromString } from "../src/Schemas.js"
import { deserialize, serialize } from "../src/Serialization.js"
import { ConversionSettings } from "../src/Settings.js"

const rawSettings = {
  release: "2024-03-15",
  deployment: "2c8f5a9e-4b1d-4c3e-9f7a-0d6e1b2a3c4d",
  timeout: "PT1M30S",
  retries: "3",
  debug: "yes",
  cacheDir: "./var/cache",
}

const ReleaseSettings = Schema.Struct({
  release: PlainDateFromString,
  deployment: UuidFromString,
  timeout: TimeDeltaFromString,
})

const outDir = resolve("examples/out")
const snapshotPath = resolve(outDir, "config-snapshot.json")

const program = Effect.gen(function* () {
  const typed = yield* Schema.decodeUnknown(ReleaseSettings)(rawSettings)
  yield* Effect.logInfo(`release ${typed.release} times out after ${typed.timeout.totalSeconds()}s`)

  for (const [key, text] of Object.entries(rawSettings)) {
    const tag = Option.getOrElse(identifyInStr(text), () => "str")
    yield* Effect.logInfo(`${key}: ${tag}`)
  }

  const snapshot = yield* serialize({ ...rawSettings, release: typed.release, timeout: typed.timeout })
  const restored = yield* deserialize(snapshot)
  yield* Effect.logDebug("restored snapshot").pipe(Effect.annotateLogs({ restored: String(restored) }))

  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  yield* Effect.sync(() => writeFileSync(snapshotPath, snapshot, "utf-8"))
}).pipe(
  Effect.provide(ConversionSettings.layer({ indent: 2, maxDepth: 8 })),
  Logger.withMinimumLogLevel(LogLevel.Debug),
)

Effect.runPromise(program).catch((error) => {
  console.error("Failed to write the configuration snapshot", error)
  process.exitCode = 1
})
