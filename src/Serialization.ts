/**
 * JSON round trip for values from the toolkit's universe.
 *
 * `serialize` walks mappings and sequences, keeping JSON primitives as they
 * are and replacing every other leaf with its canonical string. `deserialize`
 * walks decoded JSON and upgrades each string leaf through the first
 * `DeserializationChain` row that parses it.
 *
 * @since 0.1.0
 */

import { Effect, Either, HashMap, HashSet, Option } from "effect"
import {
  type ContainerFormat,
  convertToStr,
  type DispatchRow,
  strToBool,
  strToBytes,
  strToComplex,
  strToCounter,
  strToDate,
  strToDatetime,
  strToDecimal,
  strToDefaultdict,
  strToDeque,
  strToDict,
  strToFraction,
  strToFrozendict,
  strToFrozenset,
  strToPath,
  strToSet,
  strToTime,
  strToTimedelta,
  strToTimezone,
  strToUuid,
  toStr,
} from "./Conversion.js"
import { DepthLimitError, type DeserializationError, ParseError, type SerializationError } from "./Errors.js"
import { identify } from "./Identification.js"
import { ConversionSettings, type ConversionSettingsService } from "./Settings.js"
import {
  type Complex,
  type Counter,
  DefaultMap,
  Deque,
  type FsPath,
  type PlainDate,
  type PlainDateTime,
  type PlainTime,
  type TimeDelta,
  type Tuple,
  type TypeTag,
  type Uuid,
} from "./Values.js"
import { display, dumpJson, encodeBytesLiteral, type Json } from "./internal/display.js"
import {
  type Dict,
  isBytes,
  isComplex,
  isCounter,
  isDate,
  isDatetime,
  isDefaultdict,
  isDeque,
  isDict,
  isFrozendict,
  isFrozenset,
  isList,
  isNone,
  isPath,
  isPrimitiveType,
  isSet,
  isStr,
  isTime,
  isTimedelta,
  isTuple,
  isUuid,
} from "./internal/guards.js"
import { formatFloat } from "./internal/numbers.js"

/**
 * @since 0.1.0
 * @category Models
 */
export type SerializationTag = TypeTag | "primitive"

type Walk = (child: unknown) => Effect.Effect<Json, SerializationError>

/**
 * A serialization row handles a value when its handler returns some effect.
 *
 * @since 0.1.0
 * @category Models
 */
export type SerializationRow = DispatchRow<
  SerializationTag,
  (value: unknown, walk: Walk) => Option.Option<Effect.Effect<Json, SerializationError>>
>

/**
 * @since 0.1.0
 * @category Models
 */
export interface DeserializationRow {
  readonly tag: TypeTag
  readonly parse: (text: string) => Option.Option<unknown>
}

const row = <A>(
  tag: SerializationTag,
  test: (value: unknown) => value is A,
  encode: (value: A, walk: Walk) => Effect.Effect<Json, SerializationError>,
): SerializationRow => ({
  tag,
  test,
  handler: (value, walk) => (test(value) ? Option.some(encode(value, walk)) : Option.none()),
})

const keyText = (key: unknown): string => {
  if (typeof key === "string") {
    return key
  }
  if (typeof key === "boolean") {
    return key ? "true" : "false"
  }
  return isNone(key) ? "null" : display(key)
}

const encodeEntries = (
  entries: Iterable<readonly [unknown, unknown]>,
  walk: Walk,
): Effect.Effect<Json, SerializationError> =>
  Effect.map(
    Effect.forEach(entries, ([key, item]) => Effect.map(walk(item), (tree) => [keyText(key), tree] as const)),
    (members) => Object.fromEntries(members),
  )

const encodeItems = (items: Iterable<unknown>, walk: Walk): Effect.Effect<Json, SerializationError> =>
  Effect.forEach(items, walk)

const canonicalText = (value: { toString(): string }): Effect.Effect<Json, SerializationError> =>
  Effect.succeed(value.toString())

const isMapping = (value: unknown): value is Dict | HashMap.HashMap<unknown, unknown> =>
  isDict(value) || isFrozendict(value)

const isSequence = (value: unknown): value is ReadonlyArray<unknown> | Tuple => isList(value) || isTuple(value)

const isUnordered = (value: unknown): value is ReadonlySet<unknown> | HashSet.HashSet<unknown> =>
  isSet(value) || isFrozenset(value)

/**
 * Leaf dispatch order of `serialize`. Values no row accepts fall through to
 * `toStr`.
 *
 * @since 0.1.0
 * @category Dispatch
 */
export const SerializationChain: ReadonlyArray<SerializationRow> = [
  row("none", isNone, () => Effect.succeed(null)),
  row("str", isStr, (value) => Effect.succeed(value)),
  row("primitive", isPrimitiveType, (value) =>
    Effect.succeed(typeof value === "number" && !Number.isFinite(value) ? formatFloat(value) : value)),
  row("dict", isMapping, (value, walk) => encodeEntries(isDict(value) ? Object.entries(value) : value, walk)),
  row("list", isSequence, (value, walk) => encodeItems(value, walk)),
  row("counter", isCounter, (value: Counter<unknown>, walk) => encodeEntries(value, walk)),
  row("defaultdict", isDefaultdict, (value: DefaultMap<unknown, unknown>, walk) => encodeEntries(value, walk)),
  row("deque", isDeque, (value: Deque<unknown>, walk) => encodeItems(value, walk)),
  row("set", isUnordered, (value, walk) => encodeItems(value, walk)),
  row("datetime", isDatetime, (value: PlainDateTime) => canonicalText(value)),
  row("date", isDate, (value: PlainDate) => canonicalText(value)),
  row("time", isTime, (value: PlainTime) => canonicalText(value)),
  row("timedelta", isTimedelta, (value: TimeDelta) => canonicalText(value)),
  row("complex", isComplex, (value: Complex) => canonicalText(value)),
  row("bytes", isBytes, (value) => Effect.succeed(encodeBytesLiteral(value))),
  row("path", isPath, (value: FsPath) => canonicalText(value)),
  row("uuid", isUuid, (value: Uuid) => canonicalText(value)),
]

const NESTED_TAGS: ReadonlySet<SerializationTag> = new Set(["dict", "list", "counter", "defaultdict", "deque", "set"])

const depthGuard = <A, E>(
  depth: number,
  settings: ConversionSettingsService,
  effect: Effect.Effect<A, E>,
): Effect.Effect<A, E | DepthLimitError> =>
  depth > settings.maxDepth ? Effect.fail(new DepthLimitError({ depth, limit: settings.maxDepth })) : effect

const encodeNode = (
  value: unknown,
  depth: number,
  settings: ConversionSettingsService,
): Effect.Effect<Json, SerializationError> =>
  Effect.suspend(() => {
    const walk: Walk = (child) => encodeNode(child, depth + 1, settings)
    for (const candidate of SerializationChain) {
      const handled = candidate.handler(value, walk)
      if (Option.isSome(handled)) {
        return NESTED_TAGS.has(candidate.tag) ? depthGuard(depth, settings, handled.value) : handled.value
      }
    }
    return Effect.logDebug("Serializing through the string fallback").pipe(
      Effect.annotateLogs({ depth, type: identify(value) }),
      Effect.zipRight(toStr(value, settings.encoding)),
    )
  })

const isWalkable = (value: unknown): boolean =>
  isMapping(value) || isSequence(value) || isCounter(value) || isDefaultdict(value) || isDeque(value)
  || isUnordered(value)

/**
 * Encode a value as JSON text. Containers are walked recursively; any other
 * top-level value is rendered by `convertToStr`.
 *
 * @since 0.1.0
 * @category Serialization
 * @example
 * ```ts
 * serialize({ when: PlainDate.from({ year: 2024, month: 1, day: 31 }).pipe(Option.getOrThrow), n: 1 })
 * // Effect.succeed('{"when": "2024-01-31", "n": 1}')
 * ```
 */
export const serialize = (
  value: unknown,
  format: ContainerFormat = "simple",
): Effect.Effect<string, SerializationError> =>
  Effect.gen(function* () {
    const settings = yield* ConversionSettings
    if (!isWalkable(value)) {
      return yield* convertToStr(value, format)
    }
    const tree = yield* encodeNode(value, 1, settings)
    return dumpJson(tree, settings.indent)
  }).pipe(Effect.withLogSpan("serialize"))

/**
 * Upgrade order for string leaves in `deserialize`.
 *
 * @since 0.1.0
 * @category Dispatch
 */
export const DeserializationChain: ReadonlyArray<DeserializationRow> = [
  { tag: "bool", parse: strToBool },
  { tag: "complex", parse: strToComplex },
  { tag: "date", parse: (text) => strToDate(text) },
  { tag: "datetime", parse: (text) => strToDatetime(text) },
  { tag: "decimal", parse: strToDecimal },
  { tag: "deque", parse: strToDeque },
  { tag: "dict", parse: strToDict },
  { tag: "defaultdict", parse: strToDefaultdict },
  { tag: "fraction", parse: strToFraction },
  { tag: "frozendict", parse: strToFrozendict },
  { tag: "frozenset", parse: strToFrozenset },
  { tag: "set", parse: strToSet },
  { tag: "time", parse: (text) => strToTime(text) },
  { tag: "timedelta", parse: strToTimedelta },
  { tag: "timezone", parse: strToTimezone },
  { tag: "uuid", parse: strToUuid },
  { tag: "path", parse: strToPath },
  { tag: "counter", parse: strToCounter },
  { tag: "bytes", parse: strToBytes },
]

type Decode = Effect.Effect<unknown, DepthLimitError>

const decodeEntries = <K>(
  entries: Iterable<readonly [K, unknown]>,
  depth: number,
  settings: ConversionSettingsService,
): Effect.Effect<Array<readonly [K, unknown]>, DepthLimitError> =>
  Effect.forEach(entries, ([key, item]) => Effect.map(decodeNode(item, depth + 1, settings), (decoded) => [key, decoded] as const))

const decodeItems = (
  items: Iterable<unknown>,
  depth: number,
  settings: ConversionSettingsService,
): Effect.Effect<Array<unknown>, DepthLimitError> =>
  Effect.forEach(items, (item) => decodeNode(item, depth + 1, settings))

const upgrade = (text: string, depth: number, settings: ConversionSettingsService): Decode =>
  Effect.suspend(() => {
    for (const candidate of DeserializationChain) {
      const parsed = candidate.parse(text)
      if (Option.isSome(parsed)) {
        return Effect.logDebug("Upgraded string leaf").pipe(
          Effect.annotateLogs({ depth, tag: candidate.tag }),
          Effect.zipRight(decodeNode(parsed.value, depth, settings)),
        )
      }
    }
    return Effect.succeed(text)
  })

/**
 * Mapping keys are kept as they are; values and elements are decoded.
 */
const decodeNode = (node: unknown, depth: number, settings: ConversionSettingsService): Decode =>
  Effect.suspend((): Decode => {
    if (typeof node === "string") {
      return upgrade(node, depth, settings)
    }
    if (isList(node)) {
      return depthGuard(depth, settings, decodeItems(node, depth, settings))
    }
    if (isDict(node)) {
      return depthGuard(
        depth,
        settings,
        Effect.map(decodeEntries(Object.entries(node), depth, settings), (entries) => Object.fromEntries(entries)),
      )
    }
    if (isDeque(node)) {
      return depthGuard(depth, settings, Effect.map(decodeItems(node, depth, settings), (items) => new Deque(items, node.maxlen)))
    }
    if (isSet(node)) {
      return depthGuard(depth, settings, Effect.map(decodeItems(node, depth, settings), (items) => new Set(items)))
    }
    if (isFrozenset(node)) {
      return depthGuard(depth, settings, Effect.map(decodeItems(node, depth, settings), HashSet.fromIterable))
    }
    if (isDefaultdict(node)) {
      return depthGuard(
        depth,
        settings,
        Effect.map(decodeEntries(node, depth, settings), (entries) => new DefaultMap(node.factory, entries)),
      )
    }
    if (isFrozendict(node)) {
      return depthGuard(depth, settings, Effect.map(decodeEntries(node, depth, settings), HashMap.fromIterable))
    }
    return Effect.succeed(node)
  })

/**
 * Decode JSON text and upgrade its string leaves. A top-level JSON string is
 * upgraded too.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const deserialize = (text: string): Effect.Effect<unknown, DeserializationError> =>
  Effect.gen(function* () {
    const settings = yield* ConversionSettings
    const decoded = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) =>
        new ParseError({ input: text, problem: error instanceof Error ? error.message : String(error) }),
    })
    return yield* decodeNode(decoded, 1, settings)
  }).pipe(Effect.withLogSpan("deserialize"))

const runOrThrow = <A, E>(effect: Effect.Effect<A, E>): A =>
  Either.match(Effect.runSync(Effect.either(effect)), {
    onLeft: (error) => {
      throw error
    },
    onRight: (value) => value,
  })

/**
 * `serialize` with the default settings, throwing its error.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const serializeSync = (value: unknown, format: ContainerFormat = "simple"): string =>
  runOrThrow(serialize(value, format))

/**
 * `deserialize` with the default settings, throwing its error.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const deserializeSync = (text: string): unknown => runOrThrow(deserialize(text))

