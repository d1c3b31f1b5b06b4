/**
 * Type identification heuristics.
 *
 * Exact-type predicates (`isX`) answer "is this value an X"; feasibility
 * predicates (`couldBeX`) answer "could this value become an X". For strings
 * `couldBeX` is the absence check of the matching `strToX` parser, so a tag
 * picked by `identifyInStr` is always one its converter accepts.
 *
 * Every dispatch order lives in an exported table so the ambiguity policy
 * can be inspected and tested as data.
 *
 * @since 0.1.0
 */

import { BigDecimal, Effect, HashMap, HashSet, Option } from "effect"
import {
  coerceBool,
  coerceBytes,
  coerceComplex,
  coerceCounter,
  coerceDate,
  coerceDatetime,
  coerceDecimal,
  coerceDefaultdict,
  coerceDeque,
  coerceDict,
  coerceFloat,
  coerceFraction,
  coerceFrozendict,
  coerceFrozenset,
  coerceInt,
  coerceList,
  coercePath,
  coerceSet,
  coerceTime,
  coerceTimedelta,
  coerceTimezone,
  coerceTuple,
  coerceUuid,
} from "./Conversion.js"
import { IdentificationError } from "./Errors.js"
import type { TypeTag } from "./Values.js"
import {
  isBool,
  isBytes,
  isComplex,
  isCounter,
  isDate,
  isDatetime,
  isDecimal,
  isDefaultdict,
  isDeque,
  isDict,
  isFloat,
  isFraction,
  isFrozendict,
  isFrozenset,
  isInt,
  isList,
  isNone,
  isPath,
  isSet,
  isStr,
  isTime,
  isTimedelta,
  isTimezone,
  isTuple,
  isUuid,
} from "./internal/guards.js"

export {
  isBool,
  isBytes,
  isComplex,
  isCounter,
  isDate,
  isDatetime,
  isDecimal,
  isDefaultdict,
  isDeque,
  isDict,
  isFloat,
  isFraction,
  isFrozendict,
  isFrozenset,
  isInstance,
  isInt,
  isList,
  isNone,
  isPath,
  isPrimitiveType,
  isSet,
  isStr,
  isTime,
  isTimedelta,
  isTimezone,
  isTuple,
  isUuid,
} from "./internal/guards.js"

/**
 * A tag and the predicate that selects it.
 *
 * @since 0.1.0
 * @category Models
 */
export interface IdentificationRow {
  readonly tag: TypeTag
  readonly test: (value: unknown) => boolean
}

const feasible = <A>(coerce: (value: unknown) => Option.Option<A>) => (value: unknown): boolean =>
  Option.isSome(coerce(value))

/**
 * Feasibility predicates. A string qualifies when the matching `strToX`
 * parses it; any other value when it already is an `X` or converts to one
 * without loss.
 *
 * @since 0.1.0
 * @category Feasibility
 */
export const couldBeBool: (value: unknown) => boolean = feasible(coerceBool)
export const couldBeBytes: (value: unknown) => boolean = feasible(coerceBytes)
export const couldBeComplex: (value: unknown) => boolean = feasible(coerceComplex)
export const couldBeCounter: (value: unknown) => boolean = feasible(coerceCounter)
export const couldBeDate: (value: unknown) => boolean = feasible(coerceDate)
export const couldBeDatetime: (value: unknown) => boolean = feasible(coerceDatetime)
export const couldBeDecimal: (value: unknown) => boolean = feasible(coerceDecimal)
export const couldBeDefaultdict: (value: unknown) => boolean = feasible(coerceDefaultdict)
export const couldBeDeque: (value: unknown) => boolean = feasible(coerceDeque)
export const couldBeDict: (value: unknown) => boolean = feasible(coerceDict)
export const couldBeFloat: (value: unknown) => boolean = feasible(coerceFloat)
export const couldBeFraction: (value: unknown) => boolean = feasible(coerceFraction)
export const couldBeFrozendict: (value: unknown) => boolean = feasible(coerceFrozendict)
export const couldBeFrozenset: (value: unknown) => boolean = feasible(coerceFrozenset)
export const couldBeInt: (value: unknown) => boolean = feasible(coerceInt)
export const couldBeList: (value: unknown) => boolean = feasible(coerceList)
export const couldBePath: (value: unknown) => boolean = feasible(coercePath)
export const couldBeSet: (value: unknown) => boolean = feasible(coerceSet)
export const couldBeTime: (value: unknown) => boolean = feasible(coerceTime)
export const couldBeTimedelta: (value: unknown) => boolean = feasible(coerceTimedelta)
export const couldBeTimezone: (value: unknown) => boolean = feasible(coerceTimezone)
export const couldBeTuple: (value: unknown) => boolean = feasible(coerceTuple)
export const couldBeUuid: (value: unknown) => boolean = feasible(coerceUuid)

/**
 * Priority order of `identifyInStr`. Numeric-looking text resolves to
 * `complex` before `float` or `int`, and `"0"`/`"1"` resolve to `bool`.
 *
 * @since 0.1.0
 * @category Dispatch
 */
export const IdentificationChain: ReadonlyArray<IdentificationRow> = [
  { tag: "bool", test: couldBeBool },
  { tag: "complex", test: couldBeComplex },
  { tag: "dict", test: couldBeDict },
  { tag: "float", test: couldBeFloat },
  { tag: "int", test: couldBeInt },
  { tag: "list", test: couldBeList },
  { tag: "set", test: couldBeSet },
  { tag: "tuple", test: couldBeTuple },
  { tag: "date", test: couldBeDate },
  { tag: "datetime", test: couldBeDatetime },
  { tag: "time", test: couldBeTime },
  { tag: "timedelta", test: couldBeTimedelta },
  { tag: "timezone", test: couldBeTimezone },
  { tag: "uuid", test: couldBeUuid },
  { tag: "path", test: couldBePath },
  { tag: "bytes", test: couldBeBytes },
]

/**
 * Priority order of `identifyNumericType`.
 *
 * @since 0.1.0
 * @category Dispatch
 */
export const NumericChain: ReadonlyArray<IdentificationRow> = [
  { tag: "int", test: couldBeInt },
  { tag: "float", test: couldBeFloat },
  { tag: "complex", test: couldBeComplex },
  { tag: "decimal", test: couldBeDecimal },
]

/**
 * Exact-type predicates by tag. They are mutually exclusive, so the order
 * only affects speed.
 *
 * @since 0.1.0
 * @category Dispatch
 */
export const ClassificationChain: ReadonlyArray<IdentificationRow> = [
  { tag: "none", test: isNone },
  { tag: "bool", test: isBool },
  { tag: "int", test: isInt },
  { tag: "float", test: isFloat },
  { tag: "str", test: isStr },
  { tag: "list", test: isList },
  { tag: "dict", test: isDict },
  { tag: "complex", test: isComplex },
  { tag: "decimal", test: isDecimal },
  { tag: "fraction", test: isFraction },
  { tag: "bytes", test: isBytes },
  { tag: "date", test: isDate },
  { tag: "datetime", test: isDatetime },
  { tag: "time", test: isTime },
  { tag: "timedelta", test: isTimedelta },
  { tag: "timezone", test: isTimezone },
  { tag: "uuid", test: isUuid },
  { tag: "path", test: isPath },
  { tag: "tuple", test: isTuple },
  { tag: "set", test: isSet },
  { tag: "frozenset", test: isFrozenset },
  { tag: "frozendict", test: isFrozendict },
  { tag: "counter", test: isCounter },
  { tag: "defaultdict", test: isDefaultdict },
  { tag: "deque", test: isDeque },
]

const firstMatch = (chain: ReadonlyArray<IdentificationRow>, value: unknown): Option.Option<TypeTag> =>
  Option.map(Option.fromNullable(chain.find((row) => row.test(value))), (row) => row.tag)

/**
 * Name of the exact runtime type: `typeof` for primitives, the class name
 * for objects, `"Object"` for plain objects.
 *
 * @since 0.1.0
 * @category Identification
 */
export const identify = (value: unknown): string => {
  if (value === null) {
    return "null"
  }
  if (typeof value !== "object") {
    return typeof value
  }
  if (HashMap.isHashMap(value)) {
    return "HashMap"
  }
  if (HashSet.isHashSet(value)) {
    return "HashSet"
  }
  if (BigDecimal.isBigDecimal(value)) {
    return "BigDecimal"
  }
  const prototype: unknown = Object.getPrototypeOf(value)
  if (prototype === null || prototype === Object.prototype) {
    return "Object"
  }
  const constructor: unknown = typeof prototype === "object" ? Reflect.get(prototype, "constructor") : undefined
  return typeof constructor === "function" && constructor.name !== "" ? constructor.name : "Object"
}

/**
 * First tag of `IdentificationChain` whose predicate accepts the string.
 *
 * @since 0.1.0
 * @category Identification
 * @example
 * ```ts
 * identifyInStr("123")        // Option.some("complex")
 * identifyInStr("2024-01-31") // Option.some("date")
 * identifyInStr("hello")      // Option.none()
 * ```
 */
export const identifyInStr = (value: string): Option.Option<TypeTag> => firstMatch(IdentificationChain, value)

/**
 * @since 0.1.0
 * @category Identification
 */
export const identifyNumericType = (value: unknown): Option.Option<TypeTag> => firstMatch(NumericChain, value)

/**
 * Exact tag of a value; none for values outside the modelled universe.
 *
 * @since 0.1.0
 * @category Identification
 */
export const classify = (value: unknown): Option.Option<TypeTag> => firstMatch(ClassificationChain, value)

/**
 * Like `classify`, failing with `IdentificationError` instead of returning none.
 *
 * @since 0.1.0
 * @category Identification
 */
export const identifyOrFail = (value: unknown): Effect.Effect<TypeTag, IdentificationError> =>
  Option.match(classify(value), {
    onNone: () => Effect.fail(new IdentificationError({ value, reason: `unsupported type ${identify(value)}` })),
    onSome: Effect.succeed,
  })
