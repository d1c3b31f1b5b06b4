import { BigDecimal, HashMap, HashSet } from "effect"
import {
  Complex,
  Counter,
  DefaultMap,
  Deque,
  Fraction,
  FsPath,
  PlainDate,
  PlainDateTime,
  PlainTime,
  TimeDelta,
  TimezoneOffset,
  Tuple,
  Uuid,
} from "../Values.js"

/**
 * Exact-type membership tests. A subclass or look-alike never passes the
 * check of a sibling type: a `Counter` is not a dict, a `PlainDateTime` is
 * not a `PlainDate`, a boolean is not an int.
 */

export type Dict = { readonly [key: string]: unknown }

export const isNone = (value: unknown): value is null | undefined => value === null || value === undefined

export const isBool = (value: unknown): value is boolean => typeof value === "boolean"

export const isInt = (value: unknown): value is number | bigint =>
  typeof value === "bigint" || (typeof value === "number" && Number.isInteger(value))

export const isFloat = (value: unknown): value is number => typeof value === "number" && !Number.isInteger(value)

export const isStr = (value: unknown): value is string => typeof value === "string"

export const isComplex = (value: unknown): value is Complex => value instanceof Complex

export const isDecimal = (value: unknown): value is BigDecimal.BigDecimal => BigDecimal.isBigDecimal(value)

export const isFraction = (value: unknown): value is Fraction => value instanceof Fraction

export const isBytes = (value: unknown): value is Uint8Array => value instanceof Uint8Array

export const isDate = (value: unknown): value is PlainDate => value instanceof PlainDate

export const isDatetime = (value: unknown): value is PlainDateTime => value instanceof PlainDateTime

export const isTime = (value: unknown): value is PlainTime => value instanceof PlainTime

export const isTimedelta = (value: unknown): value is TimeDelta => value instanceof TimeDelta

export const isTimezone = (value: unknown): value is TimezoneOffset => value instanceof TimezoneOffset

export const isUuid = (value: unknown): value is Uuid => value instanceof Uuid

export const isPath = (value: unknown): value is FsPath => value instanceof FsPath

export const isList = (value: unknown): value is ReadonlyArray<unknown> => Array.isArray(value)

export const isTuple = (value: unknown): value is Tuple => value instanceof Tuple

export const isDict = (value: unknown): value is Dict => {
  if (typeof value !== "object" || value === null) {
    return false
  }
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

export const isSet = (value: unknown): value is ReadonlySet<unknown> =>
  value instanceof Set && Object.getPrototypeOf(value) === Set.prototype

export const isFrozenset = (value: unknown): value is HashSet.HashSet<unknown> => HashSet.isHashSet(value)

export const isFrozendict = (value: unknown): value is HashMap.HashMap<unknown, unknown> => HashMap.isHashMap(value)

export const isCounter = (value: unknown): value is Counter<unknown> => value instanceof Counter

export const isDefaultdict = (value: unknown): value is DefaultMap<unknown, unknown> => value instanceof DefaultMap

export const isDeque = (value: unknown): value is Deque<unknown> => value instanceof Deque

/** Scalars JSON carries natively: booleans and numbers. */
export const isPrimitiveType = (value: unknown): value is boolean | number | bigint =>
  isBool(value) || isInt(value) || isFloat(value)

export const isInstance = (
  value: unknown,
  ...constructors: ReadonlyArray<abstract new(...args: never) => unknown>
): boolean => constructors.some((constructor) => value instanceof constructor)

/**
 * Elements of anything iterable the toolkit models; mappings yield their keys.
 */
export const iterableItems = (value: unknown): ReadonlyArray<unknown> | undefined => {
  if (isList(value)) {
    return value
  }
  if (isDict(value)) {
    return Object.keys(value)
  }
  if (value instanceof Map) {
    return [...value.keys()]
  }
  if (isTuple(value) || isSet(value) || isDeque(value) || isFrozenset(value)) {
    return [...value]
  }
  if (isFrozendict(value)) {
    return [...HashMap.keys(value)]
  }
  return undefined
}

/**
 * Key/value pairs of the mapping types: plain objects, maps and `HashMap`.
 */
export const mappingEntries = (value: unknown): ReadonlyArray<readonly [unknown, unknown]> | undefined => {
  if (isDict(value)) {
    return Object.entries(value)
  }
  if (value instanceof Map) {
    return [...value.entries()]
  }
  if (isFrozendict(value)) {
    return [...value]
  }
  return undefined
}
