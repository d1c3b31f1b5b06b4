import { BigDecimal, HashSet } from "effect"
import { isDict, isFrozendict, isFrozenset, isSet } from "./guards.js"
import { formatFloat, formatScaledDecimal } from "./numbers.js"
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
  TypeNames,
  Uuid,
} from "../Values.js"

/**
 * Human-readable rendering of values: `True`, `None`, `inf`, `[1, 2]`,
 * `{'a': 1}`, and the canonical strings of the value classes.
 */

export const formatDecimal = (value: BigDecimal.BigDecimal): string =>
  formatScaledDecimal({ digits: value.value, scale: value.scale })

export const formatInt = (value: number | bigint): string =>
  typeof value === "bigint" ? value.toString() : BigInt(value).toString()

export const formatNumber = (value: number): string =>
  Number.isInteger(value) && !Object.is(value, -0) ? formatInt(value) : formatFloat(value)

const hexByte = (byte: number): string => `\\x${byte.toString(16).padStart(2, "0")}`

/**
 * `b'...'` literal; printable ASCII is kept, everything else escaped.
 */
export const encodeBytesLiteral = (bytes: Uint8Array): string => {
  const hasSingle = bytes.includes(0x27)
  const quote = hasSingle && !bytes.includes(0x22) ? "\"" : "'"
  let body = ""
  for (const byte of bytes) {
    if (byte === 0x5c) body += "\\\\"
    else if (byte === 0x27 && quote === "'") body += "\\'"
    else if (byte === 0x09) body += "\\t"
    else if (byte === 0x0a) body += "\\n"
    else if (byte === 0x0d) body += "\\r"
    else if (byte < 0x20 || byte >= 0x7f) body += hexByte(byte)
    else body += String.fromCharCode(byte)
  }
  return `b${quote}${body}${quote}`
}

const SIMPLE_ESCAPES: { readonly [escape: string]: number } = {
  "\\": 0x5c,
  "'": 0x27,
  "\"": 0x22,
  "a": 0x07,
  "b": 0x08,
  "f": 0x0c,
  "n": 0x0a,
  "r": 0x0d,
  "t": 0x09,
  "v": 0x0b,
}

const BYTES_LITERAL = /^[bB](['"])([\s\S]*)\1$/

/**
 * Inverse of `encodeBytesLiteral`. Also accepts octal escapes; unknown
 * escapes keep their backslash.
 */
export const decodeBytesLiteral = (text: string): Uint8Array | undefined => {
  const match = BYTES_LITERAL.exec(text.trim())
  if (!match) {
    return undefined
  }
  const quote = match[1] ?? "'"
  const body = match[2] ?? ""
  const bytes: Array<number> = []
  let index = 0
  while (index < body.length) {
    const char = body.charAt(index)
    const code = body.charCodeAt(index)
    if (code > 0x7f || char === quote) {
      return undefined
    }
    if (char !== "\\") {
      bytes.push(code)
      index += 1
      continue
    }
    const next = body.charAt(index + 1)
    if (next === "") {
      return undefined
    }
    const simple = SIMPLE_ESCAPES[next]
    if (simple !== undefined) {
      bytes.push(simple)
      index += 2
      continue
    }
    if (next === "x") {
      const hex = body.slice(index + 2, index + 4)
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
        return undefined
      }
      bytes.push(Number.parseInt(hex, 16))
      index += 4
      continue
    }
    const octal = /^[0-7]{1,3}/.exec(body.slice(index + 1))
    if (octal) {
      bytes.push(Number.parseInt(octal[0], 8) & 0xff)
      index += 1 + octal[0].length
      continue
    }
    bytes.push(0x5c)
    index += 1
  }
  return Uint8Array.from(bytes)
}

const quoteString = (text: string): string => {
  const quote = text.includes("'") && !text.includes("\"") ? "\"" : "'"
  let body = ""
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0
    if (char === "\\") body += "\\\\"
    else if (char === quote) body += `\\${quote}`
    else if (char === "\n") body += "\\n"
    else if (char === "\r") body += "\\r"
    else if (char === "\t") body += "\\t"
    else if (code < 0x20 || code === 0x7f) body += hexByte(code)
    else body += char
  }
  return `${quote}${body}${quote}`
}

/**
 * Canonical string of a value class instance, `undefined` for anything else.
 */
export const canonical = (value: unknown): string | undefined => {
  if (
    value instanceof Complex || value instanceof Fraction || value instanceof PlainDate
    || value instanceof PlainDateTime || value instanceof PlainTime || value instanceof TimeDelta
    || value instanceof TimezoneOffset || value instanceof Uuid || value instanceof FsPath
  ) {
    return value.toString()
  }
  if (BigDecimal.isBigDecimal(value)) {
    return formatDecimal(value)
  }
  if (value instanceof Uint8Array) {
    return encodeBytesLiteral(value)
  }
  return undefined
}

const classRepr = (value: unknown): string | undefined => {
  if (value instanceof Complex || value instanceof Uint8Array) {
    return canonical(value)
  }
  if (value instanceof Fraction) {
    return `Fraction(${value.numerator}, ${value.denominator})`
  }
  const text = canonical(value)
  if (text === undefined) {
    return undefined
  }
  const name = BigDecimal.isBigDecimal(value)
    ? TypeNames.decimal
    : value instanceof PlainDateTime
    ? TypeNames.datetime
    : value instanceof PlainDate
    ? TypeNames.date
    : value instanceof PlainTime
    ? TypeNames.time
    : value instanceof TimeDelta
    ? TypeNames.timedelta
    : value instanceof TimezoneOffset
    ? TypeNames.timezone
    : value instanceof Uuid
    ? TypeNames.uuid
    : TypeNames.path
  return `${name}(${quoteString(text)})`
}

const joinEntries = (
  entries: Iterable<readonly [unknown, unknown]>,
  seen: ReadonlySet<unknown>,
): string => Array.from(entries, ([key, item]) => `${repr(key, seen)}: ${repr(item, seen)}`).join(", ")

const joinItems = (items: Iterable<unknown>, seen: ReadonlySet<unknown>): string =>
  Array.from(items, (item) => repr(item, seen)).join(", ")

const containerRepr = (value: object, seen: ReadonlySet<unknown>): string | undefined => {
  if (Array.isArray(value)) {
    return `[${joinItems(value, seen)}]`
  }
  if (value instanceof Tuple) {
    return value.length === 1 ? `(${repr(value.items[0], seen)},)` : `(${joinItems(value, seen)})`
  }
  if (value instanceof Counter) {
    return value.size === 0 ? "Counter()" : `Counter({${joinEntries(value, seen)}})`
  }
  if (value instanceof DefaultMap) {
    const factory = value.factory === undefined ? "None" : value.factory.name || "<factory>"
    return `defaultdict(${factory}, {${joinEntries(value, seen)}})`
  }
  if (value instanceof Deque) {
    const items = `[${joinItems(value, seen)}]`
    return value.maxlen === undefined ? `deque(${items})` : `deque(${items}, maxlen=${value.maxlen})`
  }
  if (value instanceof Map) {
    return `{${joinEntries(value, seen)}}`
  }
  if (isSet(value)) {
    return value.size === 0 ? "set()" : `{${joinItems(value, seen)}}`
  }
  if (isFrozenset(value)) {
    return HashSet.size(value) === 0 ? "frozenset()" : `frozenset({${joinItems(value, seen)}})`
  }
  if (isFrozendict(value)) {
    return `frozendict({${joinEntries(value, seen)}})`
  }
  if (isDict(value)) {
    return `{${joinEntries(Object.entries(value), seen)}}`
  }
  return undefined
}

/**
 * Developer-facing rendering; strings are quoted.
 */
export const repr = (value: unknown, seen: ReadonlySet<unknown> = new Set()): string => {
  switch (typeof value) {
    case "undefined":
      return "None"
    case "boolean":
      return value ? "True" : "False"
    case "number":
      return formatNumber(value)
    case "bigint":
      return value.toString()
    case "string":
      return quoteString(value)
    case "symbol":
      return value.toString()
    case "function":
      return `<function ${value.name || "anonymous"}>`
    case "object":
      break
  }
  if (value === null) {
    return "None"
  }
  const known = classRepr(value)
  if (known !== undefined) {
    return known
  }
  if (seen.has(value)) {
    return Array.isArray(value) ? "[...]" : "{...}"
  }
  const container = containerRepr(value, new Set([...seen, value]))
  if (container !== undefined) {
    return container
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
  }
  return String(value)
}

/**
 * User-facing rendering: strings and value classes render as themselves,
 * containers as their `repr`.
 */
export const display = (value: unknown): string => {
  if (typeof value === "string") {
    return value
  }
  return canonical(value) ?? repr(value)
}

export type Json =
  | null
  | boolean
  | number
  | bigint
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

const JSON_ESCAPES: { readonly [char: string]: string } = {
  "\\": "\\\\",
  "\"": "\\\"",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\b": "\\b",
  "\f": "\\f",
}

/**
 * JSON string literal with every character outside printable ASCII escaped.
 */
export const quoteJson = (text: string): string =>
  `"${
    text.replace(
      /[\\"]|[^ -~]/g,
      (char) => JSON_ESCAPES[char] ?? `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
    )
  }"`

const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

/**
 * JSON text with `", "` and `": "` separators, or one member per line when
 * `indent` is given. Non-finite numbers encode as `null`.
 */
export const dumpJson = (value: Json, indent?: number): string => {
  const render = (node: Json, level: number): string => {
    if (node === null) {
      return "null"
    }
    switch (typeof node) {
      case "boolean":
        return node ? "true" : "false"
      case "bigint":
        return node.toString()
      case "number":
        return Number.isFinite(node) ? formatNumber(node) : "null"
      case "string":
        return quoteJson(node)
    }
    const members = isJsonArray(node)
      ? node.map((item) => render(item, level + 1))
      : Object.entries(node).map(([key, item]) => `${quoteJson(key)}: ${render(item, level + 1)}`)
    const [open, close]: readonly [string, string] = isJsonArray(node) ? ["[", "]"] : ["{", "}"]
    if (members.length === 0) {
      return `${open}${close}`
    }
    if (indent === undefined) {
      return `${open}${members.join(", ")}${close}`
    }
    const inner = `\n${" ".repeat(indent * (level + 1))}`
    const outer = `\n${" ".repeat(indent * level)}`
    return `${open}${inner}${members.join(`,${inner}`)}${outer}${close}`
  }
  return render(value, 0)
}

