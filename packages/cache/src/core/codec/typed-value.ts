import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import type { CacheValue, TypedValue } from "../../ports/cache-value"
import { UnsupportedValueTypeError } from "../errors/cache-error"

// optional sign, digits with an optional fraction (or a bare fraction), optional exponent
const NUMERIC_TEXT = /^[+-]?(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:[eE]([+-]?\d+))?$/

/** Precision and magnitude limits of a store number. */
export const NUMBER_LIMITS = {
  maxSignificantDigits: 38,
  minExponent: -130,
  maxExponent: 125,
} as const

export type NumberProblem = "not_a_number" | "too_precise" | "out_of_range"

/**
 * Why the store would refuse `text` as a number, or `undefined` when it would
 * take it: at most 38 significant digits, magnitude zero or between 1e-130
 * and 9.99…e125.
 */
export function numberProblem(text: string): NumberProblem | undefined {
  const match = NUMERIC_TEXT.exec(text)
  if (!match) return "not_a_number"

  const whole = match[1] ?? ""
  const digits = `${whole}${match[2] ?? match[3] ?? ""}`
  const exponent = Number(match[4] ?? "0")

  const leading = digits.length - digits.replace(/^0+/, "").length
  const significant = digits.slice(leading).replace(/0+$/, "")

  // zero, however it is written
  if (significant === "") return undefined
  if (significant.length > NUMBER_LIMITS.maxSignificantDigits) return "too_precise"

  const magnitude = whole.length - 1 - leading + exponent
  if (magnitude < NUMBER_LIMITS.minExponent || magnitude > NUMBER_LIMITS.maxExponent) {
    return "out_of_range"
  }

  return undefined
}

/**
 * Text that reads as a number the store can hold. Other text, numeric-looking
 * or not, is kept as a string.
 */
export function isNumericText(value: string): boolean {
  return numberProblem(value) === undefined
}

/**
 * Encode a plain value into its tagged form.
 *
 * @remarks
 * Numeric-looking text is stored as a number so that `increment` can operate
 * on it in the store. Reading it back yields a number.
 *
 * @throws UnsupportedValueTypeError for anything outside {@link CacheValue}.
 */
export function encodeValue(value: unknown): TypedValue {
  if (value === null) return { NULL: true }

  switch (typeof value) {
    case "boolean":
      return { BOOL: value }
    case "number":
      if (!Number.isFinite(value)) throw UnsupportedValueTypeError.forValue(value)
      return { N: String(value) }
    case "string":
      return isNumericText(value) ? { N: value } : { S: value }
    default:
      if (value instanceof Uint8Array) return { B: value }
      throw UnsupportedValueTypeError.forValue(value)
  }
}

/**
 * Decode a stored attribute back into a plain value.
 *
 * @throws UnsupportedValueTypeError for list, map and set attributes.
 */
export function decodeValue(attr: AttributeValue): CacheValue {
  if (attr.S !== undefined) return attr.S
  if (attr.N !== undefined) return decodeNumber(attr.N)
  if (attr.B !== undefined) return attr.B
  if (attr.BOOL !== undefined) return attr.BOOL
  if (attr.NULL !== undefined) return null

  throw UnsupportedValueTypeError.forTag(Object.keys(attr)[0] ?? "unknown")
}

/**
 * Numbers whose text is not the canonical rendering of a double (e.g. `"007"`,
 * or integers past 2^53) come back as their text so no digits are lost.
 */
export function decodeNumber(text: string): number | string {
  const value = Number(text)

  return Number.isFinite(value) && String(value) === text ? value : text
}
