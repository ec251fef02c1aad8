import type { CacheValue } from "../ports/cache-value"
import type { Serializer } from "../ports/serializer"
import { describeType, UnsupportedValueTypeError } from "./errors/cache-error"

// text keeps a leading U+FEFF; JSON.parse would reject one, so JSON drops it
const utf8 = new TextDecoder("utf-8", { ignoreBOM: true })
const jsonText = new TextDecoder("utf-8")

/**
 * Anything with a zod-style `parse`. Validates decoded JSON into `T`.
 */
export type ValueParser<T> = {
  parse(value: unknown): T
}

/**
 * Stores text as is. Numeric text reads back as a number, so `deserialize`
 * turns every plain value back into a string.
 */
export const StringSerializer: Serializer<string> = {
  serialize(value) {
    return value
  },

  deserialize(value) {
    if (value instanceof Uint8Array) return utf8.decode(value)
    if (value === null) return "null"

    return String(value)
  },
}

/**
 * JSON text, validated on the way back in.
 *
 * @example
 * ```ts
 * const users = new SerializedCache(cache, new JsonSerializer(UserSchema))
 * ```
 */
export class JsonSerializer<T> implements Serializer<T> {
  constructor(private readonly parser: ValueParser<T>) {}

  serialize(value: T): CacheValue {
    const text = JSON.stringify(value)
    if (text === undefined) throw UnsupportedValueTypeError.forValue(value)

    return text
  }

  deserialize(value: CacheValue): T {
    // numbers, booleans and null come back already decoded by the store codec
    if (typeof value === "string") return this.parser.parse(JSON.parse(value))
    if (value instanceof Uint8Array) return this.parser.parse(JSON.parse(jsonText.decode(value)))

    if (value === null || typeof value === "number" || typeof value === "boolean") {
      return this.parser.parse(value)
    }

    throw new UnsupportedValueTypeError(`Cannot read ${describeType(value)} as JSON`)
  }
}
