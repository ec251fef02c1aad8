import { z } from "zod/mini"
import { UnsupportedValueTypeError } from "../errors/cache-error"
import { JsonSerializer, StringSerializer } from "../serializers"

const User = z.object({ id: z.string(), age: z.number() })

describe("StringSerializer", () => {
  it("stores text unchanged", () => {
    expect(StringSerializer.serialize("hello")).toBe("hello")
  })

  it("turns every plain value back into text", () => {
    expect(StringSerializer.deserialize("hello")).toBe("hello")
    expect(StringSerializer.deserialize(123)).toBe("123")
    expect(StringSerializer.deserialize(true)).toBe("true")
    expect(StringSerializer.deserialize(null)).toBe("null")
    expect(StringSerializer.deserialize(new TextEncoder().encode("héllo"))).toBe("héllo")
  })

  it("keeps a leading byte-order mark in bytes", () => {
    expect(StringSerializer.deserialize(new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x69]))).toBe(
      "\uFEFFhi",
    )
  })
})

describe("JsonSerializer", () => {
  const users = new JsonSerializer(User)

  it("serializes to JSON text", () => {
    expect(users.serialize({ id: "u1", age: 3 })).toBe('{"id":"u1","age":3}')
  })

  it("parses and validates JSON text and bytes", () => {
    expect(users.deserialize('{"id":"u1","age":3}')).toStrictEqual({ id: "u1", age: 3 })
    expect(users.deserialize(new TextEncoder().encode('{"id":"u2","age":4}'))).toStrictEqual({
      id: "u2",
      age: 4,
    })
  })

  it("reads JSON bytes that start with a byte-order mark", () => {
    const body = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode('{"id":"u3","age":5}')])

    expect(users.deserialize(body)).toStrictEqual({ id: "u3", age: 5 })
  })

  it("hands already-decoded scalars to the parser", () => {
    const numbers = new JsonSerializer(z.number())
    const flags = new JsonSerializer(z.boolean())
    const nothing = new JsonSerializer(z.null())

    expect(numbers.deserialize(42)).toBe(42)
    expect(flags.deserialize(false)).toBe(false)
    expect(nothing.deserialize(null)).toBeNull()
  })

  it("surfaces invalid JSON and failed validation", () => {
    expect(() => users.deserialize("not json")).toThrow(SyntaxError)
    expect(() => users.deserialize('{"id":1}')).toThrow()
  })

  it("rejects values JSON cannot represent", () => {
    const anything = new JsonSerializer(z.unknown())

    expect(() => anything.serialize(undefined)).toThrow(UnsupportedValueTypeError)
    expect(() => anything.serialize(() => 1)).toThrow("Unsupported value type function")
  })
})
