import { z } from "zod/mini"
import { createMemoryTableCache } from "../../adapters/create"
import { KEY_NOT_FOUND } from "../../ports/cache-options"
import { T0 } from "../../tests/utils/cache-test-helpers"
import { SerializedCache } from "../serialized-cache"
import { JsonSerializer, StringSerializer } from "../serializers"
import { FakeClock } from "../time/clock"

const Session = z.object({ user: z.string(), roles: z.array(z.string()) })
type Session = z.infer<typeof Session>

describe("SerializedCache", () => {
  function setup() {
    const clock = new FakeClock(T0)
    const { cache } = createMemoryTableCache({ namespace: "sess:" }, { clock })
    const sessions = new SerializedCache(cache, new JsonSerializer<Session>(Session))

    return { clock, cache, sessions }
  }

  it("round-trips structured values", async () => {
    const { sessions } = setup()
    const session = { user: "ada", roles: ["admin"] }

    await sessions.set("s1", session)

    expect(await sessions.get("s1")).toStrictEqual({ kind: "hit", value: session })
    expect(await sessions.get("s2")).toStrictEqual({ kind: "miss" })
  })

  it("stores JSON text underneath", async () => {
    const { cache, sessions } = setup()

    await sessions.set("s1", { user: "ada", roles: [] })

    expect(await cache.get("s1")).toStrictEqual({
      kind: "hit",
      value: '{"user":"ada","roles":[]}',
    })
  })

  it("decodes batches and keeps misses", async () => {
    const { sessions } = setup()

    await sessions.multiSet([
      ["a", { user: "a", roles: [] }],
      ["b", { user: "b", roles: ["x"] }],
    ])
    const res = await sessions.multiGet(["b", "missing", "a"])

    expect([...res.entries()]).toStrictEqual([
      ["b", { kind: "hit", value: { user: "b", roles: ["x"] } }],
      ["missing", { kind: "miss" }],
      ["a", { kind: "hit", value: { user: "a", roles: [] } }],
    ])
  })

  it("delegates the value-independent operations", async () => {
    const { clock, sessions } = setup()

    await sessions.add("s1", { user: "ada", roles: [] }, { ttl: { kind: "seconds", seconds: 30 } })

    expect(await sessions.exists("s1")).toBe(true)
    expect(await sessions.ttl("s1")).toBe(30)
    expect(await sessions.expire("s1", { kind: "seconds", seconds: 5 })).toBe(true)

    clock.advance(5000)

    expect(await sessions.ttl("s1")).toBe(KEY_NOT_FOUND)
    expect(await sessions.delete("s1")).toBe(false)
    expect(await sessions.clear()).toBe(0)
  })

  it("keeps numeric-looking text as text with the string serializer", async () => {
    const { cache } = setup()
    const names = new SerializedCache(cache, StringSerializer)

    await names.set("zip", "02134")
    await names.multiSet([["count", "12"]])

    expect(await names.get("zip")).toStrictEqual({ kind: "hit", value: "02134" })
    expect(await names.get("count")).toStrictEqual({ kind: "hit", value: "12" })
    expect(await names.increment("count", 3)).toBe(15)
    expect(await names.get("count")).toStrictEqual({ kind: "hit", value: "15" })

    await names.multiDelete(["zip", "count"])
    expect(await names.exists("zip")).toBe(false)

    await names.close()
  })
})
