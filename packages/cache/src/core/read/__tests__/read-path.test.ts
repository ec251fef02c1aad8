import { MemoryTableClient } from "../../../adapters/memory/memory-table-client"
import { TableNotFoundError } from "../../errors/cache-error"
import { DEFAULT_COLUMNS, ItemSchema } from "../../schema/cache-item"
import { ReadPath } from "../read-path"

const NOW = 1_700_000_000

describe("ReadPath", () => {
  const schema = new ItemSchema(DEFAULT_COLUMNS)
  let client: MemoryTableClient
  let reads: ReadPath

  beforeEach(async () => {
    client = new MemoryTableClient({ tables: [{ name: "cache", keyColumn: "cache_key" }] })
    reads = new ReadPath({ client, schema }, { tableName: "cache" })

    await client.putItem({ TableName: "cache", Item: schema.build("forever", { S: "a" }) })
    await client.putItem({ TableName: "cache", Item: schema.build("live", { N: "1" }, NOW + 1) })
    await client.putItem({ TableName: "cache", Item: schema.build("stale", { S: "c" }, NOW) })
  })

  it("returns live records", async () => {
    expect(await reads.fetchLive("forever", NOW, "get")).toStrictEqual({
      key: "forever",
      value: { S: "a" },
    })
    expect(await reads.fetchLive("live", NOW, "get")).toStrictEqual({
      key: "live",
      value: { N: "1" },
      expiresAt: NOW + 1,
    })
  })

  it("hides records whose expiry has passed", async () => {
    expect(await reads.fetchLive("stale", NOW, "get")).toBeUndefined()
    expect(await reads.fetchLive("live", NOW + 1, "get")).toBeUndefined()
  })

  it("returns nothing for absent keys", async () => {
    expect(await reads.fetchLive("absent", NOW, "get")).toBeUndefined()
  })

  it("issues a single-item query filtered on the ttl column", async () => {
    const query = vi.spyOn(client, "query")

    await reads.fetchLive("live", NOW, "get")

    expect(query).toHaveBeenCalledWith({
      TableName: "cache",
      KeyConditionExpression: "#pk = :key",
      FilterExpression: "attribute_not_exists(#ttl) OR #ttl > :now",
      ExpressionAttributeNames: { "#pk": "cache_key", "#ttl": "ttl" },
      ExpressionAttributeValues: { ":key": { S: "live" }, ":now": { N: "1700000000" } },
      Limit: 1,
    })
  })

  describe("fetchExpiry", () => {
    it("reads the key and expiry of live records only", async () => {
      expect(await reads.fetchExpiry("forever", NOW, "exists")).toStrictEqual({ key: "forever" })
      expect(await reads.fetchExpiry("live", NOW, "ttl")).toStrictEqual({
        key: "live",
        expiresAt: NOW + 1,
      })
      expect(await reads.fetchExpiry("stale", NOW, "ttl")).toBeUndefined()
      expect(await reads.fetchExpiry("absent", NOW, "exists")).toBeUndefined()
    })

    it("issues a projected point read", async () => {
      const getItem = vi.spyOn(client, "getItem")

      await reads.fetchExpiry("live", NOW, "ttl")

      expect(getItem).toHaveBeenCalledWith({
        TableName: "cache",
        Key: { cache_key: { S: "live" } },
        ProjectionExpression: "#pk, #ttl",
        ExpressionAttributeNames: { "#pk": "cache_key", "#ttl": "ttl" },
      })
    })
  })

  it("translates store errors with the key in context", async () => {
    const missing = new ReadPath({ client, schema }, { tableName: "gone" })

    await expect(missing.fetchLive("k", NOW, "get")).rejects.toSatisfy(
      (err) =>
        err instanceof TableNotFoundError &&
        err.context.table === "gone" &&
        err.context.key === "k" &&
        err.context.operation === "get",
    )
  })
})
