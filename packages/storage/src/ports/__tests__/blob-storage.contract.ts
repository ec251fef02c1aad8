import type { BlobStorage } from "../blob-storage"

const text = (value: string) => new TextEncoder().encode(value)

export const describeBlobStorageContractTests = (
  name: string,
  createAdapter: () => { bucket: string; storage: BlobStorage },
) => {
  describe(`BlobStorage contract: ${name}`, () => {
    let storage: BlobStorage
    let bucket: string

    beforeEach(() => {
      const setup = createAdapter()

      storage = setup.storage
      bucket = setup.bucket
    })

    describe("put / get", () => {
      it("stores and retrieves a payload byte-for-byte", async () => {
        const ref = { bucket, key: "cache-table/user:1" }
        const body = new Uint8Array([0, 255, 1, 254, 2])

        await storage.put(ref, body, { contentType: "application/octet-stream" })

        const obj = await storage.get(ref)

        expect(obj).toMatchObject({
          ref,
          sizeInBytes: 5,
          contentType: "application/octet-stream",
        })
        expect(obj?.body).toStrictEqual(body)
      })

      it("returns null for a missing key", async () => {
        await expect(storage.get({ bucket, key: "cache-table/missing" })).resolves.toBeNull()
      })

      it("overwrites an existing object", async () => {
        const ref = { bucket, key: "cache-table/user:2" }

        await storage.put(ref, text("first"))
        await storage.put(ref, text("second"))

        const obj = await storage.get(ref)

        expect(obj?.body).toStrictEqual(text("second"))
      })

      it("rejects writes to a bucket that does not exist", async () => {
        await expect(
          storage.put({ bucket: "no-such-bucket", key: "k" }, text("x")),
        ).rejects.toMatchObject({ name: "NoSuchBucket" })
      })
    })

    describe("delete", () => {
      it("removes a stored object", async () => {
        const ref = { bucket, key: "cache-table/user:3" }
        await storage.put(ref, text("payload"))

        await storage.deleteMany(bucket, [ref.key])

        await expect(storage.get(ref)).resolves.toBeNull()
      })

      it("skips a missing key", async () => {
        await expect(
          storage.deleteMany(bucket, ["cache-table/never-written"]),
        ).resolves.toBeUndefined()
      })

      it("deleteMany removes every listed key and leaves the rest", async () => {
        await storage.put({ bucket, key: "a" }, text("a"))
        await storage.put({ bucket, key: "b" }, text("b"))
        await storage.put({ bucket, key: "c" }, text("c"))

        await storage.deleteMany(bucket, ["a", "c"])

        await expect(storage.get({ bucket, key: "a" })).resolves.toBeNull()
        await expect(storage.get({ bucket, key: "c" })).resolves.toBeNull()
        expect((await storage.get({ bucket, key: "b" }))?.body).toStrictEqual(text("b"))
      })

      it("deleteMany with no keys is a no-op", async () => {
        await expect(storage.deleteMany(bucket, [])).resolves.toBeUndefined()
      })
    })

    describe("bucketExists", () => {
      it("is true for a provisioned bucket", async () => {
        await expect(storage.bucketExists(bucket)).resolves.toBe(true)
      })

      it("is false for an unknown bucket", async () => {
        await expect(storage.bucketExists("no-such-bucket")).resolves.toBe(false)
      })
    })
  })
}
