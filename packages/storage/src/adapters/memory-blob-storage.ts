import { NoSuchBucket } from "@aws-sdk/client-s3"
import type { BlobBucket, BlobKey, BlobObject, BlobRef, PutBlobOptions } from "../ports/blob-object"
import type { BlobStorage } from "../ports/blob-storage"

interface StoredBlob {
  data: Uint8Array
  contentType?: string
}

export interface MemoryBlobStorageOptions {
  /** Buckets that exist up front. Writes to any other bucket fail like S3 does. */
  buckets?: readonly BlobBucket[]
}

export class MemoryBlobStorage implements BlobStorage {
  private readonly buckets = new Map<BlobBucket, Map<BlobKey, StoredBlob>>()

  constructor(options: MemoryBlobStorageOptions = {}) {
    for (const bucket of options.buckets ?? []) {
      this.createBucket(bucket)
    }
  }

  createBucket(bucket: BlobBucket): void {
    if (!this.buckets.has(bucket)) this.buckets.set(bucket, new Map())
  }

  /** Number of objects currently held in `bucket`. */
  size(bucket: BlobBucket): number {
    return this.buckets.get(bucket)?.size ?? 0
  }

  async put(ref: BlobRef, body: Uint8Array, opts?: Partial<PutBlobOptions>): Promise<void> {
    this.requireBucket(ref.bucket).set(ref.key, {
      data: body.slice(),
      ...(opts?.contentType && { contentType: opts.contentType }),
    })
  }

  async get(ref: BlobRef): Promise<BlobObject | null> {
    const stored = this.requireBucket(ref.bucket).get(ref.key)
    if (!stored) return null

    return {
      ref,
      sizeInBytes: stored.data.byteLength,
      body: stored.data.slice(),
      ...(stored.contentType && { contentType: stored.contentType }),
    }
  }

  async deleteMany(bucket: BlobBucket, keys: readonly BlobKey[]): Promise<void> {
    const objects = this.requireBucket(bucket)

    for (const key of keys) {
      objects.delete(key)
    }
  }

  async bucketExists(bucket: BlobBucket): Promise<boolean> {
    return this.buckets.has(bucket)
  }

  private requireBucket(bucket: BlobBucket): Map<BlobKey, StoredBlob> {
    const objects = this.buckets.get(bucket)
    if (objects) return objects

    throw new NoSuchBucket({
      $metadata: { httpStatusCode: 404 },
      message: `The specified bucket does not exist: ${bucket}`,
    })
  }
}
