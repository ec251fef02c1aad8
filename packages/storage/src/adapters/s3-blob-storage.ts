import {
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  type S3Client,
} from "@aws-sdk/client-s3"
import type { BlobBucket, BlobKey, BlobObject, BlobRef, PutBlobOptions } from "../ports/blob-object"
import type { BlobStorage } from "../ports/blob-storage"

const S3_MAX_DELETE_BATCH_SIZE = 1000

export interface S3BlobStorageDeps {
  client: S3Client
}

export interface S3BlobStorageOptions {
  keyspacePrefix?: string
}

export type BlobDeleteFailure = {
  key: string
  code: string
}

/**
 * Raised by `deleteMany` after every batch was sent, when S3 refused some keys.
 */
export class BlobDeleteError extends Error {
  constructor(
    readonly bucket: BlobBucket,
    readonly failures: readonly BlobDeleteFailure[],
  ) {
    super(
      `Failed to delete ${failures.length} object(s) from ${bucket}: ${failures
        .map((failure) => `${failure.key} (${failure.code})`)
        .join(", ")}`,
    )
    this.name = "BlobDeleteError"
  }
}

export class S3BlobStorage implements BlobStorage {
  constructor(
    readonly deps: S3BlobStorageDeps,
    readonly options: S3BlobStorageOptions = {},
  ) {}

  async put(ref: BlobRef, body: Uint8Array, opts?: Partial<PutBlobOptions>): Promise<void> {
    await this.deps.client.send(
      new PutObjectCommand({
        Bucket: ref.bucket,
        Key: this.prefixKey(ref.key),
        Body: body,
        ContentLength: body.byteLength,
        ...(opts?.contentType && { ContentType: opts.contentType }),
      }),
    )
  }

  async get(ref: BlobRef): Promise<BlobObject | null> {
    try {
      const response = await this.deps.client.send(
        new GetObjectCommand({
          Bucket: ref.bucket,
          Key: this.prefixKey(ref.key),
        }),
      )

      const body = response.Body ? await response.Body.transformToByteArray() : new Uint8Array()

      return {
        ref,
        sizeInBytes: body.byteLength,
        body,
        ...(response.ContentType && { contentType: response.ContentType }),
      }
    } catch (err) {
      if (this.isMissingObject(err)) return null
      throw err
    }
  }

  async deleteMany(bucket: BlobBucket, keys: readonly BlobKey[]): Promise<void> {
    if (keys.length === 0) return

    const failures: BlobDeleteFailure[] = []

    for (const batch of this.chunk(keys, S3_MAX_DELETE_BATCH_SIZE)) {
      // per-key failures arrive inside a successful response
      const response = await this.deps.client.send(
        new DeleteObjectsCommand({
          Bucket: bucket,
          Delete: {
            Objects: batch.map((key) => ({ Key: this.prefixKey(key) })),
            Quiet: true,
          },
        }),
      )

      for (const error of response.Errors ?? []) {
        failures.push({ key: error.Key ?? "", code: error.Code ?? "Unknown" })
      }
    }

    if (failures.length > 0) throw new BlobDeleteError(bucket, failures)
  }

  async bucketExists(bucket: BlobBucket): Promise<boolean> {
    try {
      await this.deps.client.send(new HeadBucketCommand({ Bucket: bucket }))
      return true
    } catch (err) {
      if (this.isMissingBucket(err)) return false
      throw err
    }
  }

  private prefixKey(key: BlobKey): string {
    if (!this.options.keyspacePrefix) return key

    const normalizedPrefix = this.options.keyspacePrefix.endsWith("/")
      ? this.options.keyspacePrefix
      : `${this.options.keyspacePrefix}/`

    return `${normalizedPrefix}${key}`
  }

  private chunk<T>(array: readonly T[], size: number): T[][] {
    const chunks: T[][] = []
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size))
    }
    return chunks
  }

  private isMissingObject(err: unknown): boolean {
    return err instanceof Error && (err.name === "NoSuchKey" || err.name === "NotFound")
  }

  // HeadBucket carries no body, so the SDK only has the status to go on
  private isMissingBucket(err: unknown): boolean {
    if (!(err instanceof Error)) return false
    if (err.name === "NotFound" || err.name === "NoSuchBucket") return true

    return "$metadata" in err && readStatus(err.$metadata) === 404
  }
}

function readStatus(metadata: unknown): number | undefined {
  if (typeof metadata !== "object" || metadata === null) return undefined
  if (!("httpStatusCode" in metadata)) return undefined

  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined
}
