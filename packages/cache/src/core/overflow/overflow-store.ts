import type { Logger } from "@tablecache/logger"
import type { BlobRef, BlobStorage } from "@tablecache/storage"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheValue } from "../../ports/cache-value"
import { guard } from "../errors/translate"

export type OverflowStoreDeps = {
  blobs: BlobStorage
  logger: Logger
}

export type OverflowStoreOptions = {
  tableName: string
  bucket: string
}

const OCTET_STREAM = "application/octet-stream"
const TEXT_PLAIN = "text/plain; charset=utf-8"

// a leading U+FEFF is part of the value, not a marker to strip
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Out-of-line storage for values too large for a table item. Payloads live
 * under `{table}/{key}` in the configured bucket.
 */
export class OverflowStore {
  constructor(
    private readonly deps: OverflowStoreDeps,
    readonly options: OverflowStoreOptions,
  ) {}

  get bucket(): string {
    return this.options.bucket
  }

  refFor(key: string): BlobRef {
    return { bucket: this.options.bucket, key: `${this.options.tableName}/${key}` }
  }

  async spill(key: string, value: CacheValue, operation: string): Promise<BlobRef> {
    const ref = this.refFor(key)
    const body = toPayload(value)

    await guard(
      () =>
        this.deps.blobs.put(ref, body, {
          contentType: value instanceof Uint8Array ? OCTET_STREAM : TEXT_PLAIN,
        }),
      { source: "blob", operation, context: { bucket: ref.bucket, key } },
    )

    return ref
  }

  /**
   * Fetch the payload a reference record points at. A dangling reference is a miss.
   */
  async resolve(ref: BlobRef, operation: string): Promise<CacheResult<CacheValue>> {
    const blob = await guard(() => this.deps.blobs.get(ref), {
      source: "blob",
      operation,
      context: { bucket: ref.bucket, blobKey: ref.key },
    })

    if (!blob) {
      this.deps.logger.warn("reference record points at a missing blob", {
        operation,
        bucket: ref.bucket,
        blobKey: ref.key,
      })
      return { kind: "miss" }
    }

    return { kind: "hit", value: decodePayload(blob.body, blob.contentType) }
  }

  /**
   * Delete blobs whose primary records are already gone. Failures are logged,
   * not thrown: the primary record cannot be restored at this point.
   */
  async release(refs: readonly BlobRef[], operation: string): Promise<void> {
    const byBucket = new Map<string, string[]>()
    for (const ref of refs) {
      byBucket.set(ref.bucket, [...(byBucket.get(ref.bucket) ?? []), ref.key])
    }

    for (const [bucket, keys] of byBucket) {
      try {
        await this.deps.blobs.deleteMany(bucket, keys)
      } catch (err) {
        this.deps.logger.warn("leaked overflow blobs after primary delete", {
          operation,
          bucket,
          blobKeys: keys,
          err,
        })
      }
    }
  }
}

function toPayload(value: CacheValue): Uint8Array {
  if (value instanceof Uint8Array) return value

  return new TextEncoder().encode(typeof value === "string" ? value : String(value))
}

/**
 * Bytes for payloads stored as bytes. Anything else is UTF-8 text when it
 * decodes cleanly, raw bytes otherwise.
 */
export function decodePayload(body: Uint8Array, contentType?: string): string | Uint8Array {
  if (contentType === OCTET_STREAM) return body

  try {
    return utf8.decode(body)
  } catch {
    return body
  }
}
