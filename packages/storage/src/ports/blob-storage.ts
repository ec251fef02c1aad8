import type { BlobBucket, BlobKey, BlobObject, BlobRef, PutBlobOptions } from "./blob-object"

/**
 * BlobStorage holds opaque payloads addressed by bucket and key.
 *
 * @remarks
 * - Writes overwrite any object already stored under the same ref.
 * - Reads of a missing key resolve to `null`; a missing bucket is an error.
 * - Provider errors are surfaced unchanged so callers can classify them.
 */
export interface BlobStorage {
  put(ref: BlobRef, body: Uint8Array, opts?: Partial<PutBlobOptions>): Promise<void>

  get(ref: BlobRef): Promise<BlobObject | null>

  /**
   * Delete objects of one bucket, batching provider calls as needed. Missing
   * keys are skipped; a key the provider refuses to delete is an error.
   */
  deleteMany(bucket: BlobBucket, keys: readonly BlobKey[]): Promise<void>

  bucketExists(bucket: BlobBucket): Promise<boolean>
}
