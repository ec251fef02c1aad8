export type Bytes = number

/**
 * Unique identifier for an object within a bucket, e.g. `"cache-table/user:1"`.
 */
export type BlobKey = string

/**
 * Name of a storage bucket.
 * Must conform to provider naming rules (e.g., lowercase, no underscores for S3).
 */
export type BlobBucket = string

/**
 * Pointer to a specific object in storage.
 */
export interface BlobRef {
  bucket: BlobBucket
  key: BlobKey
}

/**
 * Full payload returned by get().
 */
export interface BlobObject {
  ref: BlobRef
  sizeInBytes: Bytes
  contentType?: string
  body: Uint8Array
}

export type PutBlobOptions = {
  contentType: string
}
