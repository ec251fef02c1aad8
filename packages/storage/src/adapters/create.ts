import type { S3Client } from "@aws-sdk/client-s3"
import type { BlobBucket } from "../ports/blob-object"
import type { BlobStorage } from "../ports/blob-storage"
import { MemoryBlobStorage } from "./memory-blob-storage"
import { S3BlobStorage } from "./s3-blob-storage"

export interface CreateMemoryBlobStorageOptions {
  buckets?: readonly BlobBucket[]
}

export function createMemoryBlobStorage(
  options: CreateMemoryBlobStorageOptions = {},
): MemoryBlobStorage {
  return new MemoryBlobStorage(options)
}

export interface CreateS3BlobStorageOptions {
  client: S3Client
  keyspacePrefix?: string
}

export function createS3BlobStorage(options: CreateS3BlobStorageOptions): BlobStorage {
  return new S3BlobStorage(
    { client: options.client },
    options.keyspacePrefix !== undefined ? { keyspacePrefix: options.keyspacePrefix } : {},
  )
}
