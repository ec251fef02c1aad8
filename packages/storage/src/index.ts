export { S3Client } from "@aws-sdk/client-s3"
export {
  type CreateMemoryBlobStorageOptions,
  type CreateS3BlobStorageOptions,
  createMemoryBlobStorage,
  createS3BlobStorage,
} from "./adapters/create"
export { MemoryBlobStorage, type MemoryBlobStorageOptions } from "./adapters/memory-blob-storage"
export {
  BlobDeleteError,
  type BlobDeleteFailure,
  S3BlobStorage,
  type S3BlobStorageDeps,
  type S3BlobStorageOptions,
} from "./adapters/s3-blob-storage"
export type {
  BlobBucket,
  BlobKey,
  BlobObject,
  BlobRef,
  Bytes,
  PutBlobOptions,
} from "./ports/blob-object"
export type { BlobStorage } from "./ports/blob-storage"
