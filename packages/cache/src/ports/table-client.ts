import type {
  BatchGetItemCommandInput,
  BatchGetItemCommandOutput,
  BatchWriteItemCommandInput,
  BatchWriteItemCommandOutput,
  DeleteItemCommandInput,
  DeleteItemCommandOutput,
  DescribeTableCommandInput,
  DescribeTableCommandOutput,
  GetItemCommandInput,
  GetItemCommandOutput,
  PutItemCommandInput,
  PutItemCommandOutput,
  QueryCommandInput,
  QueryCommandOutput,
  ScanCommandInput,
  ScanCommandOutput,
  UpdateItemCommandInput,
  UpdateItemCommandOutput,
} from "@aws-sdk/client-dynamodb"

type Output<T> = Omit<T, "$metadata">

/**
 * The store operations the cache needs, in DynamoDB wire shapes.
 *
 * @remarks
 * Implementations throw the store's own service exceptions; translation into
 * cache errors happens in the cache core.
 */
export interface TableClient {
  describeTable(input: DescribeTableCommandInput): Promise<Output<DescribeTableCommandOutput>>
  getItem(input: GetItemCommandInput): Promise<Output<GetItemCommandOutput>>
  query(input: QueryCommandInput): Promise<Output<QueryCommandOutput>>

  /** At most 100 keys per call; the rest may come back as `UnprocessedKeys`. */
  batchGetItem(input: BatchGetItemCommandInput): Promise<Output<BatchGetItemCommandOutput>>

  putItem(input: PutItemCommandInput): Promise<Output<PutItemCommandOutput>>

  /** At most 25 requests per call; the rest may come back as `UnprocessedItems`. */
  batchWriteItem(
    input: BatchWriteItemCommandInput,
  ): Promise<Output<BatchWriteItemCommandOutput>>

  deleteItem(input: DeleteItemCommandInput): Promise<Output<DeleteItemCommandOutput>>
  updateItem(input: UpdateItemCommandInput): Promise<Output<UpdateItemCommandOutput>>
  scan(input: ScanCommandInput): Promise<Output<ScanCommandOutput>>

  close(): Promise<void>
}
