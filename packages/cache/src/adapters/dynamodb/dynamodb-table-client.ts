import {
  type BatchGetItemCommandInput,
  BatchGetItemCommand,
  type BatchWriteItemCommandInput,
  BatchWriteItemCommand,
  type DeleteItemCommandInput,
  DeleteItemCommand,
  type DescribeTableCommandInput,
  DescribeTableCommand,
  type DynamoDBClient,
  type GetItemCommandInput,
  GetItemCommand,
  type PutItemCommandInput,
  PutItemCommand,
  type QueryCommandInput,
  QueryCommand,
  type ScanCommandInput,
  ScanCommand,
  type UpdateItemCommandInput,
  UpdateItemCommand,
} from "@aws-sdk/client-dynamodb"
import type { TableClient } from "../../ports/table-client"

export type DynamoDbTableClientDeps = {
  client: DynamoDBClient
}

/**
 * {@link TableClient} backed by the AWS SDK. Service exceptions propagate
 * untouched.
 */
export class DynamoDbTableClient implements TableClient {
  constructor(private readonly deps: DynamoDbTableClientDeps) {}

  describeTable(input: DescribeTableCommandInput) {
    return this.deps.client.send(new DescribeTableCommand(input))
  }

  getItem(input: GetItemCommandInput) {
    return this.deps.client.send(new GetItemCommand(input))
  }

  query(input: QueryCommandInput) {
    return this.deps.client.send(new QueryCommand(input))
  }

  batchGetItem(input: BatchGetItemCommandInput) {
    return this.deps.client.send(new BatchGetItemCommand(input))
  }

  putItem(input: PutItemCommandInput) {
    return this.deps.client.send(new PutItemCommand(input))
  }

  batchWriteItem(input: BatchWriteItemCommandInput) {
    return this.deps.client.send(new BatchWriteItemCommand(input))
  }

  deleteItem(input: DeleteItemCommandInput) {
    return this.deps.client.send(new DeleteItemCommand(input))
  }

  updateItem(input: UpdateItemCommandInput) {
    return this.deps.client.send(new UpdateItemCommand(input))
  }

  scan(input: ScanCommandInput) {
    return this.deps.client.send(new ScanCommand(input))
  }

  async close(): Promise<void> {
    this.deps.client.destroy()
  }
}
