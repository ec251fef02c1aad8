import {
  type BatchGetItemCommandInput,
  type BatchWriteItemCommandInput,
  ConditionalCheckFailedException,
  type DeleteItemCommandInput,
  type DescribeTableCommandInput,
  type GetItemCommandInput,
  type KeysAndAttributes,
  type PutItemCommandInput,
  type QueryCommandInput,
  ResourceNotFoundException,
  type ReturnValue,
  type ScanCommandInput,
  type UpdateItemCommandInput,
  type WriteRequest,
} from "@aws-sdk/client-dynamodb"
import { numberProblem } from "../../core/codec/typed-value"
import { itemSize, MAX_ITEM_BYTES } from "../../core/overflow/item-size"
import type { AttributeMap } from "../../core/schema/cache-item"
import type { TableClient } from "../../ports/table-client"
import {
  applyUpdate,
  type Condition,
  evaluate,
  ExpressionScope,
  parseCondition,
  parseProjection,
  parseUpdate,
  project,
  validationException,
} from "./expressions"

export type MemoryTableDefinition = {
  name: string
  /** String partition key attribute. */
  keyColumn: string
}

export type MemoryTableClientOptions = {
  tables?: readonly MemoryTableDefinition[]

  /**
   * Keys served per BatchGetItem call; the rest come back unprocessed.
   * Emulates a throttled table.
   */
  maxItemsPerBatchGetResponse?: number

  /** Requests applied per BatchWriteItem call; the rest come back unprocessed. */
  maxItemsPerBatchWriteCall?: number
}

type Table = {
  definition: MemoryTableDefinition
  items: Map<string, AttributeMap>
}

const BATCH_GET_MAX = 100
const BATCH_WRITE_MAX = 25

/**
 * In-process table with the request semantics the cache relies on:
 * condition, update, filter and projection expressions; batch limits with
 * unprocessed items; the item size limit and number limits; paginated scans.
 *
 * @remarks
 * Tables are hash-key only and expired items are never swept, which makes
 * the logical-expiry behavior of the cache directly observable.
 */
export class MemoryTableClient implements TableClient {
  private readonly tables = new Map<string, Table>()

  constructor(private readonly options: MemoryTableClientOptions = {}) {
    for (const definition of options.tables ?? []) this.createTable(definition)
  }

  createTable(definition: MemoryTableDefinition): void {
    this.tables.set(definition.name, { definition, items: new Map() })
  }

  /** Number of stored items, expired ones included. */
  size(tableName: string): number {
    return this.table(tableName).items.size
  }

  async describeTable(input: DescribeTableCommandInput) {
    const table = this.table(input.TableName)

    return {
      Table: {
        TableName: table.definition.name,
        TableStatus: "ACTIVE" as const,
        ItemCount: table.items.size,
        KeySchema: [{ AttributeName: table.definition.keyColumn, KeyType: "HASH" as const }],
      },
    }
  }

  async getItem(input: GetItemCommandInput) {
    const table = this.table(input.TableName)
    const scope = new ExpressionScope(input.ExpressionAttributeNames)
    const projection = input.ProjectionExpression
      ? parseProjection(input.ProjectionExpression, scope)
      : undefined
    scope.assertAllUsed()

    const item = table.items.get(this.keyOf(table, input.Key))
    if (!item) return {}

    return { Item: projection ? project(item, projection) : clone(item) }
  }

  async query(input: QueryCommandInput) {
    const table = this.table(input.TableName)
    if (!input.KeyConditionExpression) {
      throw validationException("Either the KeyConditions or KeyConditionExpression parameter must be specified")
    }

    const scope = new ExpressionScope(
      input.ExpressionAttributeNames,
      input.ExpressionAttributeValues,
    )
    const keyCondition = parseCondition(input.KeyConditionExpression, scope)
    const filter = input.FilterExpression ? parseCondition(input.FilterExpression, scope) : undefined
    const projection = input.ProjectionExpression
      ? parseProjection(input.ProjectionExpression, scope)
      : undefined
    scope.assertAllUsed()

    const item = table.items.get(keyValueOf(keyCondition, table.definition.keyColumn))
    const scanned = item ? [item] : []
    const matched = scanned.filter((candidate) => !filter || evaluate(filter, candidate))

    return {
      Items: matched.map((match) => (projection ? project(match, projection) : clone(match))),
      Count: matched.length,
      ScannedCount: scanned.length,
    }
  }

  async batchGetItem(input: BatchGetItemCommandInput) {
    const requests = Object.entries(input.RequestItems ?? {})
    const total = requests.reduce((n, [, request]) => n + (request.Keys?.length ?? 0), 0)

    if (total === 0) {
      throw validationException("The requestItems parameter must contain at least one key")
    }
    if (total > BATCH_GET_MAX) {
      throw validationException("Too many items requested for the BatchGetItem call")
    }

    let budget = this.options.maxItemsPerBatchGetResponse ?? total
    const responses: Record<string, AttributeMap[]> = {}
    const unprocessed: Record<string, KeysAndAttributes> = {}

    for (const [tableName, request] of requests) {
      const table = this.table(tableName)
      const scope = new ExpressionScope(request.ExpressionAttributeNames)
      const projection = request.ProjectionExpression
        ? parseProjection(request.ProjectionExpression, scope)
        : undefined
      scope.assertAllUsed()

      const keys = request.Keys ?? []
      const ids = keys.map((key) => this.keyOf(table, key))
      if (new Set(ids).size !== ids.length) {
        throw validationException("Provided list of item keys contains duplicates")
      }

      const served = Math.max(0, Math.min(budget, keys.length))
      budget -= served

      responses[tableName] = ids
        .slice(0, served)
        .flatMap((id) => {
          const item = table.items.get(id)
          return item ? [projection ? project(item, projection) : clone(item)] : []
        })

      if (served < keys.length) {
        unprocessed[tableName] = { ...request, Keys: keys.slice(served) }
      }
    }

    return { Responses: responses, UnprocessedKeys: unprocessed }
  }

  async putItem(input: PutItemCommandInput) {
    const table = this.table(input.TableName)
    const item = input.Item ?? {}
    const id = this.keyOf(table, item)

    assertStorable(item)

    const previous = table.items.get(id)
    this.checkCondition(input, previous)

    table.items.set(id, clone(item))

    return returnOld(input.ReturnValues, previous)
  }

  async batchWriteItem(input: BatchWriteItemCommandInput) {
    const requests = Object.entries(input.RequestItems ?? {})
    const total = requests.reduce((n, [, writes]) => n + writes.length, 0)

    if (total === 0) {
      throw validationException("The requestItems parameter must contain at least one write request")
    }
    if (total > BATCH_WRITE_MAX) {
      throw validationException(
        "Too many items requested for the BatchWriteItem call: item collection size must be less than or equal to 25",
      )
    }

    // the whole call is validated before anything is applied
    const planned = requests.map(([tableName, writes]) => {
      const table = this.table(tableName)
      const ids = writes.map((write) => this.writeTarget(table, write))
      if (new Set(ids).size !== ids.length) {
        throw validationException("Provided list of item keys contains duplicates")
      }
      return { tableName, table, writes, ids }
    })

    let budget = this.options.maxItemsPerBatchWriteCall ?? total
    const unprocessed: Record<string, WriteRequest[]> = {}

    for (const { tableName, table, writes, ids } of planned) {
      const applied = Math.max(0, Math.min(budget, writes.length))
      budget -= applied

      writes.slice(0, applied).forEach((write, i) => {
        const id = ids[i] ?? ""
        if (write.PutRequest?.Item) table.items.set(id, clone(write.PutRequest.Item))
        else table.items.delete(id)
      })

      if (applied < writes.length) unprocessed[tableName] = writes.slice(applied)
    }

    return { UnprocessedItems: unprocessed }
  }

  async deleteItem(input: DeleteItemCommandInput) {
    const table = this.table(input.TableName)
    const id = this.keyOf(table, input.Key)

    const previous = table.items.get(id)
    this.checkCondition(input, previous)

    table.items.delete(id)

    return returnOld(input.ReturnValues, previous)
  }

  async updateItem(input: UpdateItemCommandInput) {
    const table = this.table(input.TableName)
    const id = this.keyOf(table, input.Key)

    const scope = new ExpressionScope(
      input.ExpressionAttributeNames,
      input.ExpressionAttributeValues,
    )
    const plan = input.UpdateExpression ? parseUpdate(input.UpdateExpression, scope) : undefined
    const condition = input.ConditionExpression
      ? parseCondition(input.ConditionExpression, scope)
      : undefined
    scope.assertAllUsed()

    const keyColumn = table.definition.keyColumn
    if (plan && [...plan.set.map(({ name }) => name), ...plan.remove].includes(keyColumn)) {
      throw validationException(
        `One or more parameter values were invalid: Cannot update attribute ${keyColumn}. This attribute is part of the key`,
      )
    }

    const previous = table.items.get(id)
    if (condition && !evaluate(condition, previous ?? {})) throw conditionFailed()

    const base: AttributeMap = previous ?? { [keyColumn]: { S: id } }
    const { item, updated } = plan ? applyUpdate(plan, base) : { item: base, updated: [] }

    assertStorable(item)
    table.items.set(id, clone(item))

    switch (input.ReturnValues ?? "NONE") {
      case "ALL_NEW":
        return { Attributes: clone(item) }
      case "ALL_OLD":
        return previous ? { Attributes: previous } : {}
      case "UPDATED_NEW":
        return { Attributes: project(item, updated) }
      case "UPDATED_OLD":
        return previous ? { Attributes: project(previous, updated) } : {}
      default:
        return {}
    }
  }

  async scan(input: ScanCommandInput) {
    const table = this.table(input.TableName)

    const scope = new ExpressionScope(
      input.ExpressionAttributeNames,
      input.ExpressionAttributeValues,
    )
    const filter = input.FilterExpression ? parseCondition(input.FilterExpression, scope) : undefined
    const projection = input.ProjectionExpression
      ? parseProjection(input.ProjectionExpression, scope)
      : undefined
    scope.assertAllUsed()

    const ids = [...table.items.keys()].sort()
    const startAfter = input.ExclusiveStartKey
      ? this.keyOf(table, input.ExclusiveStartKey)
      : undefined
    const remaining = startAfter === undefined ? ids : ids.filter((id) => id > startAfter)
    const evaluated = remaining.slice(0, input.Limit ?? remaining.length)

    const matched = evaluated.flatMap((id) => {
      const item = table.items.get(id)
      return item && (!filter || evaluate(filter, item)) ? [item] : []
    })

    const last = evaluated[evaluated.length - 1]
    const hasMore = evaluated.length < remaining.length

    return {
      Items: matched.map((item) => (projection ? project(item, projection) : clone(item))),
      Count: matched.length,
      ScannedCount: evaluated.length,
      ...(hasMore && last !== undefined && {
        LastEvaluatedKey: { [table.definition.keyColumn]: { S: last } },
      }),
    }
  }

  async close(): Promise<void> {}

  private table(name: string | undefined): Table {
    const table = name === undefined ? undefined : this.tables.get(name)
    if (!table) {
      throw new ResourceNotFoundException({
        $metadata: { httpStatusCode: 400 },
        message: "Requested resource not found",
      })
    }
    return table
  }

  private keyOf(table: Table, key: AttributeMap | undefined): string {
    const id = key?.[table.definition.keyColumn]?.S
    if (id === undefined) {
      throw validationException("The provided key element does not match the schema")
    }
    return id
  }

  private writeTarget(table: Table, write: WriteRequest): string {
    if (write.PutRequest?.Item) {
      assertStorable(write.PutRequest.Item)
      return this.keyOf(table, write.PutRequest.Item)
    }
    if (write.DeleteRequest?.Key) return this.keyOf(table, write.DeleteRequest.Key)

    throw validationException("Supplied WriteRequest is missing both PutRequest and DeleteRequest")
  }

  private checkCondition(
    input: Pick<
      PutItemCommandInput,
      "ConditionExpression" | "ExpressionAttributeNames" | "ExpressionAttributeValues"
    >,
    previous: AttributeMap | undefined,
  ): void {
    const scope = new ExpressionScope(
      input.ExpressionAttributeNames,
      input.ExpressionAttributeValues,
    )
    const condition = input.ConditionExpression
      ? parseCondition(input.ConditionExpression, scope)
      : undefined
    scope.assertAllUsed()

    if (condition && !evaluate(condition, previous ?? {})) throw conditionFailed()
  }
}

function keyValueOf(condition: Condition, keyColumn: string): string {
  if (condition.kind === "compare" && condition.op === "=") {
    const { left, right } = condition
    if (left.kind === "path" && left.name === keyColumn && right.kind === "value") {
      const value = right.value.S
      if (value !== undefined) return value
    }
  }

  throw validationException("Query condition missed key schema element")
}

const NUMBER_MESSAGES = {
  not_a_number: "The parameter cannot be converted to a numeric value",
  too_precise: "Attempting to store more than 38 significant digits in a Number",
  out_of_range: "Number overflow. Attempting to store a number with magnitude outside the supported range",
} as const

function assertStorable(item: AttributeMap): void {
  for (const attr of Object.values(item)) {
    for (const text of attr.N !== undefined ? [attr.N] : (attr.NS ?? [])) {
      const problem = numberProblem(text)
      if (problem) throw validationException(`${NUMBER_MESSAGES[problem]}: ${text}`)
    }
  }

  if (itemSize(item) > MAX_ITEM_BYTES) {
    throw validationException("Item size has exceeded the maximum allowed size")
  }
}

function conditionFailed(): ConditionalCheckFailedException {
  return new ConditionalCheckFailedException({
    $metadata: { httpStatusCode: 400 },
    message: "The conditional request failed",
  })
}

function returnOld(returnValues: ReturnValue | undefined, previous: AttributeMap | undefined) {
  return returnValues === "ALL_OLD" && previous ? { Attributes: previous } : {}
}

function clone(item: AttributeMap): AttributeMap {
  return structuredClone(item)
}
