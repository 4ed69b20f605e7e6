/**
 * DynamoDB batch helpers
 */

import {
  BatchWriteCommand,
  ScanCommand,
  type BatchWriteCommandInput,
  type DynamoDBDocumentClient,
  type ScanCommandInput,
} from "@aws-sdk/lib-dynamodb"

export type WriteRequest = NonNullable<BatchWriteCommandInput["RequestItems"]>[string][number]

// DynamoDB limit per BatchWriteItem call
export const BATCH_WRITE_LIMIT = 25

const MAX_UNPROCESSED_RETRIES = 3

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

/**
 * Write requests in chunks of 25, resubmitting unprocessed items
 */
export async function batchWriteAll(
  client: DynamoDBDocumentClient,
  tableName: string,
  requests: WriteRequest[]
): Promise<void> {
  for (const batch of chunk(requests, BATCH_WRITE_LIMIT)) {
    let pending = batch
    let attempt = 0

    while (pending.length > 0) {
      const response = await client.send(
        new BatchWriteCommand({ RequestItems: { [tableName]: pending } })
      )
      pending = response.UnprocessedItems?.[tableName] ?? []
      attempt++

      if (pending.length > 0 && attempt > MAX_UNPROCESSED_RETRIES) {
        throw new Error(`Batch write to ${tableName} left ${pending.length} unprocessed items`)
      }
    }
  }
}

/**
 * Scan every page of a table
 */
export async function scanAll(
  client: DynamoDBDocumentClient,
  input: ScanCommandInput
): Promise<Record<string, unknown>[]> {
  const items: Record<string, unknown>[] = []
  let exclusiveStartKey: ScanCommandInput["ExclusiveStartKey"]

  do {
    const response = await client.send(
      new ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
    )
    items.push(...(response.Items ?? []))
    exclusiveStartKey = response.LastEvaluatedKey
  } while (exclusiveStartKey)

  return items
}
