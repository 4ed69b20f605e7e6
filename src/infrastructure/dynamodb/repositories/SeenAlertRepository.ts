/**
 * DynamoDB Seen Alert Repository
 *
 * One item per alert id already handed to the notifier. Items expire after
 * 30 days; provider alerts are long gone by then.
 */

import {
  BatchGetCommand,
  type DynamoDBDocumentClient,
} from "@aws-sdk/lib-dynamodb"
import type { SeenAlertRepository } from "../../../domain/alert/Alert"
import { systemClock } from "../../../shared/types"
import type { Clock } from "../../../shared/types"
import { batchWriteAll, chunk, scanAll } from "../batch"

// DynamoDB limit per BatchGetItem call
const BATCH_GET_LIMIT = 100
const SEEN_RETENTION_SECONDS = 30 * 24 * 60 * 60
const MAX_UNPROCESSED_RETRIES = 3

export class DynamoDBSeenAlertRepository implements SeenAlertRepository {
  private client: DynamoDBDocumentClient
  private tableName: string
  private clock: Clock

  constructor(client: DynamoDBDocumentClient, tableName: string = "seen_alerts", clock: Clock = systemClock) {
    this.client = client
    this.tableName = tableName
    this.clock = clock
  }

  async filterUnseen(ids: string[]): Promise<string[]> {
    const unique = [...new Set(ids)]
    const seen = new Set<string>()

    for (const batch of chunk(unique, BATCH_GET_LIMIT)) {
      let keys: Record<string, unknown>[] = batch.map((id) => ({ PK: `ALERT#${id}` }))
      let attempt = 0

      while (keys.length > 0) {
        const response = await this.client.send(
          new BatchGetCommand({
            RequestItems: {
              [this.tableName]: { Keys: keys, ProjectionExpression: "alert_id" },
            },
          })
        )

        for (const item of response.Responses?.[this.tableName] ?? []) {
          if (typeof item.alert_id === "string") {
            seen.add(item.alert_id)
          }
        }

        keys = response.UnprocessedKeys?.[this.tableName]?.Keys ?? []
        attempt++
        if (keys.length > 0 && attempt > MAX_UNPROCESSED_RETRIES) {
          throw new Error(`Batch get from ${this.tableName} left ${keys.length} unprocessed keys`)
        }
      }
    }

    return ids.filter((id) => !seen.has(id))
  }

  async markSeen(ids: string[]): Promise<void> {
    const nowMs = this.clock.now()
    const seenAt = new Date(nowMs).toISOString()
    const ttl = Math.floor(nowMs / 1000) + SEEN_RETENTION_SECONDS

    await batchWriteAll(
      this.client,
      this.tableName,
      [...new Set(ids)].map((id) => ({
        PutRequest: {
          Item: { PK: `ALERT#${id}`, alert_id: id, seen_at: seenAt, ttl },
        },
      }))
    )
  }

  async reset(): Promise<void> {
    const items = await scanAll(this.client, {
      TableName: this.tableName,
      ProjectionExpression: "PK",
    })

    await batchWriteAll(
      this.client,
      this.tableName,
      items.map((item) => ({ DeleteRequest: { Key: { PK: item.PK } } }))
    )
  }
}
