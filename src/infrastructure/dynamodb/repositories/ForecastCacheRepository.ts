/**
 * DynamoDB Forecast Cache Repository
 *
 * Implements ForecastCacheRepository using DynamoDB.
 * One item per location key; the item TTL outlives the daily expiry by a
 * week so expired snapshots stay available as stale fallback.
 */

import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  type DynamoDBDocumentClient,
} from "@aws-sdk/lib-dynamodb"
import type {
  CacheEntry,
  ForecastCacheRepository,
} from "../../../domain/forecast/Forecast"
import { batchWriteAll, scanAll } from "../batch"
import { cacheItemSchema } from "../schemas/snapshotSchema"

const SNAPSHOT_SK = "SNAPSHOT"
const STALE_RETENTION_SECONDS = 7 * 24 * 60 * 60

export class DynamoDBForecastCacheRepository implements ForecastCacheRepository {
  private client: DynamoDBDocumentClient
  private tableName: string

  constructor(client: DynamoDBDocumentClient, tableName: string = "forecast_cache") {
    this.client = client
    this.tableName = tableName
  }

  async load(key: string): Promise<CacheEntry | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: `FORECAST#${key}`, SK: SNAPSHOT_SK },
      })
    )

    if (!response.Item) {
      return null
    }

    const parsed = cacheItemSchema.safeParse(response.Item)
    if (!parsed.success) {
      console.warn(`[ForecastCache] Ignoring unreadable cache item for ${key}`)
      return null
    }

    return {
      snapshot: parsed.data.snapshot,
      storedAt: parsed.data.stored_at,
      dailyExpiresAt: parsed.data.daily_expires_at,
      hourlyExpiresAt: parsed.data.hourly_expires_at,
    }
  }

  async save(key: string, entry: CacheEntry): Promise<void> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          PK: `FORECAST#${key}`,
          SK: SNAPSHOT_SK,
          snapshot: entry.snapshot,
          stored_at: entry.storedAt,
          daily_expires_at: entry.dailyExpiresAt,
          hourly_expires_at: entry.hourlyExpiresAt,
          ttl: Math.floor(entry.dailyExpiresAt / 1000) + STALE_RETENTION_SECONDS,
        },
      })
    )
  }

  async remove(key: string): Promise<void> {
    await this.client.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: { PK: `FORECAST#${key}`, SK: SNAPSHOT_SK },
      })
    )
  }

  async removeAll(): Promise<void> {
    const items = await scanAll(this.client, {
      TableName: this.tableName,
      ProjectionExpression: "PK, SK",
    })

    await batchWriteAll(
      this.client,
      this.tableName,
      items.map((item) => ({ DeleteRequest: { Key: { PK: item.PK, SK: item.SK } } }))
    )
  }
}
