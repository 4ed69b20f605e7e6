/**
 * DynamoDB Location Repository Implementation
 *
 * Implements LocationRepository interface using DynamoDB.
 * The tracked-location set is small, so listing is a full scan.
 */

import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  type DynamoDBDocumentClient,
} from "@aws-sdk/lib-dynamodb"
import { z } from "zod"
import type {
  Location,
  LocationRepository,
} from "../../../domain/location/Location"
import { scanAll } from "../batch"

const METADATA_SK = "METADATA"

const locationItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  is_favorite: z.boolean().default(false),
  created_at: z.string(),
  updated_at: z.string(),
})

export class DynamoDBLocationRepository implements LocationRepository {
  private client: DynamoDBDocumentClient
  private tableName: string

  constructor(client: DynamoDBDocumentClient, tableName: string = "locations") {
    this.client = client
    this.tableName = tableName
  }

  async listAll(): Promise<Location[]> {
    const items = await scanAll(this.client, {
      TableName: this.tableName,
      FilterExpression: "SK = :sk",
      ExpressionAttributeValues: { ":sk": METADATA_SK },
    })

    return items.map((item) => this.mapItemToLocation(item))
  }

  async findById(id: string): Promise<Location | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: `LOCATION#${id}`, SK: METADATA_SK },
      })
    )

    if (!response.Item) {
      return null
    }

    return this.mapItemToLocation(response.Item)
  }

  async upsert(location: Location): Promise<Location> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: this.mapLocationToItem(location),
      })
    )
    return location
  }

  async delete(id: string): Promise<void> {
    await this.client.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: { PK: `LOCATION#${id}`, SK: METADATA_SK },
      })
    )
  }

  private mapItemToLocation(item: Record<string, unknown>): Location {
    const parsed = locationItemSchema.parse(item)
    return {
      id: parsed.id,
      name: parsed.name,
      latitude: parsed.latitude,
      longitude: parsed.longitude,
      isFavorite: parsed.is_favorite,
      createdAt: new Date(parsed.created_at),
      updatedAt: new Date(parsed.updated_at),
    }
  }

  private mapLocationToItem(location: Location): Record<string, unknown> {
    return {
      PK: `LOCATION#${location.id}`,
      SK: METADATA_SK,
      id: location.id,
      name: location.name,
      latitude: location.latitude,
      longitude: location.longitude,
      is_favorite: location.isFavorite,
      created_at: location.createdAt.toISOString(),
      updated_at: location.updatedAt.toISOString(),
    }
  }
}
