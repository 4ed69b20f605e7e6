/**
 * DynamoDB Notification Outbox
 *
 * Notifier implementation that records alert notifications for delivery by a
 * downstream consumer (stream-triggered push sender). Keyed by location and
 * alert, so a repeated notify overwrites rather than duplicates.
 */

import { PutCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import type { Alert, Notifier } from "../../../domain/alert/Alert"
import { notificationClassFor } from "../../../domain/alert/Alert"
import type { Location } from "../../../domain/location/Location"
import { systemClock } from "../../../shared/types"
import type { Clock } from "../../../shared/types"

const OUTBOX_RETENTION_SECONDS = 30 * 24 * 60 * 60

export class DynamoDBNotificationOutbox implements Notifier {
  private client: DynamoDBDocumentClient
  private tableName: string
  private clock: Clock

  constructor(client: DynamoDBDocumentClient, tableName: string = "notifications", clock: Clock = systemClock) {
    this.client = client
    this.tableName = tableName
    this.clock = clock
  }

  async notify(alert: Alert, location: Location): Promise<void> {
    const { category, critical } = notificationClassFor(alert.severity)
    const nowMs = this.clock.now()

    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          PK: `LOCATION#${location.id}`,
          SK: `ALERT#${alert.id}`,
          alert_id: alert.id,
          location_id: location.id,
          category,
          critical,
          severity: alert.severity,
          title: `${alert.event} - ${location.name}`,
          body: alert.headline,
          status: "PENDING",
          created_at: new Date(nowMs).toISOString(),
          ttl: Math.floor(nowMs / 1000) + OUTBOX_RETENTION_SECONDS,
        },
      })
    )
  }
}
