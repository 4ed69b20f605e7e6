/**
 * Alert Processor
 *
 * Turns the alert list of each refreshed snapshot into notification
 * decisions:
 * - Deduplication against the durable seen-alert set (by alert id)
 * - Severity normalization (unknown values become moderate)
 * - One Notifier call per alert id, ever, until the seen set is reset
 * - Ended alerts (present last time, gone now) reported for live indicators
 *
 * Ids are marked seen under the lock; Notifier calls run after it is
 * released, each bounded by a timeout.
 */

import type {
  Alert,
  AlertSeverity,
  Notifier,
  SeenAlertRepository,
} from "../../domain/alert/Alert"
import { classifySeverity, isAtLeast } from "../../domain/alert/Alert"
import { uniqueAlerts } from "../../domain/forecast/Forecast"
import type { Location } from "../../domain/location/Location"
import { Mutex } from "../../shared/concurrency/Mutex"
import { waitWithTimeout } from "../../shared/concurrency/timeout"

export interface AlertProcessingResult {
  surfaced: Alert[]
  ended: string[]
}

export interface AlertProcessorOptions {
  notifyTimeoutMs?: number
}

export interface ProcessOptions {
  /**
   * Alert ids active before this snapshot, used when this process has no
   * record of the location yet (cold start)
   */
  previousAlertIds?: string[]
  /**
   * Lowers the notify timeout for this call
   */
  notifyTimeoutMs?: number
}

export class AlertProcessor {
  private lock = new Mutex()
  // location id -> alert ids active in the last processed snapshot
  private previousActive = new Map<string, Set<string>>()
  private notifyTimeoutMs: number

  constructor(
    private seenAlertRepository: SeenAlertRepository,
    private notifier: Notifier,
    options: AlertProcessorOptions = {}
  ) {
    this.notifyTimeoutMs = options.notifyTimeoutMs ?? 10000
  }

  async process(
    newAlerts: Alert[],
    location: Location,
    options: ProcessOptions = {}
  ): Promise<AlertProcessingResult> {
    const result = await this.lock.runExclusive(async () => {
      const alerts = uniqueAlerts(newAlerts).map((alert) => ({
        ...alert,
        severity: classifySeverity(alert.severity),
      }))
      const currentIds = new Set(alerts.map((alert) => alert.id))

      const unseenIds = new Set(
        alerts.length > 0
          ? await this.seenAlertRepository.filterUnseen([...currentIds])
          : []
      )
      const surfaced = alerts.filter((alert) => unseenIds.has(alert.id))

      if (surfaced.length > 0) {
        await this.seenAlertRepository.markSeen(surfaced.map((alert) => alert.id))
        console.log(`[AlertProcessor] ${surfaced.length} new alerts for ${location.name}`)
      }

      const previous = this.previousActive.get(location.id) ?? new Set(options.previousAlertIds ?? [])
      const ended = [...previous].filter((id) => !currentIds.has(id))
      this.previousActive.set(location.id, currentIds)

      return { surfaced, ended }
    })

    const timeoutMs = Math.min(options.notifyTimeoutMs ?? this.notifyTimeoutMs, this.notifyTimeoutMs)
    await Promise.all(result.surfaced.map((alert) => this.notify(alert, location, timeoutMs)))

    return result
  }

  private async notify(alert: Alert, location: Location, timeoutMs: number): Promise<void> {
    try {
      await waitWithTimeout(
        Promise.resolve().then(() => this.notifier.notify(alert, location)),
        timeoutMs,
        `Notifier timed out after ${timeoutMs}ms`
      )
    } catch (error: unknown) {
      console.error(`[AlertProcessor] Notifier failed for alert ${alert.id} (${location.name}):`, error)
    }
  }

  /**
   * Alerts at or above `minSeverity`
   */
  filter(alerts: Alert[], minSeverity: AlertSeverity): Alert[] {
    return filterBySeverity(alerts, minSeverity)
  }

  async reset(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.seenAlertRepository.reset()
      this.previousActive.clear()
    })
  }
}

export function filterBySeverity(alerts: Alert[], minSeverity: AlertSeverity): Alert[] {
  return alerts.filter((alert) => isAtLeast(classifySeverity(alert.severity), minSeverity))
}
