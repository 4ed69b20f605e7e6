/**
 * Background Refresh Scheduler
 *
 * Refreshes every tracked location in one batch, triggered by an external
 * timer (EventBridge, every 15+ minutes).
 *
 * Key Features:
 * - Bounded worker pool (REFRESH_CONCURRENCY)
 * - Per-location timeout; a slow or failing location never cancels siblings
 * - Overall deadline; locations still queued when it passes fail with a timeout
 * - New alerts from fresh snapshots handed to the AlertProcessor, time-boxed
 *   by the same per-location timeout and the overall deadline
 *
 * Partial success is the normal outcome and is reported, not thrown.
 */

import type { Alert } from "../../domain/alert/Alert"
import type { Location, LocationRepository } from "../../domain/location/Location"
import { buildLocationKey, coordinateOf } from "../../domain/location/Location"
import type { AlertProcessor } from "../alert/AlertProcessor"
import type { FetchOrchestrator, ResolveOutcome } from "../forecast/FetchOrchestrator"
import { waitWithTimeout } from "../../shared/concurrency/timeout"
import { TimeoutError, errorMessage } from "../../shared/errors"
import { systemClock } from "../../shared/types"
import type { Clock, TemperatureUnit } from "../../shared/types"

export interface RefreshFailure {
  locationId: string
  error: Error
}

export interface RefreshReport {
  totalLocations: number
  succeeded: string[]
  // Subset of succeeded that was answered from expired cache
  stale: string[]
  failed: RefreshFailure[]
  alertsSurfaced: number
  duration: number
}

interface LocationRefresh {
  outcome: ResolveOutcome
  previousAlertIds: string[]
}

export interface BackgroundRefreshOptions {
  concurrency?: number
  locationTimeoutMs?: number
  unit?: TemperatureUnit
  alertProcessor?: AlertProcessor
  clock?: Clock
}

const MAX_CONCURRENCY = 8

export class BackgroundRefreshScheduler {
  private concurrency: number
  private locationTimeoutMs: number
  private unit: TemperatureUnit
  private alertProcessor?: AlertProcessor
  private clock: Clock

  constructor(
    private locationRepository: LocationRepository,
    private orchestrator: FetchOrchestrator,
    options: BackgroundRefreshOptions = {}
  ) {
    this.concurrency = Math.min(Math.max(1, Math.floor(options.concurrency ?? 4)), MAX_CONCURRENCY)
    this.locationTimeoutMs = options.locationTimeoutMs ?? 20000
    this.unit = options.unit ?? "fahrenheit"
    this.alertProcessor = options.alertProcessor
    this.clock = options.clock ?? systemClock
  }

  async refreshAll(deadline: Date): Promise<RefreshReport> {
    const startTime = this.clock.now()
    const locations = await this.locationRepository.listAll()

    console.log(
      `[RefreshScheduler] Refreshing ${locations.length} locations ` +
      `(concurrency ${this.concurrency}, deadline ${deadline.toISOString()})`
    )

    const report: RefreshReport = {
      totalLocations: locations.length,
      succeeded: [],
      stale: [],
      failed: [],
      alertsSurfaced: 0,
      duration: 0,
    }

    let next = 0
    const worker = async (): Promise<void> => {
      while (next < locations.length) {
        const location = locations[next]
        next++
        await this.refreshLocation(location, deadline, report)
      }
    }

    const workerCount = Math.min(this.concurrency, locations.length)
    await Promise.all(Array.from({ length: workerCount }, () => worker()))

    report.duration = this.clock.now() - startTime

    console.log(
      `[RefreshScheduler] Completed: ${report.succeeded.length}/${locations.length} locations refreshed ` +
      `(${report.stale.length} stale, ${report.failed.length} failed, ${report.alertsSurfaced} new alerts) in ${report.duration}ms`
    )

    return report
  }

  private async refreshLocation(location: Location, deadline: Date, report: RefreshReport): Promise<void> {
    const remainingMs = deadline.getTime() - this.clock.now()
    if (remainingMs <= 0) {
      report.failed.push({ locationId: location.id, error: new TimeoutError("Refresh deadline exceeded") })
      return
    }

    const timeoutMs = Math.min(this.locationTimeoutMs, remainingMs)
    const controller = new AbortController()

    try {
      const { outcome, previousAlertIds } = await waitWithTimeout(
        this.resolveLocation(location, controller.signal),
        timeoutMs,
        `Refresh of location ${location.id} timed out after ${timeoutMs}ms`
      )

      report.succeeded.push(location.id)
      if (outcome.state === "stale-fallback") {
        report.stale.push(location.id)
        return
      }

      await this.processAlerts(location, outcome.snapshot.alerts, previousAlertIds, deadline, report)
    } catch (error: unknown) {
      controller.abort()
      const failure = error instanceof Error ? error : new Error(errorMessage(error))
      console.error(`[RefreshScheduler] Location ${location.id} (${location.name}) failed: ${failure.message}`)
      report.failed.push({ locationId: location.id, error: failure })
    }
  }

  private async resolveLocation(location: Location, signal: AbortSignal): Promise<LocationRefresh> {
    const key = buildLocationKey(location.id, this.unit)
    // Alerts of the snapshot being replaced, for ended-alert reporting
    const cached = this.alertProcessor ? await this.orchestrator.peek(key) : null
    const outcome = await this.orchestrator.resolveWithState(key, coordinateOf(location), this.unit, { signal })
    return { outcome, previousAlertIds: cached ? cached.alerts.map((alert) => alert.id) : [] }
  }

  private async processAlerts(
    location: Location,
    alerts: Alert[],
    previousAlertIds: string[],
    deadline: Date,
    report: RefreshReport
  ): Promise<void> {
    if (!this.alertProcessor) {
      return
    }

    const remainingMs = deadline.getTime() - this.clock.now()
    if (remainingMs <= 0) {
      console.warn(`[RefreshScheduler] Skipping alert processing for ${location.id}: deadline exceeded`)
      return
    }

    const timeoutMs = Math.min(this.locationTimeoutMs, remainingMs)

    try {
      const result = await waitWithTimeout(
        this.alertProcessor.process(alerts, location, { previousAlertIds, notifyTimeoutMs: timeoutMs }),
        timeoutMs,
        `Alert processing for ${location.id} timed out after ${timeoutMs}ms`
      )
      report.alertsSurfaced += result.surfaced.length
    } catch (error: unknown) {
      console.error(`[RefreshScheduler] Alert processing failed for ${location.id}:`, error)
    }
  }
}
