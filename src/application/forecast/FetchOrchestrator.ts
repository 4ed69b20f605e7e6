/**
 * Fetch Orchestrator
 *
 * Resolves the snapshot for one location key:
 *
 *   CacheCheck
 *     fresh          hourly TTL not reached -> cached snapshot
 *     partial-stale  daily valid, hourly lapsed -> cached snapshot now,
 *                    hourly-only patch fetch in the background
 *     missing/expired -> Fetching
 *   Fetching (single-flight per key)
 *     fetched        provider succeeded -> stored with daily/hourly TTLs
 *     stale-fallback provider failed, any cached entry -> marked stale
 *     failed         provider failed, nothing cached -> NotFoundError
 */

import type {
  ForecastProviderRegistry,
  ProviderForecast,
  Snapshot,
} from "../../domain/forecast/Forecast"
import { uniqueAlerts } from "../../domain/forecast/Forecast"
import { assertValidCoordinate, assertValidLocationKey } from "../../domain/location/Location"
import type { CacheStore } from "../cache/CacheStore"
import type { ProviderSelector } from "../routing/ProviderSelector"
import { detachOnAbort } from "../../shared/concurrency/timeout"
import { NotFoundError, errorMessage, isRecoverableFetchError } from "../../shared/errors"
import { systemClock } from "../../shared/types"
import type { Clock, Coordinate, TemperatureUnit } from "../../shared/types"

const HOUR_MS = 60 * 60 * 1000

export type ResolveState = "fresh" | "partial-stale" | "fetched" | "stale-fallback"

export interface ResolveOutcome {
  snapshot: Snapshot
  state: ResolveState
}

export interface ResolveOptions {
  /**
   * Detaches this caller from the fetch. A fetch shared with other callers
   * keeps running for them.
   */
  signal?: AbortSignal
}

export interface FetchOrchestratorOptions {
  dailyTtlMs?: number
  hourlyTtlMs?: number
  clock?: Clock
}

export class FetchOrchestrator {
  private inFlight = new Map<string, Promise<ResolveOutcome>>()
  private patches = new Map<string, Promise<void>>()
  private dailyTtlMs: number
  private hourlyTtlMs: number
  private clock: Clock

  constructor(
    private cacheStore: CacheStore,
    private providerSelector: ProviderSelector,
    private providers: ForecastProviderRegistry,
    options: FetchOrchestratorOptions = {}
  ) {
    this.dailyTtlMs = options.dailyTtlMs ?? 3 * HOUR_MS
    this.hourlyTtlMs = options.hourlyTtlMs ?? HOUR_MS
    this.clock = options.clock ?? systemClock
  }

  async resolve(
    locationKey: string,
    coordinate: Coordinate,
    unit: TemperatureUnit,
    options: ResolveOptions = {}
  ): Promise<Snapshot> {
    const outcome = await this.resolveWithState(locationKey, coordinate, unit, options)
    return outcome.snapshot
  }

  async resolveWithState(
    locationKey: string,
    coordinate: Coordinate,
    unit: TemperatureUnit,
    options: ResolveOptions = {}
  ): Promise<ResolveOutcome> {
    assertValidLocationKey(locationKey)
    assertValidCoordinate(coordinate)

    const detachMessage = `Resolve for ${locationKey} was cancelled`

    const pending = this.inFlight.get(locationKey)
    if (pending) {
      return detachOnAbort(pending, options.signal, detachMessage)
    }

    const entry = await this.cacheStore.get(locationKey)
    const now = this.clock.now()

    if (entry && now < entry.dailyExpiresAt) {
      if (now < entry.hourlyExpiresAt) {
        return { snapshot: entry.snapshot, state: "fresh" }
      }

      this.startPatch(locationKey, coordinate, unit)
      return { snapshot: entry.snapshot, state: "partial-stale" }
    }

    // Re-check after the cache read: another caller may have started the
    // fetch while we were suspended. No await between check and set.
    let fetch = this.inFlight.get(locationKey)
    if (!fetch) {
      fetch = this.fetchAndApply(locationKey, coordinate, unit).finally(() => {
        this.inFlight.delete(locationKey)
      })
      this.inFlight.set(locationKey, fetch)
    }

    return detachOnAbort(fetch, options.signal, detachMessage)
  }

  /**
   * Resolves once the background patch fetch for `locationKey` has finished,
   * or every patch fetch when no key is given
   */
  async settle(locationKey?: string): Promise<void> {
    if (locationKey !== undefined) {
      await this.patches.get(locationKey)
      return
    }
    while (this.patches.size > 0) {
      await Promise.all(this.patches.values())
    }
  }

  /**
   * Cached snapshot for `locationKey`, expired or not, without fetching
   */
  async peek(locationKey: string): Promise<Snapshot | null> {
    const entry = await this.cacheStore.get(locationKey)
    return entry?.snapshot ?? null
  }

  private async fetchAndApply(
    locationKey: string,
    coordinate: Coordinate,
    unit: TemperatureUnit
  ): Promise<ResolveOutcome> {
    const providerId = this.providerSelector.select(coordinate)

    try {
      const forecast = await this.providers.get(providerId).fetch(coordinate, unit)
      const snapshot = toSnapshot(locationKey, forecast)
      await this.cacheStore.put(locationKey, snapshot, this.dailyTtlMs, this.hourlyTtlMs)

      console.log(
        `[FetchOrchestrator] Fetched ${locationKey} from ${providerId}: ` +
        `${snapshot.dailyForecasts.length} daily, ${snapshot.hourlyForecasts.length} hourly, ${snapshot.alerts.length} alerts`
      )
      return { snapshot, state: "fetched" }
    } catch (error: unknown) {
      if (!isRecoverableFetchError(error)) {
        throw error
      }

      const stale = await this.cacheStore.get(locationKey)
      if (!stale) {
        console.error(`[FetchOrchestrator] Fetch failed for ${locationKey} with no cached fallback:`, error.message)
        throw new NotFoundError(`Forecast for ${locationKey}`, error)
      }

      console.warn(`[FetchOrchestrator] Serving stale forecast for ${locationKey}: ${error.message}`)
      return {
        snapshot: {
          ...stale.snapshot,
          metadata: {
            ...stale.snapshot.metadata,
            stale: true,
            staleReason: error.message,
          },
        },
        state: "stale-fallback",
      }
    }
  }

  private startPatch(locationKey: string, coordinate: Coordinate, unit: TemperatureUnit): void {
    if (this.patches.has(locationKey) || this.inFlight.has(locationKey)) {
      return
    }

    const patch = this.patchHourly(locationKey, coordinate, unit).finally(() => {
      this.patches.delete(locationKey)
    })
    this.patches.set(locationKey, patch)
  }

  // Never rejects: daily data already answered the caller
  private async patchHourly(locationKey: string, coordinate: Coordinate, unit: TemperatureUnit): Promise<void> {
    const providerId = this.providerSelector.select(coordinate)

    try {
      const forecast = await this.providers.get(providerId).fetch(coordinate, unit)
      const patched = await this.cacheStore.patchHourly(locationKey, forecast.hourlyForecasts, this.hourlyTtlMs)
      if (!patched) {
        console.warn(`[FetchOrchestrator] Hourly patch for ${locationKey} dropped: entry was cleared`)
      }
    } catch (error: unknown) {
      console.warn(`[FetchOrchestrator] Hourly patch failed for ${locationKey}: ${errorMessage(error)}`)
    }
  }
}

function toSnapshot(locationKey: string, forecast: ProviderForecast): Snapshot {
  return {
    locationKey,
    dailyForecasts: forecast.dailyForecasts,
    hourlyForecasts: forecast.hourlyForecasts,
    alerts: uniqueAlerts(forecast.alerts),
    metadata: forecast.metadata,
  }
}
