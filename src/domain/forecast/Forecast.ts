/**
 * Forecast Domain Entities
 *
 * A Snapshot is everything known about one location at one point in time:
 * daily and hourly forecasts plus the active alerts. Snapshots are produced by
 * the FetchOrchestrator only and are replaced wholesale, except for the
 * hourly-only patch applied when the hourly TTL lapses first.
 */

import type { Alert } from "../alert/Alert"
import type { Coordinate, TemperatureUnit } from "../../shared/types"

export type ProviderId = "nws" | "openweathermap"

export type IconCode =
  | "clear-day"
  | "clear-night"
  | "partly-cloudy-day"
  | "partly-cloudy-night"
  | "cloudy"
  | "rain"
  | "drizzle"
  | "thunderstorm"
  | "snow"
  | "sleet"
  | "fog"
  | "wind"

export interface Wind {
  speed: number
  direction: string
}

export interface DailyForecast {
  id: string
  date: string
  tempHigh: number | null
  tempLow: number | null
  precipitationChance: number
  uvIndex?: number
  wind: Wind
  icon: IconCode
  shortForecast: string
  detailedForecast?: string
  humidity?: number
  dewpoint?: number
  pressure?: number
  skyCover?: number
}

export interface HourlyForecast {
  id: string
  time: string
  temperature: number
  precipitationChance?: number
  icon: IconCode
  shortForecast: string
  wind: Wind
  isDaytime: boolean
  humidity?: number
}

export interface SnapshotMetadata {
  providerId: ProviderId
  updatedAt: string
  // Provider-side handle, e.g. NWS grid "OKX/33,35"
  providerRef: string
  timezone?: string
  locationName?: string
  stale?: boolean
  staleReason?: string
}

export interface Snapshot {
  locationKey: string
  dailyForecasts: DailyForecast[]
  hourlyForecasts: HourlyForecast[]
  alerts: Alert[]
  metadata: SnapshotMetadata
}

/**
 * What a provider returns; the orchestrator stamps the location key
 */
export type ProviderForecast = Omit<Snapshot, "locationKey">

export interface CacheEntry {
  snapshot: Snapshot
  storedAt: number
  dailyExpiresAt: number
  hourlyExpiresAt: number
}

export interface ForecastProvider {
  readonly id: ProviderId
  fetch(coordinate: Coordinate, unit: TemperatureUnit): Promise<ProviderForecast>
}

export interface ForecastProviderRegistry {
  get(id: ProviderId): ForecastProvider
}

/**
 * Durable backend behind the CacheStore. Format is opaque to the engine; only
 * the two-expiry shape is a contract.
 */
export interface ForecastCacheRepository {
  load(key: string): Promise<CacheEntry | null>
  save(key: string, entry: CacheEntry): Promise<void>
  remove(key: string): Promise<void>
  removeAll(): Promise<void>
}

/**
 * Keep the first occurrence of each alert id
 */
export function uniqueAlerts(alerts: Alert[]): Alert[] {
  const seen = new Set<string>()
  return alerts.filter((alert) => {
    if (seen.has(alert.id)) {
      return false
    }
    seen.add(alert.id)
    return true
  })
}
