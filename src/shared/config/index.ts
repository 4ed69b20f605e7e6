/**
 * Engine Configuration
 *
 * Read from environment variables (Lambda configuration) and validated once at
 * container start. Table names, provider endpoints, TTLs and refresh limits
 * all live here so handlers only wire objects together.
 */

import { z } from "zod"
import { ConfigurationError } from "../errors"
import type { TemperatureUnit } from "../types"

const MINUTE_MS = 60 * 1000

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  FORECAST_CACHE_TABLE: z.string().min(1).default("forecast_cache"),
  LOCATIONS_TABLE: z.string().min(1).default("locations"),
  SEEN_ALERTS_TABLE: z.string().min(1).default("seen_alerts"),
  NOTIFICATIONS_TABLE: z.string().min(1).default("notifications"),
  NWS_API_BASE_URL: z.string().url().default("https://api.weather.gov"),
  NWS_USER_AGENT: z.string().min(1).default("forecast-sync-engine/1.0"),
  OPENWEATHERMAP_API_BASE_URL: z.string().url().default("https://api.openweathermap.org/data/3.0"),
  OPENWEATHERMAP_API_KEY: z.string().min(1).optional(),
  FORECAST_DAILY_TTL_MINUTES: intFromEnv(180),
  FORECAST_HOURLY_TTL_MINUTES: intFromEnv(60),
  REFRESH_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(4),
  REFRESH_LOCATION_TIMEOUT_MS: intFromEnv(20000),
  PROVIDER_REQUEST_TIMEOUT_MS: intFromEnv(15000),
  TEMPERATURE_UNIT: z.enum(["fahrenheit", "celsius"]).default("fahrenheit"),
})

export interface EngineConfig {
  tables: {
    forecastCache: string
    locations: string
    seenAlerts: string
    notifications: string
  }
  providers: {
    nws: {
      apiBaseUrl: string
      userAgent: string
    }
    openWeatherMap: {
      apiBaseUrl: string
      apiKey?: string
    }
    requestTimeoutMs: number
  }
  cache: {
    dailyTtlMs: number
    hourlyTtlMs: number
  }
  refresh: {
    concurrency: number
    locationTimeoutMs: number
  }
  defaultUnit: TemperatureUnit
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Empty strings are how unset variables usually arrive from templates
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  )

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")
    throw new ConfigurationError(`Invalid configuration: ${keys}`)
  }

  const values = parsed.data
  return {
    tables: {
      forecastCache: values.FORECAST_CACHE_TABLE,
      locations: values.LOCATIONS_TABLE,
      seenAlerts: values.SEEN_ALERTS_TABLE,
      notifications: values.NOTIFICATIONS_TABLE,
    },
    providers: {
      nws: {
        apiBaseUrl: values.NWS_API_BASE_URL,
        userAgent: values.NWS_USER_AGENT,
      },
      openWeatherMap: {
        apiBaseUrl: values.OPENWEATHERMAP_API_BASE_URL,
        apiKey: values.OPENWEATHERMAP_API_KEY,
      },
      requestTimeoutMs: values.PROVIDER_REQUEST_TIMEOUT_MS,
    },
    cache: {
      dailyTtlMs: values.FORECAST_DAILY_TTL_MINUTES * MINUTE_MS,
      hourlyTtlMs: values.FORECAST_HOURLY_TTL_MINUTES * MINUTE_MS,
    },
    refresh: {
      concurrency: values.REFRESH_CONCURRENCY,
      locationTimeoutMs: values.REFRESH_LOCATION_TIMEOUT_MS,
    },
    defaultUnit: values.TEMPERATURE_UNIT,
  }
}
