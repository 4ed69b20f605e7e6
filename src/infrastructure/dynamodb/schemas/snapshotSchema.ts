/**
 * Stored snapshot shape
 *
 * Cache items are written by this service, but a table can outlive a
 * deployment. Items that no longer match are treated as cache misses.
 */

import { z } from "zod"

const iconCodeSchema = z.enum([
  "clear-day",
  "clear-night",
  "partly-cloudy-day",
  "partly-cloudy-night",
  "cloudy",
  "rain",
  "drizzle",
  "thunderstorm",
  "snow",
  "sleet",
  "fog",
  "wind",
])

const windSchema = z.object({
  speed: z.number(),
  direction: z.string(),
})

const dailySchema = z.object({
  id: z.string(),
  date: z.string(),
  tempHigh: z.number().nullable(),
  tempLow: z.number().nullable(),
  precipitationChance: z.number(),
  uvIndex: z.number().optional(),
  wind: windSchema,
  icon: iconCodeSchema,
  shortForecast: z.string(),
  detailedForecast: z.string().optional(),
  humidity: z.number().optional(),
  dewpoint: z.number().optional(),
  pressure: z.number().optional(),
  skyCover: z.number().optional(),
})

const hourlySchema = z.object({
  id: z.string(),
  time: z.string(),
  temperature: z.number(),
  precipitationChance: z.number().optional(),
  icon: iconCodeSchema,
  shortForecast: z.string(),
  wind: windSchema,
  isDaytime: z.boolean(),
  humidity: z.number().optional(),
})

const alertSchema = z.object({
  id: z.string(),
  headline: z.string(),
  description: z.string(),
  severity: z.enum(["minor", "moderate", "severe", "extreme"]),
  event: z.string(),
  start: z.string(),
  end: z.string().nullable(),
})

export const snapshotSchema = z.object({
  locationKey: z.string(),
  dailyForecasts: z.array(dailySchema),
  hourlyForecasts: z.array(hourlySchema),
  alerts: z.array(alertSchema),
  metadata: z.object({
    providerId: z.enum(["nws", "openweathermap"]),
    updatedAt: z.string(),
    providerRef: z.string(),
    timezone: z.string().optional(),
    locationName: z.string().optional(),
    stale: z.boolean().optional(),
    staleReason: z.string().optional(),
  }),
})

export const cacheItemSchema = z.object({
  snapshot: snapshotSchema,
  stored_at: z.number(),
  daily_expires_at: z.number(),
  hourly_expires_at: z.number(),
})
