/**
 * OpenWeatherMap Provider
 *
 * One Call API integration used for every coordinate outside NWS coverage.
 * A single request returns current conditions, hourly and daily forecasts and
 * alerts; the API key is required.
 */

import { createHash } from "crypto"
import { z } from "zod"
import type { Alert, AlertSeverity } from "../../../domain/alert/Alert"
import type {
  DailyForecast,
  HourlyForecast,
  IconCode,
  ProviderForecast,
} from "../../../domain/forecast/Forecast"
import { ConfigurationError } from "../../../shared/errors"
import type { Coordinate, TemperatureUnit } from "../../../shared/types"
import { BaseForecastProvider } from "../base/BaseForecastProvider"
import { clampPercent, compassDirection } from "../normalize"
import type { ProviderConfig } from "../types"

const HOURLY_LIMIT = 24

const conditionSchema = z.object({
  id: z.number(),
  main: z.string().optional(),
  description: z.string().optional(),
  icon: z.string().optional(),
})

const hourlySchema = z.object({
  dt: z.number(),
  temp: z.number(),
  pop: z.number().optional(),
  humidity: z.number().optional(),
  wind_speed: z.number().optional(),
  wind_deg: z.number().optional(),
  weather: z.array(conditionSchema).default([]),
})

const dailySchema = z.object({
  dt: z.number(),
  temp: z.object({ min: z.number(), max: z.number() }),
  pop: z.number().optional(),
  uvi: z.number().optional(),
  humidity: z.number().optional(),
  dew_point: z.number().optional(),
  pressure: z.number().optional(),
  clouds: z.number().optional(),
  wind_speed: z.number().optional(),
  wind_deg: z.number().optional(),
  summary: z.string().optional(),
  weather: z.array(conditionSchema).default([]),
})

const alertSchema = z.object({
  sender_name: z.string().optional(),
  event: z.string().optional(),
  start: z.number().optional(),
  end: z.number().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
})

const oneCallSchema = z.object({
  timezone: z.string().optional(),
  timezone_offset: z.number().optional(),
  current: z.object({ dt: z.number() }).optional(),
  hourly: z.array(hourlySchema).default([]),
  daily: z.array(dailySchema).default([]),
  alerts: z.array(alertSchema).default([]),
})

type OwmCondition = z.infer<typeof conditionSchema>
type OwmAlert = z.infer<typeof alertSchema>

export class OpenWeatherMapProvider extends BaseForecastProvider {
  constructor(config: Omit<ProviderConfig, "id">) {
    super({ ...config, id: "openweathermap" })
  }

  async fetch(coordinate: Coordinate, unit: TemperatureUnit): Promise<ProviderForecast> {
    if (!this.config.apiKey) {
      throw new ConfigurationError("OpenWeatherMap API key not configured. Please set OPENWEATHERMAP_API_KEY.")
    }

    const params = new URLSearchParams({
      lat: String(coordinate.latitude),
      lon: String(coordinate.longitude),
      units: unit === "celsius" ? "metric" : "imperial",
      exclude: "minutely",
      appid: this.config.apiKey,
    })

    console.log(`[OpenWeatherMap] Fetching forecast for ${coordinate.latitude},${coordinate.longitude}`)
    const payload = await this.requestJson(`${this.getApiBaseUrl()}/onecall?${params.toString()}`, oneCallSchema, "onecall")

    const offsetSeconds = payload.timezone_offset ?? 0

    const dailyForecasts: DailyForecast[] = payload.daily.map((day, index) => {
      const condition = day.weather[0]
      return {
        id: `day-${index}`,
        date: isoFromUnix(day.dt),
        tempHigh: day.temp.max,
        tempLow: day.temp.min,
        precipitationChance: clampPercent((day.pop ?? 0) * 100),
        uvIndex: day.uvi !== undefined ? Math.round(day.uvi) : undefined,
        wind: { speed: day.wind_speed ?? 0, direction: compassDirection(day.wind_deg ?? 0) },
        icon: mapOpenWeatherMapIcon(condition),
        shortForecast: condition?.main ?? "Unknown",
        detailedForecast: day.summary ?? capitalize(condition?.description),
        humidity: day.humidity,
        dewpoint: day.dew_point,
        pressure: day.pressure,
        skyCover: day.clouds,
      }
    })

    const hourlyForecasts: HourlyForecast[] = payload.hourly.slice(0, HOURLY_LIMIT).map((hour, index) => {
      const condition = hour.weather[0]
      return {
        id: `hour-${index}`,
        time: isoFromUnix(hour.dt),
        temperature: hour.temp,
        precipitationChance: hour.pop !== undefined ? clampPercent(hour.pop * 100) : undefined,
        icon: mapOpenWeatherMapIcon(condition),
        shortForecast: condition?.main ?? "Unknown",
        wind: { speed: hour.wind_speed ?? 0, direction: compassDirection(hour.wind_deg ?? 0) },
        isDaytime: isDaytime(condition, hour.dt, offsetSeconds),
        humidity: hour.humidity,
      }
    })

    return {
      dailyForecasts,
      hourlyForecasts,
      alerts: payload.alerts.map(toAlert),
      metadata: {
        providerId: "openweathermap",
        updatedAt: payload.current ? isoFromUnix(payload.current.dt) : new Date().toISOString(),
        providerRef: `onecall/${coordinate.latitude},${coordinate.longitude}`,
        timezone: payload.timezone,
      },
    }
  }

  protected describeStatus(status: number): string {
    switch (status) {
      case 401:
        return "Invalid API key"
      case 404:
        return "Location not found"
      case 429:
        return "Rate limited"
      default:
        return super.describeStatus(status)
    }
  }
}

function isoFromUnix(seconds: number): string {
  return new Date(seconds * 1000).toISOString()
}

function capitalize(text: string | undefined): string | undefined {
  if (!text) {
    return undefined
  }
  return text.charAt(0).toUpperCase() + text.slice(1)
}

function isDaytime(condition: OwmCondition | undefined, dt: number, offsetSeconds: number): boolean {
  if (condition?.icon) {
    return !condition.icon.endsWith("n")
  }
  const localHour = new Date((dt + offsetSeconds) * 1000).getUTCHours()
  return localHour >= 6 && localHour < 18
}

/**
 * Map an OpenWeatherMap condition id to an icon code.
 * Day and night variants come from the icon suffix ("01d" / "01n").
 */
export function mapOpenWeatherMapIcon(condition: OwmCondition | undefined): IconCode {
  if (!condition) {
    return "cloudy"
  }

  const { id } = condition
  const isNight = condition.icon?.includes("n") ?? false

  if (id >= 200 && id < 300) return "thunderstorm"
  if (id >= 300 && id < 400) return "drizzle"
  if (id === 511) return "sleet"
  if (id >= 500 && id < 600) return "rain"
  if (id >= 611 && id <= 616) return "sleet"
  if (id >= 600 && id < 700) return "snow"
  if (id >= 700 && id < 800) return "fog"
  if (id === 800) return isNight ? "clear-night" : "clear-day"
  if (id === 801 || id === 802) return isNight ? "partly-cloudy-night" : "partly-cloudy-day"
  return "cloudy"
}

const TAG_SEVERITIES: Array<[string, AlertSeverity]> = [
  ["extreme", "extreme"],
  ["severe", "severe"],
  ["moderate", "moderate"],
  ["minor", "minor"],
]

/**
 * Highest severity named in the alert tags; moderate when none match
 */
export function severityFromTags(tags: string[] | undefined): AlertSeverity {
  const lowered = (tags ?? []).map((tag) => tag.toLowerCase())
  const match = TAG_SEVERITIES.find(([keyword]) => lowered.some((tag) => tag.includes(keyword)))
  return match?.[1] ?? "moderate"
}

/**
 * One Call alerts carry no id; derive one that stays the same across refreshes
 */
export function openWeatherMapAlertId(alert: Pick<OwmAlert, "sender_name" | "event" | "start">): string {
  const source = `${alert.sender_name ?? ""}|${alert.event ?? ""}|${alert.start ?? 0}`
  return `owm-${createHash("sha1").update(source).digest("hex").slice(0, 16)}`
}

function toAlert(alert: OwmAlert): Alert {
  const event = alert.event ?? "Weather Alert"
  return {
    id: openWeatherMapAlertId(alert),
    headline: event,
    description: alert.description ?? "No details available",
    severity: severityFromTags(alert.tags),
    event,
    start: isoFromUnix(alert.start ?? 0),
    end: alert.end !== undefined ? isoFromUnix(alert.end) : null,
  }
}
