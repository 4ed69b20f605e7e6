/**
 * National Weather Service Provider
 *
 * Implements the api.weather.gov integration for the regional coverage area.
 *
 * Flow:
 * - /points/{lat},{lon} resolves the forecast grid
 * - daily and hourly grid forecasts and active alerts are fetched in parallel
 * - alerts are best effort: a failed alerts request yields no alerts
 */

import { z } from "zod"
import type { Alert } from "../../../domain/alert/Alert"
import { classifySeverity } from "../../../domain/alert/Alert"
import type {
  DailyForecast,
  HourlyForecast,
  ProviderForecast,
} from "../../../domain/forecast/Forecast"
import { errorMessage } from "../../../shared/errors"
import type { Coordinate, TemperatureUnit } from "../../../shared/types"
import { BaseForecastProvider } from "../base/BaseForecastProvider"
import { clampPercent, convertTemperature, roundTo } from "../normalize"
import type { ProviderConfig } from "../types"
import {
  estimatePrecipChance,
  estimateSkyCover,
  extractPrecipChance,
  extractUvIndex,
  mapNwsIcon,
  pairDayNightPeriods,
  parseWindSpeed,
} from "./nwsPeriods"

const HOURLY_LIMIT = 24

const quantitativeValue = z.object({ value: z.number().nullable() }).nullish()

const pointSchema = z.object({
  properties: z.object({
    gridId: z.string(),
    gridX: z.number(),
    gridY: z.number(),
    forecast: z.string(),
    forecastHourly: z.string(),
    timeZone: z.string().optional(),
    relativeLocation: z
      .object({
        properties: z.object({
          city: z.string(),
          state: z.string(),
        }),
      })
      .optional(),
  }),
})

const periodSchema = z.object({
  number: z.number(),
  name: z.string().optional(),
  startTime: z.string(),
  endTime: z.string(),
  isDaytime: z.boolean(),
  temperature: z.number(),
  temperatureUnit: z.string(),
  windSpeed: z.string().nullish(),
  windDirection: z.string().nullish(),
  icon: z.string(),
  shortForecast: z.string(),
  detailedForecast: z.string().nullish(),
  probabilityOfPrecipitation: quantitativeValue,
  relativeHumidity: quantitativeValue,
  dewpoint: quantitativeValue,
})

const forecastSchema = z.object({
  properties: z.object({
    updated: z.string().optional(),
    periods: z.array(periodSchema),
  }),
})

const alertsSchema = z.object({
  features: z.array(
    z.object({
      properties: z.object({
        id: z.string(),
        event: z.string(),
        headline: z.string().nullish(),
        description: z.string().nullish(),
        severity: z.string().nullish(),
        effective: z.string(),
        expires: z.string().nullish(),
      }),
    })
  ),
})

type NwsPeriod = z.infer<typeof periodSchema>

export class NwsProvider extends BaseForecastProvider {
  constructor(config: Omit<ProviderConfig, "id">) {
    super({ ...config, id: "nws" })
  }

  async fetch(coordinate: Coordinate, unit: TemperatureUnit): Promise<ProviderForecast> {
    const baseUrl = this.getApiBaseUrl()
    const point = formatPoint(coordinate)

    console.log(`[NWS] Resolving grid for ${point}`)
    const { properties: grid } = await this.requestJson(`${baseUrl}/points/${point}`, pointSchema, "points")

    const [daily, hourly, alerts] = await Promise.all([
      this.requestJson(grid.forecast, forecastSchema, "forecast"),
      this.requestJson(grid.forecastHourly, forecastSchema, "hourly forecast"),
      this.fetchAlerts(baseUrl, point),
    ])

    const relative = grid.relativeLocation?.properties

    return {
      dailyForecasts: toDailyForecasts(daily.properties.periods, unit),
      hourlyForecasts: toHourlyForecasts(hourly.properties.periods, unit),
      alerts,
      metadata: {
        providerId: "nws",
        updatedAt: daily.properties.updated ?? new Date().toISOString(),
        providerRef: `${grid.gridId}/${grid.gridX},${grid.gridY}`,
        timezone: grid.timeZone,
        locationName: relative ? `${relative.city}, ${relative.state}` : undefined,
      },
    }
  }

  protected describeStatus(status: number): string {
    switch (status) {
      case 404:
        return "Location is outside NWS coverage"
      case 429:
        return "Rate limited"
      case 500:
      case 502:
      case 503:
        return `Service unavailable (${status})`
      default:
        return super.describeStatus(status)
    }
  }

  private async fetchAlerts(baseUrl: string, point: string): Promise<Alert[]> {
    try {
      const response = await this.requestJson(
        `${baseUrl}/alerts/active?point=${point}`,
        alertsSchema,
        "alerts"
      )
      return response.features.map(({ properties }) => ({
        id: properties.id,
        headline: properties.headline ?? properties.event,
        description: properties.description ?? "",
        severity: classifySeverity(properties.severity),
        event: properties.event,
        start: properties.effective,
        end: properties.expires ?? null,
      }))
    } catch (error: unknown) {
      console.warn(`[NWS] Alerts unavailable for ${point}: ${errorMessage(error)}`)
      return []
    }
  }
}

// api.weather.gov redirects coordinates with more than four decimals
function formatPoint({ latitude, longitude }: Coordinate): string {
  return `${Number(latitude.toFixed(4))},${Number(longitude.toFixed(4))}`
}

function precipitationFor(period: NwsPeriod): number {
  const reported = period.probabilityOfPrecipitation?.value
  if (reported !== null && reported !== undefined) {
    return clampPercent(reported)
  }
  const detailed = period.detailedForecast ?? ""
  return extractPrecipChance(detailed) || estimatePrecipChance(period.shortForecast)
}

function windFor(period: NwsPeriod): { speed: number; direction: string } {
  return {
    speed: parseWindSpeed(period.windSpeed),
    direction: period.windDirection ?? "",
  }
}

export function toDailyForecasts(periods: NwsPeriod[], unit: TemperatureUnit): DailyForecast[] {
  return pairDayNightPeriods(periods).map(({ day, night, primary }) => {
    const precipitation = Math.max(
      day ? precipitationFor(day) : 0,
      night ? precipitationFor(night) : 0
    )
    const humidity = primary.relativeHumidity?.value ?? undefined
    const dewpoint = primary.dewpoint?.value

    return {
      id: `day-${primary.number}`,
      date: primary.startTime,
      tempHigh: day ? convertTemperature(day.temperature, day.temperatureUnit, unit) : null,
      tempLow: night ? convertTemperature(night.temperature, night.temperatureUnit, unit) : null,
      precipitationChance: precipitation,
      uvIndex: day ? extractUvIndex(day.detailedForecast ?? "") : undefined,
      wind: windFor(primary),
      icon: mapNwsIcon(primary.icon),
      shortForecast: primary.shortForecast,
      detailedForecast: primary.detailedForecast ?? undefined,
      humidity,
      // NWS reports dewpoint in Celsius
      dewpoint:
        dewpoint !== null && dewpoint !== undefined
          ? convertTemperature(roundTo(dewpoint, 1), "C", unit)
          : undefined,
      skyCover: estimateSkyCover(primary.shortForecast),
    }
  })
}

export function toHourlyForecasts(periods: NwsPeriod[], unit: TemperatureUnit): HourlyForecast[] {
  return periods.slice(0, HOURLY_LIMIT).map((period) => ({
    id: `hour-${period.number}`,
    time: period.startTime,
    temperature: convertTemperature(period.temperature, period.temperatureUnit, unit),
    precipitationChance: precipitationFor(period),
    icon: mapNwsIcon(period.icon),
    shortForecast: period.shortForecast,
    wind: windFor(period),
    isDaytime: period.isDaytime,
    humidity: period.relativeHumidity?.value ?? undefined,
  }))
}
